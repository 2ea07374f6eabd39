import { resolve } from 'node:path';
import type { Command } from 'commander';
import { loadPipelineDefinition } from '../../pipeline/loader.js';
import { buildDag, getParallelLayers } from '../../runtime/dag.js';
import { stepDisplayName, type PipelineDefinition } from '../../pipeline/types.js';
import { errorMessage } from '../../shared/errors.js';
import { requireWorkspace } from '../cli-shared.js';

/** Load the pipeline file and check its job graph; exits on any problem. */
export function loadCheckedPipeline(file?: string): { definition: PipelineDefinition; layers: string[][] } {
  let path: string;
  if (file) {
    path = resolve(file);
  } else {
    const { paths, config } = requireWorkspace();
    path = resolve(paths.projectRoot, config.pipeline_file);
  }
  try {
    const definition = loadPipelineDefinition(path);
    const layers = getParallelLayers(buildDag(Object.values(definition.jobs)));
    return { definition, layers };
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
}

export function registerValidateCommands(program: Command): void {
  program
    .command('validate')
    .description('Check the pipeline definition and its job graph')
    .option('-f, --file <path>', 'Pipeline file (default: the workspace pipeline)')
    .action((opts: { file?: string }) => {
      const { definition } = loadCheckedPipeline(opts.file);
      const jobCount = Object.keys(definition.jobs).length;
      console.log(`Pipeline "${definition.name}" is valid: ${jobCount} job(s), triggered by push to ${definition.on.push.branch}`);
    });

  program
    .command('plan')
    .description('Show the order jobs would run in')
    .option('-f, --file <path>', 'Pipeline file (default: the workspace pipeline)')
    .action((opts: { file?: string }) => {
      const { definition, layers } = loadCheckedPipeline(opts.file);
      console.log(`Pipeline: ${definition.name} (push to ${definition.on.push.branch})`);
      layers.forEach((layer, index) => {
        console.log(`\nStage ${index + 1}:`);
        for (const jobId of layer) {
          const job = definition.jobs[jobId];
          if (!job) continue;
          const needs = job.needs.length > 0 ? ` (needs: ${job.needs.join(', ')})` : '';
          console.log(`  ${job.name} [${job.id}] on ${job.runs_on}${needs}`);
          job.steps.forEach((step, i) => console.log(`    ${i + 1}. ${stepDisplayName(step)}`));
        }
      });
    });
}
