import type { Command } from 'commander';
import { triggerPipeline } from '../../runtime/engine.js';
import { createEngineServices } from '../../runtime/services.js';
import { RunStore } from '../../runs/store.js';
import { logger } from '../../shared/logger.js';
import { errorMessage } from '../../shared/errors.js';
import { parseIntOption, printRunSummary, requireWorkspace } from '../cli-shared.js';
import { loadCheckedPipeline } from './validate.js';

interface RunCommandOptions {
  branch: string;
  sha: string;
  repository?: string;
  file?: string;
  maxParallel?: string;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the pipeline for a push to <branch> at <sha>')
    .requiredOption('-b, --branch <branch>', 'Branch that was pushed')
    .requiredOption('-s, --sha <sha>', 'Commit that was pushed')
    .option('-r, --repository <url>', 'Repository to check out (default: this project)')
    .option('-f, --file <path>', 'Pipeline file (default: the workspace pipeline)')
    .option('--max-parallel <n>', 'Jobs running at once (0 = no limit)')
    .action(async (opts: RunCommandOptions) => {
      const workspace = requireWorkspace();
      const { definition } = loadCheckedPipeline(opts.file);
      const maxParallel = opts.maxParallel
        ? parseIntOption(opts.maxParallel, '--max-parallel')
        : workspace.config.concurrency.max_parallel;

      const controller = new AbortController();
      const onSignal = () => {
        if (controller.signal.aborted) return;
        console.error('\nCancelling run: running jobs will stop, pending jobs are skipped...');
        controller.abort();
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      try {
        const result = await triggerPipeline(
          definition,
          { branch: opts.branch, sha: opts.sha, repository: opts.repository, pusher: 'cli' },
          {
            services: createEngineServices(workspace),
            store: new RunStore(workspace.db),
            triggeredBy: 'cli',
            signal: controller.signal,
            maxParallel,
          },
        );

        if (!result) {
          console.log(`Push to ${opts.branch} does not trigger "${definition.name}" (listens on ${definition.on.push.branch}).`);
          return;
        }

        printRunSummary(result);
        if (result.status !== 'succeeded') process.exitCode = 1;
      } catch (err) {
        logger.error('Run failed', { error: errorMessage(err) });
        console.error(`Run failed: ${errorMessage(err)}`);
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    });
}
