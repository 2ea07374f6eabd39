import type { Command } from 'commander';
import { RunStore } from '../../runs/store.js';
import { parseIntOption, requireWorkspace } from '../cli-shared.js';

export function registerRunsCommand(program: Command): void {
  const runs = program.command('runs').description('Inspect run history');

  runs
    .command('list')
    .description('List recent runs, newest first')
    .option('-n, --limit <n>', 'Number of runs', '20')
    .option('-b, --branch <branch>', 'Only runs for this branch')
    .action((opts: { limit: string; branch?: string }) => {
      const { db } = requireWorkspace();
      const list = new RunStore(db).listRuns({ limit: parseIntOption(opts.limit, '--limit'), branch: opts.branch });
      if (list.length === 0) {
        console.log('No runs yet.');
        return;
      }
      for (const run of list) {
        const cancelled = run.cancelled ? ' (cancelled)' : '';
        console.log(`${run.id}  ${run.status.padEnd(9)}${cancelled}  ${run.branch}@${run.sha.slice(0, 7)}  ${run.started_at}`);
      }
    });

  runs
    .command('show <id>')
    .description('Show jobs and steps of one run')
    .action((id: string) => {
      const { db } = requireWorkspace();
      const run = new RunStore(db).getRun(id);
      if (!run) {
        console.error(`Run not found: ${id}`);
        process.exit(1);
      }
      console.log(`Run ${run.id} (${run.pipeline}): ${run.status}${run.cancelled ? ' (cancelled)' : ''}`);
      console.log(`  Push: ${run.branch}@${run.sha}`);
      for (const job of run.jobs) {
        const reason = job.skip_reason ? ` (${job.skip_reason})` : '';
        console.log(`\n  ${job.name} [${job.job_id}]: ${job.status}${reason}`);
        if (job.error) console.log(`    ${job.error_kind ?? 'error'}: ${job.error}`);
        for (const step of job.steps) {
          const exit = step.exit_code !== null ? ` exit ${step.exit_code}` : '';
          console.log(`    ${step.step_index + 1}. ${step.name}: ${step.status}${exit}`);
        }
      }
    });
}
