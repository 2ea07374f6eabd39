import { getWorkspacePaths } from '../workspace/paths.js';
import { readWorkspaceConfig } from '../workspace/config.js';
import { openDb } from '../workspace/db.js';
import { errorMessage } from '../shared/errors.js';
import type { WorkspaceConfig, WorkspacePaths } from '../workspace/types.js';
import type { JobResult, PipelineRunResult } from '../runtime/types.js';
import type Database from 'better-sqlite3';

export interface WorkspaceContext {
  paths: WorkspacePaths;
  config: WorkspaceConfig;
  db: Database.Database;
}

/**
 * Load workspace config and open db, or print error and exit.
 * Use at the top of every CLI command that requires an initialized workspace.
 */
export function requireWorkspace(cwd?: string): WorkspaceContext {
  const paths = getWorkspacePaths(cwd);
  let config: WorkspaceConfig;
  try {
    config = readWorkspaceConfig(paths.config);
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
  const db = openDb(paths.stateDb);
  return { paths, config, db };
}

/** Parse a positive integer option, exiting with a message on bad input. */
export function parseIntOption(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.error(`Invalid value for ${flag}: ${value}`);
    process.exit(1);
  }
  return parsed;
}

const STATUS_ICON: Record<JobResult['status'], string> = {
  succeeded: '✓',
  failed: '✗',
  skipped: '-',
};

export function printRunSummary(result: PipelineRunResult): void {
  console.log(`\nRun ${result.runId}: ${result.status}${result.cancelled ? ' (cancelled)' : ''}`);
  for (const job of result.jobs) {
    const reason = job.skipReason ? ` (${job.skipReason})` : '';
    console.log(`  ${STATUS_ICON[job.status]} ${job.name} [${job.jobId}] ${job.status}${reason}`);
    if (job.error) {
      const step = job.error.step !== undefined ? ` at step ${job.error.step + 1}` : '';
      console.log(`      ${job.error.kind}${step}: ${job.error.message}`);
    }
  }
}
