import type Database from 'better-sqlite3';
import type { JobStatus, PushEvent, SkipReason } from '../pipeline/types.js';
import type { JobResult, PipelineRunResult, StepResult } from '../runtime/types.js';

export interface RunRecord {
  id: string;
  pipeline: string;
  branch: string;
  sha: string;
  status: 'running' | 'succeeded' | 'failed';
  cancelled: 0 | 1;
  triggered_by: string | null;
  started_at: string;
  ended_at: string | null;
}

export interface JobRunRecord {
  run_id: string;
  job_id: string;
  name: string;
  status: JobStatus;
  skip_reason: SkipReason | null;
  error_kind: string | null;
  error: string | null;
  started_at: string | null;
  ended_at: string | null;
}

export interface StepRunRecord {
  run_id: string;
  job_id: string;
  step_index: number;
  name: string;
  kind: string;
  status: StepResult['status'];
  error: string | null;
  exit_code: number | null;
  started_at: string | null;
  ended_at: string | null;
}

export interface RunDetail extends RunRecord {
  jobs: (JobRunRecord & { steps: StepRunRecord[] })[];
}

export interface NewRun {
  id: string;
  pipeline: string;
  event: PushEvent;
  triggeredBy?: string;
  startedAt: string;
  jobs: { id: string; name: string }[];
}

/**
 * Run history in the workspace state DB. Jobs are written pending when the
 * run starts and updated as they move, so an interrupted run still shows
 * where it stopped.
 */
export class RunStore {
  constructor(private readonly db: Database.Database) {}

  createRun(run: NewRun): void {
    const insertRun = this.db.prepare(
      `INSERT INTO runs (id, pipeline, branch, sha, status, cancelled, triggered_by, started_at)
       VALUES (?, ?, ?, ?, 'running', 0, ?, ?)`,
    );
    const insertJob = this.db.prepare(
      `INSERT INTO job_runs (run_id, job_id, name, status) VALUES (?, ?, ?, 'pending')`,
    );

    this.db.transaction(() => {
      insertRun.run(run.id, run.pipeline, run.event.branch, run.event.sha, run.triggeredBy ?? null, run.startedAt);
      for (const job of run.jobs) insertJob.run(run.id, job.id, job.name);
    })();
  }

  updateJobStatus(runId: string, jobId: string, status: JobStatus): void {
    this.db
      .prepare(
        `UPDATE job_runs SET status = ?,
           started_at = CASE WHEN ? = 'running' THEN ? ELSE started_at END
         WHERE run_id = ? AND job_id = ?`,
      )
      .run(status, status, new Date().toISOString(), runId, jobId);
  }

  recordStep(runId: string, jobId: string, step: StepResult): void {
    this.db
      .prepare(
        `INSERT INTO step_runs (run_id, job_id, step_index, name, kind, status, error, exit_code, started_at, ended_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(run_id, job_id, step_index) DO UPDATE SET
           status = excluded.status,
           error = excluded.error,
           exit_code = excluded.exit_code,
           started_at = excluded.started_at,
           ended_at = excluded.ended_at`,
      )
      .run(
        runId,
        jobId,
        step.index,
        step.name,
        step.kind,
        step.status,
        step.error ?? null,
        step.exitCode ?? null,
        step.startedAt ?? null,
        step.endedAt ?? null,
      );
  }

  /** Final state of a job, including every step result. */
  completeJob(runId: string, result: JobResult): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `UPDATE job_runs SET status = ?, skip_reason = ?, error_kind = ?, error = ?,
             started_at = COALESCE(?, started_at), ended_at = ?
           WHERE run_id = ? AND job_id = ?`,
        )
        .run(
          result.status,
          result.skipReason ?? null,
          result.error?.kind ?? null,
          result.error?.message ?? null,
          result.startedAt ?? null,
          result.endedAt ?? new Date().toISOString(),
          runId,
          result.jobId,
        );
      for (const step of result.steps) this.recordStep(runId, result.jobId, step);
    })();
  }

  completeRun(result: PipelineRunResult): void {
    this.db
      .prepare(`UPDATE runs SET status = ?, cancelled = ?, ended_at = ? WHERE id = ?`)
      .run(result.status, result.cancelled ? 1 : 0, result.endedAt, result.runId);
  }

  listRuns(opts: { limit?: number; offset?: number; branch?: string } = {}): RunRecord[] {
    const limit = opts.limit ?? 50;
    const offset = opts.offset ?? 0;
    if (opts.branch) {
      return this.db
        .prepare(`SELECT * FROM runs WHERE branch = ? ORDER BY started_at DESC, rowid DESC LIMIT ? OFFSET ?`)
        .all(opts.branch, limit, offset) as RunRecord[];
    }
    return this.db
      .prepare(`SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ? OFFSET ?`)
      .all(limit, offset) as RunRecord[];
  }

  getRun(id: string): RunDetail | null {
    const run = this.db.prepare(`SELECT * FROM runs WHERE id = ?`).get(id) as RunRecord | undefined;
    if (!run) return null;

    const jobs = this.db
      .prepare(`SELECT * FROM job_runs WHERE run_id = ? ORDER BY rowid`)
      .all(id) as JobRunRecord[];
    const steps = this.db
      .prepare(`SELECT * FROM step_runs WHERE run_id = ? ORDER BY job_id, step_index`)
      .all(id) as StepRunRecord[];

    return {
      ...run,
      jobs: jobs.map((job) => ({ ...job, steps: steps.filter((step) => step.job_id === job.job_id) })),
    };
  }
}
