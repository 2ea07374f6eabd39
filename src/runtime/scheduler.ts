import { errorMessage } from '../shared/errors.js';
import { generateRunId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import type { JobDefinition, JobStatus, PipelineDefinition, PushEvent, SkipReason } from '../pipeline/types.js';
import { buildDag } from './dag.js';
import { executeJob, skippedJobResult } from './executor.js';
import { admit } from './gate.js';
import type { RunEvents } from './events.js';
import type { EngineServices, JobResult, PipelineRunResult } from './types.js';

export interface RunPipelineOptions {
  services: EngineServices;
  runId?: string;
  /** Aborting cancels the run: running jobs stop, pending jobs are skipped. */
  signal?: AbortSignal;
  /** Jobs running at once; 0 or unset means no limit. */
  maxParallel?: number;
  events?: RunEvents;
}

/**
 * Run every job of a pipeline for one push event.
 *
 * Jobs start as soon as the gate admits them, so independent jobs overlap.
 * A job whose prerequisite failed or was skipped is skipped without running,
 * which carries a failure down every chain below it. Siblings of a failed job
 * keep going. The returned promise resolves once every job is terminal; it
 * rejects only when the job graph itself is invalid, before anything runs.
 */
export async function runPipeline(
  definition: PipelineDefinition,
  event: PushEvent,
  opts: RunPipelineOptions,
): Promise<PipelineRunResult> {
  const jobs: JobDefinition[] = Object.values(definition.jobs);
  buildDag(jobs);

  const runId = opts.runId ?? generateRunId(new Date());
  const { services, signal, events } = opts;
  const limit = opts.maxParallel && opts.maxParallel > 0 ? opts.maxParallel : Infinity;
  const log = logger.child({ run_id: runId, pipeline: definition.name });

  const statuses = new Map<string, JobStatus>(jobs.map((job) => [job.id, 'pending']));
  const results = new Map<string, JobResult>();
  const running = new Map<string, Promise<void>>();

  const startedAt = new Date().toISOString();
  log.info('Pipeline run started', { branch: event.branch, sha: event.sha, jobs: jobs.length });
  events?.emit('run:started', {
    runId,
    pipeline: definition.name,
    event,
    jobs: jobs.map((job) => ({ id: job.id, name: job.name })),
  });

  const transition = (jobId: string, to: JobStatus, result?: JobResult, reason?: SkipReason) => {
    const from = statuses.get(jobId) ?? 'pending';
    if (from === to) return;
    statuses.set(jobId, to);
    if (result) results.set(jobId, result);
    log.info('Job status changed', { job: jobId, from, to, ...(reason ? { reason } : {}) });
    events?.emit('job:status', {
      runId,
      jobId,
      from,
      to,
      ...(reason ? { reason } : {}),
      ...(result ? { result } : {}),
    });
  };

  const skip = (job: JobDefinition, reason: SkipReason) => {
    transition(job.id, 'skipped', skippedJobResult(job, reason), reason);
  };

  const start = (job: JobDefinition) => {
    transition(job.id, 'running');
    const task = executeJob(job, {
      runId,
      event,
      services,
      signal,
      onStep: (step) => events?.emit('step:finished', { runId, jobId: job.id, step }),
    })
      .catch((err: unknown): JobResult => {
        log.error('Job executor rejected', { job: job.id, error: errorMessage(err) });
        return {
          jobId: job.id,
          name: job.name,
          status: 'failed',
          steps: [],
          error: { kind: 'step_failure', message: errorMessage(err) },
        };
      })
      .then((result) => {
        running.delete(job.id);
        transition(job.id, result.status, result, result.skipReason);
      });
    running.set(job.id, task);
  };

  for (;;) {
    let progressed = true;
    while (progressed) {
      progressed = false;
      for (const job of jobs) {
        if (statuses.get(job.id) !== 'pending') continue;

        if (signal?.aborted) {
          skip(job, 'cancelled');
          progressed = true;
          continue;
        }

        const decision = admit(job, statuses);
        if (decision === 'skip') {
          skip(job, 'upstream');
          progressed = true;
        } else if (decision === 'admit' && running.size < limit) {
          start(job);
          progressed = true;
        }
      }
    }

    if (running.size === 0) break;
    await Promise.race(running.values());
  }

  const jobResults = jobs.map((job) => results.get(job.id) ?? skippedJobResult(job, 'upstream'));
  const cancelled = (signal?.aborted ?? false) || jobResults.some((job) => job.skipReason === 'cancelled');
  const result: PipelineRunResult = {
    runId,
    pipeline: definition.name,
    event,
    status: jobResults.every((job) => job.status === 'succeeded') ? 'succeeded' : 'failed',
    cancelled,
    jobs: jobResults,
    startedAt,
    endedAt: new Date().toISOString(),
  };

  log.info('Pipeline run finished', { status: result.status, cancelled });
  events?.emit('run:finished', { result });
  return result;
}
