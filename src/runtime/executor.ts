import { PublishFailure, StepFailure, errorMessage } from '../shared/errors.js';
import { logger as rootLogger } from '../shared/logger.js';
import { stepDisplayName, type JobDefinition, type PushEvent } from '../pipeline/types.js';
import { executeStep, saveCaches } from './steps/index.js';
import type { ExecutionEnvironment } from './environment.js';
import type {
  EngineServices,
  JobError,
  JobResult,
  JobState,
  StepContext,
  StepResult,
} from './types.js';

export interface ExecuteJobOptions {
  runId: string;
  event: PushEvent;
  services: EngineServices;
  signal?: AbortSignal;
  /** Called once per step as it reaches its final status. */
  onStep?: (step: StepResult) => void;
}

function skippedSteps(job: JobDefinition, from: number): StepResult[] {
  return job.steps.slice(from).map((step, offset) => ({
    index: from + offset,
    name: stepDisplayName(step),
    kind: step.kind,
    status: 'skipped' as const,
  }));
}

function toJobError(err: unknown, step: number): JobError {
  const exitCode = err instanceof StepFailure ? err.exitCode : undefined;
  return {
    kind: err instanceof PublishFailure ? 'publish_failure' : 'step_failure',
    message: errorMessage(err),
    step,
    ...(exitCode !== undefined ? { exitCode } : {}),
  };
}

/**
 * Result for a job that never started: every step skipped.
 */
export function skippedJobResult(job: JobDefinition, reason: JobResult['skipReason']): JobResult {
  return {
    jobId: job.id,
    name: job.name,
    status: 'skipped',
    skipReason: reason,
    steps: skippedSteps(job, 0),
  };
}

/**
 * Run one job's steps, strictly in order, in a freshly provisioned environment.
 *
 * The first failing step fails the job and every later step is skipped. An
 * aborted signal stops the job the same way but leaves it `skipped` with
 * reason `cancelled`. Never rejects: every outcome is a JobResult.
 */
export async function executeJob(job: JobDefinition, opts: ExecuteJobOptions): Promise<JobResult> {
  const { services, signal } = opts;
  const log = rootLogger.child({ run_id: opts.runId, job: job.id });
  const startedAt = new Date().toISOString();
  const steps: StepResult[] = [];

  const finish = (status: JobResult['status'], extra: Partial<JobResult> = {}): JobResult => ({
    jobId: job.id,
    name: job.name,
    status,
    steps,
    startedAt,
    endedAt: new Date().toISOString(),
    ...extra,
  });

  const record = (result: StepResult) => {
    steps.push(result);
    opts.onStep?.(result);
  };

  let environment: ExecutionEnvironment;
  try {
    environment = await services.environments.provision({
      runId: opts.runId,
      jobId: job.id,
      runsOn: job.runs_on,
      event: opts.event,
    });
  } catch (err) {
    log.error('Failed to provision job environment', { error: errorMessage(err) });
    skippedSteps(job, 0).forEach(record);
    return finish('failed', { error: { kind: 'environment', message: errorMessage(err) } });
  }

  const state: JobState = { cacheSaves: [] };
  const ctx: StepContext = {
    runId: opts.runId,
    event: opts.event,
    job,
    environment,
    services,
    state,
    signal,
    log,
    command: {
      cwd: environment.workspaceDir,
      env: environment.env,
      signal,
      onLine: (line, stream) => log.info(line, { stream }),
    },
  };

  let error: JobError | undefined;
  let cancelled = false;

  try {
    for (const [index, step] of job.steps.entries()) {
      if (signal?.aborted) {
        cancelled = true;
        skippedSteps(job, index).forEach(record);
        break;
      }

      const name = stepDisplayName(step);
      const stepStartedAt = new Date().toISOString();
      log.info('Step started', { step: index, name, kind: step.kind });

      try {
        await executeStep(step, ctx);
        record({
          index,
          name,
          kind: step.kind,
          status: 'succeeded',
          startedAt: stepStartedAt,
          endedAt: new Date().toISOString(),
        });
      } catch (err) {
        const endedAt = new Date().toISOString();
        if (signal?.aborted) {
          cancelled = true;
          log.warn('Step interrupted by cancellation', { step: index, name });
          record({ index, name, kind: step.kind, status: 'skipped', error: 'cancelled', startedAt: stepStartedAt, endedAt });
        } else {
          error = toJobError(err, index);
          log.error('Step failed', { step: index, name, error: error.message, exit_code: error.exitCode });
          record({
            index,
            name,
            kind: step.kind,
            status: 'failed',
            error: error.message,
            exitCode: error.exitCode,
            startedAt: stepStartedAt,
            endedAt,
          });
        }
        skippedSteps(job, index + 1).forEach(record);
        break;
      }
    }

    if (!error && !cancelled) {
      await saveCaches(ctx);
    }
  } finally {
    try {
      await environment.dispose();
    } catch (err) {
      log.warn('Failed to dispose job environment', { environment: environment.id, error: errorMessage(err) });
    }
  }

  if (cancelled) return finish('skipped', { skipReason: 'cancelled' });
  if (error) return finish('failed', { error });
  return finish('succeeded');
}
