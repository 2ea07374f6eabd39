import { EventEmitter } from 'node:events';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { JobStatus, PushEvent, SkipReason } from '../pipeline/types.js';
import type { JobResult, PipelineRunResult, StepResult } from './types.js';

export interface RunEventMap {
  'run:started': { runId: string; pipeline: string; event: PushEvent; jobs: { id: string; name: string }[] };
  'job:status': {
    runId: string;
    jobId: string;
    from: JobStatus;
    to: JobStatus;
    reason?: SkipReason;
    /** Present once the job reaches a terminal status. */
    result?: JobResult;
  };
  'step:finished': { runId: string; jobId: string; step: StepResult };
  'run:finished': { result: PipelineRunResult };
}

export type RunEventName = keyof RunEventMap;

/**
 * Progress notifications for a run. Listeners are called synchronously; a
 * listener that throws is logged and does not disturb the run.
 */
export class RunEvents {
  private readonly emitter = new EventEmitter();

  on<K extends RunEventName>(name: K, listener: (payload: RunEventMap[K]) => void): () => void {
    const wrapped = (payload: RunEventMap[K]) => {
      try {
        listener(payload);
      } catch (err) {
        logger.warn('Run event listener failed', { event: name, error: errorMessage(err) });
      }
    };
    this.emitter.on(name, wrapped);
    return () => {
      this.emitter.off(name, wrapped);
    };
  }

  emit<K extends RunEventName>(name: K, payload: RunEventMap[K]): void {
    this.emitter.emit(name, payload);
  }
}
