import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { RunEvents } from '../runtime/events.js';
import type { RunStore } from './store.js';

/**
 * Persist a run's progress as it happens. Returns a function that detaches
 * the recorder. A failed write is logged; the run itself carries on.
 */
export function attachRunRecorder(events: RunEvents, store: RunStore, triggeredBy?: string): () => void {
  const guard = (what: string, write: () => void) => {
    try {
      write();
    } catch (err) {
      logger.error('Failed to record run progress', { write: what, error: errorMessage(err) });
    }
  };

  const detach = [
    events.on('run:started', ({ runId, pipeline, event, jobs }) =>
      guard('run', () =>
        store.createRun({ id: runId, pipeline, event, triggeredBy, startedAt: new Date().toISOString(), jobs }),
      ),
    ),
    events.on('job:status', ({ runId, jobId, to, result }) =>
      guard('job', () => {
        if (result) store.completeJob(runId, result);
        else store.updateJobStatus(runId, jobId, to);
      }),
    ),
    events.on('step:finished', ({ runId, jobId, step }) => guard('step', () => store.recordStep(runId, jobId, step))),
    events.on('run:finished', ({ result }) => guard('run', () => store.completeRun(result))),
  ];

  return () => detach.forEach((off) => off());
}
