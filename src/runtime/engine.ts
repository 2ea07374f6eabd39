import { logger } from '../shared/logger.js';
import { matchesTrigger } from '../pipeline/trigger.js';
import { attachRunRecorder } from '../runs/recorder.js';
import type { PipelineDefinition, PushEvent } from '../pipeline/types.js';
import type { RunStore } from '../runs/store.js';
import { RunEvents } from './events.js';
import { runPipeline, type RunPipelineOptions } from './scheduler.js';
import type { PipelineRunResult } from './types.js';

export interface TriggerOptions extends RunPipelineOptions {
  /** Run history to record into. */
  store?: RunStore;
  /** Recorded with the run ("cli", "webhook", a pusher name). */
  triggeredBy?: string;
}

/**
 * Entry point for a push: runs the pipeline when the event matches its
 * trigger, otherwise resolves null without touching anything.
 */
export async function triggerPipeline(
  definition: PipelineDefinition,
  event: PushEvent,
  opts: TriggerOptions,
): Promise<PipelineRunResult | null> {
  if (!matchesTrigger(definition, event)) {
    logger.info('Push does not match pipeline trigger', {
      pipeline: definition.name,
      branch: event.branch,
      trigger_branch: definition.on.push.branch,
    });
    return null;
  }

  const events = opts.events ?? new RunEvents();
  const detach = opts.store ? attachRunRecorder(events, opts.store, opts.triggeredBy) : undefined;
  try {
    return await runPipeline(definition, event, { ...opts, events });
  } finally {
    detach?.();
  }
}
