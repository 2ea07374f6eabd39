import { triggerPipeline } from '../runtime/engine.js';
import { matchesTrigger } from '../pipeline/trigger.js';
import { buildDag } from '../runtime/dag.js';
import { generateRunId } from '../shared/ids.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { PipelineDefinition, PushEvent } from '../pipeline/types.js';
import type { EngineServices } from '../runtime/types.js';
import type { RunStore } from '../runs/store.js';
import type { DispatchResult, RunDispatcher } from './types.js';

export interface BackgroundDispatcherOptions {
  /** Called per push, so edits to the pipeline file apply to the next run. */
  loadDefinition: () => PipelineDefinition;
  services: EngineServices;
  store: RunStore;
  maxParallel?: number;
}

/**
 * Runs each matching push in the background, recording into the run store.
 * Invalid definitions, including a broken job graph, surface to the caller;
 * run outcomes only in the store.
 */
export class BackgroundRunDispatcher implements RunDispatcher {
  private readonly inflight = new Set<Promise<void>>();

  constructor(private readonly opts: BackgroundDispatcherOptions) {}

  dispatch(event: PushEvent): DispatchResult {
    const definition = this.opts.loadDefinition();
    buildDag(Object.values(definition.jobs));
    if (!matchesTrigger(definition, event)) return { triggered: false };

    const runId = generateRunId();
    const task = triggerPipeline(definition, event, {
      services: this.opts.services,
      store: this.opts.store,
      runId,
      maxParallel: this.opts.maxParallel,
      triggeredBy: event.pusher ?? 'webhook',
    })
      .then((result) => {
        logger.info('Webhook run finished', { run_id: runId, status: result?.status });
      })
      .catch((err: unknown) => {
        logger.error('Webhook run failed', { run_id: runId, error: errorMessage(err) });
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);

    return { triggered: true, runId };
  }

  async drain(): Promise<void> {
    await Promise.all([...this.inflight]);
  }
}
