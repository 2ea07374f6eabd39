export * from './pipeline/types.js';
export { parsePipelineDefinition, loadPipelineDefinition } from './pipeline/loader.js';
export { matchesTrigger, parsePushWebhook, verifyWebhookSignature } from './pipeline/trigger.js';

export { buildDag, getParallelLayers, getTopologicalOrder, getTransitiveDependents } from './runtime/dag.js';
export type { DagNode, JobGraph } from './runtime/dag.js';
export { admit } from './runtime/gate.js';
export type { GateDecision } from './runtime/gate.js';
export { executeJob } from './runtime/executor.js';
export { runPipeline } from './runtime/scheduler.js';
export type { RunPipelineOptions } from './runtime/scheduler.js';
export { triggerPipeline } from './runtime/engine.js';
export type { TriggerOptions } from './runtime/engine.js';
export { RunEvents } from './runtime/events.js';
export type { RunEventMap, RunEventName } from './runtime/events.js';
export { createEngineServices } from './runtime/services.js';
export type * from './runtime/types.js';

export { SqliteCacheStore } from './cache/store.js';
export type { CacheEntry, CacheEntrySummary, CacheStore } from './cache/store.js';
export { renderCacheKey } from './cache/key.js';
export { ArtifactStore } from './publish/artifacts.js';
export type { ArtifactRecord } from './publish/artifacts.js';
export { DockerRegistryClient } from './publish/registry.js';
export type { ContainerRegistry, RegistryLogin } from './publish/registry.js';

export { RunStore } from './runs/store.js';
export { attachRunRecorder } from './runs/recorder.js';

export * from './shared/errors.js';
