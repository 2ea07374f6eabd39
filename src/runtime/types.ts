import type { CacheStore } from '../cache/store.js';
import type { ToolchainInfo } from '../cache/key.js';
import type { ArtifactStore } from '../publish/artifacts.js';
import type { ContainerRegistry } from '../publish/registry.js';
import type { VaultProvider } from '../vault/types.js';
import type {
  JobDefinition,
  PushEvent,
  SkipReason,
  StepKind,
  StepStatus,
  TerminalJobStatus,
} from '../pipeline/types.js';
import type { RetryPolicy } from '../shared/retry.js';
import type { Logger } from '../shared/logger.js';
import type { CommandContext, ProcessRunner } from './process-runner.js';
import type { EnvironmentProvider, ExecutionEnvironment } from './environment.js';

export type PipelineStatus = 'succeeded' | 'failed';

export interface Toolchain {
  install(version: string, override: boolean, ctx: CommandContext): Promise<ToolchainInfo>;
}

/**
 * Everything a run reaches outside itself. Shared services (cache, artifact
 * store, registry, vault) are passed by reference into every job.
 */
export interface EngineServices {
  cache: CacheStore;
  artifacts: ArtifactStore;
  registry: ContainerRegistry;
  vault: VaultProvider;
  toolchain: Toolchain;
  processes: ProcessRunner;
  environments: EnvironmentProvider;
  /** Executable behind invoke-build (`cargo`). */
  buildCommand: string;
  /** Applied to cache restores and registry login/push only. */
  retry: RetryPolicy;
  /** Checked out when the push event names no repository. */
  defaultRepository: string;
}

export type JobErrorKind = 'step_failure' | 'publish_failure' | 'environment';

export interface JobError {
  kind: JobErrorKind;
  message: string;
  /** Index of the failing step, when a step failed. */
  step?: number;
  exitCode?: number;
}

export interface StepResult {
  index: number;
  name: string;
  kind: StepKind;
  status: StepStatus;
  error?: string;
  exitCode?: number;
  startedAt?: string;
  endedAt?: string;
}

export interface JobResult {
  jobId: string;
  name: string;
  status: TerminalJobStatus;
  /** Set when status is skipped. */
  skipReason?: SkipReason;
  steps: StepResult[];
  error?: JobError;
  startedAt?: string;
  endedAt?: string;
}

export interface PipelineRunResult {
  runId: string;
  pipeline: string;
  event: PushEvent;
  /** succeeded iff every job succeeded. */
  status: PipelineStatus;
  cancelled: boolean;
  /** In declaration order. */
  jobs: JobResult[];
  startedAt: string;
  endedAt: string;
}

export interface PendingCacheSave {
  key: string;
  paths: string[];
  /** Content hash of the entry restored under `key`, null on a miss. */
  restoredHash: string | null;
}

/** Mutable per-job state carried from step to step. */
export interface JobState {
  toolchain?: ToolchainInfo;
  cacheSaves: PendingCacheSave[];
}

export interface StepContext {
  runId: string;
  event: PushEvent;
  job: JobDefinition;
  environment: ExecutionEnvironment;
  services: EngineServices;
  state: JobState;
  /** Runs in the job workspace with the job environment. */
  command: CommandContext;
  signal?: AbortSignal;
  log: Logger;
}
