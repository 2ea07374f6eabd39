export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';
export type TerminalJobStatus = Extract<JobStatus, 'succeeded' | 'failed' | 'skipped'>;

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

/** Why a job never ran (or stopped): an upstream job did not succeed, or the run was aborted. */
export type SkipReason = 'upstream' | 'cancelled';

export type BuildMode = 'test' | 'release';

interface BaseStep {
  /** Display name; defaults to the step kind. */
  name?: string;
}

export interface CheckoutSourceStep extends BaseStep {
  kind: 'checkout-source';
}

export interface InstallToolchainStep extends BaseStep {
  kind: 'install-toolchain';
  version: string;
  override: boolean;
}

export interface RestoreOrSeedCacheStep extends BaseStep {
  kind: 'restore-or-seed-cache';
  /** Key template, e.g. `{{ os }}-test-{{ toolchain.hash }}-{{ hashFiles('**\/Cargo.lock') }}` */
  key: string;
  paths: string[];
}

export interface InvokeBuildStep extends BaseStep {
  kind: 'invoke-build';
  mode: BuildMode;
  args: string[];
}

export interface UploadArtifactStep extends BaseStep {
  kind: 'upload-artifact';
  artifact: string;
  path: string;
}

export interface AuthenticateRegistryStep extends BaseStep {
  kind: 'authenticate-registry';
  username: string;
  /** Vault key holding the registry access token. */
  secret: string;
  /** Registry host; omitted means the docker default (Docker Hub). */
  registry?: string;
}

export interface BuildContainerImageStep extends BaseStep {
  kind: 'build-container-image';
  tag: string;
  /** Build context relative to the job workspace. */
  context: string;
}

export interface PushContainerImageStep extends BaseStep {
  kind: 'push-container-image';
  tag: string;
}

export type StepDefinition =
  | CheckoutSourceStep
  | InstallToolchainStep
  | RestoreOrSeedCacheStep
  | InvokeBuildStep
  | UploadArtifactStep
  | AuthenticateRegistryStep
  | BuildContainerImageStep
  | PushContainerImageStep;

export type StepKind = StepDefinition['kind'];

export interface JobDefinition {
  id: string;
  name: string;
  runs_on: string;
  needs: string[];
  steps: StepDefinition[];
}

export interface PushTrigger {
  branch: string;
}

export interface PipelineDefinition {
  name: string;
  on: { push: PushTrigger };
  /** Keyed by job id, in declaration order. */
  jobs: Record<string, JobDefinition>;
}

export interface PushEvent {
  branch: string;
  sha: string;
  /** Clone URL or local path; defaults to the project root. */
  repository?: string;
  pusher?: string;
}

export function stepDisplayName(step: StepDefinition): string {
  return step.name ?? step.kind;
}
