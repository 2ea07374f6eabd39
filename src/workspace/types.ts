import type { VaultProviderName } from '../vault/index.js';

export interface WorkspaceConfig {
  project_id: string;
  /** Pipeline definition path, relative to the project root. */
  pipeline_file: string;
  vault_provider: VaultProviderName;
  docker_bin: string;
  toolchain: {
    manager: 'rustup';
    build_command: string;
  };
  concurrency: {
    /** 0 means unbounded. */
    max_parallel: number;
  };
  retry: {
    attempts: number;
    delay_ms: number;
  };
  created_at: string;
  version: string;
}

export interface WorkspacePaths {
  projectRoot: string;  // directory holding .pipewright/
  root: string;         // .pipewright/
  config: string;       // .pipewright/config.yaml
  stateDb: string;      // .pipewright/state.db
  vaultFile: string;    // .pipewright/vault.json
  artifactsDir: string; // .pipewright/artifacts/
  jobsDir: string;      // .pipewright/jobs/ (per-job scratch environments)
}
