import { SqliteCacheStore } from '../cache/store.js';
import { ArtifactStore } from '../publish/artifacts.js';
import { DockerRegistryClient } from '../publish/registry.js';
import { getVaultProvider } from '../vault/index.js';
import { openDb } from '../workspace/db.js';
import type { WorkspaceConfig, WorkspacePaths } from '../workspace/types.js';
import { LocalEnvironmentProvider } from './environment.js';
import { SpawnProcessRunner } from './process-runner.js';
import { RustupToolchain } from './toolchain.js';
import type { EngineServices } from './types.js';

export interface Workspace {
  paths: WorkspacePaths;
  config: WorkspaceConfig;
}

/**
 * Wire the default services for a workspace: sqlite-backed cache and artifact
 * index, docker for the registry, rustup for toolchains, and local temp
 * directories for job environments. Anything in `overrides` replaces the default.
 */
export function createEngineServices(workspace: Workspace, overrides: Partial<EngineServices> = {}): EngineServices {
  const { paths, config } = workspace;
  const db = openDb(paths.stateDb);
  const processes = overrides.processes ?? new SpawnProcessRunner();

  return {
    cache: new SqliteCacheStore(db),
    artifacts: new ArtifactStore(db, paths.artifactsDir),
    registry: new DockerRegistryClient(processes, { dockerBin: config.docker_bin }),
    vault: getVaultProvider({ provider: config.vault_provider, filePath: paths.vaultFile }),
    toolchain: new RustupToolchain(processes),
    environments: new LocalEnvironmentProvider({ baseDir: paths.jobsDir }),
    buildCommand: config.toolchain.build_command,
    retry: { attempts: config.retry.attempts, delayMs: config.retry.delay_ms },
    defaultRepository: paths.projectRoot,
    ...overrides,
    processes,
  };
}
