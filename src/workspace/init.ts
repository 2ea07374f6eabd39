import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { generateId } from '../shared/ids.js';
import { ConfigurationError } from '../shared/errors.js';
import { getWorkspacePaths } from './paths.js';
import { openDb } from './db.js';
import { writeWorkspaceConfig } from './config.js';
import type { WorkspaceConfig } from './types.js';
import type { VaultProviderName } from '../vault/index.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
  vaultProvider?: VaultProviderName;
}

export interface InitResult {
  config: WorkspaceConfig;
  /** Absolute path of the pipeline file; null when one already existed. */
  pipelineCreated: string | null;
}

/** Starter pipeline: test, then release artifact and container image in parallel. */
export const PIPELINE_TEMPLATE = join(__dirname, '..', '..', 'templates', 'build.yaml');

export async function initWorkspace(opts: InitOptions = {}): Promise<InitResult> {
  const paths = getWorkspacePaths(opts.cwd);

  if (existsSync(paths.root) && !opts.force) {
    throw new ConfigurationError(`Workspace already exists at ${paths.root}. Use --force to reinitialize.`);
  }

  for (const dir of [paths.root, paths.artifactsDir, paths.jobsDir]) {
    mkdirSync(dir, { recursive: true });
  }

  const config: WorkspaceConfig = {
    project_id: generateId(12),
    pipeline_file: 'pipeline.yaml',
    vault_provider: opts.vaultProvider ?? 'file',
    docker_bin: 'docker',
    toolchain: { manager: 'rustup', build_command: 'cargo' },
    concurrency: { max_parallel: 0 },
    retry: { attempts: 3, delay_ms: 1000 },
    created_at: new Date().toISOString(),
    version: '0.1.0',
  };

  writeWorkspaceConfig(paths.config, config);
  openDb(paths.stateDb);

  const pipelinePath = join(paths.projectRoot, config.pipeline_file);
  let pipelineCreated: string | null = null;
  if (!existsSync(pipelinePath)) {
    copyFileSync(PIPELINE_TEMPLATE, pipelinePath);
    pipelineCreated = pipelinePath;
  }

  return { config, pipelineCreated };
}
