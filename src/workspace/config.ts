import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import type { WorkspaceConfig } from './types.js';
import { WorkspaceConfigSchema } from '../shared/schemas.js';
import { ConfigurationError } from '../shared/errors.js';

export function readWorkspaceConfig(configPath: string): WorkspaceConfig {
  if (!existsSync(configPath)) {
    throw new ConfigurationError('Workspace not initialized. Run `pipewright init` first.');
  }
  const raw = readFileSync(configPath, 'utf8');
  const parsed = WorkspaceConfigSchema.safeParse(load(raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    throw new ConfigurationError(
      `Invalid workspace config at ${configPath}: ${field ? `${field}: ` : ''}${issue?.message ?? 'unknown error'}`,
      field,
    );
  }
  return parsed.data;
}

export function writeWorkspaceConfig(configPath: string, config: WorkspaceConfig): void {
  writeFileSync(configPath, dump(config), 'utf8');
}
