import { join, resolve } from 'node:path';
import type { WorkspacePaths } from './types.js';

export function getWorkspacePaths(cwd: string = process.cwd()): WorkspacePaths {
  const projectRoot = resolve(cwd);
  const root = join(projectRoot, '.pipewright');
  return {
    projectRoot,
    root,
    config: join(root, 'config.yaml'),
    stateDb: join(root, 'state.db'),
    vaultFile: join(root, 'vault.json'),
    artifactsDir: join(root, 'artifacts'),
    jobsDir: join(root, 'jobs'),
  };
}
