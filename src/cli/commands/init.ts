import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';
import { errorMessage } from '../../shared/errors.js';
import type { VaultProviderName } from '../../vault/index.js';

const VAULT_PROVIDERS: readonly VaultProviderName[] = ['dev', 'file', 'env'];

function isVaultProvider(value: string): value is VaultProviderName {
  return VAULT_PROVIDERS.some((name) => name === value);
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a pipewright workspace in the current directory')
    .option('--vault <provider>', 'Vault provider: dev, file, or env', 'file')
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .action(async (opts: { vault: string; force: boolean }) => {
      if (!isVaultProvider(opts.vault)) {
        console.error(`Invalid vault provider: ${opts.vault}. Must be dev, file, or env.`);
        process.exit(1);
      }

      try {
        const { config, pipelineCreated } = await initWorkspace({ force: opts.force, vaultProvider: opts.vault });
        console.log(`\nWorkspace initialized!`);
        console.log(`  Project ID: ${config.project_id}`);
        console.log(`  Pipeline:   ${config.pipeline_file}${pipelineCreated ? ' (created from template)' : ''}`);
        console.log(`  Vault:      ${config.vault_provider}`);
        console.log(`\nNext steps:`);
        console.log(`  pipewright vault set DOCKERHUB_TOKEN <token>`);
        console.log(`  pipewright plan`);
        console.log(`  pipewright run --branch live --sha <commit>`);
      } catch (err) {
        console.error(`Init failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
