import type { Command } from 'commander';
import { getVaultProvider } from '../../vault/index.js';
import type { VaultStatus } from '../../vault/types.js';
import { requireWorkspace } from '../cli-shared.js';

function printVaultStatus(status: VaultStatus): void {
  console.log(`\nVault Provider: ${status.provider}${status.writable ? '' : ' (read-only)'}`);
  console.log(`Location: ${status.location}`);
}

function workspaceVault() {
  const workspace = requireWorkspace();
  return getVaultProvider({
    provider: workspace.config.vault_provider,
    filePath: workspace.paths.vaultFile,
  });
}

export function registerVaultCommand(program: Command): void {
  const vault = program
    .command('vault')
    .description('Manage pipeline secrets (references only; never shows values)');

  vault
    .command('status')
    .description('Show vault provider status and secret references')
    .action(async () => {
      const provider = workspaceVault();
      const secrets = await provider.listSecrets();

      printVaultStatus(provider.describe());
      console.log(`\nSecrets (${secrets.length}):`);
      if (secrets.length === 0) {
        console.log('  (none)');
      } else {
        for (const s of secrets) {
          const modified = s.updatedAt ? ` (modified: ${s.updatedAt})` : '';
          console.log(`  - ${s.key}${modified}`);
        }
      }
      console.log('\nNote: Secret values are never displayed.');
    });

  vault
    .command('set <key> <value>')
    .description('Store a secret in the vault')
    .action(async (key: string, value: string) => {
      await workspaceVault().setSecret(key, value);
      console.log(`Secret stored: ${key}`);
      console.log('(Value not echoed for security)');
    });

  vault
    .command('delete <key>')
    .description('Delete a secret from the vault')
    .action(async (key: string) => {
      const deleted = await workspaceVault().deleteSecret(key);
      console.log(deleted ? `Secret deleted: ${key}` : `No secret named ${key}`);
    });
}
