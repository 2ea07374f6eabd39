import type { VaultProvider } from './types.js';
import { FileVaultProvider } from './file-provider.js';
import { DevVaultProvider } from './dev-provider.js';
import { EnvVaultProvider } from './env-provider.js';

export type { VaultProvider };

export type VaultProviderName = 'dev' | 'file' | 'env';

export interface VaultProviderOptions {
  provider?: VaultProviderName | string;
  filePath?: string;
}

let _activeProvider: VaultProvider | null = null;
let _activeKey: string | null = null;

function cacheKey(provider: string, filePath: string): string {
  return provider === 'file' ? `${provider}:${filePath}` : provider;
}

/**
 * Get the active vault provider (cached). Defaults to the file provider backed by
 * `.pipewright/vault.json`; PIPEWRIGHT_VAULT_PROVIDER overrides the configured one.
 */
export function getVaultProvider(opts: VaultProviderOptions = {}): VaultProvider {
  const provider = process.env['PIPEWRIGHT_VAULT_PROVIDER'] ?? opts.provider ?? 'file';
  const filePath = opts.filePath ?? `${process.cwd()}/.pipewright/vault.json`;
  const key = cacheKey(provider, filePath);

  if (_activeProvider && _activeKey === key) {
    return _activeProvider;
  }

  switch (provider) {
    case 'dev':
      _activeProvider = new DevVaultProvider();
      break;
    case 'file':
      _activeProvider = new FileVaultProvider(filePath);
      break;
    case 'env':
      _activeProvider = new EnvVaultProvider();
      break;
    default:
      throw new Error(`Unknown vault provider: ${provider}`);
  }

  _activeKey = key;
  return _activeProvider;
}

/** For testing only: resets the active provider so tests get a fresh one. */
export function _resetVaultProvider(): void {
  _activeProvider = null;
  _activeKey = null;
}
