/**
 * Read-only provider for secrets injected by the surrounding CI host.
 *
 * `DOCKERHUB_TOKEN` is looked up as PIPEWRIGHT_SECRET_DOCKERHUB_TOKEN; key
 * characters outside [A-Za-z0-9_] become underscores.
 */
import { ConfigurationError } from '../shared/errors.js';
import type { SecretRef, VaultProvider, VaultStatus } from './types.js';

export const ENV_SECRET_PREFIX = 'PIPEWRIGHT_SECRET_';

export function envNameForSecret(key: string): string {
  return ENV_SECRET_PREFIX + key.replace(/[^A-Za-z0-9_]/g, '_').toUpperCase();
}

export class EnvVaultProvider implements VaultProvider {
  readonly name = 'env';

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async setSecret(key: string): Promise<void> {
    throw new ConfigurationError(`The env vault is read-only; export ${envNameForSecret(key)} instead`);
  }

  async getSecret(key: string): Promise<string | null> {
    const value = this.env[envNameForSecret(key)];
    return value === undefined || value === '' ? null : value;
  }

  async deleteSecret(key: string): Promise<boolean> {
    throw new ConfigurationError(`The env vault is read-only; unset ${envNameForSecret(key)} instead`);
  }

  async listSecrets(): Promise<SecretRef[]> {
    return Object.keys(this.env)
      .filter((name) => name.startsWith(ENV_SECRET_PREFIX) && this.env[name])
      .sort()
      .map((name) => ({ key: name.slice(ENV_SECRET_PREFIX.length), updatedAt: null }));
  }

  describe(): VaultStatus {
    return { provider: this.name, writable: false, location: `${ENV_SECRET_PREFIX}* environment variables` };
  }
}
