import { logger } from '../shared/logger.js';
import { assertSecretKey, type SecretRef, type VaultProvider, type VaultStatus } from './types.js';

/** In-memory secrets for local experiments and tests; gone when the process exits. */
export class DevVaultProvider implements VaultProvider {
  readonly name = 'dev';
  private readonly secrets = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) this.secrets.set(key, value);
    logger.warn('DEV VAULT PROVIDER ACTIVE: secrets kept in memory only and lost on exit.');
  }

  async getSecret(key: string): Promise<string | null> {
    return this.secrets.get(key) ?? null;
  }

  async setSecret(key: string, value: string): Promise<void> {
    assertSecretKey(key);
    this.secrets.set(key, value);
  }

  async deleteSecret(key: string): Promise<boolean> {
    return this.secrets.delete(key);
  }

  async listSecrets(): Promise<SecretRef[]> {
    return [...this.secrets.keys()].sort().map((key) => ({ key, updatedAt: null }));
  }

  describe(): VaultStatus {
    return { provider: this.name, writable: true, location: 'process memory' };
  }
}
