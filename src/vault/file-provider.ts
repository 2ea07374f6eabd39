/**
 * Secrets in `.pipewright/vault.json`, plaintext, readable by the owner only.
 * For shared machines use the env provider and let the CI host inject secrets.
 */
import { chmodSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { assertSecretKey, type SecretRef, type VaultProvider, type VaultStatus } from './types.js';

const VaultFileSchema = z.object({
  version: z.literal(1).default(1),
  secrets: z.record(z.object({ value: z.string(), updatedAt: z.string() })),
});

type VaultFile = z.infer<typeof VaultFileSchema>;

export class FileVaultProvider implements VaultProvider {
  readonly name = 'file';
  private readonly secrets: Map<string, { value: string; updatedAt: string }>;

  constructor(private readonly filePath: string) {
    this.secrets = new Map(Object.entries(this.read().secrets));
    logger.debug('File vault loaded', { path: filePath, secrets: this.secrets.size });
  }

  /** A missing file is an empty vault; a malformed one is refused, never overwritten. */
  private read(): VaultFile {
    if (!existsSync(this.filePath)) return { version: 1, secrets: {} };

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (err) {
      throw new ConfigurationError(`Vault file ${this.filePath} is not valid JSON: ${errorMessage(err)}`);
    }
    const parsed = VaultFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Vault file ${this.filePath} is malformed at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`,
      );
    }
    return parsed.data;
  }

  private write(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true, mode: 0o700 });

    const body: VaultFile = { version: 1, secrets: Object.fromEntries(this.secrets) };
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    writeFileSync(tmp, JSON.stringify(body, null, 2), { encoding: 'utf8', mode: 0o600 });
    chmodSync(tmp, 0o600);
    renameSync(tmp, this.filePath);
  }

  async getSecret(key: string): Promise<string | null> {
    return this.secrets.get(key)?.value ?? null;
  }

  async setSecret(key: string, value: string): Promise<void> {
    assertSecretKey(key);
    this.secrets.set(key, { value, updatedAt: new Date().toISOString() });
    this.write();
  }

  async deleteSecret(key: string): Promise<boolean> {
    if (!this.secrets.delete(key)) return false;
    this.write();
    return true;
  }

  async listSecrets(): Promise<SecretRef[]> {
    return [...this.secrets.entries()]
      .map(([key, entry]) => ({ key, updatedAt: entry.updatedAt }))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  describe(): VaultStatus {
    return { provider: this.name, writable: true, location: this.filePath };
  }
}
