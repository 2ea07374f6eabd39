import { ConfigurationError } from '../shared/errors.js';

/** A stored secret as listed; values never leave the provider this way. */
export interface SecretRef {
  key: string;
  updatedAt: string | null;
}

export interface VaultStatus {
  provider: string;
  /** False when secrets are managed outside pipewright (env provider). */
  writable: boolean;
  /** Where the secrets live, for `pipewright vault status`. */
  location: string;
}

/**
 * Source of the secrets pipeline steps name by key (`secret: DOCKERHUB_TOKEN`).
 * A run only calls getSecret; the rest backs the `vault` CLI commands.
 */
export interface VaultProvider {
  readonly name: string;
  getSecret(key: string): Promise<string | null>;
  setSecret(key: string, value: string): Promise<void>;
  /** Resolves false when the key was not set. */
  deleteSecret(key: string): Promise<boolean>;
  listSecrets(): Promise<SecretRef[]>;
  describe(): VaultStatus;
}

const SECRET_KEY = /^[A-Za-z][A-Za-z0-9_.-]*$/;

export function assertSecretKey(key: string): void {
  if (!SECRET_KEY.test(key)) {
    throw new ConfigurationError(
      `Invalid secret key '${key}': start with a letter, then letters, digits, "_", "." or "-"`,
      'key',
    );
  }
}
