import { createHash, createHmac } from 'node:crypto';

// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /token['":\s]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":\s]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /--password(?:=|\s+)\S+/gi,
  /password['":\s]+['"]?\S+['"]?/gi,
];

export const MASK = '***';

// Exact values registered at run time (registry tokens etc.)
const maskedValues = new Set<string>();

/**
 * Register a secret value so every later log line has it replaced by `***`.
 * Very short values are ignored, they would mask ordinary words.
 */
export function maskSecret(value: string): void {
  if (value.length >= 4) maskedValues.add(value);
}

export function _resetMaskedSecrets(): void {
  maskedValues.clear();
}

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const value of maskedValues) {
    output = output.split(value).join(MASK);
  }
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

export function sha256Hex(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export function hmacSha256Hex(value: string | Buffer, secret: string): string {
  return createHmac('sha256', secret).update(value).digest('hex');
}

/**
 * SHA-256 hash of a canonical JSON representation of an object.
 */
export function jsonHash(obj: unknown): string {
  const replacer =
    obj !== null && typeof obj === 'object' && !Array.isArray(obj)
      ? Object.keys(obj).sort()
      : undefined;
  const canonical = JSON.stringify(obj, replacer) ?? 'null';
  return sha256Hex(canonical);
}

/**
 * Safely stringify an object, redacting known secret keys and masked values.
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'string') {
        if (/^(token|secret|password|authorization|bearer)$/i.test(key)) {
          return '[REDACTED]';
        }
        return redact(value);
      }
      return value;
    },
    space,
  );
}
