import { randomBytes } from 'node:crypto';

/**
 * Generate a URL-safe random ID of the given byte length (default 16 bytes -> 22 chars base64url).
 */
export function generateId(bytes = 16): string {
  return randomBytes(bytes).toString('base64url');
}

/**
 * Run IDs sort by creation time: base36 millisecond timestamp, then 6 random bytes in hex.
 */
export function generateRunId(now: Date = new Date()): string {
  return `${now.getTime().toString(36)}-${randomBytes(6).toString('hex')}`;
}
