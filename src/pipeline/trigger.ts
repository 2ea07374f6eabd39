import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { hmacSha256Hex } from '../shared/redact.js';
import type { PipelineDefinition, PushEvent } from './types.js';

const BRANCH_REF_PREFIX = 'refs/heads/';

/** Push is the only trigger kind: exactly one named branch. */
export function matchesTrigger(definition: PipelineDefinition, event: PushEvent): boolean {
  return event.branch === definition.on.push.branch;
}

const PushWebhookSchema = z.object({
  ref: z.string(),
  after: z.string().regex(/^[0-9a-f]{7,64}$/i),
  deleted: z.boolean().optional(),
  repository: z
    .object({
      // Passed to git clone; a URL can never be read as an option
      clone_url: z.string().url().optional(),
      full_name: z.string().optional(),
    })
    .optional(),
  pusher: z.object({ name: z.string() }).optional(),
});

/**
 * Turn a push webhook body (GitHub/Gitea shape) into a PushEvent.
 * Tag pushes and branch deletions yield null.
 */
export function parsePushWebhook(body: unknown): PushEvent | null {
  const parsed = PushWebhookSchema.safeParse(body);
  if (!parsed.success) return null;

  const payload = parsed.data;
  if (!payload.ref.startsWith(BRANCH_REF_PREFIX) || payload.deleted) return null;

  return {
    branch: payload.ref.slice(BRANCH_REF_PREFIX.length),
    sha: payload.after,
    repository: payload.repository?.clone_url,
    pusher: payload.pusher?.name,
  };
}

/**
 * Check a `sha256=<hex>` signature header against the raw request body.
 */
export function verifyWebhookSignature(
  payload: string | Buffer,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature) return false;

  const [algorithm, provided] = signature.split('=');
  if (algorithm !== 'sha256' || !provided) return false;

  const expected = Buffer.from(hmacSha256Hex(payload, secret), 'hex');
  const actual = Buffer.from(provided, 'hex');
  if (actual.length !== expected.length) return false;
  return timingSafeEqual(actual, expected);
}
