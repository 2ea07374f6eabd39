import { renderCacheKey } from '../../cache/key.js';
import { createSnapshot, restoreSnapshot } from '../../cache/snapshot.js';
import { errorMessage } from '../../shared/errors.js';
import { sha256Hex } from '../../shared/redact.js';
import { withRetry } from '../../shared/retry.js';
import type { CacheEntry } from '../../cache/store.js';
import type { RestoreOrSeedCacheStep } from '../../pipeline/types.js';
import type { StepContext } from '../types.js';

/**
 * Restore `paths` from the cache entry under the rendered key, and register a
 * save of the same paths under the same key for the end of the job.
 * A miss is a cold start, not a failure; so is a restore the store keeps failing.
 */
export async function restoreOrSeedCache(step: RestoreOrSeedCacheStep, ctx: StepContext): Promise<void> {
  const { environment, services } = ctx;
  const key = renderCacheKey(step.key, {
    os: environment.os,
    toolchain: ctx.state.toolchain,
    workspaceDir: environment.workspaceDir,
  });

  let entry: CacheEntry | null = null;
  try {
    entry = await withRetry(`cache restore ${key}`, services.retry, () => services.cache.restore(key), ctx.signal);
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    ctx.log.warn('Cache restore failed, continuing cold', { key, error: errorMessage(err) });
  }

  if (entry) {
    try {
      const files = restoreSnapshot(entry.data, environment);
      ctx.log.info('Cache restored', { key, files, size_bytes: entry.sizeBytes });
    } catch (err) {
      ctx.log.warn('Cache entry unreadable, continuing cold', { key, error: errorMessage(err) });
      entry = null;
    }
  } else {
    ctx.log.info('Cache miss', { key });
  }

  ctx.state.cacheSaves.push({ key, paths: step.paths, restoredHash: entry?.contentHash ?? null });
}

/**
 * Run after every step succeeded. Entries whose content did not change since
 * restore are left alone; save errors are logged and never fail the job.
 */
export async function saveCaches(ctx: StepContext): Promise<void> {
  for (const pending of ctx.state.cacheSaves) {
    try {
      const { data, fileCount } = createSnapshot(pending.paths, ctx.environment);
      if (pending.restoredHash !== null && sha256Hex(data) === pending.restoredHash) {
        ctx.log.info('Cache unchanged, not saving', { key: pending.key });
        continue;
      }
      const saved = await ctx.services.cache.save(pending.key, data);
      ctx.log.info('Cache saved', { key: pending.key, files: fileCount, size_bytes: saved.sizeBytes });
    } catch (err) {
      ctx.log.warn('Cache save failed', { key: pending.key, error: errorMessage(err) });
    }
  }
}
