import type { Command } from 'commander';
import { SqliteCacheStore } from '../../cache/store.js';
import { parseIntOption, requireWorkspace } from '../cli-shared.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function registerCacheCommand(program: Command): void {
  const cache = program.command('cache').description('Inspect and prune the build cache');

  cache
    .command('list')
    .description('List cache entries')
    .action(async () => {
      const { db } = requireWorkspace();
      const entries = await new SqliteCacheStore(db).list();
      if (entries.length === 0) {
        console.log('Cache is empty.');
        return;
      }
      for (const entry of entries) {
        console.log(`${entry.key}  ${entry.sizeBytes} bytes  updated ${entry.updatedAt}  used ${entry.lastUsedAt ?? 'never'}`);
      }
    });

  cache
    .command('prune')
    .description('Delete entries not used for a number of days')
    .option('--older-than <days>', 'Age in days', '30')
    .action(async (opts: { olderThan: string }) => {
      const { db } = requireWorkspace();
      const days = parseIntOption(opts.olderThan, '--older-than');
      const removed = await new SqliteCacheStore(db).prune(new Date(Date.now() - days * DAY_MS));
      console.log(`Removed ${removed} cache entr${removed === 1 ? 'y' : 'ies'}.`);
    });
}
