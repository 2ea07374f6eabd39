/**
 * Pack cached paths into one opaque blob and unpack it again.
 *
 * The blob is gzip'd JSON listing every file under the configured paths.
 * Paths starting with `~/` are stored relative to the job home, all others
 * relative to the job workspace, so a blob restores into any environment.
 */
import { chmodSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join, normalize, posix } from 'node:path';
import { gunzipSync, gzipSync } from 'node:zlib';
import { globSync } from 'glob';
import { z } from 'zod';
import { DefinitionError } from '../shared/errors.js';

export interface SnapshotRoots {
  workspaceDir: string;
  homeDir: string;
}

const SnapshotSchema = z.object({
  version: z.literal(1),
  files: z.array(
    z.object({
      path: z.string(),
      mode: z.number().int(),
      data: z.string(),
    }),
  ),
});

type Snapshot = z.infer<typeof SnapshotSchema>;

interface ResolvedPath {
  /** Prefix stored in the snapshot: '~/' or ''. */
  anchor: string;
  relative: string;
  absolute: string;
}

function resolveCachePath(path: string, roots: SnapshotRoots): ResolvedPath {
  const fromHome = path === '~' || path.startsWith('~/');
  const raw = fromHome ? path.slice(1).replace(/^\/+/, '') : path;
  if (isAbsolute(raw)) {
    throw new DefinitionError(`Cache path '${path}' must be relative to the workspace or start with ~/`);
  }
  const relative = posix.normalize(raw.split('\\').join('/')).replace(/\/+$/, '');
  if (relative === '..' || relative.startsWith('../')) {
    throw new DefinitionError(`Cache path '${path}' escapes its root`);
  }
  const root = fromHome ? roots.homeDir : roots.workspaceDir;
  return {
    anchor: fromHome ? '~/' : '',
    relative: relative === '.' ? '' : relative,
    absolute: normalize(join(root, relative)),
  };
}

/**
 * Collect every file under `paths`. Missing paths are skipped. Returns the
 * packed blob and the number of files in it.
 */
export function createSnapshot(paths: string[], roots: SnapshotRoots): { data: Buffer; fileCount: number } {
  const files = new Map<string, Snapshot['files'][number]>();

  for (const path of paths) {
    const resolved = resolveCachePath(path, roots);
    if (!existsSync(resolved.absolute)) continue;

    const base = resolved.relative ? `${resolved.anchor}${resolved.relative}` : resolved.anchor.replace(/\/$/, '');
    const add = (storedPath: string, absolute: string) => {
      const stat = statSync(absolute);
      files.set(storedPath, {
        path: storedPath,
        mode: stat.mode & 0o777,
        data: readFileSync(absolute).toString('base64'),
      });
    };

    if (statSync(resolved.absolute).isFile()) {
      add(base, resolved.absolute);
      continue;
    }

    const entries = globSync('**/*', { cwd: resolved.absolute, nodir: true, dot: true, posix: true });
    for (const entry of entries) {
      add(base ? `${base}/${entry}` : `${resolved.anchor}${entry}`, join(resolved.absolute, entry));
    }
  }

  const snapshot: Snapshot = {
    version: 1,
    files: [...files.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
  };

  return { data: gzipSync(Buffer.from(JSON.stringify(snapshot), 'utf8')), fileCount: snapshot.files.length };
}

/**
 * Write a snapshot's files back into an environment, overwriting what is there.
 * Returns the number of files written.
 */
export function restoreSnapshot(data: Buffer, roots: SnapshotRoots): number {
  const parsed = SnapshotSchema.safeParse(JSON.parse(gunzipSync(data).toString('utf8')));
  if (!parsed.success) {
    throw new Error('Cache entry is not a valid snapshot');
  }

  for (const file of parsed.data.files) {
    const target = resolveCachePath(file.path, roots).absolute;
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, Buffer.from(file.data, 'base64'));
    chmodSync(target, file.mode);
  }

  return parsed.data.files.length;
}
