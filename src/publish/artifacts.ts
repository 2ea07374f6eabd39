import { createHash } from 'node:crypto';
import { copyFileSync, createReadStream, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';
import type Database from 'better-sqlite3';
import { PublishFailure, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface ArtifactRecord {
  run_id: string;
  name: string;
  file_name: string;
  stored_path: string;
  size_bytes: number;
  sha256: string;
  created_at: string;
}

async function fileSha256(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Binary artifact sink. One artifact per (run, name): uploading the same name
 * again in a run replaces it, and each successful run supersedes the previous
 * one for `latest(name)`. Nothing is versioned beyond the run id.
 */
export class ArtifactStore {
  constructor(
    private readonly db: Database.Database,
    private readonly artifactsDir: string,
    private readonly copyFile: (source: string, target: string) => void = copyFileSync,
  ) {}

  async upload(runId: string, name: string, sourcePath: string): Promise<ArtifactRecord> {
    if (!existsSync(sourcePath) || !statSync(sourcePath).isFile()) {
      throw new PublishFailure(`Artifact '${name}': no file at ${sourcePath}`, 'artifact');
    }

    // The previous upload stays in place until the new copy is complete
    const targetDir = join(this.artifactsDir, runId, name);
    const stagingDir = `${targetDir}.partial`;
    const retiredDir = `${targetDir}.old`;
    rmSync(stagingDir, { recursive: true, force: true });
    mkdirSync(stagingDir, { recursive: true });

    const fileName = basename(sourcePath);
    try {
      this.copyFile(sourcePath, join(stagingDir, fileName));
    } catch (err) {
      rmSync(stagingDir, { recursive: true, force: true });
      throw new PublishFailure(`Artifact '${name}': copy failed: ${errorMessage(err)}`, 'artifact');
    }

    rmSync(retiredDir, { recursive: true, force: true });
    if (existsSync(targetDir)) renameSync(targetDir, retiredDir);
    renameSync(stagingDir, targetDir);
    rmSync(retiredDir, { recursive: true, force: true });

    const storedPath = join(targetDir, fileName);
    const record: ArtifactRecord = {
      run_id: runId,
      name,
      file_name: fileName,
      stored_path: storedPath,
      size_bytes: statSync(storedPath).size,
      sha256: await fileSha256(storedPath),
      created_at: new Date().toISOString(),
    };

    this.db
      .prepare(
        `INSERT INTO artifacts (run_id, name, file_name, stored_path, size_bytes, sha256, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(run_id, name) DO UPDATE SET
           file_name = excluded.file_name,
           stored_path = excluded.stored_path,
           size_bytes = excluded.size_bytes,
           sha256 = excluded.sha256,
           created_at = excluded.created_at`,
      )
      .run(
        record.run_id,
        record.name,
        record.file_name,
        record.stored_path,
        record.size_bytes,
        record.sha256,
        record.created_at,
      );

    logger.info('Artifact uploaded', { run_id: runId, artifact: name, size_bytes: record.size_bytes });
    return record;
  }

  get(runId: string, name: string): ArtifactRecord | null {
    const row = this.db
      .prepare(`SELECT * FROM artifacts WHERE run_id = ? AND name = ?`)
      .get(runId, name) as ArtifactRecord | undefined;
    return row ?? null;
  }

  /** Most recent upload of `name` across runs. */
  latest(name: string): ArtifactRecord | null {
    const row = this.db
      .prepare(`SELECT * FROM artifacts WHERE name = ? ORDER BY created_at DESC, rowid DESC LIMIT 1`)
      .get(name) as ArtifactRecord | undefined;
    return row ?? null;
  }

  list(runId?: string): ArtifactRecord[] {
    if (runId) {
      return this.db
        .prepare(`SELECT * FROM artifacts WHERE run_id = ? ORDER BY name`)
        .all(runId) as ArtifactRecord[];
    }
    return this.db
      .prepare(`SELECT * FROM artifacts ORDER BY created_at DESC, rowid DESC`)
      .all() as ArtifactRecord[];
  }
}
