import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import { ArtifactStore } from '../publish/artifacts.js';
import { PublishFailure } from '../shared/errors.js';
import { sha256Hex } from '../shared/redact.js';
import { createTestDb } from './test-helpers.js';

describe('ArtifactStore', () => {
  let dir: string;
  let db: Database.Database;
  let store: ArtifactStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pipewright-artifacts-'));
    db = createTestDb();
    store = new ArtifactStore(db, join(dir, 'store'));
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('copies the file and records its digest', async () => {
    const source = join(dir, 'chat-bot');
    writeFileSync(source, 'release binary');

    const record = await store.upload('run-1', 'chat-bot', source);

    expect(record).toMatchObject({
      run_id: 'run-1',
      name: 'chat-bot',
      file_name: 'chat-bot',
      stored_path: join(dir, 'store', 'run-1', 'chat-bot', 'chat-bot'),
      size_bytes: 14,
      sha256: sha256Hex('release binary'),
    });
    expect(readFileSync(record.stored_path, 'utf8')).toBe('release binary');
    expect(store.get('run-1', 'chat-bot')).toEqual(record);
  });

  it('fails with a publish failure when the file is missing', async () => {
    const upload = store.upload('run-1', 'chat-bot', join(dir, 'missing'));
    await expect(upload).rejects.toBeInstanceOf(PublishFailure);
    await expect(store.upload('run-1', 'chat-bot', join(dir, 'missing'))).rejects.toMatchObject({ sink: 'artifact' });
    expect(store.list()).toEqual([]);
  });

  it('replaces an upload of the same name in the same run', async () => {
    const source = join(dir, 'chat-bot');
    writeFileSync(source, 'v1');
    await store.upload('run-1', 'chat-bot', source);
    writeFileSync(source, 'v2');
    await store.upload('run-1', 'chat-bot', source);

    const all = store.list('run-1');
    expect(all).toHaveLength(1);
    expect(readFileSync(all[0]?.stored_path ?? '', 'utf8')).toBe('v2');
  });

  it('keeps the previous upload when copying a replacement fails', async () => {
    const source = join(dir, 'chat-bot');
    writeFileSync(source, 'v1');
    const first = await store.upload('run-1', 'chat-bot', source);
    const failing = new ArtifactStore(db, join(dir, 'store'), () => {
      throw new Error('ENOSPC: no space left on device');
    });
    writeFileSync(source, 'v2');

    await expect(failing.upload('run-1', 'chat-bot', source)).rejects.toThrow(
      "Artifact 'chat-bot': copy failed: ENOSPC: no space left on device",
    );

    expect(store.get('run-1', 'chat-bot')).toEqual(first);
    expect(readFileSync(first.stored_path, 'utf8')).toBe('v1');
    expect(readdirSync(join(dir, 'store', 'run-1'))).toEqual(['chat-bot']);
  });

  it('points latest at the newest run', async () => {
    const source = join(dir, 'chat-bot');
    writeFileSync(source, 'v1');
    await store.upload('run-1', 'chat-bot', source);
    writeFileSync(source, 'v2');
    await store.upload('run-2', 'chat-bot', source);

    expect(store.latest('chat-bot')?.run_id).toBe('run-2');
    expect(store.latest('other')).toBeNull();
    expect(store.list().map((a) => a.run_id)).toEqual(['run-2', 'run-1']);
  });
});
