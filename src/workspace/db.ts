import Database from 'better-sqlite3';

const _dbs = new Map<string, Database.Database>();

export function openDb(dbPath: string): Database.Database {
  const existing = _dbs.get(dbPath);
  if (existing) return existing;

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  applySchema(db);

  _dbs.set(dbPath, db);
  return db;
}

export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      pipeline TEXT NOT NULL,
      branch TEXT NOT NULL,
      sha TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('running','succeeded','failed')),
      cancelled INTEGER NOT NULL DEFAULT 0 CHECK (cancelled IN (0,1)),
      triggered_by TEXT,
      started_at TEXT NOT NULL,
      ended_at TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

    CREATE TABLE IF NOT EXISTS job_runs (
      run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
      job_id TEXT NOT NULL,
      name TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('pending','running','succeeded','failed','skipped')),
      skip_reason TEXT CHECK (skip_reason IS NULL OR skip_reason IN ('upstream','cancelled')),
      error_kind TEXT,
      error TEXT,
      started_at TEXT,
      ended_at TEXT,
      PRIMARY KEY (run_id, job_id)
    );

    CREATE TABLE IF NOT EXISTS step_runs (
      run_id TEXT NOT NULL,
      job_id TEXT NOT NULL,
      step_index INTEGER NOT NULL,
      name TEXT NOT NULL,
      kind TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('succeeded','failed','skipped')),
      error TEXT,
      exit_code INTEGER,
      started_at TEXT,
      ended_at TEXT,
      PRIMARY KEY (run_id, job_id, step_index),
      FOREIGN KEY (run_id, job_id) REFERENCES job_runs(run_id, job_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS cache_entries (
      key TEXT PRIMARY KEY,
      data BLOB NOT NULL,
      content_hash TEXT NOT NULL,
      size_bytes INTEGER NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      last_used_at TEXT
    );

    CREATE TABLE IF NOT EXISTS artifacts (
      run_id TEXT NOT NULL,
      name TEXT NOT NULL,
      file_name TEXT NOT NULL,
      stored_path TEXT NOT NULL,
      size_bytes INTEGER NOT NULL,
      sha256 TEXT NOT NULL,
      created_at TEXT NOT NULL,
      PRIMARY KEY (run_id, name)
    );
    CREATE INDEX IF NOT EXISTS idx_artifacts_name ON artifacts(name, created_at);
  `);
}

export function closeDb(dbPath?: string): void {
  for (const [path, db] of _dbs) {
    if (dbPath && path !== dbPath) continue;
    db.close();
    _dbs.delete(path);
  }
}

export function _resetDb(): void {
  for (const db of _dbs.values()) {
    try {
      db.close();
    } catch {
      // already closed by the test that opened it
    }
  }
  _dbs.clear();
}
