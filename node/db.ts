import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

export const CACHE_DB_FILE = 'snapshot-cache.db';

/**
 * Open the cache database under `dir` (created when missing), or an in-memory one for
 * `':memory:'`. Tables are brought to the current schema version before returning.
 */
export function openCacheDb(dir: string): Db {
  let db: Db;
  if (dir === ':memory:') {
    db = new Database(':memory:');
  } else {
    fs.mkdirSync(dir, { recursive: true });
    db = new Database(path.join(dir, CACHE_DB_FILE));
    db.pragma('journal_mode = WAL');
  }
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
  runMigrations(db);
  return db;
}

/** Open a snapshot image held in memory. The connection refuses writes. */
export function openSnapshotDb(bytes: Uint8Array): Db {
  const db = new Database(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  db.pragma('query_only = ON');
  return db;
}

export function getKv(db: Db, key: string): string | null {
  const row = db.prepare<[string], { value: string }>('SELECT value FROM kv WHERE key = ?').get(key);
  return row ? row.value : null;
}

export function setKv(db: Db, key: string, value: string): void {
  db.prepare<[string, string]>('INSERT OR REPLACE INTO kv (key, value) VALUES (?, ?)').run(key, value);
}

export function deleteKv(db: Db, key: string): void {
  db.prepare<[string]>('DELETE FROM kv WHERE key = ?').run(key);
}

/** Snapshot byte store (migration v1). */
function createSnapshotBlobTable(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS snapshot_blobs (
      cache_key TEXT PRIMARY KEY,
      bytes BLOB NOT NULL,
      size_bytes INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);
}

const SCHEMA_VERSION_KEY = 'schema_version';

export function getSchemaVersion(db: Db): number {
  const raw = getKv(db, SCHEMA_VERSION_KEY);
  if (raw === null) return 0;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : 0;
}

function setSchemaVersion(db: Db, version: number): void {
  setKv(db, SCHEMA_VERSION_KEY, String(version));
}

/** Versioned migrations. Add new migrations when schema changes. */
function runMigrations(db: Db): void {
  let v = getSchemaVersion(db);
  if (v < 1) {
    createSnapshotBlobTable(db);
    setSchemaVersion(db, 1);
    v = 1;
  }
  if (v < 2) {
    db.exec('CREATE INDEX IF NOT EXISTS idx_snapshot_blobs_updated_at ON snapshot_blobs(updated_at)');
    setSchemaVersion(db, 2);
  }
}
