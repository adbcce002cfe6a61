import { z } from 'zod';
import { deleteKv, getKv, openCacheDb, setKv, type Db } from './db';
import { CacheUnavailableError } from './errors';
import { safeParse } from './safeJson';

export const CACHE_VERSION = 1;

const metadataSchema = z.object({
  cacheKey: z.string(),
  cachedAt: z.string(),
  version: z.number(),
});

export type CacheMetadata = z.infer<typeof metadataSchema>;

/**
 * Durable store of snapshot images keyed by content identity. Reads resolve to null on a
 * miss; they only reject when the store itself is unusable.
 */
export interface SnapshotCache {
  read(key: string): Promise<Uint8Array | null>;
  readMetadata(key: string): Promise<CacheMetadata | null>;
  /** Best-effort: resolves false instead of rejecting when the write fails. */
  write(key: string, bytes: Uint8Array): Promise<boolean>;
  remove(key: string): Promise<void>;
}

export function metadataKey(cacheKey: string): string {
  return `snapshot-meta:${cacheKey}`;
}

/** Images in `snapshot_blobs`, metadata as JSON in `kv`. */
export class SqliteSnapshotCache implements SnapshotCache {
  constructor(private readonly db: Db) {}

  /** Open (or create) the store under `dir`. Throws CacheUnavailableError when it cannot. */
  static open(dir: string): SqliteSnapshotCache {
    try {
      return new SqliteSnapshotCache(openCacheDb(dir));
    } catch (error) {
      throw new CacheUnavailableError(`Cannot open snapshot cache at ${dir}`, { cause: error });
    }
  }

  async read(key: string): Promise<Uint8Array | null> {
    const row = this.db
      .prepare<[string], { bytes: Buffer }>('SELECT bytes FROM snapshot_blobs WHERE cache_key = ?')
      .get(key);
    return row ? new Uint8Array(row.bytes) : null;
  }

  async readMetadata(key: string): Promise<CacheMetadata | null> {
    return safeParse(getKv(this.db, metadataKey(key)), metadataSchema.nullable(), null);
  }

  async write(key: string, bytes: Uint8Array): Promise<boolean> {
    const metadata: CacheMetadata = { cacheKey: key, cachedAt: new Date().toISOString(), version: CACHE_VERSION };
    try {
      this.db.transaction(() => {
        this.db
          .prepare<[string, Buffer, number, number]>(
            'INSERT OR REPLACE INTO snapshot_blobs (cache_key, bytes, size_bytes, updated_at) VALUES (?, ?, ?, ?)'
          )
          .run(key, Buffer.from(bytes), bytes.byteLength, Date.now());
        setKv(this.db, metadataKey(key), JSON.stringify(metadata));
      })();
      return true;
    } catch (error) {
      console.warn('[cache] write failed for', key, error);
      return false;
    }
  }

  async remove(key: string): Promise<void> {
    this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM snapshot_blobs WHERE cache_key = ?').run(key);
      deleteKv(this.db, metadataKey(key));
    })();
  }

  close(): void {
    this.db.close();
  }
}
