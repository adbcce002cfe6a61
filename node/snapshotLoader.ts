import { recordCacheHit, recordCacheMiss, recordCacheWriteFailure } from '@/lib/metrics';
import { FetchFailedError } from './errors';
import { cacheKeyFor, formatChunkPath, type DatabaseDescriptor, type SnapshotManifest } from './manifest';
import { CACHE_VERSION, type SnapshotCache } from './snapshotCache';
import type { SnapshotTransport } from './transport';

/**
 * unsupported: no usable store. none: store available, nothing loaded yet.
 * memory: image held in memory only. cached: image persisted under its cache key.
 */
export type CacheState = 'unsupported' | 'none' | 'memory' | 'cached';

export type SnapshotSource = 'cache' | 'network';

export interface LoadedSnapshot {
  manifest: SnapshotManifest;
  bytes: Uint8Array;
  source: SnapshotSource;
  sourceLabel: string;
  cacheKey: string | null;
}

function concatParts(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((acc, p) => acc + p.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.byteLength;
  }
  return out;
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Whole file, or the ordered concatenation of its chunks when the manifest lists any. */
export async function fetchDatabaseBytes(
  transport: SnapshotTransport,
  database: DatabaseDescriptor
): Promise<{ bytes: Uint8Array; label: string }> {
  const chunks = database.chunk_manifest;
  if (chunks) {
    if (chunks.chunk_count === 0) {
      throw new FetchFailedError(chunks.pattern, undefined, { reason: 'chunk manifest lists no chunks' });
    }
    const parts: Uint8Array[] = [];
    for (let i = 0; i < chunks.chunk_count; i++) {
      parts.push(await transport.getBytes(formatChunkPath(chunks.pattern, i)));
    }
    return { bytes: concatParts(parts), label: `${chunks.pattern} (${chunks.chunk_count} chunk${chunks.chunk_count === 1 ? '' : 's'})` };
  }
  return { bytes: await transport.getBytes(database.path), label: database.path };
}

export class SnapshotLoader {
  private cache: SnapshotCache | null;
  private state: CacheState;

  constructor(
    private readonly transport: SnapshotTransport,
    cache: SnapshotCache | null = null
  ) {
    this.cache = cache;
    this.state = cache ? 'none' : 'unsupported';
  }

  get cacheState(): CacheState {
    return this.state;
  }

  private disableCache(error: unknown): void {
    console.warn('[cache] store unavailable, caching disabled for this session', error);
    this.cache = null;
    this.state = 'unsupported';
  }

  /**
   * Cache hit when the stored metadata names the current key at the current version.
   * Anything else evicts the current key and whatever key the stale metadata names,
   * then loads from the transport. Fetch failures propagate.
   */
  async load(manifest: SnapshotManifest): Promise<LoadedSnapshot> {
    const key = cacheKeyFor(manifest.database);
    const cache = this.cache;
    if (cache && key) {
      try {
        const cached = await cache.read(key);
        if (cached) {
          const meta = await cache.readMetadata(key);
          if (meta && meta.cacheKey === key && meta.version === CACHE_VERSION) {
            recordCacheHit();
            this.state = 'cached';
            console.info('[loader] snapshot served from cache', key);
            return { manifest, bytes: cached, source: 'cache', sourceLabel: `cache (${key})`, cacheKey: key };
          }
          console.warn('[cache] stale entry for', key, 'metadata names', meta?.cacheKey ?? '(none)');
          await cache.remove(key);
          if (meta && meta.cacheKey !== key) await cache.remove(meta.cacheKey);
        }
        recordCacheMiss();
      } catch (error) {
        this.disableCache(error);
      }
    }

    const { bytes, label } = await fetchDatabaseBytes(this.transport, manifest.database);
    if (this.cache && key) this.state = 'memory';
    console.info('[loader] snapshot fetched from', this.transport.description, label, `${bytes.byteLength} bytes`);
    return { manifest, bytes, source: 'network', sourceLabel: label, cacheKey: key };
  }

  /**
   * Persist a network-loaded image on a later turn of the event loop, so the caller can
   * present first. Never rejects; a failed write is counted and the image stays memory-only.
   */
  async persist(snapshot: LoadedSnapshot): Promise<boolean> {
    const cache = this.cache;
    const key = snapshot.cacheKey;
    if (!cache || !key || snapshot.source !== 'network') return false;
    await nextTick();
    return this.write(cache, key, snapshot.bytes);
  }

  private async write(cache: SnapshotCache, key: string, bytes: Uint8Array): Promise<boolean> {
    let ok: boolean;
    try {
      ok = await cache.write(key, bytes);
    } catch (error) {
      console.warn('[cache] write rejected', error);
      ok = false;
    }
    if (ok) this.state = 'cached';
    else recordCacheWriteFailure();
    return ok;
  }

  /** Evict when cached, persist otherwise. Returns the resulting state. */
  async toggleCache(snapshot: LoadedSnapshot): Promise<CacheState> {
    const cache = this.cache;
    if (!cache || !snapshot.cacheKey) return this.state;
    if (this.state === 'cached') {
      try {
        await cache.remove(snapshot.cacheKey);
        this.state = 'memory';
      } catch (error) {
        this.disableCache(error);
      }
      return this.state;
    }
    await this.write(cache, snapshot.cacheKey, snapshot.bytes);
    return this.state;
  }
}
