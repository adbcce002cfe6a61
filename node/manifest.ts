import { z } from 'zod';
import { FetchFailedError } from './errors';
import type { SnapshotTransport } from './transport';

export const MANIFEST_PATH = 'manifest.json';

const chunkManifestSchema = z
  .object({
    pattern: z.string().min(1),
    chunk_count: z.number().int().nonnegative(),
    chunk_size: z.number().int().positive().optional(),
  })
  .passthrough();

const databaseSchema = z
  .object({
    path: z.string().min(1).default('mailbox.sqlite3'),
    sha256: z.string().min(1).nullish(),
    size_bytes: z.number().int().nonnegative().nullish(),
    fts_enabled: z.boolean().default(false),
    chunk_manifest: chunkManifestSchema.nullish(),
  })
  .passthrough();

export const manifestSchema = z
  .object({
    database: databaseSchema.default({}),
  })
  .passthrough();

export type SnapshotManifest = z.infer<typeof manifestSchema>;
export type DatabaseDescriptor = SnapshotManifest['database'];
export type ChunkManifest = z.infer<typeof chunkManifestSchema>;

/** Validate a decoded manifest. Anything unusable is reported as a failed fetch of `source`. */
export function parseManifest(raw: unknown, source: string = MANIFEST_PATH): SnapshotManifest {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new FetchFailedError(source, undefined, { reason: `invalid manifest: ${reason}` });
  }
  return parsed.data;
}

export async function loadManifest(transport: SnapshotTransport, source: string = MANIFEST_PATH): Promise<SnapshotManifest> {
  return parseManifest(await transport.getJson(source), source);
}

/** Content digest when known, else `<path>:<size_bytes>`; null when neither identifies the image. */
export function cacheKeyFor(database: DatabaseDescriptor): string | null {
  if (database.sha256) return database.sha256;
  if (database.path && database.size_bytes !== null && database.size_bytes !== undefined) {
    return `${database.path}:${database.size_bytes}`;
  }
  return null;
}

const INDEX_PLACEHOLDER = /\{index(?::0?(\d+)d)?\}/g;

/** `chunks/{index:05d}.bin` with 3 gives `chunks/00003.bin`; a bare `{index}` is not padded. */
export function formatChunkPath(pattern: string, index: number): string {
  return pattern.replace(INDEX_PLACEHOLDER, (_match, width: string | undefined) => {
    const value = String(index);
    return width ? value.padStart(parseInt(width, 10), '0') : value;
  });
}
