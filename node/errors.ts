/** Manifest or database bytes could not be fetched. Fatal to the load. */
export class FetchFailedError extends Error {
  constructor(
    readonly path: string,
    readonly status?: number,
    options?: { cause?: unknown; reason?: string }
  ) {
    const detail = options?.reason ?? (status !== undefined ? `status ${status}` : 'request failed');
    super(`Failed to fetch ${path} (${detail})`, { cause: options?.cause });
    this.name = 'FetchFailedError';
  }
}

/** The byte store cannot be opened or used. Caching is disabled for the session. */
export class CacheUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheUnavailableError';
  }
}

/** A structural query against the snapshot failed (missing table, corrupt file). */
export class SnapshotQueryError extends Error {
  constructor(
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super(`Snapshot query "${operation}" failed: ${reason}`, options);
    this.name = 'SnapshotQueryError';
  }
}
