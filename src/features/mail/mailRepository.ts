import { renderMarkdownSafe } from '@/lib/sanitizeHtml';
import { buildPreviewSnippet } from './utils';

/** Bodies are fetched one message at a time, on selection. */
export type BodySource = (id: number) => string | Promise<string>;

export interface MessageBody {
  id: number;
  markdown: string;
  /** Sanitized render of `markdown`. */
  html: string;
  previewPlain: string;
}

/** LRU + TTL body cache. */
const BODY_CACHE_MAX = 50;
const BODY_CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

interface CacheEntry {
  body: MessageBody;
  at: number;
}

export interface MessageBodyRepositoryOptions {
  maxEntries?: number;
  ttlMs?: number;
  now?: () => number;
}

export class MessageBodyRepository {
  private readonly cache = new Map<number, CacheEntry>();
  private readonly keyOrder: number[] = [];
  private readonly inFlight = new Map<number, Promise<MessageBody>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly source: BodySource,
    options: MessageBodyRepositoryOptions = {}
  ) {
    this.maxEntries = options.maxEntries ?? BODY_CACHE_MAX;
    this.ttlMs = options.ttlMs ?? BODY_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.cache.size;
  }

  private forget(id: number): void {
    this.cache.delete(id);
    const i = this.keyOrder.indexOf(id);
    if (i !== -1) this.keyOrder.splice(i, 1);
  }

  private prune(): void {
    const now = this.now();
    while (this.keyOrder.length > 0) {
      const id = this.keyOrder[0];
      const entry = this.cache.get(id);
      if (!entry || now - entry.at > this.ttlMs || this.cache.size > this.maxEntries) {
        this.keyOrder.shift();
        this.cache.delete(id);
      } else break;
    }
    while (this.cache.size >= this.maxEntries) {
      const id = this.keyOrder.shift();
      if (id === undefined) break;
      this.cache.delete(id);
    }
  }

  getCached(id: number): MessageBody | null {
    const entry = this.cache.get(id);
    if (!entry) return null;
    if (this.now() - entry.at > this.ttlMs) {
      this.forget(id);
      return null;
    }
    return entry.body;
  }

  invalidate(id: number): void {
    this.forget(id);
  }

  clear(): void {
    this.cache.clear();
    this.keyOrder.length = 0;
  }

  /** Cached body, or one fetch shared by concurrent callers for the same id. */
  async fetchBody(id: number): Promise<MessageBody> {
    const cached = this.getCached(id);
    if (cached) return cached;
    const existing = this.inFlight.get(id);
    if (existing) return existing;
    const request = (async () => {
      const markdown = await this.source(id);
      const body: MessageBody = {
        id,
        markdown,
        html: renderMarkdownSafe(markdown),
        previewPlain: buildPreviewSnippet(markdown),
      };
      this.prune();
      this.forget(id);
      this.keyOrder.push(id);
      this.cache.set(id, { body, at: this.now() });
      return body;
    })();
    this.inFlight.set(id, request);
    try {
      return await request;
    } finally {
      this.inFlight.delete(id);
    }
  }
}
