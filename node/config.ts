import dotenv from 'dotenv';
import { z } from 'zod';

function flag(fallback: boolean) {
  return z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));
}

const envSchema = z.object({
  MAILBOX_CACHE_DIR: z.string().min(1).default('.mailbox-cache'),
  MAILBOX_CACHE_ENABLED: flag(true),
  MAILBOX_EXPLAIN_QUERIES: flag(false),
  MAILBOX_THREAD_LIMIT: z.coerce.number().int().positive().default(50000),
  MAILBOX_SEARCH_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(140),
  MAILBOX_ROW_HEIGHT: z.coerce.number().positive().default(156),
  MAILBOX_OVERSCAN: z.coerce.number().int().nonnegative().default(6),
});

export interface MailboxConfig {
  cacheDir: string;
  cacheEnabled: boolean;
  explainQueries: boolean;
  threadLimit: number;
  searchDebounceMs: number;
  rowHeight: number;
  overscan: number;
}

export function parseConfig(env: Record<string, string | undefined>): MailboxConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment configuration:\n${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('\n')}`
    );
  }
  const c = parsed.data;
  return {
    cacheDir: c.MAILBOX_CACHE_DIR,
    cacheEnabled: c.MAILBOX_CACHE_ENABLED,
    explainQueries: c.MAILBOX_EXPLAIN_QUERIES,
    threadLimit: c.MAILBOX_THREAD_LIMIT,
    searchDebounceMs: c.MAILBOX_SEARCH_DEBOUNCE_MS,
    rowHeight: c.MAILBOX_ROW_HEIGHT,
    overscan: c.MAILBOX_OVERSCAN,
  };
}

let config: MailboxConfig | null = null;

/** Process configuration; reads `.env` on first call. */
export function loadConfig(): MailboxConfig {
  if (!config) {
    dotenv.config();
    config = parseConfig(process.env);
  }
  return config;
}
