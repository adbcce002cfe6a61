/**
 * Thread identity. A message with a non-empty thread id belongs to that explicit thread;
 * otherwise it forms a singleton thread keyed by its own id.
 */

export type ThreadKey =
  | { kind: 'explicit'; threadId: string }
  | { kind: 'synthetic'; messageId: number };

const SYNTHETIC_PREFIX = 'msg:';
const SYNTHETIC_RE = /^msg:(\d+)$/;

export function hasExplicitThread(threadId: string | null | undefined): threadId is string {
  return typeof threadId === 'string' && threadId !== '';
}

export function threadKeyOf(message: { id: number; threadId: string | null }): ThreadKey {
  if (hasExplicitThread(message.threadId)) {
    return { kind: 'explicit', threadId: message.threadId };
  }
  return { kind: 'synthetic', messageId: message.id };
}

/** String form used for grouping, SQL parameters and deep links. */
export function formatThreadKey(key: ThreadKey): string {
  return key.kind === 'explicit' ? key.threadId : `${SYNTHETIC_PREFIX}${key.messageId}`;
}

export function threadKeyString(message: { id: number; threadId: string | null }): string {
  return formatThreadKey(threadKeyOf(message));
}

/**
 * Parse a deep-linked key. `msg:<id>` reads as synthetic; anything else is an explicit id.
 * Returns null for an empty key.
 */
export function parseThreadKey(raw: string): ThreadKey | null {
  const value = raw.trim();
  if (!value) return null;
  const m = SYNTHETIC_RE.exec(value);
  if (m) return { kind: 'synthetic', messageId: Number(m[1]) };
  return { kind: 'explicit', threadId: value };
}
