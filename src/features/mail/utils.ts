/**
 * Epoch ms for a snapshot timestamp, or null when it does not parse.
 */
export function timestampMs(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const ms = Date.parse(raw);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Ascending order over snapshot timestamps. Parseable values compare by instant; values that
 * do not parse sort before them and compare as strings among themselves.
 */
export function compareTimestamps(a: string | null | undefined, b: string | null | undefined): number {
  const ta = timestampMs(a);
  const tb = timestampMs(b);
  if (ta !== null && tb !== null) return ta - tb;
  if (ta !== null) return 1;
  if (tb !== null) return -1;
  const sa = a ?? '';
  const sb = b ?? '';
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Ascending by (createdTs, id). */
export function compareChronological(
  a: { createdTs: string; id: number },
  b: { createdTs: string; id: number }
): number {
  return compareTimestamps(a.createdTs, b.createdTs) || a.id - b.id;
}

/**
 * Full timestamp for the message header, e.g. "14 March 2025 at 09:05".
 * Falls back to the raw string if parsing fails.
 */
export function formatTimestampFull(raw: string | null | undefined): string {
  if (!raw) return 'Unknown';
  const ms = timestampMs(raw);
  if (ms === null) return raw;
  return new Date(ms).toLocaleDateString('en-GB', {
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  });
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Compact list timestamp: same day "14:11", one day back "Yesterday", within a week "Sat",
 * else "21 Feb".
 */
export function formatTimestamp(raw: string | null | undefined, now: number = Date.now()): string {
  if (!raw) return '';
  const ms = timestampMs(raw);
  if (ms === null) return raw;
  const d = new Date(ms);
  const diffDays = Math.floor((now - ms) / DAY_MS);
  if (diffDays === 0) {
    return d.toLocaleTimeString('en-GB', { hour: '2-digit', minute: '2-digit', hour12: false });
  }
  if (diffDays === 1) return 'Yesterday';
  if (diffDays > 1 && diffDays < 7) {
    return d.toLocaleDateString('en-GB', { weekday: 'short' });
  }
  return d.toLocaleDateString('en-GB', { month: 'short', day: 'numeric' });
}

export function formatImportanceLabel(value: string | null | undefined): string {
  switch ((value ?? '').toLowerCase()) {
    case 'urgent':
      return 'Urgent';
    case 'high':
      return 'High';
    case 'low':
      return 'Low';
    default:
      return 'Normal';
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Escape `text` and wrap case-insensitive occurrences of `term` in <mark>. */
export function highlightText(text: string, term: string | null | undefined): string {
  if (!term) return escapeHtml(text);
  const regex = new RegExp(`(${escapeRegExp(escapeHtml(term))})`, 'gi');
  return escapeHtml(text).replace(regex, '<mark>$1</mark>');
}

export function markdownToPlainText(markdown: string | null | undefined): string {
  if (!markdown) return '';
  return markdown
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/`[^`]*`/g, ' ')
    .replace(/!\[[^\]]*]\([^)]*\)/g, ' ')
    .replace(/\[([^\]]+)]\([^)]+\)/g, '$1')
    .replace(/[#>*_~-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

const PREVIEW_MAX = 160;

export function buildPreviewSnippet(source: string | null | undefined): string {
  const plain = markdownToPlainText(source);
  if (plain.length <= PREVIEW_MAX) return plain;
  return `${plain.slice(0, PREVIEW_MAX - 3)}...`;
}

/** Split a comma-joined roster into trimmed, non-empty names. */
export function splitRecipients(recipients: string | null | undefined): string[] {
  if (!recipients) return [];
  return recipients
    .split(',')
    .map((r) => r.trim())
    .filter((r) => r.length > 0);
}
