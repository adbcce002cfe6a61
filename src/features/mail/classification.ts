import type { Importance, MessageCategory, ThreadCategory } from './types';
import { IMPORTANCE_ORDER } from './types';

const ADMIN_SUBJECT_PATTERNS = [
  /^contact request from/i,
  /\bauto-handshake\b/i,
];

const ADMIN_BODY_PATTERNS = [
  /\bauto-handshake\b/i,
];

/**
 * Contact handshakes and other system traffic. Derived from subject and body text only,
 * never stored. `body` may be a snippet when the full body has not been loaded.
 */
export function isAdministrativeMessage(message: { subject?: string | null; body?: string | null }): boolean {
  const subject = message.subject ?? '';
  const body = message.body ?? '';
  if (ADMIN_SUBJECT_PATTERNS.some((pattern) => pattern.test(subject))) return true;
  return ADMIN_BODY_PATTERNS.some((pattern) => pattern.test(body));
}

export function messageCategory(isAdministrative: boolean): MessageCategory {
  return isAdministrative ? 'admin' : 'user';
}

export function threadCategory(adminCount: number, total: number): ThreadCategory {
  if (adminCount === 0) return 'user';
  return adminCount < total ? 'mixed' : 'admin';
}

function isImportance(value: string): value is Importance {
  return IMPORTANCE_ORDER.some((i) => i === value);
}

/** Case-insensitive; absent or unrecognized values read as 'normal'. */
export function normalizeImportance(raw: string | null | undefined): Importance {
  const value = (raw ?? '').trim().toLowerCase();
  return isImportance(value) ? value : 'normal';
}

/** urgent, high, normal, low rank 0-3; anything else ranks after them. */
export function importanceRank(value: string): number {
  const v = value.toLowerCase();
  return isImportance(v) ? IMPORTANCE_ORDER.indexOf(v) : 99;
}
