import type { OverviewMessage, OverviewRow, ThreadRollupRow } from './types';
import { isAdministrativeMessage, messageCategory, normalizeImportance } from './classification';
import { hasExplicitThread, threadKeyString } from './threadKey';
import { buildPreviewSnippet } from './utils';

export const UNKNOWN_RECIPIENTS = 'Unknown';

/** Thread key to message count, from the rollup. */
export function threadCountsFrom(rollup: readonly ThreadRollupRow[]): Map<string, number> {
  return new Map(rollup.map((r) => [r.threadKey, r.messageCount]));
}

/**
 * Derived list fields. Counts missing from `threadCounts` (a truncated or failed rollup)
 * are taken from the rows themselves. Administrative detection reads the snippet, not the body.
 */
export function enrichOverviewRows(
  rows: readonly OverviewRow[],
  roster: ReadonlyMap<number, string>,
  threadCounts: ReadonlyMap<string, number> = new Map()
): OverviewMessage[] {
  const localCounts = new Map<string, number>();
  for (const row of rows) {
    const key = threadKeyString(row);
    localCounts.set(key, (localCounts.get(key) ?? 0) + 1);
  }
  return rows.map((row) => {
    const threadKey = threadKeyString(row);
    const threadCount = threadCounts.get(threadKey) ?? localCounts.get(threadKey) ?? 1;
    const hasThread = hasExplicitThread(row.threadId) || threadCount > 1;
    const isAdministrative = isAdministrativeMessage({ subject: row.subject, body: row.snippet });
    return {
      ...row,
      importance: normalizeImportance(row.importance),
      threadKey,
      recipients: roster.get(row.id) || UNKNOWN_RECIPIENTS,
      excerpt: buildPreviewSnippet(row.snippet),
      isAdministrative,
      messageCategory: messageCategory(isAdministrative),
      threadCount,
      threadReference: hasThread ? threadKey : null,
      hasThread,
    };
  });
}
