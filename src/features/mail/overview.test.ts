import { describe, it, expect } from 'vitest';
import type { OverviewRow } from './types';
import { enrichOverviewRows, threadCountsFrom } from './overview';

function row(id: number, patch: Partial<OverviewRow> = {}): OverviewRow {
  return {
    id,
    subject: `Subject ${id}`,
    threadId: null,
    createdTs: '2025-01-01T10:00:00Z',
    importance: 'Normal',
    projectId: 1,
    sender: 'Alice',
    projectSlug: 'alpha',
    projectName: 'Alpha',
    snippet: 'Body text',
    bodyLength: 9,
    ...patch,
  };
}

describe('enrichOverviewRows', () => {
  const rollup = [
    { threadKey: 'T', messageCount: 3, lastCreatedTs: '', latestSubject: '', latestImportance: '', latestSnippet: '' },
    { threadKey: 'msg:2', messageCount: 1, lastCreatedTs: '', latestSubject: '', latestImportance: '', latestSnippet: '' },
  ];

  it('derives thread, recipient and category fields', () => {
    const [threaded, single] = enrichOverviewRows(
      [row(1, { threadId: 'T', importance: 'HIGH' }), row(2, { snippet: 'auto-handshake ping' })],
      new Map([[1, 'Bob, Carol']]),
      threadCountsFrom(rollup)
    );
    expect(threaded).toMatchObject({
      threadKey: 'T',
      threadCount: 3,
      hasThread: true,
      threadReference: 'T',
      recipients: 'Bob, Carol',
      importance: 'high',
      excerpt: 'Body text',
      messageCategory: 'user',
    });
    expect(single).toMatchObject({
      threadKey: 'msg:2',
      threadCount: 1,
      hasThread: false,
      threadReference: null,
      recipients: 'Unknown',
      isAdministrative: true,
      messageCategory: 'admin',
    });
  });

  it('counts thread members itself when the rollup is missing', () => {
    const enriched = enrichOverviewRows([row(1, { threadId: 'X' }), row(2, { threadId: 'X' })], new Map());
    expect(enriched.map((m) => m.threadCount)).toEqual([2, 2]);
  });
});
