import type { OverviewMessage } from './types';
import { threadKeyString } from './threadKey';

/** Overview row with plain defaults, for tests. */
export function overviewMessage(id: number, patch: Partial<OverviewMessage> = {}): OverviewMessage {
  const threadId = patch.threadId ?? null;
  const threadKey = threadKeyString({ id, threadId });
  return {
    id,
    subject: `Subject ${id}`,
    threadId,
    createdTs: `2025-01-${String(id).padStart(2, '0')}T10:00:00Z`,
    importance: 'normal',
    projectId: 1,
    sender: 'Alice',
    projectSlug: 'alpha',
    projectName: 'Alpha',
    snippet: '',
    bodyLength: 0,
    threadKey,
    recipients: 'Bob',
    excerpt: '',
    isAdministrative: false,
    messageCategory: 'user',
    threadCount: 1,
    threadReference: null,
    hasThread: threadId !== null && threadId !== '',
    ...patch,
  };
}
