/**
 * Mailbox snapshot model shared by the query engine, thread synthesis and the view pipeline.
 * Rows mirror the exported SQLite schema; enriched rows add derived fields.
 */

export type Importance = 'urgent' | 'high' | 'normal' | 'low';

export const IMPORTANCE_ORDER: readonly Importance[] = ['urgent', 'high', 'normal', 'low'];

export interface ProjectInfo {
  slug: string;
  humanKey: string;
}

/** A message as stored in the snapshot. `threadId` is null or '' for unthreaded messages. */
export interface MessageRecord {
  id: number;
  subject: string;
  threadId: string | null;
  createdTs: string;
  importance: string;
  projectId: number | null;
}

/** Overview query row: sender and project joined, body reduced to a prefix and its length. */
export interface OverviewRow extends MessageRecord {
  sender: string;
  projectSlug: string;
  projectName: string;
  /** First 280 characters of the markdown body. */
  snippet: string;
  bodyLength: number;
}

/** Message row enriched for list views. `bodyMd` is loaded lazily and stays absent here. */
export interface OverviewMessage extends OverviewRow {
  threadKey: string;
  recipients: string;
  excerpt: string;
  isAdministrative: boolean;
  messageCategory: MessageCategory;
  threadCount: number;
  threadReference: string | null;
  hasThread: boolean;
}

/** Message row inside an opened thread. Carries the full body. */
export interface ThreadMessage extends MessageRecord {
  threadKey: string;
  sender: string;
  recipients: string;
  bodyMd: string;
  bodyLength: number;
  snippet: string;
  previewPlain: string;
  isAdministrative: boolean;
}

export type MessageCategory = 'user' | 'admin';

export type ThreadCategory = 'user' | 'admin' | 'mixed';

export interface ThreadRollupRow {
  threadKey: string;
  messageCount: number;
  lastCreatedTs: string;
  latestSubject: string;
  latestImportance: string;
  latestSnippet: string;
}

/** Minimum a message needs to be grouped into a thread. */
export interface ThreadableMessage {
  id: number;
  threadId: string | null;
  createdTs: string;
  subject: string;
  importance: string;
  isAdministrative: boolean;
  snippet?: string;
}

export interface Thread<M extends ThreadableMessage = ThreadableMessage> {
  key: string;
  subject: string;
  /** Ascending by (createdTs, id). */
  messages: M[];
  messageCount: number;
  lastCreatedTs: string | null;
  latestImportance: string;
  latestSnippet: string;
  hasAdministrative: boolean;
  hasNonAdministrative: boolean;
  category: ThreadCategory;
}
