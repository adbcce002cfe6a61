import type { MessageRecord, OverviewRow, ProjectInfo, ThreadMessage, ThreadRollupRow } from '@/features/mail/types';
import { isAdministrativeMessage } from '@/features/mail/classification';
import { threadKeyString } from '@/features/mail/threadKey';
import { buildPreviewSnippet } from '@/features/mail/utils';
import { DEFAULT_SUBSTRING_COLUMNS, type SubstringColumns } from '@/features/search/lowering';
import { recordQueryDurationMs } from '@/lib/metrics';
import { openSnapshotDb, type Db } from './db';
import { SnapshotQueryError } from './errors';

export const DEFAULT_THREAD_LIMIT = 50000;
export const OVERVIEW_SNIPPET_LENGTH = 280;
const ROLLUP_SNIPPET_LENGTH = 160;

export interface QueryEngineOptions {
  /** Manifest flag; full-text search also needs the index table to be present. */
  ftsEnabled?: boolean;
  /** Log EXPLAIN QUERY PLAN for every query. */
  explain?: boolean;
}

type MessageColumns = {
  id: number;
  subject: string;
  thread_id: string | null;
  created_ts: string;
  importance: string;
  project_id: number | null;
};

const MESSAGE_COLUMNS =
  "m.id, COALESCE(m.subject, '') AS subject, m.thread_id, COALESCE(m.created_ts, '') AS created_ts, " +
  "COALESCE(m.importance, '') AS importance, m.project_id";

const THREAD_KEY_SQL = "CASE WHEN m.thread_id IS NULL OR m.thread_id = '' THEN printf('msg:%d', m.id) ELSE m.thread_id END";

function toRecord(r: MessageColumns): MessageRecord {
  return {
    id: r.id,
    subject: r.subject,
    threadId: r.thread_id,
    createdTs: r.created_ts,
    importance: r.importance,
    projectId: r.project_id,
  };
}

/**
 * Read-only queries over one opened snapshot. Every failure surfaces as SnapshotQueryError
 * naming the operation; callers decide which operations are fatal.
 */
export class SnapshotQueryEngine {
  readonly ftsEnabled: boolean;
  private readonly explain: boolean;
  private roster: Map<number, string> | null = null;
  private projects: Map<number, ProjectInfo> | null = null;
  private columns: SubstringColumns | null = null;

  constructor(private readonly db: Db, options: QueryEngineOptions = {}) {
    this.explain = options.explain ?? false;
    this.ftsEnabled = Boolean(options.ftsEnabled) && this.detectFts();
    if (options.ftsEnabled && !this.ftsEnabled) {
      console.warn('[engine] manifest enables full-text search but fts_messages is missing');
    }
  }

  static open(bytes: Uint8Array, options: QueryEngineOptions = {}): SnapshotQueryEngine {
    let db: Db;
    try {
      db = openSnapshotDb(bytes);
    } catch (error) {
      throw new SnapshotQueryError('open', { cause: error });
    }
    return new SnapshotQueryEngine(db, options);
  }

  private explainPlan(operation: string, sql: string, params: readonly unknown[]): void {
    if (!this.explain) return;
    try {
      const plan = this.db
        .prepare<unknown[], { detail: string }>(`EXPLAIN QUERY PLAN ${sql}`)
        .all(...params)
        .map((row) => row.detail);
      console.info(`[engine] plan ${operation}:`, plan.join(' | '));
    } catch (error) {
      console.debug(`[engine] no plan for ${operation}`, error);
    }
  }

  private timed<T>(operation: string, sql: string, params: readonly unknown[], exec: () => T): T {
    this.explainPlan(operation, sql, params);
    const started = performance.now();
    try {
      return exec();
    } catch (error) {
      throw new SnapshotQueryError(operation, { cause: error });
    } finally {
      recordQueryDurationMs(operation, performance.now() - started);
    }
  }

  private all<R>(operation: string, sql: string, params: readonly unknown[] = []): R[] {
    return this.timed(operation, sql, params, () => this.db.prepare<unknown[], R>(sql).all(...params));
  }

  private get<R>(operation: string, sql: string, params: readonly unknown[] = []): R | undefined {
    return this.timed(operation, sql, params, () => this.db.prepare<unknown[], R>(sql).get(...params));
  }

  /** Ids of messages matching a WHERE clause over `messages`, or a full statement. */
  selectIds(operation: string, sql: string, params: readonly unknown[]): number[] {
    return this.all<{ id: number }>(operation, sql, params).map((r) => r.id);
  }

  hasTable(name: string): boolean {
    const row = this.get<{ found: number }>(
      'schema.table',
      "SELECT 1 AS found FROM sqlite_master WHERE type IN ('table', 'view') AND name = ?",
      [name]
    );
    return row !== undefined;
  }

  detectFts(): boolean {
    try {
      return this.hasTable('fts_messages');
    } catch (error) {
      console.warn('[engine] full-text detection failed', error);
      return false;
    }
  }

  /** Subject and body expressions for substring search; uses `subject_lower` when exported. */
  substringColumns(): SubstringColumns {
    if (this.columns) return this.columns;
    const names = this.all<{ name: string }>('schema.columns', "SELECT name FROM pragma_table_info('messages')").map(
      (c) => c.name
    );
    this.columns = names.includes('subject_lower')
      ? { ...DEFAULT_SUBSTRING_COLUMNS, subject: "COALESCE(subject_lower, '')" }
      : DEFAULT_SUBSTRING_COLUMNS;
    return this.columns;
  }

  countMessages(): number {
    const row = this.get<{ total: number }>('count', 'SELECT COUNT(*) AS total FROM messages');
    return row ? row.total : 0;
  }

  listProjects(): Map<number, ProjectInfo> {
    if (this.projects) return this.projects;
    const rows = this.all<{ id: number; slug: string | null; human_key: string | null }>(
      'projects',
      'SELECT id, slug, human_key FROM projects'
    );
    const projects = new Map<number, ProjectInfo>();
    for (const r of rows) {
      projects.set(r.id, { slug: r.slug ?? '', humanKey: r.human_key ?? r.slug ?? '' });
    }
    this.projects = projects;
    return projects;
  }

  /**
   * One row per thread key, newest thread first. Unthreaded messages form `msg:<id>`
   * threads of one. The latest message is picked by parsed timestamp, then id.
   */
  buildThreadRollup(limit: number = DEFAULT_THREAD_LIMIT): ThreadRollupRow[] {
    const sql = `
      WITH keyed AS (
        SELECT m.id, COALESCE(m.subject, '') AS subject, COALESCE(m.importance, '') AS importance,
               COALESCE(m.created_ts, '') AS created_ts,
               substr(COALESCE(m.body_md, ''), 1, ${ROLLUP_SNIPPET_LENGTH}) AS snippet,
               ${THREAD_KEY_SQL} AS thread_key
        FROM messages m
      ), ranked AS (
        SELECT keyed.*,
               ROW_NUMBER() OVER (PARTITION BY thread_key ORDER BY datetime(created_ts) DESC, id DESC) AS rn,
               COUNT(*) OVER (PARTITION BY thread_key) AS message_count
        FROM keyed
      )
      SELECT thread_key, message_count, created_ts AS last_created_ts, subject AS latest_subject,
             importance AS latest_importance, snippet AS latest_snippet
      FROM ranked
      WHERE rn = 1
      ORDER BY datetime(created_ts) DESC, id DESC
      LIMIT ?`;
    return this.all<{
      thread_key: string;
      message_count: number;
      last_created_ts: string;
      latest_subject: string;
      latest_importance: string;
      latest_snippet: string;
    }>('threads.rollup', sql, [limit]).map((r) => ({
      threadKey: r.thread_key,
      messageCount: r.message_count,
      lastCreatedTs: r.last_created_ts,
      latestSubject: r.latest_subject,
      latestImportance: r.latest_importance,
      latestSnippet: r.latest_snippet,
    }));
  }

  /** Members of one thread, oldest first. `msg:<id>` matches only that unthreaded message. */
  listMessagesInThread(key: string): ThreadMessage[] {
    const sql = `
      SELECT ${MESSAGE_COLUMNS}, COALESCE(m.body_md, '') AS body_md, COALESCE(a.name, 'Unknown') AS sender
      FROM messages m
      LEFT JOIN agents a ON a.id = m.sender_id
      WHERE m.thread_id = ?
         OR ((m.thread_id IS NULL OR m.thread_id = '') AND printf('msg:%d', m.id) = ?)
      ORDER BY datetime(m.created_ts) ASC, m.id ASC`;
    const rows = this.all<MessageColumns & { body_md: string; sender: string }>('threads.messages', sql, [key, key]);
    const roster = this.rosterOrEmpty();
    return rows.map((r) => {
      const record = toRecord(r);
      return {
        ...record,
        threadKey: threadKeyString(record),
        sender: r.sender,
        recipients: roster.get(r.id) ?? '',
        bodyMd: r.body_md,
        bodyLength: r.body_md.length,
        snippet: r.body_md.slice(0, OVERVIEW_SNIPPET_LENGTH),
        previewPlain: buildPreviewSnippet(r.body_md),
        isAdministrative: isAdministrativeMessage({ subject: r.subject, body: r.body_md }),
      };
    });
  }

  /** Every message, newest first, without bodies. */
  listAllMessagesOverview(): OverviewRow[] {
    const sql = `
      SELECT ${MESSAGE_COLUMNS},
             COALESCE(a.name, 'Unknown') AS sender,
             COALESCE(p.slug, '') AS project_slug,
             COALESCE(p.human_key, p.slug, '') AS project_name,
             LENGTH(COALESCE(m.body_md, '')) AS body_length,
             substr(COALESCE(m.body_md, ''), 1, ${OVERVIEW_SNIPPET_LENGTH}) AS snippet
      FROM messages m
      LEFT JOIN agents a ON a.id = m.sender_id
      LEFT JOIN projects p ON p.id = m.project_id
      ORDER BY datetime(m.created_ts) DESC, m.id DESC`;
    return this.all<
      MessageColumns & { sender: string; project_slug: string; project_name: string; body_length: number; snippet: string }
    >('overview', sql).map((r) => ({
      ...toRecord(r),
      sender: r.sender,
      projectSlug: r.project_slug,
      projectName: r.project_name,
      bodyLength: r.body_length,
      snippet: r.snippet,
    }));
  }

  /** message id to recipient names, sorted and comma-joined. Built in one pass and kept. */
  buildRecipientsRoster(): Map<number, string> {
    if (this.roster) return this.roster;
    const rows = this.all<{ message_id: number; recipient_name: string }>(
      'recipients',
      `SELECT mr.message_id, COALESCE(a.name, 'Unknown') AS recipient_name
       FROM message_recipients mr
       LEFT JOIN agents a ON a.id = mr.agent_id
       ORDER BY mr.message_id, recipient_name`
    );
    const roster = new Map<number, string>();
    let currentId: number | null = null;
    let names: string[] = [];
    for (const r of rows) {
      if (r.message_id !== currentId) {
        if (currentId !== null) roster.set(currentId, names.join(', '));
        currentId = r.message_id;
        names = [];
      }
      names.push(r.recipient_name);
    }
    if (currentId !== null) roster.set(currentId, names.join(', '));
    this.roster = roster;
    return roster;
  }

  private rosterOrEmpty(): Map<number, string> {
    try {
      return this.buildRecipientsRoster();
    } catch (error) {
      console.warn('[engine] recipients unavailable', error);
      return new Map();
    }
  }

  /** Full markdown body; '' when the message is unknown or has none. */
  loadMessageBody(id: number): string {
    const row = this.get<{ body_md: string }>(
      'body',
      "SELECT COALESCE(body_md, '') AS body_md FROM messages WHERE id = ?",
      [id]
    );
    return row ? row.body_md : '';
  }

  close(): void {
    this.db.close();
  }
}
