import Database from 'better-sqlite3';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parseConfig } from './config';
import { FetchFailedError, SnapshotQueryError } from './errors';
import { MailboxSession } from './mailboxSession';
import { openCacheDb } from './db';
import { SqliteSnapshotCache, type SnapshotCache } from './snapshotCache';
import { buildSnapshotBytes, MemoryTransport, type SnapshotFixtureOptions } from './testing/snapshotFixture';

const config = parseConfig({});
const sessions: MailboxSession[] = [];

function bundle(fixture: SnapshotFixtureOptions = { fts: true }): MemoryTransport {
  return new MemoryTransport()
    .putJson('manifest.json', {
      database: { path: 'mailbox.sqlite3', sha256: 'sha-test', fts_enabled: Boolean(fixture.fts) },
    })
    .putBytes('mailbox.sqlite3', buildSnapshotBytes(fixture));
}

async function open(transport: MemoryTransport = bundle(), withCache: boolean = false): Promise<MailboxSession> {
  const cache = withCache ? new SqliteSnapshotCache(openCacheDb(':memory:')) : null;
  const session = await MailboxSession.open({ transport, cache, config });
  sessions.push(session);
  return session;
}

const ids = (list: readonly { id: number }[]) => list.map((m) => m.id);

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  while (sessions.length > 0) sessions.pop()?.close();
  vi.restoreAllMocks();
});

describe('MailboxSession.open', () => {
  it('loads the snapshot and builds the default view', async () => {
    const session = await open();
    expect(session.status).toEqual({
      total: 5,
      source: 'network',
      sourceLabel: 'mailbox.sqlite3',
      cacheState: 'unsupported',
      ftsEnabled: true,
      degraded: [],
    });
    expect(ids(session.messages)).toEqual([5, 3, 2, 1]);
    expect(session.facets.projects).toEqual(['Alpha Project', 'Beta Project']);
    expect(session.projects.map((p) => p.slug)).toEqual(['alpha', 'beta']);
    expect(session.threads.map((t) => t.key)).toEqual(['msg:5', 'msg:3', 'T-deploy']);
  });

  it('persists a network load in the background', async () => {
    const session = await open(bundle(), true);
    expect(await session.backgroundWrite).toBe(true);
    expect(session.status.cacheState).toBe('cached');
    expect(await session.toggleCache()).toBe('memory');
  });

  it('resolves before the cache write starts', async () => {
    const events: string[] = [];
    const cache: SnapshotCache = {
      read: async () => null,
      readMetadata: async () => null,
      write: async () => {
        events.push('write');
        return true;
      },
      remove: async () => {},
    };
    const session = await MailboxSession.open({ transport: bundle(), cache, config });
    sessions.push(session);
    events.push('open');
    expect(await session.backgroundWrite).toBe(true);
    expect(events).toEqual(['open', 'write']);
  });

  it('degrades when recipients are missing', async () => {
    const session = await open(bundle({ omitTables: ['message_recipients'] }));
    expect(session.status.degraded).toEqual(['recipients']);
    expect(session.messages.every((m) => m.recipients === 'Unknown')).toBe(true);
    expect(session.status.ftsEnabled).toBe(false);
  });

  it('fails when the manifest is missing', async () => {
    await expect(MailboxSession.open({ transport: new MemoryTransport(), cache: null, config })).rejects.toBeInstanceOf(
      FetchFailedError
    );
  });

  it('fails when messages cannot be counted', async () => {
    const empty = new Database(':memory:');
    const bytes = new Uint8Array(empty.serialize());
    empty.close();
    const transport = new MemoryTransport()
      .putJson('manifest.json', { database: { path: 'mailbox.sqlite3' } })
      .putBytes('mailbox.sqlite3', bytes);
    await expect(MailboxSession.open({ transport, cache: null, config })).rejects.toBeInstanceOf(SnapshotQueryError);
  });
});

describe('MailboxSession view', () => {
  it('searches and clears the search', async () => {
    const session = await open();
    expect(ids(session.search('friday'))).toEqual([3, 2, 1]);
    expect(session.viewState.searchQuery).toBe('friday');
    expect(ids(session.search('  '))).toEqual([5, 3, 2, 1]);
  });

  it('evaluates queued searches on flush', async () => {
    const session = await open();
    session.queueSearch('tacos');
    expect(ids(session.messages)).toEqual([5, 3, 2, 1]);
    session.flushSearch();
    expect(ids(session.messages)).toEqual([3]);
  });

  it('filters recipients exactly and sorts', async () => {
    const session = await open();
    expect(ids(session.setFilters({ recipient: 'Alice' }))).toEqual([2]);
    expect(ids(session.setFilters({ recipient: '', messageKind: 'all' }))).toEqual([5, 4, 3, 2, 1]);
    expect(ids(session.setSort('oldest'))).toEqual([1, 2, 3, 4, 5]);
    expect(ids(session.clearFilters())).toEqual([1, 2, 3, 5]);
    expect(session.viewState.sort).toBe('oldest');
  });

  it('loads the body of the selected message and toggles it off', async () => {
    const session = await open();
    const body = await session.selectMessage(3);
    expect(body?.markdown).toBe('Tacos on friday?');
    expect(body?.html).toContain('Tacos on friday?');
    expect(session.viewState.selectedMessageId).toBe(3);
    expect(await session.selectMessage(3)).toBeNull();
  });

  it('drops the selection when a filter hides it', async () => {
    const session = await open();
    await session.selectMessage(5);
    session.setFilters({ sender: 'Bob' });
    expect(session.viewState.selectedMessageId).toBeNull();
  });

  it('opens threads by key', async () => {
    const session = await open();
    const thread = session.openThread('T-deploy');
    expect(thread?.messageCount).toBe(2);
    expect(session.selectedThread?.key).toBe('T-deploy');
    expect(session.openThread('missing')).toBeNull();
    expect(session.viewState.selectedThreadKey).toBe('T-deploy');
  });

  it('normalizes deep-linked keys', async () => {
    const session = await open();
    expect(session.openThread(' msg:3 ')?.key).toBe('msg:3');
    expect(session.viewState.selectedThreadKey).toBe('msg:3');
    expect(session.openThread('   ')).toBeNull();
    expect(session.viewState.selectedThreadKey).toBe('msg:3');
  });

  it('refuses threads hidden by the message-kind filter', async () => {
    const session = await open();
    expect(session.openThread('msg:4')).toBeNull();
    expect(session.viewState.selectedThreadKey).toBeNull();
    session.setFilters({ messageKind: 'all' });
    expect(session.openThread('msg:4')?.key).toBe('msg:4');
    expect(session.viewState.selectedThreadKey).toBe('msg:4');
  });

  it('searches threads by subject and latest snippet', async () => {
    const session = await open();
    expect(session.setThreadSearch('deploy').map((t) => t.key)).toEqual(['msg:5', 'T-deploy']);
    expect(session.setThreadSearch('lunch').map((t) => t.key)).toEqual(['msg:3']);
  });

  it('bulk-selects the visible messages', async () => {
    const session = await open();
    session.setFilters({ project: 'Beta Project' });
    session.toggleSelectAll();
    expect(session.viewState.selectedMessageIds).toEqual([3]);
  });

  it('renders the visible window of rows', async () => {
    const session = await open();
    const first = session.renderList({ scrollTop: 0, viewportHeight: 600 });
    expect(first.window).toEqual({ start: 0, end: 4, beforeHeight: 0, afterHeight: 0 });
    expect(first.markup).toContain('data-message-id="5"');
    expect(first.changed).toBe(true);
    expect(session.renderList({ scrollTop: 0, viewportHeight: 600 }).changed).toBe(false);
  });
});
