import type {
  OverviewMessage,
  OverviewRow,
  ProjectInfo,
  Thread,
  ThreadableMessage,
  ThreadRollupRow,
} from '@/features/mail/types';
import { buildMessageRow } from '@/features/mail/messageRow';
import { MessageBodyRepository, type MessageBody } from '@/features/mail/mailRepository';
import { enrichOverviewRows, threadCountsFrom } from '@/features/mail/overview';
import { formatThreadKey, parseThreadKey } from '@/features/mail/threadKey';
import { extendWithThread, synthesizeThreads } from '@/features/mail/threadSynthesizer';
import {
  applyView,
  buildFacets,
  clearFilters,
  createViewState,
  filterThreads,
  isThreadVisible,
  reconcileFilters,
  selectMessage,
  selectThread,
  toggleMessageSelection,
  toggleSelectAll,
  withFilters,
  withSearchQuery,
  withSort,
  type FilterFacets,
  type SortKey,
  type ViewFilters,
  type ViewState,
} from '@/features/mail/viewPipeline';
import { compile } from '@/features/search/booleanQuery';
import { searchMessageIds, type FullTextFallbackTriggered, type SearchBackend } from '@/features/search/searchBackend';
import { SearchDebouncer } from '@/features/search/searchDebouncer';
import { VirtualList, type ViewportMetrics, type VirtualRender } from '@/features/virtualList/virtualWindow';
import { loadConfig, type MailboxConfig } from './config';
import { CacheUnavailableError } from './errors';
import { loadManifest, MANIFEST_PATH } from './manifest';
import { SnapshotQueryEngine } from './queryEngine';
import { createSnapshotSearch } from './search/searchService';
import { SqliteSnapshotCache, type SnapshotCache } from './snapshotCache';
import { SnapshotLoader, type CacheState, type LoadedSnapshot } from './snapshotLoader';
import type { SnapshotTransport } from './transport';

export interface OpenSessionOptions {
  transport: SnapshotTransport;
  manifestPath?: string;
  /** null disables caching; omitted opens the configured store. */
  cache?: SnapshotCache | null;
  config?: MailboxConfig;
  onFallback?: (signal: FullTextFallbackTriggered) => void;
  /** Clock for row timestamps. */
  now?: () => number;
}

export interface SessionStatus {
  total: number;
  source: LoadedSnapshot['source'];
  sourceLabel: string;
  cacheState: CacheState;
  ftsEnabled: boolean;
  /** Steps that failed and were replaced by empty results. */
  degraded: string[];
}

interface SessionParts {
  config: MailboxConfig;
  loader: SnapshotLoader;
  snapshot: LoadedSnapshot;
  engine: SnapshotQueryEngine;
  search: SearchBackend;
  total: number;
  projects: Map<number, ProjectInfo>;
  rollup: ThreadRollupRow[];
  messages: OverviewMessage[];
  degraded: string[];
  now: () => number;
}

/** Store from configuration, or null when disabled or unusable. */
export function openConfiguredCache(config: MailboxConfig): SnapshotCache | null {
  if (!config.cacheEnabled) return null;
  try {
    return SqliteSnapshotCache.open(config.cacheDir);
  } catch (error) {
    if (error instanceof CacheUnavailableError) {
      console.warn('[session] snapshot cache unavailable:', error.message);
      return null;
    }
    throw error;
  }
}

/**
 * One opened snapshot with its view state. Loading and counting are fatal; the other
 * startup queries degrade to empty results so the rest of the mailbox stays usable.
 */
export class MailboxSession {
  private state: ViewState = createViewState();
  private visible: OverviewMessage[] = [];
  private searchIds: Set<number> | null = null;
  private threadList: Thread<ThreadableMessage>[];
  private readonly allMessages: OverviewMessage[];
  private readonly filterFacets: FilterFacets;
  private readonly bodies: MessageBodyRepository;
  private readonly list: VirtualList<OverviewMessage>;
  private readonly debouncer: SearchDebouncer;
  /** Best-effort persistence of a network-loaded image. Resolves false when nothing was written. */
  readonly backgroundWrite: Promise<boolean>;

  private constructor(private readonly parts: SessionParts) {
    this.allMessages = parts.messages;
    this.threadList = synthesizeThreads<ThreadableMessage>(parts.messages);
    this.filterFacets = buildFacets(parts.messages);
    this.bodies = new MessageBodyRepository((id) => parts.engine.loadMessageBody(id));
    this.list = new VirtualList<OverviewMessage>(
      (msg, index) =>
        buildMessageRow(msg, index, {
          selectedId: this.state.selectedMessageId,
          highlight: this.highlightTerm(),
          now: parts.now(),
        }),
      { estimatedRowHeight: parts.config.rowHeight, overscan: parts.config.overscan }
    );
    this.debouncer = new SearchDebouncer((query) => {
      this.search(query);
    }, parts.config.searchDebounceMs);
    this.refresh();
    this.backgroundWrite = parts.loader.persist(parts.snapshot);
  }

  static async open(options: OpenSessionOptions): Promise<MailboxSession> {
    const config = options.config ?? loadConfig();
    const manifest = await loadManifest(options.transport, options.manifestPath ?? MANIFEST_PATH);
    const cache = options.cache !== undefined ? options.cache : openConfiguredCache(config);
    const loader = new SnapshotLoader(options.transport, cache);
    const snapshot = await loader.load(manifest);
    const engine = SnapshotQueryEngine.open(snapshot.bytes, {
      ftsEnabled: manifest.database.fts_enabled,
      explain: config.explainQueries,
    });

    let total: number;
    try {
      total = engine.countMessages();
    } catch (error) {
      engine.close();
      throw error;
    }

    const degraded: string[] = [];
    const step = <T>(name: string, fallback: T, run: () => T): T => {
      try {
        return run();
      } catch (error) {
        console.warn(`[session] ${name} unavailable, continuing without it`, error);
        degraded.push(name);
        return fallback;
      }
    };
    const projects = step('projects', new Map<number, ProjectInfo>(), () => engine.listProjects());
    const rollup = step<ThreadRollupRow[]>('threads', [], () => engine.buildThreadRollup(config.threadLimit));
    const roster = step('recipients', new Map<number, string>(), () => engine.buildRecipientsRoster());
    const rows = step<OverviewRow[]>('overview', [], () => engine.listAllMessagesOverview());
    const messages = enrichOverviewRows(rows, roster, threadCountsFrom(rollup));
    const search = createSnapshotSearch(engine, { onFallback: options.onFallback });

    console.info('[session] opened', `${total} messages`, `from ${snapshot.sourceLabel}`, `search: ${search.name}`);
    return new MailboxSession({
      config,
      loader,
      snapshot,
      engine,
      search,
      total,
      projects,
      rollup,
      messages,
      degraded,
      now: options.now ?? Date.now,
    });
  }

  get status(): SessionStatus {
    return {
      total: this.parts.total,
      source: this.parts.snapshot.source,
      sourceLabel: this.parts.snapshot.sourceLabel,
      cacheState: this.parts.loader.cacheState,
      ftsEnabled: this.parts.engine.ftsEnabled,
      degraded: [...this.parts.degraded],
    };
  }

  get viewState(): ViewState {
    return this.state;
  }

  /** Filtered and sorted message list. */
  get messages(): readonly OverviewMessage[] {
    return this.visible;
  }

  get facets(): FilterFacets {
    return this.filterFacets;
  }

  get projects(): ProjectInfo[] {
    return [...this.parts.projects.values()];
  }

  get threadSummaries(): readonly ThreadRollupRow[] {
    return this.parts.rollup;
  }

  /** Threads visible under the message-kind filter and thread search. */
  get threads(): Thread<ThreadableMessage>[] {
    return filterThreads(this.threadList, this.state.filters.messageKind, this.state.threadSearch);
  }

  get selectedThread(): Thread<ThreadableMessage> | null {
    const key = this.state.selectedThreadKey;
    return key === null ? null : this.threadList.find((t) => t.key === key) ?? null;
  }

  private highlightTerm(): string {
    const expr = this.state.searchQuery.trim() ? compile(this.state.searchQuery) : null;
    return expr && expr.type === 'term' ? expr.value : '';
  }

  private refresh(): void {
    const reconciled = reconcileFilters(this.state, this.filterFacets);
    const result = applyView(this.allMessages, reconciled, this.searchIds, this.threadList);
    this.state = result.state;
    this.visible = result.messages;
    this.list.setItems(this.visible);
  }

  /** Evaluate `query` now. Blank text clears the search. */
  search(query: string): readonly OverviewMessage[] {
    this.debouncer.cancel();
    this.state = withSearchQuery(this.state, query);
    this.searchIds = query.trim() ? searchMessageIds(query, this.parts.search) : null;
    this.refresh();
    return this.visible;
  }

  /** Keystroke entry point; evaluation waits for the input to settle. */
  queueSearch(query: string): void {
    this.debouncer.input(query);
  }

  flushSearch(): void {
    this.debouncer.flush();
  }

  setFilters(patch: Partial<ViewFilters>): readonly OverviewMessage[] {
    this.state = withFilters(this.state, patch);
    this.refresh();
    return this.visible;
  }

  setSort(sort: SortKey): readonly OverviewMessage[] {
    this.state = withSort(this.state, sort);
    this.refresh();
    return this.visible;
  }

  /** Filters, search and selections back to defaults; sort is kept. */
  clearFilters(): readonly OverviewMessage[] {
    this.debouncer.cancel();
    this.state = clearFilters(this.state);
    this.searchIds = null;
    this.refresh();
    return this.visible;
  }

  setThreadSearch(text: string): Thread<ThreadableMessage>[] {
    this.state = { ...this.state, threadSearch: text };
    return this.threads;
  }

  /**
   * Toggle the selected message. Resolves to the rendered body when a message ends up
   * selected, null when the selection was cleared.
   */
  async selectMessage(id: number): Promise<MessageBody | null> {
    this.state = selectMessage(this.state, id);
    this.list.setItems(this.visible);
    const selected = this.state.selectedMessageId;
    if (selected === null) return null;
    return this.bodies.fetchBody(selected);
  }

  /**
   * Select a thread, fetching only its messages when it is not already listed
   * (deep links). Unknown keys, and threads the message-kind filter hides, leave the
   * selection unchanged and return null.
   */
  openThread(raw: string): Thread<ThreadableMessage> | null {
    const parsed = parseThreadKey(raw);
    if (!parsed) return null;
    const key = formatThreadKey(parsed);
    let result: { threads: Thread<ThreadableMessage>[]; thread: Thread<ThreadableMessage> | null };
    try {
      result = extendWithThread<ThreadableMessage>(this.threadList, key, (k) =>
        this.parts.engine.listMessagesInThread(k)
      );
    } catch (error) {
      console.warn('[session] thread unavailable', key, error);
      return null;
    }
    this.threadList = result.threads;
    if (!result.thread) return null;
    if (!isThreadVisible(result.thread, this.state.filters.messageKind)) return null;
    this.state = selectThread(this.state, key);
    this.refresh();
    return result.thread;
  }

  toggleMessageSelection(id: number): void {
    this.state = toggleMessageSelection(this.state, id);
  }

  toggleSelectAll(): void {
    this.state = toggleSelectAll(this.state, this.visible);
  }

  renderList(viewport: ViewportMetrics, force: boolean = false): VirtualRender {
    return this.list.render(viewport, force);
  }

  measureRows(heights: readonly number[]): void {
    this.list.measure(heights);
  }

  toggleCache(): Promise<CacheState> {
    return this.parts.loader.toggleCache(this.parts.snapshot);
  }

  close(): void {
    this.debouncer.cancel();
    this.bodies.clear();
    this.parts.engine.close();
  }
}
