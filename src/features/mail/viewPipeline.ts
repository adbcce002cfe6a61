/**
 * Filter, sort and selection state for the message list. `ViewState` is immutable: every
 * change produces a new state and filtering always returns a new array.
 */

import type { OverviewMessage, Thread } from './types';
import { importanceRank, normalizeImportance } from './classification';
import { hasExplicitThread } from './threadKey';
import { compareTimestamps, splitRecipients } from './utils';

export type SortKey = 'newest' | 'oldest' | 'subject' | 'sender' | 'longest';

export type MessageKindFilter = 'user' | 'admin' | 'all';

export interface ViewFilters {
  project: string;
  sender: string;
  recipient: string;
  importance: string;
  /** null: no constraint. */
  hasThread: boolean | null;
  messageKind: MessageKindFilter;
}

export interface ViewState {
  readonly filters: Readonly<ViewFilters>;
  readonly sort: SortKey;
  readonly searchQuery: string;
  readonly threadSearch: string;
  readonly selectedMessageId: number | null;
  readonly selectedThreadKey: string | null;
  /** Bulk selection. */
  readonly selectedMessageIds: readonly number[];
}

export type FilterableMessage = Pick<
  OverviewMessage,
  | 'id'
  | 'subject'
  | 'createdTs'
  | 'importance'
  | 'threadId'
  | 'projectName'
  | 'sender'
  | 'recipients'
  | 'bodyLength'
  | 'isAdministrative'
>;

export const DEFAULT_FILTERS: Readonly<ViewFilters> = Object.freeze({
  project: '',
  sender: '',
  recipient: '',
  importance: '',
  hasThread: null,
  messageKind: 'user',
});

export function createViewState(patch: Partial<ViewState> = {}): ViewState {
  return {
    filters: DEFAULT_FILTERS,
    sort: 'newest',
    searchQuery: '',
    threadSearch: '',
    selectedMessageId: null,
    selectedThreadKey: null,
    selectedMessageIds: [],
    ...patch,
  };
}

export function withFilters(state: ViewState, patch: Partial<ViewFilters>): ViewState {
  return { ...state, filters: { ...state.filters, ...patch } };
}

export function withSort(state: ViewState, sort: SortKey): ViewState {
  return { ...state, sort };
}

export function withSearchQuery(state: ViewState, searchQuery: string): ViewState {
  return { ...state, searchQuery };
}

export function filtersActive(state: ViewState): boolean {
  const f = state.filters;
  return Boolean(f.project || f.sender || f.recipient || f.importance || f.hasThread !== null || f.messageKind !== 'user');
}

/** Back to defaults; search, thread search and every selection are cleared too. Sort is kept. */
export function clearFilters(state: ViewState): ViewState {
  return createViewState({ sort: state.sort });
}

/** Exact membership in the split roster; "Alice" never matches "Alicia". */
export function hasRecipient(recipients: string, name: string): boolean {
  return splitRecipients(recipients).includes(name);
}

/**
 * All filters AND-combined. `searchIds`, when given, restricts the set before any other filter.
 * The input array is never modified.
 */
export function filterMessages<M extends FilterableMessage>(
  messages: readonly M[],
  filters: Readonly<ViewFilters>,
  searchIds: ReadonlySet<number> | null = null
): M[] {
  const importance = filters.importance.toLowerCase();
  return messages.filter((msg) => {
    if (searchIds && !searchIds.has(msg.id)) return false;
    if (filters.project && msg.projectName !== filters.project) return false;
    if (filters.sender && msg.sender !== filters.sender) return false;
    if (filters.recipient && !hasRecipient(msg.recipients, filters.recipient)) return false;
    if (importance && normalizeImportance(msg.importance) !== importance) return false;
    if (filters.hasThread !== null && hasExplicitThread(msg.threadId) !== filters.hasThread) return false;
    if (filters.messageKind === 'user' && msg.isAdministrative) return false;
    if (filters.messageKind === 'admin' && !msg.isAdministrative) return false;
    return true;
  });
}

const COMPARATORS: Record<SortKey, (a: FilterableMessage, b: FilterableMessage) => number> = {
  newest: (a, b) => compareTimestamps(b.createdTs, a.createdTs),
  oldest: (a, b) => compareTimestamps(a.createdTs, b.createdTs),
  subject: (a, b) => (a.subject || '').localeCompare(b.subject || ''),
  sender: (a, b) => (a.sender || '').localeCompare(b.sender || ''),
  longest: (a, b) => (b.bodyLength || 0) - (a.bodyLength || 0),
};

/** Stable sort into a new array; ties keep their input order. */
export function sortMessages<M extends FilterableMessage>(messages: readonly M[], sort: SortKey): M[] {
  return [...messages].sort(COMPARATORS[sort]);
}

export function isThreadVisible(thread: Pick<Thread, 'hasAdministrative' | 'hasNonAdministrative'>, kind: MessageKindFilter): boolean {
  if (kind === 'all') return true;
  if (kind === 'admin') return thread.hasAdministrative;
  return thread.hasNonAdministrative;
}

/** Visible threads whose subject, key or latest snippet contains `search` (case-insensitive). */
export function filterThreads<T extends Thread>(threads: readonly T[], kind: MessageKindFilter, search: string = ''): T[] {
  const query = search.trim().toLowerCase();
  return threads.filter((thread) => {
    if (!isThreadVisible(thread, kind)) return false;
    if (!query) return true;
    return (
      thread.subject.toLowerCase().includes(query) ||
      thread.key.toLowerCase().includes(query) ||
      thread.latestSnippet.toLowerCase().includes(query)
    );
  });
}

export interface ViewResult<M> {
  messages: M[];
  state: ViewState;
}

/**
 * Filter then sort. Post-condition: nothing selected lies outside the result. The selected
 * thread is dropped when it is known and hidden by the message-kind filter.
 */
export function applyView<M extends FilterableMessage>(
  messages: readonly M[],
  state: ViewState,
  searchIds: ReadonlySet<number> | null = null,
  threads: readonly Thread[] = []
): ViewResult<M> {
  const filtered = sortMessages(filterMessages(messages, state.filters, searchIds), state.sort);
  const visibleIds = new Set(filtered.map((m) => m.id));
  const selectedMessageIds = state.selectedMessageIds.filter((id) => visibleIds.has(id));
  const selectedMessageId =
    state.selectedMessageId !== null && visibleIds.has(state.selectedMessageId) ? state.selectedMessageId : null;
  let selectedThreadKey = state.selectedThreadKey;
  if (selectedThreadKey !== null) {
    const thread = threads.find((t) => t.key === selectedThreadKey);
    if (thread && !isThreadVisible(thread, state.filters.messageKind)) selectedThreadKey = null;
  }
  return {
    messages: filtered,
    state: { ...state, selectedMessageIds, selectedMessageId, selectedThreadKey },
  };
}

/** Selecting the already selected message clears the selection. */
export function selectMessage(state: ViewState, id: number | null): ViewState {
  const next = id !== null && state.selectedMessageId === id ? null : id;
  return { ...state, selectedMessageId: next };
}

export function selectThread(state: ViewState, key: string | null): ViewState {
  return { ...state, selectedThreadKey: key, threadSearch: '' };
}

export function toggleMessageSelection(state: ViewState, id: number): ViewState {
  const selected = state.selectedMessageIds.includes(id)
    ? state.selectedMessageIds.filter((x) => x !== id)
    : [...state.selectedMessageIds, id];
  return { ...state, selectedMessageIds: selected };
}

/** Select every visible message, or clear when all of them are already selected. */
export function toggleSelectAll(state: ViewState, visible: readonly { id: number }[]): ViewState {
  const allSelected = visible.length > 0 && visible.every((m) => state.selectedMessageIds.includes(m.id));
  return { ...state, selectedMessageIds: allSelected ? [] : visible.map((m) => m.id) };
}

export interface FilterFacets {
  projects: string[];
  senders: string[];
  recipients: string[];
  importance: { value: string; count: number }[];
}

/** Distinct filter values present in `messages`. Importance ranks urgent, high, normal, low. */
export function buildFacets(messages: readonly FilterableMessage[]): FilterFacets {
  const projects = new Set<string>();
  const senders = new Set<string>();
  const recipients = new Set<string>();
  const importance = new Map<string, number>();
  for (const msg of messages) {
    if (msg.projectName) projects.add(msg.projectName);
    if (msg.sender) senders.add(msg.sender);
    for (const r of splitRecipients(msg.recipients)) recipients.add(r);
    const value = normalizeImportance(msg.importance);
    importance.set(value, (importance.get(value) ?? 0) + 1);
  }
  const byRank = [...importance.entries()].sort(
    (a, b) => importanceRank(a[0]) - importanceRank(b[0]) || a[0].localeCompare(b[0])
  );
  return {
    projects: [...projects].sort(),
    senders: [...senders].sort(),
    recipients: [...recipients].sort(),
    importance: byRank.map(([value, count]) => ({ value, count })),
  };
}

/** Drop an importance filter whose value no longer occurs. */
export function reconcileFilters(state: ViewState, facets: FilterFacets): ViewState {
  const current = state.filters.importance.toLowerCase();
  if (!current || facets.importance.some((i) => i.value === current)) return state;
  return withFilters(state, { importance: '' });
}
