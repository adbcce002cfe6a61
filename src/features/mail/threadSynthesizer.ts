/**
 * Groups messages into threads by thread key and ranks them newest first.
 * Membership is computed on every call and never written back to the snapshot.
 */

import type { Thread, ThreadableMessage } from './types';
import { threadCategory } from './classification';
import { threadKeyString } from './threadKey';
import { compareChronological, compareTimestamps } from './utils';

const NO_SUBJECT = '(no subject)';

/** Build one thread from its members. `messages` may be in any order. */
export function buildThread<M extends ThreadableMessage>(key: string, messages: readonly M[]): Thread<M> {
  const ordered = [...messages].sort(compareChronological);
  const latest = ordered.length > 0 ? ordered[ordered.length - 1] : undefined;
  const adminCount = ordered.filter((m) => m.isAdministrative).length;
  return {
    key,
    subject: latest?.subject || NO_SUBJECT,
    messages: ordered,
    messageCount: ordered.length,
    lastCreatedTs: latest?.createdTs ?? null,
    latestImportance: (latest?.importance ?? '').toLowerCase(),
    latestSnippet: latest?.snippet ?? '',
    hasAdministrative: adminCount > 0,
    hasNonAdministrative: adminCount < ordered.length,
    category: threadCategory(adminCount, ordered.length),
  };
}

function latestId(thread: Thread): number {
  const last = thread.messages[thread.messages.length - 1];
  return last ? last.id : -1;
}

/** Newest thread first; equal timestamps fall back to the newer latest message id. */
export function compareThreads(a: Thread, b: Thread): number {
  return compareTimestamps(b.lastCreatedTs, a.lastCreatedTs) || latestId(b) - latestId(a);
}

export function synthesizeThreads<M extends ThreadableMessage>(messages: readonly M[]): Thread<M>[] {
  const groups = new Map<string, M[]>();
  for (const m of messages) {
    const key = threadKeyString(m);
    const group = groups.get(key);
    if (group) group.push(m);
    else groups.set(key, [m]);
  }
  const threads: Thread<M>[] = [];
  for (const [key, members] of groups) {
    threads.push(buildThread(key, members));
  }
  return threads.sort(compareThreads);
}

/**
 * Insert a thread at its ranked position without regrouping the rest.
 * Returns the input list when the key is already present.
 */
export function insertThread<M extends ThreadableMessage>(threads: readonly Thread<M>[], thread: Thread<M>): Thread<M>[] {
  if (threads.some((t) => t.key === thread.key)) return [...threads];
  const next = [...threads];
  let idx = next.findIndex((t) => compareThreads(thread, t) < 0);
  if (idx === -1) idx = next.length;
  next.splice(idx, 0, thread);
  return next;
}

/**
 * Resolve a thread that may not be in the current list (e.g. deep-linked) by fetching
 * only its messages. An empty fetch yields no thread.
 */
export function extendWithThread<M extends ThreadableMessage>(
  threads: readonly Thread<M>[],
  key: string,
  fetchMessages: (key: string) => M[]
): { threads: Thread<M>[]; thread: Thread<M> | null } {
  const existing = threads.find((t) => t.key === key);
  if (existing) return { threads: [...threads], thread: existing };
  const messages = fetchMessages(key);
  if (messages.length === 0) return { threads: [...threads], thread: null };
  const thread = buildThread(key, messages);
  return { threads: insertThread(threads, thread), thread };
}
