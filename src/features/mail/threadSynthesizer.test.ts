import { describe, it, expect, vi } from 'vitest';
import type { ThreadableMessage } from './types';
import { buildThread, extendWithThread, insertThread, synthesizeThreads } from './threadSynthesizer';

function msg(id: number, threadId: string | null, createdTs: string, extra: Partial<ThreadableMessage> = {}): ThreadableMessage {
  return { id, threadId, createdTs, subject: `Subject ${id}`, importance: 'normal', isAdministrative: false, ...extra };
}

describe('synthesizeThreads', () => {
  it('gives each unthreaded message its own thread, newest first', () => {
    const threads = synthesizeThreads([
      msg(1, null, '2025-01-01T10:00:00Z'),
      msg(2, '', '2025-01-02T10:00:00Z'),
    ]);
    expect(threads.map((t) => t.key)).toEqual(['msg:2', 'msg:1']);
    expect(threads.map((t) => t.messageCount)).toEqual([1, 1]);
  });

  it('groups explicit threads and orders members oldest first', () => {
    const threads = synthesizeThreads([
      msg(5, 'T', '2025-01-03T10:00:00Z', { subject: 'Re: plan', importance: 'HIGH', snippet: 'latest words' }),
      msg(3, 'T', '2025-01-01T10:00:00Z', { subject: 'plan' }),
      msg(4, null, '2025-01-02T10:00:00Z'),
    ]);
    expect(threads.map((t) => t.key)).toEqual(['T', 'msg:4']);
    const [t] = threads;
    expect(t.messages.map((m) => m.id)).toEqual([3, 5]);
    expect(t.subject).toBe('Re: plan');
    expect(t.lastCreatedTs).toBe('2025-01-03T10:00:00Z');
    expect(t.latestImportance).toBe('high');
    expect(t.latestSnippet).toBe('latest words');
  });

  it('breaks timestamp ties by the latest message id', () => {
    const threads = synthesizeThreads([
      msg(10, 'A', '2025-01-01T10:00:00Z'),
      msg(11, 'B', '2025-01-01T10:00:00Z'),
    ]);
    expect(threads.map((t) => t.key)).toEqual(['B', 'A']);
  });

  it('categorizes threads by their administrative members', () => {
    const threads = synthesizeThreads([
      msg(1, 'mixed', '2025-01-01T10:00:00Z', { isAdministrative: true }),
      msg(2, 'mixed', '2025-01-01T11:00:00Z'),
      msg(3, 'admin', '2025-01-01T09:00:00Z', { isAdministrative: true }),
    ]);
    const byKey = new Map(threads.map((t) => [t.key, t]));
    expect(byKey.get('mixed')?.category).toBe('mixed');
    expect(byKey.get('mixed')?.hasNonAdministrative).toBe(true);
    expect(byKey.get('admin')?.category).toBe('admin');
    expect(byKey.get('admin')?.hasNonAdministrative).toBe(false);
  });
});

describe('buildThread', () => {
  it('falls back to a placeholder subject', () => {
    expect(buildThread('msg:1', [msg(1, null, '2025-01-01T00:00:00Z', { subject: '' })]).subject).toBe('(no subject)');
  });
});

describe('insertThread and extendWithThread', () => {
  const base = synthesizeThreads([
    msg(1, 'old', '2025-01-01T10:00:00Z'),
    msg(2, 'new', '2025-01-05T10:00:00Z'),
  ]);

  it('inserts at the ranked position', () => {
    const middle = buildThread('mid', [msg(3, 'mid', '2025-01-03T10:00:00Z')]);
    expect(insertThread(base, middle).map((t) => t.key)).toEqual(['new', 'mid', 'old']);
  });

  it('leaves the list alone when the key exists', () => {
    const dup = buildThread('old', [msg(9, 'old', '2025-02-01T10:00:00Z')]);
    expect(insertThread(base, dup).map((t) => t.key)).toEqual(['new', 'old']);
  });

  it('fetches only missing threads', () => {
    const fetch = vi.fn((key: string) => (key === 'deep' ? [msg(7, 'deep', '2025-01-09T10:00:00Z')] : []));
    const found = extendWithThread(base, 'old', fetch);
    expect(found.thread?.key).toBe('old');
    expect(fetch).not.toHaveBeenCalled();

    const deep = extendWithThread(base, 'deep', fetch);
    expect(deep.thread?.messageCount).toBe(1);
    expect(deep.threads.map((t) => t.key)).toEqual(['deep', 'new', 'old']);

    const missing = extendWithThread(base, 'nope', fetch);
    expect(missing.thread).toBeNull();
    expect(missing.threads).toHaveLength(2);
  });
});
