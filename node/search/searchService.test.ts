import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { searchMessageIds } from '@/features/search/searchBackend';
import { getMetricsSnapshot, resetMetrics } from '@/lib/metrics';
import { SnapshotQueryEngine } from '../queryEngine';
import { buildSnapshotBytes } from '../testing/snapshotFixture';
import { createSnapshotSearch, FullTextSearchBackend, SubstringSearchBackend } from './searchService';

let engine: SnapshotQueryEngine;

afterEach(() => {
  engine.close();
  vi.restoreAllMocks();
});

describe('SubstringSearchBackend', () => {
  beforeEach(() => {
    engine = SnapshotQueryEngine.open(buildSnapshotBytes());
  });

  const ids = (query: string) => [...searchMessageIds(query, new SubstringSearchBackend(engine))].sort((a, b) => a - b);

  it('matches subject or body case-insensitively', () => {
    expect(ids('friday')).toEqual([1, 2, 3]);
    expect(ids('LUNCH')).toEqual([3]);
  });

  it('evaluates boolean structure', () => {
    expect(ids('deploy AND NOT friday')).toEqual([5]);
    expect(ids('tacos OR incident')).toEqual([3, 5]);
    expect(ids('"staging is green"')).toEqual([2]);
  });

  it('treats LIKE wildcards literally', () => {
    expect(ids('100%')).toEqual([5]);
    expect(ids('login_page')).toEqual([5]);
    expect(ids('loginXpage')).toEqual([]);
  });

  it('is the only backend without a full-text index', () => {
    expect(createSnapshotSearch(engine).name).toBe('like');
  });
});

describe('FullTextSearchBackend', () => {
  beforeEach(() => {
    resetMetrics();
    engine = SnapshotQueryEngine.open(buildSnapshotBytes({ fts: true }), { ftsEnabled: true });
  });

  it('queries the index by rowid', () => {
    const outcome = new FullTextSearchBackend(engine).evaluate({ type: 'term', value: 'friday' });
    expect(outcome).toEqual({ ok: true, ids: new Set([1, 2, 3]) });
    expect(getMetricsSnapshot().fullTextQueries).toBe(1);
  });

  it('reports index failures instead of throwing', () => {
    const outcome = new FullTextSearchBackend(engine).evaluate({ type: 'term', value: 'broken"quote' });
    expect(outcome.ok).toBe(false);
  });

  it('falls back to substring search on no matches', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const onFallback = vi.fn();
    const search = createSnapshotSearch(engine, { onFallback });
    expect(search.name).toBe('fts5+like');
    expect(searchMessageIds('handsh', search)).toEqual(new Set([4]));
    expect(onFallback).toHaveBeenCalledTimes(1);
  });

  it('does not fall back when the index matches', () => {
    const onFallback = vi.fn();
    const search = createSnapshotSearch(engine, { onFallback });
    expect(searchMessageIds('tacos', search)).toEqual(new Set([3]));
    expect(onFallback).not.toHaveBeenCalled();
  });

  it('gives the same ids as substring search for structured queries', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const search = createSnapshotSearch(engine);
    expect(searchMessageIds('deploy AND NOT friday', search)).toEqual(new Set([5]));
  });

  it('can be switched off', () => {
    expect(createSnapshotSearch(engine, { useFullText: false }).name).toBe('like');
  });
});
