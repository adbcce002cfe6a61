/**
 * Search backends over an opened snapshot: FTS5 when the export carries an index,
 * LIKE over subject and body otherwise or when the index gives nothing usable.
 */

import type { Expr } from '@/features/search/booleanQuery';
import { toFullTextQuery, toSubstringClause } from '@/features/search/lowering';
import {
  FallbackSearchBackend,
  type FullTextFallbackTriggered,
  type SearchBackend,
  type SearchOutcome,
} from '@/features/search/searchBackend';
import { recordFullTextQuery } from '@/lib/metrics';
import type { SnapshotQueryEngine } from '../queryEngine';

export class FullTextSearchBackend implements SearchBackend {
  readonly name = 'fts5';

  constructor(private readonly engine: SnapshotQueryEngine) {}

  evaluate(expr: Expr): SearchOutcome {
    const query = toFullTextQuery(expr).trim();
    if (!query) return { ok: false, reason: 'empty-expression' };
    recordFullTextQuery();
    try {
      const ids = this.engine.selectIds(
        'search.fts',
        'SELECT rowid AS id FROM fts_messages WHERE fts_messages MATCH ?',
        [query]
      );
      return { ok: true, ids: new Set(ids) };
    } catch (error) {
      return { ok: false, reason: 'query-failed', error };
    }
  }
}

export class SubstringSearchBackend implements SearchBackend {
  readonly name = 'like';

  constructor(private readonly engine: SnapshotQueryEngine) {}

  evaluate(expr: Expr): SearchOutcome {
    try {
      const clause = toSubstringClause(expr, this.engine.substringColumns());
      const ids = this.engine.selectIds('search.like', `SELECT id FROM messages WHERE ${clause.sql}`, clause.params);
      return { ok: true, ids: new Set(ids) };
    } catch (error) {
      return { ok: false, reason: 'query-failed', error };
    }
  }
}

export interface SnapshotSearchOptions {
  /** Defaults to whether the engine found a usable index. */
  useFullText?: boolean;
  onFallback?: (signal: FullTextFallbackTriggered) => void;
}

export function createSnapshotSearch(engine: SnapshotQueryEngine, options: SnapshotSearchOptions = {}): SearchBackend {
  const like = new SubstringSearchBackend(engine);
  const useFullText = (options.useFullText ?? true) && engine.ftsEnabled;
  if (!useFullText) return like;
  return new FallbackSearchBackend(new FullTextSearchBackend(engine), like, (signal) => {
    console.info('[search] falling back to substring search:', signal.reason);
    options.onFallback?.(signal);
  });
}
