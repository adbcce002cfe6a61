import { compile, type CompileOptions, type Expr } from './booleanQuery';
import { matchesText } from './lowering';
import { recordSearchFallback } from '@/lib/metrics';

export type SearchOutcome =
  | { ok: true; ids: Set<number> }
  | { ok: false; reason: 'query-failed' | 'empty-expression'; error?: unknown };

export interface SearchBackend {
  readonly name: string;
  evaluate(expr: Expr): SearchOutcome;
}

export type FallbackReason = 'index-error' | 'no-matches' | 'empty-expression';

/** Signal, not an error: the primary backend gave nothing usable and the fallback runs. */
export interface FullTextFallbackTriggered {
  reason: FallbackReason;
  backend: string;
  error?: unknown;
}

/**
 * Runs `primary` and retries with `fallback` when it fails, compiles to nothing, or returns
 * zero ids. A genuine zero-match query therefore costs a second evaluation; the reason on
 * the signal tells the two cases apart.
 */
export class FallbackSearchBackend implements SearchBackend {
  readonly name: string;

  constructor(
    private readonly primary: SearchBackend,
    private readonly fallback: SearchBackend,
    private readonly onFallback?: (signal: FullTextFallbackTriggered) => void
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  evaluate(expr: Expr): SearchOutcome {
    const first = this.primary.evaluate(expr);
    if (first.ok && first.ids.size > 0) return first;
    const signal: FullTextFallbackTriggered = first.ok
      ? { reason: 'no-matches', backend: this.primary.name }
      : {
          reason: first.reason === 'query-failed' ? 'index-error' : 'empty-expression',
          backend: this.primary.name,
          error: first.error,
        };
    recordSearchFallback(signal.reason);
    this.onFallback?.(signal);
    return this.fallback.evaluate(expr);
  }
}

export interface SearchDocument {
  id: number;
  subject: string;
  body: string;
}

/** Substring evaluation over documents held in memory. */
export class MemorySearchBackend implements SearchBackend {
  readonly name = 'memory';

  constructor(private readonly documents: readonly SearchDocument[]) {}

  evaluate(expr: Expr): SearchOutcome {
    const ids = new Set<number>();
    for (const doc of this.documents) {
      if (matchesText(expr, doc.subject, doc.body)) ids.add(doc.id);
    }
    return { ok: true, ids };
  }
}

/**
 * Compile and evaluate a query. Empty or whitespace-only text returns an empty set without
 * touching the backend; a failed evaluation also yields an empty set.
 */
export function searchMessageIds(
  query: string,
  backend: SearchBackend,
  options: CompileOptions = {}
): Set<number> {
  const raw = query.trim();
  if (!raw) return new Set();
  const expr = compile(raw, options);
  if (!expr) return new Set();
  const outcome = backend.evaluate(expr);
  if (!outcome.ok) {
    console.warn('[search] evaluation failed on', backend.name, outcome.reason, outcome.error ?? '');
    return new Set();
  }
  return outcome.ids;
}
