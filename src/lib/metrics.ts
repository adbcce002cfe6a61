/**
 * In-memory counters for snapshot loading and querying. No persistence.
 * Tracks per-operation query latency, cache effectiveness and search fallbacks.
 */

import type { FallbackReason } from '@/features/search/searchBackend';

const MAX_SAMPLES = 100;

export interface MetricsSnapshot {
  cacheHits: number;
  cacheMisses: number;
  cacheWriteFailures: number;
  cacheHitRate: number;
  fullTextQueries: number;
  fallbacks: Record<FallbackReason, number>;
  queries: Record<string, { count: number; lastMs: number; p95Ms: number }>;
}

let cacheHits = 0;
let cacheMisses = 0;
let cacheWriteFailures = 0;
let fullTextQueries = 0;
let fallbacks: Record<FallbackReason, number> = { 'index-error': 0, 'no-matches': 0, 'empty-expression': 0 };
const queryDurationsMs = new Map<string, number[]>();
const queryCounts = new Map<string, number>();

export function recordQueryDurationMs(operation: string, ms: number): void {
  queryCounts.set(operation, (queryCounts.get(operation) ?? 0) + 1);
  const samples = queryDurationsMs.get(operation) ?? [];
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) samples.shift();
  queryDurationsMs.set(operation, samples);
}

export function recordCacheHit(): void {
  cacheHits++;
}

export function recordCacheMiss(): void {
  cacheMisses++;
}

export function recordCacheWriteFailure(): void {
  cacheWriteFailures++;
}

export function recordFullTextQuery(): void {
  fullTextQueries++;
}

export function recordSearchFallback(reason: FallbackReason): void {
  fallbacks[reason]++;
}

export function getCacheHitRate(): number {
  const total = cacheHits + cacheMisses;
  return total === 0 ? 0 : cacheHits / total;
}

function p95(samples: readonly number[]): number {
  if (samples.length === 0) return 0;
  const sorted = [...samples].sort((a, b) => a - b);
  const idx = Math.ceil(sorted.length * 0.95) - 1;
  return sorted[Math.max(0, idx)];
}

export function getMetricsSnapshot(): MetricsSnapshot {
  const queries: MetricsSnapshot['queries'] = {};
  for (const [operation, samples] of queryDurationsMs) {
    queries[operation] = {
      count: queryCounts.get(operation) ?? samples.length,
      lastMs: samples[samples.length - 1] ?? 0,
      p95Ms: p95(samples),
    };
  }
  return {
    cacheHits,
    cacheMisses,
    cacheWriteFailures,
    cacheHitRate: getCacheHitRate(),
    fullTextQueries,
    fallbacks: { ...fallbacks },
    queries,
  };
}

export function resetMetrics(): void {
  cacheHits = 0;
  cacheMisses = 0;
  cacheWriteFailures = 0;
  fullTextQueries = 0;
  fallbacks = { 'index-error': 0, 'no-matches': 0, 'empty-expression': 0 };
  queryDurationsMs.clear();
  queryCounts.clear();
}
