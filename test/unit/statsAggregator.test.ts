import { describe, expect, it } from 'vitest';
import { StatsAggregator } from '../../src/stats/statsAggregator.js';

describe('StatsAggregator', () => {
  it('starts from zero', () => {
    const snap = new StatsAggregator().snapshot();
    expect(snap).toMatchObject({
      lookupCount: 0,
      blockedCount: 0,
      matchedBy: { exact: 0, trie: 0, none: 0 },
      cacheHits: 0,
      cacheMisses: 0,
      avgLatencyMicros: 0,
      perSourceCounts: {},
      breakerTransitions: 0,
      reloads: 0,
      lastReloadMs: null
    });
  });

  it('counts lookups by outcome and averages their latency', () => {
    const stats = new StatsAggregator();
    stats.record({ type: 'lookup', blocked: true, matchedBy: 'exact', micros: 10 });
    stats.record({ type: 'lookup', blocked: true, matchedBy: 'trie', micros: 20 });
    stats.record({ type: 'lookup', blocked: false, matchedBy: 'none', micros: 30 });

    const snap = stats.snapshot();
    expect(snap).toMatchObject({ lookupCount: 3, blockedCount: 2, avgLatencyMicros: 20 });
    expect(snap.matchedBy).toEqual({ exact: 1, trie: 1, none: 1 });
    expect(snap.stageLatency.check).toEqual({ count: 3, avgMicros: 20, maxMicros: 30 });
  });

  it('tracks cache, resolution and stage counters', () => {
    const stats = new StatsAggregator();
    stats.record({ type: 'cache', hit: true });
    stats.record({ type: 'cache', hit: false });
    stats.record({ type: 'cache', hit: false });
    stats.record({ type: 'resolution', outcome: 'timeout' });
    stats.record({ type: 'latency', stage: 'upstream', micros: 1_500 });
    stats.record({ type: 'latency', stage: 'upstream', micros: 500 });

    const snap = stats.snapshot();
    expect(snap).toMatchObject({ cacheHits: 1, cacheMisses: 2 });
    expect(snap.resolutions.timeout).toBe(1);
    expect(snap.stageLatency.upstream).toEqual({ count: 2, avgMicros: 1_000, maxMicros: 1_500 });
  });

  it('keeps per-source counts and breaker transitions by server', () => {
    const stats = new StatsAggregator();
    stats.record({ type: 'sourceCount', source: 'a', count: 10 });
    stats.record({ type: 'sourceCount', source: 'b', count: 5 });
    stats.record({ type: 'sourceCount', source: 'a', count: 12 });
    stats.record({ type: 'sourceRemoved', source: 'b' });
    stats.record({ type: 'breaker', server: 'one', from: 'CLOSED', to: 'OPEN' });
    stats.record({ type: 'breaker', server: 'one', from: 'OPEN', to: 'HALF_OPEN' });
    stats.record({ type: 'reload', durationMs: 42, entries: 12 });

    const snap = stats.snapshot();
    expect(snap.perSourceCounts).toEqual({ a: 12 });
    expect(snap.breakerTransitions).toBe(2);
    expect(snap.breakerTransitionsByServer).toEqual({ one: 2 });
    expect(snap).toMatchObject({ reloads: 1, lastReloadMs: 42 });
  });

  it('returns snapshots detached from later updates', () => {
    const stats = new StatsAggregator();
    const before = stats.snapshot();
    stats.record({ type: 'lookup', blocked: false, matchedBy: 'none', micros: 1 });
    expect(before.matchedBy.none).toBe(0);
  });
});
