import type { MatchedBy } from '../blocklists/types.js';
import type { BreakerStateName } from '../upstream/circuitBreaker.js';

export type LatencyStage = 'check' | 'cache' | 'upstream' | 'resolve';

export type ResolutionOutcome = 'resolved' | 'cached' | 'blocked' | 'timeout' | 'failure' | 'invalid';

/**
 * Everything the aggregator accepts. None of the variants has a slot for a
 * query name, a client identifier or message content; source and server names
 * are configuration identifiers.
 */
export type StatsEvent =
  | { type: 'lookup'; blocked: boolean; matchedBy: MatchedBy; micros: number }
  | { type: 'cache'; hit: boolean }
  | { type: 'latency'; stage: LatencyStage; micros: number }
  | { type: 'resolution'; outcome: ResolutionOutcome }
  | { type: 'sourceCount'; source: string; count: number }
  | { type: 'sourceRemoved'; source: string }
  | { type: 'breaker'; server: string; from: BreakerStateName; to: BreakerStateName }
  | { type: 'reload'; durationMs: number; entries: number };

type LatencyCounter = { count: number; totalMicros: number; maxMicros: number };

export type LatencySummary = { count: number; avgMicros: number; maxMicros: number };

export type StatsSnapshot = {
  startedAt: string;
  lookupCount: number;
  blockedCount: number;
  matchedBy: Record<MatchedBy, number>;
  cacheHits: number;
  cacheMisses: number;
  avgLatencyMicros: number;
  stageLatency: Record<LatencyStage, LatencySummary>;
  resolutions: Record<ResolutionOutcome, number>;
  perSourceCounts: Record<string, number>;
  breakerTransitions: number;
  breakerTransitionsByServer: Record<string, number>;
  reloads: number;
  lastReloadMs: number | null;
};

function emptyLatency(): LatencyCounter {
  return { count: 0, totalMicros: 0, maxMicros: 0 };
}

function summarize(c: LatencyCounter): LatencySummary {
  return { count: c.count, avgMicros: c.count ? Math.round(c.totalMicros / c.count) : 0, maxMicros: Math.round(c.maxMicros) };
}

export class StatsAggregator {
  private readonly startedAt = new Date().toISOString();
  private lookupCount = 0;
  private blockedCount = 0;
  private readonly matchedBy: Record<MatchedBy, number> = { exact: 0, trie: 0, none: 0 };
  private cacheHits = 0;
  private cacheMisses = 0;
  private readonly lookupLatency = emptyLatency();
  private readonly stages: Record<LatencyStage, LatencyCounter> = {
    check: emptyLatency(),
    cache: emptyLatency(),
    upstream: emptyLatency(),
    resolve: emptyLatency()
  };
  private readonly resolutions: Record<ResolutionOutcome, number> = {
    resolved: 0,
    cached: 0,
    blocked: 0,
    timeout: 0,
    failure: 0,
    invalid: 0
  };
  private readonly perSource = new Map<string, number>();
  private readonly transitionsByServer = new Map<string, number>();
  private breakerTransitions = 0;
  private reloads = 0;
  private lastReloadMs: number | null = null;

  record(event: StatsEvent): void {
    switch (event.type) {
      case 'lookup':
        this.lookupCount++;
        if (event.blocked) this.blockedCount++;
        this.matchedBy[event.matchedBy]++;
        addLatency(this.lookupLatency, event.micros);
        addLatency(this.stages.check, event.micros);
        return;
      case 'cache':
        if (event.hit) this.cacheHits++;
        else this.cacheMisses++;
        return;
      case 'latency':
        addLatency(this.stages[event.stage], event.micros);
        return;
      case 'resolution':
        this.resolutions[event.outcome]++;
        return;
      case 'sourceCount':
        this.perSource.set(event.source, event.count);
        return;
      case 'sourceRemoved':
        this.perSource.delete(event.source);
        return;
      case 'breaker':
        this.breakerTransitions++;
        this.transitionsByServer.set(event.server, (this.transitionsByServer.get(event.server) ?? 0) + 1);
        return;
      case 'reload':
        this.reloads++;
        this.lastReloadMs = event.durationMs;
        return;
    }
  }

  snapshot(): StatsSnapshot {
    return {
      startedAt: this.startedAt,
      lookupCount: this.lookupCount,
      blockedCount: this.blockedCount,
      matchedBy: { ...this.matchedBy },
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      avgLatencyMicros: summarize(this.lookupLatency).avgMicros,
      stageLatency: {
        check: summarize(this.stages.check),
        cache: summarize(this.stages.cache),
        upstream: summarize(this.stages.upstream),
        resolve: summarize(this.stages.resolve)
      },
      resolutions: { ...this.resolutions },
      perSourceCounts: Object.fromEntries(this.perSource),
      breakerTransitions: this.breakerTransitions,
      breakerTransitionsByServer: Object.fromEntries(this.transitionsByServer),
      reloads: this.reloads,
      lastReloadMs: this.lastReloadMs
    };
  }
}

function addLatency(c: LatencyCounter, micros: number): void {
  if (!Number.isFinite(micros) || micros < 0) return;
  c.count++;
  c.totalMicros += micros;
  if (micros > c.maxMicros) c.maxMicros = micros;
}
