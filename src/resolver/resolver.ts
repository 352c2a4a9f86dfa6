import type { Logger } from '../logger.js';
import { normalizeName } from '../blocklists/domain.js';
import type { MatchingEngine } from '../blocklists/matchingEngine.js';
import type { Category, CheckResult } from '../blocklists/types.js';
import type { AnonymousCache, ResolvedResponse } from '../cache/anonymousCache.js';
import { ResolutionFailure, ResolutionTimeout, ValidationError, errorCode, errorKindOf, type ErrorKind } from '../core/errors.js';
import type { StatsAggregator } from '../stats/statsAggregator.js';
import type { ConnectionPool, PooledConnection } from '../upstream/connectionPool.js';
import { linkedSignal } from '../upstream/signals.js';
import { abortReason } from '../upstream/transports.js';
import type { Protocol, ServerConfig } from '../upstream/types.js';
import { buildQuery, isQueryType, rcodeOf, responseTtl, validateResponse, type QueryType } from './dnsMessage.js';

export type ResolveResult = {
  blocked: boolean;
  category: Category | null;
  // Raw DNS response message; null when blocked or on error.
  response: Buffer | null;
  ttlSeconds: number | null;
  cached: boolean;
  error: ErrorKind | null;
  ready: boolean;
};

export type ServerTestResult = {
  server: string;
  protocol: Protocol;
  success: boolean;
  latencyMs: number;
  rcode: string | null;
  // Short error code (UPSTREAM_TIMEOUT, CIRCUIT_OPEN, HTTP_503, ...).
  error: string | null;
};

export type ResolverOptions = {
  defaultDeadlineMs: number;
  acquireTimeoutMs: number;
  negativeTtlSeconds: number;
};

export type ResolverDeps = {
  engine: MatchingEngine;
  cache: AnonymousCache;
  pool: ConnectionPool;
  stats: StatsAggregator;
  logger: Logger;
};

function micros(since: number): number {
  return (performance.now() - since) * 1000;
}

/**
 * Blocklist check, then cache, then the upstream pool. Resolution problems are
 * reported through `error`; this never rejects.
 */
export class Resolver {
  constructor(
    private readonly deps: ResolverDeps,
    private readonly opts: ResolverOptions
  ) {}

  /** Blocklist verdict only. `name` must already be normalized. */
  check(name: string): CheckResult {
    const started = performance.now();
    const result = this.deps.engine.check(name);
    this.deps.stats.record({ type: 'lookup', blocked: result.blocked, matchedBy: result.matchedBy, micros: micros(started) });
    return result;
  }

  async resolve(domain: string, qtype: string, deadlineMs?: number): Promise<ResolveResult> {
    const started = performance.now();
    const { stats } = this.deps;

    const name = normalizeName(domain);
    const type = qtype.trim().toUpperCase();
    if (!name || !isQueryType(type)) {
      stats.record({ type: 'resolution', outcome: 'invalid' });
      return { blocked: false, category: null, response: null, ttlSeconds: null, cached: false, error: 'VALIDATION', ready: this.deps.engine.ready };
    }

    const verdict = this.check(name);
    if (verdict.blocked) {
      stats.record({ type: 'resolution', outcome: 'blocked' });
      stats.record({ type: 'latency', stage: 'resolve', micros: micros(started) });
      return { blocked: true, category: verdict.category, response: null, ttlSeconds: null, cached: false, error: null, ready: true };
    }

    const deadline = Date.now() + (deadlineMs ?? this.opts.defaultDeadlineMs);
    const cacheStarted = performance.now();
    try {
      const res = await this.deps.cache.getOrResolve(name, type, (signal) => this.queryUpstream(name, type, signal, deadline), deadline);
      stats.record({ type: 'cache', hit: res.cached });
      if (res.cached) stats.record({ type: 'latency', stage: 'cache', micros: micros(cacheStarted) });
      stats.record({ type: 'resolution', outcome: res.cached ? 'cached' : 'resolved' });
      stats.record({ type: 'latency', stage: 'resolve', micros: micros(started) });
      return {
        blocked: false,
        category: null,
        response: res.payload,
        ttlSeconds: res.ttlSeconds,
        cached: res.cached,
        error: null,
        ready: verdict.ready
      };
    } catch (e) {
      const kind = errorKindOf(e) === 'RESOLUTION_TIMEOUT' ? 'RESOLUTION_TIMEOUT' : 'RESOLUTION_FAILURE';
      stats.record({ type: 'cache', hit: false });
      stats.record({ type: 'resolution', outcome: kind === 'RESOLUTION_TIMEOUT' ? 'timeout' : 'failure' });
      this.deps.logger.debug({ err: errorCode(e), qtype: type }, 'resolution failed');
      return { blocked: false, category: null, response: null, ttlSeconds: null, cached: false, error: kind, ready: verdict.ready };
    }
  }

  /**
   * Sends one A query for `domain` to a single server over a pooled
   * connection. The answer is not cached; the outcome still counts toward the
   * server's health.
   */
  async testServer(serverName: string, domain: string, timeoutMs: number): Promise<ServerTestResult> {
    const server = this.deps.pool.servers.find((s) => s.name === serverName);
    if (!server) throw new ValidationError('unknown server');
    const name = normalizeName(domain);
    if (!name) throw new ValidationError();

    const started = performance.now();
    const result = (success: boolean, rcode: string | null, error: string | null): ServerTestResult => ({
      server: server.name,
      protocol: server.protocol,
      success,
      latencyMs: Math.round(performance.now() - started),
      rcode,
      error
    });
    try {
      const response = await this.attempt(server, buildQuery(name, 'A'), timeoutMs, undefined);
      return result(true, rcodeOf(response), null);
    } catch (e) {
      const code = errorCode(e);
      this.deps.logger.info({ server: server.name, err: code }, 'upstream server test failed');
      return result(false, null, code);
    }
  }

  /**
   * Tries eligible servers in priority order. Each attempt gets an even share
   * of the remaining time so one hanging server leaves room for failover.
   */
  private async queryUpstream(name: string, qtype: QueryType, signal: AbortSignal, deadline: number): Promise<ResolvedResponse> {
    const servers = this.deps.pool.eligibleServers();
    if (!servers.length) throw new ResolutionFailure('no upstream server available');

    const query = buildQuery(name, qtype);
    let lastError: unknown = null;

    for (const [i, server] of servers.entries()) {
      if (signal.aborted) throw abortReason(signal);
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new ResolutionTimeout();

      try {
        const payload = await this.attempt(server, query, Math.ceil(remaining / (servers.length - i)), signal);
        return { payload, ttlSeconds: responseTtl(payload, this.opts.negativeTtlSeconds) };
      } catch (e) {
        if (signal.aborted) throw abortReason(signal);
        lastError = e;
        this.deps.logger.debug({ server: server.name, err: errorCode(e) }, 'upstream attempt failed');
      }
    }
    // The last server used up what was left of the deadline.
    if (errorCode(lastError) === 'UPSTREAM_TIMEOUT') throw new ResolutionTimeout();
    throw new ResolutionFailure(undefined, { cause: lastError });
  }

  private async attempt(server: ServerConfig, query: Buffer, budgetMs: number, parent: AbortSignal | undefined): Promise<Buffer> {
    const linked = linkedSignal(parent, budgetMs, () => new Error('UPSTREAM_TIMEOUT'));
    let conn: PooledConnection | null = null;
    try {
      conn = await this.deps.pool.acquire(server.name, Math.min(this.opts.acquireTimeoutMs, budgetMs), linked.signal);
      const started = performance.now();
      const response = await conn.transport.query(query, linked.signal);
      validateResponse(query, response);

      const elapsed = performance.now() - started;
      this.deps.pool.release(conn, false, elapsed);
      conn = null;
      this.deps.stats.record({ type: 'latency', stage: 'upstream', micros: elapsed * 1000 });
      return response;
    } finally {
      // Still held here means the attempt failed or was cancelled; the pool
      // discards the connection and counts the failure.
      if (conn) this.deps.pool.release(conn, true);
      linked.dispose();
    }
  }
}
