import type { AppConfig } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { normalizeName } from '../blocklists/domain.js';
import { BlocklistLoader, type FetchRules, type ReloadSummary } from '../blocklists/loader.js';
import { MatchingEngine } from '../blocklists/matchingEngine.js';
import type { Category, CheckResult, SourceConfig, SourceState } from '../blocklists/types.js';
import { AnonymousCache, type CacheStats } from '../cache/anonymousCache.js';
import { isQueryType } from '../resolver/dnsMessage.js';
import { Resolver, type ResolveResult, type ServerTestResult } from '../resolver/resolver.js';
import { StatsAggregator, type StatsSnapshot } from '../stats/statsAggregator.js';
import { ConnectionPool, type ServerHealth } from '../upstream/connectionPool.js';
import { createConnectionFactory } from '../upstream/transports.js';
import type { ConnectionFactory } from '../upstream/types.js';
import type { CoreConfig } from './coreConfig.js';
import { ValidationError } from './errors.js';

export type CoreDeps = {
  logger?: Logger;
  connectionFactory?: ConnectionFactory;
  fetchRules?: FetchRules;
  cacheKeySecret?: Buffer;
};

export type BlocklistInfo = {
  ready: boolean;
  builtAt: string | null;
  totalEntries: number;
  blockEntries: number;
  categoryCounts: Record<Category, number> | null;
};

export type CoreStats = StatsSnapshot & {
  serverHealth: ServerHealth[];
  cache: CacheStats;
  blocklist: BlocklistInfo;
};

export type Core = {
  readonly ready: boolean;
  readonly logger: Logger;
  check(domain: string, qtype?: string): CheckResult;
  // null marks an input that is not a valid domain name.
  checkBatch(domains: ReadonlyArray<string>): Array<CheckResult | null>;
  resolve(domain: string, qtype: string, deadlineMs?: number): Promise<ResolveResult>;
  reload(sources?: ReadonlyArray<SourceConfig>): Promise<ReloadSummary>;
  // One named server, or every configured server in priority order.
  testServers(serverName?: string, domain?: string): Promise<ServerTestResult[]>;
  stats(): CoreStats;
  sources(): SourceState[];
  clearCache(): number;
  start(): Promise<ReloadSummary>;
  close(): Promise<void>;
};

/**
 * Builds one self-contained context: matching engine, loader, cache, pool and
 * stats. Nothing here is process-global, so several cores can coexist.
 */
export function createCore(config: AppConfig, coreConfig: CoreConfig, deps: CoreDeps = {}): Core {
  const logger = deps.logger ?? createLogger(config);
  const stats = new StatsAggregator();
  const engine = new MatchingEngine();

  const loader = new BlocklistLoader({
    engine,
    stats,
    logger,
    falsePositiveRate: config.BLOOM_FALSE_POSITIVE_RATE,
    maxEntries: config.BLOCKLIST_MAX_ENTRIES,
    fetch: {
      timeoutMs: config.BLOCKLIST_FETCH_TIMEOUT_MS,
      maxBytes: config.BLOCKLIST_MAX_BYTES,
      retries: config.BLOCKLIST_FETCH_RETRIES,
      retryBaseMs: config.BLOCKLIST_RETRY_BASE_MS
    },
    fetchRules: deps.fetchRules
  });

  const cache = new AnonymousCache({
    maxEntries: config.CACHE_MAX_ENTRIES,
    minTtlSeconds: config.CACHE_MIN_TTL_SECONDS,
    maxTtlSeconds: config.CACHE_MAX_TTL_SECONDS,
    sweepIntervalMs: config.CACHE_SWEEP_INTERVAL_MS,
    keySecret: deps.cacheKeySecret
  });

  const pool = new ConnectionPool(coreConfig.servers, {
    maxPerServer: config.POOL_MAX_PER_SERVER,
    idleTimeoutMs: config.POOL_IDLE_TIMEOUT_MS,
    breaker: {
      failureThreshold: config.BREAKER_FAILURE_THRESHOLD,
      cooldownMs: config.BREAKER_COOLDOWN_MS,
      maxCooldownMs: Math.max(config.BREAKER_COOLDOWN_MS, config.BREAKER_MAX_COOLDOWN_MS)
    },
    factory: deps.connectionFactory ?? createConnectionFactory(),
    logger,
    stats
  });

  const resolver = new Resolver(
    { engine, cache, pool, stats, logger },
    {
      defaultDeadlineMs: config.RESOLVE_DEADLINE_MS,
      acquireTimeoutMs: config.POOL_ACQUIRE_TIMEOUT_MS,
      negativeTtlSeconds: config.CACHE_NEGATIVE_TTL_SECONDS
    }
  );

  let refresh: { close: () => void } | null = null;

  const blocklistInfo = (): BlocklistInfo => {
    const snap = engine.snapshot;
    return {
      ready: snap !== null,
      builtAt: snap ? new Date(snap.builtAt).toISOString() : null,
      totalEntries: snap?.totalEntries ?? 0,
      blockEntries: snap?.blockEntries ?? 0,
      categoryCounts: snap ? { ...snap.categoryCounts } : null
    };
  };

  return {
    get ready() {
      return engine.ready;
    },
    logger,

    check(domain, qtype = 'A') {
      const name = normalizeName(domain);
      if (!name) throw new ValidationError();
      if (!isQueryType(qtype.trim().toUpperCase())) throw new ValidationError('unsupported query type');
      return resolver.check(name);
    },

    checkBatch(domains) {
      return domains.map((d) => {
        const name = normalizeName(d);
        return name ? resolver.check(name) : null;
      });
    },

    resolve: (domain, qtype, deadlineMs) => resolver.resolve(domain, qtype, deadlineMs),

    reload: (sources) => loader.reload(sources),

    async testServers(serverName, domain = config.SERVER_TEST_DOMAIN) {
      const names = serverName === undefined ? pool.servers.map((s) => s.name) : [serverName];
      return await Promise.all(names.map((n) => resolver.testServer(n, domain, config.SERVER_TEST_TIMEOUT_MS)));
    },

    stats() {
      return { ...stats.snapshot(), serverHealth: pool.health(), cache: cache.stats(), blocklist: blocklistInfo() };
    },

    sources: () => loader.sources(),

    clearCache() {
      const n = cache.clear();
      logger.info({ removed: n }, 'response cache cleared');
      return n;
    },

    async start() {
      const summary = await loader.reload(coreConfig.sources);
      if (config.ENABLE_BLOCKLIST_REFRESH && !refresh) {
        refresh = loader.startPeriodicRefresh(config.BLOCKLIST_REFRESH_HOURS * 60 * 60 * 1000);
      }
      return summary;
    },

    async close() {
      refresh?.close();
      refresh = null;
      cache.close();
      await pool.close();
    }
  };
}
