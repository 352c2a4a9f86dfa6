import type { Logger } from '../logger.js';
import { errorCode } from '../core/errors.js';
import type { StatsAggregator } from '../stats/statsAggregator.js';
import { fetchSourceRules, type FetchOptions } from './fetchSource.js';
import type { MatchingEngine } from './matchingEngine.js';
import { dedupeRules, mergeEntries, type SourceEntries } from './merge.js';
import type { ParsedLine } from './parse.js';
import { buildSnapshot } from './snapshot.js';
import type { BlocklistEntry, SourceConfig, SourceReloadResult, SourceState } from './types.js';

export type FetchRules = (source: SourceConfig) => Promise<ParsedLine>;

export type BlocklistLoaderOptions = {
  engine: MatchingEngine;
  stats: StatsAggregator;
  logger: Logger;
  falsePositiveRate: number;
  maxEntries: number;
  fetch: FetchOptions;
  // Replaces the HTTP download (tests, inline lists).
  fetchRules?: FetchRules;
  now?: () => number;
};

export type ReloadSummary = {
  results: SourceReloadResult[];
  totalEntries: number;
  dropped: number;
  durationMs: number;
};

type SourceRecord = {
  config: SourceConfig;
  entries: Map<string, BlocklistEntry>;
  lastUpdate: number | null;
  changedAt: number;
  lastError: string | null;
  order: number;
};

type Churn = { added: number; removed: number; updated: number };

function sameEntry(a: BlocklistEntry, b: BlocklistEntry): boolean {
  return a.matchType === b.matchType && a.action === b.action && a.category === b.category && a.priority === b.priority;
}

/**
 * Fetches, parses and merges sources into a fresh snapshot, then publishes it.
 * Reloads run one at a time; readers keep using the previous snapshot until
 * the swap.
 */
export class BlocklistLoader {
  private readonly records = new Map<string, SourceRecord>();
  private configured: SourceConfig[] = [];
  private chain: Promise<unknown> = Promise.resolve();
  private readonly fetchRules: FetchRules;
  private readonly now: () => number;

  constructor(private readonly opts: BlocklistLoaderOptions) {
    this.fetchRules = opts.fetchRules ?? ((source) => fetchSourceRules(source, opts.fetch));
    this.now = opts.now ?? Date.now;
  }

  /**
   * Reloads `sources` (the last configured list when omitted). Sources missing
   * from the list, or disabled, lose their entries.
   */
  reload(sources?: ReadonlyArray<SourceConfig>): Promise<ReloadSummary> {
    const list = sources ? [...sources] : this.configured;
    const run = this.chain.then(() => this.runReload(list));
    this.chain = run.catch(() => undefined);
    return run;
  }

  sources(): SourceState[] {
    return this.configured.map((config) => {
      const rec = this.records.get(config.name);
      return {
        ...config,
        lastUpdate: rec?.lastUpdate ?? null,
        entryCount: rec?.entries.size ?? 0,
        lastError: rec?.lastError ?? null
      };
    });
  }

  startPeriodicRefresh(intervalMs: number): { close: () => void } {
    const timer = setInterval(() => {
      this.reload().catch((err: unknown) => this.opts.logger.error({ err: errorCode(err) }, 'periodic blocklist refresh failed'));
    }, intervalMs);
    // Don't keep the process alive solely for refreshes.
    timer.unref?.();
    return { close: () => clearInterval(timer) };
  }

  private async runReload(list: SourceConfig[]): Promise<ReloadSummary> {
    const started = this.now();
    const { logger, stats } = this.opts;
    this.configured = list;

    const results: SourceReloadResult[] = [];
    const wanted = new Set(list.filter((s) => s.enabled).map((s) => s.name));

    // Removed or disabled sources.
    for (const [name, rec] of this.records) {
      if (wanted.has(name)) continue;
      this.records.delete(name);
      stats.record({ type: 'sourceRemoved', source: name });
      results.push({ sourceName: name, added: 0, removed: rec.entries.size, updated: 0, total: 0, invalid: 0, error: null });
    }

    const enabled = list.filter((s) => s.enabled);
    const fetched = await Promise.allSettled(enabled.map((s) => this.fetchRules(s)));

    for (const [order, source] of enabled.entries()) {
      const outcome = fetched[order];
      const prev = this.records.get(source.name);

      if (!outcome || outcome.status === 'rejected') {
        const error = outcome ? errorCode(outcome.reason) : 'UNKNOWN';
        logger.warn({ source: source.name, err: error }, 'blocklist source failed; keeping previous entries');
        // Previous entries (if any) stay in the merge; config changes still apply.
        const rec: SourceRecord = prev
          ? { ...prev, config: source, order, lastError: error, entries: this.restamp(prev.entries, source) }
          : { config: source, entries: new Map(), lastUpdate: null, changedAt: 0, lastError: error, order };
        this.records.set(source.name, rec);
        results.push({ sourceName: source.name, added: 0, removed: 0, updated: 0, total: rec.entries.size, invalid: 0, error });
        continue;
      }

      const now = this.now();
      const { entries, churn } = this.diff(source, prev?.entries, outcome.value, now);
      const changed = churn.added + churn.removed + churn.updated > 0;
      this.records.set(source.name, {
        config: source,
        entries,
        lastUpdate: now,
        changedAt: changed || !prev ? now : prev.changedAt,
        lastError: null,
        order
      });
      stats.record({ type: 'sourceCount', source: source.name, count: entries.size });
      results.push({ sourceName: source.name, ...churn, total: entries.size, invalid: outcome.value.invalid, error: null });
    }

    const perSource: SourceEntries[] = [];
    for (const rec of this.records.values()) {
      perSource.push({ entries: rec.entries, priority: rec.config.priority, changedAt: rec.changedAt, order: rec.order });
    }
    const merged = mergeEntries(perSource, this.opts.maxEntries);
    const snapshot = buildSnapshot(merged.entries, this.opts.falsePositiveRate, this.now());
    this.opts.engine.publish(snapshot);

    const durationMs = this.now() - started;
    stats.record({ type: 'reload', durationMs, entries: snapshot.totalEntries });
    logger.info(
      {
        sources: results.length,
        failed: results.filter((r) => r.error).length,
        entries: snapshot.totalEntries,
        dropped: merged.dropped,
        durationMs
      },
      'blocklist snapshot published'
    );
    if (merged.dropped) logger.warn({ dropped: merged.dropped, maxEntries: this.opts.maxEntries }, 'blocklist entry cap reached');

    return { results, totalEntries: snapshot.totalEntries, dropped: merged.dropped, durationMs };
  }

  private diff(
    source: SourceConfig,
    prev: ReadonlyMap<string, BlocklistEntry> | undefined,
    parsed: ParsedLine,
    now: number
  ): { entries: Map<string, BlocklistEntry>; churn: Churn } {
    const churn: Churn = { added: 0, removed: 0, updated: 0 };
    const entries = new Map<string, BlocklistEntry>();

    for (const [domain, rule] of dedupeRules(parsed.rules)) {
      const old = prev?.get(domain);
      const entry: BlocklistEntry = {
        domain,
        matchType: rule.matchType,
        action: rule.action,
        category: source.category,
        source: source.name,
        priority: source.priority,
        createdAt: old?.createdAt ?? now
      };
      if (!old) churn.added++;
      else if (!sameEntry(old, entry)) churn.updated++;
      entries.set(domain, old && sameEntry(old, entry) ? old : entry);
    }

    if (prev) {
      for (const domain of prev.keys()) if (!entries.has(domain)) churn.removed++;
    }
    return { entries, churn };
  }

  private restamp(entries: Map<string, BlocklistEntry>, source: SourceConfig): Map<string, BlocklistEntry> {
    const first = entries.values().next();
    if (first.done || (first.value.category === source.category && first.value.priority === source.priority)) return entries;
    const out = new Map<string, BlocklistEntry>();
    for (const [domain, e] of entries) out.set(domain, { ...e, category: source.category, priority: source.priority });
    return out;
  }
}
