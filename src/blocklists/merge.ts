import type { ParsedRule } from './parse.js';
import type { BlocklistEntry } from './types.js';

/** Entries of one source plus what the cross-source tie-break needs. */
export type SourceEntries = {
  entries: ReadonlyMap<string, BlocklistEntry>;
  priority: number;
  // Last time this source's content actually changed.
  changedAt: number;
  // Position in the configured source list.
  order: number;
};

function ruleRank(rule: ParsedRule): number {
  return (rule.action === 'allow' ? 2 : 0) + (rule.matchType === 'suffix' ? 1 : 0);
}

/**
 * Collapses a source's rules to one per domain. An explicit exemption beats a
 * block, and a suffix rule beats an exact one for the same action.
 */
export function dedupeRules(rules: Iterable<ParsedRule>): Map<string, ParsedRule> {
  const out = new Map<string, ParsedRule>();
  for (const rule of rules) {
    const prev = out.get(rule.domain);
    if (!prev || ruleRank(rule) > ruleRank(prev)) out.set(rule.domain, rule);
  }
  return out;
}

function wins(a: SourceEntries, b: SourceEntries): boolean {
  if (a.priority !== b.priority) return a.priority > b.priority;
  if (a.changedAt !== b.changedAt) return a.changedAt > b.changedAt;
  return a.order > b.order;
}

export type MergeResult = {
  entries: BlocklistEntry[];
  // Entries left out because of the maxEntries cap.
  dropped: number;
};

type Winner = { entry: BlocklistEntry; from: SourceEntries };

/**
 * Merges all sources. Exact and suffix rules for the same domain are ranked
 * separately: highest source priority, then the most recently changed
 * source, then the later source in the list. The two survivors coexist,
 * unless they disagree and the suffix rule comes from the winning source,
 * in which case it also decides the domain itself.
 */
export function mergeEntries(sources: ReadonlyArray<SourceEntries>, maxEntries = Infinity): MergeResult {
  const exact = new Map<string, Winner>();
  const suffix = new Map<string, Winner>();
  for (const src of sources) {
    for (const [domain, entry] of src.entries) {
      const winners = entry.matchType === 'exact' ? exact : suffix;
      const cur = winners.get(domain);
      if (!cur || wins(src, cur.from)) winners.set(domain, { entry, from: src });
    }
  }

  for (const [domain, broad] of suffix) {
    const narrow = exact.get(domain);
    if (narrow && narrow.entry.action !== broad.entry.action && wins(broad.from, narrow.from)) exact.delete(domain);
  }

  const entries = [...exact.values(), ...suffix.values()].map((w) => w.entry);
  if (entries.length <= maxEntries) return { entries, dropped: 0 };

  // Over the cap: keep the highest-priority entries, exemptions first among equals.
  entries.sort((a, b) => b.priority - a.priority || (a.action === b.action ? 0 : a.action === 'allow' ? -1 : 1));
  const kept = entries.slice(0, maxEntries);
  return { entries: kept, dropped: entries.length - kept.length };
}
