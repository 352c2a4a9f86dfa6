import { BloomFilter } from './bloomFilter.js';
import { ExactMatchTable } from './exactMatchTable.js';
import { SuffixTrie } from './suffixTrie.js';
import type { BlocklistEntry, Category } from './types.js';

export type Snapshot = Readonly<{
  bloom: BloomFilter;
  exact: ExactMatchTable;
  trie: SuffixTrie;
  builtAt: number;
  totalEntries: number;
  blockEntries: number;
  categoryCounts: Readonly<Record<Category, number>>;
}>;

export function emptyCategoryCounts(): Record<Category, number> {
  return { ads: 0, tracking: 0, malware: 0, custom: 0 };
}

/**
 * Builds all three structures from an already merged entry list (at most one
 * exact and one suffix entry per domain). The result is never mutated after it
 * is returned.
 */
export function buildSnapshot(entries: ReadonlyArray<BlocklistEntry>, falsePositiveRate: number, now = Date.now()): Snapshot {
  let blockEntries = 0;
  for (const e of entries) if (e.action === 'block') blockEntries++;

  const bloom = new BloomFilter(blockEntries, falsePositiveRate);
  const exact = new ExactMatchTable();
  const trie = new SuffixTrie();
  const categoryCounts = emptyCategoryCounts();

  for (const e of entries) {
    const rule = { action: e.action, category: e.category, priority: e.priority, source: e.source };
    if (e.matchType === 'exact') exact.set(e.domain, rule);
    else trie.insert(e.domain, rule);

    if (e.action === 'block') {
      bloom.add(e.domain);
      categoryCounts[e.category]++;
    }
  }

  return Object.freeze({
    bloom,
    exact,
    trie,
    builtAt: now,
    totalEntries: entries.length,
    blockEntries,
    categoryCounts: Object.freeze(categoryCounts)
  });
}
