export const CATEGORIES = ['ads', 'tracking', 'malware', 'custom'] as const;
export type Category = (typeof CATEGORIES)[number];

export const SOURCE_FORMATS = ['hosts', 'filter-list', 'plain-domains'] as const;
export type SourceFormat = (typeof SOURCE_FORMATS)[number];

export type MatchType = 'exact' | 'suffix';

// 'allow' entries are explicit exemptions (filter-list `@@` rules).
export type EntryAction = 'block' | 'allow';

export type BlocklistEntry = {
  domain: string;
  matchType: MatchType;
  action: EntryAction;
  category: Category;
  source: string;
  priority: number;
  createdAt: number;
};

export type SourceConfig = {
  name: string;
  url: string;
  format: SourceFormat;
  category: Category;
  priority: number;
  enabled: boolean;
};

export type SourceState = SourceConfig & {
  lastUpdate: number | null;
  entryCount: number;
  lastError: string | null;
};

export type MatchedBy = 'exact' | 'trie' | 'none';

export type CheckResult = {
  blocked: boolean;
  category: Category | null;
  matchedBy: MatchedBy;
  // false while no snapshot has been published yet.
  ready: boolean;
};

export type SourceReloadResult = {
  sourceName: string;
  added: number;
  removed: number;
  updated: number;
  total: number;
  invalid: number;
  error: string | null;
};
