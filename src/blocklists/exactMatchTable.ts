import type { Category, EntryAction } from './types.js';

export type ExactRule = {
  action: EntryAction;
  category: Category;
  priority: number;
  source: string;
};

export class ExactMatchTable {
  private readonly byDomain = new Map<string, ExactRule>();

  get size(): number {
    return this.byDomain.size;
  }

  set(domain: string, rule: ExactRule): void {
    this.byDomain.set(domain, rule);
  }

  get(domain: string): ExactRule | undefined {
    return this.byDomain.get(domain);
  }

  has(domain: string): boolean {
    return this.byDomain.has(domain);
  }
}
