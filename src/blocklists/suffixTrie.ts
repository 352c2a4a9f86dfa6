import type { ExactRule } from './exactMatchTable.js';

export type TrieRule = ExactRule;

type TrieNode = {
  children: Map<string, TrieNode>;
  rule: TrieRule | null;
};

function createNode(): TrieNode {
  return { children: new Map(), rule: null };
}

/**
 * Label trie keyed from the top-level label inward: "ads.example.com" is
 * stored as com -> example -> ads. A terminal node matches itself and every
 * name below it; lookups report the deepest terminal on the path.
 */
export class SuffixTrie {
  private readonly root: TrieNode = createNode();
  private terminals = 0;

  get size(): number {
    return this.terminals;
  }

  insert(domain: string, rule: TrieRule): void {
    const labels = domain.split('.');
    let node = this.root;
    for (let i = labels.length - 1; i >= 0; i--) {
      const label = labels[i];
      let next = node.children.get(label);
      if (!next) {
        next = createNode();
        node.children.set(label, next);
      }
      node = next;
    }
    if (!node.rule) this.terminals++;
    node.rule = rule;
  }

  lookup(domain: string): { rule: TrieRule; depth: number } | null {
    const labels = domain.split('.');
    let node = this.root;
    let found: { rule: TrieRule; depth: number } | null = null;
    for (let i = labels.length - 1; i >= 0; i--) {
      const next = node.children.get(labels[i]);
      if (!next) break;
      node = next;
      if (node.rule) found = { rule: node.rule, depth: labels.length - i };
    }
    return found;
  }
}
