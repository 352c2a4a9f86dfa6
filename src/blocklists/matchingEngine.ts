import { suffixCandidates } from './domain.js';
import type { Snapshot } from './snapshot.js';
import type { CheckResult } from './types.js';
import type { ExactRule } from './exactMatchTable.js';

const NOT_READY: CheckResult = Object.freeze({ blocked: false, category: null, matchedBy: 'none', ready: false });
const NO_MATCH: CheckResult = Object.freeze({ blocked: false, category: null, matchedBy: 'none', ready: true });

function decide(rule: ExactRule, matchedBy: 'exact' | 'trie'): CheckResult {
  const blocked = rule.action === 'block';
  return { blocked, category: blocked ? rule.category : null, matchedBy, ready: true };
}

/**
 * Owns the published snapshot. Readers grab the reference once per check, so a
 * concurrent publish never exposes a half-built structure: a check either runs
 * entirely against the old snapshot or entirely against the new one.
 */
export class MatchingEngine {
  private current: Snapshot | null = null;

  get snapshot(): Snapshot | null {
    return this.current;
  }

  get ready(): boolean {
    return this.current !== null;
  }

  publish(next: Snapshot): Snapshot | null {
    const prev = this.current;
    this.current = next;
    return prev;
  }

  /**
   * `name` must already be normalized (see normalizeName). Blocklist rules are
   * per name, so the query type does not take part in the decision.
   */
  check(name: string): CheckResult {
    const snap = this.current;
    if (!snap) return NOT_READY;

    // Bloom stage: suffix rules are stored under the ancestor name, so every
    // candidate suffix is probed. No hit on any candidate means no rule applies.
    const candidates = suffixCandidates(name);
    let maybe = false;
    for (const c of candidates) {
      if (snap.bloom.mightContain(c)) {
        maybe = true;
        break;
      }
    }
    if (!maybe) return NO_MATCH;

    const exact = snap.exact.get(name);
    if (exact) return decide(exact, 'exact');

    const hit = snap.trie.lookup(name);
    if (hit) return decide(hit.rule, 'trie');

    // Bloom false positive.
    return NO_MATCH;
  }

  checkBatch(names: ReadonlyArray<string>): CheckResult[] {
    return names.map((n) => this.check(n));
  }
}
