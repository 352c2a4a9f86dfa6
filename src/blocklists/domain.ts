const LABEL_RE = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;

/**
 * Lowercases, trims and strips the trailing dot. Returns null for anything that
 * is not a syntactically valid DNS name (empty labels, >253 chars, >63 char
 * labels, characters outside LDH plus underscore).
 */
export function normalizeName(input: string): string | null {
  const d = input.trim().toLowerCase();
  if (!d) return null;
  const noDot = d.endsWith('.') ? d.slice(0, -1) : d;
  if (noDot.length < 1 || noDot.length > 253) return null;
  for (const label of noDot.split('.')) {
    if (!LABEL_RE.test(label)) return null;
  }
  return noDot;
}

/** Blocklist entries additionally need at least two labels and must not be localhost. */
export function normalizeDomain(input: string): string | null {
  const d = normalizeName(input);
  if (!d) return null;
  if (!d.includes('.')) return null;
  if (isLocalhostDomain(d)) return null;
  return d;
}

export function isLocalhostDomain(domain: string): boolean {
  return domain === 'localhost' || domain.endsWith('.localhost');
}

/** "a.b.c" -> ["a.b.c", "b.c", "c"] */
export function suffixCandidates(domain: string): string[] {
  const out: string[] = [domain];
  let idx = domain.indexOf('.');
  while (idx >= 0) {
    out.push(domain.slice(idx + 1));
    idx = domain.indexOf('.', idx + 1);
  }
  return out;
}
