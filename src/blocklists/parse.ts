import ipaddr from 'ipaddr.js';
import { normalizeDomain, normalizeName } from './domain.js';
import type { EntryAction, MatchType, SourceFormat } from './types.js';

export type ParsedRule = {
  domain: string;
  matchType: MatchType;
  action: EntryAction;
};

export type ParsedLine = {
  rules: ParsedRule[];
  // Candidates that looked like rules but failed domain validation.
  invalid: number;
};

const EMPTY: ParsedLine = Object.freeze({ rules: [], invalid: 0 });

// Modifiers that narrow a rule to some clients/types; applying them globally would over-block.
const UNSUPPORTED_MODIFIERS = ['badfilter', 'client', 'ctag', 'denyallow', 'dnstype', 'dnsrewrite'];

type HostCheck = { kind: 'ok'; domain: string } | { kind: 'skip' } | { kind: 'invalid' };

function checkHost(raw: string): HostCheck {
  const name = normalizeName(raw);
  if (!name) return { kind: 'invalid' };
  // hosts files carry IP literals and single-label names (localhost, broadcasthost).
  if (ipaddr.isValid(name)) return { kind: 'skip' };
  const domain = normalizeDomain(name);
  return domain ? { kind: 'ok', domain } : { kind: 'skip' };
}

function single(raw: string, matchType: MatchType, action: EntryAction = 'block'): ParsedLine {
  const host = checkHost(raw);
  if (host.kind === 'ok') return { rules: [{ domain: host.domain, matchType, action }], invalid: 0 };
  return host.kind === 'invalid' ? { rules: [], invalid: 1 } : EMPTY;
}

function stripInlineComment(line: string): string {
  const hash = line.indexOf('#');
  return hash >= 0 ? line.slice(0, hash).trim() : line;
}

function parseHostsLine(line: string): ParsedLine {
  const cleaned = stripInlineComment(line);
  if (!cleaned) return EMPTY;
  const parts = cleaned.split(/\s+/).filter(Boolean);
  if (parts.length === 1) return single(parts[0], 'exact');

  // "0.0.0.0 a.example b.example": the first column is the address.
  if (!ipaddr.isValid(parts[0])) return { rules: [], invalid: 1 };
  const rules: ParsedRule[] = [];
  let invalid = 0;
  for (const raw of parts.slice(1)) {
    const host = checkHost(raw);
    if (host.kind === 'ok') rules.push({ domain: host.domain, matchType: 'exact', action: 'block' });
    else if (host.kind === 'invalid') invalid++;
  }
  return { rules, invalid };
}

function parsePlainLine(line: string): ParsedLine {
  const cleaned = stripInlineComment(line);
  if (!cleaned) return EMPTY;
  if (cleaned.startsWith('*.')) return single(cleaned.slice(2), 'suffix');
  return single(cleaned, 'exact');
}

function parseFilterLine(line: string): ParsedLine {
  if (line.startsWith('!') || line.startsWith('[')) return EMPTY;
  if (line.startsWith('#') && !line.startsWith('##')) return EMPTY;

  // Cosmetic filters are not network rules.
  if (line.includes('##') || line.includes('#@#') || line.includes('#?#') || line.includes('#$#') || line.includes('#%#')) {
    return EMPTY;
  }

  // Regex rules are out of reach for exact/suffix structures.
  if (line.startsWith('/') && line.endsWith('/')) return EMPTY;

  const action: EntryAction = line.startsWith('@@') ? 'allow' : 'block';
  const body = action === 'allow' ? line.slice(2) : line;

  const dollar = body.indexOf('$');
  const pattern = (dollar >= 0 ? body.slice(0, dollar) : body).trim();
  if (dollar >= 0) {
    const modifiers = body
      .slice(dollar + 1)
      .split(',')
      .map((m) => m.trim().split('=')[0].replace(/^~/, ''));
    if (modifiers.some((m) => UNSUPPORTED_MODIFIERS.includes(m))) return EMPTY;
  }
  if (!pattern) return EMPTY;

  if (pattern.startsWith('||')) {
    let rest = pattern.slice(2).replace(/^\*\./, '');
    if (rest.endsWith('|')) rest = rest.slice(0, -1);
    if (rest.endsWith('^')) rest = rest.slice(0, -1);
    // Path, port or wildcard rules target URLs, not whole names.
    if (!rest || /[/:*^|]/.test(rest)) return EMPTY;
    return single(rest, 'suffix', action);
  }

  if (pattern.startsWith('|http://') || pattern.startsWith('|https://') || pattern.startsWith('http://') || pattern.startsWith('https://')) {
    try {
      const u = new URL(pattern.startsWith('|') ? pattern.slice(1) : pattern);
      return single(u.hostname, 'exact', action);
    } catch {
      return { rules: [], invalid: 1 };
    }
  }

  // Filter lists also accept hosts syntax and bare names (which cover subdomains).
  const parts = pattern.split(/\s+/).filter(Boolean);
  if (parts.length >= 2) return action === 'allow' ? EMPTY : parseHostsLine(pattern);
  if (/[*^|/]/.test(pattern)) return EMPTY;
  return single(pattern, 'suffix', action);
}

export function parseLine(format: SourceFormat, raw: string): ParsedLine {
  const line = raw.trim();
  if (!line) return EMPTY;
  if (line.startsWith('//')) return EMPTY;

  switch (format) {
    case 'hosts':
      return line.startsWith('#') ? EMPTY : parseHostsLine(line);
    case 'plain-domains':
      return line.startsWith('#') ? EMPTY : parsePlainLine(line);
    case 'filter-list':
      return parseFilterLine(line);
  }
}

export function parseText(format: SourceFormat, text: string): ParsedLine {
  const rules: ParsedRule[] = [];
  let invalid = 0;
  for (const line of text.split(/\r?\n/)) {
    const parsed = parseLine(format, line);
    for (const r of parsed.rules) rules.push(r);
    invalid += parsed.invalid;
  }
  return { rules, invalid };
}
