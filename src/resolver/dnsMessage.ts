import crypto from 'node:crypto';
import dnsPacket, { type RecordType } from 'dns-packet';

export const QUERY_TYPES = ['A', 'AAAA', 'CNAME', 'MX', 'NS', 'PTR', 'SOA', 'SRV', 'TXT', 'CAA'] as const satisfies readonly RecordType[];
export type QueryType = (typeof QUERY_TYPES)[number];

export function isQueryType(v: string): v is QueryType {
  return (QUERY_TYPES as readonly string[]).includes(v);
}

const RCODES: Record<number, string> = {
  0: 'NOERROR',
  1: 'FORMERR',
  2: 'SERVFAIL',
  3: 'NXDOMAIN',
  4: 'NOTIMP',
  5: 'REFUSED'
};

export function buildQuery(name: string, qtype: QueryType, id = crypto.randomInt(0, 0x10000)): Buffer {
  return dnsPacket.encode({
    type: 'query',
    id,
    flags: dnsPacket.RECURSION_DESIRED,
    questions: [{ type: qtype, name, class: 'IN' }]
  });
}

export function messageId(msg: Buffer): number {
  return msg.length >= 2 ? msg.readUInt16BE(0) : -1;
}

export function rcodeOf(msg: Buffer): string {
  if (msg.length < 4) return 'FORMERR';
  const code = msg.readUInt8(3) & 0x0f;
  return RCODES[code] ?? `RCODE_${code}`;
}

/** Copy of `msg` carrying `id`, for answering a client whose query id differs from ours. */
export function withMessageId(msg: Buffer, id: number): Buffer {
  const out = Buffer.from(msg);
  if (out.length >= 2) out.writeUInt16BE(id & 0xffff, 0);
  return out;
}

/**
 * Checks an upstream reply against the query that produced it. Servers that
 * answer SERVFAIL/REFUSED are treated like failed servers so the resolver
 * moves on to the next one.
 */
export function validateResponse(query: Buffer, response: Buffer): void {
  if (response.length < 12) throw new Error('MALFORMED_RESPONSE');
  if (messageId(response) !== messageId(query)) throw new Error('ID_MISMATCH');
  const rcode = rcodeOf(response);
  if (rcode === 'SERVFAIL' || rcode === 'REFUSED') throw new Error(`UPSTREAM_${rcode}`);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function recordsOf(decoded: unknown, section: 'answers' | 'authorities'): Record<string, unknown>[] {
  if (!isRecord(decoded)) return [];
  const list = decoded[section];
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

/**
 * Cache lifetime of a response: the smallest answer TTL; for answers without
 * records, the SOA negative-caching TTL (min of SOA TTL and MINIMUM); otherwise
 * `negativeTtl`. Undecodable messages get 0 and are not cached.
 */
export function responseTtl(msg: Buffer, negativeTtl: number): number {
  let decoded: unknown;
  try {
    decoded = dnsPacket.decode(msg);
  } catch {
    return 0;
  }

  const ttls = recordsOf(decoded, 'answers')
    .map((a) => a.ttl)
    .filter((t): t is number => typeof t === 'number' && Number.isFinite(t));
  if (ttls.length) return Math.max(0, Math.min(...ttls));

  for (const auth of recordsOf(decoded, 'authorities')) {
    if (auth.type !== 'SOA' || !isRecord(auth.data)) continue;
    const minimum = auth.data.minimum;
    if (typeof minimum !== 'number') continue;
    const ttl = typeof auth.ttl === 'number' ? Math.min(auth.ttl, minimum) : minimum;
    return Math.max(0, ttl);
  }
  return negativeTtl;
}
