import dnsPacket from 'dns-packet';
import { pino } from 'pino';
import { loadConfig, type AppConfig } from '../../src/config.js';
import type { BlocklistEntry, SourceConfig } from '../../src/blocklists/types.js';
import type { Protocol, ServerConfig, UpstreamConnection } from '../../src/upstream/types.js';

export const silentLogger = pino({ level: 'silent' });

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    ENABLE_BLOCKLIST_REFRESH: 'false',
    CACHE_SWEEP_INTERVAL_MS: '0',
    BLOCKLIST_FETCH_RETRIES: '0',
    ...overrides
  });
}

export function entry(domain: string, partial: Partial<BlocklistEntry> = {}): BlocklistEntry {
  return {
    domain,
    matchType: 'exact',
    action: 'block',
    category: 'ads',
    source: 'test',
    priority: 0,
    createdAt: 0,
    ...partial
  };
}

export function source(name: string, partial: Partial<SourceConfig> = {}): SourceConfig {
  return {
    name,
    url: `https://lists.example.invalid/${name}.txt`,
    format: 'hosts',
    category: 'ads',
    priority: 0,
    enabled: true,
    ...partial
  };
}

export function server(name: string, priority: number, protocol: Protocol = 'dot'): ServerConfig {
  return {
    name,
    address: `${name}.resolver.invalid`,
    port: protocol === 'dot' ? 853 : 443,
    protocol,
    priority,
    dohPath: '/dns-query'
  };
}

/** Answers a query the way a recursive resolver would, with one A record. */
export function answerFor(query: Buffer, opts: { ttl?: number; address?: string; rcode?: 'NOERROR' | 'SERVFAIL' } = {}): Buffer {
  const q = dnsPacket.decode(query);
  const name = q.questions?.[0]?.name ?? 'unknown.invalid';
  return dnsPacket.encode({
    type: 'response',
    id: q.id,
    flags: dnsPacket.RECURSION_DESIRED | dnsPacket.RECURSION_AVAILABLE | (opts.rcode === 'SERVFAIL' ? 2 : 0),
    questions: q.questions,
    answers: opts.rcode === 'SERVFAIL' ? [] : [{ type: 'A', name, ttl: opts.ttl ?? 300, data: opts.address ?? '192.0.2.10' }]
  });
}

export type FakeBehaviour = (query: Buffer, signal: AbortSignal) => Promise<Buffer>;

/** In-memory upstream connection driven by a behaviour function. */
export class FakeConnection implements UpstreamConnection {
  closed = false;
  queries = 0;

  constructor(
    readonly protocol: Protocol,
    private readonly behaviour: FakeBehaviour
  ) {}

  async query(message: Buffer, signal: AbortSignal): Promise<Buffer> {
    this.queries++;
    return await this.behaviour(message, signal);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Never settles until the signal aborts. */
export function hang(signal: AbortSignal): Promise<Buffer> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason instanceof Error ? signal.reason : new Error('ABORTED')), { once: true });
  });
}
