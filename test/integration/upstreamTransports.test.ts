import dnsPacket from 'dns-packet';
import { MockAgent } from 'undici';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { buildQuery } from '../../src/resolver/dnsMessage.js';
import type { ServerConfig } from '../../src/upstream/types.js';
import { answerFor, server } from '../unit/_fixtures.js';

type SocketMode = 'answer' | 'split' | 'silent' | 'refuse';

const tlsState = vi.hoisted(() => {
  const state: { mode: SocketMode; connects: Array<Record<string, unknown>> } = {
    mode: 'answer',
    connects: []
  };
  return state;
});

// tls.connect is replaced by an in-memory socket that speaks length-prefixed
// DNS, so DoT framing can be tested without a TLS endpoint.
vi.mock('node:tls', async () => {
  const actual = await vi.importActual<typeof import('node:tls')>('node:tls');
  const { EventEmitter } = await vi.importActual<typeof import('node:events')>('node:events');

  class FakeTlsSocket extends EventEmitter {
    ended = false;
    destroyed = false;
    private buf = Buffer.alloc(0);

    write(data: Buffer): boolean {
      this.buf = Buffer.concat([this.buf, data]);
      if (this.buf.length < 2) return true;
      const len = this.buf.readUInt16BE(0);
      if (this.buf.length < 2 + len) return true;
      const msg = this.buf.subarray(2, 2 + len);
      this.buf = this.buf.subarray(2 + len);
      if (tlsState.mode === 'silent') return true;

      const resp = answerFor(Buffer.from(msg), { address: '198.51.100.7', ttl: 60 });
      const framed = Buffer.concat([Buffer.from([resp.length >> 8, resp.length & 0xff]), resp]);
      if (tlsState.mode === 'split') {
        process.nextTick(() => this.emit('data', framed.subarray(0, 1)));
        process.nextTick(() => this.emit('data', framed.subarray(1, 9)));
        process.nextTick(() => this.emit('data', framed.subarray(9)));
      } else {
        process.nextTick(() => this.emit('data', framed));
      }
      return true;
    }

    end(): void {
      this.ended = true;
      process.nextTick(() => this.emit('close'));
    }

    destroy(): void {
      this.destroyed = true;
      process.nextTick(() => this.emit('close'));
    }
  }

  const connect = (options: Record<string, unknown>) => {
    const sock = new FakeTlsSocket();
    tlsState.connects.push(options);
    if (tlsState.mode === 'refuse') {
      process.nextTick(() => sock.emit('error', Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' })));
    } else {
      process.nextTick(() => sock.emit('secureConnect'));
    }
    return sock;
  };

  return { ...actual, connect, default: { ...actual, connect } };
});

// Import after the tls mock.
const { createConnectionFactory } = await import('../../src/upstream/transports.js');

function signal(ms = 2_000): AbortSignal {
  return AbortSignal.timeout(ms);
}

function address(msg: Buffer): unknown {
  return dnsPacket.decode(msg).answers?.[0]?.data;
}

describe('DNS-over-TLS transport', () => {
  afterEach(() => {
    tlsState.mode = 'answer';
    tlsState.connects.length = 0;
  });

  it('connects with SNI for host names only', async () => {
    const factory = createConnectionFactory();
    const byName = await factory(server('named', 10), signal());
    const byIp = await factory({ ...server('literal', 10), address: '192.0.2.53' }, signal());

    expect(tlsState.connects).toEqual([
      { host: 'named.resolver.invalid', port: 853, servername: 'named.resolver.invalid', ALPNProtocols: ['dot'], minVersion: 'TLSv1.2' },
      { host: '192.0.2.53', port: 853, servername: undefined, ALPNProtocols: ['dot'], minVersion: 'TLSv1.2' }
    ]);
    await byName.close();
    await byIp.close();
  });

  it('round-trips length-prefixed messages, including frames split across reads', async () => {
    const conn = await createConnectionFactory()(server('dot', 10), signal());

    const first = await conn.query(buildQuery('www.example.com', 'A', 11), signal());
    expect(dnsPacket.decode(first).id).toBe(11);
    expect(address(first)).toBe('198.51.100.7');

    tlsState.mode = 'split';
    const second = await conn.query(buildQuery('www.example.com', 'A', 12), signal());
    expect(dnsPacket.decode(second).id).toBe(12);
    expect(conn.closed).toBe(false);
    await conn.close();
  });

  it('tears the session down when a query is cancelled', async () => {
    tlsState.mode = 'silent';
    const conn = await createConnectionFactory()(server('dot', 10), signal());
    const ac = new AbortController();
    const pending = conn.query(buildQuery('www.example.com', 'A', 13), ac.signal);

    ac.abort(new Error('UPSTREAM_TIMEOUT'));
    await expect(pending).rejects.toThrow('UPSTREAM_TIMEOUT');
    expect(conn.closed).toBe(true);
    await expect(conn.query(buildQuery('www.example.com', 'A', 14), signal())).rejects.toThrow('UPSTREAM_CLOSED');
  });

  it('rejects when the connection is refused', async () => {
    tlsState.mode = 'refuse';
    await expect(createConnectionFactory()(server('dot', 10), signal())).rejects.toThrow('ECONNREFUSED');
  });

  it('does not connect once the signal has aborted', async () => {
    const ac = new AbortController();
    ac.abort(new Error('CANCELLED'));
    await expect(createConnectionFactory()(server('dot', 10), ac.signal)).rejects.toThrow('CANCELLED');
    expect(tlsState.connects).toEqual([]);
  });
});

describe('DNS-over-HTTPS transport', () => {
  const doh: ServerConfig = { ...server('doh', 10, 'doh'), address: 'doh.resolver.invalid', port: 8443 };
  let agent: MockAgent | null = null;

  afterEach(async () => {
    await agent?.close();
    agent = null;
  });

  function mockAgent(): MockAgent {
    const a = new MockAgent();
    a.disableNetConnect();
    agent = a;
    return a;
  }

  it('POSTs the wire message and returns the body', async () => {
    const a = mockAgent();
    const query = buildQuery('www.example.com', 'A', 21);
    a.get('https://doh.resolver.invalid:8443')
      .intercept({ path: '/dns-query', method: 'POST', headers: { 'content-type': 'application/dns-message' } })
      .reply(200, answerFor(query, { address: '203.0.113.5' }), { headers: { 'content-type': 'application/dns-message' } });

    const conn = await createConnectionFactory({ dohDispatcher: () => a })(doh, signal());
    const res = await conn.query(query, signal());

    expect(dnsPacket.decode(res).id).toBe(21);
    expect(address(res)).toBe('203.0.113.5');
    a.assertNoPendingInterceptors();
  });

  it('turns non-200 replies into errors', async () => {
    const a = mockAgent();
    a.get('https://doh.resolver.invalid:8443').intercept({ path: '/dns-query', method: 'POST' }).reply(503, 'busy');

    const conn = await createConnectionFactory({ dohDispatcher: () => a })(doh, signal());
    await expect(conn.query(buildQuery('www.example.com', 'A', 22), signal())).rejects.toThrow('HTTP_503');
  });

  it('stops answering once closed', async () => {
    const a = mockAgent();
    const conn = await createConnectionFactory({ dohDispatcher: () => a })(doh, signal());
    await conn.close();

    expect(conn.closed).toBe(true);
    await expect(conn.query(buildQuery('www.example.com', 'A', 23), signal())).rejects.toThrow('UPSTREAM_CLOSED');
  });
});
