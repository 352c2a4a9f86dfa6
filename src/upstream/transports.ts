import tls, { type TLSSocket } from 'node:tls';
import ipaddr from 'ipaddr.js';
import { Client, type Dispatcher } from 'undici';
import type { ConnectionFactory, ServerConfig, UpstreamConnection } from './types.js';

const USER_AGENT = 'hushdns/0.1';

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('UPSTREAM_ABORTED');
}

function tlsServername(server: ServerConfig): string | undefined {
  if (server.tlsServername) return server.tlsServername;
  // SNI must not carry an IP literal.
  return ipaddr.isValid(server.address) ? undefined : server.address;
}

type PendingQuery = {
  resolve: (msg: Buffer) => void;
  reject: (err: Error) => void;
};

/**
 * DNS-over-TLS (RFC 7858): 2-byte length prefixed messages over a long-lived
 * TLS session. One query at a time; the pool guarantees exclusive use.
 */
class DotConnection implements UpstreamConnection {
  readonly protocol = 'dot' as const;
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingQuery | null = null;
  private isClosed = false;

  constructor(private readonly socket: TLSSocket) {
    socket.on('data', (data: Buffer) => this.onData(data));
    socket.on('error', (err: Error) => this.fail(err));
    socket.on('close', () => this.fail(new Error('UPSTREAM_CLOSED')));
  }

  get closed(): boolean {
    return this.isClosed;
  }

  query(message: Buffer, signal: AbortSignal): Promise<Buffer> {
    if (this.isClosed) return Promise.reject(new Error('UPSTREAM_CLOSED'));
    if (this.pending) return Promise.reject(new Error('CONNECTION_BUSY'));
    if (signal.aborted) return Promise.reject(abortReason(signal));

    return new Promise<Buffer>((resolve, reject) => {
      const onAbort = () => {
        this.pending = null;
        // Mid-flight frames would desynchronise the stream; this session is done.
        this.destroy();
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      this.pending = {
        resolve: (msg) => {
          signal.removeEventListener('abort', onAbort);
          resolve(msg);
        },
        reject: (err) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        }
      };

      const len = Buffer.alloc(2);
      len.writeUInt16BE(message.length, 0);
      this.socket.write(Buffer.concat([len, message]));
    });
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.socket.end();
  }

  private destroy(): void {
    this.isClosed = true;
    this.socket.destroy();
  }

  private onData(data: Buffer): void {
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, data]) : data;
    if (this.buffer.length < 2) return;
    const expected = this.buffer.readUInt16BE(0);
    if (this.buffer.length < expected + 2) return;

    const frame = Buffer.from(this.buffer.subarray(2, 2 + expected));
    this.buffer = this.buffer.subarray(2 + expected);
    const p = this.pending;
    this.pending = null;
    p?.resolve(frame);
  }

  private fail(err: Error): void {
    this.isClosed = true;
    const p = this.pending;
    this.pending = null;
    p?.reject(err);
  }
}

function openDot(server: ServerConfig, signal: AbortSignal): Promise<UpstreamConnection> {
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<UpstreamConnection>((resolve, reject) => {
    const socket = tls.connect({
      host: server.address,
      port: server.port,
      servername: tlsServername(server),
      ALPNProtocols: ['dot'],
      minVersion: 'TLSv1.2'
    });

    const cleanup = () => {
      signal.removeEventListener('abort', onAbort);
      socket.removeListener('error', onError);
    };
    const onAbort = () => {
      cleanup();
      socket.destroy();
      reject(abortReason(signal));
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('error', onError);
    socket.once('secureConnect', () => {
      cleanup();
      resolve(new DotConnection(socket));
    });
  });
}

/** DNS-over-HTTPS (RFC 8484) POST over a keep-alive HTTP/1.1 client. */
class DohConnection implements UpstreamConnection {
  readonly protocol = 'doh' as const;
  private isClosed = false;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly origin: string,
    private readonly path: string,
    private readonly ownsDispatcher: boolean
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  async query(message: Buffer, signal: AbortSignal): Promise<Buffer> {
    if (this.isClosed) throw new Error('UPSTREAM_CLOSED');
    try {
      const res = await this.dispatcher.request({
        origin: this.origin,
        path: this.path,
        method: 'POST',
        headers: {
          'content-type': 'application/dns-message',
          accept: 'application/dns-message',
          'user-agent': USER_AGENT
        },
        body: message,
        signal
      });

      if (res.statusCode !== 200) {
        await res.body.dump();
        throw new Error(`HTTP_${res.statusCode}`);
      }
      return Buffer.from(await res.body.arrayBuffer());
    } catch (e) {
      if (signal.aborted) throw abortReason(signal);
      throw e;
    }
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    if (this.ownsDispatcher) await this.dispatcher.close();
  }
}

function dohOrigin(server: ServerConfig): string {
  const host = ipaddr.IPv6.isValid(server.address) ? `[${server.address}]` : server.address;
  return `https://${host}:${server.port}`;
}

export type ConnectionFactoryOptions = {
  // Supplies the HTTP dispatcher for DoH instead of a dedicated undici Client.
  dohDispatcher?: (origin: string) => Dispatcher;
};

export function createConnectionFactory(opts: ConnectionFactoryOptions = {}): ConnectionFactory {
  return async (server, signal) => {
    if (server.protocol === 'dot') return await openDot(server, signal);

    if (signal.aborted) throw abortReason(signal);
    const origin = dohOrigin(server);
    if (opts.dohDispatcher) return new DohConnection(opts.dohDispatcher(origin), origin, server.dohPath, false);

    const client = new Client(origin, {
      pipelining: 1,
      keepAliveTimeout: 30_000,
      keepAliveMaxTimeout: 60_000,
      connect: { servername: tlsServername(server) }
    });
    return new DohConnection(client, origin, server.dohPath, true);
  };
}
