import type { Logger } from '../logger.js';
import { CircuitOpenError, CoreError, PoolTimeoutError, errorCode } from '../core/errors.js';
import type { StatsAggregator } from '../stats/statsAggregator.js';
import { CircuitBreaker, type BreakerPolicy, type BreakerStateName } from './circuitBreaker.js';
import { linkedSignal } from './signals.js';
import { abortReason } from './transports.js';
import type { ConnectionFactory, Protocol, ServerConfig, UpstreamConnection } from './types.js';

export type PooledConnection = {
  readonly id: number;
  readonly server: ServerConfig;
  readonly protocol: Protocol;
  readonly transport: UpstreamConnection;
  lastUsed: number;
  inUse: boolean;
};

export type ServerHealth = {
  name: string;
  protocol: Protocol;
  priority: number;
  state: BreakerStateName;
  consecutiveFailures: number;
  lastTransitionAt: string;
  latencyMs: number | null;
  openConnections: number;
  idleConnections: number;
};

export type ConnectionPoolOptions = {
  maxPerServer: number;
  idleTimeoutMs: number;
  breaker: BreakerPolicy;
  factory: ConnectionFactory;
  logger: Logger;
  stats?: StatsAggregator;
};

type Waiter = {
  resolve: (conn: PooledConnection) => void;
  reject: (err: Error) => void;
  // Absolute time the caller stops waiting; a connection opened on its behalf
  // gets only what is left of it.
  deadline: number;
  signal: AbortSignal | undefined;
  timer: NodeJS.Timeout;
  detach: () => void;
};

type Bucket = {
  server: ServerConfig;
  breaker: CircuitBreaker;
  idle: PooledConnection[];
  busy: Set<PooledConnection>;
  opening: number;
  waiters: Waiter[];
  latencyMs: number | null;
};

const LATENCY_ALPHA = 0.2;

/**
 * Bounded pools of encrypted upstream connections, one per (server, protocol),
 * each guarded by a circuit breaker. Connections are opened lazily, reused
 * while healthy and discarded after any error or cancellation.
 */
export class ConnectionPool {
  private readonly buckets = new Map<string, Bucket>();
  private readonly ordered: ServerConfig[];
  private readonly idleTimer: NodeJS.Timeout;
  private nextId = 1;
  private closed = false;

  constructor(
    servers: ReadonlyArray<ServerConfig>,
    private readonly opts: ConnectionPoolOptions
  ) {
    // Highest priority first; config order breaks ties.
    this.ordered = servers
      .map((server, index) => ({ server, index }))
      .sort((a, b) => b.server.priority - a.server.priority || a.index - b.index)
      .map((x) => x.server);

    for (const server of this.ordered) {
      const bucket: Bucket = {
        server,
        breaker: new CircuitBreaker(opts.breaker, (from, to) => this.onTransition(bucket, from, to)),
        idle: [],
        busy: new Set(),
        opening: 0,
        waiters: [],
        latencyMs: null
      };
      this.buckets.set(server.name, bucket);
    }

    this.idleTimer = setInterval(() => this.evictIdle(), Math.max(500, Math.floor(opts.idleTimeoutMs / 2)));
    this.idleTimer.unref?.();
  }

  /** Servers a request may be routed to right now, in priority order. */
  eligibleServers(now = Date.now()): ServerConfig[] {
    return this.ordered.filter((s) => this.buckets.get(s.name)?.breaker.available(now) ?? false);
  }

  get servers(): ReadonlyArray<ServerConfig> {
    return this.ordered;
  }

  async acquire(serverName: string, timeoutMs: number, signal?: AbortSignal): Promise<PooledConnection> {
    if (this.closed) throw new CoreError('NOT_READY', 'connection pool closed');
    const bucket = this.buckets.get(serverName);
    if (!bucket) throw new CoreError('CONFIG', `unknown server ${serverName}`);
    if (!bucket.breaker.tryAdmit()) throw new CircuitOpenError(serverName);

    try {
      const idle = this.takeIdle(bucket);
      if (idle) return this.checkout(bucket, idle);
      if (this.capacity(bucket) > 0) return await this.open(bucket, timeoutMs, signal);
      return await this.wait(bucket, timeoutMs, signal);
    } catch (e) {
      // A HALF_OPEN trial that never reached the server is handed back.
      bucket.breaker.releaseTrial();
      throw e;
    }
  }

  /**
   * Returns a connection. Errors (including cancellation) count against the
   * server's health and the connection is discarded rather than reused.
   */
  release(conn: PooledConnection, wasError: boolean, latencyMs?: number): void {
    const bucket = this.buckets.get(conn.server.name);
    if (!bucket || !bucket.busy.has(conn)) return;

    bucket.busy.delete(conn);
    conn.inUse = false;
    conn.lastUsed = Date.now();

    if (wasError) {
      bucket.breaker.recordFailure();
    } else {
      bucket.breaker.recordSuccess();
      if (latencyMs !== undefined && Number.isFinite(latencyMs)) {
        bucket.latencyMs = bucket.latencyMs === null ? latencyMs : bucket.latencyMs + LATENCY_ALPHA * (latencyMs - bucket.latencyMs);
      }
    }

    if (wasError || conn.transport.closed || this.closed) this.discard(bucket, conn);
    else bucket.idle.push(conn);

    this.drain(bucket);
  }

  health(): ServerHealth[] {
    return this.ordered.map((server) => {
      const bucket = this.buckets.get(server.name);
      const state = bucket?.breaker.state;
      return {
        name: server.name,
        protocol: server.protocol,
        priority: server.priority,
        state: state?.name ?? 'CLOSED',
        consecutiveFailures: state?.failures ?? 0,
        lastTransitionAt: new Date(state?.since ?? 0).toISOString(),
        latencyMs: bucket?.latencyMs === null || bucket?.latencyMs === undefined ? null : Math.round(bucket.latencyMs),
        openConnections: bucket ? bucket.idle.length + bucket.busy.size : 0,
        idleConnections: bucket?.idle.length ?? 0
      };
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.idleTimer);

    const closing: Promise<void>[] = [];
    for (const bucket of this.buckets.values()) {
      this.rejectWaiters(bucket, new CoreError('NOT_READY', 'connection pool closed'));
      for (const conn of [...bucket.idle, ...bucket.busy]) closing.push(conn.transport.close());
      bucket.idle = [];
      bucket.busy.clear();
    }
    const results = await Promise.allSettled(closing);
    const failed = results.filter((r) => r.status === 'rejected').length;
    if (failed) this.opts.logger.debug({ failed }, 'upstream connections failed to close cleanly');
  }

  private capacity(bucket: Bucket): number {
    return this.opts.maxPerServer - (bucket.idle.length + bucket.busy.size + bucket.opening);
  }

  private takeIdle(bucket: Bucket): PooledConnection | null {
    while (bucket.idle.length) {
      const conn = bucket.idle.pop();
      if (conn && !conn.transport.closed) return conn;
    }
    return null;
  }

  private checkout(bucket: Bucket, conn: PooledConnection): PooledConnection {
    conn.inUse = true;
    bucket.busy.add(conn);
    return conn;
  }

  private async open(bucket: Bucket, timeoutMs: number, signal?: AbortSignal): Promise<PooledConnection> {
    bucket.opening++;
    const linked = linkedSignal(signal, timeoutMs, () => new Error('CONNECT_TIMEOUT'));
    try {
      const transport = await this.opts.factory(bucket.server, linked.signal);
      const conn: PooledConnection = {
        id: this.nextId++,
        server: bucket.server,
        protocol: bucket.server.protocol,
        transport,
        lastUsed: Date.now(),
        inUse: false
      };
      if (this.closed) {
        void transport.close().catch((err: unknown) => this.logCloseError(bucket, err));
        throw new CoreError('NOT_READY', 'connection pool closed');
      }
      return this.checkout(bucket, conn);
    } catch (e) {
      if (!(e instanceof CoreError)) {
        bucket.breaker.recordFailure();
        this.opts.logger.debug({ server: bucket.server.name, err: errorCode(e) }, 'upstream connect failed');
      }
      throw e;
    } finally {
      linked.dispose();
      bucket.opening--;
    }
  }

  private wait(bucket: Bucket, timeoutMs: number, signal?: AbortSignal): Promise<PooledConnection> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise<PooledConnection>((resolve, reject) => {
      const remove = () => {
        const idx = bucket.waiters.indexOf(waiter);
        if (idx >= 0) bucket.waiters.splice(idx, 1);
      };
      const onAbort = () => {
        remove();
        clearTimeout(waiter.timer);
        if (signal) reject(abortReason(signal));
      };
      const waiter: Waiter = {
        resolve,
        reject,
        deadline: Date.now() + Math.max(0, timeoutMs),
        signal,
        timer: setTimeout(() => {
          remove();
          signal?.removeEventListener('abort', onAbort);
          reject(new PoolTimeoutError(bucket.server.name));
        }, Math.max(0, timeoutMs)),
        detach: () => {
          clearTimeout(waiter.timer);
          signal?.removeEventListener('abort', onAbort);
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      bucket.waiters.push(waiter);
    });
  }

  /** Hands freed capacity to queued acquirers, oldest first. */
  private drain(bucket: Bucket): void {
    while (bucket.waiters.length) {
      const idle = this.takeIdle(bucket);
      if (idle) {
        const waiter = bucket.waiters.shift();
        if (!waiter) break;
        waiter.detach();
        waiter.resolve(this.checkout(bucket, idle));
        continue;
      }
      if (this.capacity(bucket) <= 0) break;

      const waiter = bucket.waiters.shift();
      if (!waiter) break;
      waiter.detach();
      this.openFor(bucket, waiter);
    }
  }

  private openFor(bucket: Bucket, waiter: Waiter): void {
    const { signal } = waiter;
    void this.open(bucket, waiter.deadline - Date.now(), signal).then((conn) => {
      if (!signal?.aborted) {
        waiter.resolve(conn);
        return;
      }
      // The caller left while the connection was being opened.
      this.putBack(bucket, conn);
      waiter.reject(abortReason(signal));
    }, waiter.reject);
  }

  private putBack(bucket: Bucket, conn: PooledConnection): void {
    bucket.busy.delete(conn);
    conn.inUse = false;
    conn.lastUsed = Date.now();
    if (this.closed || conn.transport.closed) this.discard(bucket, conn);
    else bucket.idle.push(conn);
    this.drain(bucket);
  }

  private discard(bucket: Bucket, conn: PooledConnection): void {
    const idx = bucket.idle.indexOf(conn);
    if (idx >= 0) bucket.idle.splice(idx, 1);
    bucket.busy.delete(conn);
    void conn.transport.close().catch((err: unknown) => this.logCloseError(bucket, err));
  }

  private rejectWaiters(bucket: Bucket, err: Error): void {
    const waiters = bucket.waiters.splice(0);
    for (const w of waiters) {
      w.detach();
      w.reject(err);
    }
  }

  private evictIdle(now = Date.now()): void {
    for (const bucket of this.buckets.values()) {
      for (const conn of [...bucket.idle]) {
        if (conn.transport.closed || now - conn.lastUsed >= this.opts.idleTimeoutMs) this.discard(bucket, conn);
      }
    }
  }

  private onTransition(bucket: Bucket, from: BreakerStateName, to: BreakerStateName): void {
    const server = bucket.server.name;
    this.opts.stats?.record({ type: 'breaker', server, from, to });
    if (to === 'OPEN') {
      this.opts.logger.warn({ server, from, to }, 'upstream circuit opened');
      // Nothing may be routed to an OPEN server, queued callers included.
      this.rejectWaiters(bucket, new CircuitOpenError(server));
      for (const conn of [...bucket.idle]) this.discard(bucket, conn);
    } else {
      this.opts.logger.info({ server, from, to }, 'upstream circuit state change');
    }
  }

  private logCloseError(bucket: Bucket, err: unknown): void {
    this.opts.logger.debug({ server: bucket.server.name, err: errorCode(err) }, 'upstream connection close failed');
  }
}
