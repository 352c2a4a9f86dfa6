import { setTimeout as sleep } from 'node:timers/promises';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { CircuitOpenError, PoolTimeoutError } from '../../src/core/errors.js';
import { StatsAggregator } from '../../src/stats/statsAggregator.js';
import { ConnectionPool, type ConnectionPoolOptions } from '../../src/upstream/connectionPool.js';
import type { ConnectionFactory, ServerConfig, UpstreamConnection } from '../../src/upstream/types.js';
import { FakeConnection, answerFor, server, silentLogger } from './_fixtures.js';

const pools: ConnectionPool[] = [];

function makePool(opts: Partial<ConnectionPoolOptions> = {}, servers: ServerConfig[] = [server('primary', 10)]) {
  const opened: FakeConnection[] = [];
  const factory = vi.fn<ConnectionFactory>(async (s) => {
    const conn = new FakeConnection(s.protocol, async (q) => answerFor(q));
    opened.push(conn);
    return conn;
  });
  const pool = new ConnectionPool(servers, {
    maxPerServer: 2,
    idleTimeoutMs: 60_000,
    breaker: { failureThreshold: 2, cooldownMs: 60_000, maxCooldownMs: 60_000 },
    factory,
    logger: silentLogger,
    ...opts
  });
  pools.push(pool);
  return { pool, factory, opened };
}

/** Connect attempt that only ends when its signal aborts. */
function neverConnects(_s: ServerConfig, signal: AbortSignal): Promise<UpstreamConnection> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

const patientBreaker = { failureThreshold: 5, cooldownMs: 60_000, maxCooldownMs: 60_000 };

describe('ConnectionPool', () => {
  afterEach(async () => {
    await Promise.all(pools.splice(0).map((p) => p.close()));
  });

  it('opens lazily and reuses a healthy connection', async () => {
    const { pool, factory } = makePool();
    expect(factory).not.toHaveBeenCalled();

    const a = await pool.acquire('primary', 1_000);
    pool.release(a, false, 12);
    const b = await pool.acquire('primary', 1_000);

    expect(b).toBe(a);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(pool.health()[0]).toMatchObject({ name: 'primary', state: 'CLOSED', latencyMs: 12, openConnections: 1, idleConnections: 0 });
  });

  it('queues acquirers beyond the pool size and hands over released connections', async () => {
    const { pool, factory } = makePool({ maxPerServer: 1 });
    const first = await pool.acquire('primary', 1_000);
    const waiting = pool.acquire('primary', 1_000);

    pool.release(first, false);
    expect(await waiting).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('times out an acquire when the pool stays exhausted', async () => {
    const { pool } = makePool({ maxPerServer: 1 });
    const held = await pool.acquire('primary', 1_000);

    await expect(pool.acquire('primary', 20)).rejects.toBeInstanceOf(PoolTimeoutError);
    pool.release(held, false);
  });

  it('stops waiting when the caller cancels', async () => {
    const { pool } = makePool({ maxPerServer: 1 });
    const held = await pool.acquire('primary', 1_000);
    const ac = new AbortController();
    const waiting = pool.acquire('primary', 5_000, ac.signal);

    ac.abort(new Error('CANCELLED'));
    await expect(waiting).rejects.toThrow('CANCELLED');
    pool.release(held, false);
  });

  it('keeps a queued caller cancellable while a connection is opened for it', async () => {
    const { pool, factory } = makePool({ maxPerServer: 1, breaker: patientBreaker });
    const held = await pool.acquire('primary', 1_000);
    factory.mockImplementationOnce(neverConnects);
    const ac = new AbortController();
    const waiting = pool.acquire('primary', 5_000, ac.signal);

    // Frees the slot, so a new connection is opened for the queued caller.
    pool.release(held, true);
    expect(factory).toHaveBeenCalledTimes(2);

    const started = Date.now();
    ac.abort(new Error('CANCELLED'));
    await expect(waiting).rejects.toThrow('CANCELLED');
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('bounds a connection opened for a queued caller by what is left of its timeout', async () => {
    const { pool, factory } = makePool({ maxPerServer: 1, breaker: patientBreaker });
    const held = await pool.acquire('primary', 1_000);
    factory.mockImplementationOnce(neverConnects);
    const started = Date.now();
    const waiting = pool.acquire('primary', 50);

    pool.release(held, true);
    await expect(waiting).rejects.toThrow('CONNECT_TIMEOUT');
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('keeps a connection that arrives after its queued caller left', async () => {
    const { pool, factory } = makePool({ maxPerServer: 1, breaker: patientBreaker });
    const held = await pool.acquire('primary', 1_000);
    let finish: (conn: UpstreamConnection) => void = () => {};
    // Ignores cancellation and completes later.
    factory.mockImplementationOnce(
      () =>
        new Promise<UpstreamConnection>((resolve) => {
          finish = resolve;
        })
    );
    const ac = new AbortController();
    const waiting = pool.acquire('primary', 5_000, ac.signal);

    pool.release(held, true);
    ac.abort(new Error('CANCELLED'));
    const late = new FakeConnection('dot', async (q) => answerFor(q));
    finish(late);

    await expect(waiting).rejects.toThrow('CANCELLED');
    expect(late.closed).toBe(false);
    expect(pool.health()[0]).toMatchObject({ openConnections: 1, idleConnections: 1 });
    expect((await pool.acquire('primary', 100)).transport).toBe(late);
  });

  it('discards a connection released with an error', async () => {
    const { pool, factory, opened } = makePool();
    const a = await pool.acquire('primary', 1_000);
    pool.release(a, true);

    expect(opened[0]?.closed).toBe(true);
    const b = await pool.acquire('primary', 1_000);
    expect(b).not.toBe(a);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('opens the circuit after consecutive connect failures and refuses the server', async () => {
    const stats = new StatsAggregator();
    const failing = vi.fn<ConnectionFactory>(async () => {
      throw new Error('ECONNREFUSED');
    });
    const { pool } = makePool({ factory: failing, stats });

    await expect(pool.acquire('primary', 100)).rejects.toThrow('ECONNREFUSED');
    await expect(pool.acquire('primary', 100)).rejects.toThrow('ECONNREFUSED');
    await expect(pool.acquire('primary', 100)).rejects.toBeInstanceOf(CircuitOpenError);

    expect(failing).toHaveBeenCalledTimes(2);
    expect(pool.eligibleServers()).toEqual([]);
    expect(pool.health()[0]).toMatchObject({ state: 'OPEN', consecutiveFailures: 2 });
    expect(stats.snapshot().breakerTransitionsByServer).toEqual({ primary: 1 });
  });

  it('lets exactly one trial through after the cool-down', async () => {
    let healthy = false;
    const factory = vi.fn<ConnectionFactory>(async (s) => {
      if (!healthy) throw new Error('ECONNRESET');
      return new FakeConnection(s.protocol, async (q) => answerFor(q));
    });
    const { pool } = makePool({ factory, breaker: { failureThreshold: 1, cooldownMs: 20, maxCooldownMs: 100 } });

    await expect(pool.acquire('primary', 100)).rejects.toThrow('ECONNRESET');
    expect(pool.health()[0]?.state).toBe('OPEN');
    await expect(pool.acquire('primary', 100)).rejects.toBeInstanceOf(CircuitOpenError);

    await sleep(30);
    healthy = true;
    const trial = pool.acquire('primary', 100);
    await expect(pool.acquire('primary', 100)).rejects.toBeInstanceOf(CircuitOpenError);

    const conn = await trial;
    expect(pool.health()[0]?.state).toBe('HALF_OPEN');
    pool.release(conn, false);
    expect(pool.health()[0]).toMatchObject({ state: 'CLOSED', consecutiveFailures: 0 });
  });

  it('lists eligible servers by priority, skipping open circuits', async () => {
    const flaky = server('flaky', 50);
    const factory = vi.fn<ConnectionFactory>(async (s) => {
      if (s.name === 'flaky') throw new Error('ETIMEDOUT');
      return new FakeConnection(s.protocol, async (q) => answerFor(q));
    });
    const { pool } = makePool({ factory, breaker: { failureThreshold: 1, cooldownMs: 60_000, maxCooldownMs: 60_000 } }, [
      server('low', 1),
      flaky,
      server('mid', 10, 'doh')
    ]);

    expect(pool.eligibleServers().map((s) => s.name)).toEqual(['flaky', 'mid', 'low']);
    await expect(pool.acquire('flaky', 100)).rejects.toThrow('ETIMEDOUT');
    expect(pool.eligibleServers().map((s) => s.name)).toEqual(['mid', 'low']);
  });

  it('closes every connection on shutdown', async () => {
    const { pool, opened } = makePool();
    const a = await pool.acquire('primary', 1_000);
    const b = await pool.acquire('primary', 1_000);
    pool.release(a, false);

    await pool.close();
    expect(opened.map((c) => c.closed)).toEqual([true, true]);
    pool.release(b, false);
    await expect(pool.acquire('primary', 100)).rejects.toMatchObject({ kind: 'NOT_READY' });
  });
});
