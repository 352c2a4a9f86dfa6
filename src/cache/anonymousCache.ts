import crypto from 'node:crypto';
import { ResolutionTimeout } from '../core/errors.js';

export type CacheEntry = {
  key: string;
  payload: Buffer;
  createdAt: number;
  expiresAt: number;
  ttlSeconds: number;
  hits: number;
};

export type ResolvedResponse = {
  payload: Buffer;
  ttlSeconds: number;
};

export type CacheResult = {
  payload: Buffer;
  ttlSeconds: number;
  cached: boolean;
};

export type AnonymousCacheOptions = {
  maxEntries: number;
  minTtlSeconds: number;
  maxTtlSeconds: number;
  sweepIntervalMs: number;
  // Keys are HMACs under this secret; a fresh random one per process by default.
  keySecret?: Buffer;
};

export type CacheStats = {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  inFlight: number;
  joinedInFlight: number;
};

/**
 * Response cache keyed by HMAC-SHA256(name, qtype). The query name is hashed
 * on the way in and never stored.
 *
 * Map insertion order doubles as LRU order: a hit re-inserts the entry at the
 * tail, eviction takes from the head.
 */
export class AnonymousCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<ResolvedResponse>>();
  private readonly secret: Buffer;
  private readonly sweepTimer: NodeJS.Timeout | null;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;
  private joinedInFlight = 0;

  constructor(private readonly opts: AnonymousCacheOptions) {
    this.secret = opts.keySecret ?? crypto.randomBytes(32);
    if (opts.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), opts.sweepIntervalMs);
      this.sweepTimer.unref?.();
    } else {
      this.sweepTimer = null;
    }
  }

  keyFor(name: string, qtype: string): string {
    return crypto.createHmac('sha256', this.secret).update(name).update('\0').update(qtype.toUpperCase()).digest('base64url');
  }

  get size(): number {
    return this.entries.size;
  }

  get(name: string, qtype: string): CacheEntry | null {
    const entry = this.getByKey(this.keyFor(name, qtype));
    if (entry) this.hits++;
    else this.misses++;
    return entry;
  }

  set(name: string, qtype: string, response: ResolvedResponse): CacheEntry | null {
    return this.setByKey(this.keyFor(name, qtype), response);
  }

  /**
   * Returns the cached response or runs `resolve` for it. Concurrent callers
   * for the same key share one in-flight resolution. The first caller's
   * deadline bounds that resolution (its signal aborts at the deadline); every
   * caller also stops waiting at its own deadline.
   */
  async getOrResolve(
    name: string,
    qtype: string,
    resolve: (signal: AbortSignal) => Promise<ResolvedResponse>,
    deadline: number
  ): Promise<CacheResult> {
    const key = this.keyFor(name, qtype);
    const hit = this.getByKey(key);
    if (hit) {
      this.hits++;
      return { payload: hit.payload, ttlSeconds: hit.ttlSeconds, cached: true };
    }
    this.misses++;

    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new ResolutionTimeout();

    const pending = this.inflight.get(key);
    if (pending) {
      this.joinedInFlight++;
      const res = await withDeadline(pending, remaining);
      return { payload: res.payload, ttlSeconds: res.ttlSeconds, cached: false };
    }

    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(new ResolutionTimeout()), remaining);
    timer.unref?.();

    const shared = resolve(ac.signal)
      .then((res) => {
        this.setByKey(key, res);
        return res;
      })
      .finally(() => {
        clearTimeout(timer);
        this.inflight.delete(key);
      });
    this.inflight.set(key, shared);

    const res = await withDeadline(shared, remaining);
    return { payload: res.payload, ttlSeconds: res.ttlSeconds, cached: false };
  }

  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.expirations += removed;
    return removed;
  }

  clear(): number {
    const n = this.entries.size;
    this.entries.clear();
    return n;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      maxEntries: this.opts.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      inFlight: this.inflight.size,
      joinedInFlight: this.joinedInFlight
    };
  }

  close(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.entries.clear();
  }

  private clampTtl(ttlSeconds: number): number {
    const ttl = Number.isFinite(ttlSeconds) ? Math.floor(ttlSeconds) : 0;
    return Math.min(this.opts.maxTtlSeconds, Math.max(this.opts.minTtlSeconds, ttl));
  }

  private getByKey(key: string): CacheEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      this.expirations++;
      return null;
    }
    // LRU touch.
    this.entries.delete(key);
    this.entries.set(key, entry);
    entry.hits++;
    return entry;
  }

  private setByKey(key: string, response: ResolvedResponse): CacheEntry | null {
    const ttlSeconds = this.clampTtl(response.ttlSeconds);
    if (ttlSeconds <= 0) return null;

    const now = Date.now();
    const entry: CacheEntry = {
      key,
      payload: response.payload,
      createdAt: now,
      expiresAt: now + ttlSeconds * 1000,
      ttlSeconds,
      hits: 0
    };
    this.entries.delete(key);
    this.entries.set(key, entry);

    // Over capacity: drop least recently used first, regardless of TTL.
    while (this.entries.size > this.opts.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    return entry;
  }
}

async function withDeadline<T>(p: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ResolutionTimeout()), ms);
    timer.unref?.();
  });
  try {
    return await Promise.race([p, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
