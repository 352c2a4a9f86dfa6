import { describe, expect, it } from 'vitest';
import { BloomFilter } from '../../src/blocklists/bloomFilter.js';

describe('BloomFilter', () => {
  it('derives size and hash count from n and the target rate', () => {
    const bf = new BloomFilter(1000, 0.01);
    // m = ceil(-1000 * ln(0.01) / ln(2)^2) = 9586, k = round(9586 / 1000 * ln 2) = 7
    expect(bf.size).toBe(9586);
    expect(bf.hashCount).toBe(7);
  });

  it('rejects rates outside (0, 1)', () => {
    expect(() => new BloomFilter(10, 0)).toThrow(RangeError);
    expect(() => new BloomFilter(10, 1)).toThrow(RangeError);
  });

  it('has no false negatives', () => {
    const bf = new BloomFilter(5000, 0.001);
    const names = Array.from({ length: 5000 }, (_, i) => `host-${i}.blocked.test`);
    for (const n of names) bf.add(n);
    expect(names.every((n) => bf.mightContain(n))).toBe(true);
    expect(bf.elementCount).toBe(5000);
  });

  it('keeps the empirical false-positive rate near the configured bound', () => {
    const rate = 0.01;
    const bf = new BloomFilter(10_000, rate);
    for (let i = 0; i < 10_000; i++) bf.add(`ad-${i}.tracker.test`);

    const samples = 20_000;
    let hits = 0;
    for (let i = 0; i < samples; i++) {
      if (bf.mightContain(`clean-${i}.site.test`)) hits++;
    }
    // Tolerance for sampling noise around 1%.
    expect(hits / samples).toBeLessThanOrEqual(rate * 1.5);
  });

  it('stays usable when built for zero elements', () => {
    const bf = new BloomFilter(0, 0.001);
    expect(bf.size).toBeGreaterThanOrEqual(64);
    expect(bf.mightContain('anything.test')).toBe(false);
  });
});
