/**
 * Append-only Bloom filter over domain strings.
 *
 * Sizing follows the usual optimum for `n` expected elements and target
 * false-positive rate `p`:
 *   m = ceil(-n * ln(p) / ln(2)^2)
 *   k = round(m / n * ln(2))
 * Probe positions use double hashing (h1 + i * h2) over two 32-bit hashes.
 */
export class BloomFilter {
  readonly size: number;
  readonly hashCount: number;
  readonly expectedElements: number;
  readonly falsePositiveRate: number;
  private readonly bits: Uint32Array;
  private count = 0;

  constructor(expectedElements: number, falsePositiveRate: number) {
    if (!(falsePositiveRate > 0 && falsePositiveRate < 1)) {
      throw new RangeError('falsePositiveRate must be in (0, 1)');
    }
    const n = Math.max(1, Math.ceil(expectedElements));
    const m = Math.max(64, Math.ceil((-n * Math.log(falsePositiveRate)) / (Math.LN2 * Math.LN2)));
    this.size = m;
    this.hashCount = Math.max(1, Math.round((m / n) * Math.LN2));
    this.expectedElements = n;
    this.falsePositiveRate = falsePositiveRate;
    this.bits = new Uint32Array(Math.ceil(m / 32));
  }

  get elementCount(): number {
    return this.count;
  }

  add(value: string): void {
    const h1 = hashA(value);
    const h2 = hashB(value) | 1;
    for (let i = 0; i < this.hashCount; i++) {
      const bit = ((h1 + Math.imul(i, h2)) >>> 0) % this.size;
      this.bits[bit >>> 5] |= 1 << (bit & 31);
    }
    this.count++;
  }

  mightContain(value: string): boolean {
    const h1 = hashA(value);
    const h2 = hashB(value) | 1;
    for (let i = 0; i < this.hashCount; i++) {
      const bit = ((h1 + Math.imul(i, h2)) >>> 0) % this.size;
      if ((this.bits[bit >>> 5] & (1 << (bit & 31))) === 0) return false;
    }
    return true;
  }
}

function fmix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

// FNV-1a, finalised with the murmur3 mixer.
function hashA(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return fmix32(h);
}

// djb2 variant with a different seed, finalised the same way.
function hashB(s: string): number {
  let h = 0x9747b28c;
  for (let i = 0; i < s.length; i++) {
    h = (Math.imul(h, 33) + s.charCodeAt(i)) | 0;
  }
  return fmix32(h);
}
