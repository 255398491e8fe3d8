// xoshiro128** over a 32-byte seed.

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

function splitmix32(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x9e3779b9) | 0;
    let z = s;
    z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
    z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
    return (z ^ (z >>> 16)) >>> 0;
  };
}

export class Rng {
  private s: Uint32Array;

  constructor(seed: Uint8Array) {
    if (seed.length !== 32) throw new Error(`Rng seed must be 32 bytes, got ${seed.length}`);
    const view = new DataView(seed.buffer, seed.byteOffset, seed.byteLength);
    this.s = new Uint32Array(4);
    for (let i = 0; i < 4; i++) {
      const folded = view.getUint32(i * 4, true) ^ view.getUint32(16 + i * 4, true);
      this.s[i] = splitmix32(folded ^ i)();
    }
    if (this.s.every((w) => w === 0)) {
      this.s.set([0x9e3779b9, 0x243f6a88, 0xb7e15162, 0x3243f6a8]);
    }
  }

  next(): number {
    const s = this.s;
    const s0 = s[0] ?? 0;
    const s1 = s[1] ?? 0;
    const s2 = s[2] ?? 0;
    const s3 = s[3] ?? 0;
    const result = Math.imul(rotl(Math.imul(s1, 5), 7), 9) >>> 0;
    const t = s1 << 9;

    const n2 = s2 ^ s0;
    const n3 = s3 ^ s1;
    s[1] = s1 ^ n2;
    s[0] = s0 ^ n3;
    s[2] = n2 ^ t;
    s[3] = rotl(n3, 11);

    return result;
  }

  /** Uniform in [0, 1). */
  float(): number {
    return this.next() / 4294967296;
  }

  bool(): boolean {
    return (this.next() & 1) === 1;
  }

  range(lo: number, hi: number): number {
    return lo + this.float() * (hi - lo);
  }

  rangeInclusive(lo: number, hi: number): number {
    return lo + (this.next() / 4294967295) * (hi - lo);
  }

  /** Integer in [lo, hi). Callers check hi > lo. */
  int(lo: number, hi: number): number {
    return lo + Math.floor(this.float() * (hi - lo));
  }

  intInclusive(lo: number, hi: number): number {
    return this.int(lo, hi + 1);
  }

  /**
   * Picks an index with probability proportional to its weight. Zero weights
   * are never picked; at least one weight must be positive.
   */
  weightedIndex(weights: readonly number[]): number {
    let total = 0;
    for (const w of weights) total += w;
    const target = this.float() * total;
    let acc = 0;
    let last = 0;
    for (let i = 0; i < weights.length; i++) {
      const w = weights[i] ?? 0;
      if (w <= 0) continue;
      acc += w;
      last = i;
      if (target < acc) return i;
    }
    return last;
  }

  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(0, i + 1);
      const a = out[i];
      const b = out[j];
      if (a === undefined || b === undefined) continue;
      out[i] = b;
      out[j] = a;
    }
    return out;
  }
}
