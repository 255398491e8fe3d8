import { createHash, randomBytes } from "node:crypto";
import { encode } from "@toon-format/toon";
import type { Value } from "./value";
import type { BasicShape, Shape, Hsla, Transform } from "./shape";
import { Rng } from "./rng";
import { missingSeed } from "./errors";

export type Scope = { name: string; branch: number };

export interface CacheStats {
  hits: number;
  misses: number;
  entries: number;
  draws: number;
}

// ============================================================================
// Fingerprint mirror
// ============================================================================

type Mirror = null | boolean | string | Mirror[] | { [key: string]: Mirror };

const bitView = new DataView(new ArrayBuffer(8));

/** IEEE-754 bit pattern in hex, so `-0`, infinities and NaN stay distinct. */
function bits(n: number): string {
  bitView.setFloat64(0, n);
  return bitView.getBigUint64(0).toString(16);
}

const mirrorNumbers = (ns: readonly number[]): Mirror => ns.map(bits);
const mirrorTransform = (t: Transform): Mirror => mirrorNumbers([t.sx, t.kx, t.ky, t.sy, t.tx, t.ty]);
const mirrorColor = (c: Hsla): Mirror => mirrorNumbers([c.h, c.s, c.l, c.a]);

function mirrorBasic(b: BasicShape): Mirror {
  switch (b.type) {
    case "Square":
      return {
        square: mirrorNumbers([b.x, b.y, b.width, b.height]),
        t: mirrorTransform(b.transform),
        c: mirrorColor(b.color),
      };
    case "Circle":
      return { circle: mirrorNumbers([b.x, b.y, b.radius]), t: mirrorTransform(b.transform), c: mirrorColor(b.color) };
    case "Triangle":
      return { triangle: mirrorNumbers(b.points), t: mirrorTransform(b.transform), c: mirrorColor(b.color) };
    case "Fill":
      return { fill: mirrorColor(b.color) };
    case "Empty":
      return "empty";
  }
}

function mirrorShape(shape: Shape): Mirror {
  switch (shape.type) {
    case "Basic":
      return mirrorBasic(shape.basic);
    case "Composite":
      return {
        composite: [mirrorShape(shape.a), mirrorShape(shape.b)],
        t: mirrorTransform(shape.transform),
        c: mirrorColor(shape.color),
      };
    case "Collection":
      return {
        collection: shape.shapes.map(mirrorShape),
        t: mirrorTransform(shape.transform),
        c: mirrorColor(shape.color),
      };
  }
}

/** Type-tagged plain copy of a value; structurally equal values mirror identically. */
export function mirrorValue(value: Value): Mirror {
  switch (value.type) {
    case "Integer":
      return { i: bits(value.value) };
    case "Float":
      return { f: bits(value.value) };
    case "Boolean":
      return { b: value.value };
    case "Hex":
      return { x: mirrorNumbers(value.value) };
    case "Shape":
      return { s: mirrorShape(value.shape) };
    case "List":
      return { l: value.items.map(mirrorValue) };
  }
}

// ============================================================================
// Cache
// ============================================================================

/**
 * Memo table for reduced calls, keyed by a 64-bit fingerprint of
 * (name, branch, arguments, scope). Also owns the seeded generator so that
 * every random draw in a reduction comes from one sequence.
 */
export class Cache {
  private entries = new Map<string, Value>();
  private running = new Map<string, Promise<Value>>();
  private waits = new Map<string, Set<string>>();
  private rng: Rng;
  private hits = 0;
  private misses = 0;
  private draws = 0;

  private constructor(seed: Uint8Array) {
    this.rng = new Rng(seed);
  }

  static create(seed?: Uint8Array): Cache {
    if (seed === undefined) {
      let entropy: Uint8Array;
      try {
        entropy = randomBytes(32);
      } catch (e: unknown) {
        const err = missingSeed();
        err.cause = e;
        throw err;
      }
      return new Cache(entropy);
    }
    if (seed.length !== 32) throw missingSeed();
    return new Cache(seed);
  }

  static fingerprint(name: string, branch: number, args: readonly Value[], scope: Scope | null): string {
    const branchBytes = Buffer.alloc(4);
    branchBytes.writeUInt32BE(branch >>> 0);
    const scopeMirror: Mirror = scope === null ? null : { name: scope.name, branch: bits(scope.branch) };

    const digest = createHash("sha256")
      .update(name, "utf8")
      .update(branchBytes)
      .update(encode({ args: args.map(mirrorValue) }), "utf8")
      .update(encode({ scope: scopeMirror }), "utf8")
      .digest();
    return digest.subarray(0, 8).toString("hex");
  }

  get(key: string): Value | undefined {
    const value = this.entries.get(key);
    if (value === undefined) this.misses++;
    else this.hits++;
    return value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: Value): void {
    this.entries.set(key, value);
  }

  /**
   * Memoized async computation. Concurrent callers with the same key share
   * the one in flight, so `compute` runs at most once per key. `owner` is the
   * key of the computation making the call, or null outside any.
   */
  async memo(key: string, owner: string | null, compute: () => Promise<Value>): Promise<Value> {
    const done = this.entries.get(key);
    if (done !== undefined) {
      this.hits++;
      return done;
    }

    const running = this.running.get(key);
    if (running !== undefined) {
      // Joining a computation that is itself waiting on the caller would never settle.
      if (owner !== null && this.waitsOn(key, owner)) return compute();
      this.hits++;
      this.addWait(owner, key);
      return running;
    }

    this.misses++;
    this.addWait(owner, key);
    const promise = compute();
    this.running.set(key, promise);
    try {
      const value = await promise;
      this.entries.set(key, value);
      return value;
    } finally {
      this.running.delete(key);
      this.waits.delete(key);
    }
  }

  private addWait(owner: string | null, key: string): void {
    if (owner === null) return;
    const keys = this.waits.get(owner);
    if (keys) keys.add(key);
    else this.waits.set(owner, new Set([key]));
  }

  /** Whether the computation for `from` waits, directly or transitively, on `to`. */
  private waitsOn(from: string, to: string): boolean {
    const seen = new Set<string>();
    const stack = [from];
    for (let key = stack.pop(); key !== undefined; key = stack.pop()) {
      if (key === to) return true;
      if (seen.has(key)) continue;
      seen.add(key);
      stack.push(...(this.waits.get(key) ?? []));
    }
    return false;
  }

  /** Runs `fn` against the generator. Draws are synchronous, so each is atomic. */
  draw<T>(fn: (rng: Rng) => T): T {
    this.draws++;
    return fn(this.rng);
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, entries: this.entries.size, draws: this.draws };
  }
}
