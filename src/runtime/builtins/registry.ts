import type { Cache } from "../cache";
import type { Shape } from "../shape";
import type { Value } from "../value";
import { invalidArgument, unknownFunction } from "../errors";

export type BuiltinContext = {
  /** Name the builtin was called by; aliases report their own name. */
  name: string;
  cache: Cache;
};

export type Builtin = {
  name: string;
  aliases?: string[];
  arity: number;
  /** Draws from the generator; such calls are never memoized. */
  random?: boolean;
  run: (ctx: BuiltinContext, args: Value[]) => Value;
};

export class BuiltinRegistry {
  private map = new Map<string, Builtin>();

  register(b: Builtin) {
    for (const name of [b.name, ...(b.aliases ?? [])]) {
      if (this.map.has(name)) throw new Error(`Builtin already registered: ${name}`);
      this.map.set(name, b);
    }
  }

  registerAll(builtins: readonly Builtin[]) {
    for (const b of builtins) this.register(b);
  }

  get(name: string): Builtin {
    const b = this.map.get(name);
    if (!b) throw unknownFunction(name);
    return b;
  }

  has(name: string) {
    return this.map.has(name);
  }
}

// ============================================================================
// Argument helpers
// ============================================================================

export function arg(ctx: BuiltinContext, args: readonly Value[], i: number): Value {
  const v = args[i];
  if (v === undefined) throw invalidArgument(ctx.name);
  return v;
}

export function num(ctx: BuiltinContext, args: readonly Value[], i: number): number {
  const v = arg(ctx, args, i);
  if (v.type === "Integer" || v.type === "Float") return v.value;
  throw invalidArgument(ctx.name);
}

/** Integer argument; floats are truncated. */
export function intArg(ctx: BuiltinContext, args: readonly Value[], i: number): number {
  return Math.trunc(num(ctx, args, i)) | 0;
}

export function boolArg(ctx: BuiltinContext, args: readonly Value[], i: number): boolean {
  const v = arg(ctx, args, i);
  if (v.type === "Boolean") return v.value;
  throw invalidArgument(ctx.name);
}

export function shapeArg(ctx: BuiltinContext, args: readonly Value[], i: number): Shape {
  const v = arg(ctx, args, i);
  if (v.type === "Shape") return v.shape;
  throw invalidArgument(ctx.name);
}

export function listArg(ctx: BuiltinContext, args: readonly Value[], i: number): readonly Value[] {
  const v = arg(ctx, args, i);
  if (v.type === "List") return v.items;
  throw invalidArgument(ctx.name);
}

export function hexArg(ctx: BuiltinContext, args: readonly Value[], i: number): readonly [number, number, number] {
  const v = arg(ctx, args, i);
  if (v.type === "Hex") return v.value;
  throw invalidArgument(ctx.name);
}
