import type { Builtin, BuiltinContext } from "./registry";
import { intArg, listArg, num } from "./registry";
import { float, int, list, type Value } from "../value";
import { invalidArgument, outOfBounds } from "../errors";

// Every builtin here draws from the cache's generator and is flagged `random`.

function bounds(ctx: BuiltinContext, args: Value[], integer: boolean, inclusive: boolean): [number, number] {
  const lo = integer ? intArg(ctx, args, 0) : num(ctx, args, 0);
  const hi = integer ? intArg(ctx, args, 1) : num(ctx, args, 1);
  if (inclusive ? hi < lo : hi <= lo) throw invalidArgument(ctx.name);
  return [lo, hi];
}

export const RANDOM: Builtin[] = [
  { name: "rand", arity: 0, random: true, run: (ctx) => float(ctx.cache.draw((rng) => rng.float())) },
  { name: "randi", arity: 0, random: true, run: (ctx) => int(ctx.cache.draw((rng) => (rng.bool() ? 1 : 0))) },
  {
    name: "rand_range",
    arity: 2,
    random: true,
    run: (ctx, args) => {
      const [lo, hi] = bounds(ctx, args, false, false);
      return float(ctx.cache.draw((rng) => rng.range(lo, hi)));
    },
  },
  {
    name: "randi_range",
    arity: 2,
    random: true,
    run: (ctx, args) => {
      const [lo, hi] = bounds(ctx, args, true, false);
      return int(ctx.cache.draw((rng) => rng.int(lo, hi)));
    },
  },
  {
    name: "rand_rangei",
    arity: 2,
    random: true,
    run: (ctx, args) => {
      const [lo, hi] = bounds(ctx, args, false, true);
      return float(ctx.cache.draw((rng) => rng.rangeInclusive(lo, hi)));
    },
  },
  {
    name: "randi_rangei",
    arity: 2,
    random: true,
    run: (ctx, args) => {
      const [lo, hi] = bounds(ctx, args, true, true);
      return int(ctx.cache.draw((rng) => rng.intInclusive(lo, hi)));
    },
  },
  {
    name: "shuffle",
    arity: 1,
    random: true,
    run: (ctx, args) => {
      const items = listArg(ctx, args, 0);
      return list(ctx.cache.draw((rng) => rng.shuffle(items)));
    },
  },
  {
    name: "choose",
    arity: 1,
    random: true,
    run: (ctx, args) => {
      const items = listArg(ctx, args, 0);
      if (items.length === 0) throw outOfBounds();
      const item = items[ctx.cache.draw((rng) => rng.int(0, items.length))];
      if (item === undefined) throw outOfBounds();
      return item;
    },
  },
];
