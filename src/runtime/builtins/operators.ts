import type { Builtin, BuiltinContext } from "./registry";
import { arg, boolArg, intArg, listArg, num, shapeArg } from "./registry";
import { compose } from "../shape";
import { bool, float, int, list, shape, type Value } from "../value";
import { invalidArgument } from "../errors";

type NumericOp = { int: (a: number, b: number) => number; float: (a: number, b: number) => number };

/** Integer op when both operands are integers, float op otherwise. */
function numeric(ctx: BuiltinContext, args: Value[], op: NumericOp): Value {
  const a = arg(ctx, args, 0);
  const b = arg(ctx, args, 1);
  if (a.type === "Integer" && b.type === "Integer") return int(op.int(a.value, b.value));
  return float(op.float(num(ctx, args, 0), num(ctx, args, 1)));
}

function nonZero(ctx: BuiltinContext, n: number): number {
  if (n === 0) throw invalidArgument(ctx.name);
  return n;
}

export function valuesEqual(ctx: BuiltinContext, a: Value, b: Value): boolean {
  if ((a.type === "Integer" || a.type === "Float") && (b.type === "Integer" || b.type === "Float")) {
    return a.value === b.value;
  }
  if (a.type === "Boolean" && b.type === "Boolean") return a.value === b.value;
  if (a.type === "Hex" && b.type === "Hex") return a.value.every((byte, i) => byte === b.value[i]);
  if (a.type === "List" && b.type === "List") {
    return a.items.length === b.items.length && a.items.every((item, i) => {
      const other = b.items[i];
      return other !== undefined && valuesEqual(ctx, item, other);
    });
  }
  throw invalidArgument(ctx.name);
}

function compare(test: (a: number, b: number) => boolean) {
  return (ctx: BuiltinContext, args: Value[]) => bool(test(num(ctx, args, 0), num(ctx, args, 1)));
}

function bitwise(op: (a: number, b: number) => number) {
  return (ctx: BuiltinContext, args: Value[]) => int(op(intArg(ctx, args, 0), intArg(ctx, args, 1)));
}

function range(inclusive: boolean) {
  return (ctx: BuiltinContext, args: Value[]): Value => {
    const a = arg(ctx, args, 0);
    const b = arg(ctx, args, 1);
    if (a.type !== b.type || (a.type !== "Integer" && a.type !== "Float")) throw invalidArgument(ctx.name);
    const make = a.type === "Integer" ? int : float;
    const from = Math.trunc(num(ctx, args, 0));
    const to = Math.trunc(num(ctx, args, 1)) + (inclusive ? 1 : 0);
    const items: Value[] = [];
    for (let i = from; i < to; i++) items.push(make(i));
    return list(items);
  };
}

export const OPERATORS: Builtin[] = [
  {
    name: "+",
    aliases: ["add"],
    arity: 2,
    run: (ctx, args) => numeric(ctx, args, { int: (a, b) => a + b, float: (a, b) => a + b }),
  },
  {
    name: "-",
    aliases: ["sub"],
    arity: 2,
    run: (ctx, args) => numeric(ctx, args, { int: (a, b) => a - b, float: (a, b) => a - b }),
  },
  {
    name: "*",
    aliases: ["mul"],
    arity: 2,
    run: (ctx, args) => numeric(ctx, args, { int: Math.imul, float: (a, b) => a * b }),
  },
  {
    name: "/",
    aliases: ["div"],
    arity: 2,
    run: (ctx, args) =>
      numeric(ctx, args, { int: (a, b) => Math.trunc(a / nonZero(ctx, b)), float: (a, b) => a / b }),
  },
  {
    name: "%",
    aliases: ["mod"],
    arity: 2,
    run: (ctx, args) => numeric(ctx, args, { int: (a, b) => a % nonZero(ctx, b), float: (a, b) => a % b }),
  },
  {
    name: "**",
    aliases: ["pow"],
    arity: 2,
    run: (ctx, args) => float(Math.pow(num(ctx, args, 0), num(ctx, args, 1))),
  },

  { name: "&", aliases: ["bitand"], arity: 2, run: bitwise((a, b) => a & b) },
  { name: "|", aliases: ["bitor"], arity: 2, run: bitwise((a, b) => a | b) },
  { name: "^", aliases: ["bitxor"], arity: 2, run: bitwise((a, b) => a ^ b) },
  { name: "<<", aliases: ["bitleft"], arity: 2, run: bitwise((a, b) => a << b) },
  { name: ">>", aliases: ["bitright"], arity: 2, run: bitwise((a, b) => a >> b) },

  {
    name: "==",
    aliases: ["eq"],
    arity: 2,
    run: (ctx, args) => bool(valuesEqual(ctx, arg(ctx, args, 0), arg(ctx, args, 1))),
  },
  {
    name: "!=",
    aliases: ["neq"],
    arity: 2,
    run: (ctx, args) => bool(!valuesEqual(ctx, arg(ctx, args, 0), arg(ctx, args, 1))),
  },
  { name: "<", aliases: ["lt"], arity: 2, run: compare((a, b) => a < b) },
  { name: "<=", aliases: ["lte"], arity: 2, run: compare((a, b) => a <= b) },
  { name: ">", aliases: ["gt"], arity: 2, run: compare((a, b) => a > b) },
  { name: ">=", aliases: ["gte"], arity: 2, run: compare((a, b) => a >= b) },

  {
    name: "&&",
    aliases: ["and"],
    arity: 2,
    run: (ctx, args) => bool(boolArg(ctx, args, 0) && boolArg(ctx, args, 1)),
  },
  {
    name: "||",
    aliases: ["or"],
    arity: 2,
    run: (ctx, args) => bool(boolArg(ctx, args, 0) || boolArg(ctx, args, 1)),
  },

  {
    name: "neg",
    arity: 1,
    run: (ctx, args) => {
      const v = arg(ctx, args, 0);
      if (v.type === "Integer") return int(-v.value);
      if (v.type === "Float") return float(-v.value);
      throw invalidArgument(ctx.name);
    },
  },
  { name: "!", aliases: ["not"], arity: 1, run: (ctx, args) => bool(!boolArg(ctx, args, 0)) },
  { name: "~", aliases: ["bitnot"], arity: 1, run: (ctx, args) => int(~intArg(ctx, args, 0)) },

  { name: "..", aliases: ["range"], arity: 2, run: range(false) },
  { name: "..=", aliases: ["rangei"], arity: 2, run: range(true) },
  {
    name: "++",
    aliases: ["concat"],
    arity: 2,
    run: (ctx, args) => list([...listArg(ctx, args, 0), ...listArg(ctx, args, 1)]),
  },

  {
    name: ":",
    aliases: ["compose"],
    arity: 2,
    run: (ctx, args) => shape(compose(shapeArg(ctx, args, 0), shapeArg(ctx, args, 1))),
  },
];
