import type { Builtin, BuiltinContext } from "./registry";
import { arg, num } from "./registry";
import { float, int, type Value } from "../value";
import { invalidArgument } from "../errors";

const unary =
  (fn: (x: number) => number) =>
  (ctx: BuiltinContext, args: Value[]): Value =>
    float(fn(num(ctx, args, 0)));

function pick(choose: (a: number, b: number) => number) {
  return (ctx: BuiltinContext, args: Value[]): Value => {
    const a = arg(ctx, args, 0);
    const b = arg(ctx, args, 1);
    const n = choose(num(ctx, args, 0), num(ctx, args, 1));
    return a.type === "Integer" && b.type === "Integer" ? int(n) : float(n);
  };
}

export const MATH: Builtin[] = [
  { name: "pi", aliases: ["π"], arity: 0, run: () => float(Math.PI) },

  { name: "sin", arity: 1, run: unary(Math.sin) },
  { name: "cos", arity: 1, run: unary(Math.cos) },
  { name: "tan", arity: 1, run: unary(Math.tan) },
  { name: "asin", arity: 1, run: unary(Math.asin) },
  { name: "acos", arity: 1, run: unary(Math.acos) },
  { name: "atan", arity: 1, run: unary(Math.atan) },
  {
    name: "atan2",
    arity: 2,
    run: (ctx, args) => float(Math.atan2(num(ctx, args, 0), num(ctx, args, 1))),
  },
  { name: "sinh", arity: 1, run: unary(Math.sinh) },
  { name: "cosh", arity: 1, run: unary(Math.cosh) },
  { name: "tanh", arity: 1, run: unary(Math.tanh) },
  { name: "asinh", arity: 1, run: unary(Math.asinh) },
  { name: "acosh", arity: 1, run: unary(Math.acosh) },
  { name: "atanh", arity: 1, run: unary(Math.atanh) },

  { name: "ln", arity: 1, run: unary(Math.log) },
  { name: "log10", arity: 1, run: unary(Math.log10) },
  {
    name: "log",
    arity: 2,
    run: (ctx, args) => float(Math.log(num(ctx, args, 0)) / Math.log(num(ctx, args, 1))),
  },
  { name: "sqrt", arity: 1, run: unary(Math.sqrt) },
  { name: "deg_to_rad", arity: 1, run: unary((x) => (x * Math.PI) / 180) },
  { name: "rad_to_deg", arity: 1, run: unary((x) => (x * 180) / Math.PI) },

  { name: "floor", arity: 1, run: (ctx, args) => int(Math.floor(num(ctx, args, 0))) },
  { name: "ceil", arity: 1, run: (ctx, args) => int(Math.ceil(num(ctx, args, 0))) },
  { name: "int", arity: 1, run: (ctx, args) => int(Math.trunc(num(ctx, args, 0))) },
  { name: "float", arity: 1, run: (ctx, args) => float(num(ctx, args, 0)) },
  {
    name: "abs",
    arity: 1,
    run: (ctx, args) => {
      const v = arg(ctx, args, 0);
      if (v.type === "Integer") return int(Math.abs(v.value));
      if (v.type === "Float") return float(Math.abs(v.value));
      throw invalidArgument(ctx.name);
    },
  },
  { name: "min", arity: 2, run: pick(Math.min) },
  { name: "max", arity: 2, run: pick(Math.max) },
];
