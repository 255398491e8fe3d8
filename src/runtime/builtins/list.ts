import type { Builtin } from "./registry";
import { intArg, listArg } from "./registry";
import { int, list } from "../value";
import { outOfBounds } from "../errors";

export const LISTS: Builtin[] = [
  { name: "length", arity: 1, run: (ctx, args) => int(listArg(ctx, args, 0).length) },
  {
    name: "nth",
    arity: 2,
    run: (ctx, args) => {
      const item = listArg(ctx, args, 0)[intArg(ctx, args, 1)];
      if (item === undefined) throw outOfBounds();
      return item;
    },
  },
  {
    name: "head",
    arity: 1,
    run: (ctx, args) => {
      const item = listArg(ctx, args, 0)[0];
      if (item === undefined) throw outOfBounds();
      return item;
    },
  },
  {
    name: "last",
    arity: 1,
    run: (ctx, args) => {
      const items = listArg(ctx, args, 0);
      const item = items[items.length - 1];
      if (item === undefined) throw outOfBounds();
      return item;
    },
  },
  {
    name: "tail",
    arity: 1,
    run: (ctx, args) => {
      const items = listArg(ctx, args, 0);
      if (items.length === 0) throw outOfBounds();
      return list(items.slice(1));
    },
  },
  { name: "reverse", arity: 1, run: (ctx, args) => list([...listArg(ctx, args, 0)].reverse()) },
];
