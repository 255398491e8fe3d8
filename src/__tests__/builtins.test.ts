import { describe, expect, it } from "vitest";
import { createDefaultRegistry, BuiltinRegistry } from "../runtime/builtins";
import { Cache } from "../runtime/cache";
import { seedFromString } from "../runtime/generate";
import { basicShape, compose, type Shape } from "../runtime/shape";
import { bool, float, hex, int, list, shape, type Value } from "../runtime/value";
import { isScriptError, type ErrorKind } from "../runtime/errors";

const registry = createDefaultRegistry();

function run(name: string, ...args: Value[]): Value {
  const cache = Cache.create(seedFromString("test-seed"));
  return registry.get(name).run({ name, cache }, args);
}

function kindOf(fn: () => unknown): ErrorKind | null {
  try {
    fn();
  } catch (e: unknown) {
    if (isScriptError(e)) return e.kind;
    throw e;
  }
  return null;
}

function shapeOf(v: Value): Shape {
  if (v.type !== "Shape") throw new Error(`expected a shape, got ${v.type}`);
  return v.shape;
}

function basicOf(v: Value) {
  const s = shapeOf(v);
  if (s.type !== "Basic") throw new Error(`expected a basic shape, got ${s.type}`);
  return s.basic;
}

const SQUARE = shape(basicShape("SQUARE"));
const CIRCLE = shape(basicShape("CIRCLE"));

describe("BuiltinRegistry", () => {
  it("resolves aliases to the same builtin", () => {
    expect(registry.get("translatex")).toBe(registry.get("tx"));
    expect(registry.get("π")).toBe(registry.get("pi"));
  });

  it("rejects duplicate names", () => {
    const local = new BuiltinRegistry();
    local.register({ name: "twice", arity: 0, run: () => int(2) });
    expect(() => local.register({ name: "other", aliases: ["twice"], arity: 0, run: () => int(2) })).toThrow(
      "Builtin already registered: twice",
    );
  });

  it("reports unknown names", () => {
    expect(kindOf(() => registry.get("nope"))).toBe("UnknownFunction");
  });
});

describe("operators", () => {
  it("keeps integer arithmetic integral", () => {
    expect(run("+", int(2), int(3))).toEqual(int(5));
    expect(run("/", int(7), int(2))).toEqual(int(3));
    expect(run("/", int(-7), int(2))).toEqual(int(-3));
    expect(run("%", int(-7), int(3))).toEqual(int(-1));
    expect(run("*", int(65536), int(65536))).toEqual(int(0));
  });

  it("promotes mixed arithmetic to float", () => {
    expect(run("+", int(3), float(0.5))).toEqual(float(3.5));
    expect(run("**", int(2), int(10))).toEqual(float(1024));
  });

  it("rejects integer division by zero", () => {
    expect(() => run("/", int(1), int(0))).toThrow("Invalid argument passed to `/` function.");
    expect(kindOf(() => run("%", int(1), int(0)))).toBe("InvalidArgument");
  });

  it("works bitwise on integers", () => {
    expect(run("<<", int(1), int(4))).toEqual(int(16));
    expect(run("^", int(6), int(3))).toEqual(int(5));
    expect(run("~", int(0))).toEqual(int(-1));
  });

  it("compares numbers across types and lists by item", () => {
    expect(run("==", int(1), float(1))).toEqual(bool(true));
    expect(run("!=", list([int(1), int(2)]), list([int(1), int(2)]))).toEqual(bool(false));
    expect(run("<", int(1), float(1.5))).toEqual(bool(true));
    expect(kindOf(() => run("==", SQUARE, SQUARE))).toBe("InvalidArgument");
  });

  it("builds ranges", () => {
    expect(run("..", int(0), int(3))).toEqual(list([int(0), int(1), int(2)]));
    expect(run("..=", int(1), int(3))).toEqual(list([int(1), int(2), int(3)]));
    expect(run("..", float(0.5), float(2.7))).toEqual(list([float(0), float(1)]));
    expect(run("..", int(3), int(1))).toEqual(list([]));
    expect(kindOf(() => run("..", int(0), float(2)))).toBe("InvalidArgument");
  });

  it("concatenates lists and composes shapes", () => {
    expect(run("++", list([int(1)]), list([int(2)]))).toEqual(list([int(1), int(2)]));
    expect(kindOf(() => run("++", list([int(1)]), list([bool(true)])))).toBe("InvalidList");
    expect(shapeOf(run(":", SQUARE, CIRCLE))).toEqual(compose(basicShape("SQUARE"), basicShape("CIRCLE")));
  });

  it("negates and inverts", () => {
    expect(run("neg", float(2))).toEqual(float(-2));
    expect(run("!", bool(false))).toEqual(bool(true));
    expect(kindOf(() => run("neg", bool(true)))).toBe("InvalidArgument");
  });
});

describe("math", () => {
  it("rounds to integers", () => {
    expect(run("floor", float(2.7))).toEqual(int(2));
    expect(run("ceil", float(2.1))).toEqual(int(3));
    expect(run("int", float(-2.7))).toEqual(int(-2));
  });

  it("keeps the operand type where it can", () => {
    expect(run("abs", int(-4))).toEqual(int(4));
    expect(run("min", int(3), int(5))).toEqual(int(3));
    expect(run("max", int(3), float(2.5))).toEqual(float(3));
    expect(run("sqrt", int(16))).toEqual(float(4));
    expect(run("pi")).toEqual(float(Math.PI));
  });
});

describe("lists", () => {
  const xs = list([int(4), int(5), int(6)]);

  it("reads items", () => {
    expect(run("length", xs)).toEqual(int(3));
    expect(run("nth", xs, int(1))).toEqual(int(5));
    expect(run("head", xs)).toEqual(int(4));
    expect(run("last", xs)).toEqual(int(6));
    expect(run("tail", xs)).toEqual(list([int(5), int(6)]));
    expect(run("reverse", xs)).toEqual(list([int(6), int(5), int(4)]));
  });

  it("reports missing items", () => {
    expect(kindOf(() => run("nth", xs, int(3)))).toBe("OutOfBounds");
    expect(kindOf(() => run("head", list([])))).toBe("OutOfBounds");
    expect(kindOf(() => run("tail", list([])))).toBe("OutOfBounds");
  });
});

describe("random", () => {
  it("checks bounds", () => {
    expect(kindOf(() => run("rand_range", float(1), float(1)))).toBe("InvalidArgument");
    expect(run("randi_rangei", int(2), int(2))).toEqual(int(2));
  });

  it("chooses from a list", () => {
    expect(run("choose", list([int(7)]))).toEqual(int(7));
    expect(kindOf(() => run("choose", list([])))).toBe("OutOfBounds");
  });

  it("shuffles without losing items", () => {
    const shuffled = run("shuffle", list([int(1), int(2), int(3), int(4)]));
    if (shuffled.type !== "List") throw new Error("expected a list");
    expect(shuffled.items.map((v) => (v.type === "Integer" ? v.value : NaN)).sort()).toEqual([1, 2, 3, 4]);
  });

  it("flags every generator builtin as random", () => {
    for (const name of ["rand", "randi", "rand_range", "randi_range", "shuffle", "choose"]) {
      expect(registry.get(name).random).toBe(true);
    }
  });
});

describe("transforms", () => {
  it("post-concatenates onto the shape's transform", () => {
    const moved = basicOf(run("tx", float(2), SQUARE));
    expect(moved.type === "Square" && moved.transform).toEqual({ sx: 1, kx: 0, ky: 0, sy: 1, tx: 2, ty: 0 });

    const scaledThenMoved = basicOf(run("tx", int(1), run("ss", int(3), SQUARE)));
    expect(scaledThenMoved.type === "Square" && scaledThenMoved.transform).toEqual({
      sx: 3,
      kx: 0,
      ky: 0,
      sy: 3,
      tx: 1,
      ty: 0,
    });
  });

  it("flips horizontally", () => {
    const flipped = basicOf(run("fh", SQUARE));
    expect(flipped.type === "Square" && flipped.transform.sx).toBe(-1);
  });

  it("leaves fills untouched", () => {
    const fill = shape(basicShape("FILL"));
    expect(run("r", int(45), fill)).toEqual(fill);
  });
});

describe("colors", () => {
  it("sets channels on every basic shape", () => {
    const pair = shapeOf(run("hsl", int(120), float(0.5), float(0.25), run(":", SQUARE, CIRCLE)));
    if (pair.type !== "Composite") throw new Error("expected a composite");
    for (const child of [pair.a, pair.b]) {
      expect(child.type === "Basic" && child.basic.type !== "Empty" && child.basic.color).toEqual({
        h: 120,
        s: 0.5,
        l: 0.25,
        a: 1,
      });
    }
  });

  it("shifts channels additively", () => {
    const shifted = basicOf(run("hshift", int(30), SQUARE));
    expect(shifted.type === "Square" && shifted.color.h).toBe(390);
  });

  it("reads hex colors", () => {
    const red = basicOf(run("hex", hex([255, 0, 0]), SQUARE));
    expect(red.type === "Square" && red.color).toEqual({ h: 0, s: 1, l: 0.5, a: 1 });
  });

  it("tints groups with an overlay and basics with a color", () => {
    const overlay = { h: 10, s: 0.5, l: 0.5, a: 0.25 };
    const group = shapeOf(run("tint", int(10), float(0.5), float(0.5), float(0.25), run(":", SQUARE, CIRCLE)));
    expect(group.type === "Composite" && group.color).toEqual(overlay);

    const single = basicOf(run("tint", int(10), float(0.5), float(0.5), float(0.25), SQUARE));
    expect(single.type === "Square" && single.color).toEqual(overlay);
  });
});

describe("collect", () => {
  it("gathers shapes in order", () => {
    const group = shapeOf(run("collect", list([SQUARE, CIRCLE])));
    expect(group.type === "Collection" && group.shapes).toEqual([basicShape("SQUARE"), basicShape("CIRCLE")]);
  });

  it("needs at least one shape", () => {
    expect(() => run("collect", list([]))).toThrow("Cannot collect zero shapes.");
    expect(kindOf(() => run("collect", list([int(1)])))).toBe("InvalidArgument");
  });
});
