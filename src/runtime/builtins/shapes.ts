import type { Builtin } from "./registry";
import { hexArg, listArg, num, shapeArg } from "./registry";
import {
  collect,
  recolor,
  rgbToHsl,
  tint,
  transformShape,
  Transforms,
  type Hsla,
  type Shape,
  type Transform,
} from "../shape";
import { shape } from "../value";
import { ScriptError } from "../errors";

// ============================================================================
// Transforms
// ============================================================================

/** Builtin whose numeric arguments build a transform; the shape is the last argument. */
function transform(
  name: string,
  aliases: string[],
  numbers: number,
  build: (n: number[]) => Transform,
): Builtin {
  return {
    name,
    aliases,
    arity: numbers + 1,
    run: (ctx, args) => {
      const n = Array.from({ length: numbers }, (_, i) => num(ctx, args, i));
      return shape(transformShape(shapeArg(ctx, args, numbers), build(n)));
    },
  };
}

const at = (n: number[], i: number) => n[i] ?? 0;

function flip(degrees: number): Transform {
  let t = Transforms.rotate(degrees);
  t = Transforms.postConcat(t, Transforms.scale(-1, 1));
  return Transforms.postConcat(t, Transforms.rotate(-degrees));
}

export const TRANSFORMS: Builtin[] = [
  transform("t", ["translate"], 2, (n) => Transforms.translate(at(n, 0), at(n, 1))),
  transform("tx", ["translatex"], 1, (n) => Transforms.translate(at(n, 0), 0)),
  transform("ty", ["translatey"], 1, (n) => Transforms.translate(0, at(n, 0))),
  transform("tt", ["translateb"], 1, (n) => Transforms.translate(at(n, 0), at(n, 0))),

  transform("r", ["rotate"], 1, (n) => Transforms.rotate(at(n, 0))),
  transform("ra", ["rotate_at"], 3, (n) => Transforms.rotateAt(at(n, 0), at(n, 1), at(n, 2))),

  transform("s", ["scale"], 2, (n) => Transforms.scale(at(n, 0), at(n, 1))),
  transform("sx", ["scalex"], 1, (n) => Transforms.scale(at(n, 0), 1)),
  transform("sy", ["scaley"], 1, (n) => Transforms.scale(1, at(n, 0))),
  transform("ss", ["scaleb"], 1, (n) => Transforms.scale(at(n, 0), at(n, 0))),

  transform("k", ["skew"], 2, (n) => Transforms.skew(at(n, 0), at(n, 1))),
  transform("kx", ["skewx"], 1, (n) => Transforms.skew(at(n, 0), 0)),
  transform("ky", ["skewy"], 1, (n) => Transforms.skew(0, at(n, 0))),
  transform("kk", ["skewb"], 1, (n) => Transforms.skew(at(n, 0), at(n, 0))),

  transform("f", ["flip"], 1, (n) => flip(at(n, 0))),
  transform("fh", ["fliph"], 0, () => Transforms.scale(-1, 1)),
  transform("fv", ["flipv"], 0, () => Transforms.scale(1, -1)),
  transform("fd", ["flipd"], 0, () => Transforms.scale(-1, -1)),
];

// ============================================================================
// Colors
// ============================================================================

function color(
  name: string,
  aliases: string[],
  numbers: number,
  update: (c: Hsla, n: number[]) => Hsla,
): Builtin {
  return {
    name,
    aliases,
    arity: numbers + 1,
    run: (ctx, args) => {
      const n = Array.from({ length: numbers }, (_, i) => num(ctx, args, i));
      return shape(recolor(shapeArg(ctx, args, numbers), (c) => update(c, n)));
    },
  };
}

export const COLORS: Builtin[] = [
  color("hsl", [], 3, (c, n) => ({ ...c, h: at(n, 0), s: at(n, 1), l: at(n, 2) })),
  color("hsla", [], 4, (_c, n) => ({ h: at(n, 0), s: at(n, 1), l: at(n, 2), a: at(n, 3) })),

  color("h", ["hue"], 1, (c, n) => ({ ...c, h: at(n, 0) })),
  color("sat", ["saturation"], 1, (c, n) => ({ ...c, s: at(n, 0) })),
  color("l", ["lightness"], 1, (c, n) => ({ ...c, l: at(n, 0) })),
  color("a", ["alpha"], 1, (c, n) => ({ ...c, a: at(n, 0) })),

  color("hshift", [], 1, (c, n) => ({ ...c, h: c.h + at(n, 0) })),
  color("sshift", ["satshift"], 1, (c, n) => ({ ...c, s: c.s + at(n, 0) })),
  color("lshift", [], 1, (c, n) => ({ ...c, l: c.l + at(n, 0) })),
  color("ashift", [], 1, (c, n) => ({ ...c, a: c.a + at(n, 0) })),

  {
    name: "hex",
    arity: 2,
    run: (ctx, args) => {
      const [r, g, b] = hexArg(ctx, args, 0);
      const hsl = rgbToHsl(r, g, b);
      return shape(recolor(shapeArg(ctx, args, 1), (c) => ({ ...c, ...hsl })));
    },
  },
  {
    name: "tint",
    arity: 5,
    run: (ctx, args) => {
      const overlay: Hsla = { h: num(ctx, args, 0), s: num(ctx, args, 1), l: num(ctx, args, 2), a: num(ctx, args, 3) };
      return shape(tint(shapeArg(ctx, args, 4), overlay));
    },
  },
];

// ============================================================================
// Shapes
// ============================================================================

export const SHAPES: Builtin[] = [
  {
    name: "collect",
    arity: 1,
    run: (ctx, args) => {
      const items = listArg(ctx, args, 0);
      if (items.length === 0) throw new ScriptError("InvalidArgument", "Cannot collect zero shapes.");
      const shapes: Shape[] = items.map((_, i) => shapeArg(ctx, items, i));
      return shape(collect(shapes));
    },
  },
];
