// ============================================================================
// Transform
// ============================================================================

/** Affine map: x' = sx·x + kx·y + tx, y' = ky·x + sy·y + ty. */
export interface Transform {
  readonly sx: number;
  readonly kx: number;
  readonly ky: number;
  readonly sy: number;
  readonly tx: number;
  readonly ty: number;
}

export const IDENTITY: Transform = { sx: 1, kx: 0, ky: 0, sy: 1, tx: 0, ty: 0 };

/** `a ∘ b`: applies `b` first, then `a`. */
function multiply(a: Transform, b: Transform): Transform {
  return {
    sx: a.sx * b.sx + a.kx * b.ky,
    kx: a.sx * b.kx + a.kx * b.sy,
    ky: a.ky * b.sx + a.sy * b.ky,
    sy: a.ky * b.kx + a.sy * b.sy,
    tx: a.sx * b.tx + a.kx * b.ty + a.tx,
    ty: a.ky * b.tx + a.sy * b.ty + a.ty,
  };
}

export const Transforms = {
  translate: (tx: number, ty: number): Transform => ({ ...IDENTITY, tx, ty }),
  scale: (sx: number, sy: number): Transform => ({ ...IDENTITY, sx, sy }),
  skew: (kx: number, ky: number): Transform => ({ ...IDENTITY, kx, ky }),

  rotate(degrees: number): Transform {
    const rad = (degrees * Math.PI) / 180;
    const sin = Math.sin(rad);
    const cos = Math.cos(rad);
    return { sx: cos, kx: -sin, ky: sin, sy: cos, tx: 0, ty: 0 };
  },

  rotateAt(degrees: number, x: number, y: number): Transform {
    return multiply(
      Transforms.translate(x, y),
      multiply(Transforms.rotate(degrees), Transforms.translate(-x, -y)),
    );
  },

  /** Result applies `t` first, then `next`. */
  postConcat(t: Transform, next: Transform): Transform {
    return multiply(next, t);
  },

  invert(t: Transform): Transform | null {
    const det = t.sx * t.sy - t.kx * t.ky;
    if (det === 0 || !Number.isFinite(det)) return null;
    const inv = 1 / det;
    return {
      sx: t.sy * inv,
      kx: -t.kx * inv,
      ky: -t.ky * inv,
      sy: t.sx * inv,
      tx: (t.kx * t.ty - t.sy * t.tx) * inv,
      ty: (t.ky * t.tx - t.sx * t.ty) * inv,
    };
  },

  apply(t: Transform, x: number, y: number): [number, number] {
    return [t.sx * x + t.kx * y + t.tx, t.ky * x + t.sy * y + t.ty];
  },
};

// ============================================================================
// Color
// ============================================================================

/** Hue in degrees; saturation, lightness and alpha nominally in [0, 1]. */
export interface Hsla {
  readonly h: number;
  readonly s: number;
  readonly l: number;
  readonly a: number;
}

export const WHITE: Hsla = { h: 360, s: 1, l: 1, a: 1 };
export const TRANSPARENT: Hsla = { h: 0, s: 0, l: 0, a: 0 };

const clamp01 = (n: number) => (Number.isNaN(n) ? 0 : Math.min(1, Math.max(0, n)));

export function hslaToRgba(c: Hsla): [number, number, number, number] {
  const h = (((c.h % 360) + 360) % 360) / 60;
  const s = clamp01(c.s);
  const l = clamp01(c.l);
  const chroma = (1 - Math.abs(2 * l - 1)) * s;
  const x = chroma * (1 - Math.abs((h % 2) - 1));
  const m = l - chroma / 2;

  let rgb: [number, number, number];
  if (h < 1) rgb = [chroma, x, 0];
  else if (h < 2) rgb = [x, chroma, 0];
  else if (h < 3) rgb = [0, chroma, x];
  else if (h < 4) rgb = [0, x, chroma];
  else if (h < 5) rgb = [x, 0, chroma];
  else rgb = [chroma, 0, x];

  return [rgb[0] + m, rgb[1] + m, rgb[2] + m, clamp01(c.a)];
}

export function rgbToHsl(r8: number, g8: number, b8: number): { h: number; s: number; l: number } {
  const r = r8 / 255;
  const g = g8 / 255;
  const b = b8 / 255;
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const l = (max + min) / 2;
  const d = max - min;
  if (d === 0) return { h: 0, s: 0, l };

  const s = d / (1 - Math.abs(2 * l - 1));
  let h: number;
  if (max === r) h = 60 * (((g - b) / d) % 6);
  else if (max === g) h = 60 * ((b - r) / d + 2);
  else h = 60 * ((r - g) / d + 4);
  if (h < 0) h += 360;
  return { h, s, l };
}

// ============================================================================
// Shapes
// ============================================================================

export type BasicShape =
  | {
      readonly type: "Square";
      readonly x: number;
      readonly y: number;
      readonly width: number;
      readonly height: number;
      readonly transform: Transform;
      readonly color: Hsla;
    }
  | {
      readonly type: "Circle";
      readonly x: number;
      readonly y: number;
      readonly radius: number;
      readonly transform: Transform;
      readonly color: Hsla;
    }
  | {
      readonly type: "Triangle";
      readonly points: readonly number[];
      readonly transform: Transform;
      readonly color: Hsla;
    }
  | { readonly type: "Fill"; readonly color: Hsla }
  | { readonly type: "Empty" };

export type Shape =
  | { readonly type: "Basic"; readonly basic: BasicShape }
  | {
      readonly type: "Composite";
      readonly a: Shape;
      readonly b: Shape;
      readonly transform: Transform;
      readonly color: Hsla;
    }
  | {
      readonly type: "Collection";
      readonly shapes: readonly Shape[];
      readonly transform: Transform;
      readonly color: Hsla;
    };

export type ShapeConstant = "SQUARE" | "CIRCLE" | "TRIANGLE" | "FILL" | "EMPTY";

export const SHAPE_CONSTANTS: readonly ShapeConstant[] = ["SQUARE", "CIRCLE", "TRIANGLE", "FILL", "EMPTY"];

const TRIANGLE_POINTS = [-1, 0.577350269, 1, 0.577350269, 0, -1.154700538] as const;

export function basicShape(kind: ShapeConstant): Shape {
  switch (kind) {
    case "SQUARE":
      return {
        type: "Basic",
        basic: { type: "Square", x: -1, y: -1, width: 2, height: 2, transform: IDENTITY, color: WHITE },
      };
    case "CIRCLE":
      return {
        type: "Basic",
        basic: { type: "Circle", x: 0, y: 0, radius: 1, transform: IDENTITY, color: WHITE },
      };
    case "TRIANGLE":
      return {
        type: "Basic",
        basic: { type: "Triangle", points: TRIANGLE_POINTS, transform: IDENTITY, color: WHITE },
      };
    case "FILL":
      return { type: "Basic", basic: { type: "Fill", color: WHITE } };
    case "EMPTY":
      return { type: "Basic", basic: { type: "Empty" } };
  }
}

export function compose(a: Shape, b: Shape): Shape {
  return { type: "Composite", a, b, transform: IDENTITY, color: TRANSPARENT };
}

export function collect(shapes: readonly Shape[]): Shape {
  return { type: "Collection", shapes, transform: IDENTITY, color: TRANSPARENT };
}

/** Post-concatenates `t` onto the shape's own transform. Fill and Empty are unaffected. */
export function transformShape(shape: Shape, t: Transform): Shape {
  if (shape.type === "Basic") {
    const basic = shape.basic;
    if (basic.type === "Fill" || basic.type === "Empty") return shape;
    return { type: "Basic", basic: { ...basic, transform: Transforms.postConcat(basic.transform, t) } };
  }
  return { ...shape, transform: Transforms.postConcat(shape.transform, t) };
}

/** Rewrites the color of every basic shape in the tree. Empty is unaffected. */
export function recolor(shape: Shape, fn: (c: Hsla) => Hsla): Shape {
  switch (shape.type) {
    case "Basic": {
      const basic = shape.basic;
      if (basic.type === "Empty") return shape;
      return { type: "Basic", basic: { ...basic, color: fn(basic.color) } };
    }
    case "Composite":
      return { ...shape, a: recolor(shape.a, fn), b: recolor(shape.b, fn) };
    case "Collection":
      return { ...shape, shapes: shape.shapes.map((s) => recolor(s, fn)) };
  }
}

/** Sets the overlay of a composite or collection; on a basic shape it replaces the color. */
export function tint(shape: Shape, color: Hsla): Shape {
  if (shape.type === "Basic") return recolor(shape, () => color);
  return { ...shape, color };
}
