import { hslaToRgba, IDENTITY, Transforms, type BasicShape, type Hsla, type Shape, type Transform } from "../runtime/shape";

export interface Pixmap {
  width: number;
  height: number;
  /** RGBA, straight alpha, row-major from the top-left. */
  data: Uint8ClampedArray;
}

export interface Rasterizer {
  render(shape: Shape, width: number, height: number): Pixmap;
}

export type Rgba = [number, number, number, number];

export type Primitive =
  | { type: "Fill"; color: Rgba }
  | { type: "Geometry"; basic: Exclude<BasicShape, { type: "Fill" | "Empty" }>; transform: Transform; color: Rgba };

/** Mixes an overlay color over a resolved color by the overlay's alpha. */
function overlay(color: Rgba, tint: Hsla): Rgba {
  const [r, g, b] = hslaToRgba(tint);
  const t = Math.min(1, Math.max(0, tint.a));
  return [color[0] + (r - color[0]) * t, color[1] + (g - color[1]) * t, color[2] + (b - color[2]) * t, color[3]];
}

/**
 * Flattens a shape tree into draw order. A child's transform is applied
 * before its parent's; overlays apply innermost first.
 */
export function flatten(shape: Shape, parent: Transform = IDENTITY, tints: Hsla[] = []): Primitive[] {
  const resolve = (c: Hsla): Rgba => tints.reduce<Rgba>((acc, t) => overlay(acc, t), hslaToRgba(c));

  switch (shape.type) {
    case "Basic": {
      const basic = shape.basic;
      if (basic.type === "Empty") return [];
      if (basic.type === "Fill") return [{ type: "Fill", color: resolve(basic.color) }];
      return [
        {
          type: "Geometry",
          basic,
          transform: Transforms.postConcat(basic.transform, parent),
          color: resolve(basic.color),
        },
      ];
    }
    case "Composite":
    case "Collection": {
      const transform = Transforms.postConcat(shape.transform, parent);
      const inner = shape.color.a > 0 ? [shape.color, ...tints] : tints;
      const children = shape.type === "Composite" ? [shape.a, shape.b] : shape.shapes;
      return children.flatMap((child) => flatten(child, transform, inner));
    }
  }
}

function contains(basic: Exclude<BasicShape, { type: "Fill" | "Empty" }>, x: number, y: number): boolean {
  switch (basic.type) {
    case "Square":
      return x >= basic.x && x <= basic.x + basic.width && y >= basic.y && y <= basic.y + basic.height;
    case "Circle": {
      const dx = x - basic.x;
      const dy = y - basic.y;
      return dx * dx + dy * dy <= basic.radius * basic.radius;
    }
    case "Triangle": {
      const [x1 = 0, y1 = 0, x2 = 0, y2 = 0, x3 = 0, y3 = 0] = basic.points;
      const d1 = (x - x2) * (y1 - y2) - (x1 - x2) * (y - y2);
      const d2 = (x - x3) * (y2 - y3) - (x2 - x3) * (y - y3);
      const d3 = (x - x1) * (y3 - y1) - (x3 - x1) * (y - y1);
      const negative = d1 < 0 || d2 < 0 || d3 < 0;
      const positive = d1 > 0 || d2 > 0 || d3 > 0;
      return !(negative && positive);
    }
  }
}

function localBounds(basic: Exclude<BasicShape, { type: "Fill" | "Empty" }>): [number, number][] {
  switch (basic.type) {
    case "Square":
      return [
        [basic.x, basic.y],
        [basic.x + basic.width, basic.y],
        [basic.x, basic.y + basic.height],
        [basic.x + basic.width, basic.y + basic.height],
      ];
    case "Circle": {
      const r = basic.radius;
      return [
        [basic.x - r, basic.y - r],
        [basic.x + r, basic.y - r],
        [basic.x - r, basic.y + r],
        [basic.x + r, basic.y + r],
      ];
    }
    case "Triangle": {
      const [x1 = 0, y1 = 0, x2 = 0, y2 = 0, x3 = 0, y3 = 0] = basic.points;
      return [
        [x1, y1],
        [x2, y2],
        [x3, y3],
      ];
    }
  }
}

/**
 * Point-sampling renderer: each pixel centre is mapped back into the
 * primitive's local space and tested. No anti-aliasing.
 */
export class PointRasterizer implements Rasterizer {
  render(shape: Shape, width: number, height: number): Pixmap {
    // Premultiplied accumulation buffer.
    const acc = new Float64Array(width * height * 4);
    const canvas = Transforms.postConcat(Transforms.scale(1, -1), Transforms.translate(width / 2, height / 2));

    for (const prim of flatten(shape)) {
      if (prim.type === "Fill") {
        for (let i = 0; i < width * height; i++) blend(acc, i * 4, prim.color);
        continue;
      }

      const total = Transforms.postConcat(prim.transform, canvas);
      const inverse = Transforms.invert(total);
      if (inverse === null) continue;

      const corners = localBounds(prim.basic).map(([x, y]) => Transforms.apply(total, x, y));
      const xs = corners.map(([x]) => x);
      const ys = corners.map(([, y]) => y);
      const x0 = Math.max(0, Math.floor(Math.min(...xs)));
      const x1 = Math.min(width - 1, Math.ceil(Math.max(...xs)));
      const y0 = Math.max(0, Math.floor(Math.min(...ys)));
      const y1 = Math.min(height - 1, Math.ceil(Math.max(...ys)));

      for (let py = y0; py <= y1; py++) {
        for (let px = x0; px <= x1; px++) {
          const [lx, ly] = Transforms.apply(inverse, px + 0.5, py + 0.5);
          if (contains(prim.basic, lx, ly)) blend(acc, (py * width + px) * 4, prim.color);
        }
      }
    }

    const data = new Uint8ClampedArray(width * height * 4);
    for (let i = 0; i < acc.length; i += 4) {
      const a = acc[i + 3] ?? 0;
      if (a <= 0) continue;
      data[i] = Math.round(((acc[i] ?? 0) / a) * 255);
      data[i + 1] = Math.round(((acc[i + 1] ?? 0) / a) * 255);
      data[i + 2] = Math.round(((acc[i + 2] ?? 0) / a) * 255);
      data[i + 3] = Math.round(a * 255);
    }
    return { width, height, data };
  }
}

/** Source-over onto a premultiplied pixel. */
function blend(acc: Float64Array, i: number, [r, g, b, a]: Rgba): void {
  const keep = 1 - a;
  acc[i] = r * a + (acc[i] ?? 0) * keep;
  acc[i + 1] = g * a + (acc[i + 1] ?? 0) * keep;
  acc[i + 2] = b * a + (acc[i + 2] ?? 0) * keep;
  acc[i + 3] = a + (acc[i + 3] ?? 0) * keep;
}
