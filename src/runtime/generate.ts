import { createHash } from "node:crypto";
import path from "node:path";
import { parse } from "../dsl/parser";
import { VM } from "../dsl/vm";
import type { Tree } from "../dsl/ast";
import { createDefaultRegistry } from "./builtins";
import type { VMConfig } from "./config";
import type { RunLogger } from "./logger";
import type { Shape } from "./shape";
import { PointRasterizer, type Pixmap, type Rasterizer } from "../render/rasterizer";

export interface GenerateRequest {
  width: number;
  height: number;
  /** Seed text; hashed to the 32-byte generator seed. Omit for OS entropy. */
  seed?: string;
  vm?: Partial<VMConfig>;
  rasterizer?: Rasterizer;
  logger?: RunLogger;
  /** Name recorded in the run log. */
  file?: string;
}

export interface GenerateResult {
  tree: Tree;
  shape: Shape;
  pixmap: Pixmap;
}

export function seedFromString(text: string): Uint8Array {
  return new Uint8Array(createHash("sha256").update(text, "utf8").digest());
}

/** Parses, reduces and renders one image. */
export async function generate(source: string, request: GenerateRequest): Promise<GenerateResult> {
  const { logger } = request;
  const tree = parse(source);
  await logger?.append({ type: "parse", file: request.file ?? "<source>", definitions: tree.length });

  const vm = new VM(createDefaultRegistry(), request.vm ?? {}, logger);
  const shape = await vm.reduce(tree, request.seed === undefined ? undefined : seedFromString(request.seed));
  if (logger) {
    await logger.append({ type: "reduce", seed: request.seed ?? "<random>", stats: logger.tracker.getSnapshot() });
  }

  const rasterizer = request.rasterizer ?? new PointRasterizer();
  const pixmap = rasterizer.render(shape, request.width, request.height);
  await logger?.append({ type: "render", width: request.width, height: request.height });

  return { tree, shape, pixmap };
}

/** Output path of image `index`; with more than one image the index joins the stem. */
export function outputPath(file: string, out: string | undefined, index: number, count: number): string {
  const target = out ?? `${path.basename(file, path.extname(file))}.png`;
  if (count <= 1) return target;
  const ext = path.extname(target) || ".png";
  return path.join(path.dirname(target), `${path.basename(target, ext)}_${index}${ext}`);
}
