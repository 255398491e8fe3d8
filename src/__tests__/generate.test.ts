import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { generate, outputPath, seedFromString } from "../runtime/generate";
import { RunLogger, readEvents } from "../runtime/logger";
import { basicShape } from "../runtime/shape";

let baseDir: string;

beforeEach(async () => {
  baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "shapeforge-gen-"));
});

afterEach(async () => {
  await fs.rm(baseDir, { recursive: true, force: true });
});

describe("seedFromString", () => {
  it("hashes text to a 32-byte seed", () => {
    const seed = seedFromString("test-seed");
    expect(seed).toHaveLength(32);
    expect(seedFromString("test-seed")).toEqual(seed);
    expect(seedFromString("other-seed")).not.toEqual(seed);
  });
});

describe("generate", () => {
  it("parses, reduces and renders with a run log", async () => {
    const logger = new RunLogger(baseDir);
    await logger.init();
    const result = await generate("root = SQUARE", { width: 4, height: 4, seed: "test-seed", logger, file: "sq.sf" });

    expect(result.tree).toHaveLength(1);
    expect(result.shape).toEqual(basicShape("SQUARE"));
    expect(result.pixmap.width).toBe(4);
    expect(result.pixmap.data).toHaveLength(64);

    const events = await readEvents(baseDir, logger.runId);
    expect(events.map((e) => e.type)).toEqual(["parse", "reduce", "render"]);
    expect(events[0]).toMatchObject({ file: "sq.sf", definitions: 1 });
    expect(events[1]).toMatchObject({
      seed: "test-seed",
      stats: { calls: 1, builtinCalls: 0, maxDepth: 1, cache: { hits: 0, misses: 1, entries: 1, draws: 0 } },
    });
  });

  it("renders the same image for the same seed", async () => {
    const src = "pick@1 = SQUARE\npick@1 = CIRCLE\nroot = tx (rand_range -1.0 1.0) pick";
    const a = await generate(src, { width: 8, height: 8, seed: "test-seed" });
    const b = await generate(src, { width: 8, height: 8, seed: "test-seed" });
    expect(b.shape).toEqual(a.shape);
    expect([...b.pixmap.data]).toEqual([...a.pixmap.data]);
  });
});

describe("outputPath", () => {
  it("derives the image name from the script", () => {
    expect(outputPath("art/tree.sf", undefined, 0, 1)).toBe("tree.png");
    expect(outputPath("tree.sf", "out/pic.png", 0, 1)).toBe("out/pic.png");
  });

  it("numbers images when there are several", () => {
    expect(outputPath("tree.sf", undefined, 2, 3)).toBe("tree_2.png");
    expect(outputPath("tree.sf", "out/pic.png", 0, 3)).toBe(path.join("out", "pic_0.png"));
  });
});
