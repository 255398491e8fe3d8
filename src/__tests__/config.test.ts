import { decode } from "@toon-format/toon";
import { describe, expect, it } from "vitest";
import { DEFAULT_VM_CONFIG, GenerateOptionsSchema, VMConfigSchema } from "../runtime/config";
import { ToonSerializer, parseFormat } from "../runtime/toon-serializer";

describe("GenerateOptionsSchema", () => {
  it("fills in defaults", () => {
    expect(GenerateOptionsSchema.parse({})).toEqual({
      width: 400,
      height: 400,
      count: 1,
      maxDepth: 1500,
      verbose: false,
    });
  });

  it("rejects sizes that are not positive integers", () => {
    expect(GenerateOptionsSchema.safeParse({ width: 0 }).success).toBe(false);
    expect(GenerateOptionsSchema.safeParse({ height: 2.5 }).success).toBe(false);
    expect(GenerateOptionsSchema.safeParse({ count: Number.NaN }).success).toBe(false);
    expect(GenerateOptionsSchema.safeParse({ seed: "" }).success).toBe(false);
  });
});

describe("VMConfigSchema", () => {
  it("defaults the depth limit", () => {
    expect(DEFAULT_VM_CONFIG).toEqual({ maxDepth: 1500 });
    expect(VMConfigSchema.safeParse({ maxDepth: 0 }).success).toBe(false);
  });
});

describe("ToonSerializer", () => {
  const tree = { name: "root", weight: 1, block: [{ type: "Call", name: "tx", argc: 2 }] };

  it("writes json, pretty or compact", () => {
    expect(ToonSerializer.serialize({ a: 1 })).toBe('{"a":1}');
    expect(ToonSerializer.serialize({ a: 1 }, { format: "json", pretty: true })).toBe('{\n  "a": 1\n}');
  });

  it("writes text the readers of each format accept", () => {
    expect(JSON.parse(ToonSerializer.serialize(tree))).toEqual(tree);
    expect(decode(ToonSerializer.serialize(tree, { format: "toon" }))).toEqual(tree);
  });

  it("accepts only known formats", () => {
    expect(parseFormat(undefined)).toBe("json");
    expect(parseFormat("toon")).toBe("toon");
    expect(() => parseFormat("yaml")).toThrow();
  });
});
