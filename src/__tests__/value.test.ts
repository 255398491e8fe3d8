import { describe, expect, it } from "vitest";
import { bool, float, int, kind, list } from "../runtime/value";
import { isScriptError } from "../runtime/errors";

describe("constructors", () => {
  it("wraps integers to 32 bits and floats to single precision", () => {
    expect(int(2147483648)).toEqual({ type: "Integer", value: -2147483648 });
    expect(float(0.1)).toEqual({ type: "Float", value: Math.fround(0.1) });
  });
});

describe("list", () => {
  it("accepts homogeneous items", () => {
    expect(kind(list([int(1), int(2)]))).toEqual({ type: "List", item: { type: "Integer" } });
    expect(kind(list([list([bool(true)]), list([bool(false)])]))).toEqual({
      type: "List",
      item: { type: "List", item: { type: "Boolean" } },
    });
  });

  it("rejects mixed items", () => {
    let error: unknown;
    try {
      list([int(1), float(2)]);
    } catch (e: unknown) {
      error = e;
    }
    expect(isScriptError(error, "InvalidList")).toBe(true);
  });

  it("gives an empty list an unknown item kind", () => {
    expect(kind(list([]))).toEqual({ type: "List", item: { type: "Unknown" } });
  });
});
