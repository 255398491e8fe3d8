import type { Shape } from "./shape";
import { invalidList } from "./errors";

export type Value =
  | { type: "Integer"; value: number }
  | { type: "Float"; value: number }
  | { type: "Boolean"; value: boolean }
  | { type: "Hex"; value: readonly [number, number, number] }
  | { type: "Shape"; shape: Shape }
  | { type: "List"; items: readonly Value[] };

export type ValueKind =
  | { type: "Integer" }
  | { type: "Float" }
  | { type: "Boolean" }
  | { type: "Hex" }
  | { type: "Shape" }
  | { type: "List"; item: ValueKind }
  | { type: "Unknown" };

// ============================================================================
// Constructors
// ============================================================================

export const int = (n: number): Value => ({ type: "Integer", value: n | 0 });
export const float = (n: number): Value => ({ type: "Float", value: Math.fround(n) });
export const bool = (b: boolean): Value => ({ type: "Boolean", value: b });
export const shape = (s: Shape): Value => ({ type: "Shape", shape: s });
export const hex = (rgb: readonly [number, number, number]): Value => ({ type: "Hex", value: rgb });

/** Builds a list and checks it is homogeneous. */
export function list(items: readonly Value[]): Value {
  const value: Value = { type: "List", items };
  kind(value);
  return value;
}

// ============================================================================
// Kinds
// ============================================================================

export function kindEquals(a: ValueKind, b: ValueKind): boolean {
  if (a.type === "List" && b.type === "List") return kindEquals(a.item, b.item);
  return a.type === b.type;
}

/** Computes the kind of a value; throws InvalidList on a heterogeneous list. */
export function kind(value: Value): ValueKind {
  if (value.type !== "List") return { type: value.type };
  const [first, ...rest] = value.items;
  if (first === undefined) return { type: "List", item: { type: "Unknown" } };
  const item = kind(first);
  for (const v of rest) {
    if (!kindEquals(kind(v), item)) throw invalidList();
  }
  return { type: "List", item };
}
