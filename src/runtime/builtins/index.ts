import { BuiltinRegistry } from "./registry";
import { OPERATORS } from "./operators";
import { MATH } from "./math";
import { LISTS } from "./list";
import { RANDOM } from "./random";
import { COLORS, SHAPES, TRANSFORMS } from "./shapes";

export { BuiltinRegistry } from "./registry";
export type { Builtin, BuiltinContext } from "./registry";

export function createDefaultRegistry(): BuiltinRegistry {
  const registry = new BuiltinRegistry();
  registry.registerAll(OPERATORS);
  registry.registerAll(MATH);
  registry.registerAll(LISTS);
  registry.registerAll(RANDOM);
  registry.registerAll(SHAPES);
  registry.registerAll(TRANSFORMS);
  registry.registerAll(COLORS);
  return registry;
}
