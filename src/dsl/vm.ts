import type { Block, Definition, Expr, LetDefinition, Literal, Pattern, Tree } from "./ast";
import { assemble } from "./assemble";
import type { BuiltinRegistry } from "../runtime/builtins";
import { createDefaultRegistry } from "../runtime/builtins";
import { Cache, type CacheStats, type Scope } from "../runtime/cache";
import { DEFAULT_VM_CONFIG, type VMConfig } from "../runtime/config";
import {
  incorrectArgumentCount,
  invalidArgumentCount,
  invalidCondition,
  invalidDefinition,
  invalidMatch,
  invalidRoot,
  matchNotFound,
  maxDepthReached,
  negativeNumber,
  notIterable,
  unknownFunction,
} from "../runtime/errors";
import { ReductionTracker, type RunLogger } from "../runtime/logger";
import { basicShape, type Shape } from "../runtime/shape";
import { bool, float, hex, int, list, shape, type Value } from "../runtime/value";

// ============================================================================
// Frames
// ============================================================================

type FunctionBody = { type: "Block"; block: Block } | { type: "Value"; value: Value };

interface Fn {
  params: string[];
  weighted: boolean;
  bodies: { body: FunctionBody; weight: number }[];
  /** null for top-level definitions; otherwise the call that bound it. */
  scope: Scope | null;
}

/**
 * Local bindings visible to one expression. Top-level definitions live on the
 * VM and are consulted after the locals, so a parameter shadows a global.
 */
interface Frame {
  functions: Map<string, Fn>;
  scope: Scope | null;
  depth: number;
  /** Cache key of the innermost memoized call being reduced. */
  owner: string | null;
}

const UNARY_BUILTINS = { "-": "neg", "!": "!", "~": "~" } as const;

// ============================================================================
// Literals and patterns
// ============================================================================

export function literalValue(lit: Literal): Value {
  switch (lit.type) {
    case "Integer":
      return int(lit.value);
    case "Float":
      return float(lit.value);
    case "Boolean":
      return bool(lit.value);
    case "Hex":
      return hex(lit.value);
    case "Shape":
      return shape(basicShape(lit.value));
    case "List":
      return list(lit.items.map(literalValue));
  }
}

/** Tests one pattern literal against the scrutinee. A list literal tests membership. */
function matchesLiteral(value: Value, lit: Literal): boolean {
  if (value.type === "Shape" || lit.type === "Shape" || value.type === "List") throw invalidMatch();
  if (lit.type === "List") return lit.items.some((item) => matchesLiteral(value, item));

  if ((value.type === "Integer" || value.type === "Float") && (lit.type === "Integer" || lit.type === "Float")) {
    return Math.fround(value.value) === Math.fround(lit.value);
  }
  if (value.type === "Boolean" && lit.type === "Boolean") return value.value === lit.value;
  if (value.type === "Hex" && lit.type === "Hex") return value.value.every((b, i) => b === lit.value[i]);
  throw invalidMatch();
}

function matches(value: Value, pattern: Pattern): boolean {
  if (pattern.type === "Wildcard") return true;
  return pattern.literals.some((lit) => matchesLiteral(value, lit));
}

/** Items of a `for` iterable; a number n counts 0..n. */
function iterate(value: Value): Value[] {
  if (value.type === "List") return [...value.items];
  if (value.type === "Integer" || value.type === "Float") {
    if (value.value < 0) throw negativeNumber();
    return Array.from({ length: Math.trunc(value.value) }, (_, i) => int(i));
  }
  throw notIterable();
}

/** A `loop` runs a fixed number of times; lists are not counts. */
function loopCount(value: Value): number {
  if (value.type !== "Integer" && value.type !== "Float") throw notIterable();
  if (value.value < 0) throw negativeNumber();
  return Math.trunc(value.value);
}

// ============================================================================
// VM
// ============================================================================

export class VM {
  private config: VMConfig;
  private globals = new Map<string, Fn>();
  private assembled = new WeakMap<Block, Expr>();
  private cache: Cache | null = null;
  private tracker: ReductionTracker;
  private lastStats: CacheStats | null = null;

  constructor(
    private registry: BuiltinRegistry,
    config: Partial<VMConfig> = {},
    logger?: RunLogger,
  ) {
    this.config = { ...DEFAULT_VM_CONFIG, ...config };
    this.tracker = logger?.tracker ?? new ReductionTracker();
  }

  /**
   * Reduces `root` to a shape. Each call starts from an empty cache; run one
   * reduction at a time per VM.
   */
  async reduce(tree: Tree, seed?: Uint8Array): Promise<Shape> {
    const value = await this.evaluate(tree, "root", seed);
    if (value.type !== "Shape") throw invalidRoot();
    return value.shape;
  }

  /** Reduces a zero-argument call to any top-level name. */
  async evaluate(tree: Tree, name: string, seed?: Uint8Array): Promise<Value> {
    this.globals = buildGlobals(tree);
    if (!this.globals.has(name)) throw unknownFunction(name);

    const cache = Cache.create(seed);
    this.cache = cache;
    try {
      return await this.call(name, [], { functions: new Map(), scope: null, depth: 0, owner: null });
    } finally {
      this.lastStats = cache.stats();
      this.tracker.recordCache(this.lastStats);
      this.cache = null;
    }
  }

  /** Cache counters of the most recent reduction. */
  stats(): CacheStats | null {
    return this.lastStats;
  }

  private get activeCache(): Cache {
    if (this.cache === null) throw new Error("VM used outside of a reduction");
    return this.cache;
  }

  private expr(block: Block): Expr {
    let expr = this.assembled.get(block);
    if (expr === undefined) {
      expr = assemble(block);
      this.assembled.set(block, expr);
    }
    return expr;
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private async eval(expr: Expr, frame: Frame): Promise<Value> {
    switch (expr.type) {
      case "Literal":
        return literalValue(expr.literal);

      case "Unary": {
        const operand = await this.eval(expr.operand, frame);
        return this.runBuiltin(UNARY_BUILTINS[expr.op], [operand]);
      }

      case "Binary": {
        let args: Value[];
        if (expr.left.type === "Literal" || expr.right.type === "Literal") {
          const left = await this.eval(expr.left, frame);
          const right = await this.eval(expr.right, frame);
          args = [left, right];
        } else {
          args = await Promise.all([this.eval(expr.left, frame), this.eval(expr.right, frame)]);
        }
        return this.runBuiltin(expr.op, args);
      }

      case "Call":
        return this.call(expr.name, expr.args, frame);

      case "Let":
        return this.eval(expr.body, this.bindLet(expr.definitions, frame));

      case "If": {
        const cond = await this.eval(expr.cond, frame);
        if (cond.type !== "Boolean") throw invalidCondition();
        return this.eval(cond.value ? expr.then : expr.else, frame);
      }

      case "Match": {
        const value = await this.eval(expr.scrutinee, frame);
        for (const arm of expr.arms) {
          if (matches(value, arm.pattern)) return this.eval(arm.body, frame);
        }
        throw matchNotFound();
      }

      case "For": {
        const items = iterate(await this.eval(expr.iterable, frame));
        const results = await Promise.all(
          items.map((item) => {
            const functions = new Map(frame.functions);
            functions.set(expr.variable, valueFunction(item, frame.scope));
            return this.eval(expr.body, { ...frame, functions });
          }),
        );
        return list(results);
      }

      case "Loop": {
        const count = loopCount(await this.eval(expr.count, frame));
        const results = await Promise.all(Array.from({ length: count }, () => this.eval(expr.body, frame)));
        return list(results);
      }
    }
  }

  private bindLet(definitions: LetDefinition[], frame: Frame): Frame {
    const functions = new Map(frame.functions);
    for (const def of definitions) {
      functions.set(def.name, {
        params: def.params,
        weighted: false,
        bodies: [{ body: { type: "Block", block: def.block }, weight: 1 }],
        scope: frame.scope,
      });
    }
    return { ...frame, functions };
  }

  // ==========================================================================
  // Calls
  // ==========================================================================

  private runBuiltin(name: string, args: Value[]): Value {
    const builtin = this.registry.get(name);
    if (args.length !== builtin.arity) throw invalidArgumentCount(name);
    this.tracker.incrementBuiltinCall();
    return builtin.run({ name, cache: this.activeCache }, args);
  }

  private async call(name: string, argExprs: Expr[], frame: Frame): Promise<Value> {
    const cache = this.activeCache;

    if (this.registry.has(name)) {
      const builtin = this.registry.get(name);
      const args = await Promise.all(argExprs.map((a) => this.eval(a, frame)));
      if (builtin.random) return this.runBuiltin(name, args);

      const key = Cache.fingerprint(name, 0, args, frame.scope);
      const hit = cache.get(key);
      if (hit !== undefined) return hit;
      const value = this.runBuiltin(name, args);
      cache.set(key, value);
      return value;
    }

    const fn = frame.functions.get(name) ?? this.globals.get(name);
    if (fn === undefined) throw unknownFunction(name);
    if (argExprs.length !== fn.params.length) throw incorrectArgumentCount(name);

    const args = await Promise.all(argExprs.map((a) => this.eval(a, frame)));

    const branch = fn.weighted ? cache.draw((rng) => rng.weightedIndex(fn.bodies.map((b) => b.weight))) : 0;
    const selected = fn.bodies[branch];
    if (selected === undefined) throw unknownFunction(name);
    if (selected.body.type === "Value") return selected.body.value;

    const { block } = selected.body;
    if (fn.scope !== null) return this.enter(name, fn, branch, block, args, frame, frame.owner);

    const key = Cache.fingerprint(name, branch, args, frame.scope);
    return cache.memo(key, frame.owner, () => this.enter(name, fn, branch, block, args, frame, key));
  }

  /** Evaluates a function body in a new frame holding its parameters. */
  private async enter(
    name: string,
    fn: Fn,
    branch: number,
    block: Block,
    args: Value[],
    frame: Frame,
    owner: string | null,
  ): Promise<Value> {
    const depth = frame.depth + 1;
    if (depth > this.config.maxDepth) throw maxDepthReached(this.config.maxDepth);
    this.tracker.incrementCall(depth);

    const scope = fn.scope ?? { name, branch };
    const functions = fn.scope === null ? new Map<string, Fn>() : new Map(frame.functions);
    fn.params.forEach((param, i) => {
      const arg = args[i];
      if (arg !== undefined) functions.set(param, valueFunction(arg, scope));
    });

    return this.eval(this.expr(block), { functions, scope, depth, owner });
  }
}

function valueFunction(value: Value, scope: Scope | null): Fn {
  return { params: [], weighted: false, bodies: [{ body: { type: "Value", value }, weight: 1 }], scope };
}

/** Groups same-named definitions into one weighted function. */
function buildGlobals(tree: Tree): Map<string, Fn> {
  const groups = new Map<string, Definition[]>();
  for (const def of tree) {
    const group = groups.get(def.name);
    if (group) group.push(def);
    else groups.set(def.name, [def]);
  }

  const globals = new Map<string, Fn>();
  for (const [name, defs] of groups) {
    const [first] = defs;
    if (first === undefined) continue;
    const samePattern = (d: Definition) =>
      d.params.length === first.params.length && d.params.every((p, i) => p === first.params[i]);
    if (!defs.every(samePattern)) throw invalidDefinition(`Incorrect parameters in \`${name}\` function.`);

    const weighted = defs.length > 1;
    if (defs.some((d) => d.weight < 0 || !Number.isFinite(d.weight))) {
      throw invalidDefinition(`Negative weight in \`${name}\` function.`);
    }
    if (weighted && defs.every((d) => d.weight === 0)) {
      throw invalidDefinition(`All weights in \`${name}\` function are zero.`);
    }

    globals.set(name, {
      params: first.params,
      weighted,
      bodies: defs.map((d) => ({ body: { type: "Block", block: d.block }, weight: d.weight })),
      scope: null,
    });
  }
  return globals;
}

/** Reduces `root` with the default builtins. */
export async function reduce(tree: Tree, seed?: Uint8Array, config: Partial<VMConfig> = {}): Promise<Shape> {
  return new VM(createDefaultRegistry(), config).reduce(tree, seed);
}
