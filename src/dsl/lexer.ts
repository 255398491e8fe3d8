import type { BinaryOp, Literal, UnaryOp } from "./ast";
import { SHAPE_CONSTANTS, type ShapeConstant } from "../runtime/shape";

export const KEYWORDS = new Set(["let", "if", "else", "match", "for", "loop"]);

/** Longest operators first so that `++` wins over `+` and `..=` over `..`. */
const BINARY_OPS: readonly BinaryOp[] = [
  "++",
  "+",
  "-",
  "**",
  "*",
  "/",
  "%",
  ":",
  "==",
  "!=",
  "<<",
  "<=",
  "<",
  ">>",
  ">=",
  ">",
  "&&",
  "&",
  "||",
  "|",
  "..=",
  "..",
  "^",
];

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

/** Thrown by recognizers; caught by `attempt` and turned into a ParseError by the parser. */
export class ParseFailure extends Error {
  constructor(readonly offset: number) {
    super(`Parse failure at offset ${offset}`);
  }
}

// ============================================================================
// Cursor
// ============================================================================

export class Cursor {
  pos = 0;
  furthest = 0;

  constructor(readonly src: string) {}

  eof(): boolean {
    return this.pos >= this.src.length;
  }

  peek(offset = 0): string {
    return this.src[this.pos + offset] ?? "";
  }

  fail(): never {
    if (this.pos > this.furthest) this.furthest = this.pos;
    throw new ParseFailure(this.pos);
  }

  /** Consumes `text` if it is next. */
  take(text: string): boolean {
    if (!this.src.startsWith(text, this.pos)) return false;
    this.pos += text.length;
    return true;
  }

  expect(text: string): void {
    if (!this.take(text)) this.fail();
  }

  /** Matches a sticky regex at the cursor and consumes the match. */
  match(re: RegExp): string | null {
    re.lastIndex = this.pos;
    const m = re.exec(this.src);
    if (!m) return null;
    this.pos += m[0].length;
    return m[0];
  }

  /** Runs `fn`; on ParseFailure restores the position and returns null. */
  attempt<T>(fn: () => T): T | null {
    const saved = this.pos;
    try {
      return fn();
    } catch (e: unknown) {
      if (!(e instanceof ParseFailure)) throw e;
      this.pos = saved;
      return null;
    }
  }

  location(offset: number): { line: number; column: number } {
    const before = this.src.slice(0, offset);
    const lines = before.split("\n");
    return { line: lines.length, column: (lines[lines.length - 1] ?? "").length + 1 };
  }
}

// ============================================================================
// Whitespace
// ============================================================================

const SPACE = /[ \t]*/y;
const SPACE1 = /[ \t]+/y;
const MULTISPACE = /[ \t\r\n]*/y;
const MULTISPACE1 = /[ \t\r\n]+/y;
const BLANK_LINES = /(?:[ \t]*\r?\n)+/y;

export const space0 = (c: Cursor): void => {
  c.match(SPACE);
};

export const space1 = (c: Cursor): void => {
  if (c.match(SPACE1) === null) c.fail();
};

export const multispace0 = (c: Cursor): void => {
  c.match(MULTISPACE);
};

export const multispace1 = (c: Cursor): void => {
  if (c.match(MULTISPACE1) === null) c.fail();
};

export function atLineEnding(c: Cursor): boolean {
  return c.peek() === "\n" || (c.peek() === "\r" && c.peek(1) === "\n");
}

/**
 * Skips blank lines and leading spaces. When a line ending was crossed, the
 * new column must be at least `indent`; returns the column in that case and
 * `indent` otherwise.
 */
export function indentation(c: Cursor, indent: number): number {
  const crossed = c.match(BLANK_LINES) !== null;
  const spacing = c.match(SPACE) ?? "";
  if (!crossed) return indent;
  if (spacing.length < indent) c.fail();
  return spacing.length;
}

// ============================================================================
// Literals
// ============================================================================

const FLOAT = /-?(?:\d*\.\d+(?:[eE][+-]?\d+)?|\d+[eE][+-]?\d+)/y;
const INTEGER = /-?\d+/y;
const BOOLEAN = /(?:true|false)(?![A-Za-z0-9_])/y;
const HEX = /#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{3})(?![0-9a-fA-F])/y;
const SHAPE = /(?:SQUARE|CIRCLE|TRIANGLE|FILL|EMPTY)(?![A-Za-z0-9_])/y;

/** Parses a float literal rounded to single precision. */
export function floatValue(c: Cursor): number {
  const start = c.pos;
  const text = c.match(FLOAT);
  if (text === null) c.fail();
  const n = Math.fround(Number(text));
  if (!Number.isFinite(n)) {
    c.pos = start;
    c.fail();
  }
  return n;
}

export function integerValue(c: Cursor): number {
  const start = c.pos;
  const text = c.match(INTEGER);
  if (text === null) c.fail();
  const n = Number(text);
  if (n < I32_MIN || n > I32_MAX) {
    c.pos = start;
    c.fail();
  }
  return n;
}

function hexValue(c: Cursor): [number, number, number] {
  const text = c.match(HEX);
  if (text === null) c.fail();
  const digits = text.slice(1);
  const pairs =
    digits.length === 3
      ? [...digits].map((d) => d + d)
      : [digits.slice(0, 2), digits.slice(2, 4), digits.slice(4, 6)];
  const [r = 0, g = 0, b = 0] = pairs.map((p) => parseInt(p, 16));
  return [r, g, b];
}

function isShapeConstant(text: string): text is ShapeConstant {
  return SHAPE_CONSTANTS.some((s) => s === text);
}

function list(c: Cursor): Literal {
  c.expect("[");
  multispace0(c);
  const items: Literal[] = [];
  const first = c.attempt(() => literal(c));
  if (first !== null) {
    items.push(first);
    for (;;) {
      const next = c.attempt(() => {
        multispace0(c);
        c.expect(",");
        multispace0(c);
        return literal(c);
      });
      if (next === null) break;
      items.push(next);
    }
  }
  multispace0(c);
  c.expect("]");
  return { type: "List", items };
}

export function literal(c: Cursor): Literal {
  if (c.peek() === "#") return { type: "Hex", value: hexValue(c) };
  if (c.peek() === "[") return list(c);

  const f = c.attempt(() => floatValue(c));
  if (f !== null) return { type: "Float", value: f };

  const i = c.attempt(() => integerValue(c));
  if (i !== null) return { type: "Integer", value: i };

  const b = c.match(BOOLEAN);
  if (b !== null) return { type: "Boolean", value: b === "true" };

  const s = c.match(SHAPE);
  if (s !== null && isShapeConstant(s)) return { type: "Shape", value: s };

  return c.fail();
}

// ============================================================================
// Identifiers and operators
// ============================================================================

const NAME = /π|[A-Za-z_][A-Za-z0-9_]*/y;

function unaryTag(c: Cursor): UnaryOp {
  if (c.take("!")) return "!";
  if (c.take("~")) return "~";
  return c.fail();
}

/** A name, or an operator in parentheses such as `(+)`, which names the operator itself. */
export function identifier(c: Cursor): string {
  const start = c.pos;
  const name = c.match(NAME);
  if (name !== null) {
    if (KEYWORDS.has(name)) {
      c.pos = start;
      c.fail();
    }
    return name;
  }

  c.expect("(");
  const op = c.attempt(() => unaryTag(c)) ?? binaryOperator(c);
  c.expect(")");
  return op;
}

/** `-` is unary only when not followed by `>` or a digit. */
export function unaryOperator(c: Cursor): UnaryOp {
  if (c.peek() === "-" && c.peek(1) !== ">" && !/[0-9]/.test(c.peek(1))) {
    c.pos++;
    return "-";
  }
  return unaryTag(c);
}

export function binaryOperator(c: Cursor): BinaryOp {
  for (const op of BINARY_OPS) {
    if (op === "-" && c.peek(1) === ">") continue;
    if (c.take(op)) return op;
  }
  return c.fail();
}
