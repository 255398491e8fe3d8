import type { ShapeConstant } from "../runtime/shape";

export type Literal =
  | { type: "Integer"; value: number }
  | { type: "Float"; value: number }
  | { type: "Boolean"; value: boolean }
  | { type: "Hex"; value: [number, number, number] }
  | { type: "Shape"; value: ShapeConstant }
  | { type: "List"; items: Literal[] };

export type UnaryOp = "-" | "!" | "~";

export type BinaryOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "**"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||"
  | ".."
  | "..="
  | "++"
  | ":";

export const PRECEDENCE: Record<BinaryOp, number> = {
  ":": 0,
  "==": 0,
  "!=": 0,
  "<": 0,
  "<=": 0,
  ">": 0,
  ">=": 0,
  "||": 1,
  "|": 1,
  "^": 1,
  "&&": 2,
  "&": 2,
  "..": 3,
  "..=": 3,
  "<<": 3,
  ">>": 3,
  "+": 4,
  "-": 4,
  "++": 4,
  "*": 5,
  "/": 5,
  "%": 5,
  "**": 6,
};

export type Pattern = { type: "Matches"; literals: Literal[] } | { type: "Wildcard" };

export type LetDefinition = { name: string; params: string[]; block: Block };

/**
 * Flat postfix instruction. Control tokens carry a `skip` equal to the length
 * of the sub-block they own; see the block layouts in parser.ts.
 */
export type Token =
  | { type: "Literal"; literal: Literal }
  | { type: "Unary"; op: UnaryOp }
  | { type: "Binary"; op: BinaryOp }
  | { type: "Call"; name: string; argc: number }
  | { type: "Let"; definitions: LetDefinition[]; skip: number }
  | { type: "If"; skip: number }
  | { type: "Jump"; skip: number }
  | { type: "Match"; arms: { pattern: Pattern; skip: number }[] }
  | { type: "For"; variable: string; skip: number }
  | { type: "Loop"; skip: number };

export type Block = Token[];

export type Definition = { name: string; weight: number; params: string[]; block: Block };

export type Tree = Definition[];

// ============================================================================
// Expression tree (decoded from a block by assemble.ts)
// ============================================================================

export type Expr =
  | { type: "Literal"; literal: Literal }
  | { type: "Unary"; op: UnaryOp; operand: Expr }
  | { type: "Binary"; op: BinaryOp; left: Expr; right: Expr }
  | { type: "Call"; name: string; args: Expr[] }
  | { type: "Let"; definitions: LetDefinition[]; body: Expr }
  | { type: "If"; cond: Expr; then: Expr; else: Expr }
  | { type: "Match"; scrutinee: Expr; arms: { pattern: Pattern; body: Expr }[] }
  | { type: "For"; variable: string; iterable: Expr; body: Expr }
  | { type: "Loop"; count: Expr; body: Expr };
