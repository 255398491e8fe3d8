import type { Block, Definition, LetDefinition, Pattern, Literal, Tree } from "./ast";
import { PRECEDENCE } from "./ast";
import {
  Cursor,
  ParseFailure,
  atLineEnding,
  binaryOperator,
  floatValue,
  identifier,
  indentation,
  integerValue,
  literal,
  multispace0,
  multispace1,
  space0,
  space1,
  unaryOperator,
} from "./lexer";
import { parseError } from "../runtime/errors";

const MAX_PRECEDENCE = Number.MAX_SAFE_INTEGER;

/**
 * Parses a script into definitions whose bodies are flat postfix blocks.
 *
 * Block layouts:
 *   if c -> a; else -> b       c, If(|a|+1), a, Jump(|b|), b
 *   match x -> p1 -> e1 ...   x, Match([(p1, |e1|+1), ...]), e1, Jump(rest), ...
 *   let d1; d2 -> body         Let([d1, d2], |body|), body
 *   for v in xs -> body        xs, For(v, |body|), body
 *   loop n -> body             n, Loop(|body|), body
 */
export function parse(src: string): Tree {
  const c = new Cursor(src);

  // Either `->` (possibly after a line break) or a line ending left for the body to cross.
  const arrow = (): void => {
    const viaArrow = c.attempt(() => {
      multispace0(c);
      c.expect("->");
    });
    if (viaArrow !== null) return;
    space0(c);
    if (!atLineEnding(c)) c.fail();
  };

  const keyword = (word: string): void => {
    c.expect(word);
    if (/[A-Za-z0-9_]/.test(c.peek())) c.fail();
  };

  const end = (): void => {
    space0(c);
    if (c.take(";") || c.eof()) return;
    if (!atLineEnding(c)) c.fail();
    c.pos += c.peek() === "\r" ? 2 : 1;
  };

  const parseExpr = (indent: number, consumeSemicolon = true, minPrecedence = 0): Block => {
    const column = indentation(c, indent);
    const unary = c.attempt(() => unaryOperator(c));
    const lhs = parsePrimary(column, minPrecedence);
    if (unary !== null) lhs.push({ type: "Unary", op: unary });

    for (;;) {
      const before = c.pos;
      const op = c.attempt(() => {
        indentation(c, column);
        return binaryOperator(c);
      });
      if (op === null) break;
      const precedence = PRECEDENCE[op];
      if (precedence < minPrecedence) {
        c.pos = before;
        break;
      }
      const rhs = parseExpr(column + 1, true, precedence + 1);
      lhs.push(...rhs, { type: "Binary", op });
    }

    if (consumeSemicolon) {
      c.attempt(() => {
        space0(c);
        c.expect(";");
      });
    }
    return lhs;
  };

  const parsePrimary = (indent: number, precedence: number): Block => {
    const lit = c.attempt(() => literal(c));
    if (lit !== null) return [{ type: "Literal", literal: lit }];

    const alternatives = [
      () => parseLet(indent),
      () => parseIf(indent),
      () => parseMatch(indent),
      () => parseFor(indent),
      () => parseLoop(indent),
      () => parseCall(indent, precedence),
      () => parseParenthesized(),
    ];
    for (const alt of alternatives) {
      const block = c.attempt(alt);
      if (block !== null) return block;
    }
    return c.fail();
  };

  const parseParenthesized = (): Block => {
    c.expect("(");
    multispace0(c);
    const inner = parseExpr(0, true, 0);
    multispace0(c);
    c.expect(")");
    return inner;
  };

  const parseCall = (indent: number, precedence: number): Block => {
    const name = identifier(c);
    if (precedence === MAX_PRECEDENCE) return [{ type: "Call", name, argc: 0 }];

    const block: Block = [];
    let argc = 0;
    for (;;) {
      const arg = c.attempt(() => {
        space1(c);
        return parseExpr(indent + 1, false, MAX_PRECEDENCE);
      });
      if (arg === null) break;
      block.push(...arg);
      argc++;
    }
    block.push({ type: "Call", name, argc });
    return block;
  };

  const parseParams = (): string[] => {
    const params: string[] = [];
    for (;;) {
      const param = c.attempt(() => {
        multispace1(c);
        return identifier(c);
      });
      if (param === null) return params;
      params.push(param);
    }
  };

  const parseLetDefinition = (indent: number): LetDefinition => {
    const name = identifier(c);
    const params = parseParams();
    multispace0(c);
    c.expect("=");
    const block = parseExpr(indent + 1, false);
    return { name, params, block };
  };

  const parseLet = (indent: number): Block => {
    keyword("let");
    space1(c);
    const definitions = [parseLetDefinition(indent + 1)];
    for (;;) {
      const next = c.attempt(() => {
        end();
        multispace0(c);
        return parseLetDefinition(indent + 1);
      });
      if (next === null) break;
      definitions.push(next);
    }

    const separated =
      c.attempt(() => {
        multispace0(c);
        c.expect("->");
      }) ??
      c.attempt(() => {
        space0(c);
        c.expect(";");
      });
    if (separated === null) {
      space0(c);
      if (!atLineEnding(c)) c.fail();
    }

    const body = parseExpr(indent + 1);
    return [{ type: "Let", definitions, skip: body.length }, ...body];
  };

  const parseIf = (indent: number): Block => {
    keyword("if");
    space1(c);
    const cond = parseExpr(indent + 1);
    arrow();
    const thenBranch = parseExpr(indent + 1);
    multispace0(c);
    keyword("else");

    const elseIf = c.attempt(() => {
      multispace1(c);
      return parseIf(indent);
    });
    let elseBranch: Block;
    if (elseIf !== null) {
      elseBranch = elseIf;
    } else {
      arrow();
      elseBranch = parseExpr(indent + 1);
    }

    return [
      ...cond,
      { type: "If", skip: thenBranch.length + 1 },
      ...thenBranch,
      { type: "Jump", skip: elseBranch.length },
      ...elseBranch,
    ];
  };

  const parsePattern = (indent: number): Pattern => {
    indentation(c, indent);
    if (c.take("_")) return { type: "Wildcard" };
    const literals: Literal[] = [literal(c)];
    for (;;) {
      const next = c.attempt(() => {
        space0(c);
        c.expect(",");
        space0(c);
        return literal(c);
      });
      if (next === null) break;
      literals.push(next);
    }
    return { type: "Matches", literals };
  };

  const parseArm = (indent: number): { pattern: Pattern; body: Block } => {
    const pattern = parsePattern(indent);
    arrow();
    const body = parseExpr(indent + 1);
    return { pattern, body };
  };

  const parseMatch = (indent: number): Block => {
    keyword("match");
    space1(c);
    const scrutinee = parseExpr(indent + 1);
    arrow();

    const arms = [parseArm(indent + 1)];
    for (;;) {
      const arm = c.attempt(() => parseArm(indent + 1));
      if (arm === null) break;
      arms.push(arm);
    }

    const total = arms.reduce((sum, arm) => sum + arm.body.length + 1, 0);
    let consumed = 0;
    const body: Block = [];
    for (const arm of arms) {
      consumed += arm.body.length + 1;
      body.push(...arm.body, { type: "Jump", skip: total - consumed });
    }

    return [
      ...scrutinee,
      { type: "Match", arms: arms.map((arm) => ({ pattern: arm.pattern, skip: arm.body.length + 1 })) },
      ...body,
    ];
  };

  const parseFor = (indent: number): Block => {
    keyword("for");
    space1(c);
    const variable = identifier(c);
    multispace1(c);
    keyword("in");
    space1(c);
    const iterable = parseExpr(indent + 1);
    arrow();
    const body = parseExpr(indent + 1);
    return [...iterable, { type: "For", variable, skip: body.length }, ...body];
  };

  const parseLoop = (indent: number): Block => {
    keyword("loop");
    space1(c);
    const count = parseExpr(indent + 1);
    arrow();
    const body = parseExpr(indent + 1);
    return [...count, { type: "Loop", skip: body.length }, ...body];
  };

  const parseDefinition = (): Definition => {
    const name = identifier(c);
    let weight = 1;
    if (c.take("@")) {
      weight = c.attempt(() => floatValue(c)) ?? integerValue(c);
    }
    const params = parseParams();
    multispace0(c);
    c.expect("=");
    const block = parseExpr(1);
    end();
    return { name, weight, params, block };
  };

  const parseTree = (): Tree => {
    const tree: Tree = [];
    for (;;) {
      const def = c.attempt(() => {
        c.match(/(?:[ \t]*\r?\n)*/y);
        return parseDefinition();
      });
      if (def === null) break;
      tree.push(def);
    }
    multispace0(c);
    if (!c.eof()) c.fail();
    return tree;
  };

  try {
    return parseTree();
  } catch (e: unknown) {
    if (!(e instanceof ParseFailure)) throw e;
    const { line, column } = c.location(Math.max(c.furthest, e.offset));
    throw parseError(line, column);
  }
}
