import type { Block, Expr, Pattern } from "./ast";
import { malformedBlock } from "../runtime/errors";

/**
 * Decodes a flat block back into an expression tree. Control tokens consume
 * the operand stack for their head and recurse into the sub-blocks their
 * skips delimit.
 */
export function assemble(block: Block): Expr {
  const stack = assembleRange(block, 0, block.length);
  const [expr] = stack;
  if (stack.length !== 1 || expr === undefined) {
    throw malformedBlock(`expected one expression, found ${stack.length}`);
  }
  return expr;
}

function single(block: Block, start: number, end: number): Expr {
  const stack = assembleRange(block, start, end);
  const [expr] = stack;
  if (stack.length !== 1 || expr === undefined) {
    throw malformedBlock(`sub-block ${start}..${end} holds ${stack.length} expressions`);
  }
  return expr;
}

function assembleRange(block: Block, start: number, end: number): Expr[] {
  const stack: Expr[] = [];
  const pop = (): Expr => {
    const e = stack.pop();
    if (e === undefined) throw malformedBlock("operand stack underflow");
    return e;
  };

  let i = start;
  while (i < end) {
    const token = block[i];
    if (token === undefined) throw malformedBlock(`index ${i} out of range`);

    switch (token.type) {
      case "Literal":
        stack.push({ type: "Literal", literal: token.literal });
        i++;
        break;
      case "Unary":
        stack.push({ type: "Unary", op: token.op, operand: pop() });
        i++;
        break;
      case "Binary": {
        const right = pop();
        const left = pop();
        stack.push({ type: "Binary", op: token.op, left, right });
        i++;
        break;
      }
      case "Call": {
        if (stack.length < token.argc) throw malformedBlock(`call to ${token.name} lacks arguments`);
        const args = stack.splice(stack.length - token.argc, token.argc);
        stack.push({ type: "Call", name: token.name, args });
        i++;
        break;
      }
      case "Let": {
        const bodyEnd = i + 1 + token.skip;
        stack.push({ type: "Let", definitions: token.definitions, body: single(block, i + 1, bodyEnd) });
        i = bodyEnd;
        break;
      }
      case "If": {
        const cond = pop();
        const thenEnd = i + token.skip; // points at the Jump
        const jump = block[thenEnd];
        if (jump?.type !== "Jump") throw malformedBlock("if without jump");
        const elseEnd = thenEnd + 1 + jump.skip;
        stack.push({
          type: "If",
          cond,
          then: single(block, i + 1, thenEnd),
          else: single(block, thenEnd + 1, elseEnd),
        });
        i = elseEnd;
        break;
      }
      case "Match": {
        const scrutinee = pop();
        const arms: { pattern: Pattern; body: Expr }[] = [];
        let armStart = i + 1;
        for (const arm of token.arms) {
          const jumpAt = armStart + arm.skip - 1;
          if (block[jumpAt]?.type !== "Jump") throw malformedBlock("match arm without jump");
          arms.push({ pattern: arm.pattern, body: single(block, armStart, jumpAt) });
          armStart = jumpAt + 1;
        }
        stack.push({ type: "Match", scrutinee, arms });
        i = armStart;
        break;
      }
      case "For": {
        const iterable = pop();
        const bodyEnd = i + 1 + token.skip;
        stack.push({ type: "For", variable: token.variable, iterable, body: single(block, i + 1, bodyEnd) });
        i = bodyEnd;
        break;
      }
      case "Loop": {
        const count = pop();
        const bodyEnd = i + 1 + token.skip;
        stack.push({ type: "Loop", count, body: single(block, i + 1, bodyEnd) });
        i = bodyEnd;
        break;
      }
      case "Jump":
        throw malformedBlock(`stray jump at ${i}`);
    }
  }
  if (i !== end) throw malformedBlock(`skip overruns sub-block end ${end}`);
  return stack;
}
