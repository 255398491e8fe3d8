import type { Block, Definition, Literal, Pattern, Tree } from "./ast";
import { parse } from "./parser";
import { malformedBlock } from "../runtime/errors";

/** Shortest decimal text that reads back as the same single-precision float. */
export function formatFloat(n: number): string {
  let text = String(n);
  for (let digits = 1; digits <= 9; digits++) {
    const candidate = Number(n.toPrecision(digits));
    if (Math.fround(candidate) === n) {
      text = String(candidate);
      break;
    }
  }
  return /[.e]/.test(text) ? text : `${text}.0`;
}

export function formatLiteral(lit: Literal): string {
  switch (lit.type) {
    case "Integer":
      return String(lit.value);
    case "Float":
      return formatFloat(lit.value);
    case "Boolean":
      return String(lit.value);
    case "Hex":
      return `#${lit.value.map((b) => b.toString(16).padStart(2, "0")).join("")}`;
    case "Shape":
      return lit.value;
    case "List":
      return `[${lit.items.map(formatLiteral).join(",")}]`;
  }
}

function formatPattern(pattern: Pattern): string {
  return pattern.type === "Wildcard" ? "_" : pattern.literals.map(formatLiteral).join(",");
}

/** Operator names print in parentheses, as they are written in calls. */
const formatName = (name: string): string => (/^(?:π|[A-Za-z_])/.test(name) ? name : `(${name})`);

type Entry = { text: string; control: boolean };

const operand = (e: Entry): string => (e.control ? `(${e.text})` : e.text);

/**
 * Prints `block[start, end)` as one expression. Control constructs are
 * parenthesized unless they make up the whole of a definition body.
 */
function printRange(block: Block, start: number, end: number, top: boolean): string {
  const stack: Entry[] = [];
  const pop = (): string => {
    const e = stack.pop();
    if (e === undefined) throw malformedBlock("operand stack underflow");
    return operand(e);
  };
  const sub = (from: number, to: number) => printRange(block, from, to, false);

  let i = start;
  while (i < end) {
    const token = block[i];
    if (token === undefined) throw malformedBlock(`index ${i} out of range`);

    switch (token.type) {
      case "Literal":
        stack.push({ text: formatLiteral(token.literal), control: false });
        i++;
        break;
      case "Unary":
        stack.push({ text: `${token.op}(${pop()})`, control: false });
        i++;
        break;
      case "Binary": {
        const right = pop();
        const left = pop();
        stack.push({ text: `(${left}${token.op}${right})`, control: false });
        i++;
        break;
      }
      case "Call": {
        const args: string[] = [];
        for (let n = 0; n < token.argc; n++) args.unshift(pop());
        const name = formatName(token.name);
        const text = args.length === 0 ? name : `(${name} ${args.join(" ")})`;
        stack.push({ text, control: false });
        i++;
        break;
      }
      case "Let": {
        const defs = token.definitions.map((d) => {
          const head = [d.name, ...d.params].map(formatName).join(" ");
          return `${head}=${printRange(d.block, 0, d.block.length, false)}`;
        });
        const bodyEnd = i + 1 + token.skip;
        stack.push({ text: `let ${defs.join(";")}->${sub(i + 1, bodyEnd)}`, control: true });
        i = bodyEnd;
        break;
      }
      case "If": {
        const cond = pop();
        const thenEnd = i + token.skip;
        const jump = block[thenEnd];
        if (jump?.type !== "Jump") throw malformedBlock("if without jump");
        const elseEnd = thenEnd + 1 + jump.skip;
        stack.push({
          text: `if ${cond}->${sub(i + 1, thenEnd)};else->${sub(thenEnd + 1, elseEnd)}`,
          control: true,
        });
        i = elseEnd;
        break;
      }
      case "Match": {
        const scrutinee = pop();
        const arms: string[] = [];
        let armStart = i + 1;
        for (const arm of token.arms) {
          const jumpAt = armStart + arm.skip - 1;
          arms.push(`${formatPattern(arm.pattern)}->${sub(armStart, jumpAt)}`);
          armStart = jumpAt + 1;
        }
        stack.push({ text: `match ${scrutinee}->${arms.join(";")}`, control: true });
        i = armStart;
        break;
      }
      case "For": {
        const iterable = pop();
        const bodyEnd = i + 1 + token.skip;
        stack.push({ text: `for ${token.variable} in ${iterable}->${sub(i + 1, bodyEnd)}`, control: true });
        i = bodyEnd;
        break;
      }
      case "Loop": {
        const count = pop();
        const bodyEnd = i + 1 + token.skip;
        stack.push({ text: `loop ${count}->${sub(i + 1, bodyEnd)}`, control: true });
        i = bodyEnd;
        break;
      }
      case "Jump":
        throw malformedBlock(`stray jump at ${i}`);
    }
  }

  const [only] = stack;
  if (stack.length !== 1 || only === undefined) {
    throw malformedBlock(`expected one expression, found ${stack.length}`);
  }
  return top ? only.text : operand(only);
}

export function minifyDefinition(def: Definition): string {
  const weight = def.weight === 1 ? "" : `@${Number.isInteger(def.weight) ? def.weight : formatFloat(def.weight)}`;
  const head = [`${formatName(def.name)}${weight}`, ...def.params.map(formatName)].join(" ");
  return `${head}=${printRange(def.block, 0, def.block.length, true)}`;
}

export function minifyTree(tree: Tree): string {
  return tree.map(minifyDefinition).join("\n");
}

export function minify(source: string): string {
  return minifyTree(parse(source));
}
