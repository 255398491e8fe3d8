import { describe, expect, it } from "vitest";
import {
  Cursor,
  ParseFailure,
  binaryOperator,
  identifier,
  indentation,
  literal,
  unaryOperator,
} from "../dsl/lexer";

const lex = <T>(fn: (c: Cursor) => T, src: string): T => fn(new Cursor(src));

describe("literal", () => {
  it("reads integers and floats", () => {
    expect(lex(literal, "42")).toEqual({ type: "Integer", value: 42 });
    expect(lex(literal, "-7")).toEqual({ type: "Integer", value: -7 });
    expect(lex(literal, "4.0")).toEqual({ type: "Float", value: 4 });
    expect(lex(literal, ".5")).toEqual({ type: "Float", value: 0.5 });
    expect(lex(literal, "2e3")).toEqual({ type: "Float", value: 2000 });
  });

  it("rounds floats to single precision", () => {
    expect(lex(literal, "0.1")).toEqual({ type: "Float", value: Math.fround(0.1) });
  });

  it("rejects integers outside the 32-bit range", () => {
    expect(() => lex(literal, "2147483648")).toThrow(ParseFailure);
    expect(lex(literal, "2147483647")).toEqual({ type: "Integer", value: 2147483647 });
  });

  it("reads hex colors in long and short form", () => {
    expect(lex(literal, "#ff8000")).toEqual({ type: "Hex", value: [255, 128, 0] });
    expect(lex(literal, "#fa0")).toEqual({ type: "Hex", value: [255, 170, 0] });
  });

  it("reads booleans and shape constants as whole words", () => {
    expect(lex(literal, "true")).toEqual({ type: "Boolean", value: true });
    expect(lex(literal, "CIRCLE")).toEqual({ type: "Shape", value: "CIRCLE" });
    expect(() => lex(literal, "trueish")).toThrow(ParseFailure);
    expect(() => lex(literal, "SQUARES")).toThrow(ParseFailure);
  });

  it("reads list literals across lines", () => {
    expect(lex(literal, "[1,\n  2, 3]")).toEqual({
      type: "List",
      items: [
        { type: "Integer", value: 1 },
        { type: "Integer", value: 2 },
        { type: "Integer", value: 3 },
      ],
    });
    expect(lex(literal, "[]")).toEqual({ type: "List", items: [] });
  });
});

describe("identifier", () => {
  it("stops at the end of the name", () => {
    const c = new Cursor("foo_1 bar");
    expect(identifier(c)).toBe("foo_1");
    expect(c.pos).toBe(5);
  });

  it("rejects keywords", () => {
    expect(() => lex(identifier, "let")).toThrow(ParseFailure);
    expect(lex(identifier, "letter")).toBe("letter");
  });

  it("names operators written in parentheses", () => {
    expect(lex(identifier, "(+)")).toBe("+");
    expect(lex(identifier, "(!)")).toBe("!");
    expect(lex(identifier, "(..=)")).toBe("..=");
  });

  it("accepts pi", () => {
    expect(lex(identifier, "π")).toBe("π");
  });
});

describe("operators", () => {
  it("prefers the longest binary operator", () => {
    expect(lex(binaryOperator, "..= 3")).toBe("..=");
    expect(lex(binaryOperator, "++ xs")).toBe("++");
    expect(lex(binaryOperator, "** 2")).toBe("**");
    expect(lex(binaryOperator, "<= 2")).toBe("<=");
  });

  it("never reads an arrow as subtraction", () => {
    expect(() => lex(binaryOperator, "-> x")).toThrow(ParseFailure);
    expect(() => lex(unaryOperator, "-> x")).toThrow(ParseFailure);
  });

  it("leaves a minus before a digit to the literal", () => {
    expect(lex(unaryOperator, "-x")).toBe("-");
    expect(() => lex(unaryOperator, "-1")).toThrow(ParseFailure);
  });
});

describe("indentation", () => {
  it("returns the new column after a line break", () => {
    const c = new Cursor("\n    x");
    expect(indentation(c, 2)).toBe(4);
    expect(c.pos).toBe(5);
  });

  it("fails when the next line is indented less than required", () => {
    expect(() => indentation(new Cursor("\n x"), 2)).toThrow(ParseFailure);
  });

  it("keeps the current column on the same line", () => {
    const c = new Cursor("  x");
    expect(indentation(c, 3)).toBe(3);
    expect(c.pos).toBe(2);
  });
});

describe("Cursor.location", () => {
  it("reports one-based line and column", () => {
    expect(new Cursor("ab\ncd").location(4)).toEqual({ line: 2, column: 2 });
    expect(new Cursor("ab\ncd").location(0)).toEqual({ line: 1, column: 1 });
  });
});
