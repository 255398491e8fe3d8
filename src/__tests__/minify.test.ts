import { describe, expect, it } from "vitest";
import { formatFloat, minify } from "../dsl/minify";
import { parse } from "../dsl/parser";

const SCRIPT = `
ring n =
  let step = 360.0 / float n
  -> collect (for i in 0..n -> r (step * float i) (ty 0.5 (ss 0.25 CIRCLE)))

pick@2 = hsl 200 0.5 0.5 SQUARE
pick@0.5 = TRIANGLE

shade x = match x
  0, 1 -> pick
  [2, 3] -> sx -x SQUARE
  _ -> if x > 10 -> EMPTY; else -> FILL

root = ring 12 : pick
`;

describe("formatFloat", () => {
  it("prints the shortest text that reads back to the same float", () => {
    expect(formatFloat(Math.fround(0.1))).toBe("0.1");
    expect(formatFloat(4)).toBe("4.0");
    expect(formatFloat(Math.fround(2.5))).toBe("2.5");
  });
});

describe("minify", () => {
  it("prints one definition per line", () => {
    expect(minify("root = 3 + 4.0 * 5.0")).toBe("root=(3+(4.0*5.0))");
    expect(minify("a@2 = SQUARE\na@0.5 = CIRCLE")).toBe("a@2=SQUARE\na@0.5=CIRCLE");
  });

  it("prints control constructs without outer parentheses at the top", () => {
    expect(minify("root = if true -> SQUARE; else -> CIRCLE")).toBe("root=if true->SQUARE;else->CIRCLE");
    expect(minify("xs = for i in 0..3 -> tx i SQUARE")).toBe("xs=for i in (0..3)->(tx i SQUARE)");
  });

  it("parenthesizes operator names", () => {
    expect(minify("n = (+) 1 2")).toBe("n=((+) 1 2)");
  });

  it("prints match arms and unary operators", () => {
    expect(minify(SCRIPT).split("\n")[3]).toBe(
      "shade x=match x->0,1->pick;[2,3]->(sx -(x) SQUARE);_->(if (x>10)->EMPTY;else->FILL)",
    );
  });

  it("round-trips through the parser", () => {
    const tree = parse(SCRIPT);
    expect(parse(minify(SCRIPT))).toEqual(tree);
  });
});
