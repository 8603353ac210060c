import { describe, expect, it } from "vitest";
import { toPostfix, toPrefix } from "../../src/engine/converter.js";
import { formatPostfix } from "../../src/engine/format.js";
import { tokenize } from "../../src/engine/lexer.js";

function postfixOf(expression: string): string {
  return formatPostfix(toPostfix(tokenize(expression)));
}

describe("toPostfix", () => {
  it("respects precedence", () => {
    expect(postfixOf("2+3*4")).toBe("2 3 4 * +");
  });

  it("is left-associative for - and /", () => {
    expect(postfixOf("10-3-2")).toBe("10 3 - 2 -");
    expect(postfixOf("8/4/2")).toBe("8 4 / 2 /");
  });

  it("is right-associative for ^ and **", () => {
    expect(postfixOf("2^3^2")).toBe("2 3 2 ^ ^");
    expect(postfixOf("2**3**2")).toBe("2 3 2 ** **");
  });

  it("honours parentheses", () => {
    expect(postfixOf("(1+2)*3")).toBe("1 2 + 3 *");
  });

  it("pops a leading unary sign before a binary operator", () => {
    expect(postfixOf("-3+5")).toBe("3 neg 5 +");
    expect(postfixOf("-2^2")).toBe("2 neg 2 ^");
  });

  it("keeps a unary sign after a binary operator bound to its operand", () => {
    expect(postfixOf("3*-2")).toBe("3 2 neg *");
    expect(postfixOf("+3")).toBe("3 pos");
  });

  it("negates a parenthesized group", () => {
    expect(postfixOf("-(2+3)")).toBe("2 3 + neg");
  });

  it("emits a function after its argument", () => {
    expect(postfixOf("sin(pi/2)")).toBe("pi 2 / sin");
    expect(postfixOf("sqrt(x)+1")).toBe("x sqrt 1 +");
  });

  it("tags every emitted sign with its arity", () => {
    const arities = toPostfix(tokenize("1-(-2)")).flatMap((t) => (t.kind === "operator" ? [t.arity] : []));
    expect(arities).toEqual(["unary", "binary"]);
  });

  it("never emits parentheses", () => {
    const kinds = toPostfix(tokenize("((1+2))*(3)")).map((t) => t.kind);
    expect(kinds).not.toContain("open");
    expect(kinds).not.toContain("close");
  });
});

describe("toPrefix", () => {
  it("renders binary nodes as op a b", () => {
    expect(toPrefix(tokenize("2+3*4"))).toBe("+ 2 * 3 4");
  });

  it("renders unary signs inline", () => {
    expect(toPrefix(tokenize("-3+5"))).toBe("+ -3 5");
    expect(toPrefix(tokenize("-x"))).toBe("-x");
  });

  it("parenthesizes a negated compound operand", () => {
    expect(toPrefix(tokenize("-(2+3)"))).toBe("-(+ 2 3)");
  });

  it("renders functions as calls", () => {
    expect(toPrefix(tokenize("sqrt(x)+1"))).toBe("+ sqrt(x) 1");
  });
});
