import { describe, expect, it } from "vitest";
import { OPERATORS, UNARY_PRECEDENCE, isBinarySymbol, precedenceOf, shouldPopBefore } from "../../src/engine/operators.js";
import type { OperatorToken } from "../../src/engine/types.js";

function op(symbol: OperatorToken["symbol"], arity: OperatorToken["arity"] = "binary"): OperatorToken {
  return { kind: "operator", symbol, arity, pos: 0 };
}

describe("operator table", () => {
  it("is frozen", () => {
    expect(Object.isFrozen(OPERATORS)).toBe(true);
  });

  it("orders precedence levels", () => {
    expect(precedenceOf("+", "binary")).toBe(1);
    expect(precedenceOf("//", "binary")).toBe(2);
    expect(precedenceOf("**", "binary")).toBe(3);
    expect(precedenceOf("-", "unary")).toBe(UNARY_PRECEDENCE);
  });

  it("recognizes binary symbols only", () => {
    expect(isBinarySymbol("//")).toBe(true);
    expect(isBinarySymbol("&")).toBe(false);
    expect(isBinarySymbol("toString")).toBe(false);
  });
});

describe("shouldPopBefore", () => {
  it("pops equal precedence for left-associative operators", () => {
    expect(shouldPopBefore(op("-"), "+")).toBe(true);
    expect(shouldPopBefore(op("*"), "%")).toBe(true);
  });

  it("keeps equal precedence for right-associative operators", () => {
    expect(shouldPopBefore(op("^"), "^")).toBe(false);
  });

  it("keeps a lower-precedence operator", () => {
    expect(shouldPopBefore(op("+"), "*")).toBe(false);
  });

  it("pops a unary sign before any binary operator", () => {
    expect(shouldPopBefore(op("-", "unary"), "+")).toBe(true);
    expect(shouldPopBefore(op("-", "unary"), "^")).toBe(true);
  });
});
