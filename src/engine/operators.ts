/**
 * Operator table.
 *
 * Precedence levels (higher binds tighter):
 * - 1: + -
 * - 2: * / % //
 * - 3: ^ ** (right-associative)
 * - 4: unary + - (prefix)
 */

import type { Arity, BinarySymbol, OperatorToken, SignSymbol } from "./types.js";

export type Associativity = "left" | "right";

export type BinaryOp = "add" | "subtract" | "multiply" | "divide" | "modulo" | "floorDivide" | "power";

export interface OperatorSpec {
  readonly precedence: number;
  readonly associativity: Associativity;
  readonly op: BinaryOp;
}

export const OPERATORS: Readonly<Record<BinarySymbol, OperatorSpec>> = Object.freeze({
  "+": { precedence: 1, associativity: "left", op: "add" },
  "-": { precedence: 1, associativity: "left", op: "subtract" },
  "*": { precedence: 2, associativity: "left", op: "multiply" },
  "/": { precedence: 2, associativity: "left", op: "divide" },
  "%": { precedence: 2, associativity: "left", op: "modulo" },
  "//": { precedence: 2, associativity: "left", op: "floorDivide" },
  "^": { precedence: 3, associativity: "right", op: "power" },
  "**": { precedence: 3, associativity: "right", op: "power" },
} satisfies Record<BinarySymbol, OperatorSpec>);

export const UNARY_PRECEDENCE = 4;

/** Two-character lexemes, matched before single characters. */
export const LONG_OPERATORS: readonly BinarySymbol[] = ["**", "//"];

export function isBinarySymbol(text: string): text is BinarySymbol {
  return Object.prototype.hasOwnProperty.call(OPERATORS, text);
}

export function isSign(symbol: BinarySymbol): symbol is SignSymbol {
  return symbol === "+" || symbol === "-";
}

export function precedenceOf(symbol: BinarySymbol, arity: Arity): number {
  return arity === "unary" ? UNARY_PRECEDENCE : OPERATORS[symbol].precedence;
}

/**
 * Whether an operator already on the stack must be popped before `incoming`
 * is pushed: top precedence >= incoming for left-associative incoming,
 * strictly greater for right-associative. A unary sign on top outranks
 * every binary operator.
 */
export function shouldPopBefore(top: OperatorToken, incoming: BinarySymbol): boolean {
  const topPrecedence = precedenceOf(top.symbol, top.arity);
  const next = OPERATORS[incoming];
  return next.associativity === "left" ? topPrecedence >= next.precedence : topPrecedence > next.precedence;
}
