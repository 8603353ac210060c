import { isFunctionName } from "./functions.js";
import { isSign } from "./operators.js";
import { tokenText } from "./format.js";
import { cleanExpression, tokenize } from "./lexer.js";
import { CalcError, type CalcErrorCode, type Token, type TokenSequence, type ValidationResult } from "./types.js";

/**
 * Grammatical role of a token in context. An identifier is a function when
 * it names a known function, a call when an unknown name sits before `(`,
 * and a variable otherwise.
 */
type Role = "operand" | "function" | "call" | "operator" | "sign" | "open" | "close";

function roleOf(tokens: TokenSequence, i: number): Role | undefined {
  const tok = tokens[i];
  if (tok === undefined) return undefined;
  switch (tok.kind) {
    case "number":
      return "operand";
    case "identifier":
      if (isFunctionName(tok.name)) return "function";
      return tokens[i + 1]?.kind === "open" ? "call" : "operand";
    case "operator":
      return isSign(tok.symbol) ? "sign" : "operator";
    case "open":
      return "open";
    case "close":
      return "close";
  }
}

function isOperatorRole(role: Role | undefined): boolean {
  return role === "operator" || role === "sign";
}

function fail(code: CalcErrorCode, tok: Token): CalcError {
  return new CalcError(code, tok.pos, tok.kind === "operator" ? tok.symbol : tokenText(tok));
}

type Check = (tokens: TokenSequence) => CalcError | undefined;

function checkBalance(tokens: TokenSequence): CalcError | undefined {
  const open: Token[] = [];
  for (const tok of tokens) {
    if (tok.kind === "open") {
      open.push(tok);
    } else if (tok.kind === "close") {
      if (open.pop() === undefined) return fail("UNMATCHED_CLOSE", tok);
    }
  }
  const unclosed = open[open.length - 1];
  return unclosed === undefined ? undefined : fail("UNMATCHED_OPEN", unclosed);
}

function checkEmptyBrackets(tokens: TokenSequence): CalcError | undefined {
  for (let i = 0; i + 1 < tokens.length; i++) {
    const tok = tokens[i];
    if (tok?.kind === "open" && tokens[i + 1]?.kind === "close") return fail("EMPTY_BRACKETS", tok);
  }
  return undefined;
}

function checkOperands(tokens: TokenSequence): CalcError | undefined {
  for (let i = 1; i < tokens.length; i++) {
    const tok = tokens[i];
    const role = roleOf(tokens, i);
    const prev = roleOf(tokens, i - 1);
    if (tok === undefined) continue;

    if (role === "operand" || role === "function" || role === "call") {
      if (prev === "operand") return fail("TWO_OPERANDS_IN_ROW", tok);
      if (prev === "close") return fail("OPERAND_AFTER_CLOSE", tok);
    } else if (role === "open" && (prev === "operand" || prev === "close")) {
      return fail("OPEN_AFTER_OPERAND", tok);
    }
  }
  return undefined;
}

/**
 * A sign may follow a non-sign operator (`3*-2`, `2^-1`); two operators
 * in a row are rejected otherwise, including doubled signs (`1++2`).
 */
function checkOperators(tokens: TokenSequence): CalcError | undefined {
  for (let i = 1; i < tokens.length; i++) {
    const tok = tokens[i];
    const role = roleOf(tokens, i);
    const prev = roleOf(tokens, i - 1);
    if (tok === undefined || !isOperatorRole(role) || !isOperatorRole(prev)) continue;
    if (role === "sign" && prev === "operator") continue;
    return fail("TWO_OPERATORS_IN_ROW", tok);
  }
  return undefined;
}

function checkEnds(tokens: TokenSequence): CalcError | undefined {
  const first = tokens[0];
  if (first !== undefined && roleOf(tokens, 0) === "operator") return fail("STARTS_WITH_OPERATOR", first);

  const lastIndex = tokens.length - 1;
  const last = tokens[lastIndex];
  if (last !== undefined && isOperatorRole(roleOf(tokens, lastIndex))) return fail("ENDS_WITH_OPERATOR", last);
  return undefined;
}

function checkIdentifiers(tokens: TokenSequence): CalcError | undefined {
  for (let i = 0; i < tokens.length; i++) {
    const tok = tokens[i];
    const role = roleOf(tokens, i);
    if (tok === undefined) continue;
    if (role === "function" && tokens[i + 1]?.kind !== "open") return fail("FUNCTION_WITHOUT_PAREN", tok);
    if (role === "call") return fail("UNKNOWN_FUNCTION", tok);
  }
  return undefined;
}

function checkAfterOpen(tokens: TokenSequence): CalcError | undefined {
  for (let i = 1; i < tokens.length; i++) {
    const tok = tokens[i];
    if (tok !== undefined && roleOf(tokens, i) === "operator" && roleOf(tokens, i - 1) === "open") {
      return fail("OPERATOR_AFTER_OPEN", tok);
    }
  }
  return undefined;
}

function checkClose(tokens: TokenSequence): CalcError | undefined {
  for (let i = 0; i < tokens.length; i++) {
    const tok = tokens[i];
    if (tok?.kind !== "close") continue;
    if (i === 0) return fail("STARTS_WITH_CLOSE", tok);
    const prev = roleOf(tokens, i - 1);
    if (isOperatorRole(prev)) return fail("CLOSE_AFTER_OPERATOR", tok);
    if (prev === "open") return fail("CLOSE_AFTER_OPEN", tok);
  }
  return undefined;
}

/** Run in order; the first failing check decides the reported error. */
const CHECKS: readonly Check[] = [
  checkBalance,
  checkEmptyBrackets,
  checkOperands,
  checkOperators,
  checkEnds,
  checkIdentifiers,
  checkAfterOpen,
  checkClose,
];

function validateTokens(tokens: TokenSequence): ValidationResult {
  if (tokens.length === 0) {
    return { valid: false, error: new CalcError("EMPTY_EXPRESSION", 0) };
  }
  for (const check of CHECKS) {
    const error = check(tokens);
    if (error !== undefined) return { valid: false, error };
  }
  return { valid: true };
}

export function validate(input: string | TokenSequence): ValidationResult {
  if (typeof input !== "string") return validateTokens(input);

  if (cleanExpression(input).length === 0) {
    return { valid: false, error: new CalcError("EMPTY_EXPRESSION", 0) };
  }

  let tokens: Token[];
  try {
    tokens = tokenize(input);
  } catch (err) {
    if (err instanceof CalcError) return { valid: false, error: err };
    throw err;
  }
  return validateTokens(tokens);
}

/** Throws the first validation error instead of returning it. */
export function assertValid(input: string | TokenSequence): void {
  const result = validate(input);
  if (!result.valid) throw result.error;
}
