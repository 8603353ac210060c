import { defaultBindings } from "./bindings.js";
import { toPostfix } from "./converter.js";
import { evaluate } from "./evaluator.js";
import { DEFAULT_DISPLAY_PRECISION, formatValue } from "./format.js";
import { cleanExpression, tokenize } from "./lexer.js";
import { assertValid } from "./validator.js";
import type { CompiledExpression, VariableBindings } from "./types.js";

/**
 * Validates, tokenizes and converts once. The result is frozen and can be
 * evaluated any number of times with different bindings.
 */
export function compile(expression: string): CompiledExpression {
  assertValid(expression);
  const tokens = Object.freeze(tokenize(expression));
  const postfix = Object.freeze(toPostfix(tokens));
  return Object.freeze({ source: cleanExpression(expression), tokens, postfix });
}

export function calculate(
  expression: string,
  bindings: VariableBindings = {},
  precision: number = DEFAULT_DISPLAY_PRECISION,
): string {
  const { postfix } = compile(expression);
  return formatValue(evaluate(postfix, defaultBindings(bindings)), precision);
}
