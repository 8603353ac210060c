import type { CalcError, CalcErrorCode } from "./types.js";

type Template = string | ((detail: string) => string);

const MESSAGES: Readonly<Record<CalcErrorCode, Template>> = {
  INVALID_CHARACTER: (ch) => `Invalid character: ${ch}`,
  EMPTY_EXPRESSION: "Expression is empty",
  UNMATCHED_OPEN: "Unclosed parenthesis (",
  UNMATCHED_CLOSE: "Extra closing parenthesis )",
  EMPTY_BRACKETS: "Empty parentheses ()",
  TWO_OPERANDS_IN_ROW: "Two numbers/variables in a row",
  TWO_OPERATORS_IN_ROW: "Two operators in a row",
  STARTS_WITH_OPERATOR: "Expression starts with a binary operator",
  ENDS_WITH_OPERATOR: "Expression ends with an operator",
  OPERATOR_AFTER_OPEN: "Binary operator immediately after (",
  CLOSE_AFTER_OPERATOR: "Closing parenthesis ) after operator",
  CLOSE_AFTER_OPEN: "Closing parenthesis ) immediately after (",
  STARTS_WITH_CLOSE: "Expression starts with )",
  OPERAND_AFTER_CLOSE: "Number/variable immediately after )",
  OPEN_AFTER_OPERAND: "Opening parenthesis ( after number/variable without operator",
  UNKNOWN_FUNCTION: (name) => `Unknown function: ${name}`,
  FUNCTION_WITHOUT_PAREN: (name) => `Function ${name} must be followed by (`,
  UNDEFINED_VARIABLE: (name) => `Variable ${name} is not defined`,
  DIVISION_BY_ZERO: "Division by zero",
  COMPLEX_NOT_SUPPORTED: (op) => `${op} is not defined for complex numbers`,
  LOGARITHM_OF_ZERO: "Logarithm of zero",
  INVALID_FACTORIAL_ARGUMENT: "Factorial requires a non-negative integer",
  UNDEFINED_AT_SINGULARITY: (name) => `${name} is undefined at this point`,
  UNDEFINED_AT_ZERO: (name) => `${name} is undefined at 0`,
  MALFORMED_EXPRESSION: "Internal error: malformed expression",
};

/** Human-readable text for an engine error. */
export function describeError(error: CalcError): string {
  const template = MESSAGES[error.code];
  if (typeof template === "string") return template;
  return template(error.detail ?? "?");
}
