export type BinarySymbol = "+" | "-" | "*" | "/" | "%" | "//" | "^" | "**";
export type SignSymbol = "+" | "-";
export type Arity = "unary" | "binary";

export type Token =
  | { readonly kind: "number"; readonly text: string; readonly pos: number }
  | { readonly kind: "identifier"; readonly name: string; readonly pos: number }
  | { readonly kind: "operator"; readonly symbol: BinarySymbol; readonly arity: Arity; readonly pos: number }
  | { readonly kind: "open"; readonly pos: number }
  | { readonly kind: "close"; readonly pos: number };

export type TokenSequence = readonly Token[];

export type NumberToken = Extract<Token, { kind: "number" }>;
export type OperatorToken = Extract<Token, { kind: "operator" }>;
export type IdentifierToken = Extract<Token, { kind: "identifier" }>;

export type CalcValue =
  | { readonly kind: "real"; readonly value: number }
  | { readonly kind: "complex"; readonly re: number; readonly im: number };

export type VariableBindings = Readonly<Record<string, number | CalcValue>>;

export type CalcErrorCode =
  // lexical
  | "INVALID_CHARACTER"
  // grammar
  | "EMPTY_EXPRESSION"
  | "UNMATCHED_OPEN"
  | "UNMATCHED_CLOSE"
  | "EMPTY_BRACKETS"
  | "TWO_OPERANDS_IN_ROW"
  | "TWO_OPERATORS_IN_ROW"
  | "STARTS_WITH_OPERATOR"
  | "ENDS_WITH_OPERATOR"
  | "OPERATOR_AFTER_OPEN"
  | "CLOSE_AFTER_OPERATOR"
  | "CLOSE_AFTER_OPEN"
  | "STARTS_WITH_CLOSE"
  | "OPERAND_AFTER_CLOSE"
  | "OPEN_AFTER_OPERAND"
  | "UNKNOWN_FUNCTION"
  | "FUNCTION_WITHOUT_PAREN"
  // evaluation
  | "UNDEFINED_VARIABLE"
  | "DIVISION_BY_ZERO"
  | "COMPLEX_NOT_SUPPORTED"
  | "LOGARITHM_OF_ZERO"
  | "INVALID_FACTORIAL_ARGUMENT"
  | "UNDEFINED_AT_SINGULARITY"
  | "UNDEFINED_AT_ZERO"
  | "MALFORMED_EXPRESSION";

/** No source position (evaluation-time failures on values rather than text). */
export const NO_POS = -1;

export class CalcError extends Error {
  constructor(
    public code: CalcErrorCode,
    public pos: number,
    public detail?: string,
  ) {
    super(detail === undefined ? code : `${code} '${detail}'`);
    this.name = "CalcError";
  }
}

export function isInternalError(code: CalcErrorCode): boolean {
  return code === "MALFORMED_EXPRESSION";
}

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly error: CalcError };

export interface CompiledExpression {
  readonly source: string;
  readonly tokens: TokenSequence;
  readonly postfix: TokenSequence;
}
