import { Decimal } from "decimal.js";
import type { CalcValue, Token, TokenSequence } from "./types.js";

export const DEFAULT_DISPLAY_PRECISION = 15;

const DisplayDecimal = Decimal.clone({ precision: 64, toExpNeg: -7, toExpPos: 21 });

/**
 * Rounds to `precision` significant digits so float noise such as
 * 0.30000000000000004 prints as 0.3. Negative zero prints as 0.
 */
export function formatNumber(x: number, precision: number = DEFAULT_DISPLAY_PRECISION): string {
  if (Number.isNaN(x)) return "NaN";
  if (!Number.isFinite(x)) return x > 0 ? "Infinity" : "-Infinity";
  return new DisplayDecimal(x).toSignificantDigits(precision).toString();
}

/**
 * `<real>`, `<imag>j`, `<real> + <imag>j` or `<real> - <imag>j`. A complex
 * value with a zero imaginary part prints as a plain real.
 */
export function formatValue(v: CalcValue, precision: number = DEFAULT_DISPLAY_PRECISION): string {
  if (v.kind === "real") return formatNumber(v.value, precision);
  if (v.im === 0) return formatNumber(v.re, precision);
  if (v.re === 0) return `${formatNumber(v.im, precision)}j`;

  const re = formatNumber(v.re, precision);
  return v.im > 0
    ? `${re} + ${formatNumber(v.im, precision)}j`
    : `${re} - ${formatNumber(-v.im, precision)}j`;
}

export function tokenText(tok: Token): string {
  switch (tok.kind) {
    case "number":
      return tok.text;
    case "identifier":
      return tok.name;
    case "operator":
      if (tok.arity === "unary") return tok.symbol === "-" ? "neg" : "pos";
      return tok.symbol;
    case "open":
      return "(";
    case "close":
      return ")";
  }
}

/** Space-separated token text, e.g. `2 3 4 * +`. Unary signs print as `neg`/`pos`. */
export function formatPostfix(tokens: TokenSequence): string {
  return tokens.map(tokenText).join(" ");
}
