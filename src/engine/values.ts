import { complex, isComplex, type Complex } from "mathjs";
import { CalcError, NO_POS, type CalcValue } from "./types.js";

export function real(value: number): CalcValue {
  return { kind: "real", value };
}

export function complexValue(re: number, im: number): CalcValue {
  return { kind: "complex", re, im };
}

export function toValue(input: number | CalcValue): CalcValue {
  return typeof input === "number" ? real(input) : input;
}

export function isComplexValue(v: CalcValue): v is Extract<CalcValue, { kind: "complex" }> {
  return v.kind === "complex";
}

export function isZero(v: CalcValue): boolean {
  return v.kind === "real" ? v.value === 0 : v.re === 0 && v.im === 0;
}

/** Magnitude, for near-zero checks on both variants. */
export function magnitude(v: CalcValue): number {
  return v.kind === "real" ? Math.abs(v.value) : Math.hypot(v.re, v.im);
}

export function toComplex(v: CalcValue): Complex {
  return v.kind === "real" ? complex(v.value, 0) : complex(v.re, v.im);
}

/**
 * Normalizes a mathjs result. mathjs returns a plain number when the real
 * result exists and a Complex when it promoted (sqrt(-1), asin(2), ...).
 */
export function fromMath(result: unknown, pos: number = NO_POS): CalcValue {
  if (typeof result === "number") return real(result);
  if (isComplex(result)) return complexValue(result.re, result.im);
  throw new CalcError("MALFORMED_EXPRESSION", pos, typeof result);
}
