import { Decimal } from "decimal.js";
import {
  abs,
  acos,
  acosh,
  asin,
  asinh,
  atan,
  atanh,
  complex,
  cos,
  cosh,
  divide,
  exp,
  log,
  log10,
  log2,
  sin,
  sinh,
  sqrt,
  tan,
  tanh,
  type Complex,
} from "mathjs";
import { CalcError, type CalcErrorCode, type CalcValue } from "./types.js";
import { fromMath, isZero, magnitude, real, toComplex } from "./values.js";

const HalfEvenDecimal = Decimal.clone({ rounding: Decimal.ROUND_HALF_EVEN });

/** tan, cos and sin never hit an exact zero at a multiple of pi in floating point. */
const CIRCULAR_SINGULARITY_TOLERANCE = 1e-12;

/** Largest n whose factorial is finite as a double. */
const MAX_FINITE_FACTORIAL = 170;

// --- Rule variants ---

interface ComplexAwareRule {
  kind: "complex";
  real: (x: number) => unknown;
  complex: (z: Complex) => unknown;
  rejectZero?: CalcErrorCode;
}

interface RealOnlyRule {
  kind: "real";
  rule: (x: number, pos: number) => number;
}

/** 1 / f(x), failing where f(x) vanishes. */
interface ReciprocalRule {
  kind: "reciprocal";
  of: ComplexAwareRule;
  tolerance: number;
}

/** f(1 / x), with the value at x = 0 given explicitly. */
interface InverseReciprocalRule {
  kind: "inverseReciprocal";
  of: ComplexAwareRule;
  atZero: { kind: "error"; code: CalcErrorCode } | { kind: "value"; value: number };
}

export type FunctionRule = ComplexAwareRule | RealOnlyRule | ReciprocalRule | InverseReciprocalRule;

function complexAware(
  realRule: (x: number) => unknown,
  complexRule: (z: Complex) => unknown,
  rejectZero?: CalcErrorCode,
): ComplexAwareRule {
  return { kind: "complex", real: realRule, complex: complexRule, rejectZero };
}

// --- Real-only helpers ---

export function factorial(x: number, pos: number): number {
  if (!Number.isInteger(x) || x < 0) {
    throw new CalcError("INVALID_FACTORIAL_ARGUMENT", pos, String(x));
  }
  if (x > MAX_FINITE_FACTORIAL) return Infinity;
  let result = 1;
  for (let i = 2; i <= x; i++) result *= i;
  return result;
}

export function roundHalfEven(x: number): number {
  if (!Number.isFinite(x)) return x;
  return new HalfEvenDecimal(x).round().toNumber();
}

// --- Real arguments past the real domain ---
//
// A real x is taken as x + 0i, on the upper side of the branch cut, so
// asin(2) = pi/2 + 1.3170i and atanh(2) = 0.5493 + pi/2 i.

function asinBeyondDomain(x: number): Complex {
  return complex(Math.sign(x) * (Math.PI / 2), Math.acosh(Math.abs(x)));
}

function acosBeyondDomain(x: number): Complex {
  return complex(x > 0 ? 0 : Math.PI, -Math.acosh(Math.abs(x)));
}

function atanhBeyondDomain(x: number): Complex {
  return complex(0.5 * Math.log((x + 1) / (x - 1)), Math.PI / 2);
}

// --- Function table ---

const SIN = complexAware((x) => sin(x), (z) => sin(z));
const COS = complexAware((x) => cos(x), (z) => cos(z));
const TAN = complexAware((x) => tan(x), (z) => tan(z));
const ASIN = complexAware((x) => (Math.abs(x) > 1 ? asinBeyondDomain(x) : asin(x)), (z) => asin(z));
const ACOS = complexAware((x) => (Math.abs(x) > 1 ? acosBeyondDomain(x) : acos(x)), (z) => acos(z));
const ATAN = complexAware((x) => atan(x), (z) => atan(z));
const SINH = complexAware((x) => sinh(x), (z) => sinh(z));
const COSH = complexAware((x) => cosh(x), (z) => cosh(z));
const TANH = complexAware((x) => tanh(x), (z) => tanh(z));
const ASINH = complexAware((x) => asinh(x), (z) => asinh(z));
const ACOSH = complexAware((x) => acosh(x), (z) => acosh(z));
const ATANH = complexAware((x) => (Math.abs(x) > 1 ? atanhBeyondDomain(x) : atanh(x)), (z) => atanh(z));

export const FUNCTIONS: Readonly<Record<string, FunctionRule>> = Object.freeze({
  // Roots, powers, logarithms
  sqrt: complexAware((x) => sqrt(x), (z) => sqrt(z)),
  abs: complexAware((x) => abs(x), (z) => abs(z)),
  exp: complexAware((x) => exp(x), (z) => exp(z)),
  ln: complexAware((x) => log(x), (z) => log(z), "LOGARITHM_OF_ZERO"),
  log: complexAware((x) => log10(x), (z) => log10(z), "LOGARITHM_OF_ZERO"),
  log2: complexAware((x) => log2(x), (z) => log2(z), "LOGARITHM_OF_ZERO"),

  // Rounding and integer
  floor: { kind: "real", rule: (x) => Math.floor(x) },
  ceil: { kind: "real", rule: (x) => Math.ceil(x) },
  round: { kind: "real", rule: (x) => roundHalfEven(x) },
  fact: { kind: "real", rule: (x, pos) => factorial(x, pos) },

  // Trigonometric (radians)
  sin: SIN,
  cos: COS,
  tan: TAN,
  cot: { kind: "reciprocal", of: TAN, tolerance: CIRCULAR_SINGULARITY_TOLERANCE },
  sec: { kind: "reciprocal", of: COS, tolerance: CIRCULAR_SINGULARITY_TOLERANCE },
  csc: { kind: "reciprocal", of: SIN, tolerance: CIRCULAR_SINGULARITY_TOLERANCE },
  asin: ASIN,
  acos: ACOS,
  atan: ATAN,
  acot: { kind: "inverseReciprocal", of: ATAN, atZero: { kind: "value", value: Math.PI / 2 } },
  asec: { kind: "inverseReciprocal", of: ACOS, atZero: { kind: "error", code: "UNDEFINED_AT_ZERO" } },
  acsc: { kind: "inverseReciprocal", of: ASIN, atZero: { kind: "error", code: "UNDEFINED_AT_ZERO" } },

  // Hyperbolic
  sinh: SINH,
  cosh: COSH,
  tanh: TANH,
  coth: { kind: "reciprocal", of: TANH, tolerance: 0 },
  sech: { kind: "reciprocal", of: COSH, tolerance: 0 },
  csch: { kind: "reciprocal", of: SINH, tolerance: 0 },
  asinh: ASINH,
  acosh: ACOSH,
  atanh: ATANH,
  acoth: { kind: "inverseReciprocal", of: ATANH, atZero: { kind: "error", code: "UNDEFINED_AT_SINGULARITY" } },
  asech: { kind: "inverseReciprocal", of: ACOSH, atZero: { kind: "error", code: "UNDEFINED_AT_SINGULARITY" } },
  acsch: { kind: "inverseReciprocal", of: ASINH, atZero: { kind: "error", code: "UNDEFINED_AT_SINGULARITY" } },

  // Angle conversion
  rad: { kind: "real", rule: (x) => x * (Math.PI / 180) },
  deg: { kind: "real", rule: (x) => x * (180 / Math.PI) },
} satisfies Record<string, FunctionRule>);

export function isFunctionName(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(FUNCTIONS, name);
}

// --- Application ---

function reciprocal(v: CalcValue, pos: number): CalcValue {
  return v.kind === "real" ? real(1 / v.value) : fromMath(divide(1, toComplex(v)), pos);
}

function applyComplexAware(name: string, rule: ComplexAwareRule, v: CalcValue, pos: number): CalcValue {
  if (rule.rejectZero !== undefined && isZero(v)) {
    throw new CalcError(rule.rejectZero, pos, name);
  }
  return v.kind === "real"
    ? fromMath(rule.real(v.value), pos)
    : fromMath(rule.complex(toComplex(v)), pos);
}

export function applyFunction(name: string, v: CalcValue, pos: number): CalcValue {
  const rule = FUNCTIONS[name];
  if (rule === undefined) {
    throw new CalcError("MALFORMED_EXPRESSION", pos, name);
  }

  switch (rule.kind) {
    case "complex":
      return applyComplexAware(name, rule, v, pos);

    case "real":
      if (v.kind === "complex") {
        throw new CalcError("COMPLEX_NOT_SUPPORTED", pos, name);
      }
      return real(rule.rule(v.value, pos));

    case "reciprocal": {
      const denominator = applyComplexAware(name, rule.of, v, pos);
      if (isZero(denominator) || magnitude(denominator) < rule.tolerance) {
        throw new CalcError("UNDEFINED_AT_SINGULARITY", pos, name);
      }
      return reciprocal(denominator, pos);
    }

    case "inverseReciprocal":
      if (isZero(v)) {
        if (rule.atZero.kind === "value") return real(rule.atZero.value);
        throw new CalcError(rule.atZero.code, pos, name);
      }
      return applyComplexAware(name, rule.of, reciprocal(v, pos), pos);

    default: {
      const unreachable: never = rule;
      throw new CalcError("MALFORMED_EXPRESSION", pos, String(unreachable));
    }
  }
}
