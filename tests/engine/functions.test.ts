import { describe, expect, it } from "vitest";
import { FUNCTIONS, applyFunction, factorial, isFunctionName, roundHalfEven } from "../../src/engine/functions.js";
import type { CalcValue } from "../../src/engine/types.js";
import { complexValue, real } from "../../src/engine/values.js";
import { calcErrorOf } from "./helpers.js";

function apply(name: string, v: CalcValue | number): CalcValue {
  return applyFunction(name, typeof v === "number" ? real(v) : v, 0);
}

function realOf(name: string, x: number): number {
  const v = apply(name, x);
  if (v.kind !== "real") throw new Error(`expected a real result from ${name}(${x})`);
  return v.value;
}

describe("function table", () => {
  it("defines 36 functions", () => {
    expect(Object.keys(FUNCTIONS)).toHaveLength(36);
  });

  it("isFunctionName only matches own entries", () => {
    expect(isFunctionName("sin")).toBe(true);
    expect(isFunctionName("log2")).toBe(true);
    expect(isFunctionName("foo")).toBe(false);
    expect(isFunctionName("toString")).toBe(false);
  });

  it("throws MALFORMED_EXPRESSION for a name outside the table", () => {
    expect(calcErrorOf(() => apply("nope", 1)).code).toBe("MALFORMED_EXPRESSION");
  });
});

describe("roots, powers and logarithms", () => {
  it("sqrt of a positive real stays real", () => {
    expect(apply("sqrt", 4)).toEqual({ kind: "real", value: 2 });
  });

  it("sqrt(-1) is the imaginary unit", () => {
    expect(apply("sqrt", -1)).toEqual({ kind: "complex", re: 0, im: 1 });
  });

  it("abs of a complex value is its modulus", () => {
    expect(apply("abs", complexValue(3, 4))).toEqual({ kind: "real", value: 5 });
    expect(realOf("abs", -3)).toBe(3);
  });

  it("log is base 10 and log2 base 2", () => {
    expect(realOf("log", 100)).toBe(2);
    expect(realOf("log2", 8)).toBe(3);
  });

  it("ln of a negative real is complex", () => {
    expect(apply("ln", -1)).toEqual({ kind: "complex", re: 0, im: Math.PI });
  });

  it.each(["ln", "log", "log2"])("%s(0) throws LOGARITHM_OF_ZERO", (name) => {
    const err = calcErrorOf(() => apply(name, 0));
    expect(err.code).toBe("LOGARITHM_OF_ZERO");
    expect(err.detail).toBe(name);
  });

  it("exp(i*pi) is close to -1", () => {
    const v = apply("exp", complexValue(0, Math.PI));
    expect(v.kind).toBe("complex");
    if (v.kind === "complex") {
      expect(v.re).toBeCloseTo(-1, 12);
      expect(v.im).toBeCloseTo(0, 12);
    }
  });
});

describe("rounding and integer functions", () => {
  it("floor and ceil", () => {
    expect(realOf("floor", -2.5)).toBe(-3);
    expect(realOf("ceil", 2.1)).toBe(3);
  });

  it("round uses half-to-even", () => {
    expect(realOf("round", 2.5)).toBe(2);
    expect(realOf("round", 3.5)).toBe(4);
    expect(realOf("round", -2.5)).toBe(-2);
    expect(realOf("round", 2.6)).toBe(3);
  });

  it("roundHalfEven passes non-finite values through", () => {
    expect(roundHalfEven(Infinity)).toBe(Infinity);
    expect(Number.isNaN(roundHalfEven(NaN))).toBe(true);
  });

  it("rejects complex arguments", () => {
    const err = calcErrorOf(() => apply("floor", complexValue(1, 1)));
    expect(err.code).toBe("COMPLEX_NOT_SUPPORTED");
    expect(err.detail).toBe("floor");
  });
});

describe("factorial", () => {
  it("computes small factorials", () => {
    expect(factorial(0, 0)).toBe(1);
    expect(factorial(5, 0)).toBe(120);
    expect(realOf("fact", 10)).toBe(3628800);
  });

  it("overflows to Infinity past 170", () => {
    expect(Number.isFinite(factorial(170, 0))).toBe(true);
    expect(factorial(171, 0)).toBe(Infinity);
  });

  it.each([-1, 2.5])("rejects %d", (x) => {
    const err = calcErrorOf(() => factorial(x, 3));
    expect(err.code).toBe("INVALID_FACTORIAL_ARGUMENT");
    expect(err.pos).toBe(3);
  });
});

describe("trigonometric", () => {
  it("sin(pi/2) is 1", () => {
    expect(realOf("sin", Math.PI / 2)).toBeCloseTo(1, 9);
  });

  it("sec(0) is 1", () => {
    expect(realOf("sec", 0)).toBe(1);
  });

  it.each([
    ["cot", 0],
    ["csc", Math.PI],
    ["csc", 0],
  ])("%s(%d) is a singularity", (name, x) => {
    const err = calcErrorOf(() => apply(name, x));
    expect(err.code).toBe("UNDEFINED_AT_SINGULARITY");
    expect(err.detail).toBe(name);
  });

  it("acot(0) is pi/2", () => {
    expect(realOf("acot", 0)).toBe(Math.PI / 2);
  });

  it("acot(1) is pi/4", () => {
    expect(realOf("acot", 1)).toBeCloseTo(Math.PI / 4, 12);
  });

  it("asec(2) is pi/3", () => {
    expect(realOf("asec", 2)).toBeCloseTo(Math.PI / 3, 12);
  });

  it.each(["asec", "acsc"])("%s(0) throws UNDEFINED_AT_ZERO", (name) => {
    expect(calcErrorOf(() => apply(name, 0)).code).toBe("UNDEFINED_AT_ZERO");
  });
});

describe("real arguments outside the real domain", () => {
  const ACOSH_2 = 1.3169578969248166;
  const ATANH_HALF_LOG_3 = 0.5493061443340549;

  it.each([
    ["asin", 2, Math.PI / 2, ACOSH_2],
    ["asin", -2, -Math.PI / 2, ACOSH_2],
    ["acos", 2, 0, -ACOSH_2],
    ["acos", -2, Math.PI, -ACOSH_2],
    ["atanh", 2, ATANH_HALF_LOG_3, Math.PI / 2],
    ["atanh", -2, -ATANH_HALF_LOG_3, Math.PI / 2],
    ["acsc", 0.5, Math.PI / 2, ACOSH_2],
    ["asec", 0.5, 0, -ACOSH_2],
    ["acoth", 0.5, ATANH_HALF_LOG_3, Math.PI / 2],
  ])("%s(%d) takes the upper side of the branch cut", (name, x, re, im) => {
    const v = apply(name, x);
    expect(v.kind).toBe("complex");
    if (v.kind === "complex") {
      expect(v.re).toBeCloseTo(re, 12);
      expect(v.im).toBeCloseTo(im, 12);
    }
  });

  it("stays real on the domain boundary", () => {
    expect(realOf("asin", 1)).toBe(Math.PI / 2);
    expect(realOf("acos", -1)).toBe(Math.PI);
  });
});

describe("hyperbolic", () => {
  it("cosh(0) is 1", () => {
    expect(realOf("cosh", 0)).toBe(1);
  });

  it.each(["coth", "csch"])("%s(0) is a singularity", (name) => {
    expect(calcErrorOf(() => apply(name, 0)).code).toBe("UNDEFINED_AT_SINGULARITY");
  });

  it.each(["acoth", "asech", "acsch"])("%s(0) throws UNDEFINED_AT_SINGULARITY", (name) => {
    expect(calcErrorOf(() => apply(name, 0)).code).toBe("UNDEFINED_AT_SINGULARITY");
  });

  it("acsch(1) is asinh(1)", () => {
    expect(realOf("acsch", 1)).toBeCloseTo(Math.asinh(1), 12);
  });
});

describe("angle conversion", () => {
  it("rad and deg", () => {
    expect(realOf("rad", 180)).toBeCloseTo(Math.PI, 12);
    expect(realOf("deg", Math.PI)).toBeCloseTo(180, 10);
  });
});
