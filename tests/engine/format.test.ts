import { describe, expect, it } from "vitest";
import { formatNumber, formatPostfix, formatValue, tokenText } from "../../src/engine/format.js";
import { tokenize } from "../../src/engine/lexer.js";
import { complexValue, real } from "../../src/engine/values.js";

describe("formatNumber", () => {
  it("hides float noise", () => {
    expect(formatNumber(0.1 + 0.2)).toBe("0.3");
  });

  it("prints integers without a decimal point", () => {
    expect(formatNumber(123456)).toBe("123456");
    expect(formatNumber(-4)).toBe("-4");
  });

  it("rounds to the requested significant digits", () => {
    expect(formatNumber(2 / 3, 5)).toBe("0.66667");
    expect(formatNumber(Math.PI)).toBe("3.14159265358979");
  });

  it("switches to exponent notation for very large and small magnitudes", () => {
    expect(formatNumber(1e21)).toBe("1e+21");
    expect(formatNumber(1e-7)).toBe("1e-7");
    expect(formatNumber(0.000001)).toBe("0.000001");
  });

  it("prints negative zero as 0", () => {
    expect(formatNumber(-0)).toBe("0");
  });

  it("passes non-finite values through", () => {
    expect(formatNumber(Infinity)).toBe("Infinity");
    expect(formatNumber(-Infinity)).toBe("-Infinity");
    expect(formatNumber(NaN)).toBe("NaN");
  });
});

describe("formatValue", () => {
  it("formats reals", () => {
    expect(formatValue(real(14))).toBe("14");
  });

  it("formats a purely imaginary value with a j suffix", () => {
    expect(formatValue(complexValue(0, 1))).toBe("1j");
    expect(formatValue(complexValue(0, -1))).toBe("-1j");
  });

  it("formats both parts with the sign between them", () => {
    expect(formatValue(complexValue(2, 3))).toBe("2 + 3j");
    expect(formatValue(complexValue(1.5, -2))).toBe("1.5 - 2j");
  });

  it("prints a complex with zero imaginary part as a real", () => {
    expect(formatValue(complexValue(3, 0))).toBe("3");
  });

  it("applies precision to both parts", () => {
    expect(formatValue(complexValue(1 / 3, 2 / 3), 3)).toBe("0.333 + 0.667j");
  });
});

describe("formatPostfix", () => {
  it("joins token text with spaces", () => {
    expect(formatPostfix(tokenize("2 + x"))).toBe("2 + x");
  });

  it("names unary signs", () => {
    const [minus, , , plus] = tokenize("-2 * +3");
    expect(minus && tokenText(minus)).toBe("neg");
    expect(plus && tokenText(plus)).toBe("pos");
  });
});
