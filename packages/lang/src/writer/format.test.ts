import { describe, it, expect } from "vitest";
import { formatGeneral, formatFixed, formatFloat } from "./format";

describe("formatGeneral", () => {
  it("drops trailing zeros", () => {
    expect(formatGeneral(1)).toBe("1");
    expect(formatGeneral(2.5)).toBe("2.5");
    expect(formatGeneral(-0.25)).toBe("-0.25");
    expect(formatGeneral(100)).toBe("100");
  });

  it("rounds to six significant digits", () => {
    expect(formatGeneral(3.14159265)).toBe("3.14159");
    expect(formatGeneral(123456.7)).toBe("123457");
    expect(formatGeneral(0.1 + 0.2)).toBe("0.3");
  });

  it("switches to exponent form outside [1e-4, 1e6)", () => {
    expect(formatGeneral(1000000)).toBe("1e+06");
    expect(formatGeneral(1234567)).toBe("1.23457e+06");
    expect(formatGeneral(0.0001)).toBe("0.0001");
    expect(formatGeneral(0.00001)).toBe("1e-05");
    expect(formatGeneral(1.5e-10)).toBe("1.5e-10");
    expect(formatGeneral(2e100)).toBe("2e+100");
  });

  it("handles zero and non-finite values", () => {
    expect(formatGeneral(0)).toBe("0");
    expect(formatGeneral(Infinity)).toBe("inf");
    expect(formatGeneral(NaN)).toBe("nan");
  });
});

describe("formatFixed", () => {
  it("pads to the given digits", () => {
    expect(formatFixed(1.5, 3)).toBe("1.500");
    expect(formatFixed(2, 6)).toBe("2.000000");
  });
});

describe("formatFloat", () => {
  it("keeps one decimal for integral values", () => {
    expect(formatFloat(5)).toBe("5.0");
    expect(formatFloat(-12)).toBe("-12.0");
  });

  it("uses the general form otherwise", () => {
    expect(formatFloat(0.75)).toBe("0.75");
    expect(formatFloat(5e9)).toBe("5e+09");
  });
});
