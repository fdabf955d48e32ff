/**
 * Tests for amount parsing, rounding and tolerance checks.
 */

import { describe, it, expect } from "vitest";
import {
  exceedsTolerance,
  formatCurrency,
  formatPercent,
  parseAmount,
  requireAmount,
  roundCents,
  safeDivide,
} from "../src/amounts.js";
import { LedgerError } from "../src/types.js";

describe("parseAmount", () => {
  it("strips currency symbols and grouping", () => {
    expect(parseAmount("$1,234.56")).toBe(1234.56);
    expect(parseAmount("-$300.00")).toBe(-300);
    expect(parseAmount(" 42 ")).toBe(42);
  });

  it("passes finite numbers through", () => {
    expect(parseAmount(-7.5)).toBe(-7.5);
    expect(parseAmount(Number.NaN)).toBeNull();
  });

  it("returns null for empty markers and garbage", () => {
    expect(parseAmount("")).toBeNull();
    expect(parseAmount("nan")).toBeNull();
    expect(parseAmount("None")).toBeNull();
    expect(parseAmount("12abc")).toBeNull();
    expect(parseAmount(null)).toBeNull();
    expect(parseAmount(undefined)).toBeNull();
  });

  it("requireAmount throws on unusable input", () => {
    expect(requireAmount("$5")).toBe(5);
    expect(() => requireAmount("five", "fund value")).toThrow(LedgerError);
  });
});

describe("roundCents", () => {
  it("rounds half away from zero", () => {
    expect(roundCents(1.125)).toBe(1.13);
    expect(roundCents(-1.125)).toBe(-1.13);
  });

  it("never returns negative zero", () => {
    expect(Object.is(roundCents(-0.001), 0)).toBe(true);
  });
});

describe("formatCurrency", () => {
  it("groups thousands with two decimals", () => {
    expect(formatCurrency(1234567.891)).toBe("$1,234,567.89");
    expect(formatCurrency(-300)).toBe("-$300.00");
    expect(formatCurrency(0)).toBe("$0.00");
  });

  it("formats percentages", () => {
    expect(formatPercent(0.1234)).toBe("12.34%");
    expect(formatPercent(null)).toBe("n/a");
  });
});

describe("exceedsTolerance", () => {
  it("treats a delta equal to the tolerance as within it", () => {
    expect(exceedsTolerance(0.1, 0.1)).toBe(false);
    expect(exceedsTolerance(1000.1 - 1000, 0.1)).toBe(false);
    expect(exceedsTolerance(-0.1, 0.1)).toBe(false);
  });

  it("flags deltas above the tolerance", () => {
    expect(exceedsTolerance(0.11, 0.1)).toBe(true);
    expect(exceedsTolerance(-0.11, 0.1)).toBe(true);
  });
});

describe("safeDivide", () => {
  it("returns null for a null or zero denominator", () => {
    expect(safeDivide(5, null)).toBeNull();
    expect(safeDivide(5, 0)).toBeNull();
    expect(safeDivide(5, 2)).toBe(2.5);
  });
});
