/**
 * Tests for calendar date handling.
 */

import { describe, it, expect } from "vitest";
import {
  compareDates,
  formatDate,
  isValidDate,
  monthKey,
  normalizeDate,
  parseDate,
  sortDates,
} from "../src/dates.js";
import { LedgerError } from "../src/types.js";

describe("parseDate", () => {
  it("parses MM/DD/YYYY", () => {
    expect(parseDate("01/15/2023")).toEqual({ year: 2023, month: 1, day: 15 });
  });

  it("rejects impossible dates", () => {
    expect(parseDate("02/30/2023")).toBeNull();
    expect(parseDate("13/01/2023")).toBeNull();
    expect(parseDate("00/10/2023")).toBeNull();
  });

  it("accepts February 29 only in leap years", () => {
    expect(isValidDate("02/29/2024")).toBe(true);
    expect(isValidDate("02/29/2023")).toBe(false);
  });

  it("rejects other shapes", () => {
    expect(parseDate("2023-01-15")).toBeNull();
    expect(parseDate("1/15/2023")).toBeNull();
    expect(parseDate("")).toBeNull();
  });
});

describe("normalizeDate", () => {
  it("pads single-digit US dates", () => {
    expect(normalizeDate("1/5/2023")).toBe("01/05/2023");
  });

  it("converts ISO dates", () => {
    expect(normalizeDate("2023-03-07")).toBe("03/07/2023");
  });

  it("converts long-form dates", () => {
    expect(normalizeDate("January 15, 2023")).toBe("01/15/2023");
    expect(normalizeDate("  december 1,2022 ")).toBe("12/01/2022");
  });

  it("returns null for unknown month names and bad values", () => {
    expect(normalizeDate("Smarch 1, 2023")).toBeNull();
    expect(normalizeDate("2023-02-31")).toBeNull();
    expect(normalizeDate("yesterday")).toBeNull();
  });
});

describe("ordering", () => {
  it("orders by calendar value, not by string", () => {
    // Lexically "01/05/2024" < "12/31/2023"
    expect(compareDates("12/31/2023", "01/05/2024")).toBeLessThan(0);
    expect(sortDates(["01/05/2024", "12/31/2023", "06/15/2023"])).toEqual([
      "06/15/2023",
      "12/31/2023",
      "01/05/2024",
    ]);
  });

  it("throws LedgerError for malformed input", () => {
    expect(() => compareDates("bad", "01/01/2023")).toThrow(LedgerError);
  });

  it("formats and keys months", () => {
    const date = { year: 2023, month: 2, day: 3 };
    expect(formatDate(date)).toBe("02/03/2023");
    expect(monthKey(date)).toBe("2023-02");
  });
});
