/**
 * Tests for valuation-date (period) tracking.
 */

import { describe, it, expect } from "vitest";
import { computeValuationDates, firstDatesOfMonth } from "../src/valuation-dates.js";

describe("firstDatesOfMonth", () => {
  it("picks the earliest known date of each month", () => {
    const firsts = firstDatesOfMonth([
      "01/31/2023",
      "01/30/2023",
      "02/03/2023",
      "02/01/2023",
    ]);
    expect([...firsts].sort()).toEqual(["01/30/2023", "02/01/2023"]);
  });

  it("keeps the same month of different years apart", () => {
    const firsts = firstDatesOfMonth(["01/10/2024", "01/20/2023", "01/05/2024"]);
    expect(firsts).toEqual(new Set(["01/20/2023", "01/05/2024"]));
  });

  it("ignores malformed dates", () => {
    expect(firstDatesOfMonth(["not-a-date", "03/02/2023"])).toEqual(new Set(["03/02/2023"]));
  });

  it("is empty for no dates", () => {
    expect(firstDatesOfMonth([]).size).toBe(0);
  });
});

describe("computeValuationDates", () => {
  it("unites first-of-month dates with override dates", () => {
    const dates = ["01/03/2023", "01/04/2023", "01/17/2023", "02/01/2023"];
    const result = computeValuationDates(dates, ["01/17/2023"]);
    expect(result).toEqual(new Set(["01/03/2023", "01/17/2023", "02/01/2023"]));
  });

  it("does not duplicate an override that is also a first-of-month date", () => {
    const result = computeValuationDates(["02/01/2023"], ["02/01/2023"]);
    expect(result.size).toBe(1);
  });
});
