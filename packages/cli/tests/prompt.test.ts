import { describe, it, expect } from "vitest";
import { isYes, terminalDecider } from "../src/prompt.js";
import { fakeIo } from "./fixtures.js";

describe("isYes", () => {
  it.each(["y", "Y", "yes", " YES "])("accepts %j", (answer) => {
    expect(isYes(answer)).toBe(true);
  });

  it.each(["", "n", "no", "yep", "y e s"])("rejects %j", (answer) => {
    expect(isYes(answer)).toBe(false);
  });
});

describe("terminalDecider", () => {
  it("shows the discrepancy and asks about the correction", async () => {
    const io = fakeIo([true]);
    const accepted = await terminalDecider(io).confirm({
      discrepancy: {
        valuationDate: "02/01/2023",
        previousDate: "01/31/2023",
        expected: 10200,
        recorded: 10500,
        delta: -300,
      },
      transaction: {
        date: "01/31/2023",
        amount: 300,
        accountDescription: "Adjustment",
        transactionDescription: "Valuation correction",
        countedInPnl: false,
        overnight: true,
        additionalInfo: null,
      },
    });

    expect(accepted).toBe(true);
    expect(io.lines).toEqual([
      "02/01/2023: expected $10,200.00, recorded $10,500.00, difference -$300.00",
    ]);
    expect(io.questions).toEqual(["Add an overnight correction of $300.00 on 01/31/2023?"]);
  });
});
