/**
 * Discrepancy detection and correction proposals.
 *
 * On a valuation date the recorded start value (usually an override) can
 * differ from what the previous day carried forward. A correction is an
 * overnight transaction on the previous day for the difference: it leaves
 * that day's end value and P&L alone and moves the carried-forward value
 * onto the recorded one.
 */

import type { DateString, LedgerRow, NewOtherTransaction } from "@fundledger/types";
import { exceedsTolerance, roundCents } from "@fundledger/ledger";
import type { CorrectionProposal, Discrepancy } from "./types.js";

export const DEFAULT_DISCREPANCY_TOLERANCE = 0.1;

export const CORRECTION_ACCOUNT = "Correction";
export const CORRECTION_DESCRIPTION = "Valuation Correction";
export const CORRECTION_NOTE = "Automatic correction for valuation discrepancy";

/**
 * Every valuation date (other than the first ledger row) whose start value
 * is more than `tolerance` away from the carried-forward value, in ledger
 * order.
 */
export function detectDiscrepancies(
  rows: readonly LedgerRow[],
  valuationDates: ReadonlySet<DateString>,
  tolerance: number = DEFAULT_DISCREPANCY_TOLERANCE,
): Discrepancy[] {
  const found: Discrepancy[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const previous = rows[i - 1];
    if (row === undefined || previous === undefined) continue;
    if (!valuationDates.has(row.date)) continue;

    const expected = previous.endFundValue + previous.overnight;
    const recorded = row.startFundValue;
    const delta = expected - recorded;
    if (exceedsTolerance(delta, tolerance)) {
      found.push({
        valuationDate: row.date,
        previousDate: previous.date,
        expected,
        recorded,
        delta,
      });
    }
  }
  return found;
}

export function proposeCorrection(discrepancy: Discrepancy): CorrectionProposal {
  const transaction: NewOtherTransaction = {
    date: discrepancy.previousDate,
    amount: roundCents(-discrepancy.delta),
    accountDescription: CORRECTION_ACCOUNT,
    transactionDescription: CORRECTION_DESCRIPTION,
    countedInPnl: false,
    overnight: true,
    additionalInfo: CORRECTION_NOTE,
  };
  return { discrepancy, transaction };
}
