/**
 * @fundledger/ledger — Period returns and ledger statistics.
 *
 * Read-only views over built ledger rows.
 */

import type { DateString, LedgerRow } from "@fundledger/types";
import { safeDivide } from "./amounts.js";
import type { LedgerStats, PeriodSummary } from "./types.js";

interface OpenPeriod {
  readonly first: LedgerRow;
  last: LedgerRow;
  days: number;
  pnl: number;
}

function closePeriod(period: OpenPeriod): PeriodSummary {
  const startingNav = period.first.periodStartingNav;
  return {
    startDate: period.first.date,
    endDate: period.last.date,
    days: period.days,
    startingNav,
    endingFundValue: period.last.endFundValueWithCumPnl,
    pnl: period.pnl,
    periodReturn: safeDivide(period.pnl, startingNav),
  };
}

/**
 * Group ledger rows into valuation periods.
 *
 * A period opens on each valuation date and runs until the day before
 * the next one. Rows before the first valuation date belong to no period.
 */
export function summarizePeriods(
  rows: readonly LedgerRow[],
  valuationDates: ReadonlySet<DateString>,
): PeriodSummary[] {
  const periods: PeriodSummary[] = [];
  let open: OpenPeriod | null = null;

  for (const row of rows) {
    if (valuationDates.has(row.date)) {
      if (open !== null) periods.push(closePeriod(open));
      open = { first: row, last: row, days: 1, pnl: row.totalPnl };
      continue;
    }
    if (open === null) continue;
    open.last = row;
    open.days += 1;
    open.pnl += row.totalPnl;
  }

  if (open !== null) periods.push(closePeriod(open));
  return periods;
}

/**
 * Statistics over Total P&L, or null for an empty ledger.
 */
export function computeLedgerStats(rows: readonly LedgerRow[]): LedgerStats | null {
  const first = rows[0];
  const last = rows[rows.length - 1];
  if (first === undefined || last === undefined) return null;

  let total = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const row of rows) {
    total += row.totalPnl;
    min = Math.min(min, row.totalPnl);
    max = Math.max(max, row.totalPnl);
  }

  return {
    rowCount: rows.length,
    firstDate: first.date,
    lastDate: last.date,
    totalPnl: total,
    averagePnl: total / rows.length,
    minPnl: min,
    maxPnl: max,
  };
}
