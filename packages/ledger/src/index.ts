/**
 * @fundledger/ledger — Daily fund-value ledger engine.
 *
 * Builds the chronological fund-value series from broker snapshots,
 * other transactions and valuation overrides:
 * - Carry-forward start values (previous end + previous overnight)
 * - Valuation periods with a resetting starting NAV
 * - Daily and period-cumulative returns
 *
 * Design rules:
 * - The ledger is a pure function of its inputs
 * - Rebuilt in full on every change, never patched
 * - Gaps in the data are values (null), not exceptions
 */

// Builder
export { buildLedger, ledgerDates, rebuildLedger } from "./ledger-builder.js";

// Period tracking
export { computeValuationDates, firstDatesOfMonth } from "./valuation-dates.js";

// Reports
export { summarizePeriods, computeLedgerStats } from "./periods.js";

// Dates
export {
  parseDate,
  isValidDate,
  formatDate,
  normalizeDate,
  dateKey,
  monthKey,
  compareDates,
  sortDates,
} from "./dates.js";
export type { CalendarDate } from "./dates.js";

// Amounts
export {
  parseAmount,
  requireAmount,
  roundCents,
  formatCurrency,
  formatPercent,
  exceedsTolerance,
  safeDivide,
} from "./amounts.js";

// Types
export type {
  LedgerInput,
  BuildOptions,
  RebuildResult,
  PeriodSummary,
  LedgerStats,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
