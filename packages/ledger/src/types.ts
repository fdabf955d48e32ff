/**
 * @fundledger/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Ledger rows are derived; the ledger is rebuilt, never patched
 * - Missing data is not an error: an empty input yields an empty ledger
 */

import type { Logger } from "pino";
import type {
  BrokerDayRecord,
  DateString,
  LedgerRow,
  OtherTransaction,
  ValuationOverride,
} from "@fundledger/types";

// ─── Input ───────────────────────────────────────────────────────────────

/** The three input collections a ledger build reads. */
export interface LedgerInput {
  readonly brokerRecords: readonly BrokerDayRecord[];
  readonly otherTransactions: readonly OtherTransaction[];
  readonly valuationOverrides: readonly ValuationOverride[];
}

/**
 * Options for building the ledger.
 */
export interface BuildOptions {
  /**
   * Date on which the running other-transaction total restarts from zero.
   * Without it the total accumulates from the first known date.
   */
  readonly otherTotalEpoch?: DateString | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Result of a full rebuild against a store.
 */
export interface RebuildResult {
  /** False when there was no broker data and the ledger was cleared. */
  readonly built: boolean;
  readonly rows: readonly LedgerRow[];
  readonly valuationDates: ReadonlySet<DateString>;
}

// ─── Reports ─────────────────────────────────────────────────────────────

/**
 * One valuation period: from a valuation date up to the day before the next.
 */
export interface PeriodSummary {
  readonly startDate: DateString;
  readonly endDate: DateString;
  readonly days: number;
  readonly startingNav: number | null;
  /** End Fund Value (NAV + Cum. P&L) on the last day of the period. */
  readonly endingFundValue: number | null;
  readonly pnl: number;
  readonly periodReturn: number | null;
}

/**
 * Aggregate statistics over the Total P&L column.
 */
export interface LedgerStats {
  readonly rowCount: number;
  readonly firstDate: DateString;
  readonly lastDate: DateString;
  readonly totalPnl: number;
  readonly averagePnl: number;
  readonly minPnl: number;
  readonly maxPnl: number;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_DATE"
  | "INVALID_AMOUNT"
  | "INVALID_OPTION";

/**
 * Structured error from the ledger engine.
 * Raised for programming and configuration errors only; data gaps
 * and discrepancies are reported as values.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
