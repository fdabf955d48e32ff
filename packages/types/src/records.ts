/**
 * Record Types
 *
 * The three input collections of the fund ledger and the derived
 * ledger row.
 *
 * Rules:
 * - Dates are always `MM/DD/YYYY` strings; order them by calendar value
 * - Absent numeric values are `null`, never `NaN` or `0`
 * - Ledger rows are derived data and are replaced as a whole
 */

/** A calendar date in `MM/DD/YYYY` form. */
export type DateString = string;

/**
 * One brokerage statement day. At most one record per date.
 */
export interface BrokerDayRecord {
  readonly date: DateString;
  /** Authoritative P&L for the day (component-sum method when available). */
  readonly pnl: number | null;
  /** Absolute difference between the two P&L methods, 0 when they agree. */
  readonly reportingError: number | null;
  readonly cumulativePnl: number | null;
  readonly markToMarket: number | null;
  readonly changeInDividendAccruals: number | null;
  readonly interest: number | null;
  readonly dividends: number | null;
  readonly depositsWithdrawals: number | null;
  readonly changeInInterestAccruals: number | null;
  readonly commissions: number | null;
  /** Ending account value for the day. */
  readonly totalBroker: number | null;
}

/**
 * An ad-hoc cash movement outside the brokerage account.
 *
 * (date, accountDescription, transactionDescription, amount) is unique.
 */
export interface NewOtherTransaction {
  readonly date: DateString;
  /** Signed amount. */
  readonly amount: number;
  readonly accountDescription: string;
  readonly transactionDescription: string;
  readonly countedInPnl: boolean;
  /** Settles into the next day's starting value instead of today's end. */
  readonly overnight: boolean;
  readonly additionalInfo: string | null;
}

/** A stored other-transaction, with its store-assigned id. */
export interface OtherTransaction extends NewOtherTransaction {
  readonly id: number;
}

/**
 * A user-designated valuation date. The row's presence alone makes the
 * date a valuation date; `fundValue` optionally pins the day's start value.
 */
export interface ValuationOverride {
  readonly date: DateString;
  readonly fundValue: number | null;
}

/**
 * One derived day of the fund ledger.
 *
 * `null` means "not yet computable" (e.g. before the first valuation
 * date), not an error.
 */
export interface LedgerRow {
  readonly date: DateString;
  readonly brokerPnl: number | null;
  readonly totalBroker: number | null;
  readonly otherPnl: number;
  /** Running total of all other-transaction amounts through this day. */
  readonly totalOther: number;
  /** Sum of the day's overnight-flagged amounts. */
  readonly overnight: number;
  readonly totalPnl: number;
  readonly periodStartingNav: number | null;
  /** Start Fund Value (Accounts Total). */
  readonly startFundValue: number;
  /** End Fund Value (Accounts Total). */
  readonly endFundValue: number;
  /** Start Fund Value (NAV + Cum. P&L). */
  readonly startFundValueWithCumPnl: number | null;
  /** End Fund Value (NAV + Cum. P&L). */
  readonly endFundValueWithCumPnl: number | null;
  readonly dailyReturn: number | null;
  /** P&L accumulated since the period start, including this day. */
  readonly periodCumulativePnl: number | null;
  readonly periodCumulativeReturn: number | null;
}
