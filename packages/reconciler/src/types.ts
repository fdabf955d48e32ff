/**
 * @fundledger/reconciler domain types.
 *
 * Two reconciliation concerns:
 * - Broker statement P&L, derived two ways and cross-checked
 * - Valuation-date fund values, compared with the carried-forward value
 *
 * Findings are values. Nothing here throws on a discrepancy.
 */

import type { Logger } from "pino";
import type {
  BrokerDayRecord,
  DateString,
  NewOtherTransaction,
  UpsertOutcome,
} from "@fundledger/types";
import type { RebuildResult } from "@fundledger/ledger";

// =============================================================================
// Broker Statements
// =============================================================================

/**
 * A normalized brokerage statement for one day.
 * Absent figures are null.
 */
export interface BrokerStatement {
  readonly date: DateString;
  readonly startingValue: number | null;
  readonly endingValue: number | null;
  readonly depositsWithdrawals: number | null;
  readonly markToMarket: number | null;
  readonly interest: number | null;
  readonly dividends: number | null;
  readonly changeInInterestAccruals: number | null;
  readonly changeInDividendAccruals: number | null;
  readonly commissions: number | null;
  readonly cumulativePnl?: number | null | undefined;
}

/**
 * Where the broker reports interest and dividends.
 *
 * - "gross": outside the mark-to-market figure; the component sum adds them
 * - "net": already inside the change in account value; the NAV delta
 *   subtracts them
 */
export type PnlConvention = "gross" | "net";

export interface ReconcileOptions {
  readonly convention?: PnlConvention | undefined;
  /** Largest |component − NAV delta| still treated as agreement. Default 0.01. */
  readonly tolerance?: number | undefined;
  readonly logger?: Logger | undefined;
}

/** Which method supplied the recorded P&L. */
export type PnlSource = "component" | "nav-delta" | "none";

export interface AccrualFinding {
  readonly date: DateString;
  readonly kind: "interest" | "dividends";
  readonly amount: number;
  readonly accrualChange: number;
  readonly expectedChange: number;
  /** |accrualChange − expectedChange| / |amount| */
  readonly ratio: number;
}

export interface PnlReconciliation {
  readonly date: DateString;
  readonly componentPnl: number | null;
  readonly navDeltaPnl: number | null;
  readonly pnl: number;
  /** |componentPnl − navDeltaPnl| when it exceeds the tolerance, else 0. */
  readonly reportingError: number;
  readonly source: PnlSource;
  readonly accrualFindings: readonly AccrualFinding[];
}

export interface IngestOptions extends ReconcileOptions {
  readonly otherTotalEpoch?: DateString | undefined;
}

export interface IngestResult {
  readonly record: BrokerDayRecord;
  readonly reconciliation: PnlReconciliation;
  readonly outcome: UpsertOutcome;
  readonly rebuild: RebuildResult;
}

// =============================================================================
// Valuation Discrepancies
// =============================================================================

/**
 * A valuation date whose recorded start value differs from the value
 * carried forward from the previous ledger day.
 */
export interface Discrepancy {
  readonly valuationDate: DateString;
  readonly previousDate: DateString;
  /** End fund value + overnight of the previous day. */
  readonly expected: number;
  /** Start fund value on the valuation date. */
  readonly recorded: number;
  /** expected − recorded */
  readonly delta: number;
}

export interface CorrectionProposal {
  readonly discrepancy: Discrepancy;
  readonly transaction: NewOtherTransaction;
}

/**
 * Decides whether a proposed correction is applied.
 * May answer synchronously or asynchronously.
 */
export interface CorrectionDecider {
  confirm(proposal: CorrectionProposal): boolean | Promise<boolean>;
}

export type CorrectionStatus =
  | "converged"          // No discrepancy above tolerance remains
  | "declined"           // The decider rejected a proposal
  | "already-corrected"  // The proposed transaction already exists
  | "max-iterations";    // Gave up after the iteration limit

export interface CorrectionOptions {
  /** Apply every proposal without asking. Overrides `decider`. */
  readonly autoConfirm?: boolean | undefined;
  /** Defaults to declining everything (check only). */
  readonly decider?: CorrectionDecider | undefined;
  /** Default 0.10. */
  readonly tolerance?: number | undefined;
  /** Default 100. */
  readonly maxIterations?: number | undefined;
  readonly otherTotalEpoch?: DateString | undefined;
  readonly logger?: Logger | undefined;
}

export interface CorrectionOutcome {
  /** False only when the iteration limit was reached. */
  readonly success: boolean;
  readonly correctionsApplied: number;
  /** Proposals put to the decider. */
  readonly iterations: number;
  readonly status: CorrectionStatus;
  /** Discrepancies still present when the loop stopped. */
  readonly remaining: readonly Discrepancy[];
  readonly applied: readonly CorrectionProposal[];
}
