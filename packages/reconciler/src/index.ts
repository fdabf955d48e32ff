/**
 * @fundledger/reconciler — Reconciliation engine for the fund ledger.
 *
 * Two concerns:
 * - Broker statement P&L: component sum vs NAV delta, accrual checks
 * - Valuation discrepancies: detect, propose, decide, apply, rebuild,
 *   repeated to a fixed point
 *
 * Design rules:
 * - Discrepancies are reported as data, never thrown
 * - The corrector has no I/O; decisions come from an injected decider
 * - Every applied correction is followed by a full ledger rebuild
 */

// P&L reconciliation
export {
  computeComponentPnl,
  computeNavDeltaPnl,
  checkAccruals,
  reconcilePnl,
  toBrokerDayRecord,
  ingestBrokerStatement,
  DEFAULT_PNL_TOLERANCE,
  ACCRUAL_TOLERANCE,
} from "./pnl-reconciler.js";

// Valuation discrepancies
export {
  detectDiscrepancies,
  proposeCorrection,
  DEFAULT_DISCREPANCY_TOLERANCE,
  CORRECTION_ACCOUNT,
  CORRECTION_DESCRIPTION,
  CORRECTION_NOTE,
} from "./discrepancy-detector.js";

// Corrector
export {
  correctValuationDiscrepancies,
  autoConfirm,
  declineAll,
  DEFAULT_MAX_ITERATIONS,
} from "./correction-loop.js";

// Types
export type {
  BrokerStatement,
  PnlConvention,
  PnlSource,
  ReconcileOptions,
  PnlReconciliation,
  AccrualFinding,
  IngestOptions,
  IngestResult,
  Discrepancy,
  CorrectionProposal,
  CorrectionDecider,
  CorrectionStatus,
  CorrectionOptions,
  CorrectionOutcome,
} from "./types.js";
