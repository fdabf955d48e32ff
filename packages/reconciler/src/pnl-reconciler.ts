/**
 * P&L Reconciler
 *
 * Derives a broker day's P&L two independent ways and cross-checks them:
 *
 * - Component sum: mark-to-market + accrual changes + commissions
 *   (+ interest and dividends under the gross convention)
 * - NAV delta: ending − starting − deposits/withdrawals
 *   (− interest and dividends under the net convention)
 *
 * The component sum is authoritative. A disagreement above the tolerance
 * is recorded as the day's reporting error, never thrown.
 */

import type { BrokerDayRecord, RecordStore } from "@fundledger/types";
import {
  LedgerError,
  compareDates,
  exceedsTolerance,
  isValidDate,
  rebuildLedger,
} from "@fundledger/ledger";
import type {
  AccrualFinding,
  BrokerStatement,
  IngestOptions,
  IngestResult,
  PnlConvention,
  PnlReconciliation,
  ReconcileOptions,
} from "./types.js";

export const DEFAULT_PNL_TOLERANCE = 0.01;

/** Accrual changes may diverge from −amount by this share of |amount|. */
export const ACCRUAL_TOLERANCE = 0.1;

function sumPresent(values: readonly (number | null)[]): number | null {
  let total: number | null = null;
  for (const value of values) {
    if (value !== null) total = (total ?? 0) + value;
  }
  return total;
}

// =============================================================================
// Methods
// =============================================================================

/**
 * Component-sum P&L, or null when every component is missing.
 */
export function computeComponentPnl(
  statement: BrokerStatement,
  convention: PnlConvention = "gross",
): number | null {
  const components = [
    statement.markToMarket,
    statement.changeInInterestAccruals,
    statement.changeInDividendAccruals,
    statement.commissions,
  ];
  if (convention === "gross") {
    components.push(statement.interest, statement.dividends);
  }
  return sumPresent(components);
}

/**
 * NAV-delta P&L, or null without both a starting and an ending value.
 * Missing deposits/withdrawals count as zero.
 */
export function computeNavDeltaPnl(
  statement: BrokerStatement,
  convention: PnlConvention = "gross",
): number | null {
  const { startingValue, endingValue } = statement;
  if (startingValue === null || endingValue === null) return null;

  let pnl = endingValue - startingValue - (statement.depositsWithdrawals ?? 0);
  if (convention === "net") {
    pnl -= (statement.interest ?? 0) + (statement.dividends ?? 0);
  }
  return pnl;
}

// =============================================================================
// Accruals
// =============================================================================

/**
 * Receiving interest or a dividend should draw down the matching accrual
 * by the same amount. Flags days where it moved by more than 10% less or
 * more than that.
 */
export function checkAccruals(
  statement: BrokerStatement,
  options: Pick<ReconcileOptions, "logger"> = {},
): AccrualFinding[] {
  const checks = [
    { kind: "interest", amount: statement.interest, change: statement.changeInInterestAccruals },
    { kind: "dividends", amount: statement.dividends, change: statement.changeInDividendAccruals },
  ] as const;

  const findings: AccrualFinding[] = [];
  for (const { kind, amount, change } of checks) {
    if (amount === null || amount === 0 || change === null || change === 0) continue;

    const expectedChange = -amount;
    const ratio = Math.abs(change - expectedChange) / Math.abs(amount);
    if (ratio <= ACCRUAL_TOLERANCE) continue;

    const finding: AccrualFinding = {
      date: statement.date,
      kind,
      amount,
      accrualChange: change,
      expectedChange,
      ratio,
    };
    options.logger?.warn(finding, "Accrual change does not match the amount received");
    findings.push(finding);
  }
  return findings;
}

// =============================================================================
// Reconciliation
// =============================================================================

export function reconcilePnl(
  statement: BrokerStatement,
  options: ReconcileOptions = {},
): PnlReconciliation {
  const { logger } = options;
  const convention = options.convention ?? "gross";
  const tolerance = options.tolerance ?? DEFAULT_PNL_TOLERANCE;
  const date = statement.date;

  const componentPnl = computeComponentPnl(statement, convention);
  const navDeltaPnl = computeNavDeltaPnl(statement, convention);
  const accrualFindings = checkAccruals(statement, { logger });

  const base = { date, componentPnl, navDeltaPnl, accrualFindings };

  if (componentPnl !== null && navDeltaPnl !== null) {
    const delta = Math.abs(componentPnl - navDeltaPnl);
    if (exceedsTolerance(delta, tolerance)) {
      logger?.warn({ date, componentPnl, navDeltaPnl, delta }, "P&L methods disagree");
      return { ...base, pnl: componentPnl, reportingError: delta, source: "component" };
    }
    return { ...base, pnl: componentPnl, reportingError: 0, source: "component" };
  }

  if (componentPnl !== null) {
    logger?.warn({ date }, "Could not verify P&L: starting or ending value missing");
    return { ...base, pnl: componentPnl, reportingError: 0, source: "component" };
  }

  if (navDeltaPnl !== null) {
    return { ...base, pnl: navDeltaPnl, reportingError: 0, source: "nav-delta" };
  }

  logger?.warn({ date }, "No P&L figures in statement; recording 0");
  return { ...base, pnl: 0, reportingError: 0, source: "none" };
}

/** The broker row stored for a reconciled statement. */
export function toBrokerDayRecord(
  statement: BrokerStatement,
  reconciliation: PnlReconciliation,
): BrokerDayRecord {
  return {
    date: statement.date,
    pnl: reconciliation.pnl,
    reportingError: reconciliation.reportingError,
    cumulativePnl: statement.cumulativePnl ?? null,
    markToMarket: statement.markToMarket,
    changeInDividendAccruals: statement.changeInDividendAccruals,
    interest: statement.interest,
    dividends: statement.dividends,
    depositsWithdrawals: statement.depositsWithdrawals,
    changeInInterestAccruals: statement.changeInInterestAccruals,
    commissions: statement.commissions,
    totalBroker: statement.endingValue,
  };
}

// =============================================================================
// Ingest
// =============================================================================

function previousTotalBroker(store: RecordStore, date: string): number | null {
  let previous: BrokerDayRecord | null = null;
  for (const record of store.getBrokerRecords()) {
    if (!isValidDate(record.date) || compareDates(record.date, date) >= 0) continue;
    if (previous === null || compareDates(record.date, previous.date) > 0) {
      previous = record;
    }
  }
  return previous?.totalBroker ?? null;
}

/**
 * Reconcile a statement, store it and rebuild the ledger.
 *
 * A statement without a starting value takes the previous stored day's
 * Total Broker.
 *
 * @throws {LedgerError} INVALID_DATE for a malformed statement date
 */
export function ingestBrokerStatement(
  store: RecordStore,
  statement: BrokerStatement,
  options: IngestOptions = {},
): IngestResult {
  if (!isValidDate(statement.date)) {
    throw new LedgerError("INVALID_DATE", `Invalid statement date: "${statement.date}"`);
  }

  const resolved: BrokerStatement =
    statement.startingValue === null
      ? { ...statement, startingValue: previousTotalBroker(store, statement.date) }
      : statement;

  const reconciliation = reconcilePnl(resolved, options);
  const record = toBrokerDayRecord(resolved, reconciliation);
  const outcome = store.upsertBrokerRecord(record);
  options.logger?.info({ date: record.date, pnl: record.pnl, outcome }, "Broker record stored");

  const rebuild = rebuildLedger(store, {
    otherTotalEpoch: options.otherTotalEpoch,
    logger: options.logger,
  });

  return { record, reconciliation, outcome, rebuild };
}
