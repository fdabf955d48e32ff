/**
 * Runtime Type Guards
 *
 * Narrowing functions for fund-ledger records.
 * Used at system boundaries (database rows, JSON input files).
 */

import type {
  BrokerDayRecord,
  DateString,
  LedgerRow,
  OtherTransaction,
  ValuationOverride,
} from "./records.js";

const DATE_PATTERN = /^\d{2}\/\d{2}\/\d{4}$/;

const BROKER_NUMERIC_FIELDS = [
  "pnl",
  "reportingError",
  "cumulativePnl",
  "markToMarket",
  "changeInDividendAccruals",
  "interest",
  "dividends",
  "depositsWithdrawals",
  "changeInInterestAccruals",
  "commissions",
  "totalBroker",
] as const;

const LEDGER_NULLABLE_FIELDS = [
  "brokerPnl",
  "totalBroker",
  "periodStartingNav",
  "startFundValueWithCumPnl",
  "endFundValueWithCumPnl",
  "dailyReturn",
  "periodCumulativePnl",
  "periodCumulativeReturn",
] as const;

const LEDGER_NUMERIC_FIELDS = [
  "otherPnl",
  "totalOther",
  "overnight",
  "totalPnl",
  "startFundValue",
  "endFundValue",
] as const;

// =============================================================================
// Primitives
// =============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function isNullableNumber(value: unknown): value is number | null {
  return value === null || isFiniteNumber(value);
}

/** Shape check only; calendar validity is checked by the ledger's date parser. */
export function isDateString(value: unknown): value is DateString {
  return typeof value === "string" && DATE_PATTERN.test(value);
}

// =============================================================================
// Records
// =============================================================================

export function isBrokerDayRecord(value: unknown): value is BrokerDayRecord {
  if (!isPlainObject(value)) return false;
  if (!isDateString(value.date)) return false;
  return BROKER_NUMERIC_FIELDS.every((field) => isNullableNumber(value[field]));
}

export function isOtherTransaction(value: unknown): value is OtherTransaction {
  if (!isPlainObject(value)) return false;
  return (
    typeof value.id === "number" &&
    Number.isInteger(value.id) &&
    isDateString(value.date) &&
    isFiniteNumber(value.amount) &&
    typeof value.accountDescription === "string" &&
    typeof value.transactionDescription === "string" &&
    typeof value.countedInPnl === "boolean" &&
    typeof value.overnight === "boolean" &&
    (value.additionalInfo === null || typeof value.additionalInfo === "string")
  );
}

export function isValuationOverride(value: unknown): value is ValuationOverride {
  if (!isPlainObject(value)) return false;
  return isDateString(value.date) && isNullableNumber(value.fundValue);
}

export function isLedgerRow(value: unknown): value is LedgerRow {
  if (!isPlainObject(value)) return false;
  if (!isDateString(value.date)) return false;
  return (
    LEDGER_NUMERIC_FIELDS.every((field) => isFiniteNumber(value[field])) &&
    LEDGER_NULLABLE_FIELDS.every((field) => isNullableNumber(value[field]))
  );
}
