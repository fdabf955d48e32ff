/**
 * @fundledger/types — Shared record types for the fund ledger.
 *
 * Used across all packages:
 * - Broker day snapshots, other transactions, valuation overrides
 * - The derived ledger row
 * - The RecordStore persistence port
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards check shape only; the ledger and reconciler interpret values
 */

export type {
  DateString,
  BrokerDayRecord,
  NewOtherTransaction,
  OtherTransaction,
  ValuationOverride,
  LedgerRow,
} from "./records.js";

export type {
  TableName,
  InsertOutcome,
  UpsertOutcome,
  RecordStore,
} from "./store.js";
export { TABLE_NAMES, isTableName } from "./store.js";

// Runtime type guards
export {
  isPlainObject,
  isFiniteNumber,
  isNullableNumber,
  isDateString,
  isBrokerDayRecord,
  isOtherTransaction,
  isValuationOverride,
  isLedgerRow,
} from "./guards.js";
