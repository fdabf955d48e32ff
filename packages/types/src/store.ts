/**
 * Record Store
 *
 * The persistence port shared by the ledger builder, the reconciler
 * and the CLI. Implementations live in @fundledger/store.
 *
 * Single writer, synchronous. Every write is visible to the next read.
 */

import type {
  BrokerDayRecord,
  DateString,
  LedgerRow,
  NewOtherTransaction,
  OtherTransaction,
  ValuationOverride,
} from "./records.js";

/** Persisted table names. */
export type TableName =
  | "broker"
  | "other_transactions"
  | "valuation_dates"
  | "overall";

export const TABLE_NAMES: readonly TableName[] = [
  "broker",
  "other_transactions",
  "valuation_dates",
  "overall",
] as const;

export function isTableName(value: string): value is TableName {
  return TABLE_NAMES.some((name) => name === value);
}

/** Result of a plain insert that honours the uniqueness constraint. */
export type InsertOutcome = "inserted" | "duplicate";

/** Result of an insert-or-update. */
export type UpsertOutcome = "inserted" | "updated";

/**
 * Persistence port. Input collections come back in no particular date
 * order and consumers sort them; the ledger keeps the order it was
 * written in.
 */
export interface RecordStore {
  // ─── Broker snapshots ───────────────────────────────────────────────
  getBrokerRecords(): readonly BrokerDayRecord[];
  /** Insert or replace the record for its date. */
  upsertBrokerRecord(record: BrokerDayRecord): UpsertOutcome;
  deleteBrokerRecord(date: DateString): boolean;

  // ─── Other transactions ─────────────────────────────────────────────
  getOtherTransactions(): readonly OtherTransaction[];
  /** Insert; an identical unique tuple is reported, not written. */
  insertOtherTransaction(tx: NewOtherTransaction): InsertOutcome;
  /** Insert; an identical unique tuple has its flags and note updated. */
  upsertOtherTransaction(tx: NewOtherTransaction): UpsertOutcome;
  deleteOtherTransaction(id: number): boolean;

  // ─── Valuation overrides ────────────────────────────────────────────
  getValuationOverrides(): readonly ValuationOverride[];
  upsertValuationOverride(override: ValuationOverride): UpsertOutcome;
  deleteValuationOverride(date: DateString): boolean;

  // ─── Derived ledger ─────────────────────────────────────────────────
  getLedger(): readonly LedgerRow[];
  /** Delete every ledger row and insert `rows`, atomically. */
  replaceLedger(rows: readonly LedgerRow[]): void;

  /** Remove every row of a table. */
  clearTable(table: TableName): void;
}
