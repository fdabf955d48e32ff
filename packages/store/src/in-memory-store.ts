/**
 * @fundledger/store — In-memory RecordStore implementation.
 *
 * Keeps every collection in plain maps. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * All state is lost on process exit.
 */

import type {
  BrokerDayRecord,
  DateString,
  InsertOutcome,
  LedgerRow,
  NewOtherTransaction,
  OtherTransaction,
  RecordStore,
  TableName,
  UpsertOutcome,
  ValuationOverride,
} from "@fundledger/types";
import { isTableName } from "@fundledger/types";
import { StoreError } from "./types.js";

function uniqueKey(tx: NewOtherTransaction): string {
  return JSON.stringify([
    tx.date,
    tx.accountDescription,
    tx.transactionDescription,
    tx.amount,
  ]);
}

export class InMemoryRecordStore implements RecordStore {
  private readonly _broker = new Map<DateString, BrokerDayRecord>();
  private readonly _other = new Map<number, OtherTransaction>();
  private readonly _overrides = new Map<DateString, ValuationOverride>();
  private _ledger: readonly LedgerRow[] = [];

  /** Ids are never reused, matching AUTOINCREMENT. */
  private _nextId = 1;

  // ─── Broker ─────────────────────────────────────────────────────────

  getBrokerRecords(): readonly BrokerDayRecord[] {
    return [...this._broker.values()];
  }

  upsertBrokerRecord(record: BrokerDayRecord): UpsertOutcome {
    const outcome = this._broker.has(record.date) ? "updated" : "inserted";
    this._broker.set(record.date, { ...record });
    return outcome;
  }

  deleteBrokerRecord(date: DateString): boolean {
    return this._broker.delete(date);
  }

  // ─── Other Transactions ─────────────────────────────────────────────

  getOtherTransactions(): readonly OtherTransaction[] {
    return [...this._other.values()];
  }

  insertOtherTransaction(tx: NewOtherTransaction): InsertOutcome {
    if (this._findByUniqueKey(tx) !== undefined) return "duplicate";
    this._insert(tx);
    return "inserted";
  }

  upsertOtherTransaction(tx: NewOtherTransaction): UpsertOutcome {
    const existing = this._findByUniqueKey(tx);
    if (existing === undefined) {
      this._insert(tx);
      return "inserted";
    }
    this._other.set(existing.id, { ...tx, id: existing.id });
    return "updated";
  }

  deleteOtherTransaction(id: number): boolean {
    return this._other.delete(id);
  }

  // ─── Valuation Overrides ────────────────────────────────────────────

  getValuationOverrides(): readonly ValuationOverride[] {
    return [...this._overrides.values()];
  }

  upsertValuationOverride(override: ValuationOverride): UpsertOutcome {
    const outcome = this._overrides.has(override.date) ? "updated" : "inserted";
    this._overrides.set(override.date, { ...override });
    return outcome;
  }

  deleteValuationOverride(date: DateString): boolean {
    return this._overrides.delete(date);
  }

  // ─── Ledger ─────────────────────────────────────────────────────────

  getLedger(): readonly LedgerRow[] {
    return this._ledger;
  }

  replaceLedger(rows: readonly LedgerRow[]): void {
    this._ledger = rows.map((row) => ({ ...row }));
  }

  clearTable(table: TableName): void {
    if (!isTableName(table)) {
      throw new StoreError("UNKNOWN_TABLE", `Unknown table: ${String(table)}`, String(table));
    }
    switch (table) {
      case "broker":
        this._broker.clear();
        break;
      case "other_transactions":
        this._other.clear();
        break;
      case "valuation_dates":
        this._overrides.clear();
        break;
      case "overall":
        this._ledger = [];
        break;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _findByUniqueKey(tx: NewOtherTransaction): OtherTransaction | undefined {
    const key = uniqueKey(tx);
    for (const existing of this._other.values()) {
      if (uniqueKey(existing) === key) return existing;
    }
    return undefined;
  }

  private _insert(tx: NewOtherTransaction): void {
    const id = this._nextId++;
    this._other.set(id, { ...tx, id });
  }
}
