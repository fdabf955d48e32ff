/**
 * @fundledger/store — SQLite RecordStore on better-sqlite3.
 *
 * One database file holds the four tables. Booleans are stored as 0/1.
 * Every row read back is narrowed with the guards from @fundledger/types.
 * Rows that do not fit, such as dates written as "2/1/2023" by older
 * tools, are skipped with a warning. A NULL amount reads as 0.
 * Reads come back in storage order; callers sort by date.
 */

import Database from "better-sqlite3";
import type { Logger } from "pino";
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
import {
  isBrokerDayRecord,
  isLedgerRow,
  isOtherTransaction,
  isPlainObject,
  isTableName,
  isValuationOverride,
} from "@fundledger/types";
import {
  BROKER_COLUMNS,
  LEDGER_COLUMNS,
  SCHEMA,
  insertStatement,
  selectList,
} from "./schema.js";
import { StoreError } from "./types.js";

const SELECT_OTHER = `
SELECT id,
  Date AS "date",
  Amount AS "amount",
  "Account Description" AS "accountDescription",
  "Transaction Description" AS "transactionDescription",
  "Counted in P&L" AS "countedInPnl",
  Overnight AS "overnight",
  "Additional Info" AS "additionalInfo"
FROM other_transactions
ORDER BY id`;

const INSERT_OTHER = `
INSERT OR IGNORE INTO other_transactions
  (Date, Amount, "Account Description", "Transaction Description",
   "Counted in P&L", Overnight, "Additional Info")
VALUES (@date, @amount, @accountDescription, @transactionDescription,
   @countedInPnl, @overnight, @additionalInfo)`;

const FIND_OTHER = `
SELECT id FROM other_transactions
WHERE Date = @date
  AND "Account Description" = @accountDescription
  AND "Transaction Description" = @transactionDescription
  AND Amount = @amount`;

const UPDATE_OTHER_FLAGS = `
UPDATE other_transactions
SET "Counted in P&L" = @countedInPnl, Overnight = @overnight, "Additional Info" = @additionalInfo
WHERE id = @id`;

interface OtherTransactionParams {
  readonly date: DateString;
  readonly amount: number;
  readonly accountDescription: string;
  readonly transactionDescription: string;
  readonly countedInPnl: 0 | 1;
  readonly overnight: 0 | 1;
  readonly additionalInfo: string | null;
}

function toParams(tx: NewOtherTransaction): OtherTransactionParams {
  return {
    date: tx.date,
    amount: tx.amount,
    accountDescription: tx.accountDescription,
    transactionDescription: tx.transactionDescription,
    countedInPnl: tx.countedInPnl ? 1 : 0,
    overnight: tx.overnight ? 1 : 0,
    additionalInfo: tx.additionalInfo,
  };
}

function toOtherTransaction(row: unknown): OtherTransaction | null {
  if (isPlainObject(row)) {
    const candidate = {
      id: row.id,
      date: row.date,
      amount: row.amount ?? 0,
      accountDescription: row.accountDescription ?? "",
      transactionDescription: row.transactionDescription ?? "",
      countedInPnl: row.countedInPnl === 1,
      overnight: row.overnight === 1,
      additionalInfo: row.additionalInfo ?? null,
    };
    if (isOtherTransaction(candidate)) return candidate;
  }
  return null;
}

function narrowWith<T>(guard: (row: unknown) => row is T): (row: unknown) => T | null {
  return (row) => (guard(row) ? row : null);
}

export interface SqliteStoreOptions {
  /** Receives a warning for each skipped row. */
  readonly logger?: Logger | undefined;
}

/**
 * RecordStore backed by a SQLite database file.
 *
 * Pass ":memory:" for a throwaway database. Tables are created on open.
 */
export class SqliteRecordStore implements RecordStore {
  private readonly _db: Database.Database;
  private readonly _logger: Logger | undefined;

  constructor(filename = ":memory:", options: SqliteStoreOptions = {}) {
    this._db = new Database(filename);
    this._logger = options.logger;
    for (const ddl of SCHEMA) {
      this._db.exec(ddl);
    }
  }

  close(): void {
    this._db.close();
  }

  private _readRows<T>(table: TableName, sql: string, narrow: (row: unknown) => T | null): T[] {
    const records: T[] = [];
    for (const row of this._db.prepare(sql).all()) {
      const record = narrow(row);
      if (record === null) {
        this._logger?.warn({ table, row }, "Skipping malformed row");
        continue;
      }
      records.push(record);
    }
    return records;
  }

  // ─── Broker ─────────────────────────────────────────────────────────

  getBrokerRecords(): readonly BrokerDayRecord[] {
    return this._readRows(
      "broker",
      `SELECT ${selectList(BROKER_COLUMNS)} FROM broker`,
      narrowWith(isBrokerDayRecord),
    );
  }

  upsertBrokerRecord(record: BrokerDayRecord): UpsertOutcome {
    const upsert = this._db.transaction((r: BrokerDayRecord): UpsertOutcome => {
      const existing = this._db.prepare("SELECT 1 FROM broker WHERE Date = ?").get(r.date);
      this._db.prepare(insertStatement("broker", BROKER_COLUMNS, "INSERT OR REPLACE")).run(r);
      return existing === undefined ? "inserted" : "updated";
    });
    return upsert(record);
  }

  deleteBrokerRecord(date: DateString): boolean {
    return this._db.prepare("DELETE FROM broker WHERE Date = ?").run(date).changes > 0;
  }

  // ─── Other Transactions ─────────────────────────────────────────────

  getOtherTransactions(): readonly OtherTransaction[] {
    return this._readRows("other_transactions", SELECT_OTHER, toOtherTransaction);
  }

  insertOtherTransaction(tx: NewOtherTransaction): InsertOutcome {
    const result = this._db.prepare(INSERT_OTHER).run(toParams(tx));
    return result.changes > 0 ? "inserted" : "duplicate";
  }

  upsertOtherTransaction(tx: NewOtherTransaction): UpsertOutcome {
    const upsert = this._db.transaction((params: OtherTransactionParams): UpsertOutcome => {
      const found = this._db.prepare(FIND_OTHER).get(params);
      if (isPlainObject(found) && typeof found.id === "number") {
        this._db.prepare(UPDATE_OTHER_FLAGS).run({ ...params, id: found.id });
        return "updated";
      }
      this._db.prepare(INSERT_OTHER).run(params);
      return "inserted";
    });
    return upsert(toParams(tx));
  }

  deleteOtherTransaction(id: number): boolean {
    return this._db.prepare("DELETE FROM other_transactions WHERE id = ?").run(id).changes > 0;
  }

  // ─── Valuation Overrides ────────────────────────────────────────────

  getValuationOverrides(): readonly ValuationOverride[] {
    return this._readRows(
      "valuation_dates",
      'SELECT Date AS "date", "Fund Value" AS "fundValue" FROM valuation_dates',
      narrowWith(isValuationOverride),
    );
  }

  upsertValuationOverride(override: ValuationOverride): UpsertOutcome {
    const upsert = this._db.transaction((o: ValuationOverride): UpsertOutcome => {
      const existing = this._db.prepare("SELECT 1 FROM valuation_dates WHERE Date = ?").get(o.date);
      this._db
        .prepare('INSERT OR REPLACE INTO valuation_dates (Date, "Fund Value") VALUES (?, ?)')
        .run(o.date, o.fundValue);
      return existing === undefined ? "inserted" : "updated";
    });
    return upsert(override);
  }

  deleteValuationOverride(date: DateString): boolean {
    return this._db.prepare("DELETE FROM valuation_dates WHERE Date = ?").run(date).changes > 0;
  }

  // ─── Ledger ─────────────────────────────────────────────────────────

  getLedger(): readonly LedgerRow[] {
    return this._readRows(
      "overall",
      `SELECT ${selectList(LEDGER_COLUMNS)} FROM overall ORDER BY rowid`,
      narrowWith(isLedgerRow),
    );
  }

  replaceLedger(rows: readonly LedgerRow[]): void {
    const insert = this._db.prepare(insertStatement("overall", LEDGER_COLUMNS));
    const replace = this._db.transaction((all: readonly LedgerRow[]) => {
      this._db.exec("DELETE FROM overall");
      for (const row of all) insert.run(row);
    });
    replace(rows);
  }

  clearTable(table: TableName): void {
    if (!isTableName(table)) {
      throw new StoreError("UNKNOWN_TABLE", `Unknown table: ${String(table)}`, String(table));
    }
    this._db.exec(`DELETE FROM ${table}`);
  }
}
