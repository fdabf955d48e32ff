/**
 * Tests for SqliteRecordStore specifics.
 *
 * Verifies:
 * - Persistence: rows survive reopening the database file
 * - Schema: table and column names of the on-disk format
 * - Booleans stored as 0/1
 * - Rows written by older tools: malformed ones skipped, NULL amounts as 0
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import pino from "pino";
import type { Logger } from "pino";
import { SqliteRecordStore } from "../src/sqlite-store.js";

let testDir: string;
let dbPath: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "fundledger-store-"));
  dbPath = join(testDir, "daily_accounting.db");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function captureLogger(): { logger: Logger; lines: unknown[] } {
  const lines: unknown[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

/** Write SQL straight to the file, bypassing the store. */
function seedRaw(sql: string): void {
  const db = new Database(dbPath);
  db.exec(sql);
  db.close();
}

function columnsOf(db: Database.Database, table: string): string[] {
  return db
    .prepare(`PRAGMA table_info(${table})`)
    .all()
    .map((row) => {
      if (typeof row === "object" && row !== null && "name" in row && typeof row.name === "string") {
        return row.name;
      }
      throw new Error("unexpected pragma row");
    });
}

describe("SqliteRecordStore", () => {
  it("persists rows across reopen", () => {
    const first = new SqliteRecordStore(dbPath);
    first.upsertValuationOverride({ date: "03/01/2023", fundValue: 2500.5 });
    first.close();

    const second = new SqliteRecordStore(dbPath);
    expect(second.getValuationOverrides()).toEqual([{ date: "03/01/2023", fundValue: 2500.5 }]);
    second.close();
  });

  it("creates the four tables with their column names", () => {
    new SqliteRecordStore(dbPath).close();
    const db = new Database(dbPath, { readonly: true });

    expect(columnsOf(db, "broker")).toEqual([
      "Date",
      "P&L",
      "Reporting Error",
      "Cumulative P&L",
      "Mark-to-Market",
      "Change in Dividend Accruals",
      "Interest",
      "Dividends",
      "Deposits & Withdrawals",
      "Change in Interest Accruals",
      "Commissions",
      "Total Broker",
    ]);
    expect(columnsOf(db, "other_transactions")).toEqual([
      "id",
      "Date",
      "Amount",
      "Account Description",
      "Transaction Description",
      "Counted in P&L",
      "Overnight",
      "Additional Info",
    ]);
    expect(columnsOf(db, "valuation_dates")).toEqual(["Date", "Fund Value"]);
    expect(columnsOf(db, "overall")).toHaveLength(15);
    expect(columnsOf(db, "overall")[10]).toBe("Start Fund Value (NAV + Cum. P&L)");
    db.close();
  });

  it("stores booleans as 0 and 1", () => {
    const store = new SqliteRecordStore(dbPath);
    store.insertOtherTransaction({
      date: "01/15/2023",
      amount: -300,
      accountDescription: "Checking",
      transactionDescription: "Sweep",
      countedInPnl: false,
      overnight: true,
      additionalInfo: null,
    });
    store.close();

    const db = new Database(dbPath, { readonly: true });
    const row = db
      .prepare('SELECT "Counted in P&L" AS counted, Overnight AS overnight FROM other_transactions')
      .get();
    expect(row).toEqual({ counted: 0, overnight: 1 });
    db.close();
  });
});

describe("SqliteRecordStore with rows from older tools", () => {
  it("skips a valuation date that is not MM/DD/YYYY and logs it", () => {
    const { logger, lines } = captureLogger();
    const store = new SqliteRecordStore(dbPath, { logger });
    seedRaw(`INSERT INTO valuation_dates (Date, "Fund Value") VALUES
      ('2/1/2023', 500), ('03/01/2023', 2500)`);

    expect(store.getValuationOverrides()).toEqual([{ date: "03/01/2023", fundValue: 2500 }]);
    expect(lines).toEqual([
      expect.objectContaining({
        msg: "Skipping malformed row",
        table: "valuation_dates",
        row: { date: "2/1/2023", fundValue: 500 },
      }),
    ]);
    store.close();
  });

  it("reads a NULL amount as 0", () => {
    const store = new SqliteRecordStore(dbPath);
    seedRaw(`INSERT INTO other_transactions
      (Date, Amount, "Account Description", "Transaction Description", "Counted in P&L", Overnight)
      VALUES ('01/31/2023', NULL, 'Checking', 'Fee', 1, 0)`);

    expect(store.getOtherTransactions()).toEqual([
      {
        id: 1,
        date: "01/31/2023",
        amount: 0,
        accountDescription: "Checking",
        transactionDescription: "Fee",
        countedInPnl: true,
        overnight: false,
        additionalInfo: null,
      },
    ]);
    store.close();
  });

  it("skips other transactions and broker rows with malformed dates", () => {
    const store = new SqliteRecordStore(dbPath);
    seedRaw(`
      INSERT INTO other_transactions (Date, Amount, "Account Description", "Transaction Description")
        VALUES ('1/31/2023', 10, 'Checking', 'Fee');
      INSERT INTO broker (Date, "P&L", "Total Broker") VALUES ('2023-01-31', 5, 100), ('01/31/2023', 5, 100);
    `);

    expect(store.getOtherTransactions()).toEqual([]);
    expect(store.getBrokerRecords().map((r) => r.date)).toEqual(["01/31/2023"]);
    store.close();
  });
});
