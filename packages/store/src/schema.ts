/**
 * @fundledger/store — SQLite schema.
 *
 * Table and column names are part of the on-disk format and are kept
 * as they are, spaces and punctuation included. Each column map pairs
 * a record field with its column, in column order.
 */

import type { BrokerDayRecord, LedgerRow, TableName } from "@fundledger/types";

export const CREATE_BROKER = `
CREATE TABLE IF NOT EXISTS broker (
  Date TEXT PRIMARY KEY,
  "P&L" REAL,
  "Reporting Error" REAL,
  "Cumulative P&L" REAL,
  "Mark-to-Market" REAL,
  "Change in Dividend Accruals" REAL,
  Interest REAL,
  Dividends REAL,
  "Deposits & Withdrawals" REAL,
  "Change in Interest Accruals" REAL,
  Commissions REAL,
  "Total Broker" REAL
)`;

export const CREATE_OTHER_TRANSACTIONS = `
CREATE TABLE IF NOT EXISTS other_transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  Date TEXT NOT NULL,
  Amount REAL,
  "Account Description" TEXT,
  "Transaction Description" TEXT,
  "Counted in P&L" BOOLEAN,
  Overnight BOOLEAN,
  "Additional Info" TEXT,
  UNIQUE(Date, "Account Description", "Transaction Description", Amount)
)`;

export const CREATE_VALUATION_DATES = `
CREATE TABLE IF NOT EXISTS valuation_dates (
  Date TEXT PRIMARY KEY,
  "Fund Value" REAL
)`;

export const CREATE_OVERALL = `
CREATE TABLE IF NOT EXISTS overall (
  Date TEXT PRIMARY KEY,
  "Broker P&L" REAL,
  "Total Broker" REAL,
  "Other P&L" REAL,
  "Total Other" REAL,
  Overnight REAL,
  "Total P&L" REAL,
  "Period Starting NAV" REAL,
  "Start Fund Value (Accounts Total)" REAL,
  "End Fund Value (Accounts Total)" REAL,
  "Start Fund Value (NAV + Cum. P&L)" REAL,
  "End Fund Value (NAV + Cum. P&L)" REAL,
  "Daily Return" REAL,
  "Period Cumulative P&L" REAL,
  "Period Cumulative Return" REAL
)`;

export const SCHEMA: readonly string[] = [
  CREATE_BROKER,
  CREATE_OTHER_TRANSACTIONS,
  CREATE_VALUATION_DATES,
  CREATE_OVERALL,
];

// ─── Column Maps ─────────────────────────────────────────────────────────

export type ColumnMap<T> = readonly (readonly [keyof T & string, string])[];

export const BROKER_COLUMNS: ColumnMap<BrokerDayRecord> = [
  ["date", "Date"],
  ["pnl", "P&L"],
  ["reportingError", "Reporting Error"],
  ["cumulativePnl", "Cumulative P&L"],
  ["markToMarket", "Mark-to-Market"],
  ["changeInDividendAccruals", "Change in Dividend Accruals"],
  ["interest", "Interest"],
  ["dividends", "Dividends"],
  ["depositsWithdrawals", "Deposits & Withdrawals"],
  ["changeInInterestAccruals", "Change in Interest Accruals"],
  ["commissions", "Commissions"],
  ["totalBroker", "Total Broker"],
];

export const LEDGER_COLUMNS: ColumnMap<LedgerRow> = [
  ["date", "Date"],
  ["brokerPnl", "Broker P&L"],
  ["totalBroker", "Total Broker"],
  ["otherPnl", "Other P&L"],
  ["totalOther", "Total Other"],
  ["overnight", "Overnight"],
  ["totalPnl", "Total P&L"],
  ["periodStartingNav", "Period Starting NAV"],
  ["startFundValue", "Start Fund Value (Accounts Total)"],
  ["endFundValue", "End Fund Value (Accounts Total)"],
  ["startFundValueWithCumPnl", "Start Fund Value (NAV + Cum. P&L)"],
  ["endFundValueWithCumPnl", "End Fund Value (NAV + Cum. P&L)"],
  ["dailyReturn", "Daily Return"],
  ["periodCumulativePnl", "Period Cumulative P&L"],
  ["periodCumulativeReturn", "Period Cumulative Return"],
];

/** Double-quote an identifier. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** `"Column" AS field, ...` for a SELECT list. */
export function selectList<T>(columns: ColumnMap<T>): string {
  return columns.map(([field, column]) => `${quoteIdentifier(column)} AS ${quoteIdentifier(field)}`).join(", ");
}

/** `INSERT INTO table ("A", "B") VALUES (@a, @b)` with named parameters. */
export function insertStatement<T>(table: TableName, columns: ColumnMap<T>, verb = "INSERT"): string {
  const names = columns.map(([, column]) => quoteIdentifier(column)).join(", ");
  const params = columns.map(([field]) => `@${field}`).join(", ");
  return `${verb} INTO ${table} (${names}) VALUES (${params})`;
}
