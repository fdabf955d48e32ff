/**
 * @fundledger/cli — Terminal output.
 *
 * Commands write through a `CliIo` so tests can capture lines. Colour
 * comes from chalk and follows its terminal detection.
 */

import chalk from "chalk";
import { formatCurrency, formatPercent } from "@fundledger/ledger";
import type { LedgerStats, PeriodSummary } from "@fundledger/ledger";
import type { Discrepancy } from "@fundledger/reconciler";
import type { ValuationOverride } from "@fundledger/types";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  /** Ask a yes/no question; resolves true for yes. */
  confirm(question: string): Promise<boolean>;
}

// =============================================================================
// Helpers
// =============================================================================

export function ok(msg: string): string {
  return chalk.green("✓ ") + msg;
}

export function warn(msg: string): string {
  return chalk.yellow("! ") + msg;
}

export function fail(msg: string): string {
  return chalk.red(`✗ ${msg}`);
}

export function info(label: string, value: string): string {
  return chalk.gray(label.padEnd(22)) + value;
}

function table(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? "").length)),
  );
  const line = (cells: readonly string[]) =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();
  return [chalk.bold(line(headers)), ...rows.map(line)];
}

// =============================================================================
// Views
// =============================================================================

export function formatDiscrepancy(d: Discrepancy): string {
  return (
    `${d.valuationDate}: expected ${formatCurrency(d.expected)}, ` +
    `recorded ${formatCurrency(d.recorded)}, difference ${formatCurrency(d.delta)}`
  );
}

export function formatValuationDates(overrides: readonly ValuationOverride[]): string[] {
  return table(
    ["Date", "Fund Value"],
    overrides.map((o) => [o.date, o.fundValue === null ? "-" : formatCurrency(o.fundValue)]),
  );
}

export function formatPeriods(periods: readonly PeriodSummary[]): string[] {
  return table(
    ["Start", "End", "Days", "Starting NAV", "Ending Value", "P&L", "Return"],
    periods.map((p) => [
      p.startDate,
      p.endDate,
      String(p.days),
      p.startingNav === null ? "-" : formatCurrency(p.startingNav),
      p.endingFundValue === null ? "-" : formatCurrency(p.endingFundValue),
      formatCurrency(p.pnl),
      formatPercent(p.periodReturn),
    ]),
  );
}

export function formatStats(stats: LedgerStats): string[] {
  return [
    info("Days", String(stats.rowCount)),
    info("First date", stats.firstDate),
    info("Last date", stats.lastDate),
    info("Total P&L", formatCurrency(stats.totalPnl)),
    info("Average daily P&L", formatCurrency(stats.averagePnl)),
    info("Worst day", formatCurrency(stats.minPnl)),
    info("Best day", formatCurrency(stats.maxPnl)),
  ];
}
