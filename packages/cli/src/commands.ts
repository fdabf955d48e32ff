/**
 * @fundledger/cli — Command dispatcher.
 *
 * `runCli(argv, deps)` parses one command line, opens the store, runs
 * the command against an AccountingService and returns the exit code.
 * Every error is printed and mapped to exit code 1.
 */

import { parseArgs } from "node:util";
import type { ParseArgsConfig } from "node:util";
import type { Logger } from "pino";
import type { RecordStore } from "@fundledger/types";
import { TABLE_NAMES, isTableName } from "@fundledger/types";
import { formatCurrency, normalizeDate, requireAmount } from "@fundledger/ledger";
import type { AppConfig } from "./config.js";
import { CliError, describeError } from "./errors.js";
import {
  BrokerStatementSchema,
  OtherTransactionSchema,
  ValuationOverrideSchema,
  readRecords,
} from "./inputs.js";
import {
  fail,
  formatDiscrepancy,
  formatPeriods,
  formatStats,
  formatValuationDates,
  ok,
  warn,
} from "./output.js";
import type { CliIo } from "./output.js";
import { terminalDecider } from "./prompt.js";
import { AccountingService } from "./services/accounting-service.js";

type ParseArgsOptionsConfig = NonNullable<ParseArgsConfig["options"]>;

// =============================================================================
// Types
// =============================================================================

export interface OpenedStore {
  readonly store: RecordStore;
  close(): void;
}

export interface CliDeps {
  readonly config: AppConfig;
  readonly io: CliIo;
  readonly openStore: (path: string) => OpenedStore;
  readonly logger?: Logger | undefined;
}

type OptionValues = Record<string, string | boolean | (string | boolean)[] | undefined>;

interface CommandContext {
  readonly service: AccountingService;
  readonly io: CliIo;
  readonly args: readonly string[];
  readonly values: OptionValues;
}

interface Command {
  readonly usage: string;
  readonly args: number;
  readonly options: ParseArgsOptionsConfig;
  run(ctx: CommandContext): Promise<number>;
}

// =============================================================================
// Argument Helpers
// =============================================================================

function stringOption(values: OptionValues, name: string): string | undefined {
  const value = values[name];
  return typeof value === "string" ? value : undefined;
}

function requireString(values: OptionValues, name: string): string {
  const value = stringOption(values, name);
  if (value === undefined) {
    throw new CliError("USAGE", `Missing required option --${name}`);
  }
  return value;
}

function flag(values: OptionValues, name: string): boolean {
  return values[name] === true;
}

function dateArg(text: string): string {
  const date = normalizeDate(text);
  if (date === null) {
    throw new CliError("USAGE", `Invalid date "${text}" (expected MM/DD/YYYY)`);
  }
  return date;
}

function positional(args: readonly string[], index: number): string {
  const value = args[index];
  if (value === undefined) throw new CliError("USAGE", "Missing argument");
  return value;
}

// =============================================================================
// Commands
// =============================================================================

export const COMMANDS: Readonly<Record<string, Command>> = {
  "broker-load": {
    usage: "broker-load <file.json>",
    args: 1,
    options: {},
    async run({ service, io, args }) {
      const statements = await readRecords(positional(args, 0), BrokerStatementSchema);
      for (const result of service.loadBrokerStatements(statements)) {
        const { record, reconciliation, outcome } = result;
        io.out(ok(`${record.date}: P&L ${formatCurrency(reconciliation.pnl)} (${outcome})`));
        if (reconciliation.reportingError > 0) {
          io.out(warn(`${record.date}: reporting error ${formatCurrency(reconciliation.reportingError)}`));
        }
        for (const finding of reconciliation.accrualFindings) {
          io.out(
            warn(
              `${record.date}: ${finding.kind} accrual changed by ${formatCurrency(finding.accrualChange)}, ` +
                `expected ${formatCurrency(finding.expectedChange)}`,
            ),
          );
        }
      }
      return 0;
    },
  },

  "other-add": {
    usage:
      "other-add --date <date> --amount <n> --account <text> --description <text> " +
      "[--counted-in-pnl] [--overnight] [--info <text>]",
    args: 0,
    options: {
      date: { type: "string" },
      amount: { type: "string" },
      account: { type: "string" },
      description: { type: "string" },
      "counted-in-pnl": { type: "boolean" },
      overnight: { type: "boolean" },
      info: { type: "string" },
    },
    async run({ service, io, values }) {
      const tx = {
        date: dateArg(requireString(values, "date")),
        amount: requireAmount(requireString(values, "amount")),
        accountDescription: requireString(values, "account"),
        transactionDescription: requireString(values, "description"),
        countedInPnl: flag(values, "counted-in-pnl"),
        overnight: flag(values, "overnight"),
        additionalInfo: stringOption(values, "info") ?? null,
      };
      if (service.addOtherTransaction(tx) === "duplicate") {
        io.out(warn(`Transaction already recorded for ${tx.date}`));
      } else {
        io.out(ok(`Added ${formatCurrency(tx.amount)} on ${tx.date}`));
      }
      return 0;
    },
  },

  "other-import": {
    usage: "other-import <file.json>",
    args: 1,
    options: {},
    async run({ service, io, args }) {
      const txs = await readRecords(positional(args, 0), OtherTransactionSchema);
      const { inserted, updated } = service.importOtherTransactions(txs);
      io.out(ok(`Imported ${String(txs.length)} transactions (${String(inserted)} new, ${String(updated)} updated)`));
      return 0;
    },
  },

  "valuation-add": {
    usage: "valuation-add <date> [--value <n>]",
    args: 1,
    options: { value: { type: "string" } },
    async run({ service, io, args, values }) {
      const date = dateArg(positional(args, 0));
      const raw = stringOption(values, "value");
      const fundValue = raw === undefined ? null : requireAmount(raw, "fund value");
      const outcome = service.addValuationDate(date, fundValue);
      if (outcome === "unchanged") {
        io.out(warn(`${date} is already a valuation date; pass --value to set its fund value`));
        return 0;
      }
      const detail = fundValue === null ? "" : ` at ${formatCurrency(fundValue)}`;
      io.out(ok(`Valuation date ${date}${detail} ${outcome}`));
      return 0;
    },
  },

  "valuation-import": {
    usage: "valuation-import <file.json>",
    args: 1,
    options: {},
    async run({ service, io, args }) {
      const overrides = await readRecords(positional(args, 0), ValuationOverrideSchema);
      const { inserted, updated, unchanged } = service.importValuationDates(overrides);
      io.out(
        ok(
          `Imported ${String(overrides.length)} valuation dates ` +
            `(${String(inserted)} new, ${String(updated)} updated, ${String(unchanged)} unchanged)`,
        ),
      );
      return 0;
    },
  },

  "valuation-list": {
    usage: "valuation-list",
    args: 0,
    options: {},
    async run({ service, io }) {
      const overrides = service.listValuationDates();
      if (overrides.length === 0) {
        io.out("No valuation dates");
        return 0;
      }
      for (const line of formatValuationDates(overrides)) io.out(line);
      return 0;
    },
  },

  "valuation-delete": {
    usage: "valuation-delete <date> [--force]",
    args: 1,
    options: { force: { type: "boolean" } },
    async run({ service, io, args, values }) {
      const date = dateArg(positional(args, 0));
      if (!flag(values, "force") && !(await io.confirm(`Delete valuation date ${date}?`))) {
        io.out("Cancelled");
        return 0;
      }
      if (service.deleteValuationDate(date)) {
        io.out(ok(`Deleted valuation date ${date}`));
      } else {
        io.out(warn(`No valuation date ${date}`));
      }
      return 0;
    },
  },

  rebuild: {
    usage: "rebuild",
    args: 0,
    options: {},
    async run({ service, io }) {
      const result = service.rebuild();
      if (result.built) {
        io.out(
          ok(`Ledger rebuilt: ${String(result.rows.length)} days, ${String(result.valuationDates.size)} valuation dates`),
        );
      } else {
        io.out(warn("No broker data; ledger is empty"));
      }
      return 0;
    },
  },

  check: {
    usage: "check",
    args: 0,
    options: {},
    async run({ service, io }) {
      const discrepancies = service.checkDiscrepancies();
      if (discrepancies.length === 0) {
        io.out(ok("No valuation discrepancies"));
        return 0;
      }
      for (const d of discrepancies) io.out(warn(formatDiscrepancy(d)));
      return 0;
    },
  },

  "update-fund-values": {
    usage: "update-fund-values [--auto-confirm]",
    args: 0,
    options: { "auto-confirm": { type: "boolean" } },
    async run({ service, io, values }) {
      const outcome = await service.updateFundValues({
        autoConfirm: flag(values, "auto-confirm"),
        decider: terminalDecider(io),
      });
      const applied = `${String(outcome.correctionsApplied)} correction(s) applied`;
      switch (outcome.status) {
        case "converged":
          io.out(ok(`Fund values consistent; ${applied}`));
          return 0;
        case "declined":
          io.out(warn(`Stopped at a declined correction; ${applied}, ${String(outcome.remaining.length)} discrepancies remain`));
          return 0;
        case "already-corrected":
          io.out(warn(`Correction already recorded; ${applied}, ${String(outcome.remaining.length)} discrepancies remain`));
          return 0;
        case "max-iterations":
          io.err(fail(`Gave up after ${String(outcome.iterations)} iterations; ${applied}`));
          return 1;
      }
    },
  },

  periods: {
    usage: "periods",
    args: 0,
    options: {},
    async run({ service, io }) {
      const periods = service.periods();
      if (periods.length === 0) {
        io.out("No valuation periods");
        return 0;
      }
      for (const line of formatPeriods(periods)) io.out(line);
      return 0;
    },
  },

  stats: {
    usage: "stats",
    args: 0,
    options: {},
    async run({ service, io }) {
      const stats = service.stats();
      if (stats === null) {
        io.out(warn("Ledger is empty"));
        return 0;
      }
      for (const line of formatStats(stats)) io.out(line);
      return 0;
    },
  },

  "delete-table": {
    usage: `delete-table <${TABLE_NAMES.join("|")}> [--force]`,
    args: 1,
    options: { force: { type: "boolean" } },
    async run({ service, io, args, values }) {
      const table = positional(args, 0);
      if (!isTableName(table)) {
        throw new CliError("USAGE", `Unknown table "${table}" (expected one of ${TABLE_NAMES.join(", ")})`);
      }
      if (!flag(values, "force") && !(await io.confirm(`Delete every row of ${table}?`))) {
        io.out("Cancelled");
        return 0;
      }
      service.deleteTable(table);
      io.out(ok(`Cleared ${table}`));
      return 0;
    },
  },
};

export function usage(): string {
  const lines = Object.values(COMMANDS).map((command) => `  fund-ledger ${command.usage}`);
  return ["Usage:", ...lines, "", "Global options:", "  --database <path>  SQLite file (default $DATABASE_PATH)"].join(
    "\n",
  );
}

// =============================================================================
// Dispatch
// =============================================================================

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { config, io, logger } = deps;
  const [name, ...rest] = argv;

  if (name === undefined || name === "help" || name === "--help") {
    io.out(usage());
    return name === undefined ? 1 : 0;
  }

  const command = COMMANDS[name];
  if (command === undefined) {
    io.err(fail(`Unknown command "${name}"`));
    io.out(usage());
    return 1;
  }

  try {
    const options: ParseArgsOptionsConfig = { database: { type: "string" }, ...command.options };
    const { values, positionals } = parseArgs({
      args: [...rest],
      options,
      allowPositionals: true,
      strict: true,
    });
    if (positionals.length !== command.args) {
      throw new CliError("USAGE", `Usage: fund-ledger ${command.usage}`);
    }

    const opened = deps.openStore(stringOption(values, "database") ?? config.DATABASE_PATH);
    try {
      const service = new AccountingService(
        opened.store,
        {
          otherTotalEpoch: config.OTHER_TOTAL_EPOCH,
          pnlConvention: config.PNL_CONVENTION,
          pnlTolerance: config.PNL_TOLERANCE,
          discrepancyTolerance: config.DISCREPANCY_TOLERANCE,
          maxCorrectionIterations: config.MAX_CORRECTION_ITERATIONS,
        },
        logger,
      );
      return await command.run({ service, io, args: positionals, values });
    } finally {
      opened.close();
    }
  } catch (err) {
    logger?.debug({ err, command: name }, "Command failed");
    io.err(fail(describeError(err)));
    return 1;
  }
}
