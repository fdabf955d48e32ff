/**
 * @fundledger/ledger — Ledger builder.
 *
 * Folds broker snapshots, other transactions and valuation overrides
 * into one ledger row per known date, in a single forward pass.
 *
 * API surface:
 * - ledgerDates(): The sorted, valid union of broker and other dates
 * - buildLedger(): Pure build from in-memory input
 * - rebuildLedger(): Read a store, build, replace its ledger
 *
 * The ledger is always rebuilt from scratch. There is no incremental update.
 */

import type {
  DateString,
  LedgerRow,
  OtherTransaction,
  RecordStore,
} from "@fundledger/types";
import { safeDivide } from "./amounts.js";
import { dateKey, parseDate } from "./dates.js";
import type { BuildOptions, LedgerInput, RebuildResult } from "./types.js";
import { LedgerError } from "./types.js";
import { computeValuationDates } from "./valuation-dates.js";

interface DayTotals {
  /** Every other-transaction amount of the day. */
  readonly all: number;
  /** Amounts flagged "Counted in P&L". */
  readonly pnl: number;
  /** Amounts flagged "Overnight". */
  readonly overnight: number;
}

const NO_TRANSACTIONS: DayTotals = { all: 0, pnl: 0, overnight: 0 };

// ─── Date Collection ─────────────────────────────────────────────────────

function partitionDates(input: LedgerInput): { valid: DateString[]; malformed: DateString[] } {
  const unique = new Set<DateString>();
  for (const record of input.brokerRecords) unique.add(record.date);
  for (const tx of input.otherTransactions) unique.add(tx.date);

  const valid: { text: DateString; key: number }[] = [];
  const malformed: DateString[] = [];
  for (const text of unique) {
    const parsed = parseDate(text);
    if (parsed === null) {
      malformed.push(text);
    } else {
      valid.push({ text, key: dateKey(parsed) });
    }
  }
  valid.sort((a, b) => a.key - b.key);

  return { valid: valid.map((d) => d.text), malformed };
}

/**
 * All valid dates of broker records and other transactions, ascending.
 */
export function ledgerDates(input: LedgerInput): DateString[] {
  return partitionDates(input).valid;
}

function aggregateOther(transactions: readonly OtherTransaction[]): Map<DateString, DayTotals> {
  const totals = new Map<DateString, DayTotals>();
  for (const tx of transactions) {
    const current = totals.get(tx.date) ?? NO_TRANSACTIONS;
    totals.set(tx.date, {
      all: current.all + tx.amount,
      pnl: current.pnl + (tx.countedInPnl ? tx.amount : 0),
      overnight: current.overnight + (tx.overnight ? tx.amount : 0),
    });
  }
  return totals;
}

function resolveEpoch(epoch: DateString | undefined): DateString | undefined {
  if (epoch === undefined) return undefined;
  if (parseDate(epoch) === null) {
    throw new LedgerError(
      "INVALID_OPTION",
      `otherTotalEpoch must be a MM/DD/YYYY date, got "${epoch}"`,
    );
  }
  return epoch;
}

// ─── Build ───────────────────────────────────────────────────────────────

/**
 * Build the ledger rows.
 *
 * Returns an empty ledger when there are no broker records. Records with
 * malformed dates are skipped with a warning.
 *
 * @throws {LedgerError} INVALID_OPTION for a malformed `otherTotalEpoch`
 */
export function buildLedger(
  input: LedgerInput,
  valuationDates: ReadonlySet<DateString>,
  options: BuildOptions = {},
): LedgerRow[] {
  const { logger } = options;
  const epoch = resolveEpoch(options.otherTotalEpoch);

  if (input.brokerRecords.length === 0) {
    logger?.warn("No broker data found; ledger is empty");
    return [];
  }

  const { valid: dates, malformed } = partitionDates(input);
  for (const date of malformed) {
    logger?.warn({ date }, "Skipping records with malformed date");
  }

  const brokerByDate = new Map(input.brokerRecords.map((r) => [r.date, r] as const));
  const otherByDate = aggregateOther(input.otherTransactions);
  const overrideValues = new Map<DateString, number>();
  for (const override of input.valuationOverrides) {
    if (override.fundValue !== null) {
      overrideValues.set(override.date, override.fundValue);
    }
  }

  const rows: LedgerRow[] = [];
  let runningOtherTotal = 0;
  let periodStartingNav: number | null = null;
  let cumulativePnl = 0;
  let previous: { endFundValue: number; overnight: number } | null = null;

  for (const date of dates) {
    if (date === epoch) {
      runningOtherTotal = 0;
    }

    const record = brokerByDate.get(date);
    const other = otherByDate.get(date) ?? NO_TRANSACTIONS;
    const brokerPnl = record?.pnl ?? null;
    const totalBroker = record?.totalBroker ?? null;

    const totalPnl = (brokerPnl ?? 0) + other.pnl;
    runningOtherTotal += other.all;
    const totalOther = runningOtherTotal;
    // Overnight money is already out of the accounts; it lands tomorrow.
    const endFundValue = (totalBroker ?? 0) + totalOther - other.overnight;

    const override = overrideValues.get(date);
    let startFundValue: number;
    if (override !== undefined) {
      startFundValue = override;
    } else if (previous !== null) {
      startFundValue = previous.endFundValue + previous.overnight;
    } else {
      startFundValue = endFundValue;
    }

    if (valuationDates.has(date)) {
      periodStartingNav = startFundValue;
      cumulativePnl = 0;
    }

    const startFundValueWithCumPnl =
      periodStartingNav === null ? null : periodStartingNav + cumulativePnl;
    const endFundValueWithCumPnl =
      startFundValueWithCumPnl === null ? null : startFundValueWithCumPnl + totalPnl;
    const periodCumulativePnl = periodStartingNav === null ? null : cumulativePnl + totalPnl;

    rows.push({
      date,
      brokerPnl,
      totalBroker,
      otherPnl: other.pnl,
      totalOther,
      overnight: other.overnight,
      totalPnl,
      periodStartingNav,
      startFundValue,
      endFundValue,
      startFundValueWithCumPnl,
      endFundValueWithCumPnl,
      dailyReturn: safeDivide(totalPnl, startFundValueWithCumPnl),
      periodCumulativePnl,
      periodCumulativeReturn:
        periodCumulativePnl === null ? null : safeDivide(periodCumulativePnl, periodStartingNav),
    });

    cumulativePnl += totalPnl;
    previous = { endFundValue, overnight: other.overnight };
  }

  return rows;
}

// ─── Store Rebuild ───────────────────────────────────────────────────────

/**
 * Recompute the whole ledger from the store and replace its `overall`
 * collection. Idempotent: identical store contents give identical rows.
 */
export function rebuildLedger(store: RecordStore, options: BuildOptions = {}): RebuildResult {
  const input: LedgerInput = {
    brokerRecords: store.getBrokerRecords(),
    otherTransactions: store.getOtherTransactions(),
    valuationOverrides: store.getValuationOverrides(),
  };

  const valuationDates = computeValuationDates(
    ledgerDates(input),
    input.valuationOverrides.map((o) => o.date),
  );
  const rows = buildLedger(input, valuationDates, options);
  store.replaceLedger(rows);

  options.logger?.info(
    { rows: rows.length, valuationDates: valuationDates.size },
    "Ledger rebuilt",
  );

  return { built: rows.length > 0, rows, valuationDates };
}
