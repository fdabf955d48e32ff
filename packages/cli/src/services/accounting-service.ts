/**
 * AccountingService — Composition root for the domain packages.
 *
 * CLI commands delegate to this service; they never call the ledger,
 * reconciler or store directly. Every write that changes an input
 * collection is followed by a full ledger rebuild.
 */

import type { Logger } from "pino";
import type {
  DateString,
  InsertOutcome,
  LedgerRow,
  NewOtherTransaction,
  RecordStore,
  TableName,
  UpsertOutcome,
  ValuationOverride,
} from "@fundledger/types";
import {
  compareDates,
  computeLedgerStats,
  rebuildLedger,
  sortDates,
  summarizePeriods,
} from "@fundledger/ledger";
import type { BuildOptions, LedgerStats, PeriodSummary, RebuildResult } from "@fundledger/ledger";
import {
  correctValuationDiscrepancies,
  detectDiscrepancies,
  ingestBrokerStatement,
} from "@fundledger/reconciler";
import type {
  BrokerStatement,
  CorrectionDecider,
  CorrectionOutcome,
  Discrepancy,
  IngestResult,
  PnlConvention,
} from "@fundledger/reconciler";

// =============================================================================
// Configuration
// =============================================================================

export interface AccountingServiceConfig {
  readonly otherTotalEpoch?: DateString | undefined;
  readonly pnlConvention: PnlConvention;
  readonly pnlTolerance: number;
  readonly discrepancyTolerance: number;
  readonly maxCorrectionIterations: number;
}

export interface ImportSummary {
  readonly inserted: number;
  readonly updated: number;
}

export interface ValuationImportSummary extends ImportSummary {
  /** Dates already present that the file gave no value for. */
  readonly unchanged: number;
}

/** "unchanged": the date exists and no value was given. */
export type ValuationDateOutcome = UpsertOutcome | "unchanged";

// =============================================================================
// Service
// =============================================================================

export class AccountingService {
  private readonly _store: RecordStore;
  private readonly _config: AccountingServiceConfig;
  private readonly _logger: Logger | undefined;

  constructor(store: RecordStore, config: AccountingServiceConfig, logger?: Logger) {
    this._store = store;
    this._config = config;
    this._logger = logger;
  }

  private get _buildOptions(): BuildOptions {
    return { otherTotalEpoch: this._config.otherTotalEpoch, logger: this._logger };
  }

  // ─── Broker Statements ─────────────────────────────────────────────

  /**
   * Ingest statements in calendar order, so a statement without a
   * starting value can take the one loaded just before it.
   */
  loadBrokerStatements(statements: readonly BrokerStatement[]): IngestResult[] {
    const ordered = [...statements].sort((a, b) => compareDates(a.date, b.date));
    return ordered.map((statement) =>
      ingestBrokerStatement(this._store, statement, {
        convention: this._config.pnlConvention,
        tolerance: this._config.pnlTolerance,
        otherTotalEpoch: this._config.otherTotalEpoch,
        logger: this._logger,
      }),
    );
  }

  // ─── Other Transactions ────────────────────────────────────────────

  addOtherTransaction(tx: NewOtherTransaction): InsertOutcome {
    const outcome = this._store.insertOtherTransaction(tx);
    if (outcome === "inserted") this.rebuild();
    return outcome;
  }

  /** Upsert every transaction; re-imported ones get their flags updated. */
  importOtherTransactions(txs: readonly NewOtherTransaction[]): ImportSummary {
    let inserted = 0;
    let updated = 0;
    for (const tx of txs) {
      if (this._store.upsertOtherTransaction(tx) === "inserted") inserted++;
      else updated++;
    }
    this.rebuild();
    return { inserted, updated };
  }

  // ─── Valuation Dates ───────────────────────────────────────────────

  /**
   * Add a valuation date, or set the value of an existing one.
   * Without a value an existing date keeps the value it has.
   */
  addValuationDate(date: DateString, fundValue: number | null): ValuationDateOutcome {
    const outcome = this._upsertValuationDate({ date, fundValue });
    if (outcome !== "unchanged") this.rebuild();
    return outcome;
  }

  /** Add or update many valuation dates, then rebuild once. */
  importValuationDates(overrides: readonly ValuationOverride[]): ValuationImportSummary {
    let inserted = 0;
    let updated = 0;
    let unchanged = 0;
    for (const override of overrides) {
      const outcome = this._upsertValuationDate(override);
      if (outcome === "inserted") inserted++;
      else if (outcome === "updated") updated++;
      else unchanged++;
    }
    this.rebuild();
    return { inserted, updated, unchanged };
  }

  private _upsertValuationDate(override: ValuationOverride): ValuationDateOutcome {
    if (override.fundValue === null && this._findValuationDate(override.date) !== undefined) {
      return "unchanged";
    }
    return this._store.upsertValuationOverride(override);
  }

  private _findValuationDate(date: DateString): ValuationOverride | undefined {
    return this._store.getValuationOverrides().find((o) => o.date === date);
  }

  /** Overrides in calendar order. */
  listValuationDates(): ValuationOverride[] {
    const byDate = new Map(this._store.getValuationOverrides().map((o) => [o.date, o] as const));
    return sortDates([...byDate.keys()]).flatMap((date) => {
      const override = byDate.get(date);
      return override === undefined ? [] : [override];
    });
  }

  deleteValuationDate(date: DateString): boolean {
    const deleted = this._store.deleteValuationOverride(date);
    if (deleted) this.rebuild();
    return deleted;
  }

  // ─── Ledger ────────────────────────────────────────────────────────

  rebuild(): RebuildResult {
    return rebuildLedger(this._store, this._buildOptions);
  }

  getLedger(): readonly LedgerRow[] {
    return this._store.getLedger();
  }

  /** Rebuild and report valuation discrepancies without correcting them. */
  checkDiscrepancies(): Discrepancy[] {
    const { rows, valuationDates } = this.rebuild();
    return detectDiscrepancies(rows, valuationDates, this._config.discrepancyTolerance);
  }

  updateFundValues(options: { autoConfirm: boolean; decider?: CorrectionDecider }): Promise<CorrectionOutcome> {
    return correctValuationDiscrepancies(this._store, {
      autoConfirm: options.autoConfirm,
      decider: options.decider,
      tolerance: this._config.discrepancyTolerance,
      maxIterations: this._config.maxCorrectionIterations,
      otherTotalEpoch: this._config.otherTotalEpoch,
      logger: this._logger,
    });
  }

  periods(): PeriodSummary[] {
    const { rows, valuationDates } = this.rebuild();
    return summarizePeriods(rows, valuationDates);
  }

  stats(): LedgerStats | null {
    return computeLedgerStats(this._store.getLedger());
  }

  // ─── Maintenance ───────────────────────────────────────────────────

  /**
   * Empty a table. Clearing an input collection rebuilds the ledger
   * so it never describes data that is gone.
   */
  deleteTable(table: TableName): void {
    this._store.clearTable(table);
    this._logger?.info({ table }, "Table cleared");
    if (table !== "overall") this.rebuild();
  }
}
