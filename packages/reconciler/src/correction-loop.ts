/**
 * Discrepancy Corrector
 *
 * Runs detect → propose → decide → apply → rebuild until the ledger has
 * no valuation discrepancy left, the decider declines, the correction
 * already exists, or the iteration limit is hit. One discrepancy (the
 * earliest) is handled per cycle, since each correction shifts every
 * later running total.
 */

import type { RecordStore } from "@fundledger/types";
import { rebuildLedger } from "@fundledger/ledger";
import type { BuildOptions } from "@fundledger/ledger";
import { DEFAULT_DISCREPANCY_TOLERANCE, detectDiscrepancies, proposeCorrection } from "./discrepancy-detector.js";
import type {
  CorrectionDecider,
  CorrectionOptions,
  CorrectionOutcome,
  CorrectionProposal,
  CorrectionStatus,
  Discrepancy,
} from "./types.js";

export const DEFAULT_MAX_ITERATIONS = 100;

/** Applies every proposal. */
export const autoConfirm: CorrectionDecider = {
  confirm: () => true,
};

/** Applies nothing; the loop reports what it found. */
export const declineAll: CorrectionDecider = {
  confirm: () => false,
};

export async function correctValuationDiscrepancies(
  store: RecordStore,
  options: CorrectionOptions = {},
): Promise<CorrectionOutcome> {
  const { logger } = options;
  const tolerance = options.tolerance ?? DEFAULT_DISCREPANCY_TOLERANCE;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const decider = options.autoConfirm === true ? autoConfirm : (options.decider ?? declineAll);
  const buildOptions: BuildOptions = { otherTotalEpoch: options.otherTotalEpoch, logger };

  const applied: CorrectionProposal[] = [];
  let iterations = 0;

  const finish = (status: CorrectionStatus, remaining: readonly Discrepancy[]): CorrectionOutcome => {
    const outcome: CorrectionOutcome = {
      success: status !== "max-iterations",
      correctionsApplied: applied.length,
      iterations,
      status,
      remaining,
      applied,
    };
    if (status === "max-iterations") {
      logger?.warn(
        { iterations, remaining: remaining.length },
        "Stopped correcting: iteration limit reached",
      );
    } else {
      logger?.info(
        { status, corrections: applied.length, remaining: remaining.length },
        "Valuation check finished",
      );
    }
    return outcome;
  };

  let ledger = rebuildLedger(store, buildOptions);

  for (;;) {
    const remaining = detectDiscrepancies(ledger.rows, ledger.valuationDates, tolerance);
    const next = remaining[0];
    if (next === undefined) return finish("converged", remaining);
    if (iterations >= maxIterations) return finish("max-iterations", remaining);

    iterations += 1;
    const proposal = proposeCorrection(next);
    logger?.info(
      {
        valuationDate: next.valuationDate,
        expected: next.expected,
        recorded: next.recorded,
        delta: next.delta,
      },
      "Valuation discrepancy",
    );

    const accepted = await decider.confirm(proposal);
    if (!accepted) return finish("declined", remaining);

    if (store.insertOtherTransaction(proposal.transaction) === "duplicate") {
      logger?.warn(
        { date: proposal.transaction.date, amount: proposal.transaction.amount },
        "Correction already recorded",
      );
      return finish("already-corrected", remaining);
    }

    applied.push(proposal);
    ledger = rebuildLedger(store, buildOptions);
  }
}
