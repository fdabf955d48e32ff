/**
 * @fundledger/cli — Interactive confirmation.
 */

import { createInterface } from "node:readline/promises";
import type { CorrectionDecider } from "@fundledger/reconciler";
import { formatCurrency } from "@fundledger/ledger";
import { formatDiscrepancy } from "./output.js";
import type { CliIo } from "./output.js";

/** "y" and "yes", any case, mean yes. Anything else is no. */
export function isYes(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/** Ask on stdin/stdout. The interface is closed after each answer. */
export async function askOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isYes(await rl.question(`${question} (y/N) `));
  } finally {
    rl.close();
  }
}

/**
 * A decider that shows each discrepancy and asks before correcting it.
 */
export function terminalDecider(io: CliIo): CorrectionDecider {
  return {
    confirm: (proposal) => {
      const { discrepancy, transaction } = proposal;
      io.out(formatDiscrepancy(discrepancy));
      return io.confirm(
        `Add an overnight correction of ${formatCurrency(transaction.amount)} on ${transaction.date}?`,
      );
    },
  };
}
