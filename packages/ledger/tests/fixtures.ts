/**
 * Shared fixtures for @fundledger/ledger tests.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  BrokerDayRecord,
  OtherTransaction,
  ValuationOverride,
} from "@fundledger/types";

export function broker(
  date: string,
  pnl: number | null,
  totalBroker: number | null,
): BrokerDayRecord {
  return {
    date,
    pnl,
    reportingError: 0,
    cumulativePnl: null,
    markToMarket: null,
    changeInDividendAccruals: null,
    interest: null,
    dividends: null,
    depositsWithdrawals: null,
    changeInInterestAccruals: null,
    commissions: null,
    totalBroker,
  };
}

let nextId = 1;

export function other(
  date: string,
  amount: number,
  flags: { countedInPnl?: boolean; overnight?: boolean } = {},
): OtherTransaction {
  const id = nextId++;
  return {
    id,
    date,
    amount,
    accountDescription: "Checking",
    transactionDescription: `tx-${String(id)}`,
    countedInPnl: flags.countedInPnl ?? false,
    overnight: flags.overnight ?? false,
    additionalInfo: null,
  };
}

export function override(date: string, fundValue: number | null): ValuationOverride {
  return { date, fundValue };
}

/** A pino logger that collects parsed log lines in memory. */
export function captureLogger(): { logger: Logger; lines: unknown[] } {
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
