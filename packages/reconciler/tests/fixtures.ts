/**
 * Shared fixtures for @fundledger/reconciler tests.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { BrokerDayRecord } from "@fundledger/types";
import { InMemoryRecordStore } from "@fundledger/store";
import type { BrokerStatement } from "../src/types.js";

export function statement(date: string, fields: Partial<Omit<BrokerStatement, "date">> = {}): BrokerStatement {
  return {
    date,
    startingValue: null,
    endingValue: null,
    depositsWithdrawals: null,
    markToMarket: null,
    interest: null,
    dividends: null,
    changeInInterestAccruals: null,
    changeInDividendAccruals: null,
    commissions: null,
    ...fields,
  };
}

export function broker(date: string, totalBroker: number): BrokerDayRecord {
  return {
    date,
    pnl: 0,
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

/**
 * Broker days 01/30 (10000), 01/31 (10200), 02/01 (10150), 02/02 (10175)
 * with no other transactions, plus the given overrides.
 */
export function valuationStore(overrides: Record<string, number>): InMemoryRecordStore {
  const store = new InMemoryRecordStore();
  store.upsertBrokerRecord(broker("01/30/2023", 10000));
  store.upsertBrokerRecord(broker("01/31/2023", 10200));
  store.upsertBrokerRecord(broker("02/01/2023", 10150));
  store.upsertBrokerRecord(broker("02/02/2023", 10175));
  for (const [date, fundValue] of Object.entries(overrides)) {
    store.upsertValuationOverride({ date, fundValue });
  }
  return store;
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
