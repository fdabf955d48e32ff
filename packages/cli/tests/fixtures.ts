/**
 * Shared fixtures for @fundledger/cli tests.
 */

import type { BrokerDayRecord } from "@fundledger/types";
import { InMemoryRecordStore } from "@fundledger/store";
import type { AccountingServiceConfig } from "../src/services/accounting-service.js";
import type { CliIo } from "../src/output.js";

export const SERVICE_CONFIG: AccountingServiceConfig = {
  pnlConvention: "gross",
  pnlTolerance: 0.01,
  discrepancyTolerance: 0.1,
  maxCorrectionIterations: 100,
};

export function broker(date: string, pnl: number, totalBroker: number): BrokerDayRecord {
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

/** 01/30 (10000), 01/31 (10200), 02/01 (10150), each with P&L 100. */
export function seededStore(): InMemoryRecordStore {
  const store = new InMemoryRecordStore();
  store.upsertBrokerRecord(broker("01/30/2023", 100, 10000));
  store.upsertBrokerRecord(broker("01/31/2023", 100, 10200));
  store.upsertBrokerRecord(broker("02/01/2023", 100, 10150));
  return store;
}

export interface FakeIo extends CliIo {
  readonly lines: string[];
  readonly errors: string[];
  readonly questions: string[];
}

/** Captures output; answers confirmations from `answers` in order, then "no". */
export function fakeIo(answers: boolean[] = []): FakeIo {
  const lines: string[] = [];
  const errors: string[] = [];
  const questions: string[] = [];
  return {
    lines,
    errors,
    questions,
    out: (line) => lines.push(line),
    err: (line) => errors.push(line),
    confirm: (question) => {
      questions.push(question);
      return Promise.resolve(answers.shift() ?? false);
    },
  };
}
