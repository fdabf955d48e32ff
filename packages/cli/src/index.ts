/**
 * @fundledger/cli — Command-line front end for the fund ledger.
 *
 * Importing this module has no side effects; `main.ts` is the executable.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { AccountingService } from "./services/accounting-service.js";
export type {
  AccountingServiceConfig,
  ImportSummary,
  ValuationDateOutcome,
  ValuationImportSummary,
} from "./services/accounting-service.js";
export { runCli, usage, COMMANDS } from "./commands.js";
export type { CliDeps, OpenedStore } from "./commands.js";
export type { CliIo } from "./output.js";
export { terminalDecider, isYes } from "./prompt.js";
export { BrokerStatementSchema, OtherTransactionSchema, parseRecords } from "./inputs.js";
export type { BrokerStatementInput, OtherTransactionInput } from "./inputs.js";
export { CliError } from "./errors.js";
export type { CliErrorCode } from "./errors.js";
