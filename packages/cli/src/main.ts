#!/usr/bin/env node
/**
 * @fundledger/cli — Entry point.
 *
 * Loads config, creates the logger on stderr (stdout carries command
 * output), opens the SQLite store and runs one command.
 */

import pino from "pino";
import type { Logger } from "pino";
import { SqliteRecordStore } from "@fundledger/store";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { runCli } from "./commands.js";
import type { CliIo } from "./output.js";
import { askOnTerminal } from "./prompt.js";

function createLogger(config: AppConfig): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const io: CliIo = {
    // eslint-disable-next-line no-console
    out: (line) => console.log(line),
    // eslint-disable-next-line no-console
    err: (line) => console.error(line),
    confirm: askOnTerminal,
  };

  process.exitCode = await runCli(process.argv.slice(2), {
    config,
    io,
    logger,
    openStore: (path) => {
      const store = new SqliteRecordStore(path, { logger });
      logger.debug({ path }, "Database opened");
      return { store, close: () => store.close() };
    },
  });
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
