/**
 * @fundledger/store — RecordStore implementations.
 *
 * - InMemoryRecordStore: maps, for tests and short-lived processes
 * - SqliteRecordStore: better-sqlite3, the on-disk format the CLI uses
 */

export { InMemoryRecordStore } from "./in-memory-store.js";
export { SqliteRecordStore } from "./sqlite-store.js";
export type { SqliteStoreOptions } from "./sqlite-store.js";

export {
  SCHEMA,
  BROKER_COLUMNS,
  LEDGER_COLUMNS,
  quoteIdentifier,
} from "./schema.js";
export type { ColumnMap } from "./schema.js";

export type { StoreErrorCode } from "./types.js";
export { StoreError } from "./types.js";
