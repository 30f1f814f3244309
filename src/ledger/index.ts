import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { createJsonLedgerStore } from "./json-store";
import { openSqliteLedgerStore } from "./sqlite-store";
import type { LedgerStore } from "./ledger";

export function createLedgerStore(
  config: AppConfig["ledger"],
  logger: Logger,
): LedgerStore {
  return config.driver === "sqlite"
    ? openSqliteLedgerStore(config.path, logger)
    : createJsonLedgerStore(config.path, logger);
}

export { createJsonLedgerStore } from "./json-store";
export { createSqliteLedgerStore, openSqliteLedgerStore } from "./sqlite-store";
export {
  createEmptyLedger,
  recordDelivery,
  toPersisted,
  fromPersisted,
} from "./ledger";
export type { Ledger, LedgerStore } from "./ledger";
export type { PersistedLedger } from "./schema";
