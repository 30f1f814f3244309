// pattern: Imperative Shell
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { LedgerCorruptionError, errorMessage } from "../errors";
import { createEmptyLedger, fromPersisted, toPersisted } from "./ledger";
import type { Ledger, LedgerStore } from "./ledger";

/**
 * Ledger kept in a pretty-printed JSON file. Commits write a sibling temp
 * file and rename it over the target, so readers never see a half-written
 * snapshot.
 */
export function createJsonLedgerStore(path: string, logger: Logger): LedgerStore {
  function commit(ledger: Ledger): void {
    mkdirSync(dirname(path), { recursive: true });
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, `${JSON.stringify(toPersisted(ledger), null, 2)}\n`, "utf-8");
      renameSync(tmpPath, path);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }

  function load(): Ledger {
    if (!existsSync(path)) {
      const fresh = createEmptyLedger();
      commit(fresh);
      logger.info({ path }, "ledger not found, initialised empty ledger");
      return fresh;
    }

    const raw = readFileSync(path, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new LedgerCorruptionError(path, `invalid JSON: ${errorMessage(err)}`, err);
    }

    return fromPersisted(parsed, path);
  }

  return {
    location: path,
    load,
    commit,
    close: () => {},
  };
}
