// pattern: Imperative Shell
import { eq } from "drizzle-orm";
import type { Logger } from "pino";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { ledger as ledgerTable } from "../db/schema";
import { LedgerCorruptionError, errorMessage } from "../errors";
import { createEmptyLedger, fromPersisted, toPersisted } from "./ledger";
import type { Ledger, LedgerStore } from "./ledger";

const LEDGER_ROW_ID = 1;

function parseColumn(value: string, column: string, location: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new LedgerCorruptionError(
      location,
      `column ${column} is not valid JSON: ${errorMessage(err)}`,
      err,
    );
  }
}

/**
 * Ledger kept as one row of the `ledger` table. Each commit is a single
 * upsert statement.
 */
export function createSqliteLedgerStore(
  db: AppDatabase,
  location: string,
  logger: Logger,
  close: () => void = () => {},
): LedgerStore {
  function commit(ledger: Ledger): void {
    const snapshot = toPersisted(ledger);
    const values = {
      deliveredIds: JSON.stringify(snapshot.delivered_ids),
      lastSuccessAt: snapshot.last_success_at,
      lastSeenPublishedAt: JSON.stringify(snapshot.last_seen_published_at),
    };

    db.insert(ledgerTable)
      .values({ id: LEDGER_ROW_ID, ...values })
      .onConflictDoUpdate({ target: ledgerTable.id, set: values })
      .run();
  }

  function load(): Ledger {
    const row = db
      .select()
      .from(ledgerTable)
      .where(eq(ledgerTable.id, LEDGER_ROW_ID))
      .get();

    if (!row) {
      const fresh = createEmptyLedger();
      commit(fresh);
      logger.info({ location }, "ledger not found, initialised empty ledger");
      return fresh;
    }

    return fromPersisted(
      {
        delivered_ids: parseColumn(row.deliveredIds, "delivered_ids", location),
        last_success_at: row.lastSuccessAt,
        last_seen_published_at: parseColumn(
          row.lastSeenPublishedAt,
          "last_seen_published_at",
          location,
        ),
      },
      location,
    );
  }

  return { location, load, commit, close };
}

export function openSqliteLedgerStore(dbPath: string, logger: Logger): LedgerStore {
  const { db, close } = createDatabase(dbPath);
  return createSqliteLedgerStore(db, dbPath, logger, close);
}
