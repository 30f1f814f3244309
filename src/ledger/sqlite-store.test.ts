import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ledger as ledgerTable } from "../db/schema";
import type { AppDatabase } from "../db";
import { LedgerCorruptionError } from "../errors";
import { createTestDatabase } from "../test-utils/db";
import { createMockLogger } from "../test-utils/fixtures";
import { recordDelivery } from "./ledger";
import { createSqliteLedgerStore } from "./sqlite-store";

const NOW = new Date("2026-03-10T08:00:00Z");

describe("createSqliteLedgerStore", () => {
  let db: AppDatabase;
  let close: () => void;

  beforeEach(() => {
    ({ db, close } = createTestDatabase());
  });

  afterEach(() => {
    close();
  });

  it("should insert an empty ledger row on first load", () => {
    const logger = createMockLogger();
    const store = createSqliteLedgerStore(db, ":memory:", logger);

    const ledger = store.load();

    expect(ledger.deliveredIds).toEqual([]);
    expect(db.select().from(ledgerTable).all()).toEqual([
      {
        id: 1,
        deliveredIds: "[]",
        lastSuccessAt: null,
        lastSeenPublishedAt: "{}",
      },
    ]);
    expect(logger.info).toHaveBeenCalledWith(
      { location: ":memory:" },
      "ledger not found, initialised empty ledger",
    );
  });

  it("should overwrite the single row on every commit", () => {
    const store = createSqliteLedgerStore(db, ":memory:", createMockLogger());
    const first = recordDelivery(store.load(), ["a"], NOW, new Map(), 100);
    store.commit(first);
    const second = recordDelivery(
      store.load(),
      ["b"],
      NOW,
      new Map([["LLM", new Date("2026-03-09T00:00:00Z")]]),
      100,
    );
    store.commit(second);

    const rows = db.select().from(ledgerTable).all();
    expect(rows).toHaveLength(1);

    const reloaded = store.load();
    expect(reloaded.deliveredIds).toEqual(["a", "b"]);
    expect(reloaded.lastSuccessAt).toEqual(NOW);
    expect(reloaded.lastSeenPublishedAt.get("LLM")).toEqual(
      new Date("2026-03-09T00:00:00Z"),
    );
  });

  it("should refuse a row whose JSON columns are unreadable", () => {
    db.insert(ledgerTable)
      .values({ id: 1, deliveredIds: "[oops", lastSuccessAt: null, lastSeenPublishedAt: "{}" })
      .run();
    const store = createSqliteLedgerStore(db, ":memory:", createMockLogger());

    expect(() => store.load()).toThrow(LedgerCorruptionError);
    expect(() => store.load()).toThrow(/column delivered_ids is not valid JSON/);
  });

  it("should refuse a row with the wrong shape", () => {
    db.insert(ledgerTable)
      .values({
        id: 1,
        deliveredIds: '{"a":1}',
        lastSuccessAt: "not a date",
        lastSeenPublishedAt: "{}",
      })
      .run();
    const store = createSqliteLedgerStore(db, ":memory:", createMockLogger());

    expect(() => store.load()).toThrow(LedgerCorruptionError);
  });

  it("should call the supplied close function", () => {
    let closed = false;
    const store = createSqliteLedgerStore(db, ":memory:", createMockLogger(), () => {
      closed = true;
    });

    store.close();

    expect(closed).toBe(true);
  });
});
