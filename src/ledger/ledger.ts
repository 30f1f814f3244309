// pattern: Functional Core
import { LedgerCorruptionError } from "../errors";
import { persistedLedgerSchema } from "./schema";
import type { PersistedLedger } from "./schema";

/**
 * In-memory delivery ledger. `deliveredIds` keeps delivery order (oldest
 * first); `delivered` mirrors it for constant-time membership checks.
 */
export type Ledger = {
  readonly deliveredIds: ReadonlyArray<string>;
  readonly delivered: ReadonlySet<string>;
  readonly lastSuccessAt: Date | null;
  readonly lastSeenPublishedAt: ReadonlyMap<string, Date>;
};

export type LedgerStore = {
  /** Human-readable location used in logs and errors. */
  readonly location: string;
  /**
   * Reads the ledger, creating and persisting an empty one when none exists.
   * @throws LedgerCorruptionError when the stored snapshot has an invalid shape
   */
  readonly load: () => Ledger;
  /** Atomically replaces the stored snapshot. */
  readonly commit: (ledger: Ledger) => void;
  readonly close: () => void;
};

export function createEmptyLedger(): Ledger {
  return {
    deliveredIds: [],
    delivered: new Set(),
    lastSuccessAt: null,
    lastSeenPublishedAt: new Map(),
  };
}

/**
 * Appends newly delivered ids and stamps the run as successful.
 *
 * Ids already present (or empty) are skipped. When the list outgrows
 * `maxDeliveredIds` the oldest entries are evicted first. Per-topic
 * last-seen times only move forward.
 */
export function recordDelivery(
  ledger: Ledger,
  deliveredIds: Iterable<string>,
  now: Date,
  lastSeenPublishedByTopic: ReadonlyMap<string, Date | null>,
  maxDeliveredIds: number,
): Ledger {
  const ids = [...ledger.deliveredIds];
  const seen = new Set(ledger.delivered);

  for (const id of deliveredIds) {
    if (!id || seen.has(id)) continue;
    ids.push(id);
    seen.add(id);
  }

  const bound = Math.max(maxDeliveredIds, 0);
  const retained = ids.length > bound ? ids.slice(ids.length - bound) : ids;

  const lastSeen = new Map(ledger.lastSeenPublishedAt);
  for (const [topic, published] of lastSeenPublishedByTopic) {
    if (published === null) continue;
    const previous = lastSeen.get(topic);
    if (previous === undefined || published.getTime() > previous.getTime()) {
      lastSeen.set(topic, published);
    }
  }

  return {
    deliveredIds: retained,
    delivered: retained.length === ids.length ? seen : new Set(retained),
    lastSuccessAt: now,
    lastSeenPublishedAt: lastSeen,
  };
}

export function toPersisted(ledger: Ledger): PersistedLedger {
  const lastSeen: Record<string, string> = {};
  const topics = [...ledger.lastSeenPublishedAt.keys()].sort();
  for (const topic of topics) {
    const published = ledger.lastSeenPublishedAt.get(topic);
    if (published) lastSeen[topic] = published.toISOString();
  }

  return {
    delivered_ids: [...ledger.deliveredIds],
    last_seen_published_at: lastSeen,
    last_success_at: ledger.lastSuccessAt?.toISOString() ?? null,
  };
}

/**
 * Validates a raw snapshot and rebuilds the in-memory ledger.
 * @throws LedgerCorruptionError when `raw` does not match the persisted shape
 */
export function fromPersisted(raw: unknown, location: string): Ledger {
  const result = persistedLedgerSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new LedgerCorruptionError(location, detail, result.error);
  }

  const data = result.data;
  return {
    deliveredIds: data.delivered_ids,
    delivered: new Set(data.delivered_ids),
    lastSuccessAt: data.last_success_at ? new Date(data.last_success_at) : null,
    lastSeenPublishedAt: new Map(
      Object.entries(data.last_seen_published_at).map(
        ([topic, published]) => [topic, new Date(published)] as const,
      ),
    ),
  };
}
