import { z } from "zod";

const isoTimestamp = z.string().datetime({ offset: true });

/**
 * On-disk shape shared by every ledger store.
 */
export const persistedLedgerSchema = z.object({
  delivered_ids: z.array(z.string()),
  last_success_at: isoTimestamp.nullable().default(null),
  last_seen_published_at: z.record(z.string(), isoTimestamp).default({}),
});

export type PersistedLedger = z.output<typeof persistedLedgerSchema>;
