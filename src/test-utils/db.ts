import { createDatabase } from "../db";
import type { AppDatabase } from "../db";

/**
 * Creates an in-memory SQLite database with the ledger table in place.
 * @returns The database and its close function.
 */
export function createTestDatabase(): { readonly db: AppDatabase; readonly close: () => void } {
  return createDatabase(":memory:");
}
