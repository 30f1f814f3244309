import { vi } from "vitest";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { NormalizedItem } from "../pipeline/types";

/**
 * Creates a default AppConfig suitable for testing.
 * @returns An AppConfig with every section filled in and two topics.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    arxiv: {
      endpoint: "http://export.arxiv.org/api/query",
      userAgent: "arxiv-digest-test/1.0",
      requestTimeoutSeconds: 30,
      maxResultsPerTopic: 50,
      interQuerySleepSeconds: 3.1,
    },
    selection: {
      lookbackHours: 36,
      recentWindowDays: 7,
      maxRecentItemsPerTopic: 5,
      maxEducationalItemsPerTopic: 1,
    },
    ledger: {
      driver: "json",
      path: "state/ledger.json",
      maxDeliveredIds: 20000,
    },
    discord: {
      maxContentLength: 2000,
      requestTimeoutSeconds: 30,
      titleMaxLength: 120,
      headerTemplate: "arXiv Daily Digest ({date})",
      skipEmptyDigest: false,
    },
    report: {
      timezone: "UTC",
    },
    schedule: {},
    topics: [
      { name: "LLM", queryTerms: ["language model"], categories: ["cs.CL"] },
      { name: "Vision", queryTerms: [], categories: ["cs.CV"] },
    ],
    ...overrides,
  };
}

/**
 * Builds a NormalizedItem with sensible defaults.
 * @param id - arXiv id of the item
 * @param publishedAt - ISO timestamp, or null for an item without one
 */
export function makeItem(
  id: string,
  publishedAt: string | null,
  overrides?: Partial<NormalizedItem>,
): NormalizedItem {
  return {
    id,
    title: `Paper ${id}`,
    summary: "We propose a method.",
    authors: ["Ada Example"],
    category: "cs.LG",
    publishedAt: publishedAt === null ? null : new Date(publishedAt),
    url: `https://arxiv.org/abs/${id}`,
    ...overrides,
  };
}

/**
 * Creates a mock Logger instance for testing.
 */
export function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    setLevel: vi.fn(),
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}
