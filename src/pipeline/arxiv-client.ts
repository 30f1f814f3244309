// pattern: Imperative Shell
import type { Logger } from "pino";
import { CollaboratorError, errorMessage } from "../errors";
import { parseArxivFeed } from "./parser";
import type { NormalizedItem } from "./types";

export type ArxivClientOptions = {
  readonly endpoint: string;
  readonly userAgent: string;
  readonly timeoutMs: number;
  readonly maxResults: number;
};

/**
 * Fetches and parses the newest entries for one search query.
 * Rejects with CollaboratorError; never resolves with a partial result.
 */
export type FetchItemsFn = (
  searchQuery: string,
  logger: Logger,
) => Promise<ReadonlyArray<NormalizedItem>>;

const MIN_QUERY_DELAY_SECONDS = 3;
const FALLBACK_QUERY_DELAY_SECONDS = 3.1;

/**
 * arXiv asks API clients to leave at least three seconds between calls.
 * Shorter configured delays are raised and logged.
 */
export function resolveQueryDelayMs(configuredSeconds: number, logger: Logger): number {
  if (configuredSeconds < MIN_QUERY_DELAY_SECONDS) {
    logger.warn(
      { configuredSeconds, effectiveSeconds: FALLBACK_QUERY_DELAY_SECONDS },
      "inter-query delay below arXiv minimum, overriding",
    );
    return FALLBACK_QUERY_DELAY_SECONDS * 1000;
  }
  return configuredSeconds * 1000;
}

export function buildQueryUrl(
  endpoint: string,
  searchQuery: string,
  maxResults: number,
): string {
  const params = new URLSearchParams({
    search_query: searchQuery,
    start: "0",
    max_results: String(maxResults),
    sortBy: "submittedDate",
    sortOrder: "descending",
  });
  return `${endpoint}?${params.toString()}`;
}

export function createArxivFetcher(options: ArxivClientOptions): FetchItemsFn {
  return async function fetchItems(
    searchQuery: string,
    logger: Logger,
  ): Promise<ReadonlyArray<NormalizedItem>> {
    const url = buildQueryUrl(options.endpoint, searchQuery, options.maxResults);
    logger.info(
      { endpoint: options.endpoint, maxResults: options.maxResults },
      "arxiv request",
    );

    let xml: string;
    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: {
          "User-Agent": options.userAgent,
          Accept: "application/atom+xml",
        },
      });

      if (!response.ok) {
        throw new CollaboratorError(
          "feed",
          `arxiv request failed with HTTP ${response.status}: ${response.statusText}`,
        );
      }

      xml = await response.text();
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      throw new CollaboratorError(
        "feed",
        `arxiv request failed: ${errorMessage(err)}`,
        err,
      );
    }

    try {
      return await parseArxivFeed(xml, logger);
    } catch (err) {
      throw new CollaboratorError(
        "feed",
        `arxiv response could not be parsed: ${errorMessage(err)}`,
        err,
      );
    }
  };
}
