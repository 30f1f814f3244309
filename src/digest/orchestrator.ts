// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { CollaboratorError, ConfigurationError, DigestError, errorMessage } from "../errors";
import { recordDelivery } from "../ledger";
import type { LedgerStore } from "../ledger";
import { resolveQueryDelayMs } from "../pipeline/arxiv-client";
import type { FetchItemsFn } from "../pipeline/arxiv-client";
import { computeCandidateWindow } from "../pipeline/cutoff";
import { buildSearchQuery } from "../pipeline/query";
import { createSeededRandom, defaultRandom } from "../pipeline/random";
import { partitionCandidates, selectCandidates } from "../pipeline/selector";
import type { Clock, NormalizedItem, Random, TopicResult } from "../pipeline/types";
import { packMessages } from "./packer";
import { renderDigestBlocks, resolveTimeZone } from "./renderer";
import type { SendMessageFn } from "./sender";

export type SleepFn = (ms: number) => Promise<void>;

export type DigestRunDeps = Readonly<{
  config: AppConfig;
  store: LedgerStore;
  fetchItems: FetchItemsFn;
  sendMessage: SendMessageFn;
  logger: Logger;
  clock?: Clock;
  random?: Random;
  sleep?: SleepFn;
}>;

export type DigestRunSummary = Readonly<{
  candidateCutoff: Date;
  topicResults: ReadonlyArray<TopicResult>;
  selectedCount: number;
  messageCount: number;
  deliveredIdCount: number;
}>;

const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function latestPublished(items: ReadonlyArray<NormalizedItem>): Date | null {
  let latest: Date | null = null;
  for (const item of items) {
    if (item.publishedAt && (latest === null || item.publishedAt > latest)) {
      latest = item.publishedAt;
    }
  }
  return latest;
}

async function fetchTopicItems(
  fetchItems: FetchItemsFn,
  searchQuery: string,
  logger: Logger,
): Promise<ReadonlyArray<NormalizedItem>> {
  try {
    return await fetchItems(searchQuery, logger);
  } catch (err) {
    if (err instanceof DigestError) throw err;
    throw new CollaboratorError("feed", `feed fetch failed: ${errorMessage(err)}`, err);
  }
}

/**
 * Runs one digest: select undelivered papers per topic, send them as packed
 * messages, then commit the ledger.
 *
 * Behavior:
 * - Every topic query is built before the first fetch, so a bad topic aborts
 *   the run without touching the network.
 * - Topics run one after another with the arXiv courtesy delay in between.
 *   Ids picked for one topic are hidden from later topics in the same run.
 * - The ledger is committed exactly once, after every message was accepted.
 *   Any failure before that leaves it untouched, so a retry may re-send
 *   (at-least-once delivery).
 *
 * @throws ConfigurationError, LedgerCorruptionError or CollaboratorError
 */
export async function runDigest(deps: DigestRunDeps): Promise<DigestRunSummary> {
  const { config, store, logger } = deps;
  const clock = deps.clock ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const seed = config.selection.randomSeed;
  const random =
    deps.random ?? (seed === undefined ? defaultRandom : createSeededRandom(seed));

  if (config.topics.length === 0) {
    throw new ConfigurationError("no topics configured");
  }
  const queries = config.topics.map((topic) => ({
    name: topic.name,
    searchQuery: buildSearchQuery(topic),
  }));
  const delayMs = resolveQueryDelayMs(config.arxiv.interQuerySleepSeconds, logger);

  const ledger = store.load();
  const now = clock();
  const window = computeCandidateWindow(
    now,
    ledger.lastSuccessAt,
    config.selection.lookbackHours,
    config.selection.recentWindowDays,
  );

  logger.info(
    {
      lastSuccessAt: ledger.lastSuccessAt?.toISOString() ?? null,
      stateCutoff: window.stateCutoff.toISOString(),
      recentCutoff: window.recentCutoff.toISOString(),
      candidateCutoff: window.candidateCutoff.toISOString(),
      deliveredIdCount: ledger.deliveredIds.length,
    },
    "candidate window computed",
  );

  const working = new Set(ledger.delivered);
  const topicResults: Array<TopicResult> = [];
  const lastSeenByTopic = new Map<string, Date | null>();

  for (const [index, query] of queries.entries()) {
    logger.info({ topic: query.name, query: query.searchQuery }, "fetching topic");
    const items = await fetchTopicItems(deps.fetchItems, query.searchQuery, logger);
    lastSeenByTopic.set(query.name, latestPublished(items));

    const candidates = selectCandidates(items, window.candidateCutoff, working);
    const { recent, educational } = partitionCandidates(
      candidates,
      config.selection.maxRecentItemsPerTopic,
      config.selection.maxEducationalItemsPerTopic,
      random,
    );

    for (const entry of [...recent, ...educational]) {
      working.add(entry.id);
    }
    topicResults.push({ name: query.name, recent, educational });

    logger.info(
      {
        topic: query.name,
        fetched: items.length,
        candidates: candidates.length,
        recent: recent.length,
        educational: educational.length,
      },
      "topic selected",
    );

    if (index < queries.length - 1) {
      await sleep(delayMs);
    }
  }

  const selectedIds = topicResults.flatMap((result) =>
    [...result.recent, ...result.educational].map((entry) => entry.id),
  );

  const blocks = renderDigestBlocks({
    now,
    timeZone: resolveTimeZone(config.report.timezone, logger),
    cutoff: window.candidateCutoff,
    recentWindowDays: config.selection.recentWindowDays,
    headerTemplate: config.discord.headerTemplate,
    titleMaxLength: config.discord.titleMaxLength,
    topicResults,
  });
  const messages = packMessages(blocks, config.discord.maxContentLength);
  const skipSend = selectedIds.length === 0 && config.discord.skipEmptyDigest;

  if (skipSend) {
    logger.info("no new papers selected, skipping discord send");
  } else {
    logger.info(
      { topics: topicResults.length, selected: selectedIds.length, messages: messages.length },
      "sending digest",
    );
    for (const [index, content] of messages.entries()) {
      const result = await deps.sendMessage(content, logger);
      if (!result.success) {
        throw new CollaboratorError(
          "transport",
          `message ${index + 1}/${messages.length} failed: ${result.error}`,
        );
      }
    }
  }

  const updated = recordDelivery(
    ledger,
    selectedIds,
    now,
    lastSeenByTopic,
    config.ledger.maxDeliveredIds,
  );
  store.commit(updated);

  logger.info(
    {
      deliveredIdCount: updated.deliveredIds.length,
      lastSuccessAt: now.toISOString(),
    },
    "ledger committed",
  );

  return {
    candidateCutoff: window.candidateCutoff,
    topicResults,
    selectedCount: selectedIds.length,
    messageCount: skipSend ? 0 : messages.length,
    deliveredIdCount: updated.deliveredIds.length,
  };
}
