export { computeCutoff, computeCandidateWindow } from "./cutoff";
export { isEducational } from "./classifier";
export { selectCandidates, partitionCandidates } from "./selector";
export { createSeededRandom, defaultRandom, sampleWithoutReplacement } from "./random";
export { buildSearchQuery } from "./query";
export { parseArxivFeed, normalizeEntry } from "./parser";
export { createArxivFetcher, resolveQueryDelayMs } from "./arxiv-client";
export type { FetchItemsFn, ArxivClientOptions } from "./arxiv-client";
export type {
  NormalizedItem,
  Candidate,
  CandidatePartition,
  CandidateWindow,
  TopicResult,
  Random,
  Clock,
} from "./types";
