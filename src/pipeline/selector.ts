// pattern: Functional Core
import { isEducational } from "./classifier";
import { sampleWithoutReplacement } from "./random";
import type { Candidate, CandidatePartition, NormalizedItem, Random } from "./types";

function publishedTime(item: NormalizedItem): number | null {
  if (item.publishedAt === null) return null;
  const time = item.publishedAt.getTime();
  return Number.isNaN(time) ? null : time;
}

/**
 * Filters items down to undelivered candidates published at or after the
 * cutoff, tags each as educational or not, and orders them newest first.
 *
 * Items without an id or a usable publication time are dropped, and a repeated
 * id keeps only its first occurrence. The sort is stable, so items sharing a
 * timestamp keep their input order.
 */
export function selectCandidates(
  items: ReadonlyArray<NormalizedItem>,
  cutoff: Date,
  alreadyDelivered: ReadonlySet<string>,
): Array<Candidate> {
  const cutoffTime = cutoff.getTime();
  const candidates: Array<Candidate> = [];
  const taken = new Set<string>();

  for (const item of items) {
    const time = publishedTime(item);
    if (!item.id || time === null) continue;
    if (time < cutoffTime) continue;
    if (alreadyDelivered.has(item.id) || taken.has(item.id)) continue;

    taken.add(item.id);
    candidates.push({
      ...item,
      educational: isEducational(item.title, item.summary),
    });
  }

  return candidates.sort((a, b) => {
    const ta = publishedTime(a);
    const tb = publishedTime(b);
    if (ta === tb) return 0;
    if (ta === null) return 1;
    if (tb === null) return -1;
    return tb - ta;
  });
}

/**
 * Splits ordered candidates into the capped "recent" list (a plain
 * truncation) and the capped "educational" list (a random sample once the
 * pool outgrows the cap).
 */
export function partitionCandidates(
  candidates: ReadonlyArray<Candidate>,
  recentCap: number,
  educationalCap: number,
  random: Random,
): CandidatePartition {
  const recentPool: Array<Candidate> = [];
  const educationalPool: Array<Candidate> = [];

  for (const candidate of candidates) {
    if (candidate.educational) {
      educationalPool.push(candidate);
    } else {
      recentPool.push(candidate);
    }
  }

  const recent = recentPool.slice(0, Math.max(recentCap, 0));

  const limit = Math.max(educationalCap, 0);
  if (limit === 0 || educationalPool.length === 0) {
    return { recent, educational: [] };
  }
  if (educationalPool.length <= limit) {
    return { recent, educational: educationalPool };
  }

  return {
    recent,
    educational: sampleWithoutReplacement(educationalPool, limit, random),
  };
}
