// pattern: Functional Core
import type { CandidateWindow } from "./types";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Earliest publication time a run must consider.
 *
 * The window is at least `lookbackHours` (clamped to one hour) and grows to
 * the whole gap since the last successful run when runs were missed. A last
 * success in the future counts as zero elapsed time.
 */
export function computeCutoff(
  now: Date,
  lastSuccessAt: Date | null,
  lookbackHours: number,
): Date {
  const lookbackMs = Math.max(lookbackHours, 1) * HOUR_MS;
  if (lastSuccessAt === null) {
    return new Date(now.getTime() - lookbackMs);
  }

  const elapsedMs = Math.max(0, now.getTime() - lastSuccessAt.getTime());
  return new Date(now.getTime() - Math.max(lookbackMs, elapsedMs));
}

/**
 * Combines the catch-up cutoff with the "recent" display window. An item is a
 * candidate when it falls inside either, so the earlier cutoff wins.
 */
export function computeCandidateWindow(
  now: Date,
  lastSuccessAt: Date | null,
  lookbackHours: number,
  recentWindowDays: number,
): CandidateWindow {
  const stateCutoff = computeCutoff(now, lastSuccessAt, lookbackHours);
  const recentCutoff = new Date(
    now.getTime() - Math.max(recentWindowDays, 1) * DAY_MS,
  );
  const candidateCutoff =
    stateCutoff.getTime() <= recentCutoff.getTime() ? stateCutoff : recentCutoff;

  return { stateCutoff, recentCutoff, candidateCutoff };
}
