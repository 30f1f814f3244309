// pattern: Functional Core
import type { Random } from "./types";

export const defaultRandom: Random = () => Math.random();

/**
 * Deterministic generator (mulberry32) for reproducible sampling.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draws `count` distinct elements with a partial Fisher-Yates shuffle.
 * The result order carries no meaning.
 */
export function sampleWithoutReplacement<T>(
  pool: ReadonlyArray<T>,
  count: number,
  random: Random,
): Array<T> {
  const copy = [...pool];
  const take = Math.min(Math.max(count, 0), copy.length);

  for (let i = 0; i < take; i++) {
    const j = Math.min(
      i + Math.floor(random() * (copy.length - i)),
      copy.length - 1,
    );
    const current = copy[i];
    const picked = copy[j];
    if (current === undefined || picked === undefined) continue;
    copy[i] = picked;
    copy[j] = current;
  }

  return copy.slice(0, take);
}
