/**
 * Greedy merge learning.
 *
 * Every iteration recounts pairs over the whole working corpus, merges the
 * most frequent one everywhere, and records it. The full rescan keeps the
 * tie-break (first-seen pair) exact.
 */
import type { Merge } from "@bytepair/core";
import { countPairs, mergePair, mostFrequentPair, pairLeft, pairRight } from "./pairs.js";

export interface LearnedMerges {
  readonly merges: Merge[];
  /** Frequency of each merge's pair at the moment it was chosen. */
  readonly counts: number[];
  /** The working corpus after the last merge. */
  readonly sequences: number[][];
}

/**
 * Learn up to `numMerges` merges, numbering them from `firstId`.
 *
 * Stops early, without error, once no adjacent pair is left. Callers
 * compare `merges.length` to what they asked for.
 */
export function learnMerges(
  sequences: readonly (readonly number[])[],
  numMerges: number,
  firstId: number,
): LearnedMerges {
  let current = sequences.filter((ids) => ids.length > 0).map((ids) => [...ids]);
  const merges: Merge[] = [];
  const counts: number[] = [];

  for (let m = 0; m < numMerges; m++) {
    const best = mostFrequentPair(countPairs(current));
    if (best === undefined) break;

    const left = pairLeft(best.key);
    const right = pairRight(best.key);
    const id = firstId + m;

    current = current.map((ids) => (ids.length < 2 ? ids : mergePair(ids, left, right, id)));
    merges.push({ left, right, id });
    counts.push(best.count);
  }

  return { merges, counts, sequences: current };
}
