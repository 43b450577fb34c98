/**
 * Adjacent-pair statistics and pair replacement.
 *
 * Pairs are packed into one number so they can key a plain `Map`.
 */

/** Ids must stay below this for `pairKey` to be reversible. */
export const PAIR_STRIDE = 2 ** 26;

export function pairKey(left: number, right: number): number {
  return left * PAIR_STRIDE + right;
}

export function pairLeft(key: number): number {
  return Math.floor(key / PAIR_STRIDE);
}

export function pairRight(key: number): number {
  return key % PAIR_STRIDE;
}

/**
 * Count every adjacent pair, scanning each sequence left to right.
 *
 * The map's iteration order is the order in which pairs were first seen,
 * which is what `mostFrequentPair` relies on for tie-breaks.
 */
export function countPairs(sequences: readonly (readonly number[])[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const ids of sequences) {
    for (let i = 0; i < ids.length - 1; i++) {
      const key = pairKey(ids[i], ids[i + 1]);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return counts;
}

export interface PairCount {
  readonly key: number;
  readonly count: number;
}

/** Highest count wins; among equal counts the first-seen pair wins. */
export function mostFrequentPair(counts: ReadonlyMap<number, number>): PairCount | undefined {
  let best: PairCount | undefined;
  for (const [key, count] of counts) {
    if (best === undefined || count > best.count) {
      best = { key, count };
    }
  }
  return best;
}

/**
 * Scan `ids` and replace every adjacent (left, right) with `newId`.
 *
 * A replaced position is consumed, so "aaa" with (a, a) becomes [aa, a].
 */
export function mergePair(
  ids: readonly number[],
  left: number,
  right: number,
  newId: number,
): number[] {
  const out: number[] = [];
  let i = 0;
  while (i < ids.length) {
    if (i < ids.length - 1 && ids[i] === left && ids[i + 1] === right) {
      out.push(newId);
      i += 2;
    } else {
      out.push(ids[i]);
      i += 1;
    }
  }
  return out;
}
