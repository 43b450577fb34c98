/**
 * Applying learned merges to a byte sequence.
 *
 * Both encoders follow the same rule: of the pairs present, merge the one
 * with the lowest merge id everywhere (left to right, non-overlapping), then
 * look again. `encodeGreedy` does it literally; `encodeRanked` gets the same
 * result from a heap over a linked list of tokens.
 */
import { countPairs, mergePair, pairKey, pairLeft, pairRight } from "./pairs.js";

/** pair key -> merge id. Lower id means higher priority. */
export type MergeRanks = ReadonlyMap<number, number>;

/**
 * Recount-and-merge loop. O(M x N) for M applied merges.
 */
export function encodeGreedy(ids: readonly number[], ranks: MergeRanks): number[] {
  let current = [...ids];
  while (current.length >= 2) {
    let bestKey = -1;
    let bestId = Infinity;
    for (const key of countPairs([current]).keys()) {
      const id = ranks.get(key);
      if (id !== undefined && id < bestId) {
        bestId = id;
        bestKey = key;
      }
    }
    if (bestKey < 0) break;
    current = mergePair(current, pairLeft(bestKey), pairRight(bestKey), bestId);
  }
  return current;
}

/**
 * Min-heap keyed by (merge id, position) over a doubly-linked list of tokens.
 *
 * Merging a pair can only create pairs containing the new id, and those
 * always rank after it, so popping in (id, position) order reproduces the
 * left-to-right passes of `encodeGreedy`. O(N log N).
 */
export function encodeRanked(ids: readonly number[], ranks: MergeRanks): number[] {
  const n = ids.length;
  if (n < 2) return [...ids];

  // ── Doubly-linked list of tokens ──
  const nodeId = Int32Array.from(ids);
  const nodeNext = new Int32Array(n);
  const nodePrev = new Int32Array(n);
  const deleted = new Uint8Array(n);

  for (let i = 0; i < n; i++) {
    nodePrev[i] = i - 1;
    nodeNext[i] = i + 1;
  }
  nodeNext[n - 1] = -1;

  // ── Binary min-heap of (rank, position) ──
  // Entries go stale when a neighbour merges; they are skipped at pop time.
  const heapRank: number[] = [];
  const heapPos: number[] = [];

  const less = (a: number, b: number): boolean =>
    heapRank[a] < heapRank[b] || (heapRank[a] === heapRank[b] && heapPos[a] < heapPos[b]);

  const swap = (a: number, b: number): void => {
    const tr = heapRank[a]; heapRank[a] = heapRank[b]; heapRank[b] = tr;
    const tp = heapPos[a]; heapPos[a] = heapPos[b]; heapPos[b] = tp;
  };

  const heapPush = (rank: number, pos: number): void => {
    let i = heapRank.length;
    heapRank.push(rank);
    heapPos.push(pos);
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!less(i, p)) break;
      swap(i, p);
      i = p;
    }
  };

  const heapPop = (): [number, number] => {
    const top: [number, number] = [heapRank[0], heapPos[0]];
    const last = heapRank.length - 1;
    swap(0, last);
    heapRank.pop();
    heapPos.pop();
    let i = 0;
    while (true) {
      let s = i;
      const l = 2 * i + 1;
      const r = 2 * i + 2;
      if (l < heapRank.length && less(l, s)) s = l;
      if (r < heapRank.length && less(r, s)) s = r;
      if (s === i) break;
      swap(s, i);
      i = s;
    }
    return top;
  };

  for (let i = 0; i < n - 1; i++) {
    const rank = ranks.get(pairKey(nodeId[i], nodeId[i + 1]));
    if (rank !== undefined) heapPush(rank, i);
  }

  // ── Process merges in rank order ──
  while (heapRank.length > 0) {
    const [rank, pos] = heapPop();

    if (deleted[pos]) continue;
    const nxt = nodeNext[pos];
    if (nxt === -1) continue;
    if (ranks.get(pairKey(nodeId[pos], nodeId[nxt])) !== rank) continue;

    // Merge: pos takes the new id, nxt leaves the list.
    nodeId[pos] = rank;
    deleted[nxt] = 1;
    nodeNext[pos] = nodeNext[nxt];
    if (nodeNext[nxt] !== -1) nodePrev[nodeNext[nxt]] = pos;

    const prv = nodePrev[pos];
    if (prv !== -1) {
      const r = ranks.get(pairKey(nodeId[prv], nodeId[pos]));
      if (r !== undefined) heapPush(r, prv);
    }

    const after = nodeNext[pos];
    if (after !== -1) {
      const r = ranks.get(pairKey(nodeId[pos], nodeId[after]));
      if (r !== undefined) heapPush(r, pos);
    }
  }

  // Node 0 is never deleted: only the right half of a pair leaves the list.
  const out: number[] = [];
  for (let cur = 0; cur !== -1; cur = nodeNext[cur]) {
    out.push(nodeId[cur]);
  }
  return out;
}
