import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  BpeTokenizer,
  encodeGreedy,
  encodeRanked,
  pairKey,
  type MergeRanks,
} from "@bytepair/tokenizers";
import { sampleCorpus } from "./fixtures.js";

const utf8 = new TextEncoder();

function bytes(text: string): number[] {
  return Array.from(utf8.encode(text));
}

function ranksOf(merges: readonly { left: number; right: number; id: number }[]): MergeRanks {
  return new Map(merges.map((m): [number, number] => [pairKey(m.left, m.right), m.id]));
}

describe("encodeGreedy / encodeRanked", () => {
  it("merge overlapping runs left to right", () => {
    const ranks = ranksOf([{ left: 97, right: 97, id: 260 }]);
    for (const encode of [encodeGreedy, encodeRanked]) {
      expect(encode(bytes("aaa"), ranks)).toEqual([260, 97]);
      expect(encode(bytes("aaaaa"), ranks)).toEqual([260, 260, 97]);
    }
  });

  it("chain merges built on earlier ones", () => {
    const ranks = ranksOf([
      { left: 97, right: 97, id: 260 },
      { left: 260, right: 97, id: 261 },
    ]);
    for (const encode of [encodeGreedy, encodeRanked]) {
      expect(encode(bytes("aaa"), ranks)).toEqual([261]);
    }
  });

  it("apply the earliest merge first, not the leftmost pair", () => {
    const ranks = ranksOf([
      { left: 98, right: 99, id: 260 },
      { left: 97, right: 98, id: 261 },
    ]);
    for (const encode of [encodeGreedy, encodeRanked]) {
      expect(encode(bytes("abc"), ranks)).toEqual([97, 260]);
    }
  });

  it("leave input without known pairs alone", () => {
    const ranks = ranksOf([{ left: 120, right: 121, id: 260 }]);
    for (const encode of [encodeGreedy, encodeRanked]) {
      expect(encode(bytes("abc"), ranks)).toEqual([97, 98, 99]);
      expect(encode([], ranks)).toEqual([]);
      expect(encode([120], ranks)).toEqual([120]);
    }
  });

  it("agree on text encoded with trained merges", async () => {
    const tok = new BpeTokenizer(360);
    await Effect.runPromise(tok.train(sampleCorpus(400)));
    const ranks = ranksOf(tok.merges);

    for (const text of [
      "the lazy dog",
      sampleCorpus(80, 3),
      "dogs and cats ran away; the fox did not",
      "aaaa bbbb ssss eeee",
    ]) {
      expect(encodeRanked(bytes(text), ranks)).toEqual(encodeGreedy(bytes(text), ranks));
    }
  });
});
