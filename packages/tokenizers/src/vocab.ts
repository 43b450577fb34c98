/**
 * Vocabulary layout: raw bytes, special tokens, learned merges.
 *
 * Special tokens reuse ids 0-3, so bytes 0x00-0x03 share an id with a
 * special token and are dropped by decode. Merge ids start after the byte
 * range plus the special-token count, leaving 256-259 unassigned.
 */
import { BYTE_VOCAB_SIZE, type Merge, type TokenId } from "@bytepair/core";

export const SPECIAL_TOKENS = {
  "<PAD>": 0,
  "<UNK>": 1,
  "<BOS>": 2,
  "<EOS>": 3,
} as const;

export type SpecialToken = keyof typeof SPECIAL_TOKENS;

export const PAD_ID = SPECIAL_TOKENS["<PAD>"];
export const UNK_ID = SPECIAL_TOKENS["<UNK>"];
export const BOS_ID = SPECIAL_TOKENS["<BOS>"];
export const EOS_ID = SPECIAL_TOKENS["<EOS>"];

const specialEntries = Object.entries(SPECIAL_TOKENS);

export const NUM_SPECIAL_TOKENS = specialEntries.length;

/** First id handed out by the merge learner. */
export const FIRST_MERGE_ID = BYTE_VOCAB_SIZE + NUM_SPECIAL_TOKENS;

const specialIds: ReadonlySet<number> = new Set(Object.values(SPECIAL_TOKENS));

export function isSpecialToken(id: number): boolean {
  return specialIds.has(id);
}

export function specialTokenId(name: SpecialToken): TokenId {
  return SPECIAL_TOKENS[name];
}

const utf8 = new TextEncoder();

/** Bytes 0-255 followed by the special-token names written over ids 0-3. */
export function baseVocab(): Map<TokenId, Uint8Array> {
  const vocab = new Map<TokenId, Uint8Array>();
  for (let b = 0; b < BYTE_VOCAB_SIZE; b++) {
    vocab.set(b, Uint8Array.of(b));
  }
  for (const [name, id] of specialEntries) {
    vocab.set(id, utf8.encode(name));
  }
  return vocab;
}

export function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

/**
 * Base vocabulary extended with one entry per merge, in creation order so
 * both halves of a merge are always resolved first.
 */
export function buildVocab(merges: readonly Merge[]): Map<TokenId, Uint8Array> {
  const vocab = baseVocab();
  for (const { left, right, id } of merges) {
    const a = vocab.get(left);
    const b = vocab.get(right);
    if (a === undefined || b === undefined) {
      throw new RangeError(`Merge ${id} references unknown id (${left}, ${right})`);
    }
    vocab.set(id, concatBytes(a, b));
  }
  return vocab;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Check that `vocab` and `merges` describe one consistent tokenizer.
 * Returns a description of the first problem found, or undefined.
 */
export function findInconsistency(
  vocab: ReadonlyMap<TokenId, Uint8Array>,
  merges: readonly Merge[],
): string | undefined {
  const base = baseVocab();
  for (const [id, bytes] of base) {
    const got = vocab.get(id);
    if (got === undefined || !sameBytes(got, bytes)) {
      return `vocab entry ${id} does not match the base vocabulary`;
    }
  }

  const seenPairs = new Set<string>();
  let expectedId = FIRST_MERGE_ID;
  for (const { left, right, id } of merges) {
    if (id !== expectedId) {
      return `merge ids must run consecutively from ${FIRST_MERGE_ID}; found ${id} where ${expectedId} was expected`;
    }
    expectedId++;
    if (left >= id || right >= id) {
      return `merge ${id} references a later id (${left}, ${right})`;
    }
    const pair = `${left},${right}`;
    if (seenPairs.has(pair)) {
      return `pair (${left}, ${right}) is merged twice`;
    }
    seenPairs.add(pair);

    const a = vocab.get(left);
    const b = vocab.get(right);
    const merged = vocab.get(id);
    if (a === undefined || b === undefined) {
      return `merge ${id} references unknown id (${left}, ${right})`;
    }
    if (merged === undefined || !sameBytes(merged, concatBytes(a, b))) {
      return `vocab entry ${id} is not the concatenation of ${left} and ${right}`;
    }
  }

  const expectedSize = base.size + merges.length;
  if (vocab.size !== expectedSize) {
    return `vocab has ${vocab.size} entries, expected ${expectedSize}`;
  }
  return undefined;
}
