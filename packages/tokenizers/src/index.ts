/**
 * @bytepair/tokenizers -- byte-level BPE for the bytepair system.
 *
 * Provides the BPE tokenizer and its building blocks (pre-tokenizer, pair
 * statistics, merge learner, encoders), persistence helpers, tokenizer
 * configuration, and a pre-populated registry so the rest of the system can
 * look up tokenizers by name.
 */
import { Registry, type Tokenizer } from "@bytepair/core";
import { BpeTokenizer } from "./bpe.js";
import type { TokenizerConfig } from "./config/schema.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { BpeTokenizer } from "./bpe.js";
export {
  saveArtifacts,
  saveTokenizer,
  loadArtifacts,
  loadTokenizer,
  VOCAB_FILE,
  MERGES_FILE,
} from "./persist.js";
export { pretokenize, chunkBytes, SPLIT_PATTERN } from "./pretokenize.js";
export {
  countPairs,
  mostFrequentPair,
  mergePair,
  pairKey,
  pairLeft,
  pairRight,
  PAIR_STRIDE,
} from "./pairs.js";
export type { PairCount } from "./pairs.js";
export { learnMerges } from "./learner.js";
export type { LearnedMerges } from "./learner.js";
export { encodeGreedy, encodeRanked } from "./encoder.js";
export type { MergeRanks } from "./encoder.js";
export {
  SPECIAL_TOKENS,
  PAD_ID,
  UNK_ID,
  BOS_ID,
  EOS_ID,
  NUM_SPECIAL_TOKENS,
  FIRST_MERGE_ID,
  isSpecialToken,
  specialTokenId,
  baseVocab,
  buildVocab,
  findInconsistency,
} from "./vocab.js";
export type { SpecialToken } from "./vocab.js";
export { defaultTokenizerConfig } from "./config/schema.js";
export type { TokenizerConfig } from "./config/schema.js";
export {
  loadTokenizerConfig,
  readTokenizerConfigFile,
  parseTokenizerOverrides,
  resolveTokenizerConfig,
  validateTokenizerConfig,
} from "./config/load.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

/**
 * Global tokenizer registry.
 *
 * Pre-registered implementations:
 * - `"bpe"`     -- byte-level BPE, vocab size 1024
 * - `"bpe-4k"`  -- 4096
 * - `"bpe-16k"` -- 16384
 * - `"bpe-32k"` -- 32768
 *
 * Options passed to `get` override the preset.
 *
 * Usage:
 * ```ts
 * const tok = tokenizerRegistry.get("bpe-4k", { respectChunkBoundaries: true });
 * ```
 */
export const tokenizerRegistry = new Registry<Tokenizer, Partial<TokenizerConfig>>("tokenizer");

tokenizerRegistry.register("bpe", (o) => new BpeTokenizer({ ...o }));
tokenizerRegistry.register("bpe-4k", (o) => new BpeTokenizer({ vocabSize: 4096, ...o }));
tokenizerRegistry.register("bpe-16k", (o) => new BpeTokenizer({ vocabSize: 16384, ...o }));
tokenizerRegistry.register("bpe-32k", (o) => new BpeTokenizer({ vocabSize: 32768, ...o }));
