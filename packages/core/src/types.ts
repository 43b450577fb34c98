/**
 * Core types shared by every tokenizer package.
 */

// ── Ids ────────────────────────────────────────────────────────────────────
export type TokenId = number;

/** Ids 0-255 are raw bytes. */
export const BYTE_VOCAB_SIZE = 256;

// ── Merges ─────────────────────────────────────────────────────────────────

/** A single learned merge: (left id, right id) -> new id. */
export interface Merge {
  readonly left: TokenId;
  readonly right: TokenId;
  readonly id: TokenId;
}

// ── Artifacts ──────────────────────────────────────────────────────────────

/**
 * Everything needed to rebuild a trained tokenizer.
 *
 * `vocabSize` is the training target, not the size of `vocab`: a tokenizer
 * trained on too little text learns fewer merges than it was asked for.
 */
export interface TokenizerArtifacts {
  readonly type: string;
  readonly vocabSize: number;
  readonly vocab: ReadonlyMap<TokenId, Uint8Array>;
  readonly merges: readonly Merge[];
}

// ── Training ───────────────────────────────────────────────────────────────
export interface TrainReport {
  readonly requestedMerges: number;
  readonly learnedMerges: number;
  /** Size of the id space after training (highest id + 1). */
  readonly vocabSize: number;
  readonly corpusBytes: number;
  readonly chunkCount: number;
  /** Length of the training sequence once every merge was applied. */
  readonly tokenCount: number;
}
