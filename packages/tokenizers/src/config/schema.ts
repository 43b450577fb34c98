/**
 * TokenizerConfig type and defaults.
 */

export interface TokenizerConfig {
  /** Target id-space size: 256 bytes + 4 special tokens + merges. */
  readonly vocabSize: number;
  /** Keep pre-tokenizer chunks apart while counting and merging pairs. */
  readonly respectChunkBoundaries: boolean;
  /** Log every n-th learned merge at debug level. */
  readonly logEvery: number;
}

export const defaultTokenizerConfig: TokenizerConfig = {
  vocabSize: 1024,
  respectChunkBoundaries: false,
  logEvery: 100,
};
