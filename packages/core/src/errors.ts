/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class TokenizerError extends Data.TaggedError("TokenizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Training stopped before the requested number of merges because no
 * adjacent pair was left to merge. The tokenizer keeps what it learned.
 */
export class InsufficientDataError extends Data.TaggedError("InsufficientDataError")<{
  readonly message: string;
  readonly requestedMerges: number;
  readonly learnedMerges: number;
  readonly vocabSize: number;
}> {}

/** Persisted tokenizer state is missing or malformed. */
export class CorruptStateError extends Data.TaggedError("CorruptStateError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
