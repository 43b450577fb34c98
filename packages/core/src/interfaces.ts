/**
 * Subsystem interfaces (ports). Every tokenizer implements this one.
 */
import { Context, type Effect } from "effect";
import type { InsufficientDataError } from "./errors.js";
import type { TokenizerArtifacts, TrainReport } from "./types.js";

// ── Tokenizer ──────────────────────────────────────────────────────────────
export interface Tokenizer {
  readonly name: string;
  /** Size of the id space a consumer has to embed. */
  readonly vocabSize: number;
  readonly targetVocabSize: number;
  train(corpus: string): Effect.Effect<TrainReport, InsufficientDataError>;
  encode(text: string): Int32Array;
  decode(tokens: ArrayLike<number>): string;
  addSpecialTokens(tokens: ArrayLike<number>): Int32Array;
  artifacts(): TokenizerArtifacts;
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}
