/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer that constructs it from config or from disk.
 */
import { Layer } from "effect";
import { TokenizerService, type CorruptStateError, type Tokenizer } from "@bytepair/core";
import { loadTokenizer } from "@bytepair/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Provide the tokenizer saved in `dir`; the layer fails if it cannot load. */
export const TokenizerFromDir = (dir: string): Layer.Layer<TokenizerService, CorruptStateError> =>
  Layer.effect(TokenizerService, loadTokenizer(dir));
