/**
 * Byte-level byte-pair encoding tokenizer.
 *
 * Starts from the 256 byte values and iteratively merges the most frequent
 * adjacent pair until the target vocab size is reached. At encode time the
 * learned merges are applied greedily, earliest-learned first.
 */
import { Effect } from "effect";
import {
  InsufficientDataError,
  type Merge,
  type TokenId,
  type Tokenizer,
  type TokenizerArtifacts,
  type TrainReport,
} from "@bytepair/core";
import { resolveTokenizerConfig } from "./config/load.js";
import type { TokenizerConfig } from "./config/schema.js";
import { encodeGreedy, encodeRanked } from "./encoder.js";
import { learnMerges } from "./learner.js";
import { pairKey } from "./pairs.js";
import { chunkBytes, pretokenize } from "./pretokenize.js";
import {
  BOS_ID,
  EOS_ID,
  FIRST_MERGE_ID,
  baseVocab,
  buildVocab,
  isSpecialToken,
} from "./vocab.js";

/** Inputs longer than this (in bytes) go through the heap encoder. */
const RANKED_ENCODE_THRESHOLD = 256;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: false });

function copyVocab(vocab: ReadonlyMap<TokenId, Uint8Array>): Map<TokenId, Uint8Array> {
  return new Map([...vocab].map(([id, bytes]): [TokenId, Uint8Array] => [id, Uint8Array.from(bytes)]));
}

export class BpeTokenizer implements Tokenizer {
  readonly name = "bpe";

  private readonly _config: TokenizerConfig;

  /** id -> byte string */
  private _vocab: Map<TokenId, Uint8Array> = baseVocab();

  /** Ordered list of learned merges. */
  private _merges: Merge[] = [];

  /** pair key -> merge id, for encode-time lookups. */
  private _ranks = new Map<number, TokenId>();

  constructor(config: number | Partial<TokenizerConfig> = {}) {
    this._config = resolveTokenizerConfig(
      typeof config === "number" ? { vocabSize: config } : config,
    );
  }

  /** Rebuild a trained tokenizer. The artifacts must already be consistent. */
  static fromArtifacts(artifacts: TokenizerArtifacts): BpeTokenizer {
    const tok = new BpeTokenizer(artifacts.vocabSize);
    tok._install(artifacts.merges);
    return tok;
  }

  // ── Public interface ─────────────────────────────────────────────────────

  get config(): TokenizerConfig {
    return this._config;
  }

  get targetVocabSize(): number {
    return this._config.vocabSize;
  }

  /** Highest assigned id + 1. Equals `targetVocabSize` after a full training run. */
  get vocabSize(): number {
    return FIRST_MERGE_ID + this._merges.length;
  }

  get mergeCount(): number {
    return this._merges.length;
  }

  /** A snapshot of the vocabulary; its byte strings are copies. */
  get vocab(): ReadonlyMap<TokenId, Uint8Array> {
    return copyVocab(this._vocab);
  }

  get merges(): readonly Merge[] {
    return this._merges;
  }

  /** A copy of the bytes behind `id`, or undefined for unassigned ids. */
  tokenBytes(id: TokenId): Uint8Array | undefined {
    const bytes = this._vocab.get(id);
    return bytes === undefined ? undefined : Uint8Array.from(bytes);
  }

  artifacts(): TokenizerArtifacts {
    return {
      type: "bpe",
      vocabSize: this._config.vocabSize,
      vocab: copyVocab(this._vocab),
      merges: this._merges.map(({ left, right, id }) => ({ left, right, id })),
    };
  }

  /**
   * Learn merges from `corpus`, replacing any previous state.
   *
   * 1. Pre-tokenize and convert to UTF-8 bytes.
   * 2. Repeatedly merge the most frequent adjacent pair, numbering merges
   *    from 260, until `vocabSize - 260` merges exist.
   * 3. Build vocab entries for the merges in creation order.
   *
   * When the corpus runs out of pairs first, the merges learned so far are
   * kept and the effect fails with `InsufficientDataError`.
   */
  train(corpus: string): Effect.Effect<TrainReport, InsufficientDataError> {
    return Effect.suspend(() => {
      const { respectChunkBoundaries, logEvery } = this._config;
      const sequences = chunkBytes(corpus, respectChunkBoundaries);
      const requestedMerges = this._config.vocabSize - FIRST_MERGE_ID;
      const learned = learnMerges(sequences, requestedMerges, FIRST_MERGE_ID);

      this._install(learned.merges);

      const report: TrainReport = {
        requestedMerges,
        learnedMerges: learned.merges.length,
        vocabSize: this.vocabSize,
        corpusBytes: sequences.reduce((n, ids) => n + ids.length, 0),
        chunkCount: pretokenize(corpus).length,
        tokenCount: learned.sequences.reduce((n, ids) => n + ids.length, 0),
      };

      const progress = Effect.forEach(
        learned.merges.filter((_, i) => (i + 1) % logEvery === 0),
        ({ left, right, id }) =>
          Effect.logDebug(
            `merge ${id - FIRST_MERGE_ID + 1}/${requestedMerges}: (${left}, ${right}) -> ${id} ` +
              `count=${learned.counts[id - FIRST_MERGE_ID]}`,
          ),
        { discard: true },
      );

      const summary = Effect.logInfo(
        `learned ${report.learnedMerges}/${requestedMerges} merges from ${report.corpusBytes} bytes ` +
          `(${report.corpusBytes} -> ${report.tokenCount} tokens, vocab_size=${report.vocabSize})`,
      );

      const outcome: Effect.Effect<TrainReport, InsufficientDataError> =
        report.learnedMerges < requestedMerges
          ? Effect.fail(
              new InsufficientDataError({
                message:
                  `Corpus supports only ${report.learnedMerges} of ${requestedMerges} merges ` +
                  `(vocab_size=${report.vocabSize}, target ${this._config.vocabSize})`,
                requestedMerges,
                learnedMerges: report.learnedMerges,
                vocabSize: report.vocabSize,
              }),
            )
          : Effect.succeed(report);

      return progress.pipe(Effect.zipRight(summary), Effect.zipRight(outcome));
    }).pipe(
      Effect.annotateLogs({ tokenizer: this.name, targetVocabSize: this._config.vocabSize }),
      Effect.withSpan("bpe.train"),
    );
  }

  /**
   * Encode text by greedily applying learned merges to its UTF-8 bytes.
   *
   * No pre-tokenization happens here, so merges may span what training
   * would have treated as separate chunks.
   */
  encode(text: string): Int32Array {
    const ids = Array.from(utf8Encoder.encode(text));
    if (this._ranks.size === 0 || ids.length < 2) {
      return Int32Array.from(ids);
    }
    const merged =
      ids.length > RANKED_ENCODE_THRESHOLD
        ? encodeRanked(ids, this._ranks)
        : encodeGreedy(ids, this._ranks);
    return Int32Array.from(merged);
  }

  /**
   * Decode token ids back into a string.
   *
   * Special-token ids are dropped wherever they occur, as are ids with no
   * vocab entry. Invalid UTF-8 becomes U+FFFD.
   */
  decode(tokens: ArrayLike<number>): string {
    const parts: Uint8Array[] = [];
    let total = 0;
    for (let i = 0; i < tokens.length; i++) {
      const id = tokens[i];
      if (isSpecialToken(id)) continue;
      const bytes = this._vocab.get(id);
      if (bytes !== undefined) {
        parts.push(bytes);
        total += bytes.length;
      }
    }

    const buf = new Uint8Array(total);
    let offset = 0;
    for (const bytes of parts) {
      buf.set(bytes, offset);
      offset += bytes.length;
    }
    return utf8Decoder.decode(buf);
  }

  /** Wrap a sequence in BOS ... EOS. */
  addSpecialTokens(tokens: ArrayLike<number>): Int32Array {
    const out = new Int32Array(tokens.length + 2);
    out[0] = BOS_ID;
    for (let i = 0; i < tokens.length; i++) {
      out[i + 1] = tokens[i];
    }
    out[tokens.length + 1] = EOS_ID;
    return out;
  }

  // ── Internal helpers ─────────────────────────────────────────────────────

  /** Replace all learned state with `merges`. */
  private _install(merges: readonly Merge[]): void {
    this._merges = merges.map(({ left, right, id }) => ({ left, right, id }));
    this._vocab = buildVocab(this._merges);
    this._ranks = new Map(this._merges.map((m): [number, TokenId] => [pairKey(m.left, m.right), m.id]));
  }
}
