/**
 * Persistence for trained tokenizers.
 *
 * A tokenizer directory holds two JSON blobs:
 *
 *   vocab.json   { format: "bytepair-vocab", version: 1, entries: [[id, base64], ...] }
 *   merges.json  { format: "bytepair-merges", version: 1, vocabSize, merges: [[left, right, id], ...] }
 *
 * Every I/O step is wrapped in an Effect so callers get typed
 * `TokenizerError` / `CorruptStateError` failures instead of raw exceptions.
 */
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import {
  CorruptStateError,
  TokenizerError,
  type Merge,
  type TokenId,
  type Tokenizer,
  type TokenizerArtifacts,
} from "@bytepair/core";
import { BpeTokenizer } from "./bpe.js";
import { PAIR_STRIDE } from "./pairs.js";
import { FIRST_MERGE_ID, findInconsistency } from "./vocab.js";

export const VOCAB_FILE = "vocab.json";
export const MERGES_FILE = "merges.json";

const VOCAB_FORMAT = "bytepair-vocab";
const MERGES_FORMAT = "bytepair-merges";
const FORMAT_VERSION = 1;

// ── Save ───────────────────────────────────────────────────────────────────

/**
 * Write `contents` next to `path` and rename it into place, so a failed
 * write never leaves a truncated blob under the real name.
 */
async function writeAtomic(path: string, contents: string): Promise<void> {
  const tmp = `${path}.tmp`;
  try {
    const handle = await open(tmp, "w");
    try {
      await handle.writeFile(contents, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

function serializeVocab(vocab: ReadonlyMap<TokenId, Uint8Array>): string {
  const entries = [...vocab.entries()]
    .sort(([a], [b]) => a - b)
    .map(([id, bytes]) => [id, Buffer.from(bytes).toString("base64")]);
  return JSON.stringify({ format: VOCAB_FORMAT, version: FORMAT_VERSION, entries });
}

function serializeMerges(vocabSize: number, merges: readonly Merge[]): string {
  return JSON.stringify({
    format: MERGES_FORMAT,
    version: FORMAT_VERSION,
    vocabSize,
    merges: merges.map(({ left, right, id }) => [left, right, id]),
  });
}

/**
 * Save tokenizer artifacts into `dir`, creating it if needed.
 *
 * @param dir - Destination directory; `vocab.json` and `merges.json` are
 *   written inside it.
 */
export function saveArtifacts(
  dir: string,
  artifacts: TokenizerArtifacts,
): Effect.Effect<void, TokenizerError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dir, { recursive: true });
      await writeAtomic(join(dir, VOCAB_FILE), serializeVocab(artifacts.vocab));
      await writeAtomic(join(dir, MERGES_FILE), serializeMerges(artifacts.vocabSize, artifacts.merges));
    },
    catch: (cause) =>
      new TokenizerError({
        message: `Failed to save tokenizer to "${dir}"`,
        cause,
      }),
  }).pipe(
    Effect.tap(() =>
      Effect.logDebug(`saved ${artifacts.merges.length} merges and ${artifacts.vocab.size} vocab entries to ${dir}`),
    ),
  );
}

export function saveTokenizer(dir: string, tokenizer: Tokenizer): Effect.Effect<void, TokenizerError> {
  return saveArtifacts(dir, tokenizer.artifacts());
}

// ── Load ───────────────────────────────────────────────────────────────────

/** Thrown inside the parsers; converted to `CorruptStateError` at the edge. */
class BlobError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value < PAIR_STRIDE;
}

/** The persisted training target: room for every id, and pair keys stay reversible. */
function isTargetSize(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= FIRST_MERGE_ID &&
    value <= PAIR_STRIDE
  );
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

function parseHeader(data: unknown, format: string): Record<string, unknown> {
  if (!isRecord(data)) throw new BlobError("expected a JSON object");
  if (data.format !== format) throw new BlobError(`expected format "${format}", got ${JSON.stringify(data.format)}`);
  if (data.version !== FORMAT_VERSION) {
    throw new BlobError(`unsupported version ${JSON.stringify(data.version)}`);
  }
  return data;
}

function parseVocab(data: unknown): Map<TokenId, Uint8Array> {
  const { entries } = parseHeader(data, VOCAB_FORMAT);
  if (!Array.isArray(entries)) throw new BlobError("missing or invalid 'entries' field");

  const vocab = new Map<TokenId, Uint8Array>();
  for (const entry of entries) {
    if (!Array.isArray(entry) || entry.length !== 2) throw new BlobError("vocab entries must be [id, base64] pairs");
    const [id, encoded] = entry;
    if (!isId(id)) throw new BlobError(`invalid vocab id ${JSON.stringify(id)}`);
    if (typeof encoded !== "string" || encoded.length === 0 || !BASE64.test(encoded)) {
      throw new BlobError(`invalid bytes for vocab id ${id}`);
    }
    if (vocab.has(id)) throw new BlobError(`duplicate vocab id ${id}`);
    vocab.set(id, new Uint8Array(Buffer.from(encoded, "base64")));
  }
  return vocab;
}

function parseMerges(data: unknown): { vocabSize: number; merges: Merge[] } {
  const { vocabSize, merges } = parseHeader(data, MERGES_FORMAT);
  if (!isTargetSize(vocabSize)) throw new BlobError("missing or invalid 'vocabSize' field");
  if (!Array.isArray(merges)) throw new BlobError("missing or invalid 'merges' field");

  const parsed = merges.map((entry): Merge => {
    if (!Array.isArray(entry) || entry.length !== 3) throw new BlobError("merges must be [left, right, id] triples");
    const [left, right, id] = entry;
    if (!isId(left) || !isId(right) || !isId(id)) {
      throw new BlobError(`invalid merge ${JSON.stringify(entry)}`);
    }
    return { left, right, id };
  });

  if (vocabSize < FIRST_MERGE_ID + parsed.length) {
    throw new BlobError(`vocabSize ${vocabSize} is smaller than the ${FIRST_MERGE_ID + parsed.length} ids in use`);
  }
  return { vocabSize, merges: parsed };
}

function readBlob<A>(path: string, parse: (data: unknown) => A): Effect.Effect<A, CorruptStateError> {
  return Effect.tryPromise({
    try: async () => parse(JSON.parse(await readFile(path, "utf-8"))),
    catch: (cause) =>
      new CorruptStateError({
        message:
          cause instanceof BlobError
            ? `Malformed tokenizer blob "${path}": ${cause.message}`
            : `Failed to read or parse tokenizer blob "${path}"`,
        path,
        cause,
      }),
  });
}

/**
 * Load and cross-check the artifacts stored in `dir`.
 *
 * Fails with `CorruptStateError` when either blob is missing or malformed,
 * or when the two do not describe the same tokenizer.
 */
export function loadArtifacts(dir: string): Effect.Effect<TokenizerArtifacts, CorruptStateError> {
  return Effect.all(
    [readBlob(join(dir, VOCAB_FILE), parseVocab), readBlob(join(dir, MERGES_FILE), parseMerges)],
    { concurrency: 2 },
  ).pipe(
    Effect.flatMap(([vocab, { vocabSize, merges }]) => {
      const problem = findInconsistency(vocab, merges);
      if (problem !== undefined) {
        return Effect.fail(
          new CorruptStateError({ message: `Inconsistent tokenizer in "${dir}": ${problem}`, path: dir }),
        );
      }
      const artifacts: TokenizerArtifacts = { type: "bpe", vocabSize, vocab, merges };
      return Effect.succeed(artifacts);
    }),
  );
}

/** Load a `BpeTokenizer` saved with `saveTokenizer`. */
export function loadTokenizer(dir: string): Effect.Effect<BpeTokenizer, CorruptStateError> {
  return loadArtifacts(dir).pipe(
    Effect.map((artifacts) => BpeTokenizer.fromArtifacts(artifacts)),
    Effect.tap((tok) => Effect.logDebug(`loaded tokenizer from ${dir} (vocab_size=${tok.vocabSize})`)),
  );
}
