import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import {
  BpeTokenizer,
  MERGES_FILE,
  PAIR_STRIDE,
  VOCAB_FILE,
  loadTokenizer,
  saveTokenizer,
} from "@bytepair/tokenizers";
import { sampleCorpus } from "./fixtures.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "bytepair-persist-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function trainedSample(): Promise<BpeTokenizer> {
  const tok = new BpeTokenizer(261);
  await Effect.runPromise(tok.train("aaabaaab"));
  return tok;
}

describe("saveTokenizer / loadTokenizer", () => {
  it("round-trips merges, vocab and encodings", async () => {
    const tok = new BpeTokenizer(320);
    await Effect.runPromise(tok.train(sampleCorpus(400)));
    await Effect.runPromise(saveTokenizer(dir, tok));

    const loaded = await Effect.runPromise(loadTokenizer(dir));
    expect(loaded.merges).toEqual(tok.merges);
    expect(loaded.vocabSize).toBe(320);
    expect(loaded.targetVocabSize).toBe(320);
    expect([...loaded.vocab.keys()]).toEqual([...tok.vocab.keys()]);

    for (const text of ["the lazy dog", sampleCorpus(60, 5), "ünïcödé"]) {
      expect(Array.from(loaded.encode(text))).toEqual(Array.from(tok.encode(text)));
      expect(loaded.decode(tok.encode(text))).toBe(text);
    }
  });

  it("writes both blobs and no temporary files", async () => {
    await Effect.runPromise(saveTokenizer(dir, await trainedSample()));
    expect((await readdir(dir)).sort()).toEqual([MERGES_FILE, VOCAB_FILE]);
  });

  it("stores merges as [left, right, id] with the target size", async () => {
    await Effect.runPromise(saveTokenizer(dir, await trainedSample()));
    const merges: unknown = JSON.parse(await readFile(join(dir, MERGES_FILE), "utf-8"));
    expect(merges).toEqual({
      format: "bytepair-merges",
      version: 1,
      vocabSize: 261,
      merges: [[97, 97, 260]],
    });
  });

  it("keeps the target size of a partially trained tokenizer", async () => {
    const tok = new BpeTokenizer(270);
    await Effect.runPromise(Effect.either(tok.train("abc")));
    await Effect.runPromise(saveTokenizer(dir, tok));

    const loaded = await Effect.runPromise(loadTokenizer(dir));
    expect(loaded.targetVocabSize).toBe(270);
    expect(loaded.vocabSize).toBe(262);
    expect(Array.from(loaded.encode("abc"))).toEqual([261]);
  });

  it("reloads the largest accepted target size", async () => {
    await Effect.runPromise(saveTokenizer(dir, new BpeTokenizer(PAIR_STRIDE)));
    const loaded = await Effect.runPromise(loadTokenizer(dir));
    expect(loaded.targetVocabSize).toBe(PAIR_STRIDE);
    expect(loaded.vocabSize).toBe(260);
  });

  it("rejects a stored target beyond the pair key range", async () => {
    await Effect.runPromise(saveTokenizer(dir, new BpeTokenizer(PAIR_STRIDE)));
    const path = join(dir, MERGES_FILE);
    await writeFile(
      path,
      JSON.stringify({ format: "bytepair-merges", version: 1, vocabSize: PAIR_STRIDE + 1, merges: [] }),
    );

    const err = await Effect.runPromise(Effect.flip(loadTokenizer(dir)));
    expect(err.message).toBe(`Malformed tokenizer blob "${path}": missing or invalid 'vocabSize' field`);
  });

  it("creates missing directories", async () => {
    const nested = join(dir, "a", "b");
    await Effect.runPromise(saveTokenizer(nested, await trainedSample()));
    const loaded = await Effect.runPromise(loadTokenizer(nested));
    expect(loaded.mergeCount).toBe(1);
  });

  it("fails with TokenizerError when the directory cannot be created", async () => {
    const file = join(dir, "occupied");
    await writeFile(file, "x");
    const err = await Effect.runPromise(
      Effect.flip(saveTokenizer(join(file, "tok"), await trainedSample())),
    );
    expect(err._tag).toBe("TokenizerError");
    expect(err.message).toBe(`Failed to save tokenizer to "${join(file, "tok")}"`);
  });
});

describe("loadTokenizer failures", () => {
  it("reports a missing directory as CorruptStateError", async () => {
    const err = await Effect.runPromise(Effect.flip(loadTokenizer(join(dir, "missing"))));
    expect(err._tag).toBe("CorruptStateError");
  });

  it("reports unparseable JSON", async () => {
    await Effect.runPromise(saveTokenizer(dir, await trainedSample()));
    const path = join(dir, MERGES_FILE);
    await writeFile(path, "{not json");

    const err = await Effect.runPromise(Effect.flip(loadTokenizer(dir)));
    expect(err._tag).toBe("CorruptStateError");
    expect(err.path).toBe(path);
    expect(err.message).toBe(`Failed to read or parse tokenizer blob "${path}"`);
  });

  it("rejects a blob of the wrong format", async () => {
    await Effect.runPromise(saveTokenizer(dir, await trainedSample()));
    const path = join(dir, MERGES_FILE);
    await writeFile(path, JSON.stringify({ format: "other", version: 1, vocabSize: 261, merges: [] }));

    const err = await Effect.runPromise(Effect.flip(loadTokenizer(dir)));
    expect(err.message).toBe(
      `Malformed tokenizer blob "${path}": expected format "bytepair-merges", got "other"`,
    );
  });

  it("rejects a vocab entry that is not the concatenation of its merge", async () => {
    await Effect.runPromise(saveTokenizer(dir, await trainedSample()));
    const path = join(dir, VOCAB_FILE);
    const text = await readFile(path, "utf-8");
    // "YWE=" is "aa", "eno=" is "zz"
    await writeFile(path, text.replace('[260,"YWE="]', '[260,"eno="]'));

    const err = await Effect.runPromise(Effect.flip(loadTokenizer(dir)));
    expect(err._tag).toBe("CorruptStateError");
    expect(err.message).toBe(
      `Inconsistent tokenizer in "${dir}": vocab entry 260 is not the concatenation of 97 and 97`,
    );
  });

  it("rejects a merge that refers to a later id", async () => {
    await Effect.runPromise(saveTokenizer(dir, await trainedSample()));
    await writeFile(
      join(dir, MERGES_FILE),
      JSON.stringify({ format: "bytepair-merges", version: 1, vocabSize: 261, merges: [[261, 97, 260]] }),
    );

    const err = await Effect.runPromise(Effect.flip(loadTokenizer(dir)));
    expect(err.message).toBe(
      `Inconsistent tokenizer in "${dir}": merge 260 references a later id (261, 97)`,
    );
  });

  it("rejects a vocabSize smaller than the ids in use", async () => {
    await Effect.runPromise(saveTokenizer(dir, await trainedSample()));
    const path = join(dir, MERGES_FILE);
    await writeFile(
      path,
      JSON.stringify({ format: "bytepair-merges", version: 1, vocabSize: 260, merges: [[97, 97, 260]] }),
    );

    const err = await Effect.runPromise(Effect.flip(loadTokenizer(dir)));
    expect(err.message).toBe(
      `Malformed tokenizer blob "${path}": vocabSize 260 is smaller than the 261 ids in use`,
    );
  });
});
