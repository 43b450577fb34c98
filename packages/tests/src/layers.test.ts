import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { TokenizerService } from "@bytepair/core";
import { BpeTokenizer, saveTokenizer } from "@bytepair/tokenizers";
import { TokenizerFrom, TokenizerFromDir } from "@bytepair/effect-runtime";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "bytepair-layers-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const encodeAab = Effect.map(TokenizerService, (tok) => Array.from(tok.encode("aab")));

describe("tokenizer layers", () => {
  it("provides an in-memory tokenizer", async () => {
    const tok = new BpeTokenizer(261);
    await Effect.runPromise(tok.train("aaabaaab"));
    const ids = await Effect.runPromise(encodeAab.pipe(Effect.provide(TokenizerFrom(tok))));
    expect(ids).toEqual([260, 98]);
  });

  it("loads the tokenizer saved in a directory", async () => {
    const tok = new BpeTokenizer(261);
    await Effect.runPromise(tok.train("aaabaaab"));
    await Effect.runPromise(saveTokenizer(dir, tok));

    const ids = await Effect.runPromise(encodeAab.pipe(Effect.provide(TokenizerFromDir(dir))));
    expect(ids).toEqual([260, 98]);
  });

  it("fails with CorruptStateError for an empty directory", async () => {
    const err = await Effect.runPromise(Effect.flip(encodeAab.pipe(Effect.provide(TokenizerFromDir(dir)))));
    expect(err._tag).toBe("CorruptStateError");
  });
});
