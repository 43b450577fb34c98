/**
 * Command: bytepair tokenizer encode
 *
 * Usage:
 *   bytepair tokenizer encode --tokenizer=artifacts/tok --text="hello world" [--specials]
 *   bytepair tokenizer encode --tokenizer=artifacts/tok --input=notes.txt
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { TokenizerService } from "@bytepair/core";
import { TokenizerFromDir, loggerLayer } from "@bytepair/effect-runtime";
import { boolArg, parseKV, requireArg } from "../parse.js";
import { resolveLogLevel } from "../resolve.js";

export async function tokenizerEncodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const dir = requireArg(kv, "tokenizer", "directory with vocab.json and merges.json");
  const specials = boolArg(kv, "specials", false);
  const text =
    kv["text"] !== undefined
      ? kv["text"]
      : await readFile(requireArg(kv, "input", "text file to encode (or pass --text)"), "utf-8");

  const program = Effect.flatMap(TokenizerService, (tok) =>
    Effect.sync(() => {
      const ids = tok.encode(text);
      return specials ? tok.addSpecialTokens(ids) : ids;
    }),
  ).pipe(
    Effect.tap((ids) => Effect.logDebug(`encoded ${text.length} chars into ${ids.length} tokens`)),
    Effect.provide(TokenizerFromDir(dir)),
    Effect.provide(loggerLayer(resolveLogLevel(kv))),
  );

  const ids = await Effect.runPromise(program);
  console.log(JSON.stringify(Array.from(ids)));
}
