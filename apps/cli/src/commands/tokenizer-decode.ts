/**
 * Command: bytepair tokenizer decode
 *
 * Usage:
 *   bytepair tokenizer decode --tokenizer=artifacts/tok --ids=2,260,97,98,3
 */
import { Effect } from "effect";
import { TokenizerService } from "@bytepair/core";
import { TokenizerFromDir, loggerLayer } from "@bytepair/effect-runtime";
import { idsArg, parseKV, requireArg } from "../parse.js";
import { resolveLogLevel } from "../resolve.js";

export async function tokenizerDecodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const dir = requireArg(kv, "tokenizer", "directory with vocab.json and merges.json");
  const ids = idsArg(kv, "ids");

  const program = Effect.map(TokenizerService, (tok) => tok.decode(ids)).pipe(
    Effect.provide(TokenizerFromDir(dir)),
    Effect.provide(loggerLayer(resolveLogLevel(kv))),
  );

  console.log(await Effect.runPromise(program));
}
