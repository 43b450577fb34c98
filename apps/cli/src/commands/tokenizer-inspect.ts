/**
 * Command: bytepair tokenizer inspect
 *
 * Prints the size of a saved tokenizer and its earliest merges.
 */
import { Effect } from "effect";
import { loadTokenizer } from "@bytepair/tokenizers";
import { loggerLayer } from "@bytepair/effect-runtime";
import { countArg, parseKV, requireArg } from "../parse.js";
import { resolveLogLevel } from "../resolve.js";

const decoder = new TextDecoder("utf-8", { fatal: false });

export async function tokenizerInspectCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const dir = requireArg(kv, "tokenizer", "directory with vocab.json and merges.json");
  const top = countArg(kv, "top", 20);

  const tok = await Effect.runPromise(
    loadTokenizer(dir).pipe(Effect.provide(loggerLayer(resolveLogLevel(kv)))),
  );

  console.log(`Tokenizer:   ${dir}`);
  console.log(`vocab_size:  ${tok.vocabSize} (target ${tok.targetVocabSize})`);
  console.log(`merges:      ${tok.mergeCount}`);
  console.log();

  for (const { left, right, id } of tok.merges.slice(0, top)) {
    const bytes = tok.tokenBytes(id) ?? new Uint8Array();
    console.log(`${String(id).padStart(6)}  ${JSON.stringify(decoder.decode(bytes)).padEnd(20)} <- (${left}, ${right})`);
  }
}
