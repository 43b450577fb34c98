/**
 * Command: bytepair tokenizer build
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { saveTokenizer } from "@bytepair/tokenizers";
import { loggerLayer, withSpan } from "@bytepair/effect-runtime";
import { parseKV, requireArg, strArg } from "../parse.js";
import { resolveConfigOverrides, resolveLogLevel, resolveTokenizer } from "../resolve.js";

export async function tokenizerBuildCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const type = strArg(kv, "type", "bpe");
  const inputPath = requireArg(kv, "input", "path to training text");
  const outDir = requireArg(kv, "out", "output directory for vocab.json and merges.json");

  const tokenizer = resolveTokenizer(type, await resolveConfigOverrides(kv));
  console.log(`Building ${type} tokenizer from ${inputPath} (vocabSize=${tokenizer.targetVocabSize})`);

  const text = await readFile(inputPath, "utf-8");

  // A short corpus still yields a usable tokenizer: warn and save what was learned.
  const build = tokenizer.train(text).pipe(
    Effect.asVoid,
    Effect.catchTag("InsufficientDataError", (err) =>
      Effect.logWarning(`${err.message}; saving the ${err.learnedMerges} merges learned`),
    ),
    Effect.zipRight(saveTokenizer(outDir, tokenizer)),
  );
  const program = withSpan("cli.tokenizer.build", build).pipe(
    Effect.provide(loggerLayer(resolveLogLevel(kv))),
  );
  await Effect.runPromise(program);

  console.log(`Tokenizer built: vocab_size=${tokenizer.vocabSize}`);
  console.log(`Artifacts saved to ${outDir}`);
}
