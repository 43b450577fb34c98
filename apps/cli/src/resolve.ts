/**
 * Resolve tokenizers, config and logging from CLI args.
 */
import { Effect, type LogLevel } from "effect";
import type { Tokenizer } from "@bytepair/core";
import {
  readTokenizerConfigFile,
  tokenizerRegistry,
  type TokenizerConfig,
} from "@bytepair/tokenizers";
import { parseLogLevel } from "@bytepair/effect-runtime";
import { boolArg, intArg } from "./parse.js";

/**
 * Settings from `--config=file.json`, overridden by `--vocabSize`,
 * `--respectChunkBoundaries` and `--logEvery`. Only what is actually given
 * is returned, so the registry preset supplies the rest.
 */
export async function resolveConfigOverrides(
  kv: Record<string, string>,
): Promise<Partial<TokenizerConfig>> {
  const fromFile = kv["config"]
    ? await Effect.runPromise(readTokenizerConfigFile(kv["config"]))
    : {};
  return {
    ...fromFile,
    ...(kv["vocabSize"] ? { vocabSize: intArg(kv, "vocabSize", 0) } : {}),
    ...(kv["logEvery"] ? { logEvery: intArg(kv, "logEvery", 0) } : {}),
    ...(kv["respectChunkBoundaries"]
      ? { respectChunkBoundaries: boolArg(kv, "respectChunkBoundaries", false) }
      : {}),
  };
}

export function resolveTokenizer(name: string, overrides: Partial<TokenizerConfig>): Tokenizer {
  return tokenizerRegistry.get(name, overrides);
}

/** `--logLevel` flag, then `BYTEPAIR_LOG_LEVEL`, then info. */
export function resolveLogLevel(kv: Record<string, string>): LogLevel.LogLevel {
  return parseLogLevel(kv["logLevel"] ?? process.env["BYTEPAIR_LOG_LEVEL"] ?? "info");
}

export function listImplementations(): string {
  return `Tokenizers: ${tokenizerRegistry.list().join(", ")}`;
}
