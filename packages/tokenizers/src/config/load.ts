/**
 * Load and validate TokenizerConfig from file, merge with defaults.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "@bytepair/core";
import { PAIR_STRIDE } from "../pairs.js";
import { FIRST_MERGE_ID } from "../vocab.js";
import { defaultTokenizerConfig, type TokenizerConfig } from "./schema.js";

/** Validate a TokenizerConfig, throwing a `ConfigError` on invalid values. */
export function validateTokenizerConfig(config: TokenizerConfig): void {
  if (!Number.isInteger(config.vocabSize) || config.vocabSize < FIRST_MERGE_ID) {
    throw new ConfigError({
      message: `vocabSize must be an integer >= ${FIRST_MERGE_ID}, got ${config.vocabSize}`,
    });
  }
  if (config.vocabSize > PAIR_STRIDE) {
    throw new ConfigError({
      message: `vocabSize must be <= ${PAIR_STRIDE}, got ${config.vocabSize}`,
    });
  }
  if (!Number.isInteger(config.logEvery) || config.logEvery < 1) {
    throw new ConfigError({
      message: `logEvery must be an integer >= 1, got ${config.logEvery}`,
    });
  }
}

/** Overlay `overrides` on the defaults (or on `base`) and validate. */
export function resolveTokenizerConfig(
  overrides: Partial<TokenizerConfig>,
  base: TokenizerConfig = defaultTokenizerConfig,
): TokenizerConfig {
  const config: TokenizerConfig = {
    vocabSize: overrides.vocabSize ?? base.vocabSize,
    respectChunkBoundaries: overrides.respectChunkBoundaries ?? base.respectChunkBoundaries,
    logEvery: overrides.logEvery ?? base.logEvery,
  };
  validateTokenizerConfig(config);
  return config;
}

/**
 * Pick the known keys out of untyped input (parsed JSON), rejecting values
 * of the wrong type. Unknown keys are ignored; absent keys stay absent.
 */
export function parseTokenizerOverrides(raw: Readonly<Record<string, unknown>>): Partial<TokenizerConfig> {
  const { vocabSize, respectChunkBoundaries, logEvery } = raw;
  if (vocabSize !== undefined && typeof vocabSize !== "number") {
    throw new ConfigError({ message: `vocabSize must be a number, got ${typeof vocabSize}` });
  }
  if (respectChunkBoundaries !== undefined && typeof respectChunkBoundaries !== "boolean") {
    throw new ConfigError({
      message: `respectChunkBoundaries must be a boolean, got ${typeof respectChunkBoundaries}`,
    });
  }
  if (logEvery !== undefined && typeof logEvery !== "number") {
    throw new ConfigError({ message: `logEvery must be a number, got ${typeof logEvery}` });
  }
  return {
    ...(vocabSize !== undefined ? { vocabSize } : {}),
    ...(respectChunkBoundaries !== undefined ? { respectChunkBoundaries } : {}),
    ...(logEvery !== undefined ? { logEvery } : {}),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The settings a JSON config file actually sets, without defaults. */
export function readTokenizerConfigFile(path: string): Effect.Effect<Partial<TokenizerConfig>, ConfigError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      new ConfigError({ message: `Failed to read tokenizer config at ${path}`, cause }),
  }).pipe(
    Effect.flatMap((raw) =>
      Effect.try({
        try: (): unknown => JSON.parse(raw),
        catch: (cause) =>
          new ConfigError({ message: `Failed to parse tokenizer config at ${path}: invalid JSON`, cause }),
      }),
    ),
    Effect.flatMap((parsed) => {
      if (!isRecord(parsed)) {
        return Effect.fail(
          new ConfigError({ message: `Tokenizer config at ${path} must be a JSON object` }),
        );
      }
      return Effect.try({
        try: () => parseTokenizerOverrides(parsed),
        catch: (cause) => asConfigError(cause, path),
      });
    }),
  );
}

/** Load a TokenizerConfig from a JSON file path, merging with defaults. */
export function loadTokenizerConfig(path?: string): Effect.Effect<TokenizerConfig, ConfigError> {
  if (!path) return Effect.succeed({ ...defaultTokenizerConfig });

  return readTokenizerConfigFile(path).pipe(
    Effect.flatMap((overrides) =>
      Effect.try({
        try: () => resolveTokenizerConfig(overrides),
        catch: (cause) => asConfigError(cause, path),
      }),
    ),
  );
}

function asConfigError(cause: unknown, path: string): ConfigError {
  return cause instanceof ConfigError
    ? cause
    : new ConfigError({ message: `Invalid tokenizer config at ${path}`, cause });
}
