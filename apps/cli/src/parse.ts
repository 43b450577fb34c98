/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { ConfigError } from "@bytepair/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({
      message: `Missing required argument: --${key}${label ? ` (${label})` : ""}`,
    });
  }
  return val;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n)) {
    throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return n;
}

/** Like `intArg`, for counts: negative values are rejected. */
export function countArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const n = intArg(kv, key, defaultVal);
  if (n < 0) {
    throw new ConfigError({ message: `--${key} must be a non-negative integer, got "${kv[key]}"` });
  }
  return n;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Parse `1,2,3` or `[1, 2, 3]` into token ids. */
export function idsArg(kv: Record<string, string>, key: string): number[] {
  const raw = requireArg(kv, key, "comma-separated token ids").trim().replace(/^\[|\]$/g, "");
  if (raw.trim() === "") return [];
  return raw.split(",").map((part) => {
    const n = Number(part.trim());
    if (!Number.isInteger(n) || n < 0) {
      throw new ConfigError({ message: `--${key} must list non-negative integers, got "${part.trim()}"` });
    }
    return n;
  });
}
