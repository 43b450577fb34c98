#!/usr/bin/env -S npx tsx
/**
 * bytepair CLI, the main entry point.
 *
 * Commands: tokenizer build, tokenizer encode, tokenizer decode, tokenizer inspect, list
 */
import { existsSync, readFileSync } from "node:fs";
import { tokenizerBuildCmd } from "./commands/tokenizer-build.js";
import { tokenizerEncodeCmd } from "./commands/tokenizer-encode.js";
import { tokenizerDecodeCmd } from "./commands/tokenizer-decode.js";
import { tokenizerInspectCmd } from "./commands/tokenizer-inspect.js";
import { listImplementations } from "./resolve.js";

// Load .env.local (no dotenv dependency). Existing env vars win.
if (existsSync(".env.local")) {
  const envContent = readFileSync(".env.local", "utf8");
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}

const USAGE = `
bytepair: byte-level BPE tokenizer

Commands:
  tokenizer build    Learn merges from a text file and save them
  tokenizer encode   Encode text with a saved tokenizer (prints ids as JSON)
  tokenizer decode   Decode comma-separated ids with a saved tokenizer
  tokenizer inspect  Show the size and earliest merges of a saved tokenizer
  list               List registered tokenizers

Options:
  --logLevel=LEVEL   debug | info | warn | error | none (default: $BYTEPAIR_LOG_LEVEL or info)
  --config=FILE      JSON tokenizer config; flags override it
  --help, -h         Show this help

Examples:
  bytepair tokenizer build --type=bpe --input=data/train.txt --vocabSize=2000 --out=artifacts/tok
  bytepair tokenizer build --input=data/train.txt --out=artifacts/tok --respectChunkBoundaries
  bytepair tokenizer encode --tokenizer=artifacts/tok --text="hello world" --specials
  bytepair tokenizer decode --tokenizer=artifacts/tok --ids=2,104,101,108,108,111,3
  bytepair tokenizer inspect --tokenizer=artifacts/tok --top=30
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const [command, sub] = args;

  if (command === "tokenizer" && sub === "build") {
    await tokenizerBuildCmd(args.slice(2));
  } else if (command === "tokenizer" && sub === "encode") {
    await tokenizerEncodeCmd(args.slice(2));
  } else if (command === "tokenizer" && sub === "decode") {
    await tokenizerDecodeCmd(args.slice(2));
  } else if (command === "tokenizer" && sub === "inspect") {
    await tokenizerInspectCmd(args.slice(2));
  } else if (command === "list") {
    console.log(listImplementations());
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : err);
  process.exit(1);
});
