/**
 * Regex pre-tokenizer.
 *
 * Splits text into contractions, letter runs, short digit runs, punctuation
 * runs and whitespace runs. The pattern matches every code point, so joining
 * the chunks gives back the input.
 */

// Contractions are spelled out case by case: inline `(?i:...)` groups are
// not available in the regex engine of Node 20.
export const SPLIT_PATTERN =
  /'(?:[sSdDmMtT]|ll|LL|lL|Ll|ve|VE|vE|Ve|re|RE|rE|Re)|[^\r\n\p{L}\p{N}]?\p{L}+|\p{N}{1,3}| ?[^\s\p{L}\p{N}]+[\r\n]*|\s*[\r\n]|\s+(?!\S)|\s+/gu;

const encoder = new TextEncoder();

/** Split `text` into pre-tokenizer chunks, in order. */
export function pretokenize(text: string): string[] {
  return text.match(SPLIT_PATTERN) ?? [];
}

/**
 * Turn text into the byte sequences the merge learner counts over.
 *
 * With `respectChunkBoundaries` every chunk is its own sequence; otherwise
 * the chunks are rejoined into one stream and pairs may straddle them.
 */
export function chunkBytes(text: string, respectChunkBoundaries: boolean): number[][] {
  const chunks = pretokenize(text);
  if (respectChunkBoundaries) {
    return chunks.map((chunk) => Array.from(encoder.encode(chunk)));
  }
  return [Array.from(encoder.encode(chunks.join("")))];
}
