/**
 * Deterministic training text for tests: words picked by a small LCG so the
 * corpus has no short period and supports a few hundred merges.
 */
const WORDS = [
  "the", "quick", "brown", "fox", "jumps", "over", "lazy", "dog",
  "and", "then", "runs", "away", "from", "a", "big", "cat",
];

export function sampleCorpus(wordCount: number, seed = 1): string {
  let x = seed;
  const out: string[] = [];
  for (let i = 0; i < wordCount; i++) {
    x = (x * 75 + 74) % 65537;
    out.push(WORDS[x % WORDS.length]);
    if (x % 11 === 0) out.push(".\n");
  }
  return out.join(" ");
}
