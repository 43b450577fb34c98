import { describe, it, expect } from "vitest";
import { chunkBytes, pretokenize } from "@bytepair/tokenizers";

describe("pretokenize", () => {
  it("attaches a leading space to words", () => {
    expect(pretokenize("Hello world")).toEqual(["Hello", " world"]);
  });

  it("splits contractions, digit runs and punctuation", () => {
    expect(pretokenize("I'm 12345 ok!!\n")).toEqual(["I", "'m", " ", "123", "45", " ok", "!!\n"]);
  });

  it("matches contractions in any case", () => {
    expect(pretokenize("WE'LL")).toEqual(["WE", "'LL"]);
  });

  it("leaves the last space of a run for the next word", () => {
    expect(pretokenize("a  b")).toEqual(["a", " ", " b"]);
  });

  it("reassembles to the input", () => {
    const text = "Déjà vu, 2024-01-02!\r\n\tthey've   gone…";
    expect(pretokenize(text).join("")).toBe(text);
  });

  it("returns no chunks for empty text", () => {
    expect(pretokenize("")).toEqual([]);
  });
});

describe("chunkBytes", () => {
  it("joins chunks into one sequence by default", () => {
    expect(chunkBytes("ab cd", false)).toEqual([[97, 98, 32, 99, 100]]);
  });

  it("keeps one sequence per chunk when asked", () => {
    expect(chunkBytes("ab cd", true)).toEqual([[97, 98], [32, 99, 100]]);
  });

  it("encodes multi-byte characters as UTF-8", () => {
    expect(chunkBytes("é", false)).toEqual([[0xc3, 0xa9]]);
  });
});
