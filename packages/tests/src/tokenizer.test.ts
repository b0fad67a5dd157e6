import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import type { Tokenizer } from "@lexicon/core";
import {
  SegmenterTokenizer,
  WhitespaceTokenizer,
  checkedTokenize,
  reconstructs,
  tokenizerFor,
  tokenizerRegistry,
} from "@lexicon/tokenizers";

describe("WhitespaceTokenizer", () => {
  const tok = new WhitespaceTokenizer("en");

  it("splits off trailing punctuation", () => {
    expect(tok.tokenize("Hello world.")).toEqual(["Hello", " ", "world", "."]);
  });

  it("keeps whitespace runs and inner punctuation", () => {
    expect(tok.tokenize("  don't  stop!! ")).toEqual(["  ", "don't", "  ", "stop", "!", "!", " "]);
  });

  it("peels both ends of a chunk", () => {
    expect(tok.tokenize("(a-b)")).toEqual(["(", "a-b", ")"]);
  });

  it("handles a chunk made only of punctuation", () => {
    expect(tok.tokenize("a ...")).toEqual(["a", " ", ".", ".", "."]);
  });

  it("returns nothing for the empty sentence", () => {
    expect(tok.tokenize("")).toEqual([]);
  });
});

describe("SegmenterTokenizer", () => {
  const tok = new SegmenterTokenizer("en");

  it("separates words, spaces and punctuation", () => {
    expect(tok.tokenize("Hello world.")).toEqual(["Hello", " ", "world", "."]);
  });

  it("keeps a whitespace run as one piece", () => {
    expect(tok.tokenize("a  b")).toEqual(["a", "  ", "b"]);
  });

  it("reconstructs the sentence", () => {
    for (const sentence of ["¿Dónde está la biblioteca?", "Ich bin müde.", "  leading and trailing  "]) {
      expect(reconstructs(tok.tokenize(sentence), sentence)).toBe(true);
    }
  });
});

describe("tokenizer registry", () => {
  it("lists both implementations", () => {
    expect(tokenizerRegistry.list()).toEqual(["segmenter", "whitespace"]);
  });

  it("builds the tokenizer a profile names", async () => {
    const tok = await Effect.runPromise(tokenizerFor({ tokenizer: "whitespace", bcp47: "fr" }));
    expect(tok.name).toBe("whitespace");
    expect(tok.locale).toBe("fr");
  });

  it("fails with TokenizerError for an unknown name", async () => {
    const err = await Effect.runPromise(Effect.flip(tokenizerFor({ tokenizer: "stemmer", bcp47: "en" })));
    expect(err._tag).toBe("TokenizerError");
  });
});

describe("checkedTokenize", () => {
  it("passes pieces through when they reconstruct", async () => {
    const pieces = await Effect.runPromise(checkedTokenize(new WhitespaceTokenizer("en"), "a b"));
    expect(pieces).toEqual(["a", " ", "b"]);
  });

  it("fails when the tokenizer drops text", async () => {
    const lossy: Tokenizer = {
      name: "lossy",
      locale: "en",
      tokenize: (s) => s.split(" "),
    };
    const err = await Effect.runPromise(Effect.flip(checkedTokenize(lossy, "a b")));
    expect(err._tag).toBe("TokenizerError");
    expect(err.message).toBe('lossy tokenizer lost text: "a b" -> ["a","b"]');
  });

  it("fails when the tokenizer throws", async () => {
    const broken: Tokenizer = {
      name: "broken",
      locale: "en",
      tokenize: () => {
        throw new Error("boom");
      },
    };
    const err = await Effect.runPromise(Effect.flip(checkedTokenize(broken, "x")));
    expect(err.message).toBe('broken tokenizer failed on: "x"');
  });
});
