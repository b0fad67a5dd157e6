/**
 * Whitespace tokenizer.
 *
 * Designed for languages the segmenter handles poorly, or for corpora that
 * are already space-separated. Splits on runs of whitespace, then peels
 * leading and trailing punctuation off each chunk into one-character tokens,
 * so "world." becomes "world" and ".". Inner punctuation ("don't", "a-b")
 * stays inside the token.
 */
import type { Tokenizer } from "@lexicon/core";

const SPLIT_RE = /(\s+)/u;
const SPACE_RE = /^\s+$/u;
const PUNCT_RE = /^[\p{P}\p{S}]$/u;

export class WhitespaceTokenizer implements Tokenizer {
  readonly name = "whitespace";
  readonly locale: string;

  constructor(locale: string) {
    this.locale = locale;
  }

  tokenize(sentence: string): string[] {
    const pieces: string[] = [];
    for (const chunk of sentence.split(SPLIT_RE)) {
      if (chunk.length === 0) continue;
      if (SPACE_RE.test(chunk)) {
        pieces.push(chunk);
      } else {
        pieces.push(...this._splitChunk(chunk));
      }
    }
    return pieces;
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  /** Separate prefix and suffix punctuation from a non-space chunk. */
  private _splitChunk(chunk: string): string[] {
    const chars = [...chunk];
    let start = 0;
    let end = chars.length;

    const prefix: string[] = [];
    while (start < end && PUNCT_RE.test(chars[start])) {
      prefix.push(chars[start]);
      start++;
    }

    const suffix: string[] = [];
    while (end > start && PUNCT_RE.test(chars[end - 1])) {
      end--;
      suffix.unshift(chars[end]);
    }

    const core = chars.slice(start, end).join("");
    return core.length > 0 ? [...prefix, core, ...suffix] : [...prefix, ...suffix];
  }
}
