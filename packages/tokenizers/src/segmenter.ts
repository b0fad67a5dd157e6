/**
 * Locale-aware tokenizer built on `Intl.Segmenter` word segmentation.
 *
 * Every segment the segmenter yields becomes one piece, so joining the
 * pieces gives back the sentence. Whitespace segments are the separators;
 * punctuation and words are tokens. Adjacent whitespace segments are merged
 * into a single separator.
 */
import type { Tokenizer } from "@lexicon/core";

const WHITESPACE_RE = /^\s+$/u;

export class SegmenterTokenizer implements Tokenizer {
  readonly name = "segmenter";
  readonly locale: string;

  private readonly _segmenter: Intl.Segmenter;

  constructor(locale: string) {
    this.locale = locale;
    this._segmenter = new Intl.Segmenter(locale, { granularity: "word" });
  }

  tokenize(sentence: string): string[] {
    const pieces: string[] = [];
    let lastWasSpace = false;

    for (const { segment } of this._segmenter.segment(sentence)) {
      const isSpace = WHITESPACE_RE.test(segment);
      if (isSpace && lastWasSpace) {
        pieces[pieces.length - 1] += segment;
      } else {
        pieces.push(segment);
      }
      lastWasSpace = isSpace;
    }

    return pieces;
  }
}
