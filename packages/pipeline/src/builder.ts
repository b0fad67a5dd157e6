/**
 * Lexicon pass: drop non-words from the counter, then rank what is left.
 *
 * frequency_class = floor(0.5 - log2(count / maxCount))
 *
 * so the most frequent word(s) get class 0 and every halving of the count
 * adds roughly one class. maxCount is taken after filtering.
 */
import { Effect } from "effect";
import {
  EmptyLexiconError,
  type CorpusIOError,
  type LexiconEntry,
  type LexiconStats,
  type LineSink,
  type RowSink,
} from "@lexicon/core";
import { withSpan } from "@lexicon/effect-runtime";
import type { FrequencyCounter } from "./counter.js";
import { writeLine, writeRow } from "./sinks.js";

/** Anything that can tell words from other tokens. */
export interface WordClassifier {
  readonly code: string;
  isWord(token: string): boolean;
}

export interface LexiconSinks {
  readonly words: RowSink;
  /** Rejected tokens, one per line, no counts. */
  readonly nonwords: LineSink;
}

export const WORDS_HEADER: readonly string[] = ["word", "frequency", "frequency_class"];

export function frequencyClass(count: number, maxCount: number): number {
  return Math.floor(0.5 - Math.log2(count / maxCount));
}

/** Lexicon entries of an already-filtered counter, by descending count. */
export function* lexiconEntries(counter: FrequencyCounter, maxCount: number): Generator<LexiconEntry> {
  for (const [word, frequency] of counter.mostCommon()) {
    yield { word, frequency, frequencyClass: frequencyClass(frequency, maxCount) };
  }
}

/**
 * Delete every token the classifier rejects and log it, in descending-count
 * order. Returns how many were removed.
 */
export function removeNonWords(
  counter: FrequencyCounter,
  language: WordClassifier,
  nonwords: LineSink,
): Effect.Effect<number, CorpusIOError> {
  return Effect.gen(function* () {
    let removed = 0;
    for (const [token] of counter.mostCommon()) {
      if (language.isWord(token)) continue;
      counter.delete(token);
      yield* writeLine(nonwords, token, "non-word log");
      removed++;
    }
    return removed;
  });
}

/**
 * Filter the counter and write the ranked lexicon.
 *
 * Must only run after ingestion has finished: maxCount depends on the whole
 * corpus. Mutates `counter`.
 */
export function buildLexicon(
  counter: FrequencyCounter,
  language: WordClassifier,
  sinks: LexiconSinks,
): Effect.Effect<LexiconStats, EmptyLexiconError | CorpusIOError> {
  return withSpan("buildLexicon", Effect.gen(function* () {
    const nonwords = yield* removeNonWords(counter, language, sinks.nonwords);
    yield* Effect.logDebug(`removed ${nonwords} non-words, ${counter.size} words left`);

    const top = counter.mostCommon(1)[0];
    if (top === undefined) {
      return yield* Effect.fail(
        new EmptyLexiconError({
          language: language.code,
          message: `no words left for ${language.code} after removing ${nonwords} non-words`,
        }),
      );
    }
    const maxCount = top[1];

    let words = 0;
    for (const entry of lexiconEntries(counter, maxCount)) {
      yield* writeRow(sinks.words, [entry.word, entry.frequency, entry.frequencyClass], "lexicon");
      words++;
    }

    yield* Effect.logInfo(`lexicon for ${language.code}: ${words} words, ${nonwords} non-words, max count ${maxCount}`);
    return { words, nonwords, maxCount };
  }));
}
