/**
 * Ingestion pass: corpus lines -> sentence records -> counter + outputs.
 *
 * Every sentence is tokenized and counted. Sentences longer than the length
 * limit are still counted but go to the skip log instead of the sentence
 * table. Lines are handled strictly in order; the first malformed line ends
 * the run.
 */
import { Effect, Stream } from "effect";
import {
  CorpusIOError,
  TokenizerService,
  type IngestStats,
  type MalformedLineError,
  type RowSink,
  type TokenizerError,
} from "@lexicon/core";
import { withSpan } from "@lexicon/effect-runtime";
import { checkedTokenize } from "@lexicon/tokenizers";
import type { FrequencyCounter } from "./counter.js";
import { makeSentence, parseCorpusLine, sentenceLength, sentenceRow } from "./sentence.js";
import { writeRow } from "./sinks.js";

export const SKIP_REASON_TOO_LONG = "too long";

/** Sentence table header; the id column is left out when ids are not kept. */
export function sentenceHeader(idColumn: string, includeIds: boolean): string[] {
  return includeIds ? [idColumn, "text", "tokens"] : ["text", "tokens"];
}

export function skippedHeader(idColumn: string): string[] {
  return [idColumn, "text", "reason_for_exclusion"];
}

const PROGRESS_EVERY = 10_000;

export interface IngestOptions {
  /** Longest accepted sentence, in code points. */
  readonly maxSentenceLength: number;
  /** Parse the identifier column and write it to the sentence table. */
  readonly includeIds: boolean;
}

export const defaultIngestOptions: IngestOptions = {
  maxSentenceLength: 100,
  includeIds: true,
};

export interface IngestSinks {
  readonly sentences: RowSink;
  readonly skipped: RowSink;
}

export type CorpusLines = Iterable<string> | AsyncIterable<string>;

function isAsyncIterable(lines: CorpusLines): lines is AsyncIterable<string> {
  return typeof lines === "object" && Symbol.asyncIterator in lines;
}

function lineStream(lines: CorpusLines): Stream.Stream<string, CorpusIOError> {
  if (isAsyncIterable(lines)) {
    return Stream.fromAsyncIterable(
      lines,
      (cause) => new CorpusIOError({ message: "Failed to read corpus", cause }),
    );
  }
  return Stream.fromIterable(lines);
}

/**
 * Tokenize and count every corpus line, routing each sentence to the
 * sentence table or the skip log. The tokenizer comes from `TokenizerService`.
 *
 * The counter is filled in place; hand it to `buildLexicon` once this
 * effect has completed.
 */
export function ingestSentences(
  lines: CorpusLines,
  counter: FrequencyCounter,
  sinks: IngestSinks,
  options: IngestOptions = defaultIngestOptions,
): Effect.Effect<IngestStats, MalformedLineError | TokenizerError | CorpusIOError, TokenizerService> {
  return withSpan("ingestSentences", Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    let lineNo = 0;
    let accepted = 0;
    let skipped = 0;

    yield* Stream.runForEach(lineStream(lines), (line) =>
      Effect.gen(function* () {
        lineNo++;
        const parsed = yield* parseCorpusLine(line, lineNo, options.includeIds);
        const tokens = yield* checkedTokenize(tokenizer, parsed.text);
        const sentence = makeSentence(parsed.text, tokens, parsed.id);

        counter.update(sentence.tokens);

        if (sentenceLength(sentence.text) <= options.maxSentenceLength) {
          yield* writeRow(sinks.sentences, sentenceRow(sentence), "sentence table");
          accepted++;
        } else {
          yield* writeRow(sinks.skipped, [parsed.rawId, sentence.text, SKIP_REASON_TOO_LONG], "skip log");
          skipped++;
        }

        if (lineNo % PROGRESS_EVERY === 0) {
          yield* Effect.logDebug(`ingested ${lineNo} lines (${counter.size} distinct tokens)`);
        }
      }),
    );

    yield* Effect.logInfo(
      `ingested ${lineNo} sentences: ${accepted} accepted, ${skipped} skipped, ${counter.size} distinct tokens`,
    );
    return { sentences: lineNo, accepted, skipped };
  }));
}
