/**
 * One full run for one language: ingest the corpus, then build the lexicon.
 *
 * The two passes run in separate scopes. The sentence table and skip log are
 * closed before any word is classified, and the counter moves from the
 * first pass to the second without being shared with anything else.
 */
import { createReadStream } from "node:fs";
import { mkdir, stat } from "node:fs/promises";
import { join } from "node:path";
import * as readline from "node:readline";
import { Effect, type Scope } from "effect";
import { ConfigError, CorpusIOError, type LexiconError, type OutputPaths, type RunSummary } from "@lexicon/core";
import { TokenizerFrom } from "@lexicon/effect-runtime";
import { getLanguage } from "@lexicon/languages";
import { tokenizerFor } from "@lexicon/tokenizers";
import { buildLexicon, WORDS_HEADER } from "./builder.js";
import { defaultLexiconConfig, type LexiconConfig, type OutputFileNames } from "./config.js";
import { FrequencyCounter } from "./counter.js";
import { ingestSentences, sentenceHeader, skippedHeader } from "./ingest.js";
import { fileLineSink, fileRowSink } from "./sinks.js";

export interface ProcessOptions {
  /** ISO 639-3 language code. */
  readonly language: string;
  /** Directory the four output files are written to. */
  readonly outDir: string;
  /** Corpus file; stdin when omitted. */
  readonly input?: string;
  readonly config?: LexiconConfig;
}

export function outputPaths(outDir: string, files: OutputFileNames): OutputPaths {
  return {
    sentences: join(outDir, files.sentences),
    skipped: join(outDir, files.skipped),
    words: join(outDir, files.words),
    nonwords: join(outDir, files.nonwords),
  };
}

/**
 * Corpus lines from a file, or from stdin when no path is given.
 * The reader is closed with the enclosing scope.
 */
export function readCorpusLines(path?: string): Effect.Effect<AsyncIterable<string>, CorpusIOError, Scope.Scope> {
  return Effect.acquireRelease(
    Effect.tryPromise({
      try: async () => {
        if (path !== undefined) {
          const info = await stat(path);
          if (!info.isFile()) throw new Error(`${path} is not a file`);
        }
        const input = path === undefined ? process.stdin : createReadStream(path, { encoding: "utf-8" });
        return readline.createInterface({ input, crlfDelay: Infinity });
      },
      catch: (cause) => new CorpusIOError({ message: `Failed to open corpus ${path ?? "<stdin>"}`, path, cause }),
    }),
    (rl) => Effect.sync(() => rl.close()),
  );
}

/** Create the output directory; refuse a path that is an existing file. */
export function prepareOutputDir(outDir: string): Effect.Effect<void, ConfigError | CorpusIOError> {
  return Effect.gen(function* () {
    const isFile = yield* Effect.promise(() => stat(outDir).then((info) => info.isFile(), () => false));
    if (isFile) {
      return yield* Effect.fail(new ConfigError({ message: `${outDir} is a file` }));
    }
    yield* Effect.tryPromise({
      try: () => mkdir(outDir, { recursive: true }),
      catch: (cause) => new CorpusIOError({ message: `Failed to create ${outDir}`, path: outDir, cause }),
    });
  });
}

/** Tokenize the corpus and write all outputs for one language. */
export function processLanguage(options: ProcessOptions): Effect.Effect<RunSummary, LexiconError> {
  return Effect.gen(function* () {
    const config = options.config ?? defaultLexiconConfig;
    const language = yield* getLanguage(options.language);
    yield* prepareOutputDir(options.outDir);
    const tokenizer = yield* tokenizerFor(language);
    const outputs = outputPaths(options.outDir, config.files);
    const counter = new FrequencyCounter();

    yield* Effect.logInfo(
      `processing ${language.name} (${language.code}) from ${options.input ?? "<stdin>"} with ${tokenizer.name} tokenizer`,
    );

    const ingested = yield* Effect.scoped(
      Effect.gen(function* () {
        const lines = yield* readCorpusLines(options.input);
        const sentences = yield* fileRowSink(outputs.sentences, sentenceHeader(config.idColumn, config.includeIds));
        const skipped = yield* fileRowSink(outputs.skipped, skippedHeader(config.idColumn));
        return yield* ingestSentences(lines, counter, { sentences, skipped }, {
          maxSentenceLength: config.maxSentenceLength,
          includeIds: config.includeIds,
        });
      }),
    ).pipe(Effect.provide(TokenizerFrom(tokenizer)));
    const distinctTokens = counter.size;

    const lexicon = yield* Effect.scoped(
      Effect.gen(function* () {
        const words = yield* fileRowSink(outputs.words, WORDS_HEADER);
        const nonwords = yield* fileLineSink(outputs.nonwords);
        return yield* buildLexicon(counter, language, { words, nonwords });
      }),
    );

    return {
      language: language.code,
      ...ingested,
      ...lexicon,
      distinctTokens,
      outputs,
    };
  });
}
