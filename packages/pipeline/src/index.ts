/**
 * @lexicon/pipeline -- corpus ingestion, word counting and lexicon building.
 */
export { FrequencyCounter, isSeparator } from "./counter.js";
export {
  LEFT_TO_RIGHT_MARK,
  RIGHT_TO_LEFT_MARK,
  cleanSentence,
  sentenceLength,
  parseCorpusLine,
  makeSentence,
  serializeTokens,
  sentenceRow,
  type CorpusLine,
} from "./sentence.js";
export {
  ingestSentences,
  sentenceHeader,
  skippedHeader,
  defaultIngestOptions,
  SKIP_REASON_TOO_LONG,
  type IngestOptions,
  type IngestSinks,
  type CorpusLines,
} from "./ingest.js";
export {
  buildLexicon,
  removeNonWords,
  lexiconEntries,
  frequencyClass,
  WORDS_HEADER,
  type WordClassifier,
  type LexiconSinks,
} from "./builder.js";
export {
  csvLine,
  memoryRowSink,
  memoryLineSink,
  fileRowSink,
  fileLineSink,
  writeRow,
  writeLine,
  type Row,
  type MemoryRowSink,
  type MemoryLineSink,
} from "./sinks.js";
export {
  defaultLexiconConfig,
  mergeLexiconConfig,
  parseLexiconConfig,
  validateLexiconConfig,
  resolveLexiconConfig,
  loadLexiconConfig,
  type LexiconConfig,
  type LexiconConfigOverrides,
  type OutputFileNames,
  type LogLevelName,
} from "./config.js";
export { processLanguage, prepareOutputDir, readCorpusLines, outputPaths, type ProcessOptions } from "./process.js";
