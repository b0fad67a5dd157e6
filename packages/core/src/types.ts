/**
 * Core types for the lexicon pipeline.
 */

// ── Sentences ──────────────────────────────────────────────────────────────

/** One ingested sentence. Two records with the same `text` are interchangeable. */
export interface SentenceRecord {
  /** Exact at any size; corpus ids can exceed 2^53. */
  readonly id?: bigint;
  readonly text: string;
  readonly tokens: readonly string[];
}

export function sentenceKey(sentence: SentenceRecord): string {
  return sentence.text;
}

export function sameSentence(a: SentenceRecord, b: SentenceRecord): boolean {
  return a.text === b.text;
}

// ── Lexicon ────────────────────────────────────────────────────────────────

export interface LexiconEntry {
  readonly word: string;
  readonly frequency: number;
  readonly frequencyClass: number;
}

// ── Run results ────────────────────────────────────────────────────────────

export interface IngestStats {
  /** Lines read from the corpus. */
  readonly sentences: number;
  readonly accepted: number;
  readonly skipped: number;
}

export interface LexiconStats {
  readonly words: number;
  readonly nonwords: number;
  readonly maxCount: number;
}

export interface OutputPaths {
  readonly sentences: string;
  readonly skipped: string;
  readonly words: string;
  readonly nonwords: string;
}

export interface RunSummary extends IngestStats, LexiconStats {
  readonly language: string;
  readonly distinctTokens: number;
  readonly outputs: OutputPaths;
}
