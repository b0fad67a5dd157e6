/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context } from "effect";

// ── Tokenizer ──────────────────────────────────────────────────────────────

/**
 * Language-specific sentence segmentation.
 *
 * `tokenize` returns token and whitespace pieces in left-to-right order;
 * joining them gives back the input exactly. Empty whitespace pieces may be
 * left out.
 */
export interface Tokenizer {
  readonly name: string;
  /** BCP-47 tag the tokenizer was built for. */
  readonly locale: string;
  tokenize(sentence: string): string[];
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}

// ── Output sinks ───────────────────────────────────────────────────────────

export type Cell = string | number | bigint;

/** Tabular output: one call per row, header written when the sink opens. */
export interface RowSink {
  readonly header: readonly string[];
  write(row: readonly Cell[]): void;
}

/** Plain text output, one line per call. */
export interface LineSink {
  write(line: string): void;
}
