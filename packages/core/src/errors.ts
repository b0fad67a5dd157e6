/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class UnknownLanguageError extends Data.TaggedError("UnknownLanguageError")<{
  readonly code: string;
  readonly available: readonly string[];
  readonly message: string;
}> {}

export class MalformedLineError extends Data.TaggedError("MalformedLineError")<{
  /** 1-based line number in the corpus. */
  readonly line: number;
  readonly content: string;
  readonly message: string;
}> {}

export class EmptyLexiconError extends Data.TaggedError("EmptyLexiconError")<{
  readonly language: string;
  readonly message: string;
}> {}

export class TokenizerError extends Data.TaggedError("TokenizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class CorpusIOError extends Data.TaggedError("CorpusIOError")<{
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

/** Every failure the pipeline can surface to a caller. */
export type LexiconError =
  | UnknownLanguageError
  | MalformedLineError
  | EmptyLexiconError
  | TokenizerError
  | ConfigError
  | CorpusIOError;
