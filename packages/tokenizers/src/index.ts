/**
 * @lexicon/tokenizers -- sentence tokenizers for the lexicon pipeline.
 *
 * Provides a locale-aware segmenter tokenizer, a whitespace tokenizer, the
 * reconstruction check, and a pre-populated registry so a language profile
 * can name its tokenizer.
 */
import { Effect } from "effect";
import { Registry, TokenizerError, type Tokenizer } from "@lexicon/core";
import { SegmenterTokenizer } from "./segmenter.js";
import { WhitespaceTokenizer } from "./whitespace.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { SegmenterTokenizer } from "./segmenter.js";
export { WhitespaceTokenizer } from "./whitespace.js";
export { checkedTokenize, reconstructs } from "./contract.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

/**
 * Global tokenizer registry. Factories take the BCP-47 tag of the language.
 *
 * Pre-registered implementations:
 * - `"segmenter"`  -- Intl.Segmenter word segmentation (default)
 * - `"whitespace"` -- whitespace split with punctuation peeled off
 *
 * Usage:
 * ```ts
 * const tok = tokenizerRegistry.get("segmenter", "es");
 * ```
 */
export const tokenizerRegistry = new Registry<Tokenizer, [locale: string]>("tokenizer");

tokenizerRegistry.register("segmenter", (locale) => new SegmenterTokenizer(locale));
tokenizerRegistry.register("whitespace", (locale) => new WhitespaceTokenizer(locale));

/** Build the tokenizer a language profile asks for. */
export function tokenizerFor(language: {
  readonly tokenizer: string;
  readonly bcp47: string;
}): Effect.Effect<Tokenizer, TokenizerError> {
  return Effect.try({
    try: () => tokenizerRegistry.get(language.tokenizer, language.bcp47),
    catch: (cause) =>
      new TokenizerError({
        message: cause instanceof Error ? cause.message : String(cause),
        cause,
      }),
  });
}
