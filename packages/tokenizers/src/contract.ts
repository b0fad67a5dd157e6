/**
 * Checks for the tokenizer contract: pieces joined in order must give back
 * the sentence that was tokenized.
 */
import { Effect } from "effect";
import { TokenizerError, type Tokenizer } from "@lexicon/core";

export function reconstructs(pieces: readonly string[], sentence: string): boolean {
  return pieces.join("") === sentence;
}

/**
 * Tokenize `sentence` and fail with a `TokenizerError` if the pieces do not
 * reproduce it, or if the tokenizer throws.
 */
export function checkedTokenize(
  tokenizer: Tokenizer,
  sentence: string,
): Effect.Effect<string[], TokenizerError> {
  return Effect.try({
    try: () => tokenizer.tokenize(sentence),
    catch: (cause) =>
      new TokenizerError({
        message: `${tokenizer.name} tokenizer failed on: ${JSON.stringify(sentence)}`,
        cause,
      }),
  }).pipe(
    Effect.filterOrFail(
      (pieces) => reconstructs(pieces, sentence),
      (pieces) =>
        new TokenizerError({
          message: `${tokenizer.name} tokenizer lost text: ${JSON.stringify(sentence)} -> ${JSON.stringify(pieces)}`,
        }),
    ),
  );
}
