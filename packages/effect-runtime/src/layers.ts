/**
 * Effect layers for dependency injection.
 */
import { Layer } from "effect";
import { TokenizerService, type Tokenizer } from "@lexicon/core";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);
