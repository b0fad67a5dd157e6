/**
 * Command: lexicon build
 *
 * Usage:
 *   lexicon build --language=spa --input=data/spa.tsv --out=out/spa
 *   lexicon build --language=eng --out=out/eng --maxLength=80 < data/eng.tsv
 */
import { Effect, Either } from "effect";
import { ConfigError, type LexiconError, type RunSummary } from "@lexicon/core";
import { loggerLayer } from "@lexicon/effect-runtime";
import { getLanguage } from "@lexicon/languages";
import {
  loadLexiconConfig,
  parseLexiconConfig,
  processLanguage,
  resolveLexiconConfig,
  type LexiconConfigOverrides,
} from "@lexicon/pipeline";
import { flagValue, intFlag, parseFlags, requireFlag, switchFlag, type Flags } from "../parse.js";

/** Config overrides given as flags; they win over the config file. */
export function flagOverrides(flags: Flags): Effect.Effect<LexiconConfigOverrides, ConfigError> {
  return Effect.try({
    try: () => {
      const noIds = switchFlag(flags, "noIds");
      return parseLexiconConfig({
        maxSentenceLength: intFlag(flags, "maxLength"),
        includeIds: noIds === undefined ? undefined : !noIds,
        idColumn: flagValue(flags, "idColumn"),
        logLevel: flagValue(flags, "logLevel"),
      });
    },
    catch: (cause) => new ConfigError({ message: cause instanceof Error ? cause.message : String(cause), cause }),
  });
}

export function formatSummary(summary: RunSummary): string {
  return [
    `Done: ${summary.language}`,
    `Sentences:  ${summary.sentences} (${summary.accepted} kept, ${summary.skipped} too long)`,
    `Tokens:     ${summary.distinctTokens} distinct`,
    `Words:      ${summary.words} (max count ${summary.maxCount})`,
    `Non-words:  ${summary.nonwords}`,
    `Outputs:    ${summary.outputs.sentences}`,
    `            ${summary.outputs.skipped}`,
    `            ${summary.outputs.words}`,
    `            ${summary.outputs.nonwords}`,
  ].join("\n");
}

export function buildProgram(args: string[]): Effect.Effect<RunSummary, LexiconError> {
  const flags = parseFlags(args);
  return Effect.gen(function* () {
    const language = yield* Effect.try({
      try: () => requireFlag(flags, "language", "ISO 639-3 code"),
      catch: (cause) => new ConfigError({ message: cause instanceof Error ? cause.message : String(cause) }),
    });
    yield* getLanguage(language);
    const outDir = yield* Effect.try({
      try: () => requireFlag(flags, "out", "output directory"),
      catch: (cause) => new ConfigError({ message: cause instanceof Error ? cause.message : String(cause) }),
    });

    const fileConfig = yield* loadLexiconConfig(flagValue(flags, "config"));
    const config = yield* resolveLexiconConfig(yield* flagOverrides(flags), fileConfig);

    return yield* processLanguage({
      language,
      outDir,
      input: flagValue(flags, "input"),
      config,
    }).pipe(Effect.provide(loggerLayer(config.logLevel)));
  });
}

export async function buildCmd(args: string[]): Promise<void> {
  const result = await Effect.runPromise(Effect.either(buildProgram(args)));
  if (Either.isLeft(result)) {
    console.error(result.left.message);
    process.exitCode = 1;
    return;
  }
  console.log(formatSummary(result.right));
}
