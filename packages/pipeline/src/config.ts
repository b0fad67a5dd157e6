/**
 * LexiconConfig type, defaults, loading and validation.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "@lexicon/core";

export type LogLevelName = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

export interface OutputFileNames {
  readonly sentences: string;
  readonly skipped: string;
  readonly words: string;
  readonly nonwords: string;
}

export interface LexiconConfig {
  /** Longest sentence written to the sentence table, in code points. */
  readonly maxSentenceLength: number;
  /** Whether corpus lines carry integer sentence ids worth keeping. */
  readonly includeIds: boolean;
  /** Header of the id column in the sentence table and skip log. */
  readonly idColumn: string;
  readonly logLevel: LogLevelName;
  /** File names inside the output directory. */
  readonly files: OutputFileNames;
}

export const defaultLexiconConfig: LexiconConfig = {
  maxSentenceLength: 100,
  includeIds: true,
  idColumn: "tatoeba_id",
  logLevel: "info",
  files: {
    sentences: "sentences.csv",
    skipped: "skipped.csv",
    words: "words.csv",
    nonwords: "nonwords.txt",
  },
};

export type LexiconConfigOverrides = Partial<Omit<LexiconConfig, "files">> & {
  readonly files?: Partial<OutputFileNames>;
};

/** Overlay the defined fields of `overrides` on `base`; file names merge key by key. */
export function mergeLexiconConfig(base: LexiconConfig, overrides: LexiconConfigOverrides): LexiconConfig {
  const files: Partial<OutputFileNames> = overrides.files ?? {};
  return {
    maxSentenceLength: overrides.maxSentenceLength ?? base.maxSentenceLength,
    includeIds: overrides.includeIds ?? base.includeIds,
    idColumn: overrides.idColumn ?? base.idColumn,
    logLevel: overrides.logLevel ?? base.logLevel,
    files: {
      sentences: files.sentences ?? base.files.sentences,
      skipped: files.skipped ?? base.files.skipped,
      words: files.words ?? base.files.words,
      nonwords: files.nonwords ?? base.files.nonwords,
    },
  };
}

function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/** Read the known keys of a parsed JSON object, rejecting wrong types. */
export function parseLexiconConfig(data: unknown): LexiconConfigOverrides {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error("config must be a JSON object");
  }
  const raw: Record<string, unknown> = { ...data };
  const out: {
    maxSentenceLength?: number;
    includeIds?: boolean;
    idColumn?: string;
    logLevel?: LogLevelName;
    files?: Partial<OutputFileNames>;
  } = {};

  if (raw.maxSentenceLength !== undefined) {
    if (typeof raw.maxSentenceLength !== "number") throw new Error("maxSentenceLength must be a number");
    out.maxSentenceLength = raw.maxSentenceLength;
  }
  if (raw.includeIds !== undefined) {
    if (typeof raw.includeIds !== "boolean") throw new Error("includeIds must be a boolean");
    out.includeIds = raw.includeIds;
  }
  if (raw.idColumn !== undefined) {
    if (typeof raw.idColumn !== "string") throw new Error("idColumn must be a string");
    out.idColumn = raw.idColumn;
  }
  if (raw.logLevel !== undefined) {
    if (!isLogLevelName(raw.logLevel)) throw new Error(`logLevel must be one of ${LOG_LEVELS.join(", ")}`);
    out.logLevel = raw.logLevel;
  }
  if (raw.files !== undefined) {
    if (typeof raw.files !== "object" || raw.files === null) throw new Error("files must be an object");
    const files: Record<string, unknown> = { ...raw.files };
    const names: { -readonly [K in keyof OutputFileNames]?: string } = {};
    for (const key of ["sentences", "skipped", "words", "nonwords"] as const) {
      const value = files[key];
      if (value === undefined) continue;
      if (typeof value !== "string") throw new Error(`files.${key} must be a string`);
      names[key] = value;
    }
    out.files = names;
  }
  return out;
}

/** Validate a LexiconConfig, throwing on invalid values. */
export function validateLexiconConfig(config: LexiconConfig): void {
  if (!Number.isInteger(config.maxSentenceLength) || config.maxSentenceLength < 1) {
    throw new Error(`maxSentenceLength must be a positive integer, got ${config.maxSentenceLength}`);
  }
  if (config.idColumn.length === 0) {
    throw new Error("idColumn must not be empty");
  }
  const names = Object.values(config.files);
  for (const name of names) {
    if (name.length === 0) throw new Error("output file names must not be empty");
    if (name.includes("/") || name.includes("\\")) {
      throw new Error(`output file names must not contain path separators, got "${name}"`);
    }
  }
  if (new Set(names).size !== names.length) {
    throw new Error(`output file names must be distinct, got ${names.join(", ")}`);
  }
}

/** Merge and validate, as an Effect. */
export function resolveLexiconConfig(
  overrides: LexiconConfigOverrides = {},
  base: LexiconConfig = defaultLexiconConfig,
): Effect.Effect<LexiconConfig, ConfigError> {
  return Effect.try({
    try: () => {
      const config = mergeLexiconConfig(base, overrides);
      validateLexiconConfig(config);
      return config;
    },
    catch: (cause) => new ConfigError({ message: cause instanceof Error ? cause.message : String(cause), cause }),
  });
}

/** Load a LexiconConfig from a JSON file path, merging with defaults. */
export function loadLexiconConfig(path?: string): Effect.Effect<LexiconConfig, ConfigError> {
  if (!path) return resolveLexiconConfig();

  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new ConfigError({ message: `Failed to read config at ${path}`, cause }),
  }).pipe(
    Effect.flatMap((raw) =>
      Effect.try({
        try: () => parseLexiconConfig(JSON.parse(raw)),
        catch: (cause) =>
          new ConfigError({
            message: `Failed to parse config at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
            cause,
          }),
      }),
    ),
    Effect.flatMap((overrides) => resolveLexiconConfig(overrides)),
  );
}
