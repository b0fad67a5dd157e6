/**
 * Language table, keyed by ISO 639-3 code.
 *
 * The table lives in `languages.json` beside this module and is read once,
 * on first lookup. The resulting map is never mutated.
 */
import { readFileSync } from "node:fs";
import { Effect } from "effect";
import { UnknownLanguageError } from "@lexicon/core";
import { LanguageProfile, type LanguageDefinition } from "./profile.js";

const TABLE_URL = new URL("./languages.json", import.meta.url);

let _languages: ReadonlyMap<string, LanguageProfile> | null = null;

function isDefinition(value: unknown): value is LanguageDefinition {
  if (typeof value !== "object" || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.code === "string" &&
    typeof v.name === "string" &&
    typeof v.bcp47 === "string" &&
    typeof v.alphabet === "string" &&
    (v.symbols === undefined || typeof v.symbols === "string") &&
    (v.tokenizer === undefined || typeof v.tokenizer === "string")
  );
}

/** Parse a language table (an array of definitions). */
export function parseLanguageTable(raw: string): ReadonlyMap<string, LanguageProfile> {
  const data: unknown = JSON.parse(raw);
  if (!Array.isArray(data)) {
    throw new Error("Language table must be a JSON array");
  }
  const table = new Map<string, LanguageProfile>();
  for (const entry of data) {
    if (!isDefinition(entry)) {
      throw new Error(`Invalid language definition: ${JSON.stringify(entry)}`);
    }
    if (table.has(entry.code)) {
      throw new Error(`Duplicate language code: ${entry.code}`);
    }
    table.set(entry.code, new LanguageProfile(entry));
  }
  return table;
}

/** All supported languages, in table order. */
export function languages(): ReadonlyMap<string, LanguageProfile> {
  if (!_languages) {
    _languages = parseLanguageTable(readFileSync(TABLE_URL, "utf-8"));
  }
  return _languages;
}

export function isSupported(code: string): boolean {
  return languages().has(code);
}

export function getLanguage(code: string): Effect.Effect<LanguageProfile, UnknownLanguageError> {
  return Effect.suspend(() => {
    const table = languages();
    const profile = table.get(code);
    if (!profile) {
      return Effect.fail(
        new UnknownLanguageError({
          code,
          available: [...table.keys()],
          message: `unsupported language: ${code}`,
        }),
      );
    }
    return Effect.succeed(profile);
  });
}
