/**
 * Command: lexicon languages
 *
 * Lists the supported languages with their display names and BCP-47 tags.
 */
import { languages } from "@lexicon/languages";
import { parseFlags, switchFlag } from "../parse.js";

export interface LanguageListing {
  readonly code: string;
  readonly name: string;
  readonly bcp47: string;
}

export function listLanguages(): LanguageListing[] {
  return [...languages().values()].map(({ code, name, bcp47 }) => ({ code, name, bcp47 }));
}

export function formatLanguages(listing: readonly LanguageListing[]): string {
  return listing.map((l) => `${l.code}  ${l.bcp47.padEnd(4)} ${l.name}`).join("\n");
}

export async function languagesCmd(args: string[]): Promise<void> {
  const listing = listLanguages();
  if (switchFlag(parseFlags(args), "json")) {
    console.log(JSON.stringify({ languages: listing }, null, 2));
  } else {
    console.log(formatLanguages(listing));
  }
}
