/**
 * @lexicon/cli -- command implementations, importable without running main.
 */
export { parseFlags, flagValue, requireFlag, intFlag, switchFlag, type Flags } from "./parse.js";
export { buildCmd, buildProgram, flagOverrides, formatSummary } from "./commands/build.js";
export { languagesCmd, listLanguages, formatLanguages, type LanguageListing } from "./commands/languages.js";
