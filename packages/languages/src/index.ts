/**
 * @lexicon/languages -- per-language alphabets and the word-validity rule.
 */
export { LanguageProfile, type LanguageDefinition } from "./profile.js";
export { languages, getLanguage, isSupported, parseLanguageTable } from "./registry.js";
