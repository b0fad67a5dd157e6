/**
 * Per-language alphabet and the word-validity rule.
 *
 * A token is a word when it is non-empty, starts with an alphabet character,
 * and every character is either in the alphabet or in the symbol set.
 * Characters are compared by code point.
 */

export interface LanguageDefinition {
  readonly code: string;
  readonly name: string;
  /** Goes in the html lang attribute of consumers. */
  readonly bcp47: string;
  /** Tokenizer registry name. */
  readonly tokenizer?: string;
  readonly alphabet: string;
  readonly symbols?: string;
}

export class LanguageProfile {
  readonly code: string;
  readonly name: string;
  readonly bcp47: string;
  readonly tokenizer: string;
  readonly alphabet: ReadonlySet<string>;
  readonly symbols: ReadonlySet<string>;

  constructor(def: LanguageDefinition) {
    this.code = def.code;
    this.name = def.name;
    this.bcp47 = def.bcp47;
    this.tokenizer = def.tokenizer ?? "segmenter";
    this.alphabet = new Set(def.alphabet);
    this.symbols = new Set(def.symbols ?? "");
  }

  isWord(token: string): boolean {
    const chars = [...token];
    if (chars.length === 0) return false;
    if (!this.alphabet.has(chars[0])) return false;
    return chars.every((ch) => this.alphabet.has(ch) || this.symbols.has(ch));
  }
}
