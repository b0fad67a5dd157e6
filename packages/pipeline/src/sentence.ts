/**
 * Corpus line parsing and sentence records.
 */
import { Effect } from "effect";
import { MalformedLineError, type Cell, type SentenceRecord } from "@lexicon/core";

export const LEFT_TO_RIGHT_MARK = "\u200E";
export const RIGHT_TO_LEFT_MARK = "\u200F";

const ID_RE = /^[+-]?\d+$/;

function isDirectionalMark(ch: string): boolean {
  return ch === LEFT_TO_RIGHT_MARK || ch === RIGHT_TO_LEFT_MARK;
}

/**
 * Strip surrounding whitespace, then one directional mark from each end,
 * then whitespace again.
 */
export function cleanSentence(text: string): string {
  let s = text.trim();
  if (s.length > 0 && isDirectionalMark(s[0])) s = s.slice(1);
  if (s.length > 0 && isDirectionalMark(s[s.length - 1])) s = s.slice(0, -1);
  return s.trim();
}

/** Length in code points, not UTF-16 units. */
export function sentenceLength(text: string): number {
  return [...text].length;
}

export interface CorpusLine {
  /** Identifier field as it appears in the corpus. */
  readonly rawId: string;
  /** Parsed identifier, when ids are in use. */
  readonly id?: bigint;
  readonly text: string;
}

/**
 * Split `<identifier>\t<sentence>` on the first tab and clean the sentence.
 *
 * @param lineNo - 1-based line number, reported in errors.
 * @param parseId - whether the identifier must be a decimal integer.
 */
export function parseCorpusLine(
  line: string,
  lineNo: number,
  parseId = true,
): Effect.Effect<CorpusLine, MalformedLineError> {
  return Effect.suspend(() => {
    const tab = line.indexOf("\t");
    if (tab < 0) {
      return Effect.fail(
        new MalformedLineError({
          line: lineNo,
          content: line,
          message: `line ${lineNo}: expected <id>\\t<sentence>, found no tab`,
        }),
      );
    }

    const rawId = line.slice(0, tab);
    const text = cleanSentence(line.slice(tab + 1));
    if (!parseId) {
      return Effect.succeed({ rawId, text });
    }

    const trimmedId = rawId.trim();
    if (!ID_RE.test(trimmedId)) {
      return Effect.fail(
        new MalformedLineError({
          line: lineNo,
          content: line,
          message: `line ${lineNo}: sentence id ${JSON.stringify(rawId)} is not an integer`,
        }),
      );
    }
    return Effect.succeed({ rawId, id: BigInt(trimmedId), text });
  });
}

export function makeSentence(
  text: string,
  tokens: readonly string[],
  id?: bigint,
): SentenceRecord {
  return id === undefined ? { text, tokens } : { id, text, tokens };
}

/** Token pieces as a JSON array; keeps order and empty strings. */
export function serializeTokens(tokens: readonly string[]): string {
  return JSON.stringify(tokens);
}

/** Accepted-sentence row: `[id, text, tokens]`, or `[text, tokens]` without an id. */
export function sentenceRow(sentence: SentenceRecord): Cell[] {
  const tokens = serializeTokens(sentence.tokens);
  if (sentence.id === undefined) return [sentence.text, tokens];
  return [sentence.id, sentence.text, tokens];
}
