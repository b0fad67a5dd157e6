/**
 * Word frequency counter.
 *
 * A multiset over tokens backed by an insertion-ordered Map. Enumeration is
 * by descending count; equal counts keep first-insertion order because
 * Array.prototype.sort is stable.
 */

const SEPARATOR_RE = /^\s*$/u;

/** Whitespace pieces (and empty strings) are not counted. */
export function isSeparator(token: string): boolean {
  return SEPARATOR_RE.test(token);
}

export class FrequencyCounter {
  private readonly _counts = new Map<string, number>();

  /** Number of distinct tokens. */
  get size(): number {
    return this._counts.size;
  }

  /** Sum of all counts. */
  get total(): number {
    let sum = 0;
    for (const count of this._counts.values()) sum += count;
    return sum;
  }

  /** Count every non-separator token once. */
  update(tokens: Iterable<string>): void {
    for (const token of tokens) {
      if (isSeparator(token)) continue;
      this._counts.set(token, (this._counts.get(token) ?? 0) + 1);
    }
  }

  get(token: string): number {
    return this._counts.get(token) ?? 0;
  }

  has(token: string): boolean {
    return this._counts.has(token);
  }

  /** Remove the entry entirely. Returns false if it was not counted. */
  delete(token: string): boolean {
    return this._counts.delete(token);
  }

  /** Entries by descending count, optionally only the first `n`. */
  mostCommon(n?: number): [string, number][] {
    const entries = [...this._counts.entries()];
    entries.sort((a, b) => b[1] - a[1]);
    return n === undefined ? entries : entries.slice(0, n);
  }
}
