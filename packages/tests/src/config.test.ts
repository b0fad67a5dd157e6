import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import {
  defaultLexiconConfig,
  loadLexiconConfig,
  mergeLexiconConfig,
  parseLexiconConfig,
  resolveLexiconConfig,
} from "@lexicon/pipeline";

describe("defaultLexiconConfig", () => {
  it("matches the documented defaults", () => {
    expect(defaultLexiconConfig.maxSentenceLength).toBe(100);
    expect(defaultLexiconConfig.includeIds).toBe(true);
    expect(defaultLexiconConfig.idColumn).toBe("tatoeba_id");
    expect(defaultLexiconConfig.files).toEqual({
      sentences: "sentences.csv",
      skipped: "skipped.csv",
      words: "words.csv",
      nonwords: "nonwords.txt",
    });
  });
});

describe("mergeLexiconConfig", () => {
  it("overlays defined fields and merges file names key by key", () => {
    const merged = mergeLexiconConfig(defaultLexiconConfig, {
      maxSentenceLength: 80,
      includeIds: undefined,
      files: { words: "lexicon.csv" },
    });
    expect(merged.maxSentenceLength).toBe(80);
    expect(merged.includeIds).toBe(true);
    expect(merged.files.words).toBe("lexicon.csv");
    expect(merged.files.sentences).toBe("sentences.csv");
  });
});

describe("parseLexiconConfig", () => {
  it("keeps known keys", () => {
    expect(parseLexiconConfig({ idColumn: "sid", logLevel: "warn", unknown: 1 })).toEqual({
      idColumn: "sid",
      logLevel: "warn",
    });
  });

  it("rejects wrong types", () => {
    expect(() => parseLexiconConfig([])).toThrow("config must be a JSON object");
    expect(() => parseLexiconConfig({ maxSentenceLength: "80" })).toThrow("maxSentenceLength must be a number");
    expect(() => parseLexiconConfig({ includeIds: "no" })).toThrow("includeIds must be a boolean");
    expect(() => parseLexiconConfig({ logLevel: "loud" })).toThrow("logLevel must be one of debug, info, warn, error");
    expect(() => parseLexiconConfig({ files: { words: 3 } })).toThrow("files.words must be a string");
  });
});

describe("resolveLexiconConfig", () => {
  async function failure(overrides: Parameters<typeof resolveLexiconConfig>[0]) {
    return Effect.runPromise(Effect.flip(resolveLexiconConfig(overrides)));
  }

  it("returns defaults without overrides", async () => {
    expect(await Effect.runPromise(resolveLexiconConfig())).toEqual(defaultLexiconConfig);
  });

  it("rejects a non-positive length", async () => {
    const err = await failure({ maxSentenceLength: 0 });
    expect(err._tag).toBe("ConfigError");
    expect(err.message).toBe("maxSentenceLength must be a positive integer, got 0");
  });

  it("rejects a fractional length", async () => {
    const err = await failure({ maxSentenceLength: 2.5 });
    expect(err.message).toBe("maxSentenceLength must be a positive integer, got 2.5");
  });

  it("rejects an empty id column", async () => {
    const err = await failure({ idColumn: "" });
    expect(err.message).toBe("idColumn must not be empty");
  });

  it("rejects file names with separators", async () => {
    const err = await failure({ files: { words: "out/words.csv" } });
    expect(err.message).toBe('output file names must not contain path separators, got "out/words.csv"');
  });

  it("rejects clashing file names", async () => {
    const err = await failure({ files: { skipped: "sentences.csv" } });
    expect(err.message).toBe(
      "output file names must be distinct, got sentences.csv, sentences.csv, words.csv, nonwords.txt",
    );
  });
});

describe("loadLexiconConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lexicon-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults without a path", async () => {
    expect(await Effect.runPromise(loadLexiconConfig())).toEqual(defaultLexiconConfig);
  });

  it("merges a JSON file over the defaults", async () => {
    const path = join(dir, "lexicon.json");
    writeFileSync(path, JSON.stringify({ maxSentenceLength: 60, files: { nonwords: "rejected.txt" } }));

    const config = await Effect.runPromise(loadLexiconConfig(path));
    expect(config.maxSentenceLength).toBe(60);
    expect(config.files.nonwords).toBe("rejected.txt");
    expect(config.idColumn).toBe("tatoeba_id");
  });

  it("reports a missing file", async () => {
    const path = join(dir, "absent.json");
    const err = await Effect.runPromise(Effect.flip(loadLexiconConfig(path)));
    expect(err.message).toBe(`Failed to read config at ${path}`);
  });

  it("reports invalid JSON", async () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ nope");
    const err = await Effect.runPromise(Effect.flip(loadLexiconConfig(path)));
    expect(err._tag).toBe("ConfigError");
    expect(err.message.startsWith(`Failed to parse config at ${path}: `)).toBe(true);
  });

  it("reports a bad value with its reason", async () => {
    const path = join(dir, "level.json");
    writeFileSync(path, JSON.stringify({ logLevel: "loud" }));
    const err = await Effect.runPromise(Effect.flip(loadLexiconConfig(path)));
    expect(err.message).toBe(
      `Failed to parse config at ${path}: logLevel must be one of debug, info, warn, error`,
    );
  });
});
