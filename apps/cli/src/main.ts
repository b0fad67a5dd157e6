#!/usr/bin/env tsx
/**
 * lexicon CLI main entry point.
 *
 * Commands: build, languages
 */
import { buildCmd } from "./commands/build.js";
import { languagesCmd } from "./commands/languages.js";

const USAGE = `
lexicon: word-frequency lexicons from sentence corpora

Commands:
  build            Tokenize a corpus and write sentences, skip log, words and non-words
  languages        List supported languages

Options (build):
  --language=CODE  ISO 639-3 language code (required)
  --out=DIR        Output directory (required)
  --input=PATH     Corpus of <id>\\t<sentence> lines (default: stdin)
  --config=PATH    JSON config file
  --maxLength=N    Longest sentence kept in sentences.csv (default: 100)
  --noIds          Leave the id column out of sentences.csv
  --idColumn=NAME  Header of the id column (default: tatoeba_id)
  --logLevel=LVL   debug, info, warn or error (default: info)

Options (languages):
  --json           Print JSON instead of a table

Options:
  --help, -h       Show this help

Examples:
  lexicon build --language=spa --input=data/spa.tsv --out=build/spa
  lexicon languages --json
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "build") {
    await buildCmd(args.slice(1));
  } else if (command === "languages") {
    await languagesCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
