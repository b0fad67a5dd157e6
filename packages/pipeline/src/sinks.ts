/**
 * Output sinks for sentence tables, skip logs, lexicons and token logs.
 *
 * CSV rows are encoded with papaparse. File sinks write each row with one
 * synchronous write, so an aborted run leaves whole rows behind, and they are
 * scoped resources: the file is closed when the enclosing scope ends,
 * whatever the outcome.
 */
import * as fs from "node:fs";
import { Effect, type Scope } from "effect";
import Papa from "papaparse";
import { CorpusIOError, type Cell, type LineSink, type RowSink } from "@lexicon/core";

export type Row = readonly Cell[];

/** One CSV record, newline-terminated. */
export function csvLine(row: Row): string {
  const fields = row.map((cell) => (typeof cell === "bigint" ? cell.toString() : cell));
  return Papa.unparse([fields], { newline: "\n" }) + "\n";
}

// ── In-memory sinks ────────────────────────────────────────────────────────

export interface MemoryRowSink extends RowSink {
  readonly rows: Row[];
}

export interface MemoryLineSink extends LineSink {
  readonly lines: string[];
}

export function memoryRowSink(header: readonly string[]): MemoryRowSink {
  const rows: Row[] = [];
  return {
    header,
    rows,
    write: (row) => {
      rows.push([...row]);
    },
  };
}

export function memoryLineSink(): MemoryLineSink {
  const lines: string[] = [];
  return {
    lines,
    write: (line) => {
      lines.push(line);
    },
  };
}

// ── File sinks ─────────────────────────────────────────────────────────────

function openFile(path: string): Effect.Effect<number, CorpusIOError, Scope.Scope> {
  return Effect.acquireRelease(
    Effect.try({
      try: () => fs.openSync(path, "w"),
      catch: (cause) => new CorpusIOError({ message: `Failed to open "${path}" for writing`, path, cause }),
    }),
    (fd) =>
      Effect.try({
        try: () => fs.closeSync(fd),
        catch: (cause) => new CorpusIOError({ message: `Failed to close "${path}"`, path, cause }),
      }).pipe(Effect.catchAll((err) => Effect.logError(err.message))),
  );
}

/** CSV file sink; the header row is written on open. */
export function fileRowSink(
  path: string,
  header: readonly string[],
): Effect.Effect<RowSink, CorpusIOError, Scope.Scope> {
  return Effect.gen(function* () {
    const fd = yield* openFile(path);
    const sink: RowSink = {
      header,
      write: (row) => {
        fs.writeSync(fd, csvLine(row));
      },
    };
    yield* writeRow(sink, header, path);
    return sink;
  });
}

/** Plain text file sink, one line per write. */
export function fileLineSink(path: string): Effect.Effect<LineSink, CorpusIOError, Scope.Scope> {
  return Effect.map(openFile(path), (fd) => ({
    write: (line: string) => {
      fs.writeSync(fd, line + "\n");
    },
  }));
}

// ── Checked writes ─────────────────────────────────────────────────────────

export function writeRow(sink: RowSink, row: Row, label = "output"): Effect.Effect<void, CorpusIOError> {
  return Effect.try({
    try: () => sink.write(row),
    catch: (cause) => new CorpusIOError({ message: `Failed to write row to ${label}`, cause }),
  });
}

export function writeLine(sink: LineSink, line: string, label = "output"): Effect.Effect<void, CorpusIOError> {
  return Effect.try({
    try: () => sink.write(line),
    catch: (cause) => new CorpusIOError({ message: `Failed to write line to ${label}`, cause }),
  });
}
