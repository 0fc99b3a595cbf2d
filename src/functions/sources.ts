/**
 * Read-only access to the sources template functions query.
 *
 * Every reader checks existence first so a missing file surfaces as
 * SourceNotFoundError, and turns parser failures into SourceFormatError.
 * Database handles are opened and closed inside one call.
 */

import { existsSync, readFileSync } from "node:fs";
import Database from "better-sqlite3";
import Papa from "papaparse";
import { parse as parseYaml } from "yaml";

import { SourceFormatError, SourceNotFoundError } from "../engine/errors.js";

export type SourceLabel = "File" | "CSV file" | "YAML file" | "JSON file" | "SQLite database";

function requireSource(path: string, label: SourceLabel): void {
  if (!existsSync(path)) {
    throw new SourceNotFoundError(`${label} not found: ${path}`, path);
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

export function readTextSource(path: string, label: SourceLabel = "File"): string {
  requireSource(path, label);
  return readFileSync(path, "utf-8");
}

/**
 * Lines of a text file. A trailing newline does not add an empty line.
 */
export function readLines(path: string): string[] {
  const lines = readTextSource(path).split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function readWords(path: string): string[] {
  return readTextSource(path)
    .split(/\s+/)
    .filter((word) => word !== "");
}

// ---------------------------------------------------------------------------
// CSV
// ---------------------------------------------------------------------------

export interface CsvTable {
  headers: string[];
  /** Data rows; row 0 is the first line after the header */
  rows: string[][];
}

export function readCsvSource(path: string): CsvTable {
  const text = readTextSource(path, "CSV file").replace(/^\uFEFF/, "");
  const result = Papa.parse<string[]>(text, { delimiter: ",", skipEmptyLines: true });

  const fatal = result.errors.find((error) => error.type === "Quotes");
  if (fatal) {
    const row = fatal.row !== undefined ? ` (row ${fatal.row})` : "";
    throw new SourceFormatError(`Malformed CSV in ${path}${row}: ${fatal.message}`, path);
  }

  const [headers = [], ...rows] = result.data;
  return { headers, rows };
}

// ---------------------------------------------------------------------------
// YAML / JSON
// ---------------------------------------------------------------------------

export function readYamlSource(path: string): unknown {
  const text = readTextSource(path, "YAML file");
  try {
    const document: unknown = parseYaml(text);
    return document;
  } catch (err) {
    throw new SourceFormatError(`Invalid YAML in ${path}: ${describeError(err)}`, path, { cause: err });
  }
}

export function readJsonSource(path: string): unknown {
  const text = readTextSource(path, "JSON file");
  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (err) {
    throw new SourceFormatError(`Invalid JSON in ${path}: ${describeError(err)}`, path, { cause: err });
  }
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

/**
 * Open a database read-only, run `query`, and close it again.
 */
export function withDatabase<T>(path: string, query: (db: Database.Database) => T): T {
  requireSource(path, "SQLite database");

  const notADatabase = (err: unknown): SourceFormatError | undefined =>
    err instanceof Database.SqliteError && err.code === "SQLITE_NOTADB"
      ? new SourceFormatError(`Not a SQLite database: ${path}`, path, { cause: err })
      : undefined;

  let db: Database.Database;
  try {
    db = new Database(path, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw notADatabase(err) ?? err;
  }

  try {
    return query(db);
  } catch (err) {
    throw notADatabase(err) ?? err;
  } finally {
    db.close();
  }
}
