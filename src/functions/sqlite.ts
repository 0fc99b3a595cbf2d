/**
 * SQLite functions. Databases are opened read-only for the duration of
 * one call.
 *
 *   sqlite_query:SQL:db_path                    single scalar from a query
 *   sqlite_value:row:column:db_path             cell of the only table
 *   sqlite_value:row:column:table:db_path       cell of a named table
 *
 * Rows count from 0 in rowid order.
 */

import type Database from "better-sqlite3";

import { ArgumentError, NotFoundError, SourceFormatError } from "../engine/errors.js";
import { parseIndexArg } from "./args.js";
import { withDatabase } from "./sources.js";
import type { TemplateFunction } from "./types.js";

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function renderCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  if (Buffer.isBuffer(value)) {
    throw new SourceFormatError("Query returned a BLOB value, which cannot be rendered as text");
  }
  return String(value);
}

function prepare(db: Database.Database, sql: string): Database.Statement {
  try {
    return db.prepare(sql);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "SQLITE_NOTADB") throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new ArgumentError(`Invalid SQL: ${message}`, { cause: err });
  }
}

function userTables(db: Database.Database): string[] {
  const names: unknown[] = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .pluck()
    .all();
  return names.filter((name): name is string => typeof name === "string");
}

function tableColumns(db: Database.Database, table: string): string[] {
  const names: unknown[] = db.prepare(`SELECT name FROM pragma_table_info(?)`).pluck().all(table);
  return names.filter((name): name is string => typeof name === "string");
}

/**
 * Run a query that must produce exactly one row with one column.
 */
export function queryScalar(db: Database.Database, sql: string): string {
  const statement = prepare(db, sql);
  if (!statement.reader) {
    throw new ArgumentError("sqlite_query only runs statements that return rows");
  }

  const columns = statement.columns().length;
  if (columns !== 1) {
    throw new ArgumentError(`Query returned ${columns} columns, expected exactly one`);
  }

  const rows: unknown[] = statement.pluck().all();
  if (rows.length === 0) {
    throw new NotFoundError("Query returned no rows");
  }
  if (rows.length > 1) {
    throw new ArgumentError(`Query returned ${rows.length} rows, expected exactly one`);
  }
  return renderCell(rows[0]);
}

export const sqliteQuery: TemplateFunction = {
  name: "sqlite_query",
  family: "sqlite",
  arity: { min: 2, max: Number.POSITIVE_INFINITY },
  signature: "sqlite_query:sql:db_path",
  rawArguments: true,
  evaluate(args, ctx) {
    // SQL may itself contain ':'; everything before the last argument is the query
    const sql = args.slice(0, -1).join(":").trim();
    const path = args[args.length - 1].trim();
    if (sql === "") {
      throw new ArgumentError("sqlite_query requires a non-empty SQL statement");
    }
    return withDatabase(ctx.resolveSourcePath(path), (db) => queryScalar(db, sql));
  },
};

export const sqliteValue: TemplateFunction = {
  name: "sqlite_value",
  family: "sqlite",
  arity: { min: 3, max: 4 },
  signature: "sqlite_value:row:column:[table]:db_path",
  evaluate(args, ctx) {
    const row = parseIndexArg(args[0], "row number");
    const column = args[1];
    const requestedTable = args.length === 4 ? args[2] : undefined;
    const path = args[args.length - 1];

    return withDatabase(ctx.resolveSourcePath(path), (db) => {
      const tables = userTables(db);
      let table: string;
      if (requestedTable === undefined) {
        if (tables.length !== 1) {
          throw new ArgumentError(
            `Database has ${tables.length} tables (${tables.join(", ")}); name one: sqlite_value:row:column:table:db_path`
          );
        }
        table = tables[0];
      } else {
        if (!tables.includes(requestedTable)) {
          throw new NotFoundError(
            `Table '${requestedTable}' not found. Available tables: ${tables.join(", ")}`,
            requestedTable
          );
        }
        table = requestedTable;
      }

      const columns = tableColumns(db, table);
      if (!columns.includes(column)) {
        throw new NotFoundError(
          `Column '${column}' not found in table '${table}'. Available columns: ${columns.join(", ")}`,
          column
        );
      }

      const values: unknown[] = db
        .prepare(`SELECT ${quoteIdentifier(column)} FROM ${quoteIdentifier(table)} ORDER BY rowid LIMIT 1 OFFSET ?`)
        .pluck()
        .all(row);
      if (values.length === 0) {
        const count: unknown = db.prepare(`SELECT COUNT(*) FROM ${quoteIdentifier(table)}`).pluck().get();
        throw new NotFoundError(
          `Row ${row} out of range (table '${table}' has ${renderCell(count)} rows)`,
          String(row)
        );
      }
      return renderCell(values[0]);
    });
  },
};

export const SQLITE_FUNCTIONS: readonly TemplateFunction[] = [sqliteQuery, sqliteValue];
