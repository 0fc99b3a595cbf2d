/**
 * CSV functions.
 *
 * The first line is the header. Row numbers count data rows from 0, so
 * row 0 is the line right after the header. Columns are addressed by
 * header name, except in csv_cell which takes a 0-based column index.
 */

import { NotFoundError, SourceFormatError } from "../engine/errors.js";
import {
  compareValues,
  formatNumber,
  isNumeric,
  parseFilterOperator,
  parseIndexArg,
  type FilterOperator,
} from "./args.js";
import { readCsvSource, type CsvTable } from "./sources.js";
import type { FunctionContext, TemplateFunction } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function loadTable(path: string, ctx: FunctionContext): CsvTable {
  const resolved = ctx.resolveSourcePath(path);
  const table = readCsvSource(resolved);
  if (table.headers.length === 0) {
    throw new SourceFormatError(`CSV file is empty: ${resolved}`, resolved);
  }
  return table;
}

function columnIndex(table: CsvTable, header: string): number {
  const index = table.headers.indexOf(header);
  if (index === -1) {
    throw new NotFoundError(
      `Header '${header}' not found in CSV. Available headers: ${table.headers.join(", ")}`,
      header
    );
  }
  return index;
}

function dataRow(table: CsvTable, row: number): string[] {
  if (row >= table.rows.length) {
    throw new NotFoundError(
      `Row ${row} out of range (CSV has ${table.rows.length} data rows)`,
      String(row)
    );
  }
  return table.rows[row];
}

function cell(row: string[], index: number): string {
  return index < row.length ? row[index] : "";
}

function column(table: CsvTable, header: string): string[] {
  const index = columnIndex(table, header);
  return table.rows.map((row) => cell(row, index));
}

interface RowFilter {
  header: string;
  op: FilterOperator;
  value: string;
}

function filterRows(table: CsvTable, filter: RowFilter): string[][] {
  const index = columnIndex(table, filter.header);
  return table.rows.filter((row) => compareValues(cell(row, index).trim(), filter.op, filter.value));
}

/**
 * Numbers of one column across `rows`. Empty cells are skipped; any
 * other non-numeric cell is a format error.
 */
function numericValues(table: CsvTable, rows: string[][], header: string): number[] {
  const index = columnIndex(table, header);
  const values: number[] = [];
  for (const row of rows) {
    const raw = cell(row, index).trim();
    if (raw === "") continue;
    if (!isNumeric(raw)) {
      throw new SourceFormatError(`Non-numeric value '${raw}' in column '${header}'`);
    }
    values.push(Number(raw));
  }
  return values;
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function average(values: number[], header: string): number {
  if (values.length === 0) {
    throw new NotFoundError(`No numeric values in column '${header}'`, header);
  }
  return sum(values) / values.length;
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

export const csvCell: TemplateFunction = {
  name: "csv_cell",
  family: "csv",
  arity: { min: 3, max: 3 },
  signature: "csv_cell:row:column:file_path",
  evaluate([rowArg, columnArg, path], ctx) {
    const row = parseIndexArg(rowArg, "row number");
    const col = parseIndexArg(columnArg, "column number");
    const cells = dataRow(loadTable(path, ctx), row);
    if (col >= cells.length) {
      throw new NotFoundError(
        `Column ${col} out of range (row ${row} has ${cells.length} columns)`,
        String(col)
      );
    }
    return cells[col];
  },
};

export const csvRow: TemplateFunction = {
  name: "csv_row",
  family: "csv",
  arity: { min: 2, max: 2 },
  signature: "csv_row:row:file_path",
  evaluate([rowArg, path], ctx) {
    const row = parseIndexArg(rowArg, "row number");
    return dataRow(loadTable(path, ctx), row).join(",");
  },
};

export const csvColumn: TemplateFunction = {
  name: "csv_column",
  family: "csv",
  arity: { min: 2, max: 2 },
  signature: "csv_column:header:file_path",
  evaluate([header, path], ctx) {
    return column(loadTable(path, ctx), header).join(",");
  },
};

export const csvValue: TemplateFunction = {
  name: "csv_value",
  family: "csv",
  arity: { min: 3, max: 3 },
  signature: "csv_value:row:header:file_path",
  evaluate([rowArg, header, path], ctx) {
    const row = parseIndexArg(rowArg, "row number");
    const table = loadTable(path, ctx);
    const index = columnIndex(table, header);
    return cell(dataRow(table, row), index);
  },
};

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

export const csvCount: TemplateFunction = {
  name: "csv_count",
  family: "csv",
  arity: { min: 2, max: 2 },
  signature: "csv_count:header:file_path",
  evaluate([header, path], ctx) {
    const values = column(loadTable(path, ctx), header);
    return String(values.filter((value) => value.trim() !== "").length);
  },
};

export const csvSum: TemplateFunction = {
  name: "csv_sum",
  family: "csv",
  arity: { min: 2, max: 2 },
  signature: "csv_sum:header:file_path",
  evaluate([header, path], ctx) {
    const table = loadTable(path, ctx);
    return formatNumber(sum(numericValues(table, table.rows, header)));
  },
};

export const csvAvg: TemplateFunction = {
  name: "csv_avg",
  family: "csv",
  arity: { min: 2, max: 2 },
  signature: "csv_avg:header:file_path",
  evaluate([header, path], ctx) {
    const table = loadTable(path, ctx);
    return formatNumber(average(numericValues(table, table.rows, header), header));
  },
};

export const csvCountWhere: TemplateFunction = {
  name: "csv_count_where",
  family: "csv",
  arity: { min: 4, max: 4 },
  signature: "csv_count_where:filter_header:operator:value:file_path",
  evaluate([filterHeader, opArg, value, path], ctx) {
    const op = parseFilterOperator(opArg);
    const table = loadTable(path, ctx);
    return String(filterRows(table, { header: filterHeader, op, value }).length);
  },
};

export const csvSumWhere: TemplateFunction = {
  name: "csv_sum_where",
  family: "csv",
  arity: { min: 5, max: 5 },
  signature: "csv_sum_where:target_header:filter_header:operator:value:file_path",
  evaluate([target, filterHeader, opArg, value, path], ctx) {
    const op = parseFilterOperator(opArg);
    const table = loadTable(path, ctx);
    const rows = filterRows(table, { header: filterHeader, op, value });
    return formatNumber(sum(numericValues(table, rows, target)));
  },
};

export const csvAvgWhere: TemplateFunction = {
  name: "csv_avg_where",
  family: "csv",
  arity: { min: 5, max: 5 },
  signature: "csv_avg_where:target_header:filter_header:operator:value:file_path",
  evaluate([target, filterHeader, opArg, value, path], ctx) {
    const op = parseFilterOperator(opArg);
    const table = loadTable(path, ctx);
    const rows = filterRows(table, { header: filterHeader, op, value });
    return formatNumber(average(numericValues(table, rows, target), target));
  },
};

export const CSV_FUNCTIONS: readonly TemplateFunction[] = [
  csvCell,
  csvRow,
  csvColumn,
  csvValue,
  csvCount,
  csvSum,
  csvAvg,
  csvCountWhere,
  csvSumWhere,
  csvAvgWhere,
];
