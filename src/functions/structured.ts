/**
 * YAML and JSON functions. Both families share one implementation over
 * the parsed document; only the reader differs.
 *
 *   {prefix}_path:$.expr:file         value(s) at a path expression
 *   {prefix}_value:dotted.key:file    value at a dotted key path
 *   {prefix}_count:$.expr:file        items in an array, keys in an object
 *   {prefix}_keys:$.expr:file         comma-joined object keys
 *   {prefix}_collect:$.expr:file      comma-joined selected values
 *   {prefix}_sum|avg|max|min          numeric aggregate of selected values
 *   {prefix}_filter:$.expr:file       comma-joined values after a [?…] filter
 *   {prefix}_count_where:$.expr:file  number of values a [?…] filter keeps
 *   {prefix}_exists:$.expr:file       "true" or "false"
 */

import { ArgumentError, NotFoundError, SourceFormatError } from "../engine/errors.js";
import { formatNumber, isNumeric } from "./args.js";
import {
  evaluateSegments,
  isRecord,
  parseDottedPath,
  parsePath,
  queryPath,
  renderValue,
  selectedItems,
  type PathResult,
} from "./path-query.js";
import { readJsonSource, readYamlSource } from "./sources.js";
import type { FunctionContext, FunctionFamily, TemplateFunction } from "./types.js";

type DocumentReader = (path: string) => unknown;
type StructuredFamily = Extract<FunctionFamily, "yaml" | "json">;

type Operation = (result: PathResult, expression: string) => string;

function numbersOf(result: PathResult, expression: string): number[] {
  return selectedItems(result).map((item) => {
    if (typeof item === "number") return item;
    if (typeof item === "string" && isNumeric(item)) return Number(item);
    throw new SourceFormatError(`Non-numeric value '${renderValue(item)}' selected by ${expression}`);
  });
}

function requireNumbers(result: PathResult, expression: string): number[] {
  const numbers = numbersOf(result, expression);
  if (numbers.length === 0) {
    throw new NotFoundError(`No values selected by ${expression}`, expression);
  }
  return numbers;
}

function single(result: PathResult, expression: string): unknown {
  if (result.multi || result.values.length !== 1) {
    throw new ArgumentError(`${expression} selects ${result.values.length} values, expected one`);
  }
  return result.values[0];
}

const joinItems: Operation = (result) => selectedItems(result).map(renderValue).join(",");

const OPERATIONS: Record<string, Operation> = {
  path: (result) =>
    result.multi ? result.values.map(renderValue).join(",") : renderValue(result.values[0]),
  count: (result, expression) => {
    if (result.multi) return String(result.values.length);
    const value = single(result, expression);
    if (Array.isArray(value)) return String(value.length);
    if (isRecord(value)) return String(Object.keys(value).length);
    throw new ArgumentError(`${expression} is not an array or object`);
  },
  keys: (result, expression) => {
    const value = single(result, expression);
    if (!isRecord(value)) {
      throw new ArgumentError(`${expression} is not an object`);
    }
    return Object.keys(value).join(",");
  },
  collect: joinItems,
  filter: joinItems,
  count_where: (result) => String(selectedItems(result).length),
  sum: (result, expression) => formatNumber(numbersOf(result, expression).reduce((a, b) => a + b, 0)),
  avg: (result, expression) => {
    const numbers = requireNumbers(result, expression);
    return formatNumber(numbers.reduce((a, b) => a + b, 0) / numbers.length);
  },
  max: (result, expression) => formatNumber(Math.max(...requireNumbers(result, expression))),
  min: (result, expression) => formatNumber(Math.min(...requireNumbers(result, expression))),
};

function makeFunction(
  family: StructuredFamily,
  read: DocumentReader,
  operation: string,
  run: (document: unknown, query: string) => string,
  argName: string
): TemplateFunction {
  const name = `${family}_${operation}`;
  return {
    name,
    family,
    arity: { min: 2, max: 2 },
    signature: `${name}:${argName}:file_path`,
    evaluate([query, path], ctx: FunctionContext) {
      // Parse the query before touching the file
      parsePathFor(operation, query);
      return run(read(ctx.resolveSourcePath(path)), query);
    },
  };
}

function parsePathFor(operation: string, query: string): void {
  if (operation === "value") {
    parseDottedPath(query);
  } else {
    parsePath(query);
  }
}

/**
 * Build the twelve functions of one structured family.
 */
function structuredFunctions(family: StructuredFamily, read: DocumentReader): TemplateFunction[] {
  const functions: TemplateFunction[] = [];

  functions.push(
    makeFunction(
      family,
      read,
      "value",
      (document, key) => renderValue(evaluateSegments(document, parseDottedPath(key)).values[0]),
      "key_path"
    )
  );

  for (const [operation, run] of Object.entries(OPERATIONS)) {
    functions.push(
      makeFunction(family, read, operation, (document, expression) => run(queryPath(document, expression), expression), "path")
    );
  }

  functions.push(
    makeFunction(
      family,
      read,
      "exists",
      (document, expression) => {
        try {
          return queryPath(document, expression).values.length > 0 ? "true" : "false";
        } catch (err) {
          if (err instanceof NotFoundError) return "false";
          throw err;
        }
      },
      "path"
    )
  );

  return functions;
}

export const YAML_FUNCTIONS: readonly TemplateFunction[] = structuredFunctions("yaml", readYamlSource);
export const JSON_FUNCTIONS: readonly TemplateFunction[] = structuredFunctions("json", readJsonSource);
