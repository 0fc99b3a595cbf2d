/**
 * Path expressions over parsed YAML/JSON documents.
 *
 *   $                        document root
 *   $.users                  object key
 *   $.users[0]               array index (negative counts from the end)
 *   $.users[*].name          every element
 *   $['odd key']             quoted key
 *   $.users[?age>=30].name   elements whose field passes a comparison
 *
 * Dotted key paths (`database.port`, `users.0.name`) are a shorthand where
 * numeric segments index arrays.
 *
 * Once a wildcard or filter has fanned out, elements missing a later key
 * are skipped. Before that, a missing key is a NotFoundError.
 */

import { ArgumentError, NotFoundError } from "../engine/errors.js";
import { compareValues, type ComparisonOperator } from "./args.js";

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

export type PathSegment =
  | { type: "key"; name: string }
  | { type: "index"; index: number }
  | { type: "wildcard" }
  | { type: "filter"; field: string; op: ComparisonOperator; value: string };

const FILTER = /^\?\s*\(?\s*@?\.?([\w.]+)\s*(==|!=|>=|<=|>|<)\s*(.*?)\s*\)?$/;
const KEY_CHARS = /^[^.[\]]+/;

function unquote(value: string): string {
  const match = /^(['"])(.*)\1$/.exec(value);
  return match ? match[2] : value;
}

function parseComparison(op: string): ComparisonOperator {
  switch (op) {
    case "==":
    case "!=":
    case ">":
    case "<":
    case ">=":
    case "<=":
      return op;
    default:
      throw new ArgumentError(`Unknown operator: ${op}`);
  }
}

function parseBracket(inner: string, expression: string): PathSegment {
  const content = inner.trim();
  if (content === "*") return { type: "wildcard" };
  if (/^-?\d+$/.test(content)) return { type: "index", index: parseInt(content, 10) };
  if (/^(['"]).*\1$/.test(content)) return { type: "key", name: unquote(content) };

  const filter = FILTER.exec(content);
  if (filter) {
    return {
      type: "filter",
      field: filter[1],
      op: parseComparison(filter[2]),
      value: unquote(filter[3]),
    };
  }
  throw new ArgumentError(`Invalid path expression: ${expression} (cannot parse [${inner}])`);
}

/**
 * Parse a `$`-rooted path expression.
 * @throws ArgumentError for malformed expressions
 */
export function parsePath(expression: string): PathSegment[] {
  const source = expression.trim();
  if (!source.startsWith("$")) {
    throw new ArgumentError(`Invalid path expression: ${expression} (must start with $)`);
  }

  const segments: PathSegment[] = [];
  let rest = source.slice(1);

  while (rest.length > 0) {
    if (rest.startsWith("[")) {
      const close = rest.indexOf("]");
      if (close === -1) {
        throw new ArgumentError(`Invalid path expression: ${expression} (unclosed [)`);
      }
      segments.push(parseBracket(rest.slice(1, close), expression));
      rest = rest.slice(close + 1);
    } else if (rest.startsWith(".")) {
      rest = rest.slice(1);
      if (rest.startsWith("*")) {
        segments.push({ type: "wildcard" });
        rest = rest.slice(1);
        continue;
      }
      const key = KEY_CHARS.exec(rest);
      if (!key) {
        throw new ArgumentError(`Invalid path expression: ${expression} (empty key)`);
      }
      segments.push({ type: "key", name: key[0] });
      rest = rest.slice(key[0].length);
    } else {
      throw new ArgumentError(`Invalid path expression: ${expression} (unexpected '${rest[0]}')`);
    }
  }

  return segments;
}

/**
 * Parse a dotted key path such as `users.0.name`.
 */
export function parseDottedPath(path: string): PathSegment[] {
  const trimmed = path.trim();
  if (trimmed === "") {
    throw new ArgumentError("Key path must not be empty");
  }
  return trimmed.split(".").map((part): PathSegment => {
    if (part === "") {
      throw new ArgumentError(`Invalid key path: ${path} (empty segment)`);
    }
    return { type: "key", name: part };
  });
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export interface PathResult {
  values: unknown[];
  /** True once a wildcard or filter has been applied */
  multi: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Render a document value as template output.
 */
export function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value === null) return "null";
  if (value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

function lookupKey(value: unknown, name: string): { found: boolean; value?: unknown } {
  if (isRecord(value) && Object.prototype.hasOwnProperty.call(value, name)) {
    return { found: true, value: value[name] };
  }
  // Numeric keys address arrays in dotted paths
  if (Array.isArray(value) && /^\d+$/.test(name)) {
    const index = parseInt(name, 10);
    if (index < value.length) return { found: true, value: value[index] };
  }
  return { found: false };
}

function fieldValue(element: unknown, field: string): { found: boolean; value?: unknown } {
  let current: unknown = element;
  for (const part of field.split(".")) {
    const next = lookupKey(current, part);
    if (!next.found) return { found: false };
    current = next.value;
  }
  return { found: true, value: current };
}

function applySegment(values: unknown[], segment: PathSegment, multi: boolean): unknown[] {
  const out: unknown[] = [];

  for (const value of values) {
    switch (segment.type) {
      case "key": {
        const next = lookupKey(value, segment.name);
        if (next.found) {
          out.push(next.value);
        } else if (!multi) {
          throw new NotFoundError(`Key '${segment.name}' not found`, segment.name);
        }
        break;
      }
      case "index": {
        if (!Array.isArray(value)) {
          if (!multi) throw new NotFoundError(`Index [${segment.index}] applied to a non-array value`, `[${segment.index}]`);
          break;
        }
        const index = segment.index < 0 ? value.length + segment.index : segment.index;
        if (index >= 0 && index < value.length) {
          out.push(value[index]);
        } else if (!multi) {
          throw new NotFoundError(
            `Index ${segment.index} out of range (array has ${value.length} items)`,
            `[${segment.index}]`
          );
        }
        break;
      }
      case "wildcard": {
        if (Array.isArray(value)) {
          out.push(...value);
        } else if (isRecord(value)) {
          out.push(...Object.values(value));
        } else if (!multi) {
          throw new NotFoundError("Wildcard [*] applied to a scalar value", "[*]");
        }
        break;
      }
      case "filter": {
        const elements = Array.isArray(value) ? value : isRecord(value) ? Object.values(value) : undefined;
        if (elements === undefined) {
          if (!multi) throw new NotFoundError("Filter applied to a scalar value", `[?${segment.field}]`);
          break;
        }
        for (const element of elements) {
          const field = fieldValue(element, segment.field);
          if (field.found && compareValues(renderValue(field.value), segment.op, segment.value)) {
            out.push(element);
          }
        }
        break;
      }
    }
  }

  return out;
}

export function evaluateSegments(document: unknown, segments: PathSegment[]): PathResult {
  let values: unknown[] = [document];
  let multi = false;

  for (const segment of segments) {
    values = applySegment(values, segment, multi);
    if (segment.type === "wildcard" || segment.type === "filter") multi = true;
  }

  return { values, multi };
}

export function queryPath(document: unknown, expression: string): PathResult {
  return evaluateSegments(document, parsePath(expression));
}

/**
 * Values a query selects, with a single array result spread into its
 * elements. Aggregates and list functions work on this.
 */
export function selectedItems(result: PathResult): unknown[] {
  const [only] = result.values;
  if (!result.multi && result.values.length === 1 && Array.isArray(only)) {
    return only;
  }
  return result.values;
}
