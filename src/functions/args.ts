/**
 * Argument parsing shared by the function families.
 */

import { ArgumentError } from "../engine/errors.js";
import type { TemplateFunction } from "./types.js";

const INTEGER = /^-?\d+$/;
const NUMBER = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Parse an integer argument.
 * @param label - Used in the message, e.g. "line number" → "Invalid line number: x"
 */
export function parseIntegerArg(value: string, label: string): number {
  if (!INTEGER.test(value)) {
    throw new ArgumentError(`Invalid ${label}: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Parse a 1-based index argument (line or word number).
 */
export function parsePositionArg(value: string, label: string): number {
  const position = parseIntegerArg(value, label);
  if (position < 1) {
    throw new ArgumentError(`Invalid ${label}: ${value} (must be 1 or greater)`);
  }
  return position;
}

/**
 * Parse a 0-based index argument (data row or cell).
 */
export function parseIndexArg(value: string, label: string): number {
  const index = parseIntegerArg(value, label);
  if (index < 0) {
    throw new ArgumentError(`Invalid ${label}: ${value} (must be 0 or greater)`);
  }
  return index;
}

/** Whether a string is a plain decimal number ("12", "-3.5", "1e3"). */
export function isNumeric(value: string): boolean {
  return NUMBER.test(value.trim());
}

/**
 * Check the argument count of a call.
 *
 *   "file_line requires exactly 2 arguments (line_number, file_path)"
 *   "sqlite_value requires 3 or 4 arguments (row, column, [table], db_path)"
 */
export function checkArity(fn: TemplateFunction, args: readonly string[]): void {
  const { min, max } = fn.arity;
  if (args.length >= min && args.length <= max) return;

  const params = fn.signature.split(":").slice(1).join(", ");
  const count =
    min === max
      ? `exactly ${min} argument${min === 1 ? "" : "s"}`
      : max === Number.POSITIVE_INFINITY
        ? `at least ${min} arguments`
        : `${min} or ${max} arguments`;
  throw new ArgumentError(`${fn.name} requires ${count} (${params}), got ${args.length}`);
}

export type ComparisonOperator = "==" | "!=" | ">" | "<" | ">=" | "<=";
export type FilterOperator = ComparisonOperator | "contains";

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ["==", "!=", ">=", "<=", ">", "<"];
export const FILTER_OPERATORS: readonly FilterOperator[] = [...COMPARISON_OPERATORS, "contains"];

export function parseFilterOperator(value: string): FilterOperator {
  const op = FILTER_OPERATORS.find((candidate) => candidate === value);
  if (op === undefined) {
    throw new ArgumentError(`Unknown operator: ${value}. Supported operators: ${FILTER_OPERATORS.join(" ")}`);
  }
  return op;
}

/**
 * Compare two rendered values. Numeric when both sides are numbers;
 * otherwise `==`, `!=` and `contains` compare strings and ordering
 * operators never match.
 */
export function compareValues(left: string, op: FilterOperator, right: string): boolean {
  if (op === "contains") return left.includes(right);

  if (isNumeric(left) && isNumeric(right)) {
    const a = Number(left);
    const b = Number(right);
    switch (op) {
      case "==":
        return a === b;
      case "!=":
        return a !== b;
      case ">":
        return a > b;
      case "<":
        return a < b;
      case ">=":
        return a >= b;
      case "<=":
        return a <= b;
    }
  }

  switch (op) {
    case "==":
      return left === right;
    case "!=":
      return left !== right;
    default:
      return false;
  }
}

/**
 * Render an aggregate. Integral results print without a fraction;
 * others keep up to ten fraction digits.
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toFixed(10)));
}
