/**
 * Template function library.
 */

export type { Arity, FunctionContext, FunctionFamily, TemplateFunction } from "./types.js";
export { FunctionRegistry, createDefaultRegistry } from "./registry.js";
export {
  checkArity,
  compareValues,
  parseFilterOperator,
  parseIntegerArg,
  type ComparisonOperator,
  type FilterOperator,
} from "./args.js";
export { TEXT_FUNCTIONS } from "./text.js";
export { CSV_FUNCTIONS } from "./csv.js";
export { SQLITE_FUNCTIONS, queryScalar } from "./sqlite.js";
export { YAML_FUNCTIONS, JSON_FUNCTIONS } from "./structured.js";
export { parsePath, queryPath, renderValue, type PathSegment, type PathResult } from "./path-query.js";
