/**
 * Function registry.
 *
 * Names map to handlers in a table built once at startup. Lookups of
 * unregistered names fail with UnknownFunctionError; nothing is resolved
 * by reflection.
 */

import { UnknownFunctionError } from "../engine/errors.js";
import { checkArity } from "./args.js";
import { CSV_FUNCTIONS } from "./csv.js";
import { SQLITE_FUNCTIONS } from "./sqlite.js";
import { JSON_FUNCTIONS, YAML_FUNCTIONS } from "./structured.js";
import { TEXT_FUNCTIONS } from "./text.js";
import type { FunctionContext, FunctionFamily, TemplateFunction } from "./types.js";

export class FunctionRegistry {
  private readonly functions = new Map<string, TemplateFunction>();

  constructor(functions: Iterable<TemplateFunction> = []) {
    for (const fn of functions) this.register(fn);
  }

  /**
   * @throws Error if the name is already registered
   */
  register(fn: TemplateFunction): this {
    if (this.functions.has(fn.name)) {
      throw new Error(`Template function already registered: ${fn.name}`);
    }
    this.functions.set(fn.name, fn);
    return this;
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  /**
   * @throws UnknownFunctionError
   */
  get(name: string): TemplateFunction {
    const fn = this.functions.get(name);
    if (!fn) throw new UnknownFunctionError(name);
    return fn;
  }

  /** Registered functions, optionally limited to one family, sorted by name. */
  list(family?: FunctionFamily): TemplateFunction[] {
    return [...this.functions.values()]
      .filter((fn) => family === undefined || fn.family === family)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Look up, check arity, and run a function.
   */
  call(name: string, args: readonly string[], context: FunctionContext): string {
    const fn = this.get(name);
    const prepared = fn.rawArguments ? args : args.map((arg) => arg.trim());
    checkArity(fn, prepared);
    return fn.evaluate(prepared, context);
  }
}

export function createDefaultRegistry(): FunctionRegistry {
  return new FunctionRegistry([
    ...TEXT_FUNCTIONS,
    ...CSV_FUNCTIONS,
    ...SQLITE_FUNCTIONS,
    ...YAML_FUNCTIONS,
    ...JSON_FUNCTIONS,
  ]);
}
