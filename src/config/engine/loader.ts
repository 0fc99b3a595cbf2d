/**
 * Engine configuration loader and validator.
 *
 * Validates against the schema, reports every issue at once, and freezes
 * the result.
 */

import type { ZodIssue } from "zod";
import { EngineConfigSchema, type EngineConfig } from "./schema.js";

/**
 * Structured validation error for engine configuration.
 */
export class EngineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Engine configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code */
  code: string;
}

export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load engine configuration.
 *
 * @param input - Raw configuration object
 * @returns Validated, frozen configuration
 * @throws EngineConfigError if validation fails
 */
export function loadEngineConfig(input: unknown): Readonly<EngineConfig> {
  const result = EngineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new EngineConfigError(
      `Invalid engine configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate engine configuration without loading it.
 */
export function validateEngineConfig(input: unknown): {
  success: boolean;
  config?: EngineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = EngineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
