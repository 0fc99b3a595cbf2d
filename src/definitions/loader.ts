/**
 * Test definition loader.
 *
 * Parses a YAML definitions file, validates every entry, and reports all
 * problems at once.
 */

import { existsSync, readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";

import { formatZodIssues, type ConfigValidationIssue } from "../config/engine/loader.js";
import { TestDefinitionFileSchema, type TestDefinition } from "./schema.js";

export class TestDefinitionError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(
    message: string,
    issues: ConfigValidationIssue[],
    public readonly source?: string
  ) {
    super(message);
    this.name = "TestDefinitionError";
    this.issues = issues;
  }

  format(): string {
    const header = this.source
      ? `Test definitions in ${this.source} are invalid:`
      : "Test definitions are invalid:";
    if (this.issues.length === 0) return `${header}\n  - ${this.message}`;
    const lines = [header];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Validate already-parsed definitions data (the object under a YAML
 * document root).
 *
 * @throws TestDefinitionError listing every issue
 */
export function parseTestDefinitions(raw: unknown, source?: string): TestDefinition[] {
  const result = TestDefinitionFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new TestDefinitionError(
      `Invalid test definitions: ${issues.length} validation error(s)`,
      issues,
      source
    );
  }
  return result.data.tests;
}

/**
 * Parse definitions from YAML text.
 */
export function parseTestDefinitionsYaml(text: string, source?: string): TestDefinition[] {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new TestDefinitionError(
      `Invalid YAML${source ? ` in ${source}` : ""}: ${err instanceof Error ? err.message : String(err)}`,
      [],
      source
    );
  }
  return parseTestDefinitions(raw, source);
}

/**
 * Load definitions from a YAML file.
 */
export function loadTestDefinitions(path: string): TestDefinition[] {
  if (!existsSync(path)) {
    throw new TestDefinitionError(`Test definition file not found: ${path}`, [], path);
  }
  return parseTestDefinitionsYaml(readFileSync(path, "utf-8"), path);
}

/**
 * Find one definition by question ID.
 */
export function findDefinition(
  definitions: readonly TestDefinition[],
  questionId: number
): TestDefinition | undefined {
  return definitions.find((definition) => definition.question_id === questionId);
}
