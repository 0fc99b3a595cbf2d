#!/usr/bin/env node
/**
 * CLI tool to preview a resolved question.
 *
 * Loads a definitions file, picks one question, and resolves it for one
 * sample: the question text, sandbox paths, variable bindings and, when
 * the sandbox file is already in place, the expected answer with every
 * function call's result.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Preview question 201, sample 1:
 *   npm run preview-question -- --definitions config/test-definitions.yaml --question 201
 *
 * Reproducible preview of sample 3:
 *   npm run preview-question -- --definitions config/test-definitions.yaml --question 201 --sample 3 --seed 7
 *
 * Options:
 *   --definitions <path>  YAML test definitions (required)
 *   --question <id>       question_id to preview (required)
 *   --sample <n>          Sample number (default: 1)
 *   --seed <n>            Seed for the binding session (default: SEED or unseeded)
 *   --artifacts <dir>     Value of {{artifacts}} (default: ARTIFACTS_DIR or test_artifacts)
 *   --base-dir <dir>      Directory function paths resolve against (default: BASE_DIR or .)
 *   --pools <dir>         Entity pool directory (default: ENTITY_POOL_DIR or config)
 *   --diagnose            Collect failures instead of stopping at the first
 *   --json                Output as JSON
 *   --no-color            Disable ANSI colors
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (bad arguments, invalid definitions, resolution failure,
 *       or failures reported by --diagnose)
 */

import { existsSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { parseArgs } from "node:util";

import { config, configuredLogLevel, engineConfigFrom, EngineConfigError } from "../config/index.js";
import { findDefinition, loadTestDefinitions, TestDefinitionError } from "../definitions/index.js";
import {
  TemplateEngineError,
  TemplateProcessor,
  type ResolutionIssue,
  type ResolvedTemplate,
} from "../engine/index.js";
import { EntityPoolLoader } from "../entities/index.js";
import { QuestionGenerator, type ExpectedAnswers } from "../generation/index.js";
import { createLogger, initRunId } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface PreviewOptions {
  definitionsPath: string;
  questionId: number;
  sampleNumber: number;
  seed?: number;
  artifactsDir: string | null;
  baseDir: string;
  poolDir: string;
  maxDepth?: number;
  diagnose: boolean;
}

export interface PreviewResult {
  questionId: number;
  sampleNumber: number;
  qsId: string;
  scoringType: string;
  question: string;
  targetFile?: string;
  expectedStructure?: string[];
  filesToCheck?: string[];
  fileToRead?: string;
  variables: Record<string, string>;
  /** Why the expected answer was not resolved, when it was not */
  expectedSkipped?: string;
  expected: {
    expected_response?: string;
    expected_content?: string;
  };
  functionResults: Record<string, string>;
  errors: ResolutionIssue[];
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: preview-question --definitions <path> --question <id> [options]

Options:
  --definitions <path>  YAML test definitions (required)
  --question <id>       question_id to preview (required)
  --sample <n>          Sample number (default: 1)
  --seed <n>            Seed for the binding session (default: SEED or unseeded)
  --artifacts <dir>     Value of {{artifacts}} (default: ARTIFACTS_DIR or test_artifacts)
  --base-dir <dir>      Directory function paths resolve against (default: BASE_DIR or .)
  --pools <dir>         Entity pool directory (default: ENTITY_POOL_DIR or config)
  --diagnose            Collect failures instead of stopping at the first
  --json                Output as JSON
  --no-color            Disable ANSI colors
  -h, --help            Show this help message

Exit codes:
  0 - Success
  1 - Error
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseIntegerOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new CliUsageError(`--${name} must be an integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Parse argv into preview options.
 * @returns undefined when help was requested
 * @throws CliUsageError for missing or malformed options
 */
export function parseCliArgs(argv: string[]): { options: PreviewOptions; json: boolean; color: boolean } | undefined {
  const { values } = parseArgs({
    args: argv,
    options: {
      definitions: { type: "string" },
      question: { type: "string" },
      sample: { type: "string" },
      seed: { type: "string" },
      artifacts: { type: "string" },
      "base-dir": { type: "string" },
      pools: { type: "string" },
      diagnose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) return undefined;

  if (!values.definitions) {
    throw new CliUsageError("--definitions is required");
  }
  const questionId = parseIntegerOption("question", values.question);
  if (questionId === undefined) {
    throw new CliUsageError("--question is required");
  }
  const sampleNumber = parseIntegerOption("sample", values.sample) ?? 1;
  if (sampleNumber < 1) {
    throw new CliUsageError(`--sample must be 1 or greater, got: ${sampleNumber}`);
  }

  const engine = engineConfigFrom(config);
  const seed = parseIntegerOption("seed", values.seed) ?? engine.seed;

  return {
    options: {
      definitionsPath: values.definitions,
      questionId,
      sampleNumber,
      seed,
      artifactsDir: values.artifacts ?? engine.artifactsDir,
      baseDir: values["base-dir"] ?? engine.baseDir,
      poolDir: values.pools ?? config.entityPoolDir,
      maxDepth: engine.maxDepth,
      diagnose: values.diagnose ?? false,
    },
    json: values.json ?? false,
    color: !values["no-color"],
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

let useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

// ============================================================
// Preview Logic
// ============================================================

function collectResults(templates: Array<ResolvedTemplate | undefined>): Record<string, string> {
  const results: Record<string, string> = {};
  for (const template of templates) {
    if (template) Object.assign(results, template.functionResults);
  }
  return results;
}

/**
 * Resolve one question sample. Does not print or exit.
 *
 * @throws TestDefinitionError, EntityPoolLoadError, TemplateEngineError
 */
export function runPreview(options: PreviewOptions): PreviewResult {
  const definitions = loadTestDefinitions(resolve(options.definitionsPath));
  const definition = findDefinition(definitions, options.questionId);
  if (!definition) {
    const available = definitions.map((d) => d.question_id).join(", ");
    throw new CliUsageError(`Question ${options.questionId} not found.\nAvailable questions: ${available}`);
  }
  if (options.sampleNumber > definition.samples) {
    throw new CliUsageError(
      `Question ${options.questionId} has ${definition.samples} sample(s); --sample ${options.sampleNumber} is out of range`
    );
  }

  const pools = new EntityPoolLoader(options.poolDir).load();
  const logger = createLogger({ level: configuredLogLevel(), scope: "preview" });
  const processor = new TemplateProcessor({
    pools,
    artifactsDir: options.artifactsDir,
    baseDir: options.baseDir,
    maxDepth: options.maxDepth,
    logger,
  });
  const generator = new QuestionGenerator(processor, { seed: options.seed, logger });

  const prepared = generator.prepare(definition, options.sampleNumber);

  // Expected answers read the sandbox; skip them until it exists
  let expectedSkipped: string | undefined;
  const target = prepared.targetFile;
  if (target !== undefined) {
    const targetPath = isAbsolute(target) ? target : resolve(processor.baseDir, target);
    if (!existsSync(targetPath)) {
      expectedSkipped = `sandbox file not found: ${targetPath}`;
    }
  }

  let answers: ExpectedAnswers = {};
  let errors: ResolutionIssue[] = [];
  if (expectedSkipped === undefined) {
    if (options.diagnose) {
      const diagnosis = prepared.diagnose();
      answers = diagnosis;
      errors = diagnosis.errors;
    } else {
      answers = prepared.resolveExpected();
    }
  }

  return {
    questionId: prepared.questionId,
    sampleNumber: prepared.sampleNumber,
    qsId: prepared.qsId,
    scoringType: definition.scoring_type,
    question: prepared.question.substituted,
    targetFile: prepared.targetFile,
    expectedStructure: prepared.expectedStructure,
    filesToCheck: prepared.filesToCheck,
    fileToRead: prepared.fileToRead,
    variables: prepared.variables,
    expectedSkipped,
    expected: {
      expected_response: answers.expected_response?.substituted,
      expected_content: answers.expected_content?.substituted,
    },
    functionResults: collectResults([
      prepared.question,
      answers.expected_response,
      answers.expected_content,
    ]),
    errors,
  };
}

function printList(label: string, items: string[] | undefined): void {
  if (!items || items.length === 0) return;
  console.log(`  ${c("cyan", label)}`);
  for (const item of items) console.log(`    ${item}`);
}

function printPreview(result: PreviewResult): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` Question ${result.questionId} / sample ${result.sampleNumber} (${result.qsId})`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
  console.log(`  ${c("cyan", "Scoring:")}     ${result.scoringType}`);
  if (result.targetFile) console.log(`  ${c("cyan", "Target file:")} ${result.targetFile}`);
  if (result.fileToRead) console.log(`  ${c("cyan", "File to read:")} ${result.fileToRead}`);
  printList("Expected structure:", result.expectedStructure);
  printList("Files to check:", result.filesToCheck);

  const variables = Object.entries(result.variables);
  if (variables.length > 0) {
    console.log(`  ${c("cyan", "Variables:")}`);
    for (const [key, value] of variables) console.log(`    ${key} = ${value}`);
  }

  console.log("");
  console.log("─".repeat(60));
  console.log(result.question);
  console.log("─".repeat(60));

  if (result.expectedSkipped) {
    console.log(c("yellow", `Expected answer not resolved (${result.expectedSkipped})`));
  } else {
    for (const [field, value] of Object.entries(result.expected)) {
      if (value !== undefined) console.log(`${c("cyan", `${field}:`)} ${value}`);
    }
  }

  const calls = Object.entries(result.functionResults);
  if (calls.length > 0) {
    console.log("");
    console.log(c("bold", "Function results:"));
    for (const [call, value] of calls) {
      const color = value.startsWith("ERROR: ") ? "red" : "dim";
      console.log(`  ${call} ${c(color, `→ ${value}`)}`);
    }
  }

  if (result.errors.length > 0) {
    console.log("");
    console.log(c("red", `${result.errors.length} failure(s):`));
    for (const issue of result.errors) {
      const where = issue.expression ? `${issue.expression} ` : "";
      console.log(c("red", `  - [${issue.kind}] ${where}${issue.message}`));
    }
  }
  console.log("");
}

// ============================================================
// Main
// ============================================================

function describeError(err: unknown): string {
  if (err instanceof TestDefinitionError || err instanceof EngineConfigError) return err.format();
  if (err instanceof TemplateEngineError) return err.describe();
  return err instanceof Error ? err.message : String(err);
}

async function main(): Promise<void> {
  initRunId();
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed === undefined) {
    console.log(HELP);
    process.exit(0);
    return;
  }

  if (!parsed.color) {
    useColors = false;
  }

  const result = runPreview(parsed.options);

  if (parsed.json) {
    console.log(JSON.stringify({ mode: "preview", ...result }, null, 2));
  } else {
    printPreview(result);
  }

  process.exit(result.errors.length > 0 ? 1 : 0);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("preview-question.ts") ||
   process.argv[1].endsWith("preview-question.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(c("red", `Error: ${describeError(err)}`));
    if (err instanceof CliUsageError) console.error(HELP);
    process.exit(1);
  });
}
