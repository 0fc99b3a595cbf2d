/**
 * Question generation.
 *
 * One generation unit is a (question_id, sample_number) pair. The unit
 * gets one binding session, and every field of its definition resolves
 * against that session, so `{{entity1}}` names the same thing in the
 * question, the sandbox paths and the expected answer.
 *
 * Generation runs in two phases:
 *
 *   prepare()            sandbox target file, expected structure, files
 *                        to check, file to read, then the question text
 *   (external)           sandbox generators create the files
 *   resolveExpected()    expected response/content, whose function calls
 *                        read the files created in between
 */

import type { TestDefinition, SandboxSetup } from "../definitions/schema.js";
import type { ResolutionIssue } from "../engine/errors.js";
import type { ResolveContext, ResolvedTemplate, TemplateProcessor } from "../engine/processor.js";
import { PathResolver } from "../engine/paths.js";
import type { VariableBindingSession } from "../engine/session.js";
import { silentLogger, type Logger } from "../logging/logger.js";

const EXPECTED_STRUCTURE_PLACEHOLDER = /\{\{\s*expected_structure\s*\}\}/g;

export type ExpectedField = "expected_response" | "expected_content";
const EXPECTED_FIELDS: readonly ExpectedField[] = ["expected_response", "expected_content"];

export interface GeneratorOptions {
  /** Seed every unit's session with this value */
  seed?: number;
  logger?: Logger;
}

export interface ExpectedAnswers {
  expected_response?: ResolvedTemplate;
  expected_content?: ResolvedTemplate;
}

export interface ExpectedDiagnosis extends ExpectedAnswers {
  errors: ResolutionIssue[];
}

/**
 * Sample numbers of a definition, 1-based.
 */
export function samplesFor(definition: Pick<TestDefinition, "samples">): number[] {
  return Array.from({ length: definition.samples }, (_, index) => index + 1);
}

/**
 * Expand `{{expected_structure}}` in a question to the resolved entries.
 */
export function expandExpectedStructure(template: string, structure: readonly string[] | undefined): string {
  if (structure === undefined) return template;
  const expanded = structure.join(", ");
  return template.replace(EXPECTED_STRUCTURE_PLACEHOLDER, () => expanded);
}

export class PreparedQuestion {
  readonly qsId: string;

  constructor(
    private readonly processor: TemplateProcessor,
    readonly definition: TestDefinition,
    readonly sampleNumber: number,
    readonly session: VariableBindingSession,
    readonly question: ResolvedTemplate,
    readonly targetFile: string | undefined,
    readonly sandboxSetup: SandboxSetup | undefined,
    readonly expectedStructure: string[] | undefined,
    readonly filesToCheck: string[] | undefined,
    readonly fileToRead: string | undefined
  ) {
    this.qsId = PathResolver.qsId(definition.question_id, sampleNumber);
  }

  get questionId(): number {
    return this.definition.question_id;
  }

  /** Every variable bound for this unit so far. */
  get variables(): Record<string, string> {
    return this.session.entries();
  }

  private context(): ResolveContext {
    return {
      questionId: this.definition.question_id,
      sampleNumber: this.sampleNumber,
      session: this.session,
      targetFile: this.targetFile,
    };
  }

  /**
   * Resolve the expected answer fields. Call after the sandbox exists.
   * @throws TemplateEngineError on the first failure
   */
  resolveExpected(): ExpectedAnswers {
    return this.processor.resolveFields(this.definition, EXPECTED_FIELDS, this.context());
  }

  /**
   * Resolve the expected answer fields, collecting failures.
   */
  diagnose(): ExpectedDiagnosis {
    const diagnosis: ExpectedDiagnosis = { errors: [] };
    for (const field of EXPECTED_FIELDS) {
      const template = this.definition[field];
      if (template === undefined) continue;
      const resolved = this.processor.diagnose(template, this.context());
      diagnosis[field] = resolved;
      diagnosis.errors.push(...resolved.errors);
    }
    return diagnosis;
  }
}

export class QuestionGenerator {
  private readonly seed: number | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly processor: TemplateProcessor,
    options: GeneratorOptions = {}
  ) {
    this.seed = options.seed;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve everything about one unit that does not depend on sandbox
   * contents.
   *
   * @throws TemplateEngineError if any field fails to resolve
   */
  prepare(definition: TestDefinition, sampleNumber: number): PreparedQuestion {
    const session = this.processor.createSession(this.seed);
    const base: ResolveContext = {
      questionId: definition.question_id,
      sampleNumber,
      session,
    };
    const text = (template: string, targetFile?: string): string =>
      this.processor.resolve(template, { ...base, targetFile }).substituted;

    const setup = definition.sandbox_setup;
    const targetTemplate = setup?.target_file;
    const targetFile = targetTemplate !== undefined ? text(targetTemplate) : undefined;
    const sandboxSetup = setup !== undefined ? { ...setup, target_file: targetFile } : undefined;

    const expectedStructure = definition.expected_structure?.map((entry) => text(entry, targetFile));
    const filesToCheck = definition.files_to_check?.map((entry) => text(entry, targetFile));
    const fileToReadTemplate = definition.file_to_read;
    const fileToRead = fileToReadTemplate !== undefined ? text(fileToReadTemplate, targetFile) : undefined;

    const question = this.processor.resolve(expandExpectedStructure(definition.template, expectedStructure), {
      ...base,
      targetFile,
    });

    this.logger.debug("Prepared question", {
      questionId: definition.question_id,
      sampleNumber,
      targetFile,
      variables: session.size,
    });

    return new PreparedQuestion(
      this.processor,
      definition,
      sampleNumber,
      session,
      question,
      targetFile,
      sandboxSetup,
      expectedStructure,
      filesToCheck,
      fileToRead
    );
  }

  /**
   * Prepare every sample of a definition. Each sample gets its own session.
   */
  prepareAll(definition: TestDefinition): PreparedQuestion[] {
    return samplesFor(definition).map((sample) => this.prepare(definition, sample));
  }
}
