/**
 * Template processor.
 *
 * Resolves one template string for one generation unit. Processing
 * pipeline:
 *
 *   1. `{{qs_id}}` → q{question_id}_s{sample_number}
 *   2. `{{artifacts}}` → artifacts base directory
 *   3. entity, semantic and number variables, bound through the session
 *   4. function calls, innermost first, with TARGET_FILE substituted per
 *      argument
 *
 * `resolve()` raises on the first failure. `diagnose()` runs the same
 * pipeline and collects every failure in `errors`, leaving the failed
 * expressions in the text.
 */

import type { EntityPools } from "../entities/pool.js";
import { createDefaultRegistry, type FunctionRegistry } from "../functions/registry.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { TemplateEngineError, toIssue, type ResolutionIssue } from "./errors.js";
import { FunctionEngine } from "./evaluator.js";
import { PathResolver } from "./paths.js";
import { VariableBindingSession } from "./session.js";
import { VariableResolver } from "./variables.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProcessorOptions {
  pools: EntityPools;
  /** Defaults to every built-in function */
  registry?: FunctionRegistry;
  /** `{{artifacts}}` value; omitted → "test_artifacts", null → disabled */
  artifactsDir?: string | null;
  /** Directory relative function paths resolve against */
  baseDir?: string;
  maxDepth?: number;
  logger?: Logger;
}

export interface ResolveContext {
  questionId: number;
  sampleNumber: number;
  session: VariableBindingSession;
  /** Binding for TARGET_FILE in function arguments */
  targetFile?: string;
}

export interface ResolvedTemplate {
  original: string;
  substituted: string;
  /** Variable key → value for the variables this template used */
  variables: Record<string, string>;
  /** Function call text → result ("ERROR: …" for failures in diagnose mode) */
  functionResults: Record<string, string>;
  /** Failures collected by `diagnose()`; always empty from `resolve()` */
  errors: ResolutionIssue[];
}

// ---------------------------------------------------------------------------
// Processor
// ---------------------------------------------------------------------------

export class TemplateProcessor {
  readonly pools: EntityPools;
  readonly registry: FunctionRegistry;
  private readonly variables: VariableResolver;
  private readonly functions: FunctionEngine;
  private readonly paths: PathResolver;
  private readonly logger: Logger;

  constructor(options: ProcessorOptions) {
    this.pools = options.pools;
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = options.logger ?? silentLogger;
    this.variables = new VariableResolver(this.pools);
    this.paths = new PathResolver({ artifactsDir: options.artifactsDir });
    this.functions = new FunctionEngine(this.registry, {
      baseDir: options.baseDir,
      maxDepth: options.maxDepth,
      logger: this.logger.child("functions"),
    });
  }

  get artifactsDir(): string | null {
    return this.paths.artifactsDir;
  }

  get baseDir(): string {
    return this.functions.baseDir;
  }

  /**
   * New binding session for one generation unit.
   */
  createSession(seed?: number): VariableBindingSession {
    return new VariableBindingSession(seed !== undefined ? { seed } : {});
  }

  /**
   * Resolve a template.
   * @throws TemplateEngineError on the first failure
   */
  resolve(template: string, context: ResolveContext): ResolvedTemplate {
    const paths = this.paths.withTargetFile(context.targetFile);

    let text = PathResolver.substituteQsId(template, context.questionId, context.sampleNumber);
    text = paths.substituteArtifacts(text);

    const { text: withVariables, variables } = this.variables.substitute(text, context.session);
    const evaluated = this.functions.evaluate(withVariables, paths);

    return {
      original: template,
      substituted: evaluated.output,
      variables,
      functionResults: evaluated.results,
      errors: [],
    };
  }

  /**
   * Resolve a template without raising. Every failure is recorded in
   * `errors`; function failures also appear in `functionResults`.
   */
  diagnose(template: string, context: ResolveContext): ResolvedTemplate {
    const errors: ResolutionIssue[] = [];
    const paths = this.paths.withTargetFile(context.targetFile);

    const capture = <T>(step: () => T, fallback: T): T => {
      try {
        return step();
      } catch (err) {
        if (!(err instanceof TemplateEngineError)) throw err;
        errors.push(toIssue(err));
        this.logger.warn("Template resolution failed", { kind: err.kind, message: err.message });
        return fallback;
      }
    };

    let text = capture(
      () => PathResolver.substituteQsId(template, context.questionId, context.sampleNumber),
      template
    );
    text = capture(() => paths.substituteArtifacts(text), text);

    const { text: withVariables, variables } = this.variables.substitute(text, context.session, {
      onError: (error) => {
        errors.push(toIssue(error));
        this.logger.warn("Variable resolution failed", { expression: error.expression, message: error.message });
      },
    });

    const evaluated = this.functions.evaluateCollecting(withVariables, paths);

    return {
      original: template,
      substituted: evaluated.output,
      variables,
      functionResults: evaluated.results,
      errors: [...errors, ...evaluated.errors],
    };
  }

  /**
   * Resolve several fields of one unit against the same session, in
   * order. Missing fields are skipped.
   */
  resolveFields<K extends string>(
    fields: Partial<Record<K, string>>,
    order: readonly K[],
    context: ResolveContext
  ): Partial<Record<K, ResolvedTemplate>> {
    const resolved: Partial<Record<K, ResolvedTemplate>> = {};
    for (const key of order) {
      const template = fields[key];
      if (template === undefined) continue;
      resolved[key] = this.resolve(template, context);
    }
    return resolved;
  }
}
