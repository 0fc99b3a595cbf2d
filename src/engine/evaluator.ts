/**
 * Template function evaluation.
 *
 * Expressions are evaluated innermost-first: every nested `{{…}}` inside
 * a call is resolved before the enclosing call is dispatched. Arguments
 * are split on `:` in the call's own text only, so a nested result that
 * contains `:` stays one argument.
 *
 * Two modes share one walk:
 *
 *   evaluate()           raises the first failure, with the failing
 *                        expression attached
 *   evaluateCollecting() records every call's outcome ("ERROR: …" for
 *                        failures) and leaves failed expressions in the
 *                        output
 *
 * Results are recorded as the walk goes, so no call runs twice.
 */

import { isAbsolute, resolve } from "node:path";

import { DEFAULT_MAX_DEPTH } from "../config/engine/defaults.js";
import type { FunctionRegistry } from "../functions/registry.js";
import type { FunctionContext } from "../functions/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import {
  ArgumentError,
  ParseError,
  SourceFormatError,
  TemplateEngineError,
  toIssue,
  withExpression,
  type ResolutionIssue,
} from "./errors.js";
import type { PathResolver } from "./paths.js";
import { parseTemplateNodes, plainText, splitArguments, type ExpressionNode, type TemplateNode } from "./scanner.js";
import { isVariableToken } from "./variables.js";

export const ERROR_PREFIX = "ERROR: ";

export interface FunctionEngineOptions {
  /** Directory relative source paths resolve against. Defaults to the working directory. */
  baseDir?: string;
  maxDepth?: number;
  logger?: Logger;
}

export interface EvaluationResult {
  output: string;
  /** Call text → result, or "ERROR: …" in collecting mode */
  results: Record<string, string>;
  errors: ResolutionIssue[];
}

type Outcome = { ok: true; value: string } | { ok: false; error: TemplateEngineError };

interface Walk {
  collect: boolean;
  paths: PathResolver;
  results: Record<string, string>;
  errors: ResolutionIssue[];
  memo: Map<string, Outcome>;
}

export class FunctionEngine {
  readonly baseDir: string;
  readonly maxDepth: number;
  private readonly logger: Logger;
  private readonly context: FunctionContext;

  constructor(
    private readonly registry: FunctionRegistry,
    options: FunctionEngineOptions = {}
  ) {
    this.baseDir = resolve(options.baseDir ?? ".");
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.logger = options.logger ?? silentLogger;

    const baseDir = this.baseDir;
    this.context = {
      baseDir,
      resolveSourcePath: (path) => (isAbsolute(path) ? path : resolve(baseDir, path)),
    };
  }

  /**
   * Evaluate every function call in `text`.
   * @throws TemplateEngineError on the first failure
   */
  evaluate(text: string, paths: PathResolver): EvaluationResult {
    return this.run(text, paths, false);
  }

  /**
   * Evaluate every function call, recording failures instead of raising.
   */
  evaluateCollecting(text: string, paths: PathResolver): EvaluationResult {
    return this.run(text, paths, true);
  }

  private run(text: string, paths: PathResolver, collect: boolean): EvaluationResult {
    const walk: Walk = { collect, paths, results: {}, errors: [], memo: new Map() };

    let nodes: TemplateNode[];
    try {
      nodes = parseTemplateNodes(text);
    } catch (err) {
      if (!collect || !(err instanceof TemplateEngineError)) throw err;
      this.record(walk, err);
      return { output: text, results: walk.results, errors: walk.errors };
    }

    let output = "";
    for (const node of nodes) {
      if (node.kind === "text") {
        output += node.value;
        continue;
      }
      const outcome = this.evaluateNode(node, 1, walk);
      output += outcome.ok ? outcome.value : node.source;
    }

    return { output, results: walk.results, errors: walk.errors };
  }

  private evaluateNode(node: ExpressionNode, depth: number, walk: Walk): Outcome {
    const cached = walk.memo.get(node.source);
    if (cached) return cached;

    const outcome = this.dispatchNode(node, depth, walk);
    walk.memo.set(node.source, outcome);
    return outcome;
  }

  private dispatchNode(node: ExpressionNode, depth: number, walk: Walk): Outcome {
    if (depth > this.maxDepth) {
      return this.fail(
        walk,
        node,
        new ParseError(`Expression nesting exceeds the maximum depth of ${this.maxDepth}`, node.start)
      );
    }

    // A variable that survived substitution already failed there; in
    // collecting mode it was recorded at that point.
    const literal = plainText(node.body);
    if (literal !== undefined && isVariableToken(literal)) {
      const error = new ArgumentError(`Unresolved variable: ${literal.trim()}`, { expression: node.source });
      if (!walk.collect) throw error;
      return { ok: false, error };
    }

    const segments: string[] = [];
    for (const segment of splitArguments(node.body)) {
      let value = "";
      for (const part of segment) {
        if (part.kind === "text") {
          value += part.value;
          continue;
        }
        const inner = this.evaluateNode(part, depth + 1, walk);
        if (!inner.ok) {
          // Same error, reported once
          walk.results[node.source] = ERROR_PREFIX + inner.error.message;
          return inner;
        }
        value += inner.value;
      }
      segments.push(value);
    }

    const [rawName = "", ...rawArgs] = segments;
    const name = rawName.trim();
    if (name === "") {
      return this.fail(walk, node, new ParseError("Empty function call", node.start));
    }

    try {
      const args = rawArgs.map((arg) => walk.paths.resolveArgument(arg));
      const value = this.registry.call(name, args, this.context);
      walk.results[node.source] = value;
      this.logger.debug("Evaluated template function", { expression: node.source, result: value });
      return { ok: true, value };
    } catch (err) {
      return this.fail(walk, node, toEngineError(err, name));
    }
  }

  private fail(walk: Walk, node: ExpressionNode, error: TemplateEngineError): Outcome {
    withExpression(error, node.source);
    if (!walk.collect) throw error;
    walk.results[node.source] = ERROR_PREFIX + error.message;
    this.record(walk, error);
    return { ok: false, error };
  }

  private record(walk: Walk, error: TemplateEngineError): void {
    walk.errors.push(toIssue(error));
    this.logger.warn("Template evaluation failed", {
      kind: error.kind,
      expression: error.expression,
      message: error.message,
    });
  }
}

/**
 * Engine errors pass through; anything else a handler throws (an I/O
 * failure, a parser bug) becomes a SourceFormatError with the cause kept.
 */
function toEngineError(err: unknown, functionName: string): TemplateEngineError {
  if (err instanceof TemplateEngineError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SourceFormatError(`${functionName} failed: ${message}`, undefined, { cause: err });
}
