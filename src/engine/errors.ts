/**
 * Error kinds raised while resolving templates.
 *
 * Every error carries the `{{…}}` expression (or variable token) that
 * failed, once it is known. Function handlers throw without one; the
 * evaluator attaches the call text before the error leaves the engine.
 */

export type TemplateErrorKind =
  | "parse"
  | "unknown_function"
  | "argument"
  | "source_not_found"
  | "not_found"
  | "source_format"
  | "path_resolution";

/**
 * Base class for all template resolution failures.
 */
export abstract class TemplateEngineError extends Error {
  abstract readonly kind: TemplateErrorKind;

  /** Expression or variable token that failed, e.g. `{{file_line:3:a.txt}}`. */
  expression?: string;

  constructor(message: string, options?: { expression?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.expression = options?.expression;
  }

  /**
   * Render as `<expression>: <message>` when the expression is known.
   */
  describe(): string {
    return this.expression ? `${this.expression}: ${this.message}` : this.message;
  }
}

/** Unbalanced braces, malformed call syntax, or nesting past the limit. */
export class ParseError extends TemplateEngineError {
  readonly kind = "parse" as const;

  constructor(message: string, public readonly offset?: number, options?: { expression?: string }) {
    super(message, options);
    this.name = "ParseError";
  }
}

export class UnknownFunctionError extends TemplateEngineError {
  readonly kind = "unknown_function" as const;

  constructor(public readonly functionName: string, options?: { expression?: string }) {
    super(`Unknown template function: ${functionName}`, options);
    this.name = "UnknownFunctionError";
  }
}

/** Wrong argument count or an argument that cannot be parsed. */
export class ArgumentError extends TemplateEngineError {
  readonly kind = "argument" as const;

  constructor(message: string, options?: { expression?: string; cause?: unknown }) {
    super(message, options);
    this.name = "ArgumentError";
  }
}

/** Referenced file, database or document does not exist. */
export class SourceNotFoundError extends TemplateEngineError {
  readonly kind = "source_not_found" as const;

  constructor(message: string, public readonly sourcePath: string) {
    super(message);
    this.name = "SourceNotFoundError";
  }
}

/** Row, column, key, pool or path segment missing from an existing source. */
export class NotFoundError extends TemplateEngineError {
  readonly kind = "not_found" as const;

  constructor(message: string, public readonly segment?: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** Source exists but its content cannot be read as the expected format. */
export class SourceFormatError extends TemplateEngineError {
  readonly kind = "source_format" as const;

  constructor(message: string, public readonly sourcePath?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceFormatError";
  }
}

/** `TARGET_FILE` or `{{artifacts}}` referenced without a binding. */
export class PathResolutionError extends TemplateEngineError {
  readonly kind = "path_resolution" as const;

  constructor(message: string, public readonly variable: "TARGET_FILE" | "artifacts") {
    super(message);
    this.name = "PathResolutionError";
  }
}

/**
 * Attach the failing expression to an engine error, keeping an inner
 * expression that was already set by a nested call.
 */
export function withExpression<E extends TemplateEngineError>(error: E, expression: string): E {
  if (error.expression === undefined) {
    error.expression = expression;
  }
  return error;
}

/**
 * One failure captured by a diagnostic (non-raising) pass.
 */
export interface ResolutionIssue {
  kind: TemplateErrorKind;
  expression?: string;
  message: string;
}

export function toIssue(error: TemplateEngineError): ResolutionIssue {
  return {
    kind: error.kind,
    expression: error.expression,
    message: error.message,
  };
}
