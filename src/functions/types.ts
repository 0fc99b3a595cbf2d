/**
 * Template function contract.
 */

export type FunctionFamily = "text" | "csv" | "sqlite" | "yaml" | "json";

export interface Arity {
  min: number;
  max: number;
}

/**
 * What a handler may use besides its arguments. Handlers read sources
 * only through `resolveSourcePath`; they never write.
 */
export interface FunctionContext {
  /** Directory relative source paths resolve against */
  baseDir: string;
  /** Absolute path for a source argument */
  resolveSourcePath(path: string): string;
}

export interface TemplateFunction {
  name: string;
  family: FunctionFamily;
  /** Accepted argument counts, checked before `evaluate` runs */
  arity: Arity;
  /** Human-readable call shape, e.g. "file_line:line_number:file_path" */
  signature: string;
  /**
   * Receive arguments exactly as written. Otherwise each argument is
   * trimmed before `evaluate` runs.
   */
  rawArguments?: boolean;
  evaluate(args: readonly string[], context: FunctionContext): string;
}
