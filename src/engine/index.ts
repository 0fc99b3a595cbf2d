/**
 * Template substitution and function evaluation engine.
 *
 * Usage:
 *   const processor = new TemplateProcessor({ pools, baseDir: "test_artifacts" });
 *   const session = processor.createSession();
 *   const question = processor.resolve(template, { questionId: 1, sampleNumber: 1, session });
 */

export {
  TemplateEngineError,
  ParseError,
  UnknownFunctionError,
  ArgumentError,
  SourceNotFoundError,
  NotFoundError,
  SourceFormatError,
  PathResolutionError,
  withExpression,
  toIssue,
  type TemplateErrorKind,
  type ResolutionIssue,
} from "./errors.js";

export { VariableBindingSession, type BindingGenerator, type SessionOptions } from "./session.js";

export {
  VariableResolver,
  parseVariableToken,
  isVariableToken,
  type VariableToken,
  type VariableSubstitution,
} from "./variables.js";

export {
  generateSemantic,
  generateNumber,
  parseSemanticKind,
  parseNumberFormat,
  type NumericSpec,
} from "./semantic.js";

export { PathResolver, TARGET_FILE, type PathResolverOptions } from "./paths.js";

export {
  parseTemplateNodes,
  splitArguments,
  findUnresolvedExpressions,
  listVariableTokens,
  type TemplateNode,
  type TextNode,
  type ExpressionNode,
} from "./scanner.js";

export { FunctionEngine, ERROR_PREFIX, type EvaluationResult, type FunctionEngineOptions } from "./evaluator.js";

export {
  TemplateProcessor,
  type ProcessorOptions,
  type ResolveContext,
  type ResolvedTemplate,
} from "./processor.js";
