/**
 * Sandbox question engine.
 *
 * Resolves test question templates into concrete question text, sandbox
 * paths and expected answers. The variables of one (question_id, sample)
 * unit are bound once and shared by every field of that unit.
 *
 * Usage:
 *   const pools = new EntityPoolLoader("config").load();
 *   const processor = new TemplateProcessor({ pools, baseDir: "." });
 *   const generator = new QuestionGenerator(processor);
 *
 *   const prepared = generator.prepare(definition, 1);
 *   // ... sandbox generators create prepared.targetFile ...
 *   const expected = prepared.resolveExpected();
 */

export * from "./engine/index.js";
export * from "./functions/index.js";
export * from "./entities/index.js";
export * from "./definitions/index.js";
export * from "./generation/index.js";
export {
  config,
  validateConfig,
  engineConfigFrom,
  configuredLogLevel,
  ConfigError,
  ARTIFACTS_DISABLED,
  EngineConfigSchema,
  EngineConfigError,
  loadEngineConfig,
  validateEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_ARTIFACTS_DIR,
  DEFAULT_MAX_DEPTH,
  NumberFormat,
  SemanticKind,
  ScoringType,
  type AppConfig,
  type EngineConfig,
} from "./config/index.js";
export * from "./logging/index.js";
