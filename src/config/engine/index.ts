/**
 * Engine configuration module.
 *
 * Usage:
 *   import { loadEngineConfig, DEFAULT_ENGINE_CONFIG } from "./config/engine/index.js";
 *
 *   const config = loadEngineConfig({
 *     ...DEFAULT_ENGINE_CONFIG,
 *     baseDir: "test_artifacts/q1_s1",
 *   });
 */

export { NumberFormat, SemanticKind, ScoringType } from "./enums.js";

export { EngineConfigSchema, type EngineConfig } from "./schema.js";

export {
  loadEngineConfig,
  validateEngineConfig,
  deepFreeze,
  formatZodIssues,
  EngineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_ENGINE_CONFIG, DEFAULT_ARTIFACTS_DIR, DEFAULT_MAX_DEPTH } from "./defaults.js";
