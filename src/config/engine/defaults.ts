/**
 * Default engine configuration.
 */

import type { EngineConfig } from "./schema.js";

export const DEFAULT_ARTIFACTS_DIR = "test_artifacts";
export const DEFAULT_MAX_DEPTH = 16;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  artifactsDir: DEFAULT_ARTIFACTS_DIR,
  baseDir: ".",
  maxDepth: DEFAULT_MAX_DEPTH,
};
