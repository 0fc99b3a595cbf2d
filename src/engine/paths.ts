/**
 * Path variables.
 *
 *   {{qs_id}}      → q{question_id}_s{sample_number}
 *   {{artifacts}}  → artifacts base directory
 *   TARGET_FILE    → sandbox path of the current entry, when it is a
 *                    whole function argument
 */

import { DEFAULT_ARTIFACTS_DIR } from "../config/engine/defaults.js";
import { ArgumentError, PathResolutionError } from "./errors.js";

export const TARGET_FILE = "TARGET_FILE";

const QS_ID_PATTERN = /\{\{\s*qs_id\s*\}\}/g;
const ARTIFACTS_PATTERN = /\{\{\s*artifacts\s*\}\}/g;

export interface PathResolverOptions {
  /**
   * Base directory for `{{artifacts}}`. Omitted → the default
   * ("test_artifacts"); `null` → references fail.
   */
  artifactsDir?: string | null;
  /** Binding for TARGET_FILE */
  targetFile?: string;
}

export class PathResolver {
  readonly artifactsDir: string | null;
  readonly targetFile: string | undefined;

  constructor(options: PathResolverOptions = {}) {
    this.artifactsDir = options.artifactsDir === undefined ? DEFAULT_ARTIFACTS_DIR : options.artifactsDir;
    this.targetFile = options.targetFile;
  }

  /**
   * Format a generation unit identifier.
   * @throws ArgumentError unless both parts are non-negative integers
   */
  static qsId(questionId: number, sampleNumber: number): string {
    if (!Number.isInteger(questionId) || questionId < 0) {
      throw new ArgumentError(`Invalid question_id: ${questionId}`);
    }
    if (!Number.isInteger(sampleNumber) || sampleNumber < 0) {
      throw new ArgumentError(`Invalid sample_number: ${sampleNumber}`);
    }
    return `q${questionId}_s${sampleNumber}`;
  }

  static substituteQsId(text: string, questionId: number, sampleNumber: number): string {
    if (!text.match(QS_ID_PATTERN)) return text;
    const qsId = PathResolver.qsId(questionId, sampleNumber);
    return text.replace(QS_ID_PATTERN, () => qsId);
  }

  /**
   * @throws PathResolutionError if the text references `{{artifacts}}`
   *         and artifacts are disabled
   */
  substituteArtifacts(text: string): string {
    if (!text.match(ARTIFACTS_PATTERN)) return text;
    const dir = this.artifactsDir;
    if (dir === null) {
      throw new PathResolutionError("{{artifacts}} is referenced but no artifacts directory is configured", "artifacts");
    }
    return text.replace(ARTIFACTS_PATTERN, () => dir);
  }

  /**
   * Resolve one function argument. Only an argument that is exactly
   * TARGET_FILE (surrounding spaces aside) is replaced; the keyword inside
   * a longer argument stays.
   */
  resolveArgument(arg: string): string {
    if (arg.trim() !== TARGET_FILE) return arg;
    if (this.targetFile === undefined) {
      throw new PathResolutionError("TARGET_FILE is referenced but no target file is bound", "TARGET_FILE");
    }
    return this.targetFile;
  }

  withTargetFile(targetFile: string | undefined): PathResolver {
    return new PathResolver({ artifactsDir: this.artifactsDir, targetFile });
  }
}
