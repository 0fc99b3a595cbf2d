/**
 * Plain-text functions. Line and word numbers are 1-based.
 */

import { NotFoundError } from "../engine/errors.js";
import { parsePositionArg } from "./args.js";
import { readLines, readWords } from "./sources.js";
import type { TemplateFunction } from "./types.js";

export const fileLine: TemplateFunction = {
  name: "file_line",
  family: "text",
  arity: { min: 2, max: 2 },
  signature: "file_line:line_number:file_path",
  evaluate([lineArg, path], ctx) {
    const lineNumber = parsePositionArg(lineArg, "line number");
    const lines = readLines(ctx.resolveSourcePath(path));
    if (lineNumber > lines.length) {
      throw new NotFoundError(
        `Line number ${lineNumber} out of range (file has ${lines.length} lines)`,
        String(lineNumber)
      );
    }
    return lines[lineNumber - 1];
  },
};

export const fileWord: TemplateFunction = {
  name: "file_word",
  family: "text",
  arity: { min: 2, max: 2 },
  signature: "file_word:word_number:file_path",
  evaluate([wordArg, path], ctx) {
    const wordNumber = parsePositionArg(wordArg, "word number");
    const words = readWords(ctx.resolveSourcePath(path));
    if (wordNumber > words.length) {
      throw new NotFoundError(
        `Word number ${wordNumber} out of range (file has ${words.length} words)`,
        String(wordNumber)
      );
    }
    return words[wordNumber - 1];
  },
};

export const fileLineCount: TemplateFunction = {
  name: "file_line_count",
  family: "text",
  arity: { min: 1, max: 1 },
  signature: "file_line_count:file_path",
  evaluate([path], ctx) {
    return String(readLines(ctx.resolveSourcePath(path)).length);
  },
};

export const fileWordCount: TemplateFunction = {
  name: "file_word_count",
  family: "text",
  arity: { min: 1, max: 1 },
  signature: "file_word_count:file_path",
  evaluate([path], ctx) {
    return String(readWords(ctx.resolveSourcePath(path)).length);
  },
};

export const TEXT_FUNCTIONS: readonly TemplateFunction[] = [
  fileLine,
  fileWord,
  fileLineCount,
  fileWordCount,
];
