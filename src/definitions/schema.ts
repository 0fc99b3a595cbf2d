/**
 * Test definition schema.
 *
 * A definitions file is YAML with a top-level `tests:` list. Each entry
 * describes one question: its template, how many samples to generate,
 * and the fields its scoring type compares against.
 *
 *   tests:
 *     - question_id: 201
 *       samples: 20
 *       template: "Read {{artifacts}}/{{qs_id}}/notes.txt and reply with line 34."
 *       scoring_type: stringmatch
 *       expected_response: "{{file_line:34:TARGET_FILE}}"
 *       sandbox_setup:
 *         type: create_files
 *         target_file: "{{artifacts}}/{{qs_id}}/notes.txt"
 *         content: { type: lorem_lines, count: 100 }
 *
 * All string fields are templates, resolved per (question_id, sample).
 */

import { z } from "zod";
import { ScoringType } from "../config/engine/enums.js";

/**
 * Sandbox setup passed through to the external file generators. Only
 * `type` and `target_file` matter to the engine; other keys are kept.
 */
export const SandboxSetupSchema = z
  .object({
    type: z.string().min(1).describe("Generator to run, e.g. create_files or create_database"),
    target_file: z
      .string()
      .min(1)
      .optional()
      .describe("Sandbox path of the generated entry; bound to TARGET_FILE"),
    content: z.record(z.unknown()).optional(),
    clutter: z.record(z.unknown()).optional(),
  })
  .passthrough()
  .superRefine((setup, ctx) => {
    if (setup.type === "create_files" && setup.target_file === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["target_file"],
        message: "'target_file' is required for sandbox_setup type 'create_files'",
      });
    }
  });

export type SandboxSetup = z.infer<typeof SandboxSetupSchema>;

/**
 * Fields each scoring type needs.
 */
export const REQUIRED_FIELDS: Readonly<Record<ScoringType, readonly RequirableField[]>> = {
  stringmatch: ["expected_response"],
  jsonmatch: ["expected_response"],
  readfile_stringmatch: ["file_to_read", "expected_content"],
  readfile_jsonmatch: ["file_to_read", "expected_content"],
  json_targeted_edit: ["file_to_read", "expected_content"],
  files_exist: ["files_to_check"],
  directory_structure: ["expected_structure"],
};

export type RequirableField =
  | "expected_response"
  | "expected_content"
  | "file_to_read"
  | "files_to_check"
  | "expected_structure";

export const TestDefinitionSchema = z
  .object({
    question_id: z.number().int().min(0),
    samples: z.number().int().min(1).default(1),
    template: z.string().min(1),
    scoring_type: ScoringType,
    expected_response: z.string().optional(),
    expected_content: z.string().optional(),
    file_to_read: z.string().min(1).optional(),
    files_to_check: z.array(z.string().min(1)).optional(),
    expected_structure: z.array(z.string().min(1)).optional(),
    sandbox_setup: SandboxSetupSchema.optional(),
  })
  .strict()
  .superRefine((definition, ctx) => {
    for (const field of REQUIRED_FIELDS[definition.scoring_type]) {
      const value = definition[field];
      const missing = value === undefined || value.length === 0;
      if (missing) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `'${field}' is required for scoring_type '${definition.scoring_type}'`,
        });
      }
    }
  });

export type TestDefinition = z.infer<typeof TestDefinitionSchema>;

export const TestDefinitionFileSchema = z
  .object({
    tests: z.array(TestDefinitionSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Map<number, number>();
    file.tests.forEach((test, index) => {
      const first = seen.get(test.question_id);
      if (first !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tests", index, "question_id"],
          message: `Duplicate question_id ${test.question_id} (first defined at tests.${first})`,
        });
      } else {
        seen.set(test.question_id, index);
      }
    });
  });

export type TestDefinitionFile = z.infer<typeof TestDefinitionFileSchema>;
