/**
 * Engine configuration schema.
 *
 * The engine takes its directories and limits explicitly instead of
 * reading globals. The config is validated once, frozen, and passed to
 * the processor and CLI.
 */

import { z } from "zod";

export const EngineConfigSchema = z
  .object({
    /**
     * Value substituted for `{{artifacts}}`. `null` disables the
     * placeholder; any reference then fails with a path resolution error.
     */
    artifactsDir: z
      .string()
      .min(1)
      .nullable()
      .describe("Base directory substituted for {{artifacts}}; null disables it"),

    /** Directory relative function paths resolve against */
    baseDir: z
      .string()
      .min(1)
      .describe("Directory that relative source paths in function calls resolve against"),

    /** Maximum `{{…}}` nesting depth before evaluation gives up */
    maxDepth: z
      .number()
      .int()
      .min(1)
      .max(64)
      .describe("Maximum nesting depth of {{...}} expressions"),

    /** Fixed seed for every session; omit for fresh randomness */
    seed: z
      .number()
      .int()
      .optional()
      .describe("Seed applied to each new binding session"),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
