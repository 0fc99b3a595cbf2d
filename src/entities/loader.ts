/**
 * Entity pool loader.
 *
 * Reads entity pools from a directory:
 *
 *   entity-pool.txt    default pool, one entity per line (required)
 *   entity-pools.json  named pools, `{ "colors": ["crimson", …], … }` (optional)
 *
 * In entity-pool.txt, blank lines and lines starting with `#` are skipped.
 *
 * USAGE:
 *
 *   const loader = new EntityPoolLoader("config/");
 *   const pools = loader.load();        // cached after the first call
 *   pools.draw("colors", session.random);
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";

import { EntityPools, DEFAULT_POOL_NAME } from "./pool.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class EntityPoolLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load entity pool: ${filePath}`);
    this.name = "EntityPoolLoadError";
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_POOL_FILE = "entity-pool.txt";
export const NAMED_POOLS_FILE = "entity-pools.json";

const PoolNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Pool names must be identifiers (letters, digits, underscore)")
  .refine((name) => name !== DEFAULT_POOL_NAME, {
    message: `"${DEFAULT_POOL_NAME}" is reserved for ${DEFAULT_POOL_FILE}`,
  });

export const NamedPoolsSchema = z.record(
  PoolNameSchema,
  z.array(z.string().trim().min(1)).min(1, "A pool needs at least one entity")
);

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse the line-based default pool format.
 */
export function parsePoolText(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class EntityPoolLoader {
  private readonly baseDir: string;
  private cached: EntityPools | undefined;

  /**
   * @param baseDir - Directory containing entity-pool.txt
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new EntityPoolLoadError(
        this.baseDir,
        `Entity pool directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load the default and named pools.
   *
   * @throws EntityPoolLoadError if the default pool is missing or empty,
   *         or entity-pools.json is malformed
   */
  load(): EntityPools {
    if (this.cached) return this.cached;

    const defaultPath = join(this.baseDir, DEFAULT_POOL_FILE);
    if (!existsSync(defaultPath)) {
      throw new EntityPoolLoadError(defaultPath, `Entity pool file not found: ${defaultPath}`);
    }

    const defaultPool = parsePoolText(readFileSync(defaultPath, "utf-8"));
    if (defaultPool.length === 0) {
      throw new EntityPoolLoadError(defaultPath, `No entities found in pool file: ${defaultPath}`);
    }

    const pools = new EntityPools(defaultPool, this.loadNamedPools());
    this.cached = pools;
    return pools;
  }

  /**
   * Forget the cached pools so the next `load()` rereads the files.
   */
  reload(): EntityPools {
    this.cached = undefined;
    return this.load();
  }

  private loadNamedPools(): Record<string, string[]> {
    const namedPath = join(this.baseDir, NAMED_POOLS_FILE);
    if (!existsSync(namedPath)) return {};

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(namedPath, "utf-8"));
    } catch (err) {
      throw new EntityPoolLoadError(
        namedPath,
        `Invalid JSON in ${namedPath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const result = NamedPoolsSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new EntityPoolLoadError(namedPath, `Invalid named pools in ${namedPath}: ${details}`);
    }
    return result.data;
  }
}
