/**
 * Entity pools.
 *
 * The default pool backs legacy `{{entityN}}` placeholders; named pools
 * back `{{entityN:pool}}`. `{{entityN:default}}` addresses the default
 * pool explicitly.
 */

import type { Faker } from "@faker-js/faker";
import { NotFoundError } from "../engine/errors.js";

export const DEFAULT_POOL_NAME = "default";

export class EntityPools {
  private readonly pools: ReadonlyMap<string, readonly string[]>;

  /**
   * @param defaultPool - Candidates for `{{entityN}}`; must not be empty
   * @param named       - Additional pools keyed by name
   */
  constructor(defaultPool: readonly string[], named: Readonly<Record<string, readonly string[]>> = {}) {
    if (defaultPool.length === 0) {
      throw new RangeError("Default entity pool must contain at least one entity");
    }

    const pools = new Map<string, readonly string[]>([[DEFAULT_POOL_NAME, [...defaultPool]]]);
    for (const [name, entities] of Object.entries(named)) {
      if (name === DEFAULT_POOL_NAME) {
        throw new RangeError(`Pool name "${DEFAULT_POOL_NAME}" is reserved for the default pool`);
      }
      if (entities.length === 0) {
        throw new RangeError(`Entity pool "${name}" is empty`);
      }
      pools.set(name, [...entities]);
    }
    this.pools = pools;
  }

  has(name: string): boolean {
    return this.pools.has(name);
  }

  /**
   * Candidates of one pool.
   * @throws NotFoundError if the pool does not exist
   */
  get(name: string = DEFAULT_POOL_NAME): readonly string[] {
    const pool = this.pools.get(name);
    if (!pool) {
      throw new NotFoundError(
        `Unknown entity pool: ${name}. Available pools: ${this.names().join(", ")}`,
        name
      );
    }
    return pool;
  }

  /** Pool names, default first. */
  names(): string[] {
    return [...this.pools.keys()];
  }

  /**
   * Draw one entity uniformly at random (with replacement).
   */
  draw(name: string, random: Faker): string {
    return random.helpers.arrayElement(this.get(name));
  }
}
