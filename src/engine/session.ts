/**
 * Variable binding session.
 *
 * One session backs one generation unit (a question_id + sample_number
 * pair). The first reference to a variable key runs its generator; every
 * later reference to the same key returns the cached value, wherever it
 * appears and however many fields are resolved against the session.
 *
 * The session owns its random source. A session built with a seed resets
 * that source on `clear()`, so a cleared seeded session replays the same
 * bindings in the same order. An unseeded session keeps drawing fresh
 * values after `clear()`.
 *
 * Sessions are owned by the caller that created them. Do not share one
 * between generation units.
 */

import { Faker, en } from "@faker-js/faker";

/** Generator invoked on the first reference to a key. */
export type BindingGenerator = (random: Faker) => string;

export interface SessionOptions {
  /** Fixed seed for reproducible bindings. Omit in production. */
  seed?: number;
}

export class VariableBindingSession {
  readonly seed: number | undefined;
  readonly random: Faker;
  private readonly bindings = new Map<string, string>();

  constructor(options: SessionOptions = {}) {
    this.seed = options.seed;
    this.random = new Faker({ locale: [en] });
    if (this.seed !== undefined) {
      this.random.seed(this.seed);
    }
  }

  /**
   * Return the bound value for `key`, creating it with `generator` on
   * first use.
   */
  getOrCreate(key: string, generator: BindingGenerator): string {
    const existing = this.bindings.get(key);
    if (existing !== undefined) return existing;

    const value = generator(this.random);
    this.bindings.set(key, value);
    return value;
  }

  has(key: string): boolean {
    return this.bindings.has(key);
  }

  get(key: string): string | undefined {
    return this.bindings.get(key);
  }

  get size(): number {
    return this.bindings.size;
  }

  /**
   * Snapshot of every binding made so far, in creation order.
   */
  entries(): Record<string, string> {
    return Object.fromEntries(this.bindings);
  }

  /**
   * Drop all bindings. Seeded sessions also rewind their random source.
   */
  clear(): void {
    this.bindings.clear();
    if (this.seed !== undefined) {
      this.random.seed(this.seed);
    }
  }
}
