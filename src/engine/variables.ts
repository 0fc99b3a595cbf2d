/**
 * Entity, semantic and numeric variable substitution.
 *
 * Recognized tokens:
 *
 *   {{entityN}}                    default pool (legacy form)
 *   {{entityN:pool}}               named pool; {{entityN:default}} is {{entityN}}
 *   {{semanticN:kind}}             realistic value of a semantic kind
 *   {{numberN:min:max[:format]}}   uniform number, integer by default
 *
 * Each distinct key is bound once per session and substituted at every
 * occurrence. Tokens that look like variables but do not parse raise an
 * ArgumentError instead of passing through to function evaluation.
 */

import type { EntityPools } from "../entities/pool.js";
import { DEFAULT_POOL_NAME } from "../entities/pool.js";
import { ArgumentError, TemplateEngineError, withExpression } from "./errors.js";
import {
  generateNumber,
  generateSemantic,
  parseNumberFormat,
  parseSemanticKind,
} from "./semantic.js";
import type { VariableBindingSession } from "./session.js";

const TOKEN_PATTERN = /\{\{\s*([^{}]*?)\s*\}\}/g;
const VARIABLE_PREFIX = /^(entity|semantic|number)\d/;

const ENTITY_LEGACY = /^entity(\d+)$/;
const ENTITY_POOL = /^entity(\d+):([A-Za-z_]\w*)$/;
const SEMANTIC = /^semantic(\d+):([A-Za-z_]+)$/;
const NUMBER = /^number(\d+):(-?\d+):(-?\d+)(?::([A-Za-z_]+))?$/;

/** Safety bound on re-scans; each productive pass removes at least one token. */
const MAX_PASSES = 32;

export type VariableKind = "entity" | "semantic" | "number";

/**
 * A parsed variable token. `key` is the normalized binding key.
 */
export type VariableToken =
  | { kind: "entity"; key: string; index: number; pool: string }
  | { kind: "semantic"; key: string; index: number; semantic: string }
  | { kind: "number"; key: string; index: number; min: number; max: number; format: string | undefined };

export interface VariableSubstitution {
  text: string;
  /** Binding key → value for every variable that appeared in the text */
  variables: Record<string, string>;
}

export interface SubstituteOptions {
  /**
   * Called instead of throwing when a token fails. The token is then left
   * in the text unchanged.
   */
  onError?: (error: TemplateEngineError) => void;
}

/**
 * Whether a token body is meant as a variable (as opposed to a function
 * call or literal braces).
 */
export function isVariableToken(body: string): boolean {
  return VARIABLE_PREFIX.test(body.trim());
}

/**
 * Parse a variable token body such as `entity1:colors`.
 * @throws ArgumentError if the body has a variable prefix but does not parse
 */
export function parseVariableToken(body: string): VariableToken {
  const token = body.trim();

  let match = ENTITY_LEGACY.exec(token);
  if (match) {
    return { kind: "entity", key: `entity${match[1]}`, index: Number(match[1]), pool: DEFAULT_POOL_NAME };
  }

  match = ENTITY_POOL.exec(token);
  if (match) {
    const pool = match[2];
    const key = pool === DEFAULT_POOL_NAME ? `entity${match[1]}` : `entity${match[1]}:${pool}`;
    return { kind: "entity", key, index: Number(match[1]), pool };
  }

  match = SEMANTIC.exec(token);
  if (match) {
    return {
      kind: "semantic",
      key: `semantic${match[1]}:${match[2]}`,
      index: Number(match[1]),
      semantic: match[2],
    };
  }

  match = NUMBER.exec(token);
  if (match) {
    const min = parseInt(match[2], 10);
    const max = parseInt(match[3], 10);
    const format = match[4];
    return {
      kind: "number",
      key: `number${match[1]}:${min}:${max}:${format ?? "integer"}`,
      index: Number(match[1]),
      min,
      max,
      format,
    };
  }

  throw new ArgumentError(`Malformed variable: ${token}`);
}

/**
 * Resolves variable tokens against a session and a set of entity pools.
 */
export class VariableResolver {
  constructor(private readonly pools: EntityPools) {}

  /**
   * Value for one parsed token, bound through the session.
   */
  resolveToken(token: VariableToken, session: VariableBindingSession): string {
    switch (token.kind) {
      case "entity": {
        // Fail on an unknown pool even if nothing is drawn yet
        this.pools.get(token.pool);
        return session.getOrCreate(token.key, (random) => this.pools.draw(token.pool, random));
      }
      case "semantic": {
        const kind = parseSemanticKind(token.semantic);
        return session.getOrCreate(token.key, (random) => generateSemantic(kind, random, this.pools));
      }
      case "number": {
        const format = parseNumberFormat(token.format);
        return session.getOrCreate(token.key, (random) =>
          generateNumber({ min: token.min, max: token.max, format }, random)
        );
      }
    }
  }

  /**
   * Replace every variable token in `text`.
   *
   * @throws TemplateEngineError on the first failing token unless
   *         `options.onError` is given
   */
  substitute(
    text: string,
    session: VariableBindingSession,
    options: SubstituteOptions = {}
  ): VariableSubstitution {
    const variables: Record<string, string> = {};
    const failed = new Set<string>();
    let current = text;

    for (let pass = 0; pass < MAX_PASSES; pass++) {
      let changed = false;

      current = current.replace(TOKEN_PATTERN, (whole: string, body: string) => {
        if (!isVariableToken(body) || failed.has(whole)) return whole;

        try {
          const token = parseVariableToken(body);
          const value = this.resolveToken(token, session);
          variables[token.key] = value;
          changed = true;
          return value;
        } catch (err) {
          if (!(err instanceof TemplateEngineError)) throw err;
          withExpression(err, whole);
          if (!options.onError) throw err;
          if (!failed.has(whole)) {
            failed.add(whole);
            options.onError(err);
          }
          return whole;
        }
      });

      if (!changed) break;
    }

    return { text: current, variables };
  }
}
