/**
 * Entity pool tests.
 *
 * Run: node --import tsx src/entities/entities.test.ts
 *
 * Tests cover:
 *   1. Pool text parsing
 *   2. Loading default and named pools from a directory
 *   3. Load errors
 *   4. The shipped config/ pools
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { NotFoundError } from "../engine/errors.js";
import { VariableBindingSession } from "../engine/session.js";
import { EntityPoolLoader, EntityPoolLoadError, parsePoolText } from "./loader.js";
import { EntityPools } from "./pool.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const root = mkdtempSync(join(tmpdir(), "entity-pools-"));
let fixtureCount = 0;

/**
 * Write a pool directory with the given files and return its path.
 */
function poolDir(files: Record<string, string>): string {
  const dir = mkdtempSync(join(root, `case-${++fixtureCount}-`));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content);
  }
  return dir;
}

function loadError(dir: string): EntityPoolLoadError {
  try {
    new EntityPoolLoader(dir).load();
  } catch (err) {
    if (err instanceof EntityPoolLoadError) return err;
    throw err;
  }
  throw new Error("Expected EntityPoolLoadError");
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Pool Text");

test("skips blank lines and comments", () => {
  assert.deepEqual(parsePoolText("# header\n\nalpha\n  bravo  \r\n#skip\ncharlie\n"), ["alpha", "bravo", "charlie"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

section("Loading");

test("loads the default pool alone", () => {
  const pools = new EntityPoolLoader(poolDir({ "entity-pool.txt": "alpha\nbravo\n" })).load();
  assert.deepEqual(pools.names(), ["default"]);
  assert.deepEqual(pools.get(), ["alpha", "bravo"]);
});

test("loads named pools beside the default", () => {
  const dir = poolDir({
    "entity-pool.txt": "alpha\n",
    "entity-pools.json": JSON.stringify({ colors: ["crimson", "azure"], gems: ["opal"] }),
  });
  const pools = new EntityPoolLoader(dir).load();
  assert.deepEqual(pools.names(), ["default", "colors", "gems"]);
  assert.deepEqual(pools.get("gems"), ["opal"]);
});

test("load() is cached until reload()", () => {
  const dir = poolDir({ "entity-pool.txt": "alpha\n" });
  const loader = new EntityPoolLoader(dir);
  const first = loader.load();
  assert.equal(loader.load(), first);
  writeFileSync(join(dir, "entity-pool.txt"), "zulu\n");
  assert.deepEqual(loader.reload().get(), ["zulu"]);
});

section("Load Errors");

test("missing directory", () => {
  const missing = join(root, "nope");
  assert.throws(() => new EntityPoolLoader(missing), {
    name: "EntityPoolLoadError",
    message: `Entity pool directory does not exist: ${missing}`,
  });
});

test("missing default pool file", () => {
  const dir = poolDir({});
  assert.equal(loadError(dir).message, `Entity pool file not found: ${join(dir, "entity-pool.txt")}`);
});

test("default pool with only comments", () => {
  const dir = poolDir({ "entity-pool.txt": "# nothing here\n\n" });
  assert.equal(loadError(dir).message, `No entities found in pool file: ${join(dir, "entity-pool.txt")}`);
});

test("invalid JSON in named pools", () => {
  const dir = poolDir({ "entity-pool.txt": "alpha\n", "entity-pools.json": "{ colors: [" });
  assert.ok(loadError(dir).message.startsWith(`Invalid JSON in ${join(dir, "entity-pools.json")}: `));
});

test("named pool may not be called default", () => {
  const dir = poolDir({
    "entity-pool.txt": "alpha\n",
    "entity-pools.json": JSON.stringify({ default: ["x"] }),
  });
  assert.ok(loadError(dir).message.includes('"default" is reserved for entity-pool.txt'));
});

test("empty named pool", () => {
  const dir = poolDir({
    "entity-pool.txt": "alpha\n",
    "entity-pools.json": JSON.stringify({ colors: [] }),
  });
  assert.equal(
    loadError(dir).message,
    `Invalid named pools in ${join(dir, "entity-pools.json")}: colors: A pool needs at least one entity`
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// POOLS
// ═══════════════════════════════════════════════════════════════════════════

section("Pools");

test("unknown pool lists the available ones", () => {
  const pools = new EntityPools(["alpha"], { colors: ["crimson"] });
  assert.throws(() => pools.get("planets"), (err: unknown) => {
    if (!(err instanceof NotFoundError)) return false;
    assert.equal(err.message, "Unknown entity pool: planets. Available pools: default, colors");
    return true;
  });
});

test("an empty default pool is rejected", () => {
  assert.throws(() => new EntityPools([]), RangeError);
});

test("draws stay inside the pool", () => {
  const pools = new EntityPools(["alpha", "bravo", "charlie"]);
  const session = new VariableBindingSession({ seed: 21 });
  for (let i = 0; i < 20; i++) {
    assert.ok(["alpha", "bravo", "charlie"].includes(pools.draw("default", session.random)));
  }
});

test("shipped config/ pools load", () => {
  const pools = new EntityPoolLoader("config").load();
  assert.ok(pools.get().length > 100);
  assert.deepEqual(pools.names(), ["default", "colors", "nature", "metals", "gems"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// Cleanup
// ═══════════════════════════════════════════════════════════════════════════

rmSync(root, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
