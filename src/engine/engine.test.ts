/**
 * Tests for the template engine.
 *
 * Run: node --import tsx src/engine/engine.test.ts
 *
 * Tests cover:
 *   1. Binding session: caching, seeding, clear()
 *   2. Variable tokens: parsing, normalization, substitution
 *   3. Semantic and numeric generators
 *   4. Brace scanning
 *   5. Path variables and TARGET_FILE
 *   6. Function evaluation: nesting, errors, memoization, depth
 *   7. Diagnostic mode
 */

import { strict as assert } from "node:assert";

import { EntityPools } from "../entities/pool.js";
import { FunctionRegistry } from "../functions/registry.js";
import type { TemplateFunction } from "../functions/types.js";
import {
  ArgumentError,
  NotFoundError,
  ParseError,
  PathResolutionError,
  SourceFormatError,
  TemplateEngineError,
  UnknownFunctionError,
} from "./errors.js";
import { PathResolver } from "./paths.js";
import { TemplateProcessor, type ResolveContext } from "./processor.js";
import {
  findUnresolvedExpressions,
  listVariableTokens,
  parseTemplateNodes,
  splitArguments,
} from "./scanner.js";
import { generateNumber, parseNumberFormat, parseSemanticKind } from "./semantic.js";
import { VariableBindingSession } from "./session.js";
import { isVariableToken, parseVariableToken, VariableResolver } from "./variables.js";

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

/**
 * Run `fn`, assert it throws an instance of `type`, and return the error.
 */
function catchError<E extends Error>(type: new (...args: never[]) => E, fn: () => unknown): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw new Error(`Expected ${type.name}, got ${err instanceof Error ? err.name : String(err)}`);
  }
  throw new Error(`Expected ${type.name}, nothing was thrown`);
}

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/** One candidate per pool, so draws are predictable. */
const SINGLE_POOLS = new EntityPools(["falcon"], { colors: ["crimson"] });

const WIDE_POOLS = new EntityPools(
  ["alpha", "bravo", "charlie", "delta", "echo", "foxtrot", "golf", "hotel"],
  { colors: ["crimson", "azure", "amber", "emerald"] }
);

let ticks = 0;

const STUB_FUNCTIONS: TemplateFunction[] = [
  {
    name: "upper",
    family: "text",
    arity: { min: 1, max: 1 },
    signature: "upper:text",
    evaluate: ([text]) => text.toUpperCase(),
  },
  {
    name: "concat",
    family: "text",
    arity: { min: 1, max: Number.POSITIVE_INFINITY },
    signature: "concat:part",
    evaluate: (args) => args.join("+"),
  },
  {
    name: "join_colon",
    family: "text",
    arity: { min: 2, max: 2 },
    signature: "join_colon:left:right",
    evaluate: ([left, right]) => `${left}:${right}`,
  },
  {
    name: "raw_join",
    family: "text",
    arity: { min: 1, max: Number.POSITIVE_INFINITY },
    signature: "raw_join:part",
    rawArguments: true,
    evaluate: (args) => args.join("|"),
  },
  {
    name: "arg_count",
    family: "text",
    arity: { min: 0, max: Number.POSITIVE_INFINITY },
    signature: "arg_count",
    evaluate: (args) => String(args.length),
  },
  {
    name: "missing",
    family: "text",
    arity: { min: 0, max: 0 },
    signature: "missing",
    evaluate: () => {
      throw new NotFoundError("missing thing");
    },
  },
  {
    name: "boom",
    family: "text",
    arity: { min: 0, max: 0 },
    signature: "boom",
    evaluate: () => {
      throw new Error("kaput");
    },
  },
  {
    name: "tick",
    family: "text",
    arity: { min: 0, max: 0 },
    signature: "tick",
    evaluate: () => String(++ticks),
  },
];

function makeProcessor(overrides: { artifactsDir?: string | null; maxDepth?: number } = {}): TemplateProcessor {
  return new TemplateProcessor({
    pools: SINGLE_POOLS,
    registry: new FunctionRegistry(STUB_FUNCTIONS),
    ...overrides,
  });
}

function context(processor: TemplateProcessor, extra: Partial<ResolveContext> = {}): ResolveContext {
  return { questionId: 7, sampleNumber: 2, session: processor.createSession(), ...extra };
}

// ═══════════════════════════════════════════════════════════════════════════
// BINDING SESSION
// ═══════════════════════════════════════════════════════════════════════════

section("Binding Session");

test("getOrCreate runs the generator once per key", () => {
  const session = new VariableBindingSession();
  let calls = 0;
  const first = session.getOrCreate("entity1", () => `value-${++calls}`);
  const second = session.getOrCreate("entity1", () => `value-${++calls}`);
  assert.equal(first, "value-1");
  assert.equal(second, "value-1");
  assert.equal(calls, 1);
  assert.equal(session.size, 1);
});

test("entries() lists bindings in creation order", () => {
  const session = new VariableBindingSession();
  session.getOrCreate("b", () => "2");
  session.getOrCreate("a", () => "1");
  assert.deepEqual(Object.keys(session.entries()), ["b", "a"]);
  assert.equal(session.get("a"), "1");
  assert.equal(session.has("c"), false);
});

test("sessions with the same seed draw the same values", () => {
  const draw = (session: VariableBindingSession): string =>
    session.getOrCreate("n", (random) => String(random.number.int({ min: 0, max: 1_000_000_000 })));
  assert.equal(draw(new VariableBindingSession({ seed: 42 })), draw(new VariableBindingSession({ seed: 42 })));
});

test("clear() on a seeded session replays the same values", () => {
  const session = new VariableBindingSession({ seed: 7 });
  const generate = (random: VariableBindingSession["random"]): string =>
    String(random.number.int({ min: 0, max: 1_000_000_000 }));
  const before = session.getOrCreate("n", generate);
  session.clear();
  assert.equal(session.size, 0);
  assert.equal(session.getOrCreate("n", generate), before);
});

test("an unseeded session draws fresh values after clear()", () => {
  const session = new VariableBindingSession();
  const generate = (random: VariableBindingSession["random"]): string =>
    String(random.number.int({ min: 0, max: 1_000_000_000 }));
  const before = session.getOrCreate("n", generate);
  session.clear();
  assert.equal(session.seed, undefined);
  assert.notEqual(session.getOrCreate("n", generate), before);
});

// ═══════════════════════════════════════════════════════════════════════════
// VARIABLE TOKENS
// ═══════════════════════════════════════════════════════════════════════════

section("Variable Tokens / Parsing");

test("legacy entity token binds to the default pool", () => {
  assert.deepEqual(parseVariableToken("entity1"), { kind: "entity", key: "entity1", index: 1, pool: "default" });
});

test("entityN:default normalizes to the legacy key", () => {
  assert.equal(parseVariableToken("entity2:default").key, "entity2");
});

test("named pool token keeps the pool in its key", () => {
  assert.equal(parseVariableToken(" entity1:colors ").key, "entity1:colors");
});

test("number token key includes the default format", () => {
  const token = parseVariableToken("number3:-5:10");
  assert.equal(token.key, "number3:-5:10:integer");
  assert.equal(token.kind === "number" ? token.min : undefined, -5);
});

test("malformed variable is an ArgumentError", () => {
  const err = catchError(ArgumentError, () => parseVariableToken("number1:5"));
  assert.equal(err.message, "Malformed variable: number1:5");
});

test("isVariableToken recognizes variable prefixes only", () => {
  assert.equal(isVariableToken("entity3"), true);
  assert.equal(isVariableToken("semantic1:age"), true);
  assert.equal(isVariableToken("entityX"), false);
  assert.equal(isVariableToken("file_line:1:notes.txt"), false);
});

section("Variable Tokens / Substitution");

test("every occurrence of a key gets the same value", () => {
  const resolver = new VariableResolver(WIDE_POOLS);
  const session = new VariableBindingSession({ seed: 3 });
  const { text, variables } = resolver.substitute("{{entity1}}|{{ entity1 }}|{{entity1:default}}", session);
  const [a, b, c] = text.split("|");
  assert.equal(a, b);
  assert.equal(b, c);
  assert.deepEqual(variables, { entity1: a });
});

test("bindings carry across substitute() calls on one session", () => {
  const resolver = new VariableResolver(WIDE_POOLS);
  const session = new VariableBindingSession({ seed: 11 });
  const first = resolver.substitute("{{entity1:colors}}", session).text;
  const second = resolver.substitute("Pick {{entity1:colors}}.", session).text;
  assert.equal(second, `Pick ${first}.`);
});

test("entity draws come from the named pool", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const { text } = resolver.substitute("{{entity1}} / {{entity2:colors}}", new VariableBindingSession());
  assert.equal(text, "falcon / crimson");
});

test("different keys draw independently across fresh sessions", () => {
  const resolver = new VariableResolver(
    new EntityPools(Array.from({ length: 200 }, (_, i) => `entity-${i}`))
  );
  const firsts = new Set<string>();
  const seconds = new Set<string>();
  let identical = 0;
  for (let i = 0; i < 100; i++) {
    const { variables } = resolver.substitute("{{entity1}} {{entity2}}", new VariableBindingSession());
    firsts.add(variables.entity1);
    seconds.add(variables.entity2);
    if (variables.entity1 === variables.entity2) identical++;
  }
  assert.ok(firsts.size > 40, `entity1 had ${firsts.size} unique values`);
  assert.ok(seconds.size > 40, `entity2 had ${seconds.size} unique values`);
  assert.ok(identical < 30, `${identical} identical pairs`);
});

test("unknown pool fails with the token as expression", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const err = catchError(NotFoundError, () =>
    resolver.substitute("x {{entity1:planets}}", new VariableBindingSession())
  );
  assert.equal(err.message, "Unknown entity pool: planets. Available pools: default, colors");
  assert.equal(err.expression, "{{entity1:planets}}");
});

test("function calls are left for the evaluator", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const { text } = resolver.substitute("{{file_line:{{entity1}}:x.txt}}", new VariableBindingSession());
  assert.equal(text, "{{file_line:falcon:x.txt}}");
});

test("onError keeps the token and reports it once", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const reported: TemplateEngineError[] = [];
  const { text } = resolver.substitute(
    "{{semantic1:planet}} and {{semantic1:planet}} near {{entity1}}",
    new VariableBindingSession(),
    { onError: (error) => reported.push(error) }
  );
  assert.equal(text, "{{semantic1:planet}} and {{semantic1:planet}} near falcon");
  assert.equal(reported.length, 1);
  assert.equal(reported[0].expression, "{{semantic1:planet}}");
});

// ═══════════════════════════════════════════════════════════════════════════
// SEMANTIC AND NUMERIC GENERATORS
// ═══════════════════════════════════════════════════════════════════════════

section("Semantic Values");

test("age is an integer between 18 and 70", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  for (let seed = 0; seed < 20; seed++) {
    const age = Number(resolver.substitute("{{semantic1:age}}", new VariableBindingSession({ seed })).text);
    assert.ok(Number.isInteger(age) && age >= 18 && age <= 70, `age out of range: ${age}`);
  }
});

test("semantic keys include the kind", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const { variables } = resolver.substitute("{{semantic1:age}} {{semantic1:salary}}", new VariableBindingSession());
  assert.deepEqual(Object.keys(variables), ["semantic1:age", "semantic1:salary"]);
});

test("date renders as YYYY-MM-DD within 2020-2025", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const { text } = resolver.substitute("{{semantic1:date}}", new VariableBindingSession({ seed: 5 }));
  assert.match(text, /^202[0-5]-\d{2}-\d{2}$/);
});

test("boolean draws from the fixed vocabulary", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const { text } = resolver.substitute("{{semantic1:boolean}}", new VariableBindingSession({ seed: 9 }));
  assert.ok(["true", "false", "yes", "no", "1", "0"].includes(text));
});

test("entity_pool draws from the default pool", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  assert.equal(resolver.substitute("{{semantic2:entity_pool}}", new VariableBindingSession()).text, "falcon");
});

test("unknown semantic kind is an ArgumentError", () => {
  const err = catchError(ArgumentError, () => parseSemanticKind("planet"));
  assert.match(err.message, /^Unknown semantic kind: planet\. Supported kinds: person_name, /);
});

section("Numbers");

test("numberN stays within its bounds across fresh sessions", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const seen = new Set<string>();
  for (let i = 0; i < 100; i++) {
    const value = resolver.substitute("{{number1:10:20}}", new VariableBindingSession()).text;
    assert.match(value, /^\d+$/);
    assert.ok(Number(value) >= 10 && Number(value) <= 20, `out of range: ${value}`);
    seen.add(value);
  }
  assert.ok(seen.size > 1);
});

test("equal bounds give that integer", () => {
  const session = new VariableBindingSession();
  assert.equal(generateNumber({ min: 5, max: 5, format: "integer" }, session.random), "5");
});

test("decimal has two fraction digits and stays in range", () => {
  const session = new VariableBindingSession({ seed: 1 });
  const value = generateNumber({ min: 10, max: 20, format: "decimal" }, session.random);
  assert.match(value, /^\d+\.\d{2}$/);
  assert.ok(Number(value) >= 10 && Number(value) <= 20);
});

test("percentage has one fraction digit", () => {
  const session = new VariableBindingSession({ seed: 2 });
  assert.match(generateNumber({ min: 0, max: 100, format: "percentage" }, session.random), /^\d+\.\d$/);
});

test("currency is a plain integer", () => {
  const session = new VariableBindingSession({ seed: 4 });
  assert.match(generateNumber({ min: 100, max: 999, format: "currency" }, session.random), /^\d{3}$/);
});

test("min greater than max is an ArgumentError", () => {
  const resolver = new VariableResolver(SINGLE_POOLS);
  const err = catchError(ArgumentError, () =>
    resolver.substitute("{{number1:9:1}}", new VariableBindingSession())
  );
  assert.equal(err.message, "Invalid number range: min 9 is greater than max 1");
  assert.equal(err.expression, "{{number1:9:1}}");
});

test("omitted number format means integer", () => {
  assert.equal(parseNumberFormat(undefined), "integer");
  const err = catchError(ArgumentError, () => parseNumberFormat("roman"));
  assert.equal(err.message, "Unknown number format: roman. Supported formats: integer, decimal, currency, percentage");
});

// ═══════════════════════════════════════════════════════════════════════════
// SCANNER
// ═══════════════════════════════════════════════════════════════════════════

section("Scanner");

test("splits text and expressions", () => {
  const nodes = parseTemplateNodes("a {{b}} c");
  assert.deepEqual(
    nodes.map((node) => (node.kind === "text" ? node.value : node.source)),
    ["a ", "{{b}}", " c"]
  );
});

test("nested expressions keep their offsets", () => {
  const [outer] = parseTemplateNodes("{{f:{{g:1}}:x}}");
  assert.equal(outer.kind, "expression");
  if (outer.kind !== "expression") return;
  assert.equal(outer.end, 15);
  const inner = outer.body.find((node) => node.kind === "expression");
  assert.equal(inner?.kind === "expression" ? inner.start : -1, 4);
});

test("closing braces with nothing open are literal text", () => {
  assert.deepEqual(parseTemplateNodes('{"a": 1}}'), [{ kind: "text", value: '{"a": 1}}' }]);
});

test("unclosed expression is a ParseError with its offset", () => {
  const err = catchError(ParseError, () => parseTemplateNodes("hello {{file_line:1"));
  assert.equal(err.message, "Unclosed '{{' at offset 6");
  assert.equal(err.offset, 6);
});

test("colons inside nested expressions do not split arguments", () => {
  const [node] = parseTemplateNodes("{{f:a:{{g:1:2}}}}");
  assert.equal(node.kind, "expression");
  if (node.kind !== "expression") return;
  assert.equal(splitArguments(node.body).length, 3);
});

test("findUnresolvedExpressions lists top-level expressions", () => {
  assert.deepEqual(findUnresolvedExpressions("done"), []);
  assert.deepEqual(findUnresolvedExpressions("x {{a:{{b}}}} y {{c}}"), ["{{a:{{b}}}}", "{{c}}"]);
});

test("listVariableTokens finds nested tokens once", () => {
  assert.deepEqual(
    listVariableTokens("{{file_line:{{number1:1:3}}:x}} {{entity1}} {{ entity1 }}"),
    ["number1:1:3", "entity1"]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// PATH VARIABLES
// ═══════════════════════════════════════════════════════════════════════════

section("Path Variables");

test("qsId formats question and sample", () => {
  assert.equal(PathResolver.qsId(201, 3), "q201_s3");
});

test("qsId rejects negative identifiers", () => {
  const err = catchError(ArgumentError, () => PathResolver.qsId(-1, 1));
  assert.equal(err.message, "Invalid question_id: -1");
});

test("artifacts defaults to test_artifacts", () => {
  assert.equal(new PathResolver().substituteArtifacts("{{artifacts}}/x"), "test_artifacts/x");
});

test("disabled artifacts fail only when referenced", () => {
  const paths = new PathResolver({ artifactsDir: null });
  assert.equal(paths.substituteArtifacts("plain"), "plain");
  const err = catchError(PathResolutionError, () => paths.substituteArtifacts("{{ artifacts }}/x"));
  assert.equal(err.variable, "artifacts");
});

test("TARGET_FILE replaces whole arguments only", () => {
  const paths = new PathResolver({ targetFile: "q1_s1/notes.txt" });
  assert.equal(paths.resolveArgument("TARGET_FILE"), "q1_s1/notes.txt");
  assert.equal(paths.resolveArgument("TARGET_FILE.bak"), "TARGET_FILE.bak");
});

test("'$' patterns in the artifacts directory are kept literally", () => {
  const paths = new PathResolver({ artifactsDir: "/data/run$&x" });
  assert.equal(paths.substituteArtifacts("{{artifacts}}/f"), "/data/run$&x/f");
  assert.equal(new PathResolver({ artifactsDir: "a$$b$'c" }).substituteArtifacts("{{artifacts}}/f"), "a$$b$'c/f");
});

test("TARGET_FILE with surrounding spaces still resolves", () => {
  assert.equal(new PathResolver({ targetFile: "notes.txt" }).resolveArgument(" TARGET_FILE "), "notes.txt");
});

test("unbound TARGET_FILE is a PathResolutionError", () => {
  const err = catchError(PathResolutionError, () => new PathResolver().resolveArgument("TARGET_FILE"));
  assert.equal(err.message, "TARGET_FILE is referenced but no target file is bound");
});

// ═══════════════════════════════════════════════════════════════════════════
// PROCESSOR / RESOLVE
// ═══════════════════════════════════════════════════════════════════════════

section("Processor / Resolve");

test("substitutes qs_id and artifacts", () => {
  const processor = makeProcessor();
  const resolved = processor.resolve("{{artifacts}}/{{qs_id}}/a.txt", context(processor));
  assert.equal(resolved.substituted, "test_artifacts/q7_s2/a.txt");
  assert.equal(resolved.original, "{{artifacts}}/{{qs_id}}/a.txt");
});

test("evaluates a function call and records its result", () => {
  const processor = makeProcessor();
  const resolved = processor.resolve("Hello {{upper: world }}!", context(processor));
  assert.equal(resolved.substituted, "Hello WORLD!");
  assert.deepEqual(resolved.functionResults, { "{{upper: world }}": "WORLD" });
});

test("nested calls evaluate innermost first", () => {
  const processor = makeProcessor();
  const resolved = processor.resolve("{{upper:{{concat:a:b}}}}", context(processor));
  assert.equal(resolved.substituted, "A+B");
  assert.deepEqual(resolved.functionResults, { "{{concat:a:b}}": "a+b", "{{upper:{{concat:a:b}}}}": "A+B" });
});

test("a nested result containing ':' stays one argument", () => {
  const processor = makeProcessor();
  assert.equal(processor.resolve("{{arg_count:{{join_colon:a:b}}}}", context(processor)).substituted, "1");
});

test("arguments are trimmed unless the function takes them raw", () => {
  const processor = makeProcessor();
  const resolved = processor.resolve("[{{raw_join: a : b }}] [{{concat: a : b }}]", context(processor));
  assert.equal(resolved.substituted, "[ a | b ] [a+b]");
});

test("an artifacts directory containing '$&' resolves to itself", () => {
  const processor = makeProcessor({ artifactsDir: "/data/run$&x" });
  assert.equal(processor.resolve("{{artifacts}}/f", context(processor)).substituted, "/data/run$&x/f");
});

test("variables resolve inside function arguments", () => {
  const processor = makeProcessor();
  const resolved = processor.resolve("{{upper:{{entity1}}}}", context(processor));
  assert.equal(resolved.substituted, "FALCON");
  assert.deepEqual(resolved.variables, { entity1: "falcon" });
});

test("closing braces after a call are literal", () => {
  const processor = makeProcessor();
  assert.equal(
    processor.resolve('{"a": {"b": {{upper:x}}}}', context(processor)).substituted,
    '{"a": {"b": X}}'
  );
});

test("TARGET_FILE binds from the context", () => {
  const processor = makeProcessor();
  const resolved = processor.resolve("{{upper:TARGET_FILE}}", context(processor, { targetFile: "notes.txt" }));
  assert.equal(resolved.substituted, "NOTES.TXT");
});

test("unknown function names the expression", () => {
  const processor = makeProcessor();
  const err = catchError(UnknownFunctionError, () => processor.resolve("x {{nope:1}}", context(processor)));
  assert.equal(err.message, "Unknown template function: nope");
  assert.equal(err.expression, "{{nope:1}}");
  assert.equal(err.describe(), "{{nope:1}}: Unknown template function: nope");
});

test("wrong argument count is an ArgumentError", () => {
  const processor = makeProcessor();
  const err = catchError(ArgumentError, () => processor.resolve("{{upper:a:b}}", context(processor)));
  assert.equal(err.message, "upper requires exactly 1 argument (text), got 2");
});

test("handler errors outside the engine become SourceFormatError", () => {
  const processor = makeProcessor();
  const err = catchError(SourceFormatError, () => processor.resolve("{{boom}}", context(processor)));
  assert.equal(err.message, "boom failed: kaput");
  assert.equal(err.expression, "{{boom}}");
});

test("nested failure keeps the inner expression", () => {
  const processor = makeProcessor();
  const err = catchError(NotFoundError, () => processor.resolve("{{upper:{{missing}}}}", context(processor)));
  assert.equal(err.expression, "{{missing}}");
});

test("empty call is a ParseError", () => {
  const processor = makeProcessor();
  const err = catchError(ParseError, () => processor.resolve("a {{}} b", context(processor)));
  assert.equal(err.message, "Empty function call");
});

test("nesting deeper than maxDepth is a ParseError", () => {
  const processor = makeProcessor({ maxDepth: 2 });
  assert.equal(processor.resolve("{{upper:{{upper:x}}}}", context(processor)).substituted, "X");
  const err = catchError(ParseError, () =>
    processor.resolve("{{upper:{{upper:{{upper:x}}}}}}", context(processor))
  );
  assert.equal(err.message, "Expression nesting exceeds the maximum depth of 2");
  assert.equal(err.expression, "{{upper:x}}");
});

test("identical calls run once per resolve", () => {
  const processor = makeProcessor();
  ticks = 0;
  assert.equal(processor.resolve("{{tick}} {{tick}}", context(processor)).substituted, "1 1");
  assert.equal(processor.resolve("{{tick}}", context(processor)).substituted, "2");
});

test("disabled artifacts fail resolution", () => {
  const processor = makeProcessor({ artifactsDir: null });
  catchError(PathResolutionError, () => processor.resolve("{{artifacts}}/x", context(processor)));
});

test("resolveFields shares one session across fields", () => {
  const processor = new TemplateProcessor({ pools: WIDE_POOLS, registry: new FunctionRegistry(STUB_FUNCTIONS) });
  const resolved = processor.resolveFields(
    { question: "Name: {{entity1}}", answer: "{{upper:{{entity1}}}}" },
    ["question", "answer"],
    { questionId: 1, sampleNumber: 1, session: processor.createSession(13) }
  );
  const name = resolved.question?.substituted.replace("Name: ", "");
  assert.equal(resolved.answer?.substituted, name?.toUpperCase());
});

// ═══════════════════════════════════════════════════════════════════════════
// PROCESSOR / DIAGNOSE
// ═══════════════════════════════════════════════════════════════════════════

section("Processor / Diagnose");

test("collects failures and keeps evaluating", () => {
  const processor = makeProcessor();
  const resolved = processor.diagnose("A {{missing}} B {{upper:ok}}", context(processor));
  assert.equal(resolved.substituted, "A {{missing}} B OK");
  assert.deepEqual(resolved.errors, [{ kind: "not_found", expression: "{{missing}}", message: "missing thing" }]);
  assert.deepEqual(resolved.functionResults, {
    "{{missing}}": "ERROR: missing thing",
    "{{upper:ok}}": "OK",
  });
});

test("a nested failure is reported once", () => {
  const processor = makeProcessor();
  const resolved = processor.diagnose("{{upper:{{missing}}}}", context(processor));
  assert.equal(resolved.substituted, "{{upper:{{missing}}}}");
  assert.equal(resolved.errors.length, 1);
  assert.equal(resolved.functionResults["{{upper:{{missing}}}}"], "ERROR: missing thing");
});

test("a failed variable is reported once", () => {
  const processor = makeProcessor();
  const resolved = processor.diagnose("{{entity1:planets}} {{entity1:planets}}", context(processor));
  assert.equal(resolved.substituted, "{{entity1:planets}} {{entity1:planets}}");
  assert.equal(resolved.errors.length, 1);
  assert.equal(resolved.errors[0].kind, "not_found");
});

test("an unclosed expression is collected as a parse failure", () => {
  const processor = makeProcessor();
  const resolved = processor.diagnose("{{upper:x", context(processor));
  assert.equal(resolved.substituted, "{{upper:x");
  assert.equal(resolved.errors[0].kind, "parse");
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
