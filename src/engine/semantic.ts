/**
 * Value generators for `{{semanticN:kind}}` and `{{numberN:min:max:format}}`.
 */

import type { Faker } from "@faker-js/faker";

import { NumberFormat, SemanticKind } from "../config/engine/enums.js";
import type { EntityPools } from "../entities/pool.js";
import { DEFAULT_POOL_NAME } from "../entities/pool.js";
import { ArgumentError } from "./errors.js";

// ---------------------------------------------------------------------------
// Fixed vocabularies
// ---------------------------------------------------------------------------

const STATUSES = [
  "active",
  "inactive",
  "completed",
  "pending",
  "cancelled",
  "approved",
  "rejected",
  "processing",
] as const;

const DEPARTMENTS = [
  "Engineering",
  "Sales",
  "Marketing",
  "Finance",
  "HR",
  "Operations",
  "IT",
  "Legal",
  "Customer Service",
  "Research",
] as const;

const REGIONS = [
  "North",
  "South",
  "East",
  "West",
  "Central",
  "Northeast",
  "Southeast",
  "Southwest",
  "Northwest",
  "Midwest",
] as const;

const COURSES = [
  "Math 101",
  "Physics 201",
  "Chemistry 301",
  "Biology 101",
  "Engineering 401",
  "Computer Science 202",
  "Statistics 301",
  "Calculus 401",
  "Data Science 501",
  "Economics 101",
  "Psychology 201",
  "History 101",
  "Literature 301",
  "Art 201",
] as const;

const CATEGORIES = [
  "Electronics",
  "Clothing",
  "Books",
  "Home & Garden",
  "Sports",
  "Toys",
  "Automotive",
  "Health",
  "Beauty",
  "Food",
] as const;

const SEASONS = ["Spring", "Summer", "Fall", "Winter"] as const;
const SEMESTER_YEARS = ["2023", "2024", "2025"] as const;
const BOOLEANS = ["true", "false", "yes", "no", "1", "0"] as const;

const DATE_FROM = "2020-01-01T00:00:00.000Z";
const DATE_TO = "2025-12-28T23:59:59.999Z";

// ---------------------------------------------------------------------------
// Semantic generators
// ---------------------------------------------------------------------------

type SemanticGenerator = (random: Faker, pools: EntityPools) => string;

const int = (random: Faker, min: number, max: number): string =>
  String(random.number.int({ min, max }));

const SEMANTIC_GENERATORS: Record<SemanticKind, SemanticGenerator> = {
  person_name: (r) => r.person.fullName(),
  first_name: (r) => r.person.firstName(),
  last_name: (r) => r.person.lastName(),
  email: (r) => r.internet.email().toLowerCase(),
  age: (r) => int(r, 18, 70),
  city: (r) => r.location.city(),
  city_name: (r) => r.location.city(),
  company: (r) => r.company.name(),
  company_name: (r) => r.company.name(),
  product: (r) => r.commerce.productName(),
  product_name: (r) => r.commerce.productName(),
  currency: (r) => int(r, 1000, 100000),
  salary: (r) => int(r, 30000, 150000),
  price: (r) => r.commerce.price({ min: 10, max: 500, dec: 2 }),
  phone: (r) => r.phone.number(),
  date: (r) => r.date.between({ from: DATE_FROM, to: DATE_TO }).toISOString().slice(0, 10),
  status: (r) => r.helpers.arrayElement(STATUSES),
  department: (r) => r.helpers.arrayElement(DEPARTMENTS),
  region: (r) => r.helpers.arrayElement(REGIONS),
  id: (r) => int(r, 1, 9999),
  experience: (r) => int(r, 0, 40),
  score: (r) => int(r, 60, 100),
  course: (r) => r.helpers.arrayElement(COURSES),
  semester: (r) => `${r.helpers.arrayElement(SEASONS)} ${r.helpers.arrayElement(SEMESTER_YEARS)}`,
  category: (r) => r.helpers.arrayElement(CATEGORIES),
  boolean: (r) => r.helpers.arrayElement(BOOLEANS),
  lorem_word: (r) => r.lorem.word(),
  lorem_words: (r) => r.lorem.words({ min: 2, max: 5 }),
  entity_pool: (r, pools) => pools.draw(DEFAULT_POOL_NAME, r),
};

/**
 * Parse a semantic kind.
 * @throws ArgumentError for kinds without a generator
 */
export function parseSemanticKind(kind: string): SemanticKind {
  const result = SemanticKind.safeParse(kind);
  if (!result.success) {
    throw new ArgumentError(
      `Unknown semantic kind: ${kind}. Supported kinds: ${SemanticKind.options.join(", ")}`
    );
  }
  return result.data;
}

export function generateSemantic(kind: SemanticKind, random: Faker, pools: EntityPools): string {
  return SEMANTIC_GENERATORS[kind](random, pools);
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

export interface NumericSpec {
  min: number;
  max: number;
  format: NumberFormat;
}

/**
 * Parse a number format tag; an omitted tag means integer.
 * @throws ArgumentError for unknown tags
 */
export function parseNumberFormat(format: string | undefined): NumberFormat {
  if (format === undefined) return "integer";
  const result = NumberFormat.safeParse(format);
  if (!result.success) {
    throw new ArgumentError(
      `Unknown number format: ${format}. Supported formats: ${NumberFormat.options.join(", ")}`
    );
  }
  return result.data;
}

/**
 * Sample uniformly in [min, max] and render per format.
 *
 *   integer, currency → "42"
 *   decimal           → "42.17"
 *   percentage        → "42.2"
 */
export function generateNumber(spec: NumericSpec, random: Faker): string {
  const { min, max, format } = spec;
  if (min > max) {
    throw new ArgumentError(`Invalid number range: min ${min} is greater than max ${max}`);
  }

  switch (format) {
    case "integer":
    case "currency":
      return String(random.number.int({ min, max }));
    case "decimal":
      return random.number.float({ min, max, fractionDigits: 2 }).toFixed(2);
    case "percentage":
      return random.number.float({ min, max, fractionDigits: 1 }).toFixed(1);
  }
}
