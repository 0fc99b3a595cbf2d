/**
 * Enumerations shared by the template engine, test definitions and
 * the engine configuration.
 *
 * Templates and definition files refer to these by their string values,
 * so renaming a member breaks existing test suites.
 */

import { z } from "zod";

/**
 * Formats accepted by `{{numberN:min:max:format}}`.
 *
 *   integer     uniform integer in [min, max] (default)
 *   decimal     uniform real, two fraction digits
 *   currency    uniform integer amount
 *   percentage  uniform real, one fraction digit
 */
export const NumberFormat = z.enum(["integer", "decimal", "currency", "percentage"]);
export type NumberFormat = z.infer<typeof NumberFormat>;

/**
 * Kinds accepted by `{{semanticN:kind}}`.
 * Aliases (`city_name`, `company_name`, `product_name`) draw from the same
 * generator as their short forms.
 */
export const SemanticKind = z.enum([
  "person_name",
  "first_name",
  "last_name",
  "email",
  "age",
  "city",
  "city_name",
  "company",
  "company_name",
  "product",
  "product_name",
  "currency",
  "salary",
  "price",
  "phone",
  "date",
  "status",
  "department",
  "region",
  "id",
  "experience",
  "score",
  "course",
  "semester",
  "category",
  "boolean",
  "lorem_word",
  "lorem_words",
  "entity_pool",
]);
export type SemanticKind = z.infer<typeof SemanticKind>;

/**
 * Scoring types a test definition may name. Scoring itself happens
 * outside the engine; the type decides which fields a definition needs.
 */
export const ScoringType = z.enum([
  "stringmatch",
  "readfile_stringmatch",
  "readfile_jsonmatch",
  "jsonmatch",
  "files_exist",
  "directory_structure",
  "json_targeted_edit",
]);
export type ScoringType = z.infer<typeof ScoringType>;
