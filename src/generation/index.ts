/**
 * Per-unit question generation.
 */

export {
  QuestionGenerator,
  PreparedQuestion,
  samplesFor,
  expandExpectedStructure,
  type GeneratorOptions,
  type ExpectedAnswers,
  type ExpectedDiagnosis,
  type ExpectedField,
} from "./generator.js";
