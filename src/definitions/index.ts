/**
 * Test definitions: YAML question specs validated with zod.
 */

export {
  SandboxSetupSchema,
  TestDefinitionSchema,
  TestDefinitionFileSchema,
  REQUIRED_FIELDS,
  type SandboxSetup,
  type TestDefinition,
  type TestDefinitionFile,
  type RequirableField,
} from "./schema.js";

export {
  TestDefinitionError,
  parseTestDefinitions,
  parseTestDefinitionsYaml,
  loadTestDefinitions,
  findDefinition,
} from "./loader.js";
