/**
 * Entity pools for `{{entityN}}` and `{{entityN:pool}}` placeholders.
 */

export { EntityPools, DEFAULT_POOL_NAME } from "./pool.js";
export {
  EntityPoolLoader,
  EntityPoolLoadError,
  NamedPoolsSchema,
  parsePoolText,
  DEFAULT_POOL_FILE,
  NAMED_POOLS_FILE,
} from "./loader.js";
