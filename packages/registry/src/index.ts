/**
 * @sandscript/registry - struct table, overload resolution, coercion matrix
 * and dynamic dispatch for sandscript
 */

export * from "./types/diagnostic.js";
export * from "./sort.js";
export * from "./model.js";
export {
  TypeRegistry,
  TypeResolver,
  parseTypeName,
  STRUCT_NAME_PATTERN,
  DEFAULT_DYNAMIC_STRUCT_NAME,
  type TypeRegistryOptions,
} from "./type-registry.js";
export {
  Binder,
  MEMBER_NAME_PATTERN,
  type MethodSpec,
  type FieldSpec,
} from "./binder.js";
export { InheritanceResolver, type CopyResult } from "./inheritance.js";
export {
  CastTable,
  getCast,
  resolveCast,
  requireCast,
  type CastLookup,
} from "./cast-table.js";
export {
  DynamicDispatchIndex,
  accessorProperty,
  deriveRuntimeClass,
  type RuntimeClassLookup,
} from "./dynamic-dispatch.js";
export {
  Definition,
  type DefinitionOptions,
  type DefinitionParts,
} from "./definition.js";
export {
  DefinitionBuilder,
  BUILD_PHASES,
  type BuildPhase,
} from "./builder.js";
export { NoSuchMemberError } from "./errors.js";
export {
  loadDynamicProperty,
  storeDynamicProperty,
  invokeDynamicMethod,
  type DynamicAccess,
} from "./runtime.js";
export * from "./whitelist/types.js";
export { parseWhitelist, loadWhitelistFile } from "./whitelist/loader.js";
export { applyWhitelist } from "./whitelist/apply.js";
export {
  loadDefinition,
  loadStandardDefinition,
  standardWhitelistPath,
  type DefinitionConfig,
} from "./standard.js";
