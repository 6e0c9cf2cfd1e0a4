/**
 * @sandscript/host - host class catalogue and native binder
 */

export * from "./types/result.js";
export * from "./types/diagnostic.js";
export * from "./native.js";
export * from "./declarations/types.js";
export { readHostDeclarations } from "./declarations/reader.js";
export {
  HostCatalog,
  buildHostCatalog,
  PRIMITIVE_CLASS_NAMES,
  DEFAULT_ROOT_CLASS_NAME,
  type PrimitiveClassName,
  type HostCatalogOptions,
} from "./catalog.js";
export { CatalogBinder, type HostImplementations } from "./binder.js";
export { HostInvocationError } from "./errors.js";
export {
  loadHostDeclarationFile,
  loadHostCatalog,
  standardDeclarationsPath,
} from "./loader.js";
