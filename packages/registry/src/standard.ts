/**
 * Definition loading - host declarations plus a whitelist, and the shared
 * standard definition built from the files shipped with the packages.
 */

import { fileURLToPath } from "node:url";
import {
  CatalogBinder,
  loadHostCatalog,
  standardDeclarationsPath,
  type HostImplementations,
  type Result,
} from "@sandscript/host";
import type { Diagnostic } from "./types/diagnostic.js";
import { DefinitionBuilder } from "./builder.js";
import type { Definition, DefinitionOptions } from "./definition.js";
import { loadWhitelistFile } from "./whitelist/loader.js";
import { applyWhitelist } from "./whitelist/apply.js";

export const standardWhitelistPath = fileURLToPath(
  new URL("../whitelist/standard.json", import.meta.url)
);

export type DefinitionConfig = {
  /** Host declaration files (`.d.ts`) describing the native classes */
  readonly declarationPaths: readonly string[];
  readonly whitelistPath: string;
  /** JavaScript implementations used when members are invoked */
  readonly implementations?: HostImplementations;
  readonly options?: DefinitionOptions;
};

/**
 * Build a definition from host declaration files and a whitelist file.
 */
export const loadDefinition = (
  config: DefinitionConfig
): Result<Definition, Diagnostic[]> => {
  const options = config.options ?? {};

  const catalog = loadHostCatalog(config.declarationPaths, {
    rootClassName: options.rootClassName,
  });
  if (!catalog.ok) return catalog;

  const whitelist = loadWhitelistFile(config.whitelistPath);
  if (!whitelist.ok) return whitelist;

  const builder = new DefinitionBuilder(
    new CatalogBinder(catalog.value, config.implementations),
    options
  );

  const applied = applyWhitelist(builder, whitelist.value);
  if (!applied.ok) return { ok: false, error: [applied.error] };

  const built = builder.build();
  return built.ok ? built : { ok: false, error: [built.error] };
};

let standardDefinition: Result<Definition, Diagnostic[]> | undefined;

/**
 * The standard definition, built on first use and shared by every caller in
 * the process.
 */
export const loadStandardDefinition = (): Result<Definition, Diagnostic[]> => {
  if (!standardDefinition) {
    standardDefinition = loadDefinition({
      declarationPaths: [standardDeclarationsPath],
      whitelistPath: standardWhitelistPath,
    });
  }
  return standardDefinition;
};
