/**
 * Host declaration loader - reads declaration files from disk and builds the
 * catalogue from them.
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { partition, type Result } from "./types/result.js";
import { hostDiagnostic, type HostDiagnostic } from "./types/diagnostic.js";
import type { HostDeclarationFile } from "./declarations/types.js";
import { readHostDeclarations } from "./declarations/reader.js";
import {
  buildHostCatalog,
  type HostCatalog,
  type HostCatalogOptions,
} from "./catalog.js";

/**
 * Declarations of the host standard library shipped with this package.
 */
export const standardDeclarationsPath = fileURLToPath(
  new URL("../declarations/standard.d.ts", import.meta.url)
);

/**
 * Load and parse a host declaration file.
 *
 * @param filePath - Path to a `.d.ts` file
 */
export const loadHostDeclarationFile = (
  filePath: string
): Result<HostDeclarationFile, HostDiagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        hostDiagnostic("HOST1001", `Declaration file not found: ${filePath}`),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        hostDiagnostic(
          "HOST1002",
          `Failed to read declaration file: ${String(error)}`
        ),
      ],
    };
  }

  return readHostDeclarations(filePath, content);
};

/**
 * Load several declaration files and build one catalogue from them.
 * Every file is read before failing, so all diagnostics are reported.
 */
export const loadHostCatalog = (
  filePaths: readonly string[],
  options: HostCatalogOptions = {}
): Result<HostCatalog, HostDiagnostic[]> => {
  const files = partition(filePaths.map(loadHostDeclarationFile));
  if (!files.ok) return files;
  return buildHostCatalog(files.value, options);
};
