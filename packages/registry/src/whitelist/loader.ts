/**
 * Whitelist loading and validation
 */

import * as fs from "node:fs";
import type { Result } from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import type {
  Whitelist,
  WhitelistCast,
  WhitelistConstructor,
  WhitelistField,
  WhitelistInheritance,
  WhitelistMembers,
  WhitelistMethod,
  WhitelistStruct,
  WhitelistTransform,
} from "./types.js";

type JsonObject = { readonly [key: string]: unknown };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const memberPath = (path: string, key: string): string =>
  path === "" ? key : `${path}.${key}`;

/**
 * Collects every structural problem instead of stopping at the first one.
 */
class WhitelistValidator {
  readonly issues: Diagnostic[] = [];

  constructor(private readonly source: string) {}

  invalid(path: string, expected: string): undefined {
    this.issues.push(
      createDiagnostic(
        "DEF2104",
        `Invalid whitelist ${this.source}: '${path}' must be ${expected}`
      )
    );
    return undefined;
  }

  object(value: unknown, path: string): JsonObject | undefined {
    return isObject(value) ? value : this.invalid(path, "an object");
  }

  string(record: JsonObject, key: string, path: string): string | undefined {
    const value = record[key];
    return typeof value === "string" && value.length > 0
      ? value
      : this.invalid(memberPath(path, key), "a non-empty string");
  }

  /**
   * Undefined when absent; reported when present but not a string.
   */
  optionalString(
    record: JsonObject,
    key: string,
    path: string
  ): string | undefined {
    return record[key] === undefined
      ? undefined
      : this.string(record, key, path);
  }

  boolean(
    record: JsonObject,
    key: string,
    path: string,
    fallback?: boolean
  ): boolean | undefined {
    const value = record[key];
    if (value === undefined && fallback !== undefined) return fallback;
    return typeof value === "boolean"
      ? value
      : this.invalid(memberPath(path, key), "a boolean");
  }

  strings(
    record: JsonObject,
    key: string,
    path: string
  ): readonly string[] | undefined {
    const value = record[key];
    if (!Array.isArray(value)) {
      return this.invalid(memberPath(path, key), "an array of strings");
    }

    const strings: string[] = [];
    for (const [index, item] of value.entries()) {
      if (typeof item !== "string" || item.length === 0) {
        return this.invalid(
          `${memberPath(path, key)}[${index}]`,
          "a non-empty string"
        );
      }
      strings.push(item);
    }
    return strings;
  }

  optionalStrings(
    record: JsonObject,
    key: string,
    path: string
  ): readonly string[] | undefined {
    return record[key] === undefined
      ? undefined
      : this.strings(record, key, path);
  }

  /**
   * A list of `key` entries; an absent key is an empty list. Invalid entries
   * are reported and dropped, so the caller must check `issues`.
   */
  list<T>(
    record: JsonObject,
    key: string,
    path: string,
    readItem: (item: JsonObject, itemPath: string) => T | undefined
  ): readonly T[] {
    const value = record[key];
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      this.invalid(memberPath(path, key), "an array");
      return [];
    }

    const items: T[] = [];
    for (const [index, entry] of value.entries()) {
      const itemPath = `${memberPath(path, key)}[${index}]`;
      const item = this.object(entry, itemPath);
      if (!item) continue;
      const read = readItem(item, itemPath);
      if (read !== undefined) items.push(read);
    }
    return items;
  }
}

const readStruct = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistStruct | undefined => {
  const name = v.string(item, "name", path);
  const cls = v.string(item, "class", path);
  return name !== undefined && cls !== undefined
    ? { name, class: cls }
    : undefined;
};

const readConstructor = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistConstructor | undefined => {
  const args = v.strings(item, "args", path);
  const genericArgs = v.optionalStrings(item, "genericArgs", path);
  return args !== undefined ? { args, genericArgs } : undefined;
};

const readMethod = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistMethod | undefined => {
  const name = v.string(item, "name", path);
  const alias = v.optionalString(item, "alias", path);
  const isStatic = v.boolean(item, "static", path, false);
  const returns = v.string(item, "returns", path);
  const args = v.strings(item, "args", path);
  const genericReturn = v.optionalString(item, "genericReturn", path);
  const genericArgs = v.optionalStrings(item, "genericArgs", path);
  if (
    name === undefined ||
    isStatic === undefined ||
    returns === undefined ||
    args === undefined
  ) {
    return undefined;
  }
  return {
    name,
    alias,
    static: isStatic,
    returns,
    args,
    genericReturn,
    genericArgs,
  };
};

const readField = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistField | undefined => {
  const name = v.string(item, "name", path);
  const alias = v.optionalString(item, "alias", path);
  const isStatic = v.boolean(item, "static", path, false);
  const type = v.string(item, "type", path);
  const generic = v.optionalString(item, "generic", path);
  if (name === undefined || isStatic === undefined || type === undefined) {
    return undefined;
  }
  return { name, alias, static: isStatic, type, generic };
};

const readMembers = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistMembers | undefined => {
  const struct = v.string(item, "struct", path);
  const constructors = v.list(item, "constructors", path, (entry, p) =>
    readConstructor(v, entry, p)
  );
  const methods = v.list(item, "methods", path, (entry, p) =>
    readMethod(v, entry, p)
  );
  const fields = v.list(item, "fields", path, (entry, p) =>
    readField(v, entry, p)
  );
  return struct !== undefined
    ? { struct, constructors, methods, fields }
    : undefined;
};

const readInheritance = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistInheritance | undefined => {
  const struct = v.string(item, "struct", path);
  const parents = v.strings(item, "parents", path);
  return struct !== undefined && parents !== undefined
    ? { struct, parents }
    : undefined;
};

const readCast = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistCast | undefined => {
  const from = v.string(item, "from", path);
  const to = v.string(item, "to", path);
  const explicit = v.boolean(item, "explicit", path);
  return from !== undefined && to !== undefined && explicit !== undefined
    ? { from, to, explicit }
    : undefined;
};

const readTransform = (
  v: WhitelistValidator,
  item: JsonObject,
  path: string
): WhitelistTransform | undefined => {
  const cast = readCast(v, item, path);
  const owner = v.string(item, "owner", path);
  const adapter = v.string(item, "adapter", path);
  const isStatic = v.boolean(item, "static", path);
  return cast !== undefined &&
    owner !== undefined &&
    adapter !== undefined &&
    isStatic !== undefined
    ? { ...cast, owner, adapter, static: isStatic }
    : undefined;
};

/**
 * Validate parsed JSON as a whitelist, reporting every problem found.
 *
 * @param source - File name or label used in diagnostics
 */
export const parseWhitelist = (
  data: unknown,
  source: string
): Result<Whitelist, Diagnostic[]> => {
  const v = new WhitelistValidator(source);
  const root = v.object(data, "$");
  if (!root) return { ok: false, error: v.issues };

  const structs = v.list(root, "structs", "", (item, path) =>
    readStruct(v, item, path)
  );
  const members = v.list(root, "members", "", (item, path) =>
    readMembers(v, item, path)
  );
  const inheritance = v.list(root, "inheritance", "", (item, path) =>
    readInheritance(v, item, path)
  );
  const casts = v.list(root, "casts", "", (item, path) =>
    readCast(v, item, path)
  );
  const transforms = v.list(root, "transforms", "", (item, path) =>
    readTransform(v, item, path)
  );
  const runtimeClasses =
    root["runtimeClasses"] === undefined
      ? []
      : v.strings(root, "runtimeClasses", "");

  if (v.issues.length > 0 || runtimeClasses === undefined) {
    return { ok: false, error: v.issues };
  }

  return {
    ok: true,
    value: { structs, members, inheritance, casts, transforms, runtimeClasses },
  };
};

/**
 * Load and validate a whitelist JSON file
 */
export const loadWhitelistFile = (
  filePath: string
): Result<Whitelist, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic("DEF2101", `Whitelist file not found: ${filePath}`),
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
        createDiagnostic(
          "DEF2102",
          `Failed to read whitelist file: ${String(error)}`
        ),
      ],
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "DEF2103",
          `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        ),
      ],
    };
  }

  return parseWhitelist(data, filePath);
};
