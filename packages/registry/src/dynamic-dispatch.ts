/**
 * DynamicDispatchIndex - per native class accessor tables for values whose
 * static type is `def`.
 *
 * Getters and setters are derived from the struct's already flattened maps:
 * instance fields first, then bean-style `getX`/`isX`/`setX` methods.
 */

import type { NativeClass, Result } from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import type {
  DynamicAccessor,
  Method,
  MethodKey,
  RuntimeClass,
  Struct,
} from "./model.js";
import { readOnlyMap } from "./model.js";

export type RuntimeClassLookup = ReadonlyMap<string, RuntimeClass>;

const isUpperCase = (ch: string): boolean =>
  ch !== ch.toLowerCase() && ch === ch.toUpperCase();

/**
 * `getFooBar` with prefix `get` becomes `fooBar`; names without an uppercase
 * letter after the prefix are not accessors.
 */
export const accessorProperty = (
  methodName: string,
  prefix: "get" | "is" | "set"
): string | undefined => {
  if (!methodName.startsWith(prefix)) return undefined;
  const first = methodName.charAt(prefix.length);
  if (first === "" || !isUpperCase(first)) return undefined;
  return first.toLowerCase() + methodName.slice(prefix.length + 1);
};

const getterProperty = (method: Method): string | undefined =>
  method.args.length === 0
    ? accessorProperty(method.name, "get") ?? accessorProperty(method.name, "is")
    : undefined;

const setterProperty = (method: Method): string | undefined =>
  method.args.length === 1 ? accessorProperty(method.name, "set") : undefined;

/**
 * Derive the runtime class of a struct from its member maps.
 */
export const deriveRuntimeClass = (struct: Struct): RuntimeClass => {
  const getters = new Map<string, DynamicAccessor>();
  const setters = new Map<string, DynamicAccessor>();

  for (const [name, field] of struct.fields) {
    getters.set(name, { kind: "field", field });
    if (field.writable) {
      setters.set(name, { kind: "field", field });
    }
  }

  for (const method of struct.methods.values()) {
    const getter = getterProperty(method);
    if (getter !== undefined && !getters.has(getter)) {
      getters.set(getter, { kind: "method", method });
    }

    const setter = setterProperty(method);
    if (setter !== undefined && !setters.has(setter)) {
      setters.set(setter, { kind: "method", method });
    }
  }

  return Object.freeze({
    nativeClass: struct.nativeClass,
    methods: readOnlyMap(new Map(struct.methods)),
    getters: readOnlyMap(getters),
    setters: readOnlyMap(setters),
  });
};

export const resolveDynamicGetter = (
  table: RuntimeClassLookup,
  nativeClass: NativeClass,
  property: string
): DynamicAccessor | undefined =>
  table.get(nativeClass.descriptor)?.getters.get(property);

export const resolveDynamicSetter = (
  table: RuntimeClassLookup,
  nativeClass: NativeClass,
  property: string
): DynamicAccessor | undefined =>
  table.get(nativeClass.descriptor)?.setters.get(property);

export const resolveDynamicMethod = (
  table: RuntimeClassLookup,
  nativeClass: NativeClass,
  key: MethodKey
): Method | undefined => table.get(nativeClass.descriptor)?.methods.get(key);

export class DynamicDispatchIndex {
  private readonly table = new Map<string, RuntimeClass>();

  get entries(): RuntimeClassLookup {
    return this.table;
  }

  /**
   * Enrol a struct's native class for dynamic access. One struct per class.
   */
  addRuntimeClass(struct: Struct): Result<RuntimeClass, Diagnostic> {
    if (this.table.has(struct.descriptor)) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1202",
          `Native class '${struct.nativeClass.name}' of struct '${struct.name}' already has a runtime class`,
          "Enrol only one struct per native class"
        ),
      };
    }

    const runtimeClass = deriveRuntimeClass(struct);
    this.table.set(struct.descriptor, runtimeClass);
    return { ok: true, value: runtimeClass };
  }
}
