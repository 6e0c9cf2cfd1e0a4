/**
 * Dynamic access - loads, stores and calls on values whose static type is
 * `def`, through the runtime classes of a built definition.
 */

import type { NativeBinder, NativeClass } from "@sandscript/host";
import { createDiagnostic, type DiagnosticCode } from "./types/diagnostic.js";
import { NoSuchMemberError } from "./errors.js";
import { methodKey, type RuntimeClass } from "./model.js";

export type DynamicAccess = {
  readonly native: NativeBinder;
  readonly getRuntimeClass: (nativeClass: NativeClass) => RuntimeClass | undefined;
};

const noSuchMember = (code: DiagnosticCode, message: string): NoSuchMemberError =>
  new NoSuchMemberError(createDiagnostic(code, message));

const runtimeClassOf = (
  access: DynamicAccess,
  nativeClass: NativeClass
): RuntimeClass => {
  const runtimeClass = access.getRuntimeClass(nativeClass);
  if (!runtimeClass) {
    throw noSuchMember(
      "DEF1904",
      `Class '${nativeClass.name}' does not support dynamic access`
    );
  }
  return runtimeClass;
};

/**
 * Read `property` from `receiver`, an instance of `nativeClass`.
 */
export const loadDynamicProperty = (
  access: DynamicAccess,
  nativeClass: NativeClass,
  receiver: unknown,
  property: string
): unknown => {
  const getter = runtimeClassOf(access, nativeClass).getters.get(property);
  if (!getter) {
    throw noSuchMember(
      "DEF1901",
      `Unable to find dynamic field [${property}] for class [${nativeClass.name}]`
    );
  }

  return getter.kind === "field"
    ? access.native.getField(getter.field.native, receiver)
    : access.native.invoke(getter.method.native, receiver, []);
};

/**
 * Write `value` to `property` of `receiver`, an instance of `nativeClass`.
 */
export const storeDynamicProperty = (
  access: DynamicAccess,
  nativeClass: NativeClass,
  receiver: unknown,
  property: string,
  value: unknown
): void => {
  const setter = runtimeClassOf(access, nativeClass).setters.get(property);
  if (!setter) {
    throw noSuchMember(
      "DEF1902",
      `Unable to find dynamic field [${property}] for class [${nativeClass.name}]`
    );
  }

  if (setter.kind === "field") {
    access.native.setField(setter.field.native, receiver, value);
  } else {
    access.native.invoke(setter.method.native, receiver, [value]);
  }
};

/**
 * Call the instance method `name` of `receiver` with `args`.
 */
export const invokeDynamicMethod = (
  access: DynamicAccess,
  nativeClass: NativeClass,
  receiver: unknown,
  name: string,
  args: readonly unknown[]
): unknown => {
  const key = methodKey(name, args.length);
  const method = runtimeClassOf(access, nativeClass).methods.get(key);
  if (!method) {
    throw noSuchMember(
      "DEF1903",
      `Unable to find dynamic method [${key}] for class [${nativeClass.name}]`
    );
  }

  return access.native.invoke(method.native, receiver, args);
};
