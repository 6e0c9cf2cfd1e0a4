/**
 * Binder - validates whitelisted constructors, methods and fields against the
 * host and attaches them to their owner structs.
 *
 * Checks run cheapest first: names and overload keys are validated before the
 * native member is looked up.
 */

import type { NativeBinder, NativeClass, Result } from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import {
  CONSTRUCTOR_NAME,
  methodKey,
  type Constructor,
  type Field,
  type Method,
  type MethodKey,
  type Struct,
  type Type,
} from "./model.js";
import type { StructMembers, TypeRegistry } from "./type-registry.js";

export const MEMBER_NAME_PATTERN = /^[_a-zA-Z][_a-zA-Z0-9]*$/;

export type MethodSpec = {
  /** Native method name when it differs from the script name */
  readonly alias?: string;
  readonly isStatic?: boolean;
  readonly returns: Type;
  readonly args: readonly Type[];
  readonly genericReturn?: Type;
  readonly genericArgs?: readonly Type[];
};

export type FieldSpec = {
  /** Native field name when it differs from the script name */
  readonly alias?: string;
  readonly isStatic?: boolean;
  readonly type: Type;
  readonly generic?: Type;
};

type Category = "constructor" | "static method" | "method";

const fail = <T>(
  code: Diagnostic["code"],
  message: string,
  hint?: string
): Result<T, Diagnostic> => ({
  ok: false,
  error: createDiagnostic(code, message, hint),
});

const nativeClasses = (types: readonly Type[]): readonly NativeClass[] =>
  types.map((type) => type.nativeClass);

const typeNames = (types: readonly Type[]): string =>
  `(${types.map((type) => type.name).join(", ")})`;

export class Binder {
  constructor(
    private readonly registry: TypeRegistry,
    private readonly native: NativeBinder
  ) {}

  addConstructor(
    ownerName: string,
    args: readonly Type[],
    genericArgs?: readonly Type[]
  ): Result<Constructor, Diagnostic> {
    const owner = this.registry.requireStruct(ownerName);
    if (!owner.ok) return owner;
    const struct = owner.value;
    const members = this.registry.membersOf(struct);

    const key = methodKey(CONSTRUCTOR_NAME, args.length);
    const collision = this.checkOverload(struct, members, key, "constructor");
    if (!collision.ok) return collision;

    const generics = this.checkGenericArgs(struct, CONSTRUCTOR_NAME, args, genericArgs);
    if (!generics.ok) return generics;

    const native = this.native.findConstructor(
      struct.nativeClass,
      nativeClasses(args)
    );
    if (!native) {
      return fail(
        "DEF1701",
        `Constructor ${typeNames(args)} not found on native class '${struct.nativeClass.name}' for struct '${struct.name}'`
      );
    }

    const constructor: Constructor = Object.freeze({
      kind: "constructor",
      name: CONSTRUCTOR_NAME,
      owner: struct,
      args: generics.value,
      declaredArgs: args,
      native,
    });
    members.constructors.set(key, constructor);
    return { ok: true, value: constructor };
  }

  addMethod(
    ownerName: string,
    name: string,
    spec: MethodSpec
  ): Result<Method, Diagnostic> {
    const owner = this.registry.requireStruct(ownerName);
    if (!owner.ok) return owner;
    const struct = owner.value;
    const members = this.registry.membersOf(struct);
    const isStatic = spec.isStatic ?? false;

    if (!MEMBER_NAME_PATTERN.test(name)) {
      return fail(
        "DEF1002",
        `Invalid method name '${name}' in struct '${struct.name}'`
      );
    }

    const key = methodKey(name, spec.args.length);
    const collision = this.checkOverload(
      struct,
      members,
      key,
      isStatic ? "static method" : "method"
    );
    if (!collision.ok) return collision;

    const generics = this.checkGenericArgs(struct, name, spec.args, spec.genericArgs);
    if (!generics.ok) return generics;

    if (
      spec.genericReturn &&
      !this.native.isAssignable(
        spec.returns.nativeClass,
        spec.genericReturn.nativeClass
      )
    ) {
      return fail(
        "DEF1602",
        `Generic return '${spec.genericReturn.name}' of '${struct.name}.${name}' is not assignable to '${spec.returns.name}'`
      );
    }

    const nativeName = spec.alias ?? name;
    const native = this.native.findMethod(
      struct.nativeClass,
      nativeName,
      nativeClasses(spec.args)
    );
    if (!native) {
      return fail(
        "DEF1701",
        `Method '${nativeName}${typeNames(spec.args)}' not found on native class '${struct.nativeClass.name}' for struct '${struct.name}'`
      );
    }

    if (native.isStatic !== isStatic) {
      return fail(
        "DEF1702",
        `Method '${struct.name}.${name}' is declared ${isStatic ? "static" : "instance"} but the native method is ${native.isStatic ? "static" : "instance"}`
      );
    }

    if (native.returns.descriptor !== spec.returns.nativeClass.descriptor) {
      return fail(
        "DEF1704",
        `Method '${struct.name}.${name}' declares return '${spec.returns.name}' but the native method returns '${native.returns.name}'`,
        "Use genericReturn to narrow the script-visible return type"
      );
    }

    const method: Method = Object.freeze({
      kind: "method",
      name,
      owner: struct,
      isStatic,
      returns: spec.genericReturn ?? spec.returns,
      args: generics.value,
      declaredReturns: spec.returns,
      declaredArgs: spec.args,
      native,
    });
    (isStatic ? members.staticMethods : members.methods).set(key, method);
    return { ok: true, value: method };
  }

  addField(
    ownerName: string,
    name: string,
    spec: FieldSpec
  ): Result<Field, Diagnostic> {
    const owner = this.registry.requireStruct(ownerName);
    if (!owner.ok) return owner;
    const struct = owner.value;
    const members = this.registry.membersOf(struct);
    const isStatic = spec.isStatic ?? false;

    if (!MEMBER_NAME_PATTERN.test(name)) {
      return fail(
        "DEF1002",
        `Invalid field name '${name}' in struct '${struct.name}'`
      );
    }

    if (members.staticFields.has(name) || members.fields.has(name)) {
      const existing = members.staticFields.has(name) ? "static" : "instance";
      return fail(
        "DEF1401",
        `Field '${name}' is already defined as a ${existing} field of struct '${struct.name}'`
      );
    }

    if (
      spec.generic &&
      !this.native.isAssignable(spec.type.nativeClass, spec.generic.nativeClass)
    ) {
      return fail(
        "DEF1602",
        `Generic type '${spec.generic.name}' of field '${struct.name}.${name}' is not assignable to '${spec.type.name}'`
      );
    }

    const nativeName = spec.alias ?? name;
    const native = this.native.findField(struct.nativeClass, nativeName);
    if (!native) {
      return fail(
        "DEF1701",
        `Field '${nativeName}' not found on native class '${struct.nativeClass.name}' for struct '${struct.name}'`
      );
    }

    if (native.isStatic !== isStatic) {
      return fail(
        "DEF1702",
        `Field '${struct.name}.${name}' is declared ${isStatic ? "static" : "instance"} but the native field is ${native.isStatic ? "static" : "instance"}`
      );
    }

    if (isStatic && !native.isReadonly) {
      return fail(
        "DEF1703",
        `Static field '${struct.name}.${name}' must be bound to a readonly native field`
      );
    }

    const field: Field = Object.freeze({
      kind: "field",
      name,
      owner: struct,
      isStatic,
      type: spec.type,
      generic: spec.generic ?? spec.type,
      writable: !isStatic && !native.isReadonly,
      native,
    });
    (isStatic ? members.staticFields : members.fields).set(name, field);
    return { ok: true, value: field };
  }

  /**
   * A key may appear once per category, and in only one category.
   */
  private checkOverload(
    struct: Struct,
    members: StructMembers,
    key: MethodKey,
    category: Category
  ): Result<void, Diagnostic> {
    const maps: readonly [Category, ReadonlyMap<MethodKey, unknown>][] = [
      ["constructor", members.constructors],
      ["static method", members.staticMethods],
      ["method", members.methods],
    ];

    for (const [existing, map] of maps) {
      if (!map.has(key)) continue;
      return existing === category
        ? fail(
            "DEF1301",
            `Duplicate ${category} '${key}' in struct '${struct.name}'`,
            "Only one overload per name and argument count is allowed"
          )
        : fail(
            "DEF1302",
            `${category} '${key}' collides with a ${existing} of the same key in struct '${struct.name}'`
          );
    }

    return { ok: true, value: undefined };
  }

  /**
   * Validate generic arguments and return the script-visible argument types.
   */
  private checkGenericArgs(
    struct: Struct,
    name: string,
    args: readonly Type[],
    genericArgs: readonly Type[] | undefined
  ): Result<readonly Type[], Diagnostic> {
    if (!genericArgs) return { ok: true, value: args };

    if (genericArgs.length !== args.length) {
      return fail(
        "DEF1601",
        `'${struct.name}.${name}' has ${genericArgs.length} generic arguments for ${args.length} arguments`
      );
    }

    for (const [index, generic] of genericArgs.entries()) {
      const declared = args[index];
      if (!declared || !this.native.isAssignable(declared.nativeClass, generic.nativeClass)) {
        return fail(
          "DEF1602",
          `Generic argument '${generic.name}' of '${struct.name}.${name}' is not assignable to '${declared?.name ?? "?"}'`
        );
      }
    }

    return { ok: true, value: genericArgs };
  }
}
