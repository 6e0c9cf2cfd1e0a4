/**
 * InheritanceResolver - copies inherited instance members down the struct
 * lattice so every struct's maps hold its full effective membership.
 */

import type { NativeBinder, NativeClass, Result } from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import type { Field, Method, Struct } from "./model.js";
import type { TypeRegistry } from "./type-registry.js";

export type CopyResult = {
  readonly methods: number;
  readonly fields: number;
};

export class InheritanceResolver {
  constructor(
    private readonly registry: TypeRegistry,
    private readonly native: NativeBinder,
    private readonly rootClassName: string
  ) {}

  /**
   * Copy every instance method and field of `parentNames` that `ownerName`
   * does not define yet. Earlier parents win.
   */
  copyStruct(
    ownerName: string,
    parentNames: readonly string[]
  ): Result<CopyResult, Diagnostic> {
    const owner = this.registry.requireStruct(ownerName);
    if (!owner.ok) return owner;
    const struct = owner.value;
    const members = this.registry.membersOf(struct);

    let methods = 0;
    let fields = 0;

    for (const parentName of parentNames) {
      const parent = this.registry.requireStruct(parentName);
      if (!parent.ok) return parent;

      if (!this.native.isAssignable(parent.value.nativeClass, struct.nativeClass)) {
        return {
          ok: false,
          error: createDiagnostic(
            "DEF1705",
            `Struct '${parentName}' is not a native supertype of '${struct.name}'`,
            `'${struct.nativeClass.name}' must extend or implement '${parent.value.nativeClass.name}'`
          ),
        };
      }

      const target = this.resolutionTarget(struct, parent.value);

      for (const [key, method] of parent.value.methods) {
        if (members.methods.has(key)) continue;

        if (members.constructors.has(key) || members.staticMethods.has(key)) {
          return {
            ok: false,
            error: createDiagnostic(
              "DEF1302",
              `Inherited method '${key}' from '${parentName}' collides with a constructor or static method of '${struct.name}'`
            ),
          };
        }

        const copied = this.copyMethod(struct, target, method);
        if (!copied.ok) return copied;
        members.methods.set(key, copied.value);
        methods++;
      }

      for (const [name, field] of parent.value.fields) {
        if (members.fields.has(name)) continue;

        if (members.staticFields.has(name)) {
          return {
            ok: false,
            error: createDiagnostic(
              "DEF1401",
              `Inherited field '${name}' from '${parentName}' collides with a static field of '${struct.name}'`
            ),
          };
        }

        const copied = this.copyField(struct, target, field);
        if (!copied.ok) return copied;
        members.fields.set(name, copied.value);
        fields++;
      }
    }

    return { ok: true, value: { methods, fields } };
  }

  /**
   * Members are re-resolved on the owner's class. Interfaces do not reach the
   * root class's members, so those are resolved on the root class itself.
   */
  private resolutionTarget(owner: Struct, parent: Struct): NativeClass {
    const parentIsRoot =
      parent.nativeClass.kind === "class" &&
      parent.nativeClass.name === this.rootClassName;
    return parentIsRoot && owner.nativeClass.kind === "interface"
      ? parent.nativeClass
      : owner.nativeClass;
  }

  private copyMethod(
    owner: Struct,
    target: NativeClass,
    method: Method
  ): Result<Method, Diagnostic> {
    const native = this.native.findMethod(
      target,
      method.native.name,
      method.native.parameters
    );
    if (!native || native.isStatic) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1706",
          `Inherited method '${method.owner.name}.${method.name}' cannot be resolved on native class '${target.name}' for struct '${owner.name}'`
        ),
      };
    }

    return {
      ok: true,
      value: Object.freeze({ ...method, owner, native }),
    };
  }

  private copyField(
    owner: Struct,
    target: NativeClass,
    field: Field
  ): Result<Field, Diagnostic> {
    const native = this.native.findField(target, field.native.name);
    if (!native || native.isStatic) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1706",
          `Inherited field '${field.owner.name}.${field.name}' cannot be resolved on native class '${target.name}' for struct '${owner.name}'`
        ),
      };
    }

    return {
      ok: true,
      value: Object.freeze({
        ...field,
        owner,
        writable: !native.isReadonly,
        native,
      }),
    };
  }
}
