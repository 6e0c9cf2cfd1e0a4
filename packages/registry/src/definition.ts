/**
 * Definition - the immutable, shareable result of a build.
 *
 * Every lookup is a flat map read: inherited members were copied into each
 * struct while building.
 */

import {
  DEFAULT_ROOT_CLASS_NAME,
  type NativeBinder,
  type NativeClass,
  type Result,
} from "@sandscript/host";
import type { Diagnostic } from "./types/diagnostic.js";
import type {
  Coercion,
  Constructor,
  DynamicAccessor,
  Field,
  Method,
  MethodKey,
  RuntimeClass,
  Struct,
  Type,
} from "./model.js";
import type { TypeResolver } from "./type-registry.js";
import {
  getCast,
  requireCast,
  resolveCast,
  type CastLookup,
} from "./cast-table.js";
import {
  resolveDynamicGetter,
  resolveDynamicMethod,
  resolveDynamicSetter,
  type RuntimeClassLookup,
} from "./dynamic-dispatch.js";

export type DefinitionOptions = {
  readonly verbose?: boolean;
  /** Struct whose values are dynamically typed; `def` by default */
  readonly dynamicStructName?: string;
  /** Native class every reference class extends; `Object` by default */
  readonly rootClassName?: string;
};

export type DefinitionParts = {
  readonly native: NativeBinder;
  readonly types: TypeResolver;
  readonly casts: CastLookup;
  readonly runtimeClasses: RuntimeClassLookup;
  readonly rootClassName?: string;
};

export class Definition {
  readonly native: NativeBinder;
  readonly rootClassName: string;

  private readonly types: TypeResolver;
  private readonly casts: CastLookup;
  private readonly runtimeClasses: RuntimeClassLookup;

  constructor(parts: DefinitionParts) {
    this.native = parts.native;
    this.rootClassName = parts.rootClassName ?? DEFAULT_ROOT_CLASS_NAME;
    this.types = parts.types;
    this.casts = new Map(parts.casts);
    this.runtimeClasses = new Map(parts.runtimeClasses);
  }

  get dynamicStructName(): string {
    return this.types.dynamicStructName;
  }

  getStruct(name: string): Struct | undefined {
    return this.types.getStruct(name);
  }

  structs(): readonly Struct[] {
    return this.types.structs();
  }

  /**
   * Resolve `Name` or `Name[]...` to a Type.
   */
  resolveType(name: string): Result<Type, Diagnostic>;
  /**
   * The Type of `struct` with `dimensions` array dimensions.
   */
  resolveType(struct: Struct, dimensions: number): Type;
  resolveType(
    nameOrStruct: string | Struct,
    dimensions = 0
  ): Result<Type, Diagnostic> | Type {
    return typeof nameOrStruct === "string"
      ? this.types.resolveType(nameOrStruct)
      : this.types.typeOf(nameOrStruct, dimensions);
  }

  /**
   * The constructor, static method or instance method under `key`. The three
   * categories never share a key.
   */
  resolveMember(
    struct: Struct,
    key: MethodKey
  ): Constructor | Method | undefined {
    return (
      struct.constructors.get(key) ??
      struct.staticMethods.get(key) ??
      struct.methods.get(key)
    );
  }

  resolveConstructor(struct: Struct, key: MethodKey): Constructor | undefined {
    return struct.constructors.get(key);
  }

  resolveStaticMethod(struct: Struct, key: MethodKey): Method | undefined {
    return struct.staticMethods.get(key);
  }

  resolveMethod(struct: Struct, key: MethodKey): Method | undefined {
    return struct.methods.get(key);
  }

  resolveField(
    struct: Struct,
    name: string,
    isStatic: boolean
  ): Field | undefined {
    return (isStatic ? struct.staticFields : struct.fields).get(name);
  }

  resolveCast(from: Type, to: Type, explicit: boolean): Coercion | undefined {
    return resolveCast(this.casts, from, to, explicit);
  }

  getCast(from: Type, to: Type, explicit: boolean): Coercion | undefined {
    return getCast(this.casts, from, to, explicit);
  }

  requireCast(
    from: Type,
    to: Type,
    explicit: boolean
  ): Result<Coercion, Diagnostic> {
    return requireCast(this.casts, from, to, explicit);
  }

  coercions(): readonly Coercion[] {
    return [...this.casts.values()];
  }

  getRuntimeClass(nativeClass: NativeClass): RuntimeClass | undefined {
    return this.runtimeClasses.get(nativeClass.descriptor);
  }

  resolveDynamicGetter(
    nativeClass: NativeClass,
    property: string
  ): DynamicAccessor | undefined {
    return resolveDynamicGetter(this.runtimeClasses, nativeClass, property);
  }

  resolveDynamicSetter(
    nativeClass: NativeClass,
    property: string
  ): DynamicAccessor | undefined {
    return resolveDynamicSetter(this.runtimeClasses, nativeClass, property);
  }

  resolveDynamicMethod(
    nativeClass: NativeClass,
    key: MethodKey
  ): Method | undefined {
    return resolveDynamicMethod(this.runtimeClasses, nativeClass, key);
  }

  get voidType(): Type | undefined {
    return this.wellKnown("void");
  }

  get booleanType(): Type | undefined {
    return this.wellKnown("boolean");
  }

  get byteType(): Type | undefined {
    return this.wellKnown("byte");
  }

  get shortType(): Type | undefined {
    return this.wellKnown("short");
  }

  get charType(): Type | undefined {
    return this.wellKnown("char");
  }

  get intType(): Type | undefined {
    return this.wellKnown("int");
  }

  get longType(): Type | undefined {
    return this.wellKnown("long");
  }

  get floatType(): Type | undefined {
    return this.wellKnown("float");
  }

  get doubleType(): Type | undefined {
    return this.wellKnown("double");
  }

  get objectType(): Type | undefined {
    return this.wellKnown(this.rootClassName);
  }

  get defType(): Type | undefined {
    return this.wellKnown(this.types.dynamicStructName);
  }

  get numberType(): Type | undefined {
    return this.wellKnown("Number");
  }

  get stringType(): Type | undefined {
    return this.wellKnown("String");
  }

  private wellKnown(structName: string): Type | undefined {
    const struct = this.types.getStruct(structName);
    return struct ? this.types.typeOf(struct, 0) : undefined;
  }
}
