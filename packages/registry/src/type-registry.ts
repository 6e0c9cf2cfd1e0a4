/**
 * TypeRegistry - owns the struct table and materialises Types.
 */

import type { NativeBinder, NativeClass, Result } from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import {
  readOnlyMap,
  type Constructor,
  type Field,
  type Method,
  type MethodKey,
  type Struct,
  type Type,
} from "./model.js";
import { SORTS, sortForClassName, type Sort } from "./sort.js";

export const STRUCT_NAME_PATTERN = /^[_a-zA-Z][<>,_a-zA-Z0-9]*$/;

export const DEFAULT_DYNAMIC_STRUCT_NAME = "def";

/**
 * Mutable member maps behind a Struct's read-only views.
 */
export type StructMembers = {
  readonly constructors: Map<MethodKey, Constructor>;
  readonly staticMethods: Map<MethodKey, Method>;
  readonly methods: Map<MethodKey, Method>;
  readonly staticFields: Map<string, Field>;
  readonly fields: Map<string, Field>;
};

export type TypeRegistryOptions = {
  readonly dynamicStructName?: string;
};

/**
 * Split `Base[][]` into the base name and its dimensions.
 */
export const parseTypeName = (
  name: string
): Result<{ readonly base: string; readonly dimensions: number }, Diagnostic> => {
  const open = name.indexOf("[");
  if (open === -1) {
    return { ok: true, value: { base: name, dimensions: 0 } };
  }

  const suffix = name.slice(open);
  if (!/^(\[\])+$/.test(suffix)) {
    return {
      ok: false,
      error: createDiagnostic(
        "DEF1103",
        `Malformed array brackets in type '${name}'`,
        "Array types are written as a struct name followed by one '[]' per dimension"
      ),
    };
  }

  return {
    ok: true,
    value: { base: name.slice(0, open), dimensions: suffix.length / 2 },
  };
};

const publishStruct = (struct: Struct): Struct =>
  Object.freeze({
    name: struct.name,
    nativeClass: struct.nativeClass,
    descriptor: struct.descriptor,
    constructors: readOnlyMap(new Map(struct.constructors)),
    staticMethods: readOnlyMap(new Map(struct.staticMethods)),
    methods: readOnlyMap(new Map(struct.methods)),
    staticFields: readOnlyMap(new Map(struct.staticFields)),
    fields: readOnlyMap(new Map(struct.fields)),
  });

/**
 * Read side of the struct table: struct lookups and Type materialisation.
 */
export class TypeResolver {
  private readonly typeCache = new Map<string, Type>();

  constructor(
    private readonly binder: NativeBinder,
    private readonly structTable: ReadonlyMap<string, Struct>,
    readonly dynamicStructName: string
  ) {}

  getStruct(name: string): Struct | undefined {
    return this.structTable.get(name);
  }

  requireStruct(name: string): Result<Struct, Diagnostic> {
    const struct = this.structTable.get(name);
    return struct
      ? { ok: true, value: struct }
      : {
          ok: false,
          error: createDiagnostic("DEF1101", `Unknown struct '${name}'`),
        };
  }

  structs(): readonly Struct[] {
    return [...this.structTable.values()];
  }

  /**
   * Resolve a type name such as `int`, `Map<String,def>` or `String[][]`.
   */
  resolveType(name: string): Result<Type, Diagnostic> {
    const parsed = parseTypeName(name);
    if (!parsed.ok) return parsed;

    const struct = this.requireStruct(parsed.value.base);
    if (!struct.ok) return struct;

    const { nativeClass } = struct.value;
    const isVoid = nativeClass.kind === "primitive" && nativeClass.name === "void";
    if (isVoid && parsed.value.dimensions > 0) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1104",
          `Type '${name}' is an array of '${struct.value.name}'`,
          "Arrays of 'void' are not allowed"
        ),
      };
    }

    return { ok: true, value: this.typeOf(struct.value, parsed.value.dimensions) };
  }

  /**
   * The Type of `struct` with `dimensions` array dimensions.
   */
  typeOf(struct: Struct, dimensions: number): Type {
    if (!Number.isInteger(dimensions) || dimensions < 0) {
      throw new Error(
        `ICE: array dimensions must be a non-negative integer, got ${dimensions}`
      );
    }

    const cacheKey = `${struct.name}|${dimensions}`;
    const cached = this.typeCache.get(cacheKey);
    if (cached) return cached;

    const own = this.structTable.get(struct.name) ?? struct;

    const type: Type =
      dimensions > 0
        ? this.arrayType(own, dimensions)
        : Object.freeze({
            name: own.name,
            dimensions: 0,
            struct: own,
            nativeClass: own.nativeClass,
            descriptor: own.descriptor,
            sort: this.sortOf(own),
          });

    this.typeCache.set(cacheKey, type);
    return type;
  }

  private arrayType(struct: Struct, dimensions: number): Type {
    const nativeClass = this.binder.arrayClass(struct.nativeClass, dimensions);
    return Object.freeze({
      name: struct.name + "[]".repeat(dimensions),
      dimensions,
      struct,
      nativeClass,
      descriptor: nativeClass.descriptor,
      sort: SORTS.array,
    });
  }

  private sortOf(struct: Struct): Sort {
    if (struct.name === this.dynamicStructName) return SORTS.def;
    return sortForClassName(struct.nativeClass.name) ?? SORTS.object;
  }
}

/**
 * Write side of the struct table, used while building.
 */
export class TypeRegistry {
  readonly dynamicStructName: string;

  private readonly structTable = new Map<string, Struct>();
  private readonly memberTable = new Map<string, StructMembers>();
  private readonly resolver: TypeResolver;

  constructor(
    private readonly binder: NativeBinder,
    options: TypeRegistryOptions = {}
  ) {
    this.dynamicStructName =
      options.dynamicStructName ?? DEFAULT_DYNAMIC_STRUCT_NAME;
    this.resolver = new TypeResolver(
      binder,
      this.structTable,
      this.dynamicStructName
    );
  }

  /**
   * Register an empty struct over a native class, given directly or by name.
   */
  registerStruct(
    name: string,
    nativeClass: NativeClass | string
  ): Result<Struct, Diagnostic> {
    if (!STRUCT_NAME_PATTERN.test(name)) {
      return {
        ok: false,
        error: createDiagnostic("DEF1001", `Invalid struct name '${name}'`),
      };
    }

    if (this.structTable.has(name)) {
      return {
        ok: false,
        error: createDiagnostic("DEF1201", `Duplicate struct name '${name}'`),
      };
    }

    const cls =
      typeof nativeClass === "string"
        ? this.binder.findClass(nativeClass)
        : nativeClass;
    if (!cls) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1102",
          `Unknown native class '${String(nativeClass)}' for struct '${name}'`
        ),
      };
    }

    const members: StructMembers = {
      constructors: new Map(),
      staticMethods: new Map(),
      methods: new Map(),
      staticFields: new Map(),
      fields: new Map(),
    };
    const struct: Struct = Object.freeze({
      name,
      nativeClass: cls,
      descriptor: cls.descriptor,
      constructors: readOnlyMap(members.constructors),
      staticMethods: readOnlyMap(members.staticMethods),
      methods: readOnlyMap(members.methods),
      staticFields: readOnlyMap(members.staticFields),
      fields: readOnlyMap(members.fields),
    });

    this.structTable.set(name, struct);
    this.memberTable.set(name, members);
    return { ok: true, value: struct };
  }

  getStruct(name: string): Struct | undefined {
    return this.resolver.getStruct(name);
  }

  requireStruct(name: string): Result<Struct, Diagnostic> {
    return this.resolver.requireStruct(name);
  }

  structs(): readonly Struct[] {
    return this.resolver.structs();
  }

  /**
   * Writable member maps of a registered struct.
   */
  membersOf(struct: Struct): StructMembers {
    const members = this.memberTable.get(struct.name);
    if (!members) {
      throw new Error(`ICE: struct '${struct.name}' is not registered`);
    }
    return members;
  }

  resolveType(name: string): Result<Type, Diagnostic> {
    return this.resolver.resolveType(name);
  }

  typeOf(struct: Struct, dimensions: number): Type {
    return this.resolver.typeOf(struct, dimensions);
  }

  /**
   * A resolver over copies of the current structs. Later registrations and
   * member additions do not reach it.
   */
  snapshot(): TypeResolver {
    const published = new Map<string, Struct>();
    for (const [name, struct] of this.structTable) {
      published.set(name, publishStruct(struct));
    }
    return new TypeResolver(this.binder, published, this.dynamicStructName);
  }
}
