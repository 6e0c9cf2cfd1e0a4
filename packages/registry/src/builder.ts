/**
 * DefinitionBuilder - the only write path into a definition.
 *
 * Build operations run in phase order: declare → bind → inherit → cast →
 * index. A phase may repeat, but once a later phase has started an earlier
 * one is closed. build() snapshots the tables into a Definition and retires
 * the builder.
 */

import {
  DEFAULT_ROOT_CLASS_NAME,
  type NativeBinder,
  type NativeClass,
  type Result,
} from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import type {
  Cast,
  Constructor,
  Field,
  Method,
  RuntimeClass,
  Struct,
  Transform,
  Type,
} from "./model.js";
import { TypeRegistry } from "./type-registry.js";
import { Binder, type FieldSpec, type MethodSpec } from "./binder.js";
import { InheritanceResolver, type CopyResult } from "./inheritance.js";
import { CastTable } from "./cast-table.js";
import { DynamicDispatchIndex } from "./dynamic-dispatch.js";
import { Definition, type DefinitionOptions } from "./definition.js";

export const BUILD_PHASES = [
  "declare",
  "bind",
  "inherit",
  "cast",
  "index",
] as const;

export type BuildPhase = (typeof BUILD_PHASES)[number];

export class DefinitionBuilder {
  private readonly registry: TypeRegistry;
  private readonly binder: Binder;
  private readonly inheritance: InheritanceResolver;
  private readonly castTable: CastTable;
  private readonly dispatch = new DynamicDispatchIndex();
  private readonly verbose: boolean;
  private readonly rootClassName: string;

  private phase: BuildPhase = "declare";
  private built = false;

  constructor(
    private readonly native: NativeBinder,
    options: DefinitionOptions = {}
  ) {
    this.verbose = options.verbose ?? false;
    this.rootClassName = options.rootClassName ?? DEFAULT_ROOT_CLASS_NAME;
    this.registry = new TypeRegistry(native, {
      dynamicStructName: options.dynamicStructName,
    });
    this.binder = new Binder(this.registry, native);
    this.inheritance = new InheritanceResolver(
      this.registry,
      native,
      this.rootClassName
    );
    this.castTable = new CastTable(this.registry, native);
  }

  get currentPhase(): BuildPhase {
    return this.phase;
  }

  registerStruct(
    name: string,
    nativeClass: NativeClass | string
  ): Result<Struct, Diagnostic> {
    return this.guarded("declare", () =>
      this.registry.registerStruct(name, nativeClass)
    );
  }

  /**
   * Resolve a type name against the structs declared so far. Allowed in every
   * phase until the builder is retired.
   */
  resolveType(name: string): Result<Type, Diagnostic> {
    const open = this.checkOpen();
    if (!open.ok) return open;
    return this.registry.resolveType(name);
  }

  /**
   * A struct as declared so far; `undefined` once the builder is retired.
   */
  getStruct(name: string): Struct | undefined {
    return this.checkOpen().ok ? this.registry.getStruct(name) : undefined;
  }

  addConstructor(
    ownerName: string,
    args: readonly Type[],
    genericArgs?: readonly Type[]
  ): Result<Constructor, Diagnostic> {
    return this.guarded("bind", () =>
      this.binder.addConstructor(ownerName, args, genericArgs)
    );
  }

  addMethod(
    ownerName: string,
    name: string,
    spec: MethodSpec
  ): Result<Method, Diagnostic> {
    return this.guarded("bind", () =>
      this.binder.addMethod(ownerName, name, spec)
    );
  }

  addField(
    ownerName: string,
    name: string,
    spec: FieldSpec
  ): Result<Field, Diagnostic> {
    return this.guarded("bind", () =>
      this.binder.addField(ownerName, name, spec)
    );
  }

  copyStruct(
    ownerName: string,
    ...parentNames: readonly string[]
  ): Result<CopyResult, Diagnostic> {
    return this.guarded("inherit", () =>
      this.inheritance.copyStruct(ownerName, parentNames)
    );
  }

  addCast(from: Type, to: Type, explicit: boolean): Result<Cast, Diagnostic> {
    return this.guarded("cast", () =>
      this.castTable.addCast(from, to, explicit)
    );
  }

  addTransform(
    from: Type,
    to: Type,
    ownerName: string,
    adapterName: string,
    isStatic: boolean,
    explicit: boolean
  ): Result<Transform, Diagnostic> {
    return this.guarded("cast", () =>
      this.castTable.addTransform(
        from,
        to,
        ownerName,
        adapterName,
        isStatic,
        explicit
      )
    );
  }

  addRuntimeClass(structName: string): Result<RuntimeClass, Diagnostic> {
    return this.guarded("index", () => {
      const struct = this.registry.requireStruct(structName);
      if (!struct.ok) return struct;
      return this.dispatch.addRuntimeClass(struct.value);
    });
  }

  /**
   * Snapshot everything into an immutable Definition. The builder accepts no
   * further calls afterwards.
   */
  build(): Result<Definition, Diagnostic> {
    const open = this.checkOpen();
    if (!open.ok) return open;
    this.built = true;

    const definition = new Definition({
      native: this.native,
      types: this.registry.snapshot(),
      casts: this.castTable.entries,
      runtimeClasses: this.dispatch.entries,
      rootClassName: this.rootClassName,
    });

    if (this.verbose) {
      console.log(
        `[Definition] Built ${definition.structs().length} structs, ${definition.coercions().length} casts, ${this.dispatch.entries.size} runtime classes`
      );
    }

    return { ok: true, value: definition };
  }

  private guarded<T>(
    phase: BuildPhase,
    operation: () => Result<T, Diagnostic>
  ): Result<T, Diagnostic> {
    const entered = this.enter(phase);
    if (!entered.ok) return entered;
    return operation();
  }

  private enter(phase: BuildPhase): Result<void, Diagnostic> {
    const open = this.checkOpen();
    if (!open.ok) return open;

    const current = BUILD_PHASES.indexOf(this.phase);
    const next = BUILD_PHASES.indexOf(phase);
    if (next < current) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF2001",
          `Cannot run a '${phase}' operation after the '${this.phase}' phase has started`,
          `Phases run in the order ${BUILD_PHASES.join(" → ")}`
        ),
      };
    }

    if (next > current) {
      if (this.verbose) {
        console.log(
          `[Definition] Phase ${this.phase} → ${phase} (${this.registry.structs().length} structs)`
        );
      }
      this.phase = phase;
    }

    return { ok: true, value: undefined };
  }

  private checkOpen(): Result<void, Diagnostic> {
    return this.built
      ? {
          ok: false,
          error: createDiagnostic(
            "DEF2002",
            "Definition has already been built",
            "Create a new DefinitionBuilder to build another definition"
          ),
        }
      : { ok: true, value: undefined };
  }
}
