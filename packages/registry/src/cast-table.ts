/**
 * CastTable - the coercion matrix.
 *
 * A pair of types may hold both an implicit and an explicit entry. Lookups
 * prefer the implicit one; callers that need the explicit adapter where both
 * exist look it up directly with getCast.
 */

import type { NativeBinder, Result } from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import {
  castKey,
  methodKey,
  typesEqual,
  type Cast,
  type Coercion,
  type Transform,
  type Type,
} from "./model.js";
import type { TypeRegistry } from "./type-registry.js";

export type CastLookup = ReadonlyMap<string, Coercion>;

/**
 * Exact lookup of one (from, to, explicit) entry.
 */
export const getCast = (
  table: CastLookup,
  from: Type,
  to: Type,
  explicit: boolean
): Coercion | undefined => table.get(castKey(from, to, explicit));

/**
 * The implicit entry when there is one; otherwise, in an explicit context,
 * the explicit entry.
 */
export const resolveCast = (
  table: CastLookup,
  from: Type,
  to: Type,
  explicit: boolean
): Coercion | undefined =>
  getCast(table, from, to, false) ??
  (explicit ? getCast(table, from, to, true) : undefined);

export const requireCast = (
  table: CastLookup,
  from: Type,
  to: Type,
  explicit: boolean
): Result<Coercion, Diagnostic> => {
  const cast = resolveCast(table, from, to, explicit);
  if (cast) return { ok: true, value: cast };

  const hint =
    !explicit && getCast(table, from, to, true)
      ? `An explicit cast from '${from.name}' to '${to.name}' is available`
      : undefined;
  return {
    ok: false,
    error: createDiagnostic(
      "DEF1801",
      `Cannot ${explicit ? "explicitly " : "implicitly "}cast from '${from.name}' to '${to.name}'`,
      hint
    ),
  };
};

export class CastTable {
  private readonly table = new Map<string, Coercion>();

  constructor(
    private readonly registry: TypeRegistry,
    private readonly native: NativeBinder
  ) {}

  get entries(): CastLookup {
    return this.table;
  }

  /**
   * A free conversion between two primitive types.
   */
  addCast(from: Type, to: Type, explicit: boolean): Result<Cast, Diagnostic> {
    const checked = this.checkPair(from, to, explicit);
    if (!checked.ok) return checked;

    if (!from.sort.primitive || !to.sort.primitive) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1604",
          `Only primitive types may have a simple cast, found '${from.name}' and '${to.name}'`,
          "Use a transform with an adapter method instead"
        ),
      };
    }

    const cast: Cast = Object.freeze({ kind: "cast", from, to, explicit });
    this.table.set(castKey(from, to, explicit), cast);
    return { ok: true, value: cast };
  }

  /**
   * A conversion performed by an adapter method of `ownerName`. Static
   * adapters take the value as their one argument; instance adapters are
   * called on the value with no arguments.
   */
  addTransform(
    from: Type,
    to: Type,
    ownerName: string,
    adapterName: string,
    isStatic: boolean,
    explicit: boolean
  ): Result<Transform, Diagnostic> {
    const owner = this.registry.requireStruct(ownerName);
    if (!owner.ok) return owner;

    const checked = this.checkPair(from, to, explicit);
    if (!checked.ok) return checked;

    const key = methodKey(adapterName, isStatic ? 1 : 0);
    const method = (
      isStatic ? owner.value.staticMethods : owner.value.methods
    ).get(key);
    if (!method) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1707",
          `Transform from '${from.name}' to '${to.name}' uses ${isStatic ? "static method" : "method"} '${ownerName}.${key}' which is not defined`,
          isStatic
            ? "Static adapters take exactly one argument"
            : "Instance adapters take no arguments"
        ),
      };
    }

    let upcast: Type | undefined;
    const input = isStatic
      ? method.args[0]
      : this.registry.typeOf(owner.value, 0);
    if (!input) {
      throw new Error(`ICE: adapter '${ownerName}.${key}' has no argument`);
    }

    if (!this.native.isAssignable(input.nativeClass, from.nativeClass)) {
      if (this.native.isAssignable(from.nativeClass, input.nativeClass)) {
        upcast = input;
      } else {
        return {
          ok: false,
          error: createDiagnostic(
            "DEF1605",
            `Transform adapter '${ownerName}.${key}' cannot accept '${from.name}' as '${input.name}'`
          ),
        };
      }
    }

    let downcast: Type | undefined;
    if (!this.native.isAssignable(to.nativeClass, method.returns.nativeClass)) {
      if (this.native.isAssignable(method.returns.nativeClass, to.nativeClass)) {
        downcast = to;
      } else {
        return {
          ok: false,
          error: createDiagnostic(
            "DEF1606",
            `Transform adapter '${ownerName}.${key}' returns '${method.returns.name}' which cannot become '${to.name}'`
          ),
        };
      }
    }

    const transform: Transform = Object.freeze({
      kind: "transform",
      from,
      to,
      explicit,
      method,
      isStatic,
      upcast,
      downcast,
    });
    this.table.set(castKey(from, to, explicit), transform);
    return { ok: true, value: transform };
  }

  getCast(from: Type, to: Type, explicit: boolean): Coercion | undefined {
    return getCast(this.table, from, to, explicit);
  }

  resolveCast(from: Type, to: Type, explicit: boolean): Coercion | undefined {
    return resolveCast(this.table, from, to, explicit);
  }

  requireCast(
    from: Type,
    to: Type,
    explicit: boolean
  ): Result<Coercion, Diagnostic> {
    return requireCast(this.table, from, to, explicit);
  }

  private checkPair(
    from: Type,
    to: Type,
    explicit: boolean
  ): Result<void, Diagnostic> {
    if (typesEqual(from, to)) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1603",
          `Cast from '${from.name}' to itself is not allowed`
        ),
      };
    }

    if (this.table.has(castKey(from, to, explicit))) {
      return {
        ok: false,
        error: createDiagnostic(
          "DEF1501",
          `Duplicate ${explicit ? "explicit" : "implicit"} cast from '${from.name}' to '${to.name}'`
        ),
      };
    }

    return { ok: true, value: undefined };
  }
}
