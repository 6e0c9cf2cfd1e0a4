/**
 * Registry model - structs, types, members and coercions.
 *
 * Every value here is immutable once the definition is built. Struct member
 * maps are read-only views: over the TypeRegistry's own maps while building,
 * over copies once published.
 */

import type {
  NativeClass,
  NativeConstructorRef,
  NativeFieldRef,
  NativeMethodRef,
} from "@sandscript/host";
import type { Sort } from "./sort.js";

/**
 * Overload key: one overload per arity per name. String form `name/arity`.
 */
export type MethodKey = `${string}/${number}`;

export const methodKey = (name: string, arity: number): MethodKey =>
  `${name}/${arity}`;

export const CONSTRUCTOR_NAME = "new";

export type Struct = {
  readonly name: string;
  readonly nativeClass: NativeClass;
  readonly descriptor: string;
  readonly constructors: ReadonlyMap<MethodKey, Constructor>;
  readonly staticMethods: ReadonlyMap<MethodKey, Method>;
  readonly methods: ReadonlyMap<MethodKey, Method>;
  readonly staticFields: ReadonlyMap<string, Field>;
  readonly fields: ReadonlyMap<string, Field>;
};

/**
 * A frozen view of `source` with the read half of the Map API only.
 */
export const readOnlyMap = <K, V>(source: ReadonlyMap<K, V>): ReadonlyMap<K, V> => {
  const view: ReadonlyMap<K, V> = Object.freeze({
    get size(): number {
      return source.size;
    },
    get: (key: K) => source.get(key),
    has: (key: K) => source.has(key),
    keys: () => source.keys(),
    values: () => source.values(),
    entries: () => source.entries(),
    forEach: (
      callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void,
      thisArg?: unknown
    ): void => {
      source.forEach((value, key) => callback.call(thisArg, value, key, view));
    },
    [Symbol.iterator]: () => source.entries(),
  });
  return view;
};

export const structsEqual = (left: Struct, right: Struct): boolean =>
  left.name === right.name;

export type Type = {
  /** Display name, `Base[]...` for arrays */
  readonly name: string;
  readonly dimensions: number;
  readonly struct: Struct;
  readonly nativeClass: NativeClass;
  readonly descriptor: string;
  readonly sort: Sort;
};

export const typesEqual = (left: Type, right: Type): boolean =>
  left.descriptor === right.descriptor && left.struct.name === right.struct.name;

export const typeKey = (type: Type): string =>
  `${type.struct.name}|${type.descriptor}`;

export type Constructor = {
  readonly kind: "constructor";
  readonly name: typeof CONSTRUCTOR_NAME;
  readonly owner: Struct;
  /** Script-visible argument types */
  readonly args: readonly Type[];
  /** Argument types matching the native signature */
  readonly declaredArgs: readonly Type[];
  readonly native: NativeConstructorRef;
};

export type Method = {
  readonly kind: "method";
  readonly name: string;
  readonly owner: Struct;
  readonly isStatic: boolean;
  /** Script-visible return type; the generic return when one was given */
  readonly returns: Type;
  readonly args: readonly Type[];
  readonly declaredReturns: Type;
  readonly declaredArgs: readonly Type[];
  readonly native: NativeMethodRef;
};

export type Field = {
  readonly kind: "field";
  readonly name: string;
  readonly owner: Struct;
  readonly isStatic: boolean;
  /** Type matching the native field */
  readonly type: Type;
  /** Script-visible type */
  readonly generic: Type;
  readonly writable: boolean;
  readonly native: NativeFieldRef;
};

export type Member = Constructor | Method | Field;

export type Cast = {
  readonly kind: "cast";
  readonly from: Type;
  readonly to: Type;
  readonly explicit: boolean;
};

/**
 * A cast performed by calling an adapter method. `upcast` narrows the source
 * before the call; `downcast` narrows the adapter's result to the target.
 */
export type Transform = {
  readonly kind: "transform";
  readonly from: Type;
  readonly to: Type;
  readonly explicit: boolean;
  readonly method: Method;
  readonly isStatic: boolean;
  readonly upcast?: Type;
  readonly downcast?: Type;
};

export type Coercion = Cast | Transform;

export const castKey = (from: Type, to: Type, explicit: boolean): string =>
  `${typeKey(from)}->${typeKey(to)}${explicit ? "!" : ""}`;

export type DynamicAccessor =
  | { readonly kind: "field"; readonly field: Field }
  | { readonly kind: "method"; readonly method: Method };

export type RuntimeClass = {
  readonly nativeClass: NativeClass;
  readonly methods: ReadonlyMap<MethodKey, Method>;
  readonly getters: ReadonlyMap<string, DynamicAccessor>;
  readonly setters: ReadonlyMap<string, DynamicAccessor>;
};
