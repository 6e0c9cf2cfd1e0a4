/**
 * CatalogBinder - NativeBinder over a HostCatalog.
 *
 * Lookups answer from the catalogue alone. Invocation needs the JavaScript
 * implementation of each class: a constructor function for classes that are
 * instantiated, and any object carrying the static members.
 */

import type { HostCatalog } from "./catalog.js";
import { HostInvocationError } from "./errors.js";
import {
  sameClasses,
  type NativeBinder,
  type NativeCallableRef,
  type NativeClass,
  type NativeConstructorRef,
  type NativeFieldRef,
  type NativeMemberRef,
  type NativeMethodRef,
} from "./native.js";

/**
 * JavaScript implementations keyed by host class name.
 */
export type HostImplementations = Readonly<Record<string, object>>;

const isConstructible = (value: object): value is new (...args: never[]) => unknown =>
  typeof value === "function";

export class CatalogBinder implements NativeBinder {
  constructor(
    readonly catalog: HostCatalog,
    private readonly implementations: HostImplementations = {}
  ) {}

  findClass(name: string): NativeClass | undefined {
    return this.catalog.findClass(name);
  }

  arrayClass(component: NativeClass, dimensions: number): NativeClass {
    return this.catalog.arrayClass(component, dimensions);
  }

  isAssignable(target: NativeClass, source: NativeClass): boolean {
    return this.catalog.isAssignable(target, source);
  }

  findConstructor(
    owner: NativeClass,
    parameters: readonly NativeClass[]
  ): NativeConstructorRef | undefined {
    return this.catalog
      .constructorsOf(owner)
      .find((ctor) => sameClasses(ctor.parameters, parameters));
  }

  findMethod(
    owner: NativeClass,
    name: string,
    parameters: readonly NativeClass[]
  ): NativeMethodRef | undefined {
    for (const cls of this.catalog.lineage(owner)) {
      const match = this.catalog
        .declaredMethods(cls, name)
        .find((method) => sameClasses(method.parameters, parameters));
      if (match) return match;
    }
    return undefined;
  }

  findField(owner: NativeClass, name: string): NativeFieldRef | undefined {
    for (const cls of this.catalog.lineage(owner)) {
      const match = this.catalog.declaredField(cls, name);
      if (match) return match;
    }
    return undefined;
  }

  invoke(
    ref: NativeCallableRef,
    receiver: unknown,
    args: readonly unknown[]
  ): unknown {
    if (ref.kind === "constructor") {
      if (ref.owner.abstract) {
        throw new HostInvocationError(ref, "class is abstract");
      }
      const impl = this.implementation(ref);
      if (!isConstructible(impl)) {
        throw new HostInvocationError(ref, "implementation is not a constructor");
      }
      return Reflect.construct(impl, [...args]);
    }

    const target = ref.isStatic
      ? this.implementation(ref)
      : this.receiverObject(ref, receiver);
    const fn: unknown = Reflect.get(target, ref.name);
    if (typeof fn !== "function") {
      throw new HostInvocationError(ref, "no such function on the target");
    }
    return Reflect.apply(fn, ref.isStatic ? target : receiver, [...args]);
  }

  getField(ref: NativeFieldRef, receiver: unknown): unknown {
    const target = ref.isStatic
      ? this.implementation(ref)
      : this.receiverObject(ref, receiver);
    return Reflect.get(target, ref.name);
  }

  setField(ref: NativeFieldRef, receiver: unknown, value: unknown): void {
    if (ref.isReadonly) {
      throw new HostInvocationError(ref, "field is readonly");
    }
    const target = ref.isStatic
      ? this.implementation(ref)
      : this.receiverObject(ref, receiver);
    if (!Reflect.set(target, ref.name, value)) {
      throw new HostInvocationError(ref, "field is not writable");
    }
  }

  private implementation(ref: NativeMemberRef): object {
    const impl = this.implementations[ref.owner.name];
    if (impl === undefined) {
      throw new HostInvocationError(
        ref,
        `no implementation registered for '${ref.owner.name}'`
      );
    }
    return impl;
  }

  /**
   * Primitive receivers (strings, numbers, booleans) are boxed so their
   * prototype methods can be found.
   */
  private receiverObject(ref: NativeMemberRef, receiver: unknown): object {
    if (receiver === null || receiver === undefined) {
      throw new HostInvocationError(ref, "receiver is null");
    }
    if (typeof receiver === "object" || typeof receiver === "function") {
      return receiver;
    }
    const boxed: object = Object(receiver);
    return boxed;
  }
}
