/**
 * Native host model - the classes and members a host application exposes,
 * and the NativeBinder capability the registry builds against.
 *
 * Nothing here knows about scripts: names are host class names, and
 * parameter lists are exact native class lists.
 */

export type NativeClassKind = "primitive" | "class" | "interface" | "array";

export type NativeClass = {
  readonly name: string;
  readonly kind: NativeClassKind;
  /** Low-level identity of the class; arrays append one `[]` per dimension */
  readonly descriptor: string;
  readonly abstract: boolean;
  /** Element class for arrays */
  readonly component?: NativeClass;
  readonly dimensions: number;
};

export type NativeConstructorRef = {
  readonly kind: "constructor";
  readonly owner: NativeClass;
  readonly parameters: readonly NativeClass[];
};

export type NativeMethodRef = {
  readonly kind: "method";
  /** Class that declares the method, which may be a supertype of the class searched */
  readonly owner: NativeClass;
  readonly name: string;
  readonly isStatic: boolean;
  readonly parameters: readonly NativeClass[];
  readonly returns: NativeClass;
};

export type NativeFieldRef = {
  readonly kind: "field";
  readonly owner: NativeClass;
  readonly name: string;
  readonly isStatic: boolean;
  readonly isReadonly: boolean;
  readonly type: NativeClass;
};

export type NativeCallableRef = NativeConstructorRef | NativeMethodRef;

export type NativeMemberRef = NativeCallableRef | NativeFieldRef;

/**
 * Host capability used to validate and bind whitelisted members.
 *
 * Lookups return undefined when nothing matches; invocation throws
 * HostInvocationError since it only happens while a script runs.
 */
export type NativeBinder = {
  readonly findClass: (name: string) => NativeClass | undefined;

  readonly arrayClass: (
    component: NativeClass,
    dimensions: number
  ) => NativeClass;

  /**
   * True when a value of `source` may be stored in a slot of `target`.
   */
  readonly isAssignable: (target: NativeClass, source: NativeClass) => boolean;

  readonly findConstructor: (
    owner: NativeClass,
    parameters: readonly NativeClass[]
  ) => NativeConstructorRef | undefined;

  readonly findMethod: (
    owner: NativeClass,
    name: string,
    parameters: readonly NativeClass[]
  ) => NativeMethodRef | undefined;

  readonly findField: (
    owner: NativeClass,
    name: string
  ) => NativeFieldRef | undefined;

  readonly invoke: (
    ref: NativeCallableRef,
    receiver: unknown,
    args: readonly unknown[]
  ) => unknown;

  readonly getField: (ref: NativeFieldRef, receiver: unknown) => unknown;

  readonly setField: (
    ref: NativeFieldRef,
    receiver: unknown,
    value: unknown
  ) => void;
};

export const sameClasses = (
  left: readonly NativeClass[],
  right: readonly NativeClass[]
): boolean =>
  left.length === right.length &&
  left.every((cls, index) => cls.descriptor === right[index]?.descriptor);

export const describeClasses = (classes: readonly NativeClass[]): string =>
  `[${classes.map((cls) => cls.name).join(", ")}]`;
