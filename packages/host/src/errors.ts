import type { NativeMemberRef } from "./native.js";

const describeRef = (ref: NativeMemberRef): string =>
  ref.kind === "constructor"
    ? `${ref.owner.name}.<init>`
    : `${ref.owner.name}.${ref.name}`;

/**
 * Thrown when a bound native member cannot be invoked at run time.
 */
export class HostInvocationError extends Error {
  readonly ref: NativeMemberRef;

  constructor(ref: NativeMemberRef, reason: string) {
    super(`Cannot invoke ${describeRef(ref)}: ${reason}`);
    this.name = "HostInvocationError";
    this.ref = ref;
  }
}
