import type { Diagnostic } from "./types/diagnostic.js";

/**
 * Thrown when a script accesses a member that a dynamically typed value's
 * class does not have. Raised at run time, never while building.
 */
export class NoSuchMemberError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "NoSuchMemberError";
    this.diagnostic = diagnostic;
  }
}
