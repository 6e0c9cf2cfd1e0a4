/**
 * Diagnostic types for the host environment
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type HostDiagnosticCode =
  // Declaration loading (HOST1001-HOST1099)
  | "HOST1001" // Declaration file not found
  | "HOST1002" // Failed to read declaration file
  | "HOST1003" // Unsupported declaration statement
  | "HOST1004" // Unsupported type annotation
  | "HOST1005" // Unsupported member or parameter form
  // Catalogue construction (HOST2001-HOST2099)
  | "HOST2001" // Duplicate class declaration
  | "HOST2002" // Unknown supertype
  | "HOST2003" // Invalid supertype kind
  | "HOST2004" // Cyclic supertype graph
  | "HOST2005" // Unknown member type
  | "HOST2006"; // Duplicate member signature

export type SourcePosition = {
  readonly file: string;
  readonly line: number;
};

export type HostDiagnostic = {
  readonly code: HostDiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourcePosition;
  readonly hint?: string;
};

export const hostDiagnostic = (
  code: HostDiagnosticCode,
  message: string,
  location?: SourcePosition,
  hint?: string
): HostDiagnostic => ({
  code,
  severity: "error",
  message,
  location,
  hint,
});
