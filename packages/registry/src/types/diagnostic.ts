/**
 * Diagnostic types for the definition registry
 */

import type {
  DiagnosticSeverity,
  HostDiagnosticCode,
  SourcePosition,
} from "@sandscript/host";

export type RegistryDiagnosticCode =
  // Names (DEF1001-DEF1099)
  | "DEF1001" // Invalid struct name
  | "DEF1002" // Invalid member name
  // Lookups (DEF1101-DEF1199)
  | "DEF1101" // Unknown struct
  | "DEF1102" // Unknown native class
  | "DEF1103" // Malformed array brackets
  | "DEF1104" // Array of void
  // Duplicates (DEF1201-DEF1599)
  | "DEF1201" // Duplicate struct
  | "DEF1202" // Duplicate runtime class
  | "DEF1301" // Duplicate overload in the same category
  | "DEF1302" // Overload key already used by another category
  | "DEF1401" // Duplicate field
  | "DEF1501" // Duplicate cast
  // Type mismatches (DEF1601-DEF1699)
  | "DEF1601" // Generic argument count differs from declared argument count
  | "DEF1602" // Generic type is not assignable to its declared type
  | "DEF1603" // Cast from a type to itself
  | "DEF1604" // Simple cast between non-primitive types
  | "DEF1605" // Adapter input cannot accept the source type
  | "DEF1606" // Adapter output cannot produce the target type
  // Native binding (DEF1701-DEF1799)
  | "DEF1701" // Native member not found
  | "DEF1702" // Static flag differs from the native member
  | "DEF1703" // Static field is not readonly
  | "DEF1704" // Declared return class differs from the native return class
  | "DEF1705" // Parent struct is not a native supertype
  | "DEF1706" // Inherited member cannot be re-resolved on the owner
  | "DEF1707" // Adapter method not defined
  // Coercion (DEF1801-DEF1899)
  | "DEF1801" // No cast between two types
  // Dynamic access (DEF1901-DEF1999)
  | "DEF1901" // No dynamic getter
  | "DEF1902" // No dynamic setter
  | "DEF1903" // No dynamic method
  | "DEF1904" // Native class not enrolled for dynamic access
  // Builder (DEF2001-DEF2099)
  | "DEF2001" // Build phase out of order
  | "DEF2002" // Builder already built
  // Whitelist (DEF2101-DEF2199)
  | "DEF2101" // Whitelist file not found
  | "DEF2102" // Failed to read whitelist file
  | "DEF2103" // Invalid JSON in whitelist file
  | "DEF2104" // Invalid whitelist structure
  | "DEF2105"; // Unknown type in whitelist

export type DiagnosticCode = RegistryDiagnosticCode | HostDiagnosticCode;

export type DiagnosticKind =
  | "NameFormatError"
  | "LookupError"
  | "DuplicateStructError"
  | "DuplicateOverloadError"
  | "DuplicateFieldError"
  | "DuplicateCastError"
  | "TypeMismatchError"
  | "BindingError"
  | "CoercionError"
  | "NoSuchMemberError"
  | "BuildPhaseError"
  | "WhitelistError"
  | "HostDeclarationError";

const DIAGNOSTIC_KINDS: Readonly<Record<DiagnosticCode, DiagnosticKind>> = {
  DEF1001: "NameFormatError",
  DEF1002: "NameFormatError",
  DEF1101: "LookupError",
  DEF1102: "LookupError",
  DEF1103: "LookupError",
  DEF1104: "LookupError",
  DEF1201: "DuplicateStructError",
  DEF1202: "DuplicateStructError",
  DEF1301: "DuplicateOverloadError",
  DEF1302: "DuplicateOverloadError",
  DEF1401: "DuplicateFieldError",
  DEF1501: "DuplicateCastError",
  DEF1601: "TypeMismatchError",
  DEF1602: "TypeMismatchError",
  DEF1603: "TypeMismatchError",
  DEF1604: "TypeMismatchError",
  DEF1605: "TypeMismatchError",
  DEF1606: "TypeMismatchError",
  DEF1701: "BindingError",
  DEF1702: "BindingError",
  DEF1703: "BindingError",
  DEF1704: "BindingError",
  DEF1705: "BindingError",
  DEF1706: "BindingError",
  DEF1707: "BindingError",
  DEF1801: "CoercionError",
  DEF1901: "NoSuchMemberError",
  DEF1902: "NoSuchMemberError",
  DEF1903: "NoSuchMemberError",
  DEF1904: "NoSuchMemberError",
  DEF2001: "BuildPhaseError",
  DEF2002: "BuildPhaseError",
  DEF2101: "WhitelistError",
  DEF2102: "WhitelistError",
  DEF2103: "WhitelistError",
  DEF2104: "WhitelistError",
  DEF2105: "WhitelistError",
  HOST1001: "HostDeclarationError",
  HOST1002: "HostDeclarationError",
  HOST1003: "HostDeclarationError",
  HOST1004: "HostDeclarationError",
  HOST1005: "HostDeclarationError",
  HOST2001: "HostDeclarationError",
  HOST2002: "HostDeclarationError",
  HOST2003: "HostDeclarationError",
  HOST2004: "HostDeclarationError",
  HOST2005: "HostDeclarationError",
  HOST2006: "HostDeclarationError",
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourcePosition;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  hint?: string
): Diagnostic => ({
  code,
  severity: "error",
  message,
  hint,
});

export const diagnosticKind = (code: DiagnosticCode): DiagnosticKind =>
  DIAGNOSTIC_KINDS[code];

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(`${diagnostic.location.file}:${diagnostic.location.line}`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
