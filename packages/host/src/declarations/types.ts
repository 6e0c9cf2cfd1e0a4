/**
 * Host declarations as read from a declaration file, before any name is
 * resolved against the catalogue.
 */

export type HostConstructorDeclaration = {
  readonly kind: "constructor";
  readonly parameters: readonly string[];
  readonly line: number;
};

export type HostMethodDeclaration = {
  readonly kind: "method";
  readonly name: string;
  readonly isStatic: boolean;
  readonly parameters: readonly string[];
  readonly returns: string;
  readonly line: number;
};

export type HostFieldDeclaration = {
  readonly kind: "field";
  readonly name: string;
  readonly isStatic: boolean;
  readonly isReadonly: boolean;
  readonly type: string;
  readonly line: number;
};

export type HostMemberDeclaration =
  | HostConstructorDeclaration
  | HostMethodDeclaration
  | HostFieldDeclaration;

export type HostClassDeclaration = {
  readonly kind: "class" | "interface";
  readonly name: string;
  readonly abstract: boolean;
  /** Superclass (classes, at most one) or super-interfaces (interfaces) */
  readonly extends: readonly string[];
  readonly implements: readonly string[];
  readonly members: readonly HostMemberDeclaration[];
  readonly line: number;
};

export type HostDeclarationFile = {
  readonly fileName: string;
  readonly classes: readonly HostClassDeclaration[];
};
