/**
 * Host declaration reader - parses TypeScript declaration text describing the
 * host's classes into HostDeclarationFile records.
 *
 * Only syntax is inspected (no checker, no lib files). Type annotations are
 * taken as host class names: `int`, `Integer`, `double[]`. Type aliases such
 * as `type int = number;` are allowed so the file reads as ordinary
 * TypeScript, but carry no meaning: the primitive set is fixed.
 */

import * as ts from "typescript";
import type { Result } from "../types/result.js";
import {
  hostDiagnostic,
  type HostDiagnostic,
  type HostDiagnosticCode,
} from "../types/diagnostic.js";
import type {
  HostClassDeclaration,
  HostDeclarationFile,
  HostMemberDeclaration,
} from "./types.js";

type ReaderContext = {
  readonly sourceFile: ts.SourceFile;
  readonly diagnostics: HostDiagnostic[];
};

const lineOf = (context: ReaderContext, node: ts.Node): number =>
  context.sourceFile.getLineAndCharacterOfPosition(
    node.getStart(context.sourceFile)
  ).line + 1;

const report = (
  context: ReaderContext,
  code: HostDiagnosticCode,
  message: string,
  node: ts.Node
): void => {
  context.diagnostics.push(
    hostDiagnostic(code, message, {
      file: context.sourceFile.fileName,
      line: lineOf(context, node),
    })
  );
};

const hasModifier = (node: ts.HasModifiers, kind: ts.SyntaxKind): boolean =>
  ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;

/**
 * Map a type annotation to a host class name.
 */
const typeNodeName = (node: ts.TypeNode): string | undefined => {
  if (node.kind === ts.SyntaxKind.VoidKeyword) return "void";
  if (node.kind === ts.SyntaxKind.BooleanKeyword) return "boolean";

  if (ts.isTypeReferenceNode(node)) {
    if (node.typeArguments || !ts.isIdentifier(node.typeName)) {
      return undefined;
    }
    return node.typeName.text;
  }

  if (ts.isArrayTypeNode(node)) {
    const element = typeNodeName(node.elementType);
    return element === undefined ? undefined : `${element}[]`;
  }

  if (ts.isParenthesizedTypeNode(node)) {
    return typeNodeName(node.type);
  }

  return undefined;
};

const readType = (
  context: ReaderContext,
  node: ts.TypeNode | undefined,
  owner: ts.Node,
  what: string
): string | undefined => {
  if (!node) {
    report(context, "HOST1004", `Missing type annotation on ${what}`, owner);
    return undefined;
  }

  const name = typeNodeName(node);
  if (name === undefined) {
    report(
      context,
      "HOST1004",
      `Unsupported type '${node.getText(context.sourceFile)}' on ${what}`,
      node
    );
  }
  return name;
};

const readParameters = (
  context: ReaderContext,
  parameters: ts.NodeArray<ts.ParameterDeclaration>,
  what: string
): readonly string[] | undefined => {
  const names: string[] = [];
  let valid = true;

  for (const parameter of parameters) {
    if (parameter.dotDotDotToken || parameter.questionToken) {
      report(
        context,
        "HOST1005",
        `Rest and optional parameters are not supported on ${what}`,
        parameter
      );
      valid = false;
      continue;
    }

    const name = readType(context, parameter.type, parameter, what);
    if (name === undefined) {
      valid = false;
    } else {
      names.push(name);
    }
  }

  return valid ? names : undefined;
};

const memberName = (
  context: ReaderContext,
  name: ts.PropertyName,
  owner: string
): string | undefined => {
  if (ts.isIdentifier(name)) return name.text;
  report(
    context,
    "HOST1005",
    `Member names of '${owner}' must be plain identifiers`,
    name
  );
  return undefined;
};

const readClassMember = (
  context: ReaderContext,
  member: ts.ClassElement,
  owner: string
): HostMemberDeclaration | undefined => {
  if (ts.isConstructorDeclaration(member)) {
    const parameters = readParameters(
      context,
      member.parameters,
      `constructor of '${owner}'`
    );
    return parameters
      ? { kind: "constructor", parameters, line: lineOf(context, member) }
      : undefined;
  }

  if (ts.isMethodDeclaration(member)) {
    const name = memberName(context, member.name, owner);
    if (name === undefined) return undefined;
    if (member.typeParameters) {
      report(
        context,
        "HOST1005",
        `Generic method '${owner}.${name}' is not supported`,
        member
      );
      return undefined;
    }

    const what = `method '${owner}.${name}'`;
    const parameters = readParameters(context, member.parameters, what);
    const returns = readType(context, member.type, member, what);
    if (!parameters || returns === undefined) return undefined;

    return {
      kind: "method",
      name,
      isStatic: hasModifier(member, ts.SyntaxKind.StaticKeyword),
      parameters,
      returns,
      line: lineOf(context, member),
    };
  }

  if (ts.isPropertyDeclaration(member)) {
    const name = memberName(context, member.name, owner);
    if (name === undefined) return undefined;

    const type = readType(
      context,
      member.type,
      member,
      `field '${owner}.${name}'`
    );
    if (type === undefined) return undefined;

    return {
      kind: "field",
      name,
      isStatic: hasModifier(member, ts.SyntaxKind.StaticKeyword),
      isReadonly: hasModifier(member, ts.SyntaxKind.ReadonlyKeyword),
      type,
      line: lineOf(context, member),
    };
  }

  report(
    context,
    "HOST1005",
    `Unsupported member in class '${owner}'`,
    member
  );
  return undefined;
};

const readInterfaceMember = (
  context: ReaderContext,
  member: ts.TypeElement,
  owner: string
): HostMemberDeclaration | undefined => {
  if (ts.isMethodSignature(member)) {
    const name = memberName(context, member.name, owner);
    if (name === undefined) return undefined;

    const what = `method '${owner}.${name}'`;
    const parameters = readParameters(context, member.parameters, what);
    const returns = readType(context, member.type, member, what);
    if (!parameters || returns === undefined) return undefined;

    return {
      kind: "method",
      name,
      isStatic: false,
      parameters,
      returns,
      line: lineOf(context, member),
    };
  }

  if (ts.isPropertySignature(member)) {
    const name = memberName(context, member.name, owner);
    if (name === undefined) return undefined;

    const type = readType(
      context,
      member.type,
      member,
      `field '${owner}.${name}'`
    );
    if (type === undefined) return undefined;

    return {
      kind: "field",
      name,
      isStatic: false,
      isReadonly: hasModifier(member, ts.SyntaxKind.ReadonlyKeyword),
      type,
      line: lineOf(context, member),
    };
  }

  report(
    context,
    "HOST1005",
    `Unsupported member in interface '${owner}'`,
    member
  );
  return undefined;
};

/**
 * Read the names in a heritage clause; type arguments are rejected since
 * host classes are not generic.
 */
const readHeritage = (
  context: ReaderContext,
  clauses: ts.NodeArray<ts.HeritageClause> | undefined,
  token: ts.SyntaxKind.ExtendsKeyword | ts.SyntaxKind.ImplementsKeyword
): readonly string[] => {
  if (!clauses) return [];

  const names: string[] = [];
  for (const clause of clauses) {
    if (clause.token !== token) continue;
    for (const type of clause.types) {
      if (type.typeArguments || !ts.isIdentifier(type.expression)) {
        report(
          context,
          "HOST1004",
          `Unsupported supertype '${type.getText(context.sourceFile)}'`,
          type
        );
        continue;
      }
      names.push(type.expression.text);
    }
  }
  return names;
};

const readMembers = <M extends ts.Node>(
  members: ts.NodeArray<M>,
  read: (member: M) => HostMemberDeclaration | undefined
): readonly HostMemberDeclaration[] =>
  members
    .map(read)
    .filter((m): m is HostMemberDeclaration => m !== undefined);

const readStatement = (
  context: ReaderContext,
  statement: ts.Statement
): HostClassDeclaration | undefined => {
  if (ts.isTypeAliasDeclaration(statement)) {
    return undefined;
  }

  if (ts.isClassDeclaration(statement) && statement.name) {
    const name = statement.name.text;
    if (statement.typeParameters) {
      report(
        context,
        "HOST1003",
        `Generic class '${name}' is not supported`,
        statement
      );
      return undefined;
    }
    return {
      kind: "class",
      name,
      abstract: hasModifier(statement, ts.SyntaxKind.AbstractKeyword),
      extends: readHeritage(
        context,
        statement.heritageClauses,
        ts.SyntaxKind.ExtendsKeyword
      ),
      implements: readHeritage(
        context,
        statement.heritageClauses,
        ts.SyntaxKind.ImplementsKeyword
      ),
      members: readMembers(statement.members, (m) =>
        readClassMember(context, m, name)
      ),
      line: lineOf(context, statement),
    };
  }

  if (ts.isInterfaceDeclaration(statement)) {
    const name = statement.name.text;
    if (statement.typeParameters) {
      report(
        context,
        "HOST1003",
        `Generic interface '${name}' is not supported`,
        statement
      );
      return undefined;
    }
    return {
      kind: "interface",
      name,
      abstract: true,
      extends: readHeritage(
        context,
        statement.heritageClauses,
        ts.SyntaxKind.ExtendsKeyword
      ),
      implements: [],
      members: readMembers(statement.members, (m) =>
        readInterfaceMember(context, m, name)
      ),
      line: lineOf(context, statement),
    };
  }

  report(
    context,
    "HOST1003",
    `Unsupported statement; only classes, interfaces and type aliases may be declared`,
    statement
  );
  return undefined;
};

/**
 * Read host declarations from TypeScript declaration text.
 *
 * @param fileName - Name used in diagnostics
 * @param text - Declaration source
 */
export const readHostDeclarations = (
  fileName: string,
  text: string
): Result<HostDeclarationFile, HostDiagnostic[]> => {
  const sourceFile = ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS
  );
  const context: ReaderContext = { sourceFile, diagnostics: [] };

  const classes = sourceFile.statements
    .map((statement) => readStatement(context, statement))
    .filter((c): c is HostClassDeclaration => c !== undefined);

  if (context.diagnostics.length > 0) {
    return { ok: false, error: context.diagnostics };
  }

  return { ok: true, value: { fileName, classes } };
};
