/**
 * HostCatalog - the host's classes, their supertype graph and their declared
 * members, resolved from declaration files.
 *
 * Primitive classes are fixed. Every class without an explicit superclass
 * extends the root class (when one is declared); interfaces only extend
 * interfaces and reach the root class through assignability alone.
 */

import type { Result } from "./types/result.js";
import { hostDiagnostic, type HostDiagnostic } from "./types/diagnostic.js";
import type {
  HostClassDeclaration,
  HostDeclarationFile,
} from "./declarations/types.js";
import {
  sameClasses,
  describeClasses,
  type NativeClass,
  type NativeConstructorRef,
  type NativeFieldRef,
  type NativeMethodRef,
} from "./native.js";

export const PRIMITIVE_CLASS_NAMES = [
  "void",
  "boolean",
  "byte",
  "short",
  "char",
  "int",
  "long",
  "float",
  "double",
] as const;

export type PrimitiveClassName = (typeof PRIMITIVE_CLASS_NAMES)[number];

export const DEFAULT_ROOT_CLASS_NAME = "Object";

export type HostCatalogOptions = {
  readonly rootClassName?: string;
};

type ClassEntry = {
  readonly cls: NativeClass;
  readonly supertypes: NativeClass[];
  readonly constructors: NativeConstructorRef[];
  readonly methods: Map<string, NativeMethodRef[]>;
  readonly fields: Map<string, NativeFieldRef>;
};

const ARRAY_SUFFIX = "[]";

const isVoid = (cls: NativeClass): boolean =>
  cls.kind === "primitive" && cls.name === "void";

const createClass = (
  name: string,
  kind: NativeClass["kind"],
  isAbstract: boolean
): NativeClass => ({
  name,
  kind,
  descriptor: name,
  abstract: isAbstract,
  dimensions: 0,
});

export class HostCatalog {
  readonly rootClassName: string;

  private readonly entries = new Map<string, ClassEntry>();
  private readonly arrays = new Map<string, NativeClass>();

  constructor(options: HostCatalogOptions = {}) {
    this.rootClassName = options.rootClassName ?? DEFAULT_ROOT_CLASS_NAME;

    for (const name of PRIMITIVE_CLASS_NAMES) {
      this.entries.set(name, {
        cls: createClass(name, "primitive", false),
        supertypes: [],
        constructors: [],
        methods: new Map(),
        fields: new Map(),
      });
    }
  }

  /**
   * The root class every reference class is assignable to, once declared.
   */
  get root(): NativeClass | undefined {
    return this.entries.get(this.rootClassName)?.cls;
  }

  /**
   * Find a class by name. Array names (`int[]`, `String[][]`) resolve to the
   * synthesized array class of a known component other than `void`.
   */
  findClass(name: string): NativeClass | undefined {
    const direct = this.entries.get(name)?.cls;
    if (direct) return direct;

    let component = name;
    let dimensions = 0;
    while (component.endsWith(ARRAY_SUFFIX)) {
      component = component.slice(0, -ARRAY_SUFFIX.length);
      dimensions++;
    }
    if (dimensions === 0) return undefined;

    const base = this.entries.get(component)?.cls;
    return base && !isVoid(base) ? this.arrayClass(base, dimensions) : undefined;
  }

  /**
   * The array class with `dimensions` dimensions over `component`. One
   * instance exists per shape, so identity comparison is safe.
   */
  arrayClass(component: NativeClass, dimensions: number): NativeClass {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new Error(`ICE: array class requested with ${dimensions} dimensions`);
    }

    const element = component.component ?? component;
    if (isVoid(element)) {
      throw new Error("ICE: array class requested over 'void'");
    }
    const total = component.dimensions + dimensions;
    const descriptor = element.descriptor + ARRAY_SUFFIX.repeat(total);

    const existing = this.arrays.get(descriptor);
    if (existing) return existing;

    const cls: NativeClass = {
      name: element.name + ARRAY_SUFFIX.repeat(total),
      kind: "array",
      descriptor,
      abstract: false,
      component: element,
      dimensions: total,
    };
    this.arrays.set(descriptor, cls);
    return cls;
  }

  classNames(): readonly string[] {
    return [...this.entries.keys()];
  }

  /**
   * Direct supertypes: superclass first, then interfaces in declaration order.
   */
  supertypes(cls: NativeClass): readonly NativeClass[] {
    if (cls.kind === "array") {
      const root = this.root;
      return root ? [root] : [];
    }
    return this.entries.get(cls.name)?.supertypes ?? [];
  }

  /**
   * Supertypes in breadth-first order, starting with `cls` itself.
   */
  lineage(cls: NativeClass): readonly NativeClass[] {
    const order: NativeClass[] = [];
    const seen = new Set<string>();
    const queue: NativeClass[] = [cls];

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next || seen.has(next.descriptor)) continue;
      seen.add(next.descriptor);
      order.push(next);
      queue.push(...this.supertypes(next));
    }

    return order;
  }

  isAssignable(target: NativeClass, source: NativeClass): boolean {
    if (target.descriptor === source.descriptor) return true;
    if (target.kind === "primitive" || source.kind === "primitive") {
      return false;
    }
    if (target.name === this.rootClassName && target.kind !== "array") {
      return true;
    }

    if (source.kind === "array") {
      if (target.kind !== "array" || target.dimensions !== source.dimensions) {
        return this.isArrayAssignableAcrossDimensions(target, source);
      }
      const targetComponent = target.component;
      const sourceComponent = source.component;
      if (!targetComponent || !sourceComponent) return false;
      return (
        sourceComponent.kind !== "primitive" &&
        this.isAssignable(targetComponent, sourceComponent)
      );
    }

    return this.lineage(source).some(
      (cls) => cls.descriptor === target.descriptor
    );
  }

  /**
   * `Object[]` accepts `int[][]`: an array of arrays is an array of objects.
   */
  private isArrayAssignableAcrossDimensions(
    target: NativeClass,
    source: NativeClass
  ): boolean {
    if (target.kind !== "array" || target.dimensions >= source.dimensions) {
      return false;
    }
    return target.component?.name === this.rootClassName;
  }

  constructorsOf(cls: NativeClass): readonly NativeConstructorRef[] {
    return this.entries.get(cls.name)?.constructors ?? [];
  }

  declaredMethods(cls: NativeClass, name: string): readonly NativeMethodRef[] {
    if (cls.kind === "array") return [];
    return this.entries.get(cls.name)?.methods.get(name) ?? [];
  }

  declaredField(cls: NativeClass, name: string): NativeFieldRef | undefined {
    if (cls.kind === "array") return undefined;
    return this.entries.get(cls.name)?.fields.get(name);
  }

  /**
   * Add declared classes. Runs in two passes so declarations may refer to
   * classes declared later or in other files.
   */
  addDeclarations(
    files: readonly HostDeclarationFile[]
  ): Result<void, HostDiagnostic[]> {
    const diagnostics: HostDiagnostic[] = [];
    const added: { readonly file: string; readonly decl: HostClassDeclaration }[] =
      [];

    for (const file of files) {
      for (const decl of file.classes) {
        if (this.entries.has(decl.name)) {
          diagnostics.push(
            hostDiagnostic(
              "HOST2001",
              `Duplicate class declaration '${decl.name}'`,
              { file: file.fileName, line: decl.line }
            )
          );
          continue;
        }

        this.entries.set(decl.name, {
          cls: createClass(decl.name, decl.kind, decl.abstract),
          supertypes: [],
          constructors: [],
          methods: new Map(),
          fields: new Map(),
        });
        added.push({ file: file.fileName, decl });
      }
    }

    for (const { file, decl } of added) {
      diagnostics.push(...this.linkSupertypes(file, decl));
    }

    for (const { file, decl } of added) {
      diagnostics.push(...this.checkAcyclic(file, decl));
    }

    for (const { file, decl } of added) {
      diagnostics.push(...this.addMembers(file, decl));
    }

    if (diagnostics.length > 0) {
      return { ok: false, error: diagnostics };
    }
    return { ok: true, value: undefined };
  }

  private linkSupertypes(
    file: string,
    decl: HostClassDeclaration
  ): HostDiagnostic[] {
    const diagnostics: HostDiagnostic[] = [];
    const entry = this.entries.get(decl.name);
    if (!entry) return diagnostics;
    const location = { file, line: decl.line };

    const resolve = (
      name: string,
      expected: "class" | "interface"
    ): NativeClass | undefined => {
      const cls = this.entries.get(name)?.cls;
      if (!cls) {
        diagnostics.push(
          hostDiagnostic(
            "HOST2002",
            `Unknown supertype '${name}' of '${decl.name}'`,
            location
          )
        );
        return undefined;
      }
      if (cls.kind !== expected) {
        diagnostics.push(
          hostDiagnostic(
            "HOST2003",
            `'${decl.name}' cannot inherit from ${cls.kind} '${name}'; expected ${expected}`,
            location
          )
        );
        return undefined;
      }
      return cls;
    };

    if (decl.kind === "class") {
      if (decl.extends.length > 1) {
        diagnostics.push(
          hostDiagnostic(
            "HOST2003",
            `Class '${decl.name}' may extend at most one class`,
            location
          )
        );
      }

      const [superName] = decl.extends;
      if (superName !== undefined) {
        const superclass = resolve(superName, "class");
        if (superclass) entry.supertypes.push(superclass);
      } else if (decl.name !== this.rootClassName) {
        const root = this.root;
        if (root) entry.supertypes.push(root);
      }

      for (const name of decl.implements) {
        const iface = resolve(name, "interface");
        if (iface) entry.supertypes.push(iface);
      }
    } else {
      for (const name of decl.extends) {
        const iface = resolve(name, "interface");
        if (iface) entry.supertypes.push(iface);
      }
    }

    return diagnostics;
  }

  private checkAcyclic(
    file: string,
    decl: HostClassDeclaration
  ): HostDiagnostic[] {
    const start = this.entries.get(decl.name)?.cls;
    if (!start) return [];

    const seen = new Set<string>();
    const visit = (cls: NativeClass): boolean => {
      if (cls.name === start.name) return true;
      if (seen.has(cls.name)) return false;
      seen.add(cls.name);
      return this.supertypes(cls).some(visit);
    };

    const cyclic = this.supertypes(start).some(visit);
    return cyclic
      ? [
          hostDiagnostic(
            "HOST2004",
            `Class '${decl.name}' inherits from itself`,
            { file, line: decl.line }
          ),
        ]
      : [];
  }

  private addMembers(
    file: string,
    decl: HostClassDeclaration
  ): HostDiagnostic[] {
    const diagnostics: HostDiagnostic[] = [];
    const entry = this.entries.get(decl.name);
    if (!entry) return diagnostics;
    const owner = entry.cls;

    const resolveAll = (
      names: readonly string[],
      line: number
    ): NativeClass[] | undefined => {
      const classes: NativeClass[] = [];
      for (const name of names) {
        const cls = this.findClass(name);
        if (!cls) {
          diagnostics.push(
            hostDiagnostic(
              "HOST2005",
              `Unknown type '${name}' in a member of '${decl.name}'`,
              { file, line }
            )
          );
          return undefined;
        }
        classes.push(cls);
      }
      return classes;
    };

    const duplicate = (what: string, line: number): void => {
      diagnostics.push(
        hostDiagnostic(
          "HOST2006",
          `Duplicate ${what} in '${decl.name}'`,
          { file, line }
        )
      );
    };

    for (const member of decl.members) {
      switch (member.kind) {
        case "constructor": {
          const parameters = resolveAll(member.parameters, member.line);
          if (!parameters) break;
          if (entry.constructors.some((c) => sameClasses(c.parameters, parameters))) {
            duplicate(`constructor ${describeClasses(parameters)}`, member.line);
            break;
          }
          entry.constructors.push({ kind: "constructor", owner, parameters });
          break;
        }

        case "method": {
          const resolved = resolveAll(
            [member.returns, ...member.parameters],
            member.line
          );
          const [returns, ...parameters] = resolved ?? [];
          if (!returns) break;
          const overloads = entry.methods.get(member.name) ?? [];
          if (overloads.some((m) => sameClasses(m.parameters, parameters))) {
            duplicate(
              `method ${member.name}${describeClasses(parameters)}`,
              member.line
            );
            break;
          }
          overloads.push({
            kind: "method",
            owner,
            name: member.name,
            isStatic: member.isStatic,
            parameters,
            returns,
          });
          entry.methods.set(member.name, overloads);
          break;
        }

        case "field": {
          const [type] = resolveAll([member.type], member.line) ?? [];
          if (!type) break;
          if (entry.fields.has(member.name)) {
            duplicate(`field ${member.name}`, member.line);
            break;
          }
          entry.fields.set(member.name, {
            kind: "field",
            owner,
            name: member.name,
            isStatic: member.isStatic,
            isReadonly: member.isReadonly,
            type,
          });
          break;
        }
      }
    }

    return diagnostics;
  }
}

/**
 * Build a catalogue from declaration files.
 */
export const buildHostCatalog = (
  files: readonly HostDeclarationFile[],
  options: HostCatalogOptions = {}
): Result<HostCatalog, HostDiagnostic[]> => {
  const catalog = new HostCatalog(options);
  const added = catalog.addDeclarations(files);
  if (!added.ok) return added;
  return { ok: true, value: catalog };
};
