/**
 * Shared fixtures for registry tests: a small host with a Widget class and
 * its JavaScript implementation.
 */

import {
  buildHostCatalog,
  CatalogBinder,
  readHostDeclarations,
  type HostCatalog,
  type Result,
} from "@sandscript/host";
import { formatDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import { DefinitionBuilder } from "./builder.js";
import type { DefinitionOptions } from "./definition.js";

export const WIDGET_DECLARATIONS = `
type int = number;

declare class Object {
  equals(other: Object): boolean;
  hashCode(): int;
  toString(): String;
}

declare class String {}

declare interface Named {
  getName(): String;
}

declare class Widget implements Named {
  constructor();
  constructor(x: int);
  static readonly LIMIT: int;
  static created: int;
  x: int;
  readonly id: int;
  static create(x: int): Widget;
  getY(): int;
  setY(y: int): void;
  isActive(): boolean;
  getName(): String;
  frob(): int;
  frob(a: int): int;
  frob(a: int, b: int): int;
}

declare class Gadget extends Widget {
  constructor();
  getZ(): int;
}

declare class Integer {
  static valueOf(value: int): Integer;
  intValue(): int;
}

declare abstract class Boxes {
  static box(value: int): Object;
  static unbox(value: Object): int;
}
`;

export class WidgetImpl {
  static readonly LIMIT = 10;
  static created = 0;

  x: number;
  readonly id: number;
  private y = 0;

  constructor(x = 0) {
    this.x = x;
    WidgetImpl.created++;
    this.id = WidgetImpl.created;
  }

  static create(x: number): WidgetImpl {
    return new WidgetImpl(x);
  }

  getY(): number {
    return this.y;
  }

  setY(y: number): void {
    this.y = y;
  }

  isActive(): boolean {
    return this.x > 0;
  }

  getName(): string {
    return `widget-${this.id}`;
  }

  frob(...values: number[]): number {
    return values.reduce((sum, value) => sum + value, 100);
  }
}

export class GadgetImpl extends WidgetImpl {
  constructor() {
    super(7);
  }

  getZ(): number {
    return this.x * 2;
  }
}

export const expectOk = <T>(result: Result<T, Diagnostic>): T => {
  if (!result.ok) {
    throw new Error(formatDiagnostic(result.error));
  }
  return result.value;
};

export const expectError = <T>(result: Result<T, Diagnostic>): Diagnostic => {
  if (result.ok) {
    throw new Error("Expected an error result");
  }
  return result.error;
};

export const createWidgetCatalog = (): HostCatalog => {
  const file = readHostDeclarations("widget.d.ts", WIDGET_DECLARATIONS);
  if (!file.ok) {
    throw new Error(file.error.map((d) => d.message).join("\n"));
  }
  const catalog = buildHostCatalog([file.value]);
  if (!catalog.ok) {
    throw new Error(catalog.error.map((d) => d.message).join("\n"));
  }
  return catalog.value;
};

export const createWidgetBinder = (): CatalogBinder =>
  new CatalogBinder(createWidgetCatalog(), {
    Widget: WidgetImpl,
    Gadget: GadgetImpl,
  });

/**
 * A builder with a struct declared over each Widget host class, plus `def`
 * over `Object`.
 */
export const createWidgetBuilder = (
  options: DefinitionOptions = {}
): DefinitionBuilder => {
  const builder = new DefinitionBuilder(createWidgetBinder(), options);
  const structs: readonly (readonly [string, string])[] = [
    ["void", "void"],
    ["boolean", "boolean"],
    ["int", "int"],
    ["long", "long"],
    ["Object", "Object"],
    ["def", "Object"],
    ["String", "String"],
    ["Named", "Named"],
    ["Widget", "Widget"],
    ["Gadget", "Gadget"],
    ["Integer", "Integer"],
    ["Boxes", "Boxes"],
  ];
  for (const [name, cls] of structs) {
    expectOk(builder.registerStruct(name, cls));
  }
  return builder;
};

/**
 * Bind the Widget members used across tests. Leaves the builder in the
 * bind phase.
 */
export const bindWidgetMembers = (builder: DefinitionBuilder): void => {
  const type = (name: string) => expectOk(builder.resolveType(name));
  const int = type("int");

  expectOk(
    builder.addMethod("Object", "equals", {
      returns: type("boolean"),
      args: [type("Object")],
    })
  );
  expectOk(builder.addMethod("Object", "hashCode", { returns: int, args: [] }));
  expectOk(
    builder.addMethod("Object", "toString", { returns: type("String"), args: [] })
  );
  expectOk(builder.addMethod("Named", "getName", { returns: type("String"), args: [] }));

  expectOk(builder.addConstructor("Widget", []));
  expectOk(builder.addConstructor("Widget", [int]));
  expectOk(builder.addField("Widget", "LIMIT", { isStatic: true, type: int }));
  expectOk(builder.addField("Widget", "x", { type: int }));
  expectOk(builder.addField("Widget", "id", { type: int }));
  expectOk(
    builder.addMethod("Widget", "create", {
      isStatic: true,
      returns: type("Widget"),
      args: [int],
    })
  );
  expectOk(builder.addMethod("Widget", "getY", { returns: int, args: [] }));
  expectOk(builder.addMethod("Widget", "setY", { returns: type("void"), args: [int] }));
  expectOk(builder.addMethod("Widget", "isActive", { returns: type("boolean"), args: [] }));
  expectOk(builder.addMethod("Widget", "frob", { returns: int, args: [] }));
  expectOk(builder.addMethod("Widget", "frob", { returns: int, args: [int] }));
  expectOk(builder.addMethod("Widget", "frob", { returns: int, args: [int, int] }));

  expectOk(builder.addConstructor("Gadget", []));
  expectOk(builder.addMethod("Gadget", "getZ", { returns: int, args: [] }));

  expectOk(
    builder.addMethod("Integer", "valueOf", {
      isStatic: true,
      returns: type("Integer"),
      args: [int],
    })
  );
  expectOk(builder.addMethod("Integer", "intValue", { returns: int, args: [] }));
  expectOk(
    builder.addMethod("Boxes", "box", {
      isStatic: true,
      returns: type("Object"),
      args: [int],
    })
  );
  expectOk(
    builder.addMethod("Boxes", "unbox", {
      isStatic: true,
      returns: int,
      args: [type("Object")],
    })
  );
};

/**
 * Copy members down the Widget host's struct graph. Leaves the builder in
 * the inherit phase.
 */
export const inheritWidgetStructs = (builder: DefinitionBuilder): void => {
  expectOk(builder.copyStruct("def", "Object"));
  expectOk(builder.copyStruct("Named", "Object"));
  expectOk(builder.copyStruct("Widget", "Named", "Object"));
  expectOk(builder.copyStruct("Gadget", "Widget"));
  expectOk(builder.copyStruct("Integer", "Object"));
};
