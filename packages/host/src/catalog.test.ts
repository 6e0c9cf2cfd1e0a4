import { describe, it } from "mocha";
import { expect } from "chai";
import { buildHostCatalog, HostCatalog } from "./catalog.js";
import { readHostDeclarations } from "./declarations/reader.js";
import type { HostDiagnostic } from "./types/diagnostic.js";
import type { Result } from "./types/result.js";
import type { NativeClass } from "./native.js";

const SHAPES = `
type int = number;

declare class Object {
  hashCode(): int;
  toString(): String;
}

declare interface CharSequence {
  length(): int;
}

declare class String implements CharSequence {
  length(): int;
  trim(): String;
}

declare abstract class Shape {
  area(): int;
}

declare class Square extends Shape {
  constructor(side: int);
  static readonly SIDES: int;
  side: int;
}
`;

const build = (text: string): Result<HostCatalog, HostDiagnostic[]> => {
  const file = readHostDeclarations("test.d.ts", text);
  if (!file.ok) return file;
  return buildHostCatalog([file.value]);
};

const shapes = (): HostCatalog => {
  const catalog = build(SHAPES);
  if (!catalog.ok) {
    throw new Error(catalog.error.map((d) => d.message).join("\n"));
  }
  return catalog.value;
};

const cls = (catalog: HostCatalog, name: string): NativeClass => {
  const found = catalog.findClass(name);
  if (!found) throw new Error(`missing class ${name}`);
  return found;
};

const codes = (result: Result<HostCatalog, HostDiagnostic[]>): string[] =>
  result.ok ? [] : result.error.map((d) => d.code);

describe("HostCatalog", () => {
  describe("classes", () => {
    it("always holds the primitive classes", () => {
      const catalog = new HostCatalog();
      const int = cls(catalog, "int");
      expect(int.kind).to.equal("primitive");
      expect(int.descriptor).to.equal("int");
      expect(catalog.findClass("Object")).to.equal(undefined);
    });

    it("synthesizes one array class per shape", () => {
      const catalog = shapes();
      const matrix = cls(catalog, "int[][]");
      expect(matrix.kind).to.equal("array");
      expect(matrix.dimensions).to.equal(2);
      expect(matrix.descriptor).to.equal("int[][]");
      expect(matrix.component?.name).to.equal("int");

      const row = catalog.arrayClass(cls(catalog, "int"), 1);
      expect(catalog.arrayClass(row, 1)).to.equal(matrix);
    });

    it("does not find arrays of unknown classes", () => {
      expect(shapes().findClass("Circle[]")).to.equal(undefined);
    });

    it("has no arrays of void", () => {
      const catalog = shapes();
      expect(catalog.findClass("void")?.kind).to.equal("primitive");
      expect(catalog.findClass("void[]")).to.equal(undefined);
      expect(catalog.findClass("void[][]")).to.equal(undefined);
      expect(() => catalog.arrayClass(cls(catalog, "void"), 1)).to.throw(
        "ICE: array class requested over 'void'"
      );
    });

    it("refuses array shapes that are not whole dimensions", () => {
      const catalog = shapes();
      const int = cls(catalog, "int");
      expect(() => catalog.arrayClass(int, 0)).to.throw(
        "ICE: array class requested with 0 dimensions"
      );
      expect(() => catalog.arrayClass(int, 1.5)).to.throw(
        "ICE: array class requested with 1.5 dimensions"
      );
    });

    it("lists supertypes superclass first, then interfaces", () => {
      const catalog = shapes();
      const names = (name: string) =>
        catalog.supertypes(cls(catalog, name)).map((c) => c.name);

      expect(names("Square")).to.deep.equal(["Shape"]);
      expect(names("Shape")).to.deep.equal(["Object"]);
      expect(names("String")).to.deep.equal(["Object", "CharSequence"]);
      expect(names("CharSequence")).to.deep.equal([]);
      expect(names("Object")).to.deep.equal([]);
      expect(names("Square[]")).to.deep.equal(["Object"]);
    });

    it("walks the lineage breadth first from the class itself", () => {
      const catalog = shapes();
      expect(
        catalog.lineage(cls(catalog, "Square")).map((c) => c.name)
      ).to.deep.equal(["Square", "Shape", "Object"]);
    });
  });

  describe("isAssignable", () => {
    const catalog = shapes();
    const assignable = (target: string, source: string): boolean =>
      catalog.isAssignable(cls(catalog, target), cls(catalog, source));

    it("accepts identical classes", () => {
      expect(assignable("int", "int")).to.equal(true);
      expect(assignable("Square", "Square")).to.equal(true);
    });

    it("keeps primitives apart from everything else", () => {
      expect(assignable("long", "int")).to.equal(false);
      expect(assignable("Object", "int")).to.equal(false);
      expect(assignable("int", "Object")).to.equal(false);
    });

    it("follows superclasses and interfaces", () => {
      expect(assignable("Shape", "Square")).to.equal(true);
      expect(assignable("Square", "Shape")).to.equal(false);
      expect(assignable("CharSequence", "String")).to.equal(true);
      expect(assignable("String", "CharSequence")).to.equal(false);
    });

    it("makes the root class accept every reference class", () => {
      expect(assignable("Object", "Square")).to.equal(true);
      expect(assignable("Object", "CharSequence")).to.equal(true);
      expect(assignable("Object", "int[]")).to.equal(true);
    });

    it("treats reference arrays covariantly", () => {
      expect(assignable("Shape[]", "Square[]")).to.equal(true);
      expect(assignable("Square[]", "Shape[]")).to.equal(false);
      expect(assignable("Object[]", "String[]")).to.equal(true);
      expect(assignable("Object[]", "int[]")).to.equal(false);
      expect(assignable("long[]", "int[]")).to.equal(false);
      expect(assignable("Shape[]", "Square[][]")).to.equal(false);
      expect(assignable("Object[]", "Square[][]")).to.equal(true);
      expect(assignable("Object[][]", "int[]")).to.equal(false);
    });
  });

  describe("members", () => {
    it("records constructors, methods and fields per class", () => {
      const catalog = shapes();
      const square = cls(catalog, "Square");

      expect(catalog.constructorsOf(square)).to.have.length(1);
      expect(catalog.declaredField(square, "SIDES")).to.include({
        isStatic: true,
        isReadonly: true,
      });
      expect(catalog.declaredMethods(square, "area")).to.deep.equal([]);
      expect(
        catalog.declaredMethods(cls(catalog, "Shape"), "area")[0]?.returns.name
      ).to.equal("int");
    });
  });

  describe("addDeclarations", () => {
    it("rejects duplicate classes", () => {
      expect(codes(build(`declare class A {}\ndeclare class A {}`))).to.deep.equal([
        "HOST2001",
      ]);
    });

    it("rejects unknown supertypes", () => {
      const result = build(`declare class A extends Missing {}`);
      expect(codes(result)).to.deep.equal(["HOST2002"]);
      if (result.ok) return;
      expect(result.error[0]?.message).to.equal(
        "Unknown supertype 'Missing' of 'A'"
      );
    });

    it("rejects supertypes of the wrong kind", () => {
      expect(
        codes(build(`declare class A {}\ndeclare class B implements A {}`))
      ).to.deep.equal(["HOST2003"]);
      expect(
        codes(build(`declare class A {}\ndeclare interface I extends A {}`))
      ).to.deep.equal(["HOST2003"]);
    });

    it("rejects classes extending more than one class", () => {
      expect(
        codes(
          build(
            `declare class A {}\ndeclare class B {}\ndeclare class C extends A, B {}`
          )
        )
      ).to.deep.equal(["HOST2003"]);
    });

    it("rejects inheritance cycles", () => {
      expect(
        codes(
          build(`declare interface I extends J {}\ndeclare interface J extends I {}`)
        )
      ).to.deep.equal(["HOST2004", "HOST2004"]);
    });

    it("rejects unknown member types", () => {
      const result = build(`declare class A {\n  get(): Missing;\n}`);
      expect(codes(result)).to.deep.equal(["HOST2005"]);
      if (result.ok) return;
      expect(result.error[0]?.location).to.deep.equal({ file: "test.d.ts", line: 2 });
    });

    it("rejects duplicate member signatures", () => {
      expect(
        codes(build(`declare class A {\n  f(a: int): void;\n  f(b: int): int;\n}`))
      ).to.deep.equal(["HOST2006"]);
    });

    it("accepts overloads that differ in parameters", () => {
      const result = build(`declare class A {\n  f(a: int): void;\n  f(a: long): void;\n}`);
      expect(result.ok).to.equal(true);
    });
  });
});
