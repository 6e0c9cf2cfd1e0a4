import { describe, it } from "mocha";
import { expect } from "chai";
import { CatalogBinder } from "./binder.js";
import { buildHostCatalog, type HostCatalog } from "./catalog.js";
import { readHostDeclarations } from "./declarations/reader.js";
import { HostInvocationError } from "./errors.js";
import type {
  NativeClass,
  NativeFieldRef,
  NativeMethodRef,
} from "./native.js";

const DECLARATIONS = `
type int = number;

declare class Object {
  hashCode(): int;
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
  static of(side: int): Square;
}
`;

class SquareImpl {
  static readonly SIDES = 4;

  constructor(public side: number) {}

  static of(side: number): SquareImpl {
    return new SquareImpl(side);
  }

  area(): number {
    return this.side * this.side;
  }
}

const createCatalog = (): HostCatalog => {
  const file = readHostDeclarations("shapes.d.ts", DECLARATIONS);
  if (!file.ok) throw new Error(file.error.map((d) => d.message).join("\n"));
  const catalog = buildHostCatalog([file.value]);
  if (!catalog.ok) throw new Error(catalog.error.map((d) => d.message).join("\n"));
  return catalog.value;
};

describe("CatalogBinder", () => {
  const binder = new CatalogBinder(createCatalog(), { Square: SquareImpl });

  const cls = (name: string): NativeClass => {
    const found = binder.findClass(name);
    if (!found) throw new Error(`missing class ${name}`);
    return found;
  };

  const method = (
    owner: string,
    name: string,
    parameters: readonly string[] = []
  ): NativeMethodRef => {
    const found = binder.findMethod(cls(owner), name, parameters.map(cls));
    if (!found) throw new Error(`missing method ${owner}.${name}`);
    return found;
  };

  const field = (owner: string, name: string): NativeFieldRef => {
    const found = binder.findField(cls(owner), name);
    if (!found) throw new Error(`missing field ${owner}.${name}`);
    return found;
  };

  describe("lookup", () => {
    it("finds methods declared on supertypes", () => {
      expect(method("Square", "area").owner.name).to.equal("Shape");
      expect(method("Square", "hashCode").owner.name).to.equal("Object");
    });

    it("matches parameter classes exactly", () => {
      expect(binder.findMethod(cls("Square"), "of", [cls("int")])).to.not.equal(
        undefined
      );
      expect(binder.findMethod(cls("Square"), "of", [cls("long")])).to.equal(
        undefined
      );
      expect(binder.findMethod(cls("Square"), "of", [])).to.equal(undefined);
    });

    it("does not reach the root class through an interface", () => {
      expect(binder.findMethod(cls("CharSequence"), "hashCode", [])).to.equal(
        undefined
      );
      expect(method("CharSequence", "length").owner.name).to.equal(
        "CharSequence"
      );
    });

    it("never inherits constructors", () => {
      expect(binder.findConstructor(cls("Square"), [cls("int")])).to.not.equal(
        undefined
      );
      expect(binder.findConstructor(cls("Shape"), [])).to.equal(undefined);
      expect(binder.findConstructor(cls("Square"), [])).to.equal(undefined);
    });

    it("finds fields through the lineage", () => {
      expect(field("Square", "side")).to.include({
        isStatic: false,
        isReadonly: false,
      });
      expect(binder.findField(cls("Shape"), "side")).to.equal(undefined);
    });
  });

  describe("invocation", () => {
    it("constructs instances with the implementation class", () => {
      const ctor = binder.findConstructor(cls("Square"), [cls("int")]);
      if (!ctor) throw new Error("missing constructor");

      const square = binder.invoke(ctor, undefined, [3]);
      expect(square).to.be.instanceOf(SquareImpl);
      expect(binder.invoke(method("Square", "area"), square, [])).to.equal(9);
    });

    it("calls static methods on the implementation object", () => {
      const square = binder.invoke(method("Square", "of", ["int"]), undefined, [5]);
      expect(square).to.be.instanceOf(SquareImpl);
      expect(binder.getField(field("Square", "side"), square)).to.equal(5);
    });

    it("boxes primitive receivers", () => {
      expect(binder.invoke(method("String", "trim"), "  hi ", [])).to.equal("hi");
    });

    it("reads and writes fields", () => {
      const square = new SquareImpl(2);
      binder.setField(field("Square", "side"), square, 6);
      expect(square.side).to.equal(6);
      expect(binder.getField(field("Square", "SIDES"), undefined)).to.equal(4);
    });

    it("refuses to write readonly fields", () => {
      expect(() =>
        binder.setField(field("Square", "SIDES"), undefined, 5)
      ).to.throw(HostInvocationError, "Cannot invoke Square.SIDES: field is readonly");
    });

    it("refuses to construct abstract classes", () => {
      expect(() =>
        binder.invoke(
          { kind: "constructor", owner: cls("Shape"), parameters: [] },
          undefined,
          []
        )
      ).to.throw(HostInvocationError, "Cannot invoke Shape.<init>: class is abstract");
    });

    it("refuses null receivers", () => {
      expect(() => binder.invoke(method("Square", "area"), null, [])).to.throw(
        HostInvocationError,
        "Cannot invoke Shape.area: receiver is null"
      );
    });

    it("reports missing implementations", () => {
      const bare = new CatalogBinder(binder.catalog);
      const ctor = bare.findConstructor(cls("Square"), [cls("int")]);
      if (!ctor) throw new Error("missing constructor");

      expect(() => bare.invoke(ctor, undefined, [1])).to.throw(
        HostInvocationError,
        "Cannot invoke Square.<init>: no implementation registered for 'Square'"
      );
    });

    it("reports functions missing from the receiver", () => {
      expect(() => binder.invoke(method("Square", "hashCode"), {}, [])).to.throw(
        HostInvocationError,
        "Cannot invoke Object.hashCode: no such function on the target"
      );
    });
  });
});
