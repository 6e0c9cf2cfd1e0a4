import { describe, it } from "mocha";
import { expect } from "chai";
import type { DefinitionBuilder } from "./builder.js";
import {
  bindWidgetMembers,
  createWidgetBuilder,
  expectError,
  expectOk,
} from "./test-harness.js";

const boundBuilder = (rootClassName?: string): DefinitionBuilder => {
  const builder = createWidgetBuilder({ rootClassName });
  bindWidgetMembers(builder);
  return builder;
};

const methodKeys = (builder: DefinitionBuilder, struct: string): string[] =>
  [...(builder.getStruct(struct)?.methods.keys() ?? [])].sort();

const methodSignatures = (builder: DefinitionBuilder, struct: string): string[] =>
  [...(builder.getStruct(struct)?.methods.values() ?? [])]
    .map((method) => {
      const args = method.args.map((arg) => arg.name).join(",");
      return `${method.name}(${args}): ${method.returns.name}`;
    })
    .sort();

describe("InheritanceResolver", () => {
  it("copies instance methods from every parent", () => {
    const builder = boundBuilder();

    const copied = expectOk(builder.copyStruct("Widget", "Named", "Object"));

    expect(copied).to.deep.equal({ methods: 4, fields: 0 });
    const getName = builder.getStruct("Widget")?.methods.get("getName/0");
    expect(getName?.owner.name).to.equal("Widget");
    expect(getName?.native.owner.name).to.equal("Widget");
    expect(getName?.returns.name).to.equal("String");
  });

  it("resolves root class members of an interface on the root class", () => {
    const builder = boundBuilder();

    expect(expectOk(builder.copyStruct("Named", "Object"))).to.deep.equal({
      methods: 3,
      fields: 0,
    });
    const equals = builder.getStruct("Named")?.methods.get("equals/1");
    expect(equals?.owner.name).to.equal("Named");
    expect(equals?.native.owner.name).to.equal("Object");
  });

  it("applies the interface exception only to the configured root class", () => {
    const builder = boundBuilder("Base");

    const diagnostic = expectError(builder.copyStruct("Named", "Object"));

    expect(diagnostic.code).to.equal("DEF1706");
    expect(diagnostic.message).to.equal(
      "Inherited method 'Object.equals' cannot be resolved on native class 'Named' for struct 'Named'"
    );
  });

  it("copies fields and flattened members but not statics or constructors", () => {
    const builder = boundBuilder();
    expectOk(builder.copyStruct("Widget", "Named", "Object"));

    expect(expectOk(builder.copyStruct("Gadget", "Widget"))).to.deep.equal({
      methods: 10,
      fields: 2,
    });

    const gadget = builder.getStruct("Gadget");
    expect(gadget?.fields.get("x")?.owner.name).to.equal("Gadget");
    expect(gadget?.fields.get("x")?.writable).to.equal(true);
    expect(gadget?.fields.get("id")?.writable).to.equal(false);
    expect(gadget?.methods.get("getY/0")?.native.owner.name).to.equal("Widget");
    expect(gadget?.methods.has("getName/0")).to.equal(true);
    expect(gadget?.staticFields.size).to.equal(0);
    expect(gadget?.staticMethods.size).to.equal(0);
    expect([...(gadget?.constructors.keys() ?? [])]).to.deep.equal(["new/0"]);
  });

  it("produces the same members whatever the parent order", () => {
    const first = boundBuilder();
    const second = boundBuilder();

    expectOk(first.copyStruct("Widget", "Named", "Object"));
    expectOk(second.copyStruct("Widget", "Object", "Named"));

    expect(methodKeys(first, "Widget")).to.deep.equal(methodKeys(second, "Widget"));
    expect(methodSignatures(first, "Widget")).to.deep.equal(
      methodSignatures(second, "Widget")
    );
    expect(methodSignatures(first, "Widget")).to.deep.equal([
      "equals(Object): boolean",
      "frob(): int",
      "frob(int): int",
      "frob(int,int): int",
      "getName(): String",
      "getY(): int",
      "hashCode(): int",
      "isActive(): boolean",
      "setY(int): void",
      "toString(): String",
    ]);
    expect(methodKeys(first, "Widget")).to.deep.equal([
      "equals/1",
      "frob/0",
      "frob/1",
      "frob/2",
      "getName/0",
      "getY/0",
      "hashCode/0",
      "isActive/0",
      "setY/1",
      "toString/0",
    ]);
  });

  it("keeps members the owner already defines", () => {
    const builder = createWidgetBuilder();
    bindWidgetMembers(builder);
    const own = expectOk(
      builder.addMethod("Gadget", "getY", {
        returns: expectOk(builder.resolveType("int")),
        args: [],
      })
    );

    expect(expectOk(builder.copyStruct("Gadget", "Widget")).methods).to.equal(5);
    expect(builder.getStruct("Gadget")?.methods.get("getY/0")).to.equal(own);
  });

  it("rejects parents that are not native supertypes", () => {
    const diagnostic = expectError(boundBuilder().copyStruct("Widget", "Gadget"));

    expect(diagnostic.code).to.equal("DEF1705");
    expect(diagnostic.message).to.equal(
      "Struct 'Gadget' is not a native supertype of 'Widget'"
    );
  });

  it("rejects inherited methods that collide with a static method", () => {
    const builder = createWidgetBuilder();
    bindWidgetMembers(builder);
    expectOk(
      builder.addMethod("Gadget", "frob", {
        alias: "create",
        isStatic: true,
        returns: expectOk(builder.resolveType("Widget")),
        args: [expectOk(builder.resolveType("int"))],
      })
    );

    const diagnostic = expectError(builder.copyStruct("Gadget", "Widget"));

    expect(diagnostic.code).to.equal("DEF1302");
    expect(diagnostic.message).to.equal(
      "Inherited method 'frob/1' from 'Widget' collides with a constructor or static method of 'Gadget'"
    );
  });

  it("rejects inherited fields that collide with a static field", () => {
    const builder = createWidgetBuilder();
    bindWidgetMembers(builder);
    expectOk(
      builder.addField("Gadget", "x", {
        alias: "LIMIT",
        isStatic: true,
        type: expectOk(builder.resolveType("int")),
      })
    );

    const diagnostic = expectError(builder.copyStruct("Gadget", "Widget"));

    expect(diagnostic.code).to.equal("DEF1401");
    expect(diagnostic.message).to.equal(
      "Inherited field 'x' from 'Widget' collides with a static field of 'Gadget'"
    );
  });

  it("reports unknown parents", () => {
    expect(expectError(boundBuilder().copyStruct("Widget", "Gizmo")).code).to.equal(
      "DEF1101"
    );
  });
});
