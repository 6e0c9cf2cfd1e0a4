import { describe, it } from "mocha";
import { expect } from "chai";
import type { DefinitionBuilder } from "./builder.js";
import { accessorProperty } from "./dynamic-dispatch.js";
import {
  bindWidgetMembers,
  createWidgetBuilder,
  expectError,
  expectOk,
  inheritWidgetStructs,
} from "./test-harness.js";

const inheritedBuilder = (): DefinitionBuilder => {
  const builder = createWidgetBuilder();
  bindWidgetMembers(builder);
  inheritWidgetStructs(builder);
  return builder;
};

describe("DynamicDispatchIndex", () => {
  it("derives getters from fields and bean-style methods", () => {
    const widget = expectOk(inheritedBuilder().addRuntimeClass("Widget"));

    expect([...widget.getters.keys()].sort()).to.deep.equal([
      "active",
      "id",
      "name",
      "x",
      "y",
    ]);
    expect(widget.getters.get("x")?.kind).to.equal("field");
    const y = widget.getters.get("y");
    expect(y?.kind === "method" ? y.method.name : undefined).to.equal("getY");
    const active = widget.getters.get("active");
    expect(active?.kind === "method" ? active.method.name : undefined).to.equal("isActive");
  });

  it("derives setters from writable fields and one-argument set methods", () => {
    const widget = expectOk(inheritedBuilder().addRuntimeClass("Widget"));

    expect([...widget.setters.keys()].sort()).to.deep.equal(["x", "y"]);
    expect(widget.setters.get("x")?.kind).to.equal("field");
    expect(widget.setters.get("y")?.kind).to.equal("method");
  });

  it("exposes every flattened instance method", () => {
    const gadget = expectOk(inheritedBuilder().addRuntimeClass("Gadget"));

    expect(gadget.methods.has("frob/2")).to.equal(true);
    expect(gadget.methods.has("getZ/0")).to.equal(true);
    expect(gadget.methods.has("create/1")).to.equal(false);
    expect(gadget.getters.has("z")).to.equal(true);
  });

  it("prefers a field over a method for the same property", () => {
    const builder = createWidgetBuilder();
    bindWidgetMembers(builder);
    expectOk(
      builder.addMethod("Widget", "getX", {
        alias: "getY",
        returns: expectOk(builder.resolveType("int")),
        args: [],
      })
    );

    const widget = expectOk(builder.addRuntimeClass("Widget"));
    expect(widget.getters.get("x")?.kind).to.equal("field");
  });

  it("enrols one struct per native class", () => {
    const builder = inheritedBuilder();
    expectOk(builder.addRuntimeClass("Object"));

    const diagnostic = expectError(builder.addRuntimeClass("def"));
    expect(diagnostic.code).to.equal("DEF1202");
    expect(diagnostic.message).to.equal(
      "Native class 'Object' of struct 'def' already has a runtime class"
    );
  });

  it("reports unknown structs", () => {
    expect(expectError(inheritedBuilder().addRuntimeClass("Gizmo")).code).to.equal("DEF1101");
  });

  it("is reachable through the built definition", () => {
    const builder = inheritedBuilder();
    expectOk(builder.addRuntimeClass("Widget"));
    const definition = expectOk(builder.build());
    const widget = definition.getStruct("Widget");
    const integer = definition.getStruct("Integer");
    if (!widget || !integer) throw new Error("missing struct");

    expect(definition.getRuntimeClass(widget.nativeClass)?.nativeClass).to.equal(
      widget.nativeClass
    );
    expect(definition.resolveDynamicGetter(widget.nativeClass, "name")?.kind).to.equal("method");
    expect(definition.resolveDynamicSetter(widget.nativeClass, "id")).to.equal(undefined);
    expect(definition.resolveDynamicMethod(widget.nativeClass, "frob/1")?.name).to.equal("frob");
    expect(definition.getRuntimeClass(integer.nativeClass)).to.equal(undefined);
  });
});

describe("accessorProperty", () => {
  it("strips the prefix and lowercases the next letter", () => {
    expect(accessorProperty("getFooBar", "get")).to.equal("fooBar");
    expect(accessorProperty("isActive", "is")).to.equal("active");
    expect(accessorProperty("setY", "set")).to.equal("y");
  });

  it("ignores names without an uppercase letter after the prefix", () => {
    expect(accessorProperty("getter", "get")).to.equal(undefined);
    expect(accessorProperty("get", "get")).to.equal(undefined);
    expect(accessorProperty("frob", "get")).to.equal(undefined);
    expect(accessorProperty("get_x", "get")).to.equal(undefined);
  });
});
