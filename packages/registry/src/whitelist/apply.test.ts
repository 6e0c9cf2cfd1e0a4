import { describe, it } from "mocha";
import { expect } from "chai";
import { DefinitionBuilder } from "../builder.js";
import { methodKey } from "../model.js";
import type { Whitelist } from "./types.js";
import { applyWhitelist } from "./apply.js";
import { createWidgetBinder, expectError, expectOk } from "../test-harness.js";

const EMPTY: Whitelist = {
  structs: [],
  members: [],
  inheritance: [],
  casts: [],
  transforms: [],
  runtimeClasses: [],
};

const WIDGET_WHITELIST: Whitelist = {
  ...EMPTY,
  structs: [
    { name: "int", class: "int" },
    { name: "long", class: "long" },
    { name: "boolean", class: "boolean" },
    { name: "Object", class: "Object" },
    { name: "def", class: "Object" },
    { name: "String", class: "String" },
    { name: "Integer", class: "Integer" },
    { name: "Widget", class: "Widget" },
  ],
  members: [
    {
      struct: "Object",
      constructors: [],
      methods: [{ name: "hashCode", static: false, returns: "int", args: [] }],
      fields: [],
    },
    {
      struct: "Widget",
      constructors: [{ args: [] }, { args: ["int"] }],
      methods: [
        { name: "height", alias: "getY", static: false, returns: "int", args: [] },
        { name: "create", static: true, returns: "Widget", args: ["int"] },
      ],
      fields: [{ name: "x", static: false, type: "int" }],
    },
    {
      struct: "Integer",
      constructors: [],
      methods: [
        { name: "valueOf", static: true, returns: "Integer", args: ["int"] },
        { name: "intValue", static: false, returns: "int", args: [] },
      ],
      fields: [],
    },
  ],
  inheritance: [
    { struct: "Widget", parents: ["Object"] },
    { struct: "Integer", parents: ["Object"] },
  ],
  casts: [
    { from: "int", to: "long", explicit: false },
    { from: "long", to: "int", explicit: true },
  ],
  transforms: [
    { from: "int", to: "Integer", owner: "Integer", adapter: "valueOf", static: true, explicit: false },
    { from: "Integer", to: "int", owner: "Integer", adapter: "intValue", static: false, explicit: false },
  ],
  runtimeClasses: ["Widget"],
};

describe("applyWhitelist", () => {
  it("runs every section through the builder", () => {
    const builder = new DefinitionBuilder(createWidgetBinder());
    expectOk(applyWhitelist(builder, WIDGET_WHITELIST));
    expect(builder.currentPhase).to.equal("index");

    const definition = expectOk(builder.build());
    const widget = definition.getStruct("Widget");
    if (!widget) throw new Error("missing struct 'Widget'");

    expect(definition.resolveMethod(widget, methodKey("height", 0))?.native.name).to.equal(
      "getY"
    );
    expect(definition.resolveMethod(widget, methodKey("hashCode", 0))?.owner.name).to.equal(
      "Widget"
    );
    expect(definition.resolveStaticMethod(widget, methodKey("create", 1))?.isStatic).to.equal(
      true
    );
    expect(definition.resolveConstructor(widget, methodKey("new", 1))?.args.length).to.equal(1);
    expect(definition.coercions().length).to.equal(4);
    expect(definition.resolveDynamicGetter(widget.nativeClass, "x")?.kind).to.equal("field");
  });

  it("accepts an empty whitelist", () => {
    const builder = new DefinitionBuilder(createWidgetBinder());
    expectOk(applyWhitelist(builder, EMPTY));
    expect(builder.currentPhase).to.equal("declare");
  });

  it("reports unknown types against the entry that names them", () => {
    const builder = new DefinitionBuilder(createWidgetBinder());
    const diagnostic = expectError(
      applyWhitelist(builder, {
        ...WIDGET_WHITELIST,
        members: [
          {
            struct: "Widget",
            constructors: [],
            methods: [{ name: "getY", static: false, returns: "Gizmo", args: [] }],
            fields: [],
          },
        ],
      })
    );

    expect(diagnostic.code).to.equal("DEF2105");
    expect(diagnostic.message).to.equal("Unknown type 'Gizmo' in method 'Widget.getY'");
    expect(diagnostic.hint).to.equal("Unknown struct 'Gizmo'");
  });

  it("reports malformed type names in casts", () => {
    const builder = new DefinitionBuilder(createWidgetBinder());
    const diagnostic = expectError(
      applyWhitelist(builder, {
        ...WIDGET_WHITELIST,
        casts: [{ from: "int[", to: "long", explicit: false }],
      })
    );

    expect(diagnostic.code).to.equal("DEF2105");
    expect(diagnostic.message).to.equal("Unknown type 'int[' in cast from 'int[' to 'long'");
  });

  it("passes builder errors through unchanged", () => {
    const builder = new DefinitionBuilder(createWidgetBinder());
    const diagnostic = expectError(
      applyWhitelist(builder, {
        ...WIDGET_WHITELIST,
        structs: [...WIDGET_WHITELIST.structs, { name: "Widget", class: "Widget" }],
      })
    );

    expect(diagnostic.code).to.equal("DEF1201");
  });

  it("stops at the first failing entry", () => {
    const builder = new DefinitionBuilder(createWidgetBinder());
    const diagnostic = expectError(
      applyWhitelist(builder, {
        ...WIDGET_WHITELIST,
        casts: [
          { from: "int", to: "int", explicit: false },
          { from: "int", to: "Widget", explicit: false },
        ],
      })
    );

    expect(diagnostic.code).to.equal("DEF1603");
    expect(builder.currentPhase).to.equal("cast");
  });
});
