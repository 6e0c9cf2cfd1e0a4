/**
 * Feed a validated whitelist through a DefinitionBuilder, one phase at a time.
 * The first failure stops the run.
 */

import type { Result } from "@sandscript/host";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import type { Type } from "../model.js";
import type { DefinitionBuilder } from "../builder.js";
import type {
  Whitelist,
  WhitelistField,
  WhitelistMembers,
  WhitelistMethod,
} from "./types.js";

const OK: Result<void, Diagnostic> = { ok: true, value: undefined };

const UNKNOWN_TYPE_CODES: ReadonlySet<string> = new Set([
  "DEF1101",
  "DEF1103",
  "DEF1104",
]);

/**
 * Resolve a type name, reporting it against the entry that used it.
 */
const resolveType = (
  builder: DefinitionBuilder,
  name: string,
  context: string
): Result<Type, Diagnostic> => {
  const resolved = builder.resolveType(name);
  if (resolved.ok) return resolved;
  if (!UNKNOWN_TYPE_CODES.has(resolved.error.code)) {
    return resolved;
  }
  return {
    ok: false,
    error: createDiagnostic(
      "DEF2105",
      `Unknown type '${name}' in ${context}`,
      resolved.error.message
    ),
  };
};

const resolveTypes = (
  builder: DefinitionBuilder,
  names: readonly string[],
  context: string
): Result<readonly Type[], Diagnostic> => {
  const types: Type[] = [];
  for (const name of names) {
    const resolved = resolveType(builder, name, context);
    if (!resolved.ok) return resolved;
    types.push(resolved.value);
  }
  return { ok: true, value: types };
};

const resolveOptional = (
  builder: DefinitionBuilder,
  name: string | undefined,
  context: string
): Result<Type | undefined, Diagnostic> =>
  name === undefined
    ? { ok: true, value: undefined }
    : resolveType(builder, name, context);

const resolveOptionalList = (
  builder: DefinitionBuilder,
  names: readonly string[] | undefined,
  context: string
): Result<readonly Type[] | undefined, Diagnostic> =>
  names === undefined
    ? { ok: true, value: undefined }
    : resolveTypes(builder, names, context);

const applyMethod = (
  builder: DefinitionBuilder,
  owner: string,
  method: WhitelistMethod
): Result<void, Diagnostic> => {
  const context = `method '${owner}.${method.name}'`;
  const returns = resolveType(builder, method.returns, context);
  if (!returns.ok) return returns;
  const args = resolveTypes(builder, method.args, context);
  if (!args.ok) return args;
  const genericReturn = resolveOptional(builder, method.genericReturn, context);
  if (!genericReturn.ok) return genericReturn;
  const genericArgs = resolveOptionalList(builder, method.genericArgs, context);
  if (!genericArgs.ok) return genericArgs;

  const added = builder.addMethod(owner, method.name, {
    alias: method.alias,
    isStatic: method.static,
    returns: returns.value,
    args: args.value,
    genericReturn: genericReturn.value,
    genericArgs: genericArgs.value,
  });
  return added.ok ? OK : added;
};

const applyField = (
  builder: DefinitionBuilder,
  owner: string,
  field: WhitelistField
): Result<void, Diagnostic> => {
  const context = `field '${owner}.${field.name}'`;
  const type = resolveType(builder, field.type, context);
  if (!type.ok) return type;
  const generic = resolveOptional(builder, field.generic, context);
  if (!generic.ok) return generic;

  const added = builder.addField(owner, field.name, {
    alias: field.alias,
    isStatic: field.static,
    type: type.value,
    generic: generic.value,
  });
  return added.ok ? OK : added;
};

const applyMembers = (
  builder: DefinitionBuilder,
  members: WhitelistMembers
): Result<void, Diagnostic> => {
  const owner = members.struct;

  for (const constructor of members.constructors) {
    const context = `constructor of '${owner}'`;
    const args = resolveTypes(builder, constructor.args, context);
    if (!args.ok) return args;
    const genericArgs = resolveOptionalList(
      builder,
      constructor.genericArgs,
      context
    );
    if (!genericArgs.ok) return genericArgs;

    const added = builder.addConstructor(owner, args.value, genericArgs.value);
    if (!added.ok) return added;
  }

  for (const method of members.methods) {
    const applied = applyMethod(builder, owner, method);
    if (!applied.ok) return applied;
  }

  for (const field of members.fields) {
    const applied = applyField(builder, owner, field);
    if (!applied.ok) return applied;
  }

  return OK;
};

/**
 * Run every section of `whitelist` through `builder`: structs, members,
 * inheritance, casts, transforms, then runtime classes.
 */
export const applyWhitelist = (
  builder: DefinitionBuilder,
  whitelist: Whitelist
): Result<void, Diagnostic> => {
  for (const struct of whitelist.structs) {
    const registered = builder.registerStruct(struct.name, struct.class);
    if (!registered.ok) return registered;
  }

  for (const members of whitelist.members) {
    const applied = applyMembers(builder, members);
    if (!applied.ok) return applied;
  }

  for (const entry of whitelist.inheritance) {
    const copied = builder.copyStruct(entry.struct, ...entry.parents);
    if (!copied.ok) return copied;
  }

  for (const cast of whitelist.casts) {
    const context = `cast from '${cast.from}' to '${cast.to}'`;
    const from = resolveType(builder, cast.from, context);
    if (!from.ok) return from;
    const to = resolveType(builder, cast.to, context);
    if (!to.ok) return to;

    const added = builder.addCast(from.value, to.value, cast.explicit);
    if (!added.ok) return added;
  }

  for (const transform of whitelist.transforms) {
    const context = `transform from '${transform.from}' to '${transform.to}'`;
    const from = resolveType(builder, transform.from, context);
    if (!from.ok) return from;
    const to = resolveType(builder, transform.to, context);
    if (!to.ok) return to;

    const added = builder.addTransform(
      from.value,
      to.value,
      transform.owner,
      transform.adapter,
      transform.static,
      transform.explicit
    );
    if (!added.ok) return added;
  }

  for (const structName of whitelist.runtimeClasses) {
    const added = builder.addRuntimeClass(structName);
    if (!added.ok) return added;
  }

  return OK;
};
