/**
 * Whitelist document - the JSON form of a definition.
 *
 * Every type is written as a struct name, optionally followed by `[]` per
 * array dimension.
 */

export type WhitelistStruct = {
  readonly name: string;
  /** Native class the struct is bound to */
  readonly class: string;
};

export type WhitelistConstructor = {
  readonly args: readonly string[];
  readonly genericArgs?: readonly string[];
};

export type WhitelistMethod = {
  readonly name: string;
  /** Native method name when it differs from `name` */
  readonly alias?: string;
  readonly static?: boolean;
  readonly returns: string;
  readonly args: readonly string[];
  readonly genericReturn?: string;
  readonly genericArgs?: readonly string[];
};

export type WhitelistField = {
  readonly name: string;
  readonly alias?: string;
  readonly static?: boolean;
  readonly type: string;
  readonly generic?: string;
};

export type WhitelistMembers = {
  readonly struct: string;
  readonly constructors: readonly WhitelistConstructor[];
  readonly methods: readonly WhitelistMethod[];
  readonly fields: readonly WhitelistField[];
};

export type WhitelistInheritance = {
  readonly struct: string;
  /** Earlier parents win when two define the same member */
  readonly parents: readonly string[];
};

export type WhitelistCast = {
  readonly from: string;
  readonly to: string;
  readonly explicit: boolean;
};

export type WhitelistTransform = WhitelistCast & {
  readonly owner: string;
  readonly adapter: string;
  readonly static: boolean;
};

export type Whitelist = {
  readonly structs: readonly WhitelistStruct[];
  readonly members: readonly WhitelistMembers[];
  readonly inheritance: readonly WhitelistInheritance[];
  readonly casts: readonly WhitelistCast[];
  readonly transforms: readonly WhitelistTransform[];
  /** Struct names enrolled for dynamic access */
  readonly runtimeClasses: readonly string[];
};
