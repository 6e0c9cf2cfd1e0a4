/**
 * Sort - the canonical value category of a Type.
 */

export type SortName =
  | "void"
  | "bool"
  | "byte"
  | "short"
  | "char"
  | "int"
  | "long"
  | "float"
  | "double"
  | "voidObj"
  | "boolObj"
  | "byteObj"
  | "shortObj"
  | "charObj"
  | "intObj"
  | "longObj"
  | "floatObj"
  | "doubleObj"
  | "number"
  | "string"
  | "object"
  | "def"
  | "array";

export type Sort = {
  readonly name: SortName;
  /** Native class a struct must be bound to for this sort; none for object, def and array */
  readonly className?: string;
  /** Storage slots a value occupies */
  readonly size: 0 | 1 | 2;
  readonly primitive: boolean;
  readonly bool: boolean;
  readonly numeric: boolean;
  /** Values of this sort may be folded at compile time */
  readonly constant: boolean;
};

const sort = (
  name: SortName,
  className: string | undefined,
  size: 0 | 1 | 2,
  primitive: boolean,
  bool: boolean,
  numeric: boolean,
  constant: boolean
): Sort =>
  Object.freeze({ name, className, size, primitive, bool, numeric, constant });

export const SORTS = {
  void: sort("void", "void", 0, true, false, false, false),
  bool: sort("bool", "boolean", 1, true, true, false, true),
  byte: sort("byte", "byte", 1, true, false, true, true),
  short: sort("short", "short", 1, true, false, true, true),
  char: sort("char", "char", 1, true, false, true, true),
  int: sort("int", "int", 1, true, false, true, true),
  long: sort("long", "long", 2, true, false, true, true),
  float: sort("float", "float", 1, true, false, true, true),
  double: sort("double", "double", 2, true, false, true, true),

  voidObj: sort("voidObj", "Void", 1, false, false, false, false),
  boolObj: sort("boolObj", "Boolean", 1, false, true, false, false),
  byteObj: sort("byteObj", "Byte", 1, false, false, true, false),
  shortObj: sort("shortObj", "Short", 1, false, false, true, false),
  charObj: sort("charObj", "Character", 1, false, false, true, false),
  intObj: sort("intObj", "Integer", 1, false, false, true, false),
  longObj: sort("longObj", "Long", 1, false, false, true, false),
  floatObj: sort("floatObj", "Float", 1, false, false, true, false),
  doubleObj: sort("doubleObj", "Double", 1, false, false, true, false),

  number: sort("number", "Number", 1, false, false, false, false),
  string: sort("string", "String", 1, false, false, false, true),

  object: sort("object", undefined, 1, false, false, false, false),
  def: sort("def", undefined, 1, false, false, false, false),
  array: sort("array", undefined, 1, false, false, false, false),
} as const satisfies Readonly<Record<SortName, Sort>>;

const SORTS_BY_CLASS: ReadonlyMap<string, Sort> = new Map(
  Object.values(SORTS).flatMap((s): [string, Sort][] =>
    s.className === undefined ? [] : [[s.className, s]]
  )
);

/**
 * The sort whose native class is named `className`, if any.
 */
export const sortForClassName = (className: string): Sort | undefined =>
  SORTS_BY_CLASS.get(className);
