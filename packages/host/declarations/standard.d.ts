/**
 * Host standard library visible to scripts.
 *
 * Numeric aliases only make the file read as TypeScript: the host's primitive
 * classes are fixed, and every annotation names a host class directly.
 */

type byte = number;
type short = number;
type char = number;
type int = number;
type long = number;
type float = number;
type double = number;

declare class Object {
  equals(other: Object): boolean;
  hashCode(): int;
  toString(): String;
}

declare class Void {}

declare class Boolean {
  constructor(value: boolean);
  static readonly FALSE: Boolean;
  static readonly TRUE: Boolean;
  static compare(a: boolean, b: boolean): int;
  static parseBoolean(s: String): boolean;
  static valueOf(value: boolean): Boolean;
  booleanValue(): boolean;
  compareTo(other: Boolean): int;
}

declare abstract class Number {
  byteValue(): byte;
  shortValue(): short;
  intValue(): int;
  longValue(): long;
  floatValue(): float;
  doubleValue(): double;
}

declare class Byte extends Number {
  constructor(value: byte);
  static readonly MIN_VALUE: byte;
  static readonly MAX_VALUE: byte;
  static compare(a: byte, b: byte): int;
  static parseByte(s: String): byte;
  static valueOf(value: byte): Byte;
  compareTo(other: Byte): int;
}

declare class Short extends Number {
  constructor(value: short);
  static readonly MIN_VALUE: short;
  static readonly MAX_VALUE: short;
  static compare(a: short, b: short): int;
  static parseShort(s: String): short;
  static valueOf(value: short): Short;
  compareTo(other: Short): int;
}

declare class Character {
  constructor(value: char);
  static readonly MIN_VALUE: char;
  static readonly MAX_VALUE: char;
  static charCount(value: int): int;
  static compare(a: char, b: char): int;
  static digit(codePoint: int, radix: int): int;
  static forDigit(digit: int, radix: int): char;
  static getName(value: int): String;
  static getNumericValue(value: int): int;
  static isAlphabetic(value: int): boolean;
  static isDefined(value: int): boolean;
  static isDigit(value: int): boolean;
  static isIdeographic(value: int): boolean;
  static isLetter(value: int): boolean;
  static isLetterOrDigit(value: int): boolean;
  static isLowerCase(value: int): boolean;
  static isMirrored(value: int): boolean;
  static isSpaceChar(value: int): boolean;
  static isTitleCase(value: int): boolean;
  static isUpperCase(value: int): boolean;
  static isWhitespace(value: int): boolean;
  static valueOf(value: char): Character;
  charValue(): char;
  compareTo(other: Character): int;
}

declare class Integer extends Number {
  constructor(value: int);
  static readonly MIN_VALUE: int;
  static readonly MAX_VALUE: int;
  static compare(a: int, b: int): int;
  static min(a: int, b: int): int;
  static max(a: int, b: int): int;
  static parseInt(s: String): int;
  static signum(value: int): int;
  static toHexString(value: int): String;
  static valueOf(value: int): Integer;
  compareTo(other: Integer): int;
}

declare class Long extends Number {
  constructor(value: long);
  static readonly MIN_VALUE: long;
  static readonly MAX_VALUE: long;
  static compare(a: long, b: long): int;
  static min(a: long, b: long): long;
  static max(a: long, b: long): long;
  static parseLong(s: String): long;
  static signum(value: long): int;
  static toHexString(value: long): String;
  static valueOf(value: long): Long;
  compareTo(other: Long): int;
}

declare class Float extends Number {
  constructor(value: float);
  static readonly MIN_VALUE: float;
  static readonly MAX_VALUE: float;
  static compare(a: float, b: float): int;
  static min(a: float, b: float): float;
  static max(a: float, b: float): float;
  static parseFloat(s: String): float;
  static toHexString(value: float): String;
  static valueOf(value: float): Float;
  compareTo(other: Float): int;
}

declare class Double extends Number {
  constructor(value: double);
  static readonly MIN_VALUE: double;
  static readonly MAX_VALUE: double;
  static compare(a: double, b: double): int;
  static min(a: double, b: double): double;
  static max(a: double, b: double): double;
  static parseDouble(s: String): double;
  static toHexString(value: double): String;
  static valueOf(value: double): Double;
  compareTo(other: Double): int;
}

declare interface CharSequence {
  charAt(index: int): char;
  length(): int;
}

declare class String implements CharSequence {
  constructor();
  codePointAt(index: int): int;
  compareTo(other: String): int;
  concat(value: String): String;
  endsWith(value: String): boolean;
  indexOf(str: String): int;
  indexOf(str: String, fromIndex: int): int;
  isEmpty(): boolean;
  replace(target: CharSequence, replacement: CharSequence): String;
  startsWith(value: String): boolean;
  substring(beginIndex: int, endIndex: int): String;
  toCharArray(): char[];
  trim(): String;
}

declare abstract class Math {
  static readonly E: double;
  static readonly PI: double;
  static abs(value: double): double;
  static acos(value: double): double;
  static asin(value: double): double;
  static atan(value: double): double;
  static atan2(a: double, b: double): double;
  static cbrt(value: double): double;
  static ceil(value: double): double;
  static cos(value: double): double;
  static cosh(value: double): double;
  static exp(value: double): double;
  static expm1(value: double): double;
  static floor(value: double): double;
  static hypot(a: double, b: double): double;
  static log(value: double): double;
  static log10(value: double): double;
  static log1p(value: double): double;
  static max(a: double, b: double): double;
  static min(a: double, b: double): double;
  static pow(a: double, b: double): double;
  static random(): double;
  static rint(value: double): double;
  static round(value: double): long;
  static sin(value: double): double;
  static sinh(value: double): double;
  static sqrt(value: double): double;
  static tan(value: double): double;
  static tanh(value: double): double;
  static toDegrees(value: double): double;
  static toRadians(value: double): double;
}

declare abstract class Utility {
  static NumberToboolean(value: Number): boolean;
  static NumberTochar(value: Number): char;
  static NumberToBoolean(value: Number): Boolean;
  static NumberToByte(value: Number): Byte;
  static NumberToShort(value: Number): Short;
  static NumberToCharacter(value: Number): Character;
  static NumberToInteger(value: Number): Integer;
  static NumberToLong(value: Number): Long;
  static NumberToFloat(value: Number): Float;
  static NumberToDouble(value: Number): Double;
  static booleanTobyte(value: boolean): byte;
  static booleanToshort(value: boolean): short;
  static booleanTochar(value: boolean): char;
  static booleanToint(value: boolean): int;
  static booleanTolong(value: boolean): long;
  static booleanTofloat(value: boolean): float;
  static booleanTodouble(value: boolean): double;
  static booleanToInteger(value: boolean): Integer;
  static BooleanTobyte(value: Boolean): byte;
  static BooleanToshort(value: Boolean): short;
  static BooleanTochar(value: Boolean): char;
  static BooleanToint(value: Boolean): int;
  static BooleanTolong(value: Boolean): long;
  static BooleanTofloat(value: Boolean): float;
  static BooleanTodouble(value: Boolean): double;
  static BooleanToByte(value: Boolean): Byte;
  static BooleanToShort(value: Boolean): Short;
  static BooleanToCharacter(value: Boolean): Character;
  static BooleanToInteger(value: Boolean): Integer;
  static BooleanToLong(value: Boolean): Long;
  static BooleanToFloat(value: Boolean): Float;
  static BooleanToDouble(value: Boolean): Double;
  static byteToboolean(value: byte): boolean;
  static byteToShort(value: byte): Short;
  static byteToCharacter(value: byte): Character;
  static byteToInteger(value: byte): Integer;
  static byteToLong(value: byte): Long;
  static byteToFloat(value: byte): Float;
  static byteToDouble(value: byte): Double;
  static ByteToboolean(value: Byte): boolean;
  static ByteTochar(value: Byte): char;
  static shortToboolean(value: short): boolean;
  static shortToByte(value: short): Byte;
  static shortToCharacter(value: short): Character;
  static shortToInteger(value: short): Integer;
  static shortToLong(value: short): Long;
  static shortToFloat(value: short): Float;
  static shortToDouble(value: short): Double;
  static ShortToboolean(value: Short): boolean;
  static ShortTochar(value: Short): char;
  static charToboolean(value: char): boolean;
  static charToByte(value: char): Byte;
  static charToShort(value: char): Short;
  static charToInteger(value: char): Integer;
  static charToLong(value: char): Long;
  static charToFloat(value: char): Float;
  static charToDouble(value: char): Double;
  static charToString(value: char): String;
  static CharacterToboolean(value: Character): boolean;
  static CharacterTobyte(value: Character): byte;
  static CharacterToshort(value: Character): short;
  static CharacterToint(value: Character): int;
  static CharacterTolong(value: Character): long;
  static CharacterTofloat(value: Character): float;
  static CharacterTodouble(value: Character): double;
  static CharacterToBoolean(value: Character): Boolean;
  static CharacterToByte(value: Character): Byte;
  static CharacterToShort(value: Character): Short;
  static CharacterToInteger(value: Character): Integer;
  static CharacterToLong(value: Character): Long;
  static CharacterToFloat(value: Character): Float;
  static CharacterToDouble(value: Character): Double;
  static CharacterToString(value: Character): String;
  static intToboolean(value: int): boolean;
  static intToByte(value: int): Byte;
  static intToShort(value: int): Short;
  static intToCharacter(value: int): Character;
  static intToLong(value: int): Long;
  static intToFloat(value: int): Float;
  static intToDouble(value: int): Double;
  static IntegerToboolean(value: Integer): boolean;
  static IntegerTochar(value: Integer): char;
  static longToboolean(value: long): boolean;
  static longToByte(value: long): Byte;
  static longToShort(value: long): Short;
  static longToCharacter(value: long): Character;
  static longToInteger(value: long): Integer;
  static longToFloat(value: long): Float;
  static longToDouble(value: long): Double;
  static LongToboolean(value: Long): boolean;
  static LongTochar(value: Long): char;
  static floatToboolean(value: float): boolean;
  static floatToByte(value: float): Byte;
  static floatToShort(value: float): Short;
  static floatToCharacter(value: float): Character;
  static floatToInteger(value: float): Integer;
  static floatToLong(value: float): Long;
  static floatToDouble(value: float): Double;
  static FloatToboolean(value: Float): boolean;
  static FloatTochar(value: Float): char;
  static doubleToboolean(value: double): boolean;
  static doubleToByte(value: double): Byte;
  static doubleToShort(value: double): Short;
  static doubleToCharacter(value: double): Character;
  static doubleToInteger(value: double): Integer;
  static doubleToLong(value: double): Long;
  static doubleToFloat(value: double): Float;
  static DoubleToboolean(value: Double): boolean;
  static DoubleTochar(value: Double): char;
  static StringTochar(value: String): char;
  static StringToCharacter(value: String): Character;
}

declare abstract class Def {
  static DefTobyteImplicit(value: Object): byte;
  static DefToshortImplicit(value: Object): short;
  static DefTocharImplicit(value: Object): char;
  static DefTointImplicit(value: Object): int;
  static DefTolongImplicit(value: Object): long;
  static DefTofloatImplicit(value: Object): float;
  static DefTodoubleImplicit(value: Object): double;
  static DefToByteImplicit(value: Object): Byte;
  static DefToShortImplicit(value: Object): Short;
  static DefToCharacterImplicit(value: Object): Character;
  static DefToIntegerImplicit(value: Object): Integer;
  static DefToLongImplicit(value: Object): Long;
  static DefToFloatImplicit(value: Object): Float;
  static DefToDoubleImplicit(value: Object): Double;
  static DefTobyteExplicit(value: Object): byte;
  static DefToshortExplicit(value: Object): short;
  static DefTocharExplicit(value: Object): char;
  static DefTointExplicit(value: Object): int;
  static DefTolongExplicit(value: Object): long;
  static DefTofloatExplicit(value: Object): float;
  static DefTodoubleExplicit(value: Object): double;
  static DefToByteExplicit(value: Object): Byte;
  static DefToShortExplicit(value: Object): Short;
  static DefToCharacterExplicit(value: Object): Character;
  static DefToIntegerExplicit(value: Object): Integer;
  static DefToLongExplicit(value: Object): Long;
  static DefToFloatExplicit(value: Object): Float;
  static DefToDoubleExplicit(value: Object): Double;
}

declare interface Iterator {
  hasNext(): boolean;
  next(): Object;
  remove(): void;
}

declare interface Collection {
  add(element: Object): boolean;
  clear(): void;
  contains(element: Object): boolean;
  isEmpty(): boolean;
  iterator(): Iterator;
  remove(element: Object): boolean;
  size(): int;
}

declare interface List extends Collection {
  set(index: int, element: Object): Object;
  get(index: int): Object;
  remove(index: int): Object;
  size(): int;
}

declare class ArrayList implements List {
  constructor();
}

declare interface Set extends Collection {}

declare class HashSet implements Set {
  constructor();
}

declare interface Map {
  put(key: Object, value: Object): Object;
  get(key: Object): Object;
  remove(key: Object): Object;
  isEmpty(): boolean;
  size(): int;
  containsKey(key: Object): boolean;
  containsValue(value: Object): boolean;
  keySet(): Set;
  values(): Collection;
}

declare class HashMap implements Map {
  constructor();
}

declare abstract class Executable {}

declare class Exception {
  getMessage(): String;
}

declare class ArithmeticException extends Exception {
  constructor(message: String);
}

declare class IllegalArgumentException extends Exception {
  constructor(message: String);
}

declare class IllegalStateException extends Exception {
  constructor(message: String);
}

declare class NumberFormatException extends Exception {
  constructor(message: String);
}
