/**
 * Boxed value construction, inspection and equality.
 *
 * @packageDocumentation
 */

import { inspect, isDeepStrictEqual } from 'node:util';
import {
  BOXED,
  type BoxedBool,
  type BoxedFloat,
  type BoxedInteger,
  type BoxedNone,
  type BoxedObject,
  type BoxedStruct,
  type BoxedValue,
  type FloatTag,
  type IntegerTag,
  type StructLayout,
  type StructTag,
  type TypeTag,
} from './types.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when a JavaScript value cannot be boxed as the requested type:
 * wrong JavaScript type, out of range, or a struct of the wrong size.
 */
export class BoxingError extends Error {
  /** Key of the type tag that was requested. */
  public readonly tag: string;
  /** The value that could not be boxed. */
  public readonly value: unknown;

  /**
   * Creates a new BoxingError.
   *
   * @param tag - The requested type tag.
   * @param value - The offending value.
   * @param reason - Why the value was rejected.
   */
  constructor(tag: TypeTag, value: unknown, reason: string) {
    super(`Cannot box ${describeValue(value)} as ${tagKey(tag)}: ${reason}`);
    this.name = 'BoxingError';
    this.tag = tagKey(tag);
    this.value = value;
  }
}

/**
 * Raised when a boxed value is used where a different type tag is declared.
 * This is a programming error in the caller, never a test failure.
 */
export class BoxedTypeMismatchError extends Error {
  /** Key of the declared type tag. */
  public readonly expected: string;
  /** Description of the boxed value's actual type. */
  public readonly actual: string;

  /**
   * Creates a new BoxedTypeMismatchError.
   *
   * @param expected - The declared type tag.
   * @param actual - The boxed value that does not conform.
   */
  constructor(expected: TypeTag, actual: BoxedValue) {
    super(`Expected a boxed ${tagKey(expected)} but got a boxed ${boxedTypeName(actual)}`);
    this.name = 'BoxedTypeMismatchError';
    this.expected = tagKey(expected);
    this.actual = boxedTypeName(actual);
  }
}

// ============================================================================
// Tags
// ============================================================================

/**
 * Inclusive value range of each integer tag.
 */
export const INTEGER_RANGES: Readonly<Record<IntegerTag, readonly [bigint, bigint]>> = {
  int8: [-(2n ** 7n), 2n ** 7n - 1n],
  uint8: [0n, 2n ** 8n - 1n],
  int16: [-(2n ** 15n), 2n ** 15n - 1n],
  uint16: [0n, 2n ** 16n - 1n],
  int32: [-(2n ** 31n), 2n ** 31n - 1n],
  uint32: [0n, 2n ** 32n - 1n],
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint64: [0n, 2n ** 64n - 1n],
};

const INTEGER_TAGS: ReadonlySet<string> = new Set(Object.keys(INTEGER_RANGES));

/** Narrows a tag to an integer tag. */
export function isIntegerTag(tag: TypeTag): tag is IntegerTag {
  return typeof tag === 'string' && INTEGER_TAGS.has(tag);
}

/** Narrows a tag to a float tag. */
export function isFloatTag(tag: TypeTag): tag is FloatTag {
  return tag === 'float32' || tag === 'float64';
}

/** Narrows a tag to a struct tag. */
export function isStructTag(tag: TypeTag): tag is StructTag {
  return typeof tag === 'object';
}

/**
 * Creates a struct type tag for a layout.
 *
 * @example
 * ```typescript
 * const point = structOf({ name: 'Point', size: 8 });
 * ```
 */
export function structOf(layout: StructLayout): StructTag {
  return { kind: 'struct', layout };
}

/**
 * Canonical string key of a type tag. Two tags are the same type exactly
 * when their keys are equal.
 */
export function tagKey(tag: TypeTag): string {
  if (isStructTag(tag)) {
    return `struct ${tag.layout.name}[${String(tag.layout.size)}]`;
  }
  return tag;
}

/** Whether two tags denote the same wire type. */
export function tagsEqual(a: TypeTag, b: TypeTag): boolean {
  return tagKey(a) === tagKey(b);
}

function layoutsEqual(a: StructLayout, b: StructLayout): boolean {
  return a.name === b.name && a.size === b.size;
}

// ============================================================================
// Construction
// ============================================================================

function freeze<T extends BoxedValue>(value: T): T {
  Object.freeze(value);
  return value;
}

function integer(tag: IntegerTag, value: number | bigint): BoxedInteger {
  let big: bigint;
  if (typeof value === 'bigint') {
    big = value;
  } else if (Number.isSafeInteger(value)) {
    big = BigInt(value);
  } else {
    throw new BoxingError(tag, value, 'not a safe integer; pass a bigint');
  }
  const [min, max] = INTEGER_RANGES[tag];
  if (big < min || big > max) {
    throw new BoxingError(tag, value, `outside ${String(min)}..${String(max)}`);
  }
  return freeze<BoxedInteger>({ [BOXED]: true, kind: 'integer', tag, value: big });
}

function float(tag: FloatTag, value: number): BoxedFloat {
  return freeze<BoxedFloat>({
    [BOXED]: true,
    kind: 'float',
    tag,
    value: tag === 'float32' ? Math.fround(value) : value,
  });
}

function struct(layout: StructLayout, bytes: Uint8Array): BoxedStruct {
  if (bytes.byteLength !== layout.size) {
    throw new BoxingError(
      structOf(layout),
      bytes,
      `expected ${String(layout.size)} bytes, got ${String(bytes.byteLength)}`
    );
  }
  const stored = Uint8Array.from(bytes);
  return freeze<BoxedStruct>({
    [BOXED]: true,
    kind: 'struct',
    layout,
    get bytes(): Uint8Array {
      return Uint8Array.from(stored);
    },
  });
}

const NONE = freeze<BoxedNone>({ [BOXED]: true, kind: 'none' });

/**
 * Boxed value constructors.
 *
 * @example
 * ```typescript
 * box.int32(2);
 * box.uint64(2n ** 64n - 1n);
 * box.object('first');
 * ```
 */
export const box = {
  integer,
  float,
  struct,
  int8: (value: number | bigint): BoxedInteger => integer('int8', value),
  uint8: (value: number | bigint): BoxedInteger => integer('uint8', value),
  int16: (value: number | bigint): BoxedInteger => integer('int16', value),
  uint16: (value: number | bigint): BoxedInteger => integer('uint16', value),
  int32: (value: number | bigint): BoxedInteger => integer('int32', value),
  uint32: (value: number | bigint): BoxedInteger => integer('uint32', value),
  int64: (value: number | bigint): BoxedInteger => integer('int64', value),
  uint64: (value: number | bigint): BoxedInteger => integer('uint64', value),
  float32: (value: number): BoxedFloat => float('float32', value),
  float64: (value: number): BoxedFloat => float('float64', value),
  bool: (value: boolean): BoxedBool => freeze<BoxedBool>({ [BOXED]: true, kind: 'bool', value }),
  object: (value: unknown): BoxedObject =>
    freeze<BoxedObject>({ [BOXED]: true, kind: 'object', value: value === undefined ? null : value }),
  none: (): BoxedNone => NONE,
};

/**
 * Narrows an arbitrary value to a boxed value.
 */
export function isBoxed(value: unknown): value is BoxedValue {
  return typeof value === 'object' && value !== null && BOXED in value;
}

/**
 * Whether a boxed value conforms to a declared type tag.
 */
export function boxedMatchesTag(tag: TypeTag, value: BoxedValue): boolean {
  switch (value.kind) {
    case 'integer':
    case 'float':
      return value.tag === tag;
    case 'bool':
      return tag === 'bool';
    case 'object':
      return tag === 'object';
    case 'none':
      return tag === 'void';
    case 'struct':
      return isStructTag(tag) && layoutsEqual(tag.layout, value.layout);
  }
}

/**
 * Throws a BoxedTypeMismatchError unless the boxed value conforms to the tag.
 */
export function assertBoxedMatchesTag(tag: TypeTag, value: BoxedValue): void {
  if (!boxedMatchesTag(tag, value)) {
    throw new BoxedTypeMismatchError(tag, value);
  }
}

/**
 * Boxes a JavaScript value as the given type.
 *
 * Already-boxed values are checked against the tag and returned unchanged.
 * Integers accept `number` (safe integers only) or `bigint`; structs accept a
 * `Uint8Array` of exactly the layout's size; `void` accepts only `undefined`.
 *
 * @throws BoxingError if the value cannot represent the type.
 * @throws BoxedTypeMismatchError if a boxed value of another type is given.
 */
export function boxAs(tag: TypeTag, value: unknown): BoxedValue {
  if (isBoxed(value)) {
    assertBoxedMatchesTag(tag, value);
    return value;
  }

  if (isStructTag(tag)) {
    if (!(value instanceof Uint8Array)) {
      throw new BoxingError(tag, value, 'expected a Uint8Array');
    }
    return struct(tag.layout, value);
  }

  if (isIntegerTag(tag)) {
    if (typeof value !== 'number' && typeof value !== 'bigint') {
      throw new BoxingError(tag, value, 'expected a number or bigint');
    }
    return integer(tag, value);
  }

  if (isFloatTag(tag)) {
    if (typeof value !== 'number') {
      throw new BoxingError(tag, value, 'expected a number');
    }
    return float(tag, value);
  }

  switch (tag) {
    case 'bool':
      if (typeof value !== 'boolean') {
        throw new BoxingError(tag, value, 'expected a boolean');
      }
      return box.bool(value);
    case 'void':
      if (value !== undefined) {
        throw new BoxingError(tag, value, 'void carries no value');
      }
      return NONE;
    case 'object':
      return box.object(value);
  }
}

/**
 * The zero value of a type: `null` for objects, zero for numbers, `false`,
 * a zero-filled struct, and no value for `void`.
 */
export function zeroValue(tag: TypeTag): BoxedValue {
  if (isStructTag(tag)) {
    return struct(tag.layout, new Uint8Array(tag.layout.size));
  }
  if (isIntegerTag(tag)) {
    return integer(tag, 0n);
  }
  if (isFloatTag(tag)) {
    return float(tag, 0);
  }
  switch (tag) {
    case 'bool':
      return box.bool(false);
    case 'void':
      return NONE;
    case 'object':
      return box.object(null);
  }
}

/**
 * Returns the JavaScript value carried by a boxed value: the reference for
 * objects, a bigint for integers, a number for floats, a copy of the bytes for
 * structs and `undefined` for no value.
 */
export function unbox(value: BoxedValue): unknown {
  switch (value.kind) {
    case 'none':
      return undefined;
    case 'struct':
      return Uint8Array.from(value.bytes);
    default:
      return value.value;
  }
}

// ============================================================================
// Equality
// ============================================================================

function hasEqualsMethod(value: unknown): value is { equals(other: unknown): unknown } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

/**
 * Object reference equality: identity, then the expected value's own
 * `equals(other)` when it has one, then deep strict equality.
 */
export function objectsEqual(expected: unknown, actual: unknown): boolean {
  if (Object.is(expected, actual)) {
    return true;
  }
  if (hasEqualsMethod(expected)) {
    return expected.equals(actual) === true;
  }
  return isDeepStrictEqual(expected, actual);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) {
    return false;
  }
  return a.every((byte, i) => byte === b[i]);
}

/**
 * Value equality between two boxed values. The first argument is the
 * expected value and decides how object references are compared.
 */
export function boxedEquals(expected: BoxedValue, actual: BoxedValue): boolean {
  switch (expected.kind) {
    case 'object':
      return actual.kind === 'object' && objectsEqual(expected.value, actual.value);
    case 'integer':
      return actual.kind === 'integer' && expected.tag === actual.tag && expected.value === actual.value;
    case 'float':
      return (
        actual.kind === 'float' &&
        expected.tag === actual.tag &&
        (expected.value === actual.value ||
          (Number.isNaN(expected.value) && Number.isNaN(actual.value)))
      );
    case 'bool':
      return actual.kind === 'bool' && expected.value === actual.value;
    case 'struct':
      return (
        actual.kind === 'struct' &&
        layoutsEqual(expected.layout, actual.layout) &&
        bytesEqual(expected.bytes, actual.bytes)
      );
    case 'none':
      return actual.kind === 'none';
  }
}

// ============================================================================
// Description
// ============================================================================

function describeValue(value: unknown): string {
  return inspect(value, { depth: 2, breakLength: Infinity });
}

function boxedTypeName(value: BoxedValue): string {
  switch (value.kind) {
    case 'integer':
    case 'float':
      return value.tag;
    case 'bool':
      return 'bool';
    case 'object':
      return 'object';
    case 'none':
      return 'void';
    case 'struct':
      return tagKey(structOf(value.layout));
  }
}

/**
 * Human-readable description of a type tag.
 */
export function describeTag(tag: TypeTag): string {
  return tagKey(tag);
}

/**
 * Human-readable description of a boxed value, used in matcher and failure
 * descriptions.
 *
 * @example
 * ```typescript
 * describeBoxed(box.object('first')); // "'first'"
 * describeBoxed(box.uint64(7));       // "7"
 * ```
 */
export function describeBoxed(value: BoxedValue): string {
  switch (value.kind) {
    case 'object':
      return describeValue(value.value);
    case 'integer':
      return value.value.toString();
    case 'float':
    case 'bool':
      return String(value.value);
    case 'none':
      return 'void';
    case 'struct': {
      const hex = Array.from(value.bytes, (byte) => byte.toString(16).padStart(2, '0')).join(' ');
      return `<${value.layout.name} ${hex}>`;
    }
  }
}
