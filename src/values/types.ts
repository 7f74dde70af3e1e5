/**
 * Type tags and boxed value types.
 *
 * A type tag describes the native wire type of one argument or return slot.
 * A boxed value is the uniform representation every engine component works
 * with once a value has crossed the invocation boundary.
 *
 * @packageDocumentation
 */

/**
 * Integer wire types, by width and signedness.
 */
export type IntegerTag =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64';

/**
 * Floating point wire types.
 */
export type FloatTag = 'float32' | 'float64';

/**
 * Every non-struct wire type.
 */
export type PrimitiveTag = IntegerTag | FloatTag | 'bool' | 'object' | 'void';

/**
 * A single field of a struct layout. Informational: struct bytes are copied
 * verbatim and never reinterpreted field by field.
 */
export interface StructField {
  /** Field name. */
  readonly name: string;
  /** Byte offset of the field from the start of the struct. */
  readonly offset: number;
  /** Wire type of the field. */
  readonly type: IntegerTag | FloatTag | 'bool';
}

/**
 * Byte layout descriptor for a struct type.
 */
export interface StructLayout {
  /** Struct name, part of the type's identity. */
  readonly name: string;
  /** Exact size in bytes. */
  readonly size: number;
  /** Optional field descriptions. */
  readonly fields?: readonly StructField[];
}

/**
 * Wire type of a struct with a known layout.
 */
export interface StructTag {
  readonly kind: 'struct';
  readonly layout: StructLayout;
}

/**
 * Wire type of one argument or return slot.
 */
export type TypeTag = PrimitiveTag | StructTag;

/**
 * Brand carried by every boxed value.
 */
export const BOXED: unique symbol = Symbol('understudy.boxed');

interface BoxedBase {
  readonly [BOXED]: true;
}

/** A reference to an object (or any non-primitive JavaScript value). `null` is nil. */
export interface BoxedObject extends BoxedBase {
  readonly kind: 'object';
  readonly value: unknown;
}

/** An integer of a given width, held as a bigint for every width. */
export interface BoxedInteger extends BoxedBase {
  readonly kind: 'integer';
  readonly tag: IntegerTag;
  readonly value: bigint;
}

/** A floating point number; float32 values are already single-precision. */
export interface BoxedFloat extends BoxedBase {
  readonly kind: 'float';
  readonly tag: FloatTag;
  readonly value: number;
}

/** A boolean. */
export interface BoxedBool extends BoxedBase {
  readonly kind: 'bool';
  readonly value: boolean;
}

/** Raw struct bytes together with their layout. */
export interface BoxedStruct extends BoxedBase {
  readonly kind: 'struct';
  readonly layout: StructLayout;
  /** A fresh copy of the bytes on every read. */
  readonly bytes: Uint8Array;
}

/** The absence of a value (void returns). */
export interface BoxedNone extends BoxedBase {
  readonly kind: 'none';
}

/**
 * Tagged union over every value the engine can carry.
 */
export type BoxedValue =
  | BoxedObject
  | BoxedInteger
  | BoxedFloat
  | BoxedBool
  | BoxedStruct
  | BoxedNone;
