/**
 * Typed converters between raw frame slots and boxed values.
 *
 * Each converter handles one wire type (structs: every struct layout) and
 * knows how to read it out of a slot and write it back into one.
 *
 * @packageDocumentation
 */

import {
  BoxedTypeMismatchError,
  box,
  isStructTag,
  tagKey,
  type BoxedValue,
  type FloatTag,
  type IntegerTag,
  type TypeTag,
} from '../values/index.js';
import { EMPTY_SLOT, type RawSlot } from './frame.js';

/**
 * Byte order used to encode multi-byte primitives in a slot.
 */
export type ByteOrder = 'little' | 'big';

/**
 * Raised when a raw slot does not hold what its declared type requires.
 */
export class MalformedSlotError extends Error {
  /** Key of the declared type tag. */
  public readonly tag: string;
  /** What the slot should have held. */
  public readonly expected: string;
  /** What the slot held. */
  public readonly actual: string;

  /**
   * Creates a new MalformedSlotError.
   *
   * @param tag - The declared type tag.
   * @param expected - Description of the required slot contents.
   * @param actual - Description of the actual slot contents.
   */
  constructor(tag: TypeTag, expected: string, actual: string) {
    super(`Malformed ${tagKey(tag)} slot: expected ${expected}, got ${actual}`);
    this.name = 'MalformedSlotError';
    this.tag = tagKey(tag);
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A converter for one or more wire types.
 */
export interface Converter {
  /** Name used in diagnostics. */
  readonly name: string;
  /** Whether this converter handles the tag. */
  handles(tag: TypeTag): boolean;
  /** Reads a boxed value out of a raw slot. */
  decode(tag: TypeTag, slot: RawSlot): BoxedValue;
  /** Writes a boxed value into a new raw slot. */
  encode(tag: TypeTag, value: BoxedValue): RawSlot;
}

function describeSlot(slot: RawSlot): string {
  switch (slot.kind) {
    case 'bytes':
      return `${String(slot.bytes.byteLength)} byte(s)`;
    case 'reference':
      return 'an object reference';
    case 'empty':
      return 'an empty slot';
  }
}

function viewOf(tag: TypeTag, slot: RawSlot, width: number): DataView {
  if (slot.kind !== 'bytes' || slot.bytes.byteLength !== width) {
    throw new MalformedSlotError(tag, `${String(width)} byte(s)`, describeSlot(slot));
  }
  return new DataView(slot.bytes.buffer, slot.bytes.byteOffset, slot.bytes.byteLength);
}

function writeBytes(width: number, write: (view: DataView) => void): RawSlot {
  const bytes = new Uint8Array(width);
  write(new DataView(bytes.buffer));
  return { kind: 'bytes', bytes };
}

// ============================================================================
// Integers
// ============================================================================

interface IntegerCodec {
  readonly width: number;
  read(view: DataView, littleEndian: boolean): bigint;
  write(view: DataView, value: bigint, littleEndian: boolean): void;
}

const INTEGER_CODECS: Readonly<Record<IntegerTag, IntegerCodec>> = {
  int8: {
    width: 1,
    read: (view) => BigInt(view.getInt8(0)),
    write: (view, value) => {
      view.setInt8(0, Number(value));
    },
  },
  uint8: {
    width: 1,
    read: (view) => BigInt(view.getUint8(0)),
    write: (view, value) => {
      view.setUint8(0, Number(value));
    },
  },
  int16: {
    width: 2,
    read: (view, le) => BigInt(view.getInt16(0, le)),
    write: (view, value, le) => {
      view.setInt16(0, Number(value), le);
    },
  },
  uint16: {
    width: 2,
    read: (view, le) => BigInt(view.getUint16(0, le)),
    write: (view, value, le) => {
      view.setUint16(0, Number(value), le);
    },
  },
  int32: {
    width: 4,
    read: (view, le) => BigInt(view.getInt32(0, le)),
    write: (view, value, le) => {
      view.setInt32(0, Number(value), le);
    },
  },
  uint32: {
    width: 4,
    read: (view, le) => BigInt(view.getUint32(0, le)),
    write: (view, value, le) => {
      view.setUint32(0, Number(value), le);
    },
  },
  int64: {
    width: 8,
    read: (view, le) => view.getBigInt64(0, le),
    write: (view, value, le) => {
      view.setBigInt64(0, value, le);
    },
  },
  uint64: {
    width: 8,
    read: (view, le) => view.getBigUint64(0, le),
    write: (view, value, le) => {
      view.setBigUint64(0, value, le);
    },
  },
};

/**
 * Converter for a single integer width and signedness.
 */
export class IntegerConverter implements Converter {
  readonly name: string;
  private readonly codec: IntegerCodec;

  /**
   * @param tag - The integer type handled.
   * @param byteOrder - Byte order of multi-byte slots.
   */
  constructor(
    private readonly tag: IntegerTag,
    private readonly byteOrder: ByteOrder
  ) {
    this.name = `${tag}Converter`;
    this.codec = INTEGER_CODECS[tag];
  }

  handles(tag: TypeTag): boolean {
    return tag === this.tag;
  }

  decode(tag: TypeTag, slot: RawSlot): BoxedValue {
    const view = viewOf(tag, slot, this.codec.width);
    return box.integer(this.tag, this.codec.read(view, this.byteOrder === 'little'));
  }

  encode(tag: TypeTag, value: BoxedValue): RawSlot {
    if (value.kind !== 'integer' || value.tag !== this.tag) {
      throw new BoxedTypeMismatchError(tag, value);
    }
    return writeBytes(this.codec.width, (view) => {
      this.codec.write(view, value.value, this.byteOrder === 'little');
    });
  }
}

// ============================================================================
// Floats
// ============================================================================

/**
 * Converter for single or double precision floats.
 */
export class FloatConverter implements Converter {
  readonly name: string;
  private readonly width: number;

  /**
   * @param tag - The float type handled.
   * @param byteOrder - Byte order of the slot.
   */
  constructor(
    private readonly tag: FloatTag,
    private readonly byteOrder: ByteOrder
  ) {
    this.name = `${tag}Converter`;
    this.width = tag === 'float32' ? 4 : 8;
  }

  handles(tag: TypeTag): boolean {
    return tag === this.tag;
  }

  decode(tag: TypeTag, slot: RawSlot): BoxedValue {
    const view = viewOf(tag, slot, this.width);
    const le = this.byteOrder === 'little';
    return box.float(this.tag, this.tag === 'float32' ? view.getFloat32(0, le) : view.getFloat64(0, le));
  }

  encode(tag: TypeTag, value: BoxedValue): RawSlot {
    if (value.kind !== 'float' || value.tag !== this.tag) {
      throw new BoxedTypeMismatchError(tag, value);
    }
    const le = this.byteOrder === 'little';
    return writeBytes(this.width, (view) => {
      if (this.tag === 'float32') {
        view.setFloat32(0, value.value, le);
      } else {
        view.setFloat64(0, value.value, le);
      }
    });
  }
}

// ============================================================================
// Booleans, objects, void
// ============================================================================

/**
 * Converter for one-byte booleans. Any non-zero byte reads as `true`.
 */
export class BoolConverter implements Converter {
  readonly name = 'boolConverter';

  handles(tag: TypeTag): boolean {
    return tag === 'bool';
  }

  decode(tag: TypeTag, slot: RawSlot): BoxedValue {
    return box.bool(viewOf(tag, slot, 1).getUint8(0) !== 0);
  }

  encode(tag: TypeTag, value: BoxedValue): RawSlot {
    if (value.kind !== 'bool') {
      throw new BoxedTypeMismatchError(tag, value);
    }
    return writeBytes(1, (view) => {
      view.setUint8(0, value.value ? 1 : 0);
    });
  }
}

/**
 * Converter for object references. An empty slot reads as nil.
 */
export class ObjectConverter implements Converter {
  readonly name = 'objectConverter';

  handles(tag: TypeTag): boolean {
    return tag === 'object';
  }

  decode(tag: TypeTag, slot: RawSlot): BoxedValue {
    switch (slot.kind) {
      case 'reference':
        return box.object(slot.value);
      case 'empty':
        return box.object(null);
      case 'bytes':
        throw new MalformedSlotError(tag, 'an object reference', describeSlot(slot));
    }
  }

  encode(tag: TypeTag, value: BoxedValue): RawSlot {
    if (value.kind !== 'object') {
      throw new BoxedTypeMismatchError(tag, value);
    }
    return { kind: 'reference', value: value.value };
  }
}

/**
 * Converter for `void`: reads nothing and writes nothing.
 */
export class VoidConverter implements Converter {
  readonly name = 'voidConverter';

  handles(tag: TypeTag): boolean {
    return tag === 'void';
  }

  decode(): BoxedValue {
    return box.none();
  }

  encode(tag: TypeTag, value: BoxedValue): RawSlot {
    if (value.kind !== 'none') {
      throw new BoxedTypeMismatchError(tag, value);
    }
    return EMPTY_SLOT;
  }
}

// ============================================================================
// Structs
// ============================================================================

/**
 * Converter for structs of any layout. Bytes are copied verbatim; the
 * slot must be exactly the layout's size.
 */
export class StructConverter implements Converter {
  readonly name = 'structConverter';

  handles(tag: TypeTag): boolean {
    return isStructTag(tag);
  }

  decode(tag: TypeTag, slot: RawSlot): BoxedValue {
    if (!isStructTag(tag)) {
      throw new MalformedSlotError(tag, 'a struct type', tagKey(tag));
    }
    if (slot.kind !== 'bytes' || slot.bytes.byteLength !== tag.layout.size) {
      throw new MalformedSlotError(tag, `${String(tag.layout.size)} byte(s)`, describeSlot(slot));
    }
    return box.struct(tag.layout, slot.bytes);
  }

  encode(tag: TypeTag, value: BoxedValue): RawSlot {
    if (value.kind !== 'struct' || !isStructTag(tag) || value.bytes.byteLength !== tag.layout.size) {
      throw new BoxedTypeMismatchError(tag, value);
    }
    return { kind: 'bytes', bytes: Uint8Array.from(value.bytes) };
  }
}
