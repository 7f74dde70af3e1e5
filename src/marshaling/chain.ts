/**
 * Primitive marshaling chain.
 *
 * An ordered list of converters. A request for a type tag walks the list and
 * the first converter that handles the tag wins; when none does, the request
 * fails with an UnsupportedTypeError.
 *
 * @packageDocumentation
 */

import {
  assertBoxedMatchesTag,
  tagKey,
  type BoxedValue,
  type IntegerTag,
  type TypeTag,
} from '../values/index.js';
import {
  BoolConverter,
  FloatConverter,
  IntegerConverter,
  ObjectConverter,
  StructConverter,
  VoidConverter,
  type ByteOrder,
  type Converter,
} from './converters.js';
import { NativeFrame, type RawSlot } from './frame.js';

/**
 * Raised when no converter in the chain handles a type tag.
 * This is a configuration error and is never caught by the engine.
 */
export class UnsupportedTypeError extends Error {
  /** Key of the unsupported type tag. */
  public readonly tag: string;

  /**
   * Creates a new UnsupportedTypeError.
   *
   * @param tag - The type tag no converter handles.
   */
  constructor(tag: TypeTag) {
    super(`No converter handles type '${tagKey(tag)}'`);
    this.name = 'UnsupportedTypeError';
    this.tag = tagKey(tag);
  }
}

/**
 * Options for building the default chain.
 */
export interface MarshalingOptions {
  /**
   * Byte order of multi-byte primitive slots.
   * @defaultValue 'little'
   */
  readonly byteOrder?: ByteOrder;
}

/**
 * Ordered, first-match-wins list of converters.
 *
 * @example
 * ```typescript
 * const chain = createDefaultChain();
 * const slot = chain.encode('uint64', box.uint64(2n ** 64n - 1n));
 * chain.decode('uint64', slot); // boxed 18446744073709551615n
 * ```
 */
export class MarshalingChain {
  private readonly converters: readonly Converter[];

  /**
   * Creates a chain over converters, consulted in the given order.
   */
  constructor(converters: readonly Converter[]) {
    this.converters = Object.freeze([...converters]);
  }

  /**
   * Returns a new chain with a converter consulted before all existing ones.
   */
  withConverter(converter: Converter): MarshalingChain {
    return new MarshalingChain([converter, ...this.converters]);
  }

  /**
   * Finds the first converter that handles a tag.
   *
   * @throws UnsupportedTypeError if none does.
   */
  converterFor(tag: TypeTag): Converter {
    const converter = this.converters.find((candidate) => candidate.handles(tag));
    if (converter === undefined) {
      throw new UnsupportedTypeError(tag);
    }
    return converter;
  }

  /** Whether any converter handles the tag. */
  supports(tag: TypeTag): boolean {
    return this.converters.some((candidate) => candidate.handles(tag));
  }

  /**
   * Reads a boxed value of the given type out of a raw slot.
   */
  decode(tag: TypeTag, slot: RawSlot): BoxedValue {
    return this.converterFor(tag).decode(tag, slot);
  }

  /**
   * Writes a boxed value of the given type into a new raw slot.
   *
   * @throws BoxedTypeMismatchError if the value does not conform to the tag.
   */
  encode(tag: TypeTag, value: BoxedValue): RawSlot {
    const converter = this.converterFor(tag);
    assertBoxedMatchesTag(tag, value);
    return converter.encode(tag, value);
  }

  /**
   * Reads one argument of a frame.
   */
  readArgument(frame: NativeFrame, index: number, tag: TypeTag): BoxedValue {
    return this.decode(tag, frame.argument(index));
  }

  /**
   * Writes a frame's return slot.
   */
  writeReturn(frame: NativeFrame, tag: TypeTag, value: BoxedValue): void {
    frame.setReturnValue(this.encode(tag, value));
  }

  /**
   * Reads a frame's return slot.
   */
  readReturn(frame: NativeFrame, tag: TypeTag): BoxedValue {
    return this.decode(tag, frame.returnValue);
  }

  /**
   * Builds a frame whose argument slots hold the encoded values.
   *
   * @param types - Declared argument types.
   * @param values - One boxed value per declared type.
   */
  frameFor(types: readonly TypeTag[], values: readonly BoxedValue[]): NativeFrame {
    return new NativeFrame(
      values.map((value, index) => {
        const tag = types[index];
        if (tag === undefined) {
          throw new RangeError(
            `Value at index ${String(index)} has no declared type (${String(types.length)} declared)`
          );
        }
        return this.encode(tag, value);
      })
    );
  }
}

const INTEGER_TAGS: readonly IntegerTag[] = [
  'int8',
  'uint8',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int64',
  'uint64',
];

/**
 * Builds the chain covering every built-in wire type: objects first, then
 * integers by width, floats, booleans, structs and void.
 */
export function createDefaultChain(options: MarshalingOptions = {}): MarshalingChain {
  const byteOrder = options.byteOrder ?? 'little';
  return new MarshalingChain([
    new ObjectConverter(),
    ...INTEGER_TAGS.map((tag) => new IntegerConverter(tag, byteOrder)),
    new FloatConverter('float32', byteOrder),
    new FloatConverter('float64', byteOrder),
    new BoolConverter(),
    new StructConverter(),
    new VoidConverter(),
  ]);
}
