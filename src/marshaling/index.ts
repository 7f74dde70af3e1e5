/**
 * Primitive marshaling module.
 *
 * Converts values between the raw slots of a native call frame and boxed
 * values through an ordered chain of typed converters.
 *
 * @packageDocumentation
 */

export { EMPTY_SLOT, FrameIndexError, NativeFrame } from './frame.js';
export type { RawSlot } from './frame.js';

export {
  BoolConverter,
  FloatConverter,
  IntegerConverter,
  MalformedSlotError,
  ObjectConverter,
  StructConverter,
  VoidConverter,
} from './converters.js';
export type { ByteOrder, Converter } from './converters.js';

export { MarshalingChain, UnsupportedTypeError, createDefaultChain } from './chain.js';
export type { MarshalingOptions } from './chain.js';
