/**
 * Boxed values module.
 *
 * Provides the type tags that describe native wire types and the uniform
 * boxed representation every other module works with.
 *
 * @packageDocumentation
 */

export { BOXED } from './types.js';
export type {
  BoxedBool,
  BoxedFloat,
  BoxedInteger,
  BoxedNone,
  BoxedObject,
  BoxedStruct,
  BoxedValue,
  FloatTag,
  IntegerTag,
  PrimitiveTag,
  StructField,
  StructLayout,
  StructTag,
  TypeTag,
} from './types.js';

export {
  BoxingError,
  BoxedTypeMismatchError,
  INTEGER_RANGES,
  assertBoxedMatchesTag,
  box,
  boxAs,
  boxedEquals,
  boxedMatchesTag,
  describeBoxed,
  describeTag,
  isBoxed,
  isFloatTag,
  isIntegerTag,
  isStructTag,
  objectsEqual,
  structOf,
  tagKey,
  tagsEqual,
  unbox,
  zeroValue,
} from './boxed.js';
