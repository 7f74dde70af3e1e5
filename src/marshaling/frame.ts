/**
 * Native call frame: the raw argument and return storage a proxy layer hands
 * to the engine for one intercepted call.
 *
 * @packageDocumentation
 */

/**
 * One raw storage slot.
 *
 * - `bytes`: encoded primitive or struct storage
 * - `reference`: an object reference, stored as-is
 * - `empty`: nothing written (void, or a return slot not yet set)
 */
export type RawSlot =
  | { readonly kind: 'bytes'; readonly bytes: Uint8Array }
  | { readonly kind: 'reference'; readonly value: unknown }
  | { readonly kind: 'empty' };

/**
 * The empty slot.
 */
export const EMPTY_SLOT: RawSlot = Object.freeze({ kind: 'empty' });

/**
 * Raised when a frame is asked for an argument position it does not have.
 */
export class FrameIndexError extends Error {
  /** The requested argument index. */
  public readonly index: number;
  /** Number of argument slots in the frame. */
  public readonly arity: number;

  /**
   * Creates a new FrameIndexError.
   *
   * @param index - The requested argument index.
   * @param arity - Number of argument slots in the frame.
   */
  constructor(index: number, arity: number) {
    super(`Argument index ${String(index)} is outside a frame of ${String(arity)} argument(s)`);
    this.name = 'FrameIndexError';
    this.index = index;
    this.arity = arity;
  }
}

/**
 * Raw storage for one intercepted call.
 *
 * @example
 * ```typescript
 * const frame = new NativeFrame([{ kind: 'reference', value: 'once' }]);
 * frame.argument(0); // { kind: 'reference', value: 'once' }
 * ```
 */
export class NativeFrame {
  private readonly slots: readonly RawSlot[];
  private returnSlot: RawSlot = EMPTY_SLOT;

  /**
   * Creates a frame over the given argument slots.
   *
   * @param argumentSlots - One slot per declared argument, in order.
   */
  constructor(argumentSlots: readonly RawSlot[]) {
    this.slots = Object.freeze([...argumentSlots]);
  }

  /** Number of argument slots. */
  get arity(): number {
    return this.slots.length;
  }

  /**
   * Returns the raw slot of one argument.
   *
   * @throws FrameIndexError if the index is out of range.
   */
  argument(index: number): RawSlot {
    const slot = this.slots[index];
    if (slot === undefined) {
      throw new FrameIndexError(index, this.slots.length);
    }
    return slot;
  }

  /** The raw return slot; `empty` until something is written. */
  get returnValue(): RawSlot {
    return this.returnSlot;
  }

  /** Writes the raw return slot. */
  setReturnValue(slot: RawSlot): void {
    this.returnSlot = slot;
  }
}
