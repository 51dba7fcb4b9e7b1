/**
 * static-vector — raw slot storage
 *
 * Four backings, chosen by the ElementType:
 *
 *   NumericSlotStorage   typed array over an ArrayBuffer (or a caller region)
 *   BigIntSlotStorage    BigInt64Array / BigUint64Array, same placement rules
 *   ArraySlotStorage     plain array pre-filled with a default value
 *   ManagedSlotStorage   plain array whose free slots hold VACANT
 *
 * The first three are prefilled: a slot past length still holds a value, but
 * StaticVector never treats it as present. ManagedSlotStorage is the
 * uninitialized block; release() returns a slot to VACANT and read() refuses
 * to hand one out.
 */

import {
  SCALAR_BYTE_WIDTHS,
  VACANT,
  computeBlockBytes,
  type BigIntKind,
  type NumberKind,
  type ScalarKind,
} from './constants';
import { SlotStateError, StorageLayoutError } from './errors';
import { storageLog } from './log';
import type {
  BigIntArray,
  NumericArray,
  SlotStorage,
  StoragePlacement,
} from './types';

// ─── Typed-array factories ────────────────────────────────────────────────────

type ArrayFactory<A> = (buffer: ArrayBufferLike, byteOffset: number, length: number) => A;

const NUMERIC_ARRAYS: Readonly<Record<NumberKind, ArrayFactory<NumericArray>>> = {
  i8:  (b, o, n) => new Int8Array(b, o, n),
  u8:  (b, o, n) => new Uint8Array(b, o, n),
  u8c: (b, o, n) => new Uint8ClampedArray(b, o, n),
  i16: (b, o, n) => new Int16Array(b, o, n),
  u16: (b, o, n) => new Uint16Array(b, o, n),
  i32: (b, o, n) => new Int32Array(b, o, n),
  u32: (b, o, n) => new Uint32Array(b, o, n),
  f32: (b, o, n) => new Float32Array(b, o, n),
  f64: (b, o, n) => new Float64Array(b, o, n),
};

const BIGINT_ARRAYS: Readonly<Record<BigIntKind, ArrayFactory<BigIntArray>>> = {
  i64: (b, o, n) => new BigInt64Array(b, o, n),
  u64: (b, o, n) => new BigUint64Array(b, o, n),
};

// ─── Placement ────────────────────────────────────────────────────────────────

interface ResolvedBlock {
  readonly buffer:     ArrayBufferLike;
  readonly byteOffset: number;
}

/**
 * Resolve where a scalar block of `capacity` slots goes.
 *
 * Without a placement buffer a fresh ArrayBuffer is allocated. With one, the
 * block must start on a slot-width boundary and end inside the buffer;
 * otherwise StorageLayoutError is thrown before any view is created.
 */
export function resolveBlock(
  kind:      ScalarKind,
  capacity:  number,
  placement: StoragePlacement = {},
): ResolvedBlock {
  const bytes = computeBlockBytes(kind, capacity);

  if (placement.buffer === undefined) {
    if (placement.byteOffset !== undefined && placement.byteOffset !== 0) {
      throw new StorageLayoutError(
        `byteOffset ${placement.byteOffset} given without a buffer to place the ${kind} block in.`,
      );
    }
    storageLog('allocate %s block: %d slots, %d bytes', kind, capacity, bytes);
    return { buffer: new ArrayBuffer(bytes), byteOffset: 0 };
  }

  const width      = SCALAR_BYTE_WIDTHS[kind];
  const byteOffset = placement.byteOffset ?? 0;

  if (!Number.isInteger(byteOffset) || byteOffset < 0) {
    throw new StorageLayoutError(`byteOffset must be a non-negative integer, got ${byteOffset}.`);
  }
  if (byteOffset % width !== 0) {
    throw new StorageLayoutError(
      `byteOffset ${byteOffset} is not aligned to the ${width}-byte slots of a ${kind} block.`,
    );
  }
  if (byteOffset + bytes > placement.buffer.byteLength) {
    throw new StorageLayoutError(
      `A ${kind} block of ${capacity} slots needs bytes [${byteOffset}, ${byteOffset + bytes}) ` +
      `but the buffer is only ${placement.buffer.byteLength} bytes long.`,
    );
  }

  storageLog('place %s block: %d slots at byte %d of %d', kind, capacity, byteOffset, placement.buffer.byteLength);
  return { buffer: placement.buffer, byteOffset };
}

/** Managed and plain blocks always own their slots. */
function rejectPlacement(typeName: string, placement?: StoragePlacement): void {
  if (placement?.buffer !== undefined) {
    throw new StorageLayoutError(
      `Element type '${typeName}' is not scalar and cannot be placed in an external buffer.`,
    );
  }
}

// ─── NumericSlotStorage ───────────────────────────────────────────────────────

export class NumericSlotStorage implements SlotStorage<number> {
  readonly prefilled = true;
  readonly kind:      NumberKind;
  readonly capacity:  number;
  private readonly _slots: NumericArray;

  constructor(kind: NumberKind, capacity: number, placement?: StoragePlacement) {
    const block   = resolveBlock(kind, capacity, placement);
    this.kind     = kind;
    this.capacity = capacity;
    this._slots   = NUMERIC_ARRAYS[kind](block.buffer, block.byteOffset, capacity);
  }

  /** The ArrayBuffer (or SharedArrayBuffer) the slots live in. */
  get buffer(): ArrayBufferLike {
    return this._slots.buffer;
  }

  get byteOffset(): number {
    return this._slots.byteOffset;
  }

  read(index: number): number {
    return this._slots[index];
  }

  write(index: number, value: number): void {
    this._slots[index] = value;
  }

  release(): void {
    // Typed-array slots are never vacant.
  }

  copyWithin(target: number, start: number, end: number): void {
    this._slots.copyWithin(target, start, end);
  }

  view(start: number, end: number): NumericArray {
    return this._slots.subarray(start, end);
  }
}

// ─── BigIntSlotStorage ────────────────────────────────────────────────────────

export class BigIntSlotStorage implements SlotStorage<bigint> {
  readonly prefilled = true;
  readonly kind:      BigIntKind;
  readonly capacity:  number;
  private readonly _slots: BigIntArray;

  constructor(kind: BigIntKind, capacity: number, placement?: StoragePlacement) {
    const block   = resolveBlock(kind, capacity, placement);
    this.kind     = kind;
    this.capacity = capacity;
    this._slots   = BIGINT_ARRAYS[kind](block.buffer, block.byteOffset, capacity);
  }

  get buffer(): ArrayBufferLike {
    return this._slots.buffer;
  }

  get byteOffset(): number {
    return this._slots.byteOffset;
  }

  read(index: number): bigint {
    return this._slots[index];
  }

  write(index: number, value: bigint): void {
    this._slots[index] = value;
  }

  release(): void {
    // Typed-array slots are never vacant.
  }

  copyWithin(target: number, start: number, end: number): void {
    this._slots.copyWithin(target, start, end);
  }

  view(start: number, end: number): BigIntArray {
    return this._slots.subarray(start, end);
  }
}

// ─── ArraySlotStorage ─────────────────────────────────────────────────────────

/** Trivial values kept in a plain array pre-filled with the type's default. */
export class ArraySlotStorage<T> implements SlotStorage<T> {
  readonly prefilled = true;
  readonly capacity:  number;
  private readonly _slots: T[];

  constructor(typeName: string, capacity: number, fill: T, placement?: StoragePlacement) {
    rejectPlacement(typeName, placement);
    this.capacity = capacity;
    this._slots   = new Array<T>(capacity).fill(fill);
    storageLog('allocate %s block: %d prefilled slots', typeName, capacity);
  }

  read(index: number): T {
    return this._slots[index];
  }

  write(index: number, value: T): void {
    this._slots[index] = value;
  }

  release(): void {
    // Stale values stay until overwritten; they are never read as present.
  }

  copyWithin(target: number, start: number, end: number): void {
    this._slots.copyWithin(target, start, end);
  }
}

// ─── ManagedSlotStorage ───────────────────────────────────────────────────────

/**
 * Uninitialized slots for resource-owning values.
 *
 * Every slot starts VACANT. A write constructs nothing by itself: it stores a
 * value StaticVector already built with create / emplace / copy. release()
 * drops the slot's reference without destroying it, which is how moved-out
 * and moved-from slots are retired.
 */
export class ManagedSlotStorage<T> implements SlotStorage<T> {
  readonly prefilled = false;
  readonly capacity:  number;
  private readonly _typeName: string;
  private readonly _slots: Array<T | typeof VACANT>;

  constructor(typeName: string, capacity: number, placement?: StoragePlacement) {
    rejectPlacement(typeName, placement);
    this._typeName = typeName;
    this.capacity  = capacity;
    this._slots    = new Array<T | typeof VACANT>(capacity).fill(VACANT);
    storageLog('allocate %s block: %d vacant slots', typeName, capacity);
  }

  read(index: number): T {
    const value = this._slots[index];
    if (value === VACANT) {
      throw new SlotStateError(`Slot ${index} of a '${this._typeName}' block holds no live object.`);
    }
    return value;
  }

  write(index: number, value: T): void {
    this._slots[index] = value;
  }

  release(index: number): void {
    this._slots[index] = VACANT;
  }

  /** True when slot `index` holds no live object. */
  isVacant(index: number): boolean {
    return this._slots[index] === VACANT;
  }

  copyWithin(target: number, start: number, end: number): void {
    this._slots.copyWithin(target, start, end);
  }
}
