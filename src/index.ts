// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  ElementType,
  SlotStorage,
  StoragePlacement,
  StaticVectorOptions,
  NumericArray,
  BigIntArray,
  ScalarArray,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export type { ScalarKind, NumberKind, BigIntKind } from './constants';
export {
  SCALAR_BYTE_WIDTHS,
  VACANT,
  DEFAULT_CHECKED,
  MAX_CAPACITY,
  isBigIntKind,
  computeBlockBytes,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export type { StaticVectorErrorCode } from './errors';
export {
  StaticVectorError,
  CapacityError,
  EmptyVectorError,
  CursorError,
  SlotStateError,
  StorageLayoutError,
} from './errors';

// ─── Storage ──────────────────────────────────────────────────────────────────
export {
  NumericSlotStorage,
  BigIntSlotStorage,
  ArraySlotStorage,
  ManagedSlotStorage,
  resolveBlock,
} from './storage';

// ─── Element Types ────────────────────────────────────────────────────────────
export { scalar, plain, managed } from './elements';
export type { ScalarElementType, ManagedDefinition } from './elements';

// ─── Cursors ──────────────────────────────────────────────────────────────────
export { SlotCursor } from './cursor';
export type { CursorHost, PointerLike, ReadonlySlotCursor } from './cursor';
export { ReverseCursor } from './reverse';
export type { ReadonlyReverseCursor } from './reverse';

// ─── Vector ───────────────────────────────────────────────────────────────────
export { StaticVector } from './vector';
export type { Position, VectorReverseCursor } from './vector';
