/**
 * static-vector — layout constants
 *
 * Slot widths for the scalar element kinds, the vacancy sentinel used by
 * managed storage, and the defaults applied to StaticVectorOptions.
 *
 * A scalar block is laid out as `capacity` slots of one fixed width:
 *
 *   [byteOffset + 0 × width]  slot 0
 *   [byteOffset + 1 × width]  slot 1
 *   ...
 *   [byteOffset + (capacity - 1) × width]
 *
 * byteOffset must be a multiple of width; typed-array views reject
 * misaligned offsets.
 */

// ─── Scalar Kinds ─────────────────────────────────────────────────────────────

/**
 * Element kinds backed by a typed array.
 *
 * u8c is the clamped byte (Uint8ClampedArray). i64 / u64 hold bigint values;
 * every other kind holds number values.
 */
export type ScalarKind =
  | 'i8'
  | 'u8'
  | 'u8c'
  | 'i16'
  | 'u16'
  | 'i32'
  | 'u32'
  | 'f32'
  | 'f64'
  | 'i64'
  | 'u64';

export type BigIntKind = 'i64' | 'u64';
export type NumberKind = Exclude<ScalarKind, BigIntKind>;

/** Byte width of one slot of each ScalarKind. */
export const SCALAR_BYTE_WIDTHS: Readonly<Record<ScalarKind, number>> = {
  i8:  1,
  u8:  1,
  u8c: 1,
  i16: 2,
  u16: 2,
  i32: 4,
  u32: 4,
  f32: 4,
  f64: 8,
  i64: 8,
  u64: 8,
};

export function isBigIntKind(kind: ScalarKind): kind is BigIntKind {
  return kind === 'i64' || kind === 'u64';
}

/** Total bytes a scalar block of `capacity` slots occupies. */
export function computeBlockBytes(kind: ScalarKind, capacity: number): number {
  return capacity * SCALAR_BYTE_WIDTHS[kind];
}

// ─── Slot Sentinel ────────────────────────────────────────────────────────────

/**
 * Marks a managed slot that holds no live object.
 *
 * Every managed slot at index >= length is VACANT. Reading one is a
 * programming error and throws SlotStateError in both checked and unchecked
 * mode.
 */
export const VACANT: unique symbol = Symbol('static-vector.vacant');

// ─── Options ──────────────────────────────────────────────────────────────────

/** Precondition checks are on unless a vector is created with checked: false. */
export const DEFAULT_CHECKED = true;

/** Largest capacity a vector accepts: the typed-array length limit on 32-bit hosts. */
export const MAX_CAPACITY = 0x7fffffff;

// ─── Debug Namespaces ─────────────────────────────────────────────────────────

export const LOG_NAMESPACE_VECTOR  = 'static-vector:vector';
export const LOG_NAMESPACE_STORAGE = 'static-vector:storage';
