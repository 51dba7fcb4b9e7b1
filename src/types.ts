/**
 * static-vector — type definitions
 *
 * An ElementType describes how the values of one vector are created, copied
 * and destroyed, and which storage backing holds them. The trivial /
 * non-trivial split lives here rather than in StaticVector: a trivial type
 * allocates a pre-filled block and StaticVector skips its destroy pass.
 */

// ─── Backing Arrays ───────────────────────────────────────────────────────────

export type NumericArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

export type BigIntArray = BigInt64Array | BigUint64Array;

export type ScalarArray = NumericArray | BigIntArray;

// ─── Storage ──────────────────────────────────────────────────────────────────

/**
 * A capacity-sized block of slots.
 *
 * Storage never constructs or destroys. It reads and writes slots at the
 * indices StaticVector hands it and performs no bounds checking of its own;
 * every index it receives is in [0, capacity).
 */
export interface SlotStorage<T> {
  readonly capacity: number;

  /**
   * True when every slot holds a value from allocation onwards (typed arrays,
   * default-filled arrays). Slots at index >= length are still logically
   * absent; their contents are stale, never present.
   */
  readonly prefilled: boolean;

  read(index: number): T;
  write(index: number, value: T): void;

  /** Marks a slot as holding no live object. No-op for prefilled storage. */
  release(index: number): void;

  /** Moves slots [start, end) to begin at target, memmove-style. */
  copyWithin(target: number, start: number, end: number): void;

  /** Zero-copy view of slots [start, end). Scalar storage only. */
  view?(start: number, end: number): ScalarArray;
}

/**
 * Where a scalar block lives. Without a buffer the block allocates its own
 * ArrayBuffer. With one, slots start at byteOffset, which must be a multiple
 * of the slot width.
 */
export interface StoragePlacement {
  readonly buffer?:     ArrayBufferLike;
  readonly byteOffset?: number;
}

// ─── Element Types ────────────────────────────────────────────────────────────

/**
 * Lifecycle hooks for the values of one vector.
 *
 * create()      Default construction: resize() growth and filled() without a value.
 * emplace(...)  In-place construction from arguments: emplace() / emplaceAt().
 * copy(v)       Copy construction: push(), insert(), set(), clone(), copyOf().
 * destroy(v)    Called exactly once for every value that leaves the vector
 *               without being handed back to the caller. pop() moves the
 *               value out and does not destroy it.
 */
export interface ElementType<T, A extends readonly unknown[] = readonly []> {
  readonly name:    string;
  readonly trivial: boolean;

  create(): T;
  emplace(...args: A): T;
  copy(value: T): T;
  destroy?(value: T): void;

  allocate(capacity: number, placement?: StoragePlacement): SlotStorage<T>;
}

// ─── Vector Options ───────────────────────────────────────────────────────────

export interface StaticVectorOptions extends StoragePlacement {
  /**
   * Verify preconditions before every operation (default true). When false,
   * hot-path checks are skipped and violating a precondition leaves the
   * vector in an unspecified state. Cross-capacity conversions and storage
   * layout are checked either way.
   */
  readonly checked?: boolean;
}
