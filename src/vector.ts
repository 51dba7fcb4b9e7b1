/**
 * static-vector — StaticVector
 *
 * A sequence container with a capacity fixed at construction. Elements live
 * in one capacity-sized storage block allocated up front; no operation ever
 * grows or replaces it.
 *
 * ── Slot invariants ──────────────────────────────────────────────────────────
 *
 *   [0, length)         exactly one live element per slot
 *   [length, capacity)  no live element: VACANT for managed types, a stale
 *                       value never treated as present for trivial types
 *
 * Every value that enters the vector is built by the element type (create,
 * emplace or copy) and every value that leaves it is either destroyed exactly
 * once or, for pop() and the move operations, handed to its new owner. The
 * destroy pass is skipped for trivial element types.
 *
 * ── Shifting ─────────────────────────────────────────────────────────────────
 *
 * insert / erase relocate elements by moving slot contents, never by
 * constructing or destroying. Slots are written in two distinct ways:
 *
 *   construct  writing into a slot at or past the old length (vacant)
 *   assign     writing into a live slot; the previous value is destroyed
 *
 * insert at the end is a pure construct. erase destroys the removed elements,
 * moves the tail down, then releases the vacated tail slots without
 * destroying them: their elements now live lower in the block.
 *
 * ── Checked mode ─────────────────────────────────────────────────────────────
 *
 * With checked: true (the default) every precondition is verified before any
 * state changes, so a rejected call leaves the vector untouched. With
 * checked: false those checks are skipped. Conversions between vectors
 * (copyOf, moveFrom, assignFrom, moveAssignFrom, swap) always check that the
 * source length fits the destination capacity.
 */

import { DEFAULT_CHECKED, MAX_CAPACITY } from './constants';
import { SlotCursor, type CursorHost, type ReadonlySlotCursor } from './cursor';
import { CapacityError, CursorError, EmptyVectorError } from './errors';
import { vectorLog } from './log';
import { ReverseCursor, type ReadonlyReverseCursor } from './reverse';
import type { ElementType, ScalarArray, SlotStorage, StaticVectorOptions } from './types';

// ─── Public types ─────────────────────────────────────────────────────────────

/** A slot index, or a cursor handed out by the same vector. */
export type Position<T> = number | ReadonlySlotCursor<T>;

export type VectorReverseCursor<T> = ReverseCursor<T, SlotCursor<T>>;

function isValidCapacity(capacity: number): boolean {
  return Number.isInteger(capacity) && capacity >= 1 && capacity <= MAX_CAPACITY;
}

// ─── StaticVector ─────────────────────────────────────────────────────────────

export class StaticVector<T, A extends readonly unknown[] = readonly []>
  implements CursorHost<T>, Iterable<T>
{
  readonly elementType: ElementType<T, A>;
  readonly capacity:    number;
  readonly checked:     boolean;

  private readonly _storage: SlotStorage<T>;
  private _length:     number = 0;
  private _generation: number = 0;

  constructor(elementType: ElementType<T, A>, capacity: number, options: StaticVectorOptions = {}) {
    if (!isValidCapacity(capacity)) {
      throw new RangeError(`Capacity must be an integer in [1, ${MAX_CAPACITY}], got ${capacity}.`);
    }
    this.elementType = elementType;
    this.capacity    = capacity;
    this.checked     = options.checked ?? DEFAULT_CHECKED;
    this._storage    = elementType.allocate(capacity, options);
  }

  // ── Construction family ────────────────────────────────────────────────────

  /**
   * A vector holding `count` copies of `value`, or `count` default-constructed
   * elements when `value` is undefined.
   */
  static filled<T, A extends readonly unknown[]>(
    elementType: ElementType<T, A>,
    capacity:    number,
    count:       number,
    value?:      T,
    options?:    StaticVectorOptions,
  ): StaticVector<T, A> {
    const vec = new StaticVector(elementType, capacity, options);
    if (value === undefined) {
      vec.resize(count);
    } else {
      vec.assign(count, value);
    }
    return vec;
  }

  /** A vector holding a copy of each value of `values`, in order. */
  static from<T, A extends readonly unknown[]>(
    elementType: ElementType<T, A>,
    capacity:    number,
    values:      Iterable<T>,
    options?:    StaticVectorOptions,
  ): StaticVector<T, A> {
    const vec = new StaticVector(elementType, capacity, options);
    vec.appendRange(values);
    return vec;
  }

  /**
   * Copy `source` into a new vector of `capacity` slots.
   *
   * @throws CapacityError if source.length exceeds capacity, whatever the two
   *         capacities are and whether or not either vector is checked.
   */
  static copyOf<T, A extends readonly unknown[]>(
    source:   StaticVector<T, A>,
    capacity: number = source.capacity,
    options:  StaticVectorOptions = { checked: source.checked },
  ): StaticVector<T, A> {
    const vec = new StaticVector(source.elementType, capacity, options);
    vec._requireSourceFits('copyOf', source._length);
    vec._copyElements(source);
    if (capacity !== source.capacity) {
      vectorLog('copyOf: %d elements, capacity %d -> %d', source._length, source.capacity, capacity);
    }
    return vec;
  }

  /**
   * copyOf() as a fallible conversion: null when the source does not fit or
   * `capacity` is not a valid capacity.
   */
  static tryCopyOf<T, A extends readonly unknown[]>(
    source:   StaticVector<T, A>,
    capacity: number = source.capacity,
    options?: StaticVectorOptions,
  ): StaticVector<T, A> | null {
    if (!isValidCapacity(capacity) || source._length > capacity) {
      vectorLog('tryCopyOf: %d elements do not fit capacity %d', source._length, capacity);
      return null;
    }
    return StaticVector.copyOf(source, capacity, options);
  }

  /**
   * Move the elements of `source` into a new vector of `capacity` slots.
   * Ownership transfers: nothing is copied or destroyed, and `source` is left
   * empty.
   *
   * @throws CapacityError if source.length exceeds capacity; `source` is left
   *         untouched.
   */
  static moveFrom<T, A extends readonly unknown[]>(
    source:   StaticVector<T, A>,
    capacity: number = source.capacity,
    options:  StaticVectorOptions = { checked: source.checked },
  ): StaticVector<T, A> {
    const vec = new StaticVector(source.elementType, capacity, options);
    vec._requireSourceFits('moveFrom', source._length);
    vec._takeElements(source);
    return vec;
  }

  /** A deep copy with the same capacity and checked mode. */
  clone(): StaticVector<T, A> {
    return StaticVector.copyOf(this, this.capacity, { checked: this.checked });
  }

  // ── Assignment ─────────────────────────────────────────────────────────────

  /** Copy assignment. Assigning a vector to itself changes nothing. */
  assignFrom(other: StaticVector<T, A>): this {
    if (other === this) return this;
    this._requireSourceFits('assignFrom', other._length);
    this._copyElements(other);
    return this;
  }

  /** Move assignment. `other` is left empty; self-assignment changes nothing. */
  moveAssignFrom(other: StaticVector<T, A>): this {
    if (other === this) return this;
    this._requireSourceFits('moveAssignFrom', other._length);
    this.clear();
    this._takeElements(other);
    return this;
  }

  /** Replace the contents with `count` copies of `value`. */
  assign(count: number, value: T): void {
    if (this.checked) this._requireCount('assign', count);

    // Copy before clearing: `value` may be one of this vector's own elements.
    const copies = this._buildAll(count, () => this.elementType.copy(value));
    this.clear();
    for (let i = 0; i < count; i++) {
      this._storage.write(i, copies[i]);
    }
    this._setLength(count);
  }

  /**
   * Exchange contents with `other` without constructing or destroying.
   *
   * @throws CapacityError if either length does not fit the other's capacity.
   */
  swap(other: StaticVector<T, A>): void {
    if (other === this) return;
    if (this._length > other.capacity || other._length > this.capacity) {
      throw this._reject(new CapacityError(
        `swap: lengths ${this._length} and ${other._length} do not fit ` +
        `capacities ${other.capacity} and ${this.capacity}.`,
      ));
    }
    const mine   = this._readRange(0, this._length);
    const theirs = other._readRange(0, other._length);
    this._overwrite(theirs);
    other._overwrite(mine);
  }

  /** Destroy every live element. The vector stays usable and empty. */
  dispose(): void {
    this.clear();
  }

  // ── Appending / removing at the end ────────────────────────────────────────

  push(value: T): void {
    if (this.checked) this._requireRoom('push', 1);
    this._storage.write(this._length, this.elementType.copy(value));
    this._setLength(this._length + 1);
  }

  /** Construct a new last element in place from `args`, and return it. */
  emplace(...args: A): T {
    if (this.checked) this._requireRoom('emplace', 1);
    const index = this._length;
    this._storage.write(index, this.elementType.emplace(...args));
    this._setLength(index + 1);
    // Typed-array kinds wrap or round on write: hand back what was stored.
    return this._storage.read(index);
  }

  /**
   * Remove the last element and return it. The element is moved out, not
   * destroyed: the caller now owns it.
   */
  pop(): T {
    if (this.checked) this._requireNonEmpty('pop');
    const index   = this._length - 1;
    const element = this._storage.read(index);
    this._storage.release(index);
    this._setLength(index);
    return element;
  }

  appendRange(values: Iterable<T>): void {
    this._insertCopies(this._length, this._collect(values, 'appendRange'), 'appendRange');
  }

  // ── Inserting / erasing anywhere ───────────────────────────────────────────

  /** Insert a copy of `value` before `position`; returns a cursor to it. */
  insert(position: Position<T>, value: T): SlotCursor<T> {
    return this._insertCopies(this._resolve(position, 'insert'), [value], 'insert');
  }

  /** Construct an element in place before `position`; returns a cursor to it. */
  emplaceAt(position: Position<T>, ...args: A): SlotCursor<T> {
    const index = this._resolve(position, 'emplaceAt');
    if (this.checked) {
      this._requireRoom('emplaceAt', 1);
      this._requireInsertIndex('emplaceAt', index);
    }
    const element = this.elementType.emplace(...args);
    this._openGap(index, 1);
    this._storage.write(index, element);
    return new SlotCursor(this, index);
  }

  /** Insert a copy of each of `values` before `position`, in order. */
  insertRange(position: Position<T>, values: Iterable<T>): SlotCursor<T> {
    const index = this._resolve(position, 'insertRange');
    if (this.checked) this._requireInsertIndex('insertRange', index);
    return this._insertCopies(index, this._collect(values, 'insertRange'), 'insertRange');
  }

  /**
   * Remove the element at `first`, or the elements in [first, last).
   * Returns a cursor to the element that followed the removed range.
   */
  erase(first: Position<T>, last?: Position<T>): SlotCursor<T> {
    const start = this._resolve(first, 'erase');
    const end   = last === undefined ? start + 1 : this._resolve(last, 'erase');

    if (this.checked && !(Number.isInteger(start) && Number.isInteger(end) &&
        start >= 0 && start <= end && end <= this._length)) {
      throw this._reject(new RangeError(
        `erase: range [${start}, ${end}) is not within [0, ${this._length}].`,
      ));
    }

    const removed = end - start;
    if (removed === 0) return new SlotCursor(this, start);

    const oldLength = this._length;
    this._destroyRange(start, end);
    this._storage.copyWithin(start, end, oldLength);
    this._releaseRange(oldLength - removed, oldLength);
    this._setLength(oldLength - removed);
    return new SlotCursor(this, start);
  }

  // ── Length changes ─────────────────────────────────────────────────────────

  /**
   * Grow by default-constructing new elements, or shrink by destroying the
   * elements past `count`.
   */
  resize(count: number): void {
    if (this.checked) this._requireCount('resize', count);
    const oldLength = this._length;
    if (count === oldLength) return;

    if (count > oldLength) {
      const created = this._buildAll(count - oldLength, () => this.elementType.create());
      for (let i = 0; i < created.length; i++) {
        this._storage.write(oldLength + i, created[i]);
      }
    } else {
      this._destroyRange(count, oldLength);
      this._releaseRange(count, oldLength);
    }
    this._setLength(count);
  }

  clear(): void {
    if (this._length === 0) return;
    this._destroyRange(0, this._length);
    this._releaseRange(0, this._length);
    this._setLength(0);
  }

  /** Checks `count` against the capacity; there is nothing to reserve. */
  reserve(count: number): void {
    if (this.checked) this._requireCount('reserve', count);
  }

  shrinkToFit(): void {
    // The block never changes size.
  }

  // ── Element access ─────────────────────────────────────────────────────────

  get(index: number): T {
    if (this.checked) this._requireIndex('get', index);
    return this._storage.read(index);
  }

  /** Assign a copy of `value` to a live slot; the previous element is destroyed. */
  set(index: number, value: T): void {
    if (this.checked) this._requireIndex('set', index);
    const next     = this.elementType.copy(value);
    const previous = this._storage.read(index);
    this._storage.write(index, next);
    this._destroyOne(previous);
  }

  /**
   * Array.prototype.at semantics: the index is truncated toward zero (NaN
   * reads as 0), negative indices count from the end, and anything out of
   * range yields undefined instead of throwing.
   */
  at(index: number): T | undefined {
    const relative = Number.isNaN(index) ? 0 : Math.trunc(index);
    const resolved = relative < 0 ? this._length + relative : relative;
    if (resolved < 0 || resolved >= this._length) return undefined;
    return this._storage.read(resolved);
  }

  front(): T {
    if (this.checked) this._requireNonEmpty('front');
    return this._storage.read(0);
  }

  back(): T {
    if (this.checked) this._requireNonEmpty('back');
    return this._storage.read(this._length - 1);
  }

  // ── Queries ────────────────────────────────────────────────────────────────

  get length(): number {
    return this._length;
  }

  /** Same as capacity. */
  get maxSize(): number {
    return this.capacity;
  }

  /** Bumped whenever the length changes or elements shift. */
  get generation(): number {
    return this._generation;
  }

  isEmpty(): boolean {
    return this._length === 0;
  }

  isFull(): boolean {
    return this._length === this.capacity;
  }

  // ── Cursors ────────────────────────────────────────────────────────────────

  begin(): SlotCursor<T> {
    return new SlotCursor(this, 0);
  }

  end(): SlotCursor<T> {
    return new SlotCursor(this, this._length);
  }

  cbegin(): ReadonlySlotCursor<T> {
    return this.begin();
  }

  cend(): ReadonlySlotCursor<T> {
    return this.end();
  }

  rbegin(): VectorReverseCursor<T> {
    return new ReverseCursor<T, SlotCursor<T>>(new SlotCursor(this, this._length - 1));
  }

  rend(): VectorReverseCursor<T> {
    return new ReverseCursor<T, SlotCursor<T>>(new SlotCursor(this, -1));
  }

  crbegin(): ReadonlyReverseCursor<T> {
    return this.rbegin();
  }

  crend(): ReadonlyReverseCursor<T> {
    return this.rend();
  }

  // ── Iteration ──────────────────────────────────────────────────────────────

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  /** Front to back. Throws CursorError on a checked vector modified mid-walk. */
  *values(): IterableIterator<T> {
    const generation = this._generation;
    for (let i = 0; ; i++) {
      this._ensureUnchanged('values', generation);
      if (i >= this._length) return;
      yield this._storage.read(i);
    }
  }

  /** Back to front, through the reverse cursors. */
  *reversed(): IterableIterator<T> {
    const end = this.rend();
    for (const it = this.rbegin(); !it.equals(end); it.next()) {
      yield it.value;
    }
  }

  *entries(): IterableIterator<[number, T]> {
    const generation = this._generation;
    for (let i = 0; ; i++) {
      this._ensureUnchanged('entries', generation);
      if (i >= this._length) return;
      yield [i, this._storage.read(i)];
    }
  }

  /** The live elements in order. Managed elements are shared, not copied. */
  toArray(): T[] {
    return this._readRange(0, this._length);
  }

  /**
   * Zero-copy typed-array view of the live elements, for scalar element types.
   * undefined for plain and managed types. Invalidated like a cursor.
   */
  view(): ScalarArray | undefined {
    return this._storage.view?.(0, this._length);
  }

  equals<B extends readonly unknown[]>(
    other: StaticVector<T, B>,
    eq: (a: T, b: T) => boolean = Object.is,
  ): boolean {
    if (other._length !== this._length) return false;
    for (let i = 0; i < this._length; i++) {
      if (!eq(this._storage.read(i), other._storage.read(i))) return false;
    }
    return true;
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private _setLength(length: number): void {
    this._length      = length;
    this._generation += 1;
  }

  private _resolve(position: Position<T>, op: string): number {
    if (typeof position === 'number') return position;
    if (this.checked) {
      if (!position.belongsTo(this)) {
        throw this._reject(new CursorError(`${op}: cursor was handed out by a different vector.`));
      }
      if (!position.isCurrent()) {
        throw this._reject(new CursorError(
          `${op}: cursor at slot ${position.address} was invalidated by an earlier modification.`,
        ));
      }
    }
    return position.address;
  }

  private _insertCopies(index: number, values: readonly T[], op: string): SlotCursor<T> {
    if (this.checked) {
      this._requireRoom(op, values.length);
      this._requireInsertIndex(op, index);
    }
    if (values.length === 0) return new SlotCursor(this, index);

    const copies = this._buildAll(values.length, (i) => this.elementType.copy(values[i]));
    this._openGap(index, copies.length);
    for (let i = 0; i < copies.length; i++) {
      this._storage.write(index + i, copies[i]);
    }
    return new SlotCursor(this, index);
  }

  /**
   * Move [index, length) up by `count` slots and extend the length. The
   * caller must write every slot of [index, index + count) next: those slots
   * hold either a moved-from duplicate or nothing.
   */
  private _openGap(index: number, count: number): void {
    this._storage.copyWithin(index + count, index, this._length);
    this._setLength(this._length + count);
  }

  /** Replace the contents with copies of `source`'s elements. */
  private _copyElements(source: StaticVector<T, A>): void {
    const copies = this._buildAll(source._length, (i) => this.elementType.copy(source._storage.read(i)));
    this.clear();
    for (let i = 0; i < copies.length; i++) {
      this._storage.write(i, copies[i]);
    }
    this._setLength(copies.length);
  }

  /**
   * Build `count` new elements. If building one throws, the ones already
   * built are destroyed before the error propagates, and no slot was touched.
   */
  private _buildAll(count: number, build: (index: number) => T): T[] {
    const built: T[] = [];
    try {
      for (let i = 0; i < count; i++) built.push(build(i));
    } catch (error) {
      for (const element of built) this._destroyOne(element);
      throw error;
    }
    return built;
  }

  /**
   * Drain `values` into an array. A checked vector stops pulling one item
   * past its free slots and throws CapacityError, so an over-long or endless
   * source is rejected after at most `capacity - length + 1` items.
   */
  private _collect(values: Iterable<T>, op: string): T[] {
    if (!this.checked) return Array.from(values);
    const room = this.capacity - this._length;
    const out: T[] = [];
    for (const value of values) {
      if (out.length === room) {
        throw this._reject(new CapacityError(
          `${op}: source holds more than the ${room} free slot(s) left at length ${this._length}.`,
        ));
      }
      out.push(value);
    }
    return out;
  }

  private _takeElements(source: StaticVector<T, A>): void {
    const count = source._length;
    for (let i = 0; i < count; i++) {
      this._storage.write(i, source._storage.read(i));
    }
    source._releaseRange(0, count);
    source._setLength(0);
    this._setLength(count);
  }

  /** Replace the contents with `values`, which this vector now owns. */
  private _overwrite(values: readonly T[]): void {
    for (let i = 0; i < values.length; i++) {
      this._storage.write(i, values[i]);
    }
    this._releaseRange(values.length, this._length);
    this._setLength(values.length);
  }

  private _readRange(start: number, end: number): T[] {
    const out: T[] = [];
    for (let i = start; i < end; i++) out.push(this._storage.read(i));
    return out;
  }

  private _destroyRange(start: number, end: number): void {
    const type = this.elementType;
    if (type.trivial || type.destroy === undefined) return;
    for (let i = start; i < end; i++) {
      type.destroy(this._storage.read(i));
    }
  }

  private _destroyOne(element: T): void {
    const type = this.elementType;
    if (!type.trivial && type.destroy !== undefined) type.destroy(element);
  }

  private _releaseRange(start: number, end: number): void {
    if (this._storage.prefilled) return;
    for (let i = start; i < end; i++) this._storage.release(i);
  }

  // ── Preconditions ──────────────────────────────────────────────────────────

  private _reject<E extends Error>(error: E): E {
    vectorLog('%s: %s', error.name, error.message);
    return error;
  }

  private _requireRoom(op: string, count: number): void {
    if (this._length + count > this.capacity) {
      throw this._reject(new CapacityError(
        `${op}: adding ${count} element(s) to length ${this._length} exceeds capacity ${this.capacity}.`,
      ));
    }
  }

  private _requireCount(op: string, count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw this._reject(new RangeError(`${op}: count must be a non-negative integer, got ${count}.`));
    }
    if (count > this.capacity) {
      throw this._reject(new CapacityError(`${op}: count ${count} exceeds capacity ${this.capacity}.`));
    }
  }

  private _requireSourceFits(op: string, sourceLength: number): void {
    if (sourceLength > this.capacity) {
      throw this._reject(new CapacityError(
        `${op}: source length ${sourceLength} exceeds destination capacity ${this.capacity}.`,
      ));
    }
  }

  private _requireNonEmpty(op: string): void {
    if (this._length === 0) {
      throw this._reject(new EmptyVectorError(`${op}: vector is empty.`));
    }
  }

  private _requireIndex(op: string, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._length) {
      throw this._reject(new RangeError(`${op}: index ${index} is out of range [0, ${this._length}).`));
    }
  }

  private _requireInsertIndex(op: string, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > this._length) {
      throw this._reject(new RangeError(`${op}: position ${index} is out of range [0, ${this._length}].`));
    }
  }

  private _ensureUnchanged(op: string, generation: number): void {
    if (this.checked && generation !== this._generation) {
      throw this._reject(new CursorError(`${op}: vector was modified during iteration.`));
    }
  }
}
