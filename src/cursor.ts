/**
 * static-vector — SlotCursor
 *
 * A pointer-like, random-access cursor over the slots of one vector. Its
 * `address` is a slot index; arithmetic moves the address and dereferencing
 * goes through the owning vector, so a cursor never holds an element itself.
 *
 * Cursors follow iterator-invalidation rules: any operation that changes the
 * vector's length or shifts its elements invalidates every cursor handed out
 * before it. On a checked vector a stale cursor is detected through the
 * vector's generation stamp and dereferencing it throws CursorError. Unchecked
 * vectors skip the check and a stale cursor reads whatever now sits at its
 * address.
 *
 *   const it  = vec.begin();
 *   const end = vec.end();
 *   for (; !it.equals(end); it.next()) total += it.value;
 */

import { CursorError } from './errors';

// ─── Host ─────────────────────────────────────────────────────────────────────

/** What a cursor needs from the container it walks. StaticVector implements it. */
export interface CursorHost<T> {
  /** Bumped whenever the length changes or elements shift. */
  readonly generation: number;
  readonly checked:    boolean;
  get(index: number): T;
  set(index: number, value: T): void;
}

// ─── Pointer contract ─────────────────────────────────────────────────────────

/**
 * The minimal random-access pointer an adaptor such as ReverseCursor wraps.
 *
 * deref / assign address `address + offset`. offset() returns a new pointer;
 * shift() moves this one in place.
 */
export interface PointerLike<T, P extends PointerLike<T, P>> {
  readonly address: number;
  deref(offset?: number): T;
  assign(value: T, offset?: number): void;
  offset(delta: number): P;
  shift(delta: number): void;
  clone(): P;
}

// ─── Read-only projection ─────────────────────────────────────────────────────

/** What cbegin() / cend() hand out: a SlotCursor without write access. */
export interface ReadonlySlotCursor<T> {
  readonly address: number;
  readonly value:   T;
  at(offset: number): T;
  deref(offset?: number): T;

  next(): this;
  prev(): this;
  advance(delta: number): this;
  retreat(delta: number): this;
  plus(delta: number): ReadonlySlotCursor<T>;
  minus(delta: number): ReadonlySlotCursor<T>;
  distance(other: ReadonlySlotCursor<T>): number;

  equals(other: ReadonlySlotCursor<T>): boolean;
  lessThan(other: ReadonlySlotCursor<T>): boolean;
  lessOrEqual(other: ReadonlySlotCursor<T>): boolean;
  greaterThan(other: ReadonlySlotCursor<T>): boolean;
  greaterOrEqual(other: ReadonlySlotCursor<T>): boolean;
  compare(other: ReadonlySlotCursor<T>): number;

  isCurrent(): boolean;
  belongsTo(host: CursorHost<T>): boolean;
}

// ─── SlotCursor ───────────────────────────────────────────────────────────────

export class SlotCursor<T> implements PointerLike<T, SlotCursor<T>>, ReadonlySlotCursor<T> {
  private _address: number;
  private readonly _host: CursorHost<T>;
  private readonly _generation: number;

  /** @internal — use StaticVector.begin() / end() */
  constructor(host: CursorHost<T>, address: number, generation: number = host.generation) {
    this._host       = host;
    this._address    = address;
    this._generation = generation;
  }

  get address(): number {
    return this._address;
  }

  /** The element at the cursor. */
  get value(): T {
    return this.deref(0);
  }

  set value(value: T) {
    this.assign(value, 0);
  }

  /** The element `offset` slots after the cursor (`it[offset]`). */
  at(offset: number): T {
    return this.deref(offset);
  }

  deref(offset: number = 0): T {
    this._ensureCurrent();
    return this._host.get(this._address + offset);
  }

  assign(value: T, offset: number = 0): void {
    this._ensureCurrent();
    this._host.set(this._address + offset, value);
  }

  // ── Movement ───────────────────────────────────────────────────────────────

  next(): this {
    this._address += 1;
    return this;
  }

  prev(): this {
    this._address -= 1;
    return this;
  }

  advance(delta: number): this {
    this._address += delta;
    return this;
  }

  retreat(delta: number): this {
    this._address -= delta;
    return this;
  }

  shift(delta: number): void {
    this._address += delta;
  }

  offset(delta: number): SlotCursor<T> {
    return new SlotCursor(this._host, this._address + delta, this._generation);
  }

  plus(delta: number): SlotCursor<T> {
    return this.offset(delta);
  }

  minus(delta: number): SlotCursor<T> {
    return this.offset(-delta);
  }

  clone(): SlotCursor<T> {
    return this.offset(0);
  }

  /** `this - other` in slots. */
  distance(other: ReadonlySlotCursor<T>): number {
    return this._address - other.address;
  }

  // ── Comparison ─────────────────────────────────────────────────────────────

  equals(other: ReadonlySlotCursor<T>): boolean {
    return this._address === other.address;
  }

  lessThan(other: ReadonlySlotCursor<T>): boolean {
    return this._address < other.address;
  }

  lessOrEqual(other: ReadonlySlotCursor<T>): boolean {
    return this._address <= other.address;
  }

  greaterThan(other: ReadonlySlotCursor<T>): boolean {
    return this._address > other.address;
  }

  greaterOrEqual(other: ReadonlySlotCursor<T>): boolean {
    return this._address >= other.address;
  }

  /** Negative, zero or positive, for use with Array.prototype.sort. */
  compare(other: ReadonlySlotCursor<T>): number {
    return this._address - other.address;
  }

  // ── Validity ───────────────────────────────────────────────────────────────

  /** False once the owning vector has changed length or shifted elements. */
  isCurrent(): boolean {
    return this._generation === this._host.generation;
  }

  belongsTo(host: CursorHost<T>): boolean {
    return this._host === host;
  }

  private _ensureCurrent(): void {
    if (this._host.checked && this._generation !== this._host.generation) {
      throw new CursorError(
        `Cursor at slot ${this._address} was invalidated by a length change or element shift.`,
      );
    }
  }
}
