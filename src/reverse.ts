/**
 * static-vector — ReverseCursor
 *
 * Random-access adaptor over any PointerLike cursor. Advancing the adaptor
 * decrements the wrapped address, so walking it forward visits elements back
 * to front:
 *
 *   rbegin()  wraps slot length - 1
 *   rend()    wraps slot -1, one before the first element; never dereferenced
 *
 *   for (const it = vec.rbegin(), end = vec.rend(); !it.equals(end); it.next()) {
 *     out.push(it.value);
 *   }
 *
 * Offsets, indexing and distance are expressed in the adaptor's direction:
 * `it.at(1)` is the element before `it.value` in storage, and
 * `rend().distance(rbegin())` is the length.
 *
 * Relational comparison is on the wrapped address, not the logical reverse
 * position. `rbegin().greaterThan(rend())` is true for a non-empty vector:
 * comparisons agree with forward storage order, so a pair of reverse cursors
 * orders the same way as the pair of forward cursors they wrap.
 */

import type { PointerLike } from './cursor';

// ─── Read-only projection ─────────────────────────────────────────────────────

/** What crbegin() / crend() hand out: a ReverseCursor without write access. */
export interface ReadonlyReverseCursor<T> {
  readonly address: number;
  readonly value:   T;
  at(offset: number): T;

  next(): this;
  prev(): this;
  advance(delta: number): this;
  retreat(delta: number): this;
  plus(delta: number): ReadonlyReverseCursor<T>;
  minus(delta: number): ReadonlyReverseCursor<T>;
  distance(other: ReadonlyReverseCursor<T>): number;

  equals(other: ReadonlyReverseCursor<T>): boolean;
  lessThan(other: ReadonlyReverseCursor<T>): boolean;
  lessOrEqual(other: ReadonlyReverseCursor<T>): boolean;
  greaterThan(other: ReadonlyReverseCursor<T>): boolean;
  greaterOrEqual(other: ReadonlyReverseCursor<T>): boolean;
  compare(other: ReadonlyReverseCursor<T>): number;
}

// ─── ReverseCursor ────────────────────────────────────────────────────────────

export class ReverseCursor<T, P extends PointerLike<T, P>> implements ReadonlyReverseCursor<T> {
  private readonly _base: P;

  constructor(base: P) {
    this._base = base;
  }

  /** The wrapped cursor. Shares its address with this adaptor. */
  get base(): P {
    return this._base;
  }

  get address(): number {
    return this._base.address;
  }

  get value(): T {
    return this._base.deref(0);
  }

  set value(value: T) {
    this._base.assign(value, 0);
  }

  /** `it[offset]`: the element `offset` steps further along the reverse walk. */
  at(offset: number): T {
    return this._base.deref(-offset);
  }

  setAt(offset: number, value: T): void {
    this._base.assign(value, -offset);
  }

  // ── Movement ───────────────────────────────────────────────────────────────

  next(): this {
    this._base.shift(-1);
    return this;
  }

  prev(): this {
    this._base.shift(1);
    return this;
  }

  advance(delta: number): this {
    this._base.shift(-delta);
    return this;
  }

  retreat(delta: number): this {
    this._base.shift(delta);
    return this;
  }

  plus(delta: number): ReverseCursor<T, P> {
    return new ReverseCursor<T, P>(this._base.offset(-delta));
  }

  minus(delta: number): ReverseCursor<T, P> {
    return new ReverseCursor<T, P>(this._base.offset(delta));
  }

  clone(): ReverseCursor<T, P> {
    return new ReverseCursor<T, P>(this._base.clone());
  }

  /** `this - other` in reverse steps. */
  distance(other: ReadonlyReverseCursor<T>): number {
    return other.address - this._base.address;
  }

  // ── Comparison (wrapped address) ───────────────────────────────────────────

  equals(other: ReadonlyReverseCursor<T>): boolean {
    return this._base.address === other.address;
  }

  lessThan(other: ReadonlyReverseCursor<T>): boolean {
    return this._base.address < other.address;
  }

  lessOrEqual(other: ReadonlyReverseCursor<T>): boolean {
    return this._base.address <= other.address;
  }

  greaterThan(other: ReadonlyReverseCursor<T>): boolean {
    return this._base.address > other.address;
  }

  greaterOrEqual(other: ReadonlyReverseCursor<T>): boolean {
    return this._base.address >= other.address;
  }

  compare(other: ReadonlyReverseCursor<T>): number {
    return this._base.address - other.address;
  }
}
