/**
 * static-vector — ReverseCursor tests
 *
 * The adaptor over SlotCursor as handed out by rbegin() / rend(), and the
 * same adaptor over a pointer defined here, to show it composes with any
 * PointerLike rather than with SlotCursor alone.
 */

import { describe, it, expect } from 'vitest';
import { ReverseCursor, StaticVector, scalar, type PointerLike } from '../src/index';

// ─── helpers ─────────────────────────────────────────────────────────────────

function vec123() {
  return StaticVector.from(scalar('i32'), 4, [1, 2, 3]);
}

/** A bare pointer over a plain array. */
class ArrayPointer implements PointerLike<string, ArrayPointer> {
  constructor(private readonly items: string[], public address: number) {}

  deref(offset: number = 0): string {
    return this.items[this.address + offset];
  }

  assign(value: string, offset: number = 0): void {
    this.items[this.address + offset] = value;
  }

  offset(delta: number): ArrayPointer {
    return new ArrayPointer(this.items, this.address + delta);
  }

  shift(delta: number): void {
    this.address += delta;
  }

  clone(): ArrayPointer {
    return this.offset(0);
  }
}

function reverseOver(pointer: ArrayPointer) {
  return new ReverseCursor<string, ArrayPointer>(pointer);
}

// ─── traversal ───────────────────────────────────────────────────────────────

describe('reverse traversal', () => {
  it('rbegin → rend over [1, 2, 3] visits 3, 2, 1', () => {
    const vec  = vec123();
    const seen: number[] = [];
    for (const it = vec.rbegin(), end = vec.rend(); !it.equals(end); it.next()) {
      seen.push(it.value);
    }
    expect(seen).toEqual([3, 2, 1]);
  });

  it('rbegin wraps the last slot and rend the slot before the first', () => {
    const vec = vec123();
    expect(vec.rbegin().address).toBe(2);
    expect(vec.rend().address).toBe(-1);
    expect(vec.rbegin().base.address).toBe(2);
  });

  it('rbegin equals rend on an empty vector', () => {
    const vec = new StaticVector(scalar('i32'), 2);
    expect(vec.rbegin().equals(vec.rend())).toBe(true);
  });

  it('dereferencing rend throws RangeError', () => {
    expect(() => vec123().rend().value).toThrow(RangeError);
  });
});

// ─── arithmetic ──────────────────────────────────────────────────────────────

describe('arithmetic', () => {
  it('at(offset) walks toward the front', () => {
    const it = vec123().rbegin();
    expect(it.at(0)).toBe(3);
    expect(it.at(1)).toBe(2);
    expect(it.at(2)).toBe(1);
  });

  it('plus moves toward the front, minus toward the back', () => {
    const vec = vec123();
    expect(vec.rbegin().plus(2).value).toBe(1);
    expect(vec.rend().minus(1).value).toBe(1);
    expect(vec.rend().minus(3).value).toBe(3);
  });

  it('advance / retreat / prev move in place', () => {
    const it = vec123().rbegin();
    expect(it.advance(2).value).toBe(1);
    expect(it.retreat(1).value).toBe(2);
    expect(it.prev().value).toBe(3);
  });

  it('distance is measured in reverse steps', () => {
    const vec = vec123();
    expect(vec.rend().distance(vec.rbegin())).toBe(3);
    expect(vec.rbegin().distance(vec.rend())).toBe(-3);
    expect(vec.rbegin().plus(1).distance(vec.rbegin())).toBe(1);
  });

  it('clone is independent', () => {
    const it   = vec123().rbegin();
    const copy = it.clone();
    it.next();
    expect(copy.value).toBe(3);
    expect(it.value).toBe(2);
  });
});

// ─── comparison ──────────────────────────────────────────────────────────────

describe('comparison on the wrapped address', () => {
  it('orders by storage address, not by reverse position', () => {
    const vec = vec123();
    const rb  = vec.rbegin();
    const re  = vec.rend();
    expect(rb.greaterThan(re)).toBe(true);
    expect(rb.greaterOrEqual(re)).toBe(true);
    expect(rb.lessThan(re)).toBe(false);
    expect(re.lessOrEqual(rb)).toBe(true);
    expect(rb.compare(re)).toBe(3);
  });

  it('agrees with the forward cursors it wraps', () => {
    const vec = vec123();
    const a   = vec.rbegin();
    const b   = vec.rbegin().plus(1);
    expect(a.greaterThan(b)).toBe(a.base.greaterThan(b.base));
  });
});

// ─── writes ──────────────────────────────────────────────────────────────────

describe('writes', () => {
  it('value setter and setAt write through to the vector', () => {
    const vec = vec123();
    const it  = vec.rbegin();
    it.value  = 30;
    it.setAt(2, 10);
    expect(vec.toArray()).toEqual([10, 2, 30]);
  });

  it('crbegin / crend read the same elements', () => {
    const vec = vec123();
    expect(vec.crbegin().value).toBe(3);
    expect(vec.crend().distance(vec.crbegin())).toBe(3);
  });
});

// ─── generic adaptor ─────────────────────────────────────────────────────────

describe('over another PointerLike', () => {
  it('walks a plain array back to front', () => {
    const items = ['a', 'b', 'c', 'd'];
    const seen: string[] = [];
    const end = reverseOver(new ArrayPointer(items, -1));
    for (const it = reverseOver(new ArrayPointer(items, 3)); !it.equals(end); it.next()) {
      seen.push(it.value);
    }
    expect(seen).toEqual(['d', 'c', 'b', 'a']);
  });

  it('writes through the wrapped pointer', () => {
    const items = ['a', 'b'];
    const it    = reverseOver(new ArrayPointer(items, 1));
    it.value    = 'B';
    it.setAt(1, 'A');
    expect(items).toEqual(['A', 'B']);
    expect(it.distance(reverseOver(new ArrayPointer(items, 1)))).toBe(0);
  });
});
