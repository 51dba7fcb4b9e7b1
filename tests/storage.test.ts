/**
 * static-vector — Raw storage tests
 *
 * Covers the four storage backings on their own (no StaticVector involved)
 * plus the placement rules for scalar blocks inside a caller-supplied
 * ArrayBuffer or SharedArrayBuffer.
 */

import { describe, it, expect } from 'vitest';
import {
  ArraySlotStorage,
  BigIntSlotStorage,
  ManagedSlotStorage,
  NumericSlotStorage,
  SlotStateError,
  StaticVector,
  StorageLayoutError,
  computeBlockBytes,
  managed,
  plain,
  resolveBlock,
  scalar,
} from '../src/index';

// ─── NumericSlotStorage ───────────────────────────────────────────────────────

describe('NumericSlotStorage', () => {
  it('allocates its own block sized capacity × slot width', () => {
    const storage = new NumericSlotStorage('i32', 6);
    expect(storage.buffer.byteLength).toBe(24);
    expect(storage.byteOffset).toBe(0);
    expect(storage.capacity).toBe(6);
    expect(storage.prefilled).toBe(true);
  });

  it('starts zero-filled and reads back what was written', () => {
    const storage = new NumericSlotStorage('f64', 4);
    expect(storage.read(3)).toBe(0);
    storage.write(2, 1.25);
    expect(storage.read(2)).toBe(1.25);
  });

  it('stores values with the wrapping of the typed array', () => {
    const storage = new NumericSlotStorage('u8', 2);
    storage.write(0, 300);
    expect(storage.read(0)).toBe(44);
  });

  it('copyWithin moves slots memmove-style', () => {
    const storage = new NumericSlotStorage('i16', 5);
    [1, 2, 3, 4, 5].forEach((v, i) => storage.write(i, v));
    storage.copyWithin(1, 0, 4);
    expect(Array.from(storage.view(0, 5))).toEqual([1, 1, 2, 3, 4]);
  });

  it('view() is zero-copy', () => {
    const storage = new NumericSlotStorage('u32', 4);
    const view    = storage.view(1, 3);
    view[0] = 99;
    expect(storage.read(1)).toBe(99);
    expect(view.length).toBe(2);
  });
});

// ─── BigIntSlotStorage ────────────────────────────────────────────────────────

describe('BigIntSlotStorage', () => {
  it('holds bigint values', () => {
    const storage = new BigIntSlotStorage('i64', 3);
    storage.write(1, -5n);
    expect(storage.read(1)).toBe(-5n);
    expect(storage.read(0)).toBe(0n);
    expect(storage.buffer.byteLength).toBe(24);
  });
});

// ─── Placement ────────────────────────────────────────────────────────────────

describe('placement in a caller buffer', () => {
  it('places an f64 block at an aligned offset of a SharedArrayBuffer', () => {
    const sab     = new SharedArrayBuffer(64);
    const storage = new NumericSlotStorage('f64', 4, { buffer: sab, byteOffset: 16 });
    storage.write(0, 1.5);
    expect(new Float64Array(sab, 16, 1)[0]).toBe(1.5);
    expect(storage.buffer).toBe(sab);
    expect(storage.byteOffset).toBe(16);
  });

  it('rejects an offset that is not a multiple of the slot width', () => {
    expect(() => new NumericSlotStorage('i32', 2, { buffer: new ArrayBuffer(32), byteOffset: 2 }))
      .toThrow(StorageLayoutError);
  });

  it('rejects a block that runs past the end of the buffer', () => {
    expect(() => resolveBlock('i32', 4, { buffer: new ArrayBuffer(16), byteOffset: 4 }))
      .toThrow(StorageLayoutError);
  });

  it('accepts a block that ends exactly at the end of the buffer', () => {
    const block = resolveBlock('i32', 3, { buffer: new ArrayBuffer(16), byteOffset: 4 });
    expect(block.byteOffset).toBe(4);
  });

  it('rejects a byteOffset without a buffer', () => {
    expect(() => resolveBlock('u8', 4, { byteOffset: 8 })).toThrow(StorageLayoutError);
  });

  it('rejects a negative byteOffset', () => {
    expect(() => resolveBlock('u8', 4, { buffer: new ArrayBuffer(8), byteOffset: -1 }))
      .toThrow(StorageLayoutError);
  });

  it('computeBlockBytes multiplies the slot width', () => {
    expect(computeBlockBytes('u16', 10)).toBe(20);
    expect(computeBlockBytes('u64', 3)).toBe(24);
  });

  it('plain and managed types refuse an external buffer', () => {
    const buffer = new ArrayBuffer(16);
    expect(() => plain('', 'label').allocate(4, { buffer })).toThrow(StorageLayoutError);
    expect(() => managed({ create: () => ({}), copy: (v: object) => ({ ...v }) }).allocate(4, { buffer }))
      .toThrow(StorageLayoutError);
  });

  it('a StaticVector writes through to the placed block', () => {
    const sab = new SharedArrayBuffer(16);
    const vec = new StaticVector(scalar('u16'), 4, { buffer: sab, byteOffset: 2 });
    vec.push(7);
    vec.push(8);
    expect(Array.from(new Uint16Array(sab, 0, 4))).toEqual([0, 7, 8, 0]);
  });
});

// ─── ArraySlotStorage ─────────────────────────────────────────────────────────

describe('ArraySlotStorage', () => {
  it('is pre-filled with the default value', () => {
    const storage = new ArraySlotStorage('label', 3, 'none');
    expect(storage.read(2)).toBe('none');
    storage.write(2, 'set');
    storage.release();
    expect(storage.read(2)).toBe('set');
  });
});

// ─── ManagedSlotStorage ───────────────────────────────────────────────────────

describe('ManagedSlotStorage', () => {
  it('starts with every slot vacant', () => {
    const storage = new ManagedSlotStorage<{ id: number }>('res', 3);
    expect(storage.prefilled).toBe(false);
    expect(storage.isVacant(0)).toBe(true);
    expect(() => storage.read(0)).toThrow(SlotStateError);
  });

  it('release() returns a slot to vacant without touching the value', () => {
    const storage = new ManagedSlotStorage<{ id: number }>('res', 2);
    const value   = { id: 1 };
    storage.write(0, value);
    expect(storage.read(0)).toBe(value);
    storage.release(0);
    expect(storage.isVacant(0)).toBe(true);
    expect(value).toEqual({ id: 1 });
  });

  it('copyWithin carries vacancy along', () => {
    const storage = new ManagedSlotStorage<string>('res', 3);
    storage.write(0, 'a');
    storage.copyWithin(1, 0, 2);
    expect(storage.read(1)).toBe('a');
    expect(storage.isVacant(2)).toBe(true);
  });
});
