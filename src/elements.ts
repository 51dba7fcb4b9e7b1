/**
 * static-vector — element type descriptors
 *
 *   scalar(kind)        trivial; typed-array storage, zero default
 *   plain(default)      trivial; array storage pre-filled with the default
 *   managed({...})      non-trivial; uninitialized storage, destroy() runs
 *                       exactly once per value that leaves the vector
 *
 * Use plain() only for values whose construction and destruction have no
 * observable effect (strings, frozen records). Anything that owns a resource,
 * or whose construction or destruction must be counted, belongs in managed().
 */

import { isBigIntKind, type BigIntKind, type NumberKind, type ScalarKind } from './constants';
import {
  ArraySlotStorage,
  BigIntSlotStorage,
  ManagedSlotStorage,
  NumericSlotStorage,
} from './storage';
import type { ElementType, StoragePlacement } from './types';

// ─── Scalar ───────────────────────────────────────────────────────────────────

export interface ScalarElementType<T extends number | bigint> extends ElementType<T, [value?: T]> {
  readonly kind: ScalarKind;
}

function numberElement(kind: NumberKind): ScalarElementType<number> {
  return {
    name:    kind,
    kind,
    trivial: true,
    create:  () => 0,
    emplace: (value = 0) => value,
    copy:    (value) => value,
    allocate: (capacity: number, placement?: StoragePlacement) =>
      new NumericSlotStorage(kind, capacity, placement),
  };
}

function bigintElement(kind: BigIntKind): ScalarElementType<bigint> {
  return {
    name:    kind,
    kind,
    trivial: true,
    create:  () => 0n,
    emplace: (value = 0n) => value,
    copy:    (value) => value,
    allocate: (capacity: number, placement?: StoragePlacement) =>
      new BigIntSlotStorage(kind, capacity, placement),
  };
}

/**
 * A typed-array element type. i64 / u64 hold bigint values; the others hold
 * numbers, stored with the wrapping or rounding of their typed array.
 */
export function scalar(kind: BigIntKind): ScalarElementType<bigint>;
export function scalar(kind: NumberKind): ScalarElementType<number>;
export function scalar(kind: ScalarKind): ScalarElementType<number> | ScalarElementType<bigint>;
export function scalar(kind: ScalarKind): ScalarElementType<number> | ScalarElementType<bigint> {
  return isBigIntKind(kind) ? bigintElement(kind) : numberElement(kind);
}

// ─── Plain ────────────────────────────────────────────────────────────────────

/**
 * A trivial element type over arbitrary values. Copies share the value, and
 * nothing is destroyed.
 */
export function plain<T>(defaultValue: T, name: string = 'plain'): ElementType<T, [value: T]> {
  return {
    name,
    trivial:  true,
    create:   () => defaultValue,
    emplace:  (value) => value,
    copy:     (value) => value,
    allocate: (capacity: number, placement?: StoragePlacement) =>
      new ArraySlotStorage(name, capacity, defaultValue, placement),
  };
}

// ─── Managed ──────────────────────────────────────────────────────────────────

export interface ManagedDefinition<T, A extends readonly unknown[]> {
  readonly name?: string;
  create(): T;
  /** In-place construction. Defaults to create(), ignoring arguments. */
  construct?: (...args: A) => T;
  copy(value: T): T;
  destroy?: (value: T) => void;
}

/**
 * A resource-owning element type. Its slots start vacant, and StaticVector
 * calls destroy() on every value it drops.
 */
export function managed<T, A extends readonly unknown[] = []>(
  definition: ManagedDefinition<T, A>,
): ElementType<T, A> {
  const name      = definition.name ?? 'managed';
  const construct: (...args: A) => T = definition.construct ?? (() => definition.create());

  return {
    name,
    trivial:  false,
    create:   () => definition.create(),
    emplace:  (...args: A) => construct(...args),
    copy:     (value: T) => definition.copy(value),
    allocate: (capacity: number, placement?: StoragePlacement) =>
      new ManagedSlotStorage<T>(name, capacity, placement),
    destroy:  definition.destroy,
  };
}
