/**
 * static-vector — error types
 *
 * Every precondition failure raised by StaticVector is a StaticVectorError
 * subclass carrying a stable `code`. Out-of-range indices are the exception:
 * they raise the platform RangeError, the same as a typed-array view would.
 */

export type StaticVectorErrorCode =
  | 'CAPACITY_EXCEEDED'
  | 'EMPTY'
  | 'INVALID_CURSOR'
  | 'VACANT_SLOT'
  | 'LAYOUT';

export class StaticVectorError extends Error {
  readonly code: StaticVectorErrorCode;

  constructor(code: StaticVectorErrorCode, message: string) {
    super(message);
    this.name = 'StaticVectorError';
    this.code = code;
  }
}

/**
 * Thrown when an operation would leave more elements than the vector's
 * capacity: push / emplace / insert on a full vector, resize or assign past
 * capacity, or a copy / move / swap whose source length does not fit.
 *
 * Cross-capacity conversions raise this even on unchecked vectors. A source
 * declared with a smaller capacity proves nothing about its runtime length
 * fitting the destination, and the reverse is also true.
 */
export class CapacityError extends StaticVectorError {
  constructor(message: string) {
    super('CAPACITY_EXCEEDED', message);
    this.name = 'CapacityError';
  }
}

/** Thrown by pop / front / back on a vector with length 0. */
export class EmptyVectorError extends StaticVectorError {
  constructor(message: string) {
    super('EMPTY', message);
    this.name = 'EmptyVectorError';
  }
}

/**
 * Thrown when a cursor is used after its vector changed length or shifted
 * elements, or when a cursor is passed as a position to a vector that did
 * not hand it out.
 */
export class CursorError extends StaticVectorError {
  constructor(message: string) {
    super('INVALID_CURSOR', message);
    this.name = 'CursorError';
  }
}

/** Thrown when a managed slot that holds no live object is read. */
export class SlotStateError extends StaticVectorError {
  constructor(message: string) {
    super('VACANT_SLOT', message);
    this.name = 'SlotStateError';
  }
}

/**
 * Thrown when a scalar block cannot be placed in a caller-supplied buffer:
 * the byte offset is misaligned for the slot width, or the block runs past
 * the end of the buffer. Also thrown when a buffer is supplied for an element
 * type that is not scalar.
 */
export class StorageLayoutError extends StaticVectorError {
  constructor(message: string) {
    super('LAYOUT', message);
    this.name = 'StorageLayoutError';
  }
}
