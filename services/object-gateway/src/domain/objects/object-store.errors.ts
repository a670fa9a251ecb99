import type { ByteRange } from './content-range';

export type ObjectStoreErrorCode =
  | 'OBJECT_NOT_FOUND'
  | 'RANGE_NOT_SATISFIABLE'
  | 'MALFORMED_OBJECT_RESPONSE'
  | 'OBJECT_CHANGED'
  | 'INVALID_SEEK'
  | 'INVALID_OBJECT_KEY'
  | 'UNSUPPORTED_OPERATION';

export abstract class ObjectStoreError extends Error {
  abstract readonly code: ObjectStoreErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ObjectNotFoundError extends ObjectStoreError {
  readonly code = 'OBJECT_NOT_FOUND';

  constructor(
    readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(`Object "${key}" does not exist.`, options);
  }
}

/**
 * The store rejected a byte range. Zero-length objects reject every range,
 * which is why the reader recovers from this on its first fetch.
 */
export class RangeNotSatisfiableError extends ObjectStoreError {
  readonly code = 'RANGE_NOT_SATISFIABLE';

  constructor(
    readonly key: string,
    readonly range: ByteRange,
    options?: { cause?: unknown },
  ) {
    super(`Range bytes=${range.start}-${range.end} is not satisfiable for object "${key}".`, options);
  }
}

export class MalformedObjectResponseError extends ObjectStoreError {
  readonly code = 'MALFORMED_OBJECT_RESPONSE';

  constructor(
    readonly key: string,
    readonly reason: string,
  ) {
    super(`Malformed response for object "${key}": ${reason}`);
  }
}

export class ObjectChangedError extends ObjectStoreError {
  readonly code = 'OBJECT_CHANGED';

  constructor(
    readonly key: string,
    readonly reason: string,
  ) {
    super(`Object "${key}" changed during read: ${reason}`);
  }
}

export class InvalidSeekError extends ObjectStoreError {
  readonly code = 'INVALID_SEEK';

  constructor(message: string) {
    super(message);
  }
}

export class InvalidObjectKeyError extends ObjectStoreError {
  readonly code = 'INVALID_OBJECT_KEY';

  constructor(
    readonly key: string,
    reason: string,
  ) {
    super(`Invalid object key "${key}": ${reason}`);
  }
}

export class UnsupportedOperationError extends ObjectStoreError {
  readonly code = 'UNSUPPORTED_OPERATION';

  constructor(
    readonly operation: string,
    readonly driver: string,
  ) {
    super(`Operation "${operation}" is not supported by the ${driver} object store.`);
  }
}
