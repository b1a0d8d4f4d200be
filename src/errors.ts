export type LinkedHashMapErrorCode =
    | 'INVALID_ITERATOR'
    | 'INDEX_OUT_OF_BOUND'
    | 'NO_DEFAULT_VALUE'
    | 'INVALID_OPTION'
    | 'DESTROYED';

/**
 * Base class for every error raised by the map.
 * The map stays consistent after any of them is thrown.
 */
export class LinkedHashMapError extends Error {
    public readonly code: LinkedHashMapErrorCode;

    constructor(message: string, code: LinkedHashMapErrorCode) {
        super(message);
        this.name = 'LinkedHashMapError';
        this.code = code;
    }
}

/**
 * Raised when an iterator is moved past either end, dereferenced at end,
 * used after its node was erased, or handed to a map that does not own it.
 */
export class InvalidIteratorError extends LinkedHashMapError {
    constructor(message = 'Invalid iterator') {
        super(message, 'INVALID_ITERATOR');
        this.name = 'InvalidIteratorError';
    }
}

/** Raised by `at` when the key is absent. */
export class IndexOutOfBoundError extends LinkedHashMapError {
    constructor(message = 'Key not found') {
        super(message, 'INDEX_OUT_OF_BOUND');
        this.name = 'IndexOutOfBoundError';
    }
}
