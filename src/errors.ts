/**
 * @module skew-heap/errors
 * Error taxonomy shared by every heap family.
 * Each class carries a stable `code` so callers can branch without `instanceof`.
 */

export type HeapErrorCode =
    | 'EMPTY_COLLECTION'
    | 'NULL_REFERENCE'
    | 'INVALID_ARGUMENT'
    | 'INCOMPARABLE'
    | 'TYPE_MISMATCH'
    | 'CONCURRENT_MODIFICATION'
    | 'UNSUPPORTED_OPERATION'
    | 'SERIALIZATION'
    | 'HEAP_CORRUPTION';

export abstract class HeapError extends Error {
    abstract readonly code: HeapErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Minimum requested from a heap of size 0. */
export class EmptyHeapError extends HeapError {
    readonly code = 'EMPTY_COLLECTION';

    constructor(message = 'Heap is empty') {
        super(message);
    }
}

export class NullReferenceError extends HeapError {
    readonly code = 'NULL_REFERENCE';

    constructor(readonly argument: string) {
        super(`Argument '${argument}' must not be null or undefined`);
    }
}

export class InvalidArgumentError extends HeapError {
    readonly code = 'INVALID_ARGUMENT';
}

export class IncomparableError extends HeapError {
    readonly code = 'INCOMPARABLE';
}

export class TypeMismatchError extends HeapError {
    readonly code = 'TYPE_MISMATCH';
}

export class ConcurrentModificationError extends HeapError {
    readonly code = 'CONCURRENT_MODIFICATION';

    constructor(message = 'Heap was structurally modified during iteration') {
        super(message);
    }
}

export class UnsupportedOperationError extends HeapError {
    readonly code = 'UNSUPPORTED_OPERATION';

    constructor(operation: string) {
        super(`Unsupported operation: ${operation}`);
    }
}

/**
 * Raised while saving or restoring a heap. A change detected during save
 * is attached as `cause`.
 */
export class SerializationError extends HeapError {
    readonly code = 'SERIALIZATION';

    constructor(message: string, options?: { cause?: unknown; problems?: readonly string[] }) {
        super(message, options);
        this.problems = options?.problems ?? [];
    }

    readonly problems: readonly string[];
}

export class HeapCorruptionError extends HeapError {
    readonly code = 'HEAP_CORRUPTION';
}
