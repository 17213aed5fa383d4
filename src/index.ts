/**
 * @module skew-heap
 * Mergeable priority queues with decrease-key, arbitrary delete and union.
 *
 * * Contracts:
 * - Keys are ordered by the heap's comparator, or by {@link naturalOrder}.
 * - Entry handles returned by `insert` stay valid until the entry leaves the heap.
 * - Single-threaded; iterators are fail-fast.
 * - Iteration order is structural, not sorted. Only repeated
 *   `extractMinimum` yields keys in order.
 */

import type { Comparator } from './compare';
import { SkewHeap } from './skew-heap';

export { AbstractHeap, AbstractHeapEntry, HeapCollection } from './abstract-heap';
export { naturalOrder } from './compare';
export type { Comparable, Comparator } from './compare';
export {
    ConcurrentModificationError,
    EmptyHeapError,
    HeapCorruptionError,
    HeapError,
    IncomparableError,
    InvalidArgumentError,
    NullReferenceError,
    SerializationError,
    TypeMismatchError,
    UnsupportedOperationError,
} from './errors';
export type { HeapErrorCode } from './errors';
export { hashValue, isStructural, valueEquals } from './hash';
export type { Structural } from './hash';
export type { Action, Heap, HeapEntry, HeapIterator, ReadonlyHeapCollection } from './heap';
export { HeapReference } from './reference';
export { deserializeHeap, parseHeap, serializeHeap, stringifyHeap } from './serialize';
export type { EntryDecoder, EntryEncoder, OrderMarker, SerializedHeap } from './serialize';
export { SkewHeap } from './skew-heap';

export function emptyHeap<K, V>(comparator?: Comparator<K> | null): SkewHeap<K, V> {
    return new SkewHeap<K, V>(comparator);
}

/** Builds a heap from key/value pairs, e.g. `heapOf([[3, 'c'], [1, 'a']])`. */
export function heapOf<K, V>(pairs: Iterable<readonly [K, V]>, comparator?: Comparator<K> | null): SkewHeap<K, V> {
    const heap = new SkewHeap<K, V>(comparator);
    for (const [key, value] of pairs) heap.insert(key, value);
    return heap;
}
