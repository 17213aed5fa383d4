import type { Comparator } from './compare';
import type { Structural } from './hash';

/**
 * A key/value pair owned by a heap.
 *
 * Keys are changed only through {@link Heap.decreaseKey}; values may be
 * replaced freely. Two entries are equal when their keys and values are equal.
 */
export interface HeapEntry<K, V> extends Structural {
    readonly key: K;
    readonly value: V;
    /** Replaces the value, returning the previous one. */
    setValue(value: V): V;
    toString(): string;
}

/** Callback for {@link Heap.forEach}. */
export type Action<T> = (item: T) => void;

/**
 * Iterator that fails with a ConcurrentModificationError once the heap it
 * came from is structurally modified.
 */
export interface HeapIterator<T> extends IterableIterator<T> {
    hasNext(): boolean;
    /** Always throws: heap iterators are read-only. */
    remove(): never;
}

/**
 * Read-only, lazily evaluated projection of a heap's contents.
 */
export interface ReadonlyHeapCollection<T> extends Iterable<T>, Structural {
    readonly size: number;
    isEmpty(): boolean;
    contains(item: unknown): boolean;
    toArray(): T[];
    forEach(action: Action<T>): void;
    iterator(): HeapIterator<T>;
}

/**
 * Mergeable priority queue keyed by a total order.
 *
 * Entries returned from `insert` stay valid handles for `decreaseKey` and
 * `delete` until they leave the heap.
 */
export interface Heap<K, V> extends Iterable<HeapEntry<K, V>>, Structural {
    /** The comparator in use, or `null` for natural ordering. */
    readonly comparator: Comparator<K> | null;
    readonly size: number;
    isEmpty(): boolean;

    insert(key: K, value: V): HeapEntry<K, V>;
    /** Re-inserts every key/value pair of `other`, which is left untouched. */
    insertAll(other: Heap<K, V>): void;
    getMinimum(): HeapEntry<K, V>;
    extractMinimum(): HeapEntry<K, V>;
    decreaseKey(entry: HeapEntry<K, V>, key: K): void;
    delete(entry: HeapEntry<K, V>): void;
    /** Moves every entry of `other` into this heap; `other` is left empty. */
    union(other: Heap<K, V>): void;
    clear(): void;

    /** True iff this exact entry object currently belongs to this heap. */
    holdsEntry(entry: HeapEntry<K, V>): boolean;
    /** True iff some entry with an equal key and value is in this heap. */
    containsEntry(entry: HeapEntry<K, V>): boolean;

    iterator(): HeapIterator<HeapEntry<K, V>>;
    forEach(action: Action<HeapEntry<K, V>>): void;
    getKeys(): ReadonlyHeapCollection<K>;
    getValues(): ReadonlyHeapCollection<V>;
    getEntries(): ReadonlyHeapCollection<HeapEntry<K, V>>;

    toString(): string;
}
