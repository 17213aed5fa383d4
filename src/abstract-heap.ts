/**
 * @module skew-heap/abstract-heap
 * @description
 * Scaffolding shared by every heap family. A concrete heap supplies the
 * structural operations and a fail-fast iterator; everything here is
 * written purely against that iterator and the entry accessors:
 * - Entry value semantics (equals / hashCode / toString).
 * - Read-only lazy views over keys, values and entries.
 * - Multiset equality, order-independent hashing and `toString` for heaps.
 * - `insertAll`, `forEach` and `containsEntry`.
 */

import { naturalOrder, type Comparator } from './compare';
import { InvalidArgumentError, NullReferenceError, UnsupportedOperationError } from './errors';
import { hashValue, valueEquals } from './hash';
import type { Action, Heap, HeapEntry, HeapIterator, ReadonlyHeapCollection } from './heap';

const SELF_REFERENCE = '[self-reference]';

function render(owner: object, v: unknown): string {
    return v === owner ? SELF_REFERENCE : String(v);
}

function isHeapEntry(v: unknown): v is HeapEntry<unknown, unknown> {
    return typeof v === 'object' && v !== null && 'key' in v && 'value' in v
        && 'setValue' in v && typeof v.setValue === 'function';
}

function isSizedIterable(v: unknown): v is { readonly size: number } & Iterable<unknown> {
    return typeof v === 'object' && v !== null && 'size' in v && typeof v.size === 'number'
        && Symbol.iterator in v && typeof v[Symbol.iterator] === 'function';
}

function isHeap(v: unknown): v is AbstractHeap<unknown, unknown> {
    return v instanceof AbstractHeap;
}

// ============================================================================
// 1. ENTRY BASE
// ============================================================================

export abstract class AbstractHeapEntry<K, V> implements HeapEntry<K, V> {
    protected _key: K;
    protected _value: V;

    protected constructor(key: K, value: V) {
        this._key = key;
        this._value = value;
    }

    get key(): K { return this._key; }
    get value(): V { return this._value; }

    setValue(value: V): V {
        const previous = this._value;
        this._value = value;
        return previous;
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!isHeapEntry(other)) return false;
        return valueEquals(this._key, other.key) && valueEquals(this._value, other.value);
    }

    get hashCode(): number {
        const self: object = this;
        const hk = this._key === self ? 0 : hashValue(this._key);
        const hv = this._value === self ? 0 : hashValue(this._value);
        return (hk ^ hv) | 0;
    }

    toString(): string {
        return `${render(this, this._key)}->${render(this, this._value)}`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 2. COLLECTION VIEWS
// ============================================================================

class ProjectedIterator<E, T> implements HeapIterator<T> {
    constructor(
        private readonly source: HeapIterator<E>,
        private readonly project: (item: E) => T,
    ) {}

    hasNext(): boolean { return this.source.hasNext(); }

    next(): IteratorResult<T> {
        const r = this.source.next();
        if (r.done) return { done: true, value: undefined };
        return { done: false, value: this.project(r.value) };
    }

    remove(): never { throw new UnsupportedOperationError('Iterator.remove'); }

    [Symbol.iterator](): this { return this; }
}

/**
 * Stateless read-only projection of a heap. Every call walks the live heap
 * through a fresh fail-fast iterator; the view holds nothing but the heap
 * and the projection.
 */
export class HeapCollection<K, V, T> implements ReadonlyHeapCollection<T> {
    constructor(
        private readonly heap: AbstractHeap<K, V>,
        private readonly project: (entry: HeapEntry<K, V>) => T,
        private readonly lookup?: (item: unknown) => boolean,
    ) {}

    get size(): number { return this.heap.size; }
    isEmpty(): boolean { return this.heap.size === 0; }

    iterator(): HeapIterator<T> {
        return new ProjectedIterator(this.heap.iterator(), this.project);
    }

    [Symbol.iterator](): Iterator<T> { return this.iterator(); }

    contains(item: unknown): boolean {
        if (this.lookup !== undefined) return this.lookup(item);
        for (const el of this) {
            if (valueEquals(item, el)) return true;
        }
        return false;
    }

    toArray(): T[] {
        return Array.from(this);
    }

    forEach(action: Action<T>): void {
        if (action == null) throw new NullReferenceError('action');
        for (const el of this) action(el);
    }

    /**
     * Multiset equality against any sized iterable (another view, a Set, ...).
     * Each element pulled from this view must be matched and consumed by a
     * distinct equal element of `other`, so the cost is O(n^2).
     */
    equals(other: unknown): boolean {
        if (other === this) return true;
        if (!isSizedIterable(other)) return false;
        if (other.size !== this.size) return false;

        const mine = this.toArray();
        const theirs = Array.from(other);

        while (mine.length > 0) {
            const item = mine.shift();
            const idx = theirs.findIndex(candidate => valueEquals(item, candidate));
            if (idx < 0) return false;
            theirs.splice(idx, 1);
        }
        return theirs.length === 0;
    }

    /** XOR of element hashes, so it does not depend on iteration order. */
    get hashCode(): number {
        let h = 0;
        for (const el of this) h ^= hashValue(el);
        return h;
    }

    add(_item: T): never { throw new UnsupportedOperationError('add'); }
    addAll(_items: Iterable<T>): never { throw new UnsupportedOperationError('addAll'); }
    remove(_item: unknown): never { throw new UnsupportedOperationError('remove'); }
    clear(): never { throw new UnsupportedOperationError('clear'); }

    removeAll(items: Iterable<unknown>): never {
        if (items == null) throw new NullReferenceError('items');
        throw new UnsupportedOperationError('removeAll');
    }

    retainAll(items: Iterable<unknown>): never {
        if (items == null) throw new NullReferenceError('items');
        throw new UnsupportedOperationError('retainAll');
    }

    toString(): string {
        const parts: string[] = [];
        for (const el of this) parts.push(render(this, el));
        return `[${parts.join(', ')}]`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 3. HEAP BASE
// ============================================================================

export abstract class AbstractHeap<K, V> implements Heap<K, V> {
    abstract get comparator(): Comparator<K> | null;
    abstract get size(): number;

    abstract insert(key: K, value: V): HeapEntry<K, V>;
    abstract getMinimum(): HeapEntry<K, V>;
    abstract extractMinimum(): HeapEntry<K, V>;
    abstract decreaseKey(entry: HeapEntry<K, V>, key: K): void;
    abstract delete(entry: HeapEntry<K, V>): void;
    abstract union(other: Heap<K, V>): void;
    abstract clear(): void;
    abstract holdsEntry(entry: HeapEntry<K, V>): boolean;
    abstract iterator(): HeapIterator<HeapEntry<K, V>>;

    isEmpty(): boolean { return this.size === 0; }

    [Symbol.iterator](): Iterator<HeapEntry<K, V>> { return this.iterator(); }

    /** Compares keys with the heap's comparator, or natural order when it has none. */
    protected compareKeys(a: K, b: K): number {
        const cmp = this.comparator;
        return cmp === null ? naturalOrder(a, b) : cmp(a, b);
    }

    insertAll(other: Heap<K, V>): void {
        if (other == null) throw new NullReferenceError('other');
        if (other === this) throw new InvalidArgumentError('Cannot insert a heap into itself');
        if (other.isEmpty()) return;

        for (const entry of other.getEntries()) {
            this.insert(entry.key, entry.value);
        }
    }

    /**
     * Applies `action` to every entry. Structural changes made by the action
     * end the walk with a ConcurrentModificationError.
     */
    forEach(action: Action<HeapEntry<K, V>>): void {
        if (action == null) throw new NullReferenceError('action');
        const it = this.iterator();
        while (it.hasNext()) {
            const r = it.next();
            if (r.done) break;
            action(r.value);
        }
    }

    containsEntry(entry: HeapEntry<K, V>): boolean {
        if (entry == null) throw new NullReferenceError('entry');
        return this.containsEqualEntry(entry);
    }

    private containsEqualEntry(entry: HeapEntry<unknown, unknown>): boolean {
        for (const candidate of this) {
            if (candidate.equals(entry)) return true;
        }
        return false;
    }

    getKeys(): HeapCollection<K, V, K> {
        return new HeapCollection<K, V, K>(this, entry => entry.key);
    }

    getValues(): HeapCollection<K, V, V> {
        return new HeapCollection<K, V, V>(this, entry => entry.value);
    }

    getEntries(): HeapCollection<K, V, HeapEntry<K, V>> {
        return new HeapCollection<K, V, HeapEntry<K, V>>(
            this,
            entry => entry,
            item => isHeapEntry(item) && this.containsEqualEntry(item),
        );
    }

    /** Heaps of any family are equal when their entries are equal as multisets. */
    equals(other: unknown): boolean {
        if (other === this) return true;
        if (!isHeap(other)) return false;
        return this.getEntries().equals(other.getEntries());
    }

    /**
     * XOR of entry hashes. A key or value that is the heap itself counts as 0,
     * matching the `[self-reference]` marker of `toString`. `equals` has no
     * such guard, so comparing two distinct heaps that each contain
     * themselves does not terminate.
     */
    get hashCode(): number {
        const self: object = this;
        let h = 0;
        for (const entry of this) {
            if (entry.key !== self && entry.value !== self) {
                h ^= entry.hashCode;
                continue;
            }
            const hk = entry.key === self ? 0 : hashValue(entry.key);
            const hv = entry.value === self ? 0 : hashValue(entry.value);
            h ^= (hk ^ hv) | 0;
        }
        return h;
    }

    toString(): string {
        const parts: string[] = [];
        for (const entry of this) {
            parts.push(`${render(this, entry.key)}->${render(this, entry.value)}`);
        }
        return `${this.constructor.name}(${this.size}) [${parts.join(', ')}]`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
