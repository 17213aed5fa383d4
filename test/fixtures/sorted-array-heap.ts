import {
    AbstractHeap,
    AbstractHeapEntry,
    ConcurrentModificationError,
    EmptyHeapError,
    InvalidArgumentError,
    NullReferenceError,
    TypeMismatchError,
    UnsupportedOperationError,
    type Comparator,
    type Heap,
    type HeapEntry,
    type HeapIterator,
} from '../../src/index';

class ArrayEntry<K, V> extends AbstractHeapEntry<K, V> {
    owner: SortedArrayHeap<K, V> | null;

    constructor(key: K, value: V, owner: SortedArrayHeap<K, V>) {
        super(key, value);
        this.owner = owner;
    }

    setKey(key: K): void {
        this._key = key;
    }
}

function isArrayEntry<K, V>(entry: HeapEntry<K, V>): entry is ArrayEntry<K, V> {
    return entry instanceof ArrayEntry;
}

/**
 * A second heap family for tests: a sorted array behind the same contract.
 * Used to check cross-family equality and union type checks.
 */
export class SortedArrayHeap<K, V> extends AbstractHeap<K, V> {
    private items: ArrayEntry<K, V>[] = [];
    private modCount = 0;

    constructor(private readonly cmp: Comparator<K> | null = null) {
        super();
    }

    get comparator(): Comparator<K> | null { return this.cmp; }
    get size(): number { return this.items.length; }

    insert(key: K, value: V): HeapEntry<K, V> {
        const entry = new ArrayEntry(key, value, this);
        this.place(entry);
        this.modCount++;
        return entry;
    }

    getMinimum(): HeapEntry<K, V> {
        if (this.items.length === 0) throw new EmptyHeapError();
        return this.items[0];
    }

    extractMinimum(): HeapEntry<K, V> {
        const entry = this.items.shift();
        if (entry === undefined) throw new EmptyHeapError();
        entry.owner = null;
        this.modCount++;
        return entry;
    }

    decreaseKey(entry: HeapEntry<K, V>, key: K): void {
        const e = this.held(entry);
        if (this.compareKeys(key, e.key) > 0) throw new InvalidArgumentError('key increase');
        this.items.splice(this.items.indexOf(e), 1);
        e.setKey(key);
        this.place(e);
        this.modCount++;
    }

    delete(entry: HeapEntry<K, V>): void {
        const e = this.held(entry);
        this.items.splice(this.items.indexOf(e), 1);
        e.owner = null;
        this.modCount++;
    }

    union(other: Heap<K, V>): void {
        if (!(other instanceof SortedArrayHeap)) throw new TypeMismatchError('SortedArrayHeap only unions with its own kind');
        this.insertAll(other);
        other.clear();
    }

    clear(): void {
        for (const e of this.items) e.owner = null;
        this.items = [];
        this.modCount++;
    }

    holdsEntry(entry: HeapEntry<K, V>): boolean {
        if (entry == null) throw new NullReferenceError('entry');
        return isArrayEntry(entry) && entry.owner === this;
    }

    iterator(): HeapIterator<HeapEntry<K, V>> {
        const expected = this.modCount;
        const items = this.items;
        let i = 0;
        const check = (): void => {
            if (this.modCount !== expected) throw new ConcurrentModificationError();
        };
        return {
            hasNext: () => {
                check();
                return i < items.length;
            },
            next: (): IteratorResult<HeapEntry<K, V>> => {
                check();
                return i < items.length ? { done: false, value: items[i++] } : { done: true, value: undefined };
            },
            remove: () => {
                throw new UnsupportedOperationError('Iterator.remove');
            },
            [Symbol.iterator]() {
                return this;
            },
        };
    }

    private place(entry: ArrayEntry<K, V>): void {
        let i = 0;
        while (i < this.items.length && this.compareKeys(this.items[i].key, entry.key) <= 0) i++;
        this.items.splice(i, 0, entry);
    }

    private held(entry: HeapEntry<K, V>): ArrayEntry<K, V> {
        if (entry == null) throw new NullReferenceError('entry');
        if (!isArrayEntry(entry) || entry.owner !== this) throw new InvalidArgumentError('Entry is not held by this heap');
        return entry;
    }
}
