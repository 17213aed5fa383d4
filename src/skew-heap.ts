/**
 * @module skew-heap/skew-heap
 * @description
 * Self-adjusting skew heap.
 *
 * A skew heap is a binary tree with no shape constraint at all beyond
 * heap-order. Every structural change goes through one primitive, `link`
 * (skew merge), which merges two heap-ordered trees and swaps the children
 * of each node on the merge path. The swap is what keeps the right spines
 * short on average: any single operation may cost O(n), but every sequence
 * of m operations costs O(m log n).
 *
 * * Operations in terms of `link`:
 * - insert: link the new entry with the root.
 * - extractMinimum: link the root's two children.
 * - decreaseKey: replace the entry by the link of its children, then link
 *   the entry (with its new key) back in at the root.
 * - delete: as decreaseKey, without linking the entry back.
 * - union: link the two roots.
 *
 * * Contracts:
 * - Single-threaded. Iterators are fail-fast: any structural change after
 *   an iterator was created makes it throw ConcurrentModificationError.
 * - Entries are owned by exactly one heap; ownership is answered in O(1)
 *   through a shared {@link HeapReference} token.
 */

import { AbstractHeap, AbstractHeapEntry } from './abstract-heap';
import type { Comparator } from './compare';
import {
    ConcurrentModificationError,
    EmptyHeapError,
    HeapCorruptionError,
    InvalidArgumentError,
    NullReferenceError,
    TypeMismatchError,
    UnsupportedOperationError,
} from './errors';
import type { Heap, HeapEntry, HeapIterator } from './heap';
import { HeapReference } from './reference';

// ============================================================================
// 1. ENTRY
// ============================================================================

class SkewHeapEntry<K, V> extends AbstractHeapEntry<K, V> {
    parent: SkewHeapEntry<K, V> | null = null;
    left: SkewHeapEntry<K, V> | null = null;
    right: SkewHeapEntry<K, V> | null = null;

    /** Token of the heap that created (or absorbed) this entry; null once it leaves. */
    private reference: HeapReference<SkewHeap<K, V>> | null;

    constructor(key: K, value: V, reference: HeapReference<SkewHeap<K, V>>) {
        super(key, value);
        this.reference = reference;
    }

    setKey(key: K): void {
        this._key = key;
    }

    isHeldBy(heap: SkewHeap<K, V>): boolean {
        return this.reference !== null && this.reference.owner === heap;
    }

    clearReference(): void {
        this.reference = null;
    }
}

/**
 * Links of every entry touched by a multi-step change, as they were before
 * it. `restore` puts the tree back exactly.
 */
class LinkJournal<K, V> {
    private readonly saved = new Map<SkewHeapEntry<K, V>, readonly [
        SkewHeapEntry<K, V> | null,
        SkewHeapEntry<K, V> | null,
        SkewHeapEntry<K, V> | null,
    ]>();

    record(entry: SkewHeapEntry<K, V> | null): void {
        if (entry !== null && !this.saved.has(entry)) {
            this.saved.set(entry, [entry.parent, entry.left, entry.right]);
        }
    }

    restore(): void {
        for (const [entry, [parent, left, right]] of this.saved) {
            entry.parent = parent;
            entry.left = left;
            entry.right = right;
        }
    }
}

function isSkewEntry<K, V>(entry: HeapEntry<K, V>): entry is SkewHeapEntry<K, V> {
    return entry instanceof SkewHeapEntry;
}

function isSkewHeap<K, V>(heap: Heap<K, V>): heap is SkewHeap<K, V> {
    return heap instanceof SkewHeap;
}

// ============================================================================
// 2. FAIL-FAST ITERATOR
// ============================================================================

/**
 * Pre-order successor: left child, else right child, else the right child
 * of the nearest ancestor entered from its left side.
 */
function successor<K, V>(entry: SkewHeapEntry<K, V>): SkewHeapEntry<K, V> | null {
    if (entry.left !== null) return entry.left;
    if (entry.right !== null) return entry.right;

    let child = entry;
    let parent = entry.parent;
    while (parent !== null) {
        if (parent.left === child && parent.right !== null) return parent.right;
        child = parent;
        parent = parent.parent;
    }
    return null;
}

class EntryIterator<K, V> implements HeapIterator<HeapEntry<K, V>> {
    private readonly expectedModCount: number;
    private cursor: SkewHeapEntry<K, V> | null;

    constructor(root: SkewHeapEntry<K, V> | null, private readonly modCount: () => number) {
        this.expectedModCount = modCount();
        this.cursor = root;
    }

    private checkForComodification(): void {
        if (this.modCount() !== this.expectedModCount) {
            throw new ConcurrentModificationError();
        }
    }

    hasNext(): boolean {
        this.checkForComodification();
        return this.cursor !== null;
    }

    next(): IteratorResult<HeapEntry<K, V>> {
        this.checkForComodification();
        const current = this.cursor;
        if (current === null) return { done: true, value: undefined };
        this.cursor = successor(current);
        return { done: false, value: current };
    }

    remove(): never { throw new UnsupportedOperationError('Iterator.remove'); }

    [Symbol.iterator](): this { return this; }
}

// ============================================================================
// 3. HEAP
// ============================================================================

export class SkewHeap<K, V> extends AbstractHeap<K, V> {
    private root: SkewHeapEntry<K, V> | null = null;
    private _size = 0;
    /** Bumped on every structural change; iterators compare against it. */
    private modCount = 0;
    private reference: HeapReference<SkewHeap<K, V>>;
    private readonly _comparator: Comparator<K> | null;

    /**
     * @param comparator - key ordering; omit (or pass null) for natural order.
     */
    constructor(comparator: Comparator<K> | null = null) {
        super();
        this._comparator = comparator;
        this.reference = new HeapReference<SkewHeap<K, V>>(this);
    }

    get comparator(): Comparator<K> | null { return this._comparator; }
    get size(): number { return this._size; }

    /**
     * Comparability with existing keys is only checked as the new entry is
     * merged in; an incomparable key throws and leaves the heap unchanged.
     */
    insert(key: K, value: V): HeapEntry<K, V> {
        const entry = new SkewHeapEntry(key, value, this.reference);
        this.root = this.link(this.root, entry);
        this._size++;
        this.modCount++;
        return entry;
    }

    getMinimum(): HeapEntry<K, V> {
        if (this.root === null) throw new EmptyHeapError();
        return this.root;
    }

    extractMinimum(): HeapEntry<K, V> {
        const min = this.root;
        if (min === null) throw new EmptyHeapError();

        const next = this.link(min.left, min.right);
        if (next !== null) next.parent = null;
        this.root = next;

        min.left = min.right = null;
        min.clearReference();

        this._size--;
        this.modCount++;
        return min;
    }

    /**
     * Lowers the key of a held entry. A key equal to the current one is
     * accepted and treated like any other decrease. If the comparator throws
     * part way through, the heap and the entry are left as they were.
     */
    decreaseKey(entry: HeapEntry<K, V>, key: K): void {
        if (entry == null) throw new NullReferenceError('entry');
        if (this.compareKeys(key, entry.key) > 0) {
            throw new InvalidArgumentError('New key must not be greater than the current key');
        }

        const node = this.held(entry);
        if (node === null) throw new InvalidArgumentError('Entry is not held by this heap');

        if (node === this.root) {
            // Still minimal: the key only went down.
            node.setKey(key);
            this.modCount++;
            return;
        }

        const previousKey = node.key;
        const previousRoot = this.root;
        const journal = new LinkJournal<K, V>();
        try {
            this.cut(node, journal);
            node.setKey(key);
            this.root = this.link(this.root, node, journal);
        } catch (e) {
            journal.restore();
            node.setKey(previousKey);
            this.root = previousRoot;
            throw e;
        }
        this.modCount++;
    }

    delete(entry: HeapEntry<K, V>): void {
        if (entry == null) throw new NullReferenceError('entry');

        const node = this.held(entry);
        if (node === null) throw new InvalidArgumentError('Entry is not held by this heap');

        if (node === this.root) {
            this.extractMinimum();
            return;
        }

        this.cut(node);
        node.clearReference();

        this._size--;
        this.modCount++;
    }

    /**
     * Moves every entry of `other` into this heap in O(log n) amortized time.
     * Entries keep their identity and become held by this heap. `other` is
     * always left empty, even when merging fails.
     */
    union(other: Heap<K, V>): void {
        if (other == null) throw new NullReferenceError('other');
        if (other === this) throw new InvalidArgumentError('Cannot union a heap with itself');
        if (!isSkewHeap(other)) {
            throw new TypeMismatchError(`Cannot union ${this.constructor.name} with ${other.constructor.name}`);
        }
        if (other.isEmpty()) return;

        try {
            this.root = this.link(this.root, other.root);

            other.reference.forwardTo(this.reference);
            other.reference = new HeapReference<SkewHeap<K, V>>(other);

            this._size += other._size;
            this.modCount++;
        } finally {
            other.clear();
        }
    }

    clear(): void {
        this.root = null;

        this.reference.release();
        this.reference = new HeapReference<SkewHeap<K, V>>(this);

        this._size = 0;
        this.modCount++;
    }

    holdsEntry(entry: HeapEntry<K, V>): boolean {
        if (entry == null) throw new NullReferenceError('entry');
        return this.held(entry) !== null;
    }

    iterator(): HeapIterator<HeapEntry<K, V>> {
        return new EntryIterator(this.root, () => this.modCount);
    }

    /**
     * Walks the whole tree and throws HeapCorruptionError on the first broken
     * invariant: root parent, parent/child links, heap-order, ownership, size.
     * O(n); meant for tests and debugging.
     */
    checkValid(): void {
        const root = this.root;
        if (root === null) {
            if (this._size !== 0) throw new HeapCorruptionError(`size mismatch: empty tree but stored ${this._size}`);
            return;
        }
        if (root.parent !== null) throw new HeapCorruptionError('root has a parent');

        let count = 0;
        const stack: SkewHeapEntry<K, V>[] = [root];

        while (stack.length > 0) {
            const node = stack.pop();
            if (node === undefined) break;
            if (++count > this._size) {
                throw new HeapCorruptionError(`size mismatch: more than ${this._size} entries reachable`);
            }
            if (!node.isHeldBy(this)) throw new HeapCorruptionError(`entry ${node} is not held by this heap`);
            if (node.left !== null && node.left === node.right) {
                throw new HeapCorruptionError(`entry ${node} has the same child on both sides`);
            }

            for (const child of [node.left, node.right]) {
                if (child === null) continue;
                if (child.parent !== node) throw new HeapCorruptionError(`entry ${child} has a wrong parent link`);
                if (this.compareKeys(node.key, child.key) > 0) {
                    throw new HeapCorruptionError(`heap-order violated: ${node} above ${child}`);
                }
                stack.push(child);
            }
        }

        if (count !== this._size) {
            throw new HeapCorruptionError(`size mismatch: counted ${count} but stored ${this._size}`);
        }
    }

    private held(entry: HeapEntry<K, V>): SkewHeapEntry<K, V> | null {
        return isSkewEntry(entry) && entry.isHeldBy(this) ? entry : null;
    }

    /**
     * Removes a non-root entry from the tree, splicing the link of its
     * children into its slot. Leaves the entry with no links at all.
     */
    private cut(node: SkewHeapEntry<K, V>, journal?: LinkJournal<K, V>): void {
        const parent = node.parent;
        journal?.record(node);
        journal?.record(parent);
        const replacement = this.link(node.left, node.right, journal);

        journal?.record(replacement);
        if (replacement !== null) replacement.parent = parent;
        if (parent !== null) {
            if (parent.left === node) parent.left = replacement;
            else parent.right = replacement;
        }

        node.parent = node.left = node.right = null;
    }

    /**
     * Skew merge of two heap-ordered trees; returns the merged root.
     *
     * Walking down, the smaller of the two current roots keeps its place:
     * its left child moves to the right, and its old right subtree becomes
     * the next merge candidate. The merge path is kept on an explicit stack
     * and the left links are rebuilt bottom-up, so native stack depth does not
     * grow with tree height. The returned root's parent link is left as is.
     *
     * If the comparator throws, the swaps done so far are undone and both
     * trees are exactly as they were. A journal, when given, records every
     * entry whose links change so a caller can undo a completed merge too.
     */
    private link(
        first: SkewHeapEntry<K, V> | null,
        second: SkewHeapEntry<K, V> | null,
        journal?: LinkJournal<K, V>,
    ): SkewHeapEntry<K, V> | null {
        if (first === null) return second;
        if (second === null) return first;

        const path: SkewHeapEntry<K, V>[] = [];
        const detached: (SkewHeapEntry<K, V> | null)[] = [];

        let a: SkewHeapEntry<K, V> | null = first;
        let b: SkewHeapEntry<K, V> = second;

        try {
            while (a !== null) {
                let smaller: SkewHeapEntry<K, V>;
                let bigger: SkewHeapEntry<K, V>;
                if (this.compareKeys(a.key, b.key) < 0) {
                    smaller = a;
                    bigger = b;
                } else {
                    smaller = b;
                    bigger = a;
                }

                journal?.record(smaller);
                const rest = smaller.right;
                smaller.right = smaller.left;
                path.push(smaller);
                detached.push(rest);

                a = rest;
                b = bigger;
            }
        } catch (e) {
            for (let i = path.length - 1; i >= 0; i--) path[i].right = detached[i];
            throw e;
        }

        journal?.record(b);
        let merged = b;
        for (let i = path.length - 1; i >= 0; i--) {
            const node = path[i];
            node.left = merged;
            merged.parent = node;
            merged = node;
        }
        return merged;
    }
}
