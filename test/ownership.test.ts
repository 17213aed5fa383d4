import { describe, expect, it } from 'vitest';
import { HeapReference, NullReferenceError, SkewHeap, type HeapEntry } from '../src/index';
import { SortedArrayHeap } from './fixtures/sorted-array-heap';
import { drainKeys } from './helpers';

function filled(keys: readonly number[]): { heap: SkewHeap<number, string>; entries: HeapEntry<number, string>[] } {
    const heap = new SkewHeap<number, string>();
    const entries = keys.map(k => heap.insert(k, `v${k}`));
    return { heap, entries };
}

describe('holdsEntry', () => {
    it('is true for every entry the heap created', () => {
        const { heap, entries } = filled([4, 2, 6]);
        for (const e of entries) expect(heap.holdsEntry(e)).toBe(true);
    });

    it('is false once the entry was extracted or deleted', () => {
        const { heap, entries } = filled([1, 2, 3]);
        const min = heap.extractMinimum();
        expect(min).toBe(entries[0]);
        expect(heap.holdsEntry(min)).toBe(false);

        heap.delete(entries[2]);
        expect(heap.holdsEntry(entries[2])).toBe(false);
        expect(heap.holdsEntry(entries[1])).toBe(true);
    });

    it('is false for every former entry after clear', () => {
        const { heap, entries } = filled([1, 2, 3]);
        heap.clear();
        for (const e of entries) expect(heap.holdsEntry(e)).toBe(false);
        const fresh = heap.insert(0, 'v0');
        expect(heap.holdsEntry(fresh)).toBe(true);
    });

    it('is false for entries of another heap, even equal ones', () => {
        const a = filled([1]);
        const b = filled([1]);
        expect(a.heap.holdsEntry(b.entries[0])).toBe(false);
        expect(a.heap.containsEntry(b.entries[0])).toBe(true);
    });

    it('is false for entries of another heap family', () => {
        const { heap } = filled([1]);
        const foreign = new SortedArrayHeap<number, string>();
        const e = foreign.insert(1, 'v1');
        expect(heap.holdsEntry(e)).toBe(false);
        expect(heap.containsEntry(e)).toBe(true);
    });

    it('rejects null', () => {
        const { heap } = filled([1]);
        const loose: { holdsEntry(entry: unknown): boolean; containsEntry(entry: unknown): boolean } = heap;
        expect(() => loose.holdsEntry(null)).toThrow(NullReferenceError);
        expect(() => loose.containsEntry(undefined)).toThrow(NullReferenceError);
    });
});

describe('ownership across union', () => {
    it('transfers the donor entries to the recipient', () => {
        const a = filled([1, 3]);
        const b = filled([2, 4]);
        a.heap.union(b.heap);
        for (const e of b.entries) {
            expect(a.heap.holdsEntry(e)).toBe(true);
            expect(b.heap.holdsEntry(e)).toBe(false);
        }
    });

    it('entries inserted into the donor afterwards belong to the donor', () => {
        const a = filled([1]);
        const b = filled([2]);
        a.heap.union(b.heap);
        const late = b.heap.insert(5, 'late');
        expect(b.heap.holdsEntry(late)).toBe(true);
        expect(a.heap.holdsEntry(late)).toBe(false);
    });

    it('absorbed entries are released when the recipient is cleared', () => {
        const a = filled([1, 3]);
        const b = filled([2, 4]);
        a.heap.union(b.heap);
        a.heap.clear();
        for (const e of [...a.entries, ...b.entries]) {
            expect(a.heap.holdsEntry(e)).toBe(false);
            expect(b.heap.holdsEntry(e)).toBe(false);
        }
    });

    it('follows a chain of unions', () => {
        const a = filled([1]);
        const b = filled([2]);
        const c = filled([3]);
        a.heap.union(b.heap);
        c.heap.union(a.heap);
        for (const e of [...a.entries, ...b.entries, ...c.entries]) {
            expect(c.heap.holdsEntry(e)).toBe(true);
            expect(a.heap.holdsEntry(e)).toBe(false);
            expect(b.heap.holdsEntry(e)).toBe(false);
        }
        c.heap.decreaseKey(b.entries[0], 0);
        expect(drainKeys(c.heap)).toEqual([0, 1, 3]);
    });

    it('an absorbed entry leaves the recipient when extracted', () => {
        const a = filled([5]);
        const b = filled([1]);
        a.heap.union(b.heap);
        const min = a.heap.extractMinimum();
        expect(min).toBe(b.entries[0]);
        expect(a.heap.holdsEntry(min)).toBe(false);
        expect(a.heap.holdsEntry(a.entries[0])).toBe(true);
    });

    it('a heap reused after donating can donate again', () => {
        const a = filled([1]);
        const b = filled([2]);
        a.heap.union(b.heap);
        const again = b.heap.insert(3, 'v3');
        a.heap.union(b.heap);
        expect(a.heap.holdsEntry(again)).toBe(true);
        expect(a.heap.holdsEntry(b.entries[0])).toBe(true);
        expect(a.heap.size).toBe(3);
        a.heap.checkValid();
    });
});

describe('HeapReference', () => {
    it('resolves to its heap until released', () => {
        const owner = { name: 'a' };
        const ref = new HeapReference(owner);
        expect(ref.owner).toBe(owner);
        ref.release();
        expect(ref.owner).toBeNull();
    });

    it('forwards to the target owner', () => {
        const a = { name: 'a' };
        const b = { name: 'b' };
        const ra = new HeapReference(a);
        const rb = new HeapReference(b);
        rb.forwardTo(ra);
        expect(rb.owner).toBe(a);
        ra.release();
        expect(rb.owner).toBeNull();
    });

    it('ignores forwarding to a token that already resolves to the same root', () => {
        const a = { name: 'a' };
        const ra = new HeapReference(a);
        const rb = new HeapReference({ name: 'b' });
        rb.forwardTo(ra);
        ra.forwardTo(rb);
        expect(ra.owner).toBe(a);
        expect(rb.owner).toBe(a);
    });
});
