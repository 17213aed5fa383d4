import type { Heap } from '../src/index';

/** Small deterministic PRNG so randomized tests are reproducible. */
export function mulberry32(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) | 0;
        let t = Math.imul(a ^ (a >>> 15), 1 | a);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** `count` integer keys in [0, range), duplicates allowed. */
export function randomKeys(count: number, seed: number, range = count * 2): number[] {
    const next = mulberry32(seed);
    return Array.from({ length: count }, () => Math.floor(next() * range));
}

export function sortedCopy(keys: readonly number[]): number[] {
    return [...keys].sort((a, b) => a - b);
}

/** Extracts everything, returning keys in extraction order. */
export function drainKeys<K, V>(heap: Heap<K, V>): K[] {
    const out: K[] = [];
    while (!heap.isEmpty()) out.push(heap.extractMinimum().key);
    return out;
}

/** Keys in iteration (pre-order) order, without modifying the heap. */
export function iterationKeys<K, V>(heap: Heap<K, V>): K[] {
    return Array.from(heap, entry => entry.key);
}
