/**
 * @module skew-heap/serialize
 * Flatten a heap to its key/value pairs and rebuild it by re-insertion.
 *
 * The saved form keeps the logical multiset only: tree shape and entry
 * identity are not preserved, so a restored heap `equals` the original but
 * holds none of its entry objects. Comparators are functions and cannot be
 * saved; the form records only whether natural ordering was in use, and a
 * heap saved with a custom comparator needs one supplied again on restore.
 */

import type { Comparator } from './compare';
import { ConcurrentModificationError, HeapError, NullReferenceError, SerializationError } from './errors';
import type { Heap } from './heap';
import { SkewHeap } from './skew-heap';
import { asNonNegativeInt, isPair, isRecord, pushErr } from './validation';

export type OrderMarker = 'natural' | 'custom';

export interface SerializedHeap<K, V> {
    readonly order: OrderMarker;
    readonly size: number;
    readonly entries: ReadonlyArray<readonly [K, V]>;
}

export interface EntryEncoder<K, V, SK, SV> {
    encodeKey(key: K): SK;
    encodeValue(value: V): SV;
}

export interface EntryDecoder<K, V> {
    decodeKey(raw: unknown): K;
    decodeValue(raw: unknown): V;
}

// ============================================================================
// 1. SAVE
// ============================================================================

/**
 * Flattens `heap` in iteration order. A structural change while flattening
 * (for instance from inside an encoder) raises SerializationError with the
 * ConcurrentModificationError as its cause.
 */
export function serializeHeap<K, V>(heap: Heap<K, V>): SerializedHeap<K, V>;
export function serializeHeap<K, V, SK, SV>(heap: Heap<K, V>, encoder: EntryEncoder<K, V, SK, SV>): SerializedHeap<SK, SV>;
export function serializeHeap<K, V>(
    heap: Heap<K, V>,
    encoder?: EntryEncoder<K, V, unknown, unknown>,
): SerializedHeap<unknown, unknown> {
    if (heap == null) throw new NullReferenceError('heap');

    const size = heap.size;
    const entries: (readonly [unknown, unknown])[] = [];
    const it = heap.iterator();

    try {
        for (let r = it.next(); !r.done; r = it.next()) {
            const { key, value } = r.value;
            entries.push(encoder === undefined
                ? [key, value]
                : [encoder.encodeKey(key), encoder.encodeValue(value)]);
        }
    } catch (e) {
        if (e instanceof ConcurrentModificationError) {
            throw new SerializationError('Heap structure changed during serialization', { cause: e });
        }
        throw e;
    }

    return { order: heap.comparator === null ? 'natural' : 'custom', size, entries };
}

/** JSON text of {@link serializeHeap}. Keys and values must be JSON-representable. */
export function stringifyHeap<K, V>(heap: Heap<K, V>, encoder?: EntryEncoder<K, V, unknown, unknown>): string {
    return JSON.stringify(encoder === undefined ? serializeHeap(heap) : serializeHeap(heap, encoder));
}

// ============================================================================
// 2. RESTORE
// ============================================================================

function isOrderMarker(v: unknown): v is OrderMarker {
    return v === 'natural' || v === 'custom';
}

function readSavedForm(data: unknown): SerializedHeap<unknown, unknown> {
    const problems: string[] = [];
    if (!isRecord(data)) {
        throw new SerializationError('Invalid serialized heap', { problems: ['$ must be an object'] });
    }

    const order = data.order;
    if (!isOrderMarker(order)) pushErr(problems, '$.order', 'must be one of: natural, custom');

    const size = asNonNegativeInt(data.size);
    if (size === undefined) pushErr(problems, '$.size', 'must be a non-negative integer');

    const raw = data.entries;
    const entries: (readonly [unknown, unknown])[] = [];
    if (!Array.isArray(raw)) {
        pushErr(problems, '$.entries', 'must be an array');
    } else {
        raw.forEach((pair: unknown, i) => {
            if (isPair(pair)) entries.push([pair[0], pair[1]]);
            else pushErr(problems, `$.entries[${i}]`, 'must be a [key, value] pair');
        });
        if (size !== undefined && raw.length !== size) {
            pushErr(problems, '$.size', `is ${size} but ${raw.length} entries were saved`);
        }
    }

    if (problems.length > 0 || size === undefined || !isOrderMarker(order)) {
        throw new SerializationError('Invalid serialized heap', { problems });
    }
    return { order, size, entries };
}

function restore<K, V>(form: SerializedHeap<K, V>, comparator: Comparator<K> | null | undefined): SkewHeap<K, V> {
    if (form.order === 'custom' && comparator == null) {
        throw new SerializationError('Heap was saved with a custom comparator; one must be supplied to restore it');
    }

    const heap = new SkewHeap<K, V>(form.order === 'custom' ? comparator : null);
    try {
        for (const [key, value] of form.entries) heap.insert(key, value);
    } catch (e) {
        if (e instanceof HeapError) {
            throw new SerializationError('Saved entries could not be re-inserted', { cause: e });
        }
        throw e;
    }
    return heap;
}

/**
 * Rebuilds a heap from its saved form. The shape is validated first, so
 * data that came from outside the process is safe to pass in. For
 * `order: 'natural'` any supplied comparator is ignored.
 */
export function deserializeHeap<K, V>(data: SerializedHeap<K, V>, comparator?: Comparator<K> | null): SkewHeap<K, V> {
    if (data == null) throw new NullReferenceError('data');
    readSavedForm(data);
    return restore(data, comparator);
}

/**
 * Parses JSON text produced by {@link stringifyHeap}. The decoder turns each
 * raw JSON key and value back into `K` and `V` (and should reject anything
 * it does not recognise).
 */
export function parseHeap<K, V>(text: string, decoder: EntryDecoder<K, V>, comparator?: Comparator<K> | null): SkewHeap<K, V> {
    if (decoder == null) throw new NullReferenceError('decoder');

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e) {
        throw new SerializationError('Serialized heap is not valid JSON', { cause: e });
    }

    const form = readSavedForm(parsed);
    const entries = form.entries.map(([k, v]): readonly [K, V] => [decoder.decodeKey(k), decoder.decodeValue(v)]);
    return restore({ order: form.order, size: form.size, entries }, comparator);
}
