import { IncomparableError } from './errors';

/**
 * Orders two keys. Negative if a < b, positive if a > b, 0 if equivalent.
 * Only the sign of the result is consulted.
 */
export type Comparator<K> = (a: K, b: K) => number;

/** Keys that define their own ordering. */
export interface Comparable<T> {
    compareTo(other: T): number;
}

function hasCompareTo(v: unknown): v is Comparable<unknown> {
    return typeof v === 'object' && v !== null && 'compareTo' in v && typeof v.compareTo === 'function';
}

function describe(v: unknown): string {
    if (v === null) return 'null';
    if (v instanceof Date) return 'Date';
    if (typeof v === 'object') return v.constructor?.name ?? 'object';
    return typeof v;
}

function incomparable(a: unknown, b: unknown): IncomparableError {
    return new IncomparableError(`Keys are not mutually comparable: ${describe(a)} and ${describe(b)}`);
}

/**
 * The ordering used by heaps constructed without a comparator.
 *
 * Supported kinds (both operands must share one):
 * - number (NaN is rejected)
 * - bigint
 * - string (UTF-16 code unit order)
 * - boolean (false < true)
 * - Date (by time value)
 * - objects with a `compareTo` method
 *
 * `null` and `undefined` are not orderable and raise {@link IncomparableError}
 * like any other mixed pair.
 */
export function naturalOrder(a: unknown, b: unknown): number {
    if (typeof a === 'number' && typeof b === 'number') {
        if (Number.isNaN(a) || Number.isNaN(b)) throw incomparable(a, b);
        return a < b ? -1 : a > b ? 1 : 0;
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
    if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
    if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);

    if (a instanceof Date && b instanceof Date) {
        const ta = a.getTime(), tb = b.getTime();
        if (Number.isNaN(ta) || Number.isNaN(tb)) throw incomparable(a, b);
        return ta - tb;
    }

    if (hasCompareTo(a) && hasCompareTo(b)) return a.compareTo(b);

    throw incomparable(a, b);
}
