/**
 * @module skew-heap/hash
 * Value semantics for heap elements: deterministic hashing and equality.
 *
 * Primitives hash by content (FNV-1a), objects implementing {@link Structural}
 * delegate to their own `hashCode`, everything else hashes to 0 and compares
 * by identity.
 */

/**
 * Objects that define their own value semantics.
 * Heap entries, heaps and collection views all implement this.
 */
export interface Structural {
    readonly hashCode: number;
    equals(other: unknown): boolean;
}

// ============================================================================
// 1. HASHING (FNV-1a)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

function hashNumber(val: number): number {
    if ((val | 0) === val) return val | 0;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

export function isStructural(v: unknown): v is Structural {
    if (typeof v !== 'object' || v === null) return false;
    return 'hashCode' in v && typeof v.hashCode === 'number'
        && 'equals' in v && typeof v.equals === 'function';
}

/**
 * Computes a 32-bit hash code for any value.
 * Equal values (per {@link valueEquals}) always hash equal.
 */
export function hashValue(v: unknown): number {
    if (v === null || v === undefined) return 0;
    if (typeof v === 'number') return hashNumber(v);
    if (typeof v === 'string') return hashString(v);
    if (typeof v === 'boolean') return v ? 1231 : 1237;
    if (typeof v === 'bigint') return hashString(v.toString());
    if (v instanceof Date) return hashNumber(v.getTime());
    if (isStructural(v)) return v.hashCode;

    if (Array.isArray(v)) {
        let h = FNV_OFFSET;
        for (let i = 0; i < v.length; i++) {
            h ^= hashValue(v[i]);
            h = Math.imul(h, FNV_PRIME);
        }
        return h >>> 0;
    }
    return 0;
}

// ============================================================================
// 2. EQUALITY
// ============================================================================

/**
 * Value equality: primitives by content (NaN equals NaN), dates by time,
 * arrays element-wise, structural objects through `equals`, anything else
 * by identity.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
    if (Object.is(a, b) || a === b) return true;
    if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;

    if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
    if (isStructural(a)) return a.equals(b);

    if (Array.isArray(a) && Array.isArray(b)) {
        const len = a.length;
        if (len !== b.length) return false;
        for (let i = 0; i < len; i++) {
            if (!valueEquals(a[i], b[i])) return false;
        }
        return true;
    }
    return false;
}
