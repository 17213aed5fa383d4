export function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function asNonNegativeInt(v: unknown): number | undefined {
    return typeof v === 'number' && Number.isInteger(v) && v >= 0 ? v : undefined;
}

export function isPair(v: unknown): v is readonly [unknown, unknown] {
    return Array.isArray(v) && v.length === 2;
}

export function pushErr(problems: string[], path: string, message: string): void {
    problems.push(`${path} ${message}`);
}
