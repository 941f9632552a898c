/**
 * Helpers for walking parsed YAML/JSON values of unknown shape.
 */

export type DataRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is DataRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Name of a value's structural kind, matching the names Zod uses for `expected`. */
export function describeValue(value: unknown): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    return typeof value;
}

export interface PathLookup {
    found: boolean;
    value: unknown;
}

/** Resolve a Zod issue path inside the input document. */
export function lookupPath(data: unknown, path: readonly PropertyKey[]): PathLookup {
    let current: unknown = data;
    for (const segment of path) {
        if (Array.isArray(current) && typeof segment === "number") {
            if (segment < 0 || segment >= current.length) return { found: false, value: undefined };
            current = current[segment];
        } else if (isRecord(current) && typeof segment === "string") {
            if (!Object.hasOwn(current, segment)) return { found: false, value: undefined };
            current = current[segment];
        } else {
            return { found: false, value: undefined };
        }
    }
    return { found: current !== undefined, value: current };
}

export function joinPath(path: readonly PropertyKey[]): string {
    return path.map((segment) => String(segment)).join(".");
}

// --- Loose accessors used by the warning pass ---

export function field(data: unknown, key: string): unknown {
    return isRecord(data) ? data[key] : undefined;
}

export function hasField(data: unknown, key: string): boolean {
    return isRecord(data) && Object.hasOwn(data, key);
}

export function recordField(data: unknown, key: string): DataRecord | undefined {
    const value = field(data, key);
    return isRecord(value) ? value : undefined;
}

export function listField(data: unknown, key: string): unknown[] {
    const value = field(data, key);
    return Array.isArray(value) ? value : [];
}

/** Empty, absent or null in the way agents leave optional sections out. */
export function isBlank(value: unknown): boolean {
    if (value === undefined || value === null || value === "" || value === false || value === 0) return true;
    if (Array.isArray(value)) return value.length === 0;
    if (isRecord(value)) return Object.keys(value).length === 0;
    return false;
}
