/**
 * Dotted-path helpers for the JSON data bag.
 * Paths look like `research.sources[0].url`.
 */

export type PathSegment = string | number;

/** JSON-compatible value stored in run state */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

const SEGMENT_PATTERN = /([^.[\]]+)|\[(\d+)\]/g;

/**
 * Split a dotted path into segments. Bracketed integers become numbers.
 */
export function parsePath(path: string | PathSegment[]): PathSegment[] {
    if (Array.isArray(path)) return path;
    const segments: PathSegment[] = [];
    for (const match of path.matchAll(SEGMENT_PATTERN)) {
        if (match[2] !== undefined) {
            segments.push(Number(match[2]));
        } else if (match[1] !== undefined) {
            segments.push(match[1]);
        }
    }
    return segments;
}

export function formatPath(segments: PathSegment[]): string {
    let out = '';
    for (const segment of segments) {
        if (typeof segment === 'number') {
            out += `[${segment}]`;
        } else {
            out += out.length > 0 ? `.${segment}` : segment;
        }
    }
    return out;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a value; returns undefined for any missing link.
 */
export function getPath(root: unknown, path: string | PathSegment[]): unknown {
    let current: unknown = root;
    for (const segment of parsePath(path)) {
        if (Array.isArray(current)) {
            const index = typeof segment === 'number' ? segment : Number(segment);
            if (!Number.isInteger(index)) return undefined;
            current = current[index];
        } else if (isPlainObject(current)) {
            if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
            current = current[String(segment)];
        } else {
            return undefined;
        }
    }
    return current;
}

export function hasPath(root: unknown, path: string | PathSegment[]): boolean {
    return getPath(root, path) !== undefined;
}

/**
 * Write a value in place, creating intermediate objects (or arrays for
 * numeric segments) as needed.
 */
export function setPath(root: Record<string, unknown>, path: string | PathSegment[], value: unknown): void {
    const segments = parsePath(path);
    if (segments.length === 0) {
        throw new Error('Cannot set an empty path');
    }
    let current: unknown = root;
    for (let i = 0; i < segments.length - 1; i++) {
        const segment = segments[i];
        const nextIsIndex = typeof segments[i + 1] === 'number';
        const existing = readChild(current, segment);
        if (isPlainObject(existing) || Array.isArray(existing)) {
            current = existing;
            continue;
        }
        const created: unknown = nextIsIndex ? [] : {};
        writeChild(current, segment, created);
        current = created;
    }
    writeChild(current, segments[segments.length - 1], value);
}

/**
 * Remove a value in place. Returns whether anything was removed.
 */
export function deletePath(root: Record<string, unknown>, path: string | PathSegment[]): boolean {
    const segments = parsePath(path);
    if (segments.length === 0) return false;
    const parent = getPath(root, segments.slice(0, -1));
    const last = segments[segments.length - 1];
    if (Array.isArray(parent) && typeof last === 'number') {
        if (last >= parent.length) return false;
        parent.splice(last, 1);
        return true;
    }
    if (isPlainObject(parent) && Object.prototype.hasOwnProperty.call(parent, last)) {
        delete parent[String(last)];
        return true;
    }
    return false;
}

function readChild(container: unknown, segment: PathSegment): unknown {
    if (Array.isArray(container) && typeof segment === 'number') return container[segment];
    if (isPlainObject(container)) return container[String(segment)];
    return undefined;
}

function writeChild(container: unknown, segment: PathSegment, value: unknown): void {
    if (Array.isArray(container) && typeof segment === 'number') {
        container[segment] = value;
        return;
    }
    if (isPlainObject(container)) {
        container[String(segment)] = value;
        return;
    }
    throw new Error(`Cannot write "${String(segment)}" into a non-container value`);
}

/**
 * Deep copy of JSON-like data (structuredClone keeps Dates and typed arrays).
 */
export function deepClone<T>(value: T): T {
    return structuredClone(value);
}

export function deepFreeze<T>(value: T): Readonly<T> {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Structural equality for JSON-like values.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (Array.isArray(a) && Array.isArray(b)) {
        return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
    }
    if (isPlainObject(a) && isPlainObject(b)) {
        const keysA = Object.keys(a);
        const keysB = Object.keys(b);
        return keysA.length === keysB.length && keysA.every(key => deepEqual(a[key], b[key]));
    }
    return false;
}

/**
 * Coerce an arbitrary value into JSON data: undefined and functions are
 * dropped, Dates become ISO strings, non-finite numbers become null.
 */
export function toJsonValue(value: unknown): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'bigint') return value.toString();
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return value.map(item => toJsonValue(item));
    if (isPlainObject(value)) {
        const result: JsonObject = {};
        for (const [key, child] of Object.entries(value)) {
            if (child === undefined || typeof child === 'function') continue;
            result[key] = toJsonValue(child);
        }
        return result;
    }
    return String(value);
}

export function toJsonObject(value: unknown): JsonObject {
    const json = toJsonValue(value);
    return isPlainObject(json) ? json : {};
}
