/**
 * Declarative state writes (`writes:` on a node).
 */

import type { JsonValue } from '../lib/paths';
import { getPath, isPlainObject, parsePath, toJsonValue } from '../lib/paths';
import type { WriteRule } from '../graph/schema';
import type { StateTransaction } from '../state/run-state';

/** Values a `from` path can be rooted at */
export interface WriteSources {
    output: unknown;
    data: unknown;
    counters: unknown;
    run: unknown;
}

const SOURCE_ROOTS = new Set(['output', 'data', 'counters', 'memory', 'run']);

export function readSource(sources: WriteSources, path: string): unknown {
    const segments = parsePath(path);
    const [root, ...rest] = segments;
    if (typeof root !== 'string' || !SOURCE_ROOTS.has(root)) {
        return getPath(sources.output, segments);
    }
    switch (root) {
        case 'output':
            return getPath(sources.output, rest);
        case 'data':
            return getPath(sources.data, rest);
        case 'memory':
            return getPath(sources.data, ['memory', ...rest]);
        case 'counters':
            return getPath(sources.counters, rest);
        default:
            return getPath(sources.run, rest);
    }
}

export function applyTransform(value: unknown, transform: WriteRule['transform']): JsonValue {
    switch (transform) {
        case 'number': {
            const n = typeof value === 'number' ? value : Number(value);
            return Number.isFinite(n) ? n : null;
        }
        case 'string':
            return value === undefined || value === null
                ? ''
                : typeof value === 'string' ? value : JSON.stringify(value);
        case 'boolean':
            return value === 'false' ? false : Boolean(value);
        case 'length':
            if (typeof value === 'string' || Array.isArray(value)) return value.length;
            return isPlainObject(value) ? Object.keys(value).length : 0;
        case 'json':
            if (typeof value !== 'string') return toJsonValue(value);
            try {
                return toJsonValue(JSON.parse(value));
            } catch {
                return null;
            }
        default:
            return toJsonValue(value);
    }
}

/**
 * Stage every rule on the transaction. A rule whose `from` path is missing
 * is skipped. Returns the paths written.
 */
export function applyWriteRules(transaction: StateTransaction, rules: WriteRule[], sources: WriteSources): string[] {
    const written: string[] = [];
    for (const rule of rules) {
        let value: unknown;
        if (rule.from !== undefined) {
            value = readSource(sources, rule.from);
            if (value === undefined) continue;
        } else {
            value = rule.value ?? null;
        }
        const finalValue = applyTransform(value, rule.transform);

        switch (rule.mode ?? 'set') {
            case 'append':
                transaction.append(rule.path, finalValue);
                break;
            case 'merge':
                transaction.merge(rule.path, finalValue);
                break;
            default:
                transaction.set(rule.path, finalValue);
        }
        written.push(rule.path);
    }
    return written;
}

/**
 * Default handling for node output when a node declares no write rules:
 * an object output is merged into the data bag, anything else is stored
 * under the node's id.
 */
export function writeOutput(transaction: StateTransaction, nodeId: string, output: JsonValue): void {
    if (isPlainObject(output)) {
        transaction.merge('', output);
    } else {
        transaction.set(nodeId, output);
    }
}
