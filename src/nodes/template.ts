/**
 * `{{path}}` placeholder rendering for prompts, queries and skill params.
 *
 * Roots: `data`, `memory` (alias for `data.memory`), `counters`, `run`.
 * A path with no recognised root is read from `data`.
 */

import type { JsonObject, JsonValue } from '../lib/paths';
import { getPath, isPlainObject, parsePath, toJsonValue } from '../lib/paths';
import { summarizeFacts } from '../memory/format';
import type { Fact } from '../memory/types';

const PLACEHOLDER = /\{\{\s*([^{}]+?)\s*\}\}/g;

export interface TemplateScope {
    data: unknown;
    counters?: unknown;
    run?: unknown;
}

export function resolveTemplatePath(scope: TemplateScope, path: string): unknown {
    const segments = parsePath(path.startsWith('state.') ? path.slice('state.'.length) : path);
    const [root, ...rest] = segments;
    switch (root) {
        case 'data':
            return getPath(scope.data, rest);
        case 'memory':
            return getPath(scope.data, ['memory', ...rest]);
        case 'counters':
            return getPath(scope.counters, rest);
        case 'run':
            return getPath(scope.run, rest);
        default:
            return getPath(scope.data, segments);
    }
}

/**
 * Replace every placeholder with the value it names. Missing values render
 * as an empty string; fact lists render as a bullet summary.
 */
export function renderTemplate(template: string, scope: TemplateScope): string {
    return template.replace(PLACEHOLDER, (_match, path: string) => formatValue(resolveTemplatePath(scope, path)));
}

/**
 * Render placeholders inside every string of a JSON structure. A string
 * that is exactly one placeholder takes the referenced value as is.
 */
export function renderValue(value: JsonValue, scope: TemplateScope): JsonValue {
    if (typeof value === 'string') {
        const whole = /^\{\{\s*([^{}]+?)\s*\}\}$/.exec(value);
        if (whole) {
            const resolved = resolveTemplatePath(scope, whole[1]);
            return resolved === undefined ? null : toJsonValue(resolved);
        }
        return renderTemplate(value, scope);
    }
    if (Array.isArray(value)) return value.map(item => renderValue(item, scope));
    if (isPlainObject(value)) {
        const out: JsonObject = {};
        for (const [key, child] of Object.entries(value)) {
            out[key] = renderValue(child, scope);
        }
        return out;
    }
    return value;
}

function formatValue(value: unknown): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (Array.isArray(value) && value.length > 0 && value.every(isFactLike)) {
        return summarizeFacts(value);
    }
    return JSON.stringify(value);
}

function isFactLike(value: unknown): value is Fact {
    return isPlainObject(value)
        && typeof value.factId === 'string'
        && typeof value.text === 'string'
        && typeof value.confidence === 'number'
        && typeof value.flagged === 'boolean';
}
