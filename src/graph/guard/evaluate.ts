/**
 * Total guard evaluation: every expression yields a value and never throws.
 * A missing path reads as `undefined`, which is falsy, has length 0, fails
 * every ordering comparison and equals only `null`.
 */

import { deepEqual, getPath, isPlainObject } from '../../lib/paths';
import type { GuardExpression, GuardRoot } from './ast';

/** Read-only view of run state handed to guards */
export type GuardScope = Readonly<Record<GuardRoot, unknown>>;

export function evaluateGuard(expression: GuardExpression, scope: GuardScope): boolean {
    return isTruthy(evaluate(expression, scope));
}

export function evaluateExpression(expression: GuardExpression, scope: GuardScope): unknown {
    return evaluate(expression, scope);
}

function evaluate(expression: GuardExpression, scope: GuardScope): unknown {
    switch (expression.kind) {
        case 'literal':
            return expression.value;
        case 'list':
            return expression.items.map(item => evaluate(item, scope));
        case 'path':
            return getPath(scope[expression.root], expression.segments);
        case 'not':
            return !isTruthy(evaluate(expression.operand, scope));
        case 'logical': {
            const left = isTruthy(evaluate(expression.left, scope));
            if (expression.operator === 'and') {
                return left && isTruthy(evaluate(expression.right, scope));
            }
            return left || isTruthy(evaluate(expression.right, scope));
        }
        case 'compare':
            return compare(expression.operator, evaluate(expression.left, scope), evaluate(expression.right, scope));
        case 'membership': {
            const found = contains(evaluate(expression.collection, scope), evaluate(expression.item, scope));
            return expression.negated ? !found : found;
        }
        case 'call':
            return call(expression.fn, expression.args, scope);
    }
}

function call(fn: 'len' | 'exists' | 'retries' | 'visits', args: GuardExpression[], scope: GuardScope): unknown {
    const [arg] = args;
    switch (fn) {
        case 'len':
            return lengthOf(evaluate(arg, scope));
        case 'exists': {
            const value = evaluate(arg, scope);
            return value !== undefined && value !== null;
        }
        case 'retries':
            return countFor(scope.counters, 'edgeRetries', evaluate(arg, scope));
        case 'visits':
            return countFor(scope.counters, 'nodeVisits', evaluate(arg, scope));
    }
}

function countFor(counters: unknown, table: string, id: unknown): number {
    if (typeof id !== 'string') return 0;
    const value = getPath(counters, [table, id]);
    return typeof value === 'number' ? value : 0;
}

export function isTruthy(value: unknown): boolean {
    if (value === undefined || value === null || value === false) return false;
    if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
    if (typeof value === 'string') return value.length > 0;
    if (Array.isArray(value)) return value.length > 0;
    if (isPlainObject(value)) return Object.keys(value).length > 0;
    return true;
}

function lengthOf(value: unknown): number {
    if (typeof value === 'string' || Array.isArray(value)) return value.length;
    if (isPlainObject(value)) return Object.keys(value).length;
    return 0;
}

function compare(operator: string, left: unknown, right: unknown): boolean {
    switch (operator) {
        case '==':
            return looselyEqual(left, right);
        case '!=':
            return !looselyEqual(left, right);
    }

    const ordered = orderOf(left, right);
    if (ordered === undefined) return false;
    switch (operator) {
        case '<':
            return ordered < 0;
        case '<=':
            return ordered <= 0;
        case '>':
            return ordered > 0;
        case '>=':
            return ordered >= 0;
        default:
            return false;
    }
}

function looselyEqual(left: unknown, right: unknown): boolean {
    const leftAbsent = left === undefined || left === null;
    const rightAbsent = right === undefined || right === null;
    if (leftAbsent || rightAbsent) return leftAbsent && rightAbsent;
    return deepEqual(left, right);
}

function orderOf(left: unknown, right: unknown): number | undefined {
    if (typeof left === 'number' && typeof right === 'number') {
        if (Number.isNaN(left) || Number.isNaN(right)) return undefined;
        return left - right;
    }
    if (typeof left === 'string' && typeof right === 'string') {
        return left < right ? -1 : left > right ? 1 : 0;
    }
    return undefined;
}

function contains(collection: unknown, item: unknown): boolean {
    if (Array.isArray(collection)) {
        return collection.some(entry => looselyEqual(entry, item));
    }
    if (typeof collection === 'string') {
        return typeof item === 'string' && collection.includes(item);
    }
    if (isPlainObject(collection)) {
        return typeof item === 'string' && Object.prototype.hasOwnProperty.call(collection, item);
    }
    return false;
}

/**
 * Fold an expression that reads no state.
 * Returns undefined when the value depends on run state.
 */
export function foldConstant(expression: GuardExpression): { value: unknown } | undefined {
    switch (expression.kind) {
        case 'literal':
            return { value: expression.value };
        case 'list': {
            const items: unknown[] = [];
            for (const item of expression.items) {
                const folded = foldConstant(item);
                if (!folded) return undefined;
                items.push(folded.value);
            }
            return { value: items };
        }
        case 'path':
            return undefined;
        case 'not': {
            const operand = foldConstant(expression.operand);
            return operand ? { value: !isTruthy(operand.value) } : undefined;
        }
        case 'logical': {
            const left = foldConstant(expression.left);
            const right = foldConstant(expression.right);
            // `x or true` and `false and x` are constant regardless of x
            if (expression.operator === 'or') {
                if ((left && isTruthy(left.value)) || (right && isTruthy(right.value))) return { value: true };
                if (left && right) return { value: false };
                return undefined;
            }
            if ((left && !isTruthy(left.value)) || (right && !isTruthy(right.value))) return { value: false };
            if (left && right) return { value: true };
            return undefined;
        }
        case 'compare': {
            const left = foldConstant(expression.left);
            const right = foldConstant(expression.right);
            if (!left || !right) return undefined;
            return { value: compare(expression.operator, left.value, right.value) };
        }
        case 'membership': {
            const item = foldConstant(expression.item);
            const collection = foldConstant(expression.collection);
            if (!item || !collection) return undefined;
            const found = contains(collection.value, item.value);
            return { value: expression.negated ? !found : found };
        }
        case 'call':
            return undefined;
    }
}

export function isConstantTrue(expression: GuardExpression): boolean {
    const folded = foldConstant(expression);
    return folded !== undefined && isTruthy(folded.value);
}
