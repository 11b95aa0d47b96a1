/**
 * Typed guard expression tree.
 * Guards are parsed once at graph load and evaluated many times.
 */

import type { PathSegment } from '../../lib/paths';

/** Namespaces a guard path can read from */
export type GuardRoot = 'data' | 'counters' | 'parallel' | 'run' | 'routing';

export const GUARD_ROOTS: readonly GuardRoot[] = ['data', 'counters', 'parallel', 'run', 'routing'];

export type GuardLiteral = string | number | boolean | null;

export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type GuardFunction = 'len' | 'exists' | 'retries' | 'visits';

export const GUARD_FUNCTIONS: readonly GuardFunction[] = ['len', 'exists', 'retries', 'visits'];

export interface LiteralExpression {
    kind: 'literal';
    value: GuardLiteral;
}

export interface ListExpression {
    kind: 'list';
    items: GuardExpression[];
}

export interface PathExpression {
    kind: 'path';
    root: GuardRoot;
    segments: PathSegment[];
    /** Path as written, for messages */
    text: string;
}

export interface NotExpression {
    kind: 'not';
    operand: GuardExpression;
}

export interface LogicalExpression {
    kind: 'logical';
    operator: 'and' | 'or';
    left: GuardExpression;
    right: GuardExpression;
}

export interface CompareExpression {
    kind: 'compare';
    operator: CompareOperator;
    left: GuardExpression;
    right: GuardExpression;
}

export interface MembershipExpression {
    kind: 'membership';
    negated: boolean;
    item: GuardExpression;
    collection: GuardExpression;
}

export interface CallExpression {
    kind: 'call';
    fn: GuardFunction;
    args: GuardExpression[];
}

export type GuardExpression =
    | LiteralExpression
    | ListExpression
    | PathExpression
    | NotExpression
    | LogicalExpression
    | CompareExpression
    | MembershipExpression
    | CallExpression;

/** The always-true guard used for edges that declare none */
export const TRUE_GUARD: LiteralExpression = { kind: 'literal', value: true };
