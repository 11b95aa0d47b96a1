/**
 * Guard expression language.
 */

export type {
    GuardExpression,
    GuardRoot,
    GuardLiteral,
    GuardFunction,
    CompareOperator,
    PathExpression,
    CallExpression,
} from './ast';
export { TRUE_GUARD, GUARD_ROOTS } from './ast';
export { tokenize } from './lexer';
export type { Token, TokenType } from './lexer';
export { parseGuard } from './parser';
export type { GuardScope } from './evaluate';
export {
    evaluateGuard,
    evaluateExpression,
    isTruthy,
    foldConstant,
    isConstantTrue,
} from './evaluate';
export { collectReferences } from './references';
export type { GuardReferences } from './references';
