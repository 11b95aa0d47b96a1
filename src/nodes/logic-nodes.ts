/**
 * gate and decision nodes. Pure logic over run state, no external calls.
 */

import type { JsonObject, JsonValue } from '../lib/paths';
import { deepEqual, toJsonValue } from '../lib/paths';
import type { GuardScope } from '../graph/guard';
import { evaluateExpression, evaluateGuard } from '../graph/guard';
import type { CompiledDecisionRule, DecisionTest } from '../graph/types';
import type { NodeContext, NodeExecutor } from './types';

/** Guard scope that also sees this node's staged writes */
export function stagedScope(context: NodeContext): GuardScope {
    return { ...context.state.guardScope(), data: context.transaction.read('') };
}

// ============================================================================
// Gate
// ============================================================================

export const executeGate: NodeExecutor = async context => {
    const { node, transaction, state } = context;
    const scope = stagedScope(context);
    const results: JsonObject = {};
    for (const criterion of node.criteria) {
        results[criterion.name] = evaluateGuard(criterion.check, scope);
    }

    const values = Object.values(results);
    const requireAll = node.definition.gate?.requireAll ?? true;
    const passed = requireAll ? values.every(Boolean) : values.some(Boolean);

    transaction.set(`gates.${node.id}`, { passed, results });
    state.appendAudit(node.id, 'gate_evaluated', `Gate ${node.id} ${passed ? 'passed' : 'failed'}`, { passed, results });

    return {
        summary: `Gate ${passed ? 'passed' : 'failed'}`,
        output: { passed, results },
        signals: { passed },
    };
};

// ============================================================================
// Decision
// ============================================================================

function compareValues(operator: string, left: unknown, right: JsonValue): boolean {
    switch (operator) {
        case '==':
            return deepEqual(left, right) || (left === undefined && right === null);
        case '!=':
            return !(deepEqual(left, right) || (left === undefined && right === null));
    }
    let order: number;
    if (typeof left === 'number' && typeof right === 'number') {
        order = left - right;
    } else if (typeof left === 'string' && typeof right === 'string') {
        order = left < right ? -1 : left > right ? 1 : 0;
    } else {
        return false;
    }
    switch (operator) {
        case '<': return order < 0;
        case '<=': return order <= 0;
        case '>': return order > 0;
        case '>=': return order >= 0;
        default: return false;
    }
}

export function matchesRule(test: DecisionTest, value: unknown, scope: GuardScope): boolean {
    switch (test.kind) {
        case 'default':
            return true;
        case 'compare':
            return compareValues(test.operator, value, test.value);
        case 'range':
            return typeof value === 'number'
                && (test.min === undefined || value >= test.min)
                && (test.max === undefined || value <= test.max);
        case 'equals':
            return deepEqual(value, test.value);
        case 'guard':
            return evaluateGuard(test.expression, scope);
    }
}

/**
 * First matching rule in order. An unmet precondition selects the
 * default rule directly.
 */
export function selectRule(context: NodeContext, scope: GuardScope): { rule: CompiledDecisionRule; value: unknown; preconditionMet: boolean } {
    const { node } = context;
    const rules = node.decisionRules;
    const fallback = rules.find(r => r.test.kind === 'default') ?? rules[rules.length - 1];
    const value = node.variable ? evaluateExpression(node.variable, scope) : undefined;

    if (node.precondition && !evaluateGuard(node.precondition, scope)) {
        return { rule: fallback, value, preconditionMet: false };
    }
    const rule = rules.find(r => matchesRule(r.test, value, scope)) ?? fallback;
    return { rule, value, preconditionMet: true };
}

export const executeDecision: NodeExecutor = async context => {
    const { node, transaction, state } = context;
    const scope = stagedScope(context);
    const { rule, value, preconditionMet } = selectRule(context, scope);

    const decision: JsonObject = {
        target: rule.target,
        value: value === undefined ? null : toJsonValue(value),
        rule: rule.test.kind,
        preconditionMet,
    };
    transaction.route(`decisions.${node.id}`, decision);
    state.appendAudit(node.id, 'decision_made', `Decision ${node.id} -> ${rule.target}`, decision);

    return { summary: `Decided ${rule.target}`, output: decision, signals: { target: rule.target } };
};
