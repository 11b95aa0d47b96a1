/**
 * Graph router: picks the next edge from the committed run state.
 *
 * Outgoing edges are tried in their precompiled order (ascending priority,
 * own edges before wildcards, then declaration order) and the first
 * eligible edge whose guard holds wins. Selecting a retry edge whose bound
 * is spent yields a forced transition to the failure terminal instead.
 */

import { RetryBoundExceededError } from '../lib/errors';
import type { JsonObject } from '../lib/paths';
import { deepEqual, getPath } from '../lib/paths';
import { evaluateGuard } from '../graph/guard';
import type { CompiledEdge, CompiledGraph, CompiledNode } from '../graph/types';
import type { RunStateStore } from '../state/run-state';
import { normalizeDataPath } from '../state/run-state';

export interface EdgeCheck {
    edgeId: string;
    to: string;
    /** Guard result, absent when the edge was skipped before evaluation */
    passed?: boolean;
    skipped?: 'requirements-unmet' | 'decompose-not-ready' | 'decompose-budget-spent';
}

export type RouteDecision =
    | { kind: 'edge'; edge: CompiledEdge; checks: EdgeCheck[] }
    | {
        kind: 'forced';
        /** The retry edge that could not be taken, if any */
        edge?: CompiledEdge;
        target: number;
        reason: 'retry_bound_exceeded' | 'no_eligible_edge';
        error?: RetryBoundExceededError;
        checks: EdgeCheck[];
    };

export interface RouterOptions {
    maxTotalRetries: number;
}

/**
 * Whether a `depends` edge's requirements hold: the required nodes have
 * run (all of them, or any with `all: false`) and the required state
 * values are present.
 */
export function requirementsMet(edge: CompiledEdge, state: RunStateStore): boolean {
    const requires = edge.definition.requires;
    if (!requires) return true;

    const visited = (nodeId: string): boolean => (state.counters.nodeVisits[nodeId] ?? 0) > 0;
    const nodes = requires.nodes ?? [];
    if (nodes.length > 0) {
        const ok = requires.all === false ? nodes.some(visited) : nodes.every(visited);
        if (!ok) return false;
    }

    for (const [path, expected] of Object.entries(requires.state ?? {})) {
        if (!deepEqual(state.get(normalizeDataPath(path)), expected)) return false;
    }
    return true;
}

/** Tasks already spawned by a node across the run */
export function spawnedBy(state: RunStateStore, nodeId: string): number {
    return state.tasksSpawnedBy(nodeId).length;
}

function decomposeCheck(edge: CompiledEdge, state: RunStateStore): EdgeCheck['skipped'] | undefined {
    const decompose = edge.definition.decompose;
    if (!decompose) return undefined;
    if ((state.counters.nodeVisits[decompose.parent] ?? 0) === 0) return 'decompose-not-ready';
    if (decompose.maxChildren !== undefined && spawnedBy(state, edge.to) >= decompose.maxChildren) {
        return 'decompose-budget-spent';
    }
    return undefined;
}

/**
 * Choose the next edge for `node`. Pure: retry counters are applied by
 * the controller on traversal.
 */
export function selectEdge(
    graph: CompiledGraph,
    node: CompiledNode,
    state: RunStateStore,
    options: RouterOptions,
): RouteDecision {
    const scope = state.guardScope();
    let candidates = node.outgoing.map(i => graph.edges[i]);

    if (node.type === 'decision') {
        const target = getPath(scope.routing, ['decisions', node.id, 'target']);
        if (typeof target === 'string') {
            candidates = [
                ...candidates.filter(e => e.to === target),
                ...candidates.filter(e => e.to !== target),
            ];
        }
    }

    // Every candidate is listed, evaluated or not, so take rates can be measured
    const checks: EdgeCheck[] = candidates.map(edge => ({ edgeId: edge.id, to: edge.to }));
    for (const [i, edge] of candidates.entries()) {
        const check = checks[i];

        if (edge.kind === 'depends' && !requirementsMet(edge, state)) {
            check.skipped = 'requirements-unmet';
            continue;
        }
        if (edge.kind === 'decompose') {
            const skipped = decomposeCheck(edge, state);
            if (skipped) {
                check.skipped = skipped;
                continue;
            }
        }

        check.passed = evaluateGuard(edge.guard, scope);
        if (!check.passed) continue;

        if (edge.kind === 'retry') {
            const bound = edge.maxRetries ?? 0;
            if (state.retriesFor(edge.id) >= bound) {
                return forced(graph, edge, checks, new RetryBoundExceededError(edge.id, bound, 'edge'));
            }
            if (state.counters.totalRetries >= options.maxTotalRetries) {
                return forced(graph, edge, checks, new RetryBoundExceededError(edge.id, options.maxTotalRetries, 'global'));
            }
        }
        return { kind: 'edge', edge, checks };
    }

    // Unreachable for a validated graph: every node has a constant-true fallback
    return { kind: 'forced', target: graph.failureNode, reason: 'no_eligible_edge', checks };
}

function forced(
    graph: CompiledGraph,
    edge: CompiledEdge,
    checks: EdgeCheck[],
    error: RetryBoundExceededError,
): RouteDecision {
    return { kind: 'forced', edge, target: graph.failureNode, reason: 'retry_bound_exceeded', error, checks };
}

/** Audit form of the candidate list */
export function candidatesSignal(checks: EdgeCheck[]): JsonObject[] {
    return checks.map(check => {
        const entry: JsonObject = { edgeId: check.edgeId, to: check.to };
        if (check.passed !== undefined) entry.passed = check.passed;
        if (check.skipped) entry.skipped = check.skipped;
        return entry;
    });
}
