import { describe, it, expect } from 'vitest';
import { compileGraph } from '../../../src/graph/loader';
import type { CompiledGraph, CompiledNode } from '../../../src/graph/types';
import type { GraphDocument } from '../../../src/graph/schema';
import { RunStateStore } from '../../../src/state/run-state';
import { candidatesSignal, requirementsMet, selectEdge } from '../../../src/runtime/router';
import type { RouteDecision } from '../../../src/runtime/router';
import { RetryBoundExceededError } from '../../../src/lib/errors';
import type { JsonObject } from '../../../src/lib/paths';
import { priorityGraph, retryGraph } from '../../mocks/graphs';

const OPTIONS = { maxTotalRetries: 25 };

function storeFor(graph: CompiledGraph, input: JsonObject = {}): RunStateStore {
    return new RunStateStore({
        runId: 'run-1',
        graphName: graph.name,
        graphVersion: graph.version,
        startNodeId: graph.nodes[graph.start].id,
        input,
        startedAt: 0,
    });
}

function nodeOf(graph: CompiledGraph, id: string): CompiledNode {
    const index = graph.nodeIndex.get(id);
    if (index === undefined) throw new Error(`no node ${id}`);
    return graph.nodes[index];
}

function chosen(decision: RouteDecision): string | undefined {
    return decision.kind === 'edge' ? decision.edge.id : undefined;
}

describe('Router', () => {
    describe('priority order', () => {
        const graph = compileGraph(priorityGraph());

        it('should take the higher-priority edge whenever its guard holds', () => {
            for (let i = 0; i < 5; i++) {
                const state = storeFor(graph, { score: 0.9 });
                const decision = selectEdge(graph, nodeOf(graph, 'x'), state, OPTIONS);
                expect(chosen(decision)).toBe('E1');
                expect(decision.checks).toEqual([
                    { edgeId: 'E1', to: 'fast', passed: true },
                    { edgeId: 'E2', to: 'slow' },
                ]);
            }
        });

        it('should fall through to the next edge when a guard fails', () => {
            const state = storeFor(graph, { score: 0.5 });
            const decision = selectEdge(graph, nodeOf(graph, 'x'), state, OPTIONS);
            expect(chosen(decision)).toBe('E2');
            expect(candidatesSignal(decision.checks)).toEqual([
                { edgeId: 'E1', to: 'fast', passed: false },
                { edgeId: 'E2', to: 'slow', passed: true },
            ]);
        });

        it('should treat a missing value as a failed comparison', () => {
            const state = storeFor(graph);
            expect(chosen(selectEdge(graph, nodeOf(graph, 'x'), state, OPTIONS))).toBe('E2');
        });
    });

    describe('retry bounds', () => {
        const graph = compileGraph(retryGraph(2));

        it('should take the retry edge while under its bound', () => {
            const state = storeFor(graph);
            state.recordRetry('check->draft');
            const decision = selectEdge(graph, nodeOf(graph, 'check'), state, OPTIONS);
            expect(chosen(decision)).toBe('check->draft');
        });

        it('should force the failure terminal once the edge bound is spent', () => {
            const state = storeFor(graph);
            state.recordRetry('check->draft');
            state.recordRetry('check->draft');
            const decision = selectEdge(graph, nodeOf(graph, 'check'), state, OPTIONS);

            expect(decision.kind).toBe('forced');
            if (decision.kind !== 'forced') return;
            expect(decision.reason).toBe('retry_bound_exceeded');
            expect(decision.target).toBe(graph.failureNode);
            expect(decision.edge?.id).toBe('check->draft');
            expect(decision.error).toBeInstanceOf(RetryBoundExceededError);
            expect(decision.error?.scope).toBe('edge');
            expect(decision.error?.message).toBe('Retry edge "check->draft" exhausted its bound of 2');
        });

        it('should enforce the global retry budget', () => {
            const state = storeFor(graph);
            state.recordRetry('elsewhere');
            const decision = selectEdge(graph, nodeOf(graph, 'check'), state, { maxTotalRetries: 1 });

            expect(decision.kind).toBe('forced');
            if (decision.kind !== 'forced') return;
            expect(decision.error?.scope).toBe('global');
            expect(decision.error?.message).toBe('Global retry budget of 1 exhausted at edge "check->draft"');
        });

        it('should not count a bound against a passing gate', () => {
            const state = storeFor(graph);
            state.recordRetry('check->draft');
            state.recordRetry('check->draft');
            state.begin('check', 1).set('gates.check', { passed: true, results: {} }).commit();
            expect(chosen(selectEdge(graph, nodeOf(graph, 'check'), state, OPTIONS))).toBe('check->publish');
        });
    });

    describe('depends and decompose edges', () => {
        const document: GraphDocument = {
            name: 'split',
            start: 'a',
            nodes: [
                { id: 'a', type: 'reason', prompt: 'Split the work' },
                { id: 'b', type: 'reason', prompt: 'Do a part' },
                { id: 'c', type: 'terminal' },
                { id: 'failed', type: 'terminal', terminal: { outcome: 'failure' } },
            ],
            edges: [
                { id: 'dep', from: 'a', to: 'b', kind: 'depends', requires: { nodes: ['b'] } },
                { id: 'split', from: 'a', to: 'b', kind: 'decompose', decompose: { parent: 'a', maxChildren: 1 } },
                { id: 'fallback', from: 'a', to: 'c', priority: 2 },
                { from: 'b', to: 'c' },
            ],
        };
        const graph = compileGraph(document);

        it('should skip a decompose edge until its parent has run', () => {
            const state = storeFor(graph);
            const decision = selectEdge(graph, nodeOf(graph, 'a'), state, OPTIONS);
            expect(chosen(decision)).toBe('fallback');
            expect(decision.checks).toEqual([
                { edgeId: 'dep', to: 'b', skipped: 'requirements-unmet' },
                { edgeId: 'split', to: 'b', skipped: 'decompose-not-ready' },
                { edgeId: 'fallback', to: 'c', passed: true },
            ]);
        });

        it('should take a decompose edge once the parent has run', () => {
            const state = storeFor(graph);
            state.enterNode('a');
            expect(chosen(selectEdge(graph, nodeOf(graph, 'a'), state, OPTIONS))).toBe('split');
        });

        it('should stop decomposing when the child budget is spent', () => {
            const state = storeFor(graph);
            state.enterNode('a');
            state.begin('b', 1).trackTask('b.t1', 'completed', true).commit();
            const decision = selectEdge(graph, nodeOf(graph, 'a'), state, OPTIONS);
            expect(chosen(decision)).toBe('fallback');
            expect(decision.checks[1]).toEqual({ edgeId: 'split', to: 'b', skipped: 'decompose-budget-spent' });
        });

        it('should take a depends edge once its required nodes have run', () => {
            const state = storeFor(graph);
            state.enterNode('b');
            expect(chosen(selectEdge(graph, nodeOf(graph, 'a'), state, OPTIONS))).toBe('dep');
        });

        it('should check required state values', () => {
            const stateful = compileGraph({
                ...document,
                edges: [
                    { id: 'dep', from: 'a', to: 'b', kind: 'depends', requires: { state: { 'data.ready': true } } },
                    ...document.edges.slice(2),
                ],
            });
            const edge = stateful.edges[0];
            expect(requirementsMet(edge, storeFor(stateful, { ready: false }))).toBe(false);
            expect(requirementsMet(edge, storeFor(stateful, { ready: true }))).toBe(true);
        });
    });

    describe('decision nodes', () => {
        const graph = compileGraph({
            name: 'choose',
            start: 'd',
            nodes: [
                {
                    id: 'd',
                    type: 'decision',
                    decision: { variable: 'score', rules: [{ when: '>= 0.5', target: 'hi' }, { default: true, target: 'lo' }] },
                },
                { id: 'hi', type: 'terminal' },
                { id: 'lo', type: 'terminal', terminal: { outcome: 'failure' } },
            ],
            edges: [
                { from: 'd', to: 'lo' },
                { from: 'd', to: 'hi' },
            ],
        });

        it('should prefer edges toward the recorded decision target', () => {
            const state = storeFor(graph);
            state.begin('d', 1).route('decisions.d.target', 'hi').commit();
            const decision = selectEdge(graph, nodeOf(graph, 'd'), state, OPTIONS);
            expect(chosen(decision)).toBe('d->hi');
            expect(decision.checks).toEqual([
                { edgeId: 'd->hi', to: 'hi', passed: true },
                { edgeId: 'd->lo', to: 'lo' },
            ]);
        });

        it('should keep declaration order without a recorded target', () => {
            const state = storeFor(graph);
            expect(chosen(selectEdge(graph, nodeOf(graph, 'd'), state, OPTIONS))).toBe('d->lo');
        });
    });
});
