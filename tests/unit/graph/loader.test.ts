import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadGraph, loadGraphFile, normalizeDocument, compileGraph } from '../../../src/graph/loader';
import { dumpGraph, toDocument } from '../../../src/graph/serialize';
import { GraphValidationError } from '../../../src/lib/errors';
import type { GraphDocument } from '../../../src/graph/schema';
import { priorityGraph, retryGraph } from '../../mocks/graphs';

const REVIEW_FIXTURE = fileURLToPath(new URL('../../fixtures/review.yaml', import.meta.url));

function issuesOf(raw: unknown): string[] {
    try {
        compileGraph(raw);
    } catch (error) {
        if (error instanceof GraphValidationError) return error.issues.map(i => i.message);
        throw error;
    }
    return [];
}

function withEdges(edges: GraphDocument['edges']): GraphDocument {
    return { ...priorityGraph(), edges };
}

describe('Graph loader', () => {
    describe('normalizeDocument', () => {
        it('should derive edge ids from endpoints and number repeats', () => {
            const document = normalizeDocument(withEdges([
                { from: 'x', to: 'slow' },
                { from: 'x', to: 'slow', guard: 'score > 0.5' },
            ]));
            expect(document.edges.map(e => e.id)).toEqual(['x->slow', 'x->slow#2']);
            expect(document.version).toBe(1);
        });

        it('should derive relationship ids', () => {
            const document = normalizeDocument({
                ...priorityGraph(),
                relationships: [{ from: 'x', to: 'failed', type: 'indicates' }],
            });
            expect(document.relationships?.[0].id).toBe('x:indicates:failed');
        });

        it('should report schema violations with their paths', () => {
            try {
                normalizeDocument({ name: 'g', start: 'a', nodes: [{ id: 'a', type: 'bogus' }], edges: [] });
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(GraphValidationError);
                if (!(error instanceof GraphValidationError)) return;
                expect(error.issues[0].path).toEqual(['nodes', 0, 'type']);
            }
        });
    });

    describe('compileGraph', () => {
        it('should build the arena with indexes and terminals', () => {
            const graph = compileGraph(priorityGraph());
            expect(graph.name).toBe('triage');
            expect(graph.version).toBe(1);
            expect(graph.nodes.map(n => n.id)).toEqual(['x', 'fast', 'slow', 'failed']);
            expect(graph.start).toBe(0);
            expect(graph.terminals).toEqual([1, 2, 3]);
            expect(graph.failureNode).toBe(3);
            expect(graph.escalateNode).toBeUndefined();
            expect(graph.edgeIndex.get('E2')).toBe(1);
            expect(graph.nodes[1].outcome).toBe('success');
        });

        it('should order outgoing edges by priority, own before wildcard, then declaration', () => {
            const graph = compileGraph(withEdges([
                { id: 'late', from: 'x', to: 'slow', priority: 2 },
                { id: 'any', from: '*', to: 'failed', priority: 1, guard: 'counters.totalSteps > 50' },
                { id: 'own-a', from: 'x', to: 'fast', priority: 1, guard: 'score > 0.9' },
                { id: 'own-b', from: 'x', to: 'slow', priority: 1, guard: 'score > 0.1' },
            ]));
            const x = graph.nodes[0];
            expect(x.outgoing.map(i => graph.edges[i].id)).toEqual(['own-a', 'own-b', 'any', 'late']);
        });

        it('should freeze the compiled graph', () => {
            const graph = compileGraph(priorityGraph());
            expect(Object.isFrozen(graph)).toBe(true);
            expect(Object.isFrozen(graph.edges[0])).toBe(true);
        });

        it('should collect every problem in one pass', () => {
            const messages = issuesOf(withEdges([
                { from: 'x', to: 'nowhere' },
                { from: 'x', to: 'slow', kind: 'retry' },
                { from: 'x', to: 'fast', guard: 'score >' },
            ]));
            expect(messages).toEqual([
                'Edge "x->nowhere" targets unknown node "nowhere"',
                'Retry edge "x->slow" needs maxRetries',
                'Unexpected end of guard at position 7 in guard "score >"',
            ]);
        });

        it('should reject duplicate edge ids', () => {
            const messages = issuesOf(withEdges([
                { id: 'E1', from: 'x', to: 'fast', guard: 'score > 0.5' },
                { id: 'E1', from: 'x', to: 'slow' },
            ]));
            expect(messages).toEqual(['Duplicate edge id "E1"']);
        });

        it('should require an unconditional fallback edge', () => {
            const messages = issuesOf(withEdges([
                { from: 'x', to: 'fast', guard: 'score > 0.5' },
            ]));
            expect(messages).toEqual(['Node "x" has no unconditional outgoing edge; routing could dead-end']);
        });

        it('should not count depends edges as fallbacks', () => {
            const messages = issuesOf(withEdges([
                { from: 'x', to: 'fast', kind: 'depends', requires: { nodes: ['x'] } },
            ]));
            expect(messages).toEqual(['Node "x" has no unconditional outgoing edge; routing could dead-end']);
        });

        it('should reject outgoing edges from terminals', () => {
            const messages = issuesOf(withEdges([
                { from: 'x', to: 'slow' },
                { from: 'fast', to: 'slow' },
            ]));
            expect(messages).toEqual(['Terminal node "fast" cannot have outgoing edges']);
        });

        it('should require a failure terminal', () => {
            const document = priorityGraph();
            document.nodes = document.nodes.filter(n => n.id !== 'failed');
            expect(issuesOf(document)).toEqual([
                'Graph needs a terminal with outcome "failure" for forced transitions',
            ]);
        });

        it('should check ids named by retries() and visits()', () => {
            const messages = issuesOf(withEdges([
                { from: 'x', to: 'fast', guard: "retries('ghost') < 1 and visits('phantom') > 0" },
                { from: 'x', to: 'slow' },
            ]));
            expect(messages).toEqual([
                'retries() names unknown edge "ghost"',
                'visits() names unknown node "phantom"',
            ]);
        });

        it('should validate decision rules', () => {
            const document: GraphDocument = {
                name: 'decide',
                start: 'd',
                nodes: [
                    { id: 'd', type: 'decision', decision: { variable: 'score', rules: [{ when: '> 1', target: 'ok' }] } },
                    { id: 'ok', type: 'terminal' },
                    { id: 'other', type: 'terminal', terminal: { outcome: 'failure' } },
                ],
                edges: [{ from: 'd', to: 'other' }],
            };
            expect(issuesOf(document)).toEqual([
                'Decision node "d" needs a default rule',
                'Decision node "d" has no edge to rule target "ok"',
            ]);
        });

        it('should compile comparison rules against a literal', () => {
            const graph = loadGraph({
                name: 'decide',
                start: 'd',
                nodes: [
                    {
                        id: 'd',
                        type: 'decision',
                        decision: {
                            variable: 'score',
                            rules: [
                                { when: '>= 0.8', target: 'ok' },
                                { min: 0.2, max: 0.5, target: 'ok' },
                                { when: 'flag and score > 0', target: 'ok' },
                                { default: true, target: 'bad' },
                            ],
                        },
                    },
                    { id: 'ok', type: 'terminal' },
                    { id: 'bad', type: 'terminal', terminal: { outcome: 'failure' } },
                ],
                edges: [{ from: 'd', to: 'ok', guard: 'false' }, { from: 'd', to: 'bad' }],
            });
            expect(graph.nodes[0].decisionRules.map(r => r.test.kind)).toEqual(['compare', 'range', 'guard', 'default']);
            expect(graph.nodes[0].decisionRules[0].test).toEqual({ kind: 'compare', operator: '>=', value: 0.8 });
            expect(graph.nodes[0].variable).toEqual({ kind: 'path', root: 'data', segments: ['score'], text: 'score' });
        });

        it('should warn about unreachable nodes', () => {
            const document = priorityGraph();
            document.nodes.push({ id: 'orphan', type: 'reason', prompt: 'Never runs' });
            document.edges.push({ from: 'orphan', to: 'failed' });
            const graph = compileGraph(document);
            expect(graph.warnings).toEqual(['Node "orphan" is unreachable from "x"']);
        });

        it('should accept a retry graph with a gate', () => {
            const graph = compileGraph(retryGraph());
            expect(graph.nodes[1].criteria.map(c => c.name)).toEqual(['good-enough']);
            expect(graph.edges[2].maxRetries).toBe(2);
        });
    });

    describe('sources and files', () => {
        it('should load a YAML file', async () => {
            const graph = await loadGraphFile(REVIEW_FIXTURE);
            expect(graph.name).toBe('review');
            expect(graph.edges.map(e => e.id)).toEqual([
                'intake->review',
                'review->publish',
                'review->revise',
                'revise-loop',
                'revise->failed',
            ]);
            expect(graph.nodes[graph.nodeIndex.get('revise') ?? -1].outgoing.map(i => graph.edges[i].id))
                .toEqual(['revise-loop', 'revise->failed']);
        });

        it('should load JSON text', () => {
            const graph = loadGraph(JSON.stringify(priorityGraph()));
            expect(graph.edges.map(e => e.guardSource)).toEqual(['score >= 0.8', 'true']);
        });

        it('should report unreadable sources', () => {
            expect(() => loadGraph('nodes: [')).toThrow(GraphValidationError);
        });

        it('should dump a document that loads back to the same graph', () => {
            const graph = compileGraph(retryGraph());
            const reloaded = loadGraph(dumpGraph(toDocument(graph)));
            expect(toDocument(reloaded)).toEqual(toDocument(graph));
            expect(dumpGraph(toDocument(graph), 'json').endsWith('}\n')).toBe(true);
        });
    });
});
