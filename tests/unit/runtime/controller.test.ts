import { describe, it, expect } from 'vitest';
import type { GraphDocument } from '../../../src/graph/schema';
import type { RunResult } from '../../../src/runtime/controller';
import { SkillRegistry } from '../../../src/runtime/skill-registry';
import { MemoryArtifactStore } from '../../../src/artifacts/memory-store';
import type { JsonObject } from '../../../src/lib/paths';
import { ScriptedModel } from '../../mocks/model';
import { fanoutGraph, priorityGraph, retryGraph } from '../../mocks/graphs';
import { runGraph } from '../../mocks/runs';

function actions(result: RunResult): string[] {
    return result.state.audit.map(entry => entry.action);
}

function auditOf(result: RunResult, action: string): JsonObject[] {
    return result.state.audit.filter(entry => entry.action === action).map(entry => entry.signals);
}

function researchSkills(): SkillRegistry {
    const skills = new SkillRegistry();
    skills.register({ name: 'fetch', execute: async ({ q }) => ({ source: q }) });
    skills.register({
        name: 'slow',
        execute: (_params, context) => new Promise((_resolve, reject) => {
            context.signal?.addEventListener('abort', () => reject(new Error('cancelled')), { once: true });
        }),
    });
    return skills;
}

describe('ExecutionController', () => {
    describe('routing by priority', () => {
        it('should follow the higher-priority edge and reach its terminal', async () => {
            const result = await runGraph(priorityGraph(), { model: new ScriptedModel({ x: [{ score: 0.9 }] }) });

            expect(result.status).toBe('succeeded');
            expect(result.terminal).toEqual({ nodeId: 'fast', outcome: 'success', reason: 'reached' });
            expect(result.state.data).toEqual({ score: 0.9, outcome: 'success' });
            expect(actions(result)).toEqual([
                'run_started',
                'node_executed',
                'edge_evaluated',
                'edge_taken',
                'node_executed',
                'terminal_reached',
            ]);
            expect(auditOf(result, 'edge_evaluated')).toEqual([{
                candidates: [
                    { edgeId: 'E1', to: 'fast', passed: true },
                    { edgeId: 'E2', to: 'slow' },
                ],
                selected: 'E1',
            }]);
        });

        it('should produce identical state when replayed with the same inputs', async () => {
            const first = await runGraph(priorityGraph(), { model: new ScriptedModel({ x: [{ score: 0.3 }] }) });
            const second = await runGraph(priorityGraph(), { model: new ScriptedModel({ x: [{ score: 0.3 }] }) });

            expect(first.terminal.nodeId).toBe('slow');
            expect(second.state).toEqual(first.state);
        });

        it('should number audit entries without gaps', async () => {
            const result = await runGraph(priorityGraph(), { model: new ScriptedModel({ x: [{ score: 0.9 }] }) });
            expect(result.state.audit.map(e => e.sequence)).toEqual([1, 2, 3, 4, 5, 6]);
        });
    });

    describe('bounded retries', () => {
        it('should force the failure terminal when the retry edge is spent', async () => {
            const model = new ScriptedModel({ draft: [{ quality: 0.5 }] });
            const result = await runGraph(retryGraph(2), { model });

            expect(result.status).toBe('failed');
            expect(result.terminal).toEqual({
                nodeId: 'failed',
                outcome: 'failure',
                reason: 'retry_bound_exceeded',
                detail: 'Retry edge "check->draft" exhausted its bound of 2',
            });
            expect(result.state.counters.edgeRetries).toEqual({ 'check->draft': 2 });
            expect(result.state.counters.totalSteps).toBe(6);
            expect(model.callsFor('draft').map(c => c.prompt)).toEqual([
                'Write a draft. Attempt 1',
                'Write a draft. Attempt 3',
                'Write a draft. Attempt 5',
            ]);
            expect(auditOf(result, 'retry_exhausted')).toEqual([
                { edgeId: 'check->draft', scope: 'edge', retries: 2 },
            ]);
            expect(auditOf(result, 'forced_transition')).toEqual([
                { to: 'failed', reason: 'retry_bound_exceeded' },
            ]);
        });

        it('should publish once the gate passes', async () => {
            const model = new ScriptedModel({ draft: [{ quality: 0.5 }, { quality: 0.9 }] });
            const result = await runGraph(retryGraph(2), { model });

            expect(result.terminal).toEqual({ nodeId: 'publish', outcome: 'success', reason: 'reached' });
            expect(result.state.data).toEqual({
                quality: 0.9,
                gates: { check: { passed: true, results: { 'good-enough': true } } },
                outcome: 'success',
                result: 0.9,
            });
            expect(result.state.counters.edgeRetries).toEqual({ 'check->draft': 1 });
            expect(result.state.counters.totalSteps).toBe(4);
        });

        it('should stop at the step limit', async () => {
            const model = new ScriptedModel({ draft: [{ quality: 0.1 }] });
            const result = await runGraph(retryGraph(50), { model, config: { maxSteps: 3 } });

            expect(result.terminal).toEqual({
                nodeId: 'failed',
                outcome: 'failure',
                reason: 'max_steps_exceeded',
                detail: 'Run exceeded maximum steps: 3',
            });
            expect(result.state.counters.totalSteps).toBe(3);
            expect(auditOf(result, 'forced_transition')).toEqual([{ to: 'failed', reason: 'max_steps_exceeded' }]);
        });
    });

    describe('node failures', () => {
        function escalatingDraft(): GraphDocument {
            const document = retryGraph(2);
            document.escalateNode = 'escalated';
            document.nodes.push({ id: 'escalated', type: 'terminal', terminal: { outcome: 'escalate' } });
            return document;
        }

        it('should escalate with a resume snapshot when output never validates', async () => {
            const model = new ScriptedModel({ draft: ['not json'] });
            const result = await runGraph(escalatingDraft(), { model, input: { brief: 'b' } });

            expect(result.status).toBe('escalated');
            expect(result.terminal.nodeId).toBe('escalated');
            expect(result.terminal.reason).toBe('output_schema_failed');
            expect(result.terminal.detail).toBe('Output of node "draft" failed schema validation after 3 attempt(s)');
            expect(result.terminal.resume?.nodeId).toBe('draft');
            expect(result.terminal.resume?.data).toEqual({ brief: 'b' });
            expect(result.terminal.resume?.pendingTasks).toEqual([]);
            expect(model.callsFor('draft').map(c => c.feedback)).toEqual([undefined, 'Invalid JSON', 'Invalid JSON']);
            expect(auditOf(result, 'node_failed')).toEqual([{ error: 'OutputSchemaError', escalating: true }]);
        });

        it('should send schema failures to the failure terminal when nothing escalates', async () => {
            const model = new ScriptedModel({ draft: [{ quality: 'high' }] });
            const result = await runGraph(retryGraph(2), { model });

            expect(result.terminal.nodeId).toBe('failed');
            expect(result.terminal.reason).toBe('output_schema_failed');
            expect(result.terminal.resume).toBeUndefined();
        });

        it('should fail the run on a model error', async () => {
            const model = new ScriptedModel().respond('x', () => {
                throw new Error('model offline');
            });
            const result = await runGraph(priorityGraph(), { model });

            expect(result.terminal).toEqual({
                nodeId: 'failed',
                outcome: 'failure',
                reason: 'node_error',
                detail: 'model offline',
            });
            expect(result.state.data).toEqual({ outcome: 'failure' });
        });

        it('should stop with reason aborted when the signal fires', async () => {
            const abort = new AbortController();
            abort.abort(new Error('stop requested'));
            const result = await runGraph(priorityGraph(), { model: new ScriptedModel(), signal: abort.signal });

            expect(result.terminal).toEqual({
                nodeId: 'failed',
                outcome: 'failure',
                reason: 'aborted',
                detail: 'stop requested',
            });
            expect(result.state.counters.totalSteps).toBe(0);
        });
    });

    describe('parallel tasks', () => {
        it('should keep sibling results when one task times out', async () => {
            const model = new ScriptedModel({ plan: [{ plan: 'three sources' }] });
            const result = await runGraph(fanoutGraph(20), {
                model,
                skills: researchSkills(),
                input: { topic: 'rivers' },
            });

            expect(result.status).toBe('succeeded');
            expect(model.callsFor('plan')[0].prompt).toBe('Plan research on rivers');
            expect(result.state.counters.tasksSpawned).toBe(3);
            expect(result.state.counters.completedTasks).toEqual(['plan.t1', 'plan.t2']);
            expect(result.state.counters.failedTasks).toEqual(['plan.t3']);
            expect(result.state.counters.skillsInvoked).toBe(3);
            expect(result.state.data.results).toEqual([{ source: 'a' }, { source: 'b' }]);
            expect(result.state.data.result).toEqual([{ source: 'a' }, { source: 'b' }]);
            expect(auditOf(result, 'task_failed')).toEqual([
                { taskId: 'plan.t3', timedOut: true, onFail: 'log_and_continue' },
            ]);
            expect(auditOf(result, 'branches_merged')).toEqual([
                { taskIds: ['plan.t1', 'plan.t2'], policy: 'append', conflicts: 0 },
            ]);
        });

        it('should escalate when a propagating task fails', async () => {
            const document = fanoutGraph(20);
            const tasks = document.nodes[0].parallel?.tasks ?? [];
            tasks[2] = { ...tasks[2], onFail: 'propagate' };

            const result = await runGraph(document, {
                model: new ScriptedModel({ plan: [{ plan: 'p' }] }),
                skills: researchSkills(),
            });

            expect(result.status).toBe('escalated');
            expect(result.terminal.reason).toBe('parallel_task_failed');
            expect(result.terminal.detail).toBe('Parallel task "plan.t3" failed: Task timed out after 20ms');
            expect(result.terminal.resume?.nodeId).toBe('plan');
            expect(result.terminal.resume?.pendingTasks).toEqual([]);
            expect(result.terminal.resume?.counters.failedTasks).toEqual(['plan.t3']);
            expect(result.terminal.resume?.counters.completedTasks).toEqual(['plan.t1', 'plan.t2']);
            expect(result.state.counters.tasksSpawned).toBe(3);
            expect(result.state.counters.skillsInvoked).toBe(3);
            expect(result.state.branches['plan.t1']).toEqual({
                taskId: 'plan.t1',
                nodeId: 'plan',
                result: { source: 'a' },
                merged: false,
            });
            expect(result.state.branches['plan.t2']?.result).toEqual({ source: 'b' });
            expect(result.state.data).toEqual({ outcome: 'escalate' });
        });

        it('should rename a task id that repeats within one spawn', async () => {
            const document: GraphDocument = {
                name: 'sources',
                start: 'plan',
                nodes: [
                    {
                        id: 'plan',
                        type: 'reason',
                        prompt: 'List sources',
                        parallel: {
                            tasks: [{ skill: 'fetch', instruction: 'Fetch A', params: { q: 'a' } }],
                            fromOutput: 'tasks',
                        },
                    },
                    { id: 'gather', type: 'merge', merge: { into: 'results', policy: 'append' } },
                    { id: 'done', type: 'terminal' },
                    { id: 'failed', type: 'terminal', terminal: { outcome: 'failure' } },
                ],
                edges: [
                    { from: 'plan', to: 'gather' },
                    { from: 'gather', to: 'done' },
                ],
            };
            const model = new ScriptedModel({
                plan: [{ tasks: [{ id: '1', skill: 'fetch', instruction: 'Fetch B', params: { q: 'b' } }] }],
            });

            const result = await runGraph(document, { model, skills: researchSkills() });

            expect(result.status).toBe('succeeded');
            expect(result.state.counters.completedTasks).toEqual(['plan.1', 'plan.1#2']);
            expect(result.state.data.results).toEqual([{ source: 'a' }, { source: 'b' }]);
        });
    });

    describe('edge effects', () => {
        const relay: GraphDocument = {
            name: 'relay',
            start: 'a',
            nodes: [
                { id: 'a', type: 'reason', prompt: 'Continue' },
                { id: 'b', type: 'terminal' },
                { id: 'failed', type: 'terminal', terminal: { outcome: 'failure' } },
            ],
            edges: [{
                from: 'a',
                to: 'b',
                kind: 'cross-run-read',
                read: { path: 'data.answer', as: 'previous' },
                onTraverse: [
                    { action: 'increment', path: 'hops' },
                    { action: 'set', path: 'data.via', value: 'relay' },
                    { action: 'signal', path: 'handoff', value: true },
                ],
            }],
        };

        it('should apply traversal actions and read the latest other run', async () => {
            const artifacts = new MemoryArtifactStore();
            const earlier = await runGraph(relay, {
                model: new ScriptedModel({ a: [{ answer: 41 }] }),
                artifacts,
                runId: 'run_0',
            });
            await artifacts.saveRun({
                runId: earlier.runId,
                graphName: 'relay',
                graphVersion: 1,
                status: earlier.status,
                terminal: earlier.terminal,
                state: earlier.state,
                savedAt: 1000,
            });

            const result = await runGraph(relay, {
                model: new ScriptedModel({ a: [{ answer: 42 }] }),
                artifacts,
            });

            expect(earlier.state.data.previous).toBeNull();
            expect(result.state.data).toEqual({
                answer: 42,
                hops: 1,
                via: 'relay',
                previous: 41,
                outcome: 'success',
            });
            expect(auditOf(result, 'signal')).toEqual([{ edgeId: 'a->b', name: 'handoff', value: true }]);
            expect(auditOf(result, 'edge_taken')).toEqual([{ edgeId: 'a->b', to: 'b', kind: 'cross-run-read' }]);
        });
    });
});
