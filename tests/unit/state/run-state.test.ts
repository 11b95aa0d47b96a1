import { describe, it, expect } from 'vitest';
import { RunStateStore, normalizeDataPath } from '../../../src/state/run-state';
import type { JsonObject } from '../../../src/lib/paths';

function createStore(input: JsonObject = {}): RunStateStore {
    return new RunStateStore({
        runId: 'run-1',
        graphName: 'g',
        graphVersion: 3,
        startNodeId: 'a',
        input,
        startedAt: 1000,
    });
}

describe('RunStateStore', () => {
    describe('normalizeDataPath', () => {
        it('should strip a leading data segment', () => {
            expect(normalizeDataPath('data.a.b')).toBe('a.b');
            expect(normalizeDataPath('a.b')).toBe('a.b');
            expect(normalizeDataPath('data')).toBe('');
            expect(normalizeDataPath('database')).toBe('database');
        });
    });

    describe('initial state', () => {
        it('should start pending at the start node with a copy of the input', () => {
            const input = { topic: 'rivers' };
            const store = createStore(input);
            input.topic = 'changed';

            expect(store.status).toBe('pending');
            expect(store.currentNodeId).toBe('a');
            expect(store.data).toEqual({ topic: 'rivers' });
            expect(store.counters.totalSteps).toBe(0);
            expect(store.version).toBe(0);
        });
    });

    describe('transactions', () => {
        it('should hide staged writes until commit', () => {
            const store = createStore();
            const tx = store.begin('a', 1);
            tx.set('data.answer', 42).append('log', 'one');

            expect(store.get('answer')).toBeUndefined();
            expect(tx.read('answer')).toBe(42);

            tx.commit();
            expect(store.get('answer')).toBe(42);
            expect(store.get('log')).toEqual(['one']);
            expect(store.version).toBe(1);
        });

        it('should discard everything on rollback', () => {
            const store = createStore({ keep: true });
            const tx = store.begin('a', 1);
            tx.set('keep', false).bump('memoryWrites');
            tx.rollback();

            expect(store.get('keep')).toBe(true);
            expect(store.counters.memoryWrites).toBe(0);
            expect(store.version).toBe(0);
            expect(tx.isOpen).toBe(false);
        });

        it('should refuse writes after closing', () => {
            const store = createStore();
            const tx = store.begin('a', 2);
            tx.commit();
            expect(() => tx.set('x', 1)).toThrow('Transaction for node "a" at step 2 is already closed');
        });

        it('should refuse to replace the whole data bag', () => {
            const tx = createStore().begin('a');
            expect(() => tx.set('data', {})).toThrow('Cannot replace the whole data bag; use merge');
        });

        it('should merge objects shallowly into a path', () => {
            const store = createStore({ profile: { name: 'n', age: 1 } });
            const tx = store.begin('a', 1);
            tx.merge('profile', { age: 2, city: 'c' }).merge('data', { top: 1 });
            tx.commit();
            expect(store.data).toEqual({ profile: { name: 'n', age: 2, city: 'c' }, top: 1 });
        });

        it('should wrap an existing scalar when appending', () => {
            const store = createStore({ notes: 'first' });
            store.begin('a', 1).append('notes', 'second').commit();
            expect(store.get('notes')).toEqual(['first', 'second']);
        });

        it('should remove paths', () => {
            const store = createStore({ a: { b: 1, c: 2 } });
            store.begin('a', 1).remove('a.b').commit();
            expect(store.data).toEqual({ a: { c: 2 } });
        });

        it('should journal each data write with its node and step', () => {
            const store = createStore();
            store.begin('a', 1).set('x', 1).append('y', 2).commit();
            store.begin('b', 2).remove('x').commit();
            expect(store.toJSON().journal).toEqual([
                { step: 1, nodeId: 'a', op: 'set', path: 'x' },
                { step: 1, nodeId: 'a', op: 'append', path: 'y' },
                { step: 2, nodeId: 'b', op: 'remove', path: 'x' },
            ]);
        });

        it('should coerce values to JSON', () => {
            const store = createStore();
            store.begin('a', 1).set('when', new Date(0)).set('bad', Number.NaN).commit();
            expect(store.get('when')).toBe('1970-01-01T00:00:00.000Z');
            expect(store.get('bad')).toBeNull();
        });
    });

    describe('counters and tasks', () => {
        it('should count visits, steps and retries', () => {
            const store = createStore();
            store.enterNode('a');
            store.enterNode('b');
            store.enterNode('a');
            expect(store.incrementSteps()).toBe(1);
            store.recordRetry('e1');
            store.recordRetry('e1');

            expect(store.counters.nodeVisits).toEqual({ a: 2, b: 1 });
            expect(store.retriesFor('e1')).toBe(2);
            expect(store.retriesFor('e2')).toBe(0);
            expect(store.counters.totalRetries).toBe(2);
        });

        it('should track task records in spawn order', () => {
            const store = createStore();
            store.begin('plan', 1)
                .trackTask('plan.t1', 'active', true)
                .trackTask('plan.t2', 'active', false)
                .commit();
            store.begin('plan', 1)
                .trackTask('plan.t2', 'failed', false, 'boom')
                .trackTask('plan.t1', 'completed', true)
                .commit();

            expect(store.counters.tasksSpawned).toBe(2);
            expect(store.counters.completedTasks).toEqual(['plan.t1']);
            expect(store.counters.failedTasks).toEqual(['plan.t2']);
            expect(store.tasksSpawnedBy('plan')).toEqual(['plan.t1', 'plan.t2']);
            expect(store.tasksWithStatus('failed')).toEqual(['plan.t2']);
        });

        it('should drop tasks still active', () => {
            const store = createStore();
            store.begin('plan', 1).trackTask('plan.t1', 'active', false).trackTask('plan.t2', 'completed', true).commit();
            expect(store.dropPendingTasks()).toEqual(['plan.t1']);
            expect(store.guardScope().parallel).toEqual({
                active: [],
                completed: ['plan.t2'],
                failed: [],
                dropped: ['plan.t1'],
            });
        });
    });

    describe('guardScope', () => {
        it('should expose a frozen view of every root', () => {
            const store = createStore({ score: 0.5 });
            store.enterNode('a');
            store.incrementSteps();
            store.begin('a', 1).route('decisions.a.target', 'b').commit();

            const scope = store.guardScope();
            expect(scope.data).toEqual({ score: 0.5 });
            expect(scope.run).toEqual({ id: 'run-1', step: 1, graphVersion: 3, currentNode: 'a' });
            expect(scope.routing).toEqual({ decisions: { a: { target: 'b' } } });
            expect(Object.isFrozen(scope.data)).toBe(true);
        });
    });

    describe('slice', () => {
        it('should copy only the named paths', () => {
            const store = createStore({ a: { b: 1, c: 2 }, d: 3 });
            const slice = store.slice(['data.a.b', 'missing']);
            expect(slice).toEqual({ a: { b: 1 } });
        });

        it('should copy everything without paths', () => {
            const store = createStore({ a: [1] });
            const slice = store.slice();
            expect(slice).toEqual({ a: [1] });
            expect(slice.a).not.toBe(store.data.a);
        });
    });

    describe('mergeBranches', () => {
        function withBranches(results: unknown[], input: JsonObject = {}): RunStateStore {
            const store = createStore(input);
            const tx = store.begin('plan', 1);
            results.forEach((result, i) => {
                tx.trackTask(`plan.t${i + 1}`, 'completed', true).writeBranch(`plan.t${i + 1}`, result);
            });
            tx.commit();
            return store;
        }

        it('should append results in spawn order', () => {
            const store = withBranches(['r1', 'r2'], { results: ['r0'] });
            const tx = store.begin('gather', 2);
            const outcome = store.mergeBranches(tx, 'results', 'append');
            tx.commit();

            expect(outcome.merged).toEqual(['plan.t1', 'plan.t2']);
            expect(store.get('results')).toEqual(['r0', 'r1', 'r2']);
            expect(store.getBranch('plan.t1')?.merged).toBe(true);
        });

        it('should merge each branch only once', () => {
            const store = withBranches(['r1']);
            const first = store.begin('gather', 2);
            store.mergeBranches(first, 'results', 'append');
            first.commit();
            const second = store.begin('gather', 3);
            const outcome = store.mergeBranches(second, 'results', 'append');
            second.commit();

            expect(outcome.merged).toEqual([]);
            expect(store.get('results')).toEqual(['r1']);
        });

        it('should let later branches win under overwrite', () => {
            const store = withBranches([{ k: 1, a: 'x' }, { k: 2 }]);
            const tx = store.begin('gather', 2);
            store.mergeBranches(tx, 'combined', 'overwrite');
            tx.commit();
            expect(store.get('combined')).toEqual({ k: 2, a: 'x' });
        });

        it('should keep the first value and record clashes under conflict-flag', () => {
            const store = withBranches([{ k: 1, same: true }, { k: 2, same: true }]);
            const tx = store.begin('gather', 2);
            const outcome = store.mergeBranches(tx, 'combined', 'conflict-flag');
            tx.commit();

            expect(outcome.conflicts).toEqual([{ key: 'k', taskId: 'plan.t2', existing: 1, incoming: 2 }]);
            expect(store.get('combined')).toEqual({ k: 1, same: true });
            expect(store.get('mergeConflicts')).toEqual([
                { into: 'combined', key: 'k', taskId: 'plan.t2', existing: 1, incoming: 2 },
            ]);
        });

        it('should restrict merging to named tasks', () => {
            const store = withBranches(['r1', 'r2']);
            const tx = store.begin('gather', 2);
            const outcome = store.mergeBranches(tx, 'results', 'append', ['plan.t2']);
            tx.commit();
            expect(outcome.merged).toEqual(['plan.t2']);
            expect(store.get('results')).toEqual(['r2']);
        });

        it('should include branches staged in the same transaction', () => {
            const store = createStore();
            const tx = store.begin('plan', 1);
            tx.trackTask('plan.t1', 'completed', true).writeBranch('plan.t1', 'fresh');
            const outcome = store.mergeBranches(tx, 'results', 'append');
            tx.commit();
            expect(outcome.merged).toEqual(['plan.t1']);
            expect(store.get('results')).toEqual(['fresh']);
        });
    });

    describe('audit and finish', () => {
        it('should number audit entries and stamp the current step', () => {
            const store = createStore();
            store.incrementSteps();
            const first = store.appendAudit('a', 'node_executed', 'ran a', { ok: true });
            store.incrementSteps();
            const second = store.appendAudit('a', 'edge_taken', 'a -> b');

            expect(first).toEqual({ sequence: 1, step: 1, nodeId: 'a', action: 'node_executed', summary: 'ran a', signals: { ok: true } });
            expect(second.sequence).toBe(2);
            expect(second.step).toBe(2);
        });

        it('should map terminal outcomes to run status', () => {
            const store = createStore();
            store.finish({ nodeId: 'esc', outcome: 'escalate', reason: 'reached' }, 2000);
            expect(store.status).toBe('escalated');
            expect(store.toJSON().finishedAt).toBe(2000);
        });

        it('should restore from its serialized form', () => {
            const store = createStore({ a: 1 });
            store.begin('a', 1).set('b', 2).commit();
            const restored = RunStateStore.fromJSON(store.toJSON());
            expect(restored.data).toEqual({ a: 1, b: 2 });
            expect(restored.version).toBe(1);
        });
    });
});
