import { describe, it, expect } from 'vitest';
import { RunStateStore } from '../../../src/state/run-state';
import { applyTransform, applyWriteRules, readSource, writeOutput } from '../../../src/nodes/writes';
import type { WriteSources } from '../../../src/nodes/writes';

function newStore(): RunStateStore {
    return new RunStateStore({
        runId: 'run_1',
        graphName: 'g',
        graphVersion: 1,
        startNodeId: 'a',
        input: { existing: { keep: 1 }, log: ['start'] },
        startedAt: 0,
    });
}

const sources: WriteSources = {
    output: { answer: 'yes', items: [1, 2, 3], nested: { value: 'n' } },
    data: { topic: 'rivers', memory: { prior: ['p'] } },
    counters: { totalSteps: 2 },
    run: { id: 'run_1' },
};

describe('State writes', () => {
    describe('readSource', () => {
        it('should read from each root and default to the output', () => {
            expect(readSource(sources, 'answer')).toBe('yes');
            expect(readSource(sources, 'output.nested.value')).toBe('n');
            expect(readSource(sources, 'data.topic')).toBe('rivers');
            expect(readSource(sources, 'memory.prior')).toEqual(['p']);
            expect(readSource(sources, 'counters.totalSteps')).toBe(2);
            expect(readSource(sources, 'run.id')).toBe('run_1');
        });
    });

    describe('applyTransform', () => {
        it('should coerce values', () => {
            expect(applyTransform('3.5', 'number')).toBe(3.5);
            expect(applyTransform('abc', 'number')).toBeNull();
            expect(applyTransform({ a: 1 }, 'string')).toBe('{"a":1}');
            expect(applyTransform(undefined, 'string')).toBe('');
            expect(applyTransform('false', 'boolean')).toBe(false);
            expect(applyTransform('yes', 'boolean')).toBe(true);
            expect(applyTransform([1, 2], 'length')).toBe(2);
            expect(applyTransform({ a: 1, b: 2 }, 'length')).toBe(2);
            expect(applyTransform('{"k":[1]}', 'json')).toEqual({ k: [1] });
            expect(applyTransform('{oops', 'json')).toBeNull();
        });
    });

    describe('applyWriteRules', () => {
        it('should stage every rule in its mode and report written paths', () => {
            const store = newStore();
            const tx = store.begin('a', 1);
            const written = applyWriteRules(tx, [
                { path: 'verdict', from: 'answer' },
                { path: 'count', from: 'items', transform: 'length' },
                { path: 'log', from: 'answer', mode: 'append' },
                { path: 'existing', value: { added: true }, mode: 'merge' },
                { path: 'skipped', from: 'not.there' },
                { path: 'data.fixed', value: 7 },
            ], sources);
            tx.commit();

            expect(written).toEqual(['verdict', 'count', 'log', 'existing', 'data.fixed']);
            expect(store.data).toEqual({
                existing: { keep: 1, added: true },
                log: ['start', 'yes'],
                verdict: 'yes',
                count: 3,
                fixed: 7,
            });
        });
    });

    describe('writeOutput', () => {
        it('should merge objects into data and file other values under the node id', () => {
            const store = newStore();
            const tx = store.begin('summarize', 1);
            writeOutput(tx, 'summarize', { title: 't' });
            writeOutput(tx, 'summarize', 'plain text');
            tx.commit();

            expect(store.get('title')).toBe('t');
            expect(store.get('summarize')).toBe('plain text');
        });
    });
});
