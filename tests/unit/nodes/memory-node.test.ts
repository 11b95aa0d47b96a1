import { describe, it, expect } from 'vitest';
import { toFactInputs } from '../../../src/nodes/memory-node';
import { sliceData, taskIdFor } from '../../../src/nodes/spawn';

describe('Node helpers', () => {
    describe('toFactInputs', () => {
        it('should accept strings and fact-shaped objects', () => {
            expect(toFactInputs([
                'Plain statement',
                {
                    text: 'Structured',
                    confidence: 0.6,
                    kind: 'decision',
                    triplet: { subject: 's', predicate: 'p', object: 'o' },
                    tags: ['a', 3],
                },
                { text: 'Bad kind', kind: 'rumour', triplets: [{ subject: 's' }] },
                { missing: 'text' },
                42,
            ])).toEqual([
                { text: 'Plain statement' },
                {
                    text: 'Structured',
                    confidence: 0.6,
                    kind: 'decision',
                    triplets: [{ subject: 's', predicate: 'p', object: 'o' }],
                    tags: ['a'],
                    source: undefined,
                    supersedes: undefined,
                },
                {
                    text: 'Bad kind',
                    confidence: undefined,
                    kind: undefined,
                    triplets: [],
                    tags: undefined,
                    source: undefined,
                    supersedes: undefined,
                },
            ]);
        });

        it('should wrap a single value and ignore nothing', () => {
            expect(toFactInputs('only one')).toEqual([{ text: 'only one' }]);
            expect(toFactInputs(undefined)).toEqual([]);
            expect(toFactInputs(null)).toEqual([]);
        });
    });

    describe('taskIdFor', () => {
        it('should suffix repeat visits', () => {
            expect(taskIdFor('plan', 't1', 1)).toBe('plan.t1');
            expect(taskIdFor('plan', '2', 3)).toBe('plan.2@3');
        });
    });

    describe('sliceData', () => {
        it('should copy only the named paths', () => {
            const data = { a: { b: 1, c: 2 }, d: [1, 2] };
            expect(sliceData(data, ['data.a.c', 'd', 'nope'])).toEqual({ a: { c: 2 }, d: [1, 2] });
            expect(sliceData(data, undefined)).toEqual(data);
        });
    });
});
