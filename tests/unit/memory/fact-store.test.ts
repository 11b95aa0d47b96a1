import { describe, it, expect } from 'vitest';
import { InMemoryFactStore } from '../../../src/memory/fact-store';
import { summarizeFacts } from '../../../src/memory/format';
import type { FactInput } from '../../../src/memory/types';

const capital = (object: string, confidence = 0.9): FactInput => ({
    text: `The capital is ${object}`,
    confidence,
    triplets: [{ subject: 'Freedonia', predicate: 'capital', object }],
});

describe('InMemoryFactStore', () => {
    describe('write', () => {
        it('should commit facts with provenance and sequence numbers', async () => {
            const store = new InMemoryFactStore({ clock: () => 500 });
            const result = await store.write([
                { text: 'Rivers flow downhill', tags: ['physics'] },
                { text: 'Lakes are still', confidence: 1.7, kind: 'observation', source: 'tool' },
            ], 'run_1', 'reader');

            expect(result.conflicts).toEqual([]);
            expect(result.committed).toEqual([
                {
                    factId: 'fact_1',
                    text: 'Rivers flow downhill',
                    confidence: 1,
                    kind: 'fact',
                    triplets: [],
                    tags: ['physics'],
                    provenance: { runId: 'run_1', nodeId: 'reader', timestamp: 500, source: 'llm' },
                    supersedes: undefined,
                    flagged: false,
                    conflictsWith: [],
                    sequence: 1,
                },
                expect.objectContaining({ factId: 'fact_2', confidence: 1, kind: 'observation', sequence: 2 }),
            ]);
            expect(result.committed[1].provenance.source).toBe('tool');
        });

        it('should use the injected id generator', async () => {
            let n = 0;
            const store = new InMemoryFactStore({ idGenerator: prefix => `${prefix}-${++n}` });
            const { committed } = await store.write([{ text: 'a' }, { text: 'b' }], 'run_1', 'n');
            expect(committed.map(f => f.factId)).toEqual(['fact-1', 'fact-2']);
        });

        it('should flag contradictions and keep both records', async () => {
            const store = new InMemoryFactStore();
            await store.write([capital('Alpha')], 'run_1', 'n');
            const result = await store.write([capital('Beta')], 'run_2', 'n');

            expect(result.committed[0].flagged).toBe(true);
            expect(result.committed[0].conflictsWith).toEqual(['fact_1']);
            expect(result.conflicts).toEqual([{
                text: 'The capital is Beta',
                triplet: { subject: 'Freedonia', predicate: 'capital', object: 'Beta' },
                conflictsWith: ['fact_1'],
                resolution: 'flagged',
                factId: 'fact_2',
            }]);
            expect(await store.query()).toHaveLength(2);
        });

        it('should compare relations case-insensitively', async () => {
            const store = new InMemoryFactStore();
            await store.write([capital('Alpha')], 'run_1', 'n');
            const same = await store.write([{
                text: 'again',
                triplets: [{ subject: 'freedonia', predicate: 'Capital', object: 'ALPHA' }],
            }], 'run_2', 'n');
            expect(same.conflicts).toEqual([]);
        });

        it('should supersede under overwrite', async () => {
            const store = new InMemoryFactStore();
            await store.write([capital('Alpha')], 'run_1', 'n');
            const result = await store.write([capital('Beta')], 'run_2', 'n', { conflictPolicy: 'overwrite' });

            expect(result.committed[0].supersedes).toBe('fact_1');
            expect(result.committed[0].flagged).toBe(false);
            expect(result.conflicts[0].resolution).toBe('superseded');
            const visible = await store.query({ excludeSuperseded: true });
            expect(visible.map(f => f.factId)).toEqual(['fact_2']);
        });

        it('should skip conflicting facts under reject', async () => {
            const store = new InMemoryFactStore();
            await store.write([capital('Alpha')], 'run_1', 'n');
            const result = await store.write([capital('Beta'), { text: 'unrelated' }], 'run_2', 'n', { conflictPolicy: 'reject' });

            expect(result.committed.map(f => f.text)).toEqual(['unrelated']);
            expect(result.conflicts.map(c => c.resolution)).toEqual(['rejected']);
            expect(result.conflicts[0].factId).toBeUndefined();
        });

        it('should detect conflicts within one batch', async () => {
            const store = new InMemoryFactStore();
            const result = await store.write([capital('Alpha'), capital('Beta')], 'run_1', 'n');
            expect(result.committed[1].conflictsWith).toEqual(['fact_1']);
        });

        it('should serialize concurrent writers in call order', async () => {
            const store = new InMemoryFactStore();
            const [a, b] = await Promise.all([
                store.write([{ text: 'first' }], 'run_1', 'n'),
                store.write([{ text: 'second' }], 'run_2', 'n'),
            ]);
            expect(a.committed[0].sequence).toBe(1);
            expect(b.committed[0].sequence).toBe(2);
        });

        it('should hand out copies that cannot alter the store', async () => {
            const store = new InMemoryFactStore();
            const { committed } = await store.write([{ text: 'original', tags: ['t'] }], 'run_1', 'n');
            committed[0].tags.push('changed');
            const stored = await store.get('fact_1');
            expect(stored?.tags).toEqual(['t']);
            expect(Object.isFrozen(stored)).toBe(true);
        });
    });

    describe('query', () => {
        async function seeded(): Promise<InMemoryFactStore> {
            const store = new InMemoryFactStore();
            await store.write([
                { text: 'Low note', confidence: 0.2, tags: ['misc'] },
                { text: 'Strong claim', confidence: 0.9, kind: 'decision', tags: ['plan'] },
                { text: 'Another strong claim', confidence: 0.9, tags: ['plan', 'misc'] },
                capital('Alpha', 0.5),
            ], 'run_1', 'n');
            return store;
        }

        it('should rank by confidence then most recent', async () => {
            const store = await seeded();
            const facts = await store.query();
            expect(facts.map(f => f.factId)).toEqual(['fact_3', 'fact_2', 'fact_4', 'fact_1']);
        });

        it('should apply every filter', async () => {
            const store = await seeded();
            expect((await store.query({ minConfidence: 0.5 })).map(f => f.factId)).toEqual(['fact_3', 'fact_2', 'fact_4']);
            expect((await store.query({ kinds: ['decision'] })).map(f => f.factId)).toEqual(['fact_2']);
            expect((await store.query({ tags: ['misc'] })).map(f => f.factId)).toEqual(['fact_3', 'fact_1']);
            expect((await store.query({ subjects: ['Freedonia'] })).map(f => f.factId)).toEqual(['fact_4']);
            expect((await store.query({ text: 'STRONG' })).map(f => f.factId)).toEqual(['fact_3', 'fact_2']);
            expect((await store.query({ limit: 1 })).map(f => f.factId)).toEqual(['fact_3']);
        });

        it('should report statistics', async () => {
            const store = await seeded();
            await store.write([capital('Beta')], 'run_2', 'n', { conflictPolicy: 'overwrite' });
            expect(await store.stats()).toEqual({
                totalRecords: 5,
                flaggedRecords: 0,
                supersededRecords: 1,
                byKind: { fact: 4, decision: 1 },
                uniqueSubjects: 1,
            });
        });
    });

    describe('seed and lessons', () => {
        it('should start from seeded records', async () => {
            const source = new InMemoryFactStore();
            const { committed } = await source.write([{ text: 'carried over' }], 'run_1', 'n');
            const store = new InMemoryFactStore({ seed: committed });
            expect(store.size).toBe(0);
            expect((await store.query()).map(f => f.text)).toEqual(['carried over']);
            expect(store.size).toBe(1);
        });

        it('should write lessons with learning provenance', async () => {
            const store = new InMemoryFactStore();
            const lesson = await store.writeLesson('Check sources twice', 'run_1', 'done');
            expect(lesson?.kind).toBe('lesson');
            expect(lesson?.confidence).toBe(0.8);
            expect(lesson?.tags).toEqual(['lesson', 'auto-generated']);
            expect(lesson?.provenance.source).toBe('learning');
        });
    });
});

describe('summarizeFacts', () => {
    it('should render a bullet list with disputed markers', async () => {
        const store = new InMemoryFactStore();
        await store.write([capital('Alpha', 0.75)], 'run_1', 'n');
        await store.write([capital('Beta', 0.5)], 'run_1', 'n');
        const facts = await store.query();
        expect(summarizeFacts(facts)).toBe([
            '- The capital is Alpha (confidence 0.75)',
            '- The capital is Beta (confidence 0.50) [disputed]',
        ].join('\n'));
    });

    it('should truncate long lists', async () => {
        const store = new InMemoryFactStore();
        await store.write([{ text: 'a' }, { text: 'b' }, { text: 'c' }], 'run_1', 'n');
        const facts = await store.query();
        expect(summarizeFacts(facts, 2)).toBe('- c (confidence 1.00)\n- b (confidence 1.00)\n- ... 1 more');
    });

    it('should say when nothing is known', () => {
        expect(summarizeFacts([])).toBe('(no relevant memory)');
    });
});
