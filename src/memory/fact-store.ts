/**
 * Append-only fact stores.
 *
 * @example
 * ```typescript
 * import { InMemoryFactStore } from 'sluice';
 *
 * const memory = new InMemoryFactStore();
 * await memory.write([{
 *     text: 'Vendor A ships in 3 days',
 *     confidence: 0.9,
 *     triplets: [{ subject: 'vendor-a', predicate: 'ships_in', object: '3d' }],
 * }], 'run_1', 'research');
 * const facts = await memory.query({ subjects: ['vendor-a'] });
 * ```
 */

import type { Clock, IdGenerator } from '../lib/config';
import { deepClone, deepFreeze } from '../lib/paths';
import type {
    ConflictRecord,
    Fact,
    FactInput,
    FactQuery,
    MemoryStats,
    MemoryStore,
    Triplet,
    WriteOptions,
    WriteResult,
} from './types';

export interface FactStoreConfig {
    clock?: Clock;
    /** Fact id source (default: `fact_<sequence>`) */
    idGenerator?: IdGenerator;
}

function relationKey(triplet: Triplet): string {
    return `${triplet.subject.trim().toLowerCase()}\u0000${triplet.predicate.trim().toLowerCase()}`;
}

function sameObject(a: Triplet, b: Triplet): boolean {
    return a.object.trim().toLowerCase() === b.object.trim().toLowerCase();
}

function clampConfidence(value: number | undefined): number {
    if (value === undefined || Number.isNaN(value)) return 1;
    return Math.min(1, Math.max(0, value));
}

/**
 * Shared append-only logic. Subclasses decide where records live.
 */
export abstract class AppendOnlyFactStore implements MemoryStore {
    private records: Fact[] = [];
    private loaded: Promise<void> | null = null;
    private queue: Promise<unknown> = Promise.resolve();
    protected readonly clock: Clock;
    private readonly idGenerator?: IdGenerator;

    constructor(config: FactStoreConfig = {}) {
        this.clock = config.clock ?? Date.now;
        this.idGenerator = config.idGenerator;
    }

    /** Load previously persisted records (called once) */
    protected abstract loadRecords(): Promise<Fact[]>;

    /** Persist newly committed records */
    protected abstract appendRecords(facts: Fact[]): Promise<void>;

    async write(
        facts: FactInput[],
        runId: string,
        nodeId: string,
        options: WriteOptions = {},
    ): Promise<WriteResult> {
        // Writers are serialized so sequence numbers follow call order
        const task = this.queue.then(() => this.commit(facts, runId, nodeId, options));
        this.queue = task.catch(() => undefined);
        return task;
    }

    async query(filter: FactQuery = {}): Promise<Fact[]> {
        await this.ensureLoaded();
        const superseded = filter.excludeSuperseded ? this.supersededIds() : undefined;
        const minConfidence = filter.minConfidence ?? 0;
        const text = filter.text?.toLowerCase();

        const matches = this.records.filter(fact => {
            if (fact.confidence < minConfidence) return false;
            if (superseded?.has(fact.factId)) return false;
            if (filter.kinds && filter.kinds.length > 0 && !filter.kinds.includes(fact.kind)) return false;
            if (filter.tags && filter.tags.length > 0 && !filter.tags.some(tag => fact.tags.includes(tag))) return false;
            if (filter.subjects && filter.subjects.length > 0
                && !fact.triplets.some(t => filter.subjects?.includes(t.subject))) return false;
            if (filter.predicates && filter.predicates.length > 0
                && !fact.triplets.some(t => filter.predicates?.includes(t.predicate))) return false;
            if (filter.objects && filter.objects.length > 0
                && !fact.triplets.some(t => filter.objects?.includes(t.object))) return false;
            if (text && !fact.text.toLowerCase().includes(text)) return false;
            return true;
        });

        matches.sort((a, b) => b.confidence - a.confidence || b.sequence - a.sequence);
        return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
    }

    async get(factId: string): Promise<Fact | undefined> {
        await this.ensureLoaded();
        return this.records.find(f => f.factId === factId);
    }

    async stats(): Promise<MemoryStats> {
        await this.ensureLoaded();
        const byKind: Record<string, number> = {};
        const subjects = new Set<string>();
        for (const fact of this.records) {
            byKind[fact.kind] = (byKind[fact.kind] ?? 0) + 1;
            fact.triplets.forEach(t => subjects.add(t.subject));
        }
        return {
            totalRecords: this.records.length,
            flaggedRecords: this.records.filter(f => f.flagged).length,
            supersededRecords: this.supersededIds().size,
            byKind,
            uniqueSubjects: subjects.size,
        };
    }

    /**
     * Record a lesson learned from a run.
     */
    async writeLesson(
        text: string,
        runId: string,
        nodeId: string,
        options: { confidence?: number; tags?: string[] } = {},
    ): Promise<Fact | undefined> {
        const result = await this.write([{
            text,
            kind: 'lesson',
            confidence: options.confidence ?? 0.8,
            tags: options.tags ?? ['lesson', 'auto-generated'],
            source: 'learning',
        }], runId, nodeId);
        return result.committed[0];
    }

    get size(): number {
        return this.records.length;
    }

    private async ensureLoaded(): Promise<void> {
        if (!this.loaded) {
            this.loaded = this.loadRecords().then(records => {
                this.records = records.map(r => deepFreeze(deepClone(r)));
            });
        }
        await this.loaded;
    }

    private supersededIds(): Set<string> {
        const ids = new Set<string>();
        for (const fact of this.records) {
            if (fact.supersedes) ids.add(fact.supersedes);
        }
        return ids;
    }

    private async commit(
        inputs: FactInput[],
        runId: string,
        nodeId: string,
        options: WriteOptions,
    ): Promise<WriteResult> {
        await this.ensureLoaded();
        const policy = options.conflictPolicy ?? 'flag';
        const committed: Fact[] = [];
        const conflicts: ConflictRecord[] = [];

        for (const input of inputs) {
            const triplets = (input.triplets ?? []).map(t => ({ ...t }));
            const clashes = this.findConflicts(triplets, [...this.records, ...committed]);

            if (clashes.length > 0 && policy === 'reject') {
                for (const clash of clashes) {
                    conflicts.push({ text: input.text, triplet: clash.triplet, conflictsWith: clash.ids, resolution: 'rejected' });
                }
                continue;
            }

            const conflictIds = [...new Set(clashes.flatMap(c => c.ids))];
            const sequence = this.records.length + committed.length + 1;
            const fact: Fact = {
                factId: this.idGenerator ? this.idGenerator('fact') : `fact_${sequence}`,
                text: input.text,
                confidence: clampConfidence(input.confidence),
                kind: input.kind ?? 'fact',
                triplets,
                tags: [...(input.tags ?? [])],
                provenance: {
                    runId,
                    nodeId,
                    timestamp: this.clock(),
                    source: input.source ?? options.source ?? 'llm',
                },
                supersedes: input.supersedes
                    ?? (policy === 'overwrite' && conflictIds.length > 0 ? conflictIds[conflictIds.length - 1] : undefined),
                flagged: policy === 'flag' && conflictIds.length > 0,
                conflictsWith: conflictIds,
                sequence,
            };
            committed.push(fact);

            for (const clash of clashes) {
                conflicts.push({
                    text: input.text,
                    triplet: clash.triplet,
                    conflictsWith: clash.ids,
                    resolution: policy === 'overwrite' ? 'superseded' : 'flagged',
                    factId: fact.factId,
                });
            }
        }

        if (committed.length > 0) {
            await this.appendRecords(committed);
            for (const fact of committed) {
                this.records.push(deepFreeze(fact));
            }
        }

        return { committed: committed.map(f => deepClone(f)), conflicts };
    }

    private findConflicts(triplets: Triplet[], existing: Fact[]): Array<{ triplet: Triplet; ids: string[] }> {
        const clashes: Array<{ triplet: Triplet; ids: string[] }> = [];
        for (const triplet of triplets) {
            const key = relationKey(triplet);
            const ids = existing
                .filter(fact => fact.triplets.some(t => relationKey(t) === key && !sameObject(t, triplet)))
                .map(fact => fact.factId);
            if (ids.length > 0) clashes.push({ triplet, ids });
        }
        return clashes;
    }
}

/**
 * Process-local store for tests and single-process use.
 */
export class InMemoryFactStore extends AppendOnlyFactStore {
    private readonly seed: Fact[];

    constructor(config: FactStoreConfig & { seed?: Fact[] } = {}) {
        super(config);
        this.seed = config.seed ?? [];
    }

    protected async loadRecords(): Promise<Fact[]> {
        return this.seed;
    }

    protected async appendRecords(_facts: Fact[]): Promise<void> { }
}
