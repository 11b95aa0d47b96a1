import type { ConflictPolicy, FactKind } from '../graph/schema';

export type { ConflictPolicy, FactKind };

/** Subject / predicate / object relation carried by a fact */
export interface Triplet {
    subject: string;
    predicate: string;
    object: string;
}

export interface Provenance {
    runId: string;
    nodeId: string;
    /** Epoch milliseconds */
    timestamp: number;
    /** What produced the fact, e.g. `llm`, `tool`, `learning` */
    source: string;
}

/** A committed memory record. Never modified after it is written. */
export interface Fact {
    factId: string;
    text: string;
    /** In [0, 1]; carried as given, never recomputed */
    confidence: number;
    kind: FactKind;
    triplets: Triplet[];
    tags: string[];
    provenance: Provenance;
    /** Id of the fact this record corrects */
    supersedes?: string;
    /** Set when the fact contradicted an existing record at write time */
    flagged: boolean;
    conflictsWith: string[];
    /** Store-assigned commit order */
    sequence: number;
}

/** What callers hand to {@link MemoryStore.write} */
export interface FactInput {
    text: string;
    confidence?: number;
    kind?: FactKind;
    triplets?: Triplet[];
    tags?: string[];
    source?: string;
    supersedes?: string;
}

export interface FactQuery {
    /** Case-insensitive substring match on the text */
    text?: string;
    subjects?: string[];
    predicates?: string[];
    objects?: string[];
    kinds?: FactKind[];
    /** Matches facts carrying any of these tags */
    tags?: string[];
    minConfidence?: number;
    /** Hide records another record supersedes */
    excludeSuperseded?: boolean;
    limit?: number;
}

export interface WriteOptions {
    /** How contradictions are handled (default: 'flag') */
    conflictPolicy?: ConflictPolicy;
    /** Default provenance source (default: 'llm') */
    source?: string;
}

export interface ConflictRecord {
    text: string;
    triplet: Triplet;
    conflictsWith: string[];
    resolution: 'flagged' | 'superseded' | 'rejected';
    /** Id of the committed record, absent when rejected */
    factId?: string;
}

export interface WriteResult {
    committed: Fact[];
    conflicts: ConflictRecord[];
}

export interface MemoryStats {
    totalRecords: number;
    flaggedRecords: number;
    supersededRecords: number;
    byKind: Record<string, number>;
    uniqueSubjects: number;
}

/**
 * Append-only fact store ("sediment").
 */
export interface MemoryStore {
    /** Commit facts with provenance; conflicts are reported, never resolved destructively */
    write(facts: FactInput[], runId: string, nodeId: string, options?: WriteOptions): Promise<WriteResult>;
    /** Ranked by confidence, then most recent first */
    query(filter?: FactQuery): Promise<Fact[]>;
    get(factId: string): Promise<Fact | undefined>;
    stats(): Promise<MemoryStats>;
}
