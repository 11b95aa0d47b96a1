/**
 * Append-only memory ("sediment") with confidence and provenance.
 */

export { AppendOnlyFactStore, InMemoryFactStore } from './fact-store';
export type { FactStoreConfig } from './fact-store';
export { FileFactStore } from './file-store';
export type { FileFactStoreConfig } from './file-store';
export { summarizeFacts } from './format';
export type {
    Triplet,
    Provenance,
    Fact,
    FactInput,
    FactQuery,
    WriteOptions,
    ConflictRecord,
    WriteResult,
    MemoryStats,
    MemoryStore,
    ConflictPolicy,
    FactKind,
} from './types';
