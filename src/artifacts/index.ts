export type { ArtifactStore, RunArtifact, RunFilter } from './types';
export { MemoryArtifactStore } from './memory-store';
export { RedisArtifactStore } from './redis-store';
export type { RedisClient, RedisArtifactStoreConfig } from './redis-store';
export { runArtifactSchema, proposalSchema, changeLogRecordSchema } from './schema';
