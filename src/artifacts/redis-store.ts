/**
 * Redis artifact store.
 * Works with any ioredis-compatible client.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisArtifactStore } from 'sluice';
 *
 * const redis = new Redis('redis://localhost:6379');
 * const artifacts = new RedisArtifactStore(redis, { prefix: 'myapp:' });
 * ```
 */

import type { z } from 'zod';
import { ArtifactConflictError, ProposalNotFoundError, SluiceError } from '../lib/errors';
import type { ChangeLogRecord, Proposal, ProposalStatus } from '../learning/types';
import { changeLogRecordSchema, proposalSchema, runArtifactSchema } from './schema';
import type { ArtifactStore, RunArtifact, RunFilter } from './types';

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
    set(key: string, value: string): Promise<'OK' | null>;
    set(key: string, value: string, mode: 'NX'): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    rpush(key: string, ...values: string[]): Promise<number>;
    lrange(key: string, start: number, stop: number): Promise<string[]>;
}

export interface RedisArtifactStoreConfig {
    /** Key prefix (default: 'sluice:') */
    prefix?: string;
}

export class RedisArtifactStore implements ArtifactStore {
    private readonly redis: RedisClient;
    private readonly prefix: string;

    constructor(client: RedisClient, config: RedisArtifactStoreConfig = {}) {
        this.redis = client;
        this.prefix = config.prefix ?? 'sluice:';
    }

    private key(...parts: string[]): string {
        return `${this.prefix}${parts.join(':')}`;
    }

    // ------------------------------------------------------------------------
    // Runs
    // ------------------------------------------------------------------------

    async saveRun(artifact: RunArtifact): Promise<void> {
        const stored = await this.redis.set(this.key('run', artifact.runId), JSON.stringify(artifact), 'NX');
        if (stored === null) {
            throw new ArtifactConflictError(`run:${artifact.runId}`);
        }
        await this.redis.rpush(this.key('runs'), artifact.runId);
    }

    async loadRun(runId: string): Promise<RunArtifact | undefined> {
        const raw = await this.redis.get(this.key('run', runId));
        return raw === null ? undefined : decode(runArtifactSchema, raw, `run:${runId}`);
    }

    async listRuns(filter: RunFilter = {}): Promise<RunArtifact[]> {
        const ids = await this.redis.lrange(this.key('runs'), 0, -1);
        const runs: RunArtifact[] = [];
        for (const id of ids) {
            const run = await this.loadRun(id);
            if (!run) continue;
            if (filter.graphName !== undefined && run.graphName !== filter.graphName) continue;
            if (filter.status !== undefined && run.status !== filter.status) continue;
            runs.push(run);
        }
        return runs;
    }

    // ------------------------------------------------------------------------
    // Proposals
    // ------------------------------------------------------------------------

    async saveProposal(proposal: Proposal): Promise<void> {
        const stored = await this.redis.set(this.key('proposal', proposal.id), JSON.stringify(proposal), 'NX');
        if (stored === null) {
            throw new ArtifactConflictError(`proposal:${proposal.id}`);
        }
        await this.redis.rpush(this.key('proposals'), proposal.id);
    }

    async listProposals(status?: ProposalStatus): Promise<Proposal[]> {
        const ids = await this.redis.lrange(this.key('proposals'), 0, -1);
        const proposals: Proposal[] = [];
        for (const id of ids) {
            const proposal = await this.loadProposal(id);
            if (proposal && (status === undefined || proposal.status === status)) {
                proposals.push(proposal);
            }
        }
        return proposals;
    }

    async updateProposalStatus(proposalId: string, status: ProposalStatus): Promise<Proposal> {
        const proposal = await this.loadProposal(proposalId);
        if (!proposal) {
            throw new ProposalNotFoundError(proposalId);
        }
        const updated: Proposal = { ...proposal, status };
        await this.redis.set(this.key('proposal', proposalId), JSON.stringify(updated));
        return updated;
    }

    private async loadProposal(proposalId: string): Promise<Proposal | undefined> {
        const raw = await this.redis.get(this.key('proposal', proposalId));
        return raw === null ? undefined : decode(proposalSchema, raw, `proposal:${proposalId}`);
    }

    // ------------------------------------------------------------------------
    // Change log
    // ------------------------------------------------------------------------

    async appendChangeLog(records: ChangeLogRecord[]): Promise<void> {
        if (records.length === 0) return;
        await this.redis.rpush(this.key('changelog'), ...records.map(r => JSON.stringify(r)));
    }

    async readChangeLog(): Promise<ChangeLogRecord[]> {
        const entries = await this.redis.lrange(this.key('changelog'), 0, -1);
        return entries.map((raw, i) => decode(changeLogRecordSchema, raw, `changelog[${i}]`));
    }
}

function decode<T>(schema: z.ZodType<T>, raw: string, key: string): T {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new SluiceError(`Artifact ${key} is not valid JSON`);
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
        throw new SluiceError(`Artifact ${key} is malformed: ${result.error.errors[0]?.message ?? 'unknown issue'}`);
    }
    return result.data;
}
