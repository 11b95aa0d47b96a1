import { ArtifactConflictError, ProposalNotFoundError } from '../lib/errors';
import { deepClone } from '../lib/paths';
import type { ChangeLogRecord, Proposal, ProposalStatus } from '../learning/types';
import type { ArtifactStore, RunArtifact, RunFilter } from './types';

/**
 * Process-local artifact store. Returned values are copies.
 */
export class MemoryArtifactStore implements ArtifactStore {
    private runs = new Map<string, RunArtifact>();
    private proposals = new Map<string, Proposal>();
    private changeLog: ChangeLogRecord[] = [];

    async saveRun(artifact: RunArtifact): Promise<void> {
        if (this.runs.has(artifact.runId)) {
            throw new ArtifactConflictError(`run:${artifact.runId}`);
        }
        this.runs.set(artifact.runId, deepClone(artifact));
    }

    async loadRun(runId: string): Promise<RunArtifact | undefined> {
        const run = this.runs.get(runId);
        return run ? deepClone(run) : undefined;
    }

    async listRuns(filter: RunFilter = {}): Promise<RunArtifact[]> {
        return [...this.runs.values()]
            .filter(run => (filter.graphName === undefined || run.graphName === filter.graphName)
                && (filter.status === undefined || run.status === filter.status))
            .map(run => deepClone(run));
    }

    async saveProposal(proposal: Proposal): Promise<void> {
        if (this.proposals.has(proposal.id)) {
            throw new ArtifactConflictError(`proposal:${proposal.id}`);
        }
        this.proposals.set(proposal.id, deepClone(proposal));
    }

    async listProposals(status?: ProposalStatus): Promise<Proposal[]> {
        return [...this.proposals.values()]
            .filter(p => status === undefined || p.status === status)
            .map(p => deepClone(p));
    }

    async updateProposalStatus(proposalId: string, status: ProposalStatus): Promise<Proposal> {
        const proposal = this.proposals.get(proposalId);
        if (!proposal) {
            throw new ProposalNotFoundError(proposalId);
        }
        proposal.status = status;
        return deepClone(proposal);
    }

    async appendChangeLog(records: ChangeLogRecord[]): Promise<void> {
        this.changeLog.push(...records.map(r => deepClone(r)));
    }

    async readChangeLog(): Promise<ChangeLogRecord[]> {
        return this.changeLog.map(r => deepClone(r));
    }
}
