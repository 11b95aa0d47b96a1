/**
 * Run artifacts: write-once records of finished runs, proposals and the
 * change log.
 */

import type { RunStateData, RunStatus, TerminalInfo } from '../state/types';
import type { ChangeLogRecord, Proposal, ProposalStatus } from '../learning/types';

export interface RunArtifact {
    runId: string;
    graphName: string;
    graphVersion: number;
    status: RunStatus;
    terminal?: TerminalInfo;
    /** Final state including the audit log */
    state: RunStateData;
    savedAt: number;
}

export interface RunFilter {
    graphName?: string;
    status?: RunStatus;
}

export interface ArtifactStore {
    /** @throws ArtifactConflictError when the run was already saved */
    saveRun(artifact: RunArtifact): Promise<void>;
    loadRun(runId: string): Promise<RunArtifact | undefined>;
    /** Oldest first */
    listRuns(filter?: RunFilter): Promise<RunArtifact[]>;
    /** @throws ArtifactConflictError when the proposal id exists */
    saveProposal(proposal: Proposal): Promise<void>;
    /** Oldest first */
    listProposals(status?: ProposalStatus): Promise<Proposal[]>;
    /** @throws ProposalNotFoundError */
    updateProposalStatus(proposalId: string, status: ProposalStatus): Promise<Proposal>;
    appendChangeLog(records: ChangeLogRecord[]): Promise<void>;
    readChangeLog(): Promise<ChangeLogRecord[]>;
}
