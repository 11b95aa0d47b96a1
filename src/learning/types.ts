/**
 * Learning loop shapes: run analysis, proposals and the change log.
 */

import type { JsonValue } from '../lib/paths';
import type { RunStatus } from '../state/types';

// ============================================================================
// Changes & proposals
// ============================================================================

export type ChangeType =
    | 'update-edge-priority'
    | 'update-edge-weight'
    | 'update-relationship-weight'
    | 'add-relationship'
    | 'update-guard'
    | 'update-max-retries'
    | 'add-edge'
    | 'remove-edge'
    | 'add-node'
    | 'remove-node'
    | 'update-prompt';

/** Change types that may be published without operator approval */
export const AUTO_APPLY_TYPES: ReadonlySet<ChangeType> = new Set<ChangeType>([
    'update-edge-priority',
    'update-edge-weight',
    'update-relationship-weight',
    'add-relationship',
]);

export type ChangeRisk = 'low' | 'medium' | 'high';

export interface Change {
    id: string;
    type: ChangeType;
    /** Edge, node or relationship id the change targets */
    targetId: string;
    /** Value the change expects to find; a mismatch makes it stale */
    oldValue: JsonValue;
    newValue: JsonValue;
    rationale: string;
    autoApply: boolean;
    risk: ChangeRisk;
}

/** `failed`: the change would leave the graph invalid */
export type ProposalStatus = 'pending' | 'approved' | 'rejected' | 'applied' | 'failed';

export interface Proposal {
    id: string;
    createdAt: number;
    graphName: string;
    /** Graph version the proposal was generated against */
    graphVersion: number;
    supportingRunIds: string[];
    summary: string;
    confidence: number;
    status: ProposalStatus;
    changes: Change[];
}

/** One applied change, as recorded in the change log */
export interface ChangeLogRecord {
    proposalId: string;
    change: Change;
    graphName: string;
    fromVersion: number;
    toVersion: number;
    appliedAt: number;
}

// ============================================================================
// Analysis
// ============================================================================

export interface RunSummary {
    runId: string;
    status: RunStatus;
    graphVersion: number;
    /** Node ids in visit order, terminal included */
    path: string[];
    /** Node where a failed or escalated run went wrong */
    failurePoint?: string;
    steps: number;
}

export interface EdgeSignal {
    edgeId: string;
    from: string;
    to: string;
    /** Routing decisions in which the edge was a candidate */
    evaluations: number;
    taken: number;
    /** Distinct runs in which the edge was a candidate */
    runsEvaluated: string[];
    runsTaken: string[];
    succeededRuns: string[];
    failedRuns: string[];
}

export interface RetrySignal {
    edgeId: string;
    traversals: number;
    /** Runs in which the edge's own bound forced the failure terminal */
    boundHitRuns: string[];
}

export interface OutcomeSignal {
    total: number;
    succeeded: number;
    failed: number;
    escalated: number;
}

export interface Bottleneck {
    nodeId: string;
    /** Runs in which the node was visited more than once */
    runs: string[];
    maxVisits: number;
}

export interface RunAnalysis {
    runs: RunSummary[];
    /** Distinct node paths of successful runs */
    successfulPaths: string[][];
    /** Failure point node id to the runs that failed there */
    failurePoints: Record<string, string[]>;
    bottlenecks: Bottleneck[];
    signals: {
        edges: Record<string, EdgeSignal>;
        retries: Record<string, RetrySignal>;
        outcomes: OutcomeSignal;
    };
}
