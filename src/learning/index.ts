/**
 * Learning loop: analyze finished runs, propose changes, publish versions.
 */

export { analyzeRuns } from './analyzer';
export {
    generateProposals,
    WEIGHT_STEP,
    MAX_EDGE_WEIGHT,
    MAX_RELATIONSHIP_WEIGHT,
    LOW_TAKE_RATE,
    MIN_SUCCESS_RATE,
} from './proposals';
export type { ProposalOptions } from './proposals';
export { GraphRegistry, applyChange, isEligible } from './applier';
export type { GraphRegistryConfig, ApplyOptions, ApplyResult, SkipReason } from './applier';
export { AUTO_APPLY_TYPES } from './types';
export type {
    ChangeType,
    ChangeRisk,
    Change,
    ProposalStatus,
    Proposal,
    ChangeLogRecord,
    RunSummary,
    EdgeSignal,
    RetrySignal,
    OutcomeSignal,
    Bottleneck,
    RunAnalysis,
} from './types';
