export { RunStateStore, StateTransaction, normalizeDataPath } from './run-state';
export type { RunStateInit, MergeConflict, MergeOutcome, StagedOp } from './run-state';
export { createCounters } from './types';
export type {
    RunStatus,
    RunCounters,
    CounterName,
    TaskStatus,
    TaskRecord,
    ParallelBookkeeping,
    BranchEntry,
    AuditAction,
    AuditEntry,
    WriteOp,
    WriteRecord,
    TerminalInfo,
    EscalationSnapshot,
    RunStateData,
} from './types';
