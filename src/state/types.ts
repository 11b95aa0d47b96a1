/**
 * Run state shapes. Everything here is JSON-serializable so a run can be
 * persisted as an artifact and reloaded for analysis.
 */

import type { JsonObject, JsonValue } from '../lib/paths';

export type RunStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'escalated';

export interface RunCounters {
    totalSteps: number;
    nodeVisits: Record<string, number>;
    edgeRetries: Record<string, number>;
    totalRetries: number;
    memoryWrites: number;
    memoryConflicts: number;
    skillsInvoked: number;
    tasksSpawned: number;
    /** Extra output-schema attempts across all nodes */
    outputRetries: number;
    completedTasks: string[];
    failedTasks: string[];
}

export type CounterName =
    | 'memoryWrites'
    | 'memoryConflicts'
    | 'skillsInvoked'
    | 'tasksSpawned'
    | 'outputRetries';

export type TaskStatus = 'active' | 'completed' | 'failed' | 'dropped';

export interface TaskRecord {
    taskId: string;
    nodeId: string;
    status: TaskStatus;
    wait: boolean;
    error?: string;
}

export interface ParallelBookkeeping {
    /** Task ids in spawn order */
    order: string[];
    tasks: Record<string, TaskRecord>;
}

/** Result of one parallel task, held apart from shared data until merged */
export interface BranchEntry {
    taskId: string;
    nodeId: string;
    result: JsonValue;
    merged: boolean;
}

export type AuditAction =
    | 'run_started'
    | 'node_executed'
    | 'node_failed'
    | 'edge_evaluated'
    | 'edge_taken'
    | 'retry_exhausted'
    | 'forced_transition'
    | 'task_spawned'
    | 'task_completed'
    | 'task_failed'
    | 'task_dropped'
    | 'branches_merged'
    | 'memory_written'
    | 'memory_conflict'
    | 'gate_evaluated'
    | 'decision_made'
    | 'signal'
    | 'terminal_reached';

export interface AuditEntry {
    /** Strictly increasing within a run */
    sequence: number;
    /** Controller step the entry belongs to */
    step: number;
    nodeId: string;
    action: AuditAction;
    summary: string;
    signals: JsonObject;
}

export type WriteOp = 'set' | 'append' | 'merge' | 'remove';

/** Attribution record for every committed data write */
export interface WriteRecord {
    step: number;
    nodeId: string;
    op: WriteOp;
    path: string;
}

export interface TerminalInfo {
    nodeId: string;
    outcome: 'success' | 'failure' | 'escalate';
    /** Structured reason, e.g. `reached`, `retry_bound_exceeded`, `max_steps_exceeded` */
    reason: string;
    detail?: string;
    /** Minimal resume snapshot carried by escalations */
    resume?: EscalationSnapshot;
}

export interface EscalationSnapshot {
    nodeId: string;
    data: JsonObject;
    counters: RunCounters;
    pendingTasks: string[];
}

/** Serialized form of a run */
export interface RunStateData {
    runId: string;
    graphName: string;
    graphVersion: number;
    status: RunStatus;
    currentNodeId: string;
    data: JsonObject;
    counters: RunCounters;
    parallel: ParallelBookkeeping;
    branches: Record<string, BranchEntry>;
    routing: JsonObject;
    audit: AuditEntry[];
    journal: WriteRecord[];
    version: number;
    startedAt: number;
    finishedAt?: number;
    terminal?: TerminalInfo;
}

export function createCounters(): RunCounters {
    return {
        totalSteps: 0,
        nodeVisits: {},
        edgeRetries: {},
        totalRetries: 0,
        memoryWrites: 0,
        memoryConflicts: 0,
        skillsInvoked: 0,
        tasksSpawned: 0,
        outputRetries: 0,
        completedTasks: [],
        failedTasks: [],
    };
}
