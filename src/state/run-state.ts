/**
 * RunStateStore - one run's mutable state.
 *
 * Node executors never write directly: they stage writes on a
 * {@link StateTransaction} which the controller commits before any
 * outgoing guard is evaluated. Every committed write is journaled with the
 * node and step that made it.
 */

import type { JsonObject, JsonValue } from '../lib/paths';
import {
    deepClone,
    deepEqual,
    deepFreeze,
    deletePath,
    getPath,
    isPlainObject,
    setPath,
    toJsonValue,
} from '../lib/paths';
import type { MergePolicy } from '../graph/schema';
import type { GuardScope } from '../graph/guard';
import type {
    AuditAction,
    AuditEntry,
    BranchEntry,
    CounterName,
    RunCounters,
    RunStateData,
    RunStatus,
    TaskRecord,
    TaskStatus,
    TerminalInfo,
    WriteOp,
} from './types';
import { createCounters } from './types';

// ============================================================================
// Path handling
// ============================================================================

/**
 * Data paths may be written with or without a leading `data.`.
 */
export function normalizeDataPath(path: string): string {
    if (path === 'data') return '';
    return path.startsWith('data.') ? path.slice('data.'.length) : path;
}

// ============================================================================
// Transactions
// ============================================================================

export type StagedOp =
    | { kind: 'data'; op: WriteOp; path: string; value: JsonValue }
    | { kind: 'merged'; taskIds: string[] }
    | { kind: 'counter'; name: CounterName; by: number }
    | { kind: 'routing'; key: string; value: JsonValue }
    | { kind: 'branch'; entry: BranchEntry }
    | { kind: 'task'; record: TaskRecord };

/**
 * Buffered writes for one node execution. Nothing is visible to guards
 * until {@link StateTransaction.commit} runs.
 */
export class StateTransaction {
    private ops: StagedOp[] = [];
    private closed = false;

    constructor(
        private readonly store: RunStateStore,
        readonly nodeId: string,
        readonly step: number,
    ) { }

    /** Set a data path */
    set(path: string, value: unknown): this {
        return this.stage({ kind: 'data', op: 'set', path: normalizeDataPath(path), value: toJsonValue(value) });
    }

    /** Append to an array at a data path, creating it when absent */
    append(path: string, value: unknown): this {
        return this.stage({ kind: 'data', op: 'append', path: normalizeDataPath(path), value: toJsonValue(value) });
    }

    /** Shallow-merge an object into the object at a data path */
    merge(path: string, value: unknown): this {
        return this.stage({ kind: 'data', op: 'merge', path: normalizeDataPath(path), value: toJsonValue(value) });
    }

    remove(path: string): this {
        return this.stage({ kind: 'data', op: 'remove', path: normalizeDataPath(path), value: null });
    }

    bump(name: CounterName, by = 1): this {
        return this.stage({ kind: 'counter', name, by });
    }

    /** Record a routing flag such as a decision target */
    route(key: string, value: unknown): this {
        return this.stage({ kind: 'routing', key, value: toJsonValue(value) });
    }

    /** Stage a task result in its branch namespace; `nodeId` is the spawning node */
    writeBranch(taskId: string, result: unknown, nodeId: string = this.nodeId): this {
        return this.stage({
            kind: 'branch',
            entry: { taskId, nodeId, result: toJsonValue(result), merged: false },
        });
    }

    markMerged(taskIds: string[]): this {
        return this.stage({ kind: 'merged', taskIds: [...taskIds] });
    }

    trackTask(taskId: string, status: TaskStatus, wait: boolean, error?: string, nodeId: string = this.nodeId): this {
        return this.stage({ kind: 'task', record: { taskId, nodeId, status, wait, error } });
    }

    /** Branch results staged in this transaction, in staging order */
    stagedBranches(): BranchEntry[] {
        const entries: BranchEntry[] = [];
        for (const op of this.ops) {
            if (op.kind === 'branch') entries.push(op.entry);
        }
        return entries;
    }

    /** Reads see committed state plus this transaction's staged data writes */
    read(path: string): unknown {
        const preview = this.store.copyData();
        for (const op of this.ops) {
            if (op.kind === 'data') applyDataOp(preview, op.op, op.path, op.value);
        }
        return normalizeDataPath(path) === '' ? preview : getPath(preview, normalizeDataPath(path));
    }

    get size(): number {
        return this.ops.length;
    }

    commit(): void {
        this.ensureOpen();
        this.closed = true;
        this.store.applyTransaction(this.nodeId, this.step, this.ops);
        this.ops = [];
    }

    rollback(): void {
        this.ensureOpen();
        this.closed = true;
        this.ops = [];
    }

    get isOpen(): boolean {
        return !this.closed;
    }

    private stage(op: StagedOp): this {
        this.ensureOpen();
        if (op.kind === 'data' && op.path === '' && op.op !== 'merge') {
            throw new Error('Cannot replace the whole data bag; use merge');
        }
        this.ops.push(op);
        return this;
    }

    private ensureOpen(): void {
        if (this.closed) {
            throw new Error(`Transaction for node "${this.nodeId}" at step ${this.step} is already closed`);
        }
    }
}

function applyDataOp(data: JsonObject, op: WriteOp, path: string, value: JsonValue): void {
    switch (op) {
        case 'set':
            setPath(data, path, deepClone(value));
            return;
        case 'append': {
            const existing = path === '' ? undefined : getPath(data, path);
            if (Array.isArray(existing)) {
                existing.push(deepClone(value));
            } else if (existing === undefined || existing === null) {
                setPath(data, path, [deepClone(value)]);
            } else {
                setPath(data, path, [existing, deepClone(value)]);
            }
            return;
        }
        case 'merge': {
            const target = path === '' ? data : getPath(data, path);
            if (isPlainObject(target) && isPlainObject(value)) {
                Object.assign(target, deepClone(value));
            } else if (path !== '') {
                setPath(data, path, deepClone(value));
            }
            return;
        }
        case 'remove':
            deletePath(data, path);
            return;
    }
}

// ============================================================================
// Merge results
// ============================================================================

export interface MergeConflict {
    key: string;
    taskId: string;
    existing: JsonValue;
    incoming: JsonValue;
}

export interface MergeOutcome {
    merged: string[];
    conflicts: MergeConflict[];
    value: JsonValue;
}

// ============================================================================
// Store
// ============================================================================

export interface RunStateInit {
    runId: string;
    graphName: string;
    graphVersion: number;
    startNodeId: string;
    input?: JsonObject;
    startedAt: number;
}

export class RunStateStore {
    private state: RunStateData;

    constructor(init: RunStateInit | RunStateData) {
        if ('audit' in init) {
            this.state = deepClone(init);
            return;
        }
        this.state = {
            runId: init.runId,
            graphName: init.graphName,
            graphVersion: init.graphVersion,
            status: 'pending',
            currentNodeId: init.startNodeId,
            data: deepClone(init.input ?? {}),
            counters: createCounters(),
            parallel: { order: [], tasks: {} },
            branches: {},
            routing: {},
            audit: [],
            journal: [],
            version: 0,
            startedAt: init.startedAt,
        };
    }

    static fromJSON(data: RunStateData): RunStateStore {
        return new RunStateStore(data);
    }

    // ------------------------------------------------------------------------
    // Reads
    // ------------------------------------------------------------------------

    get runId(): string {
        return this.state.runId;
    }

    get graphVersion(): number {
        return this.state.graphVersion;
    }

    get status(): RunStatus {
        return this.state.status;
    }

    get currentNodeId(): string {
        return this.state.currentNodeId;
    }

    get version(): number {
        return this.state.version;
    }

    /** Live data bag; treat as read-only outside this module */
    get data(): Readonly<JsonObject> {
        return this.state.data;
    }

    get counters(): Readonly<RunCounters> {
        return this.state.counters;
    }

    get audit(): readonly AuditEntry[] {
        return this.state.audit;
    }

    get terminal(): TerminalInfo | undefined {
        return this.state.terminal;
    }

    copyData(): JsonObject {
        return deepClone(this.state.data);
    }

    get(path: string): unknown {
        const normalized = normalizeDataPath(path);
        return normalized === '' ? this.state.data : getPath(this.state.data, normalized);
    }

    getBranch(taskId: string): BranchEntry | undefined {
        return this.state.branches[taskId];
    }

    /** Task ids by status, in spawn order */
    tasksWithStatus(status: TaskStatus): string[] {
        return this.state.parallel.order.filter(id => this.state.parallel.tasks[id]?.status === status);
    }

    /** Task ids spawned by a node, in spawn order */
    tasksSpawnedBy(nodeId: string): string[] {
        return this.state.parallel.order.filter(id => this.state.parallel.tasks[id]?.nodeId === nodeId);
    }

    /**
     * Deep, frozen copy of the whole state for guards and inspection.
     */
    snapshot(): Readonly<RunStateData> {
        return deepFreeze(deepClone(this.state));
    }

    /**
     * Frozen view in the shape guards read.
     */
    guardScope(): GuardScope {
        const snap = this.snapshot();
        return {
            data: snap.data,
            counters: snap.counters,
            parallel: {
                active: this.tasksWithStatus('active'),
                completed: this.tasksWithStatus('completed'),
                failed: this.tasksWithStatus('failed'),
                dropped: this.tasksWithStatus('dropped'),
            },
            run: {
                id: snap.runId,
                step: snap.counters.totalSteps,
                graphVersion: snap.graphVersion,
                currentNode: snap.currentNodeId,
            },
            routing: snap.routing,
        };
    }

    /**
     * Isolated copy of selected data paths for a parallel branch.
     * With no paths the whole data bag is copied.
     */
    slice(paths?: string[]): JsonObject {
        if (!paths || paths.length === 0) {
            return deepClone(this.state.data);
        }
        const out: JsonObject = {};
        for (const raw of paths) {
            const path = normalizeDataPath(raw);
            const value = getPath(this.state.data, path);
            if (value !== undefined) {
                setPath(out, path, deepClone(value));
            }
        }
        return out;
    }

    // ------------------------------------------------------------------------
    // Writes
    // ------------------------------------------------------------------------

    begin(nodeId: string, step: number = this.state.counters.totalSteps): StateTransaction {
        return new StateTransaction(this, nodeId, step);
    }

    /** @internal called by StateTransaction.commit */
    applyTransaction(nodeId: string, step: number, ops: readonly StagedOp[]): void {
        if (ops.length === 0) return;
        for (const op of ops) {
            switch (op.kind) {
                case 'data':
                    applyDataOp(this.state.data, op.op, op.path, op.value);
                    this.state.journal.push({ step, nodeId, op: op.op, path: op.path });
                    break;
                case 'counter':
                    this.state.counters[op.name] += op.by;
                    break;
                case 'routing':
                    setPath(this.state.routing, op.key, deepClone(op.value));
                    break;
                case 'branch':
                    this.state.branches[op.entry.taskId] = deepClone(op.entry);
                    break;
                case 'merged':
                    for (const id of op.taskIds) {
                        const branch = this.state.branches[id];
                        if (branch) branch.merged = true;
                    }
                    break;
                case 'task':
                    this.recordTask(op.record);
                    break;
            }
        }
        this.state.version++;
    }

    private recordTask(record: TaskRecord): void {
        const { parallel, counters } = this.state;
        if (!parallel.tasks[record.taskId]) {
            parallel.order.push(record.taskId);
            counters.tasksSpawned++;
        }
        parallel.tasks[record.taskId] = { ...record };
        if (record.status === 'completed' && !counters.completedTasks.includes(record.taskId)) {
            counters.completedTasks.push(record.taskId);
        }
        if (record.status === 'failed' && !counters.failedTasks.includes(record.taskId)) {
            counters.failedTasks.push(record.taskId);
        }
    }

    setStatus(status: RunStatus): void {
        this.state.status = status;
    }

    /**
     * Move to a node and count the visit.
     */
    enterNode(nodeId: string): void {
        this.state.currentNodeId = nodeId;
        this.state.counters.nodeVisits[nodeId] = (this.state.counters.nodeVisits[nodeId] ?? 0) + 1;
    }

    incrementSteps(): number {
        return ++this.state.counters.totalSteps;
    }

    /**
     * Count one traversal of a retry edge against both bounds.
     */
    recordRetry(edgeId: string): void {
        const { counters } = this.state;
        counters.edgeRetries[edgeId] = (counters.edgeRetries[edgeId] ?? 0) + 1;
        counters.totalRetries++;
    }

    retriesFor(edgeId: string): number {
        return this.state.counters.edgeRetries[edgeId] ?? 0;
    }

    /**
     * Mark tasks that never finished as dropped.
     */
    dropPendingTasks(): string[] {
        const dropped = this.tasksWithStatus('active');
        for (const taskId of dropped) {
            const record = this.state.parallel.tasks[taskId];
            if (record) record.status = 'dropped';
        }
        if (dropped.length > 0) this.state.version++;
        return dropped;
    }

    finish(terminal: TerminalInfo, finishedAt: number): void {
        this.state.terminal = terminal;
        this.state.finishedAt = finishedAt;
        this.state.status = terminal.outcome === 'success'
            ? 'succeeded'
            : terminal.outcome === 'escalate' ? 'escalated' : 'failed';
    }

    appendAudit(
        nodeId: string,
        action: AuditAction,
        summary: string,
        signals: JsonObject = {},
    ): AuditEntry {
        const entry: AuditEntry = {
            sequence: this.state.audit.length + 1,
            step: this.state.counters.totalSteps,
            nodeId,
            action,
            summary,
            signals: deepClone(signals),
        };
        this.state.audit.push(entry);
        return entry;
    }

    // ------------------------------------------------------------------------
    // Branch merging
    // ------------------------------------------------------------------------

    /**
     * Combine completed branch results into shared data under a policy.
     * Branches are merged in spawn order; each branch is merged once.
     * Branches staged on `transaction` but not yet committed are included.
     *
     * - `overwrite`: object results are assigned key by key, later branches win
     * - `append`: each result is appended to the array at `into`
     * - `conflict-flag`: like overwrite, but a key that already holds a
     *   different value keeps it and the clash is recorded under `data.mergeConflicts`
     */
    mergeBranches(
        transaction: StateTransaction,
        into: string,
        policy: MergePolicy,
        taskIds?: string[],
    ): MergeOutcome {
        const staged = new Map(transaction.stagedBranches().map((entry): [string, BranchEntry] => [entry.taskId, entry]));
        const branchFor = (id: string): BranchEntry | undefined => staged.get(id) ?? this.state.branches[id];
        const { order } = this.state.parallel;
        const candidates = [...order, ...[...staged.keys()].filter(id => !order.includes(id))];
        const selected = candidates.filter(id => {
            const branch = branchFor(id);
            return branch !== undefined && !branch.merged && (!taskIds || taskIds.includes(id));
        });

        const current = transaction.read(into);
        const conflicts: MergeConflict[] = [];
        let value: JsonValue;

        if (policy === 'append') {
            const list: JsonValue[] = Array.isArray(current) ? current.map(item => toJsonValue(item)) : [];
            for (const id of selected) list.push(branchFor(id)?.result ?? null);
            value = list;
        } else {
            const target: JsonObject = isPlainObject(current) ? toObject(current) : {};
            let scalar: JsonValue | undefined;
            for (const id of selected) {
                const result = branchFor(id)?.result ?? null;
                if (!isPlainObject(result)) {
                    scalar = result;
                    continue;
                }
                for (const [key, incoming] of Object.entries(result)) {
                    const existing = target[key];
                    if (policy === 'conflict-flag' && existing !== undefined && !deepEqual(existing, incoming)) {
                        conflicts.push({ key, taskId: id, existing, incoming });
                        continue;
                    }
                    target[key] = incoming;
                }
            }
            value = Object.keys(target).length === 0 && scalar !== undefined ? scalar : target;
        }

        transaction.set(into, value);
        for (const conflict of conflicts) {
            transaction.append('mergeConflicts', { into, ...conflict });
        }
        transaction.markMerged(selected);

        return { merged: selected, conflicts, value };
    }

    toJSON(): RunStateData {
        return deepClone(this.state);
    }
}

function toObject(value: Record<string, unknown>): JsonObject {
    const json = toJsonValue(value);
    return isPlainObject(json) ? json : {};
}
