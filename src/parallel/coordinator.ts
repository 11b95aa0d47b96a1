/**
 * Parallel Task Coordinator.
 *
 * Runs independent tasks concurrently under a concurrency limit, each on
 * its own deep-copied state slice with its own timeout. A failing task
 * never cancels its siblings; what happens next is decided by its
 * `onFail` policy in the node executor. Results are handed back as
 * outcomes and only ever reach shared data through a merge node.
 */

import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { getGlobalTracer } from '../lib/tracer';
import { SluiceError, errorMessage } from '../lib/errors';
import type { JsonObject, JsonValue } from '../lib/paths';
import { deepClone, toJsonValue } from '../lib/paths';
import type { FailurePolicy } from '../graph/schema';

// ============================================================================
// Types
// ============================================================================

export interface TaskSpec {
    /** Deterministic id, unique within the run */
    taskId: string;
    /** Node that spawned the task */
    nodeId: string;
    instruction: string;
    /** Skill to invoke; without one the task is a model call */
    skill?: string;
    params?: JsonObject;
    /** Isolated copy of the state the task may read */
    slice: JsonObject;
    timeoutMs: number;
    wait: boolean;
    onFail: FailurePolicy;
}

export interface TaskOutcome {
    taskId: string;
    nodeId: string;
    status: 'completed' | 'failed';
    result?: JsonValue;
    error?: string;
    timedOut: boolean;
    wait: boolean;
    onFail: FailurePolicy;
}

export interface TaskHandle {
    readonly spec: TaskSpec;
    /** Settles with the task's outcome; never rejects */
    readonly done: Promise<TaskOutcome>;
    outcome(): TaskOutcome | undefined;
    abort(reason?: string): void;
}

/** Executes one task; receives an abort signal tied to its timeout */
export type TaskRunner = (spec: TaskSpec, signal: AbortSignal) => Promise<unknown>;

export interface CoordinatorConfig {
    runner: TaskRunner;
    /** Default concurrency limit (default: 3) */
    maxConcurrent?: number;
    logger?: Logger;
    tracer?: Tracer;
}

class TaskTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Task timed out after ${timeoutMs}ms`);
        this.name = 'TaskTimeoutError';
    }
}

// ============================================================================
// Coordinator
// ============================================================================

export class ParallelCoordinator {
    private readonly runner: TaskRunner;
    private readonly maxConcurrent: number;
    private readonly logger: Logger;
    private readonly tracer: Tracer;
    private readonly handles = new Map<string, TaskHandle>();
    /** Outcomes already delivered to the run state */
    private readonly collected = new Set<string>();

    constructor(config: CoordinatorConfig) {
        this.runner = config.runner;
        this.maxConcurrent = config.maxConcurrent ?? 3;
        this.logger = config.logger ?? noopLogger;
        this.tracer = config.tracer ?? getGlobalTracer();
    }

    /**
     * Start tasks. Returns one handle per spec, in spec order.
     *
     * @throws SluiceError when a task id repeats; nothing is started then
     */
    spawn(specs: TaskSpec[], maxConcurrent: number = this.maxConcurrent): TaskHandle[] {
        const ids = new Set<string>();
        for (const spec of specs) {
            if (this.handles.has(spec.taskId) || ids.has(spec.taskId)) {
                throw new SluiceError(`Task id "${spec.taskId}" already spawned in this run`);
            }
            ids.add(spec.taskId);
        }

        const semaphore = createSemaphore(Math.max(1, maxConcurrent));
        return specs.map(spec => {
            const handle = this.start({ ...spec, slice: deepClone(spec.slice) }, semaphore);
            this.handles.set(spec.taskId, handle);
            return handle;
        });
    }

    /**
     * Wait for the handles flagged `wait`. Fire-and-forget handles are
     * skipped. With `timeoutMs`, tasks still running at the deadline are
     * aborted and reported as timed out.
     */
    async awaitTasks(handles: TaskHandle[], timeoutMs?: number): Promise<TaskOutcome[]> {
        const awaited = handles.filter(h => h.spec.wait);
        if (awaited.length === 0) return [];

        const all = Promise.all(awaited.map(h => h.done));
        if (timeoutMs === undefined) {
            return all;
        }

        let timer: ReturnType<typeof setTimeout> | undefined;
        const deadline = new Promise<'deadline'>(resolve => {
            timer = setTimeout(() => resolve('deadline'), timeoutMs);
        });
        try {
            const first = await Promise.race([all, deadline]);
            if (first === 'deadline') {
                for (const handle of awaited) {
                    if (!handle.outcome()) handle.abort(`await deadline of ${timeoutMs}ms`);
                }
                return await all;
            }
            return first;
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Outcomes that have settled but were not yet delivered, in spawn order.
     * Each outcome is returned once.
     */
    collectSettled(nodeId?: string): TaskOutcome[] {
        const outcomes: TaskOutcome[] = [];
        for (const [taskId, handle] of this.handles) {
            if (this.collected.has(taskId)) continue;
            if (nodeId !== undefined && handle.spec.nodeId !== nodeId) continue;
            const outcome = handle.outcome();
            if (outcome) {
                outcomes.push(outcome);
                this.collected.add(taskId);
            }
        }
        return outcomes;
    }

    /** Mark outcomes as delivered so {@link collectSettled} skips them */
    markCollected(taskIds: string[]): void {
        taskIds.forEach(id => this.collected.add(id));
    }

    /** Ids of tasks still running, in spawn order */
    pending(): string[] {
        return [...this.handles.values()].filter(h => !h.outcome()).map(h => h.spec.taskId);
    }

    /**
     * Abort every unfinished task. Used at run end for fire-and-forget work.
     */
    dropPending(): string[] {
        const dropped = this.pending();
        for (const taskId of dropped) {
            this.handles.get(taskId)?.abort('run finished');
            this.collected.add(taskId);
        }
        return dropped;
    }

    private start(spec: TaskSpec, semaphore: Semaphore): TaskHandle {
        const controller = new AbortController();
        let settled: TaskOutcome | undefined;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const finish = (outcome: TaskOutcome): TaskOutcome => {
            settled = settled ?? outcome;
            return settled;
        };

        const aborted = new Promise<never>((_, reject) => {
            controller.signal.addEventListener('abort', () => {
                const reason: unknown = controller.signal.reason;
                reject(reason instanceof Error ? reason : new Error(String(reason)));
            }, { once: true });
        });
        // The race below observes this rejection; keep it from surfacing unhandled
        aborted.catch(() => undefined);

        const run = async (): Promise<TaskOutcome> => {
            await semaphore.acquire();
            const span = this.tracer.startSpan('sluice.task', { 'sluice.task_id': spec.taskId, 'sluice.node_id': spec.nodeId });
            try {
                if (controller.signal.aborted) {
                    throw controller.signal.reason instanceof Error ? controller.signal.reason : new Error('Task aborted');
                }
                timer = setTimeout(() => controller.abort(new TaskTimeoutError(spec.timeoutMs)), spec.timeoutMs);
                const result = await Promise.race([this.runner(spec, controller.signal), aborted]);
                this.logger.debug('Task completed', { taskId: spec.taskId });
                return finish({
                    taskId: spec.taskId,
                    nodeId: spec.nodeId,
                    status: 'completed',
                    result: toJsonValue(result),
                    timedOut: false,
                    wait: spec.wait,
                    onFail: spec.onFail,
                });
            } catch (error) {
                const timedOut = error instanceof TaskTimeoutError;
                span.recordException(error instanceof Error ? error : new Error(String(error)));
                this.logger.warn('Task failed', { taskId: spec.taskId, error: errorMessage(error), timedOut });
                return finish({
                    taskId: spec.taskId,
                    nodeId: spec.nodeId,
                    status: 'failed',
                    error: errorMessage(error),
                    timedOut,
                    wait: spec.wait,
                    onFail: spec.onFail,
                });
            } finally {
                clearTimeout(timer);
                span.end();
                semaphore.release();
            }
        };

        const done = run();
        return {
            spec,
            done,
            outcome: () => settled,
            abort: (reason = 'aborted') => {
                if (!controller.signal.aborted) {
                    controller.abort(new Error(`Task ${reason}`));
                }
            },
        };
    }
}

// ============================================================================
// Semaphore (for maxConcurrent)
// ============================================================================

interface Semaphore {
    acquire(): Promise<void>;
    release(): void;
}

function createSemaphore(max: number): Semaphore {
    let current = 0;
    const queue: Array<() => void> = [];

    return {
        async acquire() {
            if (current < max) {
                current++;
                return;
            }
            await new Promise<void>(resolve => queue.push(resolve));
            current++;
        },
        release() {
            current--;
            const next = queue.shift();
            if (next) next();
        },
    };
}
