/**
 * Spawning parallel tasks from a node and recording their outcomes.
 */

import { ParallelTaskFailure } from '../lib/errors';
import type { JsonObject } from '../lib/paths';
import { getPath, isPlainObject, setPath, toJsonObject } from '../lib/paths';
import type { ParallelDirective, TaskSpecDocument } from '../graph/schema';
import { taskSpecSchema } from '../graph/schema';
import { normalizeDataPath } from '../state/run-state';
import type { StateTransaction } from '../state/run-state';
import type { RunStateStore } from '../state/run-state';
import type { TaskOutcome, TaskSpec } from '../parallel/coordinator';
import { renderTemplate } from './template';
import type { NodeContext } from './types';

export interface SpawnSummary {
    spawned: string[];
    completed: string[];
    failed: string[];
    /** Fire-and-forget tasks still running when the node finished */
    detached: string[];
    /** Specs dropped by the decompose child cap */
    capped: number;
}

/**
 * Deterministic task id: `<node>.<task id or 1-based index>`, suffixed with
 * `@<visit>` when the node runs more than once.
 */
export function taskIdFor(nodeId: string, localId: string, visit: number): string {
    return visit > 1 ? `${nodeId}.${localId}@${visit}` : `${nodeId}.${localId}`;
}

/** Copy the named paths out of a data bag; no paths copies everything */
export function sliceData(data: JsonObject, paths: string[] | undefined): JsonObject {
    if (!paths || paths.length === 0) return toJsonObject(data);
    const out: JsonObject = {};
    for (const raw of paths) {
        const path = normalizeDataPath(raw);
        const value = getPath(data, path);
        if (value !== undefined) setPath(out, path, value);
    }
    return toJsonObject(out);
}

/**
 * Local ids in spec order: the spec's own id or its 1-based index, with
 * `#2`, `#3`, ... appended to repeats.
 */
export function uniqueLocalIds(specs: readonly TaskSpecDocument[]): string[] {
    const used = new Set<string>();
    return specs.map((doc, i) => {
        const base = doc.id ?? String(i + 1);
        let id = base;
        for (let n = 2; used.has(id); n++) id = `${base}#${n}`;
        used.add(id);
        return id;
    });
}

/**
 * Spawn the tasks declared by `directive` (plus any the node's output
 * lists under `fromOutput`) and wait for the awaited ones.
 *
 * Task bookkeeping and branch results go through their own transaction,
 * committed once the awaited tasks settle, so they survive a rollback of
 * the node's writes.
 *
 * @throws ParallelTaskFailure when an awaited task with `propagate` fails
 */
export async function spawnTasks(
    context: NodeContext,
    directive: ParallelDirective,
    output: unknown,
): Promise<SpawnSummary> {
    const { node, transaction, coordinator, config, state, logger } = context;
    const declared = collectSpecs(directive, output, context);

    const limit = context.spawnLimit;
    const accepted = limit !== undefined ? declared.slice(0, limit) : declared;
    const capped = declared.length - accepted.length;
    if (capped > 0) {
        logger.warn('Task specs exceed decompose cap', { nodeId: node.id, cap: limit, dropped: capped });
    }

    const data = toJsonObject(transaction.read(''));
    const scope = { data, counters: state.counters, run: { id: state.runId } };
    const localIds = uniqueLocalIds(accepted);
    accepted.forEach((doc, i) => {
        if (doc.id !== undefined && localIds[i] !== doc.id) {
            logger.warn('Renamed repeated task id', { nodeId: node.id, taskId: doc.id, renamed: localIds[i] });
        }
    });
    const specs: TaskSpec[] = accepted.map((doc, i) => ({
        taskId: taskIdFor(node.id, localIds[i], context.visit),
        nodeId: node.id,
        instruction: renderTemplate(doc.instruction, scope),
        skill: doc.skill,
        params: doc.params,
        slice: sliceData(data, doc.context),
        timeoutMs: doc.timeoutMs ?? directive.timeoutMs ?? config.defaultTaskTimeoutMs,
        wait: doc.wait ?? directive.wait ?? true,
        onFail: doc.onFail ?? directive.onFail ?? 'log_and_continue',
    }));

    const summary: SpawnSummary = { spawned: [], completed: [], failed: [], detached: [], capped };
    if (specs.length === 0) return summary;

    const handles = coordinator.spawn(specs, directive.maxConcurrent ?? config.maxConcurrentTasks);
    const ledger = state.begin(node.id, transaction.step);
    for (const spec of specs) {
        ledger.trackTask(spec.taskId, 'active', spec.wait);
        if (spec.skill) ledger.bump('skillsInvoked');
        state.appendAudit(node.id, 'task_spawned', `Spawned ${spec.taskId}`, {
            taskId: spec.taskId,
            wait: spec.wait,
            onFail: spec.onFail,
        });
        summary.spawned.push(spec.taskId);
    }

    const outcomes = await coordinator.awaitTasks(handles);
    coordinator.markCollected(outcomes.map(o => o.taskId));
    recordOutcomes(ledger, state, node.id, outcomes);
    ledger.commit();

    for (const outcome of outcomes) {
        (outcome.status === 'completed' ? summary.completed : summary.failed).push(outcome.taskId);
    }
    summary.detached = specs.filter(s => !s.wait).map(s => s.taskId);

    const propagated = outcomes.find(o => o.status === 'failed' && o.onFail === 'propagate');
    if (propagated) {
        throw new ParallelTaskFailure(propagated.taskId, propagated.error ?? 'unknown error');
    }
    return summary;
}

/**
 * Stage settled outcomes: results go to branch namespaces, failures to
 * the failed-task list. Audited against `auditNodeId`.
 */
export function recordOutcomes(
    transaction: StateTransaction,
    state: RunStateStore,
    auditNodeId: string,
    outcomes: TaskOutcome[],
): void {
    for (const outcome of outcomes) {
        if (outcome.status === 'completed') {
            transaction.writeBranch(outcome.taskId, outcome.result ?? null, outcome.nodeId);
            transaction.trackTask(outcome.taskId, 'completed', outcome.wait, undefined, outcome.nodeId);
            state.appendAudit(auditNodeId, 'task_completed', `Task ${outcome.taskId} completed`, {
                taskId: outcome.taskId,
            });
        } else {
            transaction.trackTask(outcome.taskId, 'failed', outcome.wait, outcome.error, outcome.nodeId);
            state.appendAudit(auditNodeId, 'task_failed', `Task ${outcome.taskId} failed: ${outcome.error ?? 'unknown error'}`, {
                taskId: outcome.taskId,
                timedOut: outcome.timedOut,
                onFail: outcome.onFail,
            });
        }
    }
}

function collectSpecs(directive: ParallelDirective, output: unknown, context: NodeContext): TaskSpecDocument[] {
    const specs = [...(directive.tasks ?? [])];
    if (directive.fromOutput === undefined) return specs;

    const listed = getPath(output, directive.fromOutput);
    if (!Array.isArray(listed)) return specs;

    listed.forEach((item, i) => {
        const candidate = typeof item === 'string' ? { instruction: item } : item;
        const parsed = taskSpecSchema.safeParse(isPlainObject(candidate) ? candidate : {});
        if (parsed.success) {
            specs.push(parsed.data);
        } else {
            context.logger.warn('Ignoring malformed task spec from model output', {
                nodeId: context.node.id,
                index: i,
            });
        }
    });
    return specs;
}
