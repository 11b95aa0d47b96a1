/**
 * Run analyzer: a pure function over finished runs' audit logs.
 */

import type { JsonValue } from '../lib/paths';
import { isPlainObject } from '../lib/paths';
import type { AuditEntry, RunStateData } from '../state/types';
import type {
    Bottleneck,
    EdgeSignal,
    RetrySignal,
    RunAnalysis,
    RunSummary,
} from './types';

/** `edge_evaluated` entries list candidates as `{ edgeId, to }` */
function candidateList(value: JsonValue | undefined): Array<{ edgeId: string; to: string }> {
    if (!Array.isArray(value)) return [];
    const candidates: Array<{ edgeId: string; to: string }> = [];
    for (const item of value) {
        if (isPlainObject(item) && typeof item.edgeId === 'string' && typeof item.to === 'string') {
            candidates.push({ edgeId: item.edgeId, to: item.to });
        }
    }
    return candidates;
}

function stringField(entry: AuditEntry, key: string): string | undefined {
    const value = entry.signals[key];
    return typeof value === 'string' ? value : undefined;
}

function pushOnce(list: string[], value: string): void {
    if (!list.includes(value)) list.push(value);
}

function edgeSignal(edges: Record<string, EdgeSignal>, edgeId: string, from: string, to: string): EdgeSignal {
    let signal = edges[edgeId];
    if (!signal) {
        signal = {
            edgeId,
            from,
            to,
            evaluations: 0,
            taken: 0,
            runsEvaluated: [],
            runsTaken: [],
            succeededRuns: [],
            failedRuns: [],
        };
        edges[edgeId] = signal;
    }
    return signal;
}

function findFailurePoint(audit: readonly AuditEntry[]): string | undefined {
    const byAction = (action: AuditEntry['action']) => audit.find(e => e.action === action)?.nodeId;
    const explicit = byAction('node_failed') ?? byAction('retry_exhausted') ?? byAction('forced_transition');
    if (explicit) return explicit;
    const executed = audit.filter(e => e.action === 'node_executed');
    return executed.length >= 2 ? executed[executed.length - 2].nodeId : executed[0]?.nodeId;
}

/**
 * Extract successful paths, failure points, bottlenecks and per-edge
 * signals from one or more finished runs. Unfinished runs are ignored.
 */
export function analyzeRuns(runs: readonly RunStateData[]): RunAnalysis {
    const summaries: RunSummary[] = [];
    const successfulPaths: string[][] = [];
    const failurePoints: Record<string, string[]> = {};
    const edges: Record<string, EdgeSignal> = {};
    const retries: Record<string, RetrySignal> = {};
    const visits = new Map<string, Bottleneck>();
    const outcomes = { total: 0, succeeded: 0, failed: 0, escalated: 0 };

    for (const run of runs) {
        if (run.status !== 'succeeded' && run.status !== 'failed' && run.status !== 'escalated') continue;
        const succeeded = run.status === 'succeeded';

        outcomes.total++;
        if (run.status === 'succeeded') outcomes.succeeded++;
        else if (run.status === 'failed') outcomes.failed++;
        else outcomes.escalated++;

        const path: string[] = [];
        for (const entry of run.audit) {
            switch (entry.action) {
                case 'node_executed':
                case 'node_failed':
                    path.push(entry.nodeId);
                    break;
                case 'edge_evaluated': {
                    for (const { edgeId, to } of candidateList(entry.signals.candidates)) {
                        const signal = edgeSignal(edges, edgeId, entry.nodeId, to);
                        signal.evaluations++;
                        pushOnce(signal.runsEvaluated, run.runId);
                    }
                    break;
                }
                case 'edge_taken': {
                    const edgeId = stringField(entry, 'edgeId');
                    if (!edgeId) break;
                    const signal = edgeSignal(edges, edgeId, entry.nodeId, stringField(entry, 'to') ?? '');
                    signal.taken++;
                    pushOnce(signal.runsTaken, run.runId);
                    pushOnce(succeeded ? signal.succeededRuns : signal.failedRuns, run.runId);
                    if (entry.signals.kind === 'retry') {
                        const retry: RetrySignal = retries[edgeId] ?? { edgeId, traversals: 0, boundHitRuns: [] };
                        retry.traversals++;
                        retries[edgeId] = retry;
                    }
                    break;
                }
                case 'retry_exhausted': {
                    const edgeId = stringField(entry, 'edgeId');
                    if (!edgeId || entry.signals.scope !== 'edge') break;
                    const retry: RetrySignal = retries[edgeId] ?? { edgeId, traversals: 0, boundHitRuns: [] };
                    pushOnce(retry.boundHitRuns, run.runId);
                    retries[edgeId] = retry;
                    break;
                }
                case 'terminal_reached':
                    if (path[path.length - 1] !== entry.nodeId) path.push(entry.nodeId);
                    break;
            }
        }

        let failurePoint: string | undefined;
        if (succeeded) {
            if (!successfulPaths.some(p => p.join('>') === path.join('>'))) successfulPaths.push(path);
        } else {
            failurePoint = findFailurePoint(run.audit);
            if (failurePoint) {
                failurePoints[failurePoint] = [...(failurePoints[failurePoint] ?? []), run.runId];
            }
        }

        for (const [nodeId, count] of Object.entries(run.counters.nodeVisits)) {
            if (count < 2) continue;
            const bottleneck: Bottleneck = visits.get(nodeId) ?? { nodeId, runs: [], maxVisits: 0 };
            pushOnce(bottleneck.runs, run.runId);
            bottleneck.maxVisits = Math.max(bottleneck.maxVisits, count);
            visits.set(nodeId, bottleneck);
        }

        summaries.push({
            runId: run.runId,
            status: run.status,
            graphVersion: run.graphVersion,
            path,
            failurePoint,
            steps: run.counters.totalSteps,
        });
    }

    const bottlenecks = [...visits.values()].sort((a, b) =>
        b.runs.length - a.runs.length || b.maxVisits - a.maxVisits || a.nodeId.localeCompare(b.nodeId));

    return {
        runs: summaries,
        successfulPaths,
        failurePoints,
        bottlenecks,
        signals: { edges, retries, outcomes },
    };
}
