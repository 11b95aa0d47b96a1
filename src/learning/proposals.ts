/**
 * Proposal generator: turns a run analysis into classified graph changes.
 *
 * Priority, weight and relationship adjustments are auto-applied; guard,
 * retry-bound and structural changes wait for operator approval.
 */

import type { Clock, IdGenerator } from '../lib/config';
import { createSequentialIds } from '../lib/config';
import type { JsonValue } from '../lib/paths';
import { toJsonValue } from '../lib/paths';
import { isConstantTrue } from '../graph/guard';
import type { CompiledEdge, CompiledGraph } from '../graph/types';
import type { EdgeDocument, RelationshipDocument } from '../graph/schema';
import { DEFAULT_EDGE_PRIORITY, DEFAULT_EDGE_WEIGHT } from '../graph/types';
import type { Change, ChangeRisk, ChangeType, Proposal, RunAnalysis } from './types';
import { AUTO_APPLY_TYPES } from './types';

export interface ProposalOptions {
    /** Supporting runs a pattern needs before it is acted on (default: 2) */
    minSupport?: number;
    clock?: Clock;
    idGenerator?: IdGenerator;
}

export const WEIGHT_STEP = 0.1;
export const MAX_EDGE_WEIGHT = 2;
export const MAX_RELATIONSHIP_WEIGHT = 2;
/** Take rate below which a successful edge is considered under-prioritized */
export const LOW_TAKE_RATE = 0.5;
export const MIN_SUCCESS_RATE = 0.8;

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

interface Draft {
    type: ChangeType;
    targetId: string;
    oldValue: JsonValue;
    newValue: JsonValue;
    rationale: string;
    risk: ChangeRisk;
    summary: string;
    confidence: number;
    supportingRunIds: string[];
}

/**
 * Generate one proposal per suggested change, in a stable order.
 */
export function generateProposals(
    analysis: RunAnalysis,
    graph: CompiledGraph,
    options: ProposalOptions = {},
): Proposal[] {
    const minSupport = options.minSupport ?? 2;
    const clock = options.clock ?? Date.now;
    const ids = options.idGenerator ?? createSequentialIds();

    const drafts: Draft[] = [
        ...priorityDrafts(analysis, graph, minSupport),
        ...weightDrafts(analysis, graph),
        ...relationshipDrafts(analysis, graph, minSupport),
        ...retryDrafts(analysis, graph),
        ...bypassDrafts(analysis, graph, minSupport),
        ...removalDrafts(analysis, graph, minSupport),
    ];

    const createdAt = clock();
    return drafts.map(draft => {
        const change: Change = {
            id: ids('change'),
            type: draft.type,
            targetId: draft.targetId,
            oldValue: draft.oldValue,
            newValue: draft.newValue,
            rationale: draft.rationale,
            autoApply: AUTO_APPLY_TYPES.has(draft.type),
            risk: draft.risk,
        };
        return {
            id: ids('proposal'),
            createdAt,
            graphName: graph.name,
            graphVersion: graph.version,
            supportingRunIds: draft.supportingRunIds,
            summary: draft.summary,
            confidence: round2(draft.confidence),
            status: 'pending',
            changes: [change],
        };
    });
}

// ============================================================================
// Auto-apply rules
// ============================================================================

function siblingsOf(graph: CompiledGraph, edge: CompiledEdge): CompiledEdge[] {
    return graph.edges.filter(e => e.index !== edge.index && e.fromIndex === edge.fromIndex);
}

function priorityDrafts(analysis: RunAnalysis, graph: CompiledGraph, minSupport: number): Draft[] {
    const drafts: Draft[] = [];
    for (const edge of graph.edges) {
        const signal = analysis.signals.edges[edge.id];
        if (!signal || signal.evaluations === 0 || edge.fromIndex === null) continue;

        const takeRate = signal.taken / signal.evaluations;
        const successes = signal.succeededRuns.length;
        const successRate = signal.runsTaken.length > 0 ? successes / signal.runsTaken.length : 0;
        if (takeRate >= LOW_TAKE_RATE || successes < minSupport || successRate < MIN_SUCCESS_RATE) continue;

        const siblings = siblingsOf(graph, edge);
        if (siblings.length === 0) continue;
        const best = Math.min(...siblings.map(e => e.priority));
        if (edge.priority <= best) continue;

        const next = Math.max(best, edge.priority - 1);
        drafts.push({
            type: 'update-edge-priority',
            targetId: edge.id,
            oldValue: edge.priority,
            newValue: next,
            rationale: `Taken in ${signal.taken}/${signal.evaluations} evaluations but led to success in `
                + `${successes}/${signal.runsTaken.length} runs`,
            risk: 'low',
            summary: `Raise priority of ${edge.id} from ${edge.priority} to ${next}`,
            confidence: successRate,
            supportingRunIds: [...signal.succeededRuns],
        });
    }
    return drafts;
}

function weightDrafts(analysis: RunAnalysis, graph: CompiledGraph): Draft[] {
    const drafts: Draft[] = [];
    for (const edge of graph.edges) {
        const signal = analysis.signals.edges[edge.id];
        if (!signal || signal.runsTaken.length === 0) continue;

        const delta = WEIGHT_STEP * signal.succeededRuns.length - WEIGHT_STEP * signal.failedRuns.length;
        const next = round2(clamp(edge.weight + delta, 0, MAX_EDGE_WEIGHT));
        if (next === edge.weight) continue;

        drafts.push({
            type: 'update-edge-weight',
            targetId: edge.id,
            oldValue: edge.weight,
            newValue: next,
            rationale: `Taken in ${signal.succeededRuns.length} successful and ${signal.failedRuns.length} failed run(s)`,
            risk: 'low',
            summary: `Adjust weight of ${edge.id} from ${edge.weight} to ${next}`,
            confidence: signal.runsTaken.length / Math.max(1, analysis.signals.outcomes.total),
            supportingRunIds: [...signal.runsTaken],
        });
    }
    return drafts;
}

function relationshipDrafts(analysis: RunAnalysis, graph: CompiledGraph, minSupport: number): Draft[] {
    const drafts: Draft[] = [];
    const target = graph.nodes[graph.failureNode].id;
    const total = Math.max(1, analysis.signals.outcomes.total);

    for (const [nodeId, runIds] of Object.entries(analysis.failurePoints)) {
        if (runIds.length < minSupport) continue;
        const index = graph.nodeIndex.get(nodeId);
        if (index === undefined || graph.nodes[index].type === 'terminal') continue;

        const existing = graph.relationships.find(r => r.from === nodeId && r.to === target && r.type === 'indicates');
        if (existing) {
            const old = existing.weight ?? DEFAULT_EDGE_WEIGHT;
            const next = round2(clamp(old + WEIGHT_STEP * runIds.length, 0, MAX_RELATIONSHIP_WEIGHT));
            if (next === old) continue;
            drafts.push({
                type: 'update-relationship-weight',
                targetId: existing.id ?? `${nodeId}:indicates:${target}`,
                oldValue: old,
                newValue: next,
                rationale: `${nodeId} was the failure point of ${runIds.length} run(s)`,
                risk: 'low',
                summary: `Strengthen ${nodeId} indicates ${target}`,
                confidence: runIds.length / total,
                supportingRunIds: [...runIds],
            });
            continue;
        }

        const relationship: RelationshipDocument = {
            id: `${nodeId}:indicates:${target}`,
            from: nodeId,
            to: target,
            type: 'indicates',
            weight: round2(runIds.length / total),
            observations: [...runIds],
        };
        drafts.push({
            type: 'add-relationship',
            targetId: `${nodeId}:indicates:${target}`,
            oldValue: null,
            newValue: toJsonValue(relationship),
            rationale: `${nodeId} was the failure point of ${runIds.length} run(s)`,
            risk: 'low',
            summary: `Record that failures at ${nodeId} indicate ${target}`,
            confidence: runIds.length / total,
            supportingRunIds: [...runIds],
        });
    }
    return drafts;
}

// ============================================================================
// Approval rules
// ============================================================================

function retryDrafts(analysis: RunAnalysis, graph: CompiledGraph): Draft[] {
    const drafts: Draft[] = [];
    for (const edge of graph.edges) {
        const signal = analysis.signals.retries[edge.id];
        if (!signal || signal.boundHitRuns.length === 0 || edge.maxRetries === undefined) continue;
        drafts.push({
            type: 'update-max-retries',
            targetId: edge.id,
            oldValue: edge.maxRetries,
            newValue: edge.maxRetries + 1,
            rationale: `Retry bound hit in ${signal.boundHitRuns.length} run(s)`,
            risk: 'medium',
            summary: `Raise maxRetries of ${edge.id} to ${edge.maxRetries + 1}`,
            confidence: signal.boundHitRuns.length / Math.max(1, analysis.signals.outcomes.total),
            supportingRunIds: [...signal.boundHitRuns],
        });
    }
    return drafts;
}

function mostCommon(values: string[]): string | undefined {
    const counts = new Map<string, number>();
    values.forEach(v => counts.set(v, (counts.get(v) ?? 0) + 1));
    let best: string | undefined;
    let bestCount = 0;
    for (const [value, count] of counts) {
        if (count > bestCount) {
            best = value;
            bestCount = count;
        }
    }
    return best;
}

function bypassDrafts(analysis: RunAnalysis, graph: CompiledGraph, minSupport: number): Draft[] {
    const total = analysis.signals.outcomes.total;
    if (total < minSupport) return [];
    const drafts: Draft[] = [];

    for (const bottleneck of analysis.bottlenecks) {
        if (bottleneck.runs.length * 2 < total) continue;
        const { nodeId } = bottleneck;

        const before: string[] = [];
        const after: string[] = [];
        for (const run of analysis.runs) {
            const first = run.path.indexOf(nodeId);
            const last = run.path.lastIndexOf(nodeId);
            if (first > 0) before.push(run.path[first - 1]);
            if (last >= 0 && last < run.path.length - 1 && run.status === 'succeeded') after.push(run.path[last + 1]);
        }
        const from = mostCommon(before.filter(id => id !== nodeId));
        const to = mostCommon(after.filter(id => id !== nodeId));
        if (!from || !to || from === to) continue;
        if (graph.edges.some(e => e.from === from && e.to === to)) continue;

        const fromIndex = graph.nodeIndex.get(from);
        if (fromIndex === undefined) continue;
        const outgoing = graph.nodes[fromIndex].outgoing.map(i => graph.edges[i].priority);
        const edge: EdgeDocument = {
            id: `${from}->${to}#bypass`,
            from,
            to,
            kind: 'forward',
            // Ahead of every existing edge, once the bottleneck has run
            guard: `visits('${nodeId}') >= 1`,
            priority: (outgoing.length > 0 ? Math.min(...outgoing) : DEFAULT_EDGE_PRIORITY) - 1,
            description: `Bypass for ${nodeId}`,
        };
        drafts.push({
            type: 'add-edge',
            targetId: `${from}->${to}#bypass`,
            oldValue: null,
            newValue: toJsonValue(edge),
            rationale: `${nodeId} was revisited in ${bottleneck.runs.length}/${total} runs (max ${bottleneck.maxVisits} visits)`,
            risk: 'high',
            summary: `Add bypass edge ${from} -> ${to} around ${nodeId}`,
            confidence: bottleneck.runs.length / total,
            supportingRunIds: [...bottleneck.runs],
        });
    }
    return drafts;
}

function removalDrafts(analysis: RunAnalysis, graph: CompiledGraph, minSupport: number): Draft[] {
    const drafts: Draft[] = [];
    for (const edge of graph.edges) {
        const signal = analysis.signals.edges[edge.id];
        if (!signal || signal.taken > 0 || signal.runsEvaluated.length < minSupport) continue;
        // Unconditional fallbacks keep routing total
        if (isConstantTrue(edge.guard)) continue;
        drafts.push({
            type: 'remove-edge',
            targetId: edge.id,
            oldValue: toJsonValue(edge.definition),
            newValue: null,
            rationale: `Never taken across ${signal.runsEvaluated.length} runs (${signal.evaluations} evaluations)`,
            risk: 'medium',
            summary: `Remove unused edge ${edge.id}`,
            confidence: Math.min(1, signal.runsEvaluated.length / Math.max(1, analysis.signals.outcomes.total)),
            supportingRunIds: [...signal.runsEvaluated],
        });
    }
    return drafts;
}
