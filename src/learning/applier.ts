/**
 * GraphRegistry - versioned graph publication.
 *
 * Changes are applied to a copy of the active document, the copy is
 * compiled and validated, and only then does it become the active
 * version. Runs keep the compiled graph they started with.
 *
 * @example
 * ```typescript
 * import { GraphRegistry, loadGraphFile } from 'sluice';
 *
 * const registry = new GraphRegistry(await loadGraphFile('./graph.yaml'));
 * const result = await registry.apply(proposals, { includeApproved: true });
 * console.log(result.graph.version, result.applied.length);
 * ```
 */

import type { Clock } from '../lib/config';
import { GraphValidationError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import type { JsonValue } from '../lib/paths';
import { deepClone, deepEqual } from '../lib/paths';
import { compileGraph } from '../graph/loader';
import { toDocument } from '../graph/serialize';
import type { GraphDocument } from '../graph/schema';
import { edgeSchema, nodeSchema, relationshipSchema } from '../graph/schema';
import type { CompiledGraph } from '../graph/types';
import { DEFAULT_EDGE_PRIORITY, DEFAULT_EDGE_WEIGHT } from '../graph/types';
import type { ArtifactStore } from '../artifacts/types';
import type { Change, ChangeLogRecord, Proposal } from './types';

export interface GraphRegistryConfig {
    /** Receives change-log records and proposal status updates */
    artifacts?: ArtifactStore;
    clock?: Clock;
    logger?: Logger;
}

export interface ApplyOptions {
    /** Also apply proposals an operator approved (default: false) */
    includeApproved?: boolean;
}

export type SkipReason = 'stale' | 'missing-target' | 'invalid-value' | 'not-eligible' | 'invalid-graph';

export interface ApplyResult {
    /** Active graph after the call (unchanged when nothing applied) */
    graph: CompiledGraph;
    applied: ChangeLogRecord[];
    skipped: Array<{ proposalId: string; changeId: string; reason: SkipReason }>;
    /** Proposals whose changes were published */
    appliedProposalIds: string[];
    /** Proposals dropped because the graph would no longer validate */
    failedProposalIds: string[];
}

type ChangeOutcome = 'applied' | Exclude<SkipReason, 'not-eligible' | 'invalid-graph'>;

/**
 * A proposal is eligible when it is pending and fully auto-applicable, or
 * approved and `includeApproved` is set.
 */
export function isEligible(proposal: Proposal, includeApproved: boolean): boolean {
    if (proposal.status === 'pending') return proposal.changes.every(c => c.autoApply);
    return proposal.status === 'approved' && includeApproved;
}

// ============================================================================
// Document edits
// ============================================================================

function matches(current: JsonValue | undefined, expected: JsonValue): boolean {
    return deepEqual(current === undefined ? null : current, expected);
}

/**
 * Apply one change to a mutable document in place.
 */
export function applyChange(document: GraphDocument, change: Change): ChangeOutcome {
    const edge = document.edges.find(e => e.id === change.targetId);
    const node = document.nodes.find(n => n.id === change.targetId);
    const relationships = document.relationships ?? [];
    const relationship = relationships.find(r => r.id === change.targetId);

    switch (change.type) {
        case 'update-edge-priority':
        case 'update-edge-weight':
        case 'update-max-retries': {
            if (!edge) return 'missing-target';
            if (typeof change.newValue !== 'number') return 'invalid-value';
            const current = change.type === 'update-edge-priority'
                ? edge.priority ?? DEFAULT_EDGE_PRIORITY
                : change.type === 'update-edge-weight' ? edge.weight ?? DEFAULT_EDGE_WEIGHT : edge.maxRetries;
            if (!matches(current, change.oldValue)) return 'stale';
            if (change.type === 'update-edge-priority') edge.priority = change.newValue;
            else if (change.type === 'update-edge-weight') edge.weight = change.newValue;
            else edge.maxRetries = change.newValue;
            return 'applied';
        }
        case 'update-guard': {
            if (!edge) return 'missing-target';
            if (change.newValue !== null && typeof change.newValue !== 'string') return 'invalid-value';
            if (!matches(edge.guard, change.oldValue)) return 'stale';
            if (change.newValue === null) delete edge.guard;
            else edge.guard = change.newValue;
            return 'applied';
        }
        case 'update-relationship-weight': {
            if (!relationship) return 'missing-target';
            if (typeof change.newValue !== 'number') return 'invalid-value';
            if (!matches(relationship.weight ?? DEFAULT_EDGE_WEIGHT, change.oldValue)) return 'stale';
            relationship.weight = change.newValue;
            return 'applied';
        }
        case 'add-relationship': {
            if (relationship) return 'stale';
            const parsed = relationshipSchema.safeParse(change.newValue);
            if (!parsed.success) return 'invalid-value';
            document.relationships = [...relationships, { ...parsed.data, id: parsed.data.id ?? change.targetId }];
            return 'applied';
        }
        case 'add-edge': {
            if (edge) return 'stale';
            const parsed = edgeSchema.safeParse(change.newValue);
            if (!parsed.success) return 'invalid-value';
            document.edges.push({ ...parsed.data, id: parsed.data.id ?? change.targetId });
            return 'applied';
        }
        case 'remove-edge': {
            if (!edge) return 'missing-target';
            document.edges = document.edges.filter(e => e !== edge);
            return 'applied';
        }
        case 'add-node': {
            if (node) return 'stale';
            const parsed = nodeSchema.safeParse(change.newValue);
            if (!parsed.success) return 'invalid-value';
            document.nodes.push(parsed.data);
            return 'applied';
        }
        case 'remove-node': {
            if (!node) return 'missing-target';
            document.nodes = document.nodes.filter(n => n !== node);
            // Edges touching the node go with it
            document.edges = document.edges.filter(e => e.from !== node.id && e.to !== node.id);
            document.relationships = relationships.filter(r => r.from !== node.id && r.to !== node.id);
            return 'applied';
        }
        case 'update-prompt': {
            if (!node) return 'missing-target';
            if (typeof change.newValue !== 'string') return 'invalid-value';
            if (!matches(node.prompt, change.oldValue)) return 'stale';
            node.prompt = change.newValue;
            return 'applied';
        }
    }
}

// ============================================================================
// Registry
// ============================================================================

export class GraphRegistry {
    private readonly versions = new Map<number, CompiledGraph>();
    private activeVersion: number;
    private readonly artifacts?: ArtifactStore;
    private readonly clock: Clock;
    private readonly logger: Logger;
    /** Serializes apply() calls */
    private queue: Promise<unknown> = Promise.resolve();

    constructor(initial: CompiledGraph, config: GraphRegistryConfig = {}) {
        this.versions.set(initial.version, initial);
        this.activeVersion = initial.version;
        this.artifacts = config.artifacts;
        this.clock = config.clock ?? Date.now;
        this.logger = config.logger ?? noopLogger;
    }

    get active(): CompiledGraph {
        const graph = this.versions.get(this.activeVersion);
        if (!graph) {
            throw new Error(`Active graph version ${this.activeVersion} is missing`);
        }
        return graph;
    }

    get(version: number): CompiledGraph | undefined {
        return this.versions.get(version);
    }

    listVersions(): number[] {
        return [...this.versions.keys()].sort((a, b) => a - b);
    }

    /**
     * Publish the eligible changes as one new version.
     *
     * Each proposal is applied to the working document and compiled on its
     * own; a proposal whose result does not validate is dropped, marked
     * `failed`, and the rest are still published.
     */
    async apply(proposals: readonly Proposal[], options: ApplyOptions = {}): Promise<ApplyResult> {
        const task = this.queue.then(() => this.applyNow(proposals, options.includeApproved ?? false));
        this.queue = task.catch(() => undefined);
        return task;
    }

    private async applyNow(proposals: readonly Proposal[], includeApproved: boolean): Promise<ApplyResult> {
        const base = this.active;
        const nextVersion = Math.max(...this.versions.keys()) + 1;
        let document = toDocument(base);
        let compiled: CompiledGraph | undefined;
        const skipped: ApplyResult['skipped'] = [];
        const accepted: Array<{ proposalId: string; change: Change }> = [];
        const appliedProposalIds: string[] = [];
        const failedProposalIds: string[] = [];

        for (const proposal of proposals) {
            if (!isEligible(proposal, includeApproved)) {
                proposal.changes.forEach(c => skipped.push({ proposalId: proposal.id, changeId: c.id, reason: 'not-eligible' }));
                continue;
            }

            const draft = deepClone(document);
            const changed: Change[] = [];
            for (const change of proposal.changes) {
                const outcome = applyChange(draft, change);
                if (outcome === 'applied') {
                    changed.push(change);
                } else {
                    this.logger.info('Skipped change', { proposalId: proposal.id, changeId: change.id, reason: outcome });
                    skipped.push({ proposalId: proposal.id, changeId: change.id, reason: outcome });
                }
            }
            if (changed.length === 0) continue;

            draft.version = nextVersion;
            try {
                compiled = compileGraph(draft);
            } catch (error) {
                if (!(error instanceof GraphValidationError)) throw error;
                this.logger.warn('Proposal breaks the graph', {
                    proposalId: proposal.id,
                    issues: error.issues.map(i => i.message),
                });
                changed.forEach(c => skipped.push({ proposalId: proposal.id, changeId: c.id, reason: 'invalid-graph' }));
                failedProposalIds.push(proposal.id);
                continue;
            }
            document = draft;
            changed.forEach(change => accepted.push({ proposalId: proposal.id, change }));
            appliedProposalIds.push(proposal.id);
        }

        if (this.artifacts) {
            for (const id of failedProposalIds) {
                await this.artifacts.updateProposalStatus(id, 'failed');
            }
        }

        const published = compiled;
        if (!published || accepted.length === 0) {
            return { graph: base, applied: [], skipped, appliedProposalIds, failedProposalIds };
        }

        this.versions.set(nextVersion, published);
        this.activeVersion = nextVersion;

        const appliedAt = this.clock();
        const records: ChangeLogRecord[] = accepted.map(({ proposalId, change }) => ({
            proposalId,
            change,
            graphName: published.name,
            fromVersion: base.version,
            toVersion: nextVersion,
            appliedAt,
        }));

        if (this.artifacts) {
            await this.artifacts.appendChangeLog(records);
            for (const id of appliedProposalIds) {
                await this.artifacts.updateProposalStatus(id, 'applied');
            }
        }
        this.logger.info('Published graph version', {
            graph: published.name,
            version: nextVersion,
            changes: records.length,
        });

        return { graph: published, applied: records, skipped, appliedProposalIds, failedProposalIds };
    }
}
