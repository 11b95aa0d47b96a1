/**
 * Compiled graph: an immutable arena of integer-indexed nodes and edges.
 * Built once per graph version by the loader; never mutated afterwards.
 */

import type { CompareOperator, GuardExpression } from './guard';
import type {
    EdgeDocument,
    EdgeKind,
    GraphDocument,
    NodeDocument,
    NodeType,
    RelationshipDocument,
} from './schema';
import type { JsonValue } from '../lib/paths';

export type TerminalOutcome = 'success' | 'failure' | 'escalate';

/** A named gate criterion with its parsed check */
export interface CompiledCriterion {
    name: string;
    check: GuardExpression;
    source: string;
}

/** How a decision rule tests the decision variable */
export type DecisionTest =
    | { kind: 'compare'; operator: CompareOperator; value: JsonValue }
    | { kind: 'range'; min?: number; max?: number }
    | { kind: 'equals'; value: JsonValue }
    | { kind: 'guard'; expression: GuardExpression }
    | { kind: 'default' };

export interface CompiledDecisionRule {
    test: DecisionTest;
    target: string;
    targetIndex: number;
}

export interface CompiledNode {
    index: number;
    id: string;
    type: NodeType;
    stage?: string;
    /** Normalized document entry for this node */
    definition: NodeDocument;
    /** Outgoing edge indexes, own and wildcard, in evaluation order */
    outgoing: number[];
    criteria: CompiledCriterion[];
    decisionRules: CompiledDecisionRule[];
    /** Decision variable, parsed like a guard path */
    variable?: GuardExpression;
    precondition?: GuardExpression;
    outcome?: TerminalOutcome;
}

export interface CompiledEdge {
    index: number;
    id: string;
    /** Source node index, or null for a wildcard (`*`) edge */
    fromIndex: number | null;
    from: string;
    toIndex: number;
    to: string;
    kind: EdgeKind;
    guard: GuardExpression;
    guardSource?: string;
    priority: number;
    /** Position in the document's edge list, the tie-break for equal priorities */
    declarationOrder: number;
    maxRetries?: number;
    weight: number;
    definition: EdgeDocument;
}

export interface CompiledGraph {
    name: string;
    version: number;
    /** Normalized document (ids filled in), frozen */
    document: Readonly<GraphDocument>;
    nodes: readonly CompiledNode[];
    edges: readonly CompiledEdge[];
    nodeIndex: ReadonlyMap<string, number>;
    edgeIndex: ReadonlyMap<string, number>;
    start: number;
    terminals: readonly number[];
    failureNode: number;
    escalateNode?: number;
    relationships: readonly RelationshipDocument[];
    /** Non-fatal findings such as unreachable nodes */
    warnings: readonly string[];
}

export const DEFAULT_EDGE_PRIORITY = 1;
export const DEFAULT_EDGE_WEIGHT = 1;
export const WILDCARD = '*';
