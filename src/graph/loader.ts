/**
 * Graph loader: parses a YAML/JSON document, validates it and compiles it
 * into the integer-indexed arena the router and controller run against.
 *
 * Every problem found in one pass is reported together through
 * {@link GraphValidationError}; a graph that compiles can always route.
 *
 * @example
 * ```typescript
 * import { loadGraphFile } from 'sluice';
 *
 * const graph = await loadGraphFile('./graphs/research.yaml');
 * console.log(graph.nodes.length, graph.edges.length);
 * ```
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { GraphValidationError, GuardSyntaxError } from '../lib/errors';
import type { ValidationIssue } from '../lib/errors';
import { deepClone, deepFreeze } from '../lib/paths';
import type { GuardExpression } from './guard';
import { TRUE_GUARD, collectReferences, isConstantTrue, parseGuard } from './guard';
import { graphDocumentSchema } from './schema';
import type { DecisionRuleDocument, EdgeDocument, GraphDocument, NodeDocument } from './schema';
import type {
    CompiledCriterion,
    CompiledDecisionRule,
    CompiledEdge,
    CompiledGraph,
    CompiledNode,
    DecisionTest,
    TerminalOutcome,
} from './types';
import { DEFAULT_EDGE_PRIORITY, DEFAULT_EDGE_WEIGHT, WILDCARD } from './types';

/** Edge kinds whose eligibility depends on more than the guard */
const CONDITIONAL_KINDS = new Set(['depends', 'decompose']);

const COMPARISON_RULE = /^\s*(==|!=|<=|>=|<|>)\s*(.+)$/;

// ============================================================================
// Entry points
// ============================================================================

/**
 * Parse a YAML or JSON string into an unvalidated document.
 */
export function parseGraphSource(source: string): unknown {
    try {
        return YAML.parse(source);
    } catch (error) {
        throw new GraphValidationError([{
            path: [],
            message: `Unreadable graph document: ${error instanceof Error ? error.message : String(error)}`,
        }]);
    }
}

/**
 * Load and compile a graph from a source string or an already parsed document.
 *
 * @throws GraphValidationError listing every problem found
 */
export function loadGraph(input: unknown): CompiledGraph {
    const raw = typeof input === 'string' ? parseGraphSource(input) : input;
    return compileGraph(raw);
}

export async function loadGraphFile(filePath: string): Promise<CompiledGraph> {
    const source = await readFile(filePath, 'utf8');
    return loadGraph(source);
}

/**
 * Validate a document against the schema and fill in default ids.
 */
export function normalizeDocument(raw: unknown): GraphDocument {
    const parsed = graphDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        throw new GraphValidationError(parsed.error.errors.map(e => ({
            path: e.path,
            message: e.message,
        })));
    }

    const document = deepClone(parsed.data);
    document.version = document.version ?? 1;

    const seen = new Map<string, number>();
    document.edges = document.edges.map(edge => {
        if (edge.id) return edge;
        const base = `${edge.from}->${edge.to}`;
        const count = (seen.get(base) ?? 0) + 1;
        seen.set(base, count);
        return { ...edge, id: count === 1 ? base : `${base}#${count}` };
    });
    document.relationships = (document.relationships ?? []).map(rel => ({
        ...rel,
        id: rel.id ?? `${rel.from}:${rel.type}:${rel.to}`,
    }));

    return document;
}

/**
 * Compile a raw document into an arena.
 *
 * @throws GraphValidationError listing every problem found
 */
export function compileGraph(raw: unknown): CompiledGraph {
    const document = normalizeDocument(raw);
    return new GraphCompiler(document).compile();
}

// ============================================================================
// Compiler
// ============================================================================

class GraphCompiler {
    private readonly issues: ValidationIssue[] = [];
    private readonly warnings: string[] = [];
    private readonly nodeIndex = new Map<string, number>();
    private readonly edgeIndex = new Map<string, number>();
    private readonly edgeIds = new Set<string>();

    constructor(private readonly document: GraphDocument) { }

    compile(): CompiledGraph {
        const { document } = this;

        document.nodes.forEach((node, i) => {
            if (this.nodeIndex.has(node.id)) {
                this.issue(['nodes', i, 'id'], `Duplicate node id "${node.id}"`);
            } else {
                this.nodeIndex.set(node.id, i);
            }
        });

        const nodes = document.nodes.map((node, i) => this.compileNode(node, i));
        const edges: CompiledEdge[] = [];
        document.edges.forEach((edge, i) => {
            const compiled = this.compileEdge(edge, i);
            if (compiled) edges.push(compiled);
        });

        const start = this.nodeIndex.get(document.start);
        if (start === undefined) {
            this.issue(['start'], `Start node "${document.start}" does not exist`);
        }

        this.attachOutgoing(nodes, edges);
        this.compileDecisions(nodes, edges);

        const terminals = nodes.filter(n => n.type === 'terminal').map(n => n.index);
        if (terminals.length === 0) {
            this.issue(['nodes'], 'Graph has no terminal node');
        }
        const failureNode = this.resolveTerminal(nodes, 'failureNode', 'failure');
        const escalateNode = this.resolveTerminal(nodes, 'escalateNode', 'escalate');
        if (failureNode === undefined && terminals.length > 0) {
            this.issue(['nodes'], 'Graph needs a terminal with outcome "failure" for forced transitions');
        }

        this.checkRoutingTotality(nodes, edges);
        this.checkGuardReferences(edges, nodes);

        if (this.issues.length > 0 || start === undefined || failureNode === undefined) {
            throw new GraphValidationError(this.issues);
        }

        this.findUnreachable(nodes, edges, start);

        const frozenDocument = deepFreeze(deepClone(document));
        return deepFreeze({
            name: document.name,
            version: document.version ?? 1,
            document: frozenDocument,
            nodes,
            edges,
            nodeIndex: this.nodeIndex,
            edgeIndex: this.edgeIndex,
            start,
            terminals,
            failureNode,
            escalateNode,
            relationships: frozenDocument.relationships ?? [],
            warnings: this.warnings,
        });
    }

    // ------------------------------------------------------------------------
    // Nodes
    // ------------------------------------------------------------------------

    private compileNode(node: NodeDocument, i: number): CompiledNode {
        const at = ['nodes', i];
        const compiled: CompiledNode = {
            index: i,
            id: node.id,
            type: node.type,
            stage: node.stage,
            definition: node,
            outgoing: [],
            criteria: [],
            decisionRules: [],
        };

        switch (node.type) {
            case 'init':
            case 'reason':
                if (!node.prompt) this.issue([...at, 'prompt'], `${node.type} node "${node.id}" needs a prompt`);
                break;
            case 'tool':
                if (!node.tool) this.issue([...at, 'tool'], `Tool node "${node.id}" needs a tool directive`);
                break;
            case 'merge':
                if (!node.merge) this.issue([...at, 'merge'], `Merge node "${node.id}" needs a merge directive`);
                break;
            case 'gate':
                if (!node.gate) {
                    this.issue([...at, 'gate'], `Gate node "${node.id}" needs criteria`);
                } else {
                    compiled.criteria = this.compileCriteria(node, at);
                }
                break;
            case 'decision':
                if (!node.decision) this.issue([...at, 'decision'], `Decision node "${node.id}" needs rules`);
                break;
            case 'terminal':
                compiled.outcome = node.terminal?.outcome ?? 'success';
                break;
            case 'memory-write':
                break;
        }

        if (node.parallel && !(node.type === 'reason' || node.type === 'tool')) {
            this.issue([...at, 'parallel'], `Node type "${node.type}" cannot spawn parallel tasks`);
        }
        if (node.decision) {
            compiled.variable = this.parse(node.decision.variable, [...at, 'decision', 'variable']);
        }
        if (node.decision?.precondition) {
            compiled.precondition = this.parse(node.decision.precondition, [...at, 'decision', 'precondition']);
        }

        return compiled;
    }

    private compileCriteria(node: NodeDocument, at: (string | number)[]): CompiledCriterion[] {
        const criteria = node.gate?.criteria ?? [];
        return criteria.map((criterion, j) => ({
            name: criterion.name,
            source: criterion.check,
            check: this.parse(criterion.check, [...at, 'gate', 'criteria', j, 'check']),
        }));
    }

    // ------------------------------------------------------------------------
    // Edges
    // ------------------------------------------------------------------------

    private compileEdge(edge: EdgeDocument, i: number): CompiledEdge | undefined {
        const at = ['edges', i];
        const id = edge.id ?? `${edge.from}->${edge.to}`;
        const kind = edge.kind ?? 'forward';

        if (this.edgeIds.has(id)) {
            this.issue([...at, 'id'], `Duplicate edge id "${id}"`);
        }
        this.edgeIds.add(id);

        const fromIndex = edge.from === WILDCARD ? null : this.nodeIndex.get(edge.from);
        const toIndex = this.nodeIndex.get(edge.to);
        if (fromIndex === undefined) {
            this.issue([...at, 'from'], `Edge "${id}" starts at unknown node "${edge.from}"`);
        }
        if (toIndex === undefined) {
            this.issue([...at, 'to'], `Edge "${id}" targets unknown node "${edge.to}"`);
        }
        if (fromIndex !== null && fromIndex !== undefined && this.document.nodes[fromIndex].type === 'terminal') {
            this.issue([...at, 'from'], `Terminal node "${edge.from}" cannot have outgoing edges`);
        }

        if (kind === 'retry' && edge.maxRetries === undefined) {
            this.issue([...at, 'maxRetries'], `Retry edge "${id}" needs maxRetries`);
        }
        if (kind !== 'retry' && edge.maxRetries !== undefined) {
            this.issue([...at, 'maxRetries'], `maxRetries only applies to retry edges ("${id}" is ${kind})`);
        }
        if (kind === 'decompose' && !edge.decompose) {
            this.issue([...at, 'decompose'], `Decompose edge "${id}" needs a decompose directive`);
        }
        if (kind === 'memory-pull' && !edge.dredge) {
            this.issue([...at, 'dredge'], `Memory-pull edge "${id}" needs a dredge directive`);
        }
        if (kind === 'cross-run-read' && !edge.read) {
            this.issue([...at, 'read'], `Cross-run-read edge "${id}" needs a read directive`);
        }
        if (kind === 'depends' && !edge.requires) {
            this.issue([...at, 'requires'], `Depends edge "${id}" needs a requires directive`);
        }
        for (const required of edge.requires?.nodes ?? []) {
            if (!this.nodeIndex.has(required)) {
                this.issue([...at, 'requires', 'nodes'], `Edge "${id}" requires unknown node "${required}"`);
            }
        }

        const guard = edge.guard === undefined ? TRUE_GUARD : this.parse(edge.guard, [...at, 'guard']);

        if (fromIndex === undefined || toIndex === undefined) return undefined;

        const compiled: CompiledEdge = {
            index: -1,
            id,
            fromIndex,
            from: edge.from,
            toIndex,
            to: edge.to,
            kind,
            guard,
            guardSource: edge.guard,
            priority: edge.priority ?? DEFAULT_EDGE_PRIORITY,
            declarationOrder: i,
            maxRetries: edge.maxRetries,
            weight: edge.weight ?? DEFAULT_EDGE_WEIGHT,
            definition: edge,
        };
        return compiled;
    }

    /**
     * Give every node its ordered outgoing list: ascending priority, then
     * own edges before wildcards, then declaration order.
     */
    private attachOutgoing(nodes: CompiledNode[], edges: CompiledEdge[]): void {
        edges.forEach((edge, i) => {
            edge.index = i;
            this.edgeIndex.set(edge.id, i);
        });

        for (const node of nodes) {
            if (node.type === 'terminal') continue;
            const candidates = edges.filter(e => e.fromIndex === node.index || e.fromIndex === null);
            candidates.sort((a, b) =>
                a.priority - b.priority
                || Number(a.fromIndex === null) - Number(b.fromIndex === null)
                || a.declarationOrder - b.declarationOrder
            );
            node.outgoing = candidates.map(e => e.index);
        }
    }

    // ------------------------------------------------------------------------
    // Decisions
    // ------------------------------------------------------------------------

    private compileDecisions(nodes: CompiledNode[], edges: CompiledEdge[]): void {
        for (const node of nodes) {
            const decision = node.definition.decision;
            if (node.type !== 'decision' || !decision) continue;
            const at = ['nodes', node.index, 'decision'];

            if (!decision.rules.some(rule => rule.default)) {
                this.issue([...at, 'rules'], `Decision node "${node.id}" needs a default rule`);
            }

            decision.rules.forEach((rule, j) => {
                const targetIndex = this.nodeIndex.get(rule.target);
                if (targetIndex === undefined) {
                    this.issue([...at, 'rules', j, 'target'], `Decision rule targets unknown node "${rule.target}"`);
                    return;
                }
                const reachable = node.outgoing.some(e => edges[e].toIndex === targetIndex);
                if (!reachable) {
                    this.issue([...at, 'rules', j, 'target'],
                        `Decision node "${node.id}" has no edge to rule target "${rule.target}"`);
                }
                const test = this.compileDecisionTest(rule, [...at, 'rules', j]);
                if (test) {
                    const compiled: CompiledDecisionRule = { test, target: rule.target, targetIndex };
                    node.decisionRules.push(compiled);
                }
            });
        }
    }

    private compileDecisionTest(rule: DecisionRuleDocument, at: (string | number)[]): DecisionTest | undefined {
        if (rule.default) return { kind: 'default' };
        if (rule.when !== undefined) {
            const comparison = COMPARISON_RULE.exec(rule.when);
            if (comparison) {
                const operand = this.parse(comparison[2], [...at, 'when']);
                if (operand.kind !== 'literal') {
                    this.issue([...at, 'when'], `Comparison rule "${rule.when}" needs a literal operand`);
                    return undefined;
                }
                const operator = comparison[1];
                if (operator === '==' || operator === '!=' || operator === '<' || operator === '<='
                    || operator === '>' || operator === '>=') {
                    return { kind: 'compare', operator, value: operand.value };
                }
            }
            return { kind: 'guard', expression: this.parse(rule.when, [...at, 'when']) };
        }
        if (rule.min !== undefined || rule.max !== undefined) {
            return { kind: 'range', min: rule.min, max: rule.max };
        }
        if (rule.equals !== undefined) {
            return { kind: 'equals', value: rule.equals };
        }
        this.issue(at, 'Decision rule needs when, min/max, equals or default');
        return undefined;
    }

    // ------------------------------------------------------------------------
    // Whole-graph checks
    // ------------------------------------------------------------------------

    private resolveTerminal(
        nodes: CompiledNode[],
        field: 'failureNode' | 'escalateNode',
        outcome: TerminalOutcome,
    ): number | undefined {
        const named = this.document[field];
        if (named !== undefined) {
            const index = this.nodeIndex.get(named);
            if (index === undefined || nodes[index].type !== 'terminal') {
                this.issue([field], `${field} "${named}" is not a terminal node`);
                return undefined;
            }
            return index;
        }
        return nodes.find(n => n.type === 'terminal' && n.outcome === outcome)?.index;
    }

    /**
     * Every non-terminal node needs a fallback edge that is always eligible.
     */
    private checkRoutingTotality(nodes: CompiledNode[], edges: CompiledEdge[]): void {
        for (const node of nodes) {
            if (node.type === 'terminal') continue;
            const fallback = node.outgoing.some(e =>
                !CONDITIONAL_KINDS.has(edges[e].kind) && isConstantTrue(edges[e].guard)
            );
            if (!fallback) {
                this.issue(['nodes', node.index],
                    `Node "${node.id}" has no unconditional outgoing edge; routing could dead-end`);
            }
        }
    }

    private checkGuardReferences(edges: CompiledEdge[], nodes: CompiledNode[]): void {
        const guards: Array<{ expression: GuardExpression; at: (string | number)[] }> = [];
        edges.forEach(edge => guards.push({ expression: edge.guard, at: ['edges', edge.declarationOrder, 'guard'] }));
        nodes.forEach(node => node.criteria.forEach((c, j) =>
            guards.push({ expression: c.check, at: ['nodes', node.index, 'gate', 'criteria', j, 'check'] })));

        for (const { expression, at } of guards) {
            const refs = collectReferences(expression);
            for (const edgeId of refs.edges) {
                if (!this.edgeIndex.has(edgeId)) this.issue(at, `retries() names unknown edge "${edgeId}"`);
            }
            for (const nodeId of refs.nodes) {
                if (!this.nodeIndex.has(nodeId)) this.issue(at, `visits() names unknown node "${nodeId}"`);
            }
        }
    }

    private findUnreachable(nodes: CompiledNode[], edges: CompiledEdge[], start: number): void {
        const reached = new Set<number>([start]);
        const queue = [start];
        while (queue.length > 0) {
            const current = queue.shift();
            if (current === undefined) break;
            for (const e of nodes[current].outgoing) {
                const target = edges[e].toIndex;
                if (!reached.has(target)) {
                    reached.add(target);
                    queue.push(target);
                }
            }
        }
        for (const node of nodes) {
            if (!reached.has(node.index) && node.type !== 'terminal') {
                this.warnings.push(`Node "${node.id}" is unreachable from "${nodes[start].id}"`);
            }
        }
    }

    // ------------------------------------------------------------------------

    private parse(source: string, at: (string | number)[]): GuardExpression {
        try {
            return parseGuard(source);
        } catch (error) {
            if (error instanceof GuardSyntaxError) {
                this.issue(at, error.message);
                return TRUE_GUARD;
            }
            throw error;
        }
    }

    private issue(path: (string | number)[], message: string): void {
        this.issues.push({ path, message });
    }
}
