/**
 * Execution controller: drives one run from its start node to a terminal.
 *
 * Each step executes the current node inside a state transaction, commits
 * the staged writes, asks the router for the next edge and applies the
 * edge's traversal effects. Bounds (`maxSteps`, retry budgets) and node
 * errors force the run to the failure or escalate terminal with a
 * structured reason.
 */

import type { ResolvedEngineConfig } from '../lib/config';
import {
    MaxStepsExceededError,
    OutputSchemaError,
    ParallelTaskFailure,
    SkillInvocationError,
    errorMessage,
} from '../lib/errors';
import type { Logger } from '../lib/logger';
import { createScopedLogger } from '../lib/logger';
import type { JsonObject, JsonValue } from '../lib/paths';
import { deepClone, getPath, toJsonValue } from '../lib/paths';
import type { CompiledEdge, CompiledGraph, CompiledNode } from '../graph/types';
import type { RunStateStore, StateTransaction } from '../state/run-state';
import { normalizeDataPath } from '../state/run-state';
import type { EscalationSnapshot, RunStateData, RunStatus, TerminalInfo } from '../state/types';
import type { MemoryStore } from '../memory/types';
import type { ArtifactStore } from '../artifacts/types';
import { ParallelCoordinator } from '../parallel/coordinator';
import type { TaskSpec } from '../parallel/coordinator';
import { DEFAULT_EXECUTORS } from '../nodes';
import type { NodeContext, NodeExecutorMap, NodeResult } from '../nodes/types';
import { dredge } from '../nodes/memory-node';
import { recordOutcomes } from '../nodes/spawn';
import type { LanguageModel, SkillInvoker } from './interfaces';
import { candidatesSignal, selectEdge, spawnedBy } from './router';

// ============================================================================
// Types
// ============================================================================

export interface ExecutionControllerOptions {
    graph: CompiledGraph;
    memory: MemoryStore;
    model: LanguageModel;
    skills: SkillInvoker;
    config: ResolvedEngineConfig;
    /** Override executors per node type */
    executors?: Partial<NodeExecutorMap>;
    /** Source of earlier runs for cross-run-read edges */
    artifacts?: ArtifactStore;
    /** Aborting ends the run at the next step with reason `aborted` */
    signal?: AbortSignal;
}

export interface RunResult {
    runId: string;
    status: RunStatus;
    terminal: TerminalInfo;
    state: RunStateData;
}

/** Why the run left the normal routing path */
interface ForcedExit {
    reason: string;
    detail?: string;
    resume?: EscalationSnapshot;
}

// ============================================================================
// Controller
// ============================================================================

export class ExecutionController {
    private readonly graph: CompiledGraph;
    private readonly config: ResolvedEngineConfig;
    private readonly executors: NodeExecutorMap;
    private readonly logger: Logger;

    constructor(private readonly options: ExecutionControllerOptions) {
        this.graph = options.graph;
        this.config = options.config;
        this.executors = { ...DEFAULT_EXECUTORS, ...options.executors };
        this.logger = createScopedLogger(options.config.logger, 'controller');
    }

    /**
     * Run until a terminal node is reached. The store is mutated in place
     * and its final form is returned in the result.
     */
    async execute(state: RunStateStore): Promise<RunResult> {
        return this.config.tracer.withSpan('sluice.run', async span => {
            span.setAttributes({
                'sluice.run_id': state.runId,
                'sluice.graph': this.graph.name,
                'sluice.graph_version': this.graph.version,
            });
            const terminal = await this.loop(state);
            span.setAttribute('sluice.outcome', terminal.outcome);
            return {
                runId: state.runId,
                status: state.status,
                terminal,
                state: state.toJSON(),
            };
        });
    }

    private async loop(state: RunStateStore): Promise<TerminalInfo> {
        const { graph, config, logger } = this;
        const coordinator = new ParallelCoordinator({
            runner: (spec, signal) => this.runTask(state.runId, spec, signal),
            maxConcurrent: config.maxConcurrentTasks,
            logger: config.logger,
            tracer: config.tracer,
        });

        const startNode = graph.nodes[graph.start];
        state.setStatus('running');
        state.appendAudit(startNode.id, 'run_started', `Run ${state.runId} started on ${graph.name} v${graph.version}`, {
            graph: graph.name,
            graphVersion: graph.version,
        });
        state.enterNode(startNode.id);
        logger.info('Run started', { runId: state.runId, graph: graph.name, version: graph.version });

        let node = startNode;
        let forced: ForcedExit | undefined;
        let spawnLimit: number | undefined;

        while (node.type !== 'terminal') {
            if (this.options.signal?.aborted) {
                forced = { reason: 'aborted', detail: errorMessage(this.options.signal.reason) };
                node = this.force(state, node, graph.failureNode, forced.reason);
                break;
            }
            if (state.counters.totalSteps >= config.maxSteps) {
                const error = new MaxStepsExceededError(config.maxSteps);
                forced = { reason: 'max_steps_exceeded', detail: error.message };
                node = this.force(state, node, graph.failureNode, forced.reason);
                break;
            }

            const step = state.incrementSteps();
            const transaction = state.begin(node.id, step);
            const context = this.context(state, node, transaction, coordinator, spawnLimit);
            spawnLimit = undefined;

            try {
                const result = await this.runNode(context);
                transaction.commit();
                state.appendAudit(node.id, 'node_executed', result.summary, result.signals ?? {});
            } catch (error) {
                if (transaction.isOpen) transaction.rollback();
                const escalating = error instanceof OutputSchemaError || error instanceof ParallelTaskFailure;
                const target = escalating ? graph.escalateNode ?? graph.failureNode : graph.failureNode;
                state.appendAudit(node.id, 'node_failed', `Node ${node.id} failed: ${errorMessage(error)}`, {
                    error: error instanceof Error ? error.name : 'Error',
                    escalating,
                });
                logger.warn('Node failed', { runId: state.runId, nodeId: node.id, error: errorMessage(error) });

                forced = {
                    reason: error instanceof OutputSchemaError
                        ? 'output_schema_failed'
                        : error instanceof ParallelTaskFailure ? 'parallel_task_failed' : 'node_error',
                    detail: errorMessage(error),
                };
                if (graph.nodes[target].outcome === 'escalate') {
                    forced.resume = {
                        nodeId: node.id,
                        data: state.copyData(),
                        counters: deepClone(state.counters),
                        pendingTasks: coordinator.pending(),
                    };
                }
                node = this.force(state, node, target, forced.reason);
                break;
            }

            const decision = selectEdge(graph, node, state, { maxTotalRetries: config.maxTotalRetries });
            state.appendAudit(node.id, 'edge_evaluated', `Evaluated ${decision.checks.length} candidate edge(s)`, {
                candidates: candidatesSignal(decision.checks),
                selected: decision.kind === 'edge' ? decision.edge.id : null,
            });

            if (decision.kind === 'forced') {
                if (decision.error) {
                    state.appendAudit(node.id, 'retry_exhausted', decision.error.message, {
                        edgeId: decision.error.edgeId,
                        scope: decision.error.scope,
                        retries: decision.error.retries,
                    });
                }
                forced = { reason: decision.reason, detail: decision.error?.message };
                node = this.force(state, node, decision.target, decision.reason);
                break;
            }

            spawnLimit = await this.traverse(state, decision.edge, step);
            node = graph.nodes[decision.edge.toIndex];
        }

        return this.finish(state, node, coordinator, forced);
    }

    // ------------------------------------------------------------------------
    // Node execution
    // ------------------------------------------------------------------------

    private context(
        state: RunStateStore,
        node: CompiledNode,
        transaction: StateTransaction,
        coordinator: ParallelCoordinator,
        spawnLimit?: number,
    ): NodeContext {
        return {
            graph: this.graph,
            node,
            state,
            transaction,
            memory: this.options.memory,
            model: this.options.model,
            skills: this.options.skills,
            coordinator,
            config: this.config,
            logger: this.config.logger,
            tracer: this.config.tracer,
            visit: state.counters.nodeVisits[node.id] ?? 1,
            spawnLimit,
            signal: this.options.signal,
        };
    }

    private runNode(context: NodeContext): Promise<NodeResult> {
        const { node, state } = context;
        return this.config.tracer.withSpan('sluice.node', async span => {
            span.setAttributes({
                'sluice.run_id': state.runId,
                'sluice.node_id': node.id,
                'sluice.node_type': node.type,
                'sluice.step': state.counters.totalSteps,
            });
            const result = await this.executors[node.type](context);
            span.addEvent('node.completed', { summary: result.summary });
            return result;
        });
    }

    /** Task runner handed to the coordinator: a skill call or a model call */
    private async runTask(runId: string, spec: TaskSpec, signal: AbortSignal): Promise<unknown> {
        if (spec.skill !== undefined) {
            const { result, isError } = await this.options.skills.invoke(spec.skill, spec.params ?? {}, {
                runId,
                nodeId: spec.nodeId,
                taskId: spec.taskId,
                signal,
            });
            if (isError) {
                throw new SkillInvocationError(spec.skill, `Skill "${spec.skill}" failed: ${typeof result === 'string' ? result : JSON.stringify(result)}`);
            }
            return result;
        }
        return this.options.model.call({
            prompt: `${spec.instruction}\n\nContext:\n${JSON.stringify(spec.slice, null, 2)}`,
            runId,
            nodeId: spec.nodeId,
            taskId: spec.taskId,
            attempt: 1,
            signal,
        });
    }

    // ------------------------------------------------------------------------
    // Traversal
    // ------------------------------------------------------------------------

    /**
     * Apply an edge's effects and move to its target.
     * Returns the child cap for the target when the edge is a decompose edge.
     */
    private async traverse(state: RunStateStore, edge: CompiledEdge, step: number): Promise<number | undefined> {
        const source = state.currentNodeId;
        const transaction = state.begin(source, step);
        const definition = edge.definition;

        if (edge.kind === 'retry') {
            state.recordRetry(edge.id);
        }

        for (const action of definition.onTraverse ?? []) {
            const path = normalizeDataPath(action.path);
            switch (action.action) {
                case 'set':
                    transaction.set(path, action.value ?? null);
                    break;
                case 'increment': {
                    const current = transaction.read(path);
                    const by = typeof action.value === 'number' ? action.value : 1;
                    transaction.set(path, (typeof current === 'number' ? current : 0) + by);
                    break;
                }
                case 'append':
                    transaction.append(path, action.value ?? null);
                    break;
                case 'remove':
                    transaction.remove(path);
                    break;
                case 'signal':
                    state.appendAudit(source, 'signal', `Signal ${action.path} on ${edge.id}`, {
                        edgeId: edge.id,
                        name: action.path,
                        value: action.value ?? null,
                    });
                    break;
            }
        }

        if (definition.dredge) {
            await dredge({ memory: this.options.memory, transaction, state }, [definition.dredge]);
        }
        if (definition.read) {
            const { run = 'latest', path, as } = definition.read;
            transaction.set(as, await this.readOtherRun(state, run, path));
        }

        transaction.commit();
        state.appendAudit(source, 'edge_taken', `Took ${edge.id} to ${edge.to}`, {
            edgeId: edge.id,
            to: edge.to,
            kind: edge.kind,
        });
        state.enterNode(edge.to);

        const maxChildren = definition.decompose?.maxChildren;
        return maxChildren === undefined ? undefined : Math.max(0, maxChildren - spawnedBy(state, edge.to));
    }

    /**
     * Read a value from another run's final data. `latest` picks the most
     * recent saved run of the same graph other than this one.
     */
    private async readOtherRun(state: RunStateStore, run: string, path: string): Promise<JsonValue> {
        const artifacts = this.options.artifacts;
        if (!artifacts) {
            this.logger.warn('Cross-run read without an artifact store', { runId: state.runId, path });
            return null;
        }
        const artifact = run === 'latest'
            ? (await artifacts.listRuns({ graphName: this.graph.name }))
                .filter(a => a.runId !== state.runId)
                .at(-1)
            : await artifacts.loadRun(run);
        if (!artifact) return null;
        const value = getPath(artifact.state.data, normalizeDataPath(path));
        return value === undefined ? null : toJsonValue(value);
    }

    // ------------------------------------------------------------------------
    // Termination
    // ------------------------------------------------------------------------

    private force(state: RunStateStore, from: CompiledNode, target: number, reason: string): CompiledNode {
        const node = this.graph.nodes[target];
        state.appendAudit(from.id, 'forced_transition', `Forced to ${node.id}: ${reason}`, { to: node.id, reason });
        state.enterNode(node.id);
        return node;
    }

    private async finish(
        state: RunStateStore,
        node: CompiledNode,
        coordinator: ParallelCoordinator,
        forced: ForcedExit | undefined,
    ): Promise<TerminalInfo> {
        const transaction = state.begin(node.id);
        try {
            const result = await this.runNode(this.context(state, node, transaction, coordinator));
            transaction.commit();
            state.appendAudit(node.id, 'node_executed', result.summary, result.signals ?? {});
        } catch (error) {
            if (transaction.isOpen) transaction.rollback();
            state.appendAudit(node.id, 'node_failed', `Terminal ${node.id} failed: ${errorMessage(error)}`, {
                error: error instanceof Error ? error.name : 'Error',
            });
            this.logger.error('Terminal node failed', { runId: state.runId, nodeId: node.id, error: errorMessage(error) });
        }

        // Fire-and-forget tasks: keep what finished, drop the rest
        const settled = coordinator.collectSettled();
        if (settled.length > 0) {
            const late = state.begin(node.id);
            recordOutcomes(late, state, node.id, settled);
            late.commit();
        }
        coordinator.dropPending();
        for (const taskId of state.dropPendingTasks()) {
            state.appendAudit(node.id, 'task_dropped', `Task ${taskId} dropped at run end`, { taskId });
        }

        const terminal: TerminalInfo = {
            nodeId: node.id,
            outcome: node.outcome ?? 'failure',
            reason: forced?.reason ?? 'reached',
        };
        if (forced?.detail !== undefined) terminal.detail = forced.detail;
        if (forced?.resume) terminal.resume = forced.resume;

        const signals: JsonObject = { outcome: terminal.outcome, reason: terminal.reason };
        state.appendAudit(node.id, 'terminal_reached', `Run ended at ${node.id} (${terminal.reason})`, signals);
        state.finish(terminal, this.config.clock());
        this.logger.info('Run finished', { runId: state.runId, terminal: node.id, outcome: terminal.outcome, reason: terminal.reason });
        return terminal;
    }
}
