/**
 * Node executor contract.
 */

import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { ResolvedEngineConfig } from '../lib/config';
import type { JsonObject, JsonValue } from '../lib/paths';
import type { CompiledGraph, CompiledNode } from '../graph/types';
import type { NodeType } from '../graph/schema';
import type { RunStateStore, StateTransaction } from '../state/run-state';
import type { MemoryStore } from '../memory/types';
import type { LanguageModel, SkillInvoker } from '../runtime/interfaces';
import type { ParallelCoordinator } from '../parallel/coordinator';

/** Everything an executor may touch during one node execution */
export interface NodeContext {
    graph: CompiledGraph;
    node: CompiledNode;
    /** Committed run state; read-only for executors */
    state: RunStateStore;
    /** Writes staged here are committed before routing */
    transaction: StateTransaction;
    memory: MemoryStore;
    model: LanguageModel;
    skills: SkillInvoker;
    coordinator: ParallelCoordinator;
    config: ResolvedEngineConfig;
    logger: Logger;
    tracer: Tracer;
    /** Visit count of this node, including the current one */
    visit: number;
    /** Child cap set by the decompose edge that led here */
    spawnLimit?: number;
    signal?: AbortSignal;
}

export interface NodeResult {
    /** Short human-readable summary for the audit log */
    summary: string;
    /** Raw (validated) output, when the node produced one */
    output?: JsonValue;
    /** Learning signals recorded on the node's audit entry */
    signals?: JsonObject;
}

export type NodeExecutor = (context: NodeContext) => Promise<NodeResult>;

export type NodeExecutorMap = Record<NodeType, NodeExecutor>;
