/**
 * SluiceEngine: the operator surface. Creates and executes runs against
 * the active graph version, records run artifacts and lessons, and drives
 * the learning loop (analyze, propose, apply).
 *
 * @example
 * ```typescript
 * import { SluiceEngine, loadGraphFile } from 'sluice';
 *
 * const engine = new SluiceEngine({
 *     graph: await loadGraphFile('./graphs/support.yaml'),
 *     model: myModel,
 *     skills: mySkills,
 * });
 *
 * const runId = engine.createRun({ ticket: 'Printer is on fire' });
 * const result = await engine.run(runId);
 * console.log(result.terminal.outcome);
 *
 * const { learned, applied } = await engine.evolve();
 * console.log(learned.proposals.length, applied.graph.version);
 * ```
 */

import type { EngineConfig, ResolvedEngineConfig } from './lib/config';
import { resolveEngineConfig } from './lib/config';
import { ProposalNotFoundError, RunNotFoundError, SluiceError, errorMessage, redactSecrets } from './lib/errors';
import type { Logger } from './lib/logger';
import { createScopedLogger } from './lib/logger';
import type { JsonObject } from './lib/paths';
import type { CompiledGraph } from './graph/types';
import { RunStateStore } from './state/run-state';
import type { AuditEntry, RunCounters, RunStateData, RunStatus, TerminalInfo } from './state/types';
import type { MemoryStats, MemoryStore } from './memory/types';
import { InMemoryFactStore } from './memory/fact-store';
import type { ArtifactStore } from './artifacts/types';
import { MemoryArtifactStore } from './artifacts/memory-store';
import { analyzeRuns } from './learning/analyzer';
import { generateProposals } from './learning/proposals';
import type { ApplyResult } from './learning/applier';
import { GraphRegistry } from './learning/applier';
import type { Proposal, ProposalStatus, RunAnalysis } from './learning/types';
import type { NodeExecutorMap } from './nodes/types';
import type { LanguageModel, SkillInvoker } from './runtime/interfaces';
import { SkillRegistry } from './runtime/skill-registry';
import { ExecutionController } from './runtime/controller';
import type { RunResult } from './runtime/controller';

// ============================================================================
// Types
// ============================================================================

export interface SluiceEngineOptions extends EngineConfig {
    /** Initial graph version */
    graph: CompiledGraph;
    model: LanguageModel;
    /** Skill interface (default: an empty {@link SkillRegistry}) */
    skills?: SkillInvoker;
    /** Fact store shared by every run (default: in-memory) */
    memory?: MemoryStore;
    /** Run, proposal and change-log storage (default: in-memory) */
    artifacts?: ArtifactStore;
    /** Override executors per node type */
    executors?: Partial<NodeExecutorMap>;
}

export interface RunOptions {
    signal?: AbortSignal;
}

export interface RunStatusReport {
    runId: string;
    status: RunStatus;
    graphVersion: number;
    currentNodeId: string;
    counters: RunCounters;
    terminal?: TerminalInfo;
    /** Ordered audit trail so far */
    audit: AuditEntry[];
}

export interface LearnResult {
    /** Runs consumed by this pass; empty when too few were available */
    runIds: string[];
    analysis?: RunAnalysis;
    proposals: Proposal[];
}

export interface ApprovalResult {
    /** The proposal as stored after the apply attempt */
    proposal: Proposal;
    applied: ApplyResult;
}

export interface EvolveResult {
    learned: LearnResult;
    applied: ApplyResult;
}

export interface EvolutionStats {
    graph: { name: string; activeVersion: number; versions: number[] };
    runs: Record<RunStatus, number>;
    proposals: Record<ProposalStatus, number>;
    appliedChanges: number;
    /** Traversals per edge id across recorded runs */
    edgeUsage: Record<string, number>;
    memory: MemoryStats;
}

// ============================================================================
// Engine
// ============================================================================

export class SluiceEngine {
    private readonly config: ResolvedEngineConfig;
    private readonly registry: GraphRegistry;
    private readonly model: LanguageModel;
    private readonly skills: SkillInvoker;
    private readonly memory: MemoryStore;
    private readonly artifacts: ArtifactStore;
    private readonly executors?: Partial<NodeExecutorMap>;
    private readonly logger: Logger;
    /** Runs created or executed by this engine instance */
    private readonly runs = new Map<string, RunStateStore>();
    /** Runs already consumed by {@link learn} */
    private readonly learned = new Set<string>();

    constructor(options: SluiceEngineOptions) {
        this.config = resolveEngineConfig(options);
        this.logger = createScopedLogger(this.config.logger, 'engine');
        this.model = options.model;
        this.skills = options.skills ?? new SkillRegistry({ logger: this.config.logger });
        this.memory = options.memory ?? new InMemoryFactStore({
            clock: this.config.clock,
            idGenerator: this.config.idGenerator,
        });
        this.artifacts = options.artifacts ?? new MemoryArtifactStore();
        this.executors = options.executors;
        this.registry = new GraphRegistry(options.graph, {
            artifacts: this.artifacts,
            clock: this.config.clock,
            logger: this.config.logger,
        });
    }

    /** Active graph version */
    get graph(): CompiledGraph {
        return this.registry.active;
    }

    // ------------------------------------------------------------------------
    // Runs
    // ------------------------------------------------------------------------

    /**
     * Create a run pinned to the active graph version.
     */
    createRun(input: JsonObject = {}): string {
        const graph = this.registry.active;
        const runId = this.config.idGenerator('run');
        const state = new RunStateStore({
            runId,
            graphName: graph.name,
            graphVersion: graph.version,
            startNodeId: graph.nodes[graph.start].id,
            input,
            startedAt: this.config.clock(),
        });
        this.runs.set(runId, state);
        this.logger.debug('Run created', { runId, version: graph.version, input: redactSecrets(input) });
        return runId;
    }

    /**
     * Execute a created run to its terminal, then save its artifact and
     * record a lesson in memory.
     *
     * @throws RunNotFoundError for an unknown run id
     */
    async run(runId: string, options: RunOptions = {}): Promise<RunResult> {
        const state = this.runs.get(runId);
        if (!state) {
            throw new RunNotFoundError(runId);
        }
        if (state.status !== 'pending') {
            throw new SluiceError(`Run ${runId} was already executed`);
        }
        const graph = this.registry.get(state.graphVersion);
        if (!graph) {
            throw new SluiceError(`Graph version ${state.graphVersion} of run ${runId} is not registered`);
        }

        const controller = new ExecutionController({
            graph,
            memory: this.memory,
            model: this.model,
            skills: this.skills,
            config: this.config,
            executors: this.executors,
            artifacts: this.artifacts,
            signal: options.signal,
        });
        const result = await controller.execute(state);

        await this.artifacts.saveRun({
            runId,
            graphName: graph.name,
            graphVersion: graph.version,
            status: result.status,
            terminal: result.terminal,
            state: result.state,
            savedAt: this.config.clock(),
        });
        await this.recordLesson(graph, result);
        return result;
    }

    /**
     * @throws RunNotFoundError when the run is neither live nor stored
     */
    async status(runId: string): Promise<RunStatusReport> {
        const live = this.runs.get(runId);
        if (live) {
            const snapshot = live.toJSON();
            return {
                runId,
                status: live.status,
                graphVersion: live.graphVersion,
                currentNodeId: live.currentNodeId,
                counters: snapshot.counters,
                terminal: live.terminal,
                audit: snapshot.audit,
            };
        }
        const artifact = await this.artifacts.loadRun(runId);
        if (!artifact) {
            throw new RunNotFoundError(runId);
        }
        return {
            runId,
            status: artifact.status,
            graphVersion: artifact.graphVersion,
            currentNodeId: artifact.state.currentNodeId,
            counters: artifact.state.counters,
            terminal: artifact.terminal,
            audit: artifact.state.audit,
        };
    }

    /**
     * Lesson fact for a finished run: the path it took on success, or
     * where it failed.
     */
    private async recordLesson(graph: CompiledGraph, result: RunResult): Promise<void> {
        const path = visitedPath(result.state);
        const { terminal } = result;
        const text = terminal.outcome === 'success'
            ? `${graph.name} succeeded via ${path.join(' -> ')}`
            : `${graph.name} ended in ${terminal.outcome} at ${terminal.nodeId} (${terminal.reason}) after ${path.slice(0, -1).at(-1) ?? graph.nodes[graph.start].id}`;
        try {
            await this.memory.write([{
                text,
                kind: 'lesson',
                confidence: terminal.outcome === 'success' ? 0.7 : 0.6,
                tags: ['lesson', graph.name, terminal.outcome],
                source: 'engine',
            }], result.runId, terminal.nodeId);
        } catch (error) {
            this.logger.warn('Failed to record lesson', { runId: result.runId, error: errorMessage(error) });
        }
    }

    // ------------------------------------------------------------------------
    // Learning loop
    // ------------------------------------------------------------------------

    /**
     * Analyze recorded runs not yet learned from and store the proposals
     * drawn from them. Does nothing until at least `minRunsForLearning` new
     * runs are available. Nothing is published; see {@link evolve}.
     */
    async learn(): Promise<LearnResult> {
        const graph = this.registry.active;
        const fresh = (await this.artifacts.listRuns({ graphName: graph.name }))
            .filter(run => !this.learned.has(run.runId));
        if (fresh.length < this.config.minRunsForLearning) {
            this.logger.debug('Not enough runs to learn from', { available: fresh.length });
            return { runIds: [], proposals: [] };
        }

        const analysis = analyzeRuns(fresh.map(run => run.state));
        const proposals = generateProposals(analysis, graph, {
            minSupport: this.config.minRunsForLearning,
            clock: this.config.clock,
            idGenerator: this.config.idGenerator,
        });
        for (const proposal of proposals) {
            await this.artifacts.saveProposal(proposal);
        }
        fresh.forEach(run => this.learned.add(run.runId));
        this.logger.info('Learning pass complete', { runs: fresh.length, proposals: proposals.length });

        return { runIds: fresh.map(run => run.runId), analysis, proposals };
    }

    /**
     * Approve a pending proposal and publish it on its own.
     *
     * @throws ProposalNotFoundError for an unknown id
     */
    async approve(proposalId: string): Promise<ApprovalResult> {
        const approved = await this.decide(proposalId, 'approved');
        const applied = await this.registry.apply([approved], { includeApproved: true });
        const proposal = (await this.artifacts.listProposals()).find(p => p.id === proposalId) ?? approved;
        this.logger.info('Proposal approved', { proposalId, status: proposal.status, version: applied.graph.version });
        return { proposal, applied };
    }

    async reject(proposalId: string): Promise<Proposal> {
        return this.decide(proposalId, 'rejected');
    }

    private async decide(proposalId: string, status: 'approved' | 'rejected'): Promise<Proposal> {
        const proposal = (await this.artifacts.listProposals()).find(p => p.id === proposalId);
        if (!proposal) {
            throw new ProposalNotFoundError(proposalId);
        }
        if (proposal.status !== 'pending') {
            throw new SluiceError(`Proposal ${proposalId} is ${proposal.status}, not pending`);
        }
        return this.artifacts.updateProposalStatus(proposalId, status);
    }

    /**
     * Full cycle: {@link learn}, then publish every stored proposal that is
     * pending and auto-applicable, or approved but not yet applied.
     */
    async evolve(): Promise<EvolveResult> {
        const learned = await this.learn();
        const candidates = [
            ...await this.artifacts.listProposals('pending'),
            ...await this.artifacts.listProposals('approved'),
        ];
        const applied = await this.registry.apply(candidates, { includeApproved: true });
        this.logger.info('Evolution pass complete', {
            proposals: learned.proposals.length,
            applied: applied.appliedProposalIds.length,
            failed: applied.failedProposalIds.length,
            version: applied.graph.version,
        });
        return { learned, applied };
    }

    // ------------------------------------------------------------------------
    // Statistics
    // ------------------------------------------------------------------------

    async stats(): Promise<EvolutionStats> {
        const graph = this.registry.active;
        const runs = await this.artifacts.listRuns({ graphName: graph.name });
        const proposals = await this.artifacts.listProposals();
        const changeLog = await this.artifacts.readChangeLog();

        const runCounts: Record<RunStatus, number> = { pending: 0, running: 0, succeeded: 0, failed: 0, escalated: 0 };
        const edgeUsage: Record<string, number> = {};
        for (const run of runs) {
            runCounts[run.status]++;
            for (const entry of run.state.audit) {
                const edgeId = entry.signals.edgeId;
                if (entry.action === 'edge_taken' && typeof edgeId === 'string') {
                    edgeUsage[edgeId] = (edgeUsage[edgeId] ?? 0) + 1;
                }
            }
        }

        const proposalCounts: Record<ProposalStatus, number> = { pending: 0, approved: 0, rejected: 0, applied: 0, failed: 0 };
        proposals.forEach(p => proposalCounts[p.status]++);

        return {
            graph: { name: graph.name, activeVersion: graph.version, versions: this.registry.listVersions() },
            runs: runCounts,
            proposals: proposalCounts,
            appliedChanges: changeLog.filter(r => r.graphName === graph.name).length,
            edgeUsage,
            memory: await this.memory.stats(),
        };
    }
}

/** Node ids in visit order, from the run's audit log */
function visitedPath(state: RunStateData): string[] {
    const path: string[] = [];
    for (const entry of state.audit) {
        if (entry.action === 'run_started') {
            path.push(entry.nodeId);
        } else if (entry.action === 'edge_taken' && typeof entry.signals.to === 'string') {
            path.push(entry.signals.to);
        } else if (entry.action === 'forced_transition' && typeof entry.signals.to === 'string') {
            path.push(entry.signals.to);
        }
    }
    return path;
}
