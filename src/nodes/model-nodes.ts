/**
 * init and reason nodes: render the prompt, call the model, validate and
 * write the output. Reason nodes may also stage facts and spawn tasks.
 */

import type { JsonObject, JsonValue } from '../lib/paths';
import { renderTemplate } from './template';
import { callModel } from './output';
import { applyWriteRules, writeOutput } from './writes';
import { DEFAULT_FACT_SOURCE, dredge, factsFromOutput } from './memory-node';
import { spawnTasks } from './spawn';
import type { NodeContext, NodeExecutor, NodeResult } from './types';

/**
 * Stage a node's output through its write rules, or the default write.
 */
export function stageOutput(context: NodeContext, output: JsonValue): string[] {
    const { node, transaction, state } = context;
    const rules = node.definition.writes;
    if (!rules || rules.length === 0) {
        writeOutput(transaction, node.id, output);
        return [];
    }
    return applyWriteRules(transaction, rules, {
        output,
        data: transaction.read(''),
        counters: state.counters,
        run: { id: state.runId, graphVersion: state.graphVersion },
    });
}

async function runModelNode(context: NodeContext): Promise<{ output: JsonValue; signals: JsonObject }> {
    const { node, transaction, state } = context;
    const signals: JsonObject = {};

    const dredges = node.definition.memory?.dredge;
    if (dredges && dredges.length > 0) {
        signals.dredged = await dredge(context, dredges);
    }

    const prompt = renderTemplate(node.definition.prompt ?? '', {
        data: transaction.read(''),
        counters: state.counters,
        run: { id: state.runId, step: state.counters.totalSteps, graphVersion: state.graphVersion },
    });
    const output = await callModel(context, prompt);
    const written = stageOutput(context, output);
    if (written.length > 0) signals.written = written;

    return { output, signals };
}

export const executeInit: NodeExecutor = async context => {
    const { output, signals } = await runModelNode(context);
    return { summary: `Initialized ${context.node.id}`, output, signals };
};

export const executeReason: NodeExecutor = async context => {
    const { node, transaction } = context;
    const { output, signals } = await runModelNode(context);
    const result: NodeResult = { summary: `Reasoned at ${node.id}`, output, signals };

    if (node.definition.memory?.write) {
        const facts = factsFromOutput(output);
        if (Array.isArray(facts) && facts.length > 0) {
            const target = node.definition.memory.source ?? DEFAULT_FACT_SOURCE;
            for (const fact of facts) transaction.append(target, fact);
            signals.stagedFacts = facts.length;
        }
    }

    const parallel = node.definition.parallel;
    if (parallel && parallel.spawn !== false) {
        const spawned = await spawnTasks(context, parallel, output);
        signals.tasks = {
            spawned: spawned.spawned,
            completed: spawned.completed,
            failed: spawned.failed,
            detached: spawned.detached,
        };
        if (spawned.spawned.length > 0) {
            result.summary = `Reasoned at ${node.id}; spawned ${spawned.spawned.length} task(s)`;
        }
    }
    return result;
};
