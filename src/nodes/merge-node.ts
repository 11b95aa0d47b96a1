/**
 * merge node: the only place branch results reach shared data.
 *
 * Fire-and-forget tasks that have settled by now are recorded first so
 * their results take part in the merge.
 */

import { renderTemplate } from './template';
import { callModel } from './output';
import { stageOutput } from './model-nodes';
import { recordOutcomes } from './spawn';
import type { NodeExecutor } from './types';

export const executeMerge: NodeExecutor = async context => {
    const { node, transaction, state, coordinator } = context;
    const directive = node.definition.merge;
    if (!directive) {
        throw new Error(`Merge node "${node.id}" has no merge directive`);
    }

    const harvested = coordinator.collectSettled();
    recordOutcomes(transaction, state, node.id, harvested);

    const policy = directive.policy ?? 'overwrite';
    const merged = state.mergeBranches(transaction, directive.into, policy, directive.tasks);
    state.appendAudit(node.id, 'branches_merged', `Merged ${merged.merged.length} branch(es) into ${directive.into}`, {
        taskIds: merged.merged,
        policy,
        conflicts: merged.conflicts.length,
    });

    const signals = {
        merged: merged.merged,
        conflicts: merged.conflicts.length,
        harvested: harvested.map(o => o.taskId),
    };

    if (directive.prompt === undefined) {
        return { summary: `Merged ${merged.merged.length} branch(es)`, output: merged.value, signals };
    }

    const prompt = renderTemplate(directive.prompt, {
        data: transaction.read(''),
        counters: state.counters,
        run: { id: state.runId },
    });
    const output = await callModel(context, prompt);
    stageOutput(context, output);
    return { summary: `Merged ${merged.merged.length} branch(es) and synthesized`, output, signals };
};
