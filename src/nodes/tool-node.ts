/**
 * tool node: invoke one skill with rendered parameters.
 * Skill errors are written to `data.tools.<nodeId>` and routed on, not thrown.
 */

import { errorMessage } from '../lib/errors';
import type { JsonObject } from '../lib/paths';
import { toJsonObject, toJsonValue } from '../lib/paths';
import { recordContent } from '../lib/tracer';
import { renderValue } from './template';
import { stageOutput } from './model-nodes';
import { spawnTasks } from './spawn';
import type { NodeExecutor } from './types';

export const executeTool: NodeExecutor = async context => {
    const { node, transaction, state, skills, tracer } = context;
    const directive = node.definition.tool;
    if (!directive) {
        throw new Error(`Tool node "${node.id}" has no tool directive`);
    }

    const scope = { data: transaction.read(''), counters: state.counters, run: { id: state.runId } };
    const parameters = toJsonObject(renderValue(directive.params ?? {}, scope));

    transaction.bump('skillsInvoked');
    const invocation = await tracer.withSpan('sluice.skill', async span => {
        span.setAttributes({ 'sluice.node_id': node.id, 'sluice.skill': directive.skill });
        recordContent(span, tracer, 'params', parameters);
        try {
            return await skills.invoke(directive.skill, parameters, {
                runId: state.runId,
                nodeId: node.id,
                signal: context.signal,
            });
        } catch (error) {
            // A throwing invoker is treated like an isError result
            return { result: errorMessage(error), isError: true };
        }
    });

    const result = toJsonValue(invocation.result);
    const record: JsonObject = { skill: directive.skill, isError: invocation.isError, result };
    transaction.set(`tools.${node.id}`, record);

    if (invocation.isError) {
        context.logger.warn('Skill returned an error', { nodeId: node.id, skill: directive.skill });
        return {
            summary: `Skill ${directive.skill} failed`,
            output: record,
            signals: { skill: directive.skill, isError: true },
        };
    }

    const written = node.definition.writes ? stageOutput(context, result) : [];
    const signals: JsonObject = { skill: directive.skill, isError: false };
    if (written.length > 0) signals.written = written;

    const parallel = node.definition.parallel;
    if (parallel && parallel.spawn !== false) {
        const spawned = await spawnTasks(context, parallel, result);
        signals.tasks = { spawned: spawned.spawned, completed: spawned.completed, failed: spawned.failed };
    }

    return { summary: `Skill ${directive.skill} succeeded`, output: record, signals };
};
