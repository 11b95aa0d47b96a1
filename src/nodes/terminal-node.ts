import { renderTemplate } from './template';
import type { NodeExecutor, NodeResult } from './types';

/**
 * terminal node: records `data.outcome`, copies `terminal.output` to
 * `data.result` and writes the optional lesson to memory.
 */
export const executeTerminal: NodeExecutor = async (context): Promise<NodeResult> => {
    const { node, transaction, state, memory } = context;
    const directive = node.definition.terminal;
    const outcome = node.outcome ?? 'success';

    transaction.set('outcome', outcome);
    if (directive?.output !== undefined) {
        const result = transaction.read(directive.output);
        if (result !== undefined) transaction.set('result', result);
    }

    let lessonId: string | undefined;
    if (directive?.lesson) {
        const text = renderTemplate(directive.lesson, {
            data: transaction.read(''),
            counters: state.counters,
            run: { id: state.runId },
        });
        const written = await memory.write([{
            text,
            kind: 'lesson',
            confidence: 0.8,
            tags: ['lesson', outcome],
            source: 'terminal',
        }], state.runId, node.id);
        lessonId = written.committed[0]?.factId;
        transaction.bump('memoryWrites', written.committed.length);
    }

    return {
        summary: `Reached ${outcome} terminal ${node.id}`,
        output: outcome,
        signals: lessonId ? { outcome, lessonId } : { outcome },
    };
};
