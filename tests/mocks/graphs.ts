/**
 * Graph documents shared by the routing, controller and learning tests.
 */

import type { GraphDocument } from '../../src/graph/schema';

/** Two edges out of `x`: a conditional one at priority 1, a fallback at 2 */
export function priorityGraph(): GraphDocument {
    return {
        name: 'triage',
        start: 'x',
        nodes: [
            { id: 'x', type: 'reason', prompt: 'Score the ticket' },
            { id: 'fast', type: 'terminal', terminal: { outcome: 'success' } },
            { id: 'slow', type: 'terminal', terminal: { outcome: 'success' } },
            { id: 'failed', type: 'terminal', terminal: { outcome: 'failure' } },
        ],
        edges: [
            { id: 'E1', from: 'x', to: 'fast', guard: 'score >= 0.8', priority: 1 },
            { id: 'E2', from: 'x', to: 'slow', guard: 'true', priority: 2 },
        ],
    };
}

/** draft -> check gate, with a bounded retry edge back to draft */
export function retryGraph(maxRetries = 2): GraphDocument {
    return {
        name: 'drafting',
        start: 'draft',
        nodes: [
            {
                id: 'draft',
                type: 'reason',
                prompt: 'Write a draft. Attempt {{counters.totalSteps}}',
                outputSchema: { type: 'object', required: ['quality'], properties: { quality: { type: 'number' } } },
            },
            {
                id: 'check',
                type: 'gate',
                gate: { criteria: [{ name: 'good-enough', check: 'quality >= 0.8' }] },
            },
            { id: 'publish', type: 'terminal', terminal: { outcome: 'success', output: 'quality' } },
            { id: 'failed', type: 'terminal', terminal: { outcome: 'failure' } },
        ],
        edges: [
            { id: 'draft->check', from: 'draft', to: 'check' },
            { id: 'check->publish', from: 'check', to: 'publish', guard: 'gates.check.passed', priority: 1 },
            { id: 'check->draft', from: 'check', to: 'draft', kind: 'retry', maxRetries, priority: 2 },
        ],
    };
}

/** plan spawns three skill tasks, gather merges what came back */
export function fanoutGraph(slowTimeoutMs = 20): GraphDocument {
    return {
        name: 'research',
        start: 'plan',
        escalateNode: 'escalated',
        nodes: [
            {
                id: 'plan',
                type: 'reason',
                prompt: 'Plan research on {{topic}}',
                parallel: {
                    tasks: [
                        { id: 't1', skill: 'fetch', instruction: 'Fetch A', params: { q: 'a' } },
                        { id: 't2', skill: 'fetch', instruction: 'Fetch B', params: { q: 'b' } },
                        { id: 't3', skill: 'slow', instruction: 'Fetch C', timeoutMs: slowTimeoutMs },
                    ],
                    onFail: 'log_and_continue',
                },
            },
            { id: 'gather', type: 'merge', merge: { into: 'results', policy: 'append' } },
            { id: 'done', type: 'terminal', terminal: { outcome: 'success', output: 'results' } },
            { id: 'failed', type: 'terminal', terminal: { outcome: 'failure' } },
            { id: 'escalated', type: 'terminal', terminal: { outcome: 'escalate' } },
        ],
        edges: [
            { from: 'plan', to: 'gather' },
            { from: 'gather', to: 'done' },
        ],
    };
}

/** work loops on itself until its fifth visit, then finishes */
export function polishGraph(): GraphDocument {
    return {
        name: 'polish',
        start: 'work',
        nodes: [
            { id: 'work', type: 'reason', prompt: 'Polish the text' },
            { id: 'done', type: 'terminal', terminal: { outcome: 'success' } },
            { id: 'failed', type: 'terminal', terminal: { outcome: 'failure' } },
        ],
        edges: [
            { id: 'again', from: 'work', to: 'work', kind: 'retry', maxRetries: 10, guard: "visits('work') < 5", priority: 1 },
            { id: 'finish', from: 'work', to: 'done', guard: 'true', priority: 2 },
        ],
    };
}
