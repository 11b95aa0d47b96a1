/**
 * Memory access from nodes: dredging facts into state and committing
 * staged facts to the store.
 */

import { MemoryConflictError } from '../lib/errors';
import { getPath, isPlainObject, toJsonObject, toJsonValue } from '../lib/paths';
import type { DredgeSpec } from '../graph/schema';
import { factKindSchema } from '../graph/schema';
import type { FactInput, FactQuery, Triplet } from '../memory/types';
import { renderTemplate } from './template';
import type { NodeContext, NodeExecutor, NodeResult } from './types';

export const DEFAULT_FACT_SOURCE = 'pendingFacts';

/**
 * Run dredge queries and stage the matches under `data.memory.<as>`.
 * Returns the number of facts found per alias.
 */
export async function dredge(
    context: Pick<NodeContext, 'memory' | 'transaction' | 'state'>,
    specs: DredgeSpec[],
): Promise<Record<string, number>> {
    const { memory, transaction, state } = context;
    const found: Record<string, number> = {};
    const scope = { data: transaction.read(''), counters: state.counters, run: { id: state.runId } };

    for (const spec of specs) {
        const text = spec.query !== undefined ? renderTemplate(spec.query, scope).trim() : '';
        const query: FactQuery = {
            text: text.length > 0 ? text : undefined,
            subjects: spec.subjects,
            predicates: spec.predicates,
            kinds: spec.kinds,
            tags: spec.tags,
            minConfidence: spec.minConfidence,
            excludeSuperseded: true,
            limit: spec.limit,
        };
        const facts = await memory.query(query);
        transaction.set(`memory.${spec.as}`, toJsonValue(facts));
        found[spec.as] = facts.length;
    }
    return found;
}

/**
 * Turn loosely shaped model output into fact inputs. Strings become plain
 * facts; objects need at least `text`.
 */
export function toFactInputs(value: unknown): FactInput[] {
    const items = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
    const facts: FactInput[] = [];
    for (const item of items) {
        if (typeof item === 'string') {
            facts.push({ text: item });
            continue;
        }
        if (!isPlainObject(item) || typeof item.text !== 'string') continue;

        const kind = factKindSchema.safeParse(item.kind);
        const triplets: Triplet[] = [];
        const rawTriplets = Array.isArray(item.triplets) ? item.triplets : item.triplet ? [item.triplet] : [];
        for (const t of rawTriplets) {
            if (isPlainObject(t) && typeof t.subject === 'string'
                && typeof t.predicate === 'string' && typeof t.object === 'string') {
                triplets.push({ subject: t.subject, predicate: t.predicate, object: t.object });
            }
        }

        facts.push({
            text: item.text,
            confidence: typeof item.confidence === 'number' ? item.confidence : undefined,
            kind: kind.success ? kind.data : undefined,
            triplets,
            tags: Array.isArray(item.tags) ? item.tags.filter((t): t is string => typeof t === 'string') : undefined,
            source: typeof item.source === 'string' ? item.source : undefined,
            supersedes: typeof item.supersedes === 'string' ? item.supersedes : undefined,
        });
    }
    return facts;
}

/**
 * memory-write: commit the facts staged at `memory.source` (default
 * `pendingFacts`) and clear them. Conflicts are counted and audited.
 */
export const executeMemoryWrite: NodeExecutor = async (context): Promise<NodeResult> => {
    const { node, memory, transaction, state } = context;
    const directive = node.definition.memory;
    const source = directive?.source ?? DEFAULT_FACT_SOURCE;
    const facts = toFactInputs(transaction.read(source));

    if (facts.length === 0) {
        return { summary: 'No facts to write', signals: { written: 0, conflicts: 0 } };
    }

    const result = await memory.write(facts, state.runId, node.id, {
        conflictPolicy: directive?.conflictPolicy ?? 'flag',
    });

    transaction.bump('memoryWrites', result.committed.length);
    transaction.bump('memoryConflicts', result.conflicts.length);
    transaction.remove(source);

    state.appendAudit(node.id, 'memory_written', `Committed ${result.committed.length} fact(s)`, {
        factIds: result.committed.map(f => f.factId),
    });
    for (const conflict of result.conflicts) {
        const message = conflict.resolution === 'rejected'
            ? new MemoryConflictError(conflict.text, conflict.conflictsWith).message
            : `Fact "${conflict.text}" ${conflict.resolution}; conflicts with ${conflict.conflictsWith.join(', ')}`;
        state.appendAudit(node.id, 'memory_conflict', message, toJsonObject(conflict));
    }

    return {
        summary: `Wrote ${result.committed.length} fact(s), ${result.conflicts.length} conflict(s)`,
        signals: {
            written: result.committed.length,
            conflicts: result.conflicts.length,
            source,
        },
    };
};

/** Facts listed under `facts` in a node's output, if any */
export function factsFromOutput(output: unknown): unknown {
    return getPath(output, 'facts');
}
