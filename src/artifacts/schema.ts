/**
 * Zod schemas for artifacts read back from external storage.
 */

import { z } from 'zod';
import { isPlainObject } from '../lib/paths';
import { jsonValueSchema } from '../graph/schema';
import type { RunStateData, TerminalInfo } from '../state/types';
import type { ChangeLogRecord, Proposal } from '../learning/types';
import type { RunArtifact } from './types';

const runStatusSchema = z.enum(['pending', 'running', 'succeeded', 'failed', 'escalated']);

export const changeSchema = z.object({
    id: z.string(),
    type: z.enum([
        'update-edge-priority',
        'update-edge-weight',
        'update-relationship-weight',
        'add-relationship',
        'update-guard',
        'update-max-retries',
        'add-edge',
        'remove-edge',
        'add-node',
        'remove-node',
        'update-prompt',
    ]),
    targetId: z.string(),
    oldValue: jsonValueSchema,
    newValue: jsonValueSchema,
    rationale: z.string(),
    autoApply: z.boolean(),
    risk: z.enum(['low', 'medium', 'high']),
});

export const proposalSchema: z.ZodType<Proposal> = z.object({
    id: z.string(),
    createdAt: z.number(),
    graphName: z.string(),
    graphVersion: z.number(),
    supportingRunIds: z.array(z.string()),
    summary: z.string(),
    confidence: z.number(),
    status: z.enum(['pending', 'approved', 'rejected', 'applied', 'failed']),
    changes: z.array(changeSchema),
});

export const changeLogRecordSchema: z.ZodType<ChangeLogRecord> = z.object({
    proposalId: z.string(),
    change: changeSchema,
    graphName: z.string(),
    fromVersion: z.number(),
    toVersion: z.number(),
    appliedAt: z.number(),
});

const terminalSchema = z.custom<TerminalInfo>(
    value => isPlainObject(value) && typeof value.nodeId === 'string' && typeof value.outcome === 'string',
);

const runStateSchema = z.custom<RunStateData>(
    value => isPlainObject(value)
        && typeof value.runId === 'string'
        && Array.isArray(value.audit)
        && isPlainObject(value.counters)
        && isPlainObject(value.data),
    { message: 'Malformed run state' },
);

export const runArtifactSchema: z.ZodType<RunArtifact> = z.object({
    runId: z.string(),
    graphName: z.string(),
    graphVersion: z.number(),
    status: runStatusSchema,
    terminal: terminalSchema.optional(),
    state: runStateSchema,
    savedAt: z.number(),
});
