/**
 * Zod schema for the human-authored graph document.
 * Documents are written in YAML or JSON with camelCase keys.
 */

import { z } from 'zod';
import type { JsonValue } from '../lib/paths';

// ============================================================================
// Shared pieces
// ============================================================================

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(jsonValueSchema),
    ])
);

/** JSON-schema subset accepted for node outputs */
export interface OutputSchema {
    type?: 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';
    description?: string;
    required?: string[];
    properties?: Record<string, OutputSchema>;
    items?: OutputSchema;
    enum?: JsonValue[];
    minimum?: number;
    maximum?: number;
    minItems?: number;
}

export const outputSchemaSchema: z.ZodType<OutputSchema> = z.lazy(() =>
    z.object({
        type: z.enum(['object', 'array', 'string', 'number', 'integer', 'boolean', 'null']).optional(),
        description: z.string().optional(),
        required: z.array(z.string()).optional(),
        properties: z.record(outputSchemaSchema).optional(),
        items: outputSchemaSchema.optional(),
        enum: z.array(jsonValueSchema).optional(),
        minimum: z.number().optional(),
        maximum: z.number().optional(),
        minItems: z.number().int().nonnegative().optional(),
    }).strict()
);

export const factKindSchema = z.enum(['fact', 'decision', 'observation', 'lesson']);

export const conflictPolicySchema = z.enum(['flag', 'overwrite', 'reject']);

export const mergePolicySchema = z.enum(['overwrite', 'append', 'conflict-flag']);

export const failurePolicySchema = z.enum(['log_and_continue', 'propagate']);

export const dredgeSchema = z.object({
    /** Free-text match; `{{path}}` placeholders are filled from state */
    query: z.string().optional(),
    subjects: z.array(z.string()).optional(),
    predicates: z.array(z.string()).optional(),
    kinds: z.array(factKindSchema).optional(),
    tags: z.array(z.string()).optional(),
    minConfidence: z.number().min(0).max(1).optional(),
    limit: z.number().int().positive().optional(),
    /** Stored under `data.memory.<as>` */
    as: z.string().min(1),
}).strict();

export const writeRuleSchema = z.object({
    path: z.string().min(1),
    /** Source path rooted at output, data, counters, memory or run */
    from: z.string().optional(),
    value: jsonValueSchema.optional(),
    transform: z.enum(['number', 'string', 'boolean', 'length', 'json']).optional(),
    mode: z.enum(['set', 'append', 'merge']).optional(),
}).strict();

// ============================================================================
// Node directives
// ============================================================================

export const taskSpecSchema = z.object({
    id: z.string().min(1).optional(),
    skill: z.string().optional(),
    instruction: z.string(),
    params: z.record(jsonValueSchema).optional(),
    /** State paths copied into the task's isolated slice */
    context: z.array(z.string()).optional(),
    timeoutMs: z.number().int().positive().optional(),
    wait: z.boolean().optional(),
    onFail: failurePolicySchema.optional(),
}).strict();

export const parallelSchema = z.object({
    spawn: z.boolean().optional(),
    maxConcurrent: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
    tasks: z.array(taskSpecSchema).optional(),
    /** Output field holding additional task specs produced by the model */
    fromOutput: z.string().optional(),
    wait: z.boolean().optional(),
    onFail: failurePolicySchema.optional(),
}).strict();

export const memoryDirectiveSchema = z.object({
    dredge: z.array(dredgeSchema).optional(),
    write: z.boolean().optional(),
    /** Path of the fact list to commit (memory-write nodes) */
    source: z.string().optional(),
    conflictPolicy: conflictPolicySchema.optional(),
}).strict();

export const gateSchema = z.object({
    criteria: z.array(z.object({
        name: z.string().min(1),
        check: z.string().min(1),
    }).strict()).min(1),
    requireAll: z.boolean().optional(),
}).strict();

export const decisionRuleSchema = z.object({
    /** `">= 0.8"` compares the decision variable; anything else is a guard */
    when: z.string().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    equals: jsonValueSchema.optional(),
    default: z.boolean().optional(),
    target: z.string().min(1),
}).strict();

export const decisionSchema = z.object({
    variable: z.string().min(1),
    precondition: z.string().optional(),
    rules: z.array(decisionRuleSchema).min(1),
}).strict();

export const mergeSchema = z.object({
    into: z.string().min(1),
    policy: mergePolicySchema.optional(),
    /** Restrict to these task ids; defaults to every completed branch */
    tasks: z.array(z.string()).optional(),
    prompt: z.string().optional(),
}).strict();

export const toolSchema = z.object({
    skill: z.string().min(1),
    params: z.record(jsonValueSchema).optional(),
}).strict();

export const terminalSchema = z.object({
    outcome: z.enum(['success', 'failure', 'escalate']),
    lesson: z.string().optional(),
    /** Path copied to `data.result` on arrival */
    output: z.string().optional(),
}).strict();

export const nodeTypeSchema = z.enum([
    'init', 'reason', 'tool', 'merge', 'memory-write', 'gate', 'decision', 'terminal',
]);

export const nodeSchema = z.object({
    id: z.string().min(1),
    type: nodeTypeSchema,
    stage: z.string().optional(),
    description: z.string().optional(),
    prompt: z.string().optional(),
    outputSchema: outputSchemaSchema.optional(),
    writes: z.array(writeRuleSchema).optional(),
    memory: memoryDirectiveSchema.optional(),
    parallel: parallelSchema.optional(),
    retry: z.object({ maxAttempts: z.number().int().positive() }).strict().optional(),
    tool: toolSchema.optional(),
    gate: gateSchema.optional(),
    decision: decisionSchema.optional(),
    merge: mergeSchema.optional(),
    terminal: terminalSchema.optional(),
}).strict();

// ============================================================================
// Edges
// ============================================================================

export const edgeKindSchema = z.enum([
    'forward', 'retry', 'memory-pull', 'cross-run-read', 'decompose', 'depends',
]);

export const traverseActionSchema = z.object({
    action: z.enum(['set', 'increment', 'append', 'remove', 'signal']),
    path: z.string().min(1),
    value: jsonValueSchema.optional(),
}).strict();

export const edgeSchema = z.object({
    id: z.string().min(1).optional(),
    from: z.string().min(1),
    to: z.string().min(1),
    kind: edgeKindSchema.optional(),
    guard: z.string().optional(),
    priority: z.number().int().optional(),
    maxRetries: z.number().int().nonnegative().optional(),
    weight: z.number().optional(),
    description: z.string().optional(),
    onTraverse: z.array(traverseActionSchema).optional(),
    requires: z.object({
        nodes: z.array(z.string()).optional(),
        all: z.boolean().optional(),
        state: z.record(jsonValueSchema).optional(),
    }).strict().optional(),
    decompose: z.object({
        parent: z.string().min(1),
        maxChildren: z.number().int().positive().optional(),
    }).strict().optional(),
    dredge: dredgeSchema.optional(),
    read: z.object({
        run: z.string().optional(),
        path: z.string().min(1),
        as: z.string().min(1),
    }).strict().optional(),
}).strict();

export const relationshipSchema = z.object({
    id: z.string().min(1).optional(),
    from: z.string().min(1),
    to: z.string().min(1),
    type: z.string().min(1),
    weight: z.number().optional(),
    observations: z.array(z.string()).optional(),
}).strict();

export const graphDocumentSchema = z.object({
    name: z.string().min(1),
    version: z.number().int().positive().optional(),
    description: z.string().optional(),
    start: z.string().min(1),
    failureNode: z.string().optional(),
    escalateNode: z.string().optional(),
    nodes: z.array(nodeSchema).min(1),
    edges: z.array(edgeSchema),
    relationships: z.array(relationshipSchema).optional(),
}).strict();

export type GraphDocument = z.infer<typeof graphDocumentSchema>;
export type NodeDocument = z.infer<typeof nodeSchema>;
export type EdgeDocument = z.infer<typeof edgeSchema>;
export type RelationshipDocument = z.infer<typeof relationshipSchema>;
export type NodeType = z.infer<typeof nodeTypeSchema>;
export type EdgeKind = z.infer<typeof edgeKindSchema>;
export type DredgeSpec = z.infer<typeof dredgeSchema>;
export type WriteRule = z.infer<typeof writeRuleSchema>;
export type TaskSpecDocument = z.infer<typeof taskSpecSchema>;
export type ParallelDirective = z.infer<typeof parallelSchema>;
export type MemoryDirective = z.infer<typeof memoryDirectiveSchema>;
export type GateDirective = z.infer<typeof gateSchema>;
export type DecisionDirective = z.infer<typeof decisionSchema>;
export type DecisionRuleDocument = z.infer<typeof decisionRuleSchema>;
export type MergeDirective = z.infer<typeof mergeSchema>;
export type ToolDirective = z.infer<typeof toolSchema>;
export type TerminalDirective = z.infer<typeof terminalSchema>;
export type TraverseAction = z.infer<typeof traverseActionSchema>;
export type FactKind = z.infer<typeof factKindSchema>;
export type ConflictPolicy = z.infer<typeof conflictPolicySchema>;
export type MergePolicy = z.infer<typeof mergePolicySchema>;
export type FailurePolicy = z.infer<typeof failurePolicySchema>;
