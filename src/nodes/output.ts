/**
 * Output schema validation for model calls.
 *
 * A node's `outputSchema` (a small JSON-schema subset) is compiled to a zod
 * schema. Failed attempts are retried with the validation problems passed
 * back to the model as feedback.
 */

import { z } from 'zod';
import type { OutputErrorItem } from '../lib/errors';
import { OutputSchemaError } from '../lib/errors';
import type { JsonValue } from '../lib/paths';
import { deepEqual, toJsonValue } from '../lib/paths';
import { recordContent } from '../lib/tracer';
import type { OutputSchema } from '../graph/schema';
import { jsonValueSchema } from '../graph/schema';
import type { NodeContext } from './types';

// ============================================================================
// Schema compilation
// ============================================================================

export function compileOutputSchema(schema: OutputSchema): z.ZodTypeAny {
    let compiled: z.ZodTypeAny;
    switch (schema.type) {
        case 'object': {
            const properties = schema.properties ?? {};
            const required = new Set(schema.required ?? []);
            const shape: Record<string, z.ZodTypeAny> = {};
            for (const [key, child] of Object.entries(properties)) {
                const property = compileOutputSchema(child);
                shape[key] = required.has(key) ? property : property.optional();
            }
            for (const key of required) {
                if (!(key in shape)) shape[key] = jsonValueSchema;
            }
            compiled = z.object(shape).passthrough();
            break;
        }
        case 'array': {
            let array = z.array(schema.items ? compileOutputSchema(schema.items) : jsonValueSchema);
            if (schema.minItems !== undefined) array = array.min(schema.minItems);
            compiled = array;
            break;
        }
        case 'string':
            compiled = z.string();
            break;
        case 'number':
        case 'integer': {
            let number = schema.type === 'integer' ? z.number().int() : z.number();
            if (schema.minimum !== undefined) number = number.min(schema.minimum);
            if (schema.maximum !== undefined) number = number.max(schema.maximum);
            compiled = number;
            break;
        }
        case 'boolean':
            compiled = z.boolean();
            break;
        case 'null':
            compiled = z.null();
            break;
        default:
            compiled = jsonValueSchema;
    }

    const allowed = schema.enum;
    if (allowed && allowed.length > 0) {
        compiled = compiled.refine(
            (value: unknown) => allowed.some(option => deepEqual(option, value)),
            { message: `Expected one of ${JSON.stringify(allowed)}` },
        );
    }
    return compiled;
}

export type OutputValidation =
    | { success: true; data: JsonValue }
    | { success: false; errors: OutputErrorItem[] };

/**
 * Validate a raw model response. String responses are parsed as JSON when
 * the schema expects structured data.
 */
export function validateOutput(schema: OutputSchema, raw: unknown): OutputValidation {
    let candidate = raw;
    if (typeof raw === 'string' && schema.type !== 'string') {
        try {
            candidate = JSON.parse(raw);
        } catch {
            return { success: false, errors: [{ path: [], message: 'Invalid JSON' }] };
        }
    }

    const result = compileOutputSchema(schema).safeParse(candidate);
    if (!result.success) {
        return {
            success: false,
            errors: result.error.errors.map(e => ({ path: e.path, message: e.message })),
        };
    }
    return { success: true, data: toJsonValue(result.data) };
}

export function formatFeedback(errors: OutputErrorItem[]): string {
    return errors
        .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
        .join('\n');
}

// ============================================================================
// Model call with retries
// ============================================================================

/**
 * Call the language model for the current node and validate the result.
 *
 * @throws OutputSchemaError when every allowed attempt fails validation
 */
export async function callModel(context: NodeContext, prompt: string): Promise<JsonValue> {
    const { node, state, model, transaction, tracer, logger } = context;
    const schema = node.definition.outputSchema;
    const maxAttempts = node.definition.retry?.maxAttempts ?? context.config.outputRetries + 1;

    let feedback: string | undefined;
    let lastErrors: OutputErrorItem[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (attempt > 1) transaction.bump('outputRetries');

        const raw = await tracer.withSpan('sluice.model', async span => {
            span.setAttributes({ 'sluice.node_id': node.id, 'sluice.attempt': attempt });
            recordContent(span, tracer, 'prompt', prompt);
            const response = await model.call({
                prompt,
                outputSchema: schema,
                runId: state.runId,
                nodeId: node.id,
                attempt,
                feedback,
                signal: context.signal,
            });
            recordContent(span, tracer, 'output', response);
            return response;
        });

        if (!schema) return toJsonValue(raw);

        const validation = validateOutput(schema, raw);
        if (validation.success) return validation.data;

        lastErrors = validation.errors;
        feedback = formatFeedback(validation.errors);
        logger.warn('Model output failed validation', { nodeId: node.id, attempt, feedback });
    }

    throw new OutputSchemaError(node.id, maxAttempts, lastErrors);
}
