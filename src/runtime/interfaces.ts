/**
 * The two external collaborators an engine talks to: one language model
 * and one skill (tool) interface.
 */

import type { JsonObject } from '../lib/paths';
import type { OutputSchema } from '../graph/schema';

export interface LanguageModelRequest {
    prompt: string;
    outputSchema?: OutputSchema;
    runId: string;
    nodeId: string;
    /** Parallel task making the call, if any */
    taskId?: string;
    /** 1-based attempt number; >1 means the previous output failed validation */
    attempt: number;
    /** Validation problems from the previous attempt */
    feedback?: string;
    signal?: AbortSignal;
}

/**
 * Language model worker. Returns the raw output; validation against the
 * node's output schema happens in the executor.
 */
export interface LanguageModel {
    call(request: LanguageModelRequest): Promise<unknown>;
}

export interface SkillContext {
    runId: string;
    nodeId: string;
    taskId?: string;
    signal?: AbortSignal;
}

export interface SkillResult {
    result: unknown;
    isError: boolean;
}

export interface SkillInvoker {
    invoke(name: string, parameters: JsonObject, context: SkillContext): Promise<SkillResult>;
}
