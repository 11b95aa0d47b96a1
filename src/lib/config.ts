/**
 * Engine configuration defaults and validation.
 */

import { z } from 'zod';
import type { Logger, LogLevel } from './logger';
import { noopLogger, createFilteredLogger } from './logger';
import type { Tracer } from './tracer';
import { getGlobalTracer } from './tracer';
import { ConfigError } from './errors';

/** Wall clock, injectable for deterministic tests */
export type Clock = () => number;

/** Produces ids for runs, facts and proposals */
export type IdGenerator = (prefix: string) => string;

/** Engine-wide limits and ambient services */
export interface EngineConfig {
    /** Hard bound on controller steps per run (default: 100) */
    maxSteps?: number;
    /** Global retry budget across all retry edges of a run (default: 25) */
    maxTotalRetries?: number;
    /** Concurrency limit for spawned tasks when a node sets none (default: 3) */
    maxConcurrentTasks?: number;
    /** Per-task timeout in milliseconds (default: 60000) */
    defaultTaskTimeoutMs?: number;
    /** Output-schema retries when a node sets none (default: 2) */
    outputRetries?: number;
    /** Minimum supporting runs before the learning loop proposes anything (default: 2) */
    minRunsForLearning?: number;
    logger?: Logger;
    /** Filter applied to `logger` (default: 'info') */
    logLevel?: LogLevel;
    tracer?: Tracer;
    clock?: Clock;
    idGenerator?: IdGenerator;
}

export type ResolvedEngineConfig = Required<EngineConfig>;

/**
 * Sequential ids: `run_1`, `run_2`, ... per prefix.
 */
export function createSequentialIds(): IdGenerator {
    const counters = new Map<string, number>();
    return prefix => {
        const next = (counters.get(prefix) ?? 0) + 1;
        counters.set(prefix, next);
        return `${prefix}_${next}`;
    };
}

export const DEFAULT_ENGINE_CONFIG = {
    maxSteps: 100,
    maxTotalRetries: 25,
    maxConcurrentTasks: 3,
    defaultTaskTimeoutMs: 60_000,
    outputRetries: 2,
    minRunsForLearning: 2,
    logLevel: 'info',
} as const;

const limitsSchema = z.object({
    maxSteps: z.number().int().positive(),
    maxTotalRetries: z.number().int().nonnegative(),
    maxConcurrentTasks: z.number().int().positive(),
    defaultTaskTimeoutMs: z.number().int().positive(),
    outputRetries: z.number().int().nonnegative(),
    minRunsForLearning: z.number().int().positive(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

/**
 * Merge user config over defaults and validate the numeric limits.
 *
 * @throws ConfigError when a limit is out of range
 */
export function resolveEngineConfig(config: EngineConfig = {}): ResolvedEngineConfig {
    const limits = {
        maxSteps: config.maxSteps ?? DEFAULT_ENGINE_CONFIG.maxSteps,
        maxTotalRetries: config.maxTotalRetries ?? DEFAULT_ENGINE_CONFIG.maxTotalRetries,
        maxConcurrentTasks: config.maxConcurrentTasks ?? DEFAULT_ENGINE_CONFIG.maxConcurrentTasks,
        defaultTaskTimeoutMs: config.defaultTaskTimeoutMs ?? DEFAULT_ENGINE_CONFIG.defaultTaskTimeoutMs,
        outputRetries: config.outputRetries ?? DEFAULT_ENGINE_CONFIG.outputRetries,
        minRunsForLearning: config.minRunsForLearning ?? DEFAULT_ENGINE_CONFIG.minRunsForLearning,
        logLevel: config.logLevel ?? DEFAULT_ENGINE_CONFIG.logLevel,
    };

    const parsed = limitsSchema.safeParse(limits);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.errors.map(e => ({
            path: e.path,
            message: e.message,
        })));
    }

    return {
        ...parsed.data,
        logger: createFilteredLogger(config.logger ?? noopLogger, parsed.data.logLevel),
        tracer: config.tracer ?? getGlobalTracer(),
        clock: config.clock ?? Date.now,
        idGenerator: config.idGenerator ?? createRandomIds(),
    };
}

function createRandomIds(): IdGenerator {
    return prefix => `${prefix}_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}
