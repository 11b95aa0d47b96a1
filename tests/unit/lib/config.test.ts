import { describe, it, expect } from 'vitest';
import { createSequentialIds, resolveEngineConfig, DEFAULT_ENGINE_CONFIG } from '../../../src/lib/config';
import { ConfigError } from '../../../src/lib/errors';
import type { Logger } from '../../../src/lib/logger';
import { NoopTracer, getGlobalTracer } from '../../../src/lib/tracer';

function recordingLogger(lines: string[]): Logger {
    return {
        debug: msg => lines.push(`debug ${msg}`),
        info: msg => lines.push(`info ${msg}`),
        warn: msg => lines.push(`warn ${msg}`),
        error: msg => lines.push(`error ${msg}`),
    };
}

describe('Engine config', () => {
    it('should fill in defaults', () => {
        const config = resolveEngineConfig();
        expect(config).toMatchObject({
            maxSteps: 100,
            maxTotalRetries: 25,
            maxConcurrentTasks: 3,
            defaultTaskTimeoutMs: 60_000,
            outputRetries: 2,
            minRunsForLearning: 2,
            logLevel: 'info',
        });
        expect(config.tracer).toBe(getGlobalTracer());
        expect(config.idGenerator('run')).toMatch(/^run_/);
    });

    it('should keep explicit values', () => {
        const tracer = new NoopTracer();
        const config = resolveEngineConfig({ maxSteps: 7, outputRetries: 0, tracer });
        expect(config.maxSteps).toBe(7);
        expect(config.outputRetries).toBe(0);
        expect(config.maxTotalRetries).toBe(DEFAULT_ENGINE_CONFIG.maxTotalRetries);
        expect(config.tracer).toBe(tracer);
    });

    it('should reject out-of-range limits', () => {
        expect(() => resolveEngineConfig({ maxSteps: 0 })).toThrow(ConfigError);
        expect(() => resolveEngineConfig({ maxSteps: 0 }))
            .toThrow('Invalid configuration: maxSteps: Number must be greater than 0');
        expect(() => resolveEngineConfig({ maxConcurrentTasks: 1.5 })).toThrow(ConfigError);
    });

    it('should filter the logger by level', () => {
        const lines: string[] = [];
        const { logger } = resolveEngineConfig({ logger: recordingLogger(lines), logLevel: 'warn' });
        logger.info('hidden');
        logger.warn('shown');
        logger.error('also shown');
        expect(lines).toEqual(['warn shown', 'error also shown']);
    });

    describe('createSequentialIds', () => {
        it('should count per prefix', () => {
            const ids = createSequentialIds();
            expect([ids('run'), ids('run'), ids('fact'), ids('run')]).toEqual(['run_1', 'run_2', 'fact_1', 'run_3']);
        });
    });
});
