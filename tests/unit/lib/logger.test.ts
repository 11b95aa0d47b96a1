import { describe, it, expect, vi } from 'vitest';
import { createFilteredLogger, createScopedLogger, noopLogger } from '../../../src/lib/logger';

function spyLogger() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Logger', () => {
    describe('createFilteredLogger', () => {
        it('should pass messages at or above the level', () => {
            const base = spyLogger();
            const logger = createFilteredLogger(base, 'info');
            logger.debug('noise');
            logger.info('run started', { runId: 'run_1' });

            expect(base.debug).not.toHaveBeenCalled();
            expect(base.info).toHaveBeenCalledWith('run started', { runId: 'run_1' });
        });

        it('should drop everything when silent', () => {
            const base = spyLogger();
            const logger = createFilteredLogger(base, 'silent');
            logger.error('boom');
            expect(base.error).not.toHaveBeenCalled();
        });
    });

    describe('createScopedLogger', () => {
        it('should prefix messages with the scope', () => {
            const base = spyLogger();
            createScopedLogger(base, 'controller').warn('Node failed', { nodeId: 'x' });
            expect(base.warn).toHaveBeenCalledWith('[controller] Node failed', { nodeId: 'x' });
        });
    });

    it('should accept calls on the noop logger', () => {
        expect(() => noopLogger.error('ignored')).not.toThrow();
    });
});
