import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, resolveLogLevel } from '../../src/core/logger.js';

describe('resolveLogLevel', () => {
    it('is silent under test unless configured', () => {
        expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('silent');
        expect(resolveLogLevel({ NODE_ENV: 'test', LOG_LEVEL: 'DEBUG' })).toBe('debug');
    });

    it('defaults to info and ignores unknown levels', () => {
        expect(resolveLogLevel({})).toBe('info');
        expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info');
    });
});

describe('createLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prefixes messages with the component tag', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        createLogger('Pipeline', 'info').info('run complete');
        expect(log).toHaveBeenCalledWith('[Pipeline] run complete');
    });

    it('drops messages below the level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = createLogger('API', 'warn');

        logger.info('hidden');
        logger.warn('shown');

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('[API] shown');
    });
});
