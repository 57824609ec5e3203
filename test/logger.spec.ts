// test/logger.spec.ts

import { afterEach, describe, expect, it, vi } from 'vitest';
import { isLogLevel, Logger } from '../src/util/logger';

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('recognizes log levels', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('silent')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(undefined)).toBe(false);
    });

    it('drops messages below the configured level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const logger = new Logger({ level: 'warn', prefix: '[p]', color: false });

        logger.info('hidden');
        logger.warn('shown');

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('[p] shown');
    });

    it('logs nothing at all when silent', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const logger = new Logger({ level: 'silent', color: false });

        logger.error('boom');

        expect(error).not.toHaveBeenCalled();
    });

    it('concatenates child prefixes and prints error messages', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const logger = new Logger({ prefix: '[a]', color: false }).child('[b]');

        logger.error(new Error('boom'));

        expect(error).toHaveBeenCalledWith('[a][b] boom');
    });

    it('wraps prefix and text in ANSI colors when color is on', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const logger = new Logger({ prefix: '[a]', color: true });

        logger.info('hi');

        expect(log).toHaveBeenCalledWith('\u001b[35m[a]\u001b[0m \u001b[36mhi\u001b[0m');
    });
});
