import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../../src/utils/logger.js';

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes to stderr with level and context', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        new Logger('Store', 'debug').warn('disk nearly full');
        expect(spy).toHaveBeenCalledTimes(1);
        const line = String(spy.mock.calls[0][0]);
        expect(line).toContain('[WARN]');
        expect(line).toContain('[Store]');
        expect(line.endsWith('disk nearly full')).toBe(true);
    });

    it('drops messages below its level', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const log = new Logger('Store', 'warn');
        log.debug('hidden');
        log.info('hidden');
        log.error('shown');
        expect(spy).toHaveBeenCalledTimes(1);
    });

    it('keeps the level and nests the context in children', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const child = new Logger('Stack', 'error').child('ConfigStore');
        child.info('hidden');
        child.error('failed');
        expect(spy).toHaveBeenCalledTimes(1);
        expect(String(spy.mock.calls[0][0])).toContain('[Stack:ConfigStore]');
    });
});
