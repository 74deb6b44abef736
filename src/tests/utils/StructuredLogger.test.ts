import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { TraversalConfig } from '../../config/TraversalConfig.js';
import { createLogger, isLogRecord } from '../../utils/StructuredLogger.js';

describe('StructuredLogger', () => {
    afterEach(() => {
        TraversalConfig.resetForTesting();
        jest.restoreAllMocks();
    });

    it('emits a record with component, level and fields', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = createLogger('Walker');

        logger.warn('Traversal step failed', { policy: 'children' });

        expect(warn).toHaveBeenCalledTimes(1);
        const record = warn.mock.calls[0]?.[0];
        expect(isLogRecord(record)).toBe(true);
        expect(record).toMatchObject({
            level: 'warn',
            component: 'Walker',
            message: 'Traversal step failed',
            policy: 'children'
        });
    });

    it('drops records below the configured level, read at call time', () => {
        const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
        const logger = createLogger('HTMLCollection');

        logger.debug('hidden');
        expect(debug).not.toHaveBeenCalled();

        TraversalConfig.set({ logLevel: 'debug' });
        logger.debug('shown');
        expect(debug).toHaveBeenCalledTimes(1);
    });

    it('keeps the core fields when a caller passes the same keys', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        createLogger('Test').error('boom', { level: 'info', component: 'Other' });

        expect(error.mock.calls[0]?.[0]).toMatchObject({ level: 'error', component: 'Test', message: 'boom' });
    });

    it('recognises log records', () => {
        expect(isLogRecord({ level: 'info', component: 'x', message: 'y', timestamp: 't' })).toBe(true);
        expect(isLogRecord({ level: 'verbose', component: 'x', message: 'y' })).toBe(false);
        expect(isLogRecord('info')).toBe(false);
        expect(isLogRecord(null)).toBe(false);
    });
});
