import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { TraversalConfig } from '../../config/TraversalConfig.js';

describe('TraversalConfig', () => {
    afterEach(() => {
        TraversalConfig.resetForTesting();
        jest.restoreAllMocks();
    });

    it('uses defaults when no variables are set', () => {
        TraversalConfig.initialize({});
        expect(TraversalConfig.get()).toEqual({
            collectionCache: true,
            maxWalkSteps: null,
            logLevel: 'info'
        });
    });

    it('reads TREE_ORDER_* variables', () => {
        TraversalConfig.initialize({
            TREE_ORDER_COLLECTION_CACHE: 'off',
            TREE_ORDER_MAX_WALK_STEPS: '500',
            TREE_ORDER_LOG_LEVEL: 'WARN'
        });
        expect(TraversalConfig.get()).toEqual({
            collectionCache: false,
            maxWalkSteps: 500,
            logLevel: 'warn'
        });
    });

    it('turns on debug logging unless a level is given explicitly', () => {
        TraversalConfig.initialize({ TREE_ORDER_DEBUG: '1' });
        expect(TraversalConfig.get().logLevel).toBe('debug');

        TraversalConfig.initialize({ TREE_ORDER_DEBUG: 'true', TREE_ORDER_LOG_LEVEL: 'error' });
        expect(TraversalConfig.get().logLevel).toBe('error');
    });

    it('treats empty variables as unset', () => {
        TraversalConfig.initialize({ TREE_ORDER_MAX_WALK_STEPS: '', TREE_ORDER_LOG_LEVEL: '' });
        expect(TraversalConfig.get().maxWalkSteps).toBeNull();
        expect(TraversalConfig.get().logLevel).toBe('info');
    });

    it('falls back to defaults and warns on invalid variables', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        TraversalConfig.initialize({ TREE_ORDER_MAX_WALK_STEPS: '-3', TREE_ORDER_COLLECTION_CACHE: 'maybe' });

        expect(TraversalConfig.get().maxWalkSteps).toBeNull();
        expect(TraversalConfig.get().collectionCache).toBe(true);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0]?.[0]).toBe('[TraversalConfig] Ignoring invalid environment:');
    });

    it('validates programmatic overrides', () => {
        TraversalConfig.set({ maxWalkSteps: 10 });
        expect(TraversalConfig.get().maxWalkSteps).toBe(10);

        expect(() => TraversalConfig.set({ maxWalkSteps: 0 })).toThrow();
        expect(TraversalConfig.get().maxWalkSteps).toBe(10);
    });
});
