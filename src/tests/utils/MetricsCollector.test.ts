import { describe, it, expect } from '@jest/globals';
import { MetricsCollector } from '../../utils/MetricsCollector.js';

describe('MetricsCollector', () => {
    it('counts per name and label set, independent of label order', () => {
        const collector = new MetricsCollector();
        collector.inc('walker_steps', { policy: 'children' });
        collector.inc('walker_steps', { policy: 'children' }, 2);
        collector.inc('collection_cursor', { result: 'hit', kind: 'tagName' });

        expect(collector.get('walker_steps', { policy: 'children' })).toBe(3);
        expect(collector.get('walker_steps', { policy: 'none' })).toBe(0);
        expect(collector.get('collection_cursor', { kind: 'tagName', result: 'hit' })).toBe(1);
        expect(collector.snapshot()).toEqual({
            counters: {
                'walker_steps{policy=children}': 3,
                'collection_cursor{kind=tagName,result=hit}': 1
            }
        });
    });

    it('treats empty labels as no labels and clears on reset', () => {
        const collector = new MetricsCollector();
        collector.inc('walks', {});
        collector.inc('walks');
        expect(collector.get('walks')).toBe(2);

        collector.reset();
        expect(collector.snapshot()).toEqual({ counters: {} });
    });
});
