import { describe, it, expect } from '@jest/globals';
import { IndexedSource, SequentialMapIterator } from '../../collections/SequentialMapIterator.js';
import { Document } from '../../dom/Document.js';

function arraySource<T>(items: T[]): IndexedSource<T> {
    return { item: index => items[index] ?? null };
}

describe('SequentialMapIterator', () => {
    it('yields items in index order and then reports done', () => {
        const iterator = new SequentialMapIterator(arraySource(['x', 'y']));

        expect(iterator.next()).toEqual({ done: false, value: 'x' });
        expect(iterator.next()).toEqual({ done: false, value: 'y' });
        expect(iterator.next()).toEqual({ done: true, value: null });
        expect(iterator.done).toBe(true);
        expect(iterator.position).toBe(2);
    });

    it('is done immediately on an empty source', () => {
        const iterator = new SequentialMapIterator(arraySource<string>([]));
        expect(iterator.next().done).toBe(true);
        expect(iterator.position).toBe(0);
    });

    it('stays done even if the source grows afterwards', () => {
        const items = ['x'];
        const iterator = new SequentialMapIterator(arraySource(items));

        iterator.next();
        expect(iterator.next().done).toBe(true);

        items.push('y');
        expect(iterator.next()).toEqual({ done: true, value: null });
    });

    it('reads the live attribute map, so removing a visited item skips the next one', () => {
        const doc = new Document();
        const element = doc.createElement('div');
        element.setAttribute('first', '1');
        element.setAttribute('second', '2');

        const iterator = new SequentialMapIterator(element.attributes);
        const first = iterator.next();
        expect(first.done).toBe(false);
        expect(first.value?.name).toBe('first');

        element.removeAttribute('first');

        // "second" has shifted into index 0, behind the cursor.
        expect(iterator.next()).toEqual({ done: true, value: null });
        expect(element.attributes.length).toBe(1);
    });

    it('picks up items appended before the cursor reaches the end', () => {
        const items = ['x'];
        const iterator = new SequentialMapIterator(arraySource(items));

        expect(iterator.next().value).toBe('x');
        items.push('y');
        expect(iterator.next().value).toBe('y');
    });

    it('works with for..of and spread', () => {
        expect([...new SequentialMapIterator(arraySource([1, 2, 3]))]).toEqual([1, 2, 3]);

        const seen: string[] = [];
        for (const value of new SequentialMapIterator(arraySource(['a', 'b']))) {
            seen.push(value);
        }
        expect(seen).toEqual(['a', 'b']);
    });
});
