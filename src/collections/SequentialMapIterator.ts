/** Anything that can hand out its current item at a zero-based position. */
export interface IndexedSource<T> {
    item(index: number): T | null;
}

/**
 * Index cursor over a live source. Each step re-reads `source.item(index)`
 * rather than a copy, so removals end the walk early and insertions before
 * the cursor shift what comes next. Once a read comes back empty the
 * iterator stays done for good.
 */
export class SequentialMapIterator<T> implements IterableIterator<T> {
    private index = 0;
    private finished = false;

    constructor(private readonly source: IndexedSource<T>) {}

    public get position(): number {
        return this.index;
    }

    public get done(): boolean {
        return this.finished;
    }

    public next(): IteratorResult<T, null> {
        if (this.finished) {
            return { done: true, value: null };
        }

        const value = this.source.item(this.index);
        if (value === null) {
            this.finished = true;
            return { done: true, value: null };
        }

        this.index += 1;
        return { done: false, value };
    }

    [Symbol.iterator](): this {
        return this;
    }
}
