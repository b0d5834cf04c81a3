/**
 * AsyncQueue — push-driven async iterable
 *
 * Bridges event callbacks ('data', 'message', HTTP exchanges) into the
 * pull-based `receive()` sequence a Transport exposes.
 *
 * @module
 * @internal
 */

export class AsyncQueue<T extends object> implements AsyncIterable<T> {
    private readonly _items: T[] = [];
    private readonly _waiters: Array<(result: IteratorResult<T>) => void> = [];
    private _ended = false;
    private _consumed = false;

    get ended(): boolean {
        return this._ended;
    }

    push(item: T): boolean {
        if (this._ended) return false;
        const waiter = this._waiters.shift();
        if (waiter) waiter({ value: item, done: false });
        else this._items.push(item);
        return true;
    }

    /** Items already queued are still delivered. */
    end(): void {
        if (this._ended) return;
        this._ended = true;
        for (const waiter of this._waiters.splice(0)) {
            waiter({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        if (this._consumed) {
            throw new Error('AsyncQueue can only be iterated once');
        }
        this._consumed = true;
        return {
            next: (): Promise<IteratorResult<T>> => {
                if (this._items.length > 0) {
                    const value = this._items.shift();
                    if (value !== undefined) return Promise.resolve({ value, done: false });
                }
                if (this._ended) return Promise.resolve({ value: undefined, done: true });
                return new Promise(resolve => { this._waiters.push(resolve); });
            },
            return: (): Promise<IteratorResult<T>> => {
                this.end();
                this._items.length = 0;
                return Promise.resolve({ value: undefined, done: true });
            },
        };
    }
}
