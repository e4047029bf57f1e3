/**
 * Bounded single-consumer channel between the feed socket and the monitor.
 * When full, the oldest item is dropped; drops are counted.
 */

export class BoundedChannel<T> {
    private items: T[] = [];
    private waiters: Array<() => void> = [];
    private closed = false;
    private droppedCount = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length;
    }

    get dropped(): number {
        return this.droppedCount;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Returns false when the channel is closed */
    push(item: T): boolean {
        if (this.closed) return false;
        if (this.items.length >= this.capacity) {
            this.items.shift();
            this.droppedCount++;
        }
        this.items.push(item);
        this.wake();
        return true;
    }

    /** Take up to max items in arrival order */
    drain(max = Infinity): T[] {
        if (max >= this.items.length) {
            const all = this.items;
            this.items = [];
            return all;
        }
        return this.items.splice(0, max);
    }

    /**
     * Resolves once an item is buffered, the channel closes or the signal aborts.
     * Resolves immediately if any of those already holds.
     */
    wait(signal?: AbortSignal): Promise<void> {
        if (this.items.length > 0 || this.closed || signal?.aborted) return Promise.resolve();
        return new Promise<void>(resolve => {
            const done = () => {
                signal?.removeEventListener('abort', done);
                this.waiters = this.waiters.filter(w => w !== done);
                resolve();
            };
            this.waiters.push(done);
            signal?.addEventListener('abort', done, { once: true });
        });
    }

    close(): void {
        this.closed = true;
        this.wake();
    }

    private wake(): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const w of waiters) w();
    }
}
