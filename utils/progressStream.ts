/**
 * Unbounded single-consumer async channel.
 *
 * Producers never wait: `push` buffers when no reader is pending. Iteration ends
 * once `close()` has been called and the buffer is drained.
 */
export class ProgressStream<T> implements AsyncIterable<T> {
    private buffer: T[] = [];
    private waiting: Array<(result: IteratorResult<T>) => void> = [];
    private closed = false;

    push(item: T): void {
        if (this.closed) return;
        const reader = this.waiting.shift();
        if (reader) {
            reader({ value: item, done: false });
        } else {
            this.buffer.push(item);
        }
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const reader of this.waiting.splice(0)) {
            reader({ value: undefined, done: true });
        }
    }

    get isClosed(): boolean {
        return this.closed;
    }

    private next(): Promise<IteratorResult<T>> {
        if (this.buffer.length > 0) {
            const [item] = this.buffer.splice(0, 1);
            return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise(resolve => this.waiting.push(resolve));
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return { next: () => this.next() };
    }
}
