// src/utils/circularBuffer.ts

/**
 * Fixed-capacity circular buffer, newest first.
 *
 * `push` writes the new item at logical index 0 in O(1); once the buffer is
 * full the oldest item is handed to the eviction callback and dropped.
 */
export class CircularBuffer<T> implements Iterable<T> {
    private readonly buffer: (T | undefined)[];
    private head = 0; // physical slot of the newest item
    private size = 0;
    private readonly evictionCallback: (item: T) => void;

    constructor(
        private readonly capacity: number,
        evictionCallback: (item: T) => void = () => {}
    ) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(
                `CircularBuffer capacity must be a positive integer, got ${capacity}`
            );
        }
        this.buffer = new Array<T | undefined>(capacity).fill(undefined);
        this.evictionCallback = evictionCallback;
    }

    push(item: T): void {
        const next = (this.head - 1 + this.capacity) % this.capacity;
        if (this.size === this.capacity) {
            const oldest = this.buffer[next];
            if (oldest !== undefined) {
                this.evictionCallback(oldest);
            }
        } else {
            this.size++;
        }
        this.buffer[next] = item;
        this.head = next;
    }

    /**
     * Random-access by relative index (0 = newest, length-1 = oldest).
     */
    at(index: number): T | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) {
            return undefined;
        }
        return this.buffer[(this.head + index) % this.capacity];
    }

    toArray(): T[] {
        const result: T[] = [];
        for (let i = 0; i < this.size; i++) {
            const item = this.at(i);
            if (item !== undefined) {
                result.push(item);
            }
        }
        return result;
    }

    clear(): void {
        this.buffer.fill(undefined);
        this.head = 0;
        this.size = 0;
    }

    get length(): number {
        return this.size;
    }

    get isFull(): boolean {
        return this.size === this.capacity;
    }

    /**
     * Allow use in for-of and spread operator.
     */
    [Symbol.iterator](): Iterator<T> {
        return this.toArray()[Symbol.iterator]();
    }
}
