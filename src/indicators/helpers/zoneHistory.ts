// src/indicators/helpers/zoneHistory.ts

import { CircularBuffer } from "../../utils/circularBuffer.js";
import { ConfigurationError } from "../../core/errors.js";
import type { ReclaimZone, ZoneSide } from "../../types/zoneTypes.js";

/**
 * Seed values for a new live zone
 */
export interface ZoneSeed {
    id: string;
    side: ZoneSide;
    price: number;
    time: number;
}

export function createZone(seed: ZoneSeed): ReclaimZone {
    return {
        id: seed.id,
        side: seed.side,
        fixedSidePrice: seed.price,
        activeSidePrice: seed.price,
        startTime: seed.time,
        currentHeight: 0,
        maxHeight: 0,
        maxRetracement: 0,
        ev: 0,
        increaseEvOnNextTouch: false,
        swing: 0,
        increaseSwingOnNextTouch: false,
        decayStartTime: null,
        deleted: false,
        rectangleHandle: null,
        labelHandle: null,
    };
}

/**
 * Empty history slot: already deleted, never drawn, never updated
 */
export function createPlaceholderZone(id: string, side: ZoneSide): ReclaimZone {
    return { ...createZone({ id, side, price: 0, time: 0 }), deleted: true };
}

/**
 * Fixed-capacity, newest-first zone history for one side.
 *
 * Index 0 is the live zone. `rotate` is O(1): the ring buffer hands the
 * oldest zone to `onEvict` before the new head takes its slot.
 */
export class ZoneHistory implements Iterable<ReclaimZone> {
    private readonly buffer: CircularBuffer<ReclaimZone>;

    constructor(
        public readonly capacity: number,
        private readonly onEvict: (zone: ReclaimZone) => void = () => {}
    ) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new ConfigurationError(
                `Zone history capacity must be a positive integer, got ${capacity}`
            );
        }
        this.buffer = new CircularBuffer<ReclaimZone>(capacity, (zone) =>
            this.onEvict(zone)
        );
    }

    /**
     * Fill every slot: `head` at index 0, placeholders behind it
     */
    initialize(head: ReclaimZone, placeholder: (index: number) => ReclaimZone): void {
        this.buffer.clear();
        for (let i = this.capacity - 1; i >= 1; i--) {
            this.buffer.push(placeholder(i));
        }
        this.buffer.push(head);
    }

    /**
     * Evict the tail, shift everything one slot back, install `newHead` at 0
     */
    rotate(newHead: ReclaimZone): ReclaimZone | undefined {
        const evicted = this.buffer.isFull
            ? this.buffer.at(this.capacity - 1)
            : undefined;
        this.buffer.push(newHead);
        return evicted;
    }

    head(): ReclaimZone | undefined {
        return this.buffer.at(0);
    }

    at(index: number): ReclaimZone | undefined {
        return this.buffer.at(index);
    }

    get length(): number {
        return this.buffer.length;
    }

    toArray(): ReclaimZone[] {
        return this.buffer.toArray();
    }

    /**
     * Deep copy of every zone, newest first
     */
    snapshot(): ReclaimZone[] {
        return this.buffer.toArray().map((zone) => ({ ...zone }));
    }

    /**
     * Replace the contents with a previous snapshot without evicting anything
     */
    restore(zones: readonly ReclaimZone[]): void {
        if (zones.length > this.capacity) {
            throw new ConfigurationError(
                `Snapshot of ${zones.length} zones exceeds capacity ${this.capacity}`
            );
        }
        this.buffer.clear();
        for (let i = zones.length - 1; i >= 0; i--) {
            const zone = zones[i];
            if (zone !== undefined) {
                this.buffer.push({ ...zone });
            }
        }
    }

    [Symbol.iterator](): Iterator<ReclaimZone> {
        return this.buffer[Symbol.iterator]();
    }
}
