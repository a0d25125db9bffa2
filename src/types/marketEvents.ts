// src/types/marketEvents.ts

export interface Bar {
    open: number;
    high: number;
    low: number;
    close: number;
}

/**
 * A bar with its position on the chart, as read from a bar file
 */
export interface TimedBar extends Bar {
    time: number; // bar open time, epoch ms
}

/**
 * Price extremes used by one update pass. In tick mode all three are the
 * last trade price; in bar-close mode they come from the closed bar.
 */
export interface PriceSample {
    high: number;
    low: number;
    close: number;
}

/**
 * One inbound price/bar event from the feed
 */
export interface PriceBarEvent {
    price: number; // last trade price
    currentBar: Bar;
    previousBar?: Bar; // the bar that just closed, required when isNewBar
    tickSize: number;
    barIndex: number;
    time: number; // epoch ms
    isNewBar: boolean;
}

export type SkipReason =
    | "invalid_price"
    | "invalid_tick_size"
    | "invalid_time"
    | "invalid_bar_index"
    | "non_monotonic_time"
    | "non_monotonic_bar_index"
    | "bar_index_mismatch"
    | "missing_previous_bar"
    | "awaiting_bar_close";

export type ProcessOutcome =
    | { status: "initialized" }
    | { status: "applied"; barClosed: boolean; rotated: number }
    | { status: "skipped"; reason: SkipReason };
