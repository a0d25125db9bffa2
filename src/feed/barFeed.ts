// src/feed/barFeed.ts

import { readFileSync } from "fs";
import { z } from "zod";
import { FeedError } from "../core/errors.js";
import type { PriceBarEvent, TimedBar } from "../types/marketEvents.js";

export const TimedBarSchema = z
    .object({
        time: z.number().int().nonnegative(),
        open: z.number().positive(),
        high: z.number().positive(),
        low: z.number().positive(),
        close: z.number().positive(),
    })
    .refine((bar) => bar.high >= bar.low, {
        message: "high must be >= low",
    })
    .refine(
        (bar) =>
            bar.open >= bar.low &&
            bar.open <= bar.high &&
            bar.close >= bar.low &&
            bar.close <= bar.high,
        { message: "open and close must lie within high-low" }
    );

export const BarFileSchema = z.array(TimedBarSchema);

/**
 * Parse and validate a bar array, oldest first with strictly rising times
 */
export function parseBars(raw: unknown, source = "<input>"): TimedBar[] {
    const result = BarFileSchema.safeParse(raw);
    if (!result.success) {
        const first = result.error.errors[0];
        throw new FeedError(
            `Invalid bar data: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown error"}`,
            source
        );
    }

    const bars = result.data;
    for (let i = 1; i < bars.length; i++) {
        const prev = bars[i - 1];
        const bar = bars[i];
        if (prev !== undefined && bar !== undefined && bar.time <= prev.time) {
            throw new FeedError(
                `Bar ${i} time ${bar.time} does not follow ${prev.time}`,
                source
            );
        }
    }
    return bars;
}

export function loadBars(path: string): TimedBar[] {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new FeedError(
            `Cannot read bar file: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }
    return parseBars(raw, path);
}

/**
 * Intrabar price path: open, the extreme against the bar's direction, the
 * other extreme, close (low before high on an up bar).
 */
export function intrabarPath(bar: TimedBar): number[] {
    return bar.close >= bar.open
        ? [bar.open, bar.low, bar.high, bar.close]
        : [bar.open, bar.high, bar.low, bar.close];
}

/**
 * Turn closed bars into the event stream a live feed would produce: the
 * first tick of each bar is a new-bar event carrying the bar before it,
 * followed by ticks along the intrabar path.
 */
export function barsToEvents(
    bars: readonly TimedBar[],
    tickSize: number
): PriceBarEvent[] {
    const events: PriceBarEvent[] = [];

    bars.forEach((bar, barIndex) => {
        const previous = barIndex > 0 ? bars[barIndex - 1] : undefined;
        let high = bar.open;
        let low = bar.open;

        intrabarPath(bar).forEach((price, step) => {
            high = Math.max(high, price);
            low = Math.min(low, price);
            const event: PriceBarEvent = {
                price,
                currentBar: { open: bar.open, high, low, close: price },
                tickSize,
                barIndex,
                time: bar.time,
                isNewBar: step === 0 && barIndex > 0,
            };
            if (step === 0 && previous !== undefined) {
                event.previousBar = {
                    open: previous.open,
                    high: previous.high,
                    low: previous.low,
                    close: previous.close,
                };
            }
            events.push(event);
        });
    });

    return events;
}
