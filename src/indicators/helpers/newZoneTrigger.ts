// src/indicators/helpers/newZoneTrigger.ts

import type { Bar } from "../../types/marketEvents.js";
import type { ReclaimZone } from "../../types/zoneTypes.js";

export type BarColor = "up" | "down" | "doji";

export interface TriggerSettings {
    newZoneRetracementThreshold: number;
    oppositeBarFilter: boolean;
    oppositeBarLookback: number;
    overlapBars: number;
}

export function barColor(bar: Bar): BarColor {
    if (bar.close === bar.open) return "doji";
    return bar.close > bar.open ? "up" : "down";
}

/**
 * Closed bars newest first; index 0 is the bar that just closed.
 *
 * Fails on a doji. Otherwise passes when the closed bar's colour differs
 * from the nearest non-doji bar within `lookback` bars before it, and also
 * when every bar in that window is a doji.
 */
export function hasOppositeColor(
    recentBars: readonly Bar[],
    lookback: number
): boolean {
    const latest = recentBars[0];
    if (latest === undefined) return false;

    const latestColor = barColor(latest);
    if (latestColor === "doji") return false;

    for (let i = 1; i <= lookback && i < recentBars.length; i++) {
        const bar = recentBars[i];
        if (bar === undefined) break;
        const color = barColor(bar);
        if (color !== "doji") {
            return color !== latestColor;
        }
    }
    return true;
}

/**
 * True when each of the `count - 1` bars before the latest overlaps the
 * latest bar's high-low range.
 */
export function hasPriceOverlap(recentBars: readonly Bar[], count: number): boolean {
    if (recentBars.length < count) return false;
    const latest = recentBars[0];
    if (latest === undefined) return false;

    for (let i = 1; i < count; i++) {
        const bar = recentBars[i];
        if (bar === undefined) return false;
        if (bar.low >= latest.high || bar.high <= latest.low) {
            return false;
        }
    }
    return true;
}

/**
 * Decide whether the live zone should be retired into history
 */
export function shouldStartNewZone(
    liveZone: ReclaimZone,
    recentBars: readonly Bar[],
    settings: TriggerSettings
): boolean {
    if (liveZone.maxRetracement < settings.newZoneRetracementThreshold) {
        return false;
    }
    if (
        settings.oppositeBarFilter &&
        !hasOppositeColor(recentBars, settings.oppositeBarLookback)
    ) {
        return false;
    }
    if (
        settings.overlapBars >= 2 &&
        !hasPriceOverlap(recentBars, settings.overlapBars)
    ) {
        return false;
    }
    return true;
}
