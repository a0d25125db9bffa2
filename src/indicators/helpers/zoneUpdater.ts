// src/indicators/helpers/zoneUpdater.ts
//
// Per-pass boundary maintenance. The live zone (index 0) follows the raw
// extreme and resets in place when the opposite extreme breaches its fixed
// side. Retired zones only tighten toward the fixed side until reclaimed.
//

import {
    breachesTowardFixed,
    clampToFixed,
    peakPrice,
    reachesTowardFixed,
    ticksAlong,
    type SideDirection,
} from "./sideDirection.js";
import type { PriceSample } from "../../types/marketEvents.js";
import type { ReclaimZone, ZoneUpdateOutcome } from "../../types/zoneTypes.js";

export interface ZoneUpdateContext {
    direction: SideDirection;
    sample: PriceSample;
    tickSize: number;
    time: number;
    minZoneSizeTicks: number;
}

/**
 * Update the live zone. Never deletes it.
 */
export function updateLiveZone(
    zone: ReclaimZone,
    ctx: ZoneUpdateContext
): "updated" | "reset" {
    const { direction, sample, tickSize } = ctx;

    zone.activeSidePrice = direction.extreme(sample);
    zone.currentHeight = ticksAlong(
        direction,
        zone.fixedSidePrice,
        zone.activeSidePrice,
        tickSize
    );
    if (zone.currentHeight > zone.maxHeight) {
        zone.maxHeight = zone.currentHeight;
    }

    const peak = peakPrice(
        direction,
        zone.fixedSidePrice,
        zone.maxHeight,
        tickSize
    );
    const retracement = ticksAlong(direction, sample.close, peak, tickSize);
    if (retracement > zone.maxRetracement) {
        zone.maxRetracement = retracement;
    }

    const adverse = direction.adverse(sample);
    if (breachesTowardFixed(direction, adverse, zone.fixedSidePrice)) {
        resetZone(zone, adverse, ctx.time);
        return "reset";
    }
    return "updated";
}

/**
 * Collapse both boundaries onto `price` and restart the zone at `time`
 */
export function resetZone(zone: ReclaimZone, price: number, time: number): void {
    zone.fixedSidePrice = price;
    zone.activeSidePrice = price;
    zone.startTime = time;
    zone.currentHeight = 0;
    zone.maxHeight = 0;
    zone.maxRetracement = 0;
    zone.decayStartTime = null;
}

/**
 * Update a retired zone (index >= 1). The active side only moves toward the
 * fixed side; the zone is reclaimed once price reaches the fixed side or the
 * active side collapses onto it.
 */
export function updateRetiredZone(
    zone: ReclaimZone,
    ctx: ZoneUpdateContext
): Exclude<ZoneUpdateOutcome, "reset"> {
    if (zone.deleted) {
        return "inert";
    }

    const { direction, tickSize } = ctx;
    const adverse = direction.adverse(ctx.sample);

    if (breachesTowardFixed(direction, adverse, zone.activeSidePrice)) {
        zone.activeSidePrice = clampToFixed(
            direction,
            adverse,
            zone.fixedSidePrice
        );
    }

    if (
        reachesTowardFixed(direction, adverse, zone.fixedSidePrice) ||
        reachesTowardFixed(direction, zone.activeSidePrice, zone.fixedSidePrice)
    ) {
        zone.deleted = true;
        zone.currentHeight = 0;
        return "reclaimed";
    }

    zone.currentHeight = ticksAlong(
        direction,
        zone.fixedSidePrice,
        zone.activeSidePrice,
        tickSize
    );
    if (zone.currentHeight > zone.maxHeight) {
        zone.maxHeight = zone.currentHeight;
    }
    if (
        zone.decayStartTime === null &&
        zone.currentHeight <= ctx.minZoneSizeTicks
    ) {
        zone.decayStartTime = ctx.time;
    }
    return "updated";
}
