// src/indicators/helpers/sideDirection.ts
//
// Direction capability shared by the bullish and bearish trackers. Every
// side-specific comparison goes through `sign`, so the update, scoring and
// trigger code is written once.
//

import { FinancialMath } from "../../utils/financialMath.js";
import type { PriceSample } from "../../types/marketEvents.js";
import type { ZoneSide } from "../../types/zoneTypes.js";

export interface SideDirection {
    readonly side: ZoneSide;
    readonly sign: 1 | -1;
    /** Extreme the active side follows (bullish: high) */
    extreme(sample: PriceSample): number;
    /** Extreme that moves toward the fixed side (bullish: low) */
    adverse(sample: PriceSample): number;
}

export const BULLISH: SideDirection = {
    side: "bullish",
    sign: 1,
    extreme: (sample) => sample.high,
    adverse: (sample) => sample.low,
};

export const BEARISH: SideDirection = {
    side: "bearish",
    sign: -1,
    extreme: (sample) => sample.low,
    adverse: (sample) => sample.high,
};

export function directionFor(side: ZoneSide): SideDirection {
    return side === "bullish" ? BULLISH : BEARISH;
}

/**
 * Ticks from `from` to `to` measured in the side's favourable direction,
 * truncated toward zero.
 */
export function ticksAlong(
    direction: SideDirection,
    from: number,
    to: number,
    tickSize: number
): number {
    return direction.sign === 1
        ? FinancialMath.ticksBetween(from, to, tickSize)
        : FinancialMath.ticksBetween(to, from, tickSize);
}

/**
 * True when `price` is at `reference` or beyond it on the fixed-side
 * direction (bullish: price <= reference).
 */
export function reachesTowardFixed(
    direction: SideDirection,
    price: number,
    reference: number
): boolean {
    return direction.sign * (price - reference) <= 0;
}

/**
 * True when `price` is strictly past `reference` on the fixed-side
 * direction (bullish: price < reference).
 */
export function breachesTowardFixed(
    direction: SideDirection,
    price: number,
    reference: number
): boolean {
    return direction.sign * (price - reference) < 0;
}

/**
 * Clamp `price` so it never crosses `fixedSidePrice`
 */
export function clampToFixed(
    direction: SideDirection,
    price: number,
    fixedSidePrice: number
): number {
    return breachesTowardFixed(direction, price, fixedSidePrice)
        ? fixedSidePrice
        : price;
}

/**
 * Price of the zone's best excursion: fixed side plus maxHeight ticks
 */
export function peakPrice(
    direction: SideDirection,
    fixedSidePrice: number,
    maxHeight: number,
    tickSize: number
): number {
    return FinancialMath.offsetByTicks(
        fixedSidePrice,
        direction.sign * maxHeight,
        tickSize
    );
}
