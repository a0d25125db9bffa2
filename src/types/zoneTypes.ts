// src/types/zoneTypes.ts

export type ZoneSide = "bullish" | "bearish";

/**
 * Zone lifecycle events emitted by the engine
 */
export enum ZoneUpdateType {
    ZONE_CREATED = "zoneCreated",
    ZONE_RESET = "zoneReset",
    ZONE_RECLAIMED = "zoneReclaimed",
    ZONE_EVICTED = "zoneEvicted",
}

/**
 * One reclaim zone. Bullish zones keep `activeSidePrice >= fixedSidePrice`,
 * bearish zones the reverse.
 */
export interface ReclaimZone {
    readonly id: string;
    readonly side: ZoneSide;
    fixedSidePrice: number;
    activeSidePrice: number;
    startTime: number; // left anchor, epoch ms
    currentHeight: number; // ticks
    maxHeight: number; // ticks, since last reset
    maxRetracement: number; // ticks given back from maxHeight toward the close
    ev: number;
    increaseEvOnNextTouch: boolean;
    swing: number;
    increaseSwingOnNextTouch: boolean;
    decayStartTime: number | null;
    deleted: boolean;
    // Renderer correlation only
    rectangleHandle: number | null;
    labelHandle: number | null;
}

/**
 * Outcome of one update pass on a single zone
 */
export type ZoneUpdateOutcome = "updated" | "reset" | "reclaimed" | "inert";

export interface ZoneTransition {
    type: ZoneUpdateType;
    zone: ReclaimZone;
    index: number;
}
