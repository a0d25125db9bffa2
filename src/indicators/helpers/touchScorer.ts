// src/indicators/helpers/touchScorer.ts

import { reachesTowardFixed, ticksAlong, type SideDirection } from "./sideDirection.js";
import type { Bar } from "../../types/marketEvents.js";
import type { ReclaimZone } from "../../types/zoneTypes.js";

export interface ScoreThresholds {
    evPullbackTicks: number;
    swingPullbackTicks: number;
}

export interface ScoreChange {
    evArmed: boolean;
    evIncremented: boolean;
    swingArmed: boolean;
    swingIncremented: boolean;
}

interface ScoreCounter {
    count: "ev" | "swing";
    armed: "increaseEvOnNextTouch" | "increaseSwingOnNextTouch";
}

const EV_COUNTER: ScoreCounter = { count: "ev", armed: "increaseEvOnNextTouch" };
const SWING_COUNTER: ScoreCounter = {
    count: "swing",
    armed: "increaseSwingOnNextTouch",
};

/**
 * Pullback-then-retouch scoring on a closed bar.
 *
 * A counter arms once the bar's far extreme sits at least `threshold` ticks
 * from the active side, on either side of it, and scores on a later bar
 * whose near extreme touches the active side again. Arming and scoring
 * never happen on the same bar.
 */
export function scoreZone(
    zone: ReclaimZone,
    bar: Bar,
    direction: SideDirection,
    thresholds: ScoreThresholds,
    tickSize: number
): ScoreChange {
    const change: ScoreChange = {
        evArmed: false,
        evIncremented: false,
        swingArmed: false,
        swingIncremented: false,
    };
    if (zone.deleted) {
        return change;
    }

    const pullback = Math.abs(
        ticksAlong(direction, zone.activeSidePrice, direction.extreme(bar), tickSize)
    );
    const touched = reachesTowardFixed(
        direction,
        direction.adverse(bar),
        zone.activeSidePrice
    );

    const ev = applyCounter(zone, EV_COUNTER, pullback, touched, thresholds.evPullbackTicks);
    change.evArmed = ev === "armed";
    change.evIncremented = ev === "incremented";

    const swing = applyCounter(
        zone,
        SWING_COUNTER,
        pullback,
        touched,
        thresholds.swingPullbackTicks
    );
    change.swingArmed = swing === "armed";
    change.swingIncremented = swing === "incremented";

    return change;
}

function applyCounter(
    zone: ReclaimZone,
    counter: ScoreCounter,
    pullback: number,
    touched: boolean,
    threshold: number
): "armed" | "incremented" | "none" {
    if (!zone[counter.armed]) {
        if (pullback >= threshold) {
            zone[counter.armed] = true;
            return "armed";
        }
        return "none";
    }
    if (touched) {
        zone[counter.count] += 1;
        zone[counter.armed] = false;
        return "incremented";
    }
    return "none";
}
