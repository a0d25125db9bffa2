// src/indicators/reclaimTracker.ts
//
// One side's reclaim state machine: a fixed-capacity zone history plus the
// update, scoring and rotation passes run against it. The bullish and
// bearish trackers share this code and differ only in their SideDirection.
//

import type { ReclaimSettings } from "../core/config.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { ZoneRenderAdapter } from "../rendering/zoneRenderAdapter.js";
import type { Bar, PriceSample } from "../types/marketEvents.js";
import {
    ZoneUpdateType,
    type ReclaimZone,
    type ZoneSide,
    type ZoneTransition,
} from "../types/zoneTypes.js";
import { shouldStartNewZone } from "./helpers/newZoneTrigger.js";
import type { SideDirection } from "./helpers/sideDirection.js";
import { scoreZone } from "./helpers/touchScorer.js";
import {
    createPlaceholderZone,
    createZone,
    ZoneHistory,
} from "./helpers/zoneHistory.js";
import { updateLiveZone, updateRetiredZone } from "./helpers/zoneUpdater.js";

/**
 * Tracker state captured before an event, enough to undo it
 */
export interface TrackerSnapshot {
    zones: ReclaimZone[];
    sequence: number;
}

export class ReclaimTracker {
    private readonly history: ZoneHistory;
    private sequence = 0;
    private pending: ZoneTransition[] = [];
    // Zones whose visuals were removed since the last snapshot
    private readonly erased = new Set<string>();

    constructor(
        private readonly direction: SideDirection,
        private readonly settings: ReclaimSettings,
        private readonly renderAdapter: ZoneRenderAdapter,
        private readonly logger: ILogger
    ) {
        this.history = new ZoneHistory(settings.maxZones, (zone) =>
            this.handleEviction(zone)
        );
    }

    public get side(): ZoneSide {
        return this.direction.side;
    }

    /**
     * Start tracking: the first observed price becomes both boundaries of
     * the live zone, every other slot is empty.
     */
    public seed(price: number, time: number): void {
        const head = this.newZone(price, time);
        this.history.initialize(head, (index) =>
            createPlaceholderZone(`${this.side}_empty_${index}`, this.side)
        );
        this.pending.push({ type: ZoneUpdateType.ZONE_CREATED, zone: head, index: 0 });
    }

    /**
     * Recompute boundaries of every zone for one sample
     */
    public update(sample: PriceSample, tickSize: number, time: number): void {
        const ctx = {
            direction: this.direction,
            sample,
            tickSize,
            time,
            minZoneSizeTicks: this.settings.minZoneSizeTicks,
        };

        for (let index = 0; index < this.history.length; index++) {
            const zone = this.history.at(index);
            if (zone === undefined) continue;

            if (index === 0) {
                if (updateLiveZone(zone, ctx) === "reset") {
                    this.pending.push({ type: ZoneUpdateType.ZONE_RESET, zone, index });
                }
                continue;
            }

            if (updateRetiredZone(zone, ctx) === "reclaimed") {
                this.erase(zone);
                this.pending.push({ type: ZoneUpdateType.ZONE_RECLAIMED, zone, index });
            }
        }
    }

    /**
     * Pullback/touch scoring of retired zones against a closed bar
     */
    public score(bar: Bar, tickSize: number): void {
        for (let index = 1; index < this.history.length; index++) {
            const zone = this.history.at(index);
            if (zone === undefined || zone.deleted) continue;

            const change = scoreZone(zone, bar, this.direction, this.settings, tickSize);
            if (
                (change.evIncremented || change.swingIncremented) &&
                this.logger.isDebugEnabled()
            ) {
                this.logger.debug("Zone score increased", {
                    component: "ReclaimTracker",
                    zoneId: zone.id,
                    side: this.side,
                    ev: zone.ev,
                    swing: zone.swing,
                });
            }
        }
    }

    /**
     * Retire the live zone and start a new one when the trigger fires.
     * `recentBars` is newest first, starting with the bar that just closed.
     */
    public maybeRotate(recentBars: readonly Bar[], price: number, time: number): boolean {
        const live = this.history.head();
        if (live === undefined || !shouldStartNewZone(live, recentBars, this.settings)) {
            return false;
        }

        const head = this.newZone(price, time);
        this.history.rotate(head);
        this.pending.push({ type: ZoneUpdateType.ZONE_CREATED, zone: head, index: 0 });

        this.logger.debug("New reclaim zone started", {
            component: "ReclaimTracker",
            side: this.side,
            zoneId: head.id,
            retiredZoneId: live.id,
            retiredMaxRetracement: live.maxRetracement,
        });
        return true;
    }

    /**
     * Draw every live-in-history zone; the zone at index 0 only when
     * `showCurrentZone` is set.
     */
    public render(now: number): void {
        for (let index = 0; index < this.history.length; index++) {
            const zone = this.history.at(index);
            if (zone === undefined || zone.deleted) continue;
            if (index === 0 && !this.settings.showCurrentZone) continue;
            this.renderAdapter.draw(zone, now);
        }
    }

    public zones(): ReclaimZone[] {
        return this.history.snapshot();
    }

    public snapshot(): TrackerSnapshot {
        this.erased.clear();
        return { zones: this.history.snapshot(), sequence: this.sequence };
    }

    /**
     * Roll back to `snapshot`. Zones erased since then lose their stale
     * handles so the next render draws them again.
     */
    public restore(snapshot: TrackerSnapshot): void {
        this.history.restore(
            snapshot.zones.map((zone) =>
                this.erased.has(zone.id)
                    ? { ...zone, rectangleHandle: null, labelHandle: null }
                    : zone
            )
        );
        this.sequence = snapshot.sequence;
        this.pending = [];
        this.erased.clear();
    }

    /**
     * Transitions recorded since the last call, oldest first
     */
    public drainTransitions(): ZoneTransition[] {
        const transitions = this.pending;
        this.pending = [];
        return transitions;
    }

    private newZone(price: number, time: number): ReclaimZone {
        this.sequence++;
        return createZone({
            id: `${this.side}_${this.sequence}`,
            side: this.side,
            price,
            time,
        });
    }

    private erase(zone: ReclaimZone): void {
        if (zone.rectangleHandle !== null || zone.labelHandle !== null) {
            this.erased.add(zone.id);
        }
        this.renderAdapter.erase(zone);
    }

    private handleEviction(zone: ReclaimZone): void {
        this.erase(zone);
        this.pending.push({
            type: ZoneUpdateType.ZONE_EVICTED,
            zone,
            index: this.settings.maxZones - 1,
        });
    }
}
