// src/indicators/reclaimEngine.ts

import { EventEmitter } from "events";
import {
    parseReclaimSettings,
    parseRenderSettings,
    type ReclaimSettings,
    type RenderSettings,
} from "../core/config.js";
import { ReclaimProcessingError } from "../core/errors.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { ZoneRenderAdapter } from "../rendering/zoneRenderAdapter.js";
import type { IZoneRenderer } from "../rendering/zoneRenderer.js";
import type {
    Bar,
    PriceBarEvent,
    PriceSample,
    ProcessOutcome,
    SkipReason,
} from "../types/marketEvents.js";
import type { ReclaimZone, ZoneSide, ZoneTransition } from "../types/zoneTypes.js";
import { CircularBuffer } from "../utils/circularBuffer.js";
import { FinancialMath } from "../utils/financialMath.js";
import { BEARISH, BULLISH } from "./helpers/sideDirection.js";
import { ReclaimTracker } from "./reclaimTracker.js";

export interface ReclaimEngineOptions {
    settings: ReclaimSettings;
    rendering: RenderSettings;
    renderer: IZoneRenderer;
    logger: ILogger;
}

export interface ReplaySummary {
    received: number;
    outsideLookback: number;
    initialized: number;
    applied: number;
    skipped: number;
    rotations: number;
}

/**
 * Reclaim zone engine: one bullish and one bearish tracker driven by a
 * single ordered stream of price/bar events.
 *
 * Emits `zoneCreated`, `zoneReset`, `zoneReclaimed`, `zoneEvicted` with a
 * ZoneTransition, and `eventSkipped` with the skip reason and the event.
 */
export class ReclaimEngine extends EventEmitter {
    private readonly settings: ReclaimSettings;
    private readonly trackers: readonly ReclaimTracker[];
    private readonly recentBars: CircularBuffer<Bar>;
    private readonly logger: ILogger;

    private initialized = false;
    private lastBarIndex = -1;
    private lastTime = Number.NEGATIVE_INFINITY;

    constructor(options: ReclaimEngineOptions) {
        super();

        // Fatal before any state exists
        this.settings = parseReclaimSettings(options.settings);
        const rendering = parseRenderSettings(options.rendering);
        this.logger = options.logger;

        const renderAdapter = new ZoneRenderAdapter(
            options.renderer,
            rendering,
            this.settings.evHideBelowThreshold,
            this.logger
        );
        this.trackers = [
            new ReclaimTracker(BULLISH, this.settings, renderAdapter, this.logger),
            new ReclaimTracker(BEARISH, this.settings, renderAdapter, this.logger),
        ];
        this.recentBars = new CircularBuffer<Bar>(
            Math.max(this.settings.oppositeBarLookback, this.settings.overlapBars) + 1
        );

        this.logger.info("ReclaimEngine initialized", {
            component: "ReclaimEngine",
            settings: this.settings,
        });
    }

    public get isInitialized(): boolean {
        return this.initialized;
    }

    /**
     * Apply one event. Runs to completion; a malformed or out-of-order event
     * is skipped whole and leaves every zone untouched.
     */
    public process(event: PriceBarEvent): ProcessOutcome {
        const invalid = this.validate(event);
        if (invalid !== null) {
            return this.skip(invalid, event);
        }

        if (!this.initialized) {
            return this.initialize(event);
        }

        if (this.settings.updateOnBarClose && !event.isNewBar) {
            this.lastTime = event.time;
            return { status: "skipped", reason: "awaiting_bar_close" };
        }

        const closedBar = event.isNewBar ? event.previousBar : undefined;
        const sample: PriceSample | undefined = this.settings.updateOnBarClose
            ? closedBar
            : { high: event.price, low: event.price, close: event.price };
        if (sample === undefined) {
            return this.skip("missing_previous_bar", event);
        }

        if (closedBar !== undefined) {
            this.recentBars.push({ ...closedBar });
        }
        const recentBars = this.recentBars.toArray();

        let rotated = 0;
        for (const tracker of this.trackers) {
            if (this.applySide(tracker, event, sample, closedBar, recentBars)) {
                rotated++;
            }
        }

        this.lastBarIndex = event.barIndex;
        this.lastTime = event.time;
        return { status: "applied", barClosed: event.isNewBar, rotated };
    }

    /**
     * Replay loaded history. Only the trailing `barLookback` bars are
     * tracked (all of them when it is 0).
     */
    public replay(events: readonly PriceBarEvent[]): ReplaySummary {
        const summary: ReplaySummary = {
            received: events.length,
            outsideLookback: 0,
            initialized: 0,
            applied: 0,
            skipped: 0,
            rotations: 0,
        };
        if (events.length === 0) {
            return summary;
        }

        const lastBarIndex = events.reduce(
            (max, event) => Math.max(max, event.barIndex),
            Number.NEGATIVE_INFINITY
        );
        const firstTrackedBar =
            this.settings.barLookback > 0
                ? lastBarIndex - this.settings.barLookback + 1
                : Number.NEGATIVE_INFINITY;

        for (const event of events) {
            if (event.barIndex < firstTrackedBar) {
                summary.outsideLookback++;
                continue;
            }
            const outcome = this.process(event);
            switch (outcome.status) {
                case "initialized":
                    summary.initialized++;
                    break;
                case "applied":
                    summary.applied++;
                    summary.rotations += outcome.rotated;
                    break;
                case "skipped":
                    summary.skipped++;
                    break;
            }
        }

        this.logger.info("Replay complete", {
            component: "ReclaimEngine",
            ...summary,
        });
        return summary;
    }

    /**
     * Copies of one side's zones, newest first
     */
    public getZones(side: ZoneSide): ReclaimZone[] {
        const tracker = this.trackers.find((t) => t.side === side);
        return tracker !== undefined && this.initialized ? tracker.zones() : [];
    }

    private initialize(event: PriceBarEvent): ProcessOutcome {
        for (const tracker of this.trackers) {
            tracker.seed(event.price, event.time);
            tracker.render(event.time);
            this.publish(tracker.drainTransitions());
        }
        this.initialized = true;
        this.lastBarIndex = event.barIndex;
        this.lastTime = event.time;

        this.logger.info("Reclaim tracking started", {
            component: "ReclaimEngine",
            price: event.price,
            barIndex: event.barIndex,
            maxZones: this.settings.maxZones,
        });
        return { status: "initialized" };
    }

    /**
     * Run one side's passes; on failure the side is restored to its state
     * before the event and the other side is unaffected.
     */
    private applySide(
        tracker: ReclaimTracker,
        event: PriceBarEvent,
        sample: PriceSample,
        closedBar: Bar | undefined,
        recentBars: readonly Bar[]
    ): boolean {
        const snapshot = tracker.snapshot();
        let rotated = false;
        let transitions: ZoneTransition[];

        try {
            tracker.update(sample, event.tickSize, event.time);
            if (closedBar !== undefined) {
                tracker.score(closedBar, event.tickSize);
                rotated = tracker.maybeRotate(recentBars, event.price, event.time);
            }
            tracker.render(event.time);
            transitions = tracker.drainTransitions();
        } catch (error) {
            tracker.restore(snapshot);
            const processingError = new ReclaimProcessingError(
                `Failed to process ${tracker.side} zones`,
                {
                    side: tracker.side,
                    barIndex: event.barIndex,
                    cause: error instanceof Error ? error.message : String(error),
                },
                `bar_${event.barIndex}`
            );
            this.logger.error(
                processingError.message,
                {
                    component: "ReclaimEngine",
                    ...processingError.context,
                },
                processingError.correlationId
            );
            return false;
        }

        this.publish(transitions);
        return rotated;
    }

    private validate(event: PriceBarEvent): SkipReason | null {
        if (!FinancialMath.isValidPrice(event.price)) {
            return "invalid_price";
        }
        if (!FinancialMath.isValidTickSize(event.tickSize)) {
            return "invalid_tick_size";
        }
        if (!Number.isFinite(event.time)) {
            return "invalid_time";
        }
        if (!Number.isInteger(event.barIndex) || event.barIndex < 0) {
            return "invalid_bar_index";
        }
        if (!this.initialized) {
            return null;
        }
        if (event.time < this.lastTime) {
            return "non_monotonic_time";
        }
        if (event.isNewBar) {
            if (event.barIndex <= this.lastBarIndex) {
                return "non_monotonic_bar_index";
            }
            if (event.previousBar === undefined || !isValidBar(event.previousBar)) {
                return "missing_previous_bar";
            }
        } else if (event.barIndex !== this.lastBarIndex) {
            return "bar_index_mismatch";
        }
        return null;
    }

    private skip(reason: SkipReason, event: PriceBarEvent): ProcessOutcome {
        this.logger.warn("Price event skipped", {
            component: "ReclaimEngine",
            reason,
            barIndex: event.barIndex,
            lastBarIndex: this.lastBarIndex,
            time: event.time,
        });
        this.emit("eventSkipped", reason, event);
        return { status: "skipped", reason };
    }

    private publish(transitions: readonly ZoneTransition[]): void {
        for (const transition of transitions) {
            this.emit(transition.type, { ...transition, zone: { ...transition.zone } });
        }
    }
}

function isValidBar(bar: Bar): boolean {
    return (
        FinancialMath.isValidPrice(bar.open) &&
        FinancialMath.isValidPrice(bar.high) &&
        FinancialMath.isValidPrice(bar.low) &&
        FinancialMath.isValidPrice(bar.close) &&
        bar.high >= bar.low
    );
}
