// test/indicators_reclaimEngine.test.ts

import { describe, it, expect, beforeEach, vi } from "vitest";
import { createMockLogger } from "../__mocks__/src/infrastructure/loggerInterface.js";
import {
    createReclaimSettings,
    createRenderSettings,
    type ReclaimSettings,
} from "../src/core/config.js";
import { ConfigurationError } from "../src/core/errors.js";
import { parseBars, barsToEvents } from "../src/feed/barFeed.js";
import { ReclaimEngine } from "../src/indicators/reclaimEngine.js";
import { ReclaimTracker } from "../src/indicators/reclaimTracker.js";
import type { ILogger } from "../src/infrastructure/loggerInterface.js";
import { InMemoryChart } from "../src/rendering/inMemoryChart.js";
import type { IZoneRenderer } from "../src/rendering/zoneRenderer.js";
import type { Bar, PriceBarEvent, SkipReason } from "../src/types/marketEvents.js";
import { ZoneUpdateType, type ZoneTransition } from "../src/types/zoneTypes.js";

const TICK = 0.25;

function tick(price: number, barIndex: number, time: number): PriceBarEvent {
    return {
        price,
        currentBar: { open: price, high: price, low: price, close: price },
        tickSize: TICK,
        barIndex,
        time,
        isNewBar: false,
    };
}

function newBar(
    barIndex: number,
    time: number,
    previousBar: Bar,
    price = previousBar.close
): PriceBarEvent {
    return { ...tick(price, barIndex, time), isNewBar: true, previousBar };
}

// Up-leg of one point that closes back on its low
const RALLY_BAR: Bar = { open: 100, high: 101, low: 100, close: 100 };
// Dips a tick under 100 and closes mid-range
const DIP_BAR: Bar = { open: 100, high: 100.5, low: 99.75, close: 100.25 };

describe("indicators/ReclaimEngine", () => {
    let logger: ILogger;
    let chart: InMemoryChart;

    function createEngine(overrides: Partial<ReclaimSettings> = {}): ReclaimEngine {
        return new ReclaimEngine({
            settings: createReclaimSettings({ maxZones: 3, ...overrides }),
            rendering: createRenderSettings(),
            renderer: chart,
            logger,
        });
    }

    beforeEach(() => {
        logger = createMockLogger();
        chart = new InMemoryChart();
    });

    it("rejects invalid settings at construction", () => {
        expect(() => createEngine({ maxZones: 0 })).toThrow(ConfigurationError);
    });

    it("seeds both sides from the first price", () => {
        const engine = createEngine();
        expect(engine.getZones("bullish")).toEqual([]);

        expect(engine.process(tick(100, 0, 0))).toEqual({ status: "initialized" });
        expect(engine.isInitialized).toBe(true);

        const bullish = engine.getZones("bullish");
        expect(bullish.map((z) => z.id)).toEqual([
            "bullish_1",
            "bullish_empty_1",
            "bullish_empty_2",
        ]);
        expect(bullish[0]?.fixedSidePrice).toBe(100);
        expect(bullish[0]?.activeSidePrice).toBe(100);
        expect(bullish[1]?.deleted).toBe(true);
        expect(engine.getZones("bearish")[0]?.id).toBe("bearish_1");
        expect(chart.rectangleCount).toBe(0);
    });

    describe("bar-close mode", () => {
        let engine: ReclaimEngine;

        beforeEach(() => {
            engine = createEngine();
            engine.process(tick(100, 0, 0));
        });

        it("waits for the bar to close", () => {
            const skipped = vi.fn();
            engine.on("eventSkipped", skipped);

            expect(engine.process(tick(100.5, 0, 1_000))).toEqual({
                status: "skipped",
                reason: "awaiting_bar_close",
            });
            expect(skipped).not.toHaveBeenCalled();
            expect(logger.warn).not.toHaveBeenCalled();
            expect(engine.getZones("bullish")[0]?.activeSidePrice).toBe(100);
        });

        it("retires the bullish zone once it gives back the threshold", () => {
            const outcome = engine.process(newBar(1, 60_000, RALLY_BAR, 100));
            expect(outcome).toEqual({ status: "applied", barClosed: true, rotated: 1 });

            const bullish = engine.getZones("bullish");
            expect(bullish.map((z) => z.id)).toEqual([
                "bullish_2",
                "bullish_1",
                "bullish_empty_1",
            ]);
            expect(bullish[0]?.fixedSidePrice).toBe(100);
            expect(bullish[0]?.startTime).toBe(60_000);
            expect(bullish[1]).toMatchObject({
                fixedSidePrice: 100,
                activeSidePrice: 101,
                currentHeight: 4,
                maxRetracement: 4,
                deleted: false,
            });

            expect(chart.zoneIds).toEqual(["bullish_1"]);
            expect(chart.rectangle("bullish_1")).toMatchObject({
                fromTime: 0,
                fromPrice: 100,
                toPrice: 101,
            });
            // EV 0 is below the default label threshold of 1
            expect(chart.labelCount).toBe(0);
        });

        it("resets the bearish zone when the high runs through it", () => {
            engine.process(newBar(1, 60_000, RALLY_BAR, 100));

            const bearish = engine.getZones("bearish");
            expect(bearish[0]).toMatchObject({
                id: "bearish_1",
                fixedSidePrice: 101,
                activeSidePrice: 101,
                startTime: 60_000,
                maxRetracement: 0,
            });
            expect(bearish[1]?.deleted).toBe(true);
        });

        it("reclaims a retired zone when price returns to its fixed side", () => {
            engine.process(newBar(1, 60_000, RALLY_BAR, 100));
            const outcome = engine.process(newBar(2, 120_000, DIP_BAR, 100.25));
            expect(outcome).toEqual({ status: "applied", barClosed: true, rotated: 1 });

            const bullish = engine.getZones("bullish");
            expect(bullish[0]).toMatchObject({
                id: "bullish_2",
                fixedSidePrice: 99.75,
                activeSidePrice: 99.75,
            });
            expect(bullish[1]).toMatchObject({
                id: "bullish_1",
                activeSidePrice: 100,
                currentHeight: 0,
                deleted: true,
            });
            expect(chart.rectangle("bullish_1")).toBeUndefined();

            const bearish = engine.getZones("bearish");
            expect(bearish.map((z) => z.id)).toEqual([
                "bearish_2",
                "bearish_1",
                "bearish_empty_1",
            ]);
            expect(bearish[1]).toMatchObject({
                fixedSidePrice: 101,
                activeSidePrice: 99.75,
                currentHeight: 5,
                maxRetracement: 2,
            });
            expect(chart.zoneIds).toEqual(["bearish_1"]);
        });

        it("emits lifecycle events in processing order", () => {
            const seen: string[] = [];
            const record = (transition: ZoneTransition) =>
                seen.push(`${transition.type}:${transition.zone.id}@${transition.index}`);
            for (const type of Object.values(ZoneUpdateType)) {
                engine.on(type, record);
            }

            engine.process(newBar(1, 60_000, RALLY_BAR, 100));
            engine.process(newBar(2, 120_000, DIP_BAR, 100.25));

            expect(seen).toEqual([
                "zoneEvicted:bullish_empty_2@2",
                "zoneCreated:bullish_2@0",
                "zoneReset:bearish_1@0",
                "zoneReset:bullish_2@0",
                "zoneReclaimed:bullish_1@1",
                "zoneEvicted:bearish_empty_2@2",
                "zoneCreated:bearish_2@0",
            ]);
        });

        it("hands listeners copies of the zone", () => {
            engine.on(ZoneUpdateType.ZONE_CREATED, (transition: ZoneTransition) => {
                transition.zone.fixedSidePrice = 0;
            });
            engine.process(newBar(1, 60_000, RALLY_BAR, 100));
            expect(engine.getZones("bullish")[0]?.fixedSidePrice).toBe(100);
        });
    });

    describe("tick mode", () => {
        it("updates on every price and rotates on the next bar", () => {
            const engine = createEngine({ updateOnBarClose: false });
            engine.process(tick(100, 0, 0));

            expect(engine.process(tick(101, 0, 1_000))).toEqual({
                status: "applied",
                barClosed: false,
                rotated: 0,
            });
            engine.process(tick(100, 0, 2_000));
            expect(engine.getZones("bullish")[0]).toMatchObject({
                activeSidePrice: 100,
                maxHeight: 4,
                maxRetracement: 4,
            });

            const outcome = engine.process(newBar(1, 60_000, RALLY_BAR, 100));
            expect(outcome).toEqual({ status: "applied", barClosed: true, rotated: 1 });
            expect(engine.getZones("bullish").map((z) => z.id)).toEqual([
                "bullish_2",
                "bullish_1",
                "bullish_empty_1",
            ]);
        });
    });

    describe("feed validation", () => {
        let engine: ReclaimEngine;
        let skipped: ReturnType<typeof vi.fn>;

        beforeEach(() => {
            engine = createEngine();
            skipped = vi.fn();
            engine.on("eventSkipped", skipped);
            engine.process(tick(100, 0, 60_000));
        });

        it.each<[SkipReason, PriceBarEvent]>([
            ["invalid_price", tick(0, 0, 60_000)],
            ["invalid_price", tick(Number.NaN, 0, 60_000)],
            ["invalid_tick_size", { ...tick(100, 0, 60_000), tickSize: 0 }],
            ["invalid_time", newBar(1, Number.NaN, RALLY_BAR)],
            ["invalid_time", tick(100, 0, Number.POSITIVE_INFINITY)],
            ["invalid_bar_index", newBar(1.5, 61_000, RALLY_BAR)],
            ["invalid_bar_index", newBar(Number.NaN, 61_000, RALLY_BAR)],
            ["non_monotonic_time", tick(100, 0, 59_000)],
            ["non_monotonic_bar_index", newBar(0, 60_000, RALLY_BAR)],
            ["missing_previous_bar", { ...tick(100, 1, 60_000), isNewBar: true }],
            ["bar_index_mismatch", tick(100, 2, 60_000)],
        ])("skips %s", (reason, event) => {
            const before = engine.getZones("bullish");

            expect(engine.process(event)).toEqual({ status: "skipped", reason });
            expect(skipped).toHaveBeenCalledWith(reason, event);
            expect(logger.warn).toHaveBeenCalledWith(
                "Price event skipped",
                expect.objectContaining({ component: "ReclaimEngine", reason })
            );
            expect(engine.getZones("bullish")).toEqual(before);
        });

        it("keeps checking time order after a malformed time", () => {
            engine.process(newBar(1, Number.NaN, RALLY_BAR));
            expect(engine.process(newBar(1, 5, RALLY_BAR))).toEqual({
                status: "skipped",
                reason: "non_monotonic_time",
            });
        });

        it("rejects a closed bar with inverted extremes", () => {
            const outcome = engine.process(
                newBar(1, 61_000, { open: 100, high: 99, low: 100, close: 100 })
            );
            expect(outcome).toEqual({ status: "skipped", reason: "missing_previous_bar" });
        });

        it("does not initialize from an invalid first price", () => {
            const fresh = createEngine();
            expect(fresh.process(tick(-1, 0, 0))).toEqual({
                status: "skipped",
                reason: "invalid_price",
            });
            expect(fresh.isInitialized).toBe(false);
        });
    });

    describe("rendering", () => {
        it("draws the live zones when showCurrentZone is set", () => {
            const engine = createEngine({ showCurrentZone: true, evHideBelowThreshold: 0 });
            engine.process(tick(100, 0, 0));

            expect(chart.zoneIds).toEqual(["bullish_1", "bearish_1"]);
            expect(chart.label("bullish_1")?.text).toBe("EV 0 | S 0");
            expect(engine.getZones("bullish")[0]?.rectangleHandle).toBe(1);
        });

        it("logs renderer failures and keeps zone state", () => {
            const failing: IZoneRenderer = {
                upsertRectangle: () => {
                    throw new Error("chart closed");
                },
                upsertLabel: () => 1,
                remove: () => {},
            };
            const engine = new ReclaimEngine({
                settings: createReclaimSettings({ maxZones: 3, showCurrentZone: true }),
                rendering: createRenderSettings(),
                renderer: failing,
                logger,
            });

            expect(engine.process(tick(100, 0, 0))).toEqual({ status: "initialized" });
            expect(logger.error).toHaveBeenCalledWith("Renderer call failed", {
                component: "ZoneRenderAdapter",
                zoneId: "bullish_1",
                operation: "upsertRectangle",
                error: "chart closed",
            });
            expect(engine.getZones("bullish")[0]?.rectangleHandle).toBeNull();
        });
    });

    it("rolls back a failing side and keeps processing the other", () => {
        const engine = createEngine();
        engine.process(tick(100, 0, 0));
        const before = engine.getZones("bullish");

        vi.spyOn(ReclaimTracker.prototype, "maybeRotate").mockImplementationOnce(() => {
            throw new Error("boom");
        });
        const outcome = engine.process(newBar(1, 60_000, RALLY_BAR, 100));

        expect(outcome).toEqual({ status: "applied", barClosed: true, rotated: 0 });
        expect(engine.getZones("bullish")).toEqual(before);
        expect(engine.getZones("bearish")[0]?.fixedSidePrice).toBe(101);
        expect(logger.error).toHaveBeenCalledWith(
            "Failed to process bullish zones",
            {
                component: "ReclaimEngine",
                side: "bullish",
                barIndex: 1,
                cause: "boom",
            },
            "bar_1"
        );
    });

    it("does not burn a zone id on a rolled-back rotation", () => {
        const engine = createEngine();
        engine.process(tick(100, 0, 0));

        // Fails after the bullish side has already rotated
        vi.spyOn(ReclaimTracker.prototype, "render").mockImplementationOnce(() => {
            throw new Error("boom");
        });
        engine.process(newBar(1, 60_000, RALLY_BAR, 100));
        expect(engine.getZones("bullish")[0]?.id).toBe("bullish_1");

        engine.process(newBar(2, 120_000, RALLY_BAR, 100));
        expect(engine.getZones("bullish").map((z) => z.id)).toEqual([
            "bullish_2",
            "bullish_1",
            "bullish_empty_1",
        ]);
    });

    it("redraws a zone whose erase was rolled back", () => {
        const engine = createEngine();
        engine.process(tick(100, 0, 0));
        engine.process(newBar(1, 60_000, RALLY_BAR, 100));
        expect(chart.rectangle("bullish_1")).toBeDefined();

        // bullish_1 is reclaimed and erased, then the side fails
        vi.spyOn(ReclaimTracker.prototype, "maybeRotate").mockImplementationOnce(() => {
            throw new Error("boom");
        });
        engine.process(newBar(2, 120_000, DIP_BAR, 100.25));

        expect(chart.rectangle("bullish_1")).toBeUndefined();
        expect(engine.getZones("bullish")[1]).toMatchObject({
            id: "bullish_1",
            deleted: false,
            rectangleHandle: null,
        });

        engine.process(
            newBar(3, 180_000, { open: 101, high: 101.5, low: 100.75, close: 101.5 }, 101.5)
        );
        expect(chart.rectangle("bullish_1")).toMatchObject({
            fromPrice: 100,
            toPrice: 100.75,
        });
        expect(engine.getZones("bullish")[1]?.rectangleHandle).not.toBeNull();
    });

    describe("replay", () => {
        const bars = parseBars([
            { time: 0, open: 99, high: 99.5, low: 98.5, close: 99.25 },
            { time: 60_000, open: 99.25, high: 100, low: 99, close: 99.75 },
            { time: 120_000, ...RALLY_BAR },
            { time: 180_000, ...DIP_BAR },
        ]);

        it("returns an empty summary for no events", () => {
            expect(createEngine().replay([])).toEqual({
                received: 0,
                outsideLookback: 0,
                initialized: 0,
                applied: 0,
                skipped: 0,
                rotations: 0,
            });
        });

        it("only tracks the trailing barLookback bars", () => {
            const engine = createEngine({ barLookback: 2 });
            const summary = engine.replay(barsToEvents(bars, TICK));

            expect(summary).toEqual({
                received: 16,
                outsideLookback: 8,
                initialized: 1,
                applied: 1,
                skipped: 6,
                rotations: 1,
            });
            expect(engine.getZones("bullish")[1]).toMatchObject({
                id: "bullish_1",
                startTime: 120_000,
                activeSidePrice: 101,
            });
        });

        it("replays everything when barLookback is 0", () => {
            const engine = createEngine();
            const summary = engine.replay(barsToEvents(bars, TICK));

            expect(summary).toEqual({
                received: 16,
                outsideLookback: 0,
                initialized: 1,
                applied: 3,
                skipped: 12,
                rotations: 1,
            });
            expect(engine.getZones("bullish")[1]).toMatchObject({
                id: "bullish_1",
                fixedSidePrice: 98.5,
                activeSidePrice: 101,
                maxHeight: 10,
            });
        });
    });
});
