// test/indicators_zoneHistory.test.ts

import { describe, it, expect, vi } from "vitest";
import { ConfigurationError } from "../src/core/errors.js";
import {
    ZoneHistory,
    createPlaceholderZone,
    createZone,
} from "../src/indicators/helpers/zoneHistory.js";
import type { ReclaimZone } from "../src/types/zoneTypes.js";

const placeholder = (index: number): ReclaimZone =>
    createPlaceholderZone(`bullish_empty_${index}`, "bullish");

function ids(history: ZoneHistory): string[] {
    return history.toArray().map((zone) => zone.id);
}

describe("indicators/helpers/ZoneHistory", () => {
    it("creates a live zone collapsed onto the seed price", () => {
        const zone = createZone({ id: "bullish_1", side: "bullish", price: 100, time: 5 });
        expect(zone.fixedSidePrice).toBe(100);
        expect(zone.activeSidePrice).toBe(100);
        expect(zone.startTime).toBe(5);
        expect(zone.deleted).toBe(false);
        expect(zone.decayStartTime).toBeNull();
    });

    it("fills every slot behind the head with deleted placeholders", () => {
        const history = new ZoneHistory(3);
        history.initialize(
            createZone({ id: "bullish_1", side: "bullish", price: 100, time: 0 }),
            placeholder
        );

        expect(history.length).toBe(3);
        expect(ids(history)).toEqual(["bullish_1", "bullish_empty_1", "bullish_empty_2"]);
        expect(history.at(1)?.deleted).toBe(true);
    });

    it("evicts the oldest zone on rotate", () => {
        const onEvict = vi.fn();
        const history = new ZoneHistory(3, onEvict);
        history.initialize(
            createZone({ id: "bullish_1", side: "bullish", price: 100, time: 0 }),
            placeholder
        );

        const evicted = history.rotate(
            createZone({ id: "bullish_2", side: "bullish", price: 101, time: 1 })
        );

        expect(evicted?.id).toBe("bullish_empty_2");
        expect(onEvict).toHaveBeenCalledTimes(1);
        expect(ids(history)).toEqual(["bullish_2", "bullish_1", "bullish_empty_1"]);
        expect(history.head()?.id).toBe("bullish_2");
    });

    it("restores a snapshot without evicting", () => {
        const onEvict = vi.fn();
        const history = new ZoneHistory(2, onEvict);
        history.initialize(
            createZone({ id: "bullish_1", side: "bullish", price: 100, time: 0 }),
            placeholder
        );
        const snapshot = history.snapshot();

        const head = history.head();
        if (head !== undefined) {
            head.activeSidePrice = 105;
        }
        expect(snapshot[0]?.activeSidePrice).toBe(100);

        history.restore(snapshot);
        expect(history.head()?.activeSidePrice).toBe(100);
        expect(onEvict).not.toHaveBeenCalled();
    });

    it("rejects an invalid capacity", () => {
        expect(() => new ZoneHistory(0)).toThrow(ConfigurationError);
    });
});
