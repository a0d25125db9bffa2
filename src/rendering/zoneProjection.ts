// src/rendering/zoneProjection.ts

import type { RenderSettings } from "../core/config.js";
import type { ReclaimZone } from "../types/zoneTypes.js";
import type { DrawingStyle, LabelDrawing, RectangleDrawing } from "./zoneRenderer.js";

/**
 * Style of a zone at `now`. Decaying zones are hollow and fade linearly to
 * fully transparent over `decayFadeMs`.
 */
export function zoneStyle(
    zone: ReclaimZone,
    now: number,
    settings: RenderSettings
): DrawingStyle {
    const color =
        zone.side === "bullish" ? settings.bullishColor : settings.bearishColor;

    if (zone.decayStartTime === null) {
        return { color, transparency: settings.transparency, hollow: false };
    }

    const elapsed = Math.max(0, now - zone.decayStartTime);
    const fade = Math.min(1, elapsed / settings.decayFadeMs);
    return {
        color,
        transparency: Math.round(
            settings.transparency + (100 - settings.transparency) * fade
        ),
        hollow: true,
    };
}

export function toRectangle(
    zone: ReclaimZone,
    now: number,
    settings: RenderSettings
): RectangleDrawing {
    return {
        fromTime: zone.startTime,
        fromPrice: zone.fixedSidePrice,
        extendBars: settings.rectangleExtendBars,
        toPrice: zone.activeSidePrice,
        style: zoneStyle(zone, now, settings),
    };
}

export function labelText(zone: ReclaimZone): string {
    return `EV ${zone.ev} | S ${zone.swing}`;
}

/**
 * Score label, or null while EV is below the display threshold
 */
export function toLabel(
    zone: ReclaimZone,
    now: number,
    settings: RenderSettings,
    evHideBelowThreshold: number
): LabelDrawing | null {
    if (zone.ev < evHideBelowThreshold) {
        return null;
    }
    return {
        anchorTime: zone.startTime,
        anchorPrice: zone.activeSidePrice,
        text: labelText(zone),
        style: zoneStyle(zone, now, settings),
    };
}
