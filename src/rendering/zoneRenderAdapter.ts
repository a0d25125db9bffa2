// src/rendering/zoneRenderAdapter.ts

import { RendererError } from "../core/errors.js";
import type { RenderSettings } from "../core/config.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { ReclaimZone } from "../types/zoneTypes.js";
import { toLabel, toRectangle } from "./zoneProjection.js";
import type { IZoneRenderer } from "./zoneRenderer.js";

/**
 * Projects zones onto an IZoneRenderer. Renderer failures are logged and
 * never reach zone state.
 */
export class ZoneRenderAdapter {
    constructor(
        private readonly renderer: IZoneRenderer,
        private readonly settings: RenderSettings,
        private readonly evHideBelowThreshold: number,
        private readonly logger: ILogger
    ) {}

    public draw(zone: ReclaimZone, now: number): void {
        try {
            const handle = this.renderer.upsertRectangle(
                zone.id,
                toRectangle(zone, now, this.settings),
                zone.rectangleHandle
            );
            if (zone.rectangleHandle === null) {
                zone.rectangleHandle = handle;
            }
        } catch (error) {
            this.report(error, zone.id, "upsertRectangle");
        }

        const label = toLabel(zone, now, this.settings, this.evHideBelowThreshold);
        if (label === null) {
            return;
        }
        try {
            const handle = this.renderer.upsertLabel(
                zone.id,
                label,
                zone.labelHandle
            );
            if (zone.labelHandle === null) {
                zone.labelHandle = handle;
            }
        } catch (error) {
            this.report(error, zone.id, "upsertLabel");
        }
    }

    /**
     * Remove a zone's visuals if it has any
     */
    public erase(zone: ReclaimZone): void {
        if (zone.rectangleHandle === null && zone.labelHandle === null) {
            return;
        }
        try {
            this.renderer.remove(zone.id);
        } catch (error) {
            this.report(error, zone.id, "remove");
        }
        zone.rectangleHandle = null;
        zone.labelHandle = null;
    }

    private report(
        error: unknown,
        zoneId: string,
        operation: RendererError["operation"]
    ): void {
        const rendererError = new RendererError(
            error instanceof Error ? error.message : String(error),
            zoneId,
            operation
        );
        this.logger.error("Renderer call failed", {
            component: "ZoneRenderAdapter",
            zoneId: rendererError.zoneId,
            operation: rendererError.operation,
            error: rendererError.message,
        });
    }
}
