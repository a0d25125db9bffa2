// src/rendering/zoneRenderer.ts

export interface DrawingStyle {
    color: string; // #RRGGBB
    transparency: number; // 0 opaque .. 100 invisible
    hollow: boolean;
}

export interface RectangleDrawing {
    fromTime: number;
    fromPrice: number; // fixed side
    extendBars: number; // right edge, in bars past the latest one
    toPrice: number; // active side
    style: DrawingStyle;
}

export interface LabelDrawing {
    anchorTime: number;
    anchorPrice: number;
    text: string;
    style: DrawingStyle;
}

/**
 * Chart surface the zones are projected onto. Implementations assign a
 * handle on first draw and return it on every later update.
 */
export interface IZoneRenderer {
    upsertRectangle(
        zoneId: string,
        rectangle: RectangleDrawing,
        handle: number | null
    ): number;
    upsertLabel(zoneId: string, label: LabelDrawing, handle: number | null): number;
    /** Remove both the rectangle and the label of a zone */
    remove(zoneId: string): void;
}
