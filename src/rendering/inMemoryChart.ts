// src/rendering/inMemoryChart.ts

import type { IZoneRenderer, LabelDrawing, RectangleDrawing } from "./zoneRenderer.js";

interface Stored<T> {
    handle: number;
    drawing: T;
}

/**
 * Chart surface that keeps drawings in memory, keyed by zone id.
 * Used by the replay CLI and by tests.
 */
export class InMemoryChart implements IZoneRenderer {
    private nextHandle = 1;
    private readonly rectangles = new Map<string, Stored<RectangleDrawing>>();
    private readonly labels = new Map<string, Stored<LabelDrawing>>();

    public upsertRectangle(zoneId: string, rectangle: RectangleDrawing): number {
        const handle = this.rectangles.get(zoneId)?.handle ?? this.nextHandle++;
        this.rectangles.set(zoneId, { handle, drawing: rectangle });
        return handle;
    }

    public upsertLabel(zoneId: string, label: LabelDrawing): number {
        const handle = this.labels.get(zoneId)?.handle ?? this.nextHandle++;
        this.labels.set(zoneId, { handle, drawing: label });
        return handle;
    }

    public remove(zoneId: string): void {
        this.rectangles.delete(zoneId);
        this.labels.delete(zoneId);
    }

    public rectangle(zoneId: string): RectangleDrawing | undefined {
        return this.rectangles.get(zoneId)?.drawing;
    }

    public label(zoneId: string): LabelDrawing | undefined {
        return this.labels.get(zoneId)?.drawing;
    }

    public rectangleHandle(zoneId: string): number | undefined {
        return this.rectangles.get(zoneId)?.handle;
    }

    public get zoneIds(): string[] {
        return [...this.rectangles.keys()];
    }

    public get rectangleCount(): number {
        return this.rectangles.size;
    }

    public get labelCount(): number {
        return this.labels.size;
    }
}
