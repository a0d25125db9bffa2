// src/cli/replayCommand.ts

import { Command, InvalidArgumentError } from "commander";
import { loadConfig } from "../core/config.js";
import { barsToEvents, loadBars } from "../feed/barFeed.js";
import { ReclaimEngine, type ReplaySummary } from "../indicators/reclaimEngine.js";
import { Logger } from "../infrastructure/logger.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { InMemoryChart } from "../rendering/inMemoryChart.js";
import type { ReclaimZone, ZoneSide } from "../types/zoneTypes.js";
import { FinancialMath } from "../utils/financialMath.js";

export interface ReplayOptions {
    data: string;
    tickSize: number;
    config?: string;
    pretty?: boolean;
}

export interface ReplayResult {
    summary: ReplaySummary;
    zones: Record<ZoneSide, ReclaimZone[]>;
    drawnZones: number;
}

export interface ZoneRow {
    id: string;
    fixed: number;
    active: number;
    height: number;
    ev: number;
    swing: number;
    decaying: boolean;
}

function parseTickSize(value: string): number {
    const tickSize = Number(value);
    if (!FinancialMath.isValidTickSize(tickSize)) {
        throw new InvalidArgumentError("Tick size must be a positive number.");
    }
    return tickSize;
}

/**
 * Replay a bar file through a fresh engine and return the surviving zones
 */
export function runReplay(options: ReplayOptions, logger?: ILogger): ReplayResult {
    const config = loadConfig(options.config);
    const log =
        logger ??
        new Logger({
            name: "reclaims-replay",
            level: config.logging.level,
            pretty: options.pretty === true || config.logging.pretty,
        });

    const bars = loadBars(options.data);
    const chart = new InMemoryChart();
    const engine = new ReclaimEngine({
        settings: config.reclaims,
        rendering: config.rendering,
        renderer: chart,
        logger: log,
    });

    const summary = engine.replay(barsToEvents(bars, options.tickSize));
    return {
        summary,
        zones: {
            bullish: engine.getZones("bullish").filter((zone) => !zone.deleted),
            bearish: engine.getZones("bearish").filter((zone) => !zone.deleted),
        },
        drawnZones: chart.rectangleCount,
    };
}

export function toZoneRows(zones: readonly ReclaimZone[]): ZoneRow[] {
    return zones.map((zone) => ({
        id: zone.id,
        fixed: zone.fixedSidePrice,
        active: zone.activeSidePrice,
        height: zone.currentHeight,
        ev: zone.ev,
        swing: zone.swing,
        decaying: zone.decayStartTime !== null,
    }));
}

export function buildReplayProgram(): Command {
    const program = new Command();

    program
        .name("reclaims-replay")
        .description("Replay a JSON bar file and print the surviving reclaim zones")
        .version("1.0.0")
        .requiredOption("-d, --data <path>", "Path to a JSON array of bars")
        .requiredOption("-t, --tick-size <size>", "Instrument tick size", parseTickSize)
        .option("-c, --config <path>", "Config file (defaults to ./config.json)")
        .option("--pretty", "Human readable logs", false)
        .action((options: ReplayOptions) => {
            const result = runReplay(options);
            console.log(
                `Replayed ${result.summary.received} events, ${result.summary.rotations} new zones, ${result.drawnZones} drawn`
            );
            for (const side of ["bullish", "bearish"] as const) {
                console.log(`\n${side} zones (newest first)`);
                console.table(toZoneRows(result.zones[side]));
            }
        });

    return program;
}
