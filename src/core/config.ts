// src/core/config.ts
import dotenv from "dotenv";
dotenv.config();
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "../infrastructure/logger.js";

// ============================================================================
// RECLAIM TRACKING - state machine thresholds, shared by both sides
// ============================================================================
export const ReclaimSettingsSchema = z.object({
    // History capacity per side, fixed for the lifetime of an engine
    maxZones: z.number().int().min(1).max(1000),
    newZoneRetracementThreshold: z.number().int().min(1).max(1000), // ticks

    // Scoring
    evPullbackTicks: z.number().int().min(1).max(10000),
    swingPullbackTicks: z.number().int().min(1).max(10000),

    minZoneSizeTicks: z.number().int().min(0).max(10000),
    evHideBelowThreshold: z.number().int().min(0),

    updateOnBarClose: z.boolean(),

    // New-zone gating
    oppositeBarFilter: z.boolean(),
    oppositeBarLookback: z.number().int().min(1).max(100),
    overlapBars: z.number().int().min(0).max(100), // 0 disables

    barLookback: z.number().int().min(0), // 0 replays the whole history
    showCurrentZone: z.boolean(),
});

const HexColorSchema = z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, "Expected a #RRGGBB colour");

export const RenderSettingsSchema = z.object({
    rectangleExtendBars: z.number().int().min(0).max(10000),
    bullishColor: HexColorSchema,
    bearishColor: HexColorSchema,
    transparency: z.number().int().min(0).max(100),
    decayFadeMs: z.number().int().positive(),
});

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LoggingSchema = z.object({
    level: LogLevelSchema,
    pretty: z.boolean(),
});

export const AppConfigSchema = z.object({
    nodeEnv: z.string(),
    logging: LoggingSchema,
    reclaims: ReclaimSettingsSchema,
    rendering: RenderSettingsSchema,
});

export type ReclaimSettings = z.infer<typeof ReclaimSettingsSchema>;
export type RenderSettings = z.infer<typeof RenderSettingsSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_RECLAIM_SETTINGS: ReclaimSettings = {
    maxZones: 100,
    newZoneRetracementThreshold: 2,
    evPullbackTicks: 4,
    swingPullbackTicks: 12,
    minZoneSizeTicks: 2,
    evHideBelowThreshold: 1,
    updateOnBarClose: true,
    oppositeBarFilter: false,
    oppositeBarLookback: 5,
    overlapBars: 0,
    barLookback: 0,
    showCurrentZone: false,
};

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
    rectangleExtendBars: 10,
    bullishColor: "#0064FF",
    bearishColor: "#FF6400",
    transparency: 70,
    decayFadeMs: 3_600_000,
};

function formatIssues(error: z.ZodError): string[] {
    return error.errors.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
    );
}

function parseWith<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    raw: unknown,
    what: string
): T {
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigurationError(
            `${what} validation failed: ${issues.join("; ")}`,
            issues
        );
    }
    return result.data;
}

export function parseReclaimSettings(raw: unknown): ReclaimSettings {
    return parseWith(ReclaimSettingsSchema, raw, "Reclaim settings");
}

export function parseRenderSettings(raw: unknown): RenderSettings {
    return parseWith(RenderSettingsSchema, raw, "Render settings");
}

/**
 * Validated reclaim settings from defaults plus overrides
 */
export function createReclaimSettings(
    overrides: Partial<ReclaimSettings> = {}
): ReclaimSettings {
    return parseReclaimSettings({ ...DEFAULT_RECLAIM_SETTINGS, ...overrides });
}

export function createRenderSettings(
    overrides: Partial<RenderSettings> = {}
): RenderSettings {
    return parseRenderSettings({ ...DEFAULT_RENDER_SETTINGS, ...overrides });
}

/**
 * Validate a raw config object. NO DEFAULTS: every section must be present.
 */
export function parseConfig(raw: unknown): AppConfig {
    const cfg = parseWith(AppConfigSchema, raw, "config.json");
    return {
        ...cfg,
        nodeEnv: Config.NODE_ENV ?? cfg.nodeEnv,
        logging: {
            level: Config.LOG_LEVEL ?? cfg.logging.level,
            pretty: Config.LOG_PRETTY ?? cfg.logging.pretty,
        },
    };
}

/**
 * Load and validate config.json (or the file named by RECLAIMS_CONFIG)
 */
export function loadConfig(path?: string): AppConfig {
    const configPath = resolve(
        process.cwd(),
        path ?? Config.CONFIG_PATH ?? "config.json"
    );

    let rawConfig: unknown;
    try {
        rawConfig = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
        throw new ConfigurationError(
            `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
    return parseConfig(rawConfig);
}

/**
 * Process-level settings from the environment
 */
export class Config {
    static get CONFIG_PATH(): string | undefined {
        return process.env["RECLAIMS_CONFIG"];
    }
    static get NODE_ENV(): string | undefined {
        return process.env["NODE_ENV"];
    }
    static get LOG_LEVEL(): LogLevel | undefined {
        const parsed = LogLevelSchema.safeParse(
            process.env["LOG_LEVEL"]?.toLowerCase()
        );
        return parsed.success ? parsed.data : undefined;
    }
    static get LOG_PRETTY(): boolean | undefined {
        const value = process.env["LOG_PRETTY"];
        if (value === undefined) return undefined;
        return value === "true" || value === "1";
    }
}
