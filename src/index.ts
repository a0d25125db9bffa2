// src/index.ts

export {
    ReclaimEngine,
    type ReclaimEngineOptions,
    type ReplaySummary,
} from "./indicators/reclaimEngine.js";
export { ReclaimTracker } from "./indicators/reclaimTracker.js";
export {
    BEARISH,
    BULLISH,
    directionFor,
    type SideDirection,
} from "./indicators/helpers/sideDirection.js";
export { ZoneHistory, createZone } from "./indicators/helpers/zoneHistory.js";
export { scoreZone, type ScoreChange } from "./indicators/helpers/touchScorer.js";
export {
    barColor,
    hasOppositeColor,
    hasPriceOverlap,
    shouldStartNewZone,
} from "./indicators/helpers/newZoneTrigger.js";

export {
    AppConfigSchema,
    Config,
    DEFAULT_RECLAIM_SETTINGS,
    DEFAULT_RENDER_SETTINGS,
    createReclaimSettings,
    createRenderSettings,
    loadConfig,
    parseConfig,
    type AppConfig,
    type ReclaimSettings,
    type RenderSettings,
} from "./core/config.js";
export {
    ConfigurationError,
    FeedError,
    ReclaimProcessingError,
    RendererError,
} from "./core/errors.js";

export { InMemoryChart } from "./rendering/inMemoryChart.js";
export type {
    DrawingStyle,
    IZoneRenderer,
    LabelDrawing,
    RectangleDrawing,
} from "./rendering/zoneRenderer.js";

export { barsToEvents, loadBars, parseBars } from "./feed/barFeed.js";
export { Logger, type LoggerOptions, type LogLevel } from "./infrastructure/logger.js";
export type { ILogger } from "./infrastructure/loggerInterface.js";

export type {
    Bar,
    PriceBarEvent,
    ProcessOutcome,
    SkipReason,
    TimedBar,
} from "./types/marketEvents.js";
export {
    ZoneUpdateType,
    type ReclaimZone,
    type ZoneSide,
    type ZoneTransition,
} from "./types/zoneTypes.js";
