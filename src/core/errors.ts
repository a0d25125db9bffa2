// src/core/errors.ts

/**
 * Custom error types for the reclaim tracker
 */

export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly issues: readonly string[] = []
    ) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export class ReclaimProcessingError extends Error {
    constructor(
        message: string,
        public readonly context: Record<string, unknown>,
        public readonly correlationId?: string
    ) {
        super(message);
        this.name = "ReclaimProcessingError";
    }
}

export class RendererError extends Error {
    constructor(
        message: string,
        public readonly zoneId: string,
        public readonly operation: "upsertRectangle" | "upsertLabel" | "remove"
    ) {
        super(message);
        this.name = "RendererError";
    }
}

export class FeedError extends Error {
    constructor(
        message: string,
        public readonly source: string
    ) {
        super(message);
        this.name = "FeedError";
    }
}
