// src/infrastructure/logger.ts
import { pino, type Logger as PinoLogger } from "pino";
import type { ILogger } from "./loggerInterface.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
    name?: string;
    level?: LogLevel;
    pretty?: boolean;
}

/**
 * Structured logger for the reclaim tracker, backed by pino.
 * JSON lines by default; pino-pretty for local runs.
 */
export class Logger implements ILogger {
    private readonly pino: PinoLogger;

    constructor(options: LoggerOptions = {}) {
        this.pino = pino({
            name: options.name ?? "reclaim-tracker",
            level: options.level ?? "info",
            ...(options.pretty
                ? { transport: { target: "pino-pretty" } }
                : {}),
        });
    }

    /**
     * Log info level message
     */
    public info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.info(this.bindings(context, correlationId), message);
    }

    /**
     * Log error level message
     */
    public error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.error(this.bindings(context, correlationId), message);
    }

    /**
     * Log warning level message
     */
    public warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.warn(this.bindings(context, correlationId), message);
    }

    /**
     * Log debug level message
     */
    public debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.debug(this.bindings(context, correlationId), message);
    }

    public isDebugEnabled(): boolean {
        return this.pino.isLevelEnabled("debug");
    }

    private bindings(
        context?: Record<string, unknown>,
        correlationId?: string
    ): Record<string, unknown> {
        return correlationId !== undefined
            ? { ...context, correlationId }
            : { ...context };
    }
}
