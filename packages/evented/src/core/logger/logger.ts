import type { LoggerContext } from "../types";
import type { LogEntry, LogHandler, LoggerOptions, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    warn: 1,
    error: 2,
};

/**
 * Transport-based logger. Entries fan out to every registered {@link LogHandler};
 * with no handlers the logger is silent.
 */
export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private readonly minRank: number;

    constructor(options: LoggerOptions = {}) {
        this.minRank = LEVEL_RANK[options.level ?? "debug"];
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < this.minRank || this.handlers.size === 0) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}

/** Shared no-op logger used when a component is created without one. */
export const SILENT_LOGGER: LoggerContext = Object.freeze({
    debug() {},
    warn() {},
    error() {},
});
