/**
 * Contract: Logger -- transport-based logging with pluggable handlers.
 *
 * Sections:
 *   1. Handler management
 *   2. Logging methods (debug, warn, error)
 *   3. Level threshold
 *   4. Entry shape
 *   5. Silent logger
 *   6. Console handler formatting
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleHandler } from "./console-handler";
import { Logger, SILENT_LOGGER } from "./logger";
import type { LogEntry } from "./types";

describe("Logger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // -- 1. Handler management --
    describe("Handler management", () => {
        it("addHandler registers a handler that receives entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.debug("registry", "hello");
            expect(handler).toHaveBeenCalledOnce();
        });

        it("removeHandler stops the handler from receiving entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.removeHandler(handler);
            logger.debug("registry", "hello");
            expect(handler).not.toHaveBeenCalled();
        });

        it("fans out to multiple handlers", () => {
            const logger = new Logger();
            const a = vi.fn();
            const b = vi.fn();
            logger.addHandler(a);
            logger.addHandler(b);
            logger.warn("registry", "hello");
            expect(a).toHaveBeenCalledOnce();
            expect(b).toHaveBeenCalledOnce();
        });

        it("no handlers means no error (silent)", () => {
            const logger = new Logger();
            expect(() => logger.error("registry", "hello")).not.toThrow();
        });
    });

    // -- 2. Logging methods --
    describe("Logging methods", () => {
        it("debug() emits entry with level 'debug'", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.debug("registry", "handler registered");
            expect(handler).toHaveBeenCalledWith(
                expect.objectContaining({ level: "debug", code: "registry", message: "handler registered" }),
            );
        });

        it("error() passes details through", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.error("scheduler", "task failed", { reason: "boom" });
            expect(handler).toHaveBeenCalledWith(
                expect.objectContaining({
                    level: "error",
                    code: "scheduler",
                    message: "task failed",
                    details: { reason: "boom" },
                }),
            );
        });
    });

    // -- 3. Level threshold --
    describe("Level threshold", () => {
        it("drops entries below the configured level", () => {
            const logger = new Logger({ level: "warn" });
            const levels: string[] = [];
            logger.addHandler((entry) => levels.push(entry.level));
            logger.debug("c", "m");
            logger.warn("c", "m");
            logger.error("c", "m");
            expect(levels).toEqual(["warn", "error"]);
        });
    });

    // -- 4. Entry shape --
    describe("Entry shape", () => {
        it("includes timestamp as a number and leaves details undefined when omitted", () => {
            const logger = new Logger();
            const captured: LogEntry[] = [];
            logger.addHandler((entry) => captured.push(entry));
            logger.debug("c", "msg");
            expect(captured).toHaveLength(1);
            expect(typeof captured[0]?.timestamp).toBe("number");
            expect(captured[0]?.details).toBeUndefined();
        });
    });

    // -- 5. Silent logger --
    describe("SILENT_LOGGER", () => {
        it("accepts every level without output", () => {
            const spy = vi.spyOn(console, "log");
            SILENT_LOGGER.debug("c", "m");
            SILENT_LOGGER.warn("c", "m");
            SILENT_LOGGER.error("c", "m");
            expect(spy).not.toHaveBeenCalled();
        });

        it("is frozen", () => {
            expect(Object.isFrozen(SILENT_LOGGER)).toBe(true);
        });
    });

    // -- 6. Console handler --
    describe("Console handler (createConsoleHandler)", () => {
        it("logs debug to console.log tagged [evented]", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            const handler = createConsoleHandler({ colors: false });
            handler({ level: "debug", code: "registry", message: "ready", details: { size: 2 }, timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toMatch(/^\d{2}:\d{2}:\d{2} \[evented\] registry → ready \{ size: 2 \}$/);
        });

        it("logs warn to console.warn", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            const handler = createConsoleHandler({ colors: false });
            handler({ level: "warn", code: "registry", message: "slow", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toMatch(/\[warn\] registry → slow$/);
        });

        it("logs error to console.error and formats Error details", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            const handler = createConsoleHandler({ colors: false });
            handler({
                level: "error",
                code: "scheduler",
                message: "task failed",
                details: { error: new TypeError("bad") },
                timestamp: 0,
            });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toMatch(/\[error\] scheduler → task failed \{ error: TypeError: bad \}$/);
        });

        it("colours values by default", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "debug", code: "c", message: "m", details: { n: 1 }, timestamp: 0 });
            expect(spy.mock.calls[0]?.[0]).toContain("\x1b[33m1\x1b[0m");
        });
    });
});
