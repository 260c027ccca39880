/**
 * Contract: AsyncEvent -- fan-out handlers as tasks, fan-in into one future.
 *
 * Sections:
 *   1. Fan-in on the default scheduler
 *   2. Pooled scheduler
 *   3. Failures
 *   4. Registration consistency
 *   5. firstTakesPrecedence / createAsyncEvent
 */
import { delay } from "es-toolkit";
import { describe, expect, it, vi } from "vitest";
import { IllegalStateError } from "../errors";
import { DirectScheduler } from "../executor/direct-scheduler";
import { PooledScheduler } from "../executor/pooled-scheduler";
import type { Executor } from "../executor/types";
import { EventRegime } from "../registry/enums";
import { AsyncEvent } from "./async-event";
import { createAsyncEvent } from "./helpers";

const sum = (a: number, b: number) => a + b;

describe("AsyncEvent", () => {
    // ── 1. Default scheduler ─────────────────────────────────────────
    describe("fan-in", () => {
        it("reports the pooled regime", () => {
            expect(new AsyncEvent(sum).regime).toBe(EventRegime.Pooled);
        });

        it("resolves undefined with no handlers", async () => {
            const event = new AsyncEvent<[], number>(sum);
            expect(await event.fire()).toBeUndefined();
        });

        it("folds handler results in registration order", async () => {
            const event = new AsyncEvent<[string], string>((a, b) => `${a}|${b}`);
            event.register((s) => `one:${s}`);
            event.register((s) => `two:${s}`);
            expect(await event.invoker()("x")).toBe("one:x|two:x");
        });

        it("skips null and undefined results", async () => {
            const event = new AsyncEvent<[], number>(sum);
            event.register(() => null);
            event.register(() => 4);
            event.register(() => undefined);
            event.register(() => 5);
            expect(await event.fire()).toBe(9);
        });

        it("awaits handlers that return promises", async () => {
            const event = new AsyncEvent<[], number>(sum);
            event.register(async () => {
                await delay(5);
                return 2;
            });
            event.register(() => 3);
            expect(await event.fire()).toBe(5);
        });
    });

    // ── 2. Pooled scheduler ──────────────────────────────────────────
    describe("pooled scheduler", () => {
        it("sums delayed results 1, 2 and 3 to 6", async () => {
            const event = new AsyncEvent<[], number>(sum, new PooledScheduler({ concurrency: 3 }));
            for (const [value, wait] of [
                [1, 15],
                [2, 5],
                [3, 10],
            ]) {
                event.register(async () => {
                    await delay(wait);
                    return value;
                });
            }
            expect(await event.fire()).toBe(6);
        });

        it("returns a pending future before any handler runs", async () => {
            const event = new AsyncEvent<[], number>(sum, new PooledScheduler());
            const handler = vi.fn(() => 1);
            event.register(handler);
            const future = event.fire();
            expect(future.isDone()).toBe(false);
            expect(handler).not.toHaveBeenCalled();
            expect(await future).toBe(1);
        });
    });

    // ── 3. Failures ──────────────────────────────────────────────────
    describe("failures", () => {
        it("fails the joined future with the first failure in registration order", async () => {
            const event = new AsyncEvent<[], number>(sum, new PooledScheduler());
            const sibling = vi.fn(() => 1);
            event.register(async () => {
                await delay(10);
                throw new Error("first");
            });
            event.register(() => {
                throw new Error("second");
            });
            event.register(sibling);

            const future = event.fire();
            await expect(future.get()).rejects.toThrow("first");
            expect(future.isFailed()).toBe(true);
            expect(sibling).toHaveBeenCalledTimes(1);
        });

        it("fails a handler whose executor defers it, without running it later", async () => {
            const queued: (() => void)[] = [];
            const deferred: Executor = { execute: (task) => queued.push(task) };
            const handler = vi.fn(() => 1);
            const event = new AsyncEvent<[], number>(sum);
            event.register(handler, undefined, deferred);

            await expect(event.fire().get()).rejects.toThrow(IllegalStateError);
            for (const task of queued) task();
            expect(handler).not.toHaveBeenCalled();
        });

        it("captures a synchronous throw on the direct scheduler", async () => {
            const event = new AsyncEvent<[], number>(sum, new DirectScheduler());
            event.register(() => {
                throw new Error("sync failure");
            });
            await expect(event.fire().get()).rejects.toThrow("sync failure");
        });
    });

    // ── 4. Registration ──────────────────────────────────────────────
    describe("registration", () => {
        it("an in-flight firing keeps the entries it started with", async () => {
            const event = new AsyncEvent<[], number>(sum, new PooledScheduler());
            event.register(() => 1, "a");
            event.register(() => 2, "b");
            const future = event.fire();
            event.unregister("b");
            expect(await future).toBe(3);
            expect(await event.fire()).toBe(1);
        });

        it("the invoker is stable and fires current entries", async () => {
            const event = new AsyncEvent<[], number>(sum);
            const invoke = event.invoker();
            event.register(() => 10);
            expect(event.invoker()).toBe(invoke);
            expect(await invoke()).toBe(10);
        });

        it("clear removes every handler", async () => {
            const event = new AsyncEvent<[], number>(sum);
            event.register(() => 1);
            event.clear();
            expect(event.size()).toBe(0);
            expect(await event.fire()).toBeUndefined();
        });
    });

    // ── 5. Factories ─────────────────────────────────────────────────
    describe("firstTakesPrecedence", () => {
        it("keeps the first non-null result", async () => {
            const event = AsyncEvent.firstTakesPrecedence<[], string>();
            event.register(() => null);
            event.register(() => "winner");
            event.register(() => "ignored");
            expect(await event.fire()).toBe("winner");
        });
    });

    describe("createAsyncEvent", () => {
        it("creates a named event", () => {
            const event = createAsyncEvent<[], number>({ reducer: sum, name: "totals" });
            expect(event).toBeInstanceOf(AsyncEvent);
            expect(event.name).toBe("totals");
        });

        it("throws when reducer is not a function", () => {
            const reducer = 42 as unknown as (a: number, b: number) => number;
            expect(() => createAsyncEvent({ reducer })).toThrow("[evented] createAsyncEvent: reducer must be a function");
        });

        it("throws on a blank name", () => {
            expect(() => createAsyncEvent({ reducer: sum, name: "" })).toThrow(
                "[evented] createAsyncEvent: name must not be empty",
            );
        });
    });
});
