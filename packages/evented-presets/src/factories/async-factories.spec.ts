/**
 * Contract: async factories -- fan-out/fan-in events over a scheduler.
 */
import { PooledScheduler } from "evented";
import { delay } from "es-toolkit";
import { describe, expect, it } from "vitest";
import { sum } from "../operators/numeric";
import { asyncFunction, firstTakesPrecedence } from "./async-factories";

describe("async factories", () => {
    it("asyncFunction joins handler results for one argument", async () => {
        const event = asyncFunction<number, number>(sum, new PooledScheduler(), { name: "scores" });
        event.register(async (n) => {
            await delay(5);
            return n;
        });
        event.register((n) => n * 2);
        expect(event.name).toBe("scores");
        expect(await event.fire(10)).toBe(30);
    });

    it("firstTakesPrecedence on the default scheduler", async () => {
        const event = firstTakesPrecedence<string, string>();
        event.register(() => undefined);
        event.register((s) => s.toUpperCase());
        event.register((s) => s);
        expect(await event.invoker()("abc")).toBe("ABC");
    });
});
