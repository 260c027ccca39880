import { IllegalStateError } from "../errors";
import { DIRECT_EXECUTOR } from "../executor/direct";
import type { HandlerEntry } from "../registry/types";

/**
 * Call `entry.handler` through its executor and return what the call produced.
 *
 * Strategies that need a result use this, so the executor must run the call before
 * `execute` returns. An executor that defers it is rejected, and the deferred
 * call is dropped when the executor gets round to it.
 */
export function runInline<H, T>(entry: HandlerEntry<H>, call: (handler: H) => T): T {
    if (entry.executor === DIRECT_EXECUTOR) return call(entry.handler);
    const produced: { value: T }[] = [];
    let abandoned = false;
    entry.executor.execute(() => {
        if (abandoned) return;
        produced.push({ value: call(entry.handler) });
    });
    const [first] = produced;
    if (!first) {
        abandoned = true;
        throw new IllegalStateError(
            "[evented] runInline: executor must run the handler before execute returns when the event produces a result",
        );
    }
    return first.value;
}
