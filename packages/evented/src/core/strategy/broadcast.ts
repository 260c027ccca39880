import { DIRECT_EXECUTOR } from "../executor/direct";
import type { Executor } from "../executor/types";
import type { InvokerFactory } from "../registry/types";

export type BroadcastOptions = {
    /** Runs handlers that were registered without an executor of their own. */
    executor?: Executor;
};

/**
 * Call every handler with the same arguments, in registration order, and ignore
 * their results. A handler that throws aborts the rest of the pass.
 */
export function broadcast<A extends unknown[]>(
    options: BroadcastOptions = {},
): InvokerFactory<(...args: A) => void, (...args: A) => void> {
    const fallback = options.executor ?? DIRECT_EXECUTOR;
    return (entries) =>
        (...args) => {
            for (const entry of entries) {
                const executor = entry.executor === DIRECT_EXECUTOR ? fallback : entry.executor;
                executor.execute(() => entry.handler(...args));
            }
        };
}
