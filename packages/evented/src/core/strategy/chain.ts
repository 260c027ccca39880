import type { InvokerFactory } from "../registry/types";
import { runInline } from "./dispatch";

/** Transforms `value`, with `rest` passed unchanged to every handler. */
export type ChainHandler<T, R extends unknown[] = []> = (value: T, ...rest: R) => T;

/**
 * Thread a value through every handler: each receives the previous handler's result.
 * With no handlers the value comes back unchanged.
 */
export function chain<T, R extends unknown[] = []>(): InvokerFactory<ChainHandler<T, R>, ChainHandler<T, R>> {
    return (entries) =>
        (value, ...rest) => {
            let result = value;
            for (const entry of entries) {
                const input = result;
                result = runInline(entry, (handler) => handler(input, ...rest));
            }
            return result;
        };
}
