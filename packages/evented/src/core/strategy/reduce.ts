import type { InvokerFactory } from "../registry/types";
import { runInline } from "./dispatch";
import type { BooleanOperator, Reducer } from "./operators";

/**
 * Call every handler with the same arguments and fold the results left to right,
 * seeded with the first: `f(f(f(a, b), c), d)`. No handlers gives `undefined`.
 */
export function reduce<A extends unknown[], U>(
    reducer: Reducer<U>,
): InvokerFactory<(...args: A) => U, (...args: A) => U | undefined> {
    return (entries) =>
        (...args) => {
            if (entries.length === 0) return undefined;
            const call = (handler: (...args: A) => U) => handler(...args);
            let result = runInline(entries[0], call);
            for (let i = 1; i < entries.length; i++) {
                result = reducer(result, runInline(entries[i], call));
            }
            return result;
        };
}

/** Boolean {@link reduce}. No handlers votes `false`. */
export function vote<A extends unknown[]>(
    operator: BooleanOperator,
): InvokerFactory<(...args: A) => boolean, (...args: A) => boolean> {
    const fold = reduce<A, boolean>(operator);
    return (entries) => {
        const invoke = fold(entries);
        return (...args) => invoke(...args) ?? false;
    };
}
