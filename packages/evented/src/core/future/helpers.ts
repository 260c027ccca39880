import { Future } from "./future";

export function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
    return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * Combine futures into one future of their values, in input order.
 *
 * Already-settled inputs give an already-settled result. Otherwise the values are awaited
 * in order and the first failure in that order fails the result.
 */
export function joinAll<T>(futures: readonly Future<T>[]): Future<T[]> {
    if (futures.every((f) => f.isDone())) {
        const failed = futures.find((f) => f.isFailed());
        return failed ? Future.failed(failed.errorNow()) : Future.completed(futures.map((f) => f.resultNow()));
    }
    return Future.from(
        futures.reduce<Promise<T[]>>(
            (acc, future) => acc.then((values) => future.get().then((value) => [...values, value])),
            Promise.resolve([]),
        ),
    );
}
