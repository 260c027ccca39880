import type { TaskSubmitter } from "../executor/types";
import type { Future } from "../future/future";
import type { LoggerContext } from "../types";
import type { Reducer } from "../strategy/operators";

/** A handler result; `null` and `undefined` are skipped by the join. */
export type AsyncResult<U> = U | null | undefined;

export type AsyncHandler<A extends unknown[], U> = (...args: A) => AsyncResult<U> | PromiseLike<AsyncResult<U>>;

export type AsyncInvoker<A extends unknown[], U> = (...args: A) => Future<U | undefined>;

export type CreateAsyncEventConfig<U> = {
    reducer: Reducer<U>;
    /** Defaults to a new {@link DirectScheduler}. */
    scheduler?: TaskSubmitter;
    name?: string;
    logger?: LoggerContext;
};
