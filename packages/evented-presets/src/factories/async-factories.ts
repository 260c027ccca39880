import { AsyncEvent, createAsyncEvent } from "evented";
import type { LoggerContext, Reducer, TaskSubmitter } from "evented";

export type AsyncPresetOptions = {
    name?: string;
    logger?: LoggerContext;
};

export function asyncFunction<T, U>(
    reducer: Reducer<U>,
    scheduler?: TaskSubmitter,
    options: AsyncPresetOptions = {},
): AsyncEvent<[T], U> {
    return createAsyncEvent<[T], U>({ ...options, reducer, scheduler });
}

export function firstTakesPrecedence<T, U>(
    scheduler?: TaskSubmitter,
    options: AsyncPresetOptions = {},
): AsyncEvent<[T], U> {
    return AsyncEvent.firstTakesPrecedence<[T], U>(scheduler, options);
}
