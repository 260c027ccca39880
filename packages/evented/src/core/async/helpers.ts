import { AsyncEvent } from "./async-event";
import type { CreateAsyncEventConfig } from "./types";

/** Create an {@link AsyncEvent} from a config object. Throws on invalid config. */
export function createAsyncEvent<A extends unknown[], U>(config: CreateAsyncEventConfig<U>): AsyncEvent<A, U> {
    if (typeof config.reducer !== "function") throw new Error("[evented] createAsyncEvent: reducer must be a function");
    if (config.scheduler !== undefined && typeof config.scheduler.submit !== "function") {
        throw new Error("[evented] createAsyncEvent: scheduler must provide submit()");
    }
    if (config.name !== undefined && config.name.trim().length === 0) {
        throw new Error("[evented] createAsyncEvent: name must not be empty");
    }
    return new AsyncEvent<A, U>(config.reducer, config.scheduler, { name: config.name, logger: config.logger });
}
