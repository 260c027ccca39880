import { broadcast, createEvent } from "evented";
import type { EventRegistry, Executor } from "evented";
import type { PresetOptions } from "../types";

type Broadcast<A extends unknown[]> = EventRegistry<(...args: A) => void, (...args: A) => void>;

export function runnable(options: PresetOptions = {}): Broadcast<[]> {
    return createEvent({ ...options, strategy: broadcast<[]>() });
}

export function consumer<T>(options: PresetOptions = {}): Broadcast<[T]> {
    return createEvent({ ...options, strategy: broadcast<[T]>() });
}

export function biConsumer<T, U>(options: PresetOptions = {}): Broadcast<[T, U]> {
    return createEvent({ ...options, strategy: broadcast<[T, U]>() });
}

export function numberConsumer(options: PresetOptions = {}): Broadcast<[number]> {
    return consumer<number>(options);
}

export function numberBiConsumer(options: PresetOptions = {}): Broadcast<[number, number]> {
    return biConsumer<number, number>(options);
}

/**
 * Broadcasts whose handlers run on `executor` unless registered with an
 * executor of their own. Results are never awaited.
 */
export function pooledRunnable(executor: Executor, options: PresetOptions = {}): Broadcast<[]> {
    return createEvent({ ...options, strategy: broadcast<[]>({ executor }) });
}

export function pooledConsumer<T>(executor: Executor, options: PresetOptions = {}): Broadcast<[T]> {
    return createEvent({ ...options, strategy: broadcast<[T]>({ executor }) });
}

export function pooledBiConsumer<T, U>(executor: Executor, options: PresetOptions = {}): Broadcast<[T, U]> {
    return createEvent({ ...options, strategy: broadcast<[T, U]>({ executor }) });
}
