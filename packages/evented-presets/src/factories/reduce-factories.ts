import { createEvent, lastWins, reduce, vote } from "evented";
import type { BooleanOperator, EventRegistry, Reducer } from "evented";
import type { PresetOptions } from "../types";

type Reducing<A extends unknown[], U> = EventRegistry<(...args: A) => U, (...args: A) => U | undefined>;
type Voting<A extends unknown[]> = EventRegistry<(...args: A) => boolean, (...args: A) => boolean>;

/** Handlers produce a value; the invoker returns the last one unless another reducer is given. */
export function supplier<U>(reducer: Reducer<U> = lastWins, options: PresetOptions = {}): Reducing<[], U> {
    return createEvent({ ...options, strategy: reduce<[], U>(reducer) });
}

export function fn<T, U>(reducer: Reducer<U>, options: PresetOptions = {}): Reducing<[T], U> {
    return createEvent({ ...options, strategy: reduce<[T], U>(reducer) });
}

export function biFunction<T, U, V>(reducer: Reducer<V>, options: PresetOptions = {}): Reducing<[T, U], V> {
    return createEvent({ ...options, strategy: reduce<[T, U], V>(reducer) });
}

export function numberSupplier(reducer: Reducer<number>, options: PresetOptions = {}): Reducing<[], number> {
    return supplier(reducer, options);
}

export function numberFunction<U>(reducer: Reducer<U>, options: PresetOptions = {}): Reducing<[number], U> {
    return fn<number, U>(reducer, options);
}

export function booleanSupplier(operator: BooleanOperator, options: PresetOptions = {}): Voting<[]> {
    return createEvent({ ...options, strategy: vote<[]>(operator) });
}

export function predicate<T>(operator: BooleanOperator, options: PresetOptions = {}): Voting<[T]> {
    return createEvent({ ...options, strategy: vote<[T]>(operator) });
}

export function biPredicate<T, U>(operator: BooleanOperator, options: PresetOptions = {}): Voting<[T, U]> {
    return createEvent({ ...options, strategy: vote<[T, U]>(operator) });
}
