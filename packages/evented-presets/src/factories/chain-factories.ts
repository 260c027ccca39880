import { chain, createEvent } from "evented";
import type { ChainHandler, EventRegistry } from "evented";
import type { PresetOptions } from "../types";

type Chained<T, R extends unknown[] = []> = EventRegistry<ChainHandler<T, R>, ChainHandler<T, R>>;

/** Each handler receives the previous handler's result. */
export function unaryOperator<T>(options: PresetOptions = {}): Chained<T> {
    return createEvent({ ...options, strategy: chain<T>() });
}

export function modifyNumber(options: PresetOptions = {}): Chained<number> {
    return unaryOperator<number>(options);
}

export function modifyBigInt(options: PresetOptions = {}): Chained<bigint> {
    return unaryOperator<bigint>(options);
}

export function modifyBoolean(options: PresetOptions = {}): Chained<boolean> {
    return unaryOperator<boolean>(options);
}

export function modifyString(options: PresetOptions = {}): Chained<string> {
    return unaryOperator<string>(options);
}

/** Chains the first argument; the second is passed unchanged to every handler. */
export function progressiveBiFunction<T, U>(options: PresetOptions = {}): Chained<T, [U]> {
    return createEvent({ ...options, strategy: chain<T, [U]>() });
}
