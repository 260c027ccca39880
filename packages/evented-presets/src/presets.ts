import { BooleanOperators } from "evented";
import type { ChainHandler } from "evented";
import { numberConsumer, runnable } from "./factories/broadcast-factories";
import { modifyBigInt, modifyBoolean, modifyNumber, modifyString } from "./factories/chain-factories";
import { booleanSupplier, predicate } from "./factories/reduce-factories";
import type { EventFactory } from "./types";

export const RUNNABLE: EventFactory<() => void> = runnable;
export const NUMBER_CONSUMER: EventFactory<(value: number) => void> = numberConsumer;

/** Every handler must agree. */
export const BOOLEAN_SUPPLIER_FAVOR_FALSE: EventFactory<() => boolean> = (options) =>
    booleanSupplier(BooleanOperators.AND, options);
/** Any handler may agree. */
export const BOOLEAN_SUPPLIER_FAVOR_TRUE: EventFactory<() => boolean> = (options) =>
    booleanSupplier(BooleanOperators.OR, options);

export const NUMBER_PREDICATE_FAVOR_FALSE: EventFactory<(value: number) => boolean> = (options) =>
    predicate<number>(BooleanOperators.AND, options);
export const NUMBER_PREDICATE_FAVOR_TRUE: EventFactory<(value: number) => boolean> = (options) =>
    predicate<number>(BooleanOperators.OR, options);

export const MODIFY_NUMBER: EventFactory<ChainHandler<number>> = modifyNumber;
export const MODIFY_BIGINT: EventFactory<ChainHandler<bigint>> = modifyBigInt;
export const MODIFY_BOOLEAN: EventFactory<ChainHandler<boolean>> = modifyBoolean;
export const MODIFY_STRING: EventFactory<ChainHandler<string>> = modifyString;
