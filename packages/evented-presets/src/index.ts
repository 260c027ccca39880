// ── Factories ───────────────────────────────────────────────────────
export { asyncFunction, firstTakesPrecedence } from "./factories/async-factories";
export type { AsyncPresetOptions } from "./factories/async-factories";
export {
    biConsumer,
    consumer,
    numberBiConsumer,
    numberConsumer,
    pooledBiConsumer,
    pooledConsumer,
    pooledRunnable,
    runnable,
} from "./factories/broadcast-factories";
export {
    modifyBigInt,
    modifyBoolean,
    modifyNumber,
    modifyString,
    progressiveBiFunction,
    unaryOperator,
} from "./factories/chain-factories";
export {
    biFunction,
    biPredicate,
    booleanSupplier,
    fn,
    numberFunction,
    numberSupplier,
    predicate,
    supplier,
} from "./factories/reduce-factories";
// ── Operators ───────────────────────────────────────────────────────
export { max, min, sum } from "./operators/numeric";
// ── Named presets ───────────────────────────────────────────────────
export {
    BOOLEAN_SUPPLIER_FAVOR_FALSE,
    BOOLEAN_SUPPLIER_FAVOR_TRUE,
    MODIFY_BIGINT,
    MODIFY_BOOLEAN,
    MODIFY_NUMBER,
    MODIFY_STRING,
    NUMBER_CONSUMER,
    NUMBER_PREDICATE_FAVOR_FALSE,
    NUMBER_PREDICATE_FAVOR_TRUE,
    RUNNABLE,
} from "./presets";
export type { EventFactory, PresetOptions } from "./types";
