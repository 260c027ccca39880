// ── Registry ────────────────────────────────────────────────────────
export { ConfinedRegistry } from "./core/registry/confined";
export { EventRegime } from "./core/registry/enums";
export { createEvent } from "./core/registry/helpers";
export type { CreateEventConfig } from "./core/registry/helpers";
export { SynchronizedRegistry } from "./core/registry/synchronized";
export type {
    ConfinedRegistryOptions,
    EventRegistry,
    HandlerEntry,
    InvokerFactory,
    RegistryOptions,
} from "./core/registry/types";
// ── Strategies ──────────────────────────────────────────────────────
export { broadcast } from "./core/strategy/broadcast";
export type { BroadcastOptions } from "./core/strategy/broadcast";
export { chain } from "./core/strategy/chain";
export type { ChainHandler } from "./core/strategy/chain";
export { runInline } from "./core/strategy/dispatch";
export { BooleanOperators, firstWins, lastWins } from "./core/strategy/operators";
export type { BooleanOperator, Reducer } from "./core/strategy/operators";
export { reduce, vote } from "./core/strategy/reduce";
// ── Async ───────────────────────────────────────────────────────────
export { AsyncEvent } from "./core/async/async-event";
export { createAsyncEvent } from "./core/async/helpers";
export type { AsyncHandler, AsyncInvoker, AsyncResult, CreateAsyncEventConfig } from "./core/async/types";
// ── Executors ───────────────────────────────────────────────────────
export { DIRECT_EXECUTOR } from "./core/executor/direct";
export { DirectScheduler } from "./core/executor/direct-scheduler";
export { PooledScheduler } from "./core/executor/pooled-scheduler";
export type { PooledSchedulerOptions } from "./core/executor/pooled-scheduler";
export type { Executor, TaskFn, TaskScheduler, TaskSubmitter } from "./core/executor/types";
// ── Futures ─────────────────────────────────────────────────────────
export { FutureState } from "./core/future/enums";
export { Future } from "./core/future/future";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger, SILENT_LOGGER } from "./core/logger/logger";
export type { LogEntry, LogHandler, LoggerOptions, LogLevel } from "./core/logger/types";
// ── Errors & shared types ───────────────────────────────────────────
export { IllegalStateError } from "./core/errors";
export type { LoggerContext, ThreadProbe } from "./core/types";
