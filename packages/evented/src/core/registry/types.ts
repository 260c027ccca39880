import type { Executor } from "../executor/types";
import type { LoggerContext, ThreadProbe } from "../types";
import type { EventRegime } from "./enums";

/** A registered handler with its removal key and the executor it is dispatched through. */
export type HandlerEntry<H> = {
    readonly handler: H;
    readonly key: unknown;
    readonly executor: Executor;
};

/**
 * Composition strategy: turns an ordered entry sequence into the callable that
 * dispatches to it. Confined registries pass their live array, synchronized ones a
 * frozen snapshot.
 */
export type InvokerFactory<H, I> = (entries: readonly HandlerEntry<H>[]) => I;

export interface EventRegistry<H, I> {
    readonly regime: EventRegime;
    readonly name: string | undefined;
    /**
     * Append a handler. `key` defaults to the handler itself, `executor` to
     * {@link DIRECT_EXECUTOR}. Duplicate keys are allowed.
     */
    register(handler: H, key?: unknown, executor?: Executor): void;
    /** Remove every entry whose key is identical (`Object.is`) to `key`. Unknown keys are ignored. */
    unregister(key: unknown): void;
    clear(): void;
    /** Current invoker. Re-fetch after a mutation unless the registry is confined. */
    invoker(): I;
    size(): number;
}

export type RegistryOptions = {
    /** Label used in log lines and error messages. */
    name?: string;
    logger?: LoggerContext;
};

export type ConfinedRegistryOptions = RegistryOptions & {
    /** Identity of the calling thread. Defaults to `worker_threads.threadId`. */
    threadProbe?: ThreadProbe;
};
