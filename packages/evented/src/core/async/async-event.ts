import { DirectScheduler } from "../executor/direct-scheduler";
import type { Executor, TaskSubmitter } from "../executor/types";
import type { Future } from "../future/future";
import { BaseRegistry } from "../registry/base-registry";
import { createEntry, withoutKey } from "../registry/entries";
import { EventRegime } from "../registry/enums";
import type { HandlerEntry, RegistryOptions } from "../registry/types";
import { runInline } from "../strategy/dispatch";
import { firstWins } from "../strategy/operators";
import type { Reducer } from "../strategy/operators";
import type { AsyncHandler, AsyncInvoker, AsyncResult } from "./types";

/**
 * Fan-out / fan-in event: every handler runs as its own task on the scheduler and
 * the results are joined into one {@link Future}.
 *
 * Handler tasks are submitted in registration order, then a join task awaits each
 * of them in that order, skips `null` / `undefined` results and folds the rest
 * with the reducer. The first failure in registration order fails the joined
 * future; the other tasks still run.
 *
 * Registration is copy-on-write: a firing keeps the entries it started with, so
 * a concurrent unregister may or may not reach an in-flight firing.
 */
export class AsyncEvent<A extends unknown[], U> extends BaseRegistry<AsyncHandler<A, U>, AsyncInvoker<A, U>> {
    readonly regime = EventRegime.Pooled;
    private entries: readonly HandlerEntry<AsyncHandler<A, U>>[] = [];
    private readonly fireBound: AsyncInvoker<A, U> = (...args) => this.fire(...args);

    constructor(
        private readonly reducer: Reducer<U>,
        private readonly scheduler: TaskSubmitter = new DirectScheduler(),
        options: RegistryOptions = {},
    ) {
        super(options);
    }

    /** An async event whose joined result is the first non-null handler result. */
    static firstTakesPrecedence<A extends unknown[], U>(
        scheduler?: TaskSubmitter,
        options?: RegistryOptions,
    ): AsyncEvent<A, U> {
        return new AsyncEvent<A, U>(firstWins, scheduler, options);
    }

    register(handler: AsyncHandler<A, U>, key?: unknown, executor?: Executor): void {
        this.entries = [...this.entries, createEntry(handler, key, executor)];
        this.trace("handler registered");
    }

    unregister(key: unknown): void {
        const next = withoutKey(this.entries, key);
        const removed = this.entries.length - next.length;
        if (removed === 0) return;
        this.entries = next;
        this.trace(`${removed} handler(s) unregistered`);
    }

    clear(): void {
        this.entries = [];
        this.trace("handlers cleared");
    }

    invoker(): AsyncInvoker<A, U> {
        return this.fireBound;
    }

    size(): number {
        return this.entries.length;
    }

    /** Submit every handler, then the join. Resolves `undefined` when no handler produced a value. */
    fire(...args: A): Future<U | undefined> {
        const futures = this.entries.map((entry) =>
            this.scheduler.submit<AsyncResult<U>>(() => runInline(entry, (handler) => handler(...args))),
        );
        return this.scheduler.submit<U | undefined>(() => this.join(futures));
    }

    private join(futures: readonly Future<AsyncResult<U>>[]): Promise<U | undefined> {
        return futures.reduce<Promise<U | undefined>>(
            (acc, future) =>
                acc.then((folded) =>
                    future.get().then((value) => {
                        if (value === null || value === undefined) return folded;
                        return folded === undefined ? value : this.reducer(folded, value);
                    }),
                ),
            Promise.resolve(undefined),
        );
    }
}
