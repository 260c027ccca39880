import type { Executor } from "../executor/types";
import { BaseRegistry } from "./base-registry";
import { EventRegime } from "./enums";
import { createEntry, withoutKey } from "./entries";
import type { HandlerEntry, InvokerFactory, RegistryOptions } from "./types";

const EMPTY = Object.freeze([]);

/**
 * Registry that publishes an immutable snapshot on every mutation.
 *
 * Each mutation builds a new frozen entry array and a new invoker over it; a
 * published snapshot is never touched again. An invoker fetched earlier keeps
 * dispatching to the snapshot it closed over, so callers re-fetch
 * {@link invoker} after a mutation.
 */
export class SynchronizedRegistry<H, I> extends BaseRegistry<H, I> {
    readonly regime = EventRegime.Synchronized;
    private snapshot: readonly HandlerEntry<H>[] = EMPTY;
    private current: I;

    constructor(
        private readonly strategy: InvokerFactory<H, I>,
        options: RegistryOptions = {},
    ) {
        super(options);
        this.current = strategy(this.snapshot);
    }

    register(handler: H, key?: unknown, executor?: Executor): void {
        this.publish([...this.snapshot, createEntry(handler, key, executor)]);
        this.trace("handler registered");
    }

    unregister(key: unknown): void {
        const next = withoutKey(this.snapshot, key);
        const removed = this.snapshot.length - next.length;
        if (removed === 0) return;
        this.publish(next);
        this.trace(`${removed} handler(s) unregistered`);
    }

    clear(): void {
        this.publish(EMPTY);
        this.trace("handlers cleared");
    }

    invoker(): I {
        return this.current;
    }

    size(): number {
        return this.snapshot.length;
    }

    private publish(entries: readonly HandlerEntry<H>[]): void {
        this.snapshot = Object.freeze(entries);
        this.current = this.strategy(this.snapshot);
    }
}
