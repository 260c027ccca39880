import { IllegalStateError } from "../errors";
import type { Executor } from "../executor/types";
import type { ThreadProbe } from "../types";
import { BaseRegistry } from "./base-registry";
import { EventRegime } from "./enums";
import { createEntry, currentThread, removeKey } from "./entries";
import type { ConfinedRegistryOptions, HandlerEntry, InvokerFactory } from "./types";

/**
 * Registry owned by the thread that created it.
 *
 * The invoker is built once over the live entry array and reads it at call time,
 * so it never needs re-fetching. Mutations from another thread throw
 * {@link IllegalStateError}. A handler registered while the event is firing is
 * seen by that same firing when it lands after the current position.
 */
export class ConfinedRegistry<H, I> extends BaseRegistry<H, I> {
    readonly regime = EventRegime.Confined;
    private readonly entries: HandlerEntry<H>[] = [];
    private readonly live: I;
    private readonly probe: ThreadProbe;
    private readonly owner: unknown;

    constructor(strategy: InvokerFactory<H, I>, options: ConfinedRegistryOptions = {}) {
        super(options);
        this.probe = options.threadProbe ?? currentThread;
        this.owner = this.probe();
        this.live = strategy(this.entries);
    }

    register(handler: H, key?: unknown, executor?: Executor): void {
        this.assertOwner("register");
        this.entries.push(createEntry(handler, key, executor));
        this.trace("handler registered");
    }

    unregister(key: unknown): void {
        this.assertOwner("unregister");
        const removed = removeKey(this.entries, key);
        if (removed > 0) this.trace(`${removed} handler(s) unregistered`);
    }

    clear(): void {
        this.assertOwner("clear");
        this.entries.length = 0;
        this.trace("handlers cleared");
    }

    invoker(): I {
        return this.live;
    }

    size(): number {
        return this.entries.length;
    }

    private assertOwner(operation: string): void {
        const thread = this.probe();
        if (Object.is(thread, this.owner)) return;
        const message = `[evented] ConfinedRegistry.${operation}: ${this.label} must be executed on the thread that the event was created on`;
        this.logger.error("registry", message, { owner: this.owner, thread });
        throw new IllegalStateError(message);
    }
}
