import { threadId } from "node:worker_threads";
import { DIRECT_EXECUTOR } from "../executor/direct";
import type { Executor } from "../executor/types";
import type { ThreadProbe } from "../types";
import type { HandlerEntry } from "./types";

export const currentThread: ThreadProbe = () => threadId;

export function createEntry<H>(handler: H, key: unknown, executor: Executor | undefined): HandlerEntry<H> {
    return Object.freeze({
        handler,
        key: key === undefined ? handler : key,
        executor: executor ?? DIRECT_EXECUTOR,
    });
}

/** Copy of `entries` without those keyed by `key`. */
export function withoutKey<H>(entries: readonly HandlerEntry<H>[], key: unknown): HandlerEntry<H>[] {
    return entries.filter((entry) => !Object.is(entry.key, key));
}

/** Remove entries keyed by `key` from `entries` itself. Returns how many were removed. */
export function removeKey<H>(entries: HandlerEntry<H>[], key: unknown): number {
    let removed = 0;
    for (let i = entries.length - 1; i >= 0; i--) {
        if (Object.is(entries[i]?.key, key)) {
            entries.splice(i, 1);
            removed++;
        }
    }
    return removed;
}
