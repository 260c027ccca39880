import { IllegalStateError } from "../errors";
import { Future } from "../future/future";
import { joinAll } from "../future/helpers";
import type { TaskFn, TaskScheduler } from "./types";

/**
 * Shared bookkeeping for schedulers: shutdown flag, in-flight tracking and the
 * batch operations built on `submit`.
 */
export abstract class BaseScheduler implements TaskScheduler {
    private _shutdown = false;
    private readonly inFlight = new Set<Future<unknown>>();

    protected constructor(protected readonly name: string) {}

    abstract submit<T>(task: TaskFn<T>): Future<T>;

    abstract execute(task: () => void): void;

    invokeAll<T>(tasks: Iterable<TaskFn<T>>): Future<T[]> {
        const futures = Array.from(tasks, (task) => this.submit(task));
        return joinAll(futures);
    }

    invokeAny<T>(tasks: Iterable<TaskFn<T>>): Future<T> {
        const first = tasks[Symbol.iterator]().next();
        if (first.done) {
            return Future.failed(new Error(`[evented] ${this.name}.invokeAny: cannot return a result of an empty batch`));
        }
        return this.submit(first.value);
    }

    shutdown(): void {
        this._shutdown = true;
    }

    isShutdown(): boolean {
        return this._shutdown;
    }

    isTerminated(): boolean {
        return this._shutdown && this.inFlight.size === 0;
    }

    async awaitTermination(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled(Array.from(this.inFlight, (f) => f.get()));
        }
    }

    /** Error to report when work arrives after {@link shutdown}, or `null` while accepting work. */
    protected rejection(): IllegalStateError | null {
        return this._shutdown ? new IllegalStateError(`[evented] ${this.name}: cannot accept work after shutdown`) : null;
    }

    protected track<T>(future: Future<T>): Future<T> {
        if (!future.isDone()) {
            this.inFlight.add(future);
            future.onSettled(() => {
                this.inFlight.delete(future);
            });
        }
        return future;
    }
}
