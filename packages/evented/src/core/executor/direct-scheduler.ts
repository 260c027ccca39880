import { Future } from "../future/future";
import { isPromiseLike, joinAll } from "../future/helpers";
import { BaseScheduler } from "./base-scheduler";
import type { TaskFn } from "./types";

/**
 * Scheduler that runs every task immediately on the calling stack.
 *
 * A synchronous task yields an already-settled future: completed with its return
 * value or failed with what it threw. A task returning a promise yields a future
 * that settles with it. Default scheduler of {@link AsyncEvent}.
 *
 * `invokeAll` is fully sequential: a task starts only after the previous one
 * has settled, whether it returned a value, threw or returned a promise.
 */
export class DirectScheduler extends BaseScheduler {
    constructor(name = "DirectScheduler") {
        super(name);
    }

    submit<T>(task: TaskFn<T>): Future<T> {
        const rejected = this.rejection();
        if (rejected) return Future.failed(rejected);

        let result: T | PromiseLike<T>;
        try {
            result = task();
        } catch (err) {
            return Future.failed(err);
        }
        return isPromiseLike(result) ? this.track(Future.from(result)) : Future.completed(result);
    }

    override invokeAll<T>(tasks: Iterable<TaskFn<T>>): Future<T[]> {
        return this.runSequentially(Array.from(tasks), 0, []);
    }

    execute(task: () => void): void {
        const rejected = this.rejection();
        if (rejected) throw rejected;
        task();
    }

    private runSequentially<T>(tasks: readonly TaskFn<T>[], from: number, futures: Future<T>[]): Future<T[]> {
        for (let i = from; i < tasks.length; i++) {
            const future = this.submit(tasks[i]);
            futures.push(future);
            if (!future.isDone()) {
                const next = () => this.runSequentially(tasks, i + 1, futures).get();
                return this.track(Future.from(future.get().then(next, next)));
            }
        }
        return joinAll(futures);
    }
}
