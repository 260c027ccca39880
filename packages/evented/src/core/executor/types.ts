import type { Future } from "../future/future";

/** A unit of work producing `T`, synchronously or through a promise. */
export type TaskFn<T> = () => T | PromiseLike<T>;

/** Capability to run a task: inline, on a pool, inside a context, ... */
export interface Executor {
    execute(task: () => void): void;
}

/** Minimal capability the async registry depends on. */
export interface TaskSubmitter {
    submit<T>(task: TaskFn<T>): Future<T>;
}

export interface TaskScheduler extends Executor, TaskSubmitter {
    /** Submit every task, then join their results in input order. */
    invokeAll<T>(tasks: Iterable<TaskFn<T>>): Future<T[]>;
    /** Result of the first task in the batch. Fails on an empty batch. */
    invokeAny<T>(tasks: Iterable<TaskFn<T>>): Future<T>;
    /** Refuse new work. Work already submitted still runs. */
    shutdown(): void;
    isShutdown(): boolean;
    /** Shut down and no submitted work still in flight. */
    isTerminated(): boolean;
    /** Resolve once every task submitted so far has settled. */
    awaitTermination(): Promise<void>;
}
