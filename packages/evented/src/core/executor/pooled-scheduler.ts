import { Semaphore } from "es-toolkit";
import { SILENT_LOGGER } from "../logger/logger";
import { Future } from "../future/future";
import type { LoggerContext } from "../types";
import { BaseScheduler } from "./base-scheduler";
import type { TaskFn } from "./types";

export type PooledSchedulerOptions = {
    /** Maximum number of tasks running at once. Defaults to 4. */
    concurrency?: number;
    name?: string;
    logger?: LoggerContext;
};

/**
 * Scheduler that runs tasks off the calling stack, at most `concurrency` at a time.
 *
 * Tasks never start inline: `submit` always returns a pending future, and work
 * interleaves with whatever the caller does next. Tasks beyond the cap wait in
 * FIFO order for a free slot.
 */
export class PooledScheduler extends BaseScheduler {
    private readonly semaphore: Semaphore;
    private readonly logger: LoggerContext;

    constructor(options: PooledSchedulerOptions = {}) {
        const concurrency = options.concurrency ?? 4;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new Error(`[evented] PooledScheduler: concurrency must be a positive integer, got ${concurrency}`);
        }
        super(options.name ?? "PooledScheduler");
        this.semaphore = new Semaphore(concurrency);
        this.logger = options.logger ?? SILENT_LOGGER;
    }

    /** Number of free slots right now. */
    get available(): number {
        return this.semaphore.available;
    }

    submit<T>(task: TaskFn<T>): Future<T> {
        const rejected = this.rejection();
        if (rejected) return Future.failed(rejected);
        return this.track(Future.from(this.run(task)));
    }

    /** Fire-and-forget. Failures are reported to the logger. */
    execute(task: () => void): void {
        const rejected = this.rejection();
        if (rejected) throw rejected;
        this.submit(task).onSettled((future) => {
            if (future.isFailed()) {
                this.logger.error("scheduler", `task failed on "${this.name}"`, { error: future.errorNow() });
            }
        });
    }

    private run<T>(task: TaskFn<T>): Promise<T> {
        return this.semaphore.acquire().then(() =>
            new Promise<T>((resolve) => resolve(task())).finally(() => this.semaphore.release()),
        );
    }
}
