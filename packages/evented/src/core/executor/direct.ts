import type { Executor } from "./types";

/** Runs the task inline, before `execute` returns. Stateless and shared. */
export const DIRECT_EXECUTOR: Executor = Object.freeze({
    execute(task: () => void): void {
        task();
    },
});
