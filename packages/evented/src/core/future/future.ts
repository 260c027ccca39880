import { IllegalStateError } from "../errors";
import { StateMachine } from "../state-machine/state-machine";
import { FutureState } from "./enums";

const FUTURE_TRANSITIONS: Record<FutureState, FutureState[]> = {
    [FutureState.Pending]: [FutureState.Completed, FutureState.Failed],
    [FutureState.Completed]: [],
    [FutureState.Failed]: [],
};

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

const noop = () => {};

/**
 * Result handle for work handed to a {@link TaskScheduler}.
 *
 * State machine: `Pending → Completed | Failed`
 *
 * Thenable, so `await future` reads the value (or rethrows the failure). Futures built
 * from already-known outcomes ({@link Future.completed}, {@link Future.failed}) are
 * settled synchronously; {@link Future.from} settles once its source does.
 */
export class Future<T> implements PromiseLike<T> {
    private readonly machine = new StateMachine<FutureState>({
        transitions: FUTURE_TRANSITIONS,
        initial: FutureState.Pending,
        name: "Future",
    });
    private outcome: Outcome<T> | null = null;

    private constructor(private readonly promise: Promise<T>) {}

    static completed<T>(value: T): Future<T> {
        const future = new Future(new Promise<T>((resolve) => resolve(value)));
        future.settle({ ok: true, value });
        return future;
    }

    static failed<T = never>(error: unknown): Future<T> {
        const promise = Promise.reject<T>(error);
        // Rejection is surfaced through get() / then(), not as an unhandled rejection.
        promise.catch(noop);
        const future = new Future(promise);
        future.settle({ ok: false, error });
        return future;
    }

    static from<T>(source: PromiseLike<T>): Future<T> {
        const promise = new Promise<T>((resolve, reject) => {
            source.then(resolve, reject);
        });
        const future = new Future(promise);
        void promise.then(
            (value) => future.settle({ ok: true, value }),
            (error: unknown) => future.settle({ ok: false, error }),
        );
        return future;
    }

    get state(): FutureState {
        return this.machine.current;
    }

    isDone(): boolean {
        return !this.machine.is(FutureState.Pending);
    }

    isCompleted(): boolean {
        return this.machine.is(FutureState.Completed);
    }

    isFailed(): boolean {
        return this.machine.is(FutureState.Failed);
    }

    /** Wait for the outcome. Rejects with the task's error when the future failed. */
    get(): Promise<T> {
        return this.promise;
    }

    then<TResult1 = T, TResult2 = never>(
        onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
        onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): Promise<TResult1 | TResult2> {
        return this.promise.then(onfulfilled, onrejected);
    }

    /** Value of a completed future. Throws {@link IllegalStateError} while pending or after failure. */
    resultNow(): T {
        const outcome = this.outcome;
        if (outcome?.ok) return outcome.value;
        throw new IllegalStateError(`"Future" expected state "completed", but current is "${this.state}"`);
    }

    /** Error of a failed future. Throws {@link IllegalStateError} while pending or after success. */
    errorNow(): unknown {
        const outcome = this.outcome;
        if (outcome && !outcome.ok) return outcome.error;
        throw new IllegalStateError(`"Future" expected state "failed", but current is "${this.state}"`);
    }

    /** Call `listener` once the future settles, or right away if it already has. */
    onSettled(listener: (future: Future<T>) => void): () => void {
        if (this.isDone()) {
            listener(this);
            return noop;
        }
        return this.machine.onTransition(() => listener(this));
    }

    private settle(outcome: Outcome<T>): void {
        this.outcome = outcome;
        this.machine.transition(outcome.ok ? FutureState.Completed : FutureState.Failed);
    }
}
