/**
 * Raised when an operation is attempted from a state that forbids it:
 * a confined registry touched from a foreign thread, a deferred executor under a
 * result-producing strategy, a future read before it settled, or work submitted
 * to a scheduler that was shut down.
 */
export class IllegalStateError extends Error {
    override readonly name = "IllegalStateError";

    constructor(message: string) {
        super(message);
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, IllegalStateError);
        }
    }
}
