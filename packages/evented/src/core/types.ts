/** Logger contract accepted by registries, async events and schedulers. */
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}

/**
 * Returns an identity for the thread the caller is running on.
 *
 * Compared with `Object.is` against the value captured when a confined registry was created.
 */
export type ThreadProbe = () => unknown;
