import type { Executor } from "../executor/types";
import { SILENT_LOGGER } from "../logger/logger";
import type { LoggerContext } from "../types";
import type { EventRegime } from "./enums";
import type { EventRegistry, RegistryOptions } from "./types";

/** Naming and logging shared by every registry regime. */
export abstract class BaseRegistry<H, I> implements EventRegistry<H, I> {
    abstract readonly regime: EventRegime;
    readonly name: string | undefined;
    protected readonly logger: LoggerContext;

    protected constructor(options: RegistryOptions) {
        this.name = options.name;
        this.logger = options.logger ?? SILENT_LOGGER;
    }

    abstract register(handler: H, key?: unknown, executor?: Executor): void;

    abstract unregister(key: unknown): void;

    abstract clear(): void;

    abstract invoker(): I;

    abstract size(): number;

    protected get label(): string {
        return this.name ? `"${this.name}"` : "anonymous event";
    }

    protected trace(action: string): void {
        this.logger.debug("registry", `${action} on ${this.label}`, { regime: this.regime, size: this.size() });
    }
}
