import type { LoggerContext, ThreadProbe } from "../types";
import { ConfinedRegistry } from "./confined";
import { EventRegime } from "./enums";
import { SynchronizedRegistry } from "./synchronized";
import type { EventRegistry, InvokerFactory } from "./types";

export type CreateEventConfig<H, I> = {
    strategy: InvokerFactory<H, I>;
    /** Defaults to {@link EventRegime.Synchronized}. Pooled events come from `createAsyncEvent`. */
    regime?: EventRegime;
    name?: string;
    logger?: LoggerContext;
    /** Only read by confined registries. */
    threadProbe?: ThreadProbe;
};

/** Create a confined or synchronized registry from a config object. Throws on invalid config. */
export function createEvent<H, I>(config: CreateEventConfig<H, I>): EventRegistry<H, I> {
    if (typeof config.strategy !== "function") throw new Error("[evented] createEvent: strategy must be a function");
    if (config.name !== undefined && config.name.trim().length === 0) {
        throw new Error("[evented] createEvent: name must not be empty");
    }
    const regime = config.regime ?? EventRegime.Synchronized;
    switch (regime) {
        case EventRegime.Confined:
            return new ConfinedRegistry(config.strategy, config);
        case EventRegime.Synchronized:
            return new SynchronizedRegistry(config.strategy, config);
        default:
            throw new Error(
                `[evented] createEvent: regime must be "confined" or "synchronized", got "${regime}" (use createAsyncEvent)`,
            );
    }
}
