import type { EventRegime, EventRegistry, LoggerContext, ThreadProbe } from "evented";

/** Settings shared by every preset factory. */
export type PresetOptions = {
    /** Defaults to {@link EventRegime.Synchronized}. */
    regime?: EventRegime;
    name?: string;
    logger?: LoggerContext;
    threadProbe?: ThreadProbe;
};

/** A ready-made recipe for one handler shape. */
export type EventFactory<H, I = H> = (options?: PresetOptions) => EventRegistry<H, I>;
