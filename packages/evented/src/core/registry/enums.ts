/** How a registry guards its entries against concurrent use. */
export enum EventRegime {
    /** Single owner thread; mutations from anywhere else are rejected. */
    Confined = "confined",
    /** Every mutation publishes a frozen snapshot; firings never see a partial update. */
    Synchronized = "synchronized",
    /** Handlers run as tasks on a scheduler; firing returns a future. */
    Pooled = "pooled",
}
