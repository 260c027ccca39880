export enum FutureState {
    Pending = "pending",
    Completed = "completed",
    Failed = "failed",
}
