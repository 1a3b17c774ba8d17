export enum FutureState {
    Pending = "pending",
    Running = "running",
    Resolved = "resolved",
    Rejected = "rejected",
    Cancelled = "cancelled",
}
