export enum StoreKind {
    Global = "global",
    ThreadLocal = "thread",
    TaskLocal = "task",
}

export enum PolicyState {
    Unregistered = "unregistered",
    Registered = "registered",
}

export enum EnvironmentState {
    Created = "created",
    InUse = "in-use",
    Disposed = "disposed",
}
