import type { TaskScope } from "./task-scope";

export type LoopOptions = {
    /** Upper bound on concurrent `toThread` work. Defaults to `os.availableParallelism()`. */
    workers?: number;
};

export type CreateLoopOptions = LoopOptions & {
    /** Required for `LoopKind.Scope`. */
    scope?: TaskScope;
};

export type ScopedTask<T> = (signal: AbortSignal) => T | Promise<T>;
