import { AsyncLocalStorage } from "node:async_hooks";
import { StoreKind } from "./enums";
import type { EnvironmentRef, EnvironmentStore } from "./types";

/** Set, run, restore. Shared by the stores whose slot is not tied to an async context. */
abstract class SlotStore implements EnvironmentStore {
    abstract readonly kind: StoreKind;
    abstract getCurrentEnvironment(): EnvironmentRef | null;
    abstract setCurrentEnvironment(ref: EnvironmentRef | null): void;

    runWithEnvironment<T>(ref: EnvironmentRef | null, fn: () => T): T {
        const previous = this.getCurrentEnvironment();
        this.setCurrentEnvironment(ref);
        try {
            return fn();
        } finally {
            this.setCurrentEnvironment(previous);
        }
    }

    async runWithEnvironmentAsync<T>(ref: EnvironmentRef | null, fn: () => Promise<T>): Promise<T> {
        const previous = this.getCurrentEnvironment();
        this.setCurrentEnvironment(ref);
        try {
            return await fn();
        } finally {
            this.setCurrentEnvironment(previous);
        }
    }
}

/** One slot for the whole process. Use when only one environment is ever active at a time. */
export class GlobalStore extends SlotStore {
    readonly kind = StoreKind.Global;
    private _current: EnvironmentRef | null = null;

    getCurrentEnvironment(): EnvironmentRef | null {
        return this._current;
    }

    setCurrentEnvironment(ref: EnvironmentRef | null): void {
        this._current = ref;
    }
}

/**
 * One slot per worker thread, for applications that run one environment per worker.
 *
 * Every worker evaluates its own copy of this module, so an instance is only
 * ever reached from the thread that created it and a single slot is enough.
 */
export class ThreadLocalStore extends SlotStore {
    readonly kind = StoreKind.ThreadLocal;
    private _current: EnvironmentRef | null = null;

    getCurrentEnvironment(): EnvironmentRef | null {
        return this._current;
    }

    setCurrentEnvironment(ref: EnvironmentRef | null): void {
        this._current = ref;
    }
}

/**
 * One slot per async context. Work started from a context inherits its
 * environment; changes made afterwards stay local to the context that made them.
 *
 * Reuse one instance across successive policies: every instance owns its own
 * `AsyncLocalStorage`, and values set through an old instance stay reachable
 * from the contexts that captured them.
 */
export class TaskLocalStore implements EnvironmentStore {
    readonly kind = StoreKind.TaskLocal;
    private readonly _storage = new AsyncLocalStorage<EnvironmentRef | null>();

    getCurrentEnvironment(): EnvironmentRef | null {
        return this._storage.getStore() ?? null;
    }

    setCurrentEnvironment(ref: EnvironmentRef | null): void {
        this._storage.enterWith(ref);
    }

    runWithEnvironment<T>(ref: EnvironmentRef | null, fn: () => T): T {
        return this._storage.run(ref, fn);
    }

    runWithEnvironmentAsync<T>(ref: EnvironmentRef | null, fn: () => Promise<T>): Promise<T> {
        return this._storage.run(ref, fn);
    }
}

export function createStore(kind: StoreKind): EnvironmentStore {
    switch (kind) {
        case StoreKind.Global:
            return new GlobalStore();
        case StoreKind.ThreadLocal:
            return new ThreadLocalStore();
        case StoreKind.TaskLocal:
            return new TaskLocalStore();
    }
}
