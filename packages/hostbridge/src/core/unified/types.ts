import type { Future } from "../future/future";

/** Resource entered and exited around a synchronous block, like a native frame or a lock. */
export interface ScopedResource<V> {
    enter(): V;
    exit(error?: unknown): void;
}

export interface AsyncScopedResource<V> {
    enterAsync(): Promise<V>;
    exitAsync(error?: unknown): Promise<void>;
}

export type FutureSource<T> = Iterable<Future<T>> | AsyncIterable<Future<T>>;

/** Called once per settled future. Returning a falsy value other than `undefined` stops the run. */
export type AsCompletedCallback<T> = (future: Future<T>) => unknown;
