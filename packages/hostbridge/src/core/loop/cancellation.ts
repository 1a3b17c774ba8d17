import { AsyncLocalStorage } from "node:async_hooks";

const taskSignal = new AsyncLocalStorage<AbortSignal>();

/** Cancellation token of the task running in the current async context, if it was started with one. */
export function currentSignal(): AbortSignal | undefined {
    return taskSignal.getStore();
}

export function runWithSignal<T>(signal: AbortSignal, fn: () => T): T {
    return taskSignal.run(signal, fn);
}
