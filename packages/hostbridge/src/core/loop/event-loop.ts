import { setImmediate as nextTurn } from "node:timers/promises";
import type { Semaphore } from "es-toolkit";
import { CancelledError, FutureCancelledError } from "../errors";
import { Future } from "../future/future";
import { runInto } from "../future/helpers";
import { LoopKind } from "./enums";

/**
 * Bridge between native completion callbacks and one host scheduler.
 *
 * Subclasses implement {@link fromThread}; the rest has inline defaults
 * suitable for a host without any scheduler.
 */
export abstract class EventLoop {
    abstract readonly kind: LoopKind;

    /** Called by `setLoop` when this loop takes over scheduling. */
    attach(): void {}

    /** Called by `setLoop` before another loop takes over. */
    detach(): void {}

    /** Schedule `fn` onto the loop from a native callback. The future settles with its outcome. */
    abstract fromThread<T>(fn: () => T): Future<T>;

    /** Run `fn` as a separate unit of work, off the caller's turn. */
    async toThread<T>(fn: () => T | Promise<T>): Promise<T> {
        await nextTurn();
        return fn();
    }

    /** Suspend on a future through this loop. */
    async awaitFuture<T>(future: Future<T>): Promise<T> {
        try {
            return await future.wait();
        } catch (err) {
            throw this.translate(err);
        }
    }

    /** Future settled on a later iteration; rejected with `CancelledError` if the task was cancelled meanwhile. */
    nextCycle(): Future<void> {
        return this.fromThread<void>(() => undefined);
    }

    throwIfCancelled(): void {}

    /** Run `fn`, turning `CancelledError` into this loop's native cancellation error. */
    wrapCancelled<T>(fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            throw this.translate(err);
        }
    }

    protected nativeCancellation(error: CancelledError): Error {
        return new FutureCancelledError(error.message);
    }

    protected translate(err: unknown): unknown {
        return err instanceof CancelledError ? this.nativeCancellation(err) : err;
    }

    /** `toThread` body shared by the scheduling adapters: bounded by `limiter`, checked for cancellation first. */
    protected async runBounded<T>(limiter: Semaphore, fn: () => T | Promise<T>): Promise<T> {
        await limiter.acquire();
        try {
            await nextTurn();
            this.throwIfCancelled();
            return await fn();
        } catch (err) {
            throw this.translate(err);
        } finally {
            limiter.release();
        }
    }

    /**
     * `awaitFuture` that gives up when `signal` aborts: the future is cancelled
     * (work that already started keeps running) and `onAbort` builds the error.
     */
    protected awaitWithSignal<T>(future: Future<T>, signal: AbortSignal, onAbort: () => Error): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            if (signal.aborted) {
                future.cancel();
                reject(onAbort());
                return;
            }

            const abort = () => {
                future.cancel();
                reject(onAbort());
            };
            signal.addEventListener("abort", abort, { once: true });

            future.addDoneCallback((done) => {
                signal.removeEventListener("abort", abort);
                setImmediate(() => {
                    try {
                        resolve(done.result());
                    } catch (err) {
                        reject(this.translate(err));
                    }
                });
            });
        });
    }
}

/**
 * Default loop when no scheduler is installed: everything runs inline.
 * `toThread` still defers to a fresh macrotask.
 */
export class NoEventLoop extends EventLoop {
    readonly kind = LoopKind.None;

    fromThread<T>(fn: () => T): Future<T> {
        const future = new Future<T>();
        runInto(future, fn);
        return future;
    }
}
