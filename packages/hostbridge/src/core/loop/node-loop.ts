import { availableParallelism } from "node:os";
import { Semaphore } from "es-toolkit";
import { AbortError, CancelledError, ConfigurationError } from "../errors";
import { Future } from "../future/future";
import { runInto } from "../future/helpers";
import { currentSignal, runWithSignal } from "./cancellation";
import { LoopKind } from "./enums";
import { EventLoop } from "./event-loop";
import type { LoopOptions, ScopedTask } from "./types";

/**
 * Loop adapter for plain Node: callbacks hop onto the event loop through
 * `setImmediate`, and cancellation follows the `AbortSignal` of the task
 * that is running (see {@link spawn}).
 */
export class NodeEventLoop extends EventLoop {
    readonly kind = LoopKind.Node;
    private readonly limiter: Semaphore;
    private _attached = false;

    constructor(options: LoopOptions = {}) {
        super();
        this.limiter = new Semaphore(options.workers ?? availableParallelism());
    }

    get attached(): boolean {
        return this._attached;
    }

    attach(): void {
        if (this._attached) {
            throw new ConfigurationError("This loop is already attached");
        }
        this._attached = true;
    }

    detach(): void {
        this._attached = false;
    }

    /** Start `fn` as a task whose cancellation token is `signal`. */
    spawn<T>(fn: ScopedTask<T>, signal: AbortSignal = new AbortController().signal): Promise<T> {
        return runWithSignal(signal, async () => fn(signal));
    }

    fromThread<T>(fn: () => T): Future<T> {
        const future = new Future<T>();
        setImmediate(() => runInto(future, fn));
        return future;
    }

    toThread<T>(fn: () => T | Promise<T>): Promise<T> {
        return this.runBounded(this.limiter, fn);
    }

    awaitFuture<T>(future: Future<T>): Promise<T> {
        const signal = currentSignal();
        if (!signal) return super.awaitFuture(future);
        return this.awaitWithSignal(future, signal, () => new AbortError(undefined, { cause: signal.reason }));
    }

    nextCycle(): Future<void> {
        const signal = currentSignal();
        const future = new Future<void>();
        setImmediate(() => {
            if (signal?.aborted) {
                future.setException(new CancelledError());
            } else {
                future.setResult(undefined);
            }
        });
        return future;
    }

    throwIfCancelled(): void {
        if (currentSignal()?.aborted) throw new CancelledError();
    }

    protected nativeCancellation(error: CancelledError): Error {
        return new AbortError(error.message, { cause: currentSignal()?.reason ?? error });
    }
}
