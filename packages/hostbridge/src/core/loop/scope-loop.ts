import { availableParallelism } from "node:os";
import { Semaphore } from "es-toolkit";
import { CancelledError, ConfigurationError, ScopeCancelledError } from "../errors";
import { Future } from "../future/future";
import { runInto } from "../future/helpers";
import { runWithSignal } from "./cancellation";
import { LoopKind } from "./enums";
import { EventLoop } from "./event-loop";
import type { TaskScope } from "./task-scope";
import type { LoopOptions } from "./types";

/**
 * Loop adapter bound to a {@link TaskScope}. Everything it schedules runs as
 * part of the scope, and detaching cancels the scope.
 */
export class ScopeEventLoop extends EventLoop {
    readonly kind = LoopKind.Scope;
    private readonly limiter: Semaphore;
    private _attached = false;

    constructor(
        readonly scope: TaskScope,
        options: LoopOptions = {},
    ) {
        super();
        this.limiter = new Semaphore(options.workers ?? availableParallelism());
    }

    get attached(): boolean {
        return this._attached;
    }

    attach(): void {
        if (this.scope.closed || this.scope.cancelled) {
            throw new ConfigurationError("Cannot attach to a closed task scope");
        }
        this._attached = true;
    }

    detach(): void {
        this._attached = false;
        this.scope.cancel();
    }

    fromThread<T>(fn: () => T): Future<T> {
        const future = new Future<T>();
        setImmediate(() => {
            if (this.scope.cancelled) {
                future.cancel();
                return;
            }
            runWithSignal(this.scope.signal, () => runInto(future, fn));
        });
        return future;
    }

    toThread<T>(fn: () => T | Promise<T>): Promise<T> {
        return this.scope.run(() => this.runBounded(this.limiter, fn));
    }

    awaitFuture<T>(future: Future<T>): Promise<T> {
        return this.awaitWithSignal(future, this.scope.signal, () => new ScopeCancelledError());
    }

    nextCycle(): Future<void> {
        const future = new Future<void>();
        setImmediate(() => {
            if (this.scope.cancelled) {
                future.setException(new CancelledError());
            } else {
                future.setResult(undefined);
            }
        });
        return future;
    }

    throwIfCancelled(): void {
        if (this.scope.cancelled) throw new CancelledError();
    }

    protected nativeCancellation(error: CancelledError): Error {
        return new ScopeCancelledError(error.message);
    }
}
