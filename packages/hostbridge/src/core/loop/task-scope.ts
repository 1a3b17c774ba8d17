import { AbortError, CancelledError, ConfigurationError, ScopeCancelledError, toError } from "../errors";
import { runWithSignal } from "./cancellation";
import type { ScopedTask } from "./types";

/**
 * Structured-concurrency scope: children run inside it, a failing child
 * cancels the siblings, and {@link join} waits for all of them.
 *
 * Children observe cancellation through the signal they receive (and through
 * `currentSignal()`), never by being interrupted.
 */
export class TaskScope {
    private readonly _controller = new AbortController();
    private readonly _children = new Set<Promise<unknown>>();
    private readonly _errors: Error[] = [];
    private _closed = false;

    /** Run `body` in a fresh scope and join it. A failing body cancels the scope before its error propagates. */
    static async open<T>(body: (scope: TaskScope) => T | Promise<T>): Promise<T> {
        const scope = new TaskScope();
        let result: T;
        try {
            result = await scope.run(() => body(scope));
        } catch (err) {
            scope.cancel(err);
            await scope.settle();
            throw err;
        }
        await scope.join();
        return result;
    }

    get signal(): AbortSignal {
        return this._controller.signal;
    }

    get cancelled(): boolean {
        return this._controller.signal.aborted;
    }

    get closed(): boolean {
        return this._closed;
    }

    /** Start a child. Its failure is recorded for {@link join} and cancels the scope. */
    spawn(fn: ScopedTask<unknown>): void {
        this.assertOpen();
        void this.track(
            this.enter(fn).catch((err: unknown) => {
                if (!(this.cancelled && isCancellation(err))) {
                    this._errors.push(toError(err));
                }
                this.cancel(err);
            }),
        );
    }

    /** Run `fn` inside the scope and hand its outcome to the caller. */
    run<T>(fn: ScopedTask<T>): Promise<T> {
        this.assertOpen();
        return this.track(this.enter(fn));
    }

    cancel(reason?: unknown): void {
        this._controller.abort(reason ?? new ScopeCancelledError());
    }

    /** Close the scope and wait for every child. Throws the child failure, or an `AggregateError` of several. */
    async join(): Promise<void> {
        this._closed = true;
        await this.settle();
        if (this._errors.length === 1) throw this._errors[0];
        if (this._errors.length > 1) {
            throw new AggregateError(this._errors, `${this._errors.length} tasks failed in scope`);
        }
    }

    // ── Private ──────────────────────────────────────────────────────────

    private enter<T>(fn: ScopedTask<T>): Promise<T> {
        return runWithSignal(this.signal, async () => fn(this.signal));
    }

    private track<T>(task: Promise<T>): Promise<T> {
        const settled = task.then(
            () => undefined,
            () => undefined,
        );
        this._children.add(settled);
        void settled.then(() => this._children.delete(settled));
        return task;
    }

    private async settle(): Promise<void> {
        while (this._children.size > 0) {
            await Promise.allSettled([...this._children]);
        }
    }

    private assertOpen(): void {
        if (this._closed) {
            throw new ConfigurationError("Task scope is closed");
        }
    }
}

function isCancellation(err: unknown): boolean {
    return err instanceof CancelledError || err instanceof ScopeCancelledError || err instanceof AbortError;
}
