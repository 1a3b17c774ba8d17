import { keepEnvironment } from "../environment/current";
import { Future } from "../future/future";
import { copyOutcome, failureOf } from "../future/helpers";
import type { DoneCallback } from "../future/types";
import { getLoop, makeAwaitable } from "../loop/registry";
import { isAsyncScopedResource, isScopedResource } from "./guards";
import type { AsyncScopedResource, ScopedResource } from "./types";

/**
 * Future usable from every loop: awaitable through the active loop, with
 * done callbacks that run in the environment that registered them.
 */
export class UnifiedFuture<T> extends Future<T> implements PromiseLike<T> {
    // ── Construction ─────────────────────────────────────────────────────

    static from<T>(source: Future<T> | PromiseLike<T>): UnifiedFuture<T> {
        if (source instanceof UnifiedFuture) return source;

        const result = new UnifiedFuture<T>();
        if (source instanceof Future) {
            source.addDoneCallback((done) => copyOutcome(done, result));
        } else {
            void Promise.resolve(source).then(
                (value) => {
                    if (!result.done()) result.setResult(value);
                },
                (err: unknown) => {
                    if (!result.done()) result.setException(err);
                },
            );
        }
        return result;
    }

    /** Call `fn` and adopt what it returns. A synchronous throw becomes a rejected future. */
    static fromCall<A extends unknown[], T>(
        fn: (...args: A) => Future<T> | PromiseLike<T>,
        ...args: A
    ): UnifiedFuture<T> {
        let source: Future<T> | PromiseLike<T>;
        try {
            source = fn(...args);
        } catch (err) {
            return UnifiedFuture.reject(err);
        }
        return UnifiedFuture.from(source);
    }

    static resolve<T>(value: T): UnifiedFuture<T> {
        const future = new UnifiedFuture<T>();
        future.setResult(value);
        return future;
    }

    static reject<T = never>(error: unknown): UnifiedFuture<T> {
        const future = new UnifiedFuture<T>();
        future.setException(error);
        return future;
    }

    // ── Callbacks ────────────────────────────────────────────────────────

    /** Like {@link Future.addDoneCallback}, but `fn` runs in the environment active at registration. */
    override addDoneCallback(fn: DoneCallback<T>): void {
        super.addDoneCallback(keepEnvironment(fn));
    }

    /** Run `fn` on the active loop once settled, never inside the resolver's stack (unless there is no loop). */
    addLoopCallback(fn: (future: UnifiedFuture<T>) => void): void {
        this.addDoneCallback(() => {
            const scheduled = getLoop().fromThread(() => fn(this));
            scheduled.addDoneCallback((done) => {
                const error = failureOf(done);
                if (error) this.logger.error("future", "Exception in loop callback", { error });
            });
        });
    }

    // ── Combinators ──────────────────────────────────────────────────────

    /** Derive a future from the outcome. Errors thrown by either handler reject the result. */
    transform<V>(onValue: (value: T) => V, onError?: (error: Error) => V): UnifiedFuture<V> {
        const result = new UnifiedFuture<V>(this.logger);
        this.addDoneCallback((done) => {
            if (result.done()) return;
            if (done.cancelled()) {
                result.cancel();
                return;
            }

            const error = done.exception();
            try {
                if (error === null) {
                    result.setResult(onValue(done.result()));
                } else if (onError) {
                    result.setResult(onError(error));
                } else {
                    result.setException(error);
                }
            } catch (err) {
                result.setException(err);
            }
        });
        return result;
    }

    map<V>(fn: (value: T) => V): UnifiedFuture<V> {
        return this.transform(fn);
    }

    catch<V>(fn: (error: Error) => V): UnifiedFuture<T | V> {
        return this.transform<T | V>((value) => value, fn);
    }

    // ── Awaiting ─────────────────────────────────────────────────────────

    awaitable(): Promise<T> {
        return makeAwaitable(this);
    }

    then<TResult1 = T, TResult2 = never>(
        onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
        onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): Promise<TResult1 | TResult2> {
        return this.awaitable().then(onfulfilled, onrejected);
    }

    // ── Scoped resources ─────────────────────────────────────────────────

    /** Enter the settled resource, run `fn` with what it yields, and exit it on every path. */
    use<V, R>(this: UnifiedFuture<ScopedResource<V>>, fn: (value: V) => R): R {
        const resource = this.result();
        if (!isScopedResource<V>(resource)) {
            throw new TypeError("Future value is not a scoped resource");
        }

        const value = resource.enter();
        let result: R;
        try {
            result = fn(value);
        } catch (err) {
            resource.exit(err);
            throw err;
        }
        resource.exit();
        return result;
    }

    /** Await the resource through the loop, then enter it (asynchronously if it supports that). */
    async useAsync<V, R>(
        this:
            | UnifiedFuture<ScopedResource<V>>
            | UnifiedFuture<AsyncScopedResource<V>>
            | UnifiedFuture<ScopedResource<V> | AsyncScopedResource<V>>,
        fn: (value: V) => R | Promise<R>,
    ): Promise<R> {
        const resource = await this.awaitable();

        if (isAsyncScopedResource<V>(resource)) {
            const value = await resource.enterAsync();
            let result: R;
            try {
                result = await fn(value);
            } catch (err) {
                await resource.exitAsync(err);
                throw err;
            }
            await resource.exitAsync();
            return result;
        }

        if (isScopedResource<V>(resource)) {
            const value = resource.enter();
            let result: R;
            try {
                result = await fn(value);
            } catch (err) {
                resource.exit(err);
                throw err;
            }
            resource.exit();
            return result;
        }

        throw new TypeError("Future value is not a scoped resource");
    }
}
