import { keepEnvironment } from "../environment/current";
import type { Future } from "../future/future";
import { failureOf } from "../future/helpers";
import { getLoop, makeAwaitable } from "../loop/registry";
import type { AsCompletedCallback, FutureSource } from "./types";
import { UnifiedFuture } from "./unified-future";

type Cursor<T> =
    | { readonly kind: "sync"; readonly iterator: Iterator<Future<T>> }
    | { readonly kind: "async"; readonly iterator: AsyncIterator<Future<T>> };

/**
 * Ordered sequence of futures with one shared cursor. Iterating it (sync or
 * async) or running {@link runAsCompleted} consumes the same source.
 */
export class UnifiedIterator<T> implements Iterable<T>, AsyncIterable<T> {
    private readonly cursor: Cursor<T>;

    constructor(private readonly source: FutureSource<T>) {
        this.cursor =
            Symbol.asyncIterator in source
                ? { kind: "async", iterator: source[Symbol.asyncIterator]() }
                : { kind: "sync", iterator: source[Symbol.iterator]() };
    }

    static fromCall<A extends unknown[], T>(fn: (...args: A) => FutureSource<T>, ...args: A): UnifiedIterator<T> {
        return new UnifiedIterator(fn(...args));
    }

    /** The underlying futures, unconsumed by this wrapper. */
    get futures(): FutureSource<T> {
        return this.source;
    }

    // ── Iteration ────────────────────────────────────────────────────────

    /** Values in order, read with `result()`. Only for synchronous sources. */
    *[Symbol.iterator](): Iterator<T> {
        const { cursor } = this;
        if (cursor.kind === "async") {
            throw new TypeError("Asynchronous future source; iterate with for await");
        }
        for (;;) {
            const step = cursor.iterator.next();
            if (step.done) return;
            yield step.value.result();
        }
    }

    /** Values in order, each awaited through the active loop. */
    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        for (;;) {
            const step = await this.pull();
            if (step.done) return;
            yield await makeAwaitable(step.value);
        }
    }

    // ── As completed ─────────────────────────────────────────────────────

    /**
     * Pull one future at a time, hand it to `callback` through the loop once
     * settled, give the loop a cycle, repeat.
     *
     * The returned future resolves when the source is exhausted or `callback`
     * returns a falsy value other than `undefined`, and rejects when `callback`
     * or the source throws, or when the loop cancels a scheduled step.
     * Cancelling it stops the run before the next callback.
     */
    runAsCompleted(callback: AsCompletedCallback<T>): UnifiedFuture<void> {
        const state = new UnifiedFuture<void>();
        const fail = (error: unknown) => {
            if (!state.done()) state.setException(error);
        };
        const finish = () => {
            if (!state.done()) state.setResult(undefined);
        };

        const schedule = (fn: () => void): void => {
            getLoop()
                .fromThread(fn)
                .addDoneCallback((done) => {
                    const error = failureOf(done);
                    if (error) fail(error);
                });
        };

        const invoke = keepEnvironment((future: Future<T>): boolean => {
            if (state.done()) return false;
            let verdict: unknown;
            try {
                verdict = callback(future);
            } catch (err) {
                fail(err);
                return false;
            }
            if (verdict !== undefined && !verdict) {
                finish();
                return false;
            }
            return true;
        });

        // Whether the next future may be pulled on the current stack.
        const advance = (future: Future<T>): boolean => {
            if (!future.done()) {
                future.addDoneCallback((settled) => {
                    schedule(() => {
                        if (invoke(settled)) drive();
                    });
                });
                return false;
            }
            if (!invoke(future)) return false;

            const cycle = getLoop().nextCycle();
            if (!cycle.done()) {
                cycle.addDoneCallback((done) => {
                    const error = failureOf(done);
                    if (error) {
                        fail(error);
                    } else {
                        drive();
                    }
                });
                return false;
            }
            const error = failureOf(cycle);
            if (error) {
                fail(error);
                return false;
            }
            return true;
        };

        const drive = (): void => {
            const { cursor } = this;
            if (cursor.kind === "async") {
                if (state.done()) return;
                void cursor.iterator.next().then((step) => {
                    if (step.done) {
                        finish();
                    } else if (advance(step.value)) {
                        drive();
                    }
                }, fail);
                return;
            }

            while (!state.done()) {
                let step: IteratorResult<Future<T>>;
                try {
                    step = cursor.iterator.next();
                } catch (err) {
                    fail(err);
                    return;
                }
                if (step.done) {
                    finish();
                    return;
                }
                if (!advance(step.value)) return;
            }
        };

        schedule(drive);
        return state;
    }

    // ── Private ──────────────────────────────────────────────────────────

    private async pull(): Promise<IteratorResult<Future<T>>> {
        return this.cursor.iterator.next();
    }
}
