import { availableParallelism } from "node:os";
import { ConfigurationError } from "../errors";
import type { Future } from "../future/future";
import { failureOf } from "../future/helpers";
import type { BufferOptions } from "./types";

type SourceFailure = { error: unknown };

/**
 * Bounded request pipeline over a lazy sequence of futures.
 *
 * Pulling from the source issues the request. At most `prefetch` pulled
 * futures are unsettled at once and at most `backlog` wait unconsumed;
 * consumers receive futures strictly in source order. After a request fails
 * or the consumer stops, nothing more is pulled; requests already issued run
 * to completion.
 */
export class FutureBuffer<T> implements AsyncIterableIterator<Future<T>> {
    readonly prefetch: number;
    readonly backlog: number;

    private readonly iterator: Iterator<Future<T>>;
    private readonly reorder = new Map<number, Future<T>>();
    private _submitted = 0;
    private _cursor = 0;
    private _running = 0;
    private _finished = false;
    private _started = false;
    private _failure: SourceFailure | null = null;
    private readonly waiters: (() => void)[] = [];

    constructor(futures: Iterable<Future<T>>, options: BufferOptions = {}) {
        assertCount("prefetch", options.prefetch);
        assertCount("backlog", options.backlog);
        this.prefetch = options.prefetch || availableParallelism();
        this.backlog = Math.max(options.backlog ?? this.prefetch * 3, this.prefetch);
        this.iterator = futures[Symbol.iterator]();
    }

    /** Requests issued and not yet settled. */
    get running(): number {
        return this._running;
    }

    /** Requests issued and not yet handed to the consumer. */
    get buffered(): number {
        return this.reorder.size;
    }

    get finished(): boolean {
        return this._finished;
    }

    [Symbol.asyncIterator](): this {
        return this;
    }

    async next(): Promise<IteratorResult<Future<T>>> {
        if (!this._started) {
            this._started = true;
            this.refill();
        }

        for (;;) {
            const future = this.reorder.get(this._cursor);
            if (future !== undefined) {
                this.reorder.delete(this._cursor);
                this._cursor++;
                this.refill();
                return { done: false, value: future };
            }

            if (this._failure) {
                const { error } = this._failure;
                this._failure = null;
                throw error;
            }
            if (this._finished) return { done: true, value: undefined };

            await new Promise<void>((resolve) => {
                this.waiters.push(resolve);
            });
        }
    }

    /** Stop pulling and close the source. Futures already buffered are dropped. */
    async return(): Promise<IteratorResult<Future<T>>> {
        this.finish();
        this.reorder.clear();
        this.iterator.return?.();
        return { done: true, value: undefined };
    }

    // ── Private ──────────────────────────────────────────────────────────

    private refill(): void {
        while (!this._finished && this._running < this.prefetch && this.reorder.size < this.backlog) {
            this.requestNext();
        }
    }

    private requestNext(): void {
        let step: IteratorResult<Future<T>>;
        try {
            step = this.iterator.next();
        } catch (err) {
            this._failure = { error: err };
            this.finish();
            return;
        }
        if (step.done) {
            this.finish();
            return;
        }

        this.reorder.set(this._submitted++, step.value);
        this._running++;
        step.value.addDoneCallback(this.onSettled);
    }

    private readonly onSettled = (future: Future<T>): void => {
        this._running--;
        if (!this._finished) {
            if (failureOf(future)) {
                this.finish();
            } else {
                this.refill();
            }
        }
        this.wake();
    };

    private finish(): void {
        this._finished = true;
        this.wake();
    }

    private wake(): void {
        for (const resolve of this.waiters.splice(0)) {
            resolve();
        }
    }
}

function assertCount(name: keyof BufferOptions, value: number | undefined): void {
    if (value === undefined) return;
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(
            `[hostbridge] bufferFutures: ${name} must be a non-negative integer, got ${value}`,
        );
    }
}

export function bufferFutures<T>(futures: Iterable<Future<T>>, options: BufferOptions = {}): FutureBuffer<T> {
    return new FutureBuffer(futures, options);
}
