import { Future } from "../future/future";
import { failureOf } from "../future/helpers";
import { defaultLogger } from "../logger/default";
import type { LoggerContext } from "../logger/types";
import type { ScopedResource } from "../unified/types";

/**
 * Maps futures of scoped resources to futures of their entered values, and
 * exits each resource once the consumer pulls the next item or stops.
 */
export class ClosingIterator<T> implements AsyncIterableIterator<Future<T>> {
    private readonly iterator: Iterator<Future<ScopedResource<T>>> | AsyncIterator<Future<ScopedResource<T>>>;
    private previous: Future<ScopedResource<T>> | null = null;

    constructor(
        futures: Iterable<Future<ScopedResource<T>>> | AsyncIterable<Future<ScopedResource<T>>>,
        private readonly logger: LoggerContext = defaultLogger,
    ) {
        this.iterator =
            Symbol.asyncIterator in futures ? futures[Symbol.asyncIterator]() : futures[Symbol.iterator]();
    }

    [Symbol.asyncIterator](): this {
        return this;
    }

    async next(): Promise<IteratorResult<Future<T>>> {
        this.closePrevious();
        const step = await this.iterator.next();
        if (step.done) return { done: true, value: undefined };

        this.previous = step.value;
        return { done: false, value: this.entered(step.value) };
    }

    async return(): Promise<IteratorResult<Future<T>>> {
        this.closePrevious();
        await this.iterator.return?.();
        return { done: true, value: undefined };
    }

    // ── Private ──────────────────────────────────────────────────────────

    private entered(source: Future<ScopedResource<T>>): Future<T> {
        const future = new Future<T>(this.logger);
        source.addDoneCallback((done) => {
            const error = failureOf(done);
            if (error) {
                future.setException(error);
                return;
            }
            try {
                future.setResult(done.result().enter());
            } catch (err) {
                future.setException(err);
            }
        });
        return future;
    }

    private closePrevious(): void {
        const previous = this.previous;
        this.previous = null;
        previous?.addDoneCallback((done) => {
            if (failureOf(done) === null) done.result().exit();
        });
    }
}

export function closeWhenNeeded<T>(
    futures: Iterable<Future<ScopedResource<T>>> | AsyncIterable<Future<ScopedResource<T>>>,
): ClosingIterator<T> {
    return new ClosingIterator(futures);
}
