import type { Future } from "../future/future";
import type { FutureSource } from "./types";
import { UnifiedFuture } from "./unified-future";
import { UnifiedIterator } from "./unified-iterator";

/** Wrap a function returning a future or promise so that it returns a {@link UnifiedFuture}. Throws become rejections. */
export function unifiedFuture<A extends unknown[], T>(
    fn: (...args: A) => Future<T> | PromiseLike<T>,
): (...args: A) => UnifiedFuture<T> {
    return (...args: A) => UnifiedFuture.fromCall(fn, ...args);
}

/** Wrap a function returning futures (a generator, a buffer) so that it returns a {@link UnifiedIterator}. */
export function unifiedIterator<A extends unknown[], T>(
    fn: (...args: A) => FutureSource<T>,
): (...args: A) => UnifiedIterator<T> {
    return (...args: A) => UnifiedIterator.fromCall(fn, ...args);
}
