import type { ItemSource } from "../../runtime/types";
import type { Future } from "../future/future";
import { bufferFutures } from "../prefetch/buffer";
import { closeWhenNeeded } from "../prefetch/close";
import type { BufferOptions } from "../prefetch/types";
import type { ScopedResource } from "../unified/types";
import { UnifiedFuture } from "../unified/unified-future";
import { UnifiedIterator } from "../unified/unified-iterator";

/** Request one item. A request that fails to start becomes a rejected future. */
export function request<T>(source: ItemSource<T>, index: number): UnifiedFuture<T> {
    return UnifiedFuture.fromCall(() => source.requestAsync(index));
}

/** Request every item in order, pipelined. `prefetch` defaults to the source core's thread count. */
export function requestAll<T>(source: ItemSource<T>, options: BufferOptions = {}): UnifiedIterator<T> {
    return new UnifiedIterator(buffered(source, options));
}

/** As {@link requestAll} for items that must be entered and exited; each is exited once the next is pulled. */
export function requestAllScoped<T>(
    source: ItemSource<ScopedResource<T>>,
    options: BufferOptions = {},
): UnifiedIterator<T> {
    return new UnifiedIterator(closeWhenNeeded(buffered(source, options)));
}

function buffered<T>(source: ItemSource<T>, options: BufferOptions) {
    return bufferFutures(indices(source), {
        prefetch: options.prefetch || source.core.numThreads,
        backlog: options.backlog,
    });
}

function* indices<T>(source: ItemSource<T>): Generator<Future<T>> {
    for (let index = 0; index < source.length; index++) {
        yield source.requestAsync(index);
    }
}
