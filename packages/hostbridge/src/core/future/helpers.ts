import { CancelledError } from "../errors";
import { Future } from "./future";

/** Run `fn` into `future`, unless the future was cancelled before it could start. */
export function runInto<T>(future: Future<T>, fn: () => T): void {
    if (!future.setRunningOrNotifyCancel()) return;

    let value: T;
    try {
        value = fn();
    } catch (err) {
        future.setException(err);
        return;
    }
    future.setResult(value);
}

export function resolved<T>(value: T): Future<T> {
    const future = new Future<T>();
    future.setResult(value);
    return future;
}

export function rejected<T = never>(error: unknown): Future<T> {
    const future = new Future<T>();
    future.setException(error);
    return future;
}

/** The error a settled future ended with: its rejection, `CancelledError` when cancelled, otherwise `null`. */
export function failureOf<T>(future: Future<T>): Error | null {
    if (future.cancelled()) return new CancelledError();
    return future.exception();
}

/** Settle `target` the way `source` settled. A target that is already done is left alone. */
export function copyOutcome<T>(source: Future<T>, target: Future<T>): void {
    if (target.done()) return;
    if (source.cancelled()) {
        target.cancel();
        return;
    }
    const error = source.exception();
    if (error) {
        target.setException(error);
    } else {
        target.setResult(source.result());
    }
}
