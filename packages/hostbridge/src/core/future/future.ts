import { withTimeout } from "es-toolkit";
import { FutureCancelledError, InvalidStateError, toError } from "../errors";
import { defaultLogger } from "../logger/default";
import type { LoggerContext } from "../logger/types";
import { FutureState } from "./enums";
import type { DoneCallback, FutureOutcome } from "./types";

/**
 * Single-assignment result cell, settled from any callback.
 *
 * State machine: `Pending → Running → Resolved | Rejected`, `Pending → Cancelled`.
 * Transitions are monotonic. Done callbacks run once each, in registration
 * order, on whichever stack settles the future (or immediately when the
 * future is already done). A callback that throws is logged and does not
 * affect the others.
 */
export class Future<T> {
    private _state: FutureState = FutureState.Pending;
    private _outcome: FutureOutcome<T> | null = null;
    private _callbacks: DoneCallback<T>[] = [];

    constructor(protected readonly logger: LoggerContext = defaultLogger) {}

    // ── Inspection ───────────────────────────────────────────────────────

    get state(): FutureState {
        return this._state;
    }

    done(): boolean {
        return this._outcome !== null;
    }

    running(): boolean {
        return this._state === FutureState.Running;
    }

    cancelled(): boolean {
        return this._state === FutureState.Cancelled;
    }

    /** The settled value. Throws the rejection, `FutureCancelledError`, or `InvalidStateError` while pending. */
    result(): T {
        const outcome = this.requireOutcome();
        if (outcome.kind === "resolved") return outcome.value;
        if (outcome.kind === "rejected") throw outcome.error;
        throw new FutureCancelledError();
    }

    /** The rejection, or `null` for a resolved future. Throws like {@link result} when cancelled or pending. */
    exception(): Error | null {
        const outcome = this.requireOutcome();
        if (outcome.kind === "rejected") return outcome.error;
        if (outcome.kind === "cancelled") throw new FutureCancelledError();
        return null;
    }

    // ── Settlement ───────────────────────────────────────────────────────

    setResult(value: T): void {
        this.settle({ kind: "resolved", value }, FutureState.Resolved);
    }

    setException(error: unknown): void {
        this.settle({ kind: "rejected", error: toError(error) }, FutureState.Rejected);
    }

    /** Cancel a future that has not started running. Returns whether the future ends up cancelled. */
    cancel(): boolean {
        if (this._state === FutureState.Cancelled) return true;
        if (this._state !== FutureState.Pending) return false;
        this.settle({ kind: "cancelled" }, FutureState.Cancelled);
        return true;
    }

    /**
     * Mark the future as running. Returns `false` if it was cancelled, in
     * which case the work must not start.
     */
    setRunningOrNotifyCancel(): boolean {
        if (this._state === FutureState.Cancelled) return false;
        if (this._state !== FutureState.Pending) {
            throw new InvalidStateError(`Future is already ${this._state}`);
        }
        this._state = FutureState.Running;
        return true;
    }

    // ── Observation ──────────────────────────────────────────────────────

    addDoneCallback(fn: DoneCallback<T>): void {
        if (this.done()) {
            this.invoke(fn);
            return;
        }
        this._callbacks.push(fn);
    }

    /** Promise of the outcome, rejecting with es-toolkit's `TimeoutError` after `timeoutMs`. */
    wait(timeoutMs?: number): Promise<T> {
        const settled = new Promise<T>((resolve, reject) => {
            this.addDoneCallback((future) => {
                try {
                    resolve(future.result());
                } catch (err) {
                    reject(err);
                }
            });
        });
        if (timeoutMs === undefined) return settled;
        return withTimeout(() => settled, timeoutMs);
    }

    // ── Private ──────────────────────────────────────────────────────────

    private requireOutcome(): FutureOutcome<T> {
        if (this._outcome === null) {
            throw new InvalidStateError("Future is not settled yet");
        }
        return this._outcome;
    }

    private settle(outcome: FutureOutcome<T>, state: FutureState): void {
        if (this._outcome !== null) {
            throw new InvalidStateError(`Future is already ${this._state}`);
        }
        this._outcome = outcome;
        this._state = state;

        const callbacks = this._callbacks;
        this._callbacks = [];
        for (const fn of callbacks) {
            this.invoke(fn);
        }
    }

    private invoke(fn: DoneCallback<T>): void {
        try {
            fn(this);
        } catch (err) {
            this.logger.error("future", "Exception in done callback", { error: toError(err) });
        }
    }
}
