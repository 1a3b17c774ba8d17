/**
 * Error taxonomy shared by every hostbridge module.
 *
 * `ConfigurationError` is immediate and non-retryable. `DeadEnvironmentError`
 * is raised and handled inside the policy. `CancelledError` is the loop-agnostic
 * cancellation condition; each loop adapter translates it into its own native
 * error at the boundary.
 */

/** No policy is registered, or an object is used outside the state that allows it. */
export class ConfigurationError extends Error {
    override readonly name = "ConfigurationError";
}

/** An environment handle was collected or destroyed by the native side. */
export class DeadEnvironmentError extends Error {
    override readonly name = "DeadEnvironmentError";
}

/** Loop-agnostic cancellation condition raised at suspension points. */
export class CancelledError extends Error {
    override readonly name = "CancelledError";

    constructor(message = "Operation was cancelled") {
        super(message);
    }
}

/** Raised when reading the outcome of a cancelled {@link Future}. Native error of the no-op loop. */
export class FutureCancelledError extends Error {
    override readonly name = "FutureCancelledError";

    constructor(message = "Future was cancelled") {
        super(message);
    }
}

/** Native cancellation error of the Node loop adapter. */
export class AbortError extends Error {
    override readonly name = "AbortError";

    constructor(message = "The operation was aborted", options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Native cancellation error of the structured-scope loop adapter. */
export class ScopeCancelledError extends Error {
    override readonly name = "ScopeCancelledError";

    constructor(message = "Task scope was cancelled") {
        super(message);
    }
}

/** A future was read before it settled, or settled twice. */
export class InvalidStateError extends Error {
    override readonly name = "InvalidStateError";
}

/** A state machine was asked for a transition its table does not allow. */
export class IllegalTransitionError extends Error {
    override readonly name = "IllegalTransitionError";
}

/** Non-fatal diagnostic: a native resource outlived the point where it should have been released. */
export class ResourceLeakWarning extends Error {
    override readonly name = "ResourceLeakWarning";
}

export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
