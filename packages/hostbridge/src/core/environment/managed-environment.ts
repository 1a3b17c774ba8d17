import type { EnvironmentData, NativeCore } from "../../runtime/types";
import { DeadEnvironmentError, ResourceLeakWarning, toError } from "../errors";
import type { Hospice } from "../hospice/hospice";
import type { LoggerContext } from "../logger/types";
import { StateMachine } from "../state-machine/state-machine";
import { EnvironmentState } from "./enums";
import type { ManagedPolicy } from "./managed-policy";

const ENVIRONMENT_TRANSITIONS: Record<EnvironmentState, EnvironmentState[]> = {
    [EnvironmentState.Created]: [EnvironmentState.InUse, EnvironmentState.Disposed],
    [EnvironmentState.InUse]: [EnvironmentState.Created, EnvironmentState.Disposed],
    [EnvironmentState.Disposed]: [],
};

/**
 * The native state behind one {@link ManagedEnvironment}, kept apart from the
 * wrapper so it can still be released after the wrapper was collected.
 */
export class EnvironmentLease {
    private _environment: EnvironmentData | null;
    private _core: NativeCore | null;

    constructor(
        environment: EnvironmentData,
        core: NativeCore,
        private readonly policy: ManagedPolicy,
        private readonly hospice: Hospice,
        private readonly logger: LoggerContext,
    ) {
        this._environment = environment;
        this._core = core;
    }

    get environment(): EnvironmentData | null {
        return this._environment;
    }

    get core(): NativeCore | null {
        return this._core;
    }

    get released(): boolean {
        return this._environment === null;
    }

    /** Hand the core to the hospice and destroy the environment. No-op once released. */
    release(): void {
        const environment = this._environment;
        const core = this._core;
        if (environment === null || core === null) return;

        const api = this.policy.api;
        this.logger.debug("environment", `Disposing environment ${environment.id}`);
        this.hospice.admit(environment, core);
        api.destroyEnvironment(environment);
        this._environment = null;
        this._core = null;
    }

    /** Called when the owning wrapper was collected without being disposed. */
    abandon(): void {
        const environment = this._environment;
        if (environment === null) return;

        const warning = new ResourceLeakWarning(
            `Environment ${environment.id} was collected without dispose(). This might cause leaks.`,
        );
        this.logger.warn("environment", warning.message, { warning });
        try {
            this.release();
        } catch (err) {
            this.logger.error("environment", `Could not dispose abandoned environment ${environment.id}`, {
                error: toError(err),
            });
        }
    }
}

const abandoned = new FinalizationRegistry<EnvironmentLease>((lease) => {
    lease.abandon();
});

/**
 * Application-facing handle of one environment and its core.
 *
 * States: `Created ⇄ InUse → Disposed`. Always call {@link dispose};
 * a wrapper collected without it logs a `ResourceLeakWarning`.
 */
export class ManagedEnvironment {
    readonly state: StateMachine<EnvironmentState>;
    private _depth = 0;

    constructor(
        private readonly lease: EnvironmentLease,
        private readonly policy: ManagedPolicy,
    ) {
        this.state = new StateMachine<EnvironmentState>({
            transitions: ENVIRONMENT_TRANSITIONS,
            initial: EnvironmentState.Created,
            name: "ManagedEnvironment",
            violation: (message) => new DeadEnvironmentError(message),
        });
        abandoned.register(this, lease, this);
    }

    /** The runtime's handle. Throws `DeadEnvironmentError` once disposed. */
    get environment(): EnvironmentData {
        const environment = this.lease.environment;
        if (environment === null) throw this.disposedError();
        return environment;
    }

    get core(): NativeCore {
        const core = this.lease.core;
        if (core === null) throw this.disposedError();
        return core;
    }

    get disposed(): boolean {
        return this.lease.released;
    }

    // ── Activation ───────────────────────────────────────────────────────

    /** Make this environment current while `fn` runs; the previous one is restored on every exit path. */
    use<T>(fn: () => T): T {
        const environment = this.environment;
        this.enter();
        try {
            return this.policy.runWithEnvironment(environment, fn);
        } finally {
            this.leave();
        }
    }

    async useAsync<T>(fn: () => Promise<T>): Promise<T> {
        const environment = this.environment;
        this.enter();
        try {
            return await this.policy.runWithEnvironmentAsync(environment, fn);
        } finally {
            this.leave();
        }
    }

    /** Make this environment current without remembering the previous one. */
    switch(): void {
        this.policy.setEnvironment(this.environment);
    }

    // ── Disposal ─────────────────────────────────────────────────────────

    /** Idempotent. The core goes to the hospice rather than being freed right away. */
    dispose(): void {
        if (this.disposed) return;
        this.lease.release();
        abandoned.unregister(this);
        this.state.transition(EnvironmentState.Disposed);
    }

    // ── Private ──────────────────────────────────────────────────────────

    private enter(): void {
        if (this._depth++ === 0) this.state.transition(EnvironmentState.InUse);
    }

    private leave(): void {
        if (--this._depth === 0 && this.state.is(EnvironmentState.InUse)) {
            this.state.transition(EnvironmentState.Created);
        }
    }

    private disposedError(): DeadEnvironmentError {
        return new DeadEnvironmentError("Environment has been disposed");
    }
}
