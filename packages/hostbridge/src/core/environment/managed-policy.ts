import type { EnvironmentData, EnvironmentPolicy, EnvironmentPolicyApi } from "../../runtime/types";
import { ConfigurationError, DeadEnvironmentError } from "../errors";
import { defaultLogger } from "../logger/default";
import type { LoggerContext } from "../logger/types";
import { StateMachine } from "../state-machine/state-machine";
import { bindAuthority, releaseAuthority } from "./current";
import { PolicyState } from "./enums";
import type { EnvironmentAuthority, EnvironmentRef, EnvironmentStore } from "./types";

const POLICY_TRANSITIONS: Record<PolicyState, PolicyState[]> = {
    [PolicyState.Unregistered]: [PolicyState.Registered],
    [PolicyState.Registered]: [PolicyState.Unregistered],
};

/**
 * The object that actually occupies the runtime's registration slot.
 *
 * Wraps one {@link EnvironmentStore} and verifies liveness on every read and
 * write: a stale reference is cleared and logged, and the caller sees "no
 * environment". Each get/set is one synchronous section, so the check and
 * the use cannot be separated by other work.
 */
export class ManagedPolicy implements EnvironmentPolicy, EnvironmentAuthority {
    readonly state: StateMachine<PolicyState>;
    private _api: EnvironmentPolicyApi | null = null;

    constructor(
        readonly store: EnvironmentStore,
        private readonly logger: LoggerContext = defaultLogger,
    ) {
        this.state = new StateMachine<PolicyState>({
            transitions: POLICY_TRANSITIONS,
            initial: PolicyState.Unregistered,
            name: "Policy",
            violation: (message) => new ConfigurationError(message),
        });
    }

    /** API granted by the runtime. Throws `ConfigurationError` while unregistered. */
    get api(): EnvironmentPolicyApi {
        if (this._api === null) {
            throw new ConfigurationError("Policy is not registered");
        }
        return this._api;
    }

    get registered(): boolean {
        return this.state.is(PolicyState.Registered);
    }

    // ── Registration callbacks ───────────────────────────────────────────

    onPolicyRegistered(api: EnvironmentPolicyApi): void {
        this.state.transition(PolicyState.Registered);
        this._api = api;
        bindAuthority(this);
        this.logger.debug("policy", "Successfully registered policy with the runtime");
    }

    onPolicyCleared(): void {
        this._api = null;
        releaseAuthority(this);
        if (this.state.canTransition(PolicyState.Unregistered)) {
            this.state.transition(PolicyState.Unregistered);
        }
        this.logger.debug("policy", "Policy cleared");
    }

    // ── Lookup ───────────────────────────────────────────────────────────

    getCurrentEnvironment(): EnvironmentData | null {
        const ref = this.store.getCurrentEnvironment();
        if (ref === null) return null;

        try {
            return this.resolve(ref);
        } catch (err) {
            if (!(err instanceof DeadEnvironmentError)) throw err;
            this.logger.warn("policy", err.message);
            this.store.setCurrentEnvironment(null);
            return null;
        }
    }

    setEnvironment(environment: EnvironmentData | null): void {
        if (environment !== null && !this.isAlive(environment)) {
            this.logger.warn("policy", `Got dead environment: ${environment.id}`);
            this.store.setCurrentEnvironment(null);
            return;
        }
        this.logger.debug("policy", `Setting environment: ${environment?.id ?? "none"}`);
        this.store.setCurrentEnvironment(environment === null ? null : new WeakRef(environment));
    }

    isAlive(environment: EnvironmentData): boolean {
        return this.api.isAlive(environment);
    }

    // ── Scoped activation ────────────────────────────────────────────────

    runWithEnvironment<T>(environment: EnvironmentData | null, fn: () => T): T {
        return this.store.runWithEnvironment(this.refFor(environment), fn);
    }

    runWithEnvironmentAsync<T>(environment: EnvironmentData | null, fn: () => Promise<T>): Promise<T> {
        return this.store.runWithEnvironmentAsync(this.refFor(environment), fn);
    }

    // ── Private ──────────────────────────────────────────────────────────

    private resolve(ref: EnvironmentRef): EnvironmentData {
        const environment = ref.deref();
        if (environment === undefined) {
            throw new DeadEnvironmentError("Got dead environment: handle was collected");
        }
        if (!this.isAlive(environment)) {
            throw new DeadEnvironmentError(`Got dead environment: ${environment.id}`);
        }
        return environment;
    }

    private refFor(environment: EnvironmentData | null): EnvironmentRef | null {
        if (environment === null) return null;
        if (!this.isAlive(environment)) {
            this.logger.warn("policy", `Got dead environment: ${environment.id}`);
            return null;
        }
        return new WeakRef(environment);
    }
}
