import type {
    EnvironmentData,
    EnvironmentPolicy,
    EnvironmentPolicyApi,
    NativeCore,
    PolicyRegistrar,
} from "../../runtime/types";
import { ConfigurationError } from "../errors";

/** API handed to the attached policy: `unregisterPolicy()` detaches it instead of freeing the slot. */
class ProxiedApi implements EnvironmentPolicyApi {
    constructor(
        private readonly api: EnvironmentPolicyApi,
        private readonly proxy: ProxyPolicy,
    ) {}

    createEnvironment(): EnvironmentData {
        return this.api.createEnvironment();
    }

    destroyEnvironment(environment: EnvironmentData): void {
        this.api.destroyEnvironment(environment);
    }

    isAlive(environment: EnvironmentData): boolean {
        return this.api.isAlive(environment);
    }

    getCore(environment: EnvironmentData): NativeCore {
        return this.api.getCore(environment);
    }

    unregisterPolicy(): void {
        this.proxy.forceUnregister();
    }
}

/**
 * Decorator that keeps the runtime's single registration slot for itself and
 * forwards to whichever policy is attached through it.
 *
 * Test harnesses install one proxy per process and hand it to policies as
 * their `runtime`, so a failing test can always {@link forceUnregister} the
 * policy it left behind.
 */
export class ProxyPolicy implements EnvironmentPolicy, PolicyRegistrar {
    private _api: EnvironmentPolicyApi | null = null;
    private _policy: EnvironmentPolicy | null = null;

    constructor(private readonly runtime: PolicyRegistrar) {}

    get installed(): boolean {
        return this._api !== null;
    }

    get attached(): EnvironmentPolicy | null {
        return this._policy;
    }

    /** Occupy the runtime's registration slot. */
    install(): void {
        this.runtime.registerPolicy(this);
    }

    /** Detach any policy and free the runtime's slot. */
    uninstall(): void {
        this._api?.unregisterPolicy();
    }

    // ── PolicyRegistrar ──────────────────────────────────────────────────

    registerPolicy(policy: EnvironmentPolicy): void {
        if (this._api === null) {
            throw new ConfigurationError("This proxy is not installed");
        }
        if (this._policy !== null) {
            throw new ConfigurationError("A policy is already registered");
        }

        this._policy = policy;
        try {
            policy.onPolicyRegistered(new ProxiedApi(this._api, this));
        } catch (err) {
            this._policy = null;
            throw err;
        }
    }

    /** Detach the attached policy, keeping the proxy installed. No-op without one. */
    forceUnregister(): void {
        const policy = this._policy;
        if (policy === null) return;
        this._policy = null;
        policy.onPolicyCleared();
    }

    // ── EnvironmentPolicy ────────────────────────────────────────────────

    onPolicyRegistered(api: EnvironmentPolicyApi): void {
        this._api = api;
    }

    onPolicyCleared(): void {
        try {
            this.forceUnregister();
        } finally {
            this._api = null;
        }
    }

    getCurrentEnvironment(): EnvironmentData | null {
        return this.requirePolicy().getCurrentEnvironment();
    }

    setEnvironment(environment: EnvironmentData | null): void {
        this.requirePolicy().setEnvironment(environment);
    }

    isAlive(environment: EnvironmentData): boolean {
        return this.requirePolicy().isAlive(environment);
    }

    private requirePolicy(): EnvironmentPolicy {
        if (this._policy === null) {
            throw new ConfigurationError("This proxy is not attached to a policy");
        }
        return this._policy;
    }
}
