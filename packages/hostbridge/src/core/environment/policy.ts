import type { EnvironmentData, EnvironmentPolicyApi, PolicyRegistrar } from "../../runtime/types";
import { defaultHospice, type Hospice } from "../hospice/hospice";
import { defaultLogger } from "../logger/default";
import type { LoggerContext } from "../logger/types";
import { PolicyState } from "./enums";
import { EnvironmentLease, ManagedEnvironment } from "./managed-environment";
import { ManagedPolicy } from "./managed-policy";
import type { EnvironmentStore, PolicyOptions } from "./types";

/**
 * Lifecycle API around a {@link ManagedPolicy}.
 *
 * ```ts
 * const policy = new Policy(new TaskLocalStore(), { runtime });
 * policy.register();
 * const env = policy.newEnvironment();
 * env.use(() => runtime.currentEnvironment()); // env.environment
 * env.dispose();
 * policy.unregister();
 * ```
 */
export class Policy {
    readonly managed: ManagedPolicy;
    readonly hospice: Hospice;
    private readonly registrar: PolicyRegistrar;
    private readonly logger: LoggerContext;

    constructor(store: EnvironmentStore, options: PolicyOptions) {
        this.logger = options.logger ?? defaultLogger;
        this.hospice = options.hospice ?? defaultHospice;
        this.registrar = options.runtime;
        this.managed = new ManagedPolicy(store, this.logger);
    }

    get api(): EnvironmentPolicyApi {
        return this.managed.api;
    }

    get registered(): boolean {
        return this.managed.registered;
    }

    register(): void {
        this.managed.state.assertState(PolicyState.Unregistered);
        this.registrar.registerPolicy(this.managed);
    }

    unregister(): void {
        this.managed.api.unregisterPolicy();
    }

    /** Register, run `fn`, and unregister on every exit path. */
    async run<T>(fn: (policy: this) => T | Promise<T>): Promise<T> {
        this.register();
        try {
            return await fn(this);
        } finally {
            if (this.registered) this.unregister();
        }
    }

    /** Create an isolated environment with its own core. Call `dispose()` on it when done. */
    newEnvironment(): ManagedEnvironment {
        const api = this.managed.api;
        const environment = api.createEnvironment();
        const core = api.getCore(environment);
        this.logger.debug("policy", `Created new environment ${environment.id}`);
        const lease = new EnvironmentLease(environment, core, this.managed, this.hospice, this.logger);
        return new ManagedEnvironment(lease, this.managed);
    }

    currentEnvironment(): EnvironmentData | null {
        return this.managed.getCurrentEnvironment();
    }
}
