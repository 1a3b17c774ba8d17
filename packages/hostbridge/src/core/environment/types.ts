import type { EnvironmentData, PolicyRegistrar } from "../../runtime/types";
import type { Hospice } from "../hospice/hospice";
import type { LoggerContext } from "../logger/types";
import type { StoreKind } from "./enums";

/** Stores never own an environment; they only point at it. */
export type EnvironmentRef = WeakRef<EnvironmentData>;

/**
 * Holds which environment is active for the current execution context.
 * Strategies differ only in what "current execution context" means.
 */
export interface EnvironmentStore {
    readonly kind: StoreKind;
    getCurrentEnvironment(): EnvironmentRef | null;
    setCurrentEnvironment(ref: EnvironmentRef | null): void;
    /** Make `ref` current while `fn` runs, then restore the previous value. */
    runWithEnvironment<T>(ref: EnvironmentRef | null, fn: () => T): T;
    /** As {@link runWithEnvironment}, across every await inside `fn`. */
    runWithEnvironmentAsync<T>(ref: EnvironmentRef | null, fn: () => Promise<T>): Promise<T>;
}

/** Whoever can answer "which environment is current" and switch to one for a call. */
export interface EnvironmentAuthority {
    getCurrentEnvironment(): EnvironmentData | null;
    runWithEnvironment<T>(environment: EnvironmentData | null, fn: () => T): T;
}

export type PolicyOptions = {
    /** Registration slot: the native runtime itself, or a {@link ProxyPolicy} in front of it. */
    runtime: PolicyRegistrar;
    hospice?: Hospice;
    logger?: LoggerContext;
};
