import type { Future } from "../core/future/future";

/**
 * Capability surface of the native runtime.
 *
 * hostbridge never creates or frees native state itself; it only talks to
 * these interfaces. An addon binding implements them, and so does
 * {@link InProcessRuntime} for tests.
 */

/** Opaque identity handle of one isolated runtime instance. Owned by the runtime. */
export interface EnvironmentData {
    readonly id: number;
}

/** Native core backing exactly one environment. */
export interface NativeCore {
    readonly id: number;
    /** Worker parallelism the core runs its requests with. */
    readonly numThreads: number;
}

/** API the runtime hands to a policy once it occupies the registration slot. */
export interface EnvironmentPolicyApi {
    createEnvironment(): EnvironmentData;
    destroyEnvironment(environment: EnvironmentData): void;
    isAlive(environment: EnvironmentData): boolean;
    getCore(environment: EnvironmentData): NativeCore;
    /** Release the registration slot. The runtime calls `onPolicyCleared` on the registered policy. */
    unregisterPolicy(): void;
}

/** What the runtime consults on every call for "which environment is current". */
export interface EnvironmentPolicy {
    onPolicyRegistered(api: EnvironmentPolicyApi): void;
    onPolicyCleared(): void;
    getCurrentEnvironment(): EnvironmentData | null;
    setEnvironment(environment: EnvironmentData | null): void;
    isAlive(environment: EnvironmentData): boolean;
}

/** The single process-wide policy registration slot. */
export interface PolicyRegistrar {
    registerPolicy(policy: EnvironmentPolicy): void;
}

export interface NativeRuntime extends PolicyRegistrar {
    /** Per-call hook: asks the registered policy for the current environment. */
    currentEnvironment(): EnvironmentData;
}

/** Async per-item request primitive exposed by a native object (a clip, a stream, a table). */
export interface ItemSource<T> {
    readonly length: number;
    readonly core: NativeCore;
    requestAsync(index: number): Future<T>;
}
