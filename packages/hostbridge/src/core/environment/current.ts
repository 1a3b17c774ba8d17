import { AsyncResource } from "node:async_hooks";
import type { EnvironmentAuthority } from "./types";

let authority: EnvironmentAuthority | null = null;

/** Publish the registered policy as the process-wide source of the current environment. */
export function bindAuthority(next: EnvironmentAuthority): void {
    authority = next;
}

/** Withdraw `previous` if it is still the published authority. */
export function releaseAuthority(previous: EnvironmentAuthority): void {
    if (authority === previous) authority = null;
}

export function currentAuthority(): EnvironmentAuthority | null {
    return authority;
}

/**
 * Bind `fn` to the async context and the environment active right now,
 * so it sees both again when it runs later from another callback.
 */
export function keepEnvironment<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => TResult,
): (...args: TArgs) => TResult {
    const bound = AsyncResource.bind(fn);
    const policy = authority;
    if (!policy) return bound;

    const environment = policy.getCurrentEnvironment();
    if (!environment) return bound;

    return (...args: TArgs) => policy.runWithEnvironment(environment, () => bound(...args));
}
