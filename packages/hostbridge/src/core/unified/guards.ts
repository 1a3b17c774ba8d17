import type { AsyncScopedResource, ScopedResource } from "./types";

export function isScopedResource<V>(value: unknown): value is ScopedResource<V> {
    return (
        typeof value === "object" &&
        value !== null &&
        "enter" in value &&
        typeof value.enter === "function" &&
        "exit" in value &&
        typeof value.exit === "function"
    );
}

export function isAsyncScopedResource<V>(value: unknown): value is AsyncScopedResource<V> {
    return (
        typeof value === "object" &&
        value !== null &&
        "enterAsync" in value &&
        typeof value.enterAsync === "function" &&
        "exitAsync" in value &&
        typeof value.exitAsync === "function"
    );
}
