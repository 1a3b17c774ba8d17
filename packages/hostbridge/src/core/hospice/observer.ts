import type { WeakObserver } from "./types";

/** {@link WeakObserver} backed by a `FinalizationRegistry`. Callbacks must not reference the target. */
export class FinalizationObserver implements WeakObserver {
    private readonly registry = new FinalizationRegistry<() => void>((onCollected) => {
        onCollected();
    });

    observe(target: object, onCollected: () => void): void {
        this.registry.register(target, onCollected);
    }
}
