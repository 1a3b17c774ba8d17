import type { Future } from "./future";

export type FutureOutcome<T> =
    | { kind: "resolved"; value: T }
    | { kind: "rejected"; error: Error }
    | { kind: "cancelled" };

export type DoneCallback<T> = (future: Future<T>) => void;
