import type { LoggerContext } from "../logger/types";
import type { HospiceStage } from "./enums";

export type HospiceId = number;

/** Single-fire notification when `target` becomes unreachable. */
export interface WeakObserver {
    observe(target: object, onCollected: () => void): void;
}

export type HospiceOptions = {
    logger?: LoggerContext;
    observer?: WeakObserver;
};

export interface HospiceEntry {
    readonly id: HospiceId;
    readonly core: object;
    stage: HospiceStage;
}
