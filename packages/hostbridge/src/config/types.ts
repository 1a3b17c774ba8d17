import type { StoreKind } from "../core/environment/enums";
import type { Hospice } from "../core/hospice/hospice";
import type { LogLevel, LoggerContext } from "../core/logger/types";
import type { LoopKind } from "../core/loop/enums";

// ── Input types (what users pass to defineConfig()) ──────────────────

export interface DefineConfigInput {
    /** What "current environment" is scoped to. Defaults to `StoreKind.TaskLocal`. */
    store?: StoreKind;
    /** Loop adapter to install. Defaults to `LoopKind.Node`. */
    loop?: LoopKind;
    /** Bound on concurrent `toThread` work. Defaults to `os.availableParallelism()`. */
    workers?: number;
    /** Logger for every component built from the config. Takes precedence over `logLevel`. */
    logger?: LoggerContext;
    /** Minimum level of a console logger created for this config. */
    logLevel?: LogLevel;
    /** Hospice receiving disposed cores. Defaults to the shared one. */
    hospice?: Hospice;
}

// ── Resolved config ──────────────────────────────────────────────────

export interface HostbridgeConfig {
    readonly store: StoreKind;
    readonly loop: LoopKind;
    readonly workers: number | undefined;
    readonly logger: LoggerContext;
    readonly hospice: Hospice;
}
