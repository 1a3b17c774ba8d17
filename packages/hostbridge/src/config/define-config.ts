import { StoreKind } from "../core/environment/enums";
import { ConfigurationError } from "../core/errors";
import { defaultHospice } from "../core/hospice/hospice";
import { createConsoleHandler } from "../core/logger/console-handler";
import { defaultLogger } from "../core/logger/default";
import { LOG_LEVEL_ORDER, Logger } from "../core/logger/logger";
import type { LoggerContext } from "../core/logger/types";
import { LoopKind } from "../core/loop/enums";
import type { DefineConfigInput, HostbridgeConfig } from "./types";

const STORE_KINDS: readonly string[] = Object.values(StoreKind);
const LOOP_KINDS: readonly string[] = Object.values(LoopKind);

export function defineConfig(input: DefineConfigInput = {}): HostbridgeConfig {
    const store = input.store ?? StoreKind.TaskLocal;
    if (!STORE_KINDS.includes(store)) {
        throw new ConfigurationError(`[hostbridge] defineConfig: unknown store "${store}"`);
    }

    const loop = input.loop ?? LoopKind.Node;
    if (!LOOP_KINDS.includes(loop)) {
        throw new ConfigurationError(`[hostbridge] defineConfig: unknown loop "${loop}"`);
    }

    const { workers } = input;
    if (workers !== undefined && (!Number.isInteger(workers) || workers < 1)) {
        throw new ConfigurationError(`[hostbridge] defineConfig: workers must be a positive integer, got ${workers}`);
    }

    if (input.logLevel !== undefined && !(input.logLevel in LOG_LEVEL_ORDER)) {
        throw new ConfigurationError(`[hostbridge] defineConfig: unknown log level "${input.logLevel}"`);
    }

    return Object.freeze({
        store,
        loop,
        workers,
        logger: resolveLogger(input),
        hospice: input.hospice ?? defaultHospice,
    });
}

function resolveLogger(input: DefineConfigInput): LoggerContext {
    if (input.logger) return input.logger;
    if (input.logLevel === undefined) return defaultLogger;

    const logger = new Logger();
    logger.addHandler(createConsoleHandler({ level: input.logLevel }));
    return logger;
}
