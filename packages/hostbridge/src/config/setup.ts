import { Policy } from "../core/environment/policy";
import { createStore } from "../core/environment/store";
import type { EventLoop } from "../core/loop/event-loop";
import { createEventLoop, setLoop } from "../core/loop/registry";
import type { TaskScope } from "../core/loop/task-scope";
import type { PolicyRegistrar } from "../runtime/types";
import type { HostbridgeConfig } from "./types";

/** Build the store and policy a config describes. The policy is not registered yet. */
export function createPolicy(runtime: PolicyRegistrar, config: HostbridgeConfig): Policy {
    return new Policy(createStore(config.store), {
        runtime,
        hospice: config.hospice,
        logger: config.logger,
    });
}

/** Create the config's loop adapter and make it the process-wide loop. */
export function installLoop(config: HostbridgeConfig, scope?: TaskScope): EventLoop {
    const loop = createEventLoop(config.loop, { workers: config.workers, scope });
    setLoop(loop);
    config.logger.debug("loop", `Installed ${loop.kind} loop`);
    return loop;
}
