import { ConfigurationError, toError } from "../errors";
import { keepEnvironment } from "../environment/current";
import type { Future } from "../future/future";
import { defaultLogger } from "../logger/default";
import { LoopKind } from "./enums";
import { type EventLoop, NoEventLoop } from "./event-loop";
import { NodeEventLoop } from "./node-loop";
import { ScopeEventLoop } from "./scope-loop";
import type { CreateLoopOptions } from "./types";

export const NO_LOOP: EventLoop = new NoEventLoop();

let current: EventLoop = NO_LOOP;

export function getLoop(): EventLoop {
    return current;
}

/**
 * Install `loop` as the process-wide loop. The previous loop is detached
 * first; if `loop.attach()` throws, the no-op loop is installed instead
 * and the error propagates.
 */
export function setLoop(loop: EventLoop): void {
    const previous = current;
    current = NO_LOOP;
    previous.detach();

    try {
        loop.attach();
    } catch (err) {
        defaultLogger.warn("loop", `Failed to attach ${loop.kind} loop, falling back to none`, {
            error: toError(err),
        });
        throw err;
    }
    current = loop;
}

/** Schedule `fn` onto the current loop, in the environment active right now. */
export function fromThread<T>(fn: () => T): Future<T> {
    return current.fromThread(keepEnvironment(fn));
}

/** Run `fn` as separate work on the current loop, in the environment active right now. */
export function toThread<T>(fn: () => T | Promise<T>): Promise<T> {
    return current.toThread(keepEnvironment(fn));
}

/** Await a future through the current loop. */
export function makeAwaitable<T>(future: Future<T>): Promise<T> {
    return current.awaitFuture(future);
}

export function createEventLoop(kind: LoopKind, options: CreateLoopOptions = {}): EventLoop {
    switch (kind) {
        case LoopKind.None:
            return NO_LOOP;
        case LoopKind.Node:
            return new NodeEventLoop(options);
        case LoopKind.Scope:
            if (!options.scope) {
                throw new ConfigurationError("A task scope is required for the scope loop");
            }
            return new ScopeEventLoop(options.scope, options);
    }
}
