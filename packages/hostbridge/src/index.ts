// ── Config ──────────────────────────────────────────────────────────
export { defineConfig } from "./config/define-config";
export { createPolicy, installLoop } from "./config/setup";
export type { DefineConfigInput, HostbridgeConfig } from "./config/types";
// ── Errors ──────────────────────────────────────────────────────────
export {
    AbortError,
    CancelledError,
    ConfigurationError,
    DeadEnvironmentError,
    FutureCancelledError,
    IllegalTransitionError,
    InvalidStateError,
    ResourceLeakWarning,
    ScopeCancelledError,
} from "./core/errors";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { defaultLogger } from "./core/logger/default";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LogHandler, LogLevel, LoggerContext } from "./core/logger/types";
// ── Environment ─────────────────────────────────────────────────────
export { keepEnvironment } from "./core/environment/current";
export { EnvironmentState, PolicyState, StoreKind } from "./core/environment/enums";
export { ManagedEnvironment } from "./core/environment/managed-environment";
export { ManagedPolicy } from "./core/environment/managed-policy";
export { Policy } from "./core/environment/policy";
export { ProxyPolicy } from "./core/environment/proxy-policy";
export { createStore, GlobalStore, TaskLocalStore, ThreadLocalStore } from "./core/environment/store";
export type { EnvironmentRef, EnvironmentStore, PolicyOptions } from "./core/environment/types";
// ── Hospice ─────────────────────────────────────────────────────────
export { HospiceStage } from "./core/hospice/enums";
export { defaultHospice, Hospice } from "./core/hospice/hospice";
export type { HospiceId, HospiceOptions, WeakObserver } from "./core/hospice/types";
// ── Loop ────────────────────────────────────────────────────────────
export { currentSignal } from "./core/loop/cancellation";
export { LoopKind } from "./core/loop/enums";
export { EventLoop, NoEventLoop } from "./core/loop/event-loop";
export { NodeEventLoop } from "./core/loop/node-loop";
export {
    createEventLoop,
    fromThread,
    getLoop,
    makeAwaitable,
    NO_LOOP,
    setLoop,
    toThread,
} from "./core/loop/registry";
export { ScopeEventLoop } from "./core/loop/scope-loop";
export { TaskScope } from "./core/loop/task-scope";
export type { CreateLoopOptions, LoopOptions, ScopedTask } from "./core/loop/types";
// ── Futures ─────────────────────────────────────────────────────────
export { FutureState } from "./core/future/enums";
export { Future } from "./core/future/future";
export type { DoneCallback } from "./core/future/types";
export { unifiedFuture, unifiedIterator } from "./core/unified/helpers";
export type { AsCompletedCallback, AsyncScopedResource, FutureSource, ScopedResource } from "./core/unified/types";
export { UnifiedFuture } from "./core/unified/unified-future";
export { UnifiedIterator } from "./core/unified/unified-iterator";
// ── Requests ────────────────────────────────────────────────────────
export { bufferFutures, FutureBuffer } from "./core/prefetch/buffer";
export { ClosingIterator, closeWhenNeeded } from "./core/prefetch/close";
export type { BufferOptions } from "./core/prefetch/types";
export { request, requestAll, requestAllScoped } from "./core/requests/requests";
// ── Native runtime surface ──────────────────────────────────────────
export type {
    EnvironmentData,
    EnvironmentPolicy,
    EnvironmentPolicyApi,
    ItemSource,
    NativeCore,
    NativeRuntime,
    PolicyRegistrar,
} from "./runtime/types";
// ── Testing ─────────────────────────────────────────────────────────
export { InProcessRuntime, InProcessSource } from "./testing/in-process-runtime";
export type { InProcessRuntimeOptions, Producer, SourceOptions } from "./testing/in-process-runtime";
