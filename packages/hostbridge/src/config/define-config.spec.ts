/**
 * Contract: defineConfig / createPolicy / installLoop.
 *
 * Sections:
 *   1. Defaults
 *   2. Validation
 *   3. Building a policy and a loop from the config
 */
import { afterEach, describe, expect, it } from "vitest";
import { StoreKind } from "../core/environment/enums";
import { TaskLocalStore, ThreadLocalStore } from "../core/environment/store";
import { ConfigurationError } from "../core/errors";
import { defaultHospice, Hospice } from "../core/hospice/hospice";
import { defaultLogger } from "../core/logger/default";
import { Logger } from "../core/logger/logger";
import { LoopKind } from "../core/loop/enums";
import { NodeEventLoop } from "../core/loop/node-loop";
import { getLoop, NO_LOOP, setLoop } from "../core/loop/registry";
import { ScopeEventLoop } from "../core/loop/scope-loop";
import { TaskScope } from "../core/loop/task-scope";
import { InProcessRuntime } from "../testing/in-process-runtime";
import { defineConfig } from "./define-config";
import { createPolicy, installLoop } from "./setup";

afterEach(() => {
    setLoop(NO_LOOP);
});

describe("defineConfig()", () => {
    // ── 1. Defaults ───────────────────────────────────────────────────

    it("defaults to task-local environments on the Node loop", () => {
        const config = defineConfig();
        expect(config.store).toBe(StoreKind.TaskLocal);
        expect(config.loop).toBe(LoopKind.Node);
        expect(config.workers).toBeUndefined();
        expect(config.logger).toBe(defaultLogger);
        expect(config.hospice).toBe(defaultHospice);
    });

    it("returns a frozen config", () => {
        expect(Object.isFrozen(defineConfig())).toBe(true);
    });

    it("keeps an explicit logger and hospice", () => {
        const logger = new Logger();
        const hospice = new Hospice({ logger });
        const config = defineConfig({ logger, hospice, logLevel: "debug" });
        expect(config.logger).toBe(logger);
        expect(config.hospice).toBe(hospice);
    });

    it("creates a dedicated logger for a log level", () => {
        const config = defineConfig({ logLevel: "debug" });
        expect(config.logger).toBeInstanceOf(Logger);
        expect(config.logger).not.toBe(defaultLogger);
    });

    // ── 2. Validation ─────────────────────────────────────────────────

    it.each([0, -1, 1.5])("rejects workers = %s", (workers) => {
        expect(() => defineConfig({ workers })).toThrow(ConfigurationError);
    });

    it("rejects an unknown store", () => {
        const input = JSON.parse('{ "store": "shared" }');
        expect(() => defineConfig(input)).toThrow('unknown store "shared"');
    });

    it("rejects an unknown log level", () => {
        const input = JSON.parse('{ "logLevel": "verbose" }');
        expect(() => defineConfig(input)).toThrow('unknown log level "verbose"');
    });

    // ── 3. Building from the config ───────────────────────────────────

    it("createPolicy() uses the configured store, logger and hospice", () => {
        const logger = new Logger();
        const hospice = new Hospice({ logger });
        const config = defineConfig({ store: StoreKind.ThreadLocal, logger, hospice });
        const policy = createPolicy(new InProcessRuntime(), config);

        expect(policy.managed.store).toBeInstanceOf(ThreadLocalStore);
        expect(policy.hospice).toBe(hospice);
        expect(policy.registered).toBe(false);
    });

    it("createPolicy() defaults to a task-local store", () => {
        const policy = createPolicy(new InProcessRuntime(), defineConfig({ logger: new Logger() }));
        expect(policy.managed.store).toBeInstanceOf(TaskLocalStore);
    });

    it("installLoop() installs the configured adapter", () => {
        const loop = installLoop(defineConfig({ workers: 2, logger: new Logger() }));
        expect(loop).toBeInstanceOf(NodeEventLoop);
        expect(getLoop()).toBe(loop);
    });

    it("installLoop() binds the scope loop to the given scope", () => {
        const scope = new TaskScope();
        const loop = installLoop(defineConfig({ loop: LoopKind.Scope, logger: new Logger() }), scope);
        expect(loop).toBeInstanceOf(ScopeEventLoop);
        expect(getLoop()).toBe(loop);
    });

    it("installLoop() leaves no loop installed when the scope loop has no scope", () => {
        expect(() => installLoop(defineConfig({ loop: LoopKind.Scope, logger: new Logger() }))).toThrow(
            ConfigurationError,
        );
        expect(getLoop()).toBe(NO_LOOP);
    });
});
