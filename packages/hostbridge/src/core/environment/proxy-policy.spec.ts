/**
 * Contract: ProxyPolicy — a permanent occupant of the registration slot that
 * forwards to an attached policy and can detach it by force.
 *
 * Sections:
 *   1. Installation
 *   2. Attaching policies
 *   3. Force-unregister
 *   4. Delegation without a policy
 */
import { afterEach, describe, expect, it } from "vitest";
import { InProcessRuntime } from "../../testing/in-process-runtime";
import { ConfigurationError } from "../errors";
import { Hospice } from "../hospice/hospice";
import { Logger } from "../logger/logger";
import { Policy } from "./policy";
import { ProxyPolicy } from "./proxy-policy";
import { GlobalStore } from "./store";

let proxy: ProxyPolicy | null = null;

function setup() {
    const runtime = new InProcessRuntime();
    const created = new ProxyPolicy(runtime);
    proxy = created;
    const logger = new Logger();
    const hospice = new Hospice({ logger, observer: { observe: () => undefined } });
    const createPolicy = () => new Policy(new GlobalStore(), { runtime: created, hospice, logger });
    return { runtime, proxy: created, createPolicy };
}

afterEach(() => {
    if (proxy?.installed) proxy.uninstall();
    proxy = null;
});

describe("ProxyPolicy", () => {
    // ── 1. Installation ───────────────────────────────────────────────

    it("install() occupies the runtime's slot", () => {
        const { runtime, proxy } = setup();
        proxy.install();
        expect(proxy.installed).toBe(true);
        expect(runtime.registeredPolicy).toBe(proxy);
    });

    it("refuses policies before it is installed", () => {
        const { createPolicy } = setup();
        expect(() => createPolicy().register()).toThrow("This proxy is not installed");
    });

    it("uninstall() frees the slot and detaches the policy", () => {
        const { runtime, proxy, createPolicy } = setup();
        proxy.install();
        const policy = createPolicy();
        policy.register();

        proxy.uninstall();
        expect(proxy.installed).toBe(false);
        expect(runtime.registeredPolicy).toBeNull();
        expect(policy.registered).toBe(false);
    });

    // ── 2. Attaching policies ─────────────────────────────────────────

    it("forwards the runtime's lookups to the attached policy", () => {
        const { runtime, proxy, createPolicy } = setup();
        proxy.install();
        const policy = createPolicy();
        policy.register();
        expect(proxy.attached).toBe(policy.managed);

        const environment = policy.newEnvironment();
        expect(environment.use(() => runtime.currentEnvironment())).toBe(environment.environment);
        environment.dispose();
        policy.unregister();
    });

    it("accepts one policy at a time", () => {
        const { proxy, createPolicy } = setup();
        proxy.install();
        createPolicy().register();
        expect(() => createPolicy().register()).toThrow("A policy is already registered");
    });

    it("unregistering the policy keeps the proxy installed", () => {
        const { runtime, proxy, createPolicy } = setup();
        proxy.install();
        const policy = createPolicy();
        policy.register();

        policy.unregister();
        expect(policy.registered).toBe(false);
        expect(proxy.attached).toBeNull();
        expect(runtime.registeredPolicy).toBe(proxy);
    });

    // ── 3. Force-unregister ───────────────────────────────────────────

    it("forceUnregister() detaches a leftover policy so another can register", () => {
        const { proxy, createPolicy } = setup();
        proxy.install();
        const leftover = createPolicy();
        leftover.register();

        proxy.forceUnregister();
        expect(leftover.registered).toBe(false);

        const next = createPolicy();
        next.register();
        expect(proxy.attached).toBe(next.managed);
    });

    it("forceUnregister() without a policy does nothing", () => {
        const { proxy } = setup();
        proxy.install();
        expect(() => proxy.forceUnregister()).not.toThrow();
    });

    // ── 4. Delegation without a policy ────────────────────────────────

    it("answers lookups only while a policy is attached", () => {
        const { runtime, proxy } = setup();
        proxy.install();
        expect(() => proxy.getCurrentEnvironment()).toThrow(ConfigurationError);
        expect(() => runtime.currentEnvironment()).toThrow("This proxy is not attached to a policy");
    });
});
