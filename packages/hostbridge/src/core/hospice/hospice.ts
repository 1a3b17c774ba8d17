import { PerformanceObserver } from "node:perf_hooks";
import { defaultLogger } from "../logger/default";
import type { LoggerContext } from "../logger/types";
import { HospiceStage } from "./enums";
import { FinalizationObserver } from "./observer";
import type { HospiceEntry, HospiceId, HospiceOptions, WeakObserver } from "./types";

/**
 * Staged, deferred reclamation of native cores.
 *
 * The native runtime may keep calling back into a core after its environment
 * has logically ended, so a core is only handed back once its environment is
 * unreachable and it survived several quiescence notifications with no
 * registered holders:
 *
 * `Active → Stage1` (environment collected) `→ Staged → Stage2 → released`,
 * one step per {@link notify} call.
 *
 * All bookkeeping runs in synchronous sections; admission, promotion and
 * release never interleave.
 */
export class Hospice {
    private _nextId: HospiceId = 0;
    private readonly _entries = new Map<HospiceId, HospiceEntry>();
    private readonly _holds = new WeakMap<object, number>();
    private _frozen: Map<HospiceId, HospiceEntry> | null = null;
    private readonly logger: LoggerContext;
    private readonly observer: WeakObserver;

    constructor(options: HospiceOptions = {}) {
        this.logger = options.logger ?? defaultLogger;
        this.observer = options.observer ?? new FinalizationObserver();
    }

    // ── Admission ────────────────────────────────────────────────────────

    /** Track `core` until `environment` is unreachable and the core has been quiescent long enough. */
    admit(environment: object, core: object): HospiceId {
        const id = this._nextId++;
        this._entries.set(id, { id, core, stage: HospiceStage.Active });
        this.observer.observe(environment, () => this.onEnvironmentCollected(id));
        this.logger.info("hospice", `Admitted core with ID:${id}`);
        return id;
    }

    // ── Holders ──────────────────────────────────────────────────────────

    /** Register an external holder of `core`. The returned function releases it; calling it twice is a no-op. */
    hold(core: object): () => void {
        this._holds.set(core, this.holders(core) + 1);
        let released = false;
        return () => {
            if (released) return;
            released = true;
            const remaining = this.holders(core) - 1;
            if (remaining > 0) {
                this._holds.set(core, remaining);
            } else {
                this._holds.delete(core);
            }
        };
    }

    holders(core: object): number {
        return this._holds.get(core) ?? 0;
    }

    // ── Stage advancement ────────────────────────────────────────────────

    /** A collector cycle (or any other quiescence point) completed. Advances every entry by one stage. */
    notify(): void {
        if (this._frozen) {
            this.logger.debug("hospice", "Frozen, skipping notification");
            return;
        }

        for (const entry of this.entriesIn(HospiceStage.Stage2)) {
            if (this.holders(entry.core) > 0) {
                this.logger.warn("hospice", `Core is still in use in stage 2. ID:${entry.id}`);
                continue;
            }
            this._entries.delete(entry.id);
            this.logger.info("hospice", `Released core. ID:${entry.id}`);
        }

        for (const entry of this.entriesIn(HospiceStage.Staged)) {
            entry.stage = HospiceStage.Stage2;
        }

        for (const entry of this.entriesIn(HospiceStage.Stage1)) {
            if (this.holders(entry.core) > 0) {
                this.logger.warn("hospice", `Core is still in use. ID:${entry.id}`);
                continue;
            }
            entry.stage = HospiceStage.Staged;
        }
    }

    /**
     * Drive {@link notify} from Node's garbage-collection performance entries.
     * Returns a function that stops observing.
     */
    watchCollector(): () => void {
        const observer = new PerformanceObserver((list) => {
            if (list.getEntries().length > 0) this.notify();
        });
        observer.observe({ entryTypes: ["gc"] });
        return () => observer.disconnect();
    }

    // ── Diagnostics ──────────────────────────────────────────────────────

    /** Whether any tracked core is still outstanding. Logs each one. Frozen entries are not counted. */
    anyAlive(): boolean {
        for (const entry of this._entries.values()) {
            this.logger.warn("hospice", `Core is still alive (${entry.stage}). ID:${entry.id}`);
        }
        return this._entries.size > 0;
    }

    stageOf(id: HospiceId): HospiceStage | undefined {
        return (this._entries.get(id) ?? this._frozen?.get(id))?.stage;
    }

    get frozen(): boolean {
        return this._frozen !== null;
    }

    /** Set every current entry aside and halt stage advancement until {@link unfreeze}. */
    freeze(): void {
        if (this._frozen) return;
        this._frozen = new Map(this._entries);
        this._entries.clear();
    }

    unfreeze(): void {
        if (!this._frozen) return;
        for (const [id, entry] of this._frozen) {
            this._entries.set(id, entry);
        }
        this._frozen = null;
    }

    // ── Private ──────────────────────────────────────────────────────────

    private onEnvironmentCollected(id: HospiceId): void {
        const entry = this._entries.get(id) ?? this._frozen?.get(id);
        if (!entry || entry.stage !== HospiceStage.Active) return;
        entry.stage = HospiceStage.Stage1;
        this.logger.info("hospice", `Environment has died. Keeping core for a few cycles. ID:${id}`);
    }

    private entriesIn(stage: HospiceStage): HospiceEntry[] {
        return [...this._entries.values()].filter((entry) => entry.stage === stage);
    }
}

/** Process-wide hospice shared by policies constructed without a `hospice` option. */
export const defaultHospice = new Hospice();
