/**
 * Contract: UnifiedFuture / UnifiedIterator — loop-agnostic results.
 *
 * Sections:
 *   1. Construction (from, fromCall, resolve, reject)
 *   2. Combinators never throw synchronously
 *   3. Callbacks: environment preservation and addLoopCallback
 *   4. Awaiting and scoped resources
 *   5. UnifiedIterator iteration
 *   6. runAsCompleted
 */
import { setImmediate as nextTurn } from "node:timers/promises";
import { delay } from "es-toolkit";
import { afterEach, describe, expect, it, vi } from "vitest";
import { InProcessRuntime } from "../../testing/in-process-runtime";
import { GlobalStore } from "../environment/store";
import { Policy } from "../environment/policy";
import { CancelledError } from "../errors";
import { Future } from "../future/future";
import { Hospice } from "../hospice/hospice";
import { Logger } from "../logger/logger";
import { NodeEventLoop } from "../loop/node-loop";
import { NO_LOOP, setLoop } from "../loop/registry";
import { ScopeEventLoop } from "../loop/scope-loop";
import { TaskScope } from "../loop/task-scope";
import { unifiedFuture, unifiedIterator } from "./helpers";
import type { AsyncScopedResource, ScopedResource } from "./types";
import { UnifiedFuture } from "./unified-future";
import { UnifiedIterator } from "./unified-iterator";

// ── Helpers ──────────────────────────────────────────────────────────────────

function* counting(limit: number): Generator<Future<number>> {
    for (let n = 0; n < limit; n++) {
        const future = new Future<number>();
        future.setResult(n);
        yield future;
    }
}

function recordingResource(log: string[]): ScopedResource<string> {
    return {
        enter: () => {
            log.push("enter");
            return "entered";
        },
        exit: (error) => {
            log.push(error === undefined ? "exit" : "exit:error");
        },
    };
}

function quietHospice(): Hospice {
    return new Hospice({ logger: new Logger(), observer: { observe: () => undefined } });
}

afterEach(() => {
    setLoop(NO_LOOP);
});

// ── Tests ────────────────────────────────────────────────────────────────────

describe("UnifiedFuture", () => {
    // ── 1. Construction ───────────────────────────────────────────────

    describe("construction", () => {
        it("from() returns a UnifiedFuture unchanged", () => {
            const future = UnifiedFuture.resolve(1);
            expect(UnifiedFuture.from(future)).toBe(future);
        });

        it("from() mirrors a plain future", () => {
            const source = new Future<number>();
            const unified = UnifiedFuture.from(source);
            expect(unified.done()).toBe(false);
            source.setResult(9);
            expect(unified.result()).toBe(9);
        });

        it("from() mirrors a cancelled future", () => {
            const source = new Future<number>();
            const unified = UnifiedFuture.from(source);
            source.cancel();
            expect(unified.cancelled()).toBe(true);
        });

        it("from() adopts a promise", async () => {
            const unified = UnifiedFuture.from(Promise.resolve("promised"));
            await delay(0);
            expect(unified.result()).toBe("promised");
        });

        it("fromCall() turns a synchronous throw into a rejection", () => {
            const future = UnifiedFuture.fromCall(() => {
                throw new Error("no core");
            });
            expect(future.exception()?.message).toBe("no core");
        });

        it("fromCall() passes arguments through", () => {
            const future = UnifiedFuture.fromCall((a: number, b: number) => UnifiedFuture.resolve(a + b), 2, 3);
            expect(future.result()).toBe(5);
        });

        it("unifiedFuture() wraps a function", () => {
            const double = unifiedFuture((n: number) => UnifiedFuture.resolve(n * 2));
            expect(double(4).result()).toBe(8);
        });
    });

    // ── 2. Combinators ────────────────────────────────────────────────

    describe("combinators", () => {
        it("map() transforms the value", () => {
            expect(
                UnifiedFuture.resolve(2)
                    .map((n) => n * 10)
                    .result(),
            ).toBe(20);
        });

        it("map() passes a rejection through without calling the mapper", () => {
            const mapper = vi.fn();
            const error = new Error("failed");
            const mapped = UnifiedFuture.reject<number>(error).map(mapper);
            expect(mapped.exception()).toBe(error);
            expect(mapper).not.toHaveBeenCalled();
        });

        it("catch() recovers from a rejection", () => {
            const recovered = UnifiedFuture.reject<number>(new Error("failed")).catch((err) => err.message);
            expect(recovered.result()).toBe("failed");
        });

        it("a throwing mapper rejects the derived future instead of throwing", () => {
            const source = new UnifiedFuture<number>();
            const mapped = source.map(() => {
                throw new Error("mapper failed");
            });
            expect(() => source.setResult(1)).not.toThrow();
            expect(mapped.exception()?.message).toBe("mapper failed");
        });

        it("transform() propagates cancellation", () => {
            const source = new UnifiedFuture<number>();
            const mapped = source.map((n) => n + 1);
            source.cancel();
            expect(mapped.cancelled()).toBe(true);
        });
    });

    // ── 3. Callbacks ──────────────────────────────────────────────────

    describe("callbacks", () => {
        it("addDoneCallback runs in the environment active at registration", async () => {
            const runtime = new InProcessRuntime();
            const policy = new Policy(new GlobalStore(), { runtime, hospice: quietHospice(), logger: new Logger() });

            await policy.run(() => {
                const environment = policy.newEnvironment();
                const future = new UnifiedFuture<number>();
                const seen: number[] = [];

                environment.use(() => {
                    future.addDoneCallback(() => seen.push(runtime.currentEnvironment().id));
                });
                expect(policy.currentEnvironment()).toBeNull();

                future.setResult(1);
                expect(seen).toEqual([environment.environment.id]);
                environment.dispose();
            });
        });

        it("addLoopCallback runs inline when there is no loop", () => {
            const future = new UnifiedFuture<number>();
            const cb = vi.fn();
            future.addLoopCallback(cb);
            future.setResult(1);
            expect(cb).toHaveBeenCalledWith(future);
        });

        it("addLoopCallback runs outside the resolver's stack under a real loop", async () => {
            setLoop(new NodeEventLoop());
            const future = new UnifiedFuture<number>();
            const cb = vi.fn();
            future.addLoopCallback(cb);

            future.setResult(1);
            expect(cb).not.toHaveBeenCalled();
            await nextTurn();
            expect(cb).toHaveBeenCalledOnce();
        });

        it("addLoopCallback logs a throwing callback", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            const future = new UnifiedFuture<number>(logger);
            future.addLoopCallback(() => {
                throw new Error("loop callback failed");
            });
            future.setResult(1);
            expect(handler).toHaveBeenCalledWith(
                expect.objectContaining({ level: "error", message: "Exception in loop callback" }),
            );
        });
    });

    // ── 4. Awaiting and scoped resources ─────────────────────────────

    describe("awaiting", () => {
        it("is awaitable", async () => {
            const future = new UnifiedFuture<string>();
            setTimeout(() => future.setResult("value"), 1);
            expect(await future).toBe("value");
        });

        it("awaiting a rejection throws", async () => {
            await expect(UnifiedFuture.reject(new Error("rejected")).awaitable()).rejects.toThrow("rejected");
        });

        it("use() enters and exits the resource around the block", () => {
            const log: string[] = [];
            const value = UnifiedFuture.resolve(recordingResource(log)).use((entered) => `${entered}!`);
            expect(value).toBe("entered!");
            expect(log).toEqual(["enter", "exit"]);
        });

        it("use() exits with the error when the block throws", () => {
            const log: string[] = [];
            const future = UnifiedFuture.resolve(recordingResource(log));
            expect(() =>
                future.use(() => {
                    throw new Error("block failed");
                }),
            ).toThrow("block failed");
            expect(log).toEqual(["enter", "exit:error"]);
        });

        it("useAsync() prefers the asynchronous protocol", async () => {
            const log: string[] = [];
            const resource: AsyncScopedResource<number> = {
                enterAsync: async () => {
                    log.push("enterAsync");
                    return 3;
                },
                exitAsync: async () => {
                    log.push("exitAsync");
                },
            };
            const result = await UnifiedFuture.resolve(resource).useAsync(async (n) => n * 2);
            expect(result).toBe(6);
            expect(log).toEqual(["enterAsync", "exitAsync"]);
        });

        it("useAsync() falls back to the synchronous protocol", async () => {
            const log: string[] = [];
            const result = await UnifiedFuture.resolve(recordingResource(log)).useAsync((value) => value.length);
            expect(result).toBe(7);
            expect(log).toEqual(["enter", "exit"]);
        });
    });
});

describe("UnifiedIterator", () => {
    // ── 5. Iteration ──────────────────────────────────────────────────

    it("iterates values synchronously", () => {
        expect([...new UnifiedIterator(counting(4))]).toEqual([0, 1, 2, 3]);
    });

    it("iterates values asynchronously", async () => {
        const values: number[] = [];
        for await (const value of UnifiedIterator.fromCall(counting, 3)) {
            values.push(value);
        }
        expect(values).toEqual([0, 1, 2]);
    });

    it("accepts an asynchronous source", async () => {
        async function* source(): AsyncGenerator<Future<string>> {
            const first = new Future<string>();
            first.setResult("a");
            yield first;
            const second = new Future<string>();
            setTimeout(() => second.setResult("b"), 1);
            yield second;
        }
        const values: string[] = [];
        for await (const value of new UnifiedIterator(source())) {
            values.push(value);
        }
        expect(values).toEqual(["a", "b"]);
    });

    it("refuses synchronous iteration of an asynchronous source", () => {
        async function* source(): AsyncGenerator<Future<string>> {}
        expect(() => [...new UnifiedIterator(source())]).toThrow(TypeError);
    });

    it("exposes the underlying futures", () => {
        const futures = [new Future<number>()];
        expect(unifiedIterator(() => futures)().futures).toBe(futures);
    });

    // ── 6. runAsCompleted ─────────────────────────────────────────────

    describe("runAsCompleted", () => {
        it("calls back in order and resolves when the source is exhausted", () => {
            const futures = [new Future<number>(), new Future<number>()];
            const results: number[] = [];
            const state = new UnifiedIterator(futures).runAsCompleted((f) => {
                results.push(f.result());
            });

            expect(state.done()).toBe(false);
            futures[1].setResult(2);
            expect(state.done()).toBe(false);
            futures[0].setResult(1);
            expect(state.done()).toBe(true);
            expect(state.result()).toBeUndefined();
            expect(results).toEqual([1, 2]);
        });

        it("hands failed futures to the callback", () => {
            const futures = [new Future<number>(), new Future<number>()];
            const results: number[] = [];
            const errors: Error[] = [];
            const state = new UnifiedIterator(futures).runAsCompleted((f) => {
                const error = f.exception();
                if (error) {
                    errors.push(error);
                } else {
                    results.push(f.result());
                }
            });

            futures[0].setException(new RangeError("bad index"));
            expect(state.done()).toBe(false);
            futures[1].setResult(2);
            expect(state.done()).toBe(true);
            expect(results).toEqual([2]);
            expect(errors).toHaveLength(1);
        });

        it("stops when the callback returns false", () => {
            const futures = [new Future<number>(), new Future<number>()];
            const results: number[] = [];
            const state = new UnifiedIterator(futures).runAsCompleted((f) => {
                results.push(f.result());
                return false;
            });

            futures[0].setResult(1);
            expect(state.done()).toBe(true);
            expect(state.result()).toBeUndefined();
            expect(results).toEqual([1]);
        });

        it.each([0, "", null, false])("stops when the callback returns %s", (verdict) => {
            const results: number[] = [];
            const state = new UnifiedIterator(counting(3)).runAsCompleted((f) => {
                results.push(f.result());
                return verdict;
            });

            expect(state.done()).toBe(true);
            expect(state.result()).toBeUndefined();
            expect(results).toEqual([0]);
        });

        it("keeps going when the callback returns undefined or a truthy value", () => {
            const results: number[] = [];
            const state = new UnifiedIterator(counting(3)).runAsCompleted((f) => {
                results.push(f.result());
                return f.result() === 0 ? undefined : "more";
            });

            expect(state.done()).toBe(true);
            expect(results).toEqual([0, 1, 2]);
        });

        it("rejects and stops pulling when the callback throws", () => {
            const futures = [new Future<number>(), new Future<number>()];
            const iterator = futures[Symbol.iterator]();
            const error = new Error("callback crashed");
            const state = new UnifiedIterator({ [Symbol.iterator]: () => iterator }).runAsCompleted(() => {
                throw error;
            });

            futures[0].setResult(1);
            expect(state.exception()).toBe(error);
            expect(iterator.next().value).toBe(futures[1]);
        });

        it("rejects when the source throws", () => {
            const error = new Error("source crashed");
            function* broken(): Generator<Future<number>> {
                throw error;
            }
            const state = new UnifiedIterator(broken()).runAsCompleted(() => undefined);
            expect(state.exception()).toBe(error);
        });

        it("does not call back after the returned future is cancelled", () => {
            const futures = [new Future<number>(), new Future<number>()];
            const callback = vi.fn();
            const state = new UnifiedIterator(futures).runAsCompleted(callback);

            state.cancel();
            futures[0].setResult(1);
            expect(callback).not.toHaveBeenCalled();
        });

        it("completes under the Node loop", async () => {
            setLoop(new NodeEventLoop());
            const results: number[] = [];
            const state = new UnifiedIterator(counting(3)).runAsCompleted((f) => {
                results.push(f.result());
            });
            await state;
            expect(results).toEqual([0, 1, 2]);
        });

        it("rejects with CancelledError when the scope is cancelled before the run starts", async () => {
            const scope = new TaskScope();
            setLoop(new ScopeEventLoop(scope));
            scope.cancel();

            const callback = vi.fn();
            const state = new UnifiedIterator(counting(2)).runAsCompleted(callback);
            await expect(state.wait()).rejects.toBeInstanceOf(CancelledError);
            expect(callback).not.toHaveBeenCalled();
        });

        it("rejects with CancelledError when the scope is cancelled mid-run", async () => {
            const scope = new TaskScope();
            setLoop(new ScopeEventLoop(scope));
            const futures = [new Future<number>(), new Future<number>()];
            const results: number[] = [];
            const state = new UnifiedIterator(futures).runAsCompleted((f) => {
                results.push(f.result());
            });

            await nextTurn();
            futures[0].setResult(1);
            await nextTurn();
            expect(results).toEqual([1]);

            scope.cancel();
            futures[1].setResult(2);
            await expect(state.wait()).rejects.toBeInstanceOf(CancelledError);
            expect(results).toEqual([1]);
        });

        it("drains an asynchronous source", async () => {
            async function* source(): AsyncGenerator<Future<number>> {
                yield* counting(2);
            }
            const results: number[] = [];
            const state = new UnifiedIterator(source()).runAsCompleted((f) => {
                results.push(f.result());
            });
            await state;
            expect(results).toEqual([0, 1]);
        });
    });
});
