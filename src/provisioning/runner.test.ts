import { describe, it, expect, vi } from "vitest";

import { HealthMonitor } from "./health.js";
import { runBounded, type RunnerProgress } from "./runner.js";
import type { TaskOutcome } from "./types.js";

const noSleep = async () => {};

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const failure = (message: string): TaskOutcome => ({
  ok: false,
  failure: { errorClass: "retryable-transient", exhausted: true, attempts: 3, message },
});

describe("runBounded", () => {
  it("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const items = Array.from({ length: 12 }, (_, i) => `item-${i}`);

    const result = await runBounded(
      items,
      async (_item, index) => {
        active++;
        peak = Math.max(peak, active);
        await tick(2 + (index % 3));
        active--;
        return { ok: true };
      },
      { concurrency: 3, sleep: noSleep },
    );

    expect(peak).toBe(3);
    expect(result.dispatched).toBe(12);
    expect(result.results).toHaveLength(12);
    expect(result.halted).toBe(false);
  });

  it("returns results in input order", async () => {
    const result = await runBounded(
      ["a", "b", "c"],
      async (item) => {
        await tick(item === "a" ? 10 : 1);
        return { ok: true };
      },
      { concurrency: 3, sleep: noSleep },
    );
    expect(result.results.map((r) => r.item)).toEqual(["a", "b", "c"]);
  });

  it("turns a thrown error into a failure for that item only", async () => {
    const result = await runBounded(
      ["ok-1", "bad", "ok-2"],
      async (item) => {
        if (item === "bad") throw new Error("boom");
        return { ok: true };
      },
      { concurrency: 2, sleep: noSleep },
    );

    expect(result.results).toEqual([
      { item: "ok-1", ok: true },
      {
        item: "bad",
        ok: false,
        failure: { errorClass: "retryable-transient", exhausted: false, attempts: 1, message: "boom" },
      },
      { item: "ok-2", ok: true },
    ]);
  });

  it("reports progress after each completion", async () => {
    const seen: RunnerProgress[] = [];
    await runBounded(["a", "b"], async (item) => (item === "a" ? { ok: true } : failure("nope")), {
      concurrency: 1,
      sleep: noSleep,
      onProgress: (p) => seen.push(p),
    });
    expect(seen).toEqual([
      { completed: 1, total: 2, succeeded: 1, failed: 0 },
      { completed: 2, total: 2, succeeded: 1, failed: 1 },
    ]);
  });

  it("pauses between dispatches but not after the last one", async () => {
    const sleep = vi.fn(async () => {});
    await runBounded(["a", "b", "c"], async () => ({ ok: true }), {
      concurrency: 5,
      dispatchDelayMs: 200,
      sleep,
    });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(200, undefined);
  });

  it("applies the burst throttle every N dispatches", async () => {
    const delays: number[] = [];
    const sleep = async (ms: number) => {
      delays.push(ms);
    };
    await runBounded(["a", "b", "c", "d", "e"], async () => ({ ok: true }), {
      concurrency: 5,
      dispatchDelayMs: 10,
      burst: { every: 2, delayMs: 1000 },
      sleep,
    });
    expect(delays).toEqual([10, 1000, 10, 1000]);
  });

  it("stops dispatching when the circuit opens", async () => {
    const items = Array.from({ length: 20 }, (_, i) => `item-${i + 1}`);
    const taskFn = vi.fn(async (_item: string, index: number): Promise<TaskOutcome> =>
      index < 10 ? failure("quota") : { ok: true },
    );

    const result = await runBounded(items, taskFn, {
      concurrency: 1,
      sleep: noSleep,
      health: new HealthMonitor({ threshold: 0.3, minSamples: 10 }),
    });

    expect(taskFn).toHaveBeenCalledTimes(10);
    expect(result.dispatched).toBe(10);
    expect(result.halted).toBe(true);
    expect(result.haltReason).toBe("circuit-open");
    expect(result.notDispatched).toEqual(items.slice(10));
  });

  it("stops dispatching once the signal aborts and reports the rest", async () => {
    const controller = new AbortController();
    const result = await runBounded(
      ["a", "b", "c"],
      async (item) => {
        if (item === "a") controller.abort();
        return { ok: true };
      },
      { concurrency: 1, sleep: noSleep, signal: controller.signal },
    );

    expect(result.dispatched).toBe(1);
    expect(result.haltReason).toBe("aborted");
    expect(result.notDispatched).toEqual(["b", "c"]);
  });

  it("calls onGraceExpired when in-flight tasks outlive the grace period", async () => {
    const controller = new AbortController();
    let release: () => void = () => {};
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    const onGraceExpired = vi.fn(() => release());

    const run = runBounded(
      ["slow"],
      async () => {
        await blocked;
        return failure("killed");
      },
      { concurrency: 1, sleep: noSleep, signal: controller.signal, graceMs: 5, onGraceExpired },
    );
    controller.abort();
    const result = await run;

    expect(onGraceExpired).toHaveBeenCalledTimes(1);
    expect(result.results).toHaveLength(1);
    expect(result.results[0].ok).toBe(false);
  });

  it("does not call onGraceExpired when tasks settle in time", async () => {
    const controller = new AbortController();
    const onGraceExpired = vi.fn();
    const run = runBounded(
      ["quick"],
      async () => {
        await tick(1);
        return { ok: true };
      },
      { concurrency: 1, sleep: noSleep, signal: controller.signal, graceMs: 1_000, onGraceExpired },
    );
    controller.abort();
    await run;
    expect(onGraceExpired).not.toHaveBeenCalled();
  });

  it("keeps running when a progress callback throws", async () => {
    const onProgress = vi.fn(() => {
      throw new Error("render failed");
    });
    const result = await runBounded(["a", "b"], async () => ({ ok: true }), {
      concurrency: 2,
      sleep: noSleep,
      onProgress,
    });

    expect(result.results).toEqual([
      { item: "a", ok: true },
      { item: "b", ok: true },
    ]);
    expect(onProgress).toHaveBeenCalledTimes(2);
  });

  it("removes its abort listener once the tasks settle", async () => {
    const controller = new AbortController();
    const add = vi.spyOn(controller.signal, "addEventListener");
    const remove = vi.spyOn(controller.signal, "removeEventListener");

    await runBounded(
      ["a"],
      async () => {
        await tick(1);
        return { ok: true };
      },
      { concurrency: 1, sleep: noSleep, signal: controller.signal },
    );

    expect(add).toHaveBeenCalledTimes(1);
    expect(remove).toHaveBeenCalledTimes(1);
    expect(remove).toHaveBeenCalledWith("abort", add.mock.calls[0][1]);
  });

  it("handles an empty item list", async () => {
    const result = await runBounded([], async () => ({ ok: true }), { concurrency: 4 });
    expect(result).toEqual({ results: [], dispatched: 0, notDispatched: [], halted: false, haltReason: undefined });
  });
});
