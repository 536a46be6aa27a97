/**
 * Provisioning: Bounded Concurrency Runner
 *
 * Runs one stage task over a list of work items with at most `concurrency`
 * tasks in flight. Dispatch is event driven: a new task starts only when an
 * in-flight one settles. Returns after every dispatched task has settled.
 */

import type { ProvisionLogger } from "../logging/logger.js";
import { sleep as defaultSleep, type SleepFn } from "../utils.js";
import type { HealthMonitor } from "./health.js";
import { formatErrorMessage } from "./retry.js";
import type { StageResult, TaskFn, WorkItem } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type RunnerProgress = {
  completed: number;
  total: number;
  succeeded: number;
  failed: number;
};

export type BurstThrottle = {
  /** Pause after every `every` dispatches; 0 disables. */
  every: number;
  delayMs: number;
};

export type RunnerOptions = {
  concurrency: number;
  /** Pause after each dispatch. */
  dispatchDelayMs?: number;
  burst?: BurstThrottle;
  /** Consulted before every dispatch and fed every completion. */
  health?: HealthMonitor;
  /** Stops dispatching when aborted. */
  signal?: AbortSignal;
  /** How long in-flight tasks may keep running after an abort. */
  graceMs?: number;
  /** Called once when tasks are still running after the grace period. */
  onGraceExpired?: () => void;
  onProgress?: (progress: RunnerProgress) => void;
  logger?: ProvisionLogger;
  sleep?: SleepFn;
};

export type HaltReason = "circuit-open" | "aborted";

export type RunnerResult = {
  /** One result per dispatched item, in input order. */
  results: StageResult[];
  dispatched: number;
  notDispatched: WorkItem[];
  halted: boolean;
  haltReason?: HaltReason;
};

// =============================================================================
// Runner
// =============================================================================

export async function runBounded(
  items: readonly WorkItem[],
  taskFn: TaskFn,
  options: RunnerOptions,
): Promise<RunnerResult> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const sleep = options.sleep ?? defaultSleep;
  const { signal, health, logger } = options;

  const slots: (StageResult | undefined)[] = new Array(items.length);
  const inFlight = new Map<number, Promise<void>>();
  const progress: RunnerProgress = { completed: 0, total: items.length, succeeded: 0, failed: 0 };
  let dispatched = 0;
  let haltReason: HaltReason | undefined;

  const record = (index: number, result: StageResult) => {
    slots[index] = result;
    progress.completed++;
    if (result.ok) progress.succeeded++;
    else progress.failed++;
    health?.observe(result.ok);
    try {
      options.onProgress?.({ ...progress });
    } catch (error) {
      logger?.warn("progress callback failed", { error: formatErrorMessage(error) });
    }
  };

  const runOne = async (item: WorkItem, index: number): Promise<void> => {
    let result: StageResult;
    try {
      const outcome = await taskFn(item, index);
      result = outcome.ok ? { item, ok: true } : { item, ok: false, failure: outcome.failure };
    } catch (error) {
      result = {
        item,
        ok: false,
        failure: { errorClass: "retryable-transient", exhausted: false, attempts: 1, message: formatErrorMessage(error) },
      };
    }
    record(index, result);
  };

  let index = 0;
  for (; index < items.length; index++) {
    while (inFlight.size >= concurrency) {
      await Promise.race(inFlight.values());
    }

    if (signal?.aborted) {
      haltReason = "aborted";
      break;
    }
    if (health?.shouldHalt()) {
      haltReason = "circuit-open";
      logger?.warn("circuit open, halting dispatch", { ...health.snapshot(), remaining: items.length - index });
      break;
    }

    const slot = index;
    const task = runOne(items[index], index).finally(() => {
      inFlight.delete(slot);
    });
    inFlight.set(slot, task);
    dispatched++;

    if (index === items.length - 1) continue;
    if (options.burst && options.burst.every > 0 && dispatched % options.burst.every === 0) {
      logger?.debug("burst pause", { dispatched, delayMs: options.burst.delayMs });
      await sleep(options.burst.delayMs, signal);
    } else if (options.dispatchDelayMs && options.dispatchDelayMs > 0) {
      await sleep(options.dispatchDelayMs, signal);
    }
  }

  await drain(inFlight, options);

  if (!haltReason && signal?.aborted && index < items.length) haltReason = "aborted";

  return {
    results: slots.filter((r): r is StageResult => r !== undefined),
    dispatched,
    notDispatched: items.slice(index),
    halted: haltReason !== undefined,
    haltReason,
  };
}

// =============================================================================
// Draining
// =============================================================================

/**
 * Wait for every in-flight task. If the signal fires while waiting, tasks
 * get `graceMs` before `onGraceExpired` is called; the barrier still holds.
 */
async function drain(inFlight: Map<number, Promise<void>>, options: RunnerOptions): Promise<void> {
  if (inFlight.size === 0) return;
  const all = Promise.all(inFlight.values()).then(() => "settled" as const);
  const { signal } = options;

  if (signal) {
    const abort = onAbort(signal);
    const first = await Promise.race([all, abort.promise]);
    abort.dispose();
    if (first === "aborted" && inFlight.size > 0) {
      const graceMs = options.graceMs ?? 0;
      let timer: NodeJS.Timeout | undefined;
      const expired = new Promise<"expired">((resolve) => {
        timer = setTimeout(() => resolve("expired"), graceMs);
      });
      const outcome = await Promise.race([all, expired]);
      clearTimeout(timer);
      if (outcome === "expired") {
        options.logger?.warn("grace period expired, terminating in-flight tasks", {
          inFlight: inFlight.size,
          graceMs,
        });
        options.onGraceExpired?.();
      }
    }
  }

  await all;
}

function onAbort(signal: AbortSignal): { promise: Promise<"aborted">; dispose: () => void } {
  let listener: (() => void) | undefined;
  const promise = new Promise<"aborted">((resolve) => {
    if (signal.aborted) {
      resolve("aborted");
      return;
    }
    listener = () => resolve("aborted");
    signal.addEventListener("abort", listener, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener("abort", listener);
    },
  };
}
