/**
 * Provisioning: Progress Reporting
 *
 * Stage progress bars and the heartbeat shown during the settle wait.
 */

import { sleep as defaultSleep, type SleepFn } from "../utils.js";
import type { RunnerProgress } from "./runner.js";

// =============================================================================
// Types
// =============================================================================

export type ProgressStream = {
  write: (chunk: string) => unknown;
};

export type ProgressReporter = {
  update: (progress: RunnerProgress) => void;
  setLabel: (label: string) => void;
  done: () => void;
};

export type ProgressOptions = {
  stream?: ProgressStream;
  silent?: boolean;
  width?: number;
};

// =============================================================================
// Stage Progress
// =============================================================================

export function renderProgressBar(progress: RunnerProgress, width = 30): string {
  const ratio = progress.total === 0 ? 1 : Math.min(1, progress.completed / progress.total);
  const filled = Math.round(ratio * width);
  const bar = `${"#".repeat(filled)}${"-".repeat(width - filled)}`;
  const pct = Math.round(ratio * 100);
  return `[${bar}] ${pct}% ${progress.completed}/${progress.total} (ok ${progress.succeeded}, failed ${progress.failed})`;
}

export function createStageProgress(label: string, options?: ProgressOptions): ProgressReporter {
  const silent = options?.silent ?? false;
  const stream = options?.stream ?? process.stderr;
  const width = options?.width ?? 30;
  let currentLabel = label;
  let current: RunnerProgress = { completed: 0, total: 0, succeeded: 0, failed: 0 };
  let isDone = false;

  function render(final = false) {
    if (silent) return;
    stream.write(`\r  ${currentLabel} ${renderProgressBar(current, width)}${final ? "\n" : ""}`);
  }

  return {
    update(progress: RunnerProgress) {
      if (isDone) return;
      current = progress;
      render();
    },
    setLabel(newLabel: string) {
      currentLabel = newLabel;
      if (!isDone) render();
    },
    done() {
      if (isDone) return;
      isDone = true;
      render(true);
    },
  };
}

// =============================================================================
// Heartbeat
// =============================================================================

export type Heartbeat = {
  stop: () => void;
};

/**
 * Call `onTick(elapsedMs)` every `intervalMs` until stopped. Stopping twice
 * is a no-op.
 */
export function startHeartbeat(intervalMs: number, onTick: (elapsedMs: number) => void): Heartbeat {
  const startedAt = Date.now();
  const timer = setInterval(() => onTick(Date.now() - startedAt), Math.max(1, intervalMs));
  let stopped = false;
  return {
    stop() {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
    },
  };
}

/**
 * Pause for `durationMs` with a heartbeat running. The heartbeat is always
 * stopped, including when the wait ends early on abort.
 */
export async function waitWithHeartbeat(
  durationMs: number,
  options: {
    intervalMs: number;
    onTick: (elapsedMs: number) => void;
    signal?: AbortSignal;
    sleep?: SleepFn;
  },
): Promise<void> {
  const heartbeat = startHeartbeat(options.intervalMs, options.onTick);
  try {
    await (options.sleep ?? defaultSleep)(durationMs, options.signal);
  } finally {
    heartbeat.stop();
  }
}
