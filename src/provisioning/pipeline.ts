/**
 * Provisioning: Pipeline Orchestrator
 *
 * Sequences the stages of a run:
 *
 *   create → wait → enable → extract → done
 *
 * Each stage runs through the bounded runner and only its survivors move
 * on. A stage with no survivors, or an interrupt between stages, ends the
 * run in `aborted`.
 */

import type { ProvisionLogger } from "../logging/logger.js";
import type { SleepFn } from "../utils.js";
import { HealthMonitor } from "./health.js";
import { waitWithHeartbeat } from "./progress.js";
import { RetryExecutor } from "./retry.js";
import type { RunContext } from "./run-context.js";
import { runBounded, type HaltReason, type RunnerProgress } from "./runner.js";
import { createStageTasks, type StageName, type StageTasks } from "./tasks.js";
import type { CredentialDecoder, ResourceProvider, StageFailure, WorkItem } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type PipelineState = "create" | "wait" | "enable" | "extract" | "done" | "aborted";

export type StartStage = "create" | "enable" | "extract";

export type StageStatus = "complete" | "partial" | "aborted";

export type StageReport = {
  stage: StageName;
  status: StageStatus;
  attempted: number;
  succeeded: number;
  failed: number;
  notDispatched: number;
  haltReason?: HaltReason;
  failures: { item: WorkItem; failure: StageFailure }[];
  elapsedMs: number;
};

export type AbortReason = "no-survivors" | "interrupted";

export type PipelineResult = {
  state: "done" | "aborted";
  abortedAt?: PipelineState;
  reason?: AbortReason;
  attempted: number;
  stages: StageReport[];
  /** Items that made it through the last stage that ran. */
  survivors: WorkItem[];
};

export type PipelineEvent =
  | { type: "state"; state: PipelineState }
  | { type: "stage-start"; stage: StageName; total: number }
  | { type: "stage-progress"; stage: StageName; progress: RunnerProgress }
  | { type: "stage-complete"; report: StageReport }
  | { type: "heartbeat"; elapsedMs: number; totalMs: number };

export type PipelineEventListener = (event: PipelineEvent) => void;

export type PipelineDeps = {
  context: RunContext;
  tasks: StageTasks;
  sleep?: SleepFn;
};

export type StageRun = {
  report: StageReport;
  survivors: WorkItem[];
};

// =============================================================================
// Pipeline
// =============================================================================

export class ProvisioningPipeline {
  private readonly context: RunContext;
  private readonly tasks: StageTasks;
  private readonly sleep?: SleepFn;
  private readonly logger: ProvisionLogger;
  private readonly health?: HealthMonitor;
  private listeners: PipelineEventListener[] = [];

  constructor(deps: PipelineDeps) {
    this.context = deps.context;
    this.tasks = deps.tasks;
    this.sleep = deps.sleep;
    this.logger = deps.context.logger.child("pipeline");
    const circuit = deps.context.config.circuit;
    this.health = circuit.enabled
      ? new HealthMonitor({ threshold: circuit.threshold, minSamples: circuit.minSamples })
      : undefined;
  }

  /** Subscribe to pipeline events. */
  on(listener: PipelineEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: PipelineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.debug("pipeline listener threw", { error: String(error) });
      }
    }
  }

  /**
   * Run one stage over `items` through the bounded runner. Also used on its
   * own by the maintenance commands.
   */
  async runStage(stage: StageName, items: readonly WorkItem[]): Promise<StageRun> {
    const config = this.context.config;
    const started = Date.now();
    this.health?.reset();
    this.emit({ type: "stage-start", stage, total: items.length });
    this.logger.info("stage started", { stage, items: items.length });

    const run = await runBounded(items, this.tasks[stage], {
      concurrency: config.concurrency,
      dispatchDelayMs: config.dispatchDelayMs,
      burst: config.burst,
      health: this.health,
      signal: this.context.signal,
      graceMs: config.graceMs,
      onGraceExpired: () => this.context.terminate(),
      onProgress: (progress) => this.emit({ type: "stage-progress", stage, progress }),
      logger: this.logger.withContext({ stage }),
      sleep: this.sleep,
    });

    const survivors: WorkItem[] = [];
    const failures: StageReport["failures"] = [];
    for (const result of run.results) {
      if (result.ok) survivors.push(result.item);
      else failures.push({ item: result.item, failure: result.failure });
    }

    const status: StageStatus =
      run.haltReason === "aborted" ? "aborted" : run.haltReason === "circuit-open" ? "partial" : "complete";

    const report: StageReport = {
      stage,
      status,
      attempted: run.dispatched,
      succeeded: survivors.length,
      failed: failures.length,
      notDispatched: run.notDispatched.length,
      haltReason: run.haltReason,
      failures,
      elapsedMs: Date.now() - started,
    };

    this.logger.info("stage finished", {
      stage,
      status,
      succeeded: report.succeeded,
      failed: report.failed,
      notDispatched: report.notDispatched,
    });
    this.emit({ type: "stage-complete", report });
    return { report, survivors };
  }

  /**
   * Run the pipeline over `items`, starting at `startAt`. Earlier stages are
   * skipped; the settle wait only follows Create.
   */
  async run(items: readonly WorkItem[], startAt: StartStage = "create"): Promise<PipelineResult> {
    const stages: StageReport[] = [];
    let survivors: WorkItem[] = [...items];

    const finish = (state: "done" | "aborted", extra?: { abortedAt: PipelineState; reason: AbortReason }) => {
      this.setState(state);
      const result: PipelineResult = { state, attempted: items.length, stages, survivors, ...extra };
      if (state === "aborted") this.logger.warn("pipeline aborted", { ...extra });
      return result;
    };

    const order: StartStage[] = ["create", "enable", "extract"];
    for (const stage of order.slice(order.indexOf(startAt))) {
      this.setState(stage);
      const { report, survivors: next } = await this.runStage(stage, survivors);
      stages.push(report);
      survivors = next;

      if (this.context.interrupted) return finish("aborted", { abortedAt: stage, reason: "interrupted" });
      if (stage === "extract") break;
      if (survivors.length === 0) return finish("aborted", { abortedAt: stage, reason: "no-survivors" });

      if (stage === "create") {
        this.setState("wait");
        await this.settle();
        if (this.context.interrupted) return finish("aborted", { abortedAt: "wait", reason: "interrupted" });
      }
    }

    return finish("done");
  }

  private setState(state: PipelineState): void {
    this.emit({ type: "state", state });
  }

  private async settle(): Promise<void> {
    const { settleMs, heartbeatMs } = this.context.config;
    this.logger.info("waiting for new projects to settle", { settleMs });
    await waitWithHeartbeat(settleMs, {
      intervalMs: heartbeatMs,
      signal: this.context.signal,
      sleep: this.sleep,
      onTick: (elapsedMs) => {
        this.logger.debug("settling", { elapsedMs, settleMs });
        this.emit({ type: "heartbeat", elapsedMs, totalMs: settleMs });
      },
    });
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Wire a pipeline for `context`: one retry executor bound to the run's stop
 * signal, stage tasks bound to its kill signal and sink.
 */
export function createProvisioningPipeline(options: {
  context: RunContext;
  provider: ResourceProvider;
  decode: CredentialDecoder;
  sleep?: SleepFn;
}): ProvisioningPipeline {
  const { context } = options;
  const retry = new RetryExecutor({
    ...context.config.retry,
    signal: context.signal,
    sleep: options.sleep,
  });
  const tasks = createStageTasks({
    provider: options.provider,
    decode: options.decode,
    retry,
    logger: context.logger.child("task"),
    sink: context.sink,
    killSignal: context.killSignal,
    sleep: options.sleep,
  });
  return new ProvisioningPipeline({ context, tasks, sleep: options.sleep });
}
