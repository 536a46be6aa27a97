/**
 * Provisioning: Run Report
 *
 * Aggregates a pipeline result into the end-of-run summary and maps it to
 * a process exit code.
 */

import { formatDuration } from "../utils.js";
import type { PipelineResult, StageReport } from "./pipeline.js";
import type { SinkPaths } from "./result-sink.js";

export type RunReport = {
  runId: string;
  namespace: string;
  state: PipelineResult["state"];
  abortedAt?: PipelineResult["abortedAt"];
  reason?: PipelineResult["reason"];
  attempted: number;
  stages: StageReport[];
  credentials: number;
  elapsedMs: number;
  /** Credentials per minute of wall-clock time. */
  throughput: number;
  successRate: number;
  outputFiles?: SinkPaths;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function buildReport(input: {
  result: PipelineResult;
  runId: string;
  namespace: string;
  credentials: number;
  startedAt: number;
  finishedAt?: number;
  outputFiles?: SinkPaths;
}): RunReport {
  const elapsedMs = Math.max(0, (input.finishedAt ?? Date.now()) - input.startedAt);
  const minutes = elapsedMs / 60_000;
  return {
    runId: input.runId,
    namespace: input.namespace,
    state: input.result.state,
    abortedAt: input.result.abortedAt,
    reason: input.result.reason,
    attempted: input.result.attempted,
    stages: input.result.stages,
    credentials: input.credentials,
    elapsedMs,
    throughput: minutes > 0 ? input.credentials / minutes : 0,
    successRate: input.result.attempted > 0 ? input.credentials / input.result.attempted : 0,
    outputFiles: input.outputFiles,
  };
}

export function exitCodeForReport(report: RunReport): number {
  if (report.reason === "interrupted") return EXIT_INTERRUPTED;
  if (report.state === "done" && report.credentials > 0) return EXIT_OK;
  return EXIT_FAILURE;
}

/** Exit code for maintenance runs: every item must succeed. */
export function exitCodeForStage(report: StageReport, interrupted: boolean): number {
  if (interrupted) return EXIT_INTERRUPTED;
  return report.failed === 0 && report.notDispatched === 0 ? EXIT_OK : EXIT_FAILURE;
}

const pct = (ratio: number) => `${(ratio * 100).toFixed(1)}%`;

export function formatStageLine(stage: StageReport): string {
  const extra = stage.notDispatched > 0 ? `, ${stage.notDispatched} not dispatched` : "";
  const halt = stage.haltReason ? ` [${stage.haltReason}]` : "";
  return `  ${stage.stage.padEnd(13)} ${stage.succeeded}/${stage.attempted} succeeded, ${stage.failed} failed${extra}${halt}`;
}

export function formatFailures(stages: StageReport[], limit = 20): string[] {
  const all = stages.flatMap((s) => s.failures.map((f) => ({ stage: s.stage, ...f })));
  const lines = all
    .slice(0, limit)
    .map((f) => `  ${f.stage} ${f.item}: ${f.failure.errorClass} after ${f.failure.attempts} attempt(s): ${f.failure.message}`);
  if (all.length > limit) lines.push(`  ... ${all.length - limit} more`);
  return lines;
}

export function formatReport(report: RunReport): string {
  const status =
    report.state === "done" ? "done" : `aborted at ${report.abortedAt ?? "?"} (${report.reason ?? "unknown"})`;
  const lines = [
    `Run ${report.namespace}: ${status}`,
    `  attempted     ${report.attempted}`,
    ...report.stages.map(formatStageLine),
    `  credentials   ${report.credentials} (${pct(report.successRate)})`,
    `  elapsed       ${formatDuration(report.elapsedMs)} (${report.throughput.toFixed(1)}/min)`,
  ];
  if (report.outputFiles) {
    lines.push(`  output        ${report.outputFiles.lineFile}`, `                ${report.outputFiles.commaFile}`);
  }
  const failures = formatFailures(report.stages);
  if (failures.length > 0) lines.push("Failures:", ...failures);
  return lines.join("\n");
}
