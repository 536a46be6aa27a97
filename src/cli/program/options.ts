import type { Command } from "commander";
import { z } from "zod";

import type { ProvisionerConfigInput } from "../../config/config.js";

// =============================================================================
// Shared Options
// =============================================================================

/** Options every command that talks to gcloud accepts. */
export function addCommonOptions(command: Command): Command {
  return command
    .option("--config <file>", "JSON config file")
    .option("--concurrency <n>", "Maximum tasks in flight (1-50)")
    .option("--max-attempts <n>", "Attempts per provider call")
    .option("--grace-ms <ms>", "Time in-flight commands get after an interrupt")
    .option("--no-circuit", "Disable the failure-ratio circuit breaker")
    .option("--gcloud-bin <path>", "Path to the gcloud binary")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal")
    .option("--log-file <file>", "Append log entries to this file")
    .option("--json", "Print the run report as JSON");
}

/** Options for commands that write credentials. */
export function addOutputOptions(command: Command): Command {
  return command
    .option("--service <name>", "API service to enable on each project")
    .option("--output-dir <dir>", "Directory for the key files")
    .option("--settle-ms <ms>", "Pause between Create and Enable");
}

/** Options for commands that take an explicit id list. */
export function addTargetOptions(command: Command): Command {
  return command
    .argument("[ids...]", "Project ids")
    .option("--from-file <file>", "Read project ids from a file (one per line or comma separated)")
    .option("--all", "Target every project visible to the active account");
}

// =============================================================================
// Parsing
// =============================================================================

const optionalInt = z.coerce.number().int().optional();

/**
 * Commander hands options over untyped; validate them here so the commands
 * receive typed values.
 */
export const CliOptionsSchema = z.object({
  config: z.string().optional(),
  concurrency: optionalInt,
  maxAttempts: optionalInt,
  graceMs: optionalInt,
  circuit: z.boolean().optional(),
  gcloudBin: z.string().optional(),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).optional(),
  logFile: z.string().optional(),
  json: z.boolean().optional(),
  service: z.string().optional(),
  outputDir: z.string().optional(),
  settleMs: optionalInt,
  count: optionalInt,
  prefix: z.string().optional(),
  burstEvery: optionalInt,
  rebuild: z.boolean().optional(),
  clampToQuota: z.boolean().optional(),
  fromFile: z.string().optional(),
  all: z.boolean().optional(),
  skipEnable: z.boolean().optional(),
  yes: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function parseCliOptions(raw: unknown): CliOptions {
  return CliOptionsSchema.parse(raw);
}

export const IdListSchema = z.array(z.string()).default([]);

/** Map CLI flags onto the config override layer. */
export function overridesFromCli(opts: CliOptions): ProvisionerConfigInput {
  return {
    prefix: opts.prefix,
    count: opts.count,
    concurrency: opts.concurrency,
    service: opts.service,
    settleMs: opts.settleMs,
    graceMs: opts.graceMs,
    retry: opts.maxAttempts !== undefined ? { maxAttempts: opts.maxAttempts } : undefined,
    burst: opts.burstEvery !== undefined ? { every: opts.burstEvery } : undefined,
    circuit: opts.circuit === false ? { enabled: false } : undefined,
    output: opts.outputDir ? { dir: opts.outputDir } : undefined,
    gcloud: opts.gcloudBin ? { bin: opts.gcloudBin } : undefined,
    logging:
      opts.logLevel || opts.logFile ? { level: opts.logLevel, file: opts.logFile } : undefined,
  };
}
