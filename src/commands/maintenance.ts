/**
 * Maintenance commands: `delete` removes projects, `cleanup-keys` removes
 * every API key from a set of projects. Both run through the same bounded
 * runner as provisioning and require `--yes`.
 */

import type { ProvisionerConfigInput } from "../config/config.js";
import { decodeCredentialValue } from "../gcp/decoder.js";
import { createProvisioningPipeline } from "../provisioning/pipeline.js";
import { exitCodeForStage, formatFailures, formatStageLine } from "../provisioning/report.js";
import { withRunContext } from "../provisioning/run-context.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";
import { formatDuration } from "../utils.js";
import { attachProgress, resolveTargets, setupCommand, type CommandDeps } from "./shared.js";

export type MaintenanceOptions = {
  ids?: string[];
  fromFile?: string;
  all?: boolean;
  /** Confirms the destructive operation. */
  yes?: boolean;
  configFile?: string;
  overrides?: ProvisionerConfigInput;
  json?: boolean;
};

async function runMaintenance(
  stage: "delete" | "cleanup-keys",
  opts: MaintenanceOptions,
  runtime: RuntimeEnv,
  deps: CommandDeps,
): Promise<number> {
  if (!opts.yes) {
    runtime.error(`Refusing to run ${stage} without --yes.`);
    runtime.exit(1);
    return 1;
  }

  const { config, logger, provider } = await setupCommand(
    { configFile: opts.configFile, overrides: opts.overrides ?? {} },
    deps,
  );

  try {
    const code = await withRunContext(
      { config, logger, handleSignals: deps.handleSignals ?? true },
      async (context) => {
        const items = await resolveTargets(
          { ids: opts.ids ?? [], fromFile: opts.fromFile, all: opts.all },
          provider,
          context.signal,
        );
        if (items.length === 0) {
          runtime.error("No projects given. Pass ids, --from-file or --all.");
          return 1;
        }

        const pipeline = createProvisioningPipeline({
          context,
          provider,
          decode: decodeCredentialValue,
          sleep: deps.sleep,
        });
        attachProgress(pipeline, deps.progress ?? Boolean(process.stderr.isTTY && !opts.json));

        const { report } = await pipeline.runStage(stage, items);
        const elapsed = formatDuration(Date.now() - context.startedAt);
        if (opts.json) {
          runtime.log(JSON.stringify({ runId: context.runId, ...report }));
        } else {
          const failures = formatFailures([report]);
          runtime.log(
            [`${stage}: ${report.status} in ${elapsed}`, formatStageLine(report), ...(failures.length ? ["Failures:", ...failures] : [])].join("\n"),
          );
        }
        return exitCodeForStage(report, context.interrupted);
      },
    );

    if (code !== 0) runtime.exit(code);
    return code;
  } finally {
    if (!deps.logger) await logger.close();
  }
}

export function deleteCommand(
  opts: MaintenanceOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<number> {
  return runMaintenance("delete", opts, runtime, deps);
}

export function cleanupKeysCommand(
  opts: MaintenanceOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<number> {
  return runMaintenance("cleanup-keys", opts, runtime, deps);
}
