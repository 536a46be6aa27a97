/**
 * `bulk-provisioner extract`
 *
 * Pulls one API key from each of a set of existing projects, enabling the
 * service first unless `--skip-enable` is given.
 */

import { requireService, type ProvisionerConfigInput } from "../config/config.js";
import { decodeCredentialValue } from "../gcp/decoder.js";
import { createProvisioningPipeline } from "../provisioning/pipeline.js";
import { buildReport, exitCodeForReport, formatReport } from "../provisioning/report.js";
import { withRunContext } from "../provisioning/run-context.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";
import { attachProgress, resolveTargets, setupCommand, type CommandDeps } from "./shared.js";

export type ExtractOptions = {
  ids?: string[];
  fromFile?: string;
  all?: boolean;
  skipEnable?: boolean;
  configFile?: string;
  overrides?: ProvisionerConfigInput;
  json?: boolean;
};

export async function extractCommand(
  opts: ExtractOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<number> {
  const { config, logger, provider } = await setupCommand(
    { configFile: opts.configFile, overrides: opts.overrides ?? {} },
    deps,
  );

  try {
    if (!opts.skipEnable) requireService(config);

    const code = await withRunContext(
      { config, logger, withSink: true, handleSignals: deps.handleSignals ?? true },
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

        logger.info("extracting keys", { projects: items.length, skipEnable: Boolean(opts.skipEnable) });
        const result = await pipeline.run(items, opts.skipEnable ? "extract" : "enable");

        await context.sink?.flush();
        const report = buildReport({
          result,
          runId: context.runId,
          namespace: context.namespace,
          credentials: context.sink?.size ?? 0,
          startedAt: context.startedAt,
          outputFiles: context.sink?.paths,
        });
        runtime.log(opts.json ? JSON.stringify(report) : formatReport(report));
        return exitCodeForReport(report);
      },
    );

    if (code !== 0) runtime.exit(code);
    return code;
  } finally {
    if (!deps.logger) await logger.close();
  }
}
