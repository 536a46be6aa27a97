/**
 * `bulk-provisioner provision`
 *
 * Generates a fresh batch of project ids and runs the full pipeline:
 * create, settle, enable, extract. With `--rebuild`, every project the
 * account can see is deleted first.
 */

import type { ProvisionerConfigInput } from "../config/config.js";
import { requireService } from "../config/config.js";
import { decodeCredentialValue } from "../gcp/decoder.js";
import { createProvisioningPipeline } from "../provisioning/pipeline.js";
import { buildReport, exitCodeForReport, formatReport, EXIT_INTERRUPTED } from "../provisioning/report.js";
import { withRunContext } from "../provisioning/run-context.js";
import { generateWorkItems } from "../provisioning/work-items.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";
import { attachProgress, setupCommand, type CommandDeps } from "./shared.js";

export type ProvisionOptions = {
  configFile?: string;
  overrides?: ProvisionerConfigInput;
  /** Delete every visible project before provisioning. */
  rebuild?: boolean;
  /** Lower the count to the project-creation quota instead of only warning. */
  clampToQuota?: boolean;
  json?: boolean;
};

export async function provisionCommand(
  opts: ProvisionOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<number> {
  const { config, logger, provider, account } = await setupCommand(
    { configFile: opts.configFile, overrides: opts.overrides ?? {} },
    deps,
  );

  try {
    requireService(config);
    let count = config.count;
    if (account) {
      const user = await account.getActiveAccount();
      if (user) logger.info("active account", { account: user });
      else logger.warn("no active gcloud account; commands will likely fail");

      const quota = await account.getProjectCreationQuota();
      if (quota === undefined) {
        logger.warn("project creation quota unknown, check it manually");
      } else if (count > quota) {
        if (opts.clampToQuota) {
          logger.warn("count exceeds project creation quota, clamping", { count, quota });
          count = quota;
        } else {
          logger.warn("count exceeds project creation quota", { count, quota });
        }
      }
    }

    if (count < 1) {
      runtime.error("Nothing to provision: project creation quota is 0.");
      runtime.exit(1);
      return 1;
    }

    const code = await withRunContext(
      { config, logger, withSink: true, handleSignals: deps.handleSignals ?? true },
      async (context) => {
        const pipeline = createProvisioningPipeline({
          context,
          provider,
          decode: decodeCredentialValue,
          sleep: deps.sleep,
        });
        attachProgress(pipeline, deps.progress ?? Boolean(process.stderr.isTTY && !opts.json));

        if (opts.rebuild) {
          const existing = await provider.listResources(context.signal);
          logger.info("rebuild: deleting existing projects", { count: existing.length });
          await pipeline.runStage("delete", existing);
          if (context.interrupted) return EXIT_INTERRUPTED;
        }

        const items = generateWorkItems({ prefix: config.prefix, namespace: context.namespace, count });
        logger.info("provisioning", { count, namespace: context.namespace, concurrency: config.concurrency });
        const result = await pipeline.run(items, "create");

        // Flush before reporting so the files on disk match the report.
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
