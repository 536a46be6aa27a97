/**
 * Helpers shared by the provisioning commands: config and logger setup,
 * provider construction, id resolution and progress wiring.
 */

import fs from "node:fs/promises";

import { loadConfig, type ProvisionerConfig, type ProvisionerConfigInput } from "../config/config.js";
import { GcloudProvider } from "../gcp/provider.js";
import { createProvisionLogger, type ProvisionLogger } from "../logging/logger.js";
import type { ProvisioningPipeline } from "../provisioning/pipeline.js";
import { createStageProgress, type ProgressReporter } from "../provisioning/progress.js";
import type { StageName } from "../provisioning/tasks.js";
import type { ResourceProvider, WorkItem } from "../provisioning/types.js";
import { parseWorkItemList } from "../provisioning/work-items.js";
import type { SleepFn } from "../utils.js";
import { resolveUserPath } from "../utils.js";

/** Account checks the CLI runs before provisioning. */
export interface AccountInspector {
  getActiveAccount(): Promise<string | undefined>;
  getProjectCreationQuota(): Promise<number | undefined>;
}

/** Substitutes for tests; each defaults to the gcloud implementation. */
export type CommandDeps = {
  provider?: ResourceProvider;
  account?: AccountInspector;
  logger?: ProvisionLogger;
  env?: NodeJS.ProcessEnv;
  sleep?: SleepFn;
  /** Install SIGINT/SIGTERM handlers (default: true). */
  handleSignals?: boolean;
  /** Render progress bars on stderr (default: when stderr is a TTY). */
  progress?: boolean;
};

export type CommandSetup = {
  config: ProvisionerConfig;
  logger: ProvisionLogger;
  provider: ResourceProvider;
  account?: AccountInspector;
};

export async function setupCommand(
  input: { configFile?: string; overrides: ProvisionerConfigInput },
  deps: CommandDeps,
): Promise<CommandSetup> {
  const config = await loadConfig({ file: input.configFile, env: deps.env ?? process.env, overrides: input.overrides });
  const logger =
    deps.logger ?? createProvisionLogger("cli", { level: config.logging.level, file: config.logging.file });

  if (deps.provider) {
    return { config, logger, provider: deps.provider, account: deps.account };
  }

  const gcloud = new GcloudProvider({
    service: config.service,
    credentialDisplayName: config.credentialDisplayName,
    bin: config.gcloud.bin,
    commandTimeoutMs: config.gcloud.commandTimeoutMs,
    logger: logger.child("gcloud"),
  });
  return { config, logger, provider: gcloud, account: deps.account ?? gcloud };
}

/**
 * Resolve the target ids from positional arguments, `--from-file` and
 * `--all`, in that order, dropping duplicates.
 */
export async function resolveTargets(
  input: { ids: string[]; fromFile?: string; all?: boolean },
  provider: ResourceProvider,
  signal?: AbortSignal,
): Promise<WorkItem[]> {
  const collected = [...input.ids];
  if (input.fromFile) {
    collected.push(...parseWorkItemList(await fs.readFile(resolveUserPath(input.fromFile), "utf8")));
  }
  if (input.all) {
    collected.push(...(await provider.listResources(signal)));
  }
  return parseWorkItemList(collected.join("\n"));
}

/** Render a progress bar per stage while the pipeline runs. */
export function attachProgress(pipeline: ProvisioningPipeline, enabled: boolean): () => void {
  let current: ProgressReporter | undefined;
  const labels: Record<StageName, string> = {
    create: "Creating projects",
    enable: "Enabling service",
    extract: "Extracting keys",
    delete: "Deleting projects",
    "cleanup-keys": "Cleaning up keys",
  };

  return pipeline.on((event) => {
    switch (event.type) {
      case "stage-start":
        current = createStageProgress(labels[event.stage], { silent: !enabled });
        current.update({ completed: 0, total: event.total, succeeded: 0, failed: 0 });
        break;
      case "stage-progress":
        current?.update(event.progress);
        break;
      case "stage-complete":
        current?.done();
        current = undefined;
        break;
      default:
        break;
    }
  });
}
