import type { Command } from "commander";

import { cleanupKeysCommand, deleteCommand, type MaintenanceOptions } from "../../commands/maintenance.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { IdListSchema, addCommonOptions, addTargetOptions, overridesFromCli, parseCliOptions } from "./options.js";

function toMaintenanceOptions(ids: unknown, raw: unknown): MaintenanceOptions {
  const opts = parseCliOptions(raw);
  return {
    ids: IdListSchema.parse(ids),
    fromFile: opts.fromFile,
    all: opts.all,
    yes: opts.yes,
    configFile: opts.config,
    overrides: overridesFromCli(opts),
    json: opts.json,
  };
}

export function registerDeleteCommand(program: Command) {
  const command = program
    .command("delete")
    .description("Delete projects")
    .option("--yes", "Confirm deletion");
  addTargetOptions(command);
  addCommonOptions(command);

  command.action(async (ids: unknown, raw: unknown) => {
    await runCommandWithRuntime(defaultRuntime, async () => {
      await deleteCommand(toMaintenanceOptions(ids, raw), defaultRuntime);
    });
  });
}

export function registerCleanupKeysCommand(program: Command) {
  const command = program
    .command("cleanup-keys")
    .description("Delete every API key in the given projects")
    .option("--yes", "Confirm key deletion");
  addTargetOptions(command);
  addCommonOptions(command);

  command.action(async (ids: unknown, raw: unknown) => {
    await runCommandWithRuntime(defaultRuntime, async () => {
      await cleanupKeysCommand(toMaintenanceOptions(ids, raw), defaultRuntime);
    });
  });
}
