import type { Command } from "commander";

import { provisionCommand } from "../../commands/provision.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { addCommonOptions, addOutputOptions, overridesFromCli, parseCliOptions } from "./options.js";

export function registerProvisionCommand(program: Command) {
  const command = program
    .command("provision")
    .description("Create projects, enable the service on each and extract one API key per project")
    .option("--count <n>", "Number of projects to create")
    .option("--prefix <prefix>", "Project id prefix")
    .option("--burst-every <n>", "Pause after every N dispatches (0 disables)")
    .option("--rebuild", "Delete every visible project before provisioning")
    .option("--clamp-to-quota", "Lower the count to the project creation quota");
  addOutputOptions(command);
  addCommonOptions(command);

  command.action(async (raw: unknown) => {
    await runCommandWithRuntime(defaultRuntime, async () => {
      const opts = parseCliOptions(raw);
      await provisionCommand(
        {
          configFile: opts.config,
          overrides: overridesFromCli(opts),
          rebuild: opts.rebuild,
          clampToQuota: opts.clampToQuota,
          json: opts.json,
        },
        defaultRuntime,
      );
    });
  });
}
