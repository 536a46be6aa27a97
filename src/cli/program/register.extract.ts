import type { Command } from "commander";

import { extractCommand } from "../../commands/extract.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { IdListSchema, addCommonOptions, addOutputOptions, addTargetOptions, overridesFromCli, parseCliOptions } from "./options.js";

export function registerExtractCommand(program: Command) {
  const command = program
    .command("extract")
    .description("Extract one API key from each existing project")
    .option("--skip-enable", "Do not enable the service before extracting");
  addTargetOptions(command);
  addOutputOptions(command);
  addCommonOptions(command);

  command.action(async (ids: unknown, raw: unknown) => {
    await runCommandWithRuntime(defaultRuntime, async () => {
      const opts = parseCliOptions(raw);
      await extractCommand(
        {
          ids: IdListSchema.parse(ids),
          fromFile: opts.fromFile,
          all: opts.all,
          skipEnable: opts.skipEnable,
          configFile: opts.config,
          overrides: overridesFromCli(opts),
          json: opts.json,
        },
        defaultRuntime,
      );
    });
  });
}
