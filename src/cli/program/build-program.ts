import { Command } from "commander";

import { VERSION } from "../../version.js";
import { registerExtractCommand } from "./register.extract.js";
import { registerCleanupKeysCommand, registerDeleteCommand } from "./register.maintenance.js";
import { registerProvisionCommand } from "./register.provision.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("bulk-provisioner")
    .description("Provision cloud projects in bulk and collect one API key per project")
    .version(VERSION);

  registerProvisionCommand(program);
  registerExtractCommand(program);
  registerDeleteCommand(program);
  registerCleanupKeysCommand(program);

  return program;
}
