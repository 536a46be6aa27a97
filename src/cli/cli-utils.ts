import { ConfigError } from "../config/config.js";
import { formatErrorMessage } from "../provisioning/retry.js";
import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command action; anything it throws is printed and turned into
 * exit code 1.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.error(error instanceof ConfigError ? error.message : `Error: ${formatErrorMessage(error)}`);
    runtime.exit(1);
  }
}
