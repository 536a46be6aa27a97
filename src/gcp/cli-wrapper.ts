/**
 * gcloud CLI wrapper: executes real `gcloud` commands via child_process.
 *
 * Every command runs non-interactively with JSON output where requested.
 * Returns structured results with stdout/stderr; callers decide whether a
 * failure should throw.
 */

import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

const execFile = promisify(execFileCb);

/** Options for gcloud CLI invocations. */
export interface GcloudCliOptions {
  /** Path to gcloud binary (default: "gcloud"). */
  bin?: string;
  /** Extra environment variables. */
  env?: Record<string, string>;
  /** Timeout in ms (default: 300_000 = 5 min). */
  timeout?: number;
  /** Kills the child process when aborted. */
  signal?: AbortSignal;
}

/** Result from a gcloud CLI command. */
export interface GcloudCliResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

/** Thrown by the provider when a gcloud command fails. */
export class ProviderCommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, result: GcloudCliResult) {
    super(summarizeStderr(result.stderr) || `gcloud ${command} exited with code ${result.exitCode ?? "null"}`);
    this.name = "ProviderCommandError";
    this.command = command;
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
  }
}

/** Collapse multi-line gcloud stderr into one line, dropping blank lines. */
export function summarizeStderr(stderr: string): string {
  return stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .join(" ");
}

/** Core exec helper. */
export async function runGcloud(args: string[], opts: GcloudCliOptions = {}): Promise<GcloudCliResult> {
  const bin = opts.bin ?? "gcloud";
  const timeout = opts.timeout ?? 300_000;
  const env = { ...process.env, ...opts.env, CLOUDSDK_CORE_DISABLE_PROMPTS: "1" };

  try {
    const { stdout, stderr } = await execFile(bin, [...args, "--quiet"], {
      env,
      timeout,
      signal: opts.signal,
      maxBuffer: 10 * 1024 * 1024, // 10 MB
    });
    return { success: true, stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    return { success: false, ...failureOutput(err) };
  }
}

function failureOutput(err: unknown): Omit<GcloudCliResult, "success"> {
  const fallback = err instanceof Error ? err.message : String(err);
  if (typeof err !== "object" || err === null) {
    return { stdout: "", stderr: fallback, exitCode: 1 };
  }
  const stdout = "stdout" in err && typeof err.stdout === "string" ? err.stdout : "";
  const stderr = "stderr" in err && typeof err.stderr === "string" && err.stderr ? err.stderr : fallback;
  const code = "code" in err ? err.code : undefined;
  // Aborted or timed-out children carry a string code and no exit status.
  const exitCode = typeof code === "number" ? code : typeof code === "string" ? null : 1;
  return { stdout, stderr, exitCode };
}
