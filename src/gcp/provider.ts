/**
 * gcloud-backed Resource Provider.
 *
 * Maps each pipeline operation onto one `gcloud` command. Failed commands
 * throw ProviderCommandError; its message is the command's stderr, which
 * the retry classifier reads.
 */

import { expandTemplate } from "../config/config.js";
import type { ProvisionLogger } from "../logging/logger.js";
import type { CredentialRef, RawResponse, ResourceProvider, WorkItem } from "../provisioning/types.js";
import { ProviderCommandError, runGcloud, type GcloudCliOptions, type GcloudCliResult } from "./cli-wrapper.js";
import { decodeCredentialRefs, decodeQuotaLimit } from "./decoder.js";

export type GcloudProviderOptions = {
  /** API service enabled on every project. */
  service?: string;
  /** Display name for created keys; `{id}` is the project id. */
  credentialDisplayName?: string;
  bin?: string;
  commandTimeoutMs?: number;
  logger?: ProvisionLogger;
  /** Substitute for tests. */
  exec?: (args: string[], opts: GcloudCliOptions) => Promise<GcloudCliResult>;
};

export class GcloudProvider implements ResourceProvider {
  private readonly options: GcloudProviderOptions;
  private readonly exec: (args: string[], opts: GcloudCliOptions) => Promise<GcloudCliResult>;

  constructor(options: GcloudProviderOptions = {}) {
    this.options = options;
    this.exec = options.exec ?? runGcloud;
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  async createResource(id: WorkItem, signal?: AbortSignal): Promise<void> {
    await this.run(["projects", "create", id, `--name=${id}`, "--no-set-as-default"], signal);
  }

  async deleteResource(id: WorkItem, signal?: AbortSignal): Promise<void> {
    await this.run(["projects", "delete", id], signal);
  }

  /** Projects visible to the active account, excluding `sys-` system projects. */
  async listResources(signal?: AbortSignal): Promise<WorkItem[]> {
    const stdout = await this.run(
      ["projects", "list", "--format=value(projectId)", "--filter=projectId!~^sys-"],
      signal,
    );
    return stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
  }

  // ---------------------------------------------------------------------------
  // Services
  // ---------------------------------------------------------------------------

  async enableCapability(id: WorkItem, signal?: AbortSignal): Promise<void> {
    const service = this.options.service;
    if (!service) throw new Error("No service configured for enable");
    await this.run(["services", "enable", service, `--project=${id}`], signal);
  }

  // ---------------------------------------------------------------------------
  // API keys
  // ---------------------------------------------------------------------------

  async listCredentials(id: WorkItem, signal?: AbortSignal): Promise<CredentialRef[]> {
    const stdout = await this.run(["services", "api-keys", "list", `--project=${id}`, "--format=json"], signal);
    return decodeCredentialRefs(stdout);
  }

  async createCredential(id: WorkItem, signal?: AbortSignal): Promise<RawResponse> {
    const displayName = expandTemplate(this.options.credentialDisplayName ?? "bulk-key-{id}", { id });
    return this.run(
      ["services", "api-keys", "create", `--project=${id}`, `--display-name=${displayName}`, "--format=json"],
      signal,
    );
  }

  async getCredentialValue(ref: CredentialRef, signal?: AbortSignal): Promise<RawResponse> {
    return this.run(["services", "api-keys", "get-key-string", ref.name, "--format=json"], signal);
  }

  async deleteCredential(ref: CredentialRef, signal?: AbortSignal): Promise<void> {
    await this.run(["services", "api-keys", "delete", ref.name], signal);
  }

  // ---------------------------------------------------------------------------
  // Account checks
  // ---------------------------------------------------------------------------

  /** Active account email, or `undefined` when nobody is logged in. */
  async getActiveAccount(): Promise<string | undefined> {
    const result = await this.exec(["auth", "list", "--filter=status:ACTIVE", "--format=value(account)"], this.cliOptions());
    if (!result.success) return undefined;
    return result.stdout.split(/\r?\n/).map((l) => l.trim()).find(Boolean);
  }

  /**
   * Project-creation quota for the active project. Tries the GA command,
   * then the alpha one; `undefined` when neither yields a number.
   */
  async getProjectCreationQuota(): Promise<number | undefined> {
    const current = await this.exec(["config", "get-value", "project"], this.cliOptions());
    const project = current.success ? current.stdout.trim() : "";
    if (!project) {
      this.options.logger?.warn("no default project set, skipping quota check");
      return undefined;
    }

    const attempts: string[][] = [
      [
        "services",
        "quota",
        "list",
        "--service=cloudresourcemanager.googleapis.com",
        `--consumer=projects/${project}`,
        "--filter=metric=cloudresourcemanager.googleapis.com/project_create_requests",
        "--format=json",
      ],
      [
        "alpha",
        "services",
        "quota",
        "list",
        "--service=cloudresourcemanager.googleapis.com",
        `--consumer=projects/${project}`,
        "--filter=metric(cloudresourcemanager.googleapis.com/project_create_requests)",
        "--format=json",
      ],
    ];

    for (const args of attempts) {
      const result = await this.exec(args, this.cliOptions());
      if (!result.success) continue;
      const limit = decodeQuotaLimit(result.stdout);
      if (limit !== undefined) return limit;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------

  private cliOptions(signal?: AbortSignal): GcloudCliOptions {
    return { bin: this.options.bin, timeout: this.options.commandTimeoutMs, signal };
  }

  private async run(args: string[], signal?: AbortSignal): Promise<string> {
    const command = args.slice(0, 3).join(" ");
    this.options.logger?.trace("gcloud", { args });
    const result = await this.exec(args, this.cliOptions(signal));
    if (!result.success) throw new ProviderCommandError(command, result);
    return result.stdout;
  }
}
