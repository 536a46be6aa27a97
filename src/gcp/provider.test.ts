import { describe, it, expect, vi } from "vitest";

import type { GcloudCliOptions, GcloudCliResult } from "./cli-wrapper.js";
import { ProviderCommandError } from "./cli-wrapper.js";
import { GcloudProvider } from "./provider.js";

const ok = (stdout = ""): GcloudCliResult => ({ success: true, stdout, stderr: "", exitCode: 0 });
const fail = (stderr: string): GcloudCliResult => ({ success: false, stdout: "", stderr, exitCode: 1 });

function createProvider(responses: GcloudCliResult[], service = "example.googleapis.com") {
  const exec = vi.fn(async (_args: string[], _opts: GcloudCliOptions) => responses.shift() ?? ok());
  const provider = new GcloudProvider({ service, exec, bin: "gcloud-test", commandTimeoutMs: 1_000 });
  return { provider, exec };
}

describe("GcloudProvider", () => {
  it("creates a project without making it the default", async () => {
    const { provider, exec } = createProvider([ok()]);
    await provider.createResource("proj-abcd1234-001");
    expect(exec).toHaveBeenCalledWith(
      ["projects", "create", "proj-abcd1234-001", "--name=proj-abcd1234-001", "--no-set-as-default"],
      { bin: "gcloud-test", timeout: 1_000, signal: undefined },
    );
  });

  it("forwards the abort signal to the command", async () => {
    const { provider, exec } = createProvider([ok()]);
    const controller = new AbortController();
    await provider.deleteResource("proj-1", controller.signal);
    expect(exec.mock.calls[0][1].signal).toBe(controller.signal);
  });

  it("enables the configured service", async () => {
    const { provider, exec } = createProvider([ok()]);
    await provider.enableCapability("proj-1");
    expect(exec.mock.calls[0][0]).toEqual(["services", "enable", "example.googleapis.com", "--project=proj-1"]);
  });

  it("refuses to enable without a service", async () => {
    const provider = new GcloudProvider({ exec: async () => ok() });
    await expect(provider.enableCapability("proj-1")).rejects.toThrow("No service configured for enable");
  });

  it("throws ProviderCommandError with stderr on failure", async () => {
    const { provider } = createProvider([fail("ERROR: Quota exceeded for quota metric")]);
    const error = await provider.createResource("proj-1").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderCommandError);
    expect(error instanceof Error ? error.message : "").toBe("ERROR: Quota exceeded for quota metric");
  });

  it("names created keys from the display-name template", async () => {
    const exec = vi.fn(async (_args: string[], _opts: GcloudCliOptions) => ok('{"response":{"keyString":"test-key"}}'));
    const provider = new GcloudProvider({ credentialDisplayName: "key-{id}", exec });
    expect(await provider.createCredential("proj-9")).toBe('{"response":{"keyString":"test-key"}}');
    expect(exec.mock.calls[0][0]).toEqual([
      "services",
      "api-keys",
      "create",
      "--project=proj-9",
      "--display-name=key-proj-9",
      "--format=json",
    ]);
  });

  it("lists keys and projects", async () => {
    const { provider } = createProvider([
      ok('[{"name":"projects/1/locations/global/keys/k1","displayName":"bulk-key-proj-1"}]'),
      ok("proj-1\nproj-2\n\n"),
    ]);
    expect(await provider.listCredentials("proj-1")).toEqual([
      { name: "projects/1/locations/global/keys/k1", displayName: "bulk-key-proj-1" },
    ]);
    expect(await provider.listResources()).toEqual(["proj-1", "proj-2"]);
  });

  it("reads the quota through the alpha command when the GA one has no limit", async () => {
    const { provider, exec } = createProvider([ok("home-project\n"), ok("[]"), ok('{"effectiveLimit": {"INT64": "25"}}')]);
    expect(await provider.getProjectCreationQuota()).toBe(25);
    expect(exec).toHaveBeenCalledTimes(3);
    expect(exec.mock.calls[2][0][0]).toBe("alpha");
  });

  it("skips the quota check without a default project", async () => {
    const { provider, exec } = createProvider([ok("\n")]);
    expect(await provider.getProjectCreationQuota()).toBeUndefined();
    expect(exec).toHaveBeenCalledTimes(1);
  });

  it("returns the active account", async () => {
    const { provider } = createProvider([ok("ops@example.com\n")]);
    expect(await provider.getActiveAccount()).toBe("ops@example.com");
  });
});
