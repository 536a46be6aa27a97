import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, it, expect } from "vitest";

import {
  ConfigError,
  configFromEnv,
  expandTemplate,
  getDefaultConfig,
  loadConfig,
  mergeLayers,
  requireService,
} from "./config.js";

describe("getDefaultConfig", () => {
  it("fills every default", () => {
    const config = getDefaultConfig();
    expect(config.prefix).toBe("proj");
    expect(config.count).toBe(10);
    expect(config.concurrency).toBe(15);
    expect(config.service).toBeUndefined();
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 5_000, maxDelayMs: 60_000, rateLimitMultiplier: 2 });
    expect(config.circuit).toEqual({ enabled: true, threshold: 0.3, minSamples: 10 });
    expect(config.burst).toEqual({ every: 0, delayMs: 1_000 });
    expect(config.output).toEqual({
      dir: ".",
      lineFile: "key.txt",
      commaFile: "comma_separated_keys_{namespace}.txt",
      batchSize: 1,
    });
    expect(config.gcloud).toEqual({ bin: "gcloud", commandTimeoutMs: 300_000 });
    expect(config.logging).toEqual({ level: "info" });
  });
});

describe("configFromEnv", () => {
  it("maps prefixed variables onto config paths", () => {
    expect(
      configFromEnv({
        BULK_PROVISIONER_COUNT: "25",
        BULK_PROVISIONER_SERVICE: "example.googleapis.com",
        BULK_PROVISIONER_MAX_ATTEMPTS: "5",
        BULK_PROVISIONER_LOG_LEVEL: "debug",
        UNRELATED: "x",
      }),
    ).toEqual({
      count: 25,
      service: "example.googleapis.com",
      retry: { maxAttempts: 5 },
      logging: { level: "debug" },
    });
  });

  it("passes unparseable numbers through for validation", () => {
    expect(configFromEnv({ BULK_PROVISIONER_CONCURRENCY: "lots" })).toEqual({ concurrency: "lots" });
  });
});

describe("mergeLayers", () => {
  it("merges nested objects and lets later layers win", () => {
    expect(mergeLayers({ retry: { maxAttempts: 2, baseDelayMs: 1 } }, { retry: { maxAttempts: 4 } })).toEqual({
      retry: { maxAttempts: 4, baseDelayMs: 1 },
    });
  });
});

describe("loadConfig", () => {
  it("applies file, env and overrides in order", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "provisioner-config-"));
    try {
      const file = path.join(dir, "config.json");
      await fs.writeFile(file, JSON.stringify({ prefix: "fromfile", count: 3, concurrency: 4 }));

      const config = await loadConfig({
        file,
        env: { BULK_PROVISIONER_COUNT: "7", BULK_PROVISIONER_CONCURRENCY: "8" },
        overrides: { concurrency: 9, service: undefined },
      });

      expect(config.prefix).toBe("fromfile");
      expect(config.count).toBe(7);
      expect(config.concurrency).toBe(9);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("reports every invalid field", async () => {
    const error = await loadConfig({ overrides: { concurrency: 51, prefix: "9bad" } }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toHaveLength(2);
    expect(error.issues.some((i) => i.startsWith("concurrency:"))).toBe(true);
    expect(error.issues.some((i) => i.startsWith("prefix:"))).toBe(true);
  });

  it("rejects a config file that is not valid JSON", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "provisioner-config-"));
    try {
      const file = path.join(dir, "config.json");
      await fs.writeFile(file, "{ not json");
      await expect(loadConfig({ file })).rejects.toThrow(ConfigError);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("requireService", () => {
  it("throws when no service is configured", () => {
    expect(() => requireService(getDefaultConfig())).toThrow(ConfigError);
  });

  it("returns the configured service", () => {
    expect(requireService({ ...getDefaultConfig(), service: "example.googleapis.com" })).toBe("example.googleapis.com");
  });
});

describe("expandTemplate", () => {
  it("replaces known placeholders only", () => {
    expect(expandTemplate("keys_{namespace}_{other}.txt", { namespace: "abcd1234" })).toBe("keys_abcd1234_{other}.txt");
  });
});
