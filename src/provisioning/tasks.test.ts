import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { FakeProvider } from "../../test/fake-provider.js";
import { decodeCredentialValue } from "../gcp/decoder.js";
import { createMemoryLogger } from "../logging/logger.js";
import { CredentialSink } from "./result-sink.js";
import { RetryExecutor } from "./retry.js";
import { createStageTasks } from "./tasks.js";

const noSleep = async () => {};
const fixedNow = () => new Date("2026-01-01T00:00:00.000Z");

describe("createStageTasks", () => {
  let dir: string;
  let sink: CredentialSink;
  let provider: FakeProvider;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "provisioner-tasks-"));
    sink = new CredentialSink({ dir, lineFile: "key.txt", commaFile: "keys.csv" });
    await sink.open();
    provider = new FakeProvider();
  });

  afterEach(async () => {
    await sink.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const tasks = (sleep = noSleep) =>
    createStageTasks({
      provider,
      decode: decodeCredentialValue,
      retry: new RetryExecutor({ sleep: noSleep, maxAttempts: 3 }),
      logger: createMemoryLogger().logger,
      sink,
      sleep,
      now: fixedNow,
    });

  describe("create", () => {
    it("retries transient failures", async () => {
      provider.failNext("createResource", "p-1", new Error("backend unavailable"));
      expect(await tasks().create("p-1", 0)).toEqual({ ok: true });
      expect(provider.callsFor("createResource")).toEqual(["p-1", "p-1"]);
    });

    it("reports a fatal failure after one attempt", async () => {
      provider.failAlways("createResource", "p-1", new Error("Permission denied"));
      expect(await tasks().create("p-1", 0)).toEqual({
        ok: false,
        failure: { errorClass: "fatal-permission-denied", exhausted: false, attempts: 1, message: "Permission denied" },
      });
    });
  });

  describe("enable", () => {
    it("treats an already-enabled service as success", async () => {
      provider.failAlways("enableCapability", "p-1", new Error("ALREADY_EXISTS: service enabled"));
      expect(await tasks().enable("p-1", 0)).toEqual({ ok: true });
      expect(provider.callsFor("enableCapability")).toHaveLength(1);
    });
  });

  describe("extract", () => {
    it("creates a key when none exists and records it", async () => {
      expect(await tasks().extract("p-1", 0)).toEqual({ ok: true });
      expect(sink.snapshot()).toEqual([{ item: "p-1", value: "key-p-1", extractedAt: "2026-01-01T00:00:00.000Z" }]);
      expect(provider.callsFor("createCredential")).toEqual(["p-1"]);
    });

    it("reuses an existing key instead of creating one", async () => {
      provider.addKey("p-1");
      expect(await tasks().extract("p-1", 0)).toEqual({ ok: true });
      expect(provider.callsFor("createCredential")).toEqual([]);
      expect(provider.callsFor("getCredentialValue")).toEqual(["p-1"]);
      expect(sink.snapshot().map((c) => c.value)).toEqual(["key-p-1"]);
    });

    it("fetches the key when creation reports it already exists", async () => {
      provider.failNext("createCredential", "p-1", new Error("Resource already exists"));
      // The key appears between the first list and the failed create.
      const list = provider.listCredentials.bind(provider);
      let listCalls = 0;
      vi.spyOn(provider, "listCredentials").mockImplementation(async (id) => {
        listCalls++;
        if (listCalls === 2) provider.addKey(id);
        return list(id);
      });

      expect(await tasks().extract("p-1", 0)).toEqual({ ok: true });
      expect(provider.callsFor("getCredentialValue")).toEqual(["p-1"]);
      expect(sink.snapshot().map((c) => c.value)).toEqual(["key-p-1"]);
    });

    it("fails with malformed-response when the payload has no key", async () => {
      provider.respondWith("createCredential", "p-1", '{"done": false}');
      expect(await tasks().extract("p-1", 0)).toEqual({
        ok: false,
        failure: {
          errorClass: "malformed-response",
          exhausted: false,
          attempts: 1,
          message: "provider response did not contain a key",
        },
      });
      expect(sink.size).toBe(0);
    });

    it("creates a key when listing keeps failing", async () => {
      provider.failAlways("listCredentials", "p-1", new Error("Too many requests"));
      expect(await tasks().extract("p-1", 0)).toEqual({ ok: true });
      expect(provider.callsFor("listCredentials")).toEqual(["p-1", "p-1"]);
      expect(provider.callsFor("createCredential")).toEqual(["p-1"]);
      expect(sink.snapshot().map((c) => c.value)).toEqual(["key-p-1"]);
    });

    it("creates a key when the existing one cannot be read", async () => {
      provider.addKey("p-1");
      provider.failAlways("getCredentialValue", "p-1", new Error("Permission denied"));
      expect(await tasks().extract("p-1", 0)).toEqual({ ok: true });
      expect(provider.callsFor("getCredentialValue")).toEqual(["p-1"]);
      expect(provider.callsFor("createCredential")).toEqual(["p-1"]);
      expect(sink.snapshot().map((c) => c.value)).toEqual(["key-p-1"]);
    });

    it("fails with the create error when no key can be found or made", async () => {
      provider.failAlways("listCredentials", "p-1", new Error("backend unavailable"));
      provider.failAlways("createCredential", "p-1", new Error("Permission denied"));
      expect(await tasks().extract("p-1", 0)).toEqual({
        ok: false,
        failure: { errorClass: "fatal-permission-denied", exhausted: false, attempts: 1, message: "Permission denied" },
      });
    });

    it("throws without a sink", async () => {
      const noSink = createStageTasks({
        provider,
        decode: decodeCredentialValue,
        retry: new RetryExecutor({ sleep: noSleep }),
        logger: createMemoryLogger().logger,
      });
      await expect(noSink.extract("p-1", 0)).rejects.toThrow("Extract stage requires a credential sink");
    });
  });

  describe("delete", () => {
    it("gives up after two attempts", async () => {
      provider.failAlways("deleteResource", "p-1", new Error("backend error"));
      expect(await tasks().delete("p-1", 0)).toMatchObject({ ok: false, failure: { exhausted: true, attempts: 2 } });
      expect(provider.callsFor("deleteResource")).toEqual(["p-1", "p-1"]);
    });
  });

  describe("cleanup-keys", () => {
    it("deletes every key, pausing between deletions", async () => {
      provider.addKey("p-1");
      provider.addKey("p-1");
      provider.addKey("p-1");
      const sleep = vi.fn(async () => {});

      expect(await tasks(sleep)["cleanup-keys"]("p-1", 0)).toEqual({ ok: true });
      expect(provider.keys.get("p-1")).toEqual([]);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it("succeeds even when a deletion fails", async () => {
      const first = provider.addKey("p-1");
      provider.addKey("p-1");
      provider.failAlways("deleteCredential", first.name, new Error("Permission denied"));

      expect(await tasks()["cleanup-keys"]("p-1", 0)).toEqual({ ok: true });
      expect(provider.keys.get("p-1")).toEqual([first]);
    });

    it("fails when keys cannot be listed", async () => {
      provider.failAlways("listCredentials", "p-1", new Error("Permission denied"));
      expect(await tasks()["cleanup-keys"]("p-1", 0)).toMatchObject({ ok: false });
    });
  });
});
