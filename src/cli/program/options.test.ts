import { Command } from "commander";
import { describe, expect, it } from "vitest";

import { addCommonOptions, addOutputOptions, addTargetOptions, overridesFromCli, parseCliOptions } from "./options.js";

function parse(argv: string[]) {
  const command = new Command("test").exitOverride();
  addTargetOptions(command);
  addOutputOptions(command);
  addCommonOptions(command);
  command.parse(argv, { from: "user" });
  return { ids: command.args, opts: parseCliOptions(command.opts()) };
}

describe("cli options", () => {
  it("coerces numeric flags", () => {
    const { opts } = parse(["--concurrency", "5", "--max-attempts", "2", "--settle-ms", "0"]);
    expect(opts.concurrency).toBe(5);
    expect(opts.maxAttempts).toBe(2);
    expect(opts.settleMs).toBe(0);
  });

  it("keeps the circuit on unless --no-circuit is given", () => {
    expect(parse([]).opts.circuit).toBe(true);
    expect(parse(["--no-circuit"]).opts.circuit).toBe(false);
  });

  it("collects positional ids", () => {
    const { ids, opts } = parse(["proj-1", "proj-2", "--all"]);
    expect(ids).toEqual(["proj-1", "proj-2"]);
    expect(opts.all).toBe(true);
  });

  it("rejects a non-numeric concurrency", () => {
    expect(() => parseCliOptions({ concurrency: "many" })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => parseCliOptions({ logLevel: "loud" })).toThrow();
  });

  it("maps flags onto config overrides", () => {
    const overrides = overridesFromCli(
      parseCliOptions({
        count: "4",
        service: "example.googleapis.com",
        maxAttempts: "5",
        burstEvery: "10",
        circuit: false,
        outputDir: "/tmp/keys",
        gcloudBin: "/opt/gcloud",
        logLevel: "debug",
      }),
    );

    expect(overrides).toEqual({
      count: 4,
      service: "example.googleapis.com",
      retry: { maxAttempts: 5 },
      burst: { every: 10 },
      circuit: { enabled: false },
      output: { dir: "/tmp/keys" },
      gcloud: { bin: "/opt/gcloud" },
      logging: { level: "debug" },
    });
  });

  it("leaves unset flags out of the overrides", () => {
    const overrides = overridesFromCli(parseCliOptions({ circuit: true }));
    expect(overrides.circuit).toBeUndefined();
    expect(overrides.retry).toBeUndefined();
    expect(overrides.logging).toBeUndefined();
  });
});
