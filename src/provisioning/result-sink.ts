/**
 * Provisioning: Result Sink
 *
 * Accumulates extracted credentials and persists them in two encodings:
 * one value per line, and a single comma-joined line. Every flush writes a
 * full snapshot of both files through a staging directory and renames them
 * into place, so readers never see a partial or mismatched pair.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ProvisionLogger } from "../logging/logger.js";
import type { Credential, WorkItem } from "./types.js";

export type AppendOutcome = "appended" | "duplicate";

export type CredentialSinkOptions = {
  dir: string;
  lineFile: string;
  commaFile: string;
  /** Credentials buffered before a flush. */
  batchSize?: number;
  logger?: ProvisionLogger;
};

export type SinkPaths = {
  lineFile: string;
  commaFile: string;
};

export class CredentialSink {
  readonly paths: SinkPaths;
  private readonly dir: string;
  private readonly batchSize: number;
  private readonly logger?: ProvisionLogger;

  private readonly credentials: Credential[] = [];
  private readonly seen = new Set<WorkItem>();
  private pending = 0;
  private stagingDir?: string;
  private state: "new" | "open" | "closed" = "new";
  private queue: Promise<void> = Promise.resolve();

  constructor(options: CredentialSinkOptions) {
    this.dir = path.resolve(options.dir);
    this.paths = {
      lineFile: path.join(this.dir, options.lineFile),
      commaFile: path.join(this.dir, options.commaFile),
    };
    this.batchSize = Math.max(1, options.batchSize ?? 1);
    this.logger = options.logger;
  }

  /** Truncate both output files and create the staging directory. */
  async open(): Promise<void> {
    if (this.state !== "new") throw new Error(`Result sink cannot be opened twice (state: ${this.state})`);
    await fs.mkdir(this.dir, { recursive: true });
    await Promise.all([fs.writeFile(this.paths.lineFile, ""), fs.writeFile(this.paths.commaFile, "")]);
    this.stagingDir = await fs.mkdtemp(path.join(this.dir, ".sink-staging-"));
    this.state = "open";
    this.logger?.debug("result sink opened", { ...this.paths });
  }

  /**
   * Record one credential. The first write for an item wins; later writes
   * for the same item are reported as duplicates and dropped.
   */
  append(credential: Credential): Promise<AppendOutcome> {
    return this.locked(async () => {
      if (this.state !== "open") throw new Error(`Result sink is not open (state: ${this.state})`);
      if (this.seen.has(credential.item)) {
        this.logger?.warn("duplicate credential ignored", { item: credential.item });
        return "duplicate";
      }
      this.seen.add(credential.item);
      this.credentials.push(credential);
      this.pending++;
      if (this.pending >= this.batchSize) await this.writeSnapshot();
      return "appended";
    });
  }

  /** Write any buffered credentials. */
  flush(): Promise<void> {
    return this.locked(async () => {
      if (this.state === "open" && this.pending > 0) await this.writeSnapshot();
    });
  }

  /** Flush and remove the staging directory. Safe to call more than once. */
  close(): Promise<void> {
    return this.locked(async () => {
      if (this.state === "closed") return;
      const wasOpen = this.state === "open";
      try {
        if (wasOpen && this.pending > 0) await this.writeSnapshot();
      } finally {
        this.state = "closed";
        if (this.stagingDir) {
          await fs.rm(this.stagingDir, { recursive: true, force: true });
          this.stagingDir = undefined;
        }
      }
      if (wasOpen) this.logger?.debug("result sink closed", { count: this.credentials.length });
    });
  }

  snapshot(): Credential[] {
    return [...this.credentials];
  }

  get size(): number {
    return this.credentials.length;
  }

  // ---------------------------------------------------------------------------

  private locked<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async writeSnapshot(): Promise<void> {
    const staging = this.stagingDir;
    if (!staging) throw new Error("Result sink staging directory is missing");

    const values = this.credentials.map((c) => c.value);
    const lineContent = values.length > 0 ? `${values.join("\n")}\n` : "";
    const commaContent = values.join(",");

    const lineTmp = path.join(staging, "line.tmp");
    const commaTmp = path.join(staging, "comma.tmp");
    await Promise.all([fs.writeFile(lineTmp, lineContent), fs.writeFile(commaTmp, commaContent)]);
    await fs.rename(lineTmp, this.paths.lineFile);
    await fs.rename(commaTmp, this.paths.commaFile);
    this.pending = 0;
  }
}
