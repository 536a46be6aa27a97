/**
 * Provisioning: Stage Tasks
 *
 * One TaskFn per stage. Each wraps its provider calls in the retry executor
 * and reports failures as values.
 */

import type { ProvisionLogger } from "../logging/logger.js";
import { sleep as defaultSleep, type SleepFn } from "../utils.js";
import type { CredentialSink } from "./result-sink.js";
import type { RetryExecutor, RetryResult } from "./retry.js";
import type {
  CredentialDecoder,
  CredentialRef,
  RawResponse,
  ResourceProvider,
  StageFailure,
  TaskFn,
  TaskOutcome,
  WorkItem,
} from "./types.js";

export type StageName = "create" | "enable" | "extract" | "delete" | "cleanup-keys";

export type StageTaskDeps = {
  provider: ResourceProvider;
  decode: CredentialDecoder;
  retry: RetryExecutor;
  logger: ProvisionLogger;
  /** Required by `extract`. */
  sink?: CredentialSink;
  /** Passed to every provider call; aborting it kills running commands. */
  killSignal?: AbortSignal;
  /** Pause between key deletions in `cleanup-keys`. */
  cleanupDelayMs?: number;
  sleep?: SleepFn;
  now?: () => Date;
};

export type StageTasks = Record<StageName, TaskFn>;

/** Attempt cap for project deletion. */
export const DELETE_MAX_ATTEMPTS = 2;

/** Attempt cap for listing and reading existing keys before creating one. */
export const LOOKUP_MAX_ATTEMPTS = 2;

function toFailure(result: Extract<RetryResult<unknown>, { ok: false }>): StageFailure {
  return {
    errorClass: result.errorClass,
    exhausted: result.exhausted,
    attempts: result.attempts,
    message: result.message,
  };
}

function toOutcome(result: RetryResult<unknown>): TaskOutcome {
  return result.ok ? { ok: true } : { ok: false, failure: toFailure(result) };
}

export function createStageTasks(deps: StageTaskDeps): StageTasks {
  const { provider, retry, killSignal } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());

  const itemLogger = (stage: StageName, item: WorkItem) => deps.logger.withContext({ stage, resourceId: item });

  const create: TaskFn = async (item) => {
    const log = itemLogger("create", item);
    const result = await retry.execute(() => provider.createResource(item, killSignal), undefined, log);
    if (result.ok) log.info("project created");
    return toOutcome(result);
  };

  const enable: TaskFn = async (item) => {
    const log = itemLogger("enable", item);
    const result = await retry.execute(() => provider.enableCapability(item, killSignal), undefined, log);
    if (!result.ok && result.errorClass === "fatal-already-exists") {
      log.info("service already enabled");
      return { ok: true };
    }
    if (result.ok) log.info("service enabled");
    return toOutcome(result);
  };

  /**
   * Fetch the value of the first existing key. Returns undefined when there
   * is none or when listing or reading fails; the caller then creates one.
   */
  const fetchExisting = async (item: WorkItem, log: ProvisionLogger): Promise<RawResponse | undefined> => {
    const listed = await retry.execute(() => provider.listCredentials(item, killSignal), LOOKUP_MAX_ATTEMPTS, log);
    if (!listed.ok) {
      log.warn("could not list keys, creating a new one", { errorClass: listed.errorClass, error: listed.message });
      return undefined;
    }
    const first: CredentialRef | undefined = listed.value[0];
    if (!first) return undefined;

    log.debug("reusing existing key", { key: first.name, existing: listed.value.length });
    const fetched = await retry.execute(() => provider.getCredentialValue(first, killSignal), LOOKUP_MAX_ATTEMPTS, log);
    if (!fetched.ok) {
      log.warn("could not read existing key, creating a new one", {
        key: first.name,
        errorClass: fetched.errorClass,
        error: fetched.message,
      });
      return undefined;
    }
    return fetched.value;
  };

  const extract: TaskFn = async (item) => {
    const log = itemLogger("extract", item);
    const sink = deps.sink;
    if (!sink) throw new Error("Extract stage requires a credential sink");

    let raw = await fetchExisting(item, log);
    if (raw === undefined) {
      const created = await retry.execute(() => provider.createCredential(item, killSignal), undefined, log);
      if (created.ok) {
        raw = created.value;
      } else if (created.errorClass === "fatal-already-exists") {
        log.info("key already exists, fetching it");
        raw = await fetchExisting(item, log);
        if (raw === undefined) return { ok: false, failure: toFailure(created) };
      } else {
        return { ok: false, failure: toFailure(created) };
      }
    }

    const value = deps.decode(raw);
    if (!value) {
      log.error("could not decode key from provider response");
      return {
        ok: false,
        failure: {
          errorClass: "malformed-response",
          exhausted: false,
          attempts: 1,
          message: "provider response did not contain a key",
        },
      };
    }

    const appended = await sink.append({ item, value, extractedAt: now().toISOString() });
    log.info(appended === "appended" ? "key extracted" : "key already recorded");
    return { ok: true };
  };

  const deleteProject: TaskFn = async (item) => {
    const log = itemLogger("delete", item);
    const result = await retry.execute(() => provider.deleteResource(item, killSignal), DELETE_MAX_ATTEMPTS, log);
    if (result.ok) log.info("project deleted");
    return toOutcome(result);
  };

  const cleanupKeys: TaskFn = async (item) => {
    const log = itemLogger("cleanup-keys", item);
    const listed = await retry.execute(() => provider.listCredentials(item, killSignal), undefined, log);
    if (!listed.ok) return toOutcome(listed);

    let deleted = 0;
    for (const [index, ref] of listed.value.entries()) {
      if (index > 0) await sleep(deps.cleanupDelayMs ?? 500, killSignal);
      const result = await retry.execute(() => provider.deleteCredential(ref, killSignal), undefined, log);
      if (result.ok) {
        deleted++;
      } else {
        log.warn("key deletion failed", { key: ref.name, errorClass: result.errorClass, error: result.message });
      }
    }
    log.info("keys cleaned up", { deleted, total: listed.value.length });
    return { ok: true };
  };

  return { create, enable, extract, delete: deleteProject, "cleanup-keys": cleanupKeys };
}
