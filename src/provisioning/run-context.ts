/**
 * Provisioning: Run Context
 *
 * Run-scoped state for one command invocation: config, namespace token,
 * logger, result sink and the two cancellation signals. `stop` ends
 * dispatch and backoff waits; `kill` terminates in-flight provider
 * processes once the grace period is over.
 */

import { randomUUID } from "node:crypto";

import { expandTemplate, type ProvisionerConfig } from "../config/config.js";
import type { ProvisionLogger } from "../logging/logger.js";
import { CredentialSink } from "./result-sink.js";
import { createNamespaceToken } from "./work-items.js";

export type InterruptReason = "signal" | "requested";

export type RunContext = {
  readonly runId: string;
  readonly namespace: string;
  readonly config: ProvisionerConfig;
  readonly logger: ProvisionLogger;
  /** Present for commands that extract credentials. */
  readonly sink?: CredentialSink;
  readonly signal: AbortSignal;
  readonly killSignal: AbortSignal;
  readonly startedAt: number;
  readonly interrupted: boolean;
  interrupt: (reason?: InterruptReason) => void;
  terminate: () => void;
  dispose: () => Promise<void>;
};

export type RunContextOptions = {
  config: ProvisionerConfig;
  logger: ProvisionLogger;
  namespace?: string;
  /** Open a credential sink under `config.output`. */
  withSink?: boolean;
  /** First SIGINT/SIGTERM interrupts, a second one kills. */
  handleSignals?: boolean;
  now?: () => number;
};

export async function createRunContext(options: RunContextOptions): Promise<RunContext> {
  const namespace = options.namespace ?? createNamespaceToken();
  const runId = randomUUID();
  const logger = options.logger.withContext({ runId });
  const stop = new AbortController();
  const kill = new AbortController();
  let interrupted = false;

  let sink: CredentialSink | undefined;
  if (options.withSink) {
    const output = options.config.output;
    sink = new CredentialSink({
      dir: output.dir,
      lineFile: expandTemplate(output.lineFile, { namespace }),
      commaFile: expandTemplate(output.commaFile, { namespace }),
      batchSize: output.batchSize,
      logger: logger.child("sink"),
    });
    await sink.open();
  }

  const interrupt = (reason: InterruptReason = "requested") => {
    if (stop.signal.aborted) return;
    interrupted = true;
    logger.warn("interrupt received, stopping dispatch", { reason });
    stop.abort();
  };

  const terminate = () => {
    interrupt();
    if (kill.signal.aborted) return;
    logger.warn("terminating in-flight provider commands");
    kill.abort();
  };

  const onSignal = (name: NodeJS.Signals) => {
    if (stop.signal.aborted) {
      logger.warn("second signal received", { signal: name });
      terminate();
    } else {
      interrupt("signal");
    }
  };

  if (options.handleSignals) {
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  }

  let disposed = false;
  const dispose = async () => {
    if (disposed) return;
    disposed = true;
    if (options.handleSignals) {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
    await sink?.close();
  };

  return {
    runId,
    namespace,
    config: options.config,
    logger,
    sink,
    signal: stop.signal,
    killSignal: kill.signal,
    startedAt: (options.now ?? Date.now)(),
    get interrupted() {
      return interrupted;
    },
    interrupt,
    terminate,
    dispose,
  };
}

/** Run `fn` with a fresh context; the context is disposed on every exit path. */
export async function withRunContext<T>(
  options: RunContextOptions,
  fn: (context: RunContext) => Promise<T>,
): Promise<T> {
  const context = await createRunContext(options);
  try {
    return await fn(context);
  } finally {
    await context.dispose();
  }
}
