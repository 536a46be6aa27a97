/**
 * Provisioning: Retry Utilities
 *
 * Error classification and a bounded retry executor with linear backoff.
 * Rate-limit errors wait longer; fatal errors are never retried.
 */

import type { ProvisionLogger } from "../logging/logger.js";
import { sleep as defaultSleep, type SleepFn } from "../utils.js";
import { isFatalErrorClass, type ErrorClass } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  rateLimitMultiplier?: number;
};

export type RetryConfig = Required<RetryOptions>;

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 5_000,
  maxDelayMs: 60_000,
  rateLimitMultiplier: 2,
};

// =============================================================================
// Classification Table
// =============================================================================

/**
 * Structured status codes (gRPC / REST `error.status`) take precedence over
 * message matching when the provider supplies one.
 */
export const STATUS_CODE_CLASSES: Readonly<Record<string, ErrorClass>> = {
  PERMISSION_DENIED: "fatal-permission-denied",
  UNAUTHENTICATED: "fatal-permission-denied",
  INVALID_ARGUMENT: "fatal-invalid-argument",
  FAILED_PRECONDITION: "fatal-invalid-argument",
  ALREADY_EXISTS: "fatal-already-exists",
  RESOURCE_EXHAUSTED: "retryable-rate-limited",
  RATE_LIMIT_EXCEEDED: "retryable-rate-limited",
  UNAVAILABLE: "retryable-transient",
  DEADLINE_EXCEEDED: "retryable-transient",
  INTERNAL: "retryable-transient",
  ABORTED: "retryable-transient",
};

export type ClassificationRule = {
  pattern: RegExp;
  errorClass: ErrorClass;
};

/**
 * Message patterns, checked in order. Fatal patterns come first so that a
 * message mentioning both a permission problem and a quota is never retried.
 *
 * This couples us to the provider's human-readable error text; keep the
 * table in sync with the CLI version in use.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { pattern: /permission denied|authentication failed|PERMISSION_DENIED|UNAUTHENTICATED/i, errorClass: "fatal-permission-denied" },
  { pattern: /INVALID_ARGUMENT|invalid argument|invalid value/i, errorClass: "fatal-invalid-argument" },
  { pattern: /already exists|ALREADY_EXISTS/i, errorClass: "fatal-already-exists" },
  { pattern: /quota exceeded|RESOURCE_EXHAUSTED|rate limit|too many requests/i, errorClass: "retryable-rate-limited" },
];

/**
 * Map any thrown value to an ErrorClass. Unrecognised errors are transient.
 */
export function classifyError(error: unknown): ErrorClass {
  if (error === null || error === undefined) return "retryable-transient";

  const code = errorCode(error);
  if (code && code in STATUS_CODE_CLASSES) {
    return STATUS_CODE_CLASSES[code];
  }

  const message = errorText(error);
  for (const rule of CLASSIFICATION_RULES) {
    if (rule.pattern.test(message)) return rule.errorClass;
  }
  return "retryable-transient";
}

/**
 * Backoff before the next attempt: `base × attempt` capped at `maxDelayMs`,
 * then multiplied for rate-limit errors.
 */
export function computeBackoffMs(errorClass: ErrorClass, attempt: number, config: RetryConfig): number {
  const linear = Math.min(config.baseDelayMs * attempt, config.maxDelayMs);
  return errorClass === "retryable-rate-limited" ? linear * config.rateLimitMultiplier : linear;
}

// =============================================================================
// Retry Execution
// =============================================================================

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; errorClass: ErrorClass; exhausted: boolean; attempts: number; message: string };

export type RetryExecutorOptions = RetryOptions & {
  logger?: ProvisionLogger;
  /** Stops further attempts; a pending backoff wakes immediately. */
  signal?: AbortSignal;
  sleep?: SleepFn;
};

export class RetryExecutor {
  readonly config: RetryConfig;
  private logger?: ProvisionLogger;
  private signal?: AbortSignal;
  private sleep: SleepFn;

  constructor(options?: RetryExecutorOptions) {
    this.config = {
      maxAttempts: options?.maxAttempts ?? RETRY_DEFAULTS.maxAttempts,
      baseDelayMs: options?.baseDelayMs ?? RETRY_DEFAULTS.baseDelayMs,
      maxDelayMs: options?.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs,
      rateLimitMultiplier: options?.rateLimitMultiplier ?? RETRY_DEFAULTS.rateLimitMultiplier,
    };
    this.logger = options?.logger;
    this.signal = options?.signal;
    this.sleep = options?.sleep ?? defaultSleep;
  }

  /**
   * Run `operation` until it succeeds, fails fatally, or `maxAttempts` is used up.
   */
  async execute<T>(
    operation: () => Promise<T>,
    maxAttempts: number = this.config.maxAttempts,
    logger: ProvisionLogger | undefined = this.logger,
  ): Promise<RetryResult<T>> {
    let lastClass: ErrorClass = "retryable-transient";
    let lastMessage = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const value = await operation();
        logger?.debug("attempt succeeded", { attempt, maxAttempts });
        return { ok: true, value, attempts: attempt };
      } catch (error) {
        lastClass = classifyError(error);
        lastMessage = formatErrorMessage(error);

        if (isFatalErrorClass(lastClass)) {
          logger?.warn("attempt failed", { attempt, maxAttempts, errorClass: lastClass, delayMs: 0, error: lastMessage });
          return { ok: false, errorClass: lastClass, exhausted: false, attempts: attempt, message: lastMessage };
        }

        const isLast = attempt >= maxAttempts;
        const delayMs = isLast ? 0 : computeBackoffMs(lastClass, attempt, this.config);
        logger?.warn("attempt failed", { attempt, maxAttempts, errorClass: lastClass, delayMs, error: lastMessage });

        if (isLast) break;
        if (this.signal?.aborted) {
          return { ok: false, errorClass: lastClass, exhausted: false, attempts: attempt, message: lastMessage };
        }

        await this.sleep(delayMs, this.signal);

        if (this.signal?.aborted) {
          return { ok: false, errorClass: lastClass, exhausted: false, attempts: attempt, message: lastMessage };
        }
      }
    }

    logger?.error("attempts exhausted", { maxAttempts, errorClass: lastClass, error: lastMessage });
    return { ok: false, errorClass: lastClass, exhausted: true, attempts: maxAttempts, message: lastMessage };
  }
}

// =============================================================================
// Error Formatting
// =============================================================================

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" && error.code ? error.code : undefined;
}

function errorText(error: unknown): string {
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}

/**
 * Format a provider error into a single human-readable line.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const parts: string[] = [];
  const code = errorCode(error);
  if (code) parts.push(`[${code}]`);
  parts.push(errorText(error).trim() || "Unknown error");

  return parts.join(" ");
}
