/**
 * Provisioning: Shared Types
 *
 * Core type definitions shared by the runner, the pipeline and the
 * provider adapters.
 */

// =============================================================================
// Work Items
// =============================================================================

/** Identifier of one resource (a cloud project id) flowing through the pipeline. */
export type WorkItem = string;

// =============================================================================
// Error Classification
// =============================================================================

export type ErrorClass =
  | "retryable-rate-limited"
  | "retryable-transient"
  | "fatal-permission-denied"
  | "fatal-invalid-argument"
  | "fatal-already-exists";

export function isFatalErrorClass(errorClass: ErrorClass): boolean {
  return errorClass.startsWith("fatal-");
}

// =============================================================================
// Stage Results
// =============================================================================

export type StageFailure = {
  /** Classification of the last provider error, or `malformed-response` when the call succeeded but its payload was unusable. */
  errorClass: ErrorClass | "malformed-response";
  /** True when the attempt cap was reached without a fatal error. */
  exhausted: boolean;
  attempts: number;
  message: string;
};

export type TaskOutcome = { ok: true } | { ok: false; failure: StageFailure };

export type StageResult =
  | { item: WorkItem; ok: true }
  | { item: WorkItem; ok: false; failure: StageFailure };

/**
 * A stage task. Failures are returned, not thrown; a throw is still caught
 * by the runner and recorded against the item.
 */
export type TaskFn = (item: WorkItem, index: number) => Promise<TaskOutcome>;

// =============================================================================
// Credentials
// =============================================================================

export type Credential = {
  item: WorkItem;
  value: string;
  /** ISO-8601 extraction time. */
  extractedAt: string;
};

// =============================================================================
// Resource Provider
// =============================================================================

/** Raw provider response payload (the provider's JSON output as text). */
export type RawResponse = string;

/** Reference to a credential that already exists on a resource. */
export type CredentialRef = {
  name: string;
  displayName?: string;
};

/**
 * Operations the pipeline needs from a cloud. Every method throws on failure
 * with an error whose message (and optional `code`) drives classification.
 */
export interface ResourceProvider {
  createResource(id: WorkItem, signal?: AbortSignal): Promise<void>;
  enableCapability(id: WorkItem, signal?: AbortSignal): Promise<void>;
  listCredentials(id: WorkItem, signal?: AbortSignal): Promise<CredentialRef[]>;
  createCredential(id: WorkItem, signal?: AbortSignal): Promise<RawResponse>;
  getCredentialValue(ref: CredentialRef, signal?: AbortSignal): Promise<RawResponse>;
  deleteCredential(ref: CredentialRef, signal?: AbortSignal): Promise<void>;
  deleteResource(id: WorkItem, signal?: AbortSignal): Promise<void>;
  listResources(signal?: AbortSignal): Promise<WorkItem[]>;
}

/** Extracts the secret value from a provider response; absent when it cannot. */
export type CredentialDecoder = (raw: RawResponse) => string | undefined;
