/**
 * Decoders for `gcloud services api-keys` JSON output.
 *
 * None of these throw: an unusable payload decodes to `undefined` (or an
 * empty list) and the caller records it as a malformed response.
 */

import type { CredentialRef, RawResponse } from "../provisioning/types.js";

const KEY_STRING_PATTERN = /"keyString"\s*:\s*"([^"]+)"/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Extract the key string from `api-keys create` (an operation whose
 * `response` holds the key) or `api-keys get-key-string` output.
 */
export function decodeCredentialValue(raw: RawResponse): string | undefined {
  const parsed = tryParse(raw);
  if (parsed === undefined) {
    return KEY_STRING_PATTERN.exec(raw)?.[1];
  }
  if (!isRecord(parsed)) return undefined;

  const direct = nonEmptyString(parsed.keyString);
  if (direct) return direct;
  const response = parsed.response;
  return isRecord(response) ? nonEmptyString(response.keyString) : undefined;
}

/** Parse `api-keys list --format=json` output into key references. */
export function decodeCredentialRefs(raw: RawResponse): CredentialRef[] {
  const parsed = tryParse(raw.trim() || "[]");
  if (!Array.isArray(parsed)) return [];

  const refs: CredentialRef[] = [];
  for (const entry of parsed) {
    if (!isRecord(entry)) continue;
    const name = nonEmptyString(entry.name);
    if (!name) continue;
    const displayName = nonEmptyString(entry.displayName);
    refs.push(displayName ? { name, displayName } : { name });
  }
  return refs;
}

/**
 * Read the effective project-creation limit from `services quota list` or
 * its alpha counterpart. Returns `undefined` when no numeric limit is found.
 */
export function decodeQuotaLimit(raw: RawResponse): number | undefined {
  const text = raw.trim();
  if (!text) return undefined;
  const match = /"effectiveLimit"\s*:\s*"?(\d+)"?/.exec(text) ?? /"INT64"\s*:\s*"?(\d+)"?/.exec(text);
  if (!match) return undefined;
  const limit = Number(match[1]);
  return Number.isSafeInteger(limit) ? limit : undefined;
}
