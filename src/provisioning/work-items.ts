/**
 * Provisioning: Work Item Generation
 *
 * Builds per-run project ids that satisfy the cloud project naming grammar:
 * 6-30 characters of lowercase letters, digits and hyphens, starting with a
 * letter and not ending with a hyphen.
 */

import { randomInt } from "node:crypto";

import type { WorkItem } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

export const MAX_ID_LENGTH = 30;
export const MIN_ID_LENGTH = 6;

const TOKEN_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

// =============================================================================
// Namespace Token
// =============================================================================

/**
 * Per-run token: four random lowercase alphanumerics followed by the last
 * four digits of the epoch-seconds timestamp.
 */
export function createNamespaceToken(
  now: Date = new Date(),
  random: (max: number) => number = randomInt,
): string {
  let chars = "";
  for (let i = 0; i < 4; i++) {
    chars += TOKEN_ALPHABET[random(TOKEN_ALPHABET.length)];
  }
  const seconds = String(Math.floor(now.getTime() / 1000));
  return `${chars}${seconds.slice(-4)}`;
}

// =============================================================================
// Sanitizing
// =============================================================================

/**
 * Lowercase, drop disallowed characters and collapse hyphen runs.
 */
export function sanitizeSegment(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-{2,}/g, "-");
}

export function isValidProjectId(id: string): boolean {
  return (
    id.length >= MIN_ID_LENGTH &&
    id.length <= MAX_ID_LENGTH &&
    /^[a-z][a-z0-9-]*[a-z0-9]$/.test(id)
  );
}

/**
 * Build one id. Only the `prefix-namespace` head is ever shortened, so the
 * sequence suffix (and with it uniqueness inside the run) is preserved.
 */
export function buildWorkItemId(prefix: string, namespace: string, sequence: string): WorkItem {
  const seq = sanitizeSegment(sequence);
  let head = sanitizeSegment(`${prefix}-${namespace}`).replace(/^-+/, "");
  if (!/^[a-z]/.test(head)) head = `g${head}`;

  const budget = MAX_ID_LENGTH - seq.length - 1;
  head = head.slice(0, Math.max(1, budget)).replace(/-+$/, "");
  return `${head}-${seq}`;
}

// =============================================================================
// Generation
// =============================================================================

export type WorkItemOptions = {
  prefix: string;
  namespace: string;
  count: number;
};

/**
 * Generate `count` ids, numbered from 1 and zero-padded to at least 3 digits.
 */
export function generateWorkItems(options: WorkItemOptions): WorkItem[] {
  const width = Math.max(3, String(options.count).length);
  const items: WorkItem[] = [];
  for (let i = 1; i <= options.count; i++) {
    items.push(buildWorkItemId(options.prefix, options.namespace, String(i).padStart(width, "0")));
  }
  return items;
}

/**
 * Parse an operator-supplied id list: one id per line or comma separated,
 * blank lines and `#` comments ignored, duplicates dropped in order.
 */
export function parseWorkItemList(text: string): WorkItem[] {
  const seen = new Set<string>();
  const items: WorkItem[] = [];
  for (const raw of text.split(/[\r\n,]+/)) {
    const id = raw.replace(/#.*$/, "").trim();
    if (!id || seen.has(id)) continue;
    seen.add(id);
    items.push(id);
  }
  return items;
}
