/**
 * Provisioner Configuration
 *
 * Schema-based configuration using Zod. Layers are merged lowest to highest:
 * schema defaults, JSON config file, BULK_PROVISIONER_* environment
 * variables, CLI overrides.
 */

import fs from "node:fs/promises";

import { z } from "zod";

import { resolveUserPath } from "../utils.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const retryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().nonnegative().default(5_000),
  maxDelayMs: z.number().int().nonnegative().default(60_000),
  rateLimitMultiplier: z.number().min(1).default(2),
});

export const burstConfigSchema = z.object({
  /** Pause after every N dispatches; 0 disables. */
  every: z.number().int().nonnegative().default(0),
  delayMs: z.number().int().nonnegative().default(1_000),
});

export const circuitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  threshold: z.number().min(0).max(1).default(0.3),
  minSamples: z.number().int().min(1).default(10),
});

export const outputConfigSchema = z.object({
  dir: z.string().min(1).default("."),
  lineFile: z.string().min(1).default("key.txt"),
  /** `{namespace}` is replaced with the run's namespace token. */
  commaFile: z.string().min(1).default("comma_separated_keys_{namespace}.txt"),
  batchSize: z.number().int().min(1).default(1),
});

export const gcloudConfigSchema = z.object({
  bin: z.string().min(1).default("gcloud"),
  commandTimeoutMs: z.number().int().positive().default(300_000),
});

export const loggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  file: z.string().min(1).optional(),
});

export const ProvisionerConfigSchema = z.object({
  prefix: z
    .string()
    .regex(/^[a-z][a-z0-9-]{0,19}$/, "prefix must start with a letter and use lowercase letters, digits or hyphens (max 20)")
    .default("proj"),
  count: z.number().int().min(1).default(10),
  concurrency: z.number().int().min(1).max(50).default(15),
  /** API service enabled on every project, e.g. `generativelanguage.googleapis.com`. */
  service: z.string().min(1).optional(),
  /** `{id}` is replaced with the project id. */
  credentialDisplayName: z.string().min(1).default("bulk-key-{id}"),
  retry: retryConfigSchema.default({}),
  settleMs: z.number().int().nonnegative().default(8_000),
  heartbeatMs: z.number().int().positive().default(2_000),
  dispatchDelayMs: z.number().int().nonnegative().default(200),
  burst: burstConfigSchema.default({}),
  circuit: circuitConfigSchema.default({}),
  graceMs: z.number().int().nonnegative().default(10_000),
  output: outputConfigSchema.default({}),
  gcloud: gcloudConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>;
export type ProvisionerConfigInput = z.input<typeof ProvisionerConfigSchema>;

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// =============================================================================
// Environment
// =============================================================================

export const ENV_PREFIX = "BULK_PROVISIONER_";

/** Environment variable suffix → dotted config path. */
const ENV_KEYS: Record<string, { path: string[]; numeric?: boolean }> = {
  PREFIX: { path: ["prefix"] },
  COUNT: { path: ["count"], numeric: true },
  CONCURRENCY: { path: ["concurrency"], numeric: true },
  SERVICE: { path: ["service"] },
  MAX_ATTEMPTS: { path: ["retry", "maxAttempts"], numeric: true },
  SETTLE_MS: { path: ["settleMs"], numeric: true },
  GRACE_MS: { path: ["graceMs"], numeric: true },
  OUTPUT_DIR: { path: ["output", "dir"] },
  GCLOUD_BIN: { path: ["gcloud", "bin"] },
  LOG_LEVEL: { path: ["logging", "level"] },
  LOG_FILE: { path: ["logging", "file"] },
};

/**
 * Collect BULK_PROVISIONER_* variables into a config layer. Numeric values
 * that do not parse are passed through as strings so validation reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  for (const [suffix, target] of Object.entries(ENV_KEYS)) {
    const raw = env[`${ENV_PREFIX}${suffix}`]?.trim();
    if (!raw) continue;
    const value = target.numeric && /^-?\d+(\.\d+)?$/.test(raw) ? Number(raw) : raw;
    setPath(layer, target.path, value);
  }
  return layer;
}

// =============================================================================
// Loading
// =============================================================================

export type LoadConfigOptions = {
  /** Path to a JSON config file. */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ProvisionerConfigInput;
};

export async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  const resolved = resolveUserPath(file);
  let text: string;
  try {
    text = await fs.readFile(resolved, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${resolved}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) throw new ConfigError(`Config file ${resolved} must contain a JSON object`);
  return parsed;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ProvisionerConfig> {
  const fileLayer = options.file ? await readConfigFile(options.file) : {};
  const envLayer = configFromEnv(options.env ?? {});
  const merged = mergeLayers(fileLayer, envLayer, stripUndefined(options.overrides ?? {}));
  return parseConfig(merged);
}

export function parseConfig(input: unknown): ProvisionerConfig {
  const result = ProvisionerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${at}: ${issue.message}`;
    });
    throw new ConfigError("Invalid configuration", issues);
  }
  return result.data;
}

export function getDefaultConfig(): ProvisionerConfig {
  return ProvisionerConfigSchema.parse({});
}

/** The service to enable; required by the commands that run Enable. */
export function requireService(config: ProvisionerConfig): string {
  if (!config.service) {
    throw new ConfigError(`No service configured. Pass --service or set ${ENV_PREFIX}SERVICE`);
  }
  return config.service;
}

/** Replace `{name}` placeholders. Unknown placeholders are left as-is. */
export function expandTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([a-zA-Z]+)\}/g, (match, name: string) => vars[name] ?? match);
}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function stripUndefined(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) return {};
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    out[key] = isRecord(entry) ? stripUndefined(entry) : entry;
  }
  return out;
}

export function mergeLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const existing = out[key];
      out[key] = isRecord(existing) && isRecord(value) ? mergeLayers(existing, value) : value;
    }
  }
  return out;
}
