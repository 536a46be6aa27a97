/**
 * Provisioner Logging Subsystem
 *
 * Structured, level-based logging with subsystem names, per-item context,
 * secret redaction and pluggable transports (console, file, memory).
 */

import { createWriteStream, type WriteStream } from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  runId?: string;
  stage?: string;
  resourceId?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Context carried by a logger and stamped on every entry it writes.
 */
export type LogContext = {
  runId?: string;
  stage?: string;
  resourceId?: string;
};

export interface ProvisionLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): ProvisionLogger;
  withContext(context: LogContext): ProvisionLogger;
  /** Flush and close every transport. */
  close(): Promise<void>;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.stage) contextParts.push(`stage=${entry.stage}`);
    if (entry.resourceId) contextParts.push(`resource=${entry.resourceId}`);

    if (contextParts.length > 0) {
      const ctx = contextParts.join(" ");
      parts.push(colors ? `${COLORS.dim}(${ctx})${COLORS.reset}` : `(${ctx})`);
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Console Transport
// =============================================================================

/**
 * Writes everything to stderr so stdout stays free for reports and `--json`.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.error(formatted);
    }
  }
}

// =============================================================================
// File Transport
// =============================================================================

/**
 * Buffered append-only file transport. If the file cannot be opened or
 * written, it reports once on stderr and drops further entries.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private writeStream: WriteStream | null = null;
  private failed = false;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: LogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter =
      options.formatter ??
      createDefaultFormatter({
        colors: false,
        timestamps: true,
        includeMetadata: true,
      });
    this.minLevel = options.minLevel ?? "trace";
    this.bufferSize = options.bufferSize ?? 50;
  }

  write(entry: LogEntry): void {
    if (this.failed || !shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) {
      this.drain();
    }
  }

  async flush(): Promise<void> {
    this.drain();
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.writeStream;
    this.writeStream = null;
    if (stream) {
      await new Promise<void>((resolve) => stream.end(() => resolve()));
    }
  }

  private drain(): void {
    if (this.failed || this.buffer.length === 0) return;
    if (!this.writeStream) {
      const stream = createWriteStream(this.filePath, { flags: "a" });
      stream.on("error", (error) => this.disable(error));
      this.writeStream = stream;
    }

    const content = this.buffer.join("\n") + "\n";
    this.buffer = [];
    this.writeStream.write(content);
  }

  private disable(error: Error): void {
    if (this.failed) return;
    this.failed = true;
    this.buffer = [];
    this.writeStream = null;
    console.error(`Log file ${this.filePath} is not writable, file logging disabled: ${error.message}`);
  }
}

// =============================================================================
// Memory Transport
// =============================================================================

/** Keeps entries in memory. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

/** Google-style API keys; never written to logs in the clear. */
export const DEFAULT_REDACT_PATTERNS = ["AIza[0-9A-Za-z_\\-]{20,}"];

export class ProvisionLoggerImpl implements ProvisionLogger {
  readonly subsystem: string;
  private readonly level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? DEFAULT_REDACT_PATTERNS).map((p) => new RegExp(p, "g"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): ProvisionLogger {
    return new ProvisionLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): ProvisionLogger {
    return new ProvisionLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  async close(): Promise<void> {
    for (const transport of this.transports) {
      await transport.close?.();
    }
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      runId: this.context.runId,
      stage: this.context.stage,
      resourceId: this.context.resourceId,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Logger Factory
// =============================================================================

export type LoggingOptions = {
  level?: LogLevel;
  /** Append a plain-text copy of every entry to this file. */
  file?: string;
  redactPatterns?: string[];
  /** Replace the default transports entirely. */
  transports?: LogTransport[];
};

export function createProvisionLogger(subsystem: string, options?: LoggingOptions): ProvisionLogger {
  const level = options?.level ?? "info";
  const transports: LogTransport[] = options?.transports ?? [new ConsoleTransport()];

  if (!options?.transports && options?.file) {
    transports.push(new FileTransport({ filePath: options.file }));
  }

  return new ProvisionLoggerImpl({
    subsystem: `provisioner/${subsystem}`,
    level,
    transports,
    redactPatterns: options?.redactPatterns,
  });
}

/** A logger that records into memory only. */
export function createMemoryLogger(subsystem = "test", level: LogLevel = "trace"): {
  logger: ProvisionLogger;
  transport: MemoryTransport;
} {
  const transport = new MemoryTransport();
  return { logger: createProvisionLogger(subsystem, { level, transports: [transport] }), transport };
}
