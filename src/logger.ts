import { Buffer } from "node:buffer";
import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Keys whose values are redacted from structured payloads. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
  "cookie",
]);

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Destination for the JSON lines. `null` keeps entries off the console entirely. */
export type LogStream = "stdout" | "stderr" | null;

export interface LoggerOptions {
  /**
   * Console stream receiving the entries. Worker processes must pick `stderr`
   * because their stdout carries protocol messages.
   */
  readonly stream?: LogStream;
  /** Entries below this level are not written to the stream or file. */
  readonly minLevel?: LogLevel;
  /** Optional file mirroring every emitted line. */
  readonly logFile?: string | null;
  /** Redacts values stored under {@link SENSITIVE_KEYS}. Enabled by default. */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked with every entry, regardless of {@link minLevel}. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on a console stream and optionally
 * mirrors them to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly stream: LogStream;
  private readonly minLevel: LogLevel;
  private readonly logFile?: string;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.stream = options.stream === undefined ? "stdout" : options.stream;
    this.minLevel = options.minLevel ?? "info";
    this.logFile = options.logFile ?? undefined;
    this.redactionEnabled = options.redactionEnabled ?? true;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /**
   * Waits for all pending file writes. Tests rely on this helper to assert
   * the content of mirrored log files deterministically.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const safePayload = payload !== undefined && this.redactionEnabled ? redactValue(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };

    if (this.entryListener) {
      this.entryListener(entry);
    }
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const line = `${JSON.stringify(entry, serialiseErrors)}\n`;
    if (this.stream === "stdout") {
      process.stdout.write(line);
    } else if (this.stream === "stderr") {
      process.stderr.write(line);
    }

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { file: logFile, bytes: Buffer.byteLength(line, "utf8"), error: describeError(err) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
        // Allow the next entry to retry the directory creation.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }
}

/** Serialises `Error` instances, which `JSON.stringify` would otherwise render as `{}`. */
function serialiseErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return describeError(value);
  }
  return value;
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const described: Record<string, unknown> = { name: error.name, message: error.message };
    if ("code" in error && typeof error.code === "string") {
      described.code = error.code;
    }
    return described;
  }
  return { message: String(error) };
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (value && typeof value === "object" && !(value instanceof Error)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : redactValue(entry);
    }
    return result;
  }
  return value;
}
