import { LOG_LEVELS, StructuredLogger, type LogLevel, type LogStream } from "../logger.js";
import { readBool, readEnum, readInt, readOptionalString, type EnvSource } from "./env.js";

/** Policy applied when a second request reaches a session while one is in flight. */
export type CallConcurrencyPolicy = "queue" | "reject";

export const CALL_CONCURRENCY_POLICIES: readonly CallConcurrencyPolicy[] = ["queue", "reject"];

/** Bounded waits applied to every suspending worker operation. */
export interface CoordinatorTimeouts {
  /** Time allowed for the OS to report that the worker process started. */
  readonly launchTimeoutMs: number;
  /** Time allowed for the protocol handshake. */
  readonly handshakeTimeoutMs: number;
  /** Time allowed for each `tools/list` or `tools/call` exchange. */
  readonly requestTimeoutMs: number;
  /** Grace period granted to a worker after each termination signal. */
  readonly shutdownTimeoutMs: number;
}

export interface CoordinatorSettings {
  readonly timeouts: CoordinatorTimeouts;
  readonly callConcurrency: CallConcurrencyPolicy;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly logRedaction: boolean;
}

export const DEFAULT_TIMEOUTS: CoordinatorTimeouts = {
  launchTimeoutMs: 10_000,
  handshakeTimeoutMs: 10_000,
  requestTimeoutMs: 30_000,
  shutdownTimeoutMs: 2_000,
};

/**
 * Resolves the coordinator settings from the environment. Invalid or out of
 * range values fall back to the defaults.
 */
export function loadCoordinatorSettings(env: EnvSource = process.env): CoordinatorSettings {
  const positive = { min: 1, max: 3_600_000 };
  return {
    timeouts: {
      launchTimeoutMs: readInt("COORDINATOR_LAUNCH_TIMEOUT_MS", DEFAULT_TIMEOUTS.launchTimeoutMs, positive, env),
      handshakeTimeoutMs: readInt(
        "COORDINATOR_HANDSHAKE_TIMEOUT_MS",
        DEFAULT_TIMEOUTS.handshakeTimeoutMs,
        positive,
        env,
      ),
      requestTimeoutMs: readInt("COORDINATOR_REQUEST_TIMEOUT_MS", DEFAULT_TIMEOUTS.requestTimeoutMs, positive, env),
      shutdownTimeoutMs: readInt(
        "COORDINATOR_SHUTDOWN_TIMEOUT_MS",
        DEFAULT_TIMEOUTS.shutdownTimeoutMs,
        positive,
        env,
      ),
    },
    callConcurrency: readEnum("COORDINATOR_CALL_CONCURRENCY", CALL_CONCURRENCY_POLICIES, "queue", env),
    logLevel: readEnum("COORDINATOR_LOG_LEVEL", LOG_LEVELS, "info", env),
    logFile: readOptionalString("COORDINATOR_LOG_FILE", env) ?? null,
    logRedaction: readBool("COORDINATOR_LOG_REDACT", true, env),
  };
}

/** Builds the logger described by {@link settings}. */
export function createLoggerFromSettings(settings: CoordinatorSettings, stream: LogStream = "stdout"): StructuredLogger {
  return new StructuredLogger({
    stream,
    minLevel: settings.logLevel,
    logFile: settings.logFile,
    redactionEnabled: settings.logRedaction,
  });
}
