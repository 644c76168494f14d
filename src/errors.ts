/**
 * Error taxonomy surfaced by the coordinator. Every error carries a stable
 * machine readable code, an optional recovery hint and structured details
 * naming the worker and/or tool involved so callers can diagnose failures
 * without inspecting coordinator internals.
 */

/** Stable error codes exposed on {@link CoordinatorError.code}. */
export const ERROR_CODES = {
  WORKER_LAUNCH: "E-WORKER-LAUNCH",
  WORKER_HANDSHAKE: "E-WORKER-HANDSHAKE",
  PROTOCOL: "E-PROTOCOL",
  TIMEOUT: "E-TIMEOUT",
  TOOL_FAILED: "E-TOOL-FAILED",
  TOOL_NOT_FOUND: "E-TOOL-NOTFOUND",
  WORKER_UNKNOWN: "E-WORKER-UNKNOWN",
  WORKER_NOT_CONNECTED: "E-WORKER-NOT-CONNECTED",
  CONCURRENT_CALL: "E-CONCURRENT-CALL",
  NOT_INITIALIZED: "E-NOT-INITIALIZED",
  WORKER_CONFIG: "E-WORKER-CONFIG",
} as const;

export type CoordinatorErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Operations performed against a worker session. */
export type SessionOperation = "initialize" | "listTools" | "callTool";

/**
 * Base class for every error raised by the coordinator and its sessions.
 */
export class CoordinatorError extends Error {
  public readonly code: CoordinatorErrorCode;
  public readonly hint?: string;
  public readonly details: Record<string, unknown>;

  constructor(
    code: CoordinatorErrorCode,
    message: string,
    options: { hint?: string; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CoordinatorError";
    this.code = code;
    this.hint = options.hint;
    this.details = options.details ?? {};
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause ?? "unknown");
}

/** Raised when a worker process cannot be started. */
export class LaunchError extends CoordinatorError {
  public readonly workerName: string;
  public readonly command: string;

  constructor(workerName: string, command: string, cause: unknown) {
    super(
      ERROR_CODES.WORKER_LAUNCH,
      `Failed to launch worker '${workerName}' (${command}): ${describeCause(cause)}`,
      { hint: "check the worker command and its permissions", details: { worker: workerName, command }, cause },
    );
    this.name = "LaunchError";
    this.workerName = workerName;
    this.command = command;
  }
}

/** Raised when the initial protocol exchange with a worker fails. */
export class HandshakeError extends CoordinatorError {
  public readonly workerName: string;

  constructor(workerName: string, reason: string, options: { cause?: unknown; stderr?: readonly string[] } = {}) {
    super(ERROR_CODES.WORKER_HANDSHAKE, `Handshake with worker '${workerName}' failed: ${reason}`, {
      hint: "verify the worker speaks a supported protocol version on stdout",
      details: { worker: workerName, reason, ...(options.stderr ? { stderr: [...options.stderr] } : {}) },
      cause: options.cause,
    });
    this.name = "HandshakeError";
    this.workerName = workerName;
  }
}

/** Raised when a worker sends a message the session cannot interpret. */
export class ProtocolError extends CoordinatorError {
  public readonly workerName: string;
  public readonly operation: SessionOperation | "transport";

  constructor(
    workerName: string,
    operation: SessionOperation | "transport",
    reason: string,
    options: { hint?: string; cause?: unknown; tool?: string } = {},
  ) {
    const target = options.tool ? ` while calling '${options.tool}'` : "";
    super(ERROR_CODES.PROTOCOL, `Protocol error from worker '${workerName}'${target}: ${reason}`, {
      hint: options.hint ?? "malformed_message",
      details: { worker: workerName, operation, ...(options.tool ? { tool: options.tool } : {}) },
      cause: options.cause,
    });
    this.name = "ProtocolError";
    this.workerName = workerName;
    this.operation = operation;
  }
}

/** Raised when a worker does not answer within the configured window. */
export class TimeoutError extends CoordinatorError {
  public readonly workerName: string;
  public readonly timeoutMs: number;

  constructor(workerName: string, operation: SessionOperation, timeoutMs: number, tool?: string) {
    const target = tool ? `call to '${tool}'` : operation;
    super(ERROR_CODES.TIMEOUT, `Worker '${workerName}' did not answer ${target} within ${timeoutMs}ms`, {
      hint: "raise the request timeout or check that the worker is responsive",
      details: { worker: workerName, operation, timeout_ms: timeoutMs, ...(tool ? { tool } : {}) },
    });
    this.name = "TimeoutError";
    this.workerName = workerName;
    this.timeoutMs = timeoutMs;
  }
}

/** Raised when a worker reports an application level failure for a tool call. */
export class ToolExecutionError extends CoordinatorError {
  public readonly toolName: string;
  public readonly workerName: string;
  /** Message reported by the worker, passed through verbatim. */
  public readonly workerMessage: string;

  constructor(toolName: string, workerName: string, workerMessage: string) {
    super(ERROR_CODES.TOOL_FAILED, `Tool '${toolName}' failed on worker '${workerName}': ${workerMessage}`, {
      details: { tool: toolName, worker: workerName },
    });
    this.name = "ToolExecutionError";
    this.toolName = toolName;
    this.workerName = workerName;
    this.workerMessage = workerMessage;
  }
}

/** Raised when no connected worker exposes the requested tool. */
export class ToolNotFoundError extends CoordinatorError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(ERROR_CODES.TOOL_NOT_FOUND, `Tool '${toolName}' not found in any server`, {
      hint: "list the available tools after connecting the workers",
      details: { tool: toolName },
    });
    this.name = "ToolNotFoundError";
    this.toolName = toolName;
  }
}

/** Raised when an operation targets a worker name that was never registered. */
export class UnknownServerError extends CoordinatorError {
  public readonly workerName: string;

  constructor(workerName: string) {
    super(ERROR_CODES.WORKER_UNKNOWN, `Unknown worker '${workerName}'`, {
      hint: "register the worker with addServer first",
      details: { worker: workerName },
    });
    this.name = "UnknownServerError";
    this.workerName = workerName;
  }
}

/** Raised when a call is routed to a worker without a live session. */
export class NotConnectedError extends CoordinatorError {
  public readonly workerName: string;

  constructor(workerName: string, toolName?: string) {
    const target = toolName ? ` (needed for tool '${toolName}')` : "";
    super(ERROR_CODES.WORKER_NOT_CONNECTED, `Not connected to worker '${workerName}'${target}`, {
      hint: "connect the worker before calling its tools",
      details: { worker: workerName, ...(toolName ? { tool: toolName } : {}) },
    });
    this.name = "NotConnectedError";
    this.workerName = workerName;
  }
}

/** Raised by sessions using the `reject` policy when a request is already in flight. */
export class ConcurrentCallError extends CoordinatorError {
  public readonly workerName: string;

  constructor(workerName: string, operation: SessionOperation, tool?: string) {
    super(
      ERROR_CODES.CONCURRENT_CALL,
      `Worker '${workerName}' already has a request in flight; ${tool ? `call to '${tool}'` : operation} rejected`,
      {
        hint: "await the previous request or use the queue concurrency policy",
        details: { worker: workerName, operation, ...(tool ? { tool } : {}) },
      },
    );
    this.name = "ConcurrentCallError";
    this.workerName = workerName;
  }
}

/** Raised when the API is used outside of its required lifecycle scope. */
export class NotInitializedError extends CoordinatorError {
  constructor(operation: string, reason: string) {
    super(ERROR_CODES.NOT_INITIALIZED, `Cannot ${operation}: ${reason}`, {
      hint: "open the coordinator (or run inside withCoordinator) before connecting or calling tools",
      details: { operation },
    });
    this.name = "NotInitializedError";
  }
}

/** Raised when a worker configuration or manifest fails validation. */
export class InvalidWorkerConfigError extends CoordinatorError {
  public readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(ERROR_CODES.WORKER_CONFIG, `Invalid worker configuration (${source}): ${issues.join("; ")}`, {
      hint: "fix the reported fields",
      details: { source, issues: [...issues] },
    });
    this.name = "InvalidWorkerConfigError";
    this.issues = [...issues];
  }
}
