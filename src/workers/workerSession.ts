import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import { CallToolResultSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

import { DEFAULT_TIMEOUTS, type CallConcurrencyPolicy } from "../config/settings.js";
import {
  ConcurrentCallError,
  CoordinatorError,
  HandshakeError,
  NotConnectedError,
  NotInitializedError,
  ProtocolError,
  TimeoutError,
  ToolExecutionError,
  type SessionOperation,
} from "../errors.js";
import { AsyncMutex } from "../infra/asyncMutex.js";
import { StructuredLogger } from "../logger.js";
import type { ToolArguments, ToolDescriptor, ToolInputSchema } from "../types.js";
import type { WorkerProcess } from "./workerProcess.js";
import { WorkerTransport } from "./workerTransport.js";

/** Identity announced by the coordinator during the handshake. */
export const COORDINATOR_CLIENT_INFO = { name: "tool-coordinator", version: "0.1.0" } as const;

export type WorkerSessionState = "created" | "initializing" | "ready" | "closed";

export interface WorkerSessionOptions {
  logger?: StructuredLogger;
  handshakeTimeoutMs?: number;
  requestTimeoutMs?: number;
  /** Behaviour when a request arrives while another one is in flight. Defaults to `queue`. */
  concurrency?: CallConcurrencyPolicy;
  clientInfo?: { name: string; version: string };
}

/** Identity reported by the worker in its handshake answer. */
export interface WorkerServerInfo {
  name: string;
  version: string;
}

/**
 * Protocol conversation with one worker. At most one request is outstanding
 * at a time: under the `queue` policy later requests wait their turn in
 * arrival order, under `reject` they fail with {@link ConcurrentCallError}.
 * Responses are correlated by JSON-RPC id so an answer arriving after its
 * request timed out is discarded instead of satisfying the next request.
 */
export class WorkerSession {
  public readonly workerName: string;

  private readonly worker: WorkerProcess;
  private readonly client: Client;
  private readonly transport: WorkerTransport;
  private readonly logger: StructuredLogger;
  private readonly handshakeTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly concurrency: CallConcurrencyPolicy;
  private readonly mutex = new AsyncMutex();

  private current: WorkerSessionState = "created";
  private inflight: AbortController | null = null;
  private closing: Promise<void> | null = null;

  constructor(worker: WorkerProcess, options: WorkerSessionOptions = {}) {
    this.worker = worker;
    this.workerName = worker.name;
    this.logger = options.logger ?? new StructuredLogger({ stream: null });
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_TIMEOUTS.handshakeTimeoutMs;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUTS.requestTimeoutMs;
    this.concurrency = options.concurrency ?? "queue";
    this.transport = new WorkerTransport(worker);
    this.client = new Client(options.clientInfo ?? { ...COORDINATOR_CLIENT_INFO }, { capabilities: {} });
    this.client.onerror = (error: Error) => this.handleTransportError(error);
    this.client.onclose = () => this.handleClosed();
  }

  get state(): WorkerSessionState {
    return this.current;
  }

  /** Identity reported by the worker, available once the handshake completed. */
  get serverInfo(): WorkerServerInfo | null {
    const info = this.client.getServerVersion();
    return info ? { name: info.name, version: info.version } : null;
  }

  /**
   * Performs the handshake. On failure the worker process is terminated and
   * a {@link HandshakeError} describing the cause is raised.
   */
  async initialize(): Promise<void> {
    if (this.current !== "created") {
      throw new HandshakeError(
        this.workerName,
        this.current === "closed" ? "session is closed" : "session was already initialized",
      );
    }
    this.current = "initializing";
    const controller = new AbortController();
    this.inflight = controller;
    const started = Date.now();

    try {
      await this.client.connect(this.transport, { timeout: this.handshakeTimeoutMs, signal: controller.signal });
    } catch (error) {
      const failure = this.describeHandshakeFailure(abortReason(controller) ?? error);
      this.logger.warn("worker_handshake_failed", { worker: this.workerName, error: failure });
      await this.close();
      throw failure;
    } finally {
      if (this.inflight === controller) {
        this.inflight = null;
      }
    }

    if (this.current !== "initializing") {
      // The worker went away right after answering.
      throw new HandshakeError(this.workerName, "worker exited right after the handshake", {
        stderr: this.worker.recentStderr(),
      });
    }
    this.current = "ready";
    this.logger.info("worker_handshake_completed", {
      worker: this.workerName,
      server: this.serverInfo,
      duration_ms: Date.now() - started,
    });
  }

  /** Retrieves every tool advertised by the worker, following pagination cursors. */
  async listTools(): Promise<ToolDescriptor[]> {
    return this.exchange("listTools", undefined, async (options) => {
      const tools: ToolDescriptor[] = [];
      const seenCursors = new Set<string>();
      let cursor: string | undefined;
      do {
        const page = await this.client.listTools(cursor === undefined ? undefined : { cursor }, options);
        for (const tool of page.tools) {
          tools.push(toDescriptor(tool));
        }
        cursor = page.nextCursor;
        if (cursor !== undefined) {
          if (seenCursors.has(cursor)) {
            throw new ProtocolError(this.workerName, "listTools", `pagination cursor '${cursor}' was repeated`);
          }
          seenCursors.add(cursor);
        }
      } while (cursor !== undefined);
      return tools;
    });
  }

  /**
   * Invokes {@link name} on the worker and returns the text of the first
   * content block, or an empty string when the result carries no content.
   */
  async callTool(name: string, args: ToolArguments = {}): Promise<string> {
    const result = await this.exchange("callTool", name, (options) =>
      this.client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema, options),
    );

    const blocks: ContentBlock[] = result.content;
    if (result.isError) {
      const message = blocks
        .map(textOf)
        .filter((text): text is string => text !== null)
        .join("\n");
      throw new ToolExecutionError(name, this.workerName, message || "tool reported an error without a message");
    }

    const [first] = blocks;
    if (first === undefined) {
      return "";
    }
    const text = textOf(first);
    if (text === null) {
      throw new ProtocolError(this.workerName, "callTool", `expected text content but received '${first.type}'`, {
        tool: name,
        hint: "unsupported_content",
      });
    }
    return text;
  }

  /** Ends the conversation and terminates the worker. Safe to call repeatedly. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.performClose();
    }
    return this.closing;
  }

  private async performClose(): Promise<void> {
    this.current = "closed";
    try {
      await this.client.close();
    } finally {
      await this.worker.terminate();
    }
  }

  private assertReady(operation: SessionOperation, tool: string | undefined): void {
    if (this.current === "created" || this.current === "initializing") {
      throw new NotInitializedError(`${operation} on worker '${this.workerName}'`, "the handshake has not completed");
    }
    if (this.current === "closed") {
      throw new NotConnectedError(this.workerName, tool);
    }
  }

  private async exchange<T>(
    operation: SessionOperation,
    tool: string | undefined,
    send: (options: RequestOptions) => Promise<T>,
  ): Promise<T> {
    this.assertReady(operation, tool);
    if (this.concurrency === "reject" && this.mutex.locked) {
      throw new ConcurrentCallError(this.workerName, operation, tool);
    }

    return this.mutex.runExclusive(async () => {
      this.assertReady(operation, tool);
      const controller = new AbortController();
      this.inflight = controller;
      const started = Date.now();
      try {
        const result = await send({ timeout: this.requestTimeoutMs, signal: controller.signal });
        this.logger.debug("worker_request_completed", {
          worker: this.workerName,
          operation,
          tool,
          duration_ms: Date.now() - started,
        });
        return result;
      } catch (error) {
        const failure = this.describeRequestFailure(abortReason(controller) ?? error, operation, tool);
        this.logger.warn("worker_request_failed", { worker: this.workerName, operation, tool, error: failure });
        throw failure;
      } finally {
        if (this.inflight === controller) {
          this.inflight = null;
        }
      }
    });
  }

  private describeHandshakeFailure(error: unknown): HandshakeError {
    const stderr = this.worker.recentStderr();
    if (error instanceof McpError && error.code === ErrorCode.RequestTimeout) {
      return new HandshakeError(this.workerName, `no answer within ${this.handshakeTimeoutMs}ms`, {
        cause: error,
        stderr,
      });
    }
    if (error instanceof McpError && error.code === ErrorCode.ConnectionClosed) {
      return new HandshakeError(this.workerName, "worker exited before completing the handshake", {
        cause: error,
        stderr,
      });
    }
    if (error instanceof ProtocolError) {
      return new HandshakeError(this.workerName, error.message, { cause: error, stderr });
    }
    return new HandshakeError(this.workerName, error instanceof Error ? error.message : String(error), {
      cause: error,
      stderr,
    });
  }

  private describeRequestFailure(
    error: unknown,
    operation: SessionOperation,
    tool: string | undefined,
  ): CoordinatorError {
    if (error instanceof CoordinatorError) {
      return error;
    }
    if (error instanceof McpError) {
      if (error.code === ErrorCode.RequestTimeout) {
        return new TimeoutError(this.workerName, operation, this.requestTimeoutMs, tool);
      }
      if (error.code === ErrorCode.ConnectionClosed) {
        return new ProtocolError(this.workerName, operation, "worker closed the connection", {
          hint: "worker_exited",
          cause: error,
          ...(tool !== undefined ? { tool } : {}),
        });
      }
      if (operation === "callTool" && tool !== undefined) {
        return new ToolExecutionError(tool, this.workerName, stripErrorPrefix(error.message));
      }
    }
    return new ProtocolError(this.workerName, operation, error instanceof Error ? error.message : String(error), {
      cause: error,
      ...(tool !== undefined ? { tool } : {}),
    });
  }

  private handleTransportError(error: Error): void {
    if (error instanceof ProtocolError && this.inflight) {
      this.logger.warn("worker_protocol_error", { worker: this.workerName, error });
      this.inflight.abort(error);
      return;
    }
    this.logger.warn("worker_unmatched_message", { worker: this.workerName, error });
  }

  private handleClosed(): void {
    if (this.current !== "closed") {
      this.logger.info("worker_session_closed", { worker: this.workerName, exited: this.worker.exited });
    }
    this.current = "closed";
  }
}

/**
 * Failure the session aborted {@link controller} with. The client may wrap
 * the abort reason in its own error, so the original is read off the signal.
 */
function abortReason(controller: AbortController): CoordinatorError | null {
  const reason: unknown = controller.signal.reason;
  return controller.signal.aborted && reason instanceof CoordinatorError ? reason : null;
}

/** Structural view of a result content block. */
type ContentBlock = { type: string; [key: string]: unknown };

function textOf(block: ContentBlock): string | null {
  return block.type === "text" && typeof block.text === "string" ? block.text : null;
}

/** Drops the `MCP error <code>: ` prefix the client adds to JSON-RPC errors. */
function stripErrorPrefix(message: string): string {
  return message.replace(/^MCP error -?\d+: /, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toDescriptor(tool: { name: string; description?: string | undefined; inputSchema: unknown }): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description ?? "",
    inputSchema: normaliseInputSchema(tool.inputSchema),
  };
}

function normaliseInputSchema(raw: unknown): ToolInputSchema {
  const schema: ToolInputSchema = { type: "object" };
  if (!isRecord(raw)) {
    return schema;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (key === "type" || key === "properties" || key === "required") {
      continue;
    }
    schema[key] = value;
  }
  if (isRecord(raw.properties)) {
    schema.properties = raw.properties;
  }
  if (Array.isArray(raw.required)) {
    schema.required = raw.required.filter((entry): entry is string => typeof entry === "string");
  }
  return schema;
}
