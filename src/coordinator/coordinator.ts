import { parseWorkerConfig } from "../config/workers.js";
import {
  createLoggerFromSettings,
  loadCoordinatorSettings,
  type CallConcurrencyPolicy,
  type CoordinatorSettings,
  type CoordinatorTimeouts,
} from "../config/settings.js";
import { NotConnectedError, NotInitializedError } from "../errors.js";
import type { ChildProcessGateway } from "../gateways/childProcess.js";
import { AsyncMutex } from "../infra/asyncMutex.js";
import type { StructuredLogger } from "../logger.js";
import type { ToolArguments, ToolDescriptor, ToolRecord, WorkerConfig } from "../types.js";
import { launchWorker } from "../workers/workerProcess.js";
import { WorkerSession } from "../workers/workerSession.js";
import { ConnectionRegistry, type Connection, type ConnectionSummary } from "./connections.js";
import { ResourceScope, type ScopeReleaseFailure, type ScopeReleaseReport } from "./resourceScope.js";
import { ToolRouter } from "./toolRouter.js";

export type CoordinatorLifecycle = "idle" | "open" | "closed";

export interface CoordinatorOptions {
  /** Defaults to {@link loadCoordinatorSettings} over `process.env`. */
  settings?: CoordinatorSettings;
  logger?: StructuredLogger;
  /** Spawns worker processes; tests inject in-process doubles. */
  gateway?: ChildProcessGateway;
  /** Overrides individual timeouts from {@link settings}. */
  timeouts?: Partial<CoordinatorTimeouts>;
  callConcurrency?: CallConcurrencyPolicy;
  clientInfo?: { name: string; version: string };
  /** Working directory of the spawned workers. */
  cwd?: string;
}

/**
 * Connects to a set of tool workers, merges their catalogs and routes each
 * call to the worker owning the tool. Workers are only launched between
 * {@link open} and {@link close}; every launched process is registered with a
 * resource scope so teardown terminates it whatever happened before.
 */
export class Coordinator {
  private readonly logger: StructuredLogger;
  private readonly gateway: ChildProcessGateway | undefined;
  private readonly timeouts: CoordinatorTimeouts;
  private readonly callConcurrency: CallConcurrencyPolicy;
  private readonly clientInfo: { name: string; version: string } | undefined;
  private readonly cwd: string | undefined;

  private readonly connections = new ConnectionRegistry();
  private readonly router: ToolRouter;
  private readonly scope: ResourceScope;
  private readonly writer = new AsyncMutex();
  private lifecycle: CoordinatorLifecycle = "idle";

  constructor(options: CoordinatorOptions = {}) {
    const settings = options.settings ?? loadCoordinatorSettings();
    this.logger = options.logger ?? createLoggerFromSettings(settings);
    this.gateway = options.gateway;
    this.timeouts = { ...settings.timeouts, ...options.timeouts };
    this.callConcurrency = options.callConcurrency ?? settings.callConcurrency;
    this.clientInfo = options.clientInfo;
    this.cwd = options.cwd;
    this.router = new ToolRouter(this.logger);
    this.scope = new ResourceScope(this.logger);
  }

  get state(): CoordinatorLifecycle {
    return this.lifecycle;
  }

  /** Enters the connection scope. Opening twice is a no-op; a closed coordinator cannot be reopened. */
  open(): this {
    if (this.lifecycle === "closed") {
      throw new NotInitializedError("open the coordinator", "it has already been closed");
    }
    if (this.lifecycle === "idle") {
      this.lifecycle = "open";
      this.logger.info("coordinator_opened", { workers: this.connections.names() });
    }
    return this;
  }

  /**
   * Registers (or replaces) a worker launch description. No process is
   * started. A replaced entry loses its session reference; the process it
   * owned stays registered with the scope and is terminated on close.
   */
  addServer(config: unknown): WorkerConfig {
    if (this.lifecycle === "closed") {
      throw new NotInitializedError("add a worker", "the coordinator has been closed");
    }
    const parsed = parseWorkerConfig(config);
    const { replaced } = this.connections.register(parsed);
    this.logger.info(replaced ? "worker_replaced" : "worker_registered", {
      worker: parsed.name,
      command: parsed.command,
      args: parsed.args,
      env_keys: Object.keys(parsed.env ?? {}).sort(),
    });
    return parsed;
  }

  /**
   * Launches the worker registered under {@link name}, performs the handshake
   * and records its tools. On failure the partially started worker is
   * terminated and the error propagates unchanged.
   */
  async connectToServer(name: string): Promise<ToolDescriptor[]> {
    this.assertOpen(`connect to worker '${name}'`);
    return this.writer.runExclusive(() => this.connect(name));
  }

  /** Connects every registered worker in registration order, stopping at the first failure. */
  async connectAll(): Promise<void> {
    this.assertOpen("connect the workers");
    await this.writer.runExclusive(async () => {
      for (const name of this.connections.names()) {
        await this.connect(name);
      }
    });
  }

  /** Releases every live session and clears the tool routes. */
  async disconnectAll(): Promise<void> {
    await this.writer.runExclusive(() => this.releaseAll());
  }

  listAllTools(): ToolRecord[] {
    return this.router.listAll(this.connections.values());
  }

  /** Routes {@link toolName} to its worker and returns the text the tool produced. */
  async callTool(toolName: string, args: ToolArguments = {}): Promise<string> {
    this.assertOpen(`call tool '${toolName}'`);
    const workerName = this.router.resolve(toolName);
    const session = this.connections.get(workerName)?.session;
    if (!session) {
      throw new NotConnectedError(workerName, toolName);
    }
    return session.callTool(toolName, args);
  }

  /**
   * Releases every session and then the remaining scope entries, newest
   * first, and forgets every registered worker. Release failures are
   * collected in the report instead of thrown.
   */
  async close(): Promise<ScopeReleaseReport> {
    if (this.lifecycle === "closed") {
      return { released: [], failures: [] };
    }
    this.lifecycle = "closed";

    return this.writer.runExclusive(async () => {
      const disconnected = await this.releaseAll();
      const remaining = await this.scope.close();
      this.connections.clear();
      const report: ScopeReleaseReport = {
        released: [...disconnected.released, ...remaining.released],
        failures: [...disconnected.failures, ...remaining.failures],
      };
      this.logger.info("coordinator_closed", {
        released: report.released.length,
        failures: report.failures.length,
      });
      await this.logger.flush();
      return report;
    });
  }

  getConnection(name: string): ConnectionSummary | undefined {
    return this.connections.summaries().find((summary) => summary.name === name);
  }

  listConnections(): ConnectionSummary[] {
    return this.connections.summaries();
  }

  /** Name of the worker owning {@link toolName}; throws when no worker exposes it. */
  resolveTool(toolName: string): string {
    return this.router.resolve(toolName);
  }

  private assertOpen(operation: string): void {
    if (this.lifecycle === "idle") {
      throw new NotInitializedError(operation, "the coordinator has not been opened");
    }
    if (this.lifecycle === "closed") {
      throw new NotInitializedError(operation, "the coordinator has been closed");
    }
  }

  private async connect(name: string): Promise<ToolDescriptor[]> {
    this.assertOpen(`connect to worker '${name}'`);
    const connection = this.connections.require(name);
    if (connection.release) {
      await this.releaseConnection(connection);
    }

    const worker = await launchWorker(connection.config, {
      logger: this.logger,
      launchTimeoutMs: this.timeouts.launchTimeoutMs,
      shutdownTimeoutMs: this.timeouts.shutdownTimeoutMs,
      ...(this.gateway ? { gateway: this.gateway } : {}),
      ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
    });
    const session = new WorkerSession(worker, {
      logger: this.logger,
      handshakeTimeoutMs: this.timeouts.handshakeTimeoutMs,
      requestTimeoutMs: this.timeouts.requestTimeoutMs,
      concurrency: this.callConcurrency,
      ...(this.clientInfo ? { clientInfo: this.clientInfo } : {}),
    });
    const release = this.scope.defer(`worker:${name}`, () => session.close());

    try {
      await session.initialize();
      const tools = await session.listTools();
      this.connections.attach(connection, session, tools, release);
      this.router.register(name, tools);
      this.logger.info("worker_connected", {
        worker: name,
        pid: worker.pid,
        server: session.serverInfo,
        tools: tools.map((tool) => tool.name),
      });
      return tools;
    } catch (error) {
      this.logger.error("worker_connect_failed", { worker: name, error });
      await release();
      throw error;
    }
  }

  private async releaseConnection(connection: Connection): Promise<ScopeReleaseFailure | null> {
    const release = connection.release;
    this.connections.detach(connection);
    if (!release) {
      return null;
    }
    const failure = await release();
    this.logger.info("worker_disconnected", { worker: connection.config.name, failed: failure !== null });
    return failure;
  }

  private async releaseAll(): Promise<ScopeReleaseReport> {
    const report: ScopeReleaseReport = { released: [], failures: [] };
    for (const connection of this.connections.values()) {
      const live = connection.release !== null;
      const failure = await this.releaseConnection(connection);
      if (failure) {
        report.failures.push(failure);
      } else if (live) {
        report.released.push(`worker:${connection.config.name}`);
      }
    }
    this.router.clear();
    return report;
  }
}

/**
 * Opens a coordinator, runs {@link body} and closes the coordinator
 * afterwards, including when {@link body} throws.
 */
export async function withCoordinator<T>(
  options: CoordinatorOptions,
  body: (coordinator: Coordinator) => Promise<T>,
): Promise<T> {
  const coordinator = new Coordinator(options).open();
  try {
    return await body(coordinator);
  } finally {
    await coordinator.close();
  }
}
