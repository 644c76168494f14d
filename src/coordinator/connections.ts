import { UnknownServerError } from "../errors.js";
import type { ToolDescriptor, WorkerConfig } from "../types.js";
import type { WorkerSession } from "../workers/workerSession.js";
import type { EarlyRelease } from "./resourceScope.js";

/**
 * Registry entry for one worker. The session and tool list are only set
 * while the worker is connected.
 */
export interface Connection {
  readonly config: WorkerConfig;
  session: WorkerSession | null;
  tools: ToolDescriptor[];
  /** Releases the live session through the owning scope. */
  release: EarlyRelease | null;
}

/** Public snapshot of a {@link Connection}. */
export interface ConnectionSummary {
  name: string;
  command: string;
  connected: boolean;
  toolNames: string[];
}

/** Worker registrations keyed by name, in registration order. */
export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();

  get size(): number {
    return this.connections.size;
  }

  /**
   * Stores a fresh, disconnected entry for {@link config}. An entry already
   * registered under the same name is replaced and returned; its session is
   * left running.
   */
  register(config: WorkerConfig): { connection: Connection; replaced: Connection | null } {
    const replaced = this.connections.get(config.name) ?? null;
    const connection: Connection = { config, session: null, tools: [], release: null };
    this.connections.set(config.name, connection);
    return { connection, replaced };
  }

  get(name: string): Connection | undefined {
    return this.connections.get(name);
  }

  /** Returns the entry registered under {@link name} or throws {@link UnknownServerError}. */
  require(name: string): Connection {
    const connection = this.connections.get(name);
    if (!connection) {
      throw new UnknownServerError(name);
    }
    return connection;
  }

  has(name: string): boolean {
    return this.connections.has(name);
  }

  names(): string[] {
    return [...this.connections.keys()];
  }

  values(): Connection[] {
    return [...this.connections.values()];
  }

  attach(connection: Connection, session: WorkerSession, tools: ToolDescriptor[], release: EarlyRelease): void {
    connection.session = session;
    connection.tools = tools;
    connection.release = release;
  }

  detach(connection: Connection): void {
    connection.session = null;
    connection.tools = [];
    connection.release = null;
  }

  summaries(): ConnectionSummary[] {
    return this.values().map((connection) => ({
      name: connection.config.name,
      command: connection.config.command,
      connected: connection.session !== null,
      toolNames: connection.tools.map((tool) => tool.name),
    }));
  }

  clear(): void {
    this.connections.clear();
  }
}
