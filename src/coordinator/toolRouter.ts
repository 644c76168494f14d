import { ToolNotFoundError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import type { ToolDescriptor, ToolRecord } from "../types.js";
import type { Connection } from "./connections.js";

/**
 * Maps every discovered tool name to the worker that owns it. Tool names are
 * global: when two workers expose the same name the last registration wins
 * and the override is logged.
 */
export class ToolRouter {
  private readonly routes = new Map<string, string>();
  private readonly logger: StructuredLogger;

  constructor(logger: StructuredLogger = new StructuredLogger({ stream: null })) {
    this.logger = logger;
  }

  get size(): number {
    return this.routes.size;
  }

  register(workerName: string, tools: readonly ToolDescriptor[]): void {
    for (const tool of tools) {
      const previous = this.routes.get(tool.name);
      if (previous !== undefined && previous !== workerName) {
        this.logger.warn("tool_name_collision", { tool: tool.name, previous_worker: previous, worker: workerName });
      }
      this.routes.set(tool.name, workerName);
    }
  }

  lookup(toolName: string): string | undefined {
    return this.routes.get(toolName);
  }

  /** Returns the owning worker or throws {@link ToolNotFoundError}. */
  resolve(toolName: string): string {
    const workerName = this.routes.get(toolName);
    if (workerName === undefined) {
      throw new ToolNotFoundError(toolName);
    }
    return workerName;
  }

  entries(): Array<[toolName: string, workerName: string]> {
    return [...this.routes.entries()];
  }

  /**
   * Builds the merged catalog: connections in registration order, tools in the
   * order each worker advertised them.
   */
  listAll(connections: readonly Connection[]): ToolRecord[] {
    const records: ToolRecord[] = [];
    for (const connection of connections) {
      for (const tool of connection.tools) {
        records.push({ ...tool, workerName: connection.config.name });
      }
    }
    return records;
  }

  clear(): void {
    this.routes.clear();
  }
}
