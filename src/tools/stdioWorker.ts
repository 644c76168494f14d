import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { readEnum } from "../config/env.js";
import { LOG_LEVELS, StructuredLogger } from "../logger.js";

/**
 * Serves {@link server} over the process stdio. Logs go to stderr because
 * stdout carries the protocol. The worker exits once its client closes stdin
 * or a termination signal arrives.
 */
export async function runStdioWorker(server: McpServer, name: string): Promise<void> {
  const logger = new StructuredLogger({
    stream: "stderr",
    minLevel: readEnum("WORKER_LOG_LEVEL", LOG_LEVELS, "warn"),
  });

  let stopping = false;
  const stop = async (reason: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info("worker_stopping", { worker: name, reason });
    try {
      await server.close();
    } catch (error) {
      logger.error("worker_close_failed", { worker: name, error });
      process.exitCode = 1;
    }
    await logger.flush();
    process.exit();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      void stop(signal);
    });
  }
  process.stdin.on("end", () => {
    void stop("stdin_closed");
  });

  await server.connect(new StdioServerTransport());
  logger.info("worker_listening", { worker: name, pid: process.pid });
}
